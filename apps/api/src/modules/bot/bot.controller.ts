import { Controller, Get, Inject, Post } from "@nestjs/common";
import type { BotState } from "@wfbot/shared";

import type { RefitOutcome } from "../signal/walk-forward.scheduler";
import { BotEngineService, type BotRunStatsResponse, type ModelStatusResponse } from "./bot-engine.service";

@Controller()
export class BotController {
  constructor(@Inject(BotEngineService) private readonly botEngine: BotEngineService) {}

  @Get("bot/status")
  getStatus(): BotState {
    return this.botEngine.getState();
  }

  @Get("bot/model")
  getModel(): ModelStatusResponse {
    return this.botEngine.getModelStatus();
  }

  @Get("bot/run-stats")
  getRunStats(): BotRunStatsResponse {
    return this.botEngine.getRunStats();
  }

  @Post("bot/start")
  start(): { ok: true } {
    this.botEngine.start();
    return { ok: true };
  }

  @Post("bot/stop")
  stop(): { ok: true } {
    this.botEngine.stop();
    return { ok: true };
  }

  @Post("bot/refit")
  refit(): RefitOutcome {
    return this.botEngine.refit();
  }

  @Get("bot/decisions")
  getDecisions(): BotState["decisions"] {
    return this.botEngine.getState().decisions;
  }

  @Get("orders/history")
  getOrderHistory(): BotState["orderHistory"] {
    return this.botEngine.getState().orderHistory;
  }
}
