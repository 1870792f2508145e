import { Module } from "@nestjs/common";
import { APP_GUARD } from "@nestjs/core";

import { IntegrationsModule } from "../integrations/integrations.module";
import { ApiKeyGuard } from "../security/api-key.guard";
import { SignalModule } from "../signal/signal.module";
import { BotController } from "./bot.controller";
import { BotEngineService } from "./bot-engine.service";

@Module({
  imports: [IntegrationsModule, SignalModule],
  controllers: [BotController],
  providers: [
    BotEngineService,
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard
    }
  ],
  exports: [BotEngineService]
})
export class BotModule {}
