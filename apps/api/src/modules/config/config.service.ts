import path from "node:path";

import { Injectable } from "@nestjs/common";
import type { BotConfig } from "@wfbot/shared";
import { parseBotConfig } from "@wfbot/shared";

export type Env = Record<string, string | undefined>;

/** Bot configuration parsed once from the environment and frozen. */
@Injectable()
export class ConfigService {
  private readonly config: Readonly<BotConfig>;

  constructor(private readonly env: Env) {
    this.config = Object.freeze(parseBotConfig(env));
  }

  load(): Readonly<BotConfig> {
    return this.config;
  }

  get dataDir(): string {
    return this.env.DATA_DIR ?? path.resolve(process.cwd(), "data");
  }

  get logDir(): string {
    return this.env.LOG_DIR ?? path.join(this.dataDir, "logs");
  }

  get logLevel(): string {
    return this.env.LOG_LEVEL ?? "info";
  }
}
