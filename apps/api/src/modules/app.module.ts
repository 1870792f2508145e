import { Module } from "@nestjs/common";

import { BotModule } from "./bot/bot.module";
import { ConfigModule } from "./config/config.module";
import { HealthModule } from "./health/health.module";
import { LoggingModule } from "./logging/logging.module";
import { MetricsModule } from "./metrics/metrics.module";

@Module({
  imports: [ConfigModule, LoggingModule, MetricsModule, HealthModule, BotModule]
})
export class AppModule {}
