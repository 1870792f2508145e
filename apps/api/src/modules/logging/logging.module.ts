import { Global, Module } from "@nestjs/common";

import { ConfigService } from "../config/config.service";
import { LOGGER, createLogger } from "./pino-logger";

@Global()
@Module({
  providers: [
    {
      provide: LOGGER,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => createLogger({ level: config.logLevel, logDir: config.logDir })
    }
  ],
  exports: [LOGGER]
})
export class LoggingModule {}
