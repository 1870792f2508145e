import { Global, Module } from "@nestjs/common";
import { config as loadDotenv } from "dotenv";

import { ConfigService } from "./config.service";

@Global()
@Module({
  providers: [
    {
      provide: ConfigService,
      useFactory: () => {
        loadDotenv();
        return new ConfigService(process.env);
      }
    }
  ],
  exports: [ConfigService]
})
export class ConfigModule {}
