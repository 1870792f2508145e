import { Module } from "@nestjs/common";

import { BinanceCandleFeedService, CANDLE_FEED } from "./candle-feed.service";
import { ORDER_EXECUTOR, PaperExecutionService } from "./paper-execution.service";

@Module({
  providers: [
    BinanceCandleFeedService,
    { provide: CANDLE_FEED, useExisting: BinanceCandleFeedService },
    { provide: ORDER_EXECUTOR, useFactory: () => new PaperExecutionService() }
  ],
  exports: [CANDLE_FEED, ORDER_EXECUTOR]
})
export class IntegrationsModule {}
