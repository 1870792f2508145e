import { Global, Module } from "@nestjs/common";

import { MetricsService } from "./metrics.service";
import { METRICS_SINK } from "./metrics.types";

@Global()
@Module({
  providers: [
    { provide: MetricsService, useFactory: () => new MetricsService() },
    { provide: METRICS_SINK, useExisting: MetricsService }
  ],
  exports: [MetricsService, METRICS_SINK]
})
export class MetricsModule {}
