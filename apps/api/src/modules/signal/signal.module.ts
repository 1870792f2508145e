import { Module } from "@nestjs/common";
import type { Logger } from "pino";

import { ConfigService } from "../config/config.service";
import { LOGGER } from "../logging/pino-logger";
import type { MetricsSink } from "../metrics/metrics.types";
import { METRICS_SINK } from "../metrics/metrics.types";
import { ThresholdDecisionEngine } from "./decision-engine";
import { ExtendedSignalModel } from "./extended-model";
import type { CandleModel } from "./model.types";
import { createSeededRandom, resolveSeed } from "./random";
import { RiskSizer } from "./risk-sizer";
import { SignalModel } from "./signal-model";
import { trainingSchedule } from "./training-schedule";
import { EmaTurnTrendGate } from "./trend-gate";
import { WalkForwardScheduler } from "./walk-forward.scheduler";

export const SIGNAL_MODEL = Symbol("SIGNAL_MODEL");
export const TREND_GATE = Symbol("TREND_GATE");

@Module({
  providers: [
    {
      provide: SIGNAL_MODEL,
      inject: [ConfigService, LOGGER, METRICS_SINK],
      useFactory: (configService: ConfigService, logger: Logger, metrics: MetricsSink): CandleModel => {
        const config = configService.load();
        const seed = resolveSeed(config.modelSeed);
        const random = createSeededRandom(seed);
        const model = config.modelMode === "extended" ? new ExtendedSignalModel(random) : new SignalModel(random);
        metrics.setModelMode(model.mode);
        logger.info({ msg: "Signal model initialized", mode: model.mode, seed, seeded: config.modelSeed !== undefined });
        return model;
      }
    },
    {
      provide: TREND_GATE,
      useFactory: () => new EmaTurnTrendGate()
    },
    {
      provide: ThresholdDecisionEngine,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const { buyThreshold, sellThreshold, useMAFilter } = configService.load();
        return new ThresholdDecisionEngine({ buyThreshold, sellThreshold, useMAFilter });
      }
    },
    {
      provide: RiskSizer,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const config = configService.load();
        return new RiskSizer({ enabled: config.volRiskAdjust, baseRiskPct: config.riskPerTradePct });
      }
    },
    {
      provide: WalkForwardScheduler,
      inject: [SIGNAL_MODEL, ConfigService, METRICS_SINK, LOGGER],
      useFactory: (model: CandleModel, configService: ConfigService, metrics: MetricsSink, logger: Logger) => {
        const config = configService.load();
        return new WalkForwardScheduler(
          model,
          {
            everyMinutes: config.walkForwardMin,
            everyCandles: config.walkForwardCandles,
            window: config.walkForwardWindow,
            ...trainingSchedule(config)
          },
          metrics,
          logger.child({ component: "walk-forward" })
        );
      }
    }
  ],
  exports: [SIGNAL_MODEL, TREND_GATE, ThresholdDecisionEngine, RiskSizer, WalkForwardScheduler]
})
export class SignalModule {}
