import type { Candle } from "@wfbot/shared";
import type { Logger } from "pino";

import type { MetricsSink } from "../metrics/metrics.types";
import type { CandleModel, TrainingSchedule } from "./model.types";

export type WalkForwardOptions = TrainingSchedule & {
  /** Minutes between refits; 0 disables the time cadence. */
  everyMinutes: number;
  /** New candles between refits; 0 disables the candle cadence. */
  everyCandles: number;
  window: number;
};

export type RefitOutcome =
  | { status: "disabled" | "not_due" }
  | { status: "fitted" | "skipped"; candles: number; forced: boolean };

export type WalkForwardProgress = {
  fits: number;
  lastRefitAt?: string;
};

const MINUTE_MS = 60_000;

export class WalkForwardScheduler {
  private lastTriggerAt: number | null = null;
  private lastTriggerCandleTs: number | null = null;
  private fitCount = 0;
  private lastFitAt: number | null = null;

  constructor(
    private readonly model: CandleModel,
    private readonly options: WalkForwardOptions,
    private readonly metrics: MetricsSink,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  get enabled(): boolean {
    return this.options.everyMinutes > 0 || this.options.everyCandles > 0;
  }

  /** Number of refits that applied gradient updates. */
  get fits(): number {
    return this.fitCount;
  }

  get lastRefitAt(): string | undefined {
    return this.lastFitAt === null ? undefined : new Date(this.lastFitAt).toISOString();
  }

  /** Learning rate and epochs used for every fit of the shared model. */
  get training(): TrainingSchedule {
    return { learningRate: this.options.learningRate, epochs: this.options.epochs };
  }

  progress(): WalkForwardProgress {
    return { fits: this.fitCount, lastRefitAt: this.lastRefitAt };
  }

  /** Continues counting from persisted progress. */
  resume(progress: WalkForwardProgress): void {
    this.fitCount = Math.max(0, Math.trunc(progress.fits));
    const at = progress.lastRefitAt ? Date.parse(progress.lastRefitAt) : Number.NaN;
    this.lastFitAt = Number.isFinite(at) ? at : null;
  }

  /** Marks the latest candles as already trained on without fitting. */
  anchor(candles: readonly Candle[]): void {
    this.lastTriggerAt = this.now();
    this.lastTriggerCandleTs = candles.length > 0 ? candles[candles.length - 1].timestamp : null;
  }

  isDue(candles: readonly Candle[]): boolean {
    if (!this.enabled) return false;
    if (this.lastTriggerAt === null) return true;

    const { everyMinutes, everyCandles } = this.options;
    if (everyMinutes > 0 && this.now() - this.lastTriggerAt >= everyMinutes * MINUTE_MS) return true;
    if (everyCandles > 0 && this.candlesSinceTrigger(candles) >= everyCandles) return true;
    return false;
  }

  maybeRefit(candles: readonly Candle[]): RefitOutcome {
    if (!this.enabled) return { status: "disabled" };
    if (!this.isDue(candles)) return { status: "not_due" };
    return this.refit(candles, false);
  }

  /** Refits regardless of cadence. */
  trigger(candles: readonly Candle[]): RefitOutcome {
    return this.refit(candles, true);
  }

  private refit(candles: readonly Candle[], forced: boolean): RefitOutcome {
    const window = candles.slice(-this.options.window);
    const applied = this.model.fit(window, this.options.learningRate, this.options.epochs);
    this.anchor(candles);

    if (!applied) {
      this.logger.info({ msg: "Walk-forward refit skipped", candles: window.length, forced, mode: this.model.mode });
      return { status: "skipped", candles: window.length, forced };
    }

    this.fitCount += 1;
    this.lastFitAt = this.lastTriggerAt;
    this.metrics.recordWalkForwardFit();
    this.logger.info({ msg: "Walk-forward refit", candles: window.length, forced, fits: this.fitCount, mode: this.model.mode });
    return { status: "fitted", candles: window.length, forced };
  }

  private candlesSinceTrigger(candles: readonly Candle[]): number {
    const since = this.lastTriggerCandleTs;
    if (since === null) return candles.length;
    let count = 0;
    for (let i = candles.length - 1; i >= 0 && candles[i].timestamp > since; i -= 1) {
      count += 1;
    }
    return count;
  }
}
