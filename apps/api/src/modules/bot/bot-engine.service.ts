import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { ConflictException, Inject, Injectable, type OnApplicationBootstrap, type OnModuleDestroy, type OnModuleInit } from "@nestjs/common";
import type { BotState, Candle, DailyPnl, DecisionRecord, LastCycle, ModelSnapshot, PaperOrder, Position } from "@wfbot/shared";
import { BotStateSchema, defaultBotState } from "@wfbot/shared";
import type { Logger } from "pino";

import { ConfigService } from "../config/config.service";
import { CANDLE_FEED, type CandleFeed } from "../integrations/candle-feed.service";
import { ORDER_EXECUTOR, type OrderExecutor } from "../integrations/paper-execution.service";
import { LOGGER } from "../logging/pino-logger";
import { METRICS_SINK, type MetricsSink, type MetricsSnapshot } from "../metrics/metrics.types";
import { ThresholdDecisionEngine, type TradeDecision } from "../signal/decision-engine";
import type { CandleModel } from "../signal/model.types";
import { type RiskAssessment, RiskSizer } from "../signal/risk-sizer";
import { MIN_FIT_CANDLES } from "../signal/signal-model";
import { SIGNAL_MODEL, TREND_GATE } from "../signal/signal.module";
import type { TrendGate } from "../signal/trend-gate";
import { type RefitOutcome, WalkForwardScheduler } from "../signal/walk-forward.scheduler";
import { CandleHistory } from "./candle-history";
import { addDailyPnl, applyFill, dailyLossReached, utcDay } from "./position";

function atomicWriteFile(filePath: string, data: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, data, { encoding: "utf-8" });
  fs.renameSync(tmpPath, filePath);
}

const MAX_JOURNAL = 500;
const MAX_ORDER_HISTORY = 500;
// Candles requested per cycle once warmed up; overlaps are merged by timestamp.
const REFRESH_CANDLES = 100;

export type CycleResult = {
  decision: TradeDecision;
  risk: RiskAssessment;
  refit: RefitOutcome;
  order?: PaperOrder;
};

export type ModelStatusResponse = {
  mode: CandleModel["mode"];
  featureCount: number;
  snapshot: ModelSnapshot;
  walkForward: {
    enabled: boolean;
    fits: number;
    lastRefitAt?: string;
  };
  historyCandles: number;
};

export type BotRunStatsResponse = {
  generatedAt: string;
  startedAt?: string;
  runtimeSeconds: number;
  phase: BotState["phase"];
  metrics: MetricsSnapshot;
  history: {
    candles: number;
    firstTs?: number;
    lastTs?: number;
  };
  lastCycle?: LastCycle;
  position: Position;
  daily?: DailyPnl;
  orders: {
    total: number;
    buys: number;
    sells: number;
    buyNotional: number;
    sellNotional: number;
  };
};

@Injectable()
export class BotEngineService implements OnModuleInit, OnApplicationBootstrap, OnModuleDestroy {
  private readonly statePath: string;
  private readonly history: CandleHistory;
  private readonly logger: Logger;

  private loopTimer: NodeJS.Timeout | null = null;
  private warmupTimer: NodeJS.Timeout | null = null;
  private tickInFlight = false;
  private warmedUp = false;

  constructor(
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(CANDLE_FEED) private readonly feed: CandleFeed,
    @Inject(ORDER_EXECUTOR) private readonly executor: OrderExecutor,
    @Inject(SIGNAL_MODEL) private readonly model: CandleModel,
    @Inject(TREND_GATE) private readonly trendGate: TrendGate,
    @Inject(ThresholdDecisionEngine) private readonly decisionEngine: ThresholdDecisionEngine,
    @Inject(RiskSizer) private readonly riskSizer: RiskSizer,
    @Inject(WalkForwardScheduler) private readonly scheduler: WalkForwardScheduler,
    @Inject(METRICS_SINK) private readonly metrics: MetricsSink,
    @Inject(LOGGER) logger: Logger
  ) {
    this.statePath = path.join(configService.dataDir, "state.json");
    this.history = new CandleHistory(configService.load().maxHistoryCandles);
    this.logger = logger.child({ component: "bot-engine" });
  }

  onModuleInit(): void {
    this.restoreModel();
  }

  onApplicationBootstrap(): void {
    const state = this.getState();
    if (!state.running) return;
    // A previous process was stopped without POST /bot/stop.
    this.save({ ...state, running: false, phase: "STOPPED" });
    this.start();
  }

  onModuleDestroy(): void {
    this.clearTimers();
  }

  getState(): BotState {
    if (!fs.existsSync(this.statePath)) {
      return defaultBotState();
    }

    try {
      const raw = fs.readFileSync(this.statePath, "utf-8");
      return BotStateSchema.parse(JSON.parse(raw));
    } catch (err) {
      const fallback = defaultBotState();
      return {
        ...fallback,
        lastError: err instanceof Error ? err.message : "Failed to load state.json"
      };
    }
  }

  private save(state: BotState): void {
    fs.mkdirSync(path.dirname(this.statePath), { recursive: true });
    const next: BotState = { ...state, updatedAt: new Date().toISOString() };
    atomicWriteFile(this.statePath, JSON.stringify(next, null, 2));
  }

  private restoreModel(): void {
    const { model: persisted } = this.getState();
    this.scheduler.resume({ fits: persisted.walkForwardFits, lastRefitAt: persisted.lastRefitAt });
    if (!persisted.snapshot) return;

    if (this.model.restore(persisted.snapshot)) {
      this.logger.info({ msg: "Model restored from state", mode: this.model.mode, fits: persisted.walkForwardFits });
    } else {
      this.logger.warn({
        msg: "Persisted model snapshot ignored",
        mode: this.model.mode,
        persistedMode: persisted.snapshot.mode,
        persistedWeights: persisted.snapshot.weights.length
      });
    }
  }

  private persistModel(): void {
    const state = this.getState();
    const progress = this.scheduler.progress();
    this.save({
      ...state,
      model: { snapshot: this.model.snapshot(), walkForwardFits: progress.fits, lastRefitAt: progress.lastRefitAt }
    });
  }

  isRunning(): boolean {
    return this.loopTimer !== null;
  }

  start(): void {
    if (this.isRunning()) return;
    const config = this.configService.load();

    this.addDecision("ENGINE", `Start requested (${config.symbol} ${config.interval}, ${this.model.mode} model)`);
    this.save({
      ...this.getState(),
      running: true,
      phase: this.warmedUp ? "TRADING" : "WARMING_UP",
      startedAt: new Date().toISOString(),
      lastError: undefined
    });

    if (!this.warmedUp) {
      this.warmupTimer = setTimeout(() => {
        this.warmupTimer = null;
        void this.tick();
      }, 250);
    }

    this.loopTimer = setInterval(() => {
      void this.tick();
    }, config.loopIntervalSec * 1000);
  }

  stop(): void {
    if (!this.isRunning()) return;

    this.addDecision("ENGINE", "Stop requested");
    this.clearTimers();
    this.save({ ...this.getState(), running: false, phase: "STOPPED" });
  }

  private clearTimers(): void {
    if (this.loopTimer) clearInterval(this.loopTimer);
    if (this.warmupTimer) clearTimeout(this.warmupTimer);
    this.loopTimer = null;
    this.warmupTimer = null;
  }

  private async tick(): Promise<void> {
    if (this.tickInFlight) return;
    this.tickInFlight = true;
    try {
      if (!this.warmedUp) {
        await this.warmup();
      } else {
        await this.runCycle();
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ msg: "Cycle failed", err });
      this.save({ ...this.getState(), lastError: message });
      this.addDecision("ERROR", message);
    } finally {
      this.tickInFlight = false;
    }
  }

  /** Loads the warmup window and trains the model on it once. */
  async warmup(): Promise<boolean> {
    const config = this.configService.load();
    const candles = await this.feed.recent(config.warmupCandles);
    this.history.merge(candles);

    const history = this.history.all();
    const { learningRate, epochs } = this.scheduler.training;
    const applied = this.model.fit(history, learningRate, epochs);
    this.scheduler.anchor(history);
    this.warmedUp = true;

    this.logger.info({ msg: "Warmup fit", candles: history.length, applied, mode: this.model.mode, epochs });
    this.persistModel();
    this.save({ ...this.getState(), phase: this.isRunning() ? "TRADING" : "STOPPED", lastError: undefined });
    this.addDecision(
      "WARMUP",
      applied ? `Warmup fit on ${history.length} candles` : `Warmup skipped: ${history.length} candles is not enough history`,
      { candles: history.length, applied }
    );
    return applied;
  }

  async runCycle(): Promise<CycleResult> {
    const config = this.configService.load();
    this.history.merge(await this.feed.recent(REFRESH_CANDLES));
    const candles = this.history.all();
    const last = candles[candles.length - 1];

    let refit: RefitOutcome = { status: "not_due" };
    let decision: TradeDecision;
    if (candles.length < MIN_FIT_CANDLES) {
      decision = this.decisionEngine.neutral("not_enough_data");
    } else {
      refit = this.scheduler.maybeRefit(candles);
      const probability = this.model.predictFromCandles(candles);
      decision = this.decisionEngine.decide(probability, this.trendGate.evaluate(candles));
    }

    const risk = this.riskSizer.assess(candles);
    this.metrics.recordDecision(decision.signal);
    this.metrics.setRiskFactor(risk.factor);
    this.logger.debug({ msg: "Decision", ...decision, riskFactor: risk.factor, candles: candles.length });

    const order = decision.signal === "FLAT" || !last ? undefined : await this.placeOrder(decision, risk, last);

    const state = this.getState();
    const lastCycle: LastCycle = {
      ts: new Date().toISOString(),
      signal: decision.signal,
      probability: decision.probability,
      riskFactor: risk.factor,
      lastClose: last?.close ?? 0
    };
    this.save({
      ...state,
      ...(order ? this.book(state, order) : {}),
      lastCycle,
      lastError: undefined,
      orderHistory: order ? [order, ...state.orderHistory].slice(0, MAX_ORDER_HISTORY) : state.orderHistory
    });
    if (refit.status === "fitted" || refit.status === "skipped") {
      this.persistModel();
      this.addDecision("REFIT", `Walk-forward refit ${refit.status} on ${refit.candles} candles`, { ...refit });
    }
    this.addDecision("SIGNAL", `${decision.signal}: ${decision.reason}`, {
      probability: decision.probability,
      confidence: decision.confidence,
      trend: decision.trend,
      riskFactor: risk.factor,
      riskPct: risk.riskPct,
      orderId: order?.id
    });

    return { decision, risk, refit, order };
  }

  private async placeOrder(decision: TradeDecision, risk: RiskAssessment, last: Candle): Promise<PaperOrder | undefined> {
    if (decision.signal === "FLAT") return undefined;
    const config = this.configService.load();
    const { position, daily } = this.getState();

    if (decision.signal === "BUY" && dailyLossReached(daily, utcDay(new Date()), config.usdEquity, config.maxDailyLossPct)) {
      const realizedPnl = daily?.realizedPnl ?? 0;
      this.logger.warn({ msg: "Daily loss limit reached; BUY skipped", realizedPnl, maxDailyLossPct: config.maxDailyLossPct });
      this.addDecision("RISK", `Daily loss limit reached (${realizedPnl.toFixed(2)} USD); BUY skipped`, {
        realizedPnl,
        maxDailyLossPct: config.maxDailyLossPct
      });
      return undefined;
    }

    const quoteQty = Math.max(this.riskSizer.quoteNotional(config.usdEquity, risk), config.orderMinUsd);

    const order = await this.executor.execute({
      symbol: config.symbol,
      side: decision.signal,
      quoteQty,
      price: last.close,
      probability: decision.probability,
      riskFactor: risk.factor,
      reason: decision.reason,
      maxBaseQty: decision.signal === "SELL" && config.longOnly ? position.baseQty : undefined
    });
    this.metrics.recordOrder(order.status);
    this.logger.info({
      msg: "Paper order",
      id: order.id,
      side: order.side,
      status: order.status,
      price: order.price,
      quoteQty: order.quoteQty,
      qty: order.qty,
      riskPct: risk.riskPct,
      reason: order.status === "REJECTED" ? order.reason : undefined
    });
    return order;
  }

  /** Position and daily PnL after a paper order. */
  private book(state: BotState, order: PaperOrder): Pick<BotState, "position" | "daily"> {
    const { position, realizedPnl } = applyFill(state.position, order);
    if (order.status !== "FILLED" || order.side === "BUY") return { position, daily: state.daily };
    return { position, daily: addDailyPnl(state.daily, utcDay(order.ts), realizedPnl) };
  }

  /** Forces a walk-forward refit on the current history. */
  refit(): RefitOutcome {
    if (!this.warmedUp || this.history.length === 0) {
      throw new ConflictException("No candle history yet. Start the bot and wait for warmup.");
    }
    const outcome = this.scheduler.trigger(this.history.all());
    this.persistModel();
    if (outcome.status === "fitted" || outcome.status === "skipped") {
      this.addDecision("REFIT", `Manual refit ${outcome.status} on ${outcome.candles} candles`, { ...outcome });
    }
    return outcome;
  }

  getModelStatus(): ModelStatusResponse {
    const progress = this.scheduler.progress();
    return {
      mode: this.model.mode,
      featureCount: this.model.featureCount,
      snapshot: this.model.snapshot(),
      walkForward: { enabled: this.scheduler.enabled, fits: progress.fits, lastRefitAt: progress.lastRefitAt },
      historyCandles: this.history.length
    };
  }

  getRunStats(): BotRunStatsResponse {
    const state = this.getState();
    const candles = this.history.all();
    const startedMs = state.startedAt ? Date.parse(state.startedAt) : Number.NaN;
    const filled = state.orderHistory.filter((o) => o.status === "FILLED");
    const sumQuote = (side: PaperOrder["side"]) =>
      filled.filter((o) => o.side === side).reduce((sum, o) => sum + o.quoteQty, 0);

    return {
      generatedAt: new Date().toISOString(),
      startedAt: state.startedAt,
      runtimeSeconds: Number.isFinite(startedMs) ? Math.max(0, Math.round((Date.now() - startedMs) / 1000)) : 0,
      phase: state.phase,
      metrics: this.metrics.snapshot(),
      history: {
        candles: candles.length,
        firstTs: candles[0]?.timestamp,
        lastTs: candles[candles.length - 1]?.timestamp
      },
      lastCycle: state.lastCycle,
      position: state.position,
      daily: state.daily,
      orders: {
        total: state.orderHistory.length,
        buys: filled.filter((o) => o.side === "BUY").length,
        sells: filled.filter((o) => o.side === "SELL").length,
        buyNotional: sumQuote("BUY"),
        sellNotional: sumQuote("SELL")
      }
    };
  }

  addDecision(kind: DecisionRecord["kind"], summary: DecisionRecord["summary"], details?: DecisionRecord["details"]): void {
    const state = this.getState();
    const decision: DecisionRecord = {
      id: crypto.randomUUID(),
      ts: new Date().toISOString(),
      kind,
      summary,
      details
    };
    this.save({ ...state, decisions: [decision, ...state.decisions].slice(0, MAX_JOURNAL) });
  }
}
