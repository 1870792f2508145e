import { z } from "zod";

import { ModelModeSchema } from "./candle";

const TRUE_VALUES = new Set(["1", "true", "y", "yes"]);
const FALSE_VALUES = new Set(["0", "false", "n", "no"]);

const envNumber = (schema: z.ZodNumber) => z.coerce.number().pipe(schema);

const envBoolean = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  const lower = value.toLowerCase();
  if (TRUE_VALUES.has(lower)) return true;
  if (FALSE_VALUES.has(lower)) return false;
  return value;
}, z.boolean());

const envString = z.string().min(1);

export const BotConfigSchema = z
  .object({
    symbol: envString.default("BTCUSDT"),
    interval: envString.default("1m"),
    loopIntervalSec: envNumber(z.number().int().min(1).max(86_400)).default(60),
    warmupCandles: envNumber(z.number().int().min(40).max(1000)).default(350),
    maxHistoryCandles: envNumber(z.number().int().min(100).max(100_000)).default(5000),

    buyThreshold: envNumber(z.number().min(0).max(1)).default(0.55),
    sellThreshold: envNumber(z.number().min(0).max(1)).default(0.45),
    useMAFilter: envBoolean.default(true),

    modelMode: z.preprocess((value) => (typeof value === "string" ? value.toLowerCase() : value), ModelModeSchema).default("baseline"),
    modelSeed: envNumber(z.number().int().nonnegative()).optional(),
    learningRate: envNumber(z.number().positive().max(10)).default(0.05),
    epochs: envNumber(z.number().int().min(1).max(1000)).default(4),

    walkForwardMin: envNumber(z.number().int().nonnegative()).default(0),
    walkForwardCandles: envNumber(z.number().int().nonnegative()).default(0),
    walkForwardWindow: envNumber(z.number().int().min(40)).default(500),

    volRiskAdjust: envBoolean.default(false),
    riskPerTradePct: envNumber(z.number().positive().max(100)).default(0.25),
    usdEquity: envNumber(z.number().positive()).default(1000),
    orderMinUsd: envNumber(z.number().nonnegative()).default(5),
    longOnly: envBoolean.default(true),
    maxDailyLossPct: envNumber(z.number().min(0).max(100)).default(1),

    port: envNumber(z.number().int().min(1).max(65535)).default(8080),
    apiKey: envString.optional(),
    binanceBaseUrl: z.string().url().default("https://api.binance.com")
  })
  .superRefine((value, ctx) => {
    if (value.buyThreshold <= value.sellThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `BUY_THRESHOLD (${value.buyThreshold}) must be greater than SELL_THRESHOLD (${value.sellThreshold})`,
        path: ["buyThreshold"]
      });
    }
  });

export type BotConfig = z.infer<typeof BotConfigSchema>;

const ENV_KEYS = {
  symbol: "SYMBOL",
  interval: "INTERVAL",
  loopIntervalSec: "LOOP_INTERVAL_SEC",
  warmupCandles: "WARMUP_CANDLES",
  maxHistoryCandles: "MAX_HISTORY_CANDLES",
  buyThreshold: "BUY_THRESHOLD",
  sellThreshold: "SELL_THRESHOLD",
  useMAFilter: "USE_MA_FILTER",
  modelMode: "MODEL_MODE",
  modelSeed: "MODEL_SEED",
  learningRate: "LEARNING_RATE",
  epochs: "EPOCHS",
  walkForwardMin: "WALK_FORWARD_MIN",
  walkForwardCandles: "WALK_FORWARD_CANDLES",
  walkForwardWindow: "WALK_FORWARD_WINDOW",
  volRiskAdjust: "VOL_RISK_ADJUST",
  riskPerTradePct: "RISK_PER_TRADE_PCT",
  usdEquity: "USD_EQUITY",
  orderMinUsd: "ORDER_MIN_USD",
  longOnly: "LONG_ONLY",
  maxDailyLossPct: "MAX_DAILY_LOSS_PCT",
  port: "PORT",
  apiKey: "API_KEY",
  binanceBaseUrl: "BINANCE_BASE_URL"
} as const satisfies Record<keyof BotConfig, string>;

// Blank values fall back to defaults, the same as unset keys.
export function parseBotConfig(env: Record<string, string | undefined>): BotConfig {
  const raw: Record<string, string | undefined> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key]?.trim();
    raw[field] = value ? value : undefined;
  }
  return BotConfigSchema.parse(raw);
}
