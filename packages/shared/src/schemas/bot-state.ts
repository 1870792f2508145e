import { z } from "zod";

import { ModelSnapshotSchema, TradeSignalSchema } from "./candle";

export const BOT_STATE_VERSION = 1 as const;

export const BotPhaseSchema = z.enum(["STOPPED", "WARMING_UP", "TRADING"]);
export type BotPhase = z.infer<typeof BotPhaseSchema>;

export const DecisionRecordSchema = z.object({
  id: z.string().min(1),
  ts: z.string().min(1),
  kind: z.string().min(1),
  summary: z.string().min(1),
  details: z.record(z.unknown()).optional()
});
export type DecisionRecord = z.infer<typeof DecisionRecordSchema>;

export const OrderSideSchema = z.enum(["BUY", "SELL"]);
export type OrderSide = z.infer<typeof OrderSideSchema>;

export const OrderStatusSchema = z.enum(["FILLED", "REJECTED"]);
export type OrderStatus = z.infer<typeof OrderStatusSchema>;

export const PaperOrderSchema = z.object({
  id: z.string().min(1),
  ts: z.string().min(1),
  symbol: z.string().min(1),
  side: OrderSideSchema,
  status: OrderStatusSchema,
  price: z.number().nonnegative(),
  quoteQty: z.number().nonnegative(),
  qty: z.number().nonnegative(),
  probability: z.number().min(0).max(1),
  riskFactor: z.number().positive(),
  reason: z.string().optional()
});
export type PaperOrder = z.infer<typeof PaperOrderSchema>;

export const PositionSchema = z.object({
  baseQty: z.number().nonnegative(),
  /** Quote spent on the open base quantity. */
  costQuote: z.number().nonnegative()
});
export type Position = z.infer<typeof PositionSchema>;

export const DailyPnlSchema = z.object({
  /** UTC day, YYYY-MM-DD. */
  day: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  realizedPnl: z.number()
});
export type DailyPnl = z.infer<typeof DailyPnlSchema>;

export const ModelStateSchema = z.object({
  snapshot: ModelSnapshotSchema.optional(),
  walkForwardFits: z.number().int().nonnegative().default(0),
  lastRefitAt: z.string().min(1).optional()
});
export type ModelState = z.infer<typeof ModelStateSchema>;

export const LastCycleSchema = z.object({
  ts: z.string().min(1),
  signal: TradeSignalSchema,
  probability: z.number().min(0).max(1),
  riskFactor: z.number().positive(),
  lastClose: z.number()
});
export type LastCycle = z.infer<typeof LastCycleSchema>;

export const BotStateSchema = z.object({
  version: z.literal(BOT_STATE_VERSION),
  startedAt: z.string().min(1).optional(),
  updatedAt: z.string().min(1),
  running: z.boolean(),
  phase: BotPhaseSchema,
  lastError: z.string().optional(),
  lastCycle: LastCycleSchema.optional(),
  decisions: z.array(DecisionRecordSchema),
  orderHistory: z.array(PaperOrderSchema),
  position: PositionSchema.default({ baseQty: 0, costQuote: 0 }),
  daily: DailyPnlSchema.optional(),
  model: ModelStateSchema.default({ walkForwardFits: 0 })
});
export type BotState = z.infer<typeof BotStateSchema>;

export function defaultBotState(): BotState {
  const now = new Date().toISOString();
  return {
    version: BOT_STATE_VERSION,
    startedAt: now,
    updatedAt: now,
    running: false,
    phase: "STOPPED",
    decisions: [],
    orderHistory: [],
    position: { baseQty: 0, costQuote: 0 },
    model: { walkForwardFits: 0 }
  };
}
