import { z } from "zod";

export const CandleSchema = z.object({
  timestamp: z.number().int().nonnegative(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nonnegative()
});
export type Candle = z.infer<typeof CandleSchema>;

export const TradeSignalSchema = z.enum(["BUY", "SELL", "FLAT"]);
export type TradeSignal = z.infer<typeof TradeSignalSchema>;

export const ModelModeSchema = z.enum(["baseline", "extended"]);
export type ModelMode = z.infer<typeof ModelModeSchema>;

export const ModelSnapshotSchema = z.object({
  mode: ModelModeSchema,
  weights: z.array(z.number()),
  bias: z.number()
});
export type ModelSnapshot = z.infer<typeof ModelSnapshotSchema>;
