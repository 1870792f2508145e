import { Inject, Injectable } from "@nestjs/common";
import type { Candle } from "@wfbot/shared";
import { CandleSchema } from "@wfbot/shared";
import { z } from "zod";

import { ConfigService } from "../config/config.service";
import { BinanceClient } from "./binance-client";

export const CANDLE_FEED = Symbol("CANDLE_FEED");

export interface CandleFeed {
  /** Most recent candles, oldest first. */
  recent(limit: number): Promise<Candle[]>;
}

const decimal = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());

// [openTime, open, high, low, close, volume, closeTime, ...]
const KlineRowSchema = z.tuple([z.number(), decimal, decimal, decimal, decimal, decimal]).rest(z.unknown());

/** Drops rows that are not well-formed klines; the result is sorted by timestamp. */
export function parseKlines(payload: unknown): Candle[] {
  if (!Array.isArray(payload)) return [];
  const candles: Candle[] = [];
  for (const row of payload) {
    const kline = KlineRowSchema.safeParse(row);
    if (!kline.success) continue;
    const [timestamp, open, high, low, close, volume] = kline.data;
    const candle = CandleSchema.safeParse({ timestamp, open, high, low, close, volume });
    if (candle.success) candles.push(candle.data);
  }
  return candles.sort((a, b) => a.timestamp - b.timestamp);
}

// Binance caps a klines request at 1000 rows.
const MAX_KLINES_LIMIT = 1000;

@Injectable()
export class BinanceCandleFeedService implements CandleFeed {
  private readonly client: BinanceClient;

  constructor(@Inject(ConfigService) private readonly configService: ConfigService) {
    this.client = new BinanceClient({ baseUrl: configService.load().binanceBaseUrl });
  }

  async recent(limit: number): Promise<Candle[]> {
    const { symbol, interval } = this.configService.load();
    const capped = Math.max(1, Math.min(MAX_KLINES_LIMIT, Math.trunc(limit)));
    return parseKlines(await this.client.klines(symbol, interval, capped));
  }
}
