import type { Candle } from "@wfbot/shared";

// All series are aligned to the input: out[i] describes the candle at i.

export function closesOf(candles: readonly Candle[]): number[] {
  return candles.map((c) => c.close);
}

export function sma(values: readonly number[], period: number): number[] {
  const out = new Array<number>(values.length).fill(Number.NaN);
  if (period <= 0) return out;
  let sum = 0;
  for (let i = 0; i < values.length; i += 1) {
    sum += values[i];
    if (i >= period) sum -= values[i - period];
    if (i >= period - 1) out[i] = sum / period;
  }
  return out;
}

/** Exponential moving average seeded with the first value (no warmup gap). */
export function ema(values: readonly number[], period: number): number[] {
  const out = new Array<number>(values.length);
  if (values.length === 0) return out;
  const k = 2 / (period + 1);
  out[0] = values[0];
  for (let i = 1; i < values.length; i += 1) {
    out[i] = values[i] * k + out[i - 1] * (1 - k);
  }
  return out;
}

// A window with no losses has rs = 0, so it reads as 0 rather than 100.
function rsiFromAverages(avgGain: number, avgLoss: number): number {
  const rs = avgLoss === 0 ? 0 : avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/**
 * Relative Strength Index with Wilder smoothing.
 * Indices before the first full window are 0.
 */
export function rsi(candles: readonly Candle[], period = 14): number[] {
  const out = new Array<number>(candles.length).fill(0);
  if (period <= 0 || candles.length <= period) return out;

  let gain = 0;
  let loss = 0;
  for (let i = 1; i <= period; i += 1) {
    const diff = candles[i].close - candles[i - 1].close;
    if (diff >= 0) gain += diff;
    else loss -= diff;
  }
  let avgGain = gain / period;
  let avgLoss = loss / period;
  out[period] = rsiFromAverages(avgGain, avgLoss);

  for (let i = period + 1; i < candles.length; i += 1) {
    const diff = candles[i].close - candles[i - 1].close;
    const g = diff > 0 ? diff : 0;
    const l = diff < 0 ? -diff : 0;
    avgGain = (avgGain * (period - 1) + g) / period;
    avgLoss = (avgLoss * (period - 1) + l) / period;
    out[i] = rsiFromAverages(avgGain, avgLoss);
  }
  return out;
}

/**
 * Rolling z-score of close (population variance, floored at 1e-12).
 * Indices before the first full window are 0.
 */
export function zScore(candles: readonly Candle[], period = 20): number[] {
  const out = new Array<number>(candles.length).fill(0);
  if (period <= 1) return out;
  let sum = 0;
  let sumSq = 0;
  for (let i = 0; i < candles.length; i += 1) {
    const x = candles[i].close;
    sum += x;
    sumSq += x * x;
    if (i >= period) {
      const y = candles[i - period].close;
      sum -= y;
      sumSq -= y * y;
    }
    if (i >= period - 1) {
      const mean = sum / period;
      const variance = sumSq / period - mean * mean;
      out[i] = (x - mean) / Math.sqrt(Math.max(variance, 1e-12));
    }
  }
  return out;
}

/** Rolling population standard deviation; 0 before the first full window. */
export function rollingStd(values: readonly number[], period: number): number[] {
  const out = new Array<number>(values.length).fill(0);
  if (period <= 1) return out;
  let sum = 0;
  let sumSq = 0;
  for (let i = 0; i < values.length; i += 1) {
    sum += values[i];
    sumSq += values[i] * values[i];
    if (i >= period) {
      sum -= values[i - period];
      sumSq -= values[i - period] * values[i - period];
    }
    if (i >= period - 1) {
      const mean = sum / period;
      out[i] = Math.sqrt(Math.max(sumSq / period - mean * mean, 0));
    }
  }
  return out;
}

/** Average True Range with Wilder smoothing; 0 before the first full window. */
export function atr(candles: readonly Candle[], period = 14): number[] {
  const out = new Array<number>(candles.length).fill(0);
  if (period <= 0 || candles.length <= period) return out;
  let value = 0;
  for (let i = 1; i < candles.length; i += 1) {
    const c = candles[i];
    const prevClose = candles[i - 1].close;
    const tr = Math.max(c.high - c.low, Math.abs(c.high - prevClose), Math.abs(c.low - prevClose));
    if (i <= period) {
      value += tr;
      if (i === period) {
        value /= period;
        out[i] = value;
      }
      continue;
    }
    value = (value * (period - 1) + tr) / period;
    out[i] = value;
  }
  return out;
}

export type MacdSeries = {
  macd: number[];
  signal: number[];
  histogram: number[];
};

export function macd(values: readonly number[], fast = 12, slow = 26, signalPeriod = 9): MacdSeries {
  const fastEma = ema(values, fast);
  const slowEma = ema(values, slow);
  const line = values.map((_, i) => fastEma[i] - slowEma[i]);
  const signal = ema(line, signalPeriod);
  return {
    macd: line,
    signal,
    histogram: line.map((v, i) => v - signal[i])
  };
}

/** On-Balance Volume, starting at 0. */
export function obv(candles: readonly Candle[]): number[] {
  const out = new Array<number>(candles.length).fill(0);
  for (let i = 1; i < candles.length; i += 1) {
    const diff = candles[i].close - candles[i - 1].close;
    const step = diff > 0 ? candles[i].volume : diff < 0 ? -candles[i].volume : 0;
    out[i] = out[i - 1] + step;
  }
  return out;
}
