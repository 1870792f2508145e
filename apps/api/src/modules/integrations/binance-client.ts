export type BinanceClientOptions = {
  baseUrl: string;
  timeoutMs?: number;
};

/** Unsigned Binance spot REST client for public market data. */
export class BinanceClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: BinanceClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 7000;
  }

  async klines(symbol: string, interval: string, limit: number): Promise<unknown> {
    return await this.request("/api/v3/klines", { symbol, interval, limit });
  }

  private async request(path: string, query?: Record<string, string | number | undefined>): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    const params = new URLSearchParams();

    for (const [key, value] of Object.entries(query ?? {})) {
      if (value === undefined) continue;
      params.set(key, String(value));
    }

    if (params.size > 0) {
      url.search = params.toString();
    }

    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await fetch(url, { method: "GET", signal: controller.signal });

      if (!res.ok) {
        const text = await res.text().catch(() => "");
        throw new Error(`Binance HTTP ${res.status}: ${text.slice(0, 250)}`);
      }

      return await res.json();
    } finally {
      clearTimeout(t);
    }
  }
}
