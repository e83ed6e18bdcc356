/**
 * Daily bars from Yahoo Finance via the yahoo-finance2 chart endpoint.
 */
import yahooFinance from "yahoo-finance2";
import { formatDate } from "../dates";
import type { DailyBar, PriceProvider } from "../types";

export interface ChartQuote {
  date: Date;
  open?: number | null;
  high?: number | null;
  low?: number | null;
  close?: number | null;
  volume?: number | null;
}

export interface ChartClient {
  chart(
    symbol: string,
    options: { period1: Date; period2: Date; interval: "1d" }
  ): Promise<{ meta?: { gmtoffset?: number | null }; quotes: ChartQuote[] }>;
}

function createDefaultClient(): ChartClient {
  yahooFinance.suppressNotices(["yahooSurvey"]);
  return {
    chart: (symbol, options) => yahooFinance.chart(symbol, options),
  };
}

export class YahooPriceProvider implements PriceProvider {
  private readonly client: ChartClient;

  constructor(client?: ChartClient) {
    this.client = client ?? createDefaultClient();
  }

  async fetchDailyBars(params: {
    symbol: string;
    from: Date;
    to: Date;
  }): Promise<DailyBar[]> {
    const result = await this.client.chart(params.symbol, {
      period1: params.from,
      period2: params.to,
      interval: "1d",
    });

    // quote timestamps are session opens in UTC; shift to the exchange clock
    const offsetMs = (finite(result.meta?.gmtoffset) ?? 0) * 1000;
    const bars: DailyBar[] = [];
    for (const quote of result.quotes) {
      const high = finite(quote.high);
      const low = finite(quote.low);
      const close = finite(quote.close);
      // Yahoo emits null OHLC for halted days and the in-progress session
      if (high === undefined || low === undefined || close === undefined) {
        continue;
      }
      bars.push({
        date: formatDate(new Date(quote.date.getTime() + offsetMs)),
        open: finite(quote.open),
        high,
        low,
        close,
        volume: finite(quote.volume),
      });
    }
    return bars;
  }
}

function finite(value: number | null | undefined): number | undefined {
  return typeof value === "number" && Number.isFinite(value)
    ? value
    : undefined;
}
