import { computePivots, percentChange } from "@src/market/pivots";
import type { DailyBar, PivotRow, PriceProvider } from "@src/market/types";

export function makeRow(
  symbol: string,
  overrides: Partial<{
    date: string;
    high: number;
    low: number;
    close: number;
    prevClose: number;
    isSeed: boolean;
  }> = {}
): PivotRow {
  const high = overrides.high ?? 110;
  const low = overrides.low ?? 90;
  const close = overrides.close ?? 100;
  const prevClose = overrides.prevClose ?? 95;
  return {
    symbol,
    date: overrides.date ?? "2024-09-10",
    high,
    low,
    close,
    prevClose,
    percentChange: percentChange(close, prevClose),
    ...computePivots(high, low, close),
    isSeed: overrides.isSeed ?? false,
  };
}

/** Two bars ending 2024-09-10: prev close 95, latest h=110 l=90 c=100. */
export function standardBars(): DailyBar[] {
  return [
    { date: "2024-09-09", high: 97, low: 93, close: 95 },
    { date: "2024-09-10", high: 110, low: 90, close: 100 },
  ];
}

/**
 * In-process price provider: symbols map to bars, or to an Error that the
 * fetch rejects with. Unknown symbols resolve to no bars.
 */
export function createFakeProvider(
  data: Record<string, DailyBar[] | Error>
): PriceProvider & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    fetchDailyBars: async ({ symbol }) => {
      calls.push(symbol);
      const entry = data[symbol];
      if (entry instanceof Error) throw entry;
      return entry ?? [];
    },
  };
}
