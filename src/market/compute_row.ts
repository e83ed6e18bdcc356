/**
 * Business logic: latest daily bar for a symbol turned into a pivot row.
 */
import { formatDate, windowStart } from "./dates";
import { computePivots, percentChange } from "./pivots";
import type { DailyBar, PriceProvider, SymbolOutcome } from "./types";
import { describeError } from "@src/util/http";

/** Calendar days requested; leaves room for weekends and holidays. */
export const DEFAULT_LOOKBACK_DAYS = 10;

export interface ComputeRowOptions {
  lookbackDays?: number;
  now?: Date;
  isSeed?: boolean;
}

/**
 * Never throws: provider errors and empty histories come back as failed
 * outcomes.
 */
export async function computeRow(
  symbol: string,
  provider: PriceProvider,
  options: ComputeRowOptions = {}
): Promise<SymbolOutcome> {
  const to = options.now ?? new Date();
  const from = windowStart(to, options.lookbackDays ?? DEFAULT_LOOKBACK_DAYS);

  let bars: DailyBar[];
  try {
    bars = await provider.fetchDailyBars({ symbol, from, to });
  } catch (err) {
    return { symbol, ok: false, error: describeError(err) };
  }

  const valid = bars
    .filter(isUsableBar)
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  const latest = valid[valid.length - 1];
  if (!latest) {
    return { symbol, ok: false, error: `empty data for ${symbol}` };
  }

  const { high, low, close } = latest;
  // With a single bar the change is reported as 0%
  const prevClose = valid[valid.length - 2]?.close ?? close;

  return {
    symbol,
    ok: true,
    data: {
      symbol,
      date: normalizeBarDate(latest.date, to),
      high,
      low,
      close,
      prevClose,
      percentChange: percentChange(close, prevClose),
      ...computePivots(high, low, close),
      isSeed: options.isSeed ?? false,
    },
  };
}

function isUsableBar(bar: DailyBar): boolean {
  return (
    Number.isFinite(bar.high) &&
    Number.isFinite(bar.low) &&
    Number.isFinite(bar.close)
  );
}

function normalizeBarDate(raw: string, fallback: Date): string {
  const head = raw.slice(0, 10);
  if (/^\d{4}-\d{2}-\d{2}$/.test(head)) return head;
  return formatDate(fallback);
}
