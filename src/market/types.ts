/**
 * Domain types shared by the peer resolver, the pivot calculator and the
 * report writers.
 */

/** One trading day for one symbol. Dates are YYYY-MM-DD. */
export interface DailyBar {
  date: string;
  open?: number;
  high: number;
  low: number;
  close: number;
  volume?: number;
}

export interface PivotLevels {
  pivot: number;
  s1: number;
  s2: number;
  r1: number;
  r2: number;
}

/** Values are kept at full precision; rounding happens at presentation. */
export interface PivotRow extends PivotLevels {
  symbol: string;
  date: string;
  high: number;
  low: number;
  close: number;
  prevClose: number;
  percentChange: number;
  isSeed: boolean;
}

export interface PivotGroup {
  seed: string;
  rows: PivotRow[];
}

export type Result<TData> =
  | { ok: true; data: TData }
  | { ok: false; error: string };

export type SymbolOutcome = { symbol: string } & Result<PivotRow>;

export interface PriceProvider {
  /**
   * Daily bars between `from` and `to`, oldest first. Resolves to an empty
   * array when the provider has no data for the symbol.
   */
  fetchDailyBars(params: {
    symbol: string;
    from: Date;
    to: Date;
  }): Promise<DailyBar[]>;
}

export interface PeerDiscoveryClient {
  /** Raw candidate list as returned by the service; entries are unvalidated. */
  fetchPeers(symbol: string): Promise<unknown[]>;
}
