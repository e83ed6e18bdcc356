/**
 * Business logic: seed + peers -> ordered group of pivot rows, and the
 * full dataset across all seeds.
 */
import { computeRow, DEFAULT_LOOKBACK_DAYS } from "./compute_row";
import {
  GroupBuildError,
  ReportBuildError,
  SeedFailure,
  SymbolFailure,
} from "./errors";
import {
  DEFAULT_PEER_LIMIT,
  FallbackPeerTable,
  resolvePeers,
} from "./resolve_peers";
import { normalizeSymbol, normalizeSymbols } from "./symbols";
import type {
  PeerDiscoveryClient,
  PivotGroup,
  PivotRow,
  PriceProvider,
  SymbolOutcome,
} from "./types";
import { getLogger } from "@src/util/logger";
import { describeError } from "@src/util/http";

export interface BuildGroupDependencies {
  priceProvider: PriceProvider;
  peerClient?: PeerDiscoveryClient;
  fallbackPeers?: FallbackPeerTable;
  peerLimit?: number;
  lookbackDays?: number;
  /** Fetch a group's symbols concurrently; ordering still comes from the final sort. */
  parallel?: boolean;
  now?: Date;
}

export async function buildGroup(
  seed: string,
  deps: BuildGroupDependencies
): Promise<PivotGroup> {
  const logger = getLogger("market/build_group");
  const seedSymbol = normalizeSymbol(seed);

  const peers = await resolvePeers(seedSymbol, {
    limit: deps.peerLimit ?? DEFAULT_PEER_LIMIT,
    client: deps.peerClient,
    fallback: deps.fallbackPeers,
  });
  const candidates = normalizeSymbols([seedSymbol, ...peers]);
  logger.debug({ seed: seedSymbol, candidates }, "group candidates");

  const fetchOne = (symbol: string): Promise<SymbolOutcome> =>
    computeRow(symbol, deps.priceProvider, {
      lookbackDays: deps.lookbackDays ?? DEFAULT_LOOKBACK_DAYS,
      now: deps.now,
      isSeed: symbol === seedSymbol,
    });

  const outcomes: SymbolOutcome[] = [];
  if (deps.parallel) {
    outcomes.push(...(await Promise.all(candidates.map(fetchOne))));
  } else {
    for (const symbol of candidates) {
      outcomes.push(await fetchOne(symbol));
    }
  }

  const rows: PivotRow[] = [];
  const failures: SymbolFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      rows.push(outcome.data);
    } else {
      failures.push({ symbol: outcome.symbol, error: outcome.error });
      logger.warn(
        { seed: seedSymbol, symbol: outcome.symbol, error: outcome.error },
        "symbol fetch failed, skipping"
      );
    }
  }

  if (rows.length === 0) {
    throw new GroupBuildError(seedSymbol, failures);
  }

  rows.sort(compareRows);
  logger.info(
    { seed: seedSymbol, rows: rows.length, failed: failures.length },
    "group built"
  );
  return { seed: seedSymbol, rows };
}

/** Seed row first, then alphabetical by symbol. */
export function compareRows(a: PivotRow, b: PivotRow): number {
  if (a.isSeed !== b.isSeed) return a.isSeed ? -1 : 1;
  if (a.symbol < b.symbol) return -1;
  if (a.symbol > b.symbol) return 1;
  return 0;
}

export interface BuildReportOutput {
  groups: PivotGroup[];
  failedSeeds: SeedFailure[];
}

/**
 * Builds one group per seed, sequentially. A seed whose group fails is
 * logged and skipped; no groups at all is fatal.
 */
export async function buildReport(
  seeds: readonly string[],
  deps: BuildGroupDependencies
): Promise<BuildReportOutput> {
  const logger = getLogger("market/build_report");
  const groups: PivotGroup[] = [];
  const failedSeeds: SeedFailure[] = [];

  for (const seed of normalizeSymbols(seeds)) {
    try {
      groups.push(await buildGroup(seed, deps));
    } catch (err) {
      const error = describeError(err);
      failedSeeds.push({ seed, error });
      logger.error({ seed, error }, "group failed, skipping seed");
    }
  }

  if (groups.length === 0) {
    throw new ReportBuildError(failedSeeds);
  }
  return { groups, failedSeeds };
}
