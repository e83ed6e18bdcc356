/**
 * Business logic: resolve a seed symbol's industry peers.
 *
 * Source order:
 * 1. live peer-discovery service, when a client is configured
 * 2. static fallback table
 * A seed found in neither source has no peers, which is a valid outcome.
 */
import { z } from "zod";
import fallbackPeersJson from "./peers/fallback_peers.json";
import { MAX_SYMBOL_LENGTH, normalizeSymbol } from "./symbols";
import type { PeerDiscoveryClient } from "./types";
import { getLogger } from "@src/util/logger";
import { describeError } from "@src/util/http";

export const DEFAULT_PEER_LIMIT = 10;

export type FallbackPeerTable = ReadonlyMap<string, readonly string[]>;

const fallbackTableSchema = z.record(z.string(), z.array(z.string()));

function loadFallbackTable(raw: unknown): FallbackPeerTable {
  const parsed = fallbackTableSchema.parse(raw);
  const table = new Map<string, readonly string[]>();
  for (const [seed, peers] of Object.entries(parsed)) {
    table.set(normalizeSymbol(seed), Object.freeze([...peers]));
  }
  return table;
}

export const FALLBACK_PEERS: FallbackPeerTable =
  loadFallbackTable(fallbackPeersJson);

export interface ResolvePeersOptions {
  limit?: number;
  client?: PeerDiscoveryClient;
  fallback?: FallbackPeerTable;
}

export async function resolvePeers(
  seed: string,
  options: ResolvePeersOptions = {}
): Promise<string[]> {
  const logger = getLogger("market/resolve_peers");
  const symbol = normalizeSymbol(seed);
  const limit = Math.max(0, options.limit ?? DEFAULT_PEER_LIMIT);

  if (options.client) {
    try {
      const candidates = await options.client.fetchPeers(symbol);
      const peers = filterPeers(symbol, candidates, limit);
      logger.debug(
        { seed: symbol, received: candidates.length, kept: peers.length },
        "peer discovery result"
      );
      if (peers.length > 0) return peers;
    } catch (err) {
      logger.warn(
        { seed: symbol, error: describeError(err) },
        "peer discovery failed, using fallback table"
      );
    }
  }

  const fallback = (options.fallback ?? FALLBACK_PEERS).get(symbol) ?? [];
  const peers = filterPeers(symbol, fallback, limit);
  logger.debug(
    { seed: symbol, kept: peers.length },
    peers.length > 0 ? "peers from fallback table" : "no peers for seed"
  );
  return peers;
}

/**
 * Keeps string entries of plausible length, excluding the seed, with
 * case-insensitive de-duplication and a hard cap.
 */
export function filterPeers(
  seed: string,
  candidates: readonly unknown[],
  limit: number
): string[] {
  const self = normalizeSymbol(seed);
  const seen = new Set<string>([self]);
  const peers: string[] = [];
  for (const raw of candidates) {
    if (peers.length >= limit) break;
    if (typeof raw !== "string") continue;
    const norm = normalizeSymbol(raw);
    if (!norm || norm.length > MAX_SYMBOL_LENGTH) continue;
    if (seen.has(norm)) continue;
    seen.add(norm);
    peers.push(norm);
  }
  return peers;
}
