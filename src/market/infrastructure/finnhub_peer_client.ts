/**
 * Finnhub peer-discovery client.
 *
 * GET /api/v1/stock/peers?symbol=<code>&token=<key> returns a JSON array of
 * symbols in the same industry. Entries are returned unvalidated; filtering
 * happens in the resolver.
 */
import { z } from "zod";
import type { PeerDiscoveryClient } from "../types";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  HttpError,
  fetchWithTimeout,
} from "@src/util/http";

const peersPayloadSchema = z.array(z.unknown());

export interface FinnhubPeerClientOptions {
  apiKey: string;
  timeoutMs?: number;
  baseUrl?: string;
}

export class FinnhubPeerClient implements PeerDiscoveryClient {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;

  constructor(options: FinnhubPeerClientOptions) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.baseUrl = options.baseUrl ?? "https://finnhub.io";
  }

  async fetchPeers(symbol: string): Promise<unknown[]> {
    const url = new URL("/api/v1/stock/peers", this.baseUrl);
    url.searchParams.set("symbol", symbol);
    url.searchParams.set("token", this.apiKey);

    const res = await fetchWithTimeout(
      url.toString(),
      { headers: { Accept: "application/json" } },
      this.timeoutMs
    );
    if (!res.ok) {
      throw new HttpError(res.status, `finnhub peers HTTP ${res.status}`);
    }

    const json: unknown = await res.json();
    const parsed = peersPayloadSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error("finnhub peers payload is not an array");
    }
    return parsed.data;
  }
}
