import { FinnhubPeerClient } from "../infrastructure/finnhub_peer_client";
import {
  FALLBACK_PEERS,
  filterPeers,
  resolvePeers,
} from "../resolve_peers";
import type { PeerDiscoveryClient } from "../types";
import { HttpError, HttpTimeoutError } from "@src/util/http";

function stubClient(
  impl: (symbol: string) => Promise<unknown[]>
): PeerDiscoveryClient & { fetchPeers: jest.Mock } {
  return { fetchPeers: jest.fn(impl) };
}

const emptyFallback = new Map<string, readonly string[]>();

describe("filterPeers", () => {
  it("drops the seed and duplicates in any casing", () => {
    expect(filterPeers("AAA", ["BBB", "AAA", "bbb"], 10)).toEqual(["BBB"]);
  });

  it("drops non-strings, blanks and oversized entries", () => {
    expect(
      filterPeers(
        "AAA",
        [42, null, "", "  msft ", "X".repeat(16), { s: "C" }, "goog"],
        10
      )
    ).toEqual(["MSFT", "GOOG"]);
  });

  it("caps the result at the limit", () => {
    expect(filterPeers("AAA", ["B", "C", "D"], 2)).toEqual(["B", "C"]);
  });
});

describe("resolvePeers", () => {
  it("uses peer discovery results when available", async () => {
    const client = stubClient(async () => ["BBB", "AAA", "bbb"]);
    const fallback = new Map([["AAA", ["ZZZ"]]]);

    const peers = await resolvePeers("aaa", { client, fallback, limit: 10 });

    expect(peers).toEqual(["BBB"]);
    expect(client.fetchPeers).toHaveBeenCalledWith("AAA");
  });

  it("falls back to the static table when discovery fails", async () => {
    const client = stubClient(async () => {
      throw new HttpError(503, "finnhub peers HTTP 503");
    });
    const fallback = new Map([["AAA", ["CCC", "DDD"]]]);

    await expect(resolvePeers("AAA", { client, fallback })).resolves.toEqual([
      "CCC",
      "DDD",
    ]);
  });

  it("falls back when discovery returns nothing usable", async () => {
    const client = stubClient(async () => ["aaa"]);
    const fallback = new Map([["AAA", ["CCC"]]]);

    await expect(resolvePeers("AAA", { client, fallback })).resolves.toEqual([
      "CCC",
    ]);
  });

  it("uses the fallback table when discovery is not configured", async () => {
    const fallback = new Map([["AAA", ["CCC", "AAA", "DDD", "EEE"]]]);

    await expect(
      resolvePeers("AAA", { fallback, limit: 2 })
    ).resolves.toEqual(["CCC", "DDD"]);
  });

  it("returns no peers when the seed is unknown everywhere", async () => {
    const client = stubClient(async () => []);

    await expect(
      resolvePeers("QQQ", { client, fallback: emptyFallback })
    ).resolves.toEqual([]);
  });

  it("ships a fallback table for well-known tickers", async () => {
    expect(FALLBACK_PEERS.get("NVDA")?.slice(0, 3)).toEqual([
      "AMD",
      "AVGO",
      "INTC",
    ]);
    await expect(resolvePeers("nvda", { limit: 3 })).resolves.toEqual([
      "AMD",
      "AVGO",
      "INTC",
    ]);
  });
});

describe("FinnhubPeerClient", () => {
  let fetchSpy: jest.SpyInstance;

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it("requests peers for a symbol with the API token", async () => {
    fetchSpy = jest
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(
        new Response(JSON.stringify(["BBB", "CCC"]), { status: 200 })
      );
    const client = new FinnhubPeerClient({ apiKey: "test-key" });

    await expect(client.fetchPeers("AAA")).resolves.toEqual(["BBB", "CCC"]);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(fetchSpy.mock.calls[0][0]).toBe(
      "https://finnhub.io/api/v1/stock/peers?symbol=AAA&token=test-key"
    );
  });

  it("rejects on non-2xx responses", async () => {
    fetchSpy = jest
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response("limit reached", { status: 429 }));
    const client = new FinnhubPeerClient({ apiKey: "test-key" });

    await expect(client.fetchPeers("AAA")).rejects.toThrow(
      "finnhub peers HTTP 429"
    );
  });

  it("rejects payloads that are not arrays", async () => {
    fetchSpy = jest
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(
        new Response(JSON.stringify({ error: "bad symbol" }), { status: 200 })
      );
    const client = new FinnhubPeerClient({ apiKey: "test-key" });

    await expect(client.fetchPeers("AAA")).rejects.toThrow(
      "finnhub peers payload is not an array"
    );
  });

  it("feeds the resolver, which falls back on network errors", async () => {
    fetchSpy = jest
      .spyOn(globalThis, "fetch")
      .mockRejectedValue(new TypeError("fetch failed"));
    const client = new FinnhubPeerClient({ apiKey: "test-key" });
    const fallback = new Map([["AAA", ["CCC"]]]);

    await expect(resolvePeers("AAA", { client, fallback })).resolves.toEqual([
      "CCC",
    ]);
  });

  describe("when the service does not answer", () => {
    beforeEach(() => {
      fetchSpy = jest
        .spyOn(globalThis, "fetch")
        .mockImplementation(
          (_input, init) =>
            new Promise<Response>((_resolve, reject) => {
              init?.signal?.addEventListener("abort", () =>
                reject(new Error("aborted"))
              );
            })
        );
    });

    it("aborts the request after the timeout", async () => {
      const client = new FinnhubPeerClient({ apiKey: "test-key", timeoutMs: 20 });

      await expect(client.fetchPeers("AAA")).rejects.toBeInstanceOf(
        HttpTimeoutError
      );
    });

    it("falls back to the static table on timeout", async () => {
      const client = new FinnhubPeerClient({ apiKey: "test-key", timeoutMs: 20 });
      const fallback = new Map([["AAA", ["CCC"]]]);

      await expect(resolvePeers("AAA", { client, fallback })).resolves.toEqual([
        "CCC",
      ]);
    });
  });
});
