import { access, mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { generatePivotReport } from "../generate_pivot_report";
import { parsePivotReportConfig, PivotReportConfig } from "../../config";
import { ReportBuildError } from "@src/market/errors";
import { createFakeProvider, standardBars } from "@src/__tests__/fixtures";

// The default price provider is never used here; keep the real client out
jest.mock("yahoo-finance2", () => ({
  __esModule: true,
  default: { chart: jest.fn(), suppressNotices: jest.fn() },
}));

describe("generatePivotReport", () => {
  let dir: string;
  let fetchSpy: jest.SpyInstance;
  const generatedAt = new Date("2024-09-10T21:00:00.000Z");

  function makeConfig(overrides: Partial<PivotReportConfig>): PivotReportConfig {
    return parsePivotReportConfig({
      seeds: ["AAA", "QQQ"],
      peerLimit: 10,
      lookbackDays: 10,
      httpTimeoutMs: 1000,
      fetchParallel: false,
      outputDir: join(dir, "out"),
      reportUrl: "https://example.com/report.pdf",
      ...overrides,
    });
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pivot-run-"));
    fetchSpy = jest.spyOn(globalThis, "fetch");
  });

  afterEach(async () => {
    fetchSpy.mockRestore();
    await rm(dir, { recursive: true, force: true });
  });

  it("builds groups, writes every output and publishes them", async () => {
    const provider = createFakeProvider({
      AAA: standardBars(),
      BBB: standardBars(),
    });
    const config = makeConfig({ publishDir: join(dir, "public") });

    const summary = await generatePivotReport(config, {
      priceProvider: provider,
      fallbackPeers: new Map([["AAA", ["BBB"]]]),
      now: () => generatedAt,
    });

    expect(summary.groups.map(g => g.seed)).toEqual(["AAA"]);
    expect(summary.failedSeeds).toEqual([
      { seed: "QQQ", error: "[QQQ] no valid rows" },
    ]);
    expect(summary.rowCount).toBe(2);
    expect(summary.notified).toEqual({ serverChan: false, pushPlus: false });
    expect(summary.published?.copied).toEqual([
      "report.pdf",
      "index.html",
      "table.csv",
    ]);
    expect(fetchSpy).not.toHaveBeenCalled();

    const csv = await readFile(summary.outputs.csv, "utf-8");
    expect(csv.split("\n").slice(1, 3)).toEqual([
      "AAA + Peers,AAA,2024-09-10,110.00,90.00,100.00,95.00,5.26,100.00,90.00,80.00,110.00,120.00",
      "AAA + Peers,BBB,2024-09-10,110.00,90.00,100.00,95.00,5.26,100.00,90.00,80.00,110.00,120.00",
    ]);

    const html = await readFile(summary.outputs.html, "utf-8");
    expect(html).toContain(
      '<a class="btn" href="https://example.com/report.pdf">📄 Download PDF</a>'
    );
    expect(html).toContain("Updated at: 2024-09-10 21:00 UTC");

    const pdf = await readFile(summary.outputs.pdf);
    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });

  it("uses peer discovery when a key is configured and survives notification failures", async () => {
    fetchSpy.mockImplementation(async (input: unknown) => {
      const url = String(input);
      if (url.startsWith("https://finnhub.io/")) {
        return new Response(JSON.stringify(["AAA", "ccc"]), { status: 200 });
      }
      return new Response("unavailable", { status: 503 });
    });
    const provider = createFakeProvider({
      AAA: standardBars(),
      CCC: standardBars(),
    });
    const config = makeConfig({
      seeds: ["AAA"],
      finnhubApiKey: "test-key",
      pushPlusToken: "test-token",
    });

    const summary = await generatePivotReport(config, {
      priceProvider: provider,
      fallbackPeers: new Map(),
      now: () => generatedAt,
    });

    expect(summary.groups[0].rows.map(r => r.symbol)).toEqual(["AAA", "CCC"]);
    expect(summary.notified).toEqual({ serverChan: false, pushPlus: false });
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it("aborts without writing outputs when no group can be built", async () => {
    const config = makeConfig({});

    await expect(
      generatePivotReport(config, {
        priceProvider: createFakeProvider({}),
        fallbackPeers: new Map(),
        now: () => generatedAt,
      })
    ).rejects.toBeInstanceOf(ReportBuildError);

    await expect(access(join(dir, "out", "table.csv"))).rejects.toThrow();
  });
});
