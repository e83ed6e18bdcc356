/**
 * Use case: build the pivot dataset for all seeds, write CSV, PDF and HTML,
 * then notify and publish.
 *
 * Writer failures propagate (the files are the product of the run);
 * notification failures do not.
 */
import { randomUUID } from "node:crypto";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { buildReport } from "@src/market/build_group";
import type { SeedFailure } from "@src/market/errors";
import { FinnhubPeerClient } from "@src/market/infrastructure/finnhub_peer_client";
import { YahooPriceProvider } from "@src/market/infrastructure/yahoo_price_provider";
import type { FallbackPeerTable } from "@src/market/resolve_peers";
import type {
  PeerDiscoveryClient,
  PivotGroup,
  PriceProvider,
} from "@src/market/types";
import { withRunContext } from "@src/util/logger";
import type { PivotReportConfig } from "../config";
import { CSV_FILE, HTML_FILE, PDF_FILE } from "../constants";
import {
  NotificationResult,
  sendNotifications,
} from "../notify/notifications";
import { PublishResult, publishOutputs } from "../publish/publish_outputs";
import { writeCsv } from "../render/csv_writer";
import { writeHtml } from "../render/html_writer";
import { writePdf } from "../render/pdf_writer";

export interface GeneratePivotReportDependencies {
  priceProvider?: PriceProvider;
  peerClient?: PeerDiscoveryClient;
  fallbackPeers?: FallbackPeerTable;
  now?: () => Date;
}

export interface PivotReportSummary {
  runId: string;
  seeds: string[];
  groups: PivotGroup[];
  failedSeeds: SeedFailure[];
  rowCount: number;
  outputs: { csv: string; pdf: string; html: string };
  notified: NotificationResult;
  published?: PublishResult;
}

function createPeerClient(
  config: PivotReportConfig
): PeerDiscoveryClient | undefined {
  if (!config.finnhubApiKey) return undefined;
  return new FinnhubPeerClient({
    apiKey: config.finnhubApiKey,
    timeoutMs: config.httpTimeoutMs,
  });
}

export async function generatePivotReport(
  config: PivotReportConfig,
  deps: GeneratePivotReportDependencies = {}
): Promise<PivotReportSummary> {
  const runId = randomUUID();
  const logger = withRunContext("reporting/generate_pivot_report", {
    runId,
    seeds: config.seeds,
  });
  const now = deps.now ?? (() => new Date());
  const startedAt = now();

  const peerClient = deps.peerClient ?? createPeerClient(config);
  logger.info(
    { peerDiscovery: Boolean(peerClient), parallel: config.fetchParallel },
    "starting pivot report"
  );

  const { groups, failedSeeds } = await buildReport(config.seeds, {
    priceProvider: deps.priceProvider ?? new YahooPriceProvider(),
    peerClient,
    fallbackPeers: deps.fallbackPeers,
    peerLimit: config.peerLimit,
    lookbackDays: config.lookbackDays,
    parallel: config.fetchParallel,
    now: startedAt,
  });

  await mkdir(config.outputDir, { recursive: true });
  const outputs = {
    csv: join(config.outputDir, CSV_FILE),
    pdf: join(config.outputDir, PDF_FILE),
    html: join(config.outputDir, HTML_FILE),
  };
  const generatedAt = now();

  await writeCsv(outputs.csv, groups);
  logger.info({ path: outputs.csv }, "wrote csv");
  await writePdf(outputs.pdf, groups, { generatedAt });
  logger.info({ path: outputs.pdf }, "wrote pdf");
  await writeHtml(outputs.html, groups, {
    pdfUrl: config.reportUrl,
    csvUrl: CSV_FILE,
    generatedAt,
  });
  logger.info({ path: outputs.html }, "wrote html");

  const notified = await sendNotifications(
    {
      serverChanSendKey: config.serverChanSendKey,
      pushPlusToken: config.pushPlusToken,
      timeoutMs: config.httpTimeoutMs,
    },
    { reportUrl: config.reportUrl, siteUrl: config.siteUrl }
  );

  const published = config.publishDir
    ? await publishOutputs(config.outputDir, config.publishDir)
    : undefined;

  const rowCount = groups.reduce((sum, g) => sum + g.rows.length, 0);
  logger.info(
    { groups: groups.length, failedSeeds: failedSeeds.length, rowCount },
    "pivot report done"
  );

  return {
    runId,
    seeds: config.seeds,
    groups,
    failedSeeds,
    rowCount,
    outputs,
    notified,
    published,
  };
}
