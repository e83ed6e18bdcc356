/**
 * Run configuration resolved from environment variables.
 *
 * Seeds come from TICKERS, then DEFAULT_TICKERS, then a hardcoded list.
 */
import { z } from "zod";
import { DEFAULT_LOOKBACK_DAYS } from "@src/market/compute_row";
import { DEFAULT_PEER_LIMIT } from "@src/market/resolve_peers";
import { parseSymbolList } from "@src/market/symbols";
import { getBoolean, getNumber, getString } from "@src/util/env";
import { DEFAULT_HTTP_TIMEOUT_MS, describeError } from "@src/util/http";
import { PDF_FILE } from "./constants";

export const FALLBACK_SEEDS: readonly string[] = ["NVDA"];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const configSchema = z.object({
  seeds: z.array(z.string().min(1)).min(1, "no seeds provided"),
  finnhubApiKey: z.string().min(1).optional(),
  peerLimit: z.number().int().min(1).max(50),
  lookbackDays: z.number().int().min(2).max(60),
  httpTimeoutMs: z.number().int().positive(),
  fetchParallel: z.boolean(),
  outputDir: z.string().min(1),
  reportUrl: z.string().min(1),
  siteUrl: z.string().min(1).optional(),
  serverChanSendKey: z.string().min(1).optional(),
  pushPlusToken: z.string().min(1).optional(),
  publishDir: z.string().min(1).optional(),
});

export type PivotReportConfig = z.infer<typeof configSchema>;

export function resolveSeeds(): string[] {
  const explicit = parseSymbolList(getString("TICKERS"));
  if (explicit.length > 0) return explicit;
  const defaults = parseSymbolList(getString("DEFAULT_TICKERS"));
  if (defaults.length > 0) return defaults;
  return [...FALLBACK_SEEDS];
}

/**
 * Validates a config assembled elsewhere (tests, other entry points).
 */
export function parsePivotReportConfig(raw: unknown): PivotReportConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join(".") || "config"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`invalid configuration: ${issues}`);
  }
  return parsed.data;
}

export function loadPivotReportConfig(): PivotReportConfig {
  let raw: Record<string, unknown>;
  try {
    raw = {
      seeds: resolveSeeds(),
      finnhubApiKey: getString("FINNHUB_API_KEY"),
      peerLimit: getNumber("PEER_LIMIT", DEFAULT_PEER_LIMIT),
      lookbackDays: getNumber("LOOKBACK_DAYS", DEFAULT_LOOKBACK_DAYS),
      httpTimeoutMs: getNumber("HTTP_TIMEOUT_MS", DEFAULT_HTTP_TIMEOUT_MS),
      fetchParallel: getBoolean("FETCH_PARALLEL", false),
      outputDir: getString("OUTPUT_DIR", "."),
      reportUrl: getString("REPORT_URL", PDF_FILE),
      siteUrl: getString("SITE_URL"),
      serverChanSendKey: getString("WECHAT_SCT_SENDKEY"),
      pushPlusToken: getString("PUSHPLUS_TOKEN"),
      publishDir: getString("PUBLISH_DIR"),
    };
  } catch (err) {
    throw new ConfigError(describeError(err));
  }
  return parsePivotReportConfig(raw);
}
