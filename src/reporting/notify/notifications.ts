/**
 * Optional push notifications linking to the published report.
 *
 * Best-effort: every sender resolves to `false` on failure and never
 * throws, so a delivery problem cannot fail the run.
 */
import { NOTIFICATION_TITLE } from "../constants";
import { escapeHtml } from "../render/html_writer";
import { getLogger } from "@src/util/logger";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  HttpError,
  describeError,
  fetchWithTimeout,
} from "@src/util/http";

export interface NotificationLinks {
  reportUrl: string;
  siteUrl?: string;
}

export interface NotificationTargets {
  serverChanSendKey?: string;
  pushPlusToken?: string;
  timeoutMs?: number;
}

export interface NotificationResult {
  serverChan: boolean;
  pushPlus: boolean;
}

export const SERVERCHAN_BASE_URL = "https://sctapi.ftqq.com";
export const PUSHPLUS_URL = "https://www.pushplus.plus/send";

export function buildMarkdownMessage(
  title: string,
  links: NotificationLinks
): string {
  let message = `**${title}**\n\n`;
  if (links.siteUrl) message += `[📱 Online view](${links.siteUrl})\n\n`;
  message += `[📄 Download PDF](${links.reportUrl})`;
  return message;
}

export function buildHtmlMessage(
  title: string,
  links: NotificationLinks
): string {
  let message = `<b>${escapeHtml(title)}</b><br>`;
  if (links.siteUrl) {
    message += `<a href="${escapeHtml(links.siteUrl)}">📱 Online view</a><br>`;
  }
  message += `<a href="${escapeHtml(links.reportUrl)}">📄 Download PDF</a>`;
  return message;
}

async function send(
  channel: string,
  request: () => Promise<Response>
): Promise<boolean> {
  const logger = getLogger("reporting/notifications");
  try {
    const res = await request();
    const body = await res.text().catch(() => "");
    logger.info(
      { channel, status: res.status, body: body.slice(0, 120) },
      "notification response"
    );
    if (!res.ok) throw new HttpError(res.status, `${channel} HTTP ${res.status}`);
    return true;
  } catch (err) {
    logger.warn({ channel, error: describeError(err) }, "notification failed");
    return false;
  }
}

export async function pushServerChan(
  sendKey: string | undefined,
  title: string,
  markdown: string,
  timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS
): Promise<boolean> {
  if (!sendKey) return false;
  return send("serverchan", () =>
    fetchWithTimeout(
      `${SERVERCHAN_BASE_URL}/${encodeURIComponent(sendKey)}.send`,
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({ title, desp: markdown }).toString(),
      },
      timeoutMs
    )
  );
}

export async function pushPushPlus(
  token: string | undefined,
  title: string,
  html: string,
  timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS
): Promise<boolean> {
  if (!token) return false;
  return send("pushplus", () =>
    fetchWithTimeout(
      PUSHPLUS_URL,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          token,
          title,
          content: html,
          template: "html",
        }),
      },
      timeoutMs
    )
  );
}

export async function sendNotifications(
  targets: NotificationTargets,
  links: NotificationLinks
): Promise<NotificationResult> {
  const logger = getLogger("reporting/notifications");
  const title = NOTIFICATION_TITLE;

  const serverChan = await pushServerChan(
    targets.serverChanSendKey,
    title,
    buildMarkdownMessage(title, links),
    targets.timeoutMs
  );
  const pushPlus = await pushPushPlus(
    targets.pushPlusToken,
    title,
    buildHtmlMessage(title, links),
    targets.timeoutMs
  );

  logger.info({ serverChan, pushPlus }, "notifications done");
  return { serverChan, pushPlus };
}
