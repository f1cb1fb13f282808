import axios from "axios";
import type { MonitorReporter } from "./reporter.js";
import type { SiteReport } from "./types.js";

const TELEGRAM_API = "https://api.telegram.org";

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export async function sendTelegramMessage(botToken: string, chatId: string, html: string): Promise<void> {
  await axios.post(
    `${TELEGRAM_API}/bot${botToken}/sendMessage`,
    {
      chat_id: chatId,
      text: html,
      parse_mode: "HTML",
      disable_web_page_preview: true,
    },
    { timeout: 20000 }
  );
}

/** Alert lines for a site, empty when nothing is worth a notification. */
export function alertLines(report: SiteReport): string[] {
  const lines: string[] = [];
  if (!report.observations.online) {
    lines.push("Site is OFFLINE");
  }
  if ("error" in report.version) {
    lines.push(`Snapshot failed: ${report.version.error}`);
  } else if (report.version.filename) {
    lines.push(`New version saved: ${report.version.filename} (${report.version.totalToday} today)`);
  }
  return lines;
}

export function buildSiteMessage(report: SiteReport, reportLines: string[]): string {
  const lines = [
    `<b>${escapeHtml(report.domain)}</b>`,
    `<a href="${escapeHtml(report.url)}">Open site</a>`,
    `Score: ${report.score}% (${report.band})`,
    "",
    ...reportLines.map((l) => escapeHtml(l)),
  ];
  return lines.join("\n");
}

export class TelegramReporter implements MonitorReporter {
  constructor(
    private readonly botToken: string,
    private readonly chatId: string,
    private readonly send: typeof sendTelegramMessage = sendTelegramMessage
  ) {}

  async siteCompleted(report: SiteReport): Promise<void> {
    const lines = alertLines(report);
    if (lines.length === 0) return;
    await this.send(this.botToken, this.chatId, buildSiteMessage(report, lines));
  }
}
