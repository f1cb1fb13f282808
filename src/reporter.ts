import type { SiteReport } from "./types.js";
import { errorMessage } from "./utils.js";

export interface StepProgress {
  url: string;
  step: number;
  totalSteps: number;
  label: string;
}

export interface MonitorReporter {
  runStarted?(totalSites: number): void | Promise<void>;
  stepCompleted?(progress: StepProgress): void | Promise<void>;
  siteCompleted?(report: SiteReport): void | Promise<void>;
  siteFailed?(url: string, error: unknown): void | Promise<void>;
  runCompleted?(reports: SiteReport[]): void | Promise<void>;
}

type ReporterEvent = keyof MonitorReporter;

/** Fans events out; one reporter throwing never stops the others or the run. */
export class CompositeReporter implements MonitorReporter {
  constructor(private readonly reporters: MonitorReporter[]) {}

  runStarted(totalSites: number): Promise<void> {
    return this.emit("runStarted", (r) => r.runStarted?.(totalSites));
  }

  stepCompleted(progress: StepProgress): Promise<void> {
    return this.emit("stepCompleted", (r) => r.stepCompleted?.(progress));
  }

  siteCompleted(report: SiteReport): Promise<void> {
    return this.emit("siteCompleted", (r) => r.siteCompleted?.(report));
  }

  siteFailed(url: string, error: unknown): Promise<void> {
    return this.emit("siteFailed", (r) => r.siteFailed?.(url, error));
  }

  runCompleted(reports: SiteReport[]): Promise<void> {
    return this.emit("runCompleted", (r) => r.runCompleted?.(reports));
  }

  private async emit(event: ReporterEvent, call: (r: MonitorReporter) => void | Promise<void>): Promise<void> {
    for (const reporter of this.reporters) {
      try {
        await call(reporter);
      } catch (err) {
        console.error(`[REPORT] ${event} failed:`, errorMessage(err));
      }
    }
  }
}

function yesNo(value: boolean, yes: string, no: string): string {
  return value ? yes : no;
}

export function formatReportLines(report: SiteReport): string[] {
  const o = report.observations;
  const ssl = o.transport.https
    ? o.transport.certificateValid
      ? `valid (expires: ${o.transport.certificateExpiresAt ?? "unknown"})`
      : "invalid/N/A"
    : "N/A";
  const version =
    "error" in report.version
      ? `error: ${report.version.error}`
      : `${report.version.filename ?? "no"} (${report.version.totalToday} today)`;
  const screenshot =
    "error" in report.screenshot
      ? `error: ${report.screenshot.error}`
      : "path" in report.screenshot
        ? report.screenshot.path
        : "skipped";
  const wp = o.wordpress;

  return [
    `Status:            ${o.online ? "ONLINE" : "OFFLINE"}`,
    `Response time:     ${o.responseTimeSeconds === null ? "N/A" : `${o.responseTimeSeconds.toFixed(2)} s`}`,
    `Redirects:         ${o.redirectCount ?? "N/A"}`,
    `SSL certificate:   ${ssl}`,
    `DNS:               ${o.dnsAddresses.length ? o.dnsAddresses.join(", ") : "N/A"}`,
    `Ping:              ${yesNo(o.pingSuccess, "success", "failed")}`,
    `Content-Type:      ${o.contentType ?? "N/A"}`,
    `Title:             ${o.title ?? "N/A"}`,
    `Content errors:    ${o.errorKeywords === null ? "N/A" : o.errorKeywords.length ? o.errorKeywords.join(", ") : "none"}`,
    `robots.txt:        ${yesNo(o.robotsTxt, "found", "not found")}`,
    `sitemap.xml:       ${yesNo(o.sitemapXml, "found", "not found")}`,
    `Meta refresh:      ${o.metaRefresh === null ? "N/A" : yesNo(o.metaRefresh, "detected", "not detected")}`,
    `New version:       ${version}`,
    `Performance:       ${report.performance}%`,
    `Screenshot:        ${screenshot}`,
    `WordPress:         wp-content=${wp.wpContent} wp-includes=${wp.wpIncludes} generator=${wp.metaGenerator} wp-json=${wp.wpJson} wp-admin=${wp.wpAdmin}`,
    `Score:             ${report.score}% (${report.band})`,
  ];
}

export class ConsoleReporter implements MonitorReporter {
  constructor(private readonly verbose = false) {}

  runStarted(totalSites: number): void {
    console.log(`[MONITOR] Checking ${totalSites} site(s)`);
  }

  stepCompleted(progress: StepProgress): void {
    if (!this.verbose) return;
    console.log(`[MONITOR] ${progress.url} - step ${progress.step}/${progress.totalSteps}: ${progress.label}`);
  }

  siteCompleted(report: SiteReport): void {
    console.log(`[MONITOR] ${report.url}`);
    for (const line of formatReportLines(report)) {
      console.log(`  ${line}`);
    }
  }

  siteFailed(url: string, error: unknown): void {
    console.error(`[MONITOR] ${url} failed:`, errorMessage(error));
  }

  runCompleted(reports: SiteReport[]): void {
    console.log(`[MONITOR] Run finished: ${reports.length} site(s) checked`);
  }
}
