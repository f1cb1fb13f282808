import { analyzeContent, type ContentSignals } from "./html.js";
import { selectContent } from "./probes.js";
import { CompositeReporter, type MonitorReporter } from "./reporter.js";
import { computeScore, performanceRating, scoreBand } from "./score.js";
import type { ContentVersionStore } from "./store.js";
import type {
  ProbeCollector,
  ProbeObservations,
  ScreenshotCapturer,
  ScreenshotOutcome,
  SiteReport,
  VersionOutcome,
} from "./types.js";
import { errorMessage, extractDomain, isHttps, normalizeUrl, siteOrigin, sleep as defaultSleep } from "./utils.js";

export const CHECK_STEPS = [
  "Checking availability",
  "Measuring response time",
  "Checking redirects",
  "Checking SSL certificate",
  "Checking DNS",
  "Running ping",
  "Reading Content-Type",
  "Extracting page title",
  "Looking for error patterns",
  "Checking robots.txt",
  "Checking sitemap.xml",
  "Checking meta refresh",
  "Checking WordPress fingerprints",
  "Saving content",
  "Measuring performance",
  "Capturing screenshot",
] as const;

export interface MonitorDeps {
  collector: ProbeCollector;
  store: ContentVersionStore;
  screenshots?: ScreenshotCapturer | null;
  reporters?: MonitorReporter[];
  stepDelayMs?: number;
  siteDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

function hostnameOf(url: string, fallback: string): string {
  try {
    return new URL(url).hostname || fallback;
  } catch {
    return fallback;
  }
}

export async function checkSite(url: string, deps: MonitorDeps, reporter: MonitorReporter): Promise<SiteReport> {
  const { collector, store } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const target = normalizeUrl(url);
  const domain = extractDomain(url);
  const host = hostnameOf(target, domain);

  let step = 0;
  const advance = async () => {
    step += 1;
    await reporter.stepCompleted?.({ url, step, totalSteps: CHECK_STEPS.length, label: CHECK_STEPS[step - 1] });
    await sleep(deps.stepDelayMs ?? 0);
  };

  const attempts = await collector.checkAvailability(target);
  const online = attempts.some((a) => a.ok);
  const content = selectContent(attempts);
  const signals: ContentSignals | null = content ? analyzeContent(content) : null;
  await advance();

  const response = await collector.measureResponse(target);
  await advance();

  const redirects = await collector.followRedirects(target);
  await advance();

  const https = isHttps(target);
  const certificate = https ? await collector.checkCertificate(host) : { valid: false, expiresAt: null };
  await advance();

  const dnsAddresses = await collector.resolveDns(host);
  await advance();

  const pingSuccess = await collector.ping(host);
  await advance();

  const contentType = response?.contentType ?? null;
  await advance();

  const title = signals?.title ?? null;
  await advance();

  const errorKeywords = signals ? signals.errorKeywords : null;
  await advance();

  const origin = siteOrigin(target);
  const robotsTxt = await collector.resourceExists(`${origin}/robots.txt`);
  await advance();

  const sitemapXml = await collector.resourceExists(`${origin}/sitemap.xml`);
  await advance();

  const metaRefresh = signals ? signals.metaRefresh : null;
  await advance();

  const endpoints = await collector.probeWordPressEndpoints(target);
  const wordpress = {
    wpContent: signals?.wpContent ?? false,
    wpIncludes: signals?.wpIncludes ?? false,
    metaGenerator: signals?.metaGenerator ?? false,
    wpJson: endpoints.wpJson,
    wpAdmin: endpoints.wpAdmin,
  };
  await advance();

  let version: VersionOutcome;
  try {
    version = await store.save(domain, content);
  } catch (err) {
    console.error(`[STORE] Failed to save content for ${domain}:`, errorMessage(err));
    version = { error: errorMessage(err) };
  }
  await advance();

  const responseTimeSeconds = response?.seconds ?? null;
  const performanceScore = performanceRating(responseTimeSeconds);
  await advance();

  let screenshot: ScreenshotOutcome = { skipped: true };
  if (deps.screenshots) {
    try {
      await store.ensureDomainDirectory(domain);
      const outputPath = store.screenshotPath(domain);
      await deps.screenshots.capture(target, outputPath);
      screenshot = { path: outputPath };
    } catch (err) {
      console.error(`[SCREENSHOT] Failed for ${url}:`, errorMessage(err));
      screenshot = { error: errorMessage(err) };
    }
  }
  await advance();

  const observations: ProbeObservations = {
    url: target,
    online,
    responseTimeSeconds,
    redirectCount: redirects === null ? null : redirects.length,
    transport: { https, certificateValid: certificate.valid, certificateExpiresAt: certificate.expiresAt },
    dnsAddresses,
    pingSuccess,
    contentType,
    title,
    errorKeywords,
    robotsTxt,
    sitemapXml,
    metaRefresh,
    wordpress,
    screenshotPath: "path" in screenshot ? screenshot.path : null,
  };

  const score = computeScore(observations);
  return {
    url,
    domain,
    observations,
    score,
    band: scoreBand(score),
    performance: performanceScore,
    version,
    screenshot,
  };
}

/** Checks every site in order, one at a time. A failing site never stops the run. */
export async function runMonitorOnce(links: string[], deps: MonitorDeps): Promise<SiteReport[]> {
  const reporter = new CompositeReporter(deps.reporters ?? []);
  const sleep = deps.sleep ?? defaultSleep;
  const reports: SiteReport[] = [];

  try {
    await reporter.runStarted(links.length);
    for (const [i, url] of links.entries()) {
      try {
        const report = await checkSite(url, deps, reporter);
        reports.push(report);
        await reporter.siteCompleted(report);
      } catch (err) {
        await reporter.siteFailed(url, err);
      }
      if (i < links.length - 1) {
        await sleep(deps.siteDelayMs ?? 0);
      }
    }
    await reporter.runCompleted(reports);
  } finally {
    await deps.screenshots?.close();
  }

  return reports;
}
