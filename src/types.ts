export interface WordPressFingerprint {
  wpContent: boolean;
  wpIncludes: boolean;
  metaGenerator: boolean;
  wpJson: boolean;
  wpAdmin: boolean; // login page reachable under /wp-admin/
}

export interface TransportObservation {
  https: boolean;
  certificateValid: boolean;
  certificateExpiresAt: string | null;
}

export interface ProbeObservations {
  url: string;
  online: boolean;
  responseTimeSeconds: number | null;
  redirectCount: number | null; // null when the redirect probe itself failed
  transport: TransportObservation;
  dnsAddresses: string[];
  pingSuccess: boolean;
  contentType: string | null;
  title: string | null;
  errorKeywords: string[] | null; // null when no content was fetched
  robotsTxt: boolean;
  sitemapXml: boolean;
  metaRefresh: boolean | null;
  wordpress: WordPressFingerprint;
  screenshotPath: string | null;
}

export type AvailabilityMethod = "get" | "head" | "get-browser-ua" | "get-trailing-slash" | "tcp-connect";

export interface AvailabilityAttempt {
  method: AvailabilityMethod;
  ok: boolean;
  body: Buffer | null;
}

export interface ResponseMeasurement {
  seconds: number;
  contentType: string | null;
}

export interface CertificateCheck {
  valid: boolean;
  expiresAt: string | null;
}

export interface WordPressEndpoints {
  wpJson: boolean;
  wpAdmin: boolean;
}

/**
 * Network side of a site check. Implementations never throw: a failed or
 * timed-out probe comes back as a negative result.
 */
export interface ProbeCollector {
  checkAvailability(url: string): Promise<AvailabilityAttempt[]>;
  measureResponse(url: string): Promise<ResponseMeasurement | null>;
  followRedirects(url: string): Promise<string[] | null>;
  checkCertificate(host: string): Promise<CertificateCheck>;
  resolveDns(host: string): Promise<string[]>;
  ping(host: string): Promise<boolean>;
  resourceExists(url: string): Promise<boolean>;
  probeWordPressEndpoints(baseUrl: string): Promise<WordPressEndpoints>;
}

export interface ScreenshotCapturer {
  capture(url: string, outputPath: string): Promise<void>;
  close(): Promise<void>;
}

export interface SnapshotEntry {
  day: string; // YYYY-MM-DD
  sequence: number; // 0 = unsuffixed file
  filename: string;
}

export interface SaveResult {
  filename: string | null;
  totalToday: number;
}

export type ScoreBand = "low" | "medium" | "high";

export type VersionOutcome = SaveResult | { error: string };

export type ScreenshotOutcome = { path: string } | { error: string } | { skipped: true };

export interface SiteReport {
  url: string;
  domain: string;
  observations: ProbeObservations;
  score: number;
  band: ScoreBand;
  performance: number;
  version: VersionOutcome;
  screenshot: ScreenshotOutcome;
}
