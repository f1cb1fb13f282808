import crypto from "node:crypto";

export function md5(input: Buffer | string): string {
  return crypto.createHash("md5").update(input).digest("hex");
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Bare domains from the links file are probed over plain http. */
export function normalizeUrl(input: string): string {
  const trimmed = input.trim();
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

export function extractDomain(input: string): string {
  let host: string;
  try {
    host = new URL(normalizeUrl(input)).hostname;
  } catch {
    host = input.trim().replace(/^[a-z][a-z0-9+.-]*:\/\//i, "").split(/[/?#:]/)[0];
  }
  host = host.toLowerCase();
  return host.startsWith("www.") ? host.slice(4) : host;
}

export function siteOrigin(url: string): string {
  try {
    return new URL(url).origin;
  } catch {
    return url.replace(/\/+$/, "");
  }
}

export function isHttps(url: string): boolean {
  return url.toLowerCase().startsWith("https");
}

/** Local calendar day as YYYY-MM-DD. */
export function formatDay(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
