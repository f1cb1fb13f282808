import type { ProbeObservations, ScoreBand, TransportObservation } from "./types.js";

export type ScoredSignal =
  | "reachability"
  | "latency"
  | "redirects"
  | "transport"
  | "dns"
  | "ping"
  | "contentType"
  | "title"
  | "errorKeywords"
  | "robotsTxt"
  | "sitemapXml"
  | "metaRefresh";

export interface ScoreAward {
  signal: ScoredSignal;
  points: number;
}

function latencyPoints(seconds: number | null): number {
  if (seconds === null || !Number.isFinite(seconds) || seconds < 0) return 0;
  if (seconds < 1) return 10;
  if (seconds < 3) return 5;
  return 0;
}

function redirectPoints(hops: number | null): number {
  if (hops === null || hops < 0) return 0;
  if (hops === 0) return 10;
  if (hops <= 2) return 5;
  return 0;
}

/** Plain HTTP earns its flat credit only when the site actually answered. */
function transportPoints(transport: TransportObservation, online: boolean): number {
  if (!transport.https) return online ? 5 : 0;
  return transport.certificateValid ? 10 : 0;
}

const flag = (ok: boolean, points: number): number => (ok ? points : 0);

/**
 * Per-signal awards. Tiered groups (latency, redirects, transport) each go
 * through a single lookup so at most one tier can be awarded.
 */
export function scoreBreakdown(obs: ProbeObservations): ScoreAward[] {
  return [
    { signal: "reachability", points: flag(obs.online, 30) },
    { signal: "latency", points: latencyPoints(obs.responseTimeSeconds) },
    { signal: "redirects", points: redirectPoints(obs.redirectCount) },
    { signal: "transport", points: transportPoints(obs.transport, obs.online) },
    { signal: "dns", points: flag(obs.dnsAddresses.length > 0, 5) },
    { signal: "ping", points: flag(obs.pingSuccess, 5) },
    { signal: "contentType", points: flag((obs.contentType ?? "").toLowerCase().includes("text/html"), 5) },
    { signal: "title", points: flag(obs.title !== null, 5) },
    { signal: "errorKeywords", points: flag(obs.errorKeywords !== null && obs.errorKeywords.length === 0, 5) },
    { signal: "robotsTxt", points: flag(obs.robotsTxt, 5) },
    { signal: "sitemapXml", points: flag(obs.sitemapXml, 5) },
    { signal: "metaRefresh", points: flag(obs.metaRefresh === false, 5) },
  ];
}

export function computeScore(obs: ProbeObservations): number {
  const total = scoreBreakdown(obs).reduce((sum, award) => sum + award.points, 0);
  return Math.min(100, Math.max(0, total));
}

export function scoreBand(score: number): ScoreBand {
  if (score <= 40) return "low";
  if (score <= 90) return "medium";
  return "high";
}

/** Homepage performance percentage derived from response time alone. */
export function performanceRating(seconds: number | null): number {
  if (seconds === null) return 0;
  if (seconds < 0.5) return 100;
  if (seconds < 1) return 90;
  if (seconds < 1.5) return 80;
  if (seconds < 2) return 70;
  if (seconds < 2.5) return 60;
  return 50;
}
