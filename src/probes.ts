import axios, { type AxiosInstance } from "axios";
import { execFile } from "node:child_process";
import { Resolver } from "node:dns/promises";
import net from "node:net";
import tls from "node:tls";
import type {
  AvailabilityAttempt,
  AvailabilityMethod,
  CertificateCheck,
  ProbeCollector,
  ResponseMeasurement,
  WordPressEndpoints,
} from "./types.js";

export const BROWSER_USER_AGENT = "Mozilla/5.0 (Windows NT 10.0; Win64; x64)";
const MAX_REDIRECTS = 20;
const TCP_PORTS = [80, 443];
const TLS_PORT = 443;

/** Bodies of these attempts may be archived, in this order. */
const CONTENT_PRIORITY: readonly AvailabilityMethod[] = ["get", "get-browser-ua", "get-trailing-slash"];

export function selectContent(attempts: AvailabilityAttempt[]): Buffer | null {
  for (const method of CONTENT_PRIORITY) {
    const hit = attempts.find((a) => a.method === method && a.ok && a.body !== null);
    if (hit?.body) return hit.body;
  }
  return null;
}

function toBuffer(data: unknown): Buffer | null {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (typeof data === "string") return Buffer.from(data, "utf8");
  return null;
}

function headerValue(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && typeof value[0] === "string") return value[0];
  return null;
}

export interface HttpProbeOptions {
  timeoutMs: number;
  http?: AxiosInstance;
  connect?: (host: string, port: number) => Promise<boolean>;
  tcpPorts?: number[];
  tlsPort?: number;
  /** Resolver addresses ("ip" or "ip:port"); the system resolvers when unset. */
  dnsServers?: string[];
}

export class HttpProbeCollector implements ProbeCollector {
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;
  private readonly connect: (host: string, port: number) => Promise<boolean>;
  private readonly tcpPorts: number[];
  private readonly tlsPort: number;
  private readonly dnsServers: string[] | undefined;

  constructor(options: HttpProbeOptions) {
    this.timeoutMs = options.timeoutMs;
    this.tcpPorts = options.tcpPorts ?? TCP_PORTS;
    this.tlsPort = options.tlsPort ?? TLS_PORT;
    this.dnsServers = options.dnsServers;
    this.connect = options.connect ?? ((host, port) => this.tcpConnect(host, port));
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs,
        responseType: "arraybuffer",
        validateStatus: () => true,
      });
  }

  async checkAvailability(url: string): Promise<AvailabilityAttempt[]> {
    const withSlash = url.endsWith("/") ? url : `${url}/`;
    return [
      await this.getAttempt("get", url),
      await this.headAttempt(url),
      await this.getAttempt("get-browser-ua", url, { "User-Agent": BROWSER_USER_AGENT }),
      await this.getAttempt("get-trailing-slash", withSlash),
      { method: "tcp-connect", ok: await this.tcpReachable(hostOf(url)), body: null },
    ];
  }

  async measureResponse(url: string): Promise<ResponseMeasurement | null> {
    try {
      const start = performance.now();
      const res = await this.http.get(url);
      const seconds = (performance.now() - start) / 1000;
      return { seconds, contentType: headerValue(res.headers["content-type"]) };
    } catch {
      return null;
    }
  }

  async followRedirects(url: string): Promise<string[] | null> {
    const chain: string[] = [];
    let current = url;
    try {
      for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
        const res = await this.http.get(current, { maxRedirects: 0 });
        const location = headerValue(res.headers["location"]);
        if (res.status < 300 || res.status >= 400 || !location) return chain;
        chain.push(current);
        current = new URL(location, current).toString();
      }
    } catch {
      return null;
    }
    // Redirect loop or an unusually long chain.
    return null;
  }

  checkCertificate(host: string): Promise<CertificateCheck> {
    return new Promise((resolve) => {
      const socket = tls.connect({
        host,
        port: this.tlsPort,
        servername: net.isIP(host) ? undefined : host,
        rejectUnauthorized: false,
      });
      const finish = (result: CertificateCheck) => {
        clearTimeout(timer);
        socket.destroy();
        resolve(result);
      };
      const timer = setTimeout(() => finish({ valid: false, expiresAt: null }), this.timeoutMs);

      socket.once("secureConnect", () => {
        const cert = socket.getPeerCertificate();
        finish({ valid: socket.authorized, expiresAt: cert && cert.valid_to ? cert.valid_to : null });
      });
      socket.once("error", () => finish({ valid: false, expiresAt: null }));
      socket.once("close", () => finish({ valid: false, expiresAt: null }));
    });
  }

  async resolveDns(host: string): Promise<string[]> {
    const resolver = new Resolver({ timeout: this.timeoutMs, tries: 1 });
    try {
      if (this.dnsServers) resolver.setServers(this.dnsServers);
      return await resolver.resolve4(host);
    } catch {
      return [];
    }
  }

  ping(host: string): Promise<boolean> {
    const countFlag = process.platform === "win32" ? "-n" : "-c";
    return new Promise((resolve) => {
      execFile("ping", [countFlag, "1", host], { timeout: this.timeoutMs }, (err) => resolve(!err));
    });
  }

  async resourceExists(url: string): Promise<boolean> {
    try {
      const res = await this.http.get(url);
      return res.status === 200;
    } catch {
      return false;
    }
  }

  async probeWordPressEndpoints(baseUrl: string): Promise<WordPressEndpoints> {
    const root = baseUrl.replace(/\/+$/, "");
    let wpJson = false;
    let wpAdmin = false;
    try {
      const res = await this.http.get(`${root}/wp-json/`);
      wpJson = res.status === 200;
    } catch {
      wpJson = false;
    }
    try {
      const res = await this.http.get(`${root}/wp-admin/`);
      const body = toBuffer(res.data)?.toString("utf8").toLowerCase() ?? "";
      wpAdmin = (res.status === 200 || res.status === 302) && body.includes("login");
    } catch {
      wpAdmin = false;
    }
    return { wpJson, wpAdmin };
  }

  private async getAttempt(
    method: AvailabilityMethod,
    url: string,
    headers?: Record<string, string>
  ): Promise<AvailabilityAttempt> {
    try {
      const res = await this.http.get(url, { headers });
      const ok = res.status === 200;
      return { method, ok, body: ok ? toBuffer(res.data) : null };
    } catch {
      return { method, ok: false, body: null };
    }
  }

  private async headAttempt(url: string): Promise<AvailabilityAttempt> {
    try {
      const res = await this.http.head(url);
      return { method: "head", ok: res.status < 400, body: null };
    } catch {
      return { method: "head", ok: false, body: null };
    }
  }

  private async tcpReachable(host: string): Promise<boolean> {
    if (!host) return false;
    for (const port of this.tcpPorts) {
      if (await this.connect(host, port)) return true;
    }
    return false;
  }

  private tcpConnect(host: string, port: number): Promise<boolean> {
    return new Promise((resolve) => {
      const socket = net.connect({ host, port });
      socket.setTimeout(this.timeoutMs);
      const finish = (ok: boolean) => {
        socket.destroy();
        resolve(ok);
      };
      socket.once("connect", () => finish(true));
      socket.once("timeout", () => finish(false));
      socket.once("error", () => finish(false));
    });
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return "";
  }
}
