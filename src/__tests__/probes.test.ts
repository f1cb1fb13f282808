import axios, { type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import dgram from "node:dgram";
import net from "node:net";
import { afterEach, describe, expect, it, vi } from "vitest";
import { BROWSER_USER_AGENT, HttpProbeCollector, selectContent } from "../probes.js";
import type { AvailabilityAttempt } from "../types.js";

interface FakeRoute {
  status: number;
  body?: string;
  headers?: Record<string, string>;
}

type Router = (config: InternalAxiosRequestConfig) => FakeRoute;

function fakeHttp(router: Router) {
  return axios.create({
    responseType: "arraybuffer",
    validateStatus: () => true,
    adapter: async (config): Promise<AxiosResponse> => {
      const route = router(config);
      return {
        data: Buffer.from(route.body ?? ""),
        status: route.status,
        statusText: String(route.status),
        headers: route.headers ?? {},
        config,
      };
    },
  });
}

function collectorFor(router: Router, connect = vi.fn().mockResolvedValue(false)) {
  return new HttpProbeCollector({ timeoutMs: 1000, http: fakeHttp(router), connect });
}

describe("selectContent", () => {
  it("prefers the plain GET body", () => {
    const attempts: AvailabilityAttempt[] = [
      { method: "get", ok: true, body: Buffer.from("plain") },
      { method: "get-browser-ua", ok: true, body: Buffer.from("ua") },
    ];
    expect(selectContent(attempts)?.toString()).toBe("plain");
  });

  it("falls back in priority order, not attempt order", () => {
    const attempts: AvailabilityAttempt[] = [
      { method: "get-trailing-slash", ok: true, body: Buffer.from("slash") },
      { method: "get", ok: false, body: null },
      { method: "head", ok: true, body: null },
      { method: "get-browser-ua", ok: true, body: Buffer.from("ua") },
    ];
    expect(selectContent(attempts)?.toString()).toBe("ua");
  });

  it("returns null when no successful attempt carries a body", () => {
    const attempts: AvailabilityAttempt[] = [
      { method: "get", ok: false, body: null },
      { method: "head", ok: true, body: null },
      { method: "tcp-connect", ok: true, body: null },
    ];
    expect(selectContent(attempts)).toBeNull();
  });
});

describe("HttpProbeCollector", () => {
  it("runs the five availability attempts", async () => {
    const connect = vi.fn().mockResolvedValueOnce(false).mockResolvedValueOnce(true);
    const collector = collectorFor((config) => {
      if (config.method === "head") return { status: 200 };
      if (config.url === "https://example.test/") return { status: 500 };
      if (config.headers["User-Agent"] === BROWSER_USER_AGENT) return { status: 200, body: "<html>ua</html>" };
      return { status: 403 };
    }, connect);

    const attempts = await collector.checkAvailability("https://example.test");

    expect(attempts.map((a) => [a.method, a.ok])).toEqual([
      ["get", false],
      ["head", true],
      ["get-browser-ua", true],
      ["get-trailing-slash", false],
      ["tcp-connect", true],
    ]);
    expect(attempts[2].body?.toString()).toBe("<html>ua</html>");
    expect(connect).toHaveBeenNthCalledWith(1, "example.test", 80);
    expect(connect).toHaveBeenNthCalledWith(2, "example.test", 443);
  });

  it("records failed requests as negative attempts", async () => {
    const collector = collectorFor(() => {
      throw new Error("ECONNREFUSED");
    });

    const attempts = await collector.checkAvailability("http://down.test");

    expect(attempts.every((a) => !a.ok && a.body === null)).toBe(true);
  });

  it("measures response time and content type", async () => {
    const collector = collectorFor(() => ({ status: 200, headers: { "content-type": "text/html; charset=utf-8" } }));

    const result = await collector.measureResponse("https://example.test");

    expect(result?.contentType).toBe("text/html; charset=utf-8");
    expect(result?.seconds).toBeGreaterThanOrEqual(0);
  });

  it("follows a redirect chain hop by hop", async () => {
    const collector = collectorFor((config) => {
      if (config.url === "http://example.test") return { status: 301, headers: { location: "/home" } };
      if (config.url === "http://example.test/home") {
        return { status: 302, headers: { location: "https://example.test/home" } };
      }
      return { status: 200 };
    });

    const chain = await collector.followRedirects("http://example.test");

    expect(chain).toEqual(["http://example.test", "http://example.test/home"]);
  });

  it("reports an empty chain when there is no redirect", async () => {
    const collector = collectorFor(() => ({ status: 200 }));
    expect(await collector.followRedirects("https://example.test")).toEqual([]);
  });

  it("gives up on redirect loops", async () => {
    const collector = collectorFor(() => ({ status: 302, headers: { location: "/again" } }));
    expect(await collector.followRedirects("https://example.test")).toBeNull();
  });

  it("returns null when the redirect probe fails", async () => {
    const collector = collectorFor(() => {
      throw new Error("timeout of 1000ms exceeded");
    });
    expect(await collector.followRedirects("https://example.test")).toBeNull();
  });

  it("checks resources by status 200 only", async () => {
    const collector = collectorFor((config) =>
      config.url === "https://example.test/robots.txt" ? { status: 200 } : { status: 404 }
    );

    expect(await collector.resourceExists("https://example.test/robots.txt")).toBe(true);
    expect(await collector.resourceExists("https://example.test/sitemap.xml")).toBe(false);
  });

  it("detects WordPress endpoints", async () => {
    const collector = collectorFor((config) => {
      if (config.url === "https://blog.test/wp-json/") return { status: 200, body: "{}" };
      if (config.url === "https://blog.test/wp-admin/") return { status: 200, body: "<form id='loginform'>Log In</form>" };
      return { status: 404 };
    });

    expect(await collector.probeWordPressEndpoints("https://blog.test/")).toEqual({ wpJson: true, wpAdmin: true });
  });

  it("requires a login page under /wp-admin/", async () => {
    const collector = collectorFor((config) =>
      config.url === "https://shop.test/wp-admin/" ? { status: 200, body: "<h1>Welcome</h1>" } : { status: 404 }
    );

    expect(await collector.probeWordPressEndpoints("https://shop.test")).toEqual({ wpJson: false, wpAdmin: false });
  });
});

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address && typeof address === "object") resolve(address.port);
      else reject(new Error("server has no port"));
    });
  });
}

function closeServer(server: net.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe("HttpProbeCollector sockets", () => {
  const servers: net.Server[] = [];
  const sockets: dgram.Socket[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((s) => (s.listening ? closeServer(s) : Promise.resolve())));
    for (const socket of sockets.splice(0)) socket.close();
  });

  async function localServer(onConnection: (socket: net.Socket) => void): Promise<number> {
    const server = net.createServer(onConnection);
    servers.push(server);
    return listen(server);
  }

  it("reaches a listening TCP port", async () => {
    const port = await localServer((socket) => socket.destroy());
    const collector = new HttpProbeCollector({
      timeoutMs: 1000,
      http: fakeHttp(() => ({ status: 500 })),
      tcpPorts: [port],
    });

    const attempts = await collector.checkAvailability(`http://127.0.0.1:${port}`);

    expect(attempts[4]).toEqual({ method: "tcp-connect", ok: true, body: null });
  });

  it("reports a refused TCP port as unreachable", async () => {
    const server = net.createServer();
    const port = await listen(server);
    await closeServer(server);
    const collector = new HttpProbeCollector({
      timeoutMs: 1000,
      http: fakeHttp(() => ({ status: 500 })),
      tcpPorts: [port],
    });

    const attempts = await collector.checkAvailability(`http://127.0.0.1:${port}`);

    expect(attempts[4]).toEqual({ method: "tcp-connect", ok: false, body: null });
  });

  it("treats a port that does not speak TLS as an invalid certificate", async () => {
    let connections = 0;
    const port = await localServer((socket) => {
      connections += 1;
      socket.end("plain text\n");
    });
    const collector = new HttpProbeCollector({ timeoutMs: 1000, tlsPort: port });

    const result = await collector.checkCertificate("127.0.0.1");

    expect(result).toEqual({ valid: false, expiresAt: null });
    expect(connections).toBe(1);
  });

  it("returns no addresses when the resolver never answers", async () => {
    const resolver = dgram.createSocket("udp4");
    sockets.push(resolver);
    let queries = 0;
    resolver.on("message", () => {
      queries += 1;
    });
    const port = await new Promise<number>((resolve) => {
      resolver.bind(0, "127.0.0.1", () => resolve(resolver.address().port));
    });
    const collector = new HttpProbeCollector({ timeoutMs: 200, dnsServers: [`127.0.0.1:${port}`] });

    expect(await collector.resolveDns("example.test")).toEqual([]);
    expect(queries).toBeGreaterThanOrEqual(1);
  });
});
