/**
 * Loopback HTTP server for network boundary tests.
 * Unit tests use createMockHttpClient from http-client.state-mock.ts instead.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";

export type RouteHandler = (req: IncomingMessage, res: ServerResponse) => void;

export interface TestServer {
  /** @throws Error before start() */
  getPort(): number;
  start(): Promise<void>;
  /** Drops open connections, including hanging routes. Idempotent. */
  stop(): Promise<void>;
  url(path: string): string;
}

function json(status: number, body: unknown): RouteHandler {
  return (_req, res) => {
    res.writeHead(status, { "Content-Type": "application/json" });
    res.end(JSON.stringify(body));
  };
}

/**
 * Built-in routes:
 * - /json answers {"status":"ok"}
 * - /echo-headers answers the request headers
 * - /timeout never answers
 * - /error/500 answers 500
 *
 * Anything else is a 404.
 */
const BUILT_IN_ROUTES: Record<string, RouteHandler> = {
  "/json": json(200, { status: "ok" }),
  "/echo-headers": (req, res) => json(200, req.headers)(req, res),
  "/timeout": () => undefined,
  "/error/500": json(500, { error: "Internal Server Error" }),
};

class LoopbackServer implements TestServer {
  private server: Server | undefined;
  private port: number | undefined;

  constructor(private readonly routes: Record<string, RouteHandler>) {}

  getPort(): number {
    if (this.port === undefined) {
      throw new Error("Server not started - call start() first");
    }
    return this.port;
  }

  async start(): Promise<void> {
    if (this.server !== undefined) {
      return;
    }
    const server = createServer((req, res) => {
      const route = this.routes[req.url ?? ""];
      if (route === undefined) {
        res.writeHead(404);
        res.end();
        return;
      }
      route(req, res);
    });
    this.server = server;

    this.port = await new Promise<number>((resolve, reject) => {
      server.once("error", reject);
      // 127.0.0.1 rather than localhost, which may resolve to ::1
      server.listen(0, "127.0.0.1", () => {
        const address = server.address();
        if (address !== null && typeof address === "object") {
          resolve(address.port);
        } else {
          reject(new Error("Server has no TCP address"));
        }
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (server === undefined) {
      return;
    }
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    this.server = undefined;
    this.port = undefined;
  }

  url(path: string): string {
    return `http://127.0.0.1:${this.getPort()}${path}`;
  }
}

/**
 * @param routes - added to, or replacing, the built-in routes
 *
 * @example
 * const server = createTestServer({
 *   "/redirect": (_req, res) => {
 *     res.writeHead(302, { Location: "/json" });
 *     res.end();
 *   },
 * });
 * await server.start();
 */
export function createTestServer(routes: Record<string, RouteHandler> = {}): TestServer {
  return new LoopbackServer({ ...BUILT_IN_ROUTES, ...routes });
}
