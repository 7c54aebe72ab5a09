import { createServer, type Server, type IncomingMessage, type ServerResponse } from "node:http";
import { request as httpRequest } from "node:http";
import { unlinkSync, existsSync } from "node:fs";
import { getLivenessStatus, type HealthStatus } from "./health.js";

export type HealthProvider = () => HealthStatus;

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

/**
 * Create and start an HTTP server on a Unix domain socket with
 * /healthz (liveness) and /status (full health) routes.
 */
export function createHealthServer(getHealth: HealthProvider, socketPath: string): Server {
  // Remove stale socket file from a previous crash
  if (existsSync(socketPath)) unlinkSync(socketPath);

  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    if (req.method === "GET" && req.url === "/healthz") {
      const liveness = getLivenessStatus();
      sendJson(res, liveness.status === "ok" ? 200 : 503, liveness);
      return;
    }

    if (req.method === "GET" && req.url === "/status") {
      try {
        const health = getHealth();
        sendJson(res, health.status === "unhealthy" ? 503 : 200, health);
      } catch (err) {
        sendJson(res, 503, { status: "unhealthy", error: err instanceof Error ? err.message : String(err) });
      }
      return;
    }

    res.writeHead(404, { "Content-Type": "text/plain" });
    res.end("Not Found");
  });

  server.listen(socketPath);
  return server;
}

/**
 * Self-check: GET /healthz over the Unix socket.
 * Resolves true on a 200, false otherwise.
 */
export function selfCheck(socketPath: string): Promise<boolean> {
  return new Promise((resolve) => {
    const req = httpRequest({ socketPath, path: "/healthz", method: "GET", timeout: 2000 }, (res) => {
      res.resume();
      resolve(res.statusCode === 200);
    });

    req.on("error", () => resolve(false));
    req.on("timeout", () => {
      req.destroy();
      resolve(false);
    });
    req.end();
  });
}

/**
 * GET /status over the Unix socket. Rejects when nothing is listening.
 */
export function queryStatus(socketPath: string): Promise<{ statusCode: number; body: unknown }> {
  return new Promise((resolve, reject) => {
    const req = httpRequest({ socketPath, path: "/status", method: "GET", timeout: 2000 }, (res) => {
      let raw = "";
      res.setEncoding("utf-8");
      res.on("data", (chunk: string) => { raw += chunk; });
      res.on("end", () => {
        try {
          resolve({ statusCode: res.statusCode ?? 0, body: JSON.parse(raw) });
        } catch (err) {
          reject(err);
        }
      });
    });

    req.on("error", reject);
    req.on("timeout", () => {
      req.destroy(new Error(`Timed out querying ${socketPath}`));
    });
    req.end();
  });
}
