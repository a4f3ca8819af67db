/**
 * HTTP server for health checks, status and the Telegram webhook.
 *
 * Routes:
 * - /health           - Liveness
 * - /api/*            - Status API
 * - POST <webhookPath> - Telegram updates, when webhook mode is on
 */

import { serve, type ServerType } from "@hono/node-server";
import { type Context, Hono } from "hono";
import { logger } from "hono/logger";
import { type ApiDependencies, createApiRouter } from "./api.ts";

// ============================================================================
// Types
// ============================================================================

export interface WebhookRoute {
  path: string;
  handle: (request: Request) => Promise<Response>;
}

/**
 * Server dependencies.
 */
export interface ServerDependencies extends ApiDependencies {
  port: number;
  webhook?: WebhookRoute;
  /** Request logging; off in tests */
  logRequests?: boolean;
}

/**
 * Server instance.
 */
export interface Server {
  app: Hono;
  start(): void;
  stop(): Promise<void>;
}

export const WEBHOOK_PATH = "/telegram/webhook";

// ============================================================================
// Server Factory
// ============================================================================

/**
 * Create the HTTP server.
 */
export function createServer(deps: ServerDependencies): Server {
  const app = new Hono();

  if (deps.logRequests !== false) {
    app.use("*", logger());
  }

  // ==========================================================================
  // API Routes
  // ==========================================================================

  app.route("/api", createApiRouter(deps));

  // ==========================================================================
  // Telegram Webhook
  // ==========================================================================

  const { webhook } = deps;
  if (webhook) {
    app.post(webhook.path, (c: Context) => webhook.handle(c.req.raw));
  }

  // ==========================================================================
  // Health Check
  // ==========================================================================

  app.get("/health", (c: Context) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // ==========================================================================
  // Server Lifecycle
  // ==========================================================================

  let server: ServerType | null = null;

  function start(): void {
    console.log(`Starting server on port ${deps.port}...`);
    server = serve({ fetch: app.fetch, port: deps.port }, (info) => {
      console.log(`Server listening on http://localhost:${info.port}`);
    });
  }

  function stop(): Promise<void> {
    const current = server;
    server = null;
    if (!current) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      current.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        console.log("Server stopped");
        resolve();
      });
    });
  }

  return {
    app,
    start,
    stop,
  };
}
