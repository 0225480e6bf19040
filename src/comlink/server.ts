/**
 * ComLink: read-only status page on loopback for a tablet or second
 * screen. Serves the page, warmup stats, the latest telemetry snapshot and
 * the conversation history.
 */
import express, { type ErrorRequestHandler, type Express, type Request, type Response } from "express";
import type { Server } from "node:http";
import { Logger } from "../logger.js";
import { asError } from "../errors.js";
import type { HeartbeatStats } from "../warmup.js";
import type { ConversationEntry } from "../conversation-engine.js";
import type { TelemetrySnapshot } from "../telemetry/snapshot.js";
import { COMLINK_PAGE } from "./page.js";

export const COMLINK_HOST = "127.0.0.1";

export interface TelemetryStatus {
  connected: boolean;
  /** ISO time of the last successful telemetry read. */
  lastUpdate: string | null;
}

/** What the status page reads; the app wires live state into it. */
export interface ComLinkSource {
  readonly model: string;
  /** Null when the heartbeat is disabled. */
  warmupStats(): HeartbeatStats | null;
  latestTelemetry(): TelemetrySnapshot | null;
  telemetryStatus(): TelemetryStatus;
  history(): readonly ConversationEntry[];
}

export function createComLinkApp(source: ComLinkSource): Express {
  const app = express();

  app.use((req, _res, next) => {
    Logger.debug(`[comlink] ${req.method} ${req.path}`);
    next();
  });

  app.get("/", (_req: Request, res: Response) => {
    res.type("html").send(COMLINK_PAGE);
  });

  app.get("/api/status", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      model: source.model,
      warmup: source.warmupStats(),
      telemetry: source.telemetryStatus(),
    });
  });

  app.get("/api/telemetry", (_req: Request, res: Response) => {
    const snapshot = source.latestTelemetry();
    if (!snapshot) {
      res.status(404).json({ error: "No telemetry received yet" });
      return;
    }
    res.json(snapshot);
  });

  app.get("/api/history", (_req: Request, res: Response) => {
    res.json({ entries: source.history() });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Endpoint not found" });
  });

  const onError: ErrorRequestHandler = (err, req, res, _next) => {
    const e = asError(err);
    Logger.error(`[comlink] ${req.method} ${req.path} failed: ${e.message}`);
    res.status(500).json({ error: "Internal server error", message: e.message });
  };
  app.use(onError);

  return app;
}

export interface ComLinkHandle {
  readonly port: number;
  readonly url: string;
  close(): Promise<void>;
}

/** Listen on loopback; port 0 picks an ephemeral port. */
export function startComLink(app: Express, port: number, host: string = COMLINK_HOST): Promise<ComLinkHandle> {
  return new Promise<ComLinkHandle>((resolve, reject) => {
    const server: Server = app.listen(port, host);
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      server.on("error", (e: Error) => Logger.error(`[comlink] server error: ${e.message}`));
      const address = server.address();
      const bound = typeof address === "object" && address !== null ? address.port : port;
      const url = `http://${host}:${bound}`;
      Logger.info(`[comlink] listening on ${url}`);
      resolve({
        port: bound,
        url,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((e) => (e ? fail(e) : done()));
          }),
      });
    });
  });
}
