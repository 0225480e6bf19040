/**
 * TelemetryStore watches the simulator bridge's data directory and
 * deserializes stratus_telemetry.json on demand.
 *
 * The store holds no snapshot of its own: callers decide whether to keep
 * the previous one when a read fails.
 */
import { mkdirSync, readFileSync, watch, type FSWatcher } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { Logger } from "../logger.js";
import { asError, stratusError } from "../errors.js";
import { telemetryFileSchema, toSnapshot, type TelemetrySnapshot } from "./snapshot.js";

export const DATA_DIR_NAME = "StratusATC";
export const TELEMETRY_FILE_NAME = "stratus_telemetry.json";

/** Per-platform data directory shared with the simulator bridge. */
export function resolveDataDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): string {
  switch (platform) {
    case "darwin":
      return join(home, "Library", "Application Support", DATA_DIR_NAME);
    case "win32":
      return join(env.LOCALAPPDATA || join(home, "AppData", "Local"), DATA_DIR_NAME);
    default:
      return join(env.XDG_DATA_HOME || join(home, ".local", "share"), DATA_DIR_NAME);
  }
}

export interface TelemetryStoreOptions {
  dataDir?: string;
  fileName?: string;
}

export class TelemetryStore {
  readonly dataDir: string;
  readonly path: string;
  private readonly fileName: string;
  private readonly watcher: FSWatcher;
  private changed = false;
  private notifications = 0;
  private watchError: Error | null = null;
  private closed = false;

  constructor(opts: TelemetryStoreOptions = {}) {
    this.dataDir = opts.dataDir ?? resolveDataDir();
    this.fileName = opts.fileName ?? TELEMETRY_FILE_NAME;
    this.path = join(this.dataDir, this.fileName);

    this.watcher = this.openWatcher();
    this.watcher.on("error", (e: unknown) => {
      this.watchError = asError(e);
      Logger.warn(`[telemetry] watcher error: ${this.watchError.message}`);
    });
    Logger.debug(`[telemetry] watching ${this.dataDir}`);
  }

  private openWatcher(): FSWatcher {
    try {
      mkdirSync(this.dataDir, { recursive: true });
      return watch(this.dataDir, { persistent: false }, (_event, filename) => {
        // Some platforms omit the filename; treat that as a change.
        if (!filename || String(filename) === this.fileName) {
          this.changed = true;
          this.notifications++;
        }
      });
    } catch (e: unknown) {
      throw stratusError("watch_setup_failure", `Cannot watch ${this.dataDir}: ${asError(e).message}`, {
        path: this.dataDir,
        cause: e,
      });
    }
  }

  /** Read and validate the telemetry file. */
  read(): TelemetrySnapshot {
    let content: string;
    try {
      content = readFileSync(this.path, "utf-8");
    } catch (e: unknown) {
      throw stratusError("file_access_failure", `Failed to read telemetry file: ${asError(e).message}`, {
        path: this.path,
        cause: e,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (e: unknown) {
      throw stratusError("file_parse_failure", `Failed to parse telemetry JSON: ${asError(e).message}`, {
        path: this.path,
        cause: e,
      });
    }

    const parsed = telemetryFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : parsed.error.message;
      throw stratusError("file_parse_failure", `Invalid telemetry document (${where})`, {
        path: this.path,
        cause: parsed.error,
      });
    }
    return toSnapshot(parsed.data);
  }

  /**
   * Non-blocking check. Returns null when nothing changed since the last
   * poll; otherwise drains every pending notification and reads once.
   */
  poll(): TelemetrySnapshot | null {
    if (this.watchError) {
      const cause = this.watchError;
      this.watchError = null;
      throw stratusError("watch_failure", `Telemetry watcher failed: ${cause.message}`, {
        path: this.dataDir,
        cause,
      });
    }
    if (!this.changed) return null;
    if (this.notifications > 1) Logger.debug(`[telemetry] coalesced ${this.notifications} notifications`);
    this.changed = false;
    this.notifications = 0;
    return this.read();
  }

  /** True when a change notification is waiting for the next poll. */
  hasPendingChange(): boolean {
    return this.changed;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.watcher.close();
  }
}
