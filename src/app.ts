/**
 * Wires the data plane together for one run: telemetry watch, warmup
 * heartbeat, model driver, conversation engine and the optional status page.
 */
import { Logger } from "./logger.js";
import { asError, errorLogFields, isStratusError } from "./errors.js";
import type { StratusConfig } from "./cli/config.js";
import { makeOllamaDriver } from "./drivers/ollama.js";
import type { ChunkHandler, GenerationDriver } from "./drivers/types.js";
import { ConversationEngine, type ConversationEntry } from "./conversation-engine.js";
import { WarmupHeartbeat, type HeartbeatStats } from "./warmup.js";
import { TelemetryStore } from "./telemetry/telemetry-store.js";
import { emptySnapshot, type TelemetrySnapshot } from "./telemetry/snapshot.js";
import { createComLinkApp, startComLink, type ComLinkHandle, type ComLinkSource, type TelemetryStatus } from "./comlink/server.js";
import { WatchCell } from "./utils/watch-cell.js";

export const TELEMETRY_POLL_MS = 500;
/** Telemetry older than this counts as disconnected. */
export const TELEMETRY_STALE_MS = 5_000;
export const AVAILABILITY_CHECK_MS = 10_000;

export interface StratusAppDeps {
  driver?: GenerationDriver;
  /** Millisecond wall clock. */
  now?: () => number;
}

export class StratusApp implements ComLinkSource {
  readonly config: StratusConfig;
  readonly driver: GenerationDriver;
  readonly heartbeat: WarmupHeartbeat | null;
  readonly engine: ConversationEngine;
  readonly store: TelemetryStore;
  readonly telemetry = new WatchCell<TelemetrySnapshot | null>(null);
  /** Null until the first liveness probe finishes. */
  readonly modelAvailable = new WatchCell<boolean | null>(null);

  private readonly now: () => number;
  private lastUpdateAt: number | null = null;
  private pollTimer: NodeJS.Timeout | null = null;
  private probeTimer: NodeJS.Timeout | null = null;
  private comlink: ComLinkHandle | null = null;
  private started = false;

  constructor(config: StratusConfig, deps: StratusAppDeps = {}) {
    this.config = config;
    this.now = deps.now ?? Date.now;
    this.driver = deps.driver ?? makeOllamaDriver({
      baseUrl: config.baseUrl,
      model: config.model,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      minChunkChars: config.minChunkChars,
      maxChunkChars: config.maxChunkChars,
    });
    this.heartbeat = config.warmup
      ? new WarmupHeartbeat(
          { model: config.model, intervalMs: config.warmupIntervalMs, baseUrl: config.baseUrl },
          { onColdStart: (ms) => Logger.warn(`[warmup] model was unloaded; reload took ${ms}ms`) },
        )
      : null;
    this.engine = new ConversationEngine({
      driver: this.driver,
      callsign: config.callsign,
      aircraftType: config.aircraftType,
      historyLimit: config.historyLimit,
      heartbeat: this.heartbeat ?? undefined,
    });
    this.store = new TelemetryStore({ dataDir: config.dataDir });
  }

  get model(): string {
    return this.driver.model;
  }

  /** Background work for an interactive session. */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    this.loadTelemetry();
    this.pollTimer = setInterval(() => this.refreshTelemetry(), TELEMETRY_POLL_MS);
    this.probeTimer = setInterval(() => { this.scheduleProbe(); }, AVAILABILITY_CHECK_MS);
    this.scheduleProbe();
    this.heartbeat?.start();

    if (this.config.comlink) {
      try {
        this.comlink = await startComLink(createComLinkApp(this), this.config.comlinkPort);
      } catch (e: unknown) {
        Logger.warn(`[comlink] could not start on port ${this.config.comlinkPort}: ${asError(e).message}`);
      }
    }
  }

  async stop(): Promise<void> {
    if (this.pollTimer) clearInterval(this.pollTimer);
    if (this.probeTimer) clearInterval(this.probeTimer);
    this.pollTimer = null;
    this.probeTimer = null;
    await this.heartbeat?.stop();
    if (this.comlink) {
      await this.comlink.close();
      this.comlink = null;
    }
    this.store.close();
    this.started = false;
  }

  /** Unconditional read; a failure keeps the previous snapshot. */
  loadTelemetry(): TelemetrySnapshot | null {
    try {
      this.accept(this.store.read());
    } catch (e: unknown) {
      Logger.debug(`[telemetry] initial read failed: ${asError(e).message}`);
    }
    return this.telemetry.get();
  }

  /** Pick up a change notification, if any. */
  refreshTelemetry(): void {
    try {
      const snapshot = this.store.poll();
      if (snapshot) this.accept(snapshot);
    } catch (e: unknown) {
      if (isStratusError(e, "watch_failure")) {
        Logger.warn(`[telemetry] ${e.message}`, errorLogFields(e));
      } else {
        // The bridge may be mid-write; the next notification retries.
        Logger.debug(`[telemetry] read skipped: ${asError(e).message}`);
      }
    }
  }

  async checkModel(): Promise<boolean> {
    const available = await this.driver.isAvailable();
    if (available !== this.modelAvailable.get()) {
      Logger.info(`[stream] model endpoint ${available ? "available" : "unreachable"} at ${this.driver.baseUrl}`);
    }
    this.modelAvailable.set(available);
    return available;
  }

  /** Snapshot used for prompts: the latest one, or zeros before any arrives. */
  currentTelemetry(): TelemetrySnapshot {
    return this.telemetry.get() ?? emptySnapshot();
  }

  transmit(text: string, onChunk?: ChunkHandler): Promise<string> {
    return this.engine.process(text, this.currentTelemetry(), onChunk);
  }

  retryLast(onChunk?: ChunkHandler): Promise<string | null> {
    return this.engine.retryLast(this.currentTelemetry(), onChunk);
  }

  /** Null when the heartbeat is disabled. */
  async forceWarmup(): Promise<number | null> {
    if (!this.heartbeat) {
      Logger.warn("[warmup] heartbeat disabled (--no-warmup)");
      return null;
    }
    return this.heartbeat.forcePing();
  }

  // ComLinkSource

  warmupStats(): HeartbeatStats | null {
    return this.heartbeat ? this.heartbeat.stats.get() : null;
  }

  latestTelemetry(): TelemetrySnapshot | null {
    return this.telemetry.get();
  }

  telemetryStatus(): TelemetryStatus {
    const at = this.lastUpdateAt;
    return {
      connected: at !== null && this.now() - at <= TELEMETRY_STALE_MS,
      lastUpdate: at !== null ? new Date(at).toISOString() : null,
    };
  }

  history(): readonly ConversationEntry[] {
    return this.engine.history();
  }

  private accept(snapshot: TelemetrySnapshot): void {
    this.lastUpdateAt = this.now();
    this.telemetry.set(snapshot);
  }

  private scheduleProbe(): void {
    this.checkModel().catch((e: unknown) => {
      Logger.warn(`[stream] availability check failed: ${asError(e).message}`);
    });
  }
}
