/**
 * Model warmup heartbeat.
 *
 * Sends a tiny generate request every interval so the local model stays
 * resident. A cold reload costs 5-15s, which would otherwise land on the
 * first real transmission after idle time.
 *
 * One supervised loop per instance: start() spawns it, stop() asks it to
 * exit and resolves once it has. The interval sleep is cut short by stop();
 * a ping already on the wire always completes. pause()/resume() are sampled
 * at the next cycle boundary.
 */
import { Logger } from "./logger.js";
import { asError } from "./errors.js";
import { buildGenerateRequest, DEFAULT_MODEL, DEFAULT_OLLAMA_URL, normalizeBaseUrl } from "./drivers/ollama.js";
import { sleep } from "./utils/sleep.js";
import { timedFetch } from "./utils/timed-fetch.js";
import { WatchCell } from "./utils/watch-cell.js";

export interface WarmupConfig {
  readonly model: string;
  readonly intervalMs: number;
  readonly baseUrl: string;
}

export const DEFAULT_WARMUP_CONFIG: WarmupConfig = Object.freeze({
  model: DEFAULT_MODEL,
  intervalMs: 30_000,
  baseUrl: DEFAULT_OLLAMA_URL,
});

export const WARMUP_PROMPT = "Ready";
export const WARMUP_MAX_TOKENS = 5;
export const PING_TIMEOUT_MS = 15_000;
/** Pings slower than this mean the model had been unloaded. */
export const COLD_START_THRESHOLD_MS = 2_000;

export interface HeartbeatStats {
  count: number;
  lastLatencyMs: number;
  isRunning: boolean;
  isPaused: boolean;
}

export interface HeartbeatStatus extends HeartbeatStats {
  model: string;
  intervalMs: number;
  lastPingAt: string | null;
}

export type HeartbeatState = "stopped" | "running" | "stopping";

export interface WarmupHeartbeatOptions {
  pingTimeoutMs?: number;
  coldStartThresholdMs?: number;
  onColdStart?: (latencyMs: number) => void;
}

export class WarmupHeartbeat {
  readonly config: WarmupConfig;
  readonly stats: WatchCell<HeartbeatStats>;
  private readonly endpoint: string;
  private readonly pingTimeoutMs: number;
  private readonly coldStartThresholdMs: number;
  private readonly onColdStart?: (latencyMs: number) => void;

  private state: HeartbeatState = "stopped";
  private paused = false;
  private count = 0;
  private lastLatencyMs = 0;
  private lastPingAt: Date | null = null;
  private loop: Promise<void> | null = null;
  private wake: AbortController | null = null;

  constructor(config: Partial<WarmupConfig> = {}, opts: WarmupHeartbeatOptions = {}) {
    const merged = { ...DEFAULT_WARMUP_CONFIG, ...config };
    if (!Number.isFinite(merged.intervalMs) || merged.intervalMs <= 0) {
      throw new RangeError(`intervalMs must be a positive number; got ${merged.intervalMs}`);
    }
    this.config = Object.freeze({ ...merged, baseUrl: normalizeBaseUrl(merged.baseUrl) });
    this.endpoint = `${this.config.baseUrl}/api/generate`;
    this.pingTimeoutMs = opts.pingTimeoutMs ?? PING_TIMEOUT_MS;
    this.coldStartThresholdMs = opts.coldStartThresholdMs ?? COLD_START_THRESHOLD_MS;
    this.onColdStart = opts.onColdStart;
    this.stats = new WatchCell<HeartbeatStats>(this.snapshot());
  }

  get currentState(): HeartbeatState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === "running";
  }

  isPaused(): boolean {
    return this.paused;
  }

  /**
   * Spawn the loop. Ignored with a warning unless stopped; that includes
   * "stopping", so await stop() before starting again.
   */
  start(): void {
    if (this.state !== "stopped") {
      Logger.warn(`[warmup] already ${this.state}, ignoring start()`);
      return;
    }
    this.state = "running";
    const wake = new AbortController();
    this.wake = wake;
    Logger.info(
      `[warmup] started: model=${this.config.model}, interval=${Math.round(this.config.intervalMs / 1000)}s`,
    );
    this.publish();

    this.loop = this.run(wake.signal)
      .catch((e: unknown) => {
        Logger.error(`[warmup] loop crashed: ${asError(e).message}`);
      })
      .finally(() => {
        this.state = "stopped";
        this.wake = null;
        this.loop = null;
        this.publish();
        Logger.info("[warmup] stopped");
      });
  }

  /** Ask the loop to exit; resolves once it has. Safe to call when stopped. */
  async stop(): Promise<void> {
    if (this.state === "running") {
      this.state = "stopping";
      this.wake?.abort();
      this.publish();
    }
    if (this.loop) await this.loop;
  }

  pause(): void {
    if (this.paused) return;
    this.paused = true;
    Logger.debug("[warmup] paused");
    this.publish();
  }

  resume(): void {
    if (!this.paused) return;
    this.paused = false;
    Logger.debug("[warmup] resumed");
    this.publish();
  }

  /**
   * One cycle body without the interval wait: skip when paused, otherwise
   * ping, count and publish. Returns whether a ping was sent.
   */
  async runCycle(): Promise<boolean> {
    if (this.paused) {
      Logger.debug("[warmup] paused, skipping heartbeat");
      return false;
    }
    const latency = await this.ping();
    this.count++;
    this.lastLatencyMs = latency;
    this.lastPingAt = new Date();
    this.publish();
    Logger.debug(`[warmup] heartbeat #${this.count}: ${latency}ms`);
    return true;
  }

  /** Ping now, paused or not. Leaves the heartbeat counter alone. */
  async forcePing(): Promise<number> {
    Logger.info("[warmup] forcing model warmup...");
    const latency = await this.ping();
    Logger.info(`[warmup] forced warmup complete: ${latency}ms`);
    return latency;
  }

  status(): HeartbeatStatus {
    return {
      ...this.snapshot(),
      model: this.config.model,
      intervalMs: this.config.intervalMs,
      lastPingAt: this.lastPingAt ? this.lastPingAt.toISOString() : null,
    };
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (this.state === "running") {
      await sleep(this.config.intervalMs, signal);
      if (this.state !== "running") break;
      await this.runCycle();
    }
  }

  /** Never throws: a failed ping is still a latency measurement. */
  private async ping(): Promise<number> {
    const started = performance.now();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.pingTimeoutMs);
    const elapsed = () => Math.round(performance.now() - started);

    try {
      const res = await timedFetch(this.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(
          buildGenerateRequest(this.config.model, WARMUP_PROMPT, false, {
            temperature: 0,
            maxTokens: WARMUP_MAX_TOKENS,
          }),
        ),
        signal: controller.signal,
        where: "warmup:ping",
      });
      await res.text();
      const latency = elapsed();

      if (!res.ok) {
        Logger.warn(`[warmup] ping failed with status ${res.status} (${latency}ms)`);
        return latency;
      }
      if (latency > this.coldStartThresholdMs) {
        Logger.warn(`[warmup] cold start detected: ${latency}ms`);
        this.onColdStart?.(latency);
      }
      return latency;
    } catch (e: unknown) {
      const latency = elapsed();
      Logger.warn(`[warmup] ping request failed after ${latency}ms: ${asError(e).message}`);
      return latency;
    } finally {
      clearTimeout(timer);
    }
  }

  private snapshot(): HeartbeatStats {
    return {
      count: this.count,
      lastLatencyMs: this.lastLatencyMs,
      isRunning: this.state === "running",
      isPaused: this.paused,
    };
  }

  private publish(): void {
    this.stats.set(this.snapshot());
  }
}
