/**
 * ConversationEngine turns a pilot transmission plus the latest telemetry
 * into a controller reply, keeping a bounded exchange history.
 *
 * One generation in flight per engine. The warmup heartbeat, when given, is
 * paused for the duration so pings never contend with a real request.
 */
import { Logger } from "./logger.js";
import { asError, stratusError } from "./errors.js";
import type { ChunkHandler, GenerationDriver } from "./drivers/types.js";
import type { TelemetrySnapshot } from "./telemetry/snapshot.js";

export type Speaker = "pilot" | "atc";

export interface ConversationEntry {
  readonly speaker: Speaker;
  readonly message: string;
  /** Epoch seconds. */
  readonly timestamp: number;
}

/** The part of the heartbeat the engine drives. */
export interface PausableHeartbeat {
  pause(): void;
  resume(): void;
  isPaused(): boolean;
}

export type FlightPhase = "on the ground" | "in the pattern" | "in flight";

export interface FlightContext {
  altitudeFt: number;
  heading: number;
  groundSpeedKts: number;
  phase: FlightPhase;
  squawk: string;
}

export const DEFAULT_CALLSIGN = "N12345";
export const DEFAULT_AIRCRAFT_TYPE = "C172";
export const DEFAULT_HISTORY_LIMIT = 20;

const FEET_PER_METER = 3.28084;
const KNOTS_PER_MPS = 1.94384;
const PATTERN_CEILING_FT = 1000;

export interface ConversationEngineOptions {
  driver: GenerationDriver;
  callsign?: string;
  aircraftType?: string;
  historyLimit?: number;
  heartbeat?: PausableHeartbeat;
  /** Epoch-seconds clock for entry timestamps. */
  now?: () => number;
}

export function deriveFlightContext(t: TelemetrySnapshot): FlightContext {
  const altitudeFt = Math.trunc(t.position.altitudeMslM * FEET_PER_METER);
  let phase: FlightPhase;
  if (t.state.onGround) phase = "on the ground";
  else if (altitudeFt < PATTERN_CEILING_FT) phase = "in the pattern";
  else phase = "in flight";

  return {
    altitudeFt,
    heading: Math.trunc(t.orientation.headingMag),
    groundSpeedKts: Math.trunc(t.speed.groundSpeedMps * KNOTS_PER_MPS),
    phase,
    squawk: String(t.transponder.code).padStart(4, "0"),
  };
}

export function formatHistory(entries: readonly ConversationEntry[]): string {
  return entries.map((e) => `${e.speaker === "pilot" ? "PILOT" : "ATC"}: ${e.message}`).join("\n");
}

/**
 * Render the full model prompt. `prior` is the history before the pilot
 * line being answered; the pilot line is rendered last, followed by the
 * open `ATC:` cue.
 */
export function renderPrompt(
  callsign: string,
  aircraftType: string,
  ctx: FlightContext,
  prior: readonly ConversationEntry[],
  pilotText: string,
): string {
  const system = [
    "You are an FAA Air Traffic Controller. Respond with proper ATC phraseology.",
    "",
    `AIRCRAFT: ${callsign} (${aircraftType})`,
    `POSITION: ${ctx.phase} at ${ctx.altitudeFt} ft MSL, heading ${ctx.heading}°, ${ctx.groundSpeedKts} kts`,
    `SQUAWK: ${ctx.squawk}`,
    "",
    "RULES:",
    "1. Use standard FAA phraseology",
    "2. Be concise - real ATC is brief",
    "3. Include callsign in every transmission",
    '4. If unclear, ask pilot to "say again"',
    "",
    "Respond ONLY with what ATC would say. No explanations.",
  ].join("\n");

  const history = formatHistory(prior);
  const conversation = history ? `${history}\nPILOT: ${pilotText}` : `PILOT: ${pilotText}`;
  return `${system}\n\nCONVERSATION:\n${conversation}\nATC:`;
}

export class ConversationEngine {
  readonly callsign: string;
  readonly aircraftType: string;
  readonly historyLimit: number;
  private readonly driver: GenerationDriver;
  private readonly heartbeat?: PausableHeartbeat;
  private readonly now: () => number;
  private entries: ConversationEntry[] = [];
  private busy = false;

  constructor(opts: ConversationEngineOptions) {
    const historyLimit = opts.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    if (!Number.isInteger(historyLimit) || historyLimit < 2) {
      throw new RangeError(`historyLimit must be an integer >= 2; got ${historyLimit}`);
    }
    this.driver = opts.driver;
    this.callsign = opts.callsign ?? DEFAULT_CALLSIGN;
    this.aircraftType = opts.aircraftType ?? DEFAULT_AIRCRAFT_TYPE;
    this.historyLimit = historyLimit;
    this.heartbeat = opts.heartbeat;
    this.now = opts.now ?? (() => Math.floor(Date.now() / 1000));
  }

  get model(): string {
    return this.driver.model;
  }

  isBusy(): boolean {
    return this.busy;
  }

  history(): readonly ConversationEntry[] {
    return [...this.entries];
  }

  clearHistory(): void {
    this.entries = [];
    Logger.debug("[engine] history cleared");
  }

  /** Prompt for `pilotText` against the current history, without recording it. */
  buildPrompt(pilotText: string, telemetry: TelemetrySnapshot): string {
    return renderPrompt(this.callsign, this.aircraftType, deriveFlightContext(telemetry), this.entries, pilotText);
  }

  /**
   * Record the pilot transmission and generate the reply. With `onChunk`
   * the reply is streamed; without, it is a single-shot request. On failure
   * the pilot entry stays and the error propagates unchanged.
   */
  async process(pilotText: string, telemetry: TelemetrySnapshot, onChunk?: ChunkHandler): Promise<string> {
    this.acquire();
    try {
      const prompt = this.buildPrompt(pilotText, telemetry);
      this.append("pilot", pilotText);
      return await this.respond(prompt, onChunk);
    } finally {
      this.busy = false;
    }
  }

  /**
   * Regenerate the reply to the most recent pilot entry when it has none.
   * Returns null when there is nothing to retry.
   */
  async retryLast(telemetry: TelemetrySnapshot, onChunk?: ChunkHandler): Promise<string | null> {
    const last = this.entries.at(-1);
    if (!last || last.speaker !== "pilot") return null;
    this.acquire();
    try {
      const prior = this.entries.slice(0, -1);
      const prompt = renderPrompt(
        this.callsign,
        this.aircraftType,
        deriveFlightContext(telemetry),
        prior,
        last.message,
      );
      Logger.info("[engine] retrying last transmission");
      return await this.respond(prompt, onChunk);
    } finally {
      this.busy = false;
    }
  }

  private acquire(): void {
    if (this.busy) {
      throw stratusError("engine_busy", "A transmission is already being answered");
    }
    this.busy = true;
  }

  private async respond(prompt: string, onChunk?: ChunkHandler): Promise<string> {
    const pauseHeartbeat = this.heartbeat !== undefined && !this.heartbeat.isPaused();
    if (pauseHeartbeat) this.heartbeat?.pause();
    try {
      const raw = onChunk
        ? await this.driver.generateWithCallback(prompt, onChunk)
        : await this.driver.generate(prompt);
      const reply = raw.trim();
      this.append("atc", reply);
      return reply;
    } catch (e: unknown) {
      Logger.warn(`[engine] generation failed: ${asError(e).message}`);
      throw e;
    } finally {
      if (pauseHeartbeat) this.heartbeat?.resume();
    }
  }

  private append(speaker: Speaker, message: string): void {
    this.entries.push(Object.freeze({ speaker, message, timestamp: this.now() }));
    while (this.entries.length > this.historyLimit) {
      this.entries.splice(0, this.leadingExchangeLength());
    }
  }

  /**
   * Entries in the oldest exchange: a pilot entry with its ATC answer, or a
   * lone entry (a pilot transmission whose reply failed).
   */
  private leadingExchangeLength(): number {
    const [first, second] = this.entries;
    return first?.speaker === "pilot" && second?.speaker === "atc" ? 2 : 1;
  }
}
