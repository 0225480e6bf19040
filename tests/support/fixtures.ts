import { toSnapshot, type TelemetryFile, type TelemetrySnapshot } from "../../src/telemetry/snapshot.js";
import type { ChunkHandler, GenerationDriver, StreamChunk } from "../../src/drivers/types.js";

/** A C172 climbing out at 1000 m MSL. */
export function telemetryFile(overrides: Partial<TelemetryFile> = {}): TelemetryFile {
  return {
    timestamp: 1_700_000_000,
    simulator: "test-sim",
    aircraft: "Cessna 172",
    position: { latitude: 47.4502, longitude: -122.3088, altitude_msl_m: 1000, altitude_agl_m: 880 },
    orientation: { heading_mag: 270.9, heading_true: 286.1, pitch: 2.5, roll: -1 },
    speed: { ground_speed_mps: 51.4, ias_kts: 98.6, tas_mps: 53, vertical_speed_fpm: 500.4 },
    radios: {
      com1_hz: 118_300_000,
      com1_standby_hz: 121_900_000,
      com2_hz: 124_850_000,
      com2_standby_hz: 122_800_000,
      nav1_hz: 110_500_000,
      nav2_hz: 113_800_000,
    },
    transponder: { code: 1200, mode: 4 },
    state: { on_ground: false, paused: false },
    ...overrides,
  };
}

export function snapshot(overrides: Partial<TelemetryFile> = {}): TelemetrySnapshot {
  return toSnapshot(telemetryFile(overrides));
}

/**
 * Scripted driver: each call consumes the next reply. A reply that is an
 * Error is thrown instead. Streaming splits the reply into two chunks.
 */
export class FakeDriver implements GenerationDriver {
  readonly model = "fake-model";
  readonly baseUrl = "http://fake";
  readonly prompts: string[] = [];
  private readonly replies: Array<string | Error>;
  /** Resolved by the test to let a held generation finish. */
  private gate: Promise<void> | null = null;

  constructor(replies: Array<string | Error>) {
    this.replies = [...replies];
  }

  holdUntil(gate: Promise<void>): void {
    this.gate = gate;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async generate(prompt: string): Promise<string> {
    return this.next(prompt);
  }

  async generateStream(prompt: string): Promise<AsyncIterable<StreamChunk>> {
    const reply = await this.next(prompt);
    const mid = Math.floor(reply.length / 2);
    const chunks: StreamChunk[] = [
      { text: reply.slice(0, mid).trim(), isFinal: false, latencyMs: 1 },
      { text: reply.slice(mid).trim(), isFinal: true, latencyMs: 2 },
    ];
    return (async function* () {
      yield* chunks;
    })();
  }

  async generateWithCallback(prompt: string, onChunk: ChunkHandler): Promise<string> {
    const parts: string[] = [];
    for await (const chunk of await this.generateStream(prompt)) {
      onChunk(chunk);
      if (chunk.text) parts.push(chunk.text);
    }
    return parts.join(" ");
  }

  private async next(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.gate) await this.gate;
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error("FakeDriver ran out of replies");
    if (reply instanceof Error) throw reply;
    return reply;
  }
}
