/**
 * Tests for ConversationEngine: derived flight fields, prompt rendering,
 * history bounds, failure handling, retry and heartbeat coordination.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import {
  ConversationEngine,
  deriveFlightContext,
  type PausableHeartbeat,
} from "../src/conversation-engine.js";
import { isStratusError } from "../src/errors.js";
import type { StreamChunk } from "../src/drivers/types.js";
import { FakeDriver, snapshot, telemetryFile } from "./support/fixtures.js";

class RecordingHeartbeat implements PausableHeartbeat {
  readonly calls: string[] = [];
  constructor(private paused = false) {}
  pause(): void { this.paused = true; this.calls.push("pause"); }
  resume(): void { this.paused = false; this.calls.push("resume"); }
  isPaused(): boolean { return this.paused; }
}

const messages = (engine: ConversationEngine) => engine.history().map((e) => `${e.speaker}:${e.message}`);

describe("deriveFlightContext", () => {
  test("converts units with truncation", () => {
    assert.deepStrictEqual(deriveFlightContext(snapshot()), {
      altitudeFt: 3280,
      heading: 270,
      groundSpeedKts: 99,
      phase: "in flight",
      squawk: "1200",
    });
  });

  test("on the ground wins over altitude", () => {
    const t = snapshot({ state: { on_ground: true, paused: false } });
    assert.strictEqual(deriveFlightContext(t).phase, "on the ground");
  });

  test("airborne below 1000 ft is in the pattern", () => {
    const base = telemetryFile();
    const t = snapshot({ position: { ...base.position, altitude_msl_m: 300 } });
    const ctx = deriveFlightContext(t);
    assert.strictEqual(ctx.altitudeFt, 984);
    assert.strictEqual(ctx.phase, "in the pattern");
  });

  test("squawk is zero-padded to four digits", () => {
    const t = snapshot({ transponder: { code: 7, mode: 4 } });
    assert.strictEqual(deriveFlightContext(t).squawk, "0007");
  });
});

describe("ConversationEngine prompt", () => {
  test("renders the controller block, then the conversation and an open ATC cue", () => {
    const engine = new ConversationEngine({ driver: new FakeDriver([]) });
    const prompt = engine.buildPrompt("request flight following", snapshot());
    const lines = prompt.split("\n");

    assert.strictEqual(lines[0], "You are an FAA Air Traffic Controller. Respond with proper ATC phraseology.");
    assert.ok(lines.includes("AIRCRAFT: N12345 (C172)"));
    assert.ok(lines.includes("POSITION: in flight at 3280 ft MSL, heading 270°, 99 kts"));
    assert.ok(lines.includes("SQUAWK: 1200"));
    assert.ok(lines.includes('4. If unclear, ask pilot to "say again"'));
    assert.ok(prompt.endsWith(
      "Respond ONLY with what ATC would say. No explanations.\n\nCONVERSATION:\nPILOT: request flight following\nATC:",
    ));
  });

  test("uses the configured callsign and aircraft type", () => {
    const engine = new ConversationEngine({ driver: new FakeDriver([]), callsign: "N789AB", aircraftType: "PA28" });
    assert.ok(engine.buildPrompt("hi", snapshot()).includes("\nAIRCRAFT: N789AB (PA28)\n"));
  });
});

describe("ConversationEngine.process", () => {
  test("single-shot: records both sides with a trimmed reply", async () => {
    const engine = new ConversationEngine({ driver: new FakeDriver(["  N12345, radar contact.  "]), now: () => 100 });
    const reply = await engine.process("Seattle approach, N12345, with you", snapshot());

    assert.strictEqual(reply, "N12345, radar contact.");
    assert.deepStrictEqual(engine.history(), [
      { speaker: "pilot", message: "Seattle approach, N12345, with you", timestamp: 100 },
      { speaker: "atc", message: "N12345, radar contact.", timestamp: 100 },
    ]);
  });

  test("later prompts carry earlier exchanges in order", async () => {
    const driver = new FakeDriver(["r1", "r2"]);
    const engine = new ConversationEngine({ driver });
    await engine.process("one", snapshot());
    await engine.process("two", snapshot());
    assert.ok(driver.prompts[1]?.endsWith("CONVERSATION:\nPILOT: one\nATC: r1\nPILOT: two\nATC:"));
  });

  test("streaming: forwards chunks and records the joined reply", async () => {
    const engine = new ConversationEngine({ driver: new FakeDriver(["Roger, wilco."]) });
    const chunks: StreamChunk[] = [];
    const reply = await engine.process("N12345 descending", snapshot(), (c) => chunks.push(c));

    assert.strictEqual(reply, "Roger, wilco.");
    assert.deepStrictEqual(chunks.map((c) => [c.text, c.isFinal]), [["Roger,", false], ["wilco.", true]]);
    assert.deepStrictEqual(messages(engine), ["pilot:N12345 descending", "atc:Roger, wilco."]);
  });

  test("a generation error propagates unchanged and keeps the pilot entry", async () => {
    const failure = new Error("endpoint down");
    const engine = new ConversationEngine({ driver: new FakeDriver([failure]) });
    await assert.rejects(engine.process("request taxi", snapshot()), (err: unknown) => err === failure);
    assert.deepStrictEqual(messages(engine), ["pilot:request taxi"]);
    assert.strictEqual(engine.isBusy(), false);
  });

  test("a second call while one is in flight is rejected as engine_busy", async () => {
    const driver = new FakeDriver(["Roger."]);
    let release: () => void = () => undefined;
    driver.holdUntil(new Promise<void>((resolve) => { release = resolve; }));
    const engine = new ConversationEngine({ driver });

    const first = engine.process("first", snapshot());
    assert.strictEqual(engine.isBusy(), true);
    await assert.rejects(engine.process("second", snapshot()), (err: unknown) => isStratusError(err, "engine_busy"));

    release();
    assert.strictEqual(await first, "Roger.");
    assert.strictEqual(engine.isBusy(), false);
    assert.deepStrictEqual(messages(engine), ["pilot:first", "atc:Roger."]);
  });
});

describe("ConversationEngine history bounds", () => {
  test("drops the oldest pair once the ceiling is exceeded", async () => {
    const engine = new ConversationEngine({ driver: new FakeDriver(["a1", "a2", "a3"]), historyLimit: 4 });
    await engine.process("p1", snapshot());
    await engine.process("p2", snapshot());
    await engine.process("p3", snapshot());
    assert.deepStrictEqual(messages(engine), ["pilot:p2", "atc:a2", "pilot:p3", "atc:a3"]);
  });

  test("an unanswered pilot entry is trimmed alone, keeping later pairs whole", async () => {
    const engine = new ConversationEngine({ driver: new FakeDriver([new Error("timeout"), "a2", "a3"]), historyLimit: 4 });
    await assert.rejects(engine.process("p1", snapshot()));
    await engine.process("p2", snapshot());
    await engine.process("p3", snapshot());
    assert.deepStrictEqual(messages(engine), ["pilot:p2", "atc:a2", "pilot:p3", "atc:a3"]);
  });

  test("pairs stay whole through repeated trims after a failure", async () => {
    const engine = new ConversationEngine({
      driver: new FakeDriver(["a1", new Error("timeout"), "a3", "a4", "a5"]),
      historyLimit: 4,
    });
    await engine.process("p1", snapshot());
    await assert.rejects(engine.process("p2", snapshot()));
    await engine.process("p3", snapshot());
    await engine.process("p4", snapshot());
    await engine.process("p5", snapshot());
    assert.deepStrictEqual(messages(engine), ["pilot:p4", "atc:a4", "pilot:p5", "atc:a5"]);
  });

  test("never exceeds the default ceiling of 20", async () => {
    const replies = Array.from({ length: 15 }, (_, i) => `a${i}`);
    const engine = new ConversationEngine({ driver: new FakeDriver(replies) });
    for (let i = 0; i < 15; i++) {
      await engine.process(`p${i}`, snapshot());
      assert.ok(engine.history().length <= 20);
    }
    const history = engine.history();
    assert.strictEqual(history.length, 20);
    assert.strictEqual(history[0]?.message, "p5");
    assert.strictEqual(history[0]?.speaker, "pilot");
  });

  test("clearHistory empties the log", async () => {
    const engine = new ConversationEngine({ driver: new FakeDriver(["ok"]) });
    await engine.process("hello", snapshot());
    engine.clearHistory();
    assert.deepStrictEqual(engine.history(), []);
  });

  test("history() returns a copy", async () => {
    const engine = new ConversationEngine({ driver: new FakeDriver(["ok"]) });
    const before = engine.history();
    await engine.process("hello", snapshot());
    assert.strictEqual(before.length, 0);
  });

  test("rejects a ceiling below one exchange", () => {
    assert.throws(() => new ConversationEngine({ driver: new FakeDriver([]), historyLimit: 1 }), RangeError);
  });
});

describe("ConversationEngine.retryLast", () => {
  test("regenerates for the unanswered pilot entry without duplicating it", async () => {
    const driver = new FakeDriver([new Error("timeout"), "N12345, say again."]);
    const engine = new ConversationEngine({ driver });

    await assert.rejects(engine.process("Boeing Field tower, N12345, ready", snapshot()));
    const reply = await engine.retryLast(snapshot());

    assert.strictEqual(reply, "N12345, say again.");
    assert.deepStrictEqual(messages(engine), ["pilot:Boeing Field tower, N12345, ready", "atc:N12345, say again."]);
    assert.strictEqual(driver.prompts[1], driver.prompts[0]);
  });

  test("returns null when there is nothing to retry", async () => {
    const engine = new ConversationEngine({ driver: new FakeDriver(["ok"]) });
    assert.strictEqual(await engine.retryLast(snapshot()), null);
    await engine.process("hello", snapshot());
    assert.strictEqual(await engine.retryLast(snapshot()), null);
  });
});

describe("ConversationEngine heartbeat coordination", () => {
  test("pauses during generation and resumes afterwards", async () => {
    const heartbeat = new RecordingHeartbeat();
    const engine = new ConversationEngine({ driver: new FakeDriver(["ok"]), heartbeat });
    await engine.process("hello", snapshot());
    assert.deepStrictEqual(heartbeat.calls, ["pause", "resume"]);
    assert.strictEqual(heartbeat.isPaused(), false);
  });

  test("resumes after a failed generation", async () => {
    const heartbeat = new RecordingHeartbeat();
    const engine = new ConversationEngine({ driver: new FakeDriver([new Error("boom")]), heartbeat });
    await assert.rejects(engine.process("hello", snapshot()));
    assert.deepStrictEqual(heartbeat.calls, ["pause", "resume"]);
  });

  test("leaves an already paused heartbeat alone", async () => {
    const heartbeat = new RecordingHeartbeat(true);
    const engine = new ConversationEngine({ driver: new FakeDriver(["ok"]), heartbeat });
    await engine.process("hello", snapshot());
    assert.deepStrictEqual(heartbeat.calls, []);
    assert.strictEqual(heartbeat.isPaused(), true);
  });
});
