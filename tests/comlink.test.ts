/**
 * ComLink status page routes, served on an ephemeral loopback port.
 */

import { test, describe, before, after } from "node:test";
import assert from "node:assert";
import { createComLinkApp, startComLink, type ComLinkHandle, type ComLinkSource } from "../src/comlink/server.js";
import type { ConversationEntry } from "../src/conversation-engine.js";
import type { HeartbeatStats } from "../src/warmup.js";
import type { TelemetrySnapshot } from "../src/telemetry/snapshot.js";
import { Logger } from "../src/logger.js";
import { snapshot } from "./support/fixtures.js";

class FakeSource implements ComLinkSource {
  readonly model = "test-model";
  telemetry: TelemetrySnapshot | null = null;
  stats: HeartbeatStats | null = { count: 3, lastLatencyMs: 120, isRunning: true, isPaused: false };
  entries: ConversationEntry[] = [];
  failHistory = false;

  warmupStats() { return this.stats; }
  latestTelemetry() { return this.telemetry; }
  telemetryStatus() { return { connected: this.telemetry !== null, lastUpdate: this.telemetry ? "2026-01-01T00:00:00.000Z" : null }; }
  history(): readonly ConversationEntry[] {
    if (this.failHistory) throw new Error("history unavailable");
    return this.entries;
  }
}

describe("ComLink", () => {
  const source = new FakeSource();
  const errors: string[] = [];
  let handle: ComLinkHandle;

  before(async () => {
    Logger.setSink((level, line) => { if (level === "error") errors.push(line); });
    handle = await startComLink(createComLinkApp(source), 0);
  });

  after(async () => {
    await handle.close();
    Logger.setSink(null);
  });

  test("binds to loopback on the chosen port", () => {
    assert.ok(handle.port > 0);
    assert.strictEqual(handle.url, `http://127.0.0.1:${handle.port}`);
  });

  test("GET / serves the status page", async () => {
    const res = await fetch(`${handle.url}/`);
    assert.strictEqual(res.status, 200);
    assert.ok(res.headers.get("content-type")?.startsWith("text/html"));
    assert.ok((await res.text()).includes("<title>Stratus ComLink</title>"));
  });

  test("GET /api/status reports model, warmup and telemetry link", async () => {
    source.telemetry = null;
    const res = await fetch(`${handle.url}/api/status`);
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await res.json(), {
      status: "ok",
      model: "test-model",
      warmup: { count: 3, lastLatencyMs: 120, isRunning: true, isPaused: false },
      telemetry: { connected: false, lastUpdate: null },
    });
  });

  test("warmup is null when the heartbeat is disabled", async () => {
    source.stats = null;
    try {
      const body: unknown = await (await fetch(`${handle.url}/api/status`)).json();
      assert.ok(typeof body === "object" && body !== null && "warmup" in body);
      assert.strictEqual(body.warmup, null);
    } finally {
      source.stats = { count: 3, lastLatencyMs: 120, isRunning: true, isPaused: false };
    }
  });

  test("GET /api/telemetry is 404 before any snapshot", async () => {
    source.telemetry = null;
    const res = await fetch(`${handle.url}/api/telemetry`);
    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(await res.json(), { error: "No telemetry received yet" });
  });

  test("GET /api/telemetry returns the latest snapshot", async () => {
    source.telemetry = snapshot();
    const res = await fetch(`${handle.url}/api/telemetry`);
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await res.json(), JSON.parse(JSON.stringify(snapshot())));
  });

  test("GET /api/history returns the conversation", async () => {
    source.entries = [
      { speaker: "pilot", message: "Tower, N12345, ready", timestamp: 10 },
      { speaker: "atc", message: "N12345, hold short.", timestamp: 11 },
    ];
    const res = await fetch(`${handle.url}/api/history`);
    assert.deepStrictEqual(await res.json(), { entries: source.entries });
  });

  test("unknown paths are 404 JSON", async () => {
    const res = await fetch(`${handle.url}/api/nope`);
    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(await res.json(), { error: "Endpoint not found" });
  });

  test("a failing handler becomes a 500 and is logged", async () => {
    source.failHistory = true;
    try {
      const res = await fetch(`${handle.url}/api/history`);
      assert.strictEqual(res.status, 500);
      assert.deepStrictEqual(await res.json(), { error: "Internal server error", message: "history unavailable" });
      assert.deepStrictEqual(errors, ["[comlink] GET /api/history failed: history unavailable"]);
    } finally {
      source.failHistory = false;
    }
  });

  test("a port already in use rejects", async () => {
    await assert.rejects(startComLink(createComLinkApp(source), handle.port));
  });
});
