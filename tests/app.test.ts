/**
 * StratusApp wiring: telemetry intake and ageing, transmissions through the
 * engine, and the ComLink-facing accessors. Warmup and ComLink are off.
 */

import { test, describe, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { StratusApp } from "../src/app.js";
import { loadConfig } from "../src/cli/config.js";
import { emptySnapshot } from "../src/telemetry/snapshot.js";
import { TELEMETRY_FILE_NAME } from "../src/telemetry/telemetry-store.js";
import { FakeDriver, telemetryFile } from "./support/fixtures.js";

describe("StratusApp", () => {
  let dir = "";
  let clock = 1000;
  let driver: FakeDriver;
  let app: StratusApp;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "stratus-app-"));
    clock = 1000;
    driver = new FakeDriver(["N12345, Seattle approach, radar contact."]);
    const config = loadConfig(["--no-warmup", "--no-comlink", "--data-dir", dir], {});
    app = new StratusApp(config, { driver, now: () => clock });
  });

  afterEach(async () => {
    await app.stop();
    rmSync(dir, { recursive: true, force: true });
  });

  const writeTelemetry = () => writeFileSync(join(dir, TELEMETRY_FILE_NAME), JSON.stringify(telemetryFile()));

  test("before any telemetry, prompts use an all-zero snapshot", () => {
    assert.strictEqual(app.loadTelemetry(), null);
    assert.deepStrictEqual(app.currentTelemetry(), emptySnapshot());
    assert.deepStrictEqual(app.telemetryStatus(), { connected: false, lastUpdate: null });
  });

  test("loaded telemetry is live until it goes stale", () => {
    writeTelemetry();
    assert.strictEqual(app.loadTelemetry()?.aircraft, "Cessna 172");
    assert.deepStrictEqual(app.telemetryStatus(), { connected: true, lastUpdate: "1970-01-01T00:00:01.000Z" });

    clock = 6000;
    assert.strictEqual(app.telemetryStatus().connected, true);
    clock = 6001;
    assert.strictEqual(app.telemetryStatus().connected, false);
  });

  test("refreshTelemetry picks up a change notification", async () => {
    assert.strictEqual(app.latestTelemetry(), null);
    writeTelemetry();
    const deadline = Date.now() + 3000;
    while (!app.store.hasPendingChange() && Date.now() < deadline) {
      await new Promise((r) => setTimeout(r, 10));
    }
    app.refreshTelemetry();
    assert.strictEqual(app.latestTelemetry()?.timestamp, 1_700_000_000);
  });

  test("a failed read keeps the previous snapshot", () => {
    writeTelemetry();
    const first = app.loadTelemetry();
    writeFileSync(join(dir, TELEMETRY_FILE_NAME), "{ torn write");
    assert.strictEqual(app.loadTelemetry(), first);
  });

  test("transmit builds the prompt from current telemetry and records history", async () => {
    writeTelemetry();
    app.loadTelemetry();
    const reply = await app.transmit("Seattle approach, N12345, with you at 3300");

    assert.strictEqual(reply, "N12345, Seattle approach, radar contact.");
    assert.ok(driver.prompts[0]?.includes("\nPOSITION: in flight at 3280 ft MSL, heading 270°, 99 kts\n"));
    assert.deepStrictEqual(app.history().map((e) => e.speaker), ["pilot", "atc"]);
  });

  test("checkModel publishes availability", async () => {
    assert.strictEqual(app.modelAvailable.get(), null);
    assert.strictEqual(await app.checkModel(), true);
    assert.strictEqual(app.modelAvailable.get(), true);
  });

  test("with warmup disabled there is no heartbeat to force or report", async () => {
    assert.strictEqual(app.heartbeat, null);
    assert.strictEqual(app.warmupStats(), null);
    assert.strictEqual(await app.forceWarmup(), null);
  });

  test("model comes from the driver", () => {
    assert.strictEqual(app.model, "fake-model");
  });
});
