import blessed from "blessed";
import { deriveFlightContext, type Speaker } from "../conversation-engine.js";
import { formatFrequency, type TelemetrySnapshot } from "../telemetry/snapshot.js";
import type { TelemetryStatus } from "../comlink/server.js";
import type { HeartbeatStats } from "../warmup.js";

export type CommSpeaker = Speaker | "system";

const SPEAKER_STYLE: Record<CommSpeaker, { label: string; color: string }> = {
  pilot: { label: "PILOT", color: "cyan" },
  atc: { label: "ATC", color: "green" },
  system: { label: "SYSTEM", color: "gray" },
};

export function commLine(speaker: CommSpeaker, text: string): string {
  const { label, color } = SPEAKER_STYLE[speaker];
  return `{${color}-fg}{bold}${label}:{/bold}{/${color}-fg} ${blessed.escape(text)}`;
}

export function telemetryLines(t: TelemetrySnapshot | null, status: TelemetryStatus): string[] {
  if (!t) return ["{gray-fg}Waiting for simulator...{/gray-fg}"];
  const ctx = deriveFlightContext(t);
  return [
    status.connected ? "{green-fg}LIVE{/green-fg}" : "{red-fg}STALE{/red-fg}",
    `ACFT:  ${blessed.escape(t.aircraft || "-")}`,
    `PHASE: ${ctx.phase}`,
    "",
    `ALT:   ${ctx.altitudeFt} ft`,
    `HDG:   ${ctx.heading}°`,
    `GS:    ${ctx.groundSpeedKts} kts`,
    `IAS:   ${Math.trunc(t.speed.iasKts)} kts`,
    `VS:    ${Math.trunc(t.speed.verticalSpeedFpm)} fpm`,
    `XPDR:  ${ctx.squawk}`,
    "",
    `COM1:  ${formatFrequency(t.radios.com1Hz)}`,
    `COM2:  ${formatFrequency(t.radios.com2Hz)}`,
    `POS:   ${t.position.latitude.toFixed(4)}, ${t.position.longitude.toFixed(4)}`,
  ];
}

export function statusLines(model: string, available: boolean | null, stats: HeartbeatStats | null): string[] {
  let endpoint: string;
  if (available === null) endpoint = "{yellow-fg}checking{/yellow-fg}";
  else if (available) endpoint = "{green-fg}connected{/green-fg}";
  else endpoint = "{red-fg}unreachable{/red-fg}";

  const lines = [`MODEL:  ${blessed.escape(model)}`, `OLLAMA: ${endpoint}`];
  if (!stats) {
    lines.push("WARMUP: {gray-fg}disabled{/gray-fg}");
    return lines;
  }
  let state: string;
  if (!stats.isRunning) state = "stopped";
  else if (stats.isPaused) state = "paused";
  else state = "running";
  lines.push(`WARMUP: ${state}`, `PINGS:  ${stats.count}`, `LAST:   ${stats.lastLatencyMs}ms`);
  return lines;
}
