/**
 * Interactive console: comm log with streamed replies, live telemetry and
 * model status, and a logs pane that receives every Logger line while the
 * screen is up.
 */
import { Logger } from "../logger.js";
import { asError } from "../errors.js";
import type { StratusApp } from "../app.js";
import { createScreen, setupGlobalKeys } from "./ui/screen.js";
import { createLayout } from "./ui/layout.js";
import { statusLines, telemetryLines } from "./format.js";
import { DEFAULT_PANEL_RATIOS } from "./types.js";
import { versionLine } from "../cli/config.js";

const TELEMETRY_REDRAW_MS = 1_000;

/** Resolves after the user quits and the app has shut down. */
export async function runConsole(app: StratusApp): Promise<void> {
  const screen = createScreen();
  const { commPanel, telemetryPanel, statusPanel, logsPanel, inputBox, focusables } =
    createLayout(screen, DEFAULT_PANEL_RATIOS);

  Logger.setSink((level, line) => logsPanel.appendLog(line, level));

  const drawTelemetry = () =>
    telemetryPanel.setLines(telemetryLines(app.latestTelemetry(), app.telemetryStatus()));
  const drawStatus = () =>
    statusPanel.setLines(statusLines(app.model, app.modelAvailable.get(), app.warmupStats()));

  const unsubscribers = [
    app.telemetry.subscribe(drawTelemetry),
    app.modelAvailable.subscribe(drawStatus),
  ];
  if (app.heartbeat) unsubscribers.push(app.heartbeat.stats.subscribe(drawStatus));
  // LIVE/STALE ages even when no new snapshot arrives.
  const redrawTimer = setInterval(drawTelemetry, TELEMETRY_REDRAW_MS);

  const setBusy = (busy: boolean) => {
    inputBox.setLabel(busy ? " Waiting... " : " Transmit > ");
    screen.render();
  };

  const reportFailure = (e: unknown) => {
    commPanel.abortReply();
    commPanel.append("system", `No reply: ${asError(e).message}`);
  };

  function submitInput(): void {
    const text = inputBox.getValue().trim();
    inputBox.clearValue();
    screen.render();
    if (!text) return;
    if (app.engine.isBusy()) {
      commPanel.append("system", "Still answering the last transmission");
      return;
    }

    commPanel.append("pilot", text);
    commPanel.beginReply();
    setBusy(true);
    app.transmit(text, (chunk) => commPanel.appendChunk(chunk))
      .then((reply) => commPanel.endReply(reply))
      .catch(reportFailure)
      .finally(() => setBusy(false));
  }

  function retryLast(): void {
    if (app.engine.isBusy()) return;
    commPanel.beginReply();
    setBusy(true);
    app.retryLast((chunk) => commPanel.appendChunk(chunk))
      .then((reply) => {
        if (reply === null) {
          commPanel.abortReply();
          commPanel.append("system", "Nothing to retry");
        } else {
          commPanel.endReply(reply);
        }
      })
      .catch(reportFailure)
      .finally(() => setBusy(false));
  }

  function forcePing(): void {
    app.forceWarmup()
      .then((ms) => {
        if (ms !== null) commPanel.append("system", `Model warmed in ${ms}ms`);
      })
      .catch((e: unknown) => Logger.error(`[warmup] forced ping failed: ${asError(e).message}`));
  }

  inputBox.key("enter", () => { submitInput(); });
  inputBox.on("submit", () => { inputBox.readInput(); });
  inputBox.on("cancel", () => { inputBox.readInput(); });
  inputBox.on("click", () => {
    inputBox.focus();
    inputBox.readInput();
  });

  await app.start();
  drawTelemetry();
  drawStatus();

  inputBox.focus();
  inputBox.readInput();
  logsPanel.appendLog(versionLine(), "info");
  logsPanel.appendLog(`telemetry: ${app.store.path}`, "info");
  screen.render();

  return new Promise<void>((resolve) => {
    setupGlobalKeys(screen, focusables, inputBox, {
      onQuit: () => {
        clearInterval(redrawTimer);
        for (const unsubscribe of unsubscribers) unsubscribe();
        Logger.setSink(null);
        screen.destroy();
        app.stop()
          .catch((e: unknown) => Logger.error(`Shutdown failed: ${asError(e).message}`))
          .finally(resolve);
      },
      onForcePing: forcePing,
      onRetry: retryLast,
    });
  });
}
