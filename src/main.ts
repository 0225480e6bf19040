#!/usr/bin/env node
/**
 * stratus: live ATC dialogue from flight-simulator telemetry, generated by
 * a local Ollama model.
 *
 * Interactive console by default; `-p "message"` answers one transmission
 * against the current telemetry file and streams the reply to stdout.
 */

import { Logger, C } from "./logger.js";
import { asError, errorLogFields, isStratusError } from "./errors.js";
import { loadConfig, usage, versionLine, type StratusConfig } from "./cli/config.js";
import { StratusApp } from "./app.js";
import { runConsole } from "./tui/console.js";

async function runPrint(config: StratusConfig, message: string): Promise<void> {
  const app = new StratusApp({ ...config, warmup: false, comlink: false });
  try {
    if (!app.loadTelemetry()) {
      Logger.warn(`[telemetry] no telemetry at ${app.store.path}; answering without position`);
    }
    let first = true;
    await app.transmit(message, (chunk) => {
      if (!chunk.text) return;
      Logger.streamInfo(first ? chunk.text : ` ${chunk.text}`);
      first = false;
    });
    Logger.endStreamLine();
  } finally {
    await app.stop();
  }
}

export async function main(): Promise<void> {
  const config = loadConfig();
  if (config.showHelp) {
    console.log(usage());
    return;
  }
  if (config.showVersion) {
    console.log(versionLine());
    return;
  }
  Logger.setVerbose(config.verbose);

  if (config.print !== null) {
    await runPrint(config, config.print);
    return;
  }
  await runConsole(new StratusApp(config));
}

process.on("unhandledRejection", (reason: unknown) => {
  const err = asError(reason);
  Logger.error(C.red(`unhandled rejection: ${err.message}`));
  if (err.stack) Logger.error(C.red(err.stack));
});

const mainError = (e: unknown) => {
  if (isStratusError(e)) {
    Logger.error(C.red(`stratus: ${e.message}`));
    if (Logger.isVerbose()) Logger.error(JSON.stringify(errorLogFields(e), null, 2));
  } else {
    const err = asError(e);
    Logger.error("stratus:", err.message);
    if (err.stack) Logger.error(err.stack);
  }
  process.exit(1);
};

// The console leaves stdin in raw mode; exit explicitly once main settles.
main().then(() => process.exit(0), mainError);
