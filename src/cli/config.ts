/**
 * CLI argument parsing, configuration loading, and help text.
 */

import { Logger } from "../logger.js";
import { stratusError } from "../errors.js";
import { DEFAULT_GENERATE_OPTIONS, DEFAULT_MODEL, DEFAULT_OLLAMA_URL } from "../drivers/ollama.js";
import { DEFAULT_MAX_CHUNK_CHARS, DEFAULT_MIN_CHUNK_CHARS } from "../stream-chunker.js";
import { DEFAULT_AIRCRAFT_TYPE, DEFAULT_CALLSIGN, DEFAULT_HISTORY_LIMIT } from "../conversation-engine.js";
import { DEFAULT_WARMUP_CONFIG } from "../warmup.js";
import { resolveDataDir } from "../telemetry/telemetry-store.js";
import { readVersion } from "../version.js";

export const DEFAULT_COMLINK_PORT = 8090;

export interface StratusConfig {
  model: string;
  baseUrl: string;
  dataDir: string;
  callsign: string;
  aircraftType: string;
  warmup: boolean;
  warmupIntervalMs: number;
  comlink: boolean;
  comlinkPort: number;
  minChunkChars: number;
  maxChunkChars: number;
  temperature: number;
  maxTokens: number;
  historyLimit: number;
  /** Pilot message for one-shot print mode; null runs the console. */
  print: string | null;
  verbose: boolean;
  showHelp: boolean;
  showVersion: boolean;
}

function configError(message: string): Error {
  return stratusError("config_error", message);
}

function parseInteger(flag: string, raw: string, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const n = Number(raw.trim());
  if (raw.trim() === "" || !Number.isInteger(n) || n < min || n > max) {
    throw configError(`${flag} expects an integer between ${min} and ${max}; got "${raw}"`);
  }
  return n;
}

function parseNumber(flag: string, raw: string, min: number, exclusiveMin = false): number {
  const n = Number(raw.trim());
  const tooSmall = exclusiveMin ? n <= min : n < min;
  if (raw.trim() === "" || !Number.isFinite(n) || tooSmall) {
    throw configError(`${flag} expects a number ${exclusiveMin ? ">" : ">="} ${min}; got "${raw}"`);
  }
  return n;
}

export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): StratusConfig {
  const flags: Record<string, string> = {};

  const valueOf = (i: number, arg: string): string => {
    const v = argv[i];
    if (v === undefined) throw configError(`${arg} requires a value`);
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--model" || arg === "-m") { flags.model = valueOf(++i, arg); }
    else if (arg === "--base-url") { flags.baseUrl = valueOf(++i, arg); }
    else if (arg === "--data-dir") { flags.dataDir = valueOf(++i, arg); }
    else if (arg === "--callsign") { flags.callsign = valueOf(++i, arg); }
    else if (arg === "--aircraft-type") { flags.aircraftType = valueOf(++i, arg); }
    else if (arg === "--warmup-interval") { flags.warmupInterval = valueOf(++i, arg); }
    else if (arg === "--no-warmup") { flags.noWarmup = "true"; }
    else if (arg === "--comlink-port") { flags.comlinkPort = valueOf(++i, arg); }
    else if (arg === "--no-comlink") { flags.noComlink = "true"; }
    else if (arg === "--min-chunk") { flags.minChunk = valueOf(++i, arg); }
    else if (arg === "--max-chunk") { flags.maxChunk = valueOf(++i, arg); }
    else if (arg === "--temperature") { flags.temperature = valueOf(++i, arg); }
    else if (arg === "--max-tokens") { flags.maxTokens = valueOf(++i, arg); }
    else if (arg === "--history") { flags.history = valueOf(++i, arg); }
    else if (arg === "-p" || arg === "--print") { flags.print = valueOf(++i, arg); }
    else if (arg === "--verbose") { flags.verbose = "true"; }
    else if (arg === "-V" || arg === "--version") { flags.version = "true"; }
    else if (arg === "-h" || arg === "--help") { flags.help = "true"; }
    else if (!arg.startsWith("-")) { Logger.warn(`Ignoring stray argument: ${arg}`); }
    else { Logger.warn(`Unknown flag: ${arg}`); }
  }

  const warmupRaw = flags.warmupInterval ?? env.STRATUS_WARMUP_INTERVAL;
  const warmupIntervalMs = warmupRaw !== undefined
    ? parseNumber("--warmup-interval", warmupRaw, 0, true) * 1000
    : DEFAULT_WARMUP_CONFIG.intervalMs;

  const portRaw = flags.comlinkPort ?? env.STRATUS_COMLINK_PORT;
  const comlinkPort = portRaw !== undefined
    ? parseInteger("--comlink-port", portRaw, 1, 65535)
    : DEFAULT_COMLINK_PORT;

  const minChunkChars = flags.minChunk !== undefined
    ? parseInteger("--min-chunk", flags.minChunk, 0)
    : DEFAULT_MIN_CHUNK_CHARS;
  const maxChunkChars = flags.maxChunk !== undefined
    ? parseInteger("--max-chunk", flags.maxChunk, 1)
    : DEFAULT_MAX_CHUNK_CHARS;
  if (minChunkChars > maxChunkChars) {
    throw configError(`--min-chunk (${minChunkChars}) must not exceed --max-chunk (${maxChunkChars})`);
  }

  return {
    model: flags.model || env.STRATUS_MODEL || DEFAULT_MODEL,
    baseUrl: flags.baseUrl || env.STRATUS_OLLAMA_URL || DEFAULT_OLLAMA_URL,
    dataDir: flags.dataDir || env.STRATUS_DATA_DIR || resolveDataDir(process.platform, env),
    callsign: flags.callsign || env.STRATUS_CALLSIGN || DEFAULT_CALLSIGN,
    aircraftType: flags.aircraftType || env.STRATUS_AIRCRAFT || DEFAULT_AIRCRAFT_TYPE,
    warmup: flags.noWarmup !== "true",
    warmupIntervalMs,
    comlink: flags.noComlink !== "true",
    comlinkPort,
    minChunkChars,
    maxChunkChars,
    temperature: flags.temperature !== undefined
      ? parseNumber("--temperature", flags.temperature, 0)
      : DEFAULT_GENERATE_OPTIONS.temperature,
    maxTokens: flags.maxTokens !== undefined
      ? parseInteger("--max-tokens", flags.maxTokens, 1)
      : DEFAULT_GENERATE_OPTIONS.maxTokens,
    historyLimit: flags.history !== undefined
      ? parseInteger("--history", flags.history, 2)
      : DEFAULT_HISTORY_LIMIT,
    print: flags.print ?? null,
    verbose: flags.verbose === "true",
    showHelp: flags.help === "true",
    showVersion: flags.version === "true",
  };
}

export function versionLine(): string {
  return `stratus ${readVersion()}`;
}

export function usage(): string {
  return `${versionLine()} — live ATC dialogue from flight-simulator telemetry

usage:
  stratus [options]              interactive console
  stratus -p "message"           answer one transmission and exit

options:
  -m, --model <name>         model name (default: ${DEFAULT_MODEL}; env STRATUS_MODEL)
  --base-url <url>           model endpoint (default: ${DEFAULT_OLLAMA_URL}; env STRATUS_OLLAMA_URL)
  --data-dir <dir>           telemetry directory (default: platform data dir; env STRATUS_DATA_DIR)
  --callsign <id>            aircraft callsign (default: ${DEFAULT_CALLSIGN}; env STRATUS_CALLSIGN)
  --aircraft-type <type>     aircraft type (default: ${DEFAULT_AIRCRAFT_TYPE}; env STRATUS_AIRCRAFT)
  --warmup-interval <s>      seconds between warmup pings (default: ${DEFAULT_WARMUP_CONFIG.intervalMs / 1000})
  --no-warmup                disable the warmup heartbeat
  --comlink-port <n>         status page port (default: ${DEFAULT_COMLINK_PORT}; env STRATUS_COMLINK_PORT)
  --no-comlink               disable the status page
  --min-chunk <n>            minimum chars before a phrase boundary emits (default: ${DEFAULT_MIN_CHUNK_CHARS})
  --max-chunk <n>            force-emit at this many chars (default: ${DEFAULT_MAX_CHUNK_CHARS})
  --temperature <t>          sampling temperature (default: ${DEFAULT_GENERATE_OPTIONS.temperature})
  --max-tokens <n>           reply token budget (default: ${DEFAULT_GENERATE_OPTIONS.maxTokens})
  --history <n>              conversation entries kept (default: ${DEFAULT_HISTORY_LIMIT})
  -p, --print <message>      one-shot mode
  --verbose                  verbose output (debug lines need STRATUS_LOG_LEVEL=DEBUG)
  -V, --version              show version
  -h, --help                 show this help`;
}
