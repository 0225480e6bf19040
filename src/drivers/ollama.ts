/**
 * Ollama generate-endpoint driver.
 * Single-shot generation and the liveness probe live here; the streaming
 * path is in streaming-ollama.ts.
 */
import { z } from "zod";
import { Logger } from "../logger.js";
import { asError, stratusError } from "../errors.js";
import { timedFetch } from "../utils/timed-fetch.js";
import {
  assertChunkBounds,
  DEFAULT_MAX_CHUNK_CHARS,
  DEFAULT_MIN_CHUNK_CHARS,
  joinChunks,
} from "../stream-chunker.js";
import { openGenerateStream } from "./streaming-ollama.js";
import type { ChunkHandler, GenerateOptions, GenerateRequest, GenerationDriver, StreamChunk } from "./types.js";

export const DEFAULT_OLLAMA_URL = "http://localhost:11434";
export const DEFAULT_MODEL = "llama3.2:3b";

/** Leans deterministic; real controllers stick to fixed phraseology. */
export const DEFAULT_GENERATE_OPTIONS: GenerateOptions = { temperature: 0.7, maxTokens: 256 };

export const GENERATE_TIMEOUT_MS = 30_000;
export const PROBE_TIMEOUT_MS = 2_000;

export interface OllamaDriverConfig {
  baseUrl?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  minChunkChars?: number;
  maxChunkChars?: number;
  /** Whole-request budget for generation, streamed or not. */
  timeoutMs?: number;
  probeTimeoutMs?: number;
  /** Chunks buffered ahead of a slow consumer before the producer waits. */
  channelCapacity?: number;
}

export const generateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean().optional(),
});

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, "");
}

export function buildGenerateRequest(
  model: string,
  prompt: string,
  stream: boolean,
  opts: GenerateOptions,
): GenerateRequest {
  return {
    model,
    prompt,
    stream,
    options: { temperature: opts.temperature, num_predict: opts.maxTokens },
  };
}

export function makeOllamaDriver(cfg: OllamaDriverConfig = {}): GenerationDriver {
  const baseUrl = normalizeBaseUrl(cfg.baseUrl ?? DEFAULT_OLLAMA_URL);
  const model = cfg.model ?? DEFAULT_MODEL;
  const endpoint = `${baseUrl}/api/generate`;
  const options: GenerateOptions = {
    temperature: cfg.temperature ?? DEFAULT_GENERATE_OPTIONS.temperature,
    maxTokens: cfg.maxTokens ?? DEFAULT_GENERATE_OPTIONS.maxTokens,
  };
  const minChunkChars = cfg.minChunkChars ?? DEFAULT_MIN_CHUNK_CHARS;
  const maxChunkChars = cfg.maxChunkChars ?? DEFAULT_MAX_CHUNK_CHARS;
  assertChunkBounds(minChunkChars, maxChunkChars);
  const timeoutMs = cfg.timeoutMs ?? GENERATE_TIMEOUT_MS;
  const probeTimeoutMs = cfg.probeTimeoutMs ?? PROBE_TIMEOUT_MS;

  async function isAvailable(): Promise<boolean> {
    try {
      const res = await timedFetch(`${baseUrl}/api/tags`, {
        timeoutMs: probeTimeoutMs,
        where: "driver:ollama:probe",
      });
      await res.body?.cancel();
      return res.ok;
    } catch (e: unknown) {
      Logger.debug(`[ollama] probe failed: ${asError(e).message}`);
      return false;
    }
  }

  async function generate(prompt: string): Promise<string> {
    const started = performance.now();
    Logger.info(`[API →] ${model} generate (${prompt.length} chars)`);

    const res = await timedFetch(endpoint, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(buildGenerateRequest(model, prompt, false, options)),
      timeoutMs,
      where: "driver:ollama:generate",
    });
    const latency_ms = Math.round(performance.now() - started);

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw stratusError("endpoint_unavailable", `Ollama generate failed (${res.status}): ${text}`, {
        status: res.status,
        latency_ms,
        retryable: res.status >= 500,
      });
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch (e: unknown) {
      throw stratusError("malformed_response", "Ollama generate returned a non-JSON body", {
        latency_ms,
        cause: e,
      });
    }
    const parsed = generateResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw stratusError("malformed_response", `Ollama generate response missing text: ${parsed.error.message}`, {
        latency_ms,
      });
    }

    Logger.info(`[API ←] ${parsed.data.response.length} chars in ${latency_ms}ms`);
    return parsed.data.response;
  }

  function generateStream(prompt: string): Promise<AsyncIterable<StreamChunk>> {
    Logger.info(`[API →] ${model} stream (${prompt.length} chars)`);
    return openGenerateStream({
      endpoint,
      request: buildGenerateRequest(model, prompt, true, options),
      timeoutMs,
      minChunkChars,
      maxChunkChars,
      capacity: cfg.channelCapacity,
    });
  }

  async function generateWithCallback(prompt: string, onChunk: ChunkHandler): Promise<string> {
    const stream = await generateStream(prompt);
    const received: StreamChunk[] = [];
    for await (const chunk of stream) {
      received.push(chunk);
      onChunk(chunk);
    }
    const last = received[received.length - 1];
    Logger.info(`[API ←] ${received.length} chunk(s)${last ? ` in ${last.latencyMs}ms` : ""}`);
    return joinChunks(received);
  }

  return { model, baseUrl, isAvailable, generate, generateStream, generateWithCallback };
}
