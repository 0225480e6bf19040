/**
 * Streaming half of the Ollama driver.
 *
 * The response body is newline-delimited JSON, one `{ response, done }`
 * object per line. A detached producer reads it, runs the fragments through
 * a PhraseChunker and pushes chunks into a bounded Channel; the caller
 * consumes the channel.
 */
import type { ReadableStream } from "node:stream/web";
import { z } from "zod";
import { Logger } from "../logger.js";
import { asError, stratusError } from "../errors.js";
import { Channel } from "../utils/channel.js";
import { timedFetch } from "../utils/timed-fetch.js";
import { PhraseChunker } from "../stream-chunker.js";
import type { GenerateRequest, StreamChunk } from "./types.js";

export const STREAM_CHANNEL_CAPACITY = 32;

export const streamLineSchema = z.object({
  response: z.string().default(""),
  done: z.boolean().default(false),
  error: z.string().optional(),
});

export type StreamLine = z.infer<typeof streamLineSchema>;

export interface OpenStreamParams {
  endpoint: string;
  request: GenerateRequest;
  timeoutMs: number;
  minChunkChars: number;
  maxChunkChars: number;
  capacity?: number;
}

/** Decode one NDJSON line. Returns null for anything that is not a stream line. */
export function parseStreamLine(line: string): StreamLine | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = streamLineSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export async function openGenerateStream(p: OpenStreamParams): Promise<AsyncIterable<StreamChunk>> {
  const startedAt = performance.now();
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), p.timeoutMs);

  let res: Response;
  try {
    res = await timedFetch(p.endpoint, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(p.request),
      signal: controller.signal,
      where: "driver:ollama:stream",
    });
  } catch (e: unknown) {
    clearTimeout(timer);
    throw e;
  }

  if (!res.ok || !res.body) {
    clearTimeout(timer);
    const text = await res.text().catch(() => "");
    throw stratusError("endpoint_unavailable", `Ollama stream failed (${res.status}): ${text}`, {
      status: res.status,
      latency_ms: Math.round(performance.now() - startedAt),
      retryable: res.status >= 500,
    });
  }

  const channel = new Channel<StreamChunk>(p.capacity ?? STREAM_CHANNEL_CAPACITY);
  const chunker = new PhraseChunker({
    minChunkChars: p.minChunkChars,
    maxChunkChars: p.maxChunkChars,
    startedAt,
  });
  const onDetach = () => controller.abort();
  channel.signal.addEventListener("abort", onDetach, { once: true });

  pump(res.body, chunker, channel)
    .catch((e: unknown) => {
      Logger.error(`[stream] producer crashed: ${asError(e).message}`);
      channel.close(e);
    })
    .finally(() => {
      clearTimeout(timer);
      channel.signal.removeEventListener("abort", onDetach);
    });

  return channel;
}

async function pump(
  body: ReadableStream<Uint8Array>,
  chunker: PhraseChunker,
  channel: Channel<StreamChunk>,
): Promise<void> {
  const reader = body.getReader();
  const decoder = new TextDecoder("utf-8");
  let buf = "";
  let skipped = 0;

  // Returns false when the consumer is gone and the producer should stop.
  const handleLine = async (line: string): Promise<boolean> => {
    const parsed = parseStreamLine(line);
    if (!parsed) {
      skipped++;
      Logger.debug(`[stream] skipping malformed line: ${line.slice(0, 80)}`);
      return true;
    }
    if (parsed.error) Logger.warn(`[stream] endpoint reported: ${parsed.error}`);
    const chunk = chunker.push(parsed.response, parsed.done);
    if (!chunk) return true;
    return channel.send(chunk);
  };

  try {
    while (!chunker.isFinished) {
      const { value, done } = await reader.read();
      if (done) break;
      buf += decoder.decode(value, { stream: true });
      let nl: number;
      while (!chunker.isFinished && (nl = buf.indexOf("\n")) !== -1) {
        const line = buf.slice(0, nl).trim();
        buf = buf.slice(nl + 1);
        if (line && !(await handleLine(line))) return;
      }
    }

    if (!chunker.isFinished) {
      const tail = (buf + decoder.decode()).trim();
      if (tail && !(await handleLine(tail))) return;
    }

    if (chunker.isFinished) {
      if (skipped > 0) Logger.debug(`[stream] skipped ${skipped} malformed line(s)`);
      channel.close();
      return;
    }

    await truncate(chunker, channel, "stream ended before the final line");
  } catch (e: unknown) {
    if (channel.isDetached) return;
    await truncate(chunker, channel, `stream read failed: ${asError(e).message}`, e);
  } finally {
    reader.cancel().catch((e: unknown) => {
      Logger.debug(`[stream] body cancel failed: ${asError(e).message}`);
    });
  }
}

/** Deliver whatever is buffered, then fail the channel. */
async function truncate(
  chunker: PhraseChunker,
  channel: Channel<StreamChunk>,
  message: string,
  cause?: unknown,
): Promise<void> {
  const rest = chunker.flush(false);
  if (rest && !(await channel.send(rest))) return;
  Logger.warn(`[stream] ${message}`);
  channel.close(stratusError("stream_truncated", message, { retryable: true, cause }));
}
