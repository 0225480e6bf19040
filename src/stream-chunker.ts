/**
 * Phrase Chunker
 *
 * Accumulates token fragments from a model stream and cuts them into
 * speakable pieces. A piece is released as soon as one of these holds
 * after appending a fragment:
 *
 *   - the upstream says it is done
 *   - the buffer reached maxChunkChars
 *   - the buffer reached minChunkChars and ends on a phrase boundary
 *
 * Usage:
 *   const chunker = new PhraseChunker({ minChunkChars: 20, maxChunkChars: 100 });
 *   const chunk = chunker.push(line.response, line.done);
 *   if (chunk) speak(chunk.text);
 */

import type { StreamChunk } from "./drivers/types.js";

/** Characters that mark a natural pause in spoken text. */
export const PHRASE_BOUNDARIES: ReadonlySet<string> = new Set([".", "!", "?", ",", ";", ":", "\n"]);

export const DEFAULT_MIN_CHUNK_CHARS = 20;
export const DEFAULT_MAX_CHUNK_CHARS = 100;

/** Chunk bounds are in UTF-16 code units (`string.length`), not bytes. */
export interface PhraseChunkerOptions {
  minChunkChars?: number;
  maxChunkChars?: number;
  /** Millisecond clock; defaults to performance.now. */
  now?: () => number;
  /** Clock reading at request start. Defaults to now() at construction. */
  startedAt?: number;
}

export function assertChunkBounds(minChunkChars: number, maxChunkChars: number): void {
  if (
    !Number.isInteger(minChunkChars) || !Number.isInteger(maxChunkChars) ||
    minChunkChars < 0 || maxChunkChars <= 0 || minChunkChars > maxChunkChars
  ) {
    throw new RangeError(`invalid chunk bounds: min=${minChunkChars} max=${maxChunkChars}`);
  }
}

export function endsOnPhraseBoundary(s: string): boolean {
  return s.length > 0 && PHRASE_BOUNDARIES.has(s[s.length - 1]);
}

export class PhraseChunker {
  readonly minChunkChars: number;
  readonly maxChunkChars: number;
  private readonly now: () => number;
  private readonly startedAt: number;
  private buffer = "";
  private finished = false;

  constructor(opts: PhraseChunkerOptions = {}) {
    this.minChunkChars = opts.minChunkChars ?? DEFAULT_MIN_CHUNK_CHARS;
    this.maxChunkChars = opts.maxChunkChars ?? DEFAULT_MAX_CHUNK_CHARS;
    assertChunkBounds(this.minChunkChars, this.maxChunkChars);
    this.now = opts.now ?? (() => performance.now());
    this.startedAt = opts.startedAt ?? this.now();
  }

  /** Text received but not yet emitted. */
  get pending(): string {
    return this.buffer;
  }

  /** True once a final chunk has been produced. */
  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * Append one fragment. Returns the chunk to emit, or null to keep
   * accumulating. When `done` is set a final chunk is always returned,
   * with empty text if nothing was left in the buffer.
   */
  push(fragment: string, done: boolean): StreamChunk | null {
    if (this.finished) return null;
    this.buffer += fragment;

    if (done) return this.take(true);

    const len = this.buffer.length;
    if (len >= this.maxChunkChars) return this.take(false);
    if (len >= this.minChunkChars && endsOnPhraseBoundary(this.buffer)) return this.take(false);
    return null;
  }

  /**
   * Emit whatever is buffered regardless of size. Returns null when the
   * buffer is empty (or the chunker already finished).
   */
  flush(isFinal: boolean): StreamChunk | null {
    if (this.finished || this.buffer.length === 0) return null;
    return this.take(isFinal);
  }

  private take(isFinal: boolean): StreamChunk {
    const chunk: StreamChunk = {
      text: this.buffer.trim(),
      isFinal,
      latencyMs: Math.max(0, Math.floor(this.now() - this.startedAt)),
    };
    this.buffer = "";
    if (isFinal) this.finished = true;
    return chunk;
  }
}

/** Join chunk texts the way a listener hears them: one space apart. */
export function joinChunks(chunks: Iterable<StreamChunk>): string {
  const parts: string[] = [];
  for (const c of chunks) {
    if (c.text) parts.push(c.text);
  }
  return parts.join(" ").trim();
}
