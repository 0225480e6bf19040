/** One phrase-sized piece of a streamed model response. */
export interface StreamChunk {
  /** Trimmed text; may be empty only on the final chunk. */
  text: string;
  isFinal: boolean;
  /** Whole milliseconds since the request was started. */
  latencyMs: number;
}

/** Sampling options, sent as Ollama `options`. */
export interface GenerateOptions {
  temperature: number;
  /** Token budget for the reply (`num_predict` on the wire). */
  maxTokens: number;
}

/** Body of `POST /api/generate`. */
export interface GenerateRequest {
  model: string;
  prompt: string;
  stream: boolean;
  options: {
    temperature: number;
    num_predict: number;
  };
}

export type ChunkHandler = (chunk: StreamChunk) => void;

/** Single-shot and streaming text generation against one model endpoint. */
export interface GenerationDriver {
  readonly model: string;
  readonly baseUrl: string;
  /** Liveness probe; never throws. */
  isAvailable(): Promise<boolean>;
  generate(prompt: string): Promise<string>;
  /**
   * Resolves once the endpoint accepted the request. The iterable yields
   * chunks in generation order and ends after the final chunk.
   */
  generateStream(prompt: string): Promise<AsyncIterable<StreamChunk>>;
  generateWithCallback(prompt: string, onChunk: ChunkHandler): Promise<string>;
}
