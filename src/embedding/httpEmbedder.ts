import { z } from "zod";

import { CollaboratorUnavailableError } from "../errors.js";
import { ERROR_HTTP_SCHEMA, HttpCollaboratorError, postJson } from "../infra/httpJson.js";
import type { Embedder, EmbeddingRole } from "./types.js";

/** Envelope returned by OpenAI-compatible `/embeddings` endpoints. */
const embeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        embedding: z.array(z.number()),
        index: z.number().int().optional(),
      }),
    )
    .min(1),
});

export interface HttpEmbedderOptions {
  /** Base URL of the API, e.g. `http://localhost:8080/v1/`. */
  readonly baseUrl: string;
  readonly model: string;
  readonly apiKey?: string | null;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  /**
   * Prefix the input with `query: ` / `passage: ` (asymmetric e5-style
   * models). Defaults to true when the model name contains `e5`.
   */
  readonly rolePrefixes?: boolean;
  readonly fetchImpl?: typeof fetch;
}

/**
 * Embedding client for OpenAI-compatible endpoints. Transport failures are
 * retried by {@link postJson} and then surfaced as
 * {@link CollaboratorUnavailableError} so the pipeline can report a dependency
 * failure rather than a domain rejection.
 */
export class HttpEmbedder implements Embedder {
  private observedDimensions: number | null = null;
  private readonly endpoint: URL;
  private readonly rolePrefixes: boolean;

  constructor(private readonly options: HttpEmbedderOptions) {
    const base = options.baseUrl.endsWith("/") ? options.baseUrl : `${options.baseUrl}/`;
    this.endpoint = new URL("embeddings", base);
    this.rolePrefixes = options.rolePrefixes ?? /e5/i.test(options.model);
  }

  get dimensions(): number | null {
    return this.observedDimensions;
  }

  async embed(text: string, role: EmbeddingRole, signal?: AbortSignal): Promise<number[]> {
    const input = this.rolePrefixes ? `${role}: ${text}` : text;
    let payload: unknown;
    try {
      payload = await postJson(
        this.endpoint,
        { model: this.options.model, input },
        {
          timeoutMs: this.options.timeoutMs,
          maxRetries: this.options.maxRetries,
          bearerToken: this.options.apiKey ?? null,
          ...(signal ? { signal } : {}),
          ...(this.options.fetchImpl ? { fetchImpl: this.options.fetchImpl } : {}),
        },
      );
    } catch (error) {
      throw new CollaboratorUnavailableError("embedding", "embedding endpoint unavailable", error);
    }

    const parsed = embeddingResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new CollaboratorUnavailableError(
        "embedding",
        "embedding payload did not match the expected schema",
        new HttpCollaboratorError(parsed.error.message, { code: ERROR_HTTP_SCHEMA }),
      );
    }

    const vector = parsed.data.data[0].embedding;
    if (this.observedDimensions !== null && vector.length !== this.observedDimensions) {
      throw new CollaboratorUnavailableError(
        "embedding",
        `embedding length changed from ${this.observedDimensions} to ${vector.length}`,
      );
    }
    this.observedDimensions = vector.length;
    return vector;
  }
}
