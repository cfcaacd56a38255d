/**
 * Asymmetric encoding convention. Reference material (domain examples, index
 * documents) is encoded as `passage`; incoming requests as `query`.
 */
export type EmbeddingRole = "query" | "passage";

/**
 * Opaque text → fixed-length vector function. Implementations must return
 * identical vectors for identical `(text, role)` pairs given a fixed model.
 */
export interface Embedder {
  /** Length of every vector returned by {@link embed}. `null` when unknown until the first call. */
  readonly dimensions: number | null;
  embed(text: string, role: EmbeddingRole, signal?: AbortSignal): Promise<number[]>;
}
