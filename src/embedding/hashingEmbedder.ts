import { normalise } from "./similarity.js";
import type { Embedder, EmbeddingRole } from "./types.js";

/** Weight of whole-token features relative to character bigram features. */
const TOKEN_WEIGHT = 1;
const BIGRAM_WEIGHT = 0.5;

export interface HashingEmbedderOptions {
  /** Vector length. Larger values reduce hash collisions. */
  readonly dimensions?: number;
}

/**
 * Deterministic local embedder based on feature hashing. Each lowercase token
 * and each character bigram inside a token is hashed (FNV-1a) into a signed
 * bucket; the resulting vector is L2-normalised.
 *
 * Bigrams keep agglutinative forms ("보험료", "보험료는") close to each other.
 * The role is ignored: identical texts always map to identical vectors, which
 * makes this embedder suitable for tests, offline evaluation and deployments
 * without a model endpoint.
 */
export class HashingEmbedder implements Embedder {
  public readonly dimensions: number;

  constructor(options: HashingEmbedderOptions = {}) {
    this.dimensions = Math.max(8, Math.floor(options.dimensions ?? 512));
  }

  async embed(text: string, _role: EmbeddingRole): Promise<number[]> {
    return this.embedSync(text);
  }

  /** Synchronous variant used by the evaluation script and the tests. */
  embedSync(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenise(text)) {
      this.accumulate(vector, `t:${token}`, TOKEN_WEIGHT);
      const chars = Array.from(token);
      for (let index = 0; index + 1 < chars.length; index += 1) {
        this.accumulate(vector, `b:${chars[index]}${chars[index + 1]}`, BIGRAM_WEIGHT);
      }
    }
    return normalise(vector);
  }

  private accumulate(vector: number[], feature: string, weight: number): void {
    const hash = fnv1a(feature);
    const bucket = hash % this.dimensions;
    const sign = (hash >>> 31) === 0 ? 1 : -1;
    vector[bucket] += sign * weight;
  }
}

/** Lowercase letter and number runs. */
export function tokenise(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

/** 32-bit FNV-1a over the UTF-16 code units of {@link value}. */
function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let index = 0; index < value.length; index += 1) {
    hash ^= value.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
