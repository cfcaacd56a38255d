/** Metadata stored next to each vector; values stay JSON-serialisable. */
export type VectorMetadata = Readonly<Record<string, string | number | boolean | null>>;

/** Predicate restricting a query to matching documents. */
export type MetadataFilter = (metadata: VectorMetadata) => boolean;

/** Single ranked hit returned by {@link VectorStore.query}. */
export interface VectorHit {
  readonly id: string;
  readonly score: number;
  readonly metadata: VectorMetadata;
}

/**
 * Storage contract consumed by the action index. The core never assumes a
 * specific engine; scores are cosine similarities, ranked descending.
 */
export interface VectorStore {
  upsert(collection: string, docId: string, vector: readonly number[], metadata: VectorMetadata): Promise<void>;
  delete(collection: string, docId: string): Promise<void>;
  query(
    collection: string,
    queryVector: readonly number[],
    k: number,
    filter?: MetadataFilter,
  ): Promise<VectorHit[]>;
  /** Number of documents stored in {@link collection}. */
  count(collection: string): Promise<number>;
}
