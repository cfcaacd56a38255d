import { dot, normalise } from "../embedding/similarity.js";
import type { MetadataFilter, VectorHit, VectorMetadata, VectorStore } from "./vectorStore.js";

interface StoredVector {
  readonly id: string;
  /** Unit-length copy of the upserted vector. */
  readonly unit: readonly number[];
  readonly metadata: VectorMetadata;
}

/**
 * Exact cosine search over vectors held in memory. Vectors are normalised on
 * upsert so a query costs one dot product per stored document; ties are
 * broken by document id to keep rankings stable across runs.
 */
export class InMemoryVectorStore implements VectorStore {
  private readonly collections = new Map<string, Map<string, StoredVector>>();

  async upsert(collection: string, docId: string, vector: readonly number[], metadata: VectorMetadata): Promise<void> {
    this.collectionFor(collection).set(docId, { id: docId, unit: normalise(vector), metadata: { ...metadata } });
  }

  async delete(collection: string, docId: string): Promise<void> {
    this.collections.get(collection)?.delete(docId);
  }

  async query(
    collection: string,
    queryVector: readonly number[],
    k: number,
    filter?: MetadataFilter,
  ): Promise<VectorHit[]> {
    const records = this.collections.get(collection);
    if (!records || k <= 0) {
      return [];
    }
    const unitQuery = normalise(queryVector);
    const hits: VectorHit[] = [];
    for (const record of records.values()) {
      if (filter && !filter(record.metadata)) {
        continue;
      }
      hits.push({ id: record.id, score: clamp(dot(unitQuery, record.unit)), metadata: record.metadata });
    }
    hits.sort((a, b) => b.score - a.score || a.id.localeCompare(b.id));
    return hits.slice(0, k);
  }

  async count(collection: string): Promise<number> {
    return this.collections.get(collection)?.size ?? 0;
  }

  private collectionFor(name: string): Map<string, StoredVector> {
    let records = this.collections.get(name);
    if (!records) {
      records = new Map();
      this.collections.set(name, records);
    }
    return records;
  }
}

function clamp(score: number): number {
  if (!Number.isFinite(score)) {
    return 0;
  }
  return Math.max(-1, Math.min(1, score));
}
