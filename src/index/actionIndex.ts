import { EventEmitter } from "node:events";
import pLimit from "p-limit";

import {
  contentHash,
  deriveDocuments,
  type ActionDescriptor,
  type IndexDocument,
  type IndexDocumentKind,
} from "../catalog/descriptor.js";
import type { Embedder } from "../embedding/types.js";
import { CollaboratorUnavailableError, describeError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { ActionRegistry, RegistrySnapshot } from "../registry/actionRegistry.js";
import type { VectorMetadata, VectorStore } from "../vector/vectorStore.js";

/** One ranked action: its best document decides the score. */
export interface ActionHit {
  readonly action: string;
  readonly score: number;
  /** Kind of the document that produced {@link score}. */
  readonly kind: IndexDocumentKind;
  readonly documentId: string;
}

/** Summary of one sync, emitted as the `synced` event and logged. */
export interface IndexSyncReport {
  readonly version: number;
  readonly added: readonly string[];
  readonly updated: readonly string[];
  readonly removed: readonly string[];
  /** Actions whose content hash did not change. */
  readonly reused: number;
  /** Actions without any embeddable document; they never rank. */
  readonly underIndexed: readonly string[];
  /** Actions indexed without usage phrases. */
  readonly lowRecall: readonly string[];
  readonly documentCount: number;
  readonly durationMs: number;
}

export interface ActionIndexOptions {
  readonly embedder: Embedder;
  readonly store: VectorStore;
  readonly logger: StructuredLogger;
  readonly collection?: string;
  /** Parallel embedding calls during a sync. */
  readonly concurrency?: number;
  readonly now?: () => number;
}

interface LiveEntry {
  readonly hash: string;
  readonly documentIds: readonly string[];
}

/** Table swapped atomically at the end of each sync. */
interface LiveTable {
  readonly version: number;
  readonly entries: ReadonlyMap<string, LiveEntry>;
  readonly documentCount: number;
}

/** Documents dropped by the sync that made table {@link beforeVersion} live. */
interface RetiredDocuments {
  readonly beforeVersion: number;
  readonly documentIds: readonly string[];
}

interface VersionWaiter {
  readonly version: number;
  readonly resolve: () => void;
  readonly reject: (error: unknown) => void;
}

const DEFAULT_COLLECTION = "actions";
const DEFAULT_CONCURRENCY = 4;

/**
 * Multi-document action index with per-action max-aggregation.
 *
 * Each discoverable field of a descriptor is embedded as its own document
 * (purpose, every usage phrase, the joined tags) so broad actions do not
 * collapse toward a generic centroid. A search embeds the query once, scores
 * every live document and keeps the best score per action.
 *
 * Syncs run one at a time. Documents of changed actions are upserted first,
 * then the live table is swapped, then stale documents are deleted once no
 * search still ranks against an older table. Searches bind each action to the
 * content hash of the table they captured, so they never mix documents of two
 * revisions of one action.
 */
export class ActionIndex extends EventEmitter {
  private live: LiveTable = { version: 0, entries: new Map(), documentCount: 0 };
  private syncQueue: Promise<void> = Promise.resolve();
  private waiters: VersionWaiter[] = [];
  /** Searches in flight, per table version. */
  private readonly readers = new Map<number, number>();
  private retired: RetiredDocuments[] = [];
  private deletions: Promise<void> = Promise.resolve();
  private readonly embedder: Embedder;
  private readonly store: VectorStore;
  private readonly logger: StructuredLogger;
  private readonly collection: string;
  private readonly concurrency: number;
  private readonly now: () => number;

  constructor(options: ActionIndexOptions) {
    super();
    this.embedder = options.embedder;
    this.store = options.store;
    this.logger = options.logger;
    this.collection = options.collection ?? DEFAULT_COLLECTION;
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    this.now = options.now ?? (() => Date.now());
  }

  /** Registry version reflected by the live table. */
  get version(): number {
    return this.live.version;
  }

  get actionCount(): number {
    return this.live.entries.size;
  }

  get documentCount(): number {
    return this.live.documentCount;
  }

  /** Indexes {@link snapshot}; resolves once the new table is live. */
  sync(snapshot: RegistrySnapshot): Promise<IndexSyncReport> {
    return this.enqueueSync(() => snapshot);
  }

  /**
   * Follows {@link registry}: every version bump schedules a sync of the
   * snapshot that is current when the sync starts, so bursts of mutations
   * coalesce. Returns the unsubscribe function.
   */
  attach(registry: ActionRegistry): () => void {
    const schedule = (): void => {
      this.enqueueSync(() => registry.snapshot()).catch((error: unknown) => {
        this.logger.error("index_sync_failed", { error: describeError(error) });
      });
    };
    const detach = registry.onChange(schedule);
    if (registry.version > this.live.version) {
      schedule();
    }
    return detach;
  }

  /** Resolves once registry version {@link version} (or a later one) is live. */
  whenVersion(version: number): Promise<void> {
    if (this.live.version >= version) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ version, resolve, reject });
    });
  }

  /** Embeds {@link queryText} with the query role and ranks actions. */
  async search(queryText: string, k: number, signal?: AbortSignal): Promise<ActionHit[]> {
    if (this.live.documentCount === 0 || k <= 0 || queryText.trim().length === 0) {
      return [];
    }
    let vector: number[];
    try {
      vector = await this.embedder.embed(queryText, "query", signal);
    } catch (error) {
      throw asCollaboratorError("embedding", "query embedding failed", error);
    }
    // A sync may have finished while the query was embedded.
    return this.rank(this.live, vector, k);
  }

  /** Ranks actions for an already-computed query vector. */
  searchVector(vector: readonly number[], k: number): Promise<ActionHit[]> {
    return this.rank(this.live, vector, k);
  }

  private async rank(table: LiveTable, vector: readonly number[], k: number): Promise<ActionHit[]> {
    if (table.documentCount === 0 || k <= 0) {
      return [];
    }

    const live = (metadata: VectorMetadata): boolean => {
      const action = metadata.action;
      return typeof action === "string" && table.entries.get(action)?.hash === metadata.hash;
    };

    let hits;
    this.readers.set(table.version, (this.readers.get(table.version) ?? 0) + 1);
    try {
      // Every live document is scored so the per-action maximum is exact.
      hits = await this.store.query(this.collection, vector, table.documentCount, live);
    } catch (error) {
      throw asCollaboratorError("vector_store", "vector store query failed", error);
    } finally {
      const remaining = (this.readers.get(table.version) ?? 1) - 1;
      if (remaining > 0) {
        this.readers.set(table.version, remaining);
      } else {
        this.readers.delete(table.version);
        this.collectRetired();
      }
    }

    const best = new Map<string, ActionHit>();
    for (const hit of hits) {
      const action = hit.metadata.action;
      const kind = hit.metadata.kind;
      if (typeof action !== "string" || !isDocumentKind(kind)) {
        continue;
      }
      const current = best.get(action);
      if (!current || hit.score > current.score) {
        best.set(action, { action, score: hit.score, kind, documentId: hit.id });
      }
    }

    return Array.from(best.values())
      .sort((a, b) => b.score - a.score || a.action.localeCompare(b.action))
      .slice(0, k);
  }

  private enqueueSync(resolveSnapshot: () => RegistrySnapshot): Promise<IndexSyncReport> {
    const run = this.syncQueue.then(async () => {
      const snapshot = resolveSnapshot();
      try {
        const report = await this.runSync(snapshot);
        this.settleWaiters(null);
        return report;
      } catch (error) {
        this.settleWaiters({ version: snapshot.version, error });
        throw error;
      }
    });
    this.syncQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runSync(snapshot: RegistrySnapshot): Promise<IndexSyncReport> {
    const startedAt = this.now();
    const previous = this.live;
    if (snapshot.version <= previous.version) {
      return emptyReport(previous, this.now() - startedAt);
    }

    const entries = new Map<string, LiveEntry>();
    const pending: Array<{ descriptor: ActionDescriptor; hash: string; documents: IndexDocument[] }> = [];
    const added: string[] = [];
    const updated: string[] = [];
    const underIndexed: string[] = [];
    const lowRecall: string[] = [];
    let reused = 0;

    for (const [name, entry] of snapshot.actions) {
      const descriptor = entry.descriptor;
      const hash = contentHash(descriptor);
      const existing = previous.entries.get(name);
      if (existing && existing.hash === hash) {
        entries.set(name, existing);
        reused += 1;
      } else {
        const documents = deriveDocuments(descriptor, hash);
        if (documents.length === 0) {
          underIndexed.push(name);
          this.logger.warn("action_under_indexed", { action: name, version: snapshot.version });
          continue;
        }
        pending.push({ descriptor, hash, documents });
        (existing ? updated : added).push(name);
      }
      if (descriptor.usagePhrases.length === 0) {
        lowRecall.push(name);
        this.logger.warn("action_low_recall", { action: name, version: snapshot.version });
      }
    }

    await this.upsertDocuments(pending);
    for (const item of pending) {
      entries.set(item.descriptor.name, { hash: item.hash, documentIds: item.documents.map((doc) => doc.id) });
    }

    let documentCount = 0;
    for (const entry of entries.values()) {
      documentCount += entry.documentIds.length;
    }
    this.live = { version: snapshot.version, entries, documentCount };

    const removed: string[] = [];
    const stale: string[] = [];
    for (const [name, entry] of previous.entries) {
      const next = entries.get(name);
      if (!next) {
        removed.push(name);
      }
      if (!next || next.hash !== entry.hash) {
        stale.push(...entry.documentIds);
      }
    }
    if (stale.length > 0) {
      this.retired.push({ beforeVersion: snapshot.version, documentIds: stale });
    }
    this.collectRetired();
    await this.deletions;

    const report: IndexSyncReport = {
      version: snapshot.version,
      added,
      updated,
      removed,
      reused,
      underIndexed,
      lowRecall,
      documentCount,
      durationMs: this.now() - startedAt,
    };
    this.logger.info("index_synced", {
      version: report.version,
      added: added.length,
      updated: updated.length,
      removed: removed.length,
      reused,
      documents: documentCount,
      duration_ms: report.durationMs,
    });
    this.emit("synced", report);
    return report;
  }

  /**
   * Embeds and upserts the documents of changed actions. On any failure the
   * documents written by this attempt are deleted again and the error is
   * rethrown; the live table is left as it was.
   */
  private async upsertDocuments(
    pending: ReadonlyArray<{ descriptor: ActionDescriptor; hash: string; documents: IndexDocument[] }>,
  ): Promise<void> {
    const limit = pLimit(this.concurrency);
    const written: string[] = [];
    const tasks = pending.flatMap((item) =>
      item.documents.map((document) =>
        limit(async () => {
          let vector: number[];
          try {
            vector = await this.embedder.embed(document.text, "passage");
          } catch (error) {
            throw asCollaboratorError("embedding", `embedding of ${document.id} failed`, error);
          }
          try {
            await this.store.upsert(this.collection, document.id, vector, {
              action: document.action,
              hash: item.hash,
              kind: document.kind,
              ordinal: document.ordinal,
            });
          } catch (error) {
            throw asCollaboratorError("vector_store", `upsert of ${document.id} failed`, error);
          }
          written.push(document.id);
        }),
      ),
    );

    const outcomes = await Promise.allSettled(tasks);
    const failure = outcomes.find((outcome): outcome is PromiseRejectedResult => outcome.status === "rejected");
    if (failure) {
      await this.deleteStale(written);
      throw failure.reason;
    }
  }

  /**
   * Schedules deletion of retired documents no search can still reach: those
   * retired by a table newer than the oldest table with readers.
   */
  private collectRetired(): void {
    let oldestReader = Number.POSITIVE_INFINITY;
    for (const version of this.readers.keys()) {
      oldestReader = Math.min(oldestReader, version);
    }
    const ready = this.retired.filter((item) => item.beforeVersion <= oldestReader);
    if (ready.length === 0) {
      return;
    }
    this.retired = this.retired.filter((item) => item.beforeVersion > oldestReader);
    const documentIds = ready.flatMap((item) => item.documentIds);
    this.deletions = this.deletions.then(() => this.deleteStale(documentIds));
  }

  /** Deleting is best effort: documents outside the live table never match a search. */
  private async deleteStale(documentIds: readonly string[]): Promise<void> {
    for (const documentId of documentIds) {
      try {
        await this.store.delete(this.collection, documentId);
      } catch (error) {
        this.logger.warn("index_document_delete_failed", { document_id: documentId, error: describeError(error) });
      }
    }
  }

  private settleWaiters(failure: { version: number; error: unknown } | null): void {
    const remaining: VersionWaiter[] = [];
    for (const waiter of this.waiters) {
      if (waiter.version <= this.live.version) {
        waiter.resolve();
      } else if (failure && waiter.version <= failure.version) {
        waiter.reject(failure.error);
      } else {
        remaining.push(waiter);
      }
    }
    this.waiters = remaining;
  }
}

function emptyReport(table: LiveTable, durationMs: number): IndexSyncReport {
  return {
    version: table.version,
    added: [],
    updated: [],
    removed: [],
    reused: table.entries.size,
    underIndexed: [],
    lowRecall: [],
    documentCount: table.documentCount,
    durationMs,
  };
}

function isDocumentKind(value: unknown): value is IndexDocumentKind {
  return value === "purpose" || value === "usage" || value === "tags";
}

function asCollaboratorError(
  collaborator: "embedding" | "vector_store",
  message: string,
  error: unknown,
): CollaboratorUnavailableError {
  return error instanceof CollaboratorUnavailableError ? error : new CollaboratorUnavailableError(collaborator, message, error);
}
