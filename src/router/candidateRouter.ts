import type { ActionDescriptor, ActionInput, IndexDocumentKind } from "../catalog/descriptor.js";
import type { ActionHit, ActionIndex } from "../index/actionIndex.js";
import type { StructuredLogger } from "../logger.js";
import type { ActionRegistry } from "../registry/actionRegistry.js";

/** Action offered to the selector, enriched from the live registry. */
export interface Candidate {
  readonly name: string;
  readonly purpose: string;
  readonly score: number;
  /** Document kind that produced the score. */
  readonly matchedKind: IndexDocumentKind;
  readonly notes: readonly string[];
  readonly tags: readonly string[];
  readonly inputs: readonly ActionInput[];
}

export interface RouteResult {
  readonly query: string;
  readonly candidates: readonly Candidate[];
  /** True when no candidate reached the usable-score floor. */
  readonly retrievalMiss: boolean;
  readonly registryVersion: number;
  readonly indexVersion: number;
}

export interface CandidateRouterOptions {
  readonly index: ActionIndex;
  readonly registry: ActionRegistry;
  readonly logger: StructuredLogger;
  readonly topK: number;
  /** Candidates scoring below this are dropped. */
  readonly minScore: number;
}

/** Top-K retrieval over the action index with a usable-score floor. */
export class CandidateRouter {
  private readonly index: ActionIndex;
  private readonly registry: ActionRegistry;
  private readonly logger: StructuredLogger;
  private readonly topK: number;
  private readonly minScore: number;

  constructor(options: CandidateRouterOptions) {
    this.index = options.index;
    this.registry = options.registry;
    this.logger = options.logger;
    this.topK = options.topK;
    this.minScore = options.minScore;
  }

  get defaultTopK(): number {
    return this.topK;
  }

  async route(queryText: string, options: { topK?: number; signal?: AbortSignal } = {}): Promise<RouteResult> {
    const topK = options.topK ?? this.topK;
    const indexVersion = this.index.version;
    const hits = await this.index.search(queryText, topK, options.signal);
    // Enrich from the snapshot current after the search so removed actions never surface.
    const snapshot = this.registry.snapshot();

    const candidates: Candidate[] = [];
    let dropped = 0;
    for (const hit of hits) {
      const entry = snapshot.actions.get(hit.action);
      if (!entry) {
        dropped += 1;
        continue;
      }
      if (hit.score < this.minScore) {
        continue;
      }
      candidates.push(toCandidate(hit, entry.descriptor));
    }

    const result: RouteResult = {
      query: queryText,
      candidates,
      retrievalMiss: candidates.length === 0,
      registryVersion: snapshot.version,
      indexVersion,
    };
    this.logger.debug("route_completed", {
      candidates: candidates.map((candidate) => ({ name: candidate.name, score: round(candidate.score) })),
      retrieval_miss: result.retrievalMiss,
      dropped_removed: dropped,
      registry_version: snapshot.version,
      index_version: indexVersion,
    });
    if (result.retrievalMiss) {
      this.logger.info("retrieval_miss", { hits: hits.length, min_score: this.minScore });
    }
    return result;
  }
}

function toCandidate(hit: ActionHit, descriptor: ActionDescriptor): Candidate {
  return {
    name: hit.action,
    purpose: descriptor.purpose,
    score: hit.score,
    matchedKind: hit.kind,
    notes: descriptor.disambiguationNotes,
    tags: descriptor.tags,
    inputs: descriptor.inputs,
  };
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}
