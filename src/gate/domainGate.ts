import pLimit from "p-limit";

import type { DomainExample } from "../config/dataFiles.js";
import { maxSimilarity, normalise } from "../embedding/similarity.js";
import type { Embedder } from "../embedding/types.js";
import { CollaboratorUnavailableError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { PatternMatch, PatternRuleSet } from "./patternRules.js";

export type GateVerdict = "admit" | "reject";

export type GateReason =
  | "pattern_match"
  | "short_text"
  | "follow_up"
  | "high_confidence"
  | "out_of_domain"
  | "deferred";

export type GateLayer = "pattern" | "length" | "follow_up" | "embedding";

export interface GateDecision {
  readonly verdict: GateVerdict;
  readonly reason: GateReason;
  readonly layer: GateLayer;
  /** Best similarity to an in-domain reference (embedding layer only). */
  readonly maxIn: number | null;
  /** Best similarity to an out-of-domain reference (embedding layer only). */
  readonly maxOut: number | null;
  readonly rule: PatternMatch | null;
  readonly latencyMs: number;
}

export interface GateThresholds {
  /** `maxIn` at or above this admits immediately. */
  readonly highConfidence: number;
  /** `maxOut - maxIn` at or above this rejects. */
  readonly margin: number;
}

export interface DomainGateOptions {
  readonly embedder: Embedder;
  readonly patterns: PatternRuleSet;
  readonly examples: readonly DomainExample[];
  readonly thresholds: GateThresholds;
  /** Trimmed inputs shorter than this skip the embedding layer. */
  readonly minChars: number;
  readonly logger: StructuredLogger;
  /** Parallel embedding calls while building the reference matrices. */
  readonly concurrency?: number;
  readonly now?: () => number;
}

interface ReferenceMatrices {
  readonly inDomain: readonly number[][];
  readonly outOfDomain: readonly number[][];
}

/**
 * Two-layer admission gate. The pattern layer runs on every turn, follow-ups
 * included; the embedding layer compares the query with labelled reference
 * utterances and only rejects when the out-of-domain side clearly wins.
 */
export class DomainGate {
  private examples: readonly DomainExample[];
  private matrices: Promise<ReferenceMatrices> | null = null;
  private currentThresholds: GateThresholds;
  private readonly embedder: Embedder;
  private readonly patterns: PatternRuleSet;
  private readonly minChars: number;
  private readonly logger: StructuredLogger;
  private readonly concurrency: number;
  private readonly now: () => number;

  constructor(options: DomainGateOptions) {
    this.embedder = options.embedder;
    this.patterns = options.patterns;
    this.examples = [...options.examples];
    this.currentThresholds = { ...options.thresholds };
    this.minChars = options.minChars;
    this.logger = options.logger;
    this.concurrency = Math.max(1, options.concurrency ?? 4);
    this.now = options.now ?? (() => performance.now());
  }

  get thresholds(): GateThresholds {
    return this.currentThresholds;
  }

  get exampleCount(): { in: number; out: number } {
    return {
      in: this.examples.filter((example) => example.label === "in").length,
      out: this.examples.filter((example) => example.label === "out").length,
    };
  }

  updateThresholds(patch: Partial<GateThresholds>): GateThresholds {
    this.currentThresholds = { ...this.currentThresholds, ...patch };
    this.logger.info("gate_thresholds_updated", {
      high_confidence: this.currentThresholds.highConfidence,
      margin: this.currentThresholds.margin,
    });
    return this.currentThresholds;
  }

  /** Swaps the reference utterances; the matrices are rebuilt on next use. */
  replaceExamples(examples: readonly DomainExample[]): void {
    this.examples = [...examples];
    this.matrices = null;
    this.logger.info("gate_examples_replaced", this.exampleCount);
  }

  /** Builds the reference matrices ahead of the first turn. */
  async warmUp(signal?: AbortSignal): Promise<void> {
    await raceSignal(this.referenceMatrices(), signal);
  }

  async admit(text: string, isFollowUp: boolean, signal?: AbortSignal): Promise<GateDecision> {
    const startedAt = this.now();
    const finish = (
      verdict: GateVerdict,
      reason: GateReason,
      layer: GateLayer,
      extra: { maxIn?: number; maxOut?: number; rule?: PatternMatch } = {},
    ): GateDecision => {
      const decision: GateDecision = {
        verdict,
        reason,
        layer,
        maxIn: extra.maxIn ?? null,
        maxOut: extra.maxOut ?? null,
        rule: extra.rule ?? null,
        latencyMs: this.now() - startedAt,
      };
      if (verdict === "reject") {
        this.logger.warn("gate_rejected", {
          reason,
          layer,
          rule: decision.rule?.id ?? null,
          max_in: decision.maxIn,
          max_out: decision.maxOut,
        });
      }
      return decision;
    };

    const rule = this.patterns.match(text);
    if (rule) {
      return finish("reject", "pattern_match", "pattern", { rule });
    }

    if (Array.from(text.trim()).length < this.minChars) {
      return finish("admit", "short_text", "length");
    }

    if (isFollowUp) {
      return finish("admit", "follow_up", "follow_up");
    }

    const { inDomain, outOfDomain } = await raceSignal(this.referenceMatrices(), signal);
    if (inDomain.length === 0) {
      return finish("admit", "deferred", "embedding");
    }

    let query: number[];
    try {
      query = normalise(await this.embedder.embed(text, "query", signal));
    } catch (error) {
      throw wrapEmbeddingError("domain gate query embedding failed", error);
    }

    const maxIn = maxSimilarity(query, inDomain);
    const maxOut = outOfDomain.length > 0 ? maxSimilarity(query, outOfDomain) : undefined;
    const { highConfidence, margin } = this.currentThresholds;
    this.logger.debug("gate_scored", { max_in: maxIn, max_out: maxOut ?? null });

    if (maxIn >= highConfidence) {
      return finish("admit", "high_confidence", "embedding", { maxIn, maxOut });
    }
    if (maxOut !== undefined && maxOut - maxIn >= margin) {
      return finish("reject", "out_of_domain", "embedding", { maxIn, maxOut });
    }
    return finish("admit", "deferred", "embedding", { maxIn, maxOut });
  }

  /** Shared by every turn, so it never runs under one turn's signal. */
  private referenceMatrices(): Promise<ReferenceMatrices> {
    if (!this.matrices) {
      const building = this.buildMatrices(this.examples);
      this.matrices = building;
      building.catch(() => {
        // Drop the failed build so the next turn retries; the caller gets the rejection.
        if (this.matrices === building) {
          this.matrices = null;
        }
      });
    }
    return this.matrices;
  }

  private async buildMatrices(examples: readonly DomainExample[]): Promise<ReferenceMatrices> {
    const limit = pLimit(this.concurrency);
    const startedAt = this.now();
    let vectors: number[][];
    try {
      vectors = await Promise.all(
        examples.map((example) => limit(async () => normalise(await this.embedder.embed(example.text, "passage")))),
      );
    } catch (error) {
      throw wrapEmbeddingError("domain gate reference embedding failed", error);
    }

    const inDomain: number[][] = [];
    const outOfDomain: number[][] = [];
    examples.forEach((example, position) => {
      (example.label === "in" ? inDomain : outOfDomain).push(vectors[position]);
    });
    this.logger.info("gate_references_ready", {
      in: inDomain.length,
      out: outOfDomain.length,
      duration_ms: Math.round(this.now() - startedAt),
    });
    return { inDomain, outOfDomain };
  }
}

/** Settles with {@link promise}, or rejects with the signal's reason once it aborts. */
function raceSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

function wrapEmbeddingError(message: string, error: unknown): CollaboratorUnavailableError {
  return error instanceof CollaboratorUnavailableError ? error : new CollaboratorUnavailableError("embedding", message, error);
}
