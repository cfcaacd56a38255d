import type { GateDecision } from "../gate/domainGate.js";
import type { OutputViolation } from "../gate/outputGate.js";
import type { RouteResult } from "../router/candidateRouter.js";
import type { ObservationStatus, TurnOutcomeKind } from "./types.js";

export type PipelineStage = "GATE_IN" | "REWRITE" | "SELECT_EXEC" | "GATE_OUT" | "DONE";

export interface StageRecord {
  readonly stage: PipelineStage;
  readonly detail: Readonly<Record<string, unknown>>;
  readonly durationMs: number;
}

export interface CandidateListRecord {
  readonly query: string;
  readonly candidates: ReadonlyArray<{ readonly name: string; readonly score: number }>;
  readonly retrievalMiss: boolean;
  readonly indexVersion: number;
}

export interface ExecutionRecord {
  readonly action: string;
  readonly args: Readonly<Record<string, unknown>>;
  readonly status: ObservationStatus;
  readonly missingFields?: readonly string[];
  readonly durationMs: number;
}

export interface OutputVerdictRecord {
  readonly attempt: number;
  readonly ok: boolean;
  readonly violations: readonly OutputViolation[];
}

/** Per-turn record handed back with every result, successful or not. */
export interface TurnTrace {
  readonly turnId: string;
  readonly conversationId: string | null;
  readonly originalQuery: string;
  readonly rewrittenQuery: string | null;
  readonly stages: readonly StageRecord[];
  readonly gate: GateDecision | null;
  readonly candidateLists: readonly CandidateListRecord[];
  readonly executions: readonly ExecutionRecord[];
  readonly outputVerdicts: readonly OutputVerdictRecord[];
  readonly repairCount: number;
  /** Selector calls across every selection loop of the turn. */
  readonly iterations: number;
  readonly outcome: TurnOutcomeKind | null;
  readonly durationMs: number;
}

/** Mutable builder appended to by each stage of one turn. */
export class TraceRecorder {
  private rewrittenQuery: string | null = null;
  private gate: GateDecision | null = null;
  private readonly stages: StageRecord[] = [];
  private readonly candidateLists: CandidateListRecord[] = [];
  private readonly executions: ExecutionRecord[] = [];
  private readonly outputVerdicts: OutputVerdictRecord[] = [];
  private repairCount = 0;
  private iterations = 0;
  private readonly startedAt: number;

  constructor(
    private readonly turnId: string,
    private readonly conversationId: string | null,
    private readonly originalQuery: string,
    private readonly now: () => number,
  ) {
    this.startedAt = now();
  }

  get iterationCount(): number {
    return this.iterations;
  }

  stage(stage: PipelineStage, startedAt: number, detail: Record<string, unknown> = {}): void {
    this.stages.push({ stage, detail, durationMs: this.now() - startedAt });
  }

  recordGate(decision: GateDecision): void {
    this.gate = decision;
  }

  recordRewrite(rewritten: string): void {
    this.rewrittenQuery = rewritten;
  }

  recordRoute(route: RouteResult): void {
    this.candidateLists.push({
      query: route.query,
      candidates: route.candidates.map((candidate) => ({ name: candidate.name, score: candidate.score })),
      retrievalMiss: route.retrievalMiss,
      indexVersion: route.indexVersion,
    });
  }

  recordExecution(record: ExecutionRecord): void {
    this.executions.push(record);
  }

  recordOutputVerdict(ok: boolean, violations: readonly OutputViolation[]): void {
    this.outputVerdicts.push({ attempt: this.outputVerdicts.length + 1, ok, violations });
  }

  recordRepair(): void {
    this.repairCount += 1;
  }

  recordIteration(): void {
    this.iterations += 1;
  }

  finish(outcome: TurnOutcomeKind | null): TurnTrace {
    return {
      turnId: this.turnId,
      conversationId: this.conversationId,
      originalQuery: this.originalQuery,
      rewrittenQuery: this.rewrittenQuery,
      stages: [...this.stages],
      gate: this.gate,
      candidateLists: [...this.candidateLists],
      executions: [...this.executions],
      outputVerdicts: [...this.outputVerdicts],
      repairCount: this.repairCount,
      iterations: this.iterations,
      outcome,
      durationMs: this.now() - this.startedAt,
    };
  }
}
