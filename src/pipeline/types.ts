import type { GateReason } from "../gate/domainGate.js";
import type { Candidate } from "../router/candidateRouter.js";
import type { TurnTrace } from "./trace.js";

export type ChatRole = "user" | "assistant";

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

export interface GenerationRequest {
  readonly system: string;
  readonly messages: readonly ChatMessage[];
  readonly signal?: AbortSignal;
}

/** Opaque text generator (used by the rewriter). */
export interface Generator {
  generate(request: GenerationRequest): Promise<string>;
}

export interface ActionCall {
  readonly name: string;
  readonly args: Readonly<Record<string, unknown>>;
}

export type ObservationStatus = "ok" | "needs_more_input" | "action_not_offered";

/** Result of one requested call, fed back to the selector. */
export interface Observation {
  readonly action: string;
  readonly status: ObservationStatus;
  readonly result?: unknown;
  readonly missingFields?: readonly string[];
  readonly message?: string;
}

export interface SelectionRequest {
  /** Query after rewriting. */
  readonly query: string;
  readonly originalQuery: string;
  readonly history: readonly ChatMessage[];
  /** Every candidate offered in this turn, best score first. */
  readonly candidates: readonly Candidate[];
  readonly retrievalMiss: boolean;
  readonly observations: readonly Observation[];
  /** Set after an output policy violation; the next answer must honour it. */
  readonly repairHint: string | null;
  /** Answer the output gate rejected, paired with {@link repairHint}. */
  readonly rejectedAnswer: string | null;
  /** 1-based position inside the current selection loop. */
  readonly iteration: number;
  readonly signal: AbortSignal;
}

/** Tagged decision returned by the selector at each loop iteration. */
export type SelectorDecision =
  | { readonly kind: "execute"; readonly calls: readonly ActionCall[] }
  | { readonly kind: "search"; readonly query: string }
  | { readonly kind: "final"; readonly text: string }
  | { readonly kind: "clarify"; readonly question: string }
  | { readonly kind: "decline"; readonly reason: string };

/** Opaque oracle choosing what happens next inside the selection loop. */
export interface ActionSelector {
  select(request: SelectionRequest): Promise<SelectorDecision>;
}

export interface TurnRequest {
  readonly text: string;
  /** Prior messages, oldest first, excluding {@link text}. */
  readonly history: readonly ChatMessage[];
  /** True once an earlier answer of this conversation passed the output gate. */
  readonly conversationStarted: boolean;
  readonly conversationId?: string;
  readonly signal?: AbortSignal;
}

export type TurnFailureKind =
  | "iteration_limit"
  | "output_policy"
  | "collaborator_unavailable"
  | "timeout"
  | "cancelled"
  | "internal";

export type TurnOutcome =
  | { readonly kind: "answered"; readonly text: string; readonly usedActions: readonly string[] }
  | { readonly kind: "clarification"; readonly text: string }
  | { readonly kind: "needs_input"; readonly text: string; readonly action: string; readonly missingFields: readonly string[] }
  | { readonly kind: "rejected"; readonly text: string; readonly reason: GateReason }
  | { readonly kind: "declined"; readonly text: string; readonly reason: string }
  | {
      readonly kind: "failed";
      readonly text: string;
      readonly failure: TurnFailureKind;
      /** Operator-facing details; never part of {@link text}. */
      readonly diagnostic: Readonly<Record<string, unknown>>;
    };

export type TurnOutcomeKind = TurnOutcome["kind"];

export interface TurnResult {
  readonly outcome: TurnOutcome;
  readonly trace: TurnTrace;
  readonly conversationStarted: boolean;
  readonly registryVersion: number;
}
