import { randomUUID } from "node:crypto";

import type { ActionInput } from "../catalog/descriptor.js";
import {
  CollaboratorUnavailableError,
  IterationLimitExceededError,
  TurnCancelledError,
  TurnTimeoutError,
  describeError,
} from "../errors.js";
import type { ActionExecutor } from "../executor/types.js";
import type { DomainGate } from "../gate/domainGate.js";
import type { OutputGate } from "../gate/outputGate.js";
import { runWithTurnContext } from "../infra/turnContext.js";
import type { StructuredLogger } from "../logger.js";
import type { ActionRegistry } from "../registry/actionRegistry.js";
import type { ContextRewriter } from "../rewrite/contextRewriter.js";
import type { Candidate, CandidateRouter, RouteResult } from "../router/candidateRouter.js";
import { stripThinkBlocks } from "../stream/thinkFilter.js";
import { TraceRecorder, type PipelineStage } from "./trace.js";
import type {
  ActionCall,
  ActionSelector,
  Observation,
  SelectorDecision,
  TurnFailureKind,
  TurnOutcome,
  TurnRequest,
  TurnResult,
} from "./types.js";

export interface ConversationPipelineOptions {
  readonly gate: DomainGate;
  readonly rewriter: ContextRewriter;
  readonly router: CandidateRouter;
  readonly selector: ActionSelector;
  readonly executor: ActionExecutor;
  readonly outputGate: OutputGate;
  readonly registry: ActionRegistry;
  readonly logger: StructuredLogger;
  /** Selector calls allowed per entry into SELECT_EXEC. */
  readonly maxIterations: number;
  readonly turnDeadlineMs: number;
  readonly now?: () => number;
  readonly createTurnId?: () => string;
}

/** Cancellation state shared by every collaborator call of one turn. */
interface TurnControl {
  readonly signal: AbortSignal;
  readonly expired: Promise<typeof EXPIRED>;
  stage: PipelineStage;
  timedOut: boolean;
}

/** Mutable state of the selection loop, kept across the repair re-entry. */
interface SelectionState {
  readonly query: string;
  readonly originalQuery: string;
  readonly offered: Map<string, Candidate>;
  retrievalMiss: boolean;
  readonly observations: Observation[];
  /** Actions that reported missing inputs in this turn, with the fields. */
  readonly pendingInputs: Map<string, readonly string[]>;
  readonly usedActions: Set<string>;
  repairHint: string | null;
  rejectedAnswer: string | null;
}

/** How one pass through SELECT_EXEC ended. */
type SelectionEnd =
  | { readonly kind: "text"; readonly text: string; readonly source: "final" | "clarify" }
  | { readonly kind: "declined"; readonly reason: string }
  | { readonly kind: "needs_input"; readonly action: string; readonly missingFields: readonly string[] };

const EXPIRED: unique symbol = Symbol("turn-expired");

/**
 * Bounded state machine running one conversational turn:
 * `GATE_IN → REWRITE → SELECT_EXEC → GATE_OUT → DONE`, with a single
 * `GATE_OUT → SELECT_EXEC` repair edge.
 *
 * Gate rejections, missing inputs and declines are returned as outcomes.
 * Iteration overruns, repeated policy violations, collaborator failures and
 * deadline expiry end the turn as `failed` with the generic user text; the
 * diagnostic and the trace stay operator-side.
 */
export class ConversationPipeline {
  private readonly options: ConversationPipelineOptions;
  private readonly now: () => number;
  private readonly createTurnId: () => string;

  constructor(options: ConversationPipelineOptions) {
    this.options = options;
    this.now = options.now ?? (() => performance.now());
    this.createTurnId = options.createTurnId ?? (() => randomUUID());
  }

  run(request: TurnRequest): Promise<TurnResult> {
    const turnId = this.createTurnId();
    return runWithTurnContext({ turnId, conversationId: request.conversationId ?? null }, () =>
      this.runTurn(turnId, request),
    );
  }

  private async runTurn(turnId: string, request: TurnRequest): Promise<TurnResult> {
    const { logger, turnDeadlineMs } = this.options;
    const trace = new TraceRecorder(turnId, request.conversationId ?? null, request.text, this.now);
    const controller = new AbortController();
    const control: TurnControl = {
      signal: controller.signal,
      expired: new Promise((resolve) => {
        controller.signal.addEventListener("abort", () => resolve(EXPIRED), { once: true });
      }),
      stage: "GATE_IN",
      timedOut: false,
    };

    const timer = setTimeout(() => {
      control.timedOut = true;
      controller.abort();
    }, turnDeadlineMs);
    const cancel = (): void => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    } else {
      request.signal?.addEventListener("abort", cancel, { once: true });
    }

    let outcome: TurnOutcome;
    let conversationStarted = request.conversationStarted;
    try {
      const completed = await this.advance(request, trace, control);
      outcome = completed.outcome;
      conversationStarted = conversationStarted || completed.passedOutputGate;
    } catch (error) {
      outcome = this.failure(error, control);
      logger.error("turn_failed", {
        failure: outcome.kind === "failed" ? outcome.failure : null,
        stage: control.stage,
        iterations: trace.iterationCount,
        error: describeError(error),
      });
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", cancel);
    }

    const result: TurnResult = {
      outcome,
      trace: trace.finish(outcome.kind),
      conversationStarted,
      registryVersion: this.options.registry.version,
    };
    logger.info("turn_completed", {
      outcome: outcome.kind,
      iterations: result.trace.iterations,
      repairs: result.trace.repairCount,
      duration_ms: Math.round(result.trace.durationMs),
    });
    return result;
  }

  private async advance(
    request: TurnRequest,
    trace: TraceRecorder,
    control: TurnControl,
  ): Promise<{ outcome: TurnOutcome; passedOutputGate: boolean }> {
    const { gate, rewriter, router, outputGate, registry } = this.options;
    const messages = outputGate.messages;

    // GATE_IN
    let startedAt = this.now();
    const isFollowUp = request.conversationStarted && request.history.length > 0;
    const decision = await this.guard(control, "GATE_IN", gate.admit(request.text, isFollowUp, control.signal));
    trace.recordGate(decision);
    trace.stage("GATE_IN", startedAt, { verdict: decision.verdict, reason: decision.reason, follow_up: isFollowUp });
    if (decision.verdict === "reject") {
      const text = decision.reason === "pattern_match" ? messages.rejected_pattern : messages.rejected_out_of_domain;
      trace.stage("DONE", this.now());
      return { outcome: { kind: "rejected", text, reason: decision.reason }, passedOutputGate: false };
    }

    // REWRITE
    startedAt = this.now();
    const rewrite = await this.guard(control, "REWRITE", rewriter.maybeRewrite(request.text, request.history, control.signal));
    if (rewrite.rewritten) {
      trace.recordRewrite(rewrite.text);
    }
    trace.stage("REWRITE", startedAt, { reason: rewrite.reason });

    // SELECT_EXEC, routed once per turn
    startedAt = this.now();
    const route = await this.guard(control, "SELECT_EXEC", router.route(rewrite.text, { signal: control.signal }));
    trace.recordRoute(route);
    const state: SelectionState = {
      query: rewrite.text,
      originalQuery: request.text,
      offered: new Map(),
      retrievalMiss: route.retrievalMiss,
      observations: [],
      pendingInputs: new Map(),
      usedActions: new Set(),
      repairHint: null,
      rejectedAnswer: null,
    };
    mergeCandidates(state, route);

    for (let attempt = 0; ; attempt += 1) {
      const end = await this.select(request, state, trace, control);
      trace.stage("SELECT_EXEC", startedAt, { end: end.kind, attempt });

      if (end.kind === "declined") {
        trace.stage("DONE", this.now());
        return { outcome: { kind: "declined", text: messages.declined, reason: end.reason }, passedOutputGate: false };
      }
      if (end.kind === "needs_input") {
        trace.stage("DONE", this.now());
        return {
          outcome: {
            kind: "needs_input",
            text: messages.needs_input.replace("{fields}", end.missingFields.join(", ")),
            action: end.action,
            missingFields: end.missingFields,
          },
          passedOutputGate: false,
        };
      }

      // GATE_OUT
      startedAt = this.now();
      control.stage = "GATE_OUT";
      const registeredNames = Array.from(registry.snapshot().actions.keys());
      const visible = outputGate.scrub(stripThinkBlocks(end.text), registeredNames);
      const verdict = outputGate.check(visible);
      trace.recordOutputVerdict(verdict.ok, verdict.violations);
      trace.stage("GATE_OUT", startedAt, { ok: verdict.ok, attempt });

      if (verdict.ok) {
        const text = outputGate.finalise(visible, state.usedActions, registeredNames);
        trace.stage("DONE", this.now());
        return { outcome: this.textOutcome(end.source, text, state), passedOutputGate: true };
      }

      this.options.logger.warn("output_violation", {
        attempt,
        violations: verdict.violations.map((violation) => violation.kind),
      });
      if (attempt >= 1) {
        trace.stage("DONE", this.now());
        return {
          outcome: {
            kind: "failed",
            text: messages.safe_fallback,
            failure: "output_policy",
            diagnostic: { violations: verdict.violations },
          },
          passedOutputGate: false,
        };
      }
      trace.recordRepair();
      state.repairHint = outputGate.repairHint(verdict.violations);
      state.rejectedAnswer = visible;
      startedAt = this.now();
    }
  }

  /** One bounded pass of the selection loop. */
  private async select(
    request: TurnRequest,
    state: SelectionState,
    trace: TraceRecorder,
    control: TurnControl,
  ): Promise<SelectionEnd> {
    const { selector, router, maxIterations } = this.options;
    let lastDecision: SelectorDecision["kind"] | null = null;

    for (let iteration = 1; iteration <= maxIterations; iteration += 1) {
      trace.recordIteration();
      const decision = await this.guard(
        control,
        "SELECT_EXEC",
        wrapCollaborator(
          "selector",
          selector.select({
            query: state.query,
            originalQuery: state.originalQuery,
            history: request.history,
            candidates: Array.from(state.offered.values()).sort((a, b) => b.score - a.score),
            retrievalMiss: state.retrievalMiss,
            observations: [...state.observations],
            repairHint: state.repairHint,
            rejectedAnswer: state.rejectedAnswer,
            iteration,
            signal: control.signal,
          }),
        ),
      );
      lastDecision = decision.kind;

      switch (decision.kind) {
        case "final":
          return { kind: "text", text: decision.text, source: "final" };
        case "clarify":
          return { kind: "text", text: decision.question, source: "clarify" };
        case "decline":
          return { kind: "declined", reason: decision.reason };
        case "search": {
          const route = await this.guard(control, "SELECT_EXEC", router.route(decision.query, { signal: control.signal }));
          trace.recordRoute(route);
          mergeCandidates(state, route);
          break;
        }
        case "execute": {
          const blocked = await this.executeCalls(decision.calls, state, trace, control);
          if (blocked) {
            return blocked;
          }
          break;
        }
      }
    }

    throw new IterationLimitExceededError(maxIterations, {
      iterations: trace.iterationCount,
      last_decision: lastDecision,
      observations: state.observations.length,
    });
  }

  /**
   * Runs the requested calls in order. Returns a terminal end when the
   * selector asks again for an action that is still waiting on user input.
   */
  private async executeCalls(
    calls: readonly ActionCall[],
    state: SelectionState,
    trace: TraceRecorder,
    control: TurnControl,
  ): Promise<SelectionEnd | null> {
    for (const call of calls) {
      const pending = state.pendingInputs.get(call.name);
      if (pending) {
        return { kind: "needs_input", action: call.name, missingFields: pending };
      }

      const candidate = state.offered.get(call.name);
      if (!candidate) {
        state.observations.push({
          action: call.name,
          status: "action_not_offered",
          message: "only the offered candidate actions can be executed",
        });
        trace.recordExecution({ action: call.name, args: call.args, status: "action_not_offered", durationMs: 0 });
        continue;
      }

      const missing = missingRequiredInputs(candidate.inputs, call.args);
      if (missing.length > 0) {
        state.pendingInputs.set(call.name, missing);
        state.observations.push({ action: call.name, status: "needs_more_input", missingFields: missing });
        trace.recordExecution({
          action: call.name,
          args: call.args,
          status: "needs_more_input",
          missingFields: missing,
          durationMs: 0,
        });
        continue;
      }

      const startedAt = this.now();
      const result = await this.guard(
        control,
        "SELECT_EXEC",
        wrapCollaborator("executor", this.options.executor.execute(call.name, call.args, { signal: control.signal })),
      );
      const durationMs = this.now() - startedAt;
      if (result.status === "needs_more_input") {
        state.pendingInputs.set(call.name, result.missingFields);
        state.observations.push({ action: call.name, status: "needs_more_input", missingFields: result.missingFields });
        trace.recordExecution({
          action: call.name,
          args: call.args,
          status: "needs_more_input",
          missingFields: result.missingFields,
          durationMs,
        });
      } else {
        state.usedActions.add(call.name);
        state.observations.push({ action: call.name, status: "ok", result: result.result });
        trace.recordExecution({ action: call.name, args: call.args, status: "ok", durationMs });
      }
      this.options.logger.info("action_executed", {
        action: call.name,
        status: result.status,
        duration_ms: Math.round(durationMs),
      });
    }
    return null;
  }

  private textOutcome(source: "final" | "clarify", text: string, state: SelectionState): TurnOutcome {
    if (source === "final") {
      return { kind: "answered", text, usedActions: Array.from(state.usedActions) };
    }
    const pending = state.pendingInputs.entries().next();
    if (!pending.done) {
      const [action, missingFields] = pending.value;
      return { kind: "needs_input", text, action, missingFields };
    }
    return { kind: "clarification", text };
  }

  /** Races a collaborator call against the turn deadline and the caller's signal. */
  private async guard<T>(control: TurnControl, stage: PipelineStage, work: Promise<T>): Promise<T> {
    control.stage = stage;
    if (control.signal.aborted) {
      void work.catch((error: unknown) => this.logLateFailure(stage, error));
      throw this.abortError(control);
    }
    const settled = await Promise.race([work, control.expired]);
    if (settled === EXPIRED) {
      void work.catch((error: unknown) => this.logLateFailure(stage, error));
      throw this.abortError(control);
    }
    return settled;
  }

  private logLateFailure(stage: PipelineStage, error: unknown): void {
    this.options.logger.debug("collaborator_failed_after_abort", { stage, error: describeError(error) });
  }

  private abortError(control: TurnControl): TurnTimeoutError | TurnCancelledError {
    return control.timedOut
      ? new TurnTimeoutError(this.options.turnDeadlineMs, control.stage)
      : new TurnCancelledError(control.stage);
  }

  private failure(error: unknown, control: TurnControl): TurnOutcome {
    // A collaborator may reject on the aborted signal before the race observes the expiry.
    const effective =
      control.signal.aborted && !(error instanceof TurnTimeoutError || error instanceof TurnCancelledError)
        ? this.abortError(control)
        : error;
    const failure = classifyFailure(effective);
    const diagnostic: Record<string, unknown> = { stage: control.stage, error: describeError(effective) };
    return { kind: "failed", text: this.options.outputGate.messages.generic_apology, failure, diagnostic };
  }
}

function classifyFailure(error: unknown): TurnFailureKind {
  if (error instanceof IterationLimitExceededError) {
    return "iteration_limit";
  }
  if (error instanceof TurnTimeoutError) {
    return "timeout";
  }
  if (error instanceof TurnCancelledError) {
    return "cancelled";
  }
  if (error instanceof CollaboratorUnavailableError) {
    return "collaborator_unavailable";
  }
  return "internal";
}

/** Adds the candidates of {@link route} to the offered set, keeping the best score per action. */
function mergeCandidates(state: SelectionState, route: RouteResult): void {
  for (const candidate of route.candidates) {
    const existing = state.offered.get(candidate.name);
    if (!existing || candidate.score > existing.score) {
      state.offered.set(candidate.name, candidate);
    }
  }
  state.retrievalMiss = state.offered.size === 0;
}

/** Required inputs absent from {@link args} (missing, null or blank). */
export function missingRequiredInputs(
  inputs: readonly ActionInput[],
  args: Readonly<Record<string, unknown>>,
): string[] {
  return inputs
    .filter((input) => input.required)
    .filter((input) => {
      const value = args[input.name];
      return value === undefined || value === null || (typeof value === "string" && value.trim().length === 0);
    })
    .map((input) => input.name);
}

async function wrapCollaborator<T>(collaborator: "selector" | "executor", work: Promise<T>): Promise<T> {
  try {
    return await work;
  } catch (error) {
    if (error instanceof CollaboratorUnavailableError) {
      throw error;
    }
    throw new CollaboratorUnavailableError(collaborator, `${collaborator} call failed`, error);
  }
}
