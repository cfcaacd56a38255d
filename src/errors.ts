/**
 * Error taxonomy shared by the registry, the index, the gates and the
 * conversation pipeline. Expected control-flow outcomes (gate rejection,
 * retrieval miss, missing user input, output policy repair) are modelled as
 * turn outcomes in `pipeline/types.ts`; the classes below cover the conditions
 * that abort an operation.
 */

/** Stable error codes surfaced to management clients and logs. */
export type RoutingErrorCode =
  | "E-REGISTRY-INCONSISTENT"
  | "E-PIPELINE-ITERATIONS"
  | "E-PIPELINE-TIMEOUT"
  | "E-PIPELINE-CANCELLED"
  | "E-COLLABORATOR-UNAVAILABLE"
  | "E-CATALOG-LOAD"
  | "E-GATE-PATTERN"
  | "E-OVERRIDE"
  | "E-DATA-FILE";

/** Base class carrying a machine-readable {@link RoutingErrorCode}. */
export class RoutingError extends Error {
  public readonly code: RoutingErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    code: RoutingErrorCode,
    message: string,
    options: { details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "RoutingError";
    this.code = code;
    this.details = options.details ?? {};
  }
}

/** Reasons a registry mutation can be refused. */
export type RegistryInconsistencyReason =
  | "duplicate_name"
  | "duplicate_usage_phrase"
  | "invalid_descriptor"
  | "unknown_action"
  | "unknown_group";

/**
 * Raised synchronously inside the serialized mutation step, before the live
 * snapshot changes. The index never sees a catalog that failed validation.
 */
export class RegistryInconsistencyError extends RoutingError {
  public readonly reason: RegistryInconsistencyReason;

  constructor(reason: RegistryInconsistencyReason, message: string, details: Record<string, unknown> = {}) {
    super("E-REGISTRY-INCONSISTENT", message, { details: { reason, ...details } });
    this.name = "RegistryInconsistencyError";
    this.reason = reason;
  }
}

/** Raised when the selector keeps requesting work past the iteration ceiling. */
export class IterationLimitExceededError extends RoutingError {
  public readonly limit: number;

  constructor(limit: number, details: Record<string, unknown> = {}) {
    super("E-PIPELINE-ITERATIONS", `selection loop exceeded ${limit} iterations`, {
      details: { limit, ...details },
    });
    this.name = "IterationLimitExceededError";
    this.limit = limit;
  }
}

/** Raised when the overall turn deadline expires while a stage is pending. */
export class TurnTimeoutError extends RoutingError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, stage: string) {
    super("E-PIPELINE-TIMEOUT", `turn exceeded its ${timeoutMs}ms deadline during ${stage}`, {
      details: { timeoutMs, stage },
    });
    this.name = "TurnTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Raised when the caller's signal aborts a turn before it completes. */
export class TurnCancelledError extends RoutingError {
  constructor(stage: string, cause?: unknown) {
    super("E-PIPELINE-CANCELLED", `turn cancelled by the caller during ${stage}`, { details: { stage }, cause });
    this.name = "TurnCancelledError";
  }
}

/** External dependencies the core calls into. */
export type Collaborator = "embedding" | "vector_store" | "selector" | "generator" | "executor";

/**
 * Distinguishes "the input was fine, a dependency failed" from domain
 * rejections. Adapters throw it directly; the core wraps any other failure
 * raised by a collaborator call.
 */
export class CollaboratorUnavailableError extends RoutingError {
  public readonly collaborator: Collaborator;

  constructor(collaborator: Collaborator, message: string, cause?: unknown) {
    super("E-COLLABORATOR-UNAVAILABLE", message, { details: { collaborator }, cause });
    this.name = "CollaboratorUnavailableError";
    this.collaborator = collaborator;
  }
}

/** Raised when a catalog source cannot be read or parsed. */
export class CatalogLoadError extends RoutingError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super("E-CATALOG-LOAD", message, { details, cause });
    this.name = "CatalogLoadError";
  }
}

/** Raised when a gate pattern replacement contains an invalid rule. */
export class GatePatternError extends RoutingError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super("E-GATE-PATTERN", message, { details, cause });
    this.name = "GatePatternError";
  }
}

/** Raised by the descriptor override store (missing draft, unknown version, …). */
export class OverrideStoreError extends RoutingError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super("E-OVERRIDE", message, { details, cause });
    this.name = "OverrideStoreError";
  }
}

/** Raised when a JSON data file under `config/` fails validation. */
export class DataFileError extends RoutingError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super("E-DATA-FILE", message, { details, cause });
    this.name = "DataFileError";
  }
}

/** Serialises any thrown value into a log-friendly payload. */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof RoutingError) {
    return { name: error.name, code: error.code, message: error.message, details: error.details };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}
