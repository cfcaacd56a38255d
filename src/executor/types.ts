import type { ActionDescriptor } from "../catalog/descriptor.js";

/**
 * Result shape every action must honour. Missing parameters are reported,
 * never guessed.
 */
export type ActionResult =
  | { readonly status: "ok"; readonly result: unknown }
  | { readonly status: "needs_more_input"; readonly missingFields: readonly string[] };

export interface ActionExecutionContext {
  readonly signal: AbortSignal;
}

/** Executable side of an action, held in the registry's handler table. */
export type ActionHandler = (
  args: Readonly<Record<string, unknown>>,
  context: ActionExecutionContext,
) => Promise<ActionResult>;

/** Descriptor plus optional handler, as registered under a group. */
export interface ActionDefinition {
  readonly descriptor: ActionDescriptor;
  readonly handler?: ActionHandler;
}

/** Executes a named action. */
export interface ActionExecutor {
  execute(
    name: string,
    args: Readonly<Record<string, unknown>>,
    context: ActionExecutionContext,
  ): Promise<ActionResult>;
}
