import { CollaboratorUnavailableError } from "../errors.js";
import type { ActionRegistry } from "../registry/actionRegistry.js";
import type { ActionExecutionContext, ActionExecutor, ActionResult } from "./types.js";

/**
 * Dispatches executions to the handler held by the registry's latest snapshot,
 * so a group reload swaps descriptors and handlers together. Actions without a
 * handler go to {@link fallback} when one is configured.
 */
export class RegistryActionExecutor implements ActionExecutor {
  constructor(
    private readonly registry: ActionRegistry,
    private readonly fallback: ActionExecutor | null = null,
  ) {}

  async execute(
    name: string,
    args: Readonly<Record<string, unknown>>,
    context: ActionExecutionContext,
  ): Promise<ActionResult> {
    const entry = this.registry.snapshot().actions.get(name);
    if (entry?.handler) {
      return entry.handler(args, context);
    }
    if (this.fallback) {
      return this.fallback.execute(name, args, context);
    }
    throw new CollaboratorUnavailableError("executor", `no handler is registered for action "${name}"`);
  }
}
