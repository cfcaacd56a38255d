import { AsyncLocalStorage } from "node:async_hooks";

/** Correlation identifiers attached to every log entry emitted during a turn. */
export interface TurnContext {
  readonly turnId: string;
  readonly conversationId: string | null;
}

/**
 * AsyncLocalStorage exposing the active turn to the logger and to the
 * collaborator adapters without threading identifiers through every call.
 */
const storage = new AsyncLocalStorage<TurnContext>();

/** Runs {@link callback} with {@link context} visible to nested async work. */
export function runWithTurnContext<T>(context: TurnContext, callback: () => T): T {
  return storage.run(context, callback);
}

/** Returns the context of the turn currently executing, if any. */
export function getTurnContext(): TurnContext | undefined {
  return storage.getStore();
}
