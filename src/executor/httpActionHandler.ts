import { z } from "zod";

import type { ActionDescriptor } from "../catalog/descriptor.js";
import { CollaboratorUnavailableError } from "../errors.js";
import { postJson } from "../infra/httpJson.js";
import type { ActionHandler, ActionResult } from "./types.js";

/** Reply expected from an action endpoint. */
const actionReplySchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("ok"), result: z.unknown() }),
  z.object({ status: z.literal("needs_more_input"), missing_fields: z.array(z.string()).min(1) }),
]);

export interface HttpActionHandlerOptions {
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly fetchImpl?: typeof fetch;
}

/**
 * Builds the handler of an action served by a remote endpoint: the arguments
 * are POSTed as `{ action, arguments }` and the reply must follow the action
 * result contract. Returns `undefined` for descriptors without an endpoint.
 */
export function createHttpActionHandler(
  descriptor: ActionDescriptor,
  options: HttpActionHandlerOptions,
): ActionHandler | undefined {
  const endpoint = descriptor.endpoint;
  if (endpoint === null) {
    return undefined;
  }

  return async (args, context): Promise<ActionResult> => {
    let payload: unknown;
    try {
      payload = await postJson(
        endpoint,
        { action: descriptor.name, arguments: args },
        {
          timeoutMs: options.timeoutMs,
          maxRetries: options.maxRetries,
          signal: context.signal,
          ...(options.fetchImpl ? { fetchImpl: options.fetchImpl } : {}),
        },
      );
    } catch (error) {
      throw new CollaboratorUnavailableError("executor", `action endpoint for "${descriptor.name}" failed`, error);
    }

    const reply = actionReplySchema.safeParse(payload);
    if (!reply.success) {
      throw new CollaboratorUnavailableError(
        "executor",
        `action endpoint for "${descriptor.name}" returned an invalid reply`,
        reply.error,
      );
    }
    return reply.data.status === "ok"
      ? { status: "ok", result: reply.data.result }
      : { status: "needs_more_input", missingFields: reply.data.missing_fields };
  };
}
