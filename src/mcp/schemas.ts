import { z } from "zod";

import { descriptorPatchSchema } from "../registry/overrideStore.js";

const actionName = z.string().trim().min(1).max(200);

export const ActionsListInputSchema = z
  .object({
    group: z.string().trim().min(1).optional(),
    include_descriptors: z.boolean().optional(),
  })
  .strict();

export const ActionRemoveInputSchema = z.object({ name: actionName }).strict();

export const GroupReloadInputSchema = z.object({ group: z.string().trim().min(1) }).strict();

export const GatePatternsReloadInputSchema = z.object({}).strict();

export const GateCheckInputSchema = z
  .object({
    text: z.string().max(10_000),
    follow_up: z.boolean().optional(),
  })
  .strict();

export const RouteSearchInputSchema = z
  .object({
    query: z.string().trim().min(1).max(10_000),
    top_k: z.number().int().min(1).max(50).optional(),
  })
  .strict();

export const OverrideDraftInputSchema = z
  .object({
    name: actionName,
    /** Omitted fields keep their catalog value; `null` discards the draft. */
    patch: descriptorPatchSchema.nullable(),
  })
  .strict();

export const OverridePublishInputSchema = z
  .object({
    name: actionName,
    note: z.string().trim().min(1).max(500).optional(),
  })
  .strict();

export const OverrideRollbackInputSchema = z
  .object({
    name: actionName,
    version: z.number().int().min(1),
  })
  .strict();

export const OverrideStatusInputSchema = z
  .object({
    name: actionName.optional(),
    include_history: z.boolean().optional(),
  })
  .strict();

export const ConversationTurnInputSchema = z
  .object({
    conversation_id: z.string().trim().min(1).max(200),
    text: z.string().max(10_000),
    reset: z.boolean().optional(),
  })
  .strict();

export const ActionsListInputShape = ActionsListInputSchema.shape;
export const ActionRemoveInputShape = ActionRemoveInputSchema.shape;
export const GroupReloadInputShape = GroupReloadInputSchema.shape;
export const GatePatternsReloadInputShape = GatePatternsReloadInputSchema.shape;
export const GateCheckInputShape = GateCheckInputSchema.shape;
export const RouteSearchInputShape = RouteSearchInputSchema.shape;
export const OverrideDraftInputShape = OverrideDraftInputSchema.shape;
export const OverridePublishInputShape = OverridePublishInputSchema.shape;
export const OverrideRollbackInputShape = OverrideRollbackInputSchema.shape;
export const OverrideStatusInputShape = OverrideStatusInputSchema.shape;
export const ConversationTurnInputShape = ConversationTurnInputSchema.shape;
