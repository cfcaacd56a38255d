import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { toDescriptorFile } from "../catalog/descriptor.js";
import { OverrideStoreError, RoutingError } from "../errors.js";
import type { DescriptorOverrideStore } from "../registry/overrideStore.js";
import type { ToolgateRuntime } from "../runtime.js";
import {
  ActionRemoveInputSchema,
  ActionRemoveInputShape,
  ActionsListInputSchema,
  ActionsListInputShape,
  ConversationTurnInputSchema,
  ConversationTurnInputShape,
  GateCheckInputSchema,
  GateCheckInputShape,
  GatePatternsReloadInputShape,
  GroupReloadInputSchema,
  GroupReloadInputShape,
  OverrideDraftInputSchema,
  OverrideDraftInputShape,
  OverridePublishInputSchema,
  OverridePublishInputShape,
  OverrideRollbackInputSchema,
  OverrideRollbackInputShape,
  OverrideStatusInputSchema,
  OverrideStatusInputShape,
  RouteSearchInputSchema,
  RouteSearchInputShape,
} from "./schemas.js";

export const SERVER_NAME = "toolgate";
export const SERVER_VERSION = "0.1.0";

const j = (o: unknown) => JSON.stringify(o, null, 2);

/**
 * Builds the MCP server exposing the management surface of {@link runtime}.
 * Mutating tools wait until the index caught up with the registry version
 * they report, so a `route_search` issued afterwards sees the change.
 */
export function createManagementServer(runtime: ToolgateRuntime): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const { registry, index, logger } = runtime;

  const respond = async (tool: string, run: () => Promise<Record<string, unknown>>): Promise<CallToolResult> => {
    try {
      const payload = await run();
      return { content: [{ type: "text", text: j({ tool, result: payload }) }], structuredContent: payload };
    } catch (error) {
      if (error instanceof RoutingError) {
        logger.warn("management_tool_failed", { tool, code: error.code, message: error.message });
        return {
          isError: true,
          content: [{ type: "text", text: j({ error: error.code, message: error.message, details: error.details }) }],
        };
      }
      throw error;
    }
  };

  const settled = async (version: number): Promise<Record<string, unknown>> => {
    await index.whenVersion(version);
    return { version: registry.version, action_count: registry.snapshot().actions.size };
  };

  const requireOverrides = (): DescriptorOverrideStore => {
    if (!runtime.overrides) {
      throw new OverrideStoreError("no override file is configured");
    }
    return runtime.overrides;
  };

  server.registerTool(
    "actions_list",
    {
      title: "Actions list",
      description: "Lists the registered actions with the current registry and index versions.",
      inputSchema: ActionsListInputShape,
    },
    async (input: unknown) =>
      respond("actions_list", async () => {
        const parsed = ActionsListInputSchema.parse(input ?? {});
        const snapshot = registry.snapshot();
        const actions = Array.from(snapshot.actions.values())
          .filter((entry) => parsed.group === undefined || entry.group === parsed.group)
          .map((entry) => ({
            name: entry.descriptor.name,
            group: entry.group,
            purpose: entry.descriptor.purpose,
            tags: entry.descriptor.tags,
            executable: entry.handler !== null,
            ...(parsed.include_descriptors ? { descriptor: toDescriptorFile(entry.descriptor) } : {}),
          }));
        return {
          version: snapshot.version,
          index_version: index.version,
          action_count: snapshot.actions.size,
          groups: registry.listSources().map((source) => ({ group: source.group, origin: source.origin })),
          actions,
        };
      }),
  );

  server.registerTool(
    "action_remove",
    {
      title: "Action remove",
      description: "Unregisters one action; its index documents are removed on the next sync.",
      inputSchema: ActionRemoveInputShape,
    },
    async (input: unknown) =>
      respond("action_remove", async () => {
        const parsed = ActionRemoveInputSchema.parse(input);
        const result = await registry.unregister(parsed.name);
        return { ...(await settled(result.version)), removed: result.removed };
      }),
  );

  server.registerTool(
    "group_reload",
    {
      title: "Group reload",
      description: "Re-reads the catalog file of one group and swaps its actions in one step.",
      inputSchema: GroupReloadInputShape,
    },
    async (input: unknown) =>
      respond("group_reload", async () => {
        const parsed = GroupReloadInputSchema.parse(input);
        const result = await runtime.reloadGroup(parsed.group);
        return { ...(await settled(result.version)), changed: result.changed, removed: result.removed };
      }),
  );

  server.registerTool(
    "gate_patterns_reload",
    {
      title: "Gate patterns reload",
      description: "Reloads the pattern rules of the domain gate from their file.",
      inputSchema: GatePatternsReloadInputShape,
    },
    async () =>
      respond("gate_patterns_reload", async () => {
        const ruleCount = await runtime.patterns.reloadFromFile();
        return { rule_count: ruleCount, patterns_version: runtime.patterns.version };
      }),
  );

  server.registerTool(
    "gate_check",
    {
      title: "Gate check",
      description: "Runs the domain gate on a text without executing anything.",
      inputSchema: GateCheckInputShape,
    },
    async (input: unknown) =>
      respond("gate_check", async () => {
        const parsed = GateCheckInputSchema.parse(input);
        const decision = await runtime.gate.admit(parsed.text, parsed.follow_up ?? false);
        return { ...decision };
      }),
  );

  server.registerTool(
    "route_search",
    {
      title: "Route search",
      description: "Returns the ranked candidate actions for a query.",
      inputSchema: RouteSearchInputShape,
    },
    async (input: unknown) =>
      respond("route_search", async () => {
        const parsed = RouteSearchInputSchema.parse(input);
        const route = await runtime.router.route(parsed.query, parsed.top_k ? { topK: parsed.top_k } : {});
        return {
          query: route.query,
          retrieval_miss: route.retrievalMiss,
          registry_version: route.registryVersion,
          index_version: route.indexVersion,
          candidates: route.candidates.map((candidate) => ({
            name: candidate.name,
            score: candidate.score,
            matched_kind: candidate.matchedKind,
            purpose: candidate.purpose,
          })),
        };
      }),
  );

  server.registerTool(
    "override_draft",
    {
      title: "Override draft",
      description: "Saves (or discards with a null patch) the draft edit of a descriptor.",
      inputSchema: OverrideDraftInputShape,
    },
    async (input: unknown) =>
      respond("override_draft", async () => {
        const parsed = OverrideDraftInputSchema.parse(input);
        const store = requireOverrides();
        const status =
          parsed.patch === null ? await store.discardDraft(parsed.name) : await store.saveDraft(parsed.name, parsed.patch);
        return { ...status };
      }),
  );

  server.registerTool(
    "override_publish",
    {
      title: "Override publish",
      description: "Publishes the draft of a descriptor and re-indexes the action.",
      inputSchema: OverridePublishInputShape,
    },
    async (input: unknown) =>
      respond("override_publish", async () => {
        const parsed = OverridePublishInputSchema.parse(input);
        const published = await requireOverrides().publish(parsed.name, parsed.note);
        return { ...(await settled(published.mutation.version)), override_version: published.overrideVersion };
      }),
  );

  server.registerTool(
    "override_rollback",
    {
      title: "Override rollback",
      description: "Re-publishes an earlier override version of a descriptor.",
      inputSchema: OverrideRollbackInputShape,
    },
    async (input: unknown) =>
      respond("override_rollback", async () => {
        const parsed = OverrideRollbackInputSchema.parse(input);
        const published = await requireOverrides().rollback(parsed.name, parsed.version);
        return { ...(await settled(published.mutation.version)), override_version: published.overrideVersion };
      }),
  );

  server.registerTool(
    "override_status",
    {
      title: "Override status",
      description: "Reports drafts, published versions and history of descriptor overrides.",
      inputSchema: OverrideStatusInputShape,
    },
    async (input: unknown) =>
      respond("override_status", async () => {
        const parsed = OverrideStatusInputSchema.parse(input ?? {});
        const store = requireOverrides();
        if (parsed.name === undefined) {
          return { overrides: store.list() };
        }
        return {
          ...store.status(parsed.name),
          ...(parsed.include_history ? { history: store.history(parsed.name) } : {}),
        };
      }),
  );

  const pipeline = runtime.pipeline;
  if (pipeline) {
    server.registerTool(
      "conversation_turn",
      {
        title: "Conversation turn",
        description: "Runs one conversation turn through the gates, the router and the selector.",
        inputSchema: ConversationTurnInputShape,
      },
      async (input: unknown, extra) =>
        respond("conversation_turn", async () => {
          const parsed = ConversationTurnInputSchema.parse(input);
          if (parsed.reset) {
            runtime.sessions.reset(parsed.conversation_id);
          }
          const session = runtime.sessions.get(parsed.conversation_id);
          const result = await pipeline.run({
            text: parsed.text,
            history: session.history,
            conversationStarted: session.conversationStarted,
            conversationId: parsed.conversation_id,
            signal: extra.signal,
          });
          runtime.sessions.record(parsed.conversation_id, parsed.text, result);
          return {
            outcome: result.outcome,
            conversation_started: result.conversationStarted,
            registry_version: result.registryVersion,
            trace: result.trace,
          };
        }),
    );
  }

  return server;
}
