import { z } from "zod";

import { CollaboratorUnavailableError } from "../errors.js";
import { postJson } from "../infra/httpJson.js";
import type {
  ActionCall,
  ActionSelector,
  ChatMessage,
  GenerationRequest,
  Generator,
  SelectionRequest,
  SelectorDecision,
} from "../pipeline/types.js";
import type { Candidate } from "../router/candidateRouter.js";

/** Control functions offered next to the candidates. Action names cannot start with `_`. */
export const CONTROL_FUNCTIONS = {
  search: "__search_actions",
  clarify: "__ask_user",
  decline: "__decline_request",
} as const;

const DEFAULT_SELECTOR_INSTRUCTION = [
  "You answer customer questions using only the functions offered in this request.",
  "Call a function only when its description fits the request; pass only values the user actually gave.",
  "When a function needs information the user has not provided, call __ask_user with a short question instead of guessing.",
  "When no offered function fits, you may call __search_actions with a clearer query.",
  "When the request is outside the supported domain, call __decline_request.",
  "Otherwise answer in the user's language, using the function results you received.",
].join("\n");

const toolCallSchema = z.object({
  id: z.string().optional(),
  type: z.string().optional(),
  function: z.object({ name: z.string().min(1), arguments: z.string().default("{}") }),
});

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z.array(toolCallSchema).nullable().optional(),
        }),
      }),
    )
    .min(1),
});

type ChatResponseMessage = z.infer<typeof chatResponseSchema>["choices"][number]["message"];

const argumentsSchema = z.record(z.string(), z.unknown());

export interface ChatCompletionsClientOptions {
  /** Base URL of the API, e.g. `http://localhost:8000/v1/`. */
  readonly baseUrl: string;
  readonly model: string;
  readonly apiKey?: string | null;
  readonly temperature: number;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  /** System prompt of the selector; the default suits a support assistant. */
  readonly selectorInstruction?: string;
  readonly fetchImpl?: typeof fetch;
}

interface WireMessage {
  readonly role: "system" | "user" | "assistant";
  readonly content: string;
}

/**
 * Client of an OpenAI-compatible `/chat/completions` endpoint acting as the
 * pipeline's selector (function calling over the routed candidates) and as
 * the rewriter's generator.
 */
export class ChatCompletionsClient implements ActionSelector, Generator {
  private readonly endpoint: URL;
  private readonly selectorInstruction: string;

  constructor(private readonly options: ChatCompletionsClientOptions) {
    const base = options.baseUrl.endsWith("/") ? options.baseUrl : `${options.baseUrl}/`;
    this.endpoint = new URL("chat/completions", base);
    this.selectorInstruction = options.selectorInstruction ?? DEFAULT_SELECTOR_INSTRUCTION;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const message = await this.complete(
      "generator",
      { messages: [{ role: "system", content: request.system }, ...request.messages.map(toWire)] },
      request.signal,
    );
    return message.content ?? "";
  }

  async select(request: SelectionRequest): Promise<SelectorDecision> {
    const messages: WireMessage[] = [
      { role: "system", content: this.selectorInstruction },
      ...request.history.map(toWire),
      { role: "user", content: request.originalQuery },
    ];
    if (request.query !== request.originalQuery) {
      messages.push({ role: "system", content: `Standalone form of the last question: ${request.query}` });
    }
    if (request.retrievalMiss) {
      messages.push({ role: "system", content: "No function matched this request closely." });
    }
    if (request.observations.length > 0) {
      messages.push({ role: "system", content: `Function results so far: ${JSON.stringify(request.observations)}` });
    }
    if (request.rejectedAnswer !== null) {
      messages.push({ role: "assistant", content: request.rejectedAnswer });
    }
    if (request.repairHint) {
      messages.push({ role: "system", content: request.repairHint });
    }

    const message = await this.complete(
      "selector",
      { messages, tools: [...request.candidates.map(toFunctionTool), ...controlTools()], tool_choice: "auto" },
      request.signal,
    );
    return toDecision(message);
  }

  private async complete(
    collaborator: "selector" | "generator",
    body: Record<string, unknown>,
    signal: AbortSignal | undefined,
  ): Promise<ChatResponseMessage> {
    let payload: unknown;
    try {
      payload = await postJson(
        this.endpoint,
        { model: this.options.model, temperature: this.options.temperature, ...body },
        {
          timeoutMs: this.options.timeoutMs,
          maxRetries: this.options.maxRetries,
          bearerToken: this.options.apiKey ?? null,
          ...(signal ? { signal } : {}),
          ...(this.options.fetchImpl ? { fetchImpl: this.options.fetchImpl } : {}),
        },
      );
    } catch (error) {
      throw new CollaboratorUnavailableError(collaborator, "chat completions endpoint unavailable", error);
    }

    const parsed = chatResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new CollaboratorUnavailableError(collaborator, "chat completions payload did not match the expected schema");
    }
    return parsed.data.choices[0].message;
  }
}

function toWire(message: ChatMessage): WireMessage {
  return { role: message.role, content: message.content };
}

function toFunctionTool(candidate: Candidate): Record<string, unknown> {
  const description = [candidate.purpose, ...candidate.notes].filter((part) => part.length > 0).join("\n");
  return {
    type: "function",
    function: {
      name: candidate.name,
      description,
      parameters: {
        type: "object",
        properties: Object.fromEntries(
          candidate.inputs.map((input) => [input.name, { type: "string", description: input.description }]),
        ),
        required: candidate.inputs.filter((input) => input.required).map((input) => input.name),
      },
    },
  };
}

function controlTools(): Array<Record<string, unknown>> {
  const single = (name: string, description: string, field: string): Record<string, unknown> => ({
    type: "function",
    function: {
      name,
      description,
      parameters: { type: "object", properties: { [field]: { type: "string" } }, required: [field] },
    },
  });
  return [
    single(CONTROL_FUNCTIONS.search, "Search the catalog again with a clearer query.", "query"),
    single(CONTROL_FUNCTIONS.clarify, "Ask the user for missing information.", "question"),
    single(CONTROL_FUNCTIONS.decline, "Decline a request outside the supported domain.", "reason"),
  ];
}

/** Maps a completion message to a decision; control functions take precedence over action calls. */
export function toDecision(message: ChatResponseMessage): SelectorDecision {
  const calls: ActionCall[] = (message.tool_calls ?? []).map((call) => ({
    name: call.function.name,
    args: parseArguments(call.function.name, call.function.arguments),
  }));

  const control = (name: string): ActionCall | undefined => calls.find((call) => call.name === name);
  const declined = control(CONTROL_FUNCTIONS.decline);
  if (declined) {
    return { kind: "decline", reason: stringArgument(declined, "reason") };
  }
  const clarify = control(CONTROL_FUNCTIONS.clarify);
  if (clarify) {
    return { kind: "clarify", question: stringArgument(clarify, "question") };
  }
  const search = control(CONTROL_FUNCTIONS.search);
  if (search) {
    return { kind: "search", query: stringArgument(search, "query") };
  }
  if (calls.length > 0) {
    return { kind: "execute", calls };
  }
  return { kind: "final", text: message.content ?? "" };
}

function parseArguments(name: string, raw: string): Record<string, unknown> {
  let value: unknown;
  try {
    value = JSON.parse(raw.trim().length === 0 ? "{}" : raw);
  } catch (error) {
    throw new CollaboratorUnavailableError("selector", `arguments of ${name} are not valid JSON`, error);
  }
  const parsed = argumentsSchema.safeParse(value);
  if (!parsed.success) {
    throw new CollaboratorUnavailableError("selector", `arguments of ${name} are not an object`);
  }
  return parsed.data;
}

function stringArgument(call: ActionCall, field: string): string {
  const value = call.args[field];
  return typeof value === "string" ? value : "";
}
