import { CollaboratorUnavailableError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { ChatMessage, Generator } from "../pipeline/types.js";

export type RewriteReason = "long_query" | "no_history" | "too_short" | "rewritten" | "unchanged";

export interface RewriteResult {
  readonly text: string;
  readonly rewritten: boolean;
  readonly reason: RewriteReason;
}

export interface ContextRewriterOptions {
  readonly generator: Generator;
  readonly logger: StructuredLogger;
  /** Trimmed inputs shorter than this are rewrite candidates. */
  readonly maxChars: number;
  /** Prior messages handed to the generator. */
  readonly contextMessages: number;
}

/** Single characters that answer a question the assistant just asked. */
const MEANINGFUL_SINGLE_CHARACTERS = new Set(["네", "예", "응", "M", "F", "남", "여"]);

const REWRITE_INSTRUCTION = [
  "You clarify follow-up questions in a customer support conversation.",
  "Rewrite the user's short or context-dependent follow-up into one complete, self-contained question, using the previous messages.",
  "Rules:",
  "- Output only the rewritten question on a single line.",
  "- No explanations, quotes or numbering.",
  "- Keep the original intent and language.",
  "- If no rewrite is needed, output the original text unchanged.",
  "- When the assistant asked for a detail (age, gender, product) and the user answered briefly, merge that answer into the earlier request.",
].join("\n");

const QUOTE_CHARACTERS = /^["'「」“”‘’]+|["'「」“”‘’]+$/gu;

/**
 * Turns short elliptical follow-ups into standalone questions so retrieval
 * sees the subject of the conversation. Long queries and first turns pass
 * through without a generator call.
 */
export class ContextRewriter {
  private readonly generator: Generator;
  private readonly logger: StructuredLogger;
  private readonly maxChars: number;
  private readonly contextMessages: number;

  constructor(options: ContextRewriterOptions) {
    this.generator = options.generator;
    this.logger = options.logger;
    this.maxChars = options.maxChars;
    this.contextMessages = options.contextMessages;
  }

  async maybeRewrite(text: string, recentTurns: readonly ChatMessage[], signal?: AbortSignal): Promise<RewriteResult> {
    const trimmed = text.trim();
    const length = Array.from(trimmed).length;
    if (length >= this.maxChars) {
      return { text, rewritten: false, reason: "long_query" };
    }
    if (recentTurns.length === 0) {
      return { text, rewritten: false, reason: "no_history" };
    }
    if (length <= 1 && !MEANINGFUL_SINGLE_CHARACTERS.has(trimmed)) {
      return { text: trimmed, rewritten: false, reason: "too_short" };
    }

    const messages: ChatMessage[] = [
      ...recentTurns.slice(-this.contextMessages),
      { role: "user", content: `Rewrite this follow-up as a standalone question using the conversation above: 「${trimmed}」` },
    ];

    let reply: string;
    try {
      reply = await this.generator.generate({ system: REWRITE_INSTRUCTION, messages, signal });
    } catch (error) {
      if (error instanceof CollaboratorUnavailableError) {
        throw error;
      }
      throw new CollaboratorUnavailableError("generator", "query rewrite failed", error);
    }

    const candidate = cleanReply(reply);
    if (candidate.length === 0 || candidate === trimmed) {
      return { text, rewritten: false, reason: "unchanged" };
    }
    this.logger.info("query_rewritten", { original: trimmed, rewritten: candidate });
    return { text: candidate, rewritten: true, reason: "rewritten" };
  }
}

/** First non-empty line of {@link reply}, without surrounding quotes. */
export function cleanReply(reply: string): string {
  const line = reply
    .split(/\r?\n/)
    .map((entry) => entry.trim())
    .find((entry) => entry.length > 0);
  return (line ?? "").replace(QUOTE_CHARACTERS, "").trim();
}
