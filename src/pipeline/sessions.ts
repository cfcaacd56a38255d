import type { ChatMessage, TurnResult } from "./types.js";

export interface ConversationSession {
  readonly id: string;
  readonly history: readonly ChatMessage[];
  readonly conversationStarted: boolean;
}

const DEFAULT_MAX_SESSIONS = 256;

/**
 * In-memory conversation history used by the management server's turn tool.
 * Histories are trimmed to the newest messages; the least recently used
 * session is evicted once {@link maxSessions} is reached.
 */
export class SessionStore {
  private readonly sessions = new Map<string, ConversationSession>();

  constructor(
    private readonly maxHistoryMessages: number,
    private readonly maxSessions: number = DEFAULT_MAX_SESSIONS,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  get(id: string): ConversationSession {
    return this.sessions.get(id) ?? { id, history: [], conversationStarted: false };
  }

  /** Appends the exchange of one turn and stores the follow-up flag it produced. */
  record(id: string, userText: string, result: TurnResult): ConversationSession {
    const previous = this.get(id);
    const history: ChatMessage[] = [
      ...previous.history,
      { role: "user", content: userText },
      { role: "assistant", content: result.outcome.text },
    ];
    const session: ConversationSession = {
      id,
      history: history.slice(-this.maxHistoryMessages),
      conversationStarted: result.conversationStarted,
    };

    this.sessions.delete(id);
    this.sessions.set(id, session);
    while (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) {
        break;
      }
      this.sessions.delete(oldest.value);
    }
    return session;
  }

  reset(id: string): boolean {
    return this.sessions.delete(id);
  }
}
