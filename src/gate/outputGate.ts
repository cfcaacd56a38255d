import { outputPolicySchema, type OutputPolicy, type OutputPolicyInput, type UserMessages } from "../config/dataFiles.js";
import { DataFileError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";

export type OutputViolationKind = "empty" | "pii" | "forbidden_phrase";

export interface OutputViolation {
  readonly kind: OutputViolationKind;
  /** Short reason handed back to the selector in the repair hint. */
  readonly reason: string;
}

export interface OutputVerdict {
  readonly ok: boolean;
  readonly violations: readonly OutputViolation[];
}

/** Marker introducing a disclaimer at the end of an answer. */
export const DISCLAIMER_MARKER = "※ ";

interface CompiledPolicy {
  readonly pii: ReadonlyArray<{ label: string; regex: RegExp }>;
  readonly forbidden: ReadonlyArray<{ phrase: string; reason: string; regex: RegExp }>;
  readonly internalIdentifiers: readonly RegExp[];
  readonly disclaimers: ReadonlyArray<{ actions: ReadonlySet<string>; text: string }>;
  readonly messages: UserMessages;
}

/**
 * Validates generated answers before they reach the caller and finalises the
 * ones that pass: internal identifiers are scrubbed and the disclaimer
 * matching the executed actions is appended.
 */
export class OutputGate {
  private policy: CompiledPolicy;

  constructor(
    policy: OutputPolicyInput,
    private readonly logger: StructuredLogger,
  ) {
    this.policy = compilePolicy(policy);
  }

  /** User-facing templates of the current policy. */
  get messages(): UserMessages {
    return this.policy.messages;
  }

  replacePolicy(policy: OutputPolicyInput): void {
    this.policy = compilePolicy(policy);
    this.logger.info("output_policy_replaced", {
      pii: this.policy.pii.length,
      forbidden: this.policy.forbidden.length,
      disclaimers: this.policy.disclaimers.length,
    });
  }

  check(text: string): OutputVerdict {
    if (text.trim().length === 0) {
      return { ok: false, violations: [{ kind: "empty", reason: "empty response" }] };
    }

    const violations: OutputViolation[] = [];
    for (const entry of this.policy.pii) {
      if (entry.regex.test(text)) {
        violations.push({ kind: "pii", reason: `response contains ${entry.label}` });
      }
    }
    for (const entry of this.policy.forbidden) {
      const match = entry.regex.exec(text);
      if (match) {
        violations.push({ kind: "forbidden_phrase", reason: `inappropriate wording "${match[0]}": ${entry.reason}` });
      }
    }
    return { ok: violations.length === 0, violations };
  }

  /** Instruction handed back to the selector after a violation. */
  repairHint(violations: readonly OutputViolation[]): string {
    const reasons = violations.map((violation) => violation.reason).join("; ");
    return this.policy.messages.repair_hint.replace("{reasons}", reasons);
  }

  /** First disclaimer whose trigger actions intersect {@link usedActions}. */
  selectDisclaimer(usedActions: Iterable<string>): string | null {
    const used = new Set(usedActions);
    for (const disclaimer of this.policy.disclaimers) {
      for (const action of disclaimer.actions) {
        if (used.has(action)) {
          return disclaimer.text;
        }
      }
    }
    return null;
  }

  /**
   * Removes registered action names and internal identifiers and collapses
   * the doubled spaces this leaves behind. Runs before {@link check}, so an
   * answer made only of identifiers fails as empty.
   */
  scrub(text: string, registeredNames: Iterable<string>): string {
    let cleaned = text;
    const names = Array.from(new Set(registeredNames)).sort((a, b) => b.length - a.length);
    if (names.length > 0) {
      cleaned = cleaned.replace(new RegExp(`\\b(?:${names.map(escapeRegExp).join("|")})\\b`, "g"), "");
    }
    for (const pattern of this.policy.internalIdentifiers) {
      cleaned = cleaned.replace(pattern, "");
    }
    return cleaned.replace(/ {2,}/g, " ").trim();
  }

  /** Scrubs {@link text}, then appends the disclaimer unless the answer already carries one. */
  finalise(text: string, usedActions: Iterable<string>, registeredNames: Iterable<string>): string {
    let cleaned = this.scrub(text, registeredNames);
    const disclaimer = this.selectDisclaimer(usedActions);
    if (disclaimer && !cleaned.includes(disclaimer) && !cleaned.includes(`\n${DISCLAIMER_MARKER}`)) {
      cleaned = `${cleaned.trimEnd()}\n\n${DISCLAIMER_MARKER}${disclaimer}`;
    }
    return cleaned;
  }
}

function compilePolicy(input: OutputPolicyInput): CompiledPolicy {
  const parsed = outputPolicySchema.safeParse(input);
  if (!parsed.success) {
    throw new DataFileError("output policy failed validation", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  const policy: OutputPolicy = parsed.data;
  return {
    pii: policy.pii.map((entry) => ({ label: entry.label, regex: compile(entry.pattern, "u") })),
    forbidden: policy.forbidden.map((entry) => ({
      phrase: entry.phrase,
      reason: entry.reason,
      regex: compile(entry.phrase.split(/\s+/).map(escapeRegExp).join("\\s*"), "iu"),
    })),
    internalIdentifiers: policy.internal_identifiers.map((pattern) => compile(pattern, "gu")),
    disclaimers: policy.disclaimers.map((entry) => ({ actions: new Set(entry.actions), text: entry.text })),
    messages: policy.messages,
  };
}

function compile(pattern: string, flags: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new DataFileError(`output policy pattern /${pattern}/ does not compile`, { pattern }, error);
  }
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
