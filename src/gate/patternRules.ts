import { gatePatternRuleSchema, loadGatePatterns, type GatePatternRule, type GatePatternRuleInput } from "../config/dataFiles.js";
import { GatePatternError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";

/** Rule compiled once, at replacement time. */
export interface CompiledPatternRule {
  readonly id: string;
  readonly category: string;
  readonly source: string;
  readonly regex: RegExp;
}

export interface PatternMatch {
  readonly id: string;
  readonly category: string;
}

/**
 * Ordered, hot-swappable rule list of the pattern layer. A replacement is
 * compiled completely before it is published: one invalid rule rejects the
 * whole set and the previous list stays active.
 */
export class PatternRuleSet {
  private compiled: readonly CompiledPatternRule[] = [];
  private revision = 0;

  constructor(
    private readonly logger: StructuredLogger,
    private readonly sourceFile: string | null = null,
  ) {}

  /** Number of successful replacements so far. */
  get version(): number {
    return this.revision;
  }

  get size(): number {
    return this.compiled.length;
  }

  rules(): readonly CompiledPatternRule[] {
    return this.compiled;
  }

  /** First rule matching {@link text}, in declaration order. */
  match(text: string): PatternMatch | null {
    const rules = this.compiled;
    for (const rule of rules) {
      if (rule.regex.test(text)) {
        return { id: rule.id, category: rule.category };
      }
    }
    return null;
  }

  replace(rules: readonly GatePatternRuleInput[]): number {
    const next = rules.map((input, position) => compileRule(input, position));
    const seen = new Set<string>();
    for (const rule of next) {
      if (seen.has(rule.id)) {
        throw new GatePatternError(`duplicate gate rule id "${rule.id}"`, { id: rule.id });
      }
      seen.add(rule.id);
    }

    this.compiled = Object.freeze(next);
    this.revision += 1;
    this.logger.info("gate_patterns_replaced", { version: this.revision, rule_count: next.length });
    return next.length;
  }

  /** Re-reads the rule file given at construction and replaces the list. */
  async reloadFromFile(): Promise<number> {
    if (!this.sourceFile) {
      throw new GatePatternError("no gate pattern file is configured");
    }
    const rules = await loadGatePatterns(this.sourceFile);
    return this.replace(rules);
  }
}

function compileRule(input: GatePatternRuleInput, position: number): CompiledPatternRule {
  const parsed = gatePatternRuleSchema.safeParse(input);
  if (!parsed.success) {
    throw new GatePatternError(`gate rule #${position} is invalid`, {
      position,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  const rule: GatePatternRule = parsed.data;
  try {
    return { id: rule.id, category: rule.category, source: rule.pattern, regex: new RegExp(rule.pattern, rule.flags) };
  } catch (error) {
    throw new GatePatternError(`gate rule "${rule.id}" does not compile`, { id: rule.id, pattern: rule.pattern }, error);
  }
}
