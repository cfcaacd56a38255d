import { readFile } from "node:fs/promises";
import { z } from "zod";

import { DataFileError } from "../errors.js";

const REGEX_FLAGS = /^[imsu]*$/;

/** One pattern-layer rule of the domain gate. */
export const gatePatternRuleSchema = z
  .object({
    id: z.string().trim().min(1),
    pattern: z.string().min(1),
    flags: z.string().regex(REGEX_FLAGS, "only the i, m, s and u flags are accepted").default("iu"),
    category: z.string().trim().min(1).default("injection"),
  })
  .strict();

export type GatePatternRule = z.infer<typeof gatePatternRuleSchema>;
export type GatePatternRuleInput = z.input<typeof gatePatternRuleSchema>;

export const gatePatternFileSchema = z.object({ rules: z.array(gatePatternRuleSchema) }).strict();

/** Labelled reference utterance of the embedding layer. */
export const domainExampleSchema = z
  .object({
    text: z.string().trim().min(1),
    label: z.enum(["in", "out"]),
  })
  .strict();

export type DomainExample = z.infer<typeof domainExampleSchema>;

export const domainExamplesFileSchema = z.object({ examples: z.array(domainExampleSchema) }).strict();

const userMessagesSchema = z
  .object({
    /** Refusal for inputs rejected by the pattern layer. */
    rejected_pattern: z.string().min(1),
    /** Refusal for inputs classified as out of domain. */
    rejected_out_of_domain: z.string().min(1),
    /** Answer used when the selector declines a turn. */
    declined: z.string().min(1),
    /** `{fields}` is replaced by the comma-separated missing inputs. */
    needs_input: z.string().includes("{fields}"),
    /** Answer returned after a second output policy violation. */
    safe_fallback: z.string().min(1),
    /** Answer for every other turn failure. */
    generic_apology: z.string().min(1),
    /** `{reasons}` is replaced by the violation reasons. */
    repair_hint: z.string().includes("{reasons}"),
  })
  .strict();

/** Output gate policy: checks, scrubbing, disclaimers and user-facing templates. */
export const outputPolicySchema = z
  .object({
    pii: z.array(z.object({ label: z.string().min(1), pattern: z.string().min(1) }).strict()).default([]),
    forbidden: z.array(z.object({ phrase: z.string().trim().min(1), reason: z.string().min(1) }).strict()).default([]),
    internal_identifiers: z.array(z.string().min(1)).default([]),
    disclaimers: z
      .array(z.object({ actions: z.array(z.string().min(1)).min(1), text: z.string().trim().min(1) }).strict())
      .default([]),
    messages: userMessagesSchema,
  })
  .strict();

export type OutputPolicy = z.infer<typeof outputPolicySchema>;
export type OutputPolicyInput = z.input<typeof outputPolicySchema>;
export type UserMessages = OutputPolicy["messages"];

/** Reads a JSON data file and validates it against {@link schema}. */
export async function loadJsonDataFile<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.output<S>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new DataFileError(`unable to read data file ${path}`, { file: path }, error);
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new DataFileError(`data file ${path} is not valid JSON`, { file: path }, error);
  }

  const parsed = schema.safeParse(document);
  if (!parsed.success) {
    throw new DataFileError(`data file ${path} failed validation`, {
      file: path,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export function loadGatePatterns(path: string): Promise<GatePatternRule[]> {
  return loadJsonDataFile(path, gatePatternFileSchema).then((file) => file.rules);
}

export function loadDomainExamples(path: string): Promise<DomainExample[]> {
  return loadJsonDataFile(path, domainExamplesFileSchema).then((file) => file.examples);
}

export function loadOutputPolicy(path: string): Promise<OutputPolicy> {
  return loadJsonDataFile(path, outputPolicySchema);
}
