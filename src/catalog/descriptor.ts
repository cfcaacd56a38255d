import { createHash } from "node:crypto";
import { z } from "zod";

/** Action names are snake_case identifiers so they can be scrubbed from answers. */
export const ACTION_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

/** Declared input of an action (its machine-checkable contract). */
export interface ActionInput {
  readonly name: string;
  readonly description: string;
  readonly required: boolean;
}

/**
 * Retrieval and selection metadata of one action. The executable side lives in
 * the registry's handler table, not here.
 */
export interface ActionDescriptor {
  /** Unique, immutable key. */
  readonly name: string;
  /** One sentence, embedded as its own document. */
  readonly purpose: string;
  /** Example utterances; each one is embedded as a separate document. */
  readonly usagePhrases: readonly string[];
  /**
   * Hints distinguishing this action from neighbours. Never embedded: they only
   * reach the selector next to the ranked candidates.
   */
  readonly disambiguationNotes: readonly string[];
  /** Short keywords embedded together as one document. */
  readonly tags: readonly string[];
  readonly inputs: readonly ActionInput[];
  /** Remote endpoint invoked by the HTTP action handler, when declared. */
  readonly endpoint: string | null;
}

const trimmedList = z
  .array(z.string())
  .default([])
  .transform((items) => items.map((item) => item.trim()).filter((item) => item.length > 0));

/** Descriptor as written in catalog and override files (snake_case keys). */
export const actionDescriptorFileSchema = z
  .object({
    name: z.string().trim().regex(ACTION_NAME_PATTERN, "action names must be snake_case identifiers"),
    purpose: z.string().default("").transform((value) => value.trim()),
    usage_phrases: trimmedList,
    disambiguation_notes: trimmedList,
    tags: trimmedList,
    inputs: z
      .array(
        z.object({
          name: z.string().trim().min(1),
          description: z.string().trim().default(""),
          required: z.boolean().default(true),
        }),
      )
      .default([]),
    endpoint: z.string().url().nullable().default(null),
  })
  .strict();

/** File shape with every default applied. */
export type ActionDescriptorFile = z.output<typeof actionDescriptorFileSchema>;

/** Parses the file shape into an {@link ActionDescriptor}. */
export const actionDescriptorSchema = actionDescriptorFileSchema.transform(
  (raw): ActionDescriptor => ({
    name: raw.name,
    purpose: raw.purpose,
    usagePhrases: raw.usage_phrases,
    disambiguationNotes: raw.disambiguation_notes,
    tags: Array.from(new Set(raw.tags.map((tag) => tag.toLowerCase()))),
    inputs: raw.inputs,
    endpoint: raw.endpoint,
  }),
);

export type ActionDescriptorInput = z.input<typeof actionDescriptorSchema>;

/** Converts a descriptor back to the catalog file shape (used by the override store). */
export function toDescriptorFile(descriptor: ActionDescriptor): ActionDescriptorFile {
  return {
    name: descriptor.name,
    purpose: descriptor.purpose,
    usage_phrases: [...descriptor.usagePhrases],
    disambiguation_notes: [...descriptor.disambiguationNotes],
    tags: [...descriptor.tags],
    inputs: descriptor.inputs.map((input) => ({ ...input })),
    endpoint: descriptor.endpoint,
  };
}

/** Kinds of embeddable documents derived from a descriptor. */
export type IndexDocumentKind = "purpose" | "usage" | "tags";

/** One embeddable unit owned by an action. */
export interface IndexDocument {
  readonly id: string;
  readonly action: string;
  readonly kind: IndexDocumentKind;
  /** Position of the usage phrase; 0 for purpose and tags documents. */
  readonly ordinal: number;
  readonly text: string;
}

/**
 * Hash over the indexable fields only. Editing disambiguation notes, inputs or
 * the endpoint does not force a re-embedding.
 */
export function contentHash(descriptor: ActionDescriptor): string {
  return createHash("sha256")
    .update(JSON.stringify([descriptor.purpose, descriptor.usagePhrases, descriptor.tags]))
    .digest("hex");
}

/**
 * Derives the documents of {@link descriptor}. Ids embed a prefix of the
 * content hash so documents of two revisions of one action never collide.
 */
export function deriveDocuments(descriptor: ActionDescriptor, hash: string = contentHash(descriptor)): IndexDocument[] {
  const prefix = `${descriptor.name}::${hash.slice(0, 12)}`;
  const documents: IndexDocument[] = [];
  if (descriptor.purpose.length > 0) {
    documents.push({ id: `${prefix}::purpose`, action: descriptor.name, kind: "purpose", ordinal: 0, text: descriptor.purpose });
  }
  descriptor.usagePhrases.forEach((phrase, ordinal) => {
    documents.push({ id: `${prefix}::usage:${ordinal}`, action: descriptor.name, kind: "usage", ordinal, text: phrase });
  });
  if (descriptor.tags.length > 0) {
    documents.push({ id: `${prefix}::tags`, action: descriptor.name, kind: "tags", ordinal: 0, text: descriptor.tags.join(" ") });
  }
  return documents;
}

/** Canonical form used to detect duplicate usage phrases across actions. */
export function normalisePhrase(phrase: string): string {
  return phrase.normalize("NFKC").toLowerCase().replace(/\s+/g, " ").trim();
}
