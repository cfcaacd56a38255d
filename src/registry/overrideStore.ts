import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

import {
  actionDescriptorFileSchema,
  actionDescriptorSchema,
  toDescriptorFile,
  type ActionDescriptor,
  type ActionDescriptorFile,
} from "../catalog/descriptor.js";
import { suggestActionName } from "../catalog/validation.js";
import { OverrideStoreError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { isErrnoException } from "../nodePrimitives.js";
import { omitUndefinedEntries } from "../utils/object.js";
import type { ActionRegistry, MutationResult } from "./actionRegistry.js";

/** Published versions retained per action. */
export const MAX_OVERRIDE_HISTORY = 30;

/** Editable fields of a descriptor; the name never changes. */
export const descriptorPatchSchema = actionDescriptorFileSchema.omit({ name: true }).partial().strict();

export type DescriptorPatch = z.output<typeof descriptorPatchSchema>;
export type DescriptorPatchInput = z.input<typeof descriptorPatchSchema>;

const historyEntrySchema = z.object({
  version: z.number().int().min(1),
  timestamp: z.string(),
  data: actionDescriptorFileSchema,
  note: z.string(),
  previous: actionDescriptorFileSchema.nullable(),
});

export type OverrideHistoryEntry = z.output<typeof historyEntrySchema>;

const overrideEntrySchema = z.object({
  draft: descriptorPatchSchema.nullable().default(null),
  published: actionDescriptorFileSchema.nullable().default(null),
  history: z.array(historyEntrySchema).default([]),
});

type OverrideEntry = z.output<typeof overrideEntrySchema>;

const overrideFileSchema = z.object({ actions: z.record(z.string(), overrideEntrySchema).default({}) });

export interface OverrideStatus {
  readonly name: string;
  /** `override` once a version was published, `catalog` otherwise. */
  readonly source: "override" | "catalog";
  readonly hasDraft: boolean;
  readonly draft: DescriptorPatch | null;
  /** Latest published override version, 0 when none. */
  readonly version: number;
  readonly historyCount: number;
}

export interface PublishResult {
  readonly name: string;
  readonly overrideVersion: number;
  readonly mutation: MutationResult;
}

export interface DescriptorOverrideStoreOptions {
  readonly filePath: string;
  readonly registry: ActionRegistry;
  readonly logger: StructuredLogger;
  readonly clock?: () => Date;
}

/**
 * Draft / publish / rollback workflow for descriptor edits made at runtime.
 * A draft never reaches the registry; publishing applies the merged
 * descriptor through {@link ActionRegistry.update} (which re-indexes the
 * action) and records the version. The state lives in one JSON file written
 * through a temporary file and a rename.
 */
export class DescriptorOverrideStore {
  private entries = new Map<string, OverrideEntry>();
  private queue: Promise<void> = Promise.resolve();
  private readonly filePath: string;
  private readonly registry: ActionRegistry;
  private readonly logger: StructuredLogger;
  private readonly clock: () => Date;

  constructor(options: DescriptorOverrideStoreOptions) {
    this.filePath = options.filePath;
    this.registry = options.registry;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Creates a store and loads the existing file, if any. */
  static async open(options: DescriptorOverrideStoreOptions): Promise<DescriptorOverrideStore> {
    const store = new DescriptorOverrideStore(options);
    await store.load();
    return store;
  }

  /** Names with a draft, a published override or history. */
  list(): OverrideStatus[] {
    return Array.from(this.entries.keys())
      .sort()
      .map((name) => this.status(name));
  }

  status(name: string): OverrideStatus {
    const entry = this.entries.get(name);
    const history = entry?.history ?? [];
    return {
      name,
      source: entry?.published ? "override" : "catalog",
      hasDraft: Boolean(entry?.draft),
      draft: entry?.draft ?? null,
      version: history.at(-1)?.version ?? 0,
      historyCount: history.length,
    };
  }

  history(name: string): OverrideHistoryEntry[] {
    return [...(this.entries.get(name)?.history ?? [])];
  }

  saveDraft(name: string, patch: DescriptorPatchInput): Promise<OverrideStatus> {
    return this.enqueue(async () => {
      this.requireRegistered(name);
      const parsed = descriptorPatchSchema.safeParse(patch);
      if (!parsed.success) {
        throw new OverrideStoreError(`draft for "${name}" is invalid`, {
          action: name,
          issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
        });
      }
      const entry = this.entryFor(name);
      this.entries.set(name, { ...entry, draft: omitUndefinedEntries(parsed.data) });
      await this.persist();
      this.logger.info("override_draft_saved", { action: name, fields: Object.keys(parsed.data) });
      return this.status(name);
    });
  }

  discardDraft(name: string): Promise<OverrideStatus> {
    return this.enqueue(async () => {
      const entry = this.entries.get(name);
      if (entry?.draft) {
        this.entries.set(name, { ...entry, draft: null });
        await this.persist();
      }
      return this.status(name);
    });
  }

  /** Applies the draft of {@link name} to the registry and records a new version. */
  publish(name: string, note?: string): Promise<PublishResult> {
    return this.enqueue(async () => {
      const entry = this.entries.get(name);
      if (!entry?.draft) {
        throw new OverrideStoreError(`no draft to publish for "${name}"`, { action: name });
      }
      const current = this.requireRegistered(name);
      const data = mergePatch(current, entry.draft);
      return this.apply(name, entry, data, (version) => note ?? `v${version} published`);
    });
  }

  /** Saves {@link patch} as the draft and publishes it in one step. */
  async publishDirect(name: string, patch: DescriptorPatchInput, note?: string): Promise<PublishResult> {
    await this.saveDraft(name, patch);
    return this.publish(name, note);
  }

  /** Re-publishes the data of an earlier version as a new version. */
  rollback(name: string, targetVersion: number): Promise<PublishResult> {
    return this.enqueue(async () => {
      const entry = this.entries.get(name);
      const target = entry?.history.find((item) => item.version === targetVersion);
      if (!entry || !target) {
        throw new OverrideStoreError(`version ${targetVersion} of "${name}" is not in the override history`, {
          action: name,
          version: targetVersion,
          known: entry?.history.map((item) => item.version) ?? [],
        });
      }
      this.requireRegistered(name);
      return this.apply(name, entry, { ...target.data, name }, () => `rollback to v${targetVersion}`);
    });
  }

  /**
   * Re-applies every published override whose action is registered. Called
   * after catalog loads, which replace descriptors with their file version.
   */
  applyAll(): Promise<number> {
    return this.enqueue(async () => {
      const snapshot = this.registry.snapshot();
      let applied = 0;
      for (const [name, entry] of this.entries) {
        if (!entry.published || !snapshot.actions.has(name)) {
          continue;
        }
        await this.registry.update(parseDescriptor(name, entry.published));
        applied += 1;
      }
      if (applied > 0) {
        this.logger.info("overrides_applied", { count: applied });
      }
      return applied;
    });
  }

  private async apply(
    name: string,
    entry: OverrideEntry,
    data: ActionDescriptorFile,
    describe: (version: number) => string,
  ): Promise<PublishResult> {
    const descriptor = parseDescriptor(name, data);
    const mutation = await this.registry.update(descriptor);

    const version = (entry.history.at(-1)?.version ?? 0) + 1;
    const history = [
      ...entry.history,
      { version, timestamp: this.clock().toISOString(), data, note: describe(version), previous: entry.published },
    ].slice(-MAX_OVERRIDE_HISTORY);
    this.entries.set(name, { draft: null, published: data, history });
    await this.persist();

    this.logger.info("override_published", { action: name, version, registry_version: mutation.version });
    return { name, overrideVersion: version, mutation };
  }

  private requireRegistered(name: string): ActionDescriptor {
    const entry = this.registry.snapshot().actions.get(name);
    if (!entry) {
      const suggestion = suggestActionName(name, this.registry.snapshot().actions.keys());
      throw new OverrideStoreError(`action "${name}" is not registered`, {
        action: name,
        ...(suggestion ? { suggestion } : {}),
      });
    }
    return entry.descriptor;
  }

  private entryFor(name: string): OverrideEntry {
    return this.entries.get(name) ?? { draft: null, published: null, history: [] };
  }

  private enqueue<T>(step: () => Promise<T>): Promise<T> {
    const run = this.queue.then(step);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        this.logger.info("override_file_missing", { file: this.filePath });
        return;
      }
      throw new OverrideStoreError(`unable to read ${this.filePath}`, { file: this.filePath }, error);
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new OverrideStoreError(`${this.filePath} is not valid JSON`, { file: this.filePath }, error);
    }
    const parsed = overrideFileSchema.safeParse(document);
    if (!parsed.success) {
      throw new OverrideStoreError(`${this.filePath} failed validation`, {
        file: this.filePath,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
    this.entries = new Map(Object.entries(parsed.data.actions));
    this.logger.info("overrides_loaded", { file: this.filePath, count: this.entries.size });
  }

  private async persist(): Promise<void> {
    const payload = { actions: Object.fromEntries(this.entries) };
    const tmpPath = `${this.filePath}.${randomUUID()}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
      await rename(tmpPath, this.filePath);
    } catch (error) {
      throw new OverrideStoreError(`unable to write ${this.filePath}`, { file: this.filePath }, error);
    }
  }
}

function mergePatch(current: ActionDescriptor, patch: DescriptorPatch): ActionDescriptorFile {
  return { ...toDescriptorFile(current), ...omitUndefinedEntries(patch), name: current.name };
}

function parseDescriptor(name: string, data: ActionDescriptorFile): ActionDescriptor {
  const parsed = actionDescriptorSchema.safeParse({ ...data, name });
  if (!parsed.success) {
    throw new OverrideStoreError(`override of "${name}" is not a valid descriptor`, {
      action: name,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return parsed.data;
}
