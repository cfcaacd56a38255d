import { EventEmitter } from "node:events";

import type { ActionDescriptor } from "../catalog/descriptor.js";
import type { ActionGroupSource } from "../catalog/groupSource.js";
import { findNearDuplicatePhrases, suggestActionName, validateCatalog } from "../catalog/validation.js";
import { RegistryInconsistencyError, describeError } from "../errors.js";
import type { ActionDefinition, ActionHandler } from "../executor/types.js";
import type { StructuredLogger } from "../logger.js";
import { deepFreeze } from "../utils/object.js";

/** Entry of the live catalog: descriptor plus the handler serving it. */
export interface RegisteredAction {
  readonly descriptor: ActionDescriptor;
  readonly group: string;
  readonly handler: ActionHandler | null;
}

/**
 * Immutable view of the catalog at one version. Snapshots are replaced by
 * reference on every mutation, never edited in place.
 */
export interface RegistrySnapshot {
  readonly version: number;
  readonly actions: ReadonlyMap<string, RegisteredAction>;
  /** Group name → action names, in registration order. */
  readonly groups: ReadonlyMap<string, readonly string[]>;
}

export type RegistryMutationKind = "register" | "unregister" | "update" | "reload";

/** Payload of the `change` event, emitted once per version bump. */
export interface RegistryChange {
  readonly version: number;
  readonly kind: RegistryMutationKind;
  readonly group: string | null;
  /** Actions added or modified by the mutation. */
  readonly changed: readonly string[];
  readonly removed: readonly string[];
}

/** Report returned to management callers after a successful mutation. */
export interface MutationResult {
  readonly version: number;
  readonly actionCount: number;
  readonly changed: readonly string[];
  readonly removed: readonly string[];
}

export interface ActionRegistryOptions {
  readonly logger: StructuredLogger;
}

const EMPTY_SNAPSHOT: RegistrySnapshot = deepFreeze({
  version: 0,
  actions: new Map<string, RegisteredAction>(),
  groups: new Map<string, readonly string[]>(),
});

/**
 * Mutable, versioned catalog of servable actions.
 *
 * Every mutation runs on a single promise queue: validation happens inside the
 * serialized step against the state left by the previous mutation, and a
 * failed step leaves both the snapshot and the version untouched. Successful
 * steps increment the version by exactly one and emit one `change` event.
 */
export class ActionRegistry extends EventEmitter {
  private current: RegistrySnapshot = EMPTY_SNAPSHOT;
  private mutationQueue: Promise<void> = Promise.resolve();
  private readonly sources = new Map<string, ActionGroupSource>();
  private readonly logger: StructuredLogger;

  constructor(options: ActionRegistryOptions) {
    super();
    this.logger = options.logger;
  }

  get version(): number {
    return this.current.version;
  }

  /** Latest committed snapshot. Callers must not cache it across awaits. */
  snapshot(): RegistrySnapshot {
    return this.current;
  }

  /** Subscribes to version bumps; returns the unsubscribe function. */
  onChange(listener: (change: RegistryChange) => void): () => void {
    this.on("change", listener);
    return () => {
      this.off("change", listener);
    };
  }

  /** Declares where `reloadGroup(source.group)` reads its actions from. */
  addSource(source: ActionGroupSource): void {
    this.sources.set(source.group, source);
  }

  /** Groups with a declared source. */
  listSources(): ActionGroupSource[] {
    return Array.from(this.sources.values());
  }

  /**
   * Adds {@link definitions} to {@link group}. Names already registered under
   * the same group are replaced; names owned by another group are rejected.
   */
  register(group: string, definitions: readonly ActionDefinition[]): Promise<MutationResult> {
    return this.enqueue(() => {
      const batch = definitions.map((definition) => definition.descriptor);
      validateCatalog(batch);
      const actions = new Map(this.current.actions);
      for (const definition of definitions) {
        this.assertOwnership(definition.descriptor.name, group);
        actions.set(definition.descriptor.name, toRegistered(definition, group));
      }
      return this.commit("register", group, actions, batch.map((descriptor) => descriptor.name), []);
    });
  }

  /** Removes one action; its index documents disappear on the next sync. */
  unregister(name: string): Promise<MutationResult> {
    return this.enqueue(() => {
      const existing = this.requireAction(name);
      const actions = new Map(this.current.actions);
      actions.delete(name);
      return this.commit("unregister", existing.group, actions, [], [name]);
    });
  }

  /** Replaces the descriptor of a registered action, keeping its group and handler. */
  update(descriptor: ActionDescriptor): Promise<MutationResult> {
    return this.enqueue(() => {
      const existing = this.requireAction(descriptor.name);
      const actions = new Map(this.current.actions);
      actions.set(descriptor.name, { ...existing, descriptor });
      return this.commit("update", existing.group, actions, [descriptor.name], []);
    });
  }

  /**
   * Re-reads the source of {@link group} and swaps its descriptors and handlers
   * in a single step. Actions missing from the new load are removed.
   */
  reloadGroup(group: string): Promise<MutationResult> {
    return this.enqueueAsync(async () => {
      const source = this.sources.get(group);
      if (!source) {
        throw new RegistryInconsistencyError("unknown_group", `group "${group}" has no registered source`, {
          group,
          known: Array.from(this.sources.keys()),
        });
      }
      const definitions = await source.load();
      validateCatalog(definitions.map((definition) => definition.descriptor));

      const previous = this.current.groups.get(group) ?? [];
      const actions = new Map(this.current.actions);
      for (const name of previous) {
        actions.delete(name);
      }
      for (const definition of definitions) {
        this.assertOwnership(definition.descriptor.name, group);
        actions.set(definition.descriptor.name, toRegistered(definition, group));
      }
      const loaded = new Set(definitions.map((definition) => definition.descriptor.name));
      const removed = previous.filter((name) => !loaded.has(name));
      return this.commit("reload", group, actions, Array.from(loaded), removed);
    });
  }

  /** Loads every declared source once (startup). */
  async loadAllSources(): Promise<MutationResult[]> {
    const results: MutationResult[] = [];
    for (const group of this.sources.keys()) {
      results.push(await this.reloadGroup(group));
    }
    return results;
  }

  private enqueue(step: () => MutationResult): Promise<MutationResult> {
    return this.enqueueAsync(async () => step());
  }

  private enqueueAsync(step: () => Promise<MutationResult>): Promise<MutationResult> {
    const run = this.mutationQueue.then(step);
    // Keep the queue alive after a rejected step; the caller receives the rejection.
    this.mutationQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private assertOwnership(name: string, group: string): void {
    const existing = this.current.actions.get(name);
    if (existing && existing.group !== group) {
      throw new RegistryInconsistencyError(
        "duplicate_name",
        `action "${name}" is already registered by group "${existing.group}"`,
        { action: name, group, owner: existing.group },
      );
    }
  }

  private requireAction(name: string): RegisteredAction {
    const existing = this.current.actions.get(name);
    if (!existing) {
      const suggestion = suggestActionName(name, this.current.actions.keys());
      throw new RegistryInconsistencyError("unknown_action", `action "${name}" is not registered`, {
        action: name,
        ...(suggestion ? { suggestion } : {}),
      });
    }
    return existing;
  }

  private commit(
    kind: RegistryMutationKind,
    group: string | null,
    actions: Map<string, RegisteredAction>,
    changed: readonly string[],
    removed: readonly string[],
  ): MutationResult {
    validateCatalog(Array.from(actions.values(), (entry) => entry.descriptor));

    const groups = new Map<string, string[]>();
    for (const [name, entry] of actions) {
      const members = groups.get(entry.group) ?? [];
      members.push(name);
      groups.set(entry.group, members);
    }

    const next: RegistrySnapshot = deepFreeze({ version: this.current.version + 1, actions, groups });
    this.current = next;

    const change: RegistryChange = { version: next.version, kind, group, changed: [...changed], removed: [...removed] };
    this.logger.info("registry_mutated", {
      version: change.version,
      kind,
      group,
      changed: change.changed,
      removed: change.removed,
      action_count: actions.size,
    });
    this.warnNearDuplicates(changed);

    try {
      this.emit("change", change);
    } catch (error) {
      // A faulty listener must not turn a committed mutation into a failure.
      this.logger.error("registry_listener_failed", { version: change.version, error: describeError(error) });
    }

    return { version: next.version, actionCount: actions.size, changed: change.changed, removed: change.removed };
  }

  private warnNearDuplicates(changed: readonly string[]): void {
    if (changed.length === 0) {
      return;
    }
    const touched = new Set(changed);
    const descriptors = Array.from(this.current.actions.values(), (entry) => entry.descriptor);
    for (const pair of findNearDuplicatePhrases(descriptors)) {
      if (touched.has(pair.left.action) || touched.has(pair.right.action)) {
        this.logger.warn("usage_phrase_near_duplicate", pair);
      }
    }
  }
}

function toRegistered(definition: ActionDefinition, group: string): RegisteredAction {
  return { descriptor: definition.descriptor, group, handler: definition.handler ?? null };
}
