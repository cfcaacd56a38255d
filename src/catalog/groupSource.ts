import { readdir, readFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { CatalogLoadError } from "../errors.js";
import type { ActionDefinition, ActionHandler } from "../executor/types.js";
import { actionDescriptorSchema, type ActionDescriptor } from "./descriptor.js";

/**
 * Provider of one group's actions. `reloadGroup` calls {@link load} again and
 * swaps the result in, so file-backed sources pick up edits without restart.
 */
export interface ActionGroupSource {
  readonly group: string;
  /** Human-readable origin reported by the management surface. */
  readonly origin: string;
  load(): Promise<ActionDefinition[]>;
}

/** Builds the handler of a descriptor loaded from a file, if it has one. */
export type HandlerFactory = (descriptor: ActionDescriptor) => ActionHandler | undefined;

/** Source returning definitions produced in process (tests, embedders of the library). */
export class StaticGroupSource implements ActionGroupSource {
  public readonly origin: string;

  constructor(
    public readonly group: string,
    private readonly provide: () => ActionDefinition[] | Promise<ActionDefinition[]>,
  ) {
    this.origin = `static:${group}`;
  }

  async load(): Promise<ActionDefinition[]> {
    return [...(await this.provide())];
  }
}

const groupFileSchema = z
  .object({
    group: z.string().trim().min(1).optional(),
    actions: z.array(z.unknown()).default([]),
  })
  .strict();

const CATALOG_EXTENSIONS = new Set([".yaml", ".yml", ".json"]);

/**
 * YAML (or JSON) catalog file holding one group. The group name is the file's
 * base name; a `group:` key, when present, must agree with it.
 */
export class FileGroupSource implements ActionGroupSource {
  public readonly group: string;

  constructor(
    public readonly origin: string,
    private readonly handlerFactory?: HandlerFactory,
  ) {
    this.group = basename(origin, extname(origin));
  }

  async load(): Promise<ActionDefinition[]> {
    let raw: string;
    try {
      raw = await readFile(this.origin, "utf8");
    } catch (error) {
      throw new CatalogLoadError(`unable to read catalog file ${this.origin}`, { file: this.origin }, error);
    }

    let document: unknown;
    try {
      document = parseYaml(raw);
    } catch (error) {
      throw new CatalogLoadError(`catalog file ${this.origin} is not valid YAML`, { file: this.origin }, error);
    }

    const file = groupFileSchema.safeParse(document ?? {});
    if (!file.success) {
      throw new CatalogLoadError(`catalog file ${this.origin} has an invalid layout`, {
        file: this.origin,
        issues: file.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
    if (file.data.group !== undefined && file.data.group !== this.group) {
      throw new CatalogLoadError(`catalog file ${this.origin} declares group "${file.data.group}"`, {
        file: this.origin,
        expected: this.group,
      });
    }

    return file.data.actions.map((entry, position) => {
      const parsed = actionDescriptorSchema.safeParse(entry);
      if (!parsed.success) {
        throw new CatalogLoadError(`action #${position} of ${this.origin} is invalid`, {
          file: this.origin,
          position,
          issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
        });
      }
      const handler = this.handlerFactory?.(parsed.data);
      return handler ? { descriptor: parsed.data, handler } : { descriptor: parsed.data };
    });
  }
}

/** Lists one {@link FileGroupSource} per catalog file in {@link directory}, sorted by name. */
export async function discoverGroupSources(
  directory: string,
  handlerFactory?: HandlerFactory,
): Promise<FileGroupSource[]> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    throw new CatalogLoadError(`unable to list catalog directory ${directory}`, { directory }, error);
  }
  return entries
    .filter((entry) => CATALOG_EXTENSIONS.has(extname(entry).toLowerCase()))
    .sort()
    .map((entry) => new FileGroupSource(join(directory, entry), handlerFactory));
}
