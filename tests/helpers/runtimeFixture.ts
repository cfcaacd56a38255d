import { fileURLToPath } from "node:url";

import { loadSettings } from "../../src/config/settings.js";
import type { ActionSelector, Generator } from "../../src/pipeline/types.js";
import { createToolgateRuntime, type ToolgateRuntime } from "../../src/runtime.js";
import { recordingHandler } from "./fakes.js";
import { RecordingLogger } from "./recordingLogger.js";

export const CONFIG_DIR = fileURLToPath(new URL("../../config", import.meta.url));
export const CATALOG_DIR = fileURLToPath(new URL("../../config/actions", import.meta.url));

export interface TestRuntimeOptions {
  readonly overridesFile?: string;
  readonly selector?: ActionSelector;
  readonly generator?: Generator;
}

/**
 * Runtime over the shipped catalog and data files, with the hashing embedder
 * and handlers answering `{ stub: <action> }` instead of calling endpoints.
 */
export async function createTestRuntime(
  options: TestRuntimeOptions = {},
): Promise<{ runtime: ToolgateRuntime; logger: RecordingLogger }> {
  const logger = new RecordingLogger();
  const settings = loadSettings({
    TOOLGATE_CATALOG_DIR: CATALOG_DIR,
    TOOLGATE_DATA_DIR: CONFIG_DIR,
    TOOLGATE_EMBEDDING_DIMENSIONS: "256",
    ...(options.overridesFile ? { TOOLGATE_OVERRIDES_FILE: options.overridesFile } : {}),
  });
  const runtime = await createToolgateRuntime(settings, {
    logger,
    handlerFactory: (descriptor) => recordingHandler({ stub: descriptor.name }),
    ...(options.selector ? { selector: options.selector } : {}),
    ...(options.generator ? { generator: options.generator } : {}),
  });
  return { runtime, logger };
}
