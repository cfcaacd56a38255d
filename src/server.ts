#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { loadSettings } from "./config/settings.js";
import { describeError } from "./errors.js";
import { StructuredLogger } from "./logger.js";
import { createManagementServer } from "./mcp/management.js";
import { createToolgateRuntime } from "./runtime.js";
import { applyServerOptions, parseServerOptions } from "./serverOptions.js";

export { createManagementServer } from "./mcp/management.js";
export { createToolgateRuntime } from "./runtime.js";

/**
 * Loads the catalog, the gate data and the index, then serves the management
 * tools over stdio. Logs go to stderr so stdout stays reserved for MCP.
 */
async function main(): Promise<void> {
  let settings;
  try {
    settings = applyServerOptions(loadSettings(), parseServerOptions(process.argv.slice(2)));
  } catch (error) {
    new StructuredLogger().error("cli_options_invalid", describeError(error));
    process.exit(1);
  }

  let runtime;
  try {
    runtime = await createToolgateRuntime(settings);
  } catch (error) {
    new StructuredLogger().error("runtime_init_failed", describeError(error));
    process.exit(1);
  }
  const { logger } = runtime;
  try {
    await runtime.start();
  } catch (error) {
    logger.error("runtime_start_failed", describeError(error));
    await runtime.close();
    process.exit(1);
  }

  const server = createManagementServer(runtime);
  await server.connect(new StdioServerTransport());
  logger.info("stdio_listening", { catalog_dir: settings.catalogDir, data_dir: settings.dataDir });

  process.on("SIGINT", async () => {
    logger.warn("shutdown_signal", { signal: "SIGINT" });
    try {
      await server.close();
    } catch (error) {
      logger.error("transport_close_failed", describeError(error));
    }
    await runtime.close();
    process.exit(0);
  });
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    new StructuredLogger().error("server_failed", describeError(error));
    process.exitCode = 1;
  });
}
