#!/usr/bin/env node
import { dirname, join, resolve } from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import process from "node:process";

import { loadSettings } from "../src/config/settings.js";
import { describeError } from "../src/errors.js";
import { evaluateRecall, loadRecallCases, type RecallReport } from "../src/eval/recall.js";
import { StructuredLogger } from "../src/logger.js";
import { createToolgateRuntime } from "../src/runtime.js";
import { applyServerOptions, parseServerOptions } from "../src/serverOptions.js";

const SCRIPT_DIR = dirname(fileURLToPath(import.meta.url));
const WORKSPACE_ROOT = resolve(SCRIPT_DIR, "..");
const DEFAULT_CASES = join(WORKSPACE_ROOT, "config", "eval", "recall-cases.json");
const DEFAULT_K = 5;
const DEFAULT_NO_CALL_THRESHOLD = 0.5;

export interface RecallCliOptions {
  readonly casesPath: string;
  readonly k: number;
  readonly noCallThreshold: number;
}

/** Reads `--cases`, `--k` and `--no-call-threshold`; catalog flags are handled by the server parser. */
export function parseRecallCliArgs(argv: string[]): RecallCliOptions {
  let casesPath = DEFAULT_CASES;
  let k = DEFAULT_K;
  let noCallThreshold = DEFAULT_NO_CALL_THRESHOLD;

  for (let index = 0; index < argv.length; index += 1) {
    const [flag, inlineValue] = argv[index].split("=", 2);
    const value = (): string => {
      if (inlineValue !== undefined && inlineValue !== "") {
        return inlineValue;
      }
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`the ${flag} flag requires a value`);
      }
      index += 1;
      return next;
    };

    switch (flag) {
      case "--cases":
        casesPath = resolve(value());
        break;
      case "--k": {
        const parsed = Number(value());
        if (!Number.isInteger(parsed) || parsed < 1) {
          throw new Error("--k must be a positive integer");
        }
        k = parsed;
        break;
      }
      case "--no-call-threshold": {
        const parsed = Number(value());
        if (!Number.isFinite(parsed)) {
          throw new Error("--no-call-threshold must be a number");
        }
        noCallThreshold = parsed;
        break;
      }
      default:
        break;
    }
  }

  return { casesPath, k, noCallThreshold };
}

/** One JSON line per case followed by a summary line. */
export function formatRecallReport(report: RecallReport): string[] {
  const lines = report.results.map((result) => JSON.stringify({ type: "case", ...result }));
  const { results: _results, ...summary } = report;
  lines.push(JSON.stringify({ type: "summary", ...summary }));
  return lines;
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const options = parseRecallCliArgs(argv);
  const settings = applyServerOptions(loadSettings(), parseServerOptions(argv));
  const logger = new StructuredLogger({ logFile: settings.logFile, minLevel: "warn" });

  const runtime = await createToolgateRuntime(settings, { logger });
  try {
    await runtime.start();
    const cases = await loadRecallCases(options.casesPath);
    const report = await evaluateRecall(runtime.router, cases, options);
    for (const line of formatRecallReport(report)) {
      process.stdout.write(`${line}\n`);
    }
  } finally {
    await runtime.close();
  }
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    new StructuredLogger().error("eval_recall_failed", describeError(error));
    process.exitCode = 1;
  });
}
