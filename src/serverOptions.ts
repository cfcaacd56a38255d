import type { ToolgateSettings } from "./config/settings.js";

/**
 * Command-line overrides of the environment settings. Absent flags keep the
 * value read from `TOOLGATE_*` variables.
 */
export interface ServerCliOptions {
  catalogDir?: string;
  dataDir?: string;
  logFile?: string;
  overridesFile?: string;
}

const FLAG_WITH_VALUE = new Set(["--catalog-dir", "--data-dir", "--log-file", "--overrides-file"]);

function requirePath(value: string | undefined, flag: string): string {
  const raw = (value ?? "").trim();
  if (!raw.length) {
    throw new Error(`the ${flag} flag requires a non-empty path`);
  }
  return raw;
}

/**
 * Parses `process.argv.slice(2)`. Flags accept `--flag value` and
 * `--flag=value`; unknown flags are ignored.
 */
export function parseServerOptions(argv: string[]): ServerCliOptions {
  const options: ServerCliOptions = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg.startsWith("--")) {
      continue;
    }

    const [flag, inlineValue] = arg.split("=", 2);
    let value = inlineValue;
    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`the ${flag} flag requires a value`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--catalog-dir":
        options.catalogDir = requirePath(value, flag);
        break;
      case "--data-dir":
        options.dataDir = requirePath(value, flag);
        break;
      case "--log-file":
        options.logFile = requirePath(value, flag);
        break;
      case "--overrides-file":
        options.overridesFile = requirePath(value, flag);
        break;
      default:
        break;
    }
  }

  return options;
}

/** Returns {@link settings} with the command-line overrides applied. */
export function applyServerOptions(settings: ToolgateSettings, options: ServerCliOptions): ToolgateSettings {
  return {
    ...settings,
    catalogDir: options.catalogDir ?? settings.catalogDir,
    dataDir: options.dataDir ?? settings.dataDir,
    logFile: options.logFile ?? settings.logFile,
    overridesFile: options.overridesFile ?? settings.overridesFile,
  };
}
