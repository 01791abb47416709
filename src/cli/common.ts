import { Command } from "commander";
import { DEFAULT_ENV_FILE, LoadSettingsOptions, Settings, loadSettings } from "../config/settings";
import { logger } from "../utils/logger";

export interface SettingsCliOptions {
  config?: string;
  envFile: string;
  provider?: Settings["provider"];
  model?: string;
  verbose?: boolean;
}

export function addSettingsOptions(program: Command): Command {
  return program
    .option("-c, --config <file>", "YAML or JSON settings file (environment wins)")
    .option("--env-file <file>", "dotenv file to load first", DEFAULT_ENV_FILE)
    .option("--provider <name>", "openai or mock (default: LLM_PROVIDER)")
    .option("--model <id>", "Model id (default: LLM_MODEL)")
    .option("-v, --verbose", "Debug logging", false);
}

export function loadCliSettings(opts: SettingsCliOptions): Settings {
  if (opts.verbose) {
    logger.setLevel("debug");
  }
  const options: LoadSettingsOptions = { configFile: opts.config, envFile: opts.envFile };
  const settings = loadSettings(options);
  if (settings.debug && !opts.verbose) {
    logger.setLevel("debug");
  }
  return settings;
}

/** Turns `key=value` pairs into an override mapping. Values are read as JSON when they parse, else kept as text. */
export function parseAssignments(pairs: readonly string[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const pair of pairs) {
    const index = pair.indexOf("=");
    if (index <= 0) {
      throw new Error(`Expected key=value, got "${pair}"`);
    }
    const key = pair.slice(0, index).trim();
    const raw = pair.slice(index + 1).trim();
    result[key] = parseValue(raw);
  }
  return result;
}

function parseValue(raw: string): unknown {
  try {
    const value: unknown = JSON.parse(raw);
    return value;
  } catch {
    return raw;
  }
}

export type OutputFormat = "text" | "json";

/** JSON output describes a whole response, so it only goes with blocking calls. */
export function checkOutputOptions(opts: { stream: boolean; outputFormat: string }): OutputFormat {
  const format = opts.outputFormat;
  if (format !== "text" && format !== "json") {
    throw new Error(`Unknown output format "${format}", expected text or json`);
  }
  if (opts.stream && format === "json") {
    throw new Error("--output-format json cannot be combined with --stream");
  }
  return format;
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function runMain(main: () => Promise<void>) {
  main().catch((err: unknown) => {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}
