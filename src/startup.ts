import fs from "fs";
import type { Settings } from "./config/settings";

export type LineWriter = (line: string) => void;

const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

/**
 * Prints what the process is about to run with and makes sure the vector
 * store directory exists. Returns true when the directory had to be created.
 */
export async function runStartup(
  settings: Pick<Settings, "appName" | "environment" | "model" | "defaults" | "vectorDbPath" | "apiKey">,
  write: LineWriter = stdoutWriter
): Promise<boolean> {
  write(`Starting ${settings.appName} in ${settings.environment} mode...`);
  if (!settings.apiKey.reveal()) {
    throw new Error("OPENAI_API_KEY is empty");
  }
  write(`Using Model: ${settings.model}`);
  write(`Temp: ${settings.defaults.temperature}`);

  if (fs.existsSync(settings.vectorDbPath)) {
    return false;
  }
  await fs.promises.mkdir(settings.vectorDbPath, { recursive: true });
  write(`Created database at: ${settings.vectorDbPath}`);
  return true;
}
