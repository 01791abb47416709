#!/usr/bin/env node
import { Command } from "commander";
import { createLLMClient } from "../llm";
import { systemMessage, userMessage } from "../llm/base";
import { SettingsCliOptions, addSettingsOptions, loadCliSettings, runMain } from "./common";

async function main() {
  const program = new Command();
  addSettingsOptions(program).option(
    "--question <text>",
    "Prompt used for both checks",
    "Explain the benefits of schema validation in one sentence."
  );
  program.showHelpAfterError();
  program.parse(process.argv);
  const opts = program.opts<SettingsCliOptions & { question: string }>();

  const settings = loadCliSettings(opts);
  const out = (line: string) => process.stdout.write(`${line}\n`);
  out(`Checking ${settings.appName} (${settings.environment})`);
  out(`Model: ${opts.model ?? settings.model}`);

  const client = createLLMClient(settings, { provider: opts.provider, model: opts.model });
  const messages = [
    systemMessage("You are a helpful technical assistant."),
    userMessage(opts.question),
  ];
  let failures = 0;

  out("\n[1] blocking completion");
  const started = Date.now();
  try {
    const response = await client.chat(messages);
    out(`latency: ${((Date.now() - started) / 1000).toFixed(2)}s`);
    out(`response: ${response.content}`);
    out(`tokens: ${JSON.stringify(response.tokenUsage)}`);
  } catch (err) {
    failures += 1;
    out(`failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  out("\n[2] streaming completion");
  try {
    for await (const fragment of client.streamChat(messages)) {
      process.stdout.write(fragment);
    }
    out("");
  } catch (err) {
    failures += 1;
    out(`\nfailed: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (failures) {
    throw new Error(`${failures} check(s) failed`);
  }
  out("\nall checks passed");
}

runMain(main);
