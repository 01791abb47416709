#!/usr/bin/env node
import { Command } from "commander";
import { RequestConfig } from "../config/requestConfig";
import { readConfigFile } from "../config/schema";
import { readConversation } from "../dataset/jsonl";
import { Message, systemMessage, userMessage } from "../llm/base";
import { createLLMClient } from "../llm";
import {
  SettingsCliOptions,
  addSettingsOptions,
  checkOutputOptions,
  collect,
  loadCliSettings,
  parseAssignments,
  runMain,
} from "./common";

interface ChatOptions extends SettingsCliOptions {
  prompt?: string;
  system?: string;
  messages?: string;
  set: string[];
  defaults?: string;
  stream: boolean;
  portable: boolean;
  outputFormat: string;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function buildConversation(opts: ChatOptions): Promise<Message[]> {
  const messages: Message[] = opts.messages ? await readConversation(opts.messages) : [];
  if (opts.system) {
    messages.unshift(systemMessage(opts.system));
  }
  const prompt = opts.prompt ?? (opts.messages ? undefined : await readStdin());
  if (prompt !== undefined && prompt.trim()) {
    messages.push(userMessage(prompt.trim()));
  }
  return messages;
}

async function main() {
  const program = new Command();
  addSettingsOptions(program)
    .option("-p, --prompt <text>", "User prompt (default: stdin unless --messages is given)")
    .option("-s, --system <text>", "System prompt placed first")
    .option("-m, --messages <file>", "JSONL conversation, one message per line")
    .option("--set <key=value>", "Per-call override, repeatable (e.g. temperature=0.2)", collect, [])
    .option("--defaults <file>", "YAML or JSON client defaults")
    .option("--stream", "Print fragments as they arrive", false)
    .option("--portable", "Send only provider-agnostic parameters", false)
    .option("--output-format <format>", "text or json (json needs a blocking call)", "text");
  program.showHelpAfterError();
  program.parse(process.argv);
  const opts = program.opts<ChatOptions>();
  const outputFormat = checkOutputOptions(opts);

  const settings = loadCliSettings(opts);
  const defaults = opts.defaults ? RequestConfig.fromDict(readConfigFile(opts.defaults)) : undefined;
  const client = createLLMClient(settings, {
    provider: opts.provider,
    model: opts.model,
    defaults,
    portableOnly: opts.portable,
  });
  const overrides = parseAssignments(opts.set);
  const messages = await buildConversation(opts);

  if (opts.stream) {
    for await (const fragment of client.streamChat(messages, overrides)) {
      process.stdout.write(fragment);
    }
    process.stdout.write("\n");
    return;
  }

  const response = await client.chat(messages, overrides);
  if (outputFormat === "json") {
    process.stdout.write(`${JSON.stringify(response)}\n`);
  } else {
    process.stdout.write(`${response.content}\n`);
  }
}

runMain(main);
