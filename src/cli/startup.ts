#!/usr/bin/env node
import { Command } from "commander";
import { runStartup } from "../startup";
import { SettingsCliOptions, addSettingsOptions, loadCliSettings, runMain } from "./common";

async function main() {
  const program = new Command();
  addSettingsOptions(program);
  program.showHelpAfterError();
  program.parse(process.argv);
  const opts = program.opts<SettingsCliOptions>();
  const settings = loadCliSettings(opts);
  await runStartup({ ...settings, model: opts.model ?? settings.model });
}

runMain(main);
