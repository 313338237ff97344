#!/usr/bin/env node
import { Command } from "commander";
import { createClient } from "./client";
import { runRepl } from "./repl";

type GlobalOptions = {
  model?: string;
  verbose?: boolean;
};

const program = new Command();

program
  .name("forecast-chat")
  .description("Ask weather questions in plain language")
  .version("0.1.0")
  .option("-m, --model <id>", "OpenRouter model id (overrides FORECAST_CHAT_MODEL)")
  .option("-v, --verbose", "Trace each pipeline step to stderr")
  .action(async (opts: GlobalOptions) => {
    const deps = createClient(opts);
    await runRepl(deps, { input: process.stdin, output: process.stdout });
  });

void program.parseAsync(process.argv).catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
