#!/usr/bin/env node
import { runCommand, type CommandOutput } from "./lib/cli/commands";
import { createInventoryContext } from "./lib/context";
import { loadEnv } from "./lib/env";

const consoleOutput: CommandOutput = {
  write: (line) => console.log(line),
  error: (line) => console.error(line),
};

async function main(): Promise<void> {
  const config = loadEnv();
  const context = createInventoryContext(config);
  process.exitCode = await runCommand(process.argv.slice(2), context, consoleOutput);
}

main().catch((error: unknown) => {
  console.error("[ERROR]", error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
