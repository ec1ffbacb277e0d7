import { CommanderError } from "commander";
import { createProgram } from "./program.ts";

const QUIET_EXITS = new Set(["commander.helpDisplayed", "commander.version", "commander.help"]);

async function main() {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
    // If no subcommand is provided, show help
    if (process.argv.length <= 2) {
      program.outputHelp();
    }
  } catch (error: unknown) {
    if (error instanceof CommanderError && QUIET_EXITS.has(error.code)) {
      process.exit(0);
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error("An unexpected error occurred");
    }
    process.exit(1);
  }
}

void main();
