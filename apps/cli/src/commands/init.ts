import type { Command } from "commander";
import type { OpenFolio } from "../lib/folio.ts";
import { createFormatter, errorMessage } from "../lib/output.ts";

export function registerInitCommand(program: Command, open: OpenFolio): void {
  program
    .command("init")
    .description("Create the blog folder layout in Dropbox")
    .action(async () => {
      const formatter = createFormatter(program.opts());

      try {
        const { store } = open(formatter.toLogger());
        await store.initializeStructure();
        formatter.output({ root: store.root, initialized: true }, () => `Initialized ${store.root}`);
      } catch (error) {
        formatter.error(`Failed to initialize: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
