import { Command } from "commander";
import { registerInitCommand } from "./commands/init.ts";
import { registerPostsCommands } from "./commands/posts.ts";
import { registerStatsCommand } from "./commands/stats.ts";
import { registerWhoamiCommand } from "./commands/whoami.ts";
import { type OpenFolio, openFromEnv } from "./lib/folio.ts";

export function createProgram(open: OpenFolio = openFromEnv()): Command {
  const program = new Command();

  program
    .name("folio")
    .description("Manage a markdown blog stored in Dropbox")
    .version("0.1.0")
    .option("-f, --format <type>", "output format: text|json|yaml|table", "text")
    .option("-v, --verbose", "verbose output")
    .option("-q, --quiet", "quiet mode");

  // Inherited by subcommands registered below
  program.exitOverride();

  registerInitCommand(program, open);
  registerWhoamiCommand(program, open);
  registerPostsCommands(program, open);
  registerStatsCommand(program, open);

  return program;
}
