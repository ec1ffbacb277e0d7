import type { Command } from "commander";
import type { OpenFolio } from "../lib/folio.ts";
import { createFormatter, errorMessage } from "../lib/output.ts";

export function registerWhoamiCommand(program: Command, open: OpenFolio): void {
  program
    .command("whoami")
    .description("Check the Dropbox token and show the linked account")
    .action(async () => {
      const formatter = createFormatter(program.opts());

      try {
        const { gateway } = open(formatter.toLogger());
        const result = await gateway.testConnection();
        if (!result.ok) {
          formatter.error(`Connection failed: ${result.error.code}: ${result.error.message}`);
          process.exitCode = 1;
          return;
        }

        const account = {
          accountId: result.data.account_id,
          name: result.data.name?.display_name ?? null,
          email: result.data.email ?? null,
        };
        formatter.output(account, () => {
          const lines = [`Account: ${account.accountId}`];
          if (account.name) lines.push(`Name:    ${account.name}`);
          if (account.email) lines.push(`Email:   ${account.email}`);
          return lines.join("\n");
        });
      } catch (error) {
        formatter.error(errorMessage(error));
        process.exitCode = 1;
      }
    });
}
