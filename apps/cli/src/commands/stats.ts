import type { Command } from "commander";
import type { OpenFolio } from "../lib/folio.ts";
import { createFormatter, errorMessage } from "../lib/output.ts";

/** Most frequent first, name ascending on ties */
const ranked = (counts: Record<string, number>): Array<[string, number]> =>
  Object.entries(counts).sort(([a, x], [b, y]) => y - x || (a < b ? -1 : a > b ? 1 : 0));

export function registerStatsCommand(program: Command, open: OpenFolio): void {
  program
    .command("stats")
    .description("Count posts, categories and tags")
    .action(async () => {
      const formatter = createFormatter(program.opts());

      try {
        const { store } = open(formatter.toLogger());
        const stats = await store.getBlogStats();

        formatter.output(
          {
            publishedPosts: stats.publishedPosts,
            draftPosts: stats.draftPosts,
            categories: stats.categories,
            tags: stats.tags,
            lastUpdated: stats.lastUpdated.toISOString(),
          },
          () => {
            const lines = [`Published: ${stats.publishedPosts}`, `Drafts:    ${stats.draftPosts}`];
            const categories = ranked(stats.categories);
            if (categories.length > 0) {
              lines.push("", "Categories:");
              for (const [name, count] of categories) lines.push(`  ${name} (${count})`);
            }
            const tags = ranked(stats.tags);
            if (tags.length > 0) {
              lines.push("", "Tags:");
              for (const [name, count] of tags) lines.push(`  ${name} (${count})`);
            }
            return lines.join("\n");
          }
        );
      } catch (error) {
        formatter.error(`Failed to read stats: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
