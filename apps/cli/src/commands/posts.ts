import { readFile } from "node:fs/promises";
import type { BlogService } from "@folio/blog-service";
import { generateSlug, type PostMetadata, type StoredPost } from "@folio/protocol";
import type { Command } from "commander";
import type { OpenFolio } from "../lib/folio.ts";
import { createFormatter, errorMessage, formatRelativeTime } from "../lib/output.ts";

type NewPostOptions = {
  file?: string;
  category?: string;
  tag?: string[];
  slug?: string;
  publish?: boolean;
};

const summarize = (post: StoredPost) => ({
  slug: post.metadata.slug,
  title: post.metadata.title,
  category: post.metadata.category ?? null,
  tags: post.metadata.tags,
  published: post.metadata.published,
  updatedAt: post.metadata.updatedAt.toISOString(),
  path: post.path,
});

const collect = (value: string, previous: string[] = []): string[] => [...previous, value];

export function registerPostsCommands(program: Command, open: OpenFolio): void {
  const posts = program.command("posts").description("Manage blog posts");

  posts
    .command("list")
    .description("List published posts, newest first")
    .option("-d, --drafts", "List drafts instead")
    .action(async (cmdOpts: { drafts?: boolean }) => {
      const formatter = createFormatter(program.opts());

      try {
        const { store } = open(formatter.toLogger());
        const found = cmdOpts.drafts
          ? await store.listDraftPosts()
          : await store.listPublishedPosts();
        const rows = found.map(summarize);

        formatter.output(rows, () => {
          if (rows.length === 0) {
            return cmdOpts.drafts ? "No drafts." : "No published posts.";
          }
          return found
            .map((post) => {
              const when = formatRelativeTime(post.metadata.updatedAt);
              return `${post.metadata.slug}  ${post.metadata.title}  (${when})`;
            })
            .join("\n");
        });
      } catch (error) {
        formatter.error(`Failed to list posts: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  posts
    .command("show <slug>")
    .description("Show a post's metadata and body")
    .action(async (slug: string) => {
      const formatter = createFormatter(program.opts());

      try {
        const { service } = open(formatter.toLogger());
        const post = await service.getPost(slug);
        if (!post) {
          formatter.error(`Post not found: ${slug}`);
          process.exitCode = 1;
          return;
        }

        const { metadata } = post;
        formatter.output(
          {
            ...metadata,
            createdAt: metadata.createdAt.toISOString(),
            updatedAt: metadata.updatedAt.toISOString(),
            featured: post.featured,
            path: post.remotePath,
            body: post.body,
          },
          () => {
            const header = [
              `# ${metadata.title}`,
              `slug: ${metadata.slug}  published: ${metadata.published}`,
            ];
            if (metadata.tags.length > 0) header.push(`tags: ${metadata.tags.join(", ")}`);
            return `${header.join("\n")}\n\n${post.body}`;
          }
        );
      } catch (error) {
        formatter.error(errorMessage(error));
        process.exitCode = 1;
      }
    });

  posts
    .command("new <title>")
    .description("Create a post, as a draft unless --publish is given")
    .option("--file <path>", "Read the markdown body from a file")
    .option("--slug <slug>", "Slug to use instead of one derived from the title")
    .option("-c, --category <name>", "Category")
    .option("-t, --tag <tag>", "Tag (repeatable)", collect)
    .option("-p, --publish", "Publish immediately")
    .action(async (title: string, cmdOpts: NewPostOptions) => {
      const formatter = createFormatter(program.opts());

      try {
        const body = cmdOpts.file ? await readFile(cmdOpts.file, "utf8") : "";
        const now = new Date();
        const metadata: PostMetadata = {
          title,
          slug: cmdOpts.slug ?? generateSlug(title),
          createdAt: now,
          updatedAt: now,
          category: cmdOpts.category,
          tags: [...new Set(cmdOpts.tag ?? [])],
          published: cmdOpts.publish === true,
          extra: {},
        };

        const { service } = open(formatter.toLogger());
        const saved = await service.savePost({ metadata, body }, { draft: !metadata.published });
        formatter.output(
          { slug: saved.metadata.slug, path: saved.remotePath, published: saved.metadata.published },
          () => `Saved ${saved.metadata.slug} to ${saved.remotePath}`
        );
      } catch (error) {
        formatter.error(`Failed to create post: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  const transition = (
    name: string,
    description: string,
    past: string,
    run: (service: BlogService, slug: string) => Promise<boolean>
  ) =>
    posts
      .command(`${name} <slug>`)
      .description(description)
      .action(async (slug: string) => {
        const formatter = createFormatter(program.opts());

        try {
          const { service } = open(formatter.toLogger());
          if (!(await run(service, slug))) {
            formatter.error(`Post not found: ${slug}`);
            process.exitCode = 1;
            return;
          }
          formatter.output({ slug, [past]: true }, () => `${slug} ${past}`);
        } catch (error) {
          formatter.error(`Failed to ${name} ${slug}: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      });

  transition("publish", "Move a draft into the published folder", "published", (service, slug) =>
    service.publishPost(slug)
  );
  transition("unpublish", "Move a published post back to drafts", "unpublished", (service, slug) =>
    service.unpublishPost(slug)
  );
  transition("delete", "Delete a post, the published copy first", "deleted", (service, slug) =>
    service.deletePost(slug)
  );
}
