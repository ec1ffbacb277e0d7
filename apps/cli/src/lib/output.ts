import type { Logger } from "@folio/protocol";
import chalk from "chalk";
import Table from "cli-table3";
import YAML from "yaml";

export const OUTPUT_FORMATS = ["text", "json", "yaml", "table"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface OutputOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export class OutputFormatter {
  constructor(private options: OutputOptions) {}

  // Output structured data
  output(data: unknown, textFormatter?: () => string): void {
    if (this.options.quiet && this.options.format === "text") {
      return;
    }

    switch (this.options.format) {
      case "json":
        console.log(JSON.stringify(data, null, 2));
        break;
      case "yaml":
        console.log(YAML.stringify(data).trimEnd());
        break;
      case "table":
        if (Array.isArray(data)) {
          this.printTable(data.filter(isRecord));
        } else if (isRecord(data)) {
          this.printObjectTable(data);
        } else {
          console.log(String(data));
        }
        break;
      default:
        console.log(textFormatter ? textFormatter() : data);
    }
  }

  // Print array as table
  printTable(rows: Array<Record<string, unknown>>): void {
    const firstRow = rows[0];
    if (!firstRow) {
      console.log("(empty)");
      return;
    }

    const cols = Object.keys(firstRow);
    const table = new Table({
      head: cols.map((c) => chalk.bold(c.toUpperCase())),
      style: { head: [], border: [] },
    });

    for (const row of rows) {
      table.push(cols.map((c) => formatCell(row[c])));
    }

    console.log(table.toString());
  }

  // Print object as key-value table
  printObjectTable(obj: Record<string, unknown>): void {
    const table = new Table({
      style: { head: [], border: [] },
    });

    for (const [key, value] of Object.entries(obj)) {
      table.push([chalk.bold(key), formatValue(value)]);
    }

    console.log(table.toString());
  }

  // Print error message
  error(message: string): void {
    console.error(chalk.red("✗"), message);
  }

  // Print warning message
  warn(message: string): void {
    if (!this.options.quiet) {
      console.warn(chalk.yellow("⚠"), message);
    }
  }

  // Print verbose/debug message to stderr, away from json/yaml output
  debug(message: string): void {
    if (this.options.verbose) {
      console.error(chalk.gray("⋯"), chalk.gray(message));
    }
  }

  /**
   * Logger for the library layers: debug and info only with --verbose,
   * warnings unless --quiet. Every level writes to stderr.
   */
  toLogger(): Logger {
    return {
      debug: (...args: unknown[]) => this.debug(args.map(String).join(" ")),
      info: (...args: unknown[]) => this.debug(args.map(String).join(" ")),
      warn: (...args: unknown[]) => this.warn(args.map(String).join(" ")),
      error: (...args: unknown[]) => this.error(args.map(String).join(" ")),
    };
  }
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (Array.isArray(value)) return value.join(", ");
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray("—");
  }
  if (typeof value === "boolean") {
    return value ? chalk.green("true") : chalk.red("false");
  }
  if (typeof value === "number") {
    return chalk.cyan(String(value));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.join(", ");
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

export function parseFormat(value: string | undefined): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (value !== undefined && !format) {
    throw new Error(`Unknown format "${value}" (expected ${OUTPUT_FORMATS.join("|")})`);
  }
  return format ?? "text";
}

// Helper to create formatter from command options
export function createFormatter(options: {
  format?: string;
  quiet?: boolean;
  verbose?: boolean;
}): OutputFormatter {
  return new OutputFormatter({
    format: parseFormat(options.format),
    quiet: options.quiet || false,
    verbose: options.verbose || false,
  });
}

// Format relative time
export function formatRelativeTime(date: Date, now: number = Date.now()): string {
  const timestamp = date.getTime();
  const diff = now - timestamp;

  const seconds = Math.floor(diff / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 30) {
    return new Date(timestamp).toISOString().slice(0, 10);
  }
  if (days > 0) return `${days}d ago`;
  if (hours > 0) return `${hours}h ago`;
  if (minutes > 0) return `${minutes}m ago`;
  return "just now";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
