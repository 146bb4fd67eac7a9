import type { Logger } from "@dirscope/client";
import chalk from "chalk";
import Table from "cli-table3";
import YAML from "yaml";

export type OutputFormat = "text" | "json" | "yaml" | "table";

export interface OutputOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
}

type Row = Record<string, unknown>;

const isRecord = (value: unknown): value is Row =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Renders command results in the selected format and carries the
 * diagnostic channel: `debug` doubles as the client's Logger.
 */
export class OutputFormatter implements Logger {
  constructor(private options: OutputOptions) {}

  get format(): OutputFormat {
    return this.options.format;
  }

  get isQuiet(): boolean {
    return this.options.quiet;
  }

  get isVerbose(): boolean {
    return this.options.verbose;
  }

  /**
   * Output structured data. `tableRows` replaces `data` in table format,
   * for reports whose data is not a flat list.
   */
  output(data: unknown, textFormatter?: (data: unknown) => string, tableRows?: Row[]): void {
    if (this.options.quiet && this.options.format === "text") {
      return;
    }

    switch (this.options.format) {
      case "json":
        console.log(JSON.stringify(data, null, 2));
        break;
      case "yaml":
        console.log(YAML.stringify(data));
        break;
      case "table":
        if (tableRows) {
          this.printTable(tableRows);
        } else if (Array.isArray(data)) {
          this.printTable(data.filter(isRecord));
        } else if (isRecord(data)) {
          this.printObjectTable(data);
        } else {
          console.log(String(data));
        }
        break;
      default:
        if (textFormatter) {
          console.log(textFormatter(data));
        } else {
          console.log(data);
        }
    }
  }

  // Print array as table
  printTable(rows: Row[], columns?: string[]): void {
    const firstRow = rows[0];
    if (!firstRow) {
      console.log("(empty)");
      return;
    }

    const cols = columns ?? Object.keys(firstRow);
    const table = new Table({
      head: cols.map((c) => chalk.bold(c.toUpperCase())),
      style: { head: [], border: [] },
    });

    for (const row of rows) {
      table.push(cols.map((c) => String(row[c] ?? "")));
    }

    console.log(table.toString());
  }

  // Print object as key-value table
  printObjectTable(obj: Row): void {
    const table = new Table({
      style: { head: [], border: [] },
    });

    for (const [key, value] of Object.entries(obj)) {
      table.push([chalk.bold(key), formatValue(value)]);
    }

    console.log(table.toString());
  }

  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green("✓"), message);
    }
  }

  error(message: string): void {
    console.error(chalk.red("✗"), message);
  }

  // Warnings and notices go to stderr so stdout stays parseable.
  warn(message: string): void {
    if (!this.options.quiet) {
      console.error(chalk.yellow("⚠"), message);
    }
  }

  info(message: string): void {
    if (!this.options.quiet) {
      console.error(chalk.blue("ℹ"), message);
    }
  }

  /** Verbose-only diagnostics on stderr: `⋯ message key=value ...` */
  debug(message: string, fields?: Record<string, unknown>): void {
    if (!this.options.verbose) return;
    const suffix = fields
      ? Object.entries(fields)
          .map(([key, value]) => ` ${key}=${formatField(value)}`)
          .join("")
      : "";
    console.error(chalk.gray("⋯"), chalk.gray(`${message}${suffix}`));
  }

  raw(text: string): void {
    console.log(text);
  }
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
  if (Array.isArray(value)) {
    return value.join(", ");
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

function formatField(value: unknown): string {
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

export function createFormatter(options: OutputOptions): OutputFormatter {
  return new OutputFormatter(options);
}

// ============================================================================
// Text helpers
// ============================================================================

/**
 * Left-aligned columns separated by two spaces; the last column is not padded.
 */
export function formatColumns(header: string[], rows: string[][]): string {
  const all = [header, ...rows];
  const widths = header.map((_, i) => Math.max(...all.map((r) => (r[i] ?? "").length)));
  return all
    .map((r) =>
      r
        .map((cell, i) => (i === r.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)))
        .join("  ")
    )
    .join("\n");
}

// Format file size
export function formatSize(bytes: number): string {
  if (bytes <= 0) return "0 B";
  const units = ["B", "KB", "MB", "GB", "TB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  const size = bytes / 1024 ** i;
  return `${size.toFixed(i === 0 ? 0 : 2)} ${units[i]}`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/** Unix seconds → "YYYY-MM-DD" (UTC) */
export function formatDate(seconds: number): string {
  return new Date(seconds * 1000).toISOString().slice(0, 10);
}

/** Unix seconds → "YYYY-MM-DD HH:MM" (UTC) */
export function formatDateTime(seconds: number): string {
  return new Date(seconds * 1000).toISOString().slice(0, 16).replace("T", " ");
}

export function truncateName(name: string, max: number): string {
  return name.length <= max ? name : `${name.slice(0, max - 3)}...`;
}
