/**
 * Terminal output helpers (chalk).
 *
 * Everything the operator reads goes through a Printer so commands can
 * be exercised with a captured writer and colors turned off.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import { AnnotatorError } from "@slo-annotator/core";
import { PlatformError } from "@slo-annotator/sdk";

export type LineWriter = (line: string) => void;

export class Printer {
  constructor(
    private readonly write: LineWriter,
    private readonly c: ChalkInstance = chalk,
  ) {}

  line(text = ""): void {
    this.write(text);
  }

  heading(title: string): void {
    this.write(this.c.cyan.bold(title));
  }

  ok(msg: string): void {
    this.write(this.c.green("✓ ") + msg);
  }

  fail(msg: string): void {
    this.write(this.c.red("✗ ") + msg);
  }

  warn(msg: string): void {
    this.write(this.c.yellow("! ") + this.c.yellow(msg));
  }

  info(label: string, value: string): void {
    this.write(this.c.gray("→ ") + this.c.gray(label.padEnd(16)) + value);
  }

  muted(msg: string): void {
    this.write(this.c.gray(msg));
  }

  /**
   * A setup error: message in red, structured details underneath.
   */
  error(error: unknown): void {
    if (error instanceof AnnotatorError || error instanceof PlatformError) {
      this.write(this.c.red(`Error [${error.code}]: ${error.message}`));
      const details =
        error instanceof AnnotatorError ? error.details : { statusCode: error.statusCode };
      for (const [key, value] of Object.entries(details)) {
        this.write(this.c.gray(`  ${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`));
      }
      return;
    }
    this.write(this.c.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  }

  /**
   * Fixed-width table with a header row and a dashed rule.
   */
  table(headers: readonly string[], rows: readonly (readonly string[])[]): void {
    const widths = headers.map((header, i) =>
      Math.max(header.length, ...rows.map((row) => (row[i] ?? "").length)),
    );
    const render = (cells: readonly string[]): string =>
      cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join("  ").trimEnd();

    this.write(this.c.bold(render(headers)));
    this.write(render(widths.map((w) => "-".repeat(w))));
    for (const row of rows) {
      this.write(render(row));
    }
  }
}
