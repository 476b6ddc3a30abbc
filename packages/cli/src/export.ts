/**
 * Annotation export and display formatting.
 */

import type { Annotation } from "@slo-annotator/types";
import { categoryOf } from "@slo-annotator/sdk";

export type ExportFormat = "csv" | "json";

const CSV_COLUMNS = [
  "name",
  "project",
  "slo",
  "category",
  "startTime",
  "endTime",
  "description",
] as const;

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * RFC 4180 CSV with a header row; lines end in CRLF.
 */
export function toCsv(annotations: readonly Annotation[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const annotation of annotations) {
    lines.push(CSV_COLUMNS.map((column) => csvField(annotation[column] ?? "")).join(","));
  }
  return lines.join("\r\n") + "\r\n";
}

export function toJson(annotations: readonly Annotation[]): string {
  return JSON.stringify(annotations, null, 2) + "\n";
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * `annotations_<context>_<YYYYMMDD_HHMMSS>.<ext>`, in local time.
 */
export function defaultExportName(context: string, format: ExportFormat, now: Date): string {
  const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  const safeContext = context.replace(/[^A-Za-z0-9._-]/g, "_");
  return `annotations_${safeContext}_${date}_${time}.${format}`;
}

export interface CategoryCount {
  readonly category: string;
  readonly count: number;
}

/** Counts per category, sorted by category name. */
export function countByCategory(annotations: readonly Annotation[]): CategoryCount[] {
  const counts = new Map<string, number>();
  for (const annotation of annotations) {
    const category = categoryOf(annotation);
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([category, count]) => ({ category, count }));
}

const WIRE_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})/;

/**
 * `MM/DD/YY HH:MM` taken from the timestamp as written (UTC), or the
 * input unchanged when it is not a wire timestamp.
 */
export function formatDisplayTime(timestamp: string): string {
  const match = WIRE_TIMESTAMP.exec(timestamp);
  if (match === null) return timestamp;
  const [, year = "", month = "", day = "", hour = "", minute = ""] = match;
  return `${month}/${day}/${year.slice(2)} ${hour}:${minute}`;
}

/** Shorten to `max` characters, marking the cut with "...". */
export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
