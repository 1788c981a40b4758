/**
 * Output formatters for detected stacks.
 *
 * JSON renders the full output envelope; TSV is a flat, one-row-per-stack
 * view for spreadsheets and shell pipelines.
 */

import type { DetectedStack } from "@/types";
import { toStacksOutput } from "@models/stack";

/**
 * Interface that all output formatters must implement.
 */
export interface Formatter {
  format(stacks: readonly DetectedStack[]): string;
}

/**
 * Raised when an output format has no formatter.
 */
export class UnsupportedFormatError extends Error {
  constructor(format: string) {
    super(`unsupported output format: ${format} (supported formats: json, tsv)`);
    this.name = "UnsupportedFormatError";
  }
}

/**
 * Renders `{"stacks":[...]}` as compact JSON.
 */
export class JsonFormatter implements Formatter {
  format(stacks: readonly DetectedStack[]): string {
    return JSON.stringify(toStacksOutput(stacks));
  }
}

export const TSV_HEADER = [
  "StackName",
  "StackID",
  "Region",
  "Description",
  "CreatedAt",
  "UpdatedAt",
  "Tags",
  "Reasons",
] as const;

/**
 * Renders tab-separated values with a fixed header row.
 *
 * Tags and reasons are flattened into `;`-joined cells; tags are sorted by
 * key so output is stable across runs.
 */
export class TsvFormatter implements Formatter {
  format(stacks: readonly DetectedStack[]): string {
    const rows = stacks.map((stack) =>
      [
        TsvFormatter.escapeValue(stack.stackName),
        TsvFormatter.escapeValue(stack.stackId),
        TsvFormatter.escapeValue(stack.region),
        TsvFormatter.escapeValue(stack.description),
        TsvFormatter.formatTime(stack.createdAt),
        TsvFormatter.formatTime(stack.updatedAt),
        TsvFormatter.formatTags(stack.stackTags),
        TsvFormatter.formatReasons(stack.reasons),
      ].join("\t")
    );

    return [TSV_HEADER.join("\t"), ...rows].join("\n");
  }

  /**
   * Escape tabs and line breaks as two-character sequences.
   */
  static escapeValue(value: string): string {
    return value.replace(/\t/g, "\\t").replace(/\n/g, "\\n").replace(/\r/g, "\\r");
  }

  /**
   * Format a date as RFC 3339 in UTC at second precision.
   */
  static formatTime(date: Date): string {
    if (Number.isNaN(date.getTime())) {
      return "";
    }
    return date.toISOString().replace(/\.\d{3}Z$/, "Z");
  }

  static formatTags(tags: Readonly<Record<string, string>>): string {
    return Object.keys(tags)
      .sort()
      .map((key) => `${TsvFormatter.escapeValue(key)}=${TsvFormatter.escapeValue(tags[key] ?? "")}`)
      .join(";");
  }

  static formatReasons(reasons: readonly string[]): string {
    return reasons.map((reason) => TsvFormatter.escapeValue(reason)).join(";");
  }
}

/**
 * Get a formatter for an output format.
 *
 * @param format - Output format name
 * @returns Formatter instance
 * @throws {UnsupportedFormatError} If the format is not supported
 */
export function getFormatter(format: string): Formatter {
  switch (format) {
    case "json":
      return new JsonFormatter();
    case "tsv":
      return new TsvFormatter();
    default:
      throw new UnsupportedFormatError(format);
  }
}
