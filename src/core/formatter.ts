/**
 * Output rendering for read results.
 */

import type { OutputFormat } from "../config/schema.js";
import type { ReadResult } from "../types/index.js";
import { extractText } from "./text.js";

export interface FormatOptions {
  output: OutputFormat;
  pretty?: boolean;
}

export function formatJson(result: ReadResult, pretty = false): string {
  return JSON.stringify(result, null, pretty ? 2 : undefined);
}

/**
 * Render a result for standard output.
 * Text output falls back to JSON for results without a text projection.
 */
export function formatOutput(result: ReadResult, options: FormatOptions): string {
  if (options.output === "text") {
    const text = extractText(result);
    if (text !== null) {
      return text;
    }
  }
  return formatJson(result, options.pretty);
}
