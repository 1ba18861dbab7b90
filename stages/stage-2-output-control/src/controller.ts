/**
 * Output Controller: parse raw model content and validate against JSON Schema.
 */

import { extractJson, stripMarkdownCodeBlock } from "./parse.js";
import type {
  OutputController,
  OutputControllerConfig,
  ParseAndValidateOptions,
  ParseResult,
  ValidationOutcome,
} from "./types.js";
import { compileSchema } from "./validate.js";

/**
 * Parse content as JSON: the whole (fence-stripped) text first, then the first
 * object or array embedded in it.
 */
export function parseJsonContent(
  content: string,
  stripMarkdown: boolean = true
): ParseResult {
  const text = stripMarkdown ? stripMarkdownCodeBlock(content) : content.trim();
  try {
    return { success: true, data: JSON.parse(text) as unknown };
  } catch {
    // fall through to embedded JSON
  }

  const extract = extractJson(text, false);
  if (!extract.found) {
    return {
      success: false,
      errors: [extract.reason],
      raw: content.slice(0, 500),
    };
  }

  try {
    return { success: true, data: JSON.parse(extract.json) as unknown };
  } catch (err) {
    const msg = err instanceof Error ? err.message : "JSON parse failed";
    return {
      success: false,
      errors: [msg],
      raw: extract.json.slice(0, 500),
    };
  }
}

export function createOutputController(
  config: OutputControllerConfig = {}
): OutputController {
  const stripMarkdown = config.stripMarkdownCodeBlock ?? true;

  return {
    parseAndValidate<T = unknown>(
      content: string,
      options?: ParseAndValidateOptions
    ): ParseResult<T> {
      const strip = options?.stripMarkdownCodeBlock ?? stripMarkdown;
      const parsed = parseJsonContent(content, strip);
      if (!parsed.success) {
        return parsed;
      }

      const schema = options?.schema ?? {};
      let check: (data: unknown) => ValidationOutcome<T>;
      try {
        check = compileSchema<T>(schema);
      } catch (err) {
        const message =
          err instanceof Error ? err.message : "Unknown validation error";
        return { success: false, errors: [message] };
      }
      const outcome = check(parsed.data);
      if (!outcome.accepted) {
        return {
          success: false,
          errors: outcome.errors,
          raw: content.slice(0, 500),
        };
      }

      return { success: true, data: outcome.value };
    },
  };
}
