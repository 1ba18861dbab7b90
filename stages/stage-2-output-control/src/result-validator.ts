/**
 * Result validators: decide whether an attempt's final text is an acceptable
 * answer for the caller's result shape.
 */

import { parseJsonContent } from "./controller.js";
import type {
  JsonSchema,
  ResultValidator,
  SchemaValidatorOptions,
  ValidationOutcome,
} from "./types.js";
import { compileSchema } from "./validate.js";

/** Accepts any text as the result. */
export function createTextValidator(): ResultValidator<string> {
  return {
    validate(raw: string): ValidationOutcome<string> {
      return { accepted: true, value: raw };
    },
  };
}

/**
 * Validate text against a JSON Schema. String schemas see the raw text;
 * every other schema sees the text parsed as JSON.
 */
export function createSchemaValidator<T>(
  schema: JsonSchema,
  options: SchemaValidatorOptions = {}
): ResultValidator<T> {
  const check = compileSchema<T>(schema);
  const stripMarkdown = options.stripMarkdownCodeBlock ?? true;
  const isStringSchema = schema.type === "string";

  return {
    schema,
    validate(raw: string): ValidationOutcome<T> {
      if (isStringSchema) {
        return check(raw);
      }
      const parsed = parseJsonContent(raw, stripMarkdown);
      if (!parsed.success) {
        return {
          accepted: false,
          errors: parsed.errors.map((e) => `Invalid JSON: ${e}`),
        };
      }
      return check(parsed.data);
    },
  };
}

/**
 * Add a check that runs on values the inner validator accepted. `check`
 * returns an error message to reject, or undefined to accept.
 */
export function refineValidator<T>(
  validator: ResultValidator<T>,
  check: (value: T) => string | undefined
): ResultValidator<T> {
  return {
    schema: validator.schema,
    validate(raw: string): ValidationOutcome<T> {
      const outcome = validator.validate(raw);
      if (!outcome.accepted) {
        return outcome;
      }
      const error = check(outcome.value);
      return error === undefined ? outcome : { accepted: false, errors: [error] };
    },
  };
}
