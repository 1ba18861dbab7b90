/**
 * Validate parsed data against JSON Schema (using ajv).
 */

import AjvImport, { type ErrorObject, type ValidateFunction } from "ajv";
import type { JsonSchema, ValidationOutcome, ValidationResult } from "./types.js";

interface AjvOptions {
  allErrors?: boolean;
}

interface AjvInstance {
  compile<T = unknown>(schema: JsonSchema): ValidateFunction<T>;
}

// ajv ships CommonJS: the default import is the module object under some loaders
const AjvConstructor = (
  typeof AjvImport === "function"
    ? AjvImport
    : (
        AjvImport as unknown as {
          default: new (opts?: AjvOptions) => AjvInstance;
        }
      ).default
) as new (opts?: AjvOptions) => AjvInstance;

export function formatAjvErrors(
  errors: ErrorObject[] | null | undefined
): string[] {
  if (!errors || errors.length === 0) {
    return [];
  }
  return errors.map(
    (e) =>
      `${e.instancePath || "/"} ${e.message ?? e.keyword}${
        e.params && Object.keys(e.params).length > 0
          ? ` (${JSON.stringify(e.params)})`
          : ""
      }`
  );
}

/**
 * Compile a schema once; the returned function validates data against it.
 * A schema ajv cannot compile throws here, at compile time.
 */
export function compileSchema<T = unknown>(
  schema: JsonSchema
): (data: unknown) => ValidationOutcome<T> {
  const ajv = new AjvConstructor({ allErrors: true });
  const check = ajv.compile<T>(schema);

  return (data: unknown) => {
    if (check(data)) {
      return { accepted: true, value: data };
    }
    const errors = formatAjvErrors(check.errors);
    return {
      accepted: false,
      errors: errors.length > 0 ? errors : ["Validation failed"],
    };
  };
}

/**
 * Validate data against a JSON Schema. Returns validation result with errors if invalid.
 */
export function validateAgainstSchema(
  data: unknown,
  schema: JsonSchema
): ValidationResult {
  try {
    const outcome = compileSchema(schema)(data);
    if (outcome.accepted) {
      return { valid: true };
    }
    return { valid: false, errors: outcome.errors };
  } catch (err) {
    const message =
      err instanceof Error ? err.message : "Unknown validation error";
    return { valid: false, errors: [message] };
  }
}
