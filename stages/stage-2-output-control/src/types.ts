/**
 * Stage 2 Output Control types.
 * Model output is untrusted: the final answer is parsed and validated before
 * the run accepts it.
 */

/** JSON Schema (draft-07 style) for constraining structured output. */
export type JsonSchema = Record<string, unknown>;

/** Result of parsing raw model content into JSON. */
export type ParseResult<T = unknown> =
  | { success: true; data: T }
  | { success: false; errors: string[]; raw?: string };

/** Result of validating parsed data against a schema. */
export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/** Outcome of validating one attempt's final text. */
export type ValidationOutcome<T> =
  | { accepted: true; value: T }
  | { accepted: false; errors: string[] };

/**
 * Validator for the caller-declared result shape. Must be a pure function of
 * the text; errors are fed back to the model verbatim.
 */
export interface ResultValidator<T> {
  /** Shape the answer must take; absent when any text is accepted. */
  readonly schema?: JsonSchema;
  validate(raw: string): ValidationOutcome<T>;
}

/** Options for parsing and validating structured output. */
export interface ParseAndValidateOptions {
  /** JSON Schema to validate against. If omitted, only JSON parse is performed. */
  schema?: JsonSchema;
  /** If true, strip markdown code blocks (e.g. ```json ... ```) before parsing. */
  stripMarkdownCodeBlock?: boolean;
}

/** Configuration for the output controller. */
export interface OutputControllerConfig {
  /** Whether to strip ```json ... ``` from content before parsing (default true). */
  stripMarkdownCodeBlock?: boolean;
}

export interface SchemaValidatorOptions {
  /** Default true. */
  stripMarkdownCodeBlock?: boolean;
}

/** Output controller: parse and validate model content. */
export interface OutputController {
  /**
   * Extract JSON from raw content and optionally validate against schema.
   * Returns errors on parse or validation failure.
   */
  parseAndValidate<T = unknown>(
    content: string,
    options?: ParseAndValidateOptions
  ): ParseResult<T>;
}
