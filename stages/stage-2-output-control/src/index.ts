export { createOutputController, parseJsonContent } from "./controller.js";
export { extractJson, stripMarkdownCodeBlock } from "./parse.js";
export {
  createSchemaValidator,
  createTextValidator,
  refineValidator,
} from "./result-validator.js";
export {
  compileSchema,
  formatAjvErrors,
  validateAgainstSchema,
} from "./validate.js";
export type {
  JsonSchema,
  OutputController,
  OutputControllerConfig,
  ParseAndValidateOptions,
  ParseResult,
  ResultValidator,
  SchemaValidatorOptions,
  ValidationOutcome,
  ValidationResult,
} from "./types.js";
