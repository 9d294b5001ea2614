/**
 * Annotation Extraction Module
 *
 * Maps `<example>` and `<header>` documentation fragments to OpenAPI objects.
 *
 * @module
 */

export {
  extractExamples,
  extractHeaders,
  getOpenApiExamples,
  getOpenApiHeaders,
  KnownXmlStrings,
  GENERATED_EXAMPLE_KEY_PREFIX,
} from "./element-processor.js";
export { readExampleValue, JsonValueSchema } from "./value-reader.js";
export { SpecificationGenerationMessages } from "./messages.js";
export { removeBlankLines, cleanText } from "./text.js";
