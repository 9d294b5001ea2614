/**
 * openapi-xmldoc
 *
 * Turns XML documentation fragments into OpenAPI examples and headers.
 *
 * @example
 * ```typescript
 * import { parseFragment, TypeFetcher, extractExamples, unwrap } from "openapi-xmldoc";
 *
 * const fetcher = unwrap(TypeFetcher.fromFiles(["contracts/Sample.Contracts.json"]));
 * const fragment = unwrap(parseFragment(xml));
 * const examples = unwrap(extractExamples(fragment, fetcher));
 * ```
 */

export * from "./core/index.js";
export { createLogger, setLogLevel, type Logger, type LogLevel } from "./utils/logger.js";
export { loadConfig, resolveAssemblyPaths, CONFIG_FILE, type LoadedConfig } from "./utils/config.js";
export { ConfigSchema, type AppConfig, type PropertyNaming } from "./utils/validation.js";
