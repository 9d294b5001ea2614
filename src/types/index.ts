/**
 * Shared types for openapi-xmldoc
 */

export * from "./openapi.js";
export * from "./result.js";
