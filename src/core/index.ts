/**
 * Core module - shared between the library entry point and the CLI
 */

// Re-export error classes
export * from "./errors.js";

export * from "./xml/index.js";
export * from "./cref/index.js";
export * from "./reflection/index.js";
export * from "./schema/index.js";
export * from "./annotations/index.js";

// Re-export types
export * from "../types/index.js";
