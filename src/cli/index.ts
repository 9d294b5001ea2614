#!/usr/bin/env node

/**
 * openapi-xmldoc CLI
 * Extracts OpenAPI examples and headers from XML documentation fragments
 */

import { Command } from "commander";
import chalk from "chalk";
import { examplesCommand } from "./commands/examples.js";
import { headersCommand } from "./commands/headers.js";
import { resolveLogLevel } from "./context.js";
import { createLogger, setLogLevel } from "../utils/logger.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("openapi-xmldoc")
  .description("Turn XML documentation fragments into OpenAPI examples and headers")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  })
  .hook("preAction", (_program, actionCommand) => {
    setLogLevel(resolveLogLevel(actionCommand.opts().verbose === true));
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("examples")
  .description("Print the examples described by <example> elements")
  .argument("<file>", "XML file holding the documentation fragment")
  .option("-a, --assembly <patterns...>", "Contract assembly files or glob patterns")
  .option("-c, --config <path>", "Configuration file")
  .option("-v, --verbose", "Enable debug logging")
  .action(examplesCommand);

program
  .command("headers")
  .description("Print the headers described by <header> elements")
  .argument("<file>", "XML file holding the documentation fragment")
  .option("-a, --assembly <patterns...>", "Contract assembly files or glob patterns")
  .option("-c, --config <path>", "Configuration file")
  .option("--camel-case", "Camel-case property names in component schemas")
  .option("-v, --verbose", "Enable debug logging")
  .action(headersCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
