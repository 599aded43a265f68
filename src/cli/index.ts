#!/usr/bin/env node

/**
 * erlang-dfg CLI
 * Extracts data-flow training records from Erlang checkouts
 */

import { Command } from "commander";
import chalk from "chalk";
import { extractCommand, parseInteger } from "./commands/extract.js";
import { inspectCommand } from "./commands/inspect.js";
import { isCorpusError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("erlang-dfg")
  .description("Build JSON Lines training corpora of Erlang functions and their variable data flow")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("extract")
  .description("Extract one record per function from every source file under <root>")
  .argument("<root>", "Checkout root to scan")
  .requiredOption("-o, --output <file>", "JSON Lines output file")
  .option("--append", "Append to the output file instead of replacing it")
  .option("-c, --config <file>", "Configuration file (default: ./erlang-dfg.config.json when present)")
  .option("--docs <file>", "JSON map of \"module:name/arity\" to doc string")
  .option("--stats <file>", "Write the run summary as JSON")
  .option("-j, --concurrency <n>", "Files processed at once", parseInteger)
  .option("--max-file-size <bytes>", "Skip files larger than this", parseInteger)
  .option("--file-timeout <ms>", "Per-file processing timeout", parseInteger)
  .option("--approximate", "Emit approximate edges as dfg_approximate")
  .option("--fail-fast", "Stop scheduling files after the first error")
  .option("--ext <extensions...>", "Source file extensions (default: .erl)")
  .option("--exclude <patterns...>", "Glob patterns to exclude")
  .option("--repo-name <name>", "Repository name prefixed to record ids")
  .option("--repo-url <url>", "Repository URL used to build record links")
  .option("--repo-ref <ref>", "Git ref used in record links")
  .action(extractCommand);

program
  .command("inspect")
  .description("Print the clause groups, tokens and data-flow edges of one file")
  .argument("<file>", "Source file")
  .option("--approximate", "Include approximate edges")
  .action(inspectCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (isCorpusError(error) && error.context) {
      console.error(chalk.dim(JSON.stringify(error.context)));
    }
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

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

function shutdown(signal: string): void {
  logger.info({ signal }, "Received shutdown signal");
  console.log(chalk.dim(`\nReceived ${signal}, stopping`));
  process.exit(130);
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
