#!/usr/bin/env -S node --import tsx
/**
 * SalesIQ Investigator CLI - Entry Point
 *
 *   parseArgs() → load config → test connection | run investigation → print / write output
 *
 * USAGE:
 *   npm run investigate -- "Why did CTR drop for Campaign 5?"
 *   npm run investigate -- "Investigate Campaign 5" -c "metric=ctr" -o report.md
 */

import { ConfigError, ValidationError, getConfig, logger, wrapError } from "@salesiq/core";
import { createSqlClient, resetPool, shutdownEventStore, testConnection } from "@salesiq/db";
import { parseArgs, helpText, type CliCommand } from "./cli/args.js";
import { EXIT_FAILED, EXIT_OK, EXIT_USAGE, exitCodeFor, renderResult, writeOutput } from "./cli/output.js";
import { createInvestigator } from "./systems/investigation/orchestrator.js";

async function runInvestigation(command: Extract<CliCommand, { command: "investigate" }>): Promise<number> {
  const investigator = createInvestigator();

  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn("Cancellation requested; stopping after the current step");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const result = await investigator.run(command.question, command.context, { signal: controller.signal });

    console.log(renderResult(result));

    if (command.output) {
      await writeOutput(command.output, result);
      logger.info(`Result written to ${command.output}`);
    }

    return exitCodeFor(result);
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

async function runConnectionTest(): Promise<number> {
  const config = getConfig();
  const target = config.database.connectionString
    ? "DATABASE_URL"
    : `${config.database.host}:${config.database.port}/${config.database.database}`;

  const ok = await testConnection(createSqlClient());
  console.log(ok ? `Connection to ${target} OK` : `Connection to ${target} FAILED`);
  return ok ? EXIT_OK : EXIT_FAILED;
}

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(`Error: ${error.message}\nRun with --help for usage.`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (command.command === "help") {
    console.log(helpText());
    return EXIT_OK;
  }

  try {
    const config = getConfig();
    logger.setLevel(command.verbose ? "debug" : config.env.logLevel);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return EXIT_FAILED;
    }
    throw error;
  }

  try {
    return command.command === "test-connection" ? await runConnectionTest() : await runInvestigation(command);
  } finally {
    await shutdownEventStore();
    await resetPool();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error("Fatal error", wrapError(error));
    process.exitCode = EXIT_FAILED;
  });
