#!/usr/bin/env node
/**
 * Bloggy CLI entry point.
 *
 * Selects the notes marked for publication and links them, and the assets
 * they reference, into the blog's source tree.
 */

import { CommanderError } from "commander";
import { ExitCodes } from "./lib/models.js";
import { ConfigError } from "./lib/errors.js";
import { createLogger } from "./lib/logger.js";
import { resolveConfig } from "./lib/config.js";
import { buildProgram } from "./program.js";
import {
  CliOptions,
  runOperation,
  selectOperation,
} from "./commands/dispatch.js";

const program = buildProgram();

try {
  program.parse(process.argv);
} catch (err) {
  // Commander has already printed help, version or the parse error
  if (err instanceof CommanderError) {
    process.exit(err.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.USAGE_ERROR);
  }
  throw err;
}

const options = program.opts<CliOptions>();
const logger = createLogger({ verbose: options.verbose });

const selection = selectOperation(options);
if (!selection.ok) {
  logger.error(selection.error);
  program.outputHelp({ error: true });
  process.exit(ExitCodes.USAGE_ERROR);
}

try {
  const config = resolveConfig({
    notesDir: options.notesDir,
    configPath: options.config,
  });
  logger.debug(`Notes directory: ${config.notesDir}`);

  const code = runOperation(
    selection.operation,
    config,
    (line) => console.log(line),
    logger,
  );
  process.exit(code);
} catch (err) {
  if (err instanceof ConfigError) {
    logger.error(err.message);
    process.exit(ExitCodes.USAGE_ERROR);
  }
  if (process.env.DEBUG) {
    console.error(err);
  } else {
    logger.error(err instanceof Error ? err.message : String(err));
  }
  process.exit(ExitCodes.FAILURE);
}
