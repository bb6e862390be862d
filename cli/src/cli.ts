#!/usr/bin/env node
/**
 * Leadflow CLI
 *
 * Usage:
 *   leadflow run <workflow> --handlers <module>   Execute a workflow
 *   leadflow validate <workflow>                   Validate without executing
 *   leadflow explain <workflow>                    Show the execution plan
 *   leadflow --version                             Show version
 */

import { ExitCode, describeThrown } from '@leadflow/engine';
import { CLI_VERSION, createProgram } from './program.js';

async function main(): Promise<void> {
  await createProgram(CLI_VERSION).parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const { name, message } = describeThrown(error);
  console.error(`${name}: ${message}`);
  if (process.env.DEBUG && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(ExitCode.FAILURE);
});
