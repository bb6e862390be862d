/**
 * Validate Command
 *
 * Checks a workflow file without executing it: document syntax, field
 * names, step ids, successor references, cycles, reachability and input
 * bindings. With --handlers, also reports handler types the module does
 * not register.
 *
 * Usage:
 *   leadflow validate outreach.yaml
 *   leadflow validate outreach.yaml --handlers ./dist/handlers.js
 *   leadflow validate outreach.yaml --format json
 *
 * Exit codes:
 *   0 - Workflow valid (warnings allowed)
 *   1 - Workflow invalid or unreadable
 */

import type { Command } from 'commander';
import { ExitCode, WorkflowEngine } from '@leadflow/engine';
import { createFormatter } from '../formatters/createFormatter.js';
import type { CliValidateOptions } from '../types/CliValidateOptions.js';
import { formatOption } from '../utils/options.js';
import { loadHandlers } from '../utils/handlers.js';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <workflow>')
    .description('Validate a workflow without executing it')
    .option('-H, --handlers <module>', 'Also check handler types against this module')
    .addOption(formatOption())
    .option('--verbose', 'Show error context and the step list')
    .option('--silent', 'Only the verdict and its errors')
    .option('--no-color', 'Disable colored output')
    .action(validateWorkflow);
}

async function validateWorkflow(workflowPath: string, options: CliValidateOptions): Promise<void> {
  const formatter = createFormatter(options.format, {
    verbose: options.verbose,
    silent: options.silent,
    color: options.color,
  });

  try {
    const engine = new WorkflowEngine({ logLevel: options.verbose ? 'debug' : 'warn', colors: options.color });
    if (options.handlers) {
      await loadHandlers(options.handlers, engine.getRegistry());
    }

    const spec = await engine.loadWorkflow(workflowPath);
    const report = engine.validate(spec, { checkHandlers: options.handlers !== undefined });

    formatter.showValidation(engine.summarize(spec), report);
    process.exit(report.valid ? ExitCode.SUCCESS : ExitCode.FAILURE);
  } catch (error) {
    formatter.showError(error);
    process.exit(ExitCode.FAILURE);
  }
}
