/**
 * Run Command
 *
 * Loads a workflow file, registers the caller's handlers and runs the
 * workflow once, streaming engine events to the formatter.
 *
 * Usage:
 *   leadflow run outreach.yaml --handlers ./dist/handlers.js
 *   leadflow run outreach.yaml --handlers ./dist/handlers.js --concurrency 4 --timeout 30000
 *   leadflow run outreach.yaml --handlers ./dist/handlers.js --env PDL_API_KEY=test-key --format json
 *
 * Ctrl+C cancels the run: running steps finish, no new step starts, and
 * every step never started is reported as skipped.
 *
 * Exit codes:
 *   0 - Every step succeeded
 *   1 - The entry step failed, or the workflow was rejected before running
 *   2 - Partial success, or cancelled
 */

import type { Command } from 'commander';
import { ExitCode, WorkflowEngine, type WorkflowResult } from '@leadflow/engine';
import { createFormatter } from '../formatters/createFormatter.js';
import { parseKeyValuePairs, type CliRunOptions } from '../types/CliRunOptions.js';
import { collect, formatOption, parsePositiveInt } from '../utils/options.js';
import { loadHandlers } from '../utils/handlers.js';

export function registerRunCommand(program: Command): void {
  program
    .command('run <workflow>')
    .description('Execute a workflow')
    .requiredOption('-H, --handlers <module>', 'Module exporting registerHandlers(registry)')
    .option('-c, --concurrency <n>', 'Steps running at once', parsePositiveInt)
    .option('-t, --timeout <ms>', 'Per-step timeout in milliseconds', parsePositiveInt)
    .option('-e, --env <key=value>', 'Value for a {{VAR}} placeholder (repeatable)', collect)
    .option('--strict-env', 'Fail when a {{VAR}} placeholder has no value')
    .addOption(formatOption())
    .option('--verbose', 'Show step outputs and debug logs')
    .option('--silent', 'Only errors and the final result')
    .option('--no-color', 'Disable colored output')
    .action(runWorkflow);
}

/**
 * Exit code for a finished run
 */
export function exitCodeFor(result: WorkflowResult): ExitCode {
  switch (result.status) {
    case 'succeeded':
      return ExitCode.SUCCESS;
    case 'partial':
    case 'cancelled':
      return ExitCode.PARTIAL;
    case 'failed':
      return ExitCode.FAILURE;
  }
}

async function runWorkflow(workflowPath: string, options: CliRunOptions): Promise<void> {
  const formatter = createFormatter(options.format, {
    verbose: options.verbose,
    silent: options.silent,
    color: options.color,
  });

  const controller = new AbortController();
  const onSigint = (): void => {
    formatter.showWarning('Cancelling: no new steps will start');
    controller.abort();
  };

  try {
    const engine = new WorkflowEngine({
      logLevel: options.verbose ? 'debug' : 'warn',
      colors: options.color,
      maxConcurrentSteps: options.concurrency,
      stepTimeoutMs: options.timeout,
    });

    const registered = await loadHandlers(options.handlers, engine.getRegistry());
    engine.getRegistry().seal();
    if (options.verbose) {
      formatter.showInfo(`Handlers registered: ${registered.join(', ') || 'none'}`);
    }

    const spec = await engine.loadWorkflow(workflowPath, {
      env: { ...process.env, ...parseKeyValuePairs(options.env ?? []) },
      strictEnv: options.strictEnv,
    });

    engine.onAny((event) => formatter.onEvent(event));

    process.once('SIGINT', onSigint);
    const result = await engine.run(spec, { signal: controller.signal });
    process.removeListener('SIGINT', onSigint);

    formatter.showResult(result);
    process.exit(exitCodeFor(result));
  } catch (error) {
    process.removeListener('SIGINT', onSigint);
    formatter.showError(error);
    process.exit(ExitCode.FAILURE);
  }
}
