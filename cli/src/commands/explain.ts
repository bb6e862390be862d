/**
 * Explain Command
 *
 * Prints how a workflow would run: its entry step, the parallel phases
 * and the flat execution order. Nothing is executed and no handlers are
 * needed.
 *
 * Usage:
 *   leadflow explain outreach.yaml
 *   leadflow explain outreach.yaml --verbose
 *   leadflow explain outreach.yaml --format json
 */

import type { Command } from 'commander';
import { ExitCode, WorkflowEngine } from '@leadflow/engine';
import { createFormatter } from '../formatters/createFormatter.js';
import type { CliExplainOptions } from '../types/CliExplainOptions.js';
import { formatOption } from '../utils/options.js';

export function registerExplainCommand(program: Command): void {
  program
    .command('explain <workflow>')
    .description('Show the execution plan without running anything')
    .addOption(formatOption())
    .option('--verbose', 'Also list every step')
    .option('--silent', 'Suppress informational output')
    .option('--no-color', 'Disable colored output')
    .action(explainWorkflow);
}

async function explainWorkflow(workflowPath: string, options: CliExplainOptions): Promise<void> {
  const formatter = createFormatter(options.format, {
    verbose: options.verbose,
    silent: options.silent,
    color: options.color,
  });

  try {
    const engine = new WorkflowEngine({ logLevel: 'warn', colors: options.color });
    const spec = await engine.loadWorkflow(workflowPath);

    formatter.showPlan(engine.summarize(spec), engine.explain(spec));
    process.exit(ExitCode.SUCCESS);
  } catch (error) {
    formatter.showError(error);
    process.exit(ExitCode.FAILURE);
  }
}
