/**
 * Command tree for the `leadflow` binary
 */

import { Command } from 'commander';
import { registerRunCommand } from './commands/run.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerExplainCommand } from './commands/explain.js';

// Keep in step with package.json
export const CLI_VERSION = '0.1.0';

export function createProgram(version: string = CLI_VERSION): Command {
  const program = new Command();

  program
    .name('leadflow')
    .description('Run outreach workflows defined as step graphs')
    .version(version, '-v, --version', 'Show version number')
    .helpOption('-h, --help', 'Show help');

  registerRunCommand(program);
  registerValidateCommand(program);
  registerExplainCommand(program);

  return program;
}
