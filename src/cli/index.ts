/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { SafegateError } from '../core/errors.js';
import { createCheckCommand } from './commands/check.js';
import { createValidateCommand } from './commands/validate.js';
import { createSanitizeCommand } from './commands/sanitize.js';
import { createRunCommand } from './commands/run.js';
import { createStatusCommand } from './commands/status.js';
import { createInitCommand } from './commands/init.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Safegate — validation and safety gating for request/response pipelines')
    .option('-v, --verbose', 'Log to stderr with pretty output');

  program.addCommand(createCheckCommand());
  program.addCommand(createValidateCommand());
  program.addCommand(createSanitizeCommand());
  program.addCommand(createRunCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createInitCommand());

  return program;
}

export async function main(): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof SafegateError) {
      console.error(`\n❌ [${error.code}] ${error.message}\n`);
    } else if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
    }
    if (process.env.DEBUG && error instanceof Error) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}
