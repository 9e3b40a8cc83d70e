/**
 * `safegate validate "text"` — Run the input validator on one input.
 */

import { Command } from 'commander';
import { createComponents } from '../../guardrails/pipeline.js';
import { loadContext } from '../setup.js';

export function createValidateCommand(): Command {
  const cmd = new Command('validate');

  cmd
    .description('Check raw input for size, structure and suspicious patterns')
    .argument('<text...>', 'Input to validate')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action((parts: string[], options: { dir: string; json?: boolean }) => {
      const { config } = loadContext(cmd, options.dir);
      const { validator } = createComponents(config);
      const result = validator.validate(parts.join(' '));

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      if (result.valid) {
        console.log(`\n  Valid (${result.length} characters)\n`);
      } else {
        console.log(`\n  Rejected: ${result.failure}`);
        console.log(`  ${result.reason}\n`);
        process.exitCode = 1;
      }
    });

  return cmd;
}
