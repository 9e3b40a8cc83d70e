/**
 * `safegate sanitize "text"` — Run the output sanitizer on one output.
 */

import { Command } from 'commander';
import { createComponents } from '../../guardrails/pipeline.js';
import { loadContext } from '../setup.js';

export function createSanitizeCommand(): Command {
  const cmd = new Command('sanitize');

  cmd
    .description('Redact, filter and truncate text as if it were model output')
    .argument('<text...>', 'Output to sanitize')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action((parts: string[], options: { dir: string; json?: boolean }) => {
      const { config } = loadContext(cmd, options.dir);
      const { sanitizer } = createComponents(config);
      const result = sanitizer.validate(parts.join(' '));

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      if (result.safe) {
        console.log(result.output);
      } else {
        console.error(`Blocked: ${result.reason}`);
        process.exitCode = 1;
      }
    });

  return cmd;
}
