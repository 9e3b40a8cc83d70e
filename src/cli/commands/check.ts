/**
 * `safegate check "text"` — One safety-engine check against a fresh engine.
 */

import { Command } from 'commander';
import { createComponents } from '../../guardrails/pipeline.js';
import { severityName, type SafetyCheckResult } from '../../guardrails/types.js';
import { loadContext } from '../setup.js';

interface CheckOptions {
  dir: string;
  output?: boolean;
  json?: boolean;
}

export function createCheckCommand(): Command {
  const cmd = new Command('check');

  cmd
    .description('Score text against the safety rules and print the resulting action')
    .argument('<text...>', 'Text to check')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--output', 'Check as model output (adds misleading-claim detectors)')
    .option('--json', 'Output as JSON')
    .action((parts: string[], options: CheckOptions) => {
      const { config } = loadContext(cmd, options.dir);
      const { engine } = createComponents(config);
      const text = parts.join(' ');
      const result = options.output ? engine.checkOutput(text) : engine.checkInput(text);

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        printCheck(result);
      }

      if (result.action.kind === 'shutdown') {
        process.exitCode = 2;
      }
    });

  return cmd;
}

export function printCheck(result: SafetyCheckResult): void {
  console.log();
  console.log(`  Action:       ${result.action.kind} (${result.action.message})`);
  console.log(`  Penalty:      ${result.totalPenalty}`);
  console.log(`  Safety score: ${result.safetyScore.toFixed(2)}`);
  if (result.action.restrictions.length > 0) {
    console.log(`  Restrictions: ${result.action.restrictions.join(', ')}`);
  }
  if (result.violations.length > 0) {
    console.log('  Violations:');
    for (const v of result.violations) {
      console.log(`    [${severityName(v.severity)}] ${v.ruleName} +${v.penalty}  ${v.description}`);
    }
  }
  console.log();
}
