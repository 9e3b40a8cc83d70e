/**
 * `safegate status` — Show the effective configuration and rule table.
 */

import { Command } from 'commander';
import { existsSync } from 'fs';
import { join } from 'path';
import { PROJECT_CONFIG_FILE } from '../../core/config.js';
import { RuleSet, ruleFromConfig } from '../../guardrails/rules.js';
import { severityName } from '../../guardrails/types.js';
import { VERSION } from '../../version.js';
import { loadContext } from '../setup.js';

export function createStatusCommand(): Command {
  const cmd = new Command('status');

  cmd
    .description('Show Safegate configuration and active rules')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action((options: { dir: string; json?: boolean }) => {
      const { config, projectDir } = loadContext(cmd, options.dir);
      const rules = RuleSet.withDefaults(config.safety.rules.map(ruleFromConfig)).list();

      const status = {
        version: VERSION,
        projectDir,
        projectConfig: existsSync(join(projectDir, PROJECT_CONFIG_FILE)),
        config,
        rules: rules.map((rule) => ({ ...rule, severity: severityName(rule.severity) })),
      };

      if (options.json) {
        console.log(JSON.stringify(status, null, 2));
        return;
      }

      console.log();
      console.log(`  Safegate v${VERSION}`);
      console.log('  ' + '─'.repeat(40));
      console.log();

      console.log(`  Project:        ${projectDir}`);
      console.log(`  Project config: ${status.projectConfig ? 'Yes' : `No (run \`safegate init\`)`}`);
      console.log();

      console.log('  Thresholds:');
      console.log(`    Critical violations: ${config.safety.criticalViolations}`);
      console.log(`    Cumulative penalty:  ${config.safety.totalPenalty}`);
      console.log(`    Min safety score:    ${config.safety.minSafetyScore}`);
      console.log();

      console.log('  Limits:');
      console.log(`    Input:  ${config.input.maxLength} characters`);
      console.log(`    Output: ${config.output.maxLength} characters`);
      console.log();

      console.log(`  Rules (${status.rules.length}):`);
      for (const rule of status.rules) {
        console.log(`    ${rule.name.padEnd(28)} ${rule.severity.padEnd(9)} ${String(rule.penalty).padStart(5)}`);
      }
      console.log();
    });

  return cmd;
}
