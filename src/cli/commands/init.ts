/**
 * `safegate init` — Write a starter .safegate.yaml into the project.
 */

import { Command } from 'commander';
import { resolve, join } from 'path';
import { ConfigManager, PROJECT_CONFIG_FILE } from '../../core/config.js';

export function createInitCommand(): Command {
  const cmd = new Command('init');

  cmd
    .description(`Create ${PROJECT_CONFIG_FILE} in the project directory`)
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action((options: { dir: string }) => {
      const projectDir = resolve(options.dir);
      const created = new ConfigManager(projectDir).createProjectConfig();
      const path = join(projectDir, PROJECT_CONFIG_FILE);

      if (created) {
        console.log(`\n  Created ${path}\n`);
      } else {
        console.log(`\n  ${path} already exists\n`);
      }
    });

  return cmd;
}
