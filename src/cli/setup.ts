/**
 * Shared command bootstrap: load configuration and install the logger.
 */

import { resolve } from 'path';
import type { Command } from 'commander';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import type { SafegateConfig } from '../core/types.js';

export interface CommandContext {
  config: SafegateConfig;
  projectDir: string;
}

export function loadContext(cmd: Command, dir = '.'): CommandContext {
  const projectDir = resolve(dir);
  const config = new ConfigManager(projectDir).load();
  const verbose = cmd.optsWithGlobals().verbose === true;

  setLogger(createLogger({
    level: config.logging.level,
    verbose: verbose || config.logging.verbose,
  }));

  return { config, projectDir };
}
