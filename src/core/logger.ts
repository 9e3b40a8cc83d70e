import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  verbose?: boolean;
  /** Directory for the JSON log file. Defaults to ~/.safegate/logs */
  logDir?: string;
}

const DEFAULT_LOG_DIR = join(homedir(), '.safegate', 'logs');

function ensureLogDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const name = options.name ?? 'safegate';
  const level = options.level ?? 'info';

  if (options.verbose) {
    return pino({
      name,
      level: level === 'info' ? 'debug' : level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  const logDir = options.logDir ?? DEFAULT_LOG_DIR;
  ensureLogDir(logDir);

  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: join(logDir, 'safegate.log'), mkdir: true },
    },
  });
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}
