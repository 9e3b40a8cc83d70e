/**
 * Safegate — Request/response gating pipeline
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, createPipeline } from 'safegate';
 *
 * const config = new ConfigManager(process.cwd()).load();
 * const pipeline = createPipeline(config, (text) => `echo: ${text}`);
 * const result = await pipeline.handle('hello there');
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager, PROJECT_CONFIG_FILE, GLOBAL_CONFIG_FILE } from './core/config.js';
export { createLogger, getLogger, setLogger, type LoggerOptions, type LogLevel } from './core/logger.js';
export {
  SafegateError,
  ConfigError,
  RuleError,
  ExportError,
  toError,
  type ErrorStage,
} from './core/errors.js';
export {
  SafegateConfigSchema,
  RuleConfigSchema,
  type SafegateConfig,
  type SafegateConfigInput,
  type RuleConfig,
  type PipelineStage,
  type SafegateEvents,
} from './core/types.js';

// Utils
export { CircularBuffer } from './utils/circular-buffer.js';

// Guardrails
export * from './guardrails/index.js';

// Version
export { VERSION, NAME } from './version.js';
