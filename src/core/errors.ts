export type ErrorStage = 'config' | 'rules' | 'export';

export class SafegateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: ErrorStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'SafegateError';
  }
}

export class ConfigError extends SafegateError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class RuleError extends SafegateError {
  constructor(message: string, public readonly ruleName: string, cause?: Error) {
    super(message, 'RULE_ERROR', 'rules', cause);
    this.name = 'RuleError';
  }
}

export class ExportError extends SafegateError {
  constructor(message: string, public readonly filePath: string, cause?: Error) {
    super(message, 'EXPORT_ERROR', 'export', cause);
    this.name = 'ExportError';
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
