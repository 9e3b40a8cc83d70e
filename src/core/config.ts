import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { SafegateConfigSchema, type SafegateConfig, type SafegateConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';

export const PROJECT_CONFIG_FILE = '.safegate.yaml';
export const GLOBAL_CONFIG_FILE = 'config.yaml';

export class ConfigManager {
  private config: SafegateConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir || join(homedir(), '.safegate');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: SafegateConfigInput): SafegateConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, GLOBAL_CONFIG_FILE), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, PROJECT_CONFIG_FILE), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, { ...overrides });
    }

    const parsed = SafegateConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${details}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): SafegateConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  /**
   * Write a commented starter config into the project directory.
   * Returns false when one already exists.
   */
  createProjectConfig(): boolean {
    const configPath = join(this.projectDir, PROJECT_CONFIG_FILE);
    if (existsSync(configPath)) {
      return false;
    }
    mkdirSync(this.projectDir, { recursive: true });
    const starter = `# Safegate project configuration
input:
  maxLength: 10000

safety:
  totalPenalty: 2000
  minSafetyScore: 20
  # rules:
  #   - name: no_secrets
  #     pattern: "\\\\b(api key|password)\\\\b"
  #     severity: HIGH
  #     penalty: 400
  #     description: Credential disclosure

output:
  maxLength: 5000

logging:
  level: info
`;
    writeFileSync(configPath, starter, 'utf-8');
    return true;
  }

  private readYaml(path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) {
      return {};
    }
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const result = { ...raw };
    const logging = isRecord(result.logging) ? { ...result.logging } : {};
    const input = isRecord(result.input) ? { ...result.input } : {};
    const output = isRecord(result.output) ? { ...result.output } : {};

    if (process.env.SAFEGATE_LOG_LEVEL) {
      logging.level = process.env.SAFEGATE_LOG_LEVEL;
    }
    if (process.env.SAFEGATE_VERBOSE) {
      logging.verbose = process.env.SAFEGATE_VERBOSE === '1' || process.env.SAFEGATE_VERBOSE === 'true';
    }
    if (process.env.SAFEGATE_MAX_INPUT_LENGTH) {
      input.maxLength = Number(process.env.SAFEGATE_MAX_INPUT_LENGTH);
    }
    if (process.env.SAFEGATE_MAX_OUTPUT_LENGTH) {
      output.maxLength = Number(process.env.SAFEGATE_MAX_OUTPUT_LENGTH);
    }

    result.logging = logging;
    result.input = input;
    result.output = output;
    return result;
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const next = source[key];
      const current = target[key];
      if (isRecord(next) && isRecord(current)) {
        result[key] = this.deepMerge(current, next);
      } else {
        result[key] = next;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
