import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import type {
  OutputStats,
  SanitizationResult,
  SanitizerRules,
  ToneReport,
} from './types.js';

// ---------------------------------------------------------------------------
// Redaction, phrase and command tables
// ---------------------------------------------------------------------------

/** Applied in order; each replacement contains no characters its pattern matches. */
export const REDACTION_RULES: ReadonlyArray<{ pattern: RegExp; replacement: string }> = [
  { pattern: /\b\d{3}-\d{2}-\d{4}\b/g, replacement: '[SSN_REDACTED]' },
  { pattern: /\b\d{16}\b/g, replacement: '[CREDIT_CARD_REDACTED]' },
  { pattern: /\b\d{10}\b/g, replacement: '[PHONE_REDACTED]' },
  { pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, replacement: '[EMAIL_REDACTED]' },
];

export const DANGEROUS_PHRASES: readonly string[] = [
  'kill yourself', 'harm yourself', 'hurt someone',
  'build a bomb', 'make poison', 'hack into',
  'steal from', 'cheat on', 'bypass security',
];

export const SYSTEM_COMMAND_TOKENS: readonly string[] = ['sudo', 'rm -rf', 'format', 'del ', 'shutdown'];

export const COMMAND_PLACEHOLDER = '[COMMAND_REDACTED]';
export const TRUNCATION_MARKER = '... [TRUNCATED]';

const POSITIVE_WORDS = ['good', 'great', 'excellent', 'helpful', 'positive'];
const NEGATIVE_WORDS = ['bad', 'terrible', 'awful', 'harmful', 'negative'];

const PREVIEW_LENGTH = 100;

function codePointLength(text: string): number {
  return Array.from(text).length;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Tokens match from a word start, and to a word end when they end in a word character
const COMMAND_MATCHERS: ReadonlyArray<{ token: string; regex: RegExp }> = SYSTEM_COMMAND_TOKENS.map((token) => ({
  token,
  regex: new RegExp(`\\b${escapeRegExp(token)}${/\w$/.test(token) ? '\\b' : ''}`, 'gi'),
}));

/**
 * Redact sensitive substrings. Idempotent.
 */
export function redact(text: string): string {
  let result = text;
  for (const { pattern, replacement } of REDACTION_RULES) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

// ---------------------------------------------------------------------------
// OutputSanitizer
// ---------------------------------------------------------------------------

const DEFAULT_SANITIZER_RULES: SanitizerRules = {
  redactPersonalInfo: true,
  blockDangerousPhrases: true,
  redactSystemCommands: true,
};

/** Fields left undefined in `updates` keep their current value. */
function mergeRules(base: SanitizerRules, updates: Partial<SanitizerRules> = {}): SanitizerRules {
  return {
    redactPersonalInfo: updates.redactPersonalInfo ?? base.redactPersonalInfo,
    blockDangerousPhrases: updates.blockDangerousPhrases ?? base.blockDangerousPhrases,
    redactSystemCommands: updates.redactSystemCommands ?? base.redactSystemCommands,
  };
}

export interface OutputSanitizerOptions {
  maxLength?: number;
  rules?: Partial<SanitizerRules>;
  logger?: Logger;
  now?: () => number;
}

export class OutputSanitizer {
  private readonly maxLength: number;
  private rules: SanitizerRules;
  private readonly logger: Logger;
  private readonly now: () => number;

  private total = 0;
  private safe = 0;
  private modified = 0;
  private blocked = 0;

  constructor(options: OutputSanitizerOptions = {}) {
    this.maxLength = options.maxLength ?? 5000;
    this.rules = mergeRules(DEFAULT_SANITIZER_RULES, options.rules);
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? Date.now;
  }

  validate(output: unknown): SanitizationResult {
    this.total++;
    const original = typeof output === 'string' ? output : String(output);
    let text = this.rules.redactPersonalInfo ? redact(original) : original;

    if (this.rules.blockDangerousPhrases) {
      const lowered = text.toLowerCase();
      const found = DANGEROUS_PHRASES.filter((phrase) => lowered.includes(phrase));
      if (found.length > 0) {
        this.blocked++;
        this.logger.warn({ phrases: found }, 'Output blocked');
        return {
          safe: false,
          reason: `Dangerous phrases: ${found.join(', ')}`,
          matchedPhrases: found,
          preview: Array.from(original).slice(0, PREVIEW_LENGTH).join(''),
          timestamp: this.now(),
        };
      }
    }

    let modificationCount = 0;

    if (this.rules.redactSystemCommands) {
      for (const { regex } of COMMAND_MATCHERS) {
        regex.lastIndex = 0;
        if (regex.test(text)) {
          regex.lastIndex = 0;
          text = text.replace(regex, COMMAND_PLACEHOLDER);
          modificationCount++;
        }
      }
    }

    // Lengths and the cut point count code points, so a surrogate pair is never split
    const chars = Array.from(text);
    if (chars.length > this.maxLength) {
      text = chars.slice(0, this.maxLength).join('') + TRUNCATION_MARKER;
      modificationCount++;
    }

    this.safe++;
    this.modified += modificationCount;
    const finalLength = codePointLength(text);
    this.logger.debug({ modificationCount, length: finalLength }, 'Output sanitized');

    return {
      safe: true,
      output: text,
      originalLength: codePointLength(original),
      finalLength,
      modifications: text !== original ? 'redacted' : 'none',
      modificationCount,
      timestamp: this.now(),
    };
  }

  batchValidate(outputs: readonly unknown[]): SanitizationResult[] {
    return outputs.map((output) => this.validate(output));
  }

  /**
   * Word-count tone estimate; positive or negative when one side outnumbers the other.
   */
  checkTone(text: string): ToneReport {
    const lowered = text.toLowerCase();
    const positiveScore = POSITIVE_WORDS.filter((w) => lowered.includes(w)).length;
    const negativeScore = NEGATIVE_WORDS.filter((w) => lowered.includes(w)).length;

    let tone: ToneReport['tone'] = 'neutral';
    if (positiveScore > negativeScore) tone = 'positive';
    else if (negativeScore > positiveScore) tone = 'negative';

    return { tone, positiveScore, negativeScore };
  }

  updateRules(updates: Partial<SanitizerRules>): SanitizerRules {
    this.rules = mergeRules(this.rules, updates);
    this.logger.info({ rules: this.rules }, 'Output sanitizer rules updated');
    return { ...this.rules };
  }

  getRules(): SanitizerRules {
    return { ...this.rules };
  }

  getStats(): OutputStats {
    return {
      totalOutputs: this.total,
      safeOutputs: this.safe,
      modifiedOutputs: this.modified,
      blockedOutputs: this.blocked,
      safetyRate: this.safe / Math.max(this.total, 1),
      rulesActive: Object.values(this.rules).filter(Boolean).length,
    };
  }
}
