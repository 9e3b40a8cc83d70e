import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import type { InputStats, ValidationFailure, ValidationResult } from './types.js';

/** Fixed unsafe substrings, matched case-insensitively. */
export const SUSPICIOUS_PATTERNS: readonly string[] = [
  '<!--', '-->',             // HTML comments
  '<script>', '</script>',   // Script tags
  'javascript:',
  'onerror=', 'onclick=',    // Event handlers
  '../', '~/',               // Path traversal
  '||', '&&',                // Command chaining
  '`', '$(',                 // Command substitution
];

const ALNUM = /[\p{L}\p{N}]/u;

export interface InputValidatorOptions {
  maxLength?: number;
  minAlnumRatio?: number;
  /** Inputs shorter than this are never treated as gibberish */
  gibberishMinLength?: number;
  extraPatterns?: readonly string[];
  logger?: Logger;
  now?: () => number;
}

/**
 * First gate of the pipeline: structural, size and suspicious-pattern
 * screening of raw input.
 */
export class InputValidator {
  private readonly maxLength: number;
  private readonly minAlnumRatio: number;
  private readonly gibberishMinLength: number;
  private readonly patterns: string[];
  private readonly logger: Logger;
  private readonly now: () => number;

  private total = 0;
  private valid = 0;
  private invalid = 0;
  private suspicious = 0;

  constructor(options: InputValidatorOptions = {}) {
    this.maxLength = options.maxLength ?? 10_000;
    this.minAlnumRatio = options.minAlnumRatio ?? 0.3;
    this.gibberishMinLength = options.gibberishMinLength ?? 10;
    this.patterns = [...SUSPICIOUS_PATTERNS];
    for (const pattern of options.extraPatterns ?? []) {
      this.addCustomPattern(pattern);
    }
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? Date.now;
  }

  validate(raw: unknown): ValidationResult {
    this.total++;
    const checkId = this.total;
    const text = normalizeInput(raw);
    const chars = Array.from(text);

    if (chars.length === 0) {
      return this.reject(checkId, 'EmptyInput', 'Input empty');
    }

    if (chars.length > this.maxLength) {
      return this.reject(checkId, 'OversizedInput', `Input too large (${chars.length} > ${this.maxLength} characters)`);
    }

    const lowered = text.toLowerCase();
    const matched = this.patterns.filter((p) => lowered.includes(p));
    if (matched.length > 0) {
      this.suspicious++;
      this.logger.warn({ checkId, patterns: matched }, 'Suspicious input rejected');
      return {
        valid: false,
        failure: 'SuspiciousPattern',
        reason: `Suspicious patterns: ${matched.join(', ')}`,
        checkId,
        matchedPatterns: matched,
      };
    }

    if ((text.startsWith('{') || text.startsWith('[')) && !isJson(text)) {
      return this.reject(checkId, 'MalformedStructure', 'Invalid JSON structure');
    }

    if (this.isGibberish(chars)) {
      return this.reject(checkId, 'GibberishInput', 'Input appears to be gibberish');
    }

    this.valid++;
    this.logger.debug({ checkId, length: chars.length }, 'Input validated');
    return {
      valid: true,
      normalized: text,
      length: chars.length,
      checkId,
      timestamp: this.now(),
    };
  }

  batchValidate(inputs: readonly unknown[]): ValidationResult[] {
    return inputs.map((input) => this.validate(input));
  }

  /**
   * Add an unsafe substring. Returns false when it is already screened.
   */
  addCustomPattern(pattern: string): boolean {
    const normalized = pattern.toLowerCase();
    if (normalized.length === 0 || this.patterns.includes(normalized)) {
      return false;
    }
    this.patterns.push(normalized);
    return true;
  }

  getStats(): InputStats {
    return {
      totalInputs: this.total,
      validInputs: this.valid,
      invalidInputs: this.invalid,
      suspiciousInputs: this.suspicious,
      validityRate: this.valid / Math.max(this.total, 1),
      patternsChecked: this.patterns.length,
    };
  }

  private isGibberish(chars: readonly string[]): boolean {
    if (chars.length < this.gibberishMinLength) {
      return false;
    }
    const alnum = chars.filter((c) => ALNUM.test(c)).length;
    return alnum / chars.length < this.minAlnumRatio;
  }

  private reject(checkId: number, failure: ValidationFailure, reason: string): ValidationResult {
    this.invalid++;
    this.logger.debug({ checkId, failure }, reason);
    return { valid: false, failure, reason, checkId };
  }
}

/**
 * Text form of a raw input: strings as-is, scalars stringified, objects
 * and arrays as JSON. NFC-normalized and trimmed.
 */
export function normalizeInput(raw: unknown): string {
  let text: string;
  if (raw === null || raw === undefined) {
    text = '';
  } else if (typeof raw === 'string') {
    text = raw;
  } else if (typeof raw === 'object') {
    text = stringifyObject(raw);
  } else {
    text = String(raw);
  }
  return text.normalize('NFC').trim();
}

function stringifyObject(value: object): string {
  try {
    // undefined when toJSON() yields nothing serializable
    return JSON.stringify(value) ?? String(value);
  } catch {
    // Circular structures have no JSON form
    return String(value);
  }
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}
