/**
 * Rule table for the safety engine.
 *
 * A RuleSet is built once and never mutated. Patterns are compiled into
 * case-insensitive matchers at construction so a bad pattern fails fast.
 */

import { RuleError } from '../core/errors.js';
import { parseSeverity, Severity, type Rule } from './types.js';
import type { RuleConfig } from '../core/types.js';

/** Anything that can answer "does this pattern occur in this text". */
export interface TextMatcher {
  test(text: string): boolean;
}

export const DEFAULT_RULES: readonly Rule[] = Object.freeze([
  {
    name: 'no_harm',
    pattern: '\\b(kill|harm|hurt|injure|attack|destroy)\\b',
    severity: Severity.CRITICAL,
    penalty: 1000,
    description: 'Prevention of physical harm',
  },
  {
    name: 'no_exploit',
    pattern: '\\b(hack|exploit|breach|bypass|unauthorized)\\b',
    severity: Severity.HIGH,
    penalty: 500,
    description: 'System security protection',
  },
  {
    name: 'no_privacy_violation',
    pattern: '\\b(spy|snoop|eavesdrop|private|personal data)\\b',
    severity: Severity.HIGH,
    penalty: 400,
    description: 'Data privacy protection',
  },
  {
    name: 'no_dangerous_instructions',
    pattern: '\\b(bomb|weapon|poison|dangerous chemical)\\b',
    severity: Severity.CRITICAL,
    penalty: 1500,
    description: 'Prevention of dangerous creations',
  },
  {
    name: 'no_system_damage',
    pattern: '\\b(rm -rf|format|delete all|erase|corrupt)\\b',
    severity: Severity.HIGH,
    penalty: 600,
    description: 'System integrity protection',
  },
  {
    name: 'no_unethical',
    pattern: '\\b(cheat|steal|lie|deceive|manipulate)\\b',
    severity: Severity.MEDIUM,
    penalty: 300,
    description: 'Ethical behavior enforcement',
  },
  {
    name: 'reality_check',
    pattern: '\\b(time travel|teleport|magic|supernatural|infinite energy)\\b',
    severity: Severity.LOW,
    penalty: 100,
    description: 'Reality consistency check',
  },
]);

interface CompiledRule {
  rule: Rule;
  matcher: TextMatcher;
}

export function compilePattern(pattern: string): TextMatcher {
  // No global flag: test() must stay stateless between calls
  return new RegExp(pattern, 'i');
}

export function ruleFromConfig(config: RuleConfig): Rule {
  return {
    name: config.name,
    pattern: config.pattern,
    severity: parseSeverity(config.severity),
    penalty: config.penalty,
    description: config.description,
  };
}

export class RuleSet {
  private readonly compiled: readonly CompiledRule[];
  private readonly byName: ReadonlyMap<string, Rule>;

  constructor(rules: readonly Rule[]) {
    const byName = new Map<string, Rule>();
    const compiled: CompiledRule[] = [];

    for (const candidate of rules) {
      if (byName.has(candidate.name)) {
        throw new RuleError(`Duplicate rule name: ${candidate.name}`, candidate.name);
      }
      if (!Number.isInteger(candidate.penalty) || candidate.penalty <= 0) {
        throw new RuleError(
          `Rule ${candidate.name} must have a positive integer penalty, got ${candidate.penalty}`,
          candidate.name,
        );
      }

      let matcher: TextMatcher;
      try {
        matcher = compilePattern(candidate.pattern);
      } catch (err) {
        throw new RuleError(
          `Rule ${candidate.name} has an invalid pattern: ${candidate.pattern}`,
          candidate.name,
          err instanceof Error ? err : undefined,
        );
      }

      const rule = Object.freeze({ ...candidate });
      byName.set(rule.name, rule);
      compiled.push({ rule, matcher });
    }

    this.compiled = Object.freeze(compiled);
    this.byName = byName;
  }

  /**
   * Built-in rules followed by any extras.
   */
  static withDefaults(extra: readonly Rule[] = []): RuleSet {
    return new RuleSet([...DEFAULT_RULES, ...extra]);
  }

  /**
   * Every rule whose pattern occurs in `text`, in table order.
   */
  matching(text: string): Rule[] {
    return this.compiled.filter(({ matcher }) => matcher.test(text)).map(({ rule }) => rule);
  }

  get(name: string): Rule | undefined {
    return this.byName.get(name);
  }

  list(): readonly Rule[] {
    return this.compiled.map(({ rule }) => rule);
  }

  get size(): number {
    return this.compiled.length;
  }
}
