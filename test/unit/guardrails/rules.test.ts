import { describe, it, expect } from 'vitest';
import { RuleSet, DEFAULT_RULES, ruleFromConfig } from '../../../src/guardrails/rules.js';
import { Severity, type Rule } from '../../../src/guardrails/types.js';
import { RuleError } from '../../../src/core/errors.js';

function makeRule(overrides: Partial<Rule> = {}): Rule {
  return {
    name: 'no_secrets',
    pattern: '\\b(password|api key)\\b',
    severity: Severity.HIGH,
    penalty: 400,
    description: 'Credential disclosure',
    ...overrides,
  };
}

describe('RuleSet', () => {
  it('ships seven default rules in table order', () => {
    const rules = RuleSet.withDefaults();
    expect(rules.size).toBe(7);
    expect(rules.list().map((r) => r.name)).toEqual([
      'no_harm',
      'no_exploit',
      'no_privacy_violation',
      'no_dangerous_instructions',
      'no_system_damage',
      'no_unethical',
      'reality_check',
    ]);
    expect(DEFAULT_RULES).toHaveLength(7);
  });

  it('matches case-insensitively on word boundaries', () => {
    const rules = RuleSet.withDefaults();
    expect(rules.matching('How can I HACK into a system?').map((r) => r.name)).toEqual(['no_exploit']);
    expect(rules.matching('a hacker news article')).toEqual([]);
  });

  it('returns every matching rule', () => {
    const rules = RuleSet.withDefaults();
    const names = rules.matching('steal the bomb').map((r) => r.name);
    expect(names).toEqual(['no_dangerous_instructions', 'no_unethical']);
  });

  it('matching is stable across repeated calls', () => {
    const rules = RuleSet.withDefaults();
    expect(rules.matching('magic')).toHaveLength(1);
    expect(rules.matching('magic')).toHaveLength(1);
  });

  it('appends extra rules after the defaults', () => {
    const rules = RuleSet.withDefaults([makeRule()]);
    expect(rules.size).toBe(8);
    expect(rules.get('no_secrets')?.penalty).toBe(400);
    expect(rules.matching('my password is hunter2').map((r) => r.name)).toEqual(['no_secrets']);
  });

  it('rejects duplicate names', () => {
    expect(() => new RuleSet([makeRule(), makeRule()])).toThrow(RuleError);
    expect(() => new RuleSet([makeRule(), makeRule()])).toThrow('Duplicate rule name: no_secrets');
  });

  it('rejects non-positive and fractional penalties', () => {
    expect(() => new RuleSet([makeRule({ penalty: 0 })])).toThrow(RuleError);
    expect(() => new RuleSet([makeRule({ penalty: 2.5 })])).toThrow(
      'Rule no_secrets must have a positive integer penalty, got 2.5',
    );
  });

  it('rejects invalid patterns at construction', () => {
    try {
      new RuleSet([makeRule({ pattern: '(unclosed' })]);
      expect.unreachable('constructor should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(RuleError);
      if (err instanceof RuleError) {
        expect(err.ruleName).toBe('no_secrets');
        expect(err.message).toBe('Rule no_secrets has an invalid pattern: (unclosed');
        expect(err.cause).toBeInstanceOf(SyntaxError);
      }
    }
  });

  it('freezes stored rules', () => {
    const rules = new RuleSet([makeRule()]);
    expect(Object.isFrozen(rules.get('no_secrets'))).toBe(true);
  });
});

describe('ruleFromConfig', () => {
  it('maps severity names onto the enum', () => {
    const rule = ruleFromConfig({
      name: 'no_spam',
      pattern: 'buy now',
      severity: 'MEDIUM',
      penalty: 200,
      description: 'Spam',
    });
    expect(rule.severity).toBe(Severity.MEDIUM);
    expect(rule.penalty).toBe(200);
  });
});
