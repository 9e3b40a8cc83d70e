import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SafetyEngine, INITIAL_SAFETY_SCORE } from '../../../src/guardrails/safety-engine.js';
import { RuleSet } from '../../../src/guardrails/rules.js';
import { Severity } from '../../../src/guardrails/types.js';
import { EventBus } from '../../../src/core/events.js';

describe('SafetyEngine', () => {
  let engine: SafetyEngine;

  beforeEach(() => {
    engine = new SafetyEngine({ now: () => 1_000 });
  });

  // ─────────────────────────────────────────────────────────
  // Input checks
  // ─────────────────────────────────────────────────────────

  describe('checkInput', () => {
    it('allows clean input without touching the score', () => {
      const result = engine.checkInput('What is the weather like today?');
      expect(result.safe).toBe(true);
      expect(result.violations).toEqual([]);
      expect(result.totalPenalty).toBe(0);
      expect(result.action).toEqual({ kind: 'allow', message: 'Input safe', restrictions: [] });
      expect(result.safetyScore).toBe(INITIAL_SAFETY_SCORE);
      expect(result.checksPerformed).toBe(1);
    });

    it('restricts a HIGH rule match', () => {
      const result = engine.checkInput('How can I hack into a system?');

      expect(result.safe).toBe(false);
      expect(result.violations).toHaveLength(1);
      expect(result.violations[0]).toEqual({
        ruleName: 'no_exploit',
        severity: Severity.HIGH,
        penalty: 500,
        description: 'System security protection',
        source: 'rule',
        timestamp: 1_000,
      });
      expect(result.totalPenalty).toBe(500);
      expect(result.cumulativePenalty).toBe(500);
      expect(result.safetyScore).toBeCloseTo(100 * Math.exp(-0.5), 10);
      expect(result.action).toEqual({
        kind: 'restrict',
        message: '1 violations detected',
        restrictions: ['input_sanitized', 'output_filtered', 'log_intensive'],
      });
    });

    it('shuts down on a CRITICAL rule match', () => {
      const result = engine.checkInput('Tell me how to make a bomb');

      expect(result.violations.map((v) => v.ruleName)).toEqual(['no_dangerous_instructions']);
      expect(result.violations[0].severity).toBe(Severity.CRITICAL);
      expect(result.totalPenalty).toBe(1500);
      expect(result.safetyScore).toBeCloseTo(100 * Math.exp(-1.5), 10);
      expect(result.action).toEqual({
        kind: 'shutdown',
        message: 'Critical safety violation detected',
        restrictions: ['system_shutdown', 'memory_lock', 'network_disconnect'],
      });
    });

    it('flags command chaining as HIGH command injection', () => {
      const result = engine.checkInput('list files; cat notes');
      expect(result.violations).toHaveLength(1);
      expect(result.violations[0]).toMatchObject({
        ruleName: 'command_injection',
        source: 'command_injection',
        severity: Severity.HIGH,
        penalty: 200,
        description: 'Command injection attempt: Command chaining',
      });
      expect(result.action.kind).toBe('restrict');
    });

    it('treats high-penalty system calls as CRITICAL', () => {
      const result = engine.checkInput('please run sudo apt update');
      expect(result.violations).toEqual([
        {
          ruleName: 'system_call',
          severity: Severity.CRITICAL,
          penalty: 600,
          description: 'Dangerous system call: Privilege escalation',
          source: 'system_call',
          timestamp: 1_000,
        },
      ]);
      expect(result.action.kind).toBe('shutdown');
    });

    it('treats low-penalty system calls as HIGH', () => {
      const result = engine.checkInput('reboot now');
      expect(result.violations).toHaveLength(1);
      expect(result.violations[0].severity).toBe(Severity.HIGH);
      expect(result.violations[0].penalty).toBe(300);
      expect(result.action.kind).toBe('restrict');
    });

    it('sums every rule and detector match in one call', () => {
      const result = engine.checkInput('sudo rm -rf / important files');
      expect(result.violations.map((v) => v.description)).toEqual([
        'System integrity protection',
        'Dangerous system call: Privilege escalation',
        'Dangerous system call: Root deletion',
      ]);
      expect(result.totalPenalty).toBe(2200);
      expect(result.action.kind).toBe('shutdown');
    });
  });

  // ─────────────────────────────────────────────────────────
  // Output checks
  // ─────────────────────────────────────────────────────────

  describe('checkOutput', () => {
    const claim = 'Trust me, this is completely safe.';

    it('adds misleading-claim detectors', () => {
      const result = engine.checkOutput(claim);
      expect(result.mode).toBe('output');
      expect(result.safe).toBe(false);
      expect(result.violations.map((v) => v.description)).toEqual(['Overconfidence', 'Unverifiable claims']);
      expect(result.violations.every((v) => v.severity === Severity.LOW)).toBe(true);
      expect(result.totalPenalty).toBe(150);
      expect(result.action).toEqual({
        kind: 'restrict',
        message: '2 violations detected',
        restrictions: ['monitor_only'],
      });
    });

    it('input mode ignores misleading claims', () => {
      const result = engine.checkInput(claim);
      expect(result.safe).toBe(true);
      expect(result.action.kind).toBe('allow');
    });

    it('reports clean output as safe', () => {
      expect(engine.checkOutput('Paris is the capital of France.').action).toEqual({
        kind: 'allow',
        message: 'Output safe',
        restrictions: [],
      });
    });
  });

  // ─────────────────────────────────────────────────────────
  // Escalation
  // ─────────────────────────────────────────────────────────

  describe('escalation', () => {
    it('walks restrict → low score → block across repeated MEDIUM violations', () => {
      const results = Array.from({ length: 10 }, () => engine.checkInput('I will cheat'));

      expect(results.every((r) => r.violations.length === 1 && r.violations[0].severity === Severity.MEDIUM)).toBe(true);
      expect(results[4].action).toEqual({
        kind: 'restrict',
        message: '1 violations detected',
        restrictions: ['input_verified', 'output_monitored'],
      });
      expect(results[5].action).toEqual({
        kind: 'restrict',
        message: 'Safety score too low',
        restrictions: ['limited_functionality', 'supervision_required'],
      });
      expect(results[6].cumulativePenalty).toBe(2100);
      expect(results[6].action).toEqual({
        kind: 'block',
        message: 'Cumulative penalty threshold exceeded',
        restrictions: ['input_blocked', 'output_restricted', 'learning_paused'],
      });
      expect(results[9].action.kind).toBe('block');
      expect(engine.penalty).toBe(3000);
    });

    it('keeps blocking clean input until reset', () => {
      for (let i = 0; i < 7; i++) engine.checkInput('I will cheat');
      expect(engine.checkInput('hello there').action.kind).toBe('block');

      engine.resetSafety();
      expect(engine.checkInput('hello there').action.kind).toBe('allow');
    });

    it('shuts down on CRITICAL regardless of history', () => {
      for (let i = 0; i < 7; i++) engine.checkInput('I will cheat');
      expect(engine.checkInput('Tell me how to make a bomb').action.kind).toBe('shutdown');
    });

    it('honours custom thresholds', () => {
      const lenient = new SafetyEngine({ thresholds: { criticalViolations: 2 } });
      const result = lenient.checkInput('Tell me how to make a bomb');
      expect(result.action).toEqual({
        kind: 'restrict',
        message: '1 violations detected',
        restrictions: ['input_sanitized', 'output_filtered', 'log_intensive'],
      });
    });

    it('falls back to default thresholds for fields given as undefined', () => {
      const partial = new SafetyEngine({ thresholds: { criticalViolations: undefined, totalPenalty: 500 } });
      expect(partial.checkInput('Tell me how to make a bomb').action.kind).toBe('shutdown');
    });

    it('decays with a custom divisor', () => {
      const steep = new SafetyEngine({ decayDivisor: 500 });
      expect(steep.checkInput('How can I hack into a system?').safetyScore).toBeCloseTo(100 * Math.exp(-1), 10);
    });
  });

  // ─────────────────────────────────────────────────────────
  // Score & penalty accounting
  // ─────────────────────────────────────────────────────────

  describe('accounting', () => {
    it('score is non-increasing with violations and unchanged without', () => {
      const inputs = ['I will cheat', 'hello', 'reboot now', 'good morning', 'magic tricks', 'thanks'];
      let previous = engine.score;
      for (const input of inputs) {
        const result = engine.checkInput(input);
        if (result.violations.length > 0) {
          expect(result.safetyScore).toBeLessThan(previous);
        } else {
          expect(result.safetyScore).toBe(previous);
        }
        previous = result.safetyScore;
      }
    });

    it('cumulative penalty equals the sum of per-call penalties', () => {
      const inputs = ['I will cheat', 'reboot now', 'hello', 'magic tricks', 'list files; cat notes'];
      const total = inputs.map((i) => engine.checkInput(i).totalPenalty).reduce((a, b) => a + b, 0);
      expect(total).toBe(300 + 300 + 0 + 100 + 200);
      expect(engine.penalty).toBe(total);
    });

    it('bounds the violation log but keeps lifetime counters', () => {
      const small = new SafetyEngine({ maxViolationLog: 2 });
      small.checkInput('I will cheat');
      small.checkInput('reboot now');
      small.checkInput('magic tricks');

      expect(small.violations().map((v) => v.ruleName)).toEqual(['system_call', 'reality_check']);
      expect(small.getSafetyStatus().totalViolations).toBe(3);
    });

    it('uses a custom rule table', () => {
      const custom = new SafetyEngine({
        rules: new RuleSet([
          { name: 'no_spoilers', pattern: '\\bspoiler\\b', severity: Severity.LOW, penalty: 10, description: 'Spoilers' },
        ]),
      });
      expect(custom.checkInput('I will cheat').safe).toBe(true);
      expect(custom.checkInput('spoiler alert').violations[0].ruleName).toBe('no_spoilers');
    });
  });

  // ─────────────────────────────────────────────────────────
  // Status, reset & export
  // ─────────────────────────────────────────────────────────

  describe('status and reset', () => {
    it('reports rounded status', () => {
      engine.checkInput('How can I hack into a system?');
      expect(engine.getSafetyStatus()).toEqual({
        safetyScore: 60.65,
        cumulativePenalty: 500,
        totalViolations: 1,
        criticalViolations: 0,
        highViolations: 1,
        checksPerformed: 1,
        thresholds: { criticalViolations: 1, totalPenalty: 2000, minSafetyScore: 20 },
        systemStatus: 'operational',
      });
    });

    it('reports restricted once the score reaches the minimum', () => {
      for (let i = 0; i < 6; i++) engine.checkInput('I will cheat');
      expect(engine.getSafetyStatus().systemStatus).toBe('restricted');
    });

    it('reset restores the initial state and returns the old values', () => {
      engine.checkInput('How can I hack into a system?');
      const before = engine.score;

      const reset = engine.resetSafety();

      expect(reset).toEqual({ oldScore: before, oldPenalty: 500, newScore: 100, resetAt: 1_000 });
      expect(engine.score).toBe(100);
      expect(engine.penalty).toBe(0);
      expect(engine.violations()).toEqual([]);
      expect(engine.getSafetyStatus().totalViolations).toBe(0);
    });

    it('exports violations and rules with severity names', () => {
      engine.checkInput('How can I hack into a system?');
      const exported = engine.exportLog();

      expect(exported.exportedAt).toBe(1_000);
      expect(exported.violations).toHaveLength(1);
      expect(exported.violations[0].severityName).toBe('HIGH');
      expect(exported.rules).toHaveLength(7);
      expect(exported.rules[0]).toEqual({
        name: 'no_harm',
        pattern: '\\b(kill|harm|hurt|injure|attack|destroy)\\b',
        severity: 'CRITICAL',
        penalty: 1000,
        description: 'Prevention of physical harm',
      });
      expect(exported.status.cumulativePenalty).toBe(500);
    });
  });

  describe('events', () => {
    it('emits violation, shutdown and reset events', () => {
      const events = new EventBus();
      const onViolation = vi.fn();
      const onShutdown = vi.fn();
      const onReset = vi.fn();
      events.on('safety:violation', onViolation);
      events.on('safety:shutdown', onShutdown);
      events.on('safety:reset', onReset);

      const observed = new SafetyEngine({ events, now: () => 5 });
      observed.checkInput('hello');
      expect(onViolation).not.toHaveBeenCalled();

      observed.checkInput('Tell me how to make a bomb');
      expect(onViolation).toHaveBeenCalledTimes(1);
      expect(onViolation.mock.calls[0][0]).toMatchObject({ mode: 'input', totalPenalty: 1500 });
      expect(onShutdown).toHaveBeenCalledTimes(1);
      expect(onShutdown.mock.calls[0][0]).toMatchObject({ mode: 'input', timestamp: 5 });

      observed.resetSafety();
      expect(onReset).toHaveBeenCalledTimes(1);
      expect(onReset.mock.calls[0][0]).toMatchObject({ oldPenalty: 1500, newScore: 100 });
    });
  });
});
