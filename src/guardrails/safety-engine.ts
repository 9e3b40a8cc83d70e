/**
 * SafetyEngine — Penalty-scored safety verdicts
 *
 * Matches text against the rule table and two fixed detector families,
 * accumulates a lifetime penalty, decays a 0–100 safety score, and resolves
 * an escalating action (allow → restrict → block → shutdown).
 *
 * Every check runs synchronously: the log append, penalty add and score
 * decay of one call are applied in a single turn of the event loop, so
 * concurrent requests sharing an engine can never interleave them.
 */

import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import type { EventBus } from '../core/events.js';
import { CircularBuffer } from '../utils/circular-buffer.js';
import { RuleSet } from './rules.js';
import {
  Severity,
  severityName,
  type Action,
  type CheckMode,
  type Restriction,
  type SafetyCheckResult,
  type SafetyLogExport,
  type SafetyReset,
  type SafetyStatus,
  type SafetyThresholds,
  type Violation,
  type ViolationSource,
} from './types.js';

// ═══════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════

export const INITIAL_SAFETY_SCORE = 100.0;

const DEFAULT_THRESHOLDS: SafetyThresholds = {
  criticalViolations: 1,
  totalPenalty: 2000,
  minSafetyScore: 20.0,
};

// ═══════════════════════════════════════════════════════════════
// DETECTOR TABLES
// ═══════════════════════════════════════════════════════════════

interface PatternDetector {
  regex: RegExp;
  description: string;
  penalty: number;
  severity: Severity;
}

const COMMAND_INJECTION_DETECTORS: readonly PatternDetector[] = [
  { regex: /;\s*\w+/i, description: 'Command chaining', penalty: 200, severity: Severity.HIGH },
  { regex: /\|\s*\w+/i, description: 'Pipe command', penalty: 200, severity: Severity.HIGH },
  { regex: /&&\s*\w+/i, description: 'AND command', penalty: 200, severity: Severity.HIGH },
  { regex: /\|\|\s*\w+/i, description: 'OR command', penalty: 200, severity: Severity.HIGH },
  { regex: /`.*`/i, description: 'Command substitution', penalty: 300, severity: Severity.HIGH },
  { regex: /\$\s*\(.*\)/i, description: 'Command execution', penalty: 300, severity: Severity.HIGH },
  { regex: /eval\s*\(.*\)/i, description: 'Eval function', penalty: 400, severity: Severity.HIGH },
  { regex: /exec\s*\(.*\)/i, description: 'Exec function', penalty: 400, severity: Severity.HIGH },
  { regex: /system\s*\(.*\)/i, description: 'System call', penalty: 500, severity: Severity.HIGH },
];

const DANGEROUS_SYSTEM_CALLS: ReadonlyArray<{ call: string; description: string; penalty: number }> = [
  { call: 'sudo', description: 'Privilege escalation', penalty: 600 },
  { call: 'chmod 777', description: 'Permission change', penalty: 400 },
  { call: 'chown root', description: 'Ownership change', penalty: 400 },
  { call: 'dd if=', description: 'Disk operations', penalty: 500 },
  { call: 'mkfs', description: 'Filesystem creation', penalty: 500 },
  { call: 'fdisk', description: 'Partition operations', penalty: 500 },
  { call: 'shutdown', description: 'System shutdown', penalty: 300 },
  { call: 'reboot', description: 'System reboot', penalty: 300 },
  { call: 'kill -9', description: 'Process termination', penalty: 300 },
  { call: 'rm -rf /', description: 'Root deletion', penalty: 1000 },
];

/** Penalty at or above which a dangerous system call is CRITICAL */
const CRITICAL_SYSTEM_CALL_PENALTY = 500;

const MISLEADING_OUTPUT_DETECTORS: readonly PatternDetector[] = [
  { regex: /\b(100% guaranteed|no risk|completely safe)\b/i, description: 'Overconfidence', penalty: 100, severity: Severity.LOW },
  { regex: /\b(trust me|believe me|I promise)\b/i, description: 'Unverifiable claims', penalty: 50, severity: Severity.LOW },
  { regex: /\b(secret|hidden|confidential|not public)\b/i, description: 'Secretive behavior', penalty: 150, severity: Severity.LOW },
];

const SEVERITY_RESTRICTIONS: Record<Severity, Restriction[]> = {
  [Severity.CRITICAL]: ['input_sanitized', 'output_filtered', 'log_intensive'],
  [Severity.HIGH]: ['input_sanitized', 'output_filtered', 'log_intensive'],
  [Severity.MEDIUM]: ['input_verified', 'output_monitored'],
  [Severity.LOW]: ['monitor_only'],
};

// ═══════════════════════════════════════════════════════════════
// SAFETY ENGINE
// ═══════════════════════════════════════════════════════════════

export interface SafetyEngineOptions {
  rules?: RuleSet;
  thresholds?: Partial<SafetyThresholds>;
  /** Penalty divisor in the score decay `exp(-penalty / decayDivisor)` */
  decayDivisor?: number;
  /** Violations retained for export; older ones are evicted */
  maxViolationLog?: number;
  events?: EventBus;
  logger?: Logger;
  now?: () => number;
}

export class SafetyEngine {
  private readonly rules: RuleSet;
  private readonly thresholds: SafetyThresholds;
  private readonly decayDivisor: number;
  private readonly events?: EventBus;
  private readonly logger: Logger;
  private readonly now: () => number;

  private violationLog: CircularBuffer<Violation>;
  private safetyScore = INITIAL_SAFETY_SCORE;
  private cumulativePenalty = 0;
  private checksPerformed = 0;

  // Lifetime counters since the last reset; the log itself is bounded
  private totalViolations = 0;
  private criticalCount = 0;
  private highCount = 0;

  constructor(options: SafetyEngineOptions = {}) {
    this.rules = options.rules ?? RuleSet.withDefaults();
    const thresholds = options.thresholds ?? {};
    this.thresholds = Object.freeze({
      criticalViolations: thresholds.criticalViolations ?? DEFAULT_THRESHOLDS.criticalViolations,
      totalPenalty: thresholds.totalPenalty ?? DEFAULT_THRESHOLDS.totalPenalty,
      minSafetyScore: thresholds.minSafetyScore ?? DEFAULT_THRESHOLDS.minSafetyScore,
    });
    this.decayDivisor = options.decayDivisor ?? 1000;
    this.violationLog = new CircularBuffer<Violation>(options.maxViolationLog ?? 10_000);
    this.events = options.events;
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? Date.now;
  }

  // ─────────────────────────────────────────────────────────
  // CHECKS
  // ─────────────────────────────────────────────────────────

  /**
   * Check inbound text against the rule table and the injection/system-call detectors.
   */
  checkInput(text: string): SafetyCheckResult {
    return this.evaluate(text, 'input');
  }

  /**
   * Same as checkInput, plus the misleading-claim detectors. Misleading
   * matches count toward this call's penalty and mark it unsafe.
   */
  checkOutput(text: string): SafetyCheckResult {
    return this.evaluate(text, 'output');
  }

  private evaluate(text: string, mode: CheckMode): SafetyCheckResult {
    this.checksPerformed++;
    const timestamp = this.now();
    const lowered = text.toLowerCase();

    const violations: Violation[] = [
      ...this.rules.matching(lowered).map((rule) => ({
        ruleName: rule.name,
        severity: rule.severity,
        penalty: rule.penalty,
        description: rule.description,
        source: 'rule' as const,
        timestamp,
      })),
      ...this.detectCommandInjection(text, timestamp),
      ...this.detectSystemCalls(lowered, timestamp),
      ...(mode === 'output' ? this.detectMisleadingClaims(text, timestamp) : []),
    ];

    const totalPenalty = violations.reduce((sum, v) => sum + v.penalty, 0);

    if (violations.length > 0) {
      this.commit(violations, totalPenalty);
    }

    const action = this.resolveAction(violations, mode);

    this.logger.debug(
      { mode, violations: violations.length, totalPenalty, action: action.kind, safetyScore: this.safetyScore },
      'Safety check completed',
    );

    if (violations.length > 0) {
      this.logger.warn(
        { mode, rules: violations.map((v) => v.ruleName), totalPenalty, cumulativePenalty: this.cumulativePenalty },
        'Safety violations detected',
      );
      this.events?.emit('safety:violation', {
        mode,
        violations,
        totalPenalty,
        safetyScore: this.safetyScore,
      });
    }

    if (action.kind === 'shutdown') {
      this.logger.fatal(
        { mode, violations: violations.filter((v) => v.severity === Severity.CRITICAL).map((v) => v.description) },
        action.message,
      );
      this.events?.emit('safety:shutdown', { mode, action, violations, timestamp });
    }

    return {
      mode,
      safe: violations.length === 0,
      violations,
      totalPenalty,
      action,
      checksPerformed: this.checksPerformed,
      safetyScore: this.safetyScore,
      cumulativePenalty: this.cumulativePenalty,
    };
  }

  /**
   * Apply one call's violations to the engine state. Log, penalty and
   * score always move together.
   */
  private commit(violations: Violation[], callPenalty: number): void {
    this.violationLog.pushAll(violations);
    this.totalViolations += violations.length;
    for (const v of violations) {
      if (v.severity === Severity.CRITICAL) this.criticalCount++;
      else if (v.severity === Severity.HIGH) this.highCount++;
    }
    this.cumulativePenalty += callPenalty;
    // Decays on this call's penalty only; cumulative penalty is a separate signal
    this.safetyScore = Math.max(0, this.safetyScore * Math.exp(-callPenalty / this.decayDivisor));
  }

  private detectCommandInjection(text: string, timestamp: number): Violation[] {
    return COMMAND_INJECTION_DETECTORS
      .filter(({ regex }) => regex.test(text))
      .map((d) => this.detectorViolation('command_injection', `Command injection attempt: ${d.description}`, d, timestamp));
  }

  private detectSystemCalls(lowered: string, timestamp: number): Violation[] {
    return DANGEROUS_SYSTEM_CALLS
      .filter(({ call }) => lowered.includes(call))
      .map(({ description, penalty }) => ({
        ruleName: 'system_call',
        severity: penalty >= CRITICAL_SYSTEM_CALL_PENALTY ? Severity.CRITICAL : Severity.HIGH,
        penalty,
        description: `Dangerous system call: ${description}`,
        source: 'system_call' as const,
        timestamp,
      }));
  }

  private detectMisleadingClaims(text: string, timestamp: number): Violation[] {
    return MISLEADING_OUTPUT_DETECTORS
      .filter(({ regex }) => regex.test(text))
      .map((d) => this.detectorViolation('misleading_output', d.description, d, timestamp));
  }

  private detectorViolation(
    source: ViolationSource,
    description: string,
    detector: PatternDetector,
    timestamp: number,
  ): Violation {
    return {
      ruleName: source,
      severity: detector.severity,
      penalty: detector.penalty,
      description,
      source,
      timestamp,
    };
  }

  // ─────────────────────────────────────────────────────────
  // ACTION RESOLUTION
  // ─────────────────────────────────────────────────────────

  private resolveAction(violations: Violation[], mode: CheckMode): Action {
    const criticalCount = violations.filter((v) => v.severity === Severity.CRITICAL).length;

    if (criticalCount >= this.thresholds.criticalViolations) {
      return {
        kind: 'shutdown',
        message: 'Critical safety violation detected',
        restrictions: ['system_shutdown', 'memory_lock', 'network_disconnect'],
      };
    }

    if (this.cumulativePenalty >= this.thresholds.totalPenalty) {
      return {
        kind: 'block',
        message: 'Cumulative penalty threshold exceeded',
        restrictions: ['input_blocked', 'output_restricted', 'learning_paused'],
      };
    }

    if (this.safetyScore <= this.thresholds.minSafetyScore) {
      return {
        kind: 'restrict',
        message: 'Safety score too low',
        restrictions: ['limited_functionality', 'supervision_required'],
      };
    }

    if (violations.length > 0) {
      const restrictions = new Set<Restriction>();
      for (const v of violations) {
        for (const r of SEVERITY_RESTRICTIONS[v.severity]) restrictions.add(r);
      }
      return {
        kind: 'restrict',
        message: `${violations.length} violations detected`,
        restrictions: [...restrictions],
      };
    }

    return {
      kind: 'allow',
      message: mode === 'input' ? 'Input safe' : 'Output safe',
      restrictions: [],
    };
  }

  // ─────────────────────────────────────────────────────────
  // STATUS, RESET & EXPORT
  // ─────────────────────────────────────────────────────────

  getSafetyStatus(): SafetyStatus {
    return {
      safetyScore: Math.round(this.safetyScore * 100) / 100,
      cumulativePenalty: this.cumulativePenalty,
      totalViolations: this.totalViolations,
      criticalViolations: this.criticalCount,
      highViolations: this.highCount,
      checksPerformed: this.checksPerformed,
      thresholds: { ...this.thresholds },
      systemStatus: this.safetyScore > this.thresholds.minSafetyScore ? 'operational' : 'restricted',
    };
  }

  getStats(): SafetyStatus {
    return this.getSafetyStatus();
  }

  get score(): number {
    return this.safetyScore;
  }

  get penalty(): number {
    return this.cumulativePenalty;
  }

  /** Retained violations, oldest first */
  violations(): Violation[] {
    return this.violationLog.toArray();
  }

  ruleSet(): RuleSet {
    return this.rules;
  }

  /**
   * Restore score and penalty and clear the violation log.
   * Callers must treat this as privileged; the engine does not authorize.
   */
  resetSafety(): SafetyReset {
    const reset: SafetyReset = {
      oldScore: this.safetyScore,
      oldPenalty: this.cumulativePenalty,
      newScore: INITIAL_SAFETY_SCORE,
      resetAt: this.now(),
    };

    this.safetyScore = INITIAL_SAFETY_SCORE;
    this.cumulativePenalty = 0;
    this.violationLog.clear();
    this.totalViolations = 0;
    this.criticalCount = 0;
    this.highCount = 0;

    this.logger.warn({ oldScore: reset.oldScore, oldPenalty: reset.oldPenalty }, 'Safety state reset');
    this.events?.emit('safety:reset', { ...reset, status: this.getSafetyStatus() });

    return reset;
  }

  /**
   * Snapshot of the violation log, status and rule table.
   */
  exportLog(): SafetyLogExport {
    return {
      violations: this.violationLog.toArray().map((v) => ({ ...v, severityName: severityName(v.severity) })),
      status: this.getSafetyStatus(),
      rules: this.rules.list().map((rule) => ({ ...rule, severity: severityName(rule.severity) })),
      exportedAt: this.now(),
    };
  }
}
