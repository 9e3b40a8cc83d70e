/**
 * Guardrail Types — Safegate
 *
 * Type definitions for the gating pipeline: rule tables, violations,
 * safety verdicts, per-stage results and component statistics.
 */

// ═══════════════════════════════════════════════════════════════
// SEVERITY
// ═══════════════════════════════════════════════════════════════

/** Ordered severity of a rule or detector match. Higher is worse. */
export enum Severity {
  LOW = 1,
  MEDIUM = 2,
  HIGH = 3,
  CRITICAL = 4,
}

export type SeverityName = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

const SEVERITY_NAMES: Record<Severity, SeverityName> = {
  [Severity.LOW]: 'LOW',
  [Severity.MEDIUM]: 'MEDIUM',
  [Severity.HIGH]: 'HIGH',
  [Severity.CRITICAL]: 'CRITICAL',
};

export function severityName(severity: Severity): SeverityName {
  return SEVERITY_NAMES[severity];
}

export function parseSeverity(name: SeverityName): Severity {
  return Severity[name];
}

/** Negative when `a` is less severe than `b`, zero when equal. */
export function compareSeverity(a: Severity, b: Severity): number {
  return a - b;
}

// ═══════════════════════════════════════════════════════════════
// RULES & VIOLATIONS
// ═══════════════════════════════════════════════════════════════

/** A named pattern-to-penalty mapping. */
export interface Rule {
  /** Unique rule identifier */
  readonly name: string;
  /** Case-insensitive regular-expression source */
  readonly pattern: string;
  readonly severity: Severity;
  /** Positive integer penalty applied on match */
  readonly penalty: number;
  readonly description: string;
}

/** Where a violation came from. */
export type ViolationSource = 'rule' | 'command_injection' | 'system_call' | 'misleading_output';

/** One recorded rule or detector match. */
export interface Violation {
  ruleName: string;
  severity: Severity;
  penalty: number;
  description: string;
  source: ViolationSource;
  /** Unix timestamp (ms) */
  timestamp: number;
}

// ═══════════════════════════════════════════════════════════════
// ACTIONS
// ═══════════════════════════════════════════════════════════════

export type ActionKind = 'allow' | 'restrict' | 'block' | 'shutdown';

export type Restriction =
  | 'system_shutdown'
  | 'memory_lock'
  | 'network_disconnect'
  | 'input_blocked'
  | 'output_restricted'
  | 'learning_paused'
  | 'limited_functionality'
  | 'supervision_required'
  | 'input_sanitized'
  | 'output_filtered'
  | 'log_intensive'
  | 'input_verified'
  | 'output_monitored'
  | 'monitor_only';

/** The engine's verdict for a single check. */
export interface Action {
  kind: ActionKind;
  message: string;
  restrictions: Restriction[];
}

export type CheckMode = 'input' | 'output';

export interface SafetyCheckResult {
  mode: CheckMode;
  /** True iff this call produced no violations */
  safe: boolean;
  violations: Violation[];
  /** Sum of penalties from this call only */
  totalPenalty: number;
  action: Action;
  checksPerformed: number;
  safetyScore: number;
  cumulativePenalty: number;
}

export interface SafetyThresholds {
  /** CRITICAL matches in one call that trigger shutdown */
  criticalViolations: number;
  /** Lifetime penalty that triggers block */
  totalPenalty: number;
  /** Score at or below which checks are restricted */
  minSafetyScore: number;
}

export interface SafetyStatus {
  safetyScore: number;
  cumulativePenalty: number;
  totalViolations: number;
  criticalViolations: number;
  highViolations: number;
  checksPerformed: number;
  thresholds: SafetyThresholds;
  systemStatus: 'operational' | 'restricted';
}

export interface SafetyReset {
  oldScore: number;
  oldPenalty: number;
  newScore: number;
  resetAt: number;
}

export interface SafetyLogExport {
  violations: Array<Violation & { severityName: SeverityName }>;
  status: SafetyStatus;
  rules: Array<Omit<Rule, 'severity'> & { severity: SeverityName }>;
  exportedAt: number;
}

// ═══════════════════════════════════════════════════════════════
// INPUT VALIDATION
// ═══════════════════════════════════════════════════════════════

export type ValidationFailure =
  | 'EmptyInput'
  | 'OversizedInput'
  | 'SuspiciousPattern'
  | 'MalformedStructure'
  | 'GibberishInput';

export type ValidationResult =
  | {
      valid: true;
      normalized: string;
      length: number;
      /** Per-validator call counter, used as a correlation id */
      checkId: number;
      timestamp: number;
    }
  | {
      valid: false;
      failure: ValidationFailure;
      reason: string;
      checkId: number;
      matchedPatterns?: string[];
    };

export interface InputStats {
  totalInputs: number;
  validInputs: number;
  invalidInputs: number;
  suspiciousInputs: number;
  validityRate: number;
  patternsChecked: number;
}

// ═══════════════════════════════════════════════════════════════
// CONTENT CHECKING
// ═══════════════════════════════════════════════════════════════

export type ContentCategory = 'safety' | 'ethics' | 'system' | 'reality';

export interface ContentVerdict {
  approved: boolean;
  /** `category:keyword` or `pattern:<id>` tags */
  issues: string[];
  checkId: number;
  totalChecks: number;
  blocks: number;
}

export interface ContentAuditEntry {
  timestamp: number;
  contentPreview: string;
  approved: boolean;
  issues: string[];
  checkId: number;
}

export interface ContentStats {
  checksPerformed: number;
  blocks: number;
  approvalRate: number;
  lastCheck: ContentAuditEntry | null;
  categoriesChecked: ContentCategory[];
}

// ═══════════════════════════════════════════════════════════════
// OUTPUT SANITIZATION
// ═══════════════════════════════════════════════════════════════

export type SanitizationResult =
  | {
      safe: true;
      output: string;
      originalLength: number;
      finalLength: number;
      modifications: 'redacted' | 'none';
      modificationCount: number;
      timestamp: number;
    }
  | {
      safe: false;
      reason: string;
      matchedPhrases: string[];
      /** First 100 characters of the original output */
      preview: string;
      timestamp: number;
    };

export interface SanitizerRules {
  redactPersonalInfo: boolean;
  blockDangerousPhrases: boolean;
  redactSystemCommands: boolean;
}

export type Tone = 'positive' | 'negative' | 'neutral';

export interface ToneReport {
  tone: Tone;
  positiveScore: number;
  negativeScore: number;
}

export interface OutputStats {
  totalOutputs: number;
  safeOutputs: number;
  modifiedOutputs: number;
  blockedOutputs: number;
  safetyRate: number;
  rulesActive: number;
}
