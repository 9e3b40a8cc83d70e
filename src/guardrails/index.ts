/**
 * Request Gating Pipeline — Safegate
 *
 * Input validation, content checking, penalty-scored safety verdicts
 * and output sanitization, sequenced around an injected reasoning step.
 *
 * @example
 * ```typescript
 * import { ConfigManager, createPipeline } from 'safegate';
 *
 * const config = new ConfigManager().load();
 * const pipeline = createPipeline(config, async (text) => summarize(text));
 *
 * const result = await pipeline.handle('What is the capital of France?');
 * if (result.accepted) console.log(result.sanitizedOutput);
 * else console.log(result.rejection.stage, result.rejectionReason);
 * ```
 */

export { RuleSet, DEFAULT_RULES, compilePattern, ruleFromConfig, type TextMatcher } from './rules.js';
export { InputValidator, SUSPICIOUS_PATTERNS, normalizeInput, type InputValidatorOptions } from './input-validator.js';
export { ContentChecker, CONTENT_CATEGORIES, type ContentCheckerOptions } from './content-checker.js';
export { SafetyEngine, INITIAL_SAFETY_SCORE, type SafetyEngineOptions } from './safety-engine.js';
export {
  OutputSanitizer,
  redact,
  REDACTION_RULES,
  DANGEROUS_PHRASES,
  SYSTEM_COMMAND_TOKENS,
  COMMAND_PLACEHOLDER,
  TRUNCATION_MARKER,
  type OutputSanitizerOptions,
} from './output-sanitizer.js';
export {
  PipelineCoordinator,
  createPipeline,
  createComponents,
  type Reasoner,
  type RejectionKind,
  type Rejection,
  type PipelineResult,
  type CoordinationEntry,
  type PipelineStats,
  type PipelineComponents,
  type PipelineOptions,
  type CreatePipelineOptions,
} from './pipeline.js';
export { exportSafetyLog } from './safety-log.js';
export { Severity, severityName, parseSeverity, compareSeverity } from './types.js';
export type {
  SeverityName,
  Rule,
  ViolationSource,
  Violation,
  ActionKind,
  Restriction,
  Action,
  CheckMode,
  SafetyCheckResult,
  SafetyThresholds,
  SafetyStatus,
  SafetyReset,
  SafetyLogExport,
  ValidationFailure,
  ValidationResult,
  InputStats,
  ContentCategory,
  ContentVerdict,
  ContentAuditEntry,
  ContentStats,
  SanitizationResult,
  SanitizerRules,
  Tone,
  ToneReport,
  OutputStats,
} from './types.js';
