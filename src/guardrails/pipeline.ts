/**
 * PipelineCoordinator — Sequenced request gating
 *
 * Runs one request through input validation, content checking, the safety
 * engine's input check, the injected reasoning step, the output check and
 * output sanitization. The first failing stage ends the request with a
 * structured rejection; nothing past it runs.
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import { toError } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import type { PipelineStage, SafegateConfig } from '../core/types.js';
import { CircularBuffer } from '../utils/circular-buffer.js';
import { ContentChecker } from './content-checker.js';
import { InputValidator } from './input-validator.js';
import { OutputSanitizer } from './output-sanitizer.js';
import { ruleFromConfig, RuleSet } from './rules.js';
import { SafetyEngine } from './safety-engine.js';
import type {
  Action,
  ContentStats,
  InputStats,
  OutputStats,
  SafetyReset,
  SafetyStatus,
} from './types.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

/** Downstream processing step. Receives only text that passed every input gate. */
export type Reasoner = (text: string) => string | Promise<string>;

export type RejectionKind =
  | 'InputRejected'
  | 'ContentBlocked'
  | 'SafetyAction'
  | 'OutputBlocked'
  | 'ReasoningFailed';

export interface Rejection {
  kind: RejectionKind;
  stage: PipelineStage;
  reason: string;
  /** Set for SafetyAction rejections */
  action?: Action;
  /** True only for a shutdown verdict */
  fatal: boolean;
}

export type PipelineResult =
  | {
      accepted: true;
      requestId: string;
      sanitizedOutput: string;
      durationMs: number;
    }
  | {
      accepted: false;
      requestId: string;
      rejectionReason: string;
      rejection: Rejection;
      durationMs: number;
    };

export interface CoordinationEntry {
  requestId: string;
  timestamp: number;
  accepted: boolean;
  stage?: PipelineStage;
  reason?: string;
  durationMs: number;
}

export interface PipelineStats {
  requests: number;
  accepted: number;
  rejected: number;
  successRate: number;
  rejectionsByStage: Record<PipelineStage, number>;
  input: InputStats;
  content: ContentStats;
  safety: SafetyStatus;
  output: OutputStats;
}

export interface PipelineComponents {
  validator: InputValidator;
  checker: ContentChecker;
  engine: SafetyEngine;
  sanitizer: OutputSanitizer;
}

export interface PipelineOptions extends PipelineComponents {
  reason: Reasoner;
  maxLogEntries?: number;
  events?: EventBus;
  logger?: Logger;
  now?: () => number;
}

function emptyStageCounts(): Record<PipelineStage, number> {
  return {
    'input-validation': 0,
    'content-check': 0,
    'safety-input': 0,
    reasoning: 0,
    'safety-output': 0,
    'output-sanitization': 0,
  };
}

// ═══════════════════════════════════════════════════════════════
// COORDINATOR
// ═══════════════════════════════════════════════════════════════

export class PipelineCoordinator {
  private readonly validator: InputValidator;
  private readonly checker: ContentChecker;
  private readonly engine: SafetyEngine;
  private readonly sanitizer: OutputSanitizer;
  private readonly reason: Reasoner;
  private readonly events?: EventBus;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly log: CircularBuffer<CoordinationEntry>;

  private requests = 0;
  private acceptedCount = 0;
  private rejectedCount = 0;
  private byStage = emptyStageCounts();

  constructor(options: PipelineOptions) {
    this.validator = options.validator;
    this.checker = options.checker;
    this.engine = options.engine;
    this.sanitizer = options.sanitizer;
    this.reason = options.reason;
    this.events = options.events;
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? Date.now;
    this.log = new CircularBuffer<CoordinationEntry>(options.maxLogEntries ?? 1000);
  }

  async handle(raw: unknown): Promise<PipelineResult> {
    this.requests++;
    const requestId = nanoid();
    const startedAt = this.now();

    const reject = (rejection: Rejection): PipelineResult => this.finishRejected(requestId, startedAt, rejection);

    // 1. Input validation
    const validation = this.validator.validate(raw);
    if (!validation.valid) {
      return reject({ kind: 'InputRejected', stage: 'input-validation', reason: validation.reason, fatal: false });
    }
    const text = validation.normalized;

    // 2. Content check
    const verdict = this.checker.verify(text);
    if (!verdict.approved) {
      return reject({
        kind: 'ContentBlocked',
        stage: 'content-check',
        reason: `Content blocked: ${verdict.issues.join(', ')}`,
        fatal: false,
      });
    }

    // 3. Safety, input side
    const inputCheck = this.engine.checkInput(text);
    if (inputCheck.action.kind !== 'allow') {
      return reject(this.safetyRejection('safety-input', inputCheck.action));
    }

    // 4. Reasoning
    let output: unknown;
    try {
      output = await this.reason(text);
    } catch (err) {
      const error = toError(err);
      this.logger.error({ requestId, err: error }, 'Reasoning step failed');
      return reject({
        kind: 'ReasoningFailed',
        stage: 'reasoning',
        reason: `Reasoning failed: ${error.message}`,
        fatal: false,
      });
    }

    if (typeof output !== 'string') {
      this.logger.error({ requestId, outputType: typeof output }, 'Reasoning step returned non-text output');
      return reject({
        kind: 'ReasoningFailed',
        stage: 'reasoning',
        reason: `Reasoning failed: expected text output, got ${typeof output}`,
        fatal: false,
      });
    }

    // 5. Safety, output side
    const outputCheck = this.engine.checkOutput(output);
    if (!outputCheck.safe || outputCheck.action.kind !== 'allow') {
      return reject(this.safetyRejection('safety-output', outputCheck.action));
    }

    // 6. Sanitization
    const sanitized = this.sanitizer.validate(output);
    if (!sanitized.safe) {
      return reject({ kind: 'OutputBlocked', stage: 'output-sanitization', reason: sanitized.reason, fatal: false });
    }

    const durationMs = this.now() - startedAt;
    this.acceptedCount++;
    this.log.push({ requestId, timestamp: this.now(), accepted: true, durationMs });
    this.logger.debug({ requestId, durationMs }, 'Request accepted');
    this.events?.emit('pipeline:accepted', { requestId, durationMs });

    return { accepted: true, requestId, sanitizedOutput: sanitized.output, durationMs };
  }

  private safetyRejection(stage: PipelineStage, action: Action): Rejection {
    return {
      kind: 'SafetyAction',
      stage,
      reason: `Safety ${action.kind}: ${action.message}`,
      action,
      fatal: action.kind === 'shutdown',
    };
  }

  private finishRejected(requestId: string, startedAt: number, rejection: Rejection): PipelineResult {
    const timestamp = this.now();
    const durationMs = timestamp - startedAt;
    this.rejectedCount++;
    this.byStage[rejection.stage]++;
    this.log.push({
      requestId,
      timestamp,
      accepted: false,
      stage: rejection.stage,
      reason: rejection.reason,
      durationMs,
    });

    this.logger.warn({ requestId, stage: rejection.stage, kind: rejection.kind }, rejection.reason);
    this.events?.emit('pipeline:rejected', { requestId, stage: rejection.stage, reason: rejection.reason, durationMs });

    if (rejection.fatal) {
      this.events?.emit('pipeline:shutdown', { requestId, stage: rejection.stage, reason: rejection.reason, timestamp });
    }

    return { accepted: false, requestId, rejectionReason: rejection.reason, rejection, durationMs };
  }

  getStats(): PipelineStats {
    return {
      requests: this.requests,
      accepted: this.acceptedCount,
      rejected: this.rejectedCount,
      successRate: this.acceptedCount / Math.max(this.requests, 1),
      rejectionsByStage: { ...this.byStage },
      input: this.validator.getStats(),
      content: this.checker.getStats(),
      safety: this.engine.getSafetyStatus(),
      output: this.sanitizer.getStats(),
    };
  }

  /** Delegates to the engine. Privileged: callers decide who may reset. */
  resetSafety(): SafetyReset {
    return this.engine.resetSafety();
  }

  /** Retained outcomes, oldest first */
  coordinationLog(): CoordinationEntry[] {
    return this.log.toArray();
  }

  components(): PipelineComponents {
    return {
      validator: this.validator,
      checker: this.checker,
      engine: this.engine,
      sanitizer: this.sanitizer,
    };
  }
}

// ═══════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════

export interface CreatePipelineOptions {
  events?: EventBus;
  logger?: Logger;
  now?: () => number;
}

/**
 * Build the four gating components from a loaded configuration.
 */
export function createComponents(
  config: SafegateConfig,
  options: CreatePipelineOptions = {},
): PipelineComponents {
  const { events, logger, now } = options;

  return {
    validator: new InputValidator({
      maxLength: config.input.maxLength,
      minAlnumRatio: config.input.minAlnumRatio,
      gibberishMinLength: config.input.gibberishMinLength,
      extraPatterns: config.input.extraSuspiciousPatterns,
      logger,
      now,
    }),
    checker: new ContentChecker({
      maxAuditEntries: config.content.maxAuditEntries,
      logger,
      now,
    }),
    engine: new SafetyEngine({
      rules: RuleSet.withDefaults(config.safety.rules.map(ruleFromConfig)),
      thresholds: {
        criticalViolations: config.safety.criticalViolations,
        totalPenalty: config.safety.totalPenalty,
        minSafetyScore: config.safety.minSafetyScore,
      },
      decayDivisor: config.safety.decayDivisor,
      maxViolationLog: config.safety.maxViolationLog,
      events,
      logger,
      now,
    }),
    sanitizer: new OutputSanitizer({
      maxLength: config.output.maxLength,
      rules: {
        redactPersonalInfo: config.output.redactPersonalInfo,
        blockDangerousPhrases: config.output.blockDangerousPhrases,
        redactSystemCommands: config.output.redactSystemCommands,
      },
      logger,
      now,
    }),
  };
}

/**
 * Build every component from a loaded configuration and wire them into a coordinator.
 */
export function createPipeline(
  config: SafegateConfig,
  reason: Reasoner,
  options: CreatePipelineOptions = {},
): PipelineCoordinator {
  return new PipelineCoordinator({
    ...createComponents(config, options),
    reason,
    maxLogEntries: config.pipeline.maxLogEntries,
    events: options.events,
    logger: options.logger,
    now: options.now,
  });
}
