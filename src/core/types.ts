import { z } from 'zod';
import type {
  Action,
  CheckMode,
  SafetyReset,
  SafetyStatus,
  Violation,
} from '../guardrails/types.js';

// ===== Configuration =====

export const RuleConfigSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().min(1),
  severity: z.enum(['LOW', 'MEDIUM', 'HIGH', 'CRITICAL']),
  penalty: z.number().int().positive(),
  description: z.string().default(''),
});

export const SafegateConfigSchema = z.object({
  input: z.object({
    maxLength: z.number().int().min(1).default(10_000),
    minAlnumRatio: z.number().min(0).max(1).default(0.3),
    gibberishMinLength: z.number().int().min(1).default(10),
    extraSuspiciousPatterns: z.array(z.string().min(1)).default([]),
  }).default({}),
  content: z.object({
    maxAuditEntries: z.number().int().min(1).default(10_000),
  }).default({}),
  safety: z.object({
    criticalViolations: z.number().int().min(1).default(1),
    totalPenalty: z.number().positive().default(2000),
    minSafetyScore: z.number().min(0).max(100).default(20),
    decayDivisor: z.number().positive().default(1000),
    maxViolationLog: z.number().int().min(1).default(10_000),
    /** Extra rules appended to the built-in rule table */
    rules: z.array(RuleConfigSchema).default([]),
  }).default({}),
  output: z.object({
    maxLength: z.number().int().min(1).default(5000),
    redactPersonalInfo: z.boolean().default(true),
    blockDangerousPhrases: z.boolean().default(true),
    redactSystemCommands: z.boolean().default(true),
  }).default({}),
  pipeline: z.object({
    maxLogEntries: z.number().int().min(1).default(1000),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    verbose: z.boolean().default(false),
  }).default({}),
});

export type SafegateConfig = z.infer<typeof SafegateConfigSchema>;
export type RuleConfig = z.infer<typeof RuleConfigSchema>;
export type SafegateConfigInput = z.input<typeof SafegateConfigSchema>;

// ===== Events =====

export type PipelineStage =
  | 'input-validation'
  | 'content-check'
  | 'safety-input'
  | 'reasoning'
  | 'safety-output'
  | 'output-sanitization';

export interface SafegateEvents {
  'safety:violation': { mode: CheckMode; violations: Violation[]; totalPenalty: number; safetyScore: number };
  'safety:shutdown': { mode: CheckMode; action: Action; violations: Violation[]; timestamp: number };
  'safety:reset': SafetyReset & { status: SafetyStatus };
  'pipeline:accepted': { requestId: string; durationMs: number };
  'pipeline:rejected': { requestId: string; stage: PipelineStage; reason: string; durationMs: number };
  'pipeline:shutdown': { requestId: string; stage: PipelineStage; reason: string; timestamp: number };
}
