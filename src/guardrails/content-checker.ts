import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import { CircularBuffer } from '../utils/circular-buffer.js';
import type {
  ContentAuditEntry,
  ContentCategory,
  ContentStats,
  ContentVerdict,
} from './types.js';

export const CONTENT_CATEGORIES: Readonly<Record<ContentCategory, readonly string[]>> = {
  safety: ['harm', 'danger', 'attack', 'violate'],
  ethics: ['unethical', 'illegal', 'immoral', 'exploit'],
  system: ['crash', 'overload', 'corrupt', 'bypass'],
  reality: ['impossible', 'magic', 'fantasy', 'supernatural'],
};

const CATEGORY_NAMES: readonly ContentCategory[] = ['safety', 'ethics', 'system', 'reality'];

const DANGEROUS_PATTERNS: ReadonlyArray<{ id: string; regex: RegExp }> = [
  { id: 'system_call', regex: /system\s*\(\s*\)/i },
  { id: 'exec_call', regex: /exec\s*\(/i },
  { id: 'dunder_name', regex: /__\w+__/i },
  { id: 'recursive_delete', regex: /rm\s+-rf/i },
  { id: 'disk_format', regex: /format\s+c:/i },
];

const PREVIEW_LENGTH = 100;

export interface ContentCheckerOptions {
  maxAuditEntries?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Coarse pass/fail gate over category keywords and dangerous structural
 * patterns. No scoring; every call lands in the audit log.
 */
export class ContentChecker {
  private readonly log: CircularBuffer<ContentAuditEntry>;
  private readonly logger: Logger;
  private readonly now: () => number;
  private checksPerformed = 0;
  private blocks = 0;

  constructor(options: ContentCheckerOptions = {}) {
    this.log = new CircularBuffer<ContentAuditEntry>(options.maxAuditEntries ?? 10_000);
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? Date.now;
  }

  verify(content: unknown): ContentVerdict {
    this.checksPerformed++;
    const checkId = this.checksPerformed;
    const text = stringify(content).toLowerCase();
    const issues: string[] = [];

    for (const category of CATEGORY_NAMES) {
      for (const keyword of CONTENT_CATEGORIES[category]) {
        if (text.includes(keyword)) {
          issues.push(`${category}:${keyword}`);
        }
      }
    }

    for (const { id, regex } of DANGEROUS_PATTERNS) {
      if (regex.test(text)) {
        issues.push(`pattern:${id}`);
      }
    }

    const approved = issues.length === 0;
    this.log.push({
      timestamp: this.now(),
      contentPreview: text.slice(0, PREVIEW_LENGTH),
      approved,
      issues,
      checkId,
    });

    if (!approved) {
      this.blocks++;
      this.logger.warn({ checkId, issues }, 'Content blocked');
    } else {
      this.logger.debug({ checkId }, 'Content approved');
    }

    return {
      approved,
      issues,
      checkId,
      totalChecks: this.checksPerformed,
      blocks: this.blocks,
    };
  }

  stats(): ContentStats {
    return {
      checksPerformed: this.checksPerformed,
      blocks: this.blocks,
      approvalRate: (this.checksPerformed - this.blocks) / Math.max(this.checksPerformed, 1),
      lastCheck: this.log.latest() ?? null,
      categoriesChecked: [...CATEGORY_NAMES],
    };
  }

  getStats(): ContentStats {
    return this.stats();
  }

  /** Retained audit entries, oldest first */
  auditLog(): ContentAuditEntry[] {
    return this.log.toArray();
  }

  resetStats(): void {
    this.checksPerformed = 0;
    this.blocks = 0;
    this.log.clear();
    this.logger.info('Content checker statistics reset');
  }
}

function stringify(content: unknown): string {
  if (typeof content === 'string') return content;
  if (content === null || content === undefined) return '';
  if (typeof content === 'object') {
    try {
      return JSON.stringify(content) ?? String(content);
    } catch {
      return String(content);
    }
  }
  return String(content);
}
