import { describe, it, expect, beforeEach } from 'vitest';
import { ContentChecker } from '../../../src/guardrails/content-checker.js';

describe('ContentChecker', () => {
  let checker: ContentChecker;

  beforeEach(() => {
    checker = new ContentChecker({ now: () => 7 });
  });

  it('approves neutral content', () => {
    expect(checker.verify('What is the capital of France?')).toEqual({
      approved: true,
      issues: [],
      checkId: 1,
      totalChecks: 1,
      blocks: 0,
    });
  });

  it('does not flag words outside the keyword lists', () => {
    expect(checker.verify('How can I hack into a system?').approved).toBe(true);
  });

  it('reports category keywords as category:keyword', () => {
    const verdict = checker.verify('This could HARM the system and crash it');
    expect(verdict.approved).toBe(false);
    expect(verdict.issues).toEqual(['safety:harm', 'system:crash']);
    expect(verdict.blocks).toBe(1);
  });

  it('matches keywords as substrings', () => {
    expect(checker.verify('visit the pharmacy').issues).toEqual(['safety:harm']);
  });

  it('reports dangerous structural patterns', () => {
    expect(checker.verify('call system() now').issues).toEqual(['pattern:system_call']);
    expect(checker.verify('rm -rf /tmp').issues).toEqual(['pattern:recursive_delete']);
    expect(checker.verify('__import__').issues).toEqual(['pattern:dunder_name']);
    expect(checker.verify('format c: now').issues).toEqual(['pattern:disk_format']);
  });

  it('serializes objects before checking', () => {
    expect(checker.verify({ text: 'danger zone' }).issues).toEqual(['safety:danger']);
  });

  it('checks objects whose toJSON yields nothing by their String() form', () => {
    const verdict = checker.verify({ toJSON: () => undefined });
    expect(verdict.approved).toBe(true);
    expect(verdict.issues).toEqual([]);
    expect(checker.auditLog()[0].contentPreview).toBe('[object object]');
  });

  it('audits every call with a lowercased preview', () => {
    checker.verify('A'.repeat(150));
    checker.verify('magic show');

    const log = checker.auditLog();
    expect(log).toHaveLength(2);
    expect(log[0]).toEqual({
      timestamp: 7,
      contentPreview: 'a'.repeat(100),
      approved: true,
      issues: [],
      checkId: 1,
    });
    expect(log[1].issues).toEqual(['reality:magic']);
  });

  it('bounds the audit log', () => {
    const small = new ContentChecker({ maxAuditEntries: 2 });
    small.verify('one');
    small.verify('two');
    small.verify('three');
    expect(small.auditLog().map((e) => e.contentPreview)).toEqual(['two', 'three']);
    expect(small.stats().checksPerformed).toBe(3);
  });

  it('summarizes statistics', () => {
    checker.verify('hello');
    checker.verify('illegal plan');
    checker.verify('good day');
    checker.verify('see you');

    const stats = checker.getStats();
    expect(stats.checksPerformed).toBe(4);
    expect(stats.blocks).toBe(1);
    expect(stats.approvalRate).toBe(0.75);
    expect(stats.lastCheck?.contentPreview).toBe('see you');
    expect(stats.categoriesChecked).toEqual(['safety', 'ethics', 'system', 'reality']);
  });

  it('resets statistics and the audit log', () => {
    checker.verify('illegal plan');
    checker.resetStats();
    expect(checker.stats()).toEqual({
      checksPerformed: 0,
      blocks: 0,
      approvalRate: 0,
      lastCheck: null,
      categoriesChecked: ['safety', 'ethics', 'system', 'reality'],
    });
    expect(checker.auditLog()).toEqual([]);
  });
});
