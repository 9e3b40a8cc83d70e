import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { ExportError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { SafetyEngine } from './safety-engine.js';
import type { SafetyLogExport } from './types.js';

/**
 * Write the engine's violation log, status and rule table to `filePath` as JSON.
 * The snapshot is taken synchronously before any I/O.
 */
export function exportSafetyLog(engine: SafetyEngine, filePath: string): SafetyLogExport {
  const snapshot = engine.exportLog();

  try {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, JSON.stringify(snapshot, null, 2) + '\n', 'utf-8');
  } catch (err) {
    throw new ExportError(`Failed to export safety log to ${filePath}`, filePath, toError(err));
  }

  getLogger().info({ filePath, violations: snapshot.violations.length }, 'Safety log exported');
  return snapshot;
}
