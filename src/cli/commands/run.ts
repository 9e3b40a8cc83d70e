/**
 * `safegate run "prompt"` — Push prompts through the full gating pipeline.
 * With no prompt arguments, reads one prompt per stdin line against a
 * single pipeline, so engine state accumulates across lines.
 */

import { Command } from 'commander';
import { createInterface } from 'readline';
import { createPipeline, type PipelineCoordinator, type PipelineResult, type Reasoner } from '../../guardrails/pipeline.js';
import { exportSafetyLog } from '../../guardrails/safety-log.js';
import { loadContext } from '../setup.js';

interface RunOptions {
  dir: string;
  json?: boolean;
  export?: string;
}

export interface RunSummary {
  results: PipelineResult[];
  /** True when a request ended in a shutdown verdict; no later prompt was handled */
  shutdown: boolean;
}

/** Stands in for a downstream model: returns the gated input unchanged. */
export const echoReasoner: Reasoner = (text) => text;

/**
 * Handle prompts in order, stopping after the first shutdown verdict.
 */
export async function processPrompts(
  pipeline: PipelineCoordinator,
  prompts: Iterable<string> | AsyncIterable<string>,
  onResult?: (prompt: string, result: PipelineResult) => void,
): Promise<RunSummary> {
  const results: PipelineResult[] = [];

  for await (const prompt of prompts) {
    const result = await pipeline.handle(prompt);
    results.push(result);
    onResult?.(prompt, result);

    if (!result.accepted && result.rejection.fatal) {
      return { results, shutdown: true };
    }
  }

  return { results, shutdown: false };
}

async function* stdinLines(): AsyncGenerator<string> {
  const rl = createInterface({ input: process.stdin, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      if (line.trim().length > 0) yield line;
    }
  } finally {
    rl.close();
  }
}

export function formatResult(prompt: string, result: PipelineResult): string {
  if (result.accepted) {
    return `  ✓ ${prompt}\n    → ${result.sanitizedOutput}`;
  }
  const marker = result.rejection.fatal ? '✗✗' : '✗';
  return `  ${marker} ${prompt}\n    [${result.rejection.stage}] ${result.rejectionReason}`;
}

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Run prompts through the gating pipeline with an echo reasoner')
    .argument('[prompt...]', 'Prompts to handle; reads stdin lines when omitted')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Print one JSON result per line')
    .option('--export <file>', 'Write the safety log to a JSON file afterwards')
    .action(async (prompts: string[], options: RunOptions) => {
      await executeRun(cmd, prompts, options);
    });

  return cmd;
}

async function executeRun(cmd: Command, prompts: string[], options: RunOptions): Promise<void> {
  const { config } = loadContext(cmd, options.dir);
  const pipeline = createPipeline(config, echoReasoner);

  const source = prompts.length > 0 ? prompts : stdinLines();
  const summary = await processPrompts(pipeline, source, (prompt, result) => {
    console.log(options.json ? JSON.stringify(result) : formatResult(prompt, result));
  });

  if (options.export) {
    const snapshot = exportSafetyLog(pipeline.components().engine, options.export);
    if (!options.json) {
      console.log(`\n  Safety log (${snapshot.violations.length} violations) written to ${options.export}`);
    }
  }

  if (!options.json) {
    const stats = pipeline.getStats();
    console.log();
    console.log(`  Requests: ${stats.requests}  Accepted: ${stats.accepted}  Rejected: ${stats.rejected}`);
    console.log(`  Safety score: ${stats.safety.safetyScore}  Cumulative penalty: ${stats.safety.cumulativePenalty}`);
    console.log();
  }

  if (summary.shutdown) {
    console.error('Safety shutdown: critical violation detected');
    process.exitCode = 2;
  }
}
