import { existsSync } from 'node:fs';
import { ResultAnalyzer, exportCsv, formatSummaryTables } from './analyzer.js';
import { AbortedError } from './errors.js';
import type { BenchmarkRunner } from './runner.js';
import type { BaselineOutcome, PhaseReport, PhaseSelector } from './types.js';

export interface PhaseContext {
  runner: BenchmarkRunner;
  signal?: AbortSignal;
}

export interface Phase {
  id: number;
  name: string;
  description: string;
  /** Phase whose output this one reads; skipped when that phase ran and did not complete. */
  dependsOn?: number;
  run(ctx: PhaseContext): Promise<PhaseReport>;
}

export const baselinePhase: Phase = {
  id: 1,
  name: 'baseline',
  description: 'Baseline inference',
  async run({ runner, signal }) {
    const prompts = await runner.ensurePrompts();

    try {
      await runner.startEngine(signal);
    } catch (err: unknown) {
      if (!(err instanceof AbortedError)) throw err;
      runner.logger.warn('Run aborted while the engine was starting');
      return { id: 1, name: 'baseline', status: 'aborted', completed: 0, failed: 0, skipped: prompts.length };
    }
    let outcome: BaselineOutcome;
    try {
      outcome = await runner.runBaseline(prompts, runner.resultsPath, signal);
    } finally {
      await runner.stopEngine();
    }

    runner.logContextAverages(outcome.results);
    return {
      id: 1,
      name: 'baseline',
      status: outcome.aborted ? 'aborted' : 'completed',
      completed: outcome.results.length,
      failed: outcome.failures.length,
      skipped: prompts.length - outcome.results.length - outcome.failures.length,
      outputPath: runner.resultsPath,
    };
  },
};

export const analysisPhase: Phase = {
  id: 2,
  name: 'analysis',
  description: 'Result analysis',
  dependsOn: 1,
  async run({ runner }) {
    if (!existsSync(runner.resultsPath)) {
      throw new Error(`Results file not found: ${runner.resultsPath} (run phase 1 first)`);
    }

    const analyzer = new ResultAnalyzer({ logger: runner.logger });
    const report = await analyzer.analyzeFile(runner.resultsPath);
    for (const line of formatSummaryTables(report.summaries)) {
      runner.logger.info(line);
    }
    await exportCsv(report.summaries, runner.summaryPath);
    runner.logger.info({ path: runner.summaryPath }, `Results exported to CSV: ${runner.summaryPath}`);

    return {
      id: 2,
      name: 'analysis',
      status: 'completed',
      completed: report.total - report.skipped.length,
      failed: 0,
      skipped: report.skipped.length,
      outputPath: runner.summaryPath,
    };
  },
};

export const PHASES: readonly Phase[] = [baselinePhase, analysisPhase];

export function resolvePhases(selector: PhaseSelector): Phase[] {
  if (selector === 'all') return [...PHASES];
  const id = Number(selector);
  return PHASES.filter((phase) => phase.id === id);
}

export function isPhaseSelector(value: string): value is PhaseSelector {
  return value === 'all' || PHASES.some((phase) => String(phase.id) === value);
}
