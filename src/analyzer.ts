import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import { parseRecordLines, readLines } from './record-stream.js';
import { RESULT_METRICS, ResultRecordSchema } from './schemas.js';
import type { ResultMetric, ResultRecord } from './schemas.js';
import { describe } from './stats.js';
import { silentLogger } from './logger.js';
import type {
  AnalysisReport,
  IResultAnalyzer,
  MetricStats,
  ParsedResults,
  SummaryRecord,
  SummaryRow,
} from './types.js';

export const SUMMARY_STATS = ['mean', 'min', 'max', 'median', 'stdev'] as const;

export function parseResultLines(lines: string[]): ParsedResults {
  return parseRecordLines(lines, ResultRecordSchema);
}

export async function loadResults(path: string): Promise<ParsedResults> {
  return parseResultLines(await readLines(path));
}

export function summarizeGroup(contextLength: number, records: ResultRecord[]): SummaryRecord {
  const column = (metric: ResultMetric) => describe(records.map((r) => r[metric]));
  return {
    context_length: contextLength,
    sample_count: records.length,
    metrics: {
      prompt_tokens: column('prompt_tokens'),
      output_tokens: column('output_tokens'),
      ttft: column('ttft'),
      total_latency: column('total_latency'),
      decode_throughput: column('decode_throughput'),
      peak_gpu_memory_gb: column('peak_gpu_memory_gb'),
    },
  };
}

export interface ResultAnalyzerOptions {
  logger?: Logger;
}

export class ResultAnalyzer implements IResultAnalyzer {
  private logger: Logger;

  constructor(opts: ResultAnalyzerOptions = {}) {
    this.logger = opts.logger ?? silentLogger();
  }

  /** One summary per distinct context length, ascending. */
  analyze(records: ResultRecord[]): SummaryRecord[] {
    const groups = new Map<number, ResultRecord[]>();
    for (const record of records) {
      const group = groups.get(record.context_length);
      if (group) {
        group.push(record);
      } else {
        groups.set(record.context_length, [record]);
      }
    }

    return [...groups.entries()]
      .sort(([a], [b]) => a - b)
      .map(([contextLength, group]) => summarizeGroup(contextLength, group));
  }

  async analyzeFile(path: string): Promise<AnalysisReport> {
    this.logger.info({ path }, 'Loading results');
    const { records, skipped } = await loadResults(path);

    for (const skip of skipped) {
      this.logger.warn({ path, line: skip.line, reason: skip.reason }, `Skipping malformed record on line ${skip.line}`);
    }
    if (skipped.length > 0) {
      this.logger.warn({ path, skipped: skipped.length }, `Skipped ${skipped.length} malformed record(s)`);
    }
    this.logger.info({ path, records: records.length }, `Loaded ${records.length} result entries`);

    const summaries = this.analyze(records);
    return { summaries, skipped, total: records.length + skipped.length };
  }
}

// --- Export ---

export function summaryColumns(): string[] {
  const columns = ['context_length', 'sample_count'];
  for (const metric of RESULT_METRICS) {
    for (const stat of SUMMARY_STATS) {
      columns.push(`${metric}_${stat}`);
    }
  }
  return columns;
}

/** One row per context length, keys in `summaryColumns()` order. */
export function flattenSummaries(summaries: SummaryRecord[]): SummaryRow[] {
  return [...summaries]
    .sort((a, b) => a.context_length - b.context_length)
    .map((summary) => {
      const row: SummaryRow = {
        context_length: summary.context_length,
        sample_count: summary.sample_count,
      };
      for (const metric of RESULT_METRICS) {
        for (const stat of SUMMARY_STATS) {
          row[`${metric}_${stat}`] = summary.metrics[metric][stat];
        }
      }
      return row;
    });
}

export function toCsv(rows: SummaryRow[], columns = summaryColumns()): string {
  const lines = [columns.join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => String(row[column] ?? '')).join(','));
  }
  return lines.join('\n') + '\n';
}

export async function exportCsv(summaries: SummaryRecord[], path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, toCsv(flattenSummaries(summaries)), 'utf-8');
}

// --- Console tables ---

function padR(str: string, len: number): string {
  return str.length >= len ? str : str + ' '.repeat(len - str.length);
}

const DIVIDER = '-'.repeat(80);

interface TableSpec {
  title: string;
  metric: ResultMetric;
  unit: string;
  stats: Array<keyof MetricStats>;
  digits: number;
}

const TABLES: TableSpec[] = [
  { title: 'Time to First Token (TTFT) by Context Length', metric: 'ttft', unit: ' (s)', stats: ['mean', 'min', 'max', 'median', 'stdev'], digits: 4 },
  { title: 'Decode Throughput (tokens/sec) by Context Length', metric: 'decode_throughput', unit: '', stats: ['mean', 'min', 'max', 'median'], digits: 2 },
  { title: 'Total Latency (s) by Context Length', metric: 'total_latency', unit: ' (s)', stats: ['mean', 'min', 'max', 'median'], digits: 4 },
  { title: 'GPU Memory Usage (GB) by Context Length', metric: 'peak_gpu_memory_gb', unit: '', stats: ['mean', 'max'], digits: 2 },
];

const STAT_LABELS: Record<keyof MetricStats, string> = {
  count: 'Count',
  mean: 'Mean',
  min: 'Min',
  max: 'Max',
  median: 'Median',
  stdev: 'StdDev',
};

export function formatSummaryTables(summaries: SummaryRecord[]): string[] {
  const lines: string[] = [];
  for (const table of TABLES) {
    lines.push('', `${table.title}:`, DIVIDER);
    lines.push(
      padR('Context (tokens)', 20)
      + padR('Samples', 10)
      + table.stats.map((s) => padR(`${STAT_LABELS[s]}${s === 'stdev' ? '' : table.unit}`, 12)).join(''),
    );
    lines.push(DIVIDER);
    for (const summary of summaries) {
      const stats = summary.metrics[table.metric];
      lines.push(
        padR(String(summary.context_length), 20)
        + padR(String(summary.sample_count), 10)
        + table.stats.map((s) => padR(stats[s].toFixed(table.digits), 12)).join(''),
      );
    }
  }
  return lines.map((line) => line.trimEnd());
}
