import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ComparisonResult, EngineRunResult } from '@/types/evaluation';
import type { ReportFormat } from '@/config/settings';
import {
  renderComparisonReport,
  serializeComparison,
  type SkippedEngineEntry,
} from '@/reports/comparison-report';
import { renderCsvReport } from '@/reports/csv-report';
import { serializeRunResult } from '@/reports/json-report';
import { renderMarkdownReport } from '@/reports/markdown-report';
import { createReportError } from '@/utils/error-handling';
import { createLogger, type Logger } from '@/utils/logger';

export const DEFAULT_COMPARISON_REPORT_NAME = 'model_comparison';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD_HH-mm-ss`. */
export function formatReportTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_` +
    `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

export function toFileStem(name: string): string {
  return name.replace(/[\\/:*?"<>|\s]+/g, '_');
}

export function defaultReportName(engineName: string, date: Date): string {
  return `${toFileStem(engineName)}_report_${formatReportTimestamp(date)}`;
}

export interface RunReportRequest {
  format: ReportFormat;
  /** File stem without extension; defaults to `<engine>_report_<timestamp>`. */
  name?: string;
  date?: Date;
}

export interface ComparisonReportRequest {
  name?: string;
  generatedAt: string;
  skippedEngines?: readonly SkippedEngineEntry[];
}

export class ReportWriter {
  private readonly outputDir: string;
  private readonly logger: Logger;

  constructor(outputDir: string, logger: Logger = createLogger('reports')) {
    this.outputDir = outputDir;
    this.logger = logger;
  }

  async writeRunReports(result: EngineRunResult, request: RunReportRequest): Promise<string[]> {
    const stem = request.name ?? defaultReportName(result.summary.engineName, request.date ?? new Date());
    const wants = (format: Exclude<ReportFormat, 'all'>): boolean =>
      request.format === 'all' || request.format === format;

    const written: string[] = [];
    if (wants('markdown')) {
      written.push(await this.write(`${stem}.md`, renderMarkdownReport(result)));
    }
    if (wants('json')) {
      written.push(await this.write(`${stem}.json`, serializeRunResult(result)));
    }
    if (wants('csv')) {
      written.push(await this.write(`${stem}.csv`, renderCsvReport(result.records)));
    }
    return written;
  }

  async writeComparisonReports(
    comparison: ComparisonResult,
    request: ComparisonReportRequest
  ): Promise<string[]> {
    const stem = request.name ?? DEFAULT_COMPARISON_REPORT_NAME;
    const options = { generatedAt: request.generatedAt, skippedEngines: request.skippedEngines };
    return [
      await this.write(`${stem}.md`, renderComparisonReport(comparison, options)),
      await this.write(`${stem}.json`, serializeComparison(comparison, options)),
    ];
  }

  private async write(fileName: string, content: string): Promise<string> {
    const target = path.join(this.outputDir, fileName);
    try {
      await mkdir(this.outputDir, { recursive: true });
      await writeFile(target, content, 'utf8');
    } catch (error) {
      throw createReportError(target, error);
    }
    this.logger.info(`Report written: ${target}`);
    return target;
  }
}
