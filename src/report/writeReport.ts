import fs from 'node:fs/promises';
import path from 'node:path';
import { serializeReport, type ExtractionReport } from './extractionReport';
import { reportToMarkdown } from './markdownReport';

export type ReportFormat = 'json' | 'md';

export function reportFormatFor(outFile: string): ReportFormat {
  return path.extname(outFile).toLowerCase() === '.json' ? 'json' : 'md';
}

export async function writeReportFile(
  outFile: string,
  report: ExtractionReport,
  format: ReportFormat = reportFormatFor(outFile),
): Promise<void> {
  await fs.mkdir(path.dirname(outFile), { recursive: true });
  const content = format === 'json' ? serializeReport(report) : reportToMarkdown(report);
  await fs.writeFile(outFile, content, 'utf8');
}

/** Write a text artifact, creating parent directories. */
export async function writeTextFile(outFile: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(outFile), { recursive: true });
  await fs.writeFile(outFile, content, 'utf8');
}
