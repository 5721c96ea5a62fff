/**
 * Export report
 *
 * Plain-text summary written next to the per-format folders of one asset.
 */

import * as fs from 'fs';
import * as path from 'path';
import { REPORT_FILE_SUFFIX } from '../constants/config';
import type { ExportFormat } from '../constants/export';
import { errorMessage } from '../errors';
import { formatLogTimestamp, type Logger } from '../utils/logger';

export interface FormatExportResult {
  format: ExportFormat;
  success: boolean;
  /** Output path on success, otherwise the error */
  detail: string;
}

export interface ExportReport {
  assetName: string;
  generatedAt: Date;
  directories: Array<{ format: ExportFormat; dir: string }>;
  results: FormatExportResult[];
  objTextures: string[];
  daeTextures: string[];
  warnings: string[];
}

function listing(title: string, entries: string[]): string[] {
  const lines = [title];
  if (entries.length === 0) {
    lines.push('  (none)');
  } else {
    lines.push(...entries.map(entry => `  ${entry}`));
  }
  return lines;
}

export function formatExportReport(report: ExportReport): string {
  const lines = [
    `Export report: ${report.assetName}`,
    `Generated: ${formatLogTimestamp(report.generatedAt)}`,
    '',
    'Directories used:',
    ...report.directories.map(({ format, dir }) => `  ${format.toUpperCase()}: ${dir}`),
    '',
    ...report.results.map(r => `  ${r.format.toUpperCase()}: ${r.success ? 'SUCCESS' : 'FAILED'} -> ${r.detail}`),
    '',
    ...listing('OBJ texture files:', report.objTextures),
    '',
    ...listing('DAE texture files:', report.daeTextures),
  ];

  if (report.warnings.length > 0) {
    lines.push('', 'Warnings:', ...report.warnings.map(w => `  ${w}`));
  }
  return lines.join('\n');
}

export function reportPathFor(outputDir: string, assetName: string): string {
  return path.join(outputDir, `${assetName}${REPORT_FILE_SUFFIX}`);
}

/**
 * Write the report; a failed write is logged, not thrown
 */
export async function writeExportReport(report: ExportReport, outputDir: string, logger: Logger): Promise<string | undefined> {
  const reportPath = reportPathFor(outputDir, report.assetName);
  try {
    await fs.promises.writeFile(reportPath, formatExportReport(report), 'utf-8');
    logger.info(`Export report written: ${reportPath}`);
    return reportPath;
  } catch (error) {
    logger.warn(`Could not write export report: ${errorMessage(error)}`);
    return undefined;
  }
}
