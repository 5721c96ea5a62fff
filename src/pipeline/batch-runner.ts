/**
 * Batch Runner
 *
 * Discovers input files, runs each through the asset pipeline strictly in
 * order, moves every source to the done or failed folder and writes the
 * batch log.
 */

import * as fs from 'fs';
import * as path from 'path';
import { EXIT_CODES, LOG_FILE } from '../constants/config';
import { Workspace } from '../core/workspace';
import { errorMessage, PipelineErrorFactory } from '../errors';
import type { HostCapabilities } from '../host/capabilities';
import { checkRigPluginCompatibility } from '../rigging/plugin-compatibility';
import type { PipelineConfig } from '../schemas';
import { ensureDir, findFilesByExtension, moveFile } from '../utils/file-utils';
import { LogBuffer, type Logger } from '../utils/logger';
import { AssetJob, AssetOutcome } from './asset-job';
import { AssetPipeline } from './asset-pipeline';

export interface BatchRunnerOptions {
  config: PipelineConfig;
  host: HostCapabilities;
  logger: Logger;
  workspace?: Workspace;
}

export interface BatchSummary {
  total: number;
  rigged: number;
  fallback: number;
  failed: number;
  jobs: AssetJob[];
  logPath: string | undefined;
  exitCode: number;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `avatar_pipeline_YYYYMMDD_HHMMSS.log`
 */
export function batchLogFileName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${LOG_FILE.PREFIX}${day}_${time}${LOG_FILE.EXTENSION}`;
}

export class BatchRunner {
  private readonly workspace: Workspace;

  constructor(private readonly options: BatchRunnerOptions) {
    this.workspace = options.workspace ?? new Workspace();
  }

  async run(): Promise<BatchSummary> {
    const { config, host, logger } = this.options;

    const folders: Array<[string, string]> = [
      ['inputDir', config.inputDir],
      ['outputDir', config.outputDir],
      ['doneDir', config.doneDir],
      ['failedDir', config.failedDir],
    ];
    for (const [key, dir] of folders) {
      try {
        ensureDir(dir);
      } catch (error) {
        throw PipelineErrorFactory.configError(`Cannot use folder ${dir}: ${errorMessage(error)}`, key, { dir });
      }
    }

    const files = findFilesByExtension(config.inputDir, config.inputExtensions);
    if (files.length === 0) {
      logger.info(`No ${config.inputExtensions.join('/')} files found in: ${config.inputDir}`);
      return { total: 0, rigged: 0, fallback: 0, failed: 0, jobs: [], logPath: undefined, exitCode: EXIT_CODES.OK };
    }

    const buffer = new LogBuffer();
    const detach = logger.addSink(buffer);
    try {
      const summary = await this.runFiles(files);
      const logPath = await this.writeBatchLog(buffer);
      return { ...summary, logPath };
    } finally {
      detach();
    }
  }

  private async runFiles(files: string[]): Promise<Omit<BatchSummary, 'logPath'>> {
    const { config, host, logger } = this.options;
    const info = host.describe();

    logger.info(`Pipeline started. Files: ${files.length}`);
    logger.info(`Input: ${config.inputDir}`);
    logger.info(`Output: ${config.outputDir}`);
    logger.info(`Done: ${config.doneDir}`);
    logger.info(`Failed: ${config.failedDir}`);
    logger.info(`Host: ${info.name} ${info.version.join('.')}`);
    logger.info(`Background: ${info.background}`);
    logger.info(`Conversion-only: ${config.conversionOnly}`);
    logger.logConfig({ ...config });

    const compatible = checkRigPluginCompatibility(host, logger);
    if (config.conversionOnly || info.background) {
      logger.warn('Conversion-only/background: rig binding will be skipped; conversion-only export will be used');
    }

    const pipeline = new AssetPipeline({
      workspace: this.workspace,
      host,
      logger,
      config,
      rigBindingEnabled: compatible && !config.conversionOnly && !info.background,
    });

    const jobs: AssetJob[] = [];
    let rigged = 0;
    let fallback = 0;
    let failed = 0;

    for (const [index, file] of files.entries()) {
      const job = new AssetJob(file);
      jobs.push(job);
      logger.info(`--- File ${index + 1}/${files.length}: ${job.fileName} ---`);

      await logger.withTiming(`asset ${job.name}`, () => pipeline.process(job), { asset: job.name });

      const outcome = job.result?.outcome ?? AssetOutcome.Failed;
      if (outcome === AssetOutcome.RiggedExport) rigged++;
      else if (outcome === AssetOutcome.FallbackExport) fallback++;
      else failed++;

      await this.relocateSource(job, outcome);
    }

    const rule = '='.repeat(60);
    logger.info(rule);
    logger.info('Pipeline complete - Summary');
    logger.info(`  total:            ${files.length}`);
    logger.info(`  rigged_success:   ${rigged}`);
    logger.info(`  fallback_success: ${fallback}`);
    logger.info(`  failed:           ${failed}`);
    logger.info(rule);

    return {
      total: files.length,
      rigged,
      fallback,
      failed,
      jobs,
      exitCode: failed > 0 ? EXIT_CODES.ASSET_FAILED : EXIT_CODES.OK,
    };
  }

  private async relocateSource(job: AssetJob, outcome: AssetOutcome): Promise<void> {
    const { config, logger } = this.options;
    const succeeded = outcome !== AssetOutcome.Failed;
    const destination = path.join(succeeded ? config.doneDir : config.failedDir, job.fileName);
    try {
      await moveFile(job.sourcePath, destination);
      const note = outcome === AssetOutcome.FallbackExport ? ' (fallback)' : '';
      logger.info(`Moved to ${succeeded ? 'done' : 'failed'}${note}: ${destination}`);
    } catch (error) {
      logger.warn(`Failed to move to ${succeeded ? 'done' : 'failed'}: ${errorMessage(error)}`);
    }
  }

  private async writeBatchLog(buffer: LogBuffer): Promise<string | undefined> {
    const { config, logger } = this.options;
    const logPath = path.join(config.outputDir, batchLogFileName(new Date()));
    try {
      await fs.promises.writeFile(logPath, buffer.toString(), 'utf-8');
      logger.info(`Log written to: ${logPath}`);
      return logPath;
    } catch (error) {
      logger.warn(`Failed to write log: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
