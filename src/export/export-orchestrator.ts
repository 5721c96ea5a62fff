/**
 * Export Orchestrator
 *
 * Runs every configured format for one asset: per-format material
 * preparation, selection, export, verification and texture relocation.
 * A failing format is recorded and the next one still runs.
 */

import * as path from 'path';
import {
  FORMAT_EXTENSIONS,
  FORMAT_POLICIES,
  MTL_EXTENSION,
  REPORT_TEXTURE_EXTENSIONS,
  type ExportFormat,
} from '../constants/export';
import { prepareMaterialsForExport } from '../converters/materials/material-preparation';
import { relocateMtlTextures } from '../converters/textures/texture-relocation';
import type { ArmatureObject, MeshObject } from '../core/scene-types';
import type { Workspace } from '../core/workspace';
import type { HostCapabilities, InteractiveContext } from '../host/capabilities';
import type { TransparencyPolicy } from '../schemas';
import { errorMessage, PipelineErrorFactory } from '../errors';
import { ensureDir, fileSize, isFile, listFilesByExtension } from '../utils/file-utils';
import type { Logger } from '../utils/logger';
import { buildExportOptions } from './export-options';
import { writeExportReport, type ExportReport, type FormatExportResult } from './export-report';

export interface ExportOrchestratorOptions {
  workspace: Workspace;
  host: HostCapabilities;
  logger: Logger;
  outputDir: string;
  formats: readonly ExportFormat[];
  primaryFormat: ExportFormat;
  shaderMarkers: readonly string[];
  transparency: TransparencyPolicy;
}

export interface ExportRunResult {
  results: FormatExportResult[];
  primarySuccess: boolean;
  reportPath: string | undefined;
}

interface FormatOutcome {
  result: FormatExportResult;
  warnings: string[];
}

/**
 * `<out>/<format>/<asset>`
 */
export function formatOutputDir(outputDir: string, format: ExportFormat, assetName: string): string {
  return path.join(outputDir, format, assetName);
}

export class ExportOrchestrator {
  constructor(private readonly options: ExportOrchestratorOptions) {}

  async exportAll(armature: ArmatureObject, meshes: MeshObject[], assetName: string): Promise<ExportRunResult> {
    const { outputDir, formats, primaryFormat, host, logger } = this.options;

    const directories = formats.map(format => ({ format, dir: formatOutputDir(outputDir, format, assetName) }));

    const context = host.acquireInteractiveContext();
    if (!context) {
      logger.warn('No interactive context (background?); exporters run with the current workspace state');
    }

    const results: FormatExportResult[] = [];
    const warnings: string[] = [];
    for (const { format, dir } of directories) {
      const outcome = await this.exportFormat(format, dir, armature, meshes, assetName, context);
      results.push(outcome.result);
      warnings.push(...outcome.warnings);
    }

    const report: ExportReport = {
      assetName,
      generatedAt: new Date(),
      directories,
      results,
      objTextures: this.textureListing(directories, 'obj', false),
      daeTextures: this.textureListing(directories, 'dae', true),
      warnings,
    };
    const reportPath = await writeExportReport(report, outputDir, logger);

    const primary = results.find(r => r.format === primaryFormat);
    return { results, primarySuccess: primary?.success ?? false, reportPath };
  }

  private async exportFormat(
    format: ExportFormat,
    dir: string,
    armature: ArmatureObject,
    meshes: MeshObject[],
    assetName: string,
    context: InteractiveContext | undefined
  ): Promise<FormatOutcome> {
    const { workspace, host, logger } = this.options;
    const label = format.toUpperCase();
    const policy = FORMAT_POLICIES[format];
    const filePath = path.join(dir, `${assetName}${FORMAT_EXTENSIONS[format]}`);
    const warnings: string[] = [];

    try {
      ensureDir(dir);

      await prepareMaterialsForExport(meshes, format, policy, {
        workspace,
        host,
        logger,
        shaderMarkers: this.options.shaderMarkers,
        transparency: this.options.transparency,
      });

      workspace.setSelection(armature, [armature, ...meshes], 'OBJECT');

      if (policy.packImages && host.packImages) {
        try {
          await host.packImages(workspace);
          logger.info(`  Packed all images for ${label} embed`);
        } catch (error) {
          logger.warn(`  Image packing (non-fatal): ${errorMessage(error)}`);
        }
      }

      const exporter = host.probeExporter(format);
      if (!exporter) {
        throw PipelineErrorFactory.exportError(`${label} exporter not available`, format);
      }

      logger.info(`Exporting ${label} to: ${filePath}`);
      const status = await exporter.exportScene({
        filePath,
        workspace,
        armature,
        meshes,
        options: buildExportOptions(format),
        context,
      });
      if (status !== 'finished') {
        throw PipelineErrorFactory.exportError(`operator returned ${status}`, format, { filePath });
      }

      const success = this.verifyExport(filePath, label);

      if (success && policy.relocateTextures) {
        const mtlPath = path.join(dir, `${assetName}${MTL_EXTENSION}`);
        const relocation = await relocateMtlTextures({
          mtlPath,
          destinationDir: dir,
          workspace,
          imageWriter: host.createImageWriter(),
          logger,
        });
        logger.info(`${label} export: OK ${filePath}, textures copied: ${relocation.copied}`);
        if (relocation.missing.length > 0) {
          logger.warn(`${label} missing textures: ${relocation.missing.join(', ')}`);
          warnings.push(...relocation.missing.map(ref => `${label} missing texture: ${ref}`));
        }
      }

      return { result: { format, success, detail: filePath }, warnings };
    } catch (error) {
      logger.error(`${label} export failed: ${errorMessage(error)}`, { operation: 'export', asset: assetName });
      return { result: { format, success: false, detail: errorMessage(error) }, warnings };
    }
  }

  /**
   * True when the file exists and is non-empty
   */
  private verifyExport(filePath: string, label: string): boolean {
    const { logger } = this.options;
    if (isFile(filePath) && fileSize(filePath) > 0) {
      logger.info(`${label}: SUCCESS -> ${filePath} (${fileSize(filePath)} bytes)`);
      return true;
    }
    logger.error(`${label}: FAILED (file missing or empty) -> ${filePath}`);
    return false;
  }

  private textureListing(
    directories: Array<{ format: ExportFormat; dir: string }>,
    format: ExportFormat,
    recursive: boolean
  ): string[] {
    const entry = directories.find(d => d.format === format);
    return entry ? listFilesByExtension(entry.dir, REPORT_TEXTURE_EXTENSIONS, recursive) : [];
  }
}
