/**
 * Asset Pipeline State Machine
 *
 * Queued -> Importing -> Scaffolded -> [RigBindingAttempted] -> Exported
 * -> RiggedExport | FallbackExport | Failed
 *
 * `process` never throws: anything unexpected ends the job as Failed.
 */

import { FAILURE_REASONS } from '../constants/errors';
import { captureSceneSnapshot } from '../core/scene-snapshot';
import type { ArmatureObject, MeshObject } from '../core/scene-types';
import type { Workspace } from '../core/workspace';
import { errorMessage } from '../errors';
import { ExportOrchestrator } from '../export/export-orchestrator';
import type { HostCapabilities } from '../host/capabilities';
import { RigBindingEngine } from '../rigging/rig-binding-engine';
import type { PipelineConfig } from '../schemas';
import type { Logger } from '../utils/logger';
import { AssetJob, AssetOutcome, PipelineState } from './asset-job';

export interface AssetPipelineOptions {
  workspace: Workspace;
  host: HostCapabilities;
  logger: Logger;
  config: PipelineConfig;
  /** Run-level decision: false when conversion-only, headless or the plugin is incompatible */
  rigBindingEnabled: boolean;
  rigEngine?: RigBindingEngine;
}

export class AssetPipeline {
  private readonly rigEngine: RigBindingEngine;
  private readonly exporter: ExportOrchestrator;

  constructor(private readonly options: AssetPipelineOptions) {
    const { workspace, host, logger, config } = options;
    this.rigEngine = options.rigEngine ?? new RigBindingEngine();
    this.exporter = new ExportOrchestrator({
      workspace,
      host,
      logger,
      outputDir: config.outputDir,
      formats: config.formats,
      primaryFormat: config.primaryFormat,
      shaderMarkers: config.shaderMarkers,
      transparency: config.transparency,
    });
  }

  async process(job: AssetJob): Promise<AssetJob> {
    const { logger } = this.options;
    const rule = '='.repeat(60);
    logger.info(rule);
    logger.info(`Processing: ${job.sourcePath}`);
    logger.info(`Asset name: ${job.name}`);
    logger.info(rule);

    try {
      await this.run(job);
    } catch (error) {
      logger.logError(error, { asset: job.name });
      job.fail(errorMessage(error), logger);
    }
    return job;
  }

  private async run(job: AssetJob): Promise<void> {
    const { workspace, host, logger, config } = this.options;

    await workspace.reset(logger);
    job.advance(PipelineState.Importing, logger);

    const importer = host.probeImporter();
    if (!importer) {
      job.fail(FAILURE_REASONS.IMPORTER_UNAVAILABLE, logger);
      return;
    }

    try {
      const status = await importer.importAsset(job.sourcePath, workspace);
      if (status !== 'finished') {
        logger.error(`Import returned: ${status}`);
        job.fail(FAILURE_REASONS.IMPORT_FAILED, logger);
        return;
      }
    } catch (error) {
      logger.error(`Import failed: ${errorMessage(error)}`);
      job.fail(FAILURE_REASONS.IMPORT_FAILED, logger);
      return;
    }

    const snapshot = captureSceneSnapshot(workspace);
    if (!snapshot.skeleton) {
      job.fail(FAILURE_REASONS.NO_ARMATURE, logger);
      return;
    }
    if (snapshot.meshes.length === 0 || !snapshot.primaryMesh) {
      job.fail(FAILURE_REASONS.NO_MESHES, logger);
      return;
    }
    const skeleton = snapshot.skeleton;
    logger.info(`Skeleton: '${skeleton.name}' (${skeleton.boneCount} bones)`);
    logger.info(`Meshes: ${snapshot.meshes.map(m => m.name).join(', ')}`);
    job.advance(PipelineState.Scaffolded, logger);

    await this.applyTransforms([skeleton, ...snapshot.meshes]);

    let rig: ArmatureObject | undefined;
    if (!this.options.rigBindingEnabled || config.conversionOnly) {
      logger.info('Rig binding disabled for this run');
    } else {
      const context = host.acquireInteractiveContext();
      if (!context) {
        logger.warn('Cannot run rig binding: no interactive context');
      } else {
        const binding = await this.rigEngine.run({
          workspace,
          host,
          context,
          armature: skeleton,
          mesh: snapshot.primaryMesh,
          logger,
        });
        job.advance(PipelineState.RigBindingAttempted, logger);
        if (binding.success) {
          rig = binding.rig;
        } else {
          logger.warn(`Rig binding failed at ${binding.failedStep ?? 'setup'}: ${binding.reason}`);
        }
      }
    }

    // binding may add or replace meshes
    const meshes = workspace.listMeshes();

    if (rig) {
      const rigged = await this.exporter.exportAll(rig, meshes, job.name);
      if (rigged.primarySuccess) {
        job.advance(PipelineState.Exported, logger);
        job.succeed(AssetOutcome.RiggedExport, logger);
        return;
      }
      logger.warn(`Rig binding succeeded but ${config.primaryFormat.toUpperCase()} export failed; trying conversion-only`);
      const fallbackOk = await this.conversionOnlyExport(skeleton, meshes, job);
      job.advance(PipelineState.Exported, logger);
      if (fallbackOk) {
        job.succeed(AssetOutcome.FallbackExport, logger);
      } else {
        job.fail(FAILURE_REASONS.RIGGED_AND_FALLBACK_FAILED, logger);
      }
      return;
    }

    const fallbackOk = await this.conversionOnlyExport(skeleton, meshes, job);
    job.advance(PipelineState.Exported, logger);
    if (fallbackOk) {
      logger.info('Conversion-only export succeeded');
      job.succeed(AssetOutcome.FallbackExport, logger);
    } else {
      job.fail(FAILURE_REASONS.EXPORT_FAILED, logger);
    }
  }

  private async conversionOnlyExport(skeleton: ArmatureObject, meshes: MeshObject[], job: AssetJob): Promise<boolean> {
    this.options.logger.info('Attempting conversion-only export (no rig binding)');
    const result = await this.exporter.exportAll(skeleton, meshes, job.name);
    return result.primarySuccess;
  }

  private async applyTransforms(objects: Array<ArmatureObject | MeshObject>): Promise<void> {
    const { host, workspace, logger } = this.options;
    if (!host.applyTransforms) return;

    for (const obj of objects) {
      try {
        await host.applyTransforms(obj, workspace);
        logger.debug(`Applied transforms: ${obj.name}`);
      } catch (error) {
        logger.warn(`Apply transforms failed for '${obj.name}': ${errorMessage(error)}`);
      }
    }
  }
}
