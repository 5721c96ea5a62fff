/**
 * Avatar Batch Exporter
 *
 * Converts a folder of VRM avatars to FBX, GLB, DAE and OBJ, re-rigging each
 * one through an auto-rig plugin when the host offers it.
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'avatar-batch-exporter';
 *
 * const exporter = defineConfig({
 *   inputDir: './vrm_in',
 *   outputDir: './export_out',
 *   primaryFormat: 'glb',
 * });
 *
 * const summary = await exporter.run();
 * process.exitCode = summary.exitCode;
 * ```
 */

import { ZodError } from 'zod';
import { PipelineErrorFactory } from './errors';
import type { HostCapabilities } from './host/capabilities';
import { GltfHost } from './host/gltf/gltf-host';
import { BatchRunner, type BatchSummary } from './pipeline/batch-runner';
import { PipelineConfigSchema, type PipelineConfig, type PipelineConfigInput } from './schemas';
import { LoggerFactory, LogLevel, type Logger } from './utils/logger';

const LOG_LEVELS: Record<PipelineConfig['logLevel'], LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export interface RunOptions {
  /** Host application; defaults to the glTF host */
  host?: HostCapabilities;
  logger?: Logger;
}

/**
 * Main exporter class
 */
export class AvatarBatchExporter {
  private config: PipelineConfig;

  constructor(config: PipelineConfigInput = {}) {
    try {
      this.config = PipelineConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw PipelineErrorFactory.schemaError('Invalid configuration', 'PipelineConfig', error);
      }
      throw error;
    }
  }

  /**
   * Process every input file once
   */
  async run(options: RunOptions = {}): Promise<BatchSummary> {
    const logger = options.logger ?? LoggerFactory.forPipeline(LOG_LEVELS[this.config.logLevel], this.config.color);
    const host = options.host ?? new GltfHost(logger);
    return new BatchRunner({ config: this.config, host, logger }).run();
  }

  /**
   * Get current configuration
   */
  getConfig(): PipelineConfig {
    return { ...this.config };
  }
}

/**
 * Create an exporter with configuration
 */
export function defineConfig(config: PipelineConfigInput = {}): AvatarBatchExporter {
  return new AvatarBatchExporter(config);
}

export type { PipelineConfig, PipelineConfigInput, TransparencyPolicy } from './schemas';
export type {
  AssetImporter,
  ExportRequest,
  FormatExporter,
  HostCapabilities,
  HostInfo,
  ImageWriter,
  InteractiveContext,
  OperatorStatus,
  RigOperator,
  RigPluginInfo,
} from './host/capabilities';
export type { BatchSummary } from './pipeline/batch-runner';
export { Workspace } from './core/workspace';
export { GltfHost } from './host/gltf/gltf-host';
export { AssetOutcome } from './pipeline/asset-job';
export * from './errors';
