/**
 * Zod Schemas for the avatar export pipeline
 */

import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_CONFIG } from '../constants/config';
import { EXPORT_FORMATS } from '../constants/export';
import { ExportFormatSchema, FileExtensionSchema, LogLevelSchema } from './base-schemas';

/**
 * Per-material transparency classification for formats that sort
 * transparency in real time.
 *
 * `name-heuristic` switches a material to alpha clip when its name contains
 * one of `clipPatterns` and to opaque otherwise; `preserve` keeps whatever
 * blend mode the material already has.
 */
export const TransparencyPolicySchema = z.object({
  mode: z.enum(['name-heuristic', 'preserve']).optional().default('name-heuristic'),
  clipPatterns: z.array(z.string().min(1)).optional().default([...DEFAULT_CONFIG.CLIP_PATTERNS]),
  alphaThreshold: z.number().min(0).max(1).optional().default(DEFAULT_CONFIG.ALPHA_THRESHOLD),
});

/**
 * Pipeline Configuration Schema
 */
export const PipelineConfigSchema = z.object({
  inputDir: z.string().min(1).optional().default(DEFAULT_CONFIG.INPUT_DIR),
  outputDir: z.string().min(1).optional().default(DEFAULT_CONFIG.OUTPUT_DIR),
  doneDir: z.string().min(1).optional().default(DEFAULT_CONFIG.DONE_DIR),
  failedDir: z.string().min(1).optional().default(DEFAULT_CONFIG.FAILED_DIR),
  conversionOnly: z.boolean().optional().default(false),
  primaryFormat: ExportFormatSchema.optional().default('fbx'),
  formats: z.array(ExportFormatSchema).min(1).optional().default([...EXPORT_FORMATS]),
  inputExtensions: z.array(FileExtensionSchema).min(1).optional().default([...DEFAULT_CONFIG.INPUT_EXTENSIONS]),
  shaderMarkers: z.array(z.string().min(1)).min(1).optional().default([...DEFAULT_CONFIG.SHADER_MARKERS]),
  transparency: TransparencyPolicySchema.optional().default({}),
  logLevel: LogLevelSchema.optional().default('info'),
  color: z.boolean().optional().default(true),
}).refine(config => config.formats.includes(config.primaryFormat), {
  message: 'Primary format must be one of the exported formats',
  path: ['primaryFormat'],
}).transform(config => ({
  ...config,
  inputDir: path.resolve(config.inputDir),
  outputDir: path.resolve(config.outputDir),
  doneDir: path.resolve(config.doneDir),
  failedDir: path.resolve(config.failedDir),
}));

/**
 * Type exports for TypeScript inference
 */
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
export type PipelineConfig = z.output<typeof PipelineConfigSchema>;
export type TransparencyPolicy = z.output<typeof TransparencyPolicySchema>;

export { ExportFormatSchema, LogLevelSchema, FileExtensionSchema } from './base-schemas';
