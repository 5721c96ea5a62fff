/**
 * Configuration Constants
 */

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  INPUT_DIR: 'vrm_in',
  OUTPUT_DIR: 'export_out',
  DONE_DIR: 'vrm_done',
  FAILED_DIR: 'vrm_failed',
  INPUT_EXTENSIONS: ['.vrm'],
  SHADER_MARKERS: ['mtoon', 'vrm'],
  CLIP_PATTERNS: ['face', 'eyelash', 'eye', 'hair'],
  ALPHA_THRESHOLD: 0.5,
  FALLBACK_ASSET_NAME: 'export',
  FALLBACK_TEXTURE_NAME: 'tex.png',
} as const;

/**
 * Batch log naming
 */
export const LOG_FILE = {
  PREFIX: 'avatar_pipeline_',
  EXTENSION: '.log',
} as const;

/**
 * Report naming
 */
export const REPORT_FILE_SUFFIX = '_export_report.txt';

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  OK: 0,
  USAGE: 1,
  ASSET_FAILED: 2,
} as const;
