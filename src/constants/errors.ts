/**
 * Error Constants for the avatar export pipeline
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  SCHEMA_VALIDATION_ERROR: 'PIPELINE_SCHEMA_VALIDATION_ERROR',
  CONFIG_VALIDATION_ERROR: 'PIPELINE_CONFIG_VALIDATION_ERROR',
  IMPORT_ERROR: 'PIPELINE_IMPORT_ERROR',
  EXPORT_ERROR: 'PIPELINE_EXPORT_ERROR',
  FILE_SYSTEM_ERROR: 'PIPELINE_FILE_SYSTEM_ERROR',
} as const;

/**
 * Failure reasons recorded on an AssetJob
 */
export const FAILURE_REASONS = {
  IMPORTER_UNAVAILABLE: 'importer unavailable',
  IMPORT_FAILED: 'import failed',
  NO_ARMATURE: 'no armature',
  NO_MESHES: 'no meshes',
  EXPORT_FAILED: 'conversion-only export failed',
  RIGGED_AND_FALLBACK_FAILED: 'rigged and conversion-only export failed',
} as const;
