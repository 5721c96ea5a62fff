/**
 * Custom Error Classes for pipeline operations
 *
 * Tagged union errors with Zod integration for configuration failures.
 */

import { ZodError } from 'zod';
import { ERROR_CODES } from './constants/errors';

/**
 * Base Pipeline Error Class
 */
export abstract class BasePipelineError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * Schema Validation Error
 */
export class PipelineSchemaError extends BasePipelineError {
  readonly _tag = 'PipelineSchemaError' as const;
  readonly code = ERROR_CODES.SCHEMA_VALIDATION_ERROR;
  readonly path: string;
  readonly zodError?: ZodError;

  constructor(message: string, path: string, zodError?: ZodError) {
    super(message, { path });
    this.path = path;
    this.zodError = zodError;
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * Configuration Error
 *
 * Raised for invalid configuration and for a required capability the host
 * does not provide.
 */
export class PipelineConfigError extends BasePipelineError {
  readonly _tag = 'PipelineConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;

  constructor(message: string, configKey: string, context?: Record<string, unknown>) {
    super(message, { configKey, ...context });
    this.configKey = configKey;
  }
}

/**
 * Import Error
 */
export class PipelineImportError extends BasePipelineError {
  readonly _tag = 'PipelineImportError' as const;
  readonly code = ERROR_CODES.IMPORT_ERROR;
  readonly sourcePath: string;

  constructor(message: string, sourcePath: string, context?: Record<string, unknown>) {
    super(message, { sourcePath, ...context });
    this.sourcePath = sourcePath;
  }
}

/**
 * Export Error
 */
export class PipelineExportError extends BasePipelineError {
  readonly _tag = 'PipelineExportError' as const;
  readonly code = ERROR_CODES.EXPORT_ERROR;
  readonly format: string;

  constructor(message: string, format: string, context?: Record<string, unknown>) {
    super(message, { format, ...context });
    this.format = format;
  }
}

/**
 * File System Error
 */
export class PipelineFileSystemError extends BasePipelineError {
  readonly _tag = 'PipelineFileSystemError' as const;
  readonly code = ERROR_CODES.FILE_SYSTEM_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, context?: Record<string, unknown>) {
    super(message, { filePath, operation, ...context });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * Union type for all pipeline errors
 */
export type PipelineError =
  | PipelineSchemaError
  | PipelineConfigError
  | PipelineImportError
  | PipelineExportError
  | PipelineFileSystemError;

/**
 * Error factory functions
 */
export const PipelineErrorFactory = {
  schemaError(message: string, path: string, zodError?: ZodError): PipelineSchemaError {
    return new PipelineSchemaError(message, path, zodError);
  },

  configError(message: string, configKey: string, context?: Record<string, unknown>): PipelineConfigError {
    return new PipelineConfigError(message, configKey, context);
  },

  importError(message: string, sourcePath: string, context?: Record<string, unknown>): PipelineImportError {
    return new PipelineImportError(message, sourcePath, context);
  },

  exportError(message: string, format: string, context?: Record<string, unknown>): PipelineExportError {
    return new PipelineExportError(message, format, context);
  },

  fileSystemError(message: string, filePath: string, operation: string, context?: Record<string, unknown>): PipelineFileSystemError {
    return new PipelineFileSystemError(message, filePath, operation, context);
  },
};

/**
 * Message of anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
