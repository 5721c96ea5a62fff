/**
 * Base Schemas
 *
 * Common validation schemas shared by the pipeline configuration.
 */

import { z } from 'zod';
import { EXPORT_FORMATS } from '../constants/export';

/**
 * Supported export formats
 */
export const ExportFormatSchema = z.enum(EXPORT_FORMATS);

/**
 * Log level names
 */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * File extension with leading dot, e.g. `.vrm`
 */
export const FileExtensionSchema = z.string()
  .regex(/^\.[A-Za-z0-9]+$/, 'Extension must start with a dot and contain only letters and digits')
  .transform(ext => ext.toLowerCase());
