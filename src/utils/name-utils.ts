/**
 * Name Utilities
 *
 * Canonical asset names and file names synthesised for in-memory images.
 */

import * as path from 'path';
import { DEFAULT_CONFIG } from '../constants/config';
import { RECOGNIZED_IMAGE_EXTENSIONS } from '../constants/export';

const ASSET_NAME_INVALID_CHARS = /[^A-Za-z0-9_-]/g;

/**
 * Canonical name for an asset file.
 *
 * Base name without extension, spaces turned into underscores and everything
 * outside `[A-Za-z0-9_-]` removed. Never empty.
 * Example: "/in/My Avatar (v2).vrm" -> "My_Avatar_v2"
 */
export function sanitizeAssetName(pathOrName: string | null | undefined): string {
  const base = getBasenameWithoutExt(pathOrName ?? '');
  const spaced = (base || DEFAULT_CONFIG.FALLBACK_ASSET_NAME).replace(/ /g, '_');
  return spaced.replace(ASSET_NAME_INVALID_CHARS, '') || DEFAULT_CONFIG.FALLBACK_ASSET_NAME;
}

/**
 * Base name without its last extension; handles both separators
 */
export function getBasenameWithoutExt(filePath: string): string {
  const basename = path.basename(filePath.replace(/\\/g, '/'));
  return basename.replace(/\.[^/.]+$/, '');
}

export function hasRecognizedImageExtension(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return RECOGNIZED_IMAGE_EXTENSIONS.some(ext => lower.endsWith(ext));
}

/**
 * File name for an image that only exists in memory.
 * Spaces become underscores, directories are dropped, and `fallbackExt` is
 * appended when the name has no recognised image extension.
 */
export function synthesizeImageFileName(imageName: string, fallbackExt = '.png'): string {
  const base = path.basename((imageName.trim() || 'image').replace(/ /g, '_').replace(/\\/g, '/'));
  return hasRecognizedImageExtension(base) ? base : `${base}${fallbackExt}`;
}
