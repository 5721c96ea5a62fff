/**
 * Resolves a texture path written in a `.mtl` file to its source
 */

import * as path from 'path';
import type { SceneImage } from '../../core/scene-types';
import { isFile } from '../../utils/file-utils';

export type TextureSource =
  | { kind: 'file'; path: string }
  | { kind: 'memory'; image: SceneImage }
  | { kind: 'missing'; reference: string };

function nameMatches(image: SceneImage, base: string): boolean {
  const name = image.name.trim();
  return name !== '' && (name === base || path.basename(name.replace(/\\/g, '/')) === base);
}

/**
 * Resolution order: absolute file, file relative to the `.mtl` folder, then
 * scene images by file path or name. An image matched by name without a file
 * on disk is returned as held in memory.
 */
export function resolveTextureSource(
  reference: string,
  mtlDir: string,
  images: readonly SceneImage[]
): TextureSource {
  const raw = reference.trim().replace(/\\/g, '/');
  if (!raw) {
    return { kind: 'missing', reference };
  }
  const base = path.posix.basename(raw);

  if (path.isAbsolute(raw)) {
    if (isFile(raw)) return { kind: 'file', path: path.normalize(raw) };
  } else {
    const relative = path.resolve(mtlDir, raw);
    if (isFile(relative)) return { kind: 'file', path: relative };
  }

  for (const image of images) {
    if (!image.filepath) {
      if (image.data && nameMatches(image, base)) {
        return { kind: 'memory', image };
      }
      continue;
    }

    const absolute = path.resolve(image.filepath);
    const onDisk = isFile(absolute);
    const normalized = absolute.replace(/\\/g, '/');
    if (onDisk && (path.basename(absolute) === base || normalized.endsWith(raw))) {
      return { kind: 'file', path: absolute };
    }
    if (nameMatches(image, base)) {
      if (onDisk) return { kind: 'file', path: absolute };
      if (image.data) return { kind: 'memory', image };
    }
  }

  return { kind: 'missing', reference: raw };
}
