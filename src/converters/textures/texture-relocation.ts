/**
 * Texture Relocation Resolver
 *
 * Rewrites an exported `.mtl` so every texture it names sits next to it.
 * The legacy format only stores a path, while the scene may hold a texture
 * purely in memory or under a different path, so each reference is resolved
 * first and then copied or serialised under a unique file name.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { SceneImage } from '../../core/scene-types';
import type { Workspace } from '../../core/workspace';
import type { ImageWriter } from '../../host/capabilities';
import { errorMessage } from '../../errors';
import { getImageExtensionFromData, getImageExtensionFromMimeType } from '../../utils/image-utils';
import type { Logger } from '../../utils/logger';
import { isFile, isSamePath } from '../../utils/file-utils';
import { synthesizeImageFileName } from '../../utils/name-utils';
import { formatTextureDirective, parseTextureDirective, type TextureDirective } from './mtl-directive';
import { resolveTextureSource, type TextureSource } from './texture-source-resolver';
import { UniqueFilenameAllocator } from './unique-filename';

export interface TextureRelocationOptions {
  mtlPath: string;
  destinationDir: string;
  workspace: Workspace;
  imageWriter: ImageWriter;
  logger: Logger;
}

export interface TextureRelocationResult {
  /** Files copied or serialised while rewriting directives */
  copied: number;
  /** References that could not be resolved or written */
  missing: string[];
  /** Memory-only images flushed after the rewrite */
  flushed: string[];
}

/**
 * File name for an in-memory image; the extension comes from its MIME type
 * or bytes when the name has none
 */
export function memoryImageFileName(image: SceneImage): string {
  const fallbackExt = getImageExtensionFromMimeType(image.mimeType)
    ?? (image.data ? getImageExtensionFromData(image.data) : '.png');
  return synthesizeImageFileName(image.name, fallbackExt);
}

interface ResolvedLine {
  line: string;
  directive?: TextureDirective;
  source?: TextureSource;
}

/**
 * Names already present in the destination folder; none when it is missing
 */
async function listDestinationNames(dir: string): Promise<string[]> {
  try {
    return await fs.promises.readdir(dir);
  } catch {
    return [];
  }
}

function isMemoryOnly(image: SceneImage): boolean {
  return image.data !== null && !(image.filepath && isFile(image.filepath));
}

export async function relocateMtlTextures(options: TextureRelocationOptions): Promise<TextureRelocationResult> {
  const { mtlPath, destinationDir, workspace, imageWriter, logger } = options;
  const result: TextureRelocationResult = { copied: 0, missing: [], flushed: [] };

  if (!isFile(mtlPath)) {
    logger.warn(`MTL file not found: ${mtlPath}`);
    return result;
  }

  let content: string;
  try {
    content = await fs.promises.readFile(mtlPath, 'utf-8');
  } catch (error) {
    logger.warn(`Could not read MTL ${mtlPath}: ${errorMessage(error)}`);
    return result;
  }

  const mtlDir = path.dirname(mtlPath);
  const images = workspace.listImages();

  // resolve every directive before anything is copied into the folder
  const entries: ResolvedLine[] = content.split(/\r?\n/).map(line => {
    const directive = parseTextureDirective(line);
    return directive
      ? { line, directive, source: resolveTextureSource(directive.path, mtlDir, images) }
      : { line };
  });

  const inPlace = new Map<string, string>();
  for (const { source } of entries) {
    if (source?.kind === 'file' && isSamePath(path.dirname(source.path), destinationDir)) {
      inPlace.set(source.path, path.basename(source.path));
    }
  }
  const keep = new Set(inPlace.values());
  const allocator = new UniqueFilenameAllocator(
    (await listDestinationNames(destinationDir)).filter(name => !keep.has(name))
  );
  for (const name of keep) allocator.allocate(name);

  const fileNames = new Map<string, string>(inPlace);
  const imageNames = new Map<SceneImage, string>();
  const rewritten: string[] = [];

  for (const { line, directive, source } of entries) {
    if (!directive || !source) {
      rewritten.push(line);
      continue;
    }

    if (source.kind === 'missing') {
      result.missing.push(directive.path);
      rewritten.push(line);
      continue;
    }

    if (source.kind === 'memory') {
      let fileName = imageNames.get(source.image);
      if (!fileName) {
        fileName = allocator.allocate(memoryImageFileName(source.image));
        try {
          await imageWriter.writeImage(source.image, path.join(destinationDir, fileName));
          imageNames.set(source.image, fileName);
          result.copied++;
          logger.info(`Copied texture (in memory): ${fileName}`);
        } catch (error) {
          logger.warn(`Could not save in-memory image '${fileName}': ${errorMessage(error)}`);
          result.missing.push(directive.path);
          rewritten.push(line);
          continue;
        }
      }
      rewritten.push(formatTextureDirective(directive, fileName));
      continue;
    }

    let fileName = fileNames.get(source.path);
    if (!fileName) {
      fileName = allocator.allocate(path.basename(source.path));
      try {
        await fs.promises.copyFile(source.path, path.join(destinationDir, fileName));
        fileNames.set(source.path, fileName);
        result.copied++;
        logger.info(`Copied texture: ${fileName}`);
      } catch (error) {
        logger.warn(`Could not copy '${fileName}': ${errorMessage(error)}`);
        result.missing.push(directive.path);
        rewritten.push(line);
        continue;
      }
    }
    rewritten.push(formatTextureDirective(directive, fileName));
  }

  // textures held only in memory that no directive referenced
  for (const image of images) {
    if (imageNames.has(image) || !isMemoryOnly(image)) continue;
    const fileName = allocator.allocate(memoryImageFileName(image));
    try {
      await imageWriter.writeImage(image, path.join(destinationDir, fileName));
      result.flushed.push(fileName);
      logger.debug(`Saved texture: ${fileName}`);
    } catch (error) {
      logger.warn(`Could not save '${fileName}' (non-fatal): ${errorMessage(error)}`);
    }
  }

  try {
    await fs.promises.writeFile(mtlPath, rewritten.join('\n'), 'utf-8');
  } catch (error) {
    logger.warn(`Could not rewrite MTL ${mtlPath}: ${errorMessage(error)}`);
  }

  return result;
}
