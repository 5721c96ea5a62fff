import * as fs from 'fs';
import type { SceneImage } from '../core/scene-types';
import { PipelineErrorFactory } from '../errors';
import { isFile, isSamePath } from '../utils/file-utils';
import type { ImageWriter } from './capabilities';

/**
 * Writes an image's in-memory bytes, or copies its backing file when it has
 * no bytes. Bytes are written as stored; no re-encoding.
 */
export class FileImageWriter implements ImageWriter {
  async writeImage(image: SceneImage, destination: string): Promise<void> {
    if (image.data) {
      await fs.promises.writeFile(destination, image.data);
      return;
    }

    if (image.filepath && isFile(image.filepath)) {
      if (!isSamePath(image.filepath, destination)) {
        await fs.promises.copyFile(image.filepath, destination);
      }
      return;
    }

    throw PipelineErrorFactory.fileSystemError(
      `Image '${image.name}' has no data to write`,
      destination,
      'write_image'
    );
  }
}
