/**
 * GLB exporter
 *
 * Writes the workspace's material state back onto the glTF document the
 * asset was read from, then serialises a pruned copy.
 */

import * as fs from 'fs';
import type {
  Document,
  Material as GltfMaterial,
  NodeIO,
  Texture,
} from '@gltf-transform/core';
import { cloneDocument, prune } from '@gltf-transform/functions';
import { resolveShaderTextures } from '../../converters/materials/shader-graph-resolver';
import type { Material, SceneImage } from '../../core/scene-types';
import { PipelineErrorFactory } from '../../errors';
import type { ExportRequest, FormatExporter, OperatorStatus } from '../capabilities';
import type { GltfSceneBinding } from './gltf-scene-reader';

function applyBlendMode(target: GltfMaterial, source: Material): void {
  switch (source.blendMode) {
    case 'CLIP':
      target.setAlphaMode('MASK').setAlphaCutoff(source.alphaThreshold);
      break;
    case 'HASHED':
    case 'BLEND':
      target.setAlphaMode('BLEND');
      break;
    default:
      target.setAlphaMode('OPAQUE');
  }
  target.setDoubleSided(!source.useBackfaceCulling);
}

export class GlbExporter implements FormatExporter {
  readonly format = 'glb';

  constructor(
    private readonly io: NodeIO,
    private readonly getBinding: () => GltfSceneBinding | undefined
  ) {}

  async exportScene(request: ExportRequest): Promise<OperatorStatus> {
    const binding = this.getBinding();
    if (!binding) {
      throw PipelineErrorFactory.exportError('No glTF document loaded', this.format, { filePath: request.filePath });
    }

    const resolved = new Map<Material, GltfMaterial>();
    for (const mesh of request.meshes) {
      const node = binding.meshNodes.get(mesh);
      const primitives = node?.getMesh()?.listPrimitives() ?? [];
      primitives.forEach((prim, index) => {
        const material = mesh.materialSlots[index]?.material;
        if (!material) return;
        let target = resolved.get(material);
        if (!target) {
          target = this.toGltfMaterial(material, binding);
          applyBlendMode(target, material);
          resolved.set(material, target);
        }
        prim.setMaterial(target);
      });
    }

    const output = cloneDocument(binding.document);
    await output.transform(prune());
    const glb = await this.io.writeBinary(output);
    await fs.promises.writeFile(request.filePath, glb);
    return 'finished';
  }

  /**
   * The material the asset came with, or a new one for a derived material
   */
  private toGltfMaterial(material: Material, binding: GltfSceneBinding): GltfMaterial {
    const existing = binding.materials.get(material);
    if (existing) return existing;

    const { document } = binding;
    const created = document.createMaterial(material.name).setMetallicFactor(0).setRoughnessFactor(1);
    const textures = resolveShaderTextures(material);
    if (textures.baseColor) {
      created.setBaseColorTexture(this.textureFor(textures.baseColor, binding, document));
    }
    if (textures.normal) {
      created.setNormalTexture(this.textureFor(textures.normal, binding, document));
    }
    binding.materials.set(material, created);
    return created;
  }

  private textureFor(image: SceneImage, binding: GltfSceneBinding, document: Document): Texture | null {
    const existing = binding.textures.get(image);
    if (existing) return existing;
    if (!image.data) return null;

    const texture = document.createTexture(image.name)
      .setImage(image.data)
      .setMimeType(image.mimeType ?? 'image/png');
    binding.textures.set(image, texture);
    return texture;
  }
}
