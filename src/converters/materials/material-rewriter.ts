/**
 * Material Rewriter
 *
 * Builds a principled replacement for a toon-shader material. Replacements
 * live in the workspace under `{original}_{target}_principled`, so each
 * original gets at most one per export target and every slot shares it.
 */

import { DERIVED_MATERIAL_SUFFIX, NODE_TYPES, SOCKETS } from '../../constants/shader';
import { createMaterial, ShaderGraphBuilder } from '../../core/shader-graph';
import type { Material } from '../../core/scene-types';
import type { Workspace } from '../../core/workspace';
import type { Logger } from '../../utils/logger';
import { resolveShaderTextures, type ResolvedShaderTextures } from './shader-graph-resolver';

export function derivedMaterialName(original: string, target: string): string {
  return `${original}_${target}_${DERIVED_MATERIAL_SUFFIX}`;
}

export class MaterialRewriter {
  constructor(
    private readonly workspace: Workspace,
    private readonly logger: Logger
  ) {}

  /**
   * Cached replacement for `material` and `target`, creating it on first use
   */
  rewrite(material: Material, target: string, resolved?: ResolvedShaderTextures): Material {
    const name = derivedMaterialName(material.name, target);
    const cached = this.workspace.findMaterial(name);
    if (cached) {
      return cached;
    }

    const textures = resolved ?? resolveShaderTextures(material);
    const builder = new ShaderGraphBuilder(`${name}_tree`);
    const output = builder.addNode(NODE_TYPES.OUTPUT_MATERIAL, 'Material Output');
    const principled = builder.addNode(NODE_TYPES.BSDF_PRINCIPLED, 'Principled BSDF');
    builder.link(principled, SOCKETS.BSDF, output, SOCKETS.SURFACE);

    const derived = createMaterial(name);
    derived.derivedFrom = { original: material.name, target };
    derived.useBackfaceCulling = false;

    if (textures.baseColor) {
      const base = builder.addImageNode(textures.baseColor, 'Base Color Texture');
      builder.link(base, SOCKETS.COLOR, principled, SOCKETS.BASE_COLOR);
      if (textures.hasAlpha) {
        builder.link(base, SOCKETS.ALPHA, principled, SOCKETS.ALPHA);
        derived.blendMode = 'HASHED';
        derived.shadowMode = 'HASHED';
      }
    }

    if (textures.normal) {
      const normalMap = builder.addNode(NODE_TYPES.NORMAL_MAP, 'Normal Map');
      const normalImage = builder.addImageNode(textures.normal, 'Normal Texture');
      builder.link(normalImage, SOCKETS.COLOR, normalMap, SOCKETS.COLOR);
      builder.link(normalMap, SOCKETS.NORMAL, principled, SOCKETS.NORMAL);
    }

    derived.graph = builder.build();
    this.workspace.addMaterial(derived);

    this.logger.info(
      `Created principled material: ${derived.name} (from ${material.name}, tex=${textures.baseColor?.name ?? 'none'})`
    );
    return derived;
  }
}
