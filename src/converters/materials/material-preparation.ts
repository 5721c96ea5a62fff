/**
 * Material preparation before an export
 *
 * Double-sided materials everywhere, toon materials rewritten for targets
 * that cannot carry them, colour spaces fixed, transparency classified and
 * normals recalculated, each step driven by the target's format policy.
 */

import type { ExportFormat, FormatPolicy } from '../../constants/export';
import {
  NON_COLOR_SOCKET_MARKERS,
  NON_COLOR_SOCKETS,
} from '../../constants/shader';
import { isImageNode, linksFrom } from '../../core/shader-graph';
import type { Material, MeshObject } from '../../core/scene-types';
import type { Workspace } from '../../core/workspace';
import type { HostCapabilities } from '../../host/capabilities';
import type { TransparencyPolicy } from '../../schemas';
import { errorMessage } from '../../errors';
import type { Logger } from '../../utils/logger';
import { MaterialRewriter } from './material-rewriter';
import { isNormalImage, isSpecialShaderMaterial } from './shader-graph-resolver';

export interface MaterialPreparationContext {
  workspace: Workspace;
  host: HostCapabilities;
  logger: Logger;
  shaderMarkers: readonly string[];
  transparency: TransparencyPolicy;
}

export interface MaterialPreparationResult {
  processed: number;
  rewritten: number;
}

function isNonColorSocket(socket: string): boolean {
  const lower = socket.toLowerCase();
  return NON_COLOR_SOCKETS.includes(socket) || NON_COLOR_SOCKET_MARKERS.some(marker => lower.includes(marker));
}

/**
 * Non-Color for images named like normal maps or feeding only data sockets,
 * sRGB for the rest. An image whose colour also feeds a colour input stays
 * sRGB. Top-level image nodes only.
 */
export function fixImageColorSpaces(material: Material): void {
  const graph = material.graph;
  if (!graph) return;

  for (const node of graph.nodes) {
    if (!isImageNode(node) || !node.image) continue;
    const targets = linksFrom(graph, node).map(link => link.toSocket);
    const feedsData = targets.some(isNonColorSocket);
    const feedsColor = targets.some(socket => !isNonColorSocket(socket));
    node.image.colorSpace = isNormalImage(node.image) || (feedsData && !feedsColor) ? 'Non-Color' : 'sRGB';
  }
}

/**
 * Apply the transparency policy to one material
 */
export function applyTransparencyPolicy(material: Material, policy: TransparencyPolicy): void {
  if (policy.mode === 'preserve') return;

  const name = material.name.toLowerCase();
  if (policy.clipPatterns.some(pattern => name.includes(pattern.toLowerCase()))) {
    material.blendMode = 'CLIP';
    material.alphaThreshold = policy.alphaThreshold;
  } else {
    material.blendMode = 'OPAQUE';
  }
}

export async function prepareMaterialsForExport(
  meshes: MeshObject[],
  format: ExportFormat,
  policy: FormatPolicy,
  ctx: MaterialPreparationContext
): Promise<MaterialPreparationResult> {
  const result: MaterialPreparationResult = { processed: 0, rewritten: 0 };
  if (meshes.length === 0 || !policy.prepareMaterials) {
    return result;
  }

  const { host, logger, workspace } = ctx;
  logger.info(`Preparing materials for ${format.toUpperCase()}`);

  if (policy.rewriteShaders && host.convertSpecialShaders) {
    try {
      const status = await host.convertSpecialShaders(workspace);
      logger.info(`Host shader conversion returned: ${status}`);
    } catch (error) {
      logger.warn(`Host shader conversion (non-fatal): ${errorMessage(error)}`);
    }
  }

  const rewriter = new MaterialRewriter(workspace, logger);
  // original -> material its slots should now reference
  const replacements = new Map<Material, Material>();

  for (const mesh of meshes) {
    for (const slot of mesh.materialSlots) {
      const original = slot.material;
      if (!original) continue;

      const seen = replacements.get(original);
      if (seen) {
        slot.material = seen;
        seen.useBackfaceCulling = false;
        continue;
      }

      original.useBackfaceCulling = false;
      let material = original;

      if (policy.rewriteShaders && isSpecialShaderMaterial(original, ctx.shaderMarkers)) {
        try {
          material = rewriter.rewrite(original, format);
          material.useBackfaceCulling = false;
          slot.material = material;
          result.rewritten++;
        } catch (error) {
          logger.warn(`Skip principled conversion for '${original.name}': ${errorMessage(error)}`);
        }
      }
      replacements.set(original, material);
      result.processed++;

      fixImageColorSpaces(material);
      if (policy.classifyTransparency) {
        applyTransparencyPolicy(material, ctx.transparency);
      }
    }
  }

  if (host.recalculateNormals) {
    for (const mesh of meshes) {
      try {
        await host.recalculateNormals(mesh, workspace);
        logger.debug(`Recalculated normals (outside) for: ${mesh.name}`);
      } catch (error) {
        logger.warn(`Normal recalculation failed for '${mesh.name}': ${errorMessage(error)}`);
      }
    }
  }

  logger.info(`Materials prepared for ${format.toUpperCase()}: ${result.processed} processed, ${result.rewritten} rewritten`);
  return result;
}
