/**
 * Shader Graph Resolver
 *
 * Decides whether a material uses the toon shader and finds the textures a
 * portable replacement needs. The targeted walk follows the signal from the
 * material output back to a base-colour image; because the toon shader's
 * internal wiring differs between addon versions, a permissive walk over
 * every image in the graph backs it up.
 */

import {
  NODE_TYPES,
  NORMAL_IMAGE_MARKERS,
  SOCKETS,
} from '../../constants/shader';
import {
  findNodeByType,
  isGroupNode,
  isImageNode,
  linksInto,
  findNode,
  sourceOf,
} from '../../core/shader-graph';
import type {
  ImageTextureNode,
  Material,
  SceneImage,
  ShaderGraph,
} from '../../core/scene-types';

export interface ResolvedShaderTextures {
  baseColor: SceneImage | null;
  hasAlpha: boolean;
  normal: SceneImage | null;
}

interface ImageHit {
  image: SceneImage;
  hasAlpha: boolean;
}

interface CollectedImages {
  main: ImageHit[];
  normal: SceneImage[];
}

function containsMarker(value: string | null | undefined, markers: readonly string[]): boolean {
  const lower = (value ?? '').toLowerCase();
  return markers.some(marker => lower.includes(marker.toLowerCase()));
}

export function isNormalImage(image: SceneImage): boolean {
  return containsMarker(image.name, NORMAL_IMAGE_MARKERS);
}

function imageHit(node: ImageTextureNode): ImageHit | undefined {
  if (!node.image) return undefined;
  return {
    image: node.image,
    hasAlpha: node.outputs.includes(SOCKETS.ALPHA) && node.image.alphaMode !== 'NONE',
  };
}

/**
 * True when a group node's name or sub-graph name, any node name, or the
 * material's own name contains one of `markers`. Materials produced by the
 * rewriter and materials without a graph never qualify.
 */
export function isSpecialShaderMaterial(material: Material, markers: readonly string[]): boolean {
  if (!material.graph || material.derivedFrom) {
    return false;
  }

  for (const node of material.graph.nodes) {
    if (isGroupNode(node) && node.subgraph && containsMarker(node.subgraph.name, markers)) {
      return true;
    }
    if (containsMarker(node.name, markers)) {
      return true;
    }
  }
  return containsMarker(material.name, markers);
}

/**
 * Group-output inputs that carry the lit / base colour
 */
function isBaseColorSocketName(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.includes('lit') || (lower.includes('base') && lower.includes('color')) || lower === 'color';
}

/**
 * Follow a group's output bindings. Named lit/base-colour inputs first
 * (recursing into nested groups), then any image bound to any output.
 */
function findInGroup(group: ShaderGraph, visited: Set<string>): ImageHit | undefined {
  const groupOutput = findNodeByType(group, NODE_TYPES.GROUP_OUTPUT);
  if (!groupOutput) return undefined;

  for (const socket of groupOutput.inputs.filter(isBaseColorSocketName)) {
    for (const link of linksInto(group, groupOutput, socket)) {
      const source = findNode(group, link.fromNode);
      if (isImageNode(source)) {
        const hit = imageHit(source);
        if (hit) return hit;
      }
      if (isGroupNode(source) && source.subgraph) {
        const nested = findLitOrBaseColorImage(source.subgraph, visited, true);
        if (nested) return nested;
      }
    }
  }

  for (const socket of groupOutput.inputs) {
    for (const link of linksInto(group, groupOutput, socket)) {
      const source = findNode(group, link.fromNode);
      if (isImageNode(source)) {
        const hit = imageHit(source);
        if (hit) return hit;
      }
    }
  }
  return undefined;
}

/**
 * Targeted walk from the material output. `insideGroup` starts the walk at a
 * nested group's output bindings instead of a material output node.
 */
function findLitOrBaseColorImage(graph: ShaderGraph, visited: Set<string>, insideGroup = false): ImageHit | undefined {
  if (visited.has(graph.id)) return undefined;
  visited.add(graph.id);

  if (insideGroup) {
    return findInGroup(graph, visited);
  }

  const output = findNodeByType(graph, NODE_TYPES.OUTPUT_MATERIAL);
  if (!output) return undefined;
  const shader = sourceOf(graph, output, SOCKETS.SURFACE);
  if (!shader) return undefined;

  if (isImageNode(shader)) {
    return imageHit(shader);
  }

  if (shader.type === NODE_TYPES.BSDF_PRINCIPLED) {
    const base = sourceOf(graph, shader, SOCKETS.BASE_COLOR);
    if (isImageNode(base)) {
      return imageHit(base);
    }
  }

  if (isGroupNode(shader) && shader.subgraph) {
    if (visited.has(shader.subgraph.id)) return undefined;
    visited.add(shader.subgraph.id);
    return findInGroup(shader.subgraph, visited);
  }

  return undefined;
}

/**
 * Every image in the graph and nested groups, split into colour and normal
 */
function collectImages(graph: ShaderGraph, visited: Set<string>): CollectedImages {
  const collected: CollectedImages = { main: [], normal: [] };
  if (visited.has(graph.id)) return collected;
  visited.add(graph.id);

  for (const node of graph.nodes) {
    if (isImageNode(node) && node.image) {
      if (isNormalImage(node.image)) {
        collected.normal.push(node.image);
      } else {
        const hit = imageHit(node);
        if (hit) collected.main.push(hit);
      }
    }
    if (isGroupNode(node) && node.subgraph) {
      const nested = collectImages(node.subgraph, visited);
      collected.main.push(...nested.main);
      collected.normal.push(...nested.normal);
    }
  }
  return collected;
}

/**
 * Base colour (with alpha flag) and normal map for a material
 */
export function resolveShaderTextures(material: Material): ResolvedShaderTextures {
  if (!material.graph) {
    return { baseColor: null, hasAlpha: false, normal: null };
  }

  const targeted = findLitOrBaseColorImage(material.graph, new Set());
  const collected = collectImages(material.graph, new Set());
  const base = targeted ?? collected.main[0];

  return {
    baseColor: base?.image ?? null,
    hasAlpha: base?.hasAlpha ?? false,
    normal: collected.normal[0] ?? null,
  };
}
