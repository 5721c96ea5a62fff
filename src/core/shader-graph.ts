/**
 * Shader graph construction and traversal helpers
 */

import { NODE_TYPES, SOCKETS, type ShaderNodeType } from '../constants/shader';
import type {
  GroupNode,
  ImageTextureNode,
  Material,
  NodeLink,
  SceneImage,
  ShaderGraph,
  ShaderNode,
} from './scene-types';

/**
 * Default socket layout per node type
 */
const NODE_SOCKETS: Record<ShaderNodeType, { inputs: string[]; outputs: string[] }> = {
  OUTPUT_MATERIAL: { inputs: [SOCKETS.SURFACE, 'Volume', 'Displacement'], outputs: [] },
  BSDF_PRINCIPLED: {
    inputs: [SOCKETS.BASE_COLOR, SOCKETS.METALLIC, SOCKETS.ROUGHNESS, SOCKETS.ALPHA, SOCKETS.NORMAL, 'Emission Color'],
    outputs: [SOCKETS.BSDF],
  },
  GROUP: { inputs: [], outputs: [] },
  GROUP_INPUT: { inputs: [], outputs: [] },
  GROUP_OUTPUT: { inputs: [], outputs: [] },
  TEX_IMAGE: { inputs: ['Vector'], outputs: [SOCKETS.COLOR, SOCKETS.ALPHA] },
  NORMAL_MAP: { inputs: [SOCKETS.STRENGTH, SOCKETS.COLOR], outputs: [SOCKETS.NORMAL] },
  MIX: { inputs: ['Factor', 'A', 'B'], outputs: ['Result'] },
  EMISSION: { inputs: [SOCKETS.COLOR, SOCKETS.STRENGTH], outputs: ['Emission'] },
};

let graphCounter = 0;

/**
 * Incrementally builds a ShaderGraph with unique node ids
 */
export class ShaderGraphBuilder {
  private readonly graph: ShaderGraph;
  private nodeCounter = 0;

  constructor(name: string) {
    graphCounter += 1;
    this.graph = { id: `graph_${graphCounter}`, name, nodes: [], links: [] };
  }

  private nextId(type: ShaderNodeType): string {
    this.nodeCounter += 1;
    return `${type.toLowerCase()}_${this.nodeCounter}`;
  }

  /**
   * Add a plain node. Socket lists default to the type's layout.
   */
  addNode(
    type: Exclude<ShaderNodeType, 'TEX_IMAGE' | 'GROUP'>,
    name?: string,
    sockets?: { inputs?: string[]; outputs?: string[] }
  ): ShaderNode {
    const node: ShaderNode = {
      id: this.nextId(type),
      type,
      name: name ?? type,
      inputs: sockets?.inputs ?? [...NODE_SOCKETS[type].inputs],
      outputs: sockets?.outputs ?? [...NODE_SOCKETS[type].outputs],
    };
    this.graph.nodes.push(node);
    return node;
  }

  addImageNode(image: SceneImage | null, name = 'Image Texture'): ImageTextureNode {
    const node: ImageTextureNode = {
      id: this.nextId(NODE_TYPES.TEX_IMAGE),
      type: NODE_TYPES.TEX_IMAGE,
      name,
      image,
      inputs: [...NODE_SOCKETS.TEX_IMAGE.inputs],
      outputs: [...NODE_SOCKETS.TEX_IMAGE.outputs],
    };
    this.graph.nodes.push(node);
    return node;
  }

  addGroupNode(subgraph: ShaderGraph | null, name = 'Group', outputs: string[] = [SOCKETS.BSDF]): GroupNode {
    const node: GroupNode = {
      id: this.nextId(NODE_TYPES.GROUP),
      type: NODE_TYPES.GROUP,
      name,
      subgraph,
      inputs: [],
      outputs,
    };
    this.graph.nodes.push(node);
    return node;
  }

  /**
   * Connect `from.fromSocket` to `to.toSocket`. Any existing link into the
   * target socket is replaced, as an input takes a single link.
   */
  link(from: ShaderNode, fromSocket: string, to: ShaderNode, toSocket: string): NodeLink {
    if (!from.outputs.includes(fromSocket)) {
      throw new Error(`Node '${from.name}' has no output '${fromSocket}'`);
    }
    if (!to.inputs.includes(toSocket)) {
      throw new Error(`Node '${to.name}' has no input '${toSocket}'`);
    }
    this.graph.links = this.graph.links.filter(l => !(l.toNode === to.id && l.toSocket === toSocket));
    const link: NodeLink = { fromNode: from.id, fromSocket, toNode: to.id, toSocket };
    this.graph.links.push(link);
    return link;
  }

  build(): ShaderGraph {
    return this.graph;
  }
}

export function findNode(graph: ShaderGraph, id: string): ShaderNode | undefined {
  return graph.nodes.find(node => node.id === id);
}

export function findNodeByType(graph: ShaderGraph, type: ShaderNodeType): ShaderNode | undefined {
  return graph.nodes.find(node => node.type === type);
}

/**
 * Links feeding one input socket
 */
export function linksInto(graph: ShaderGraph, node: ShaderNode, socket: string): NodeLink[] {
  return graph.links.filter(link => link.toNode === node.id && link.toSocket === socket);
}

/**
 * Links leaving a node from any of its outputs
 */
export function linksFrom(graph: ShaderGraph, node: ShaderNode): NodeLink[] {
  return graph.links.filter(link => link.fromNode === node.id);
}

/**
 * Node at the other end of the first link into `socket`
 */
export function sourceOf(graph: ShaderGraph, node: ShaderNode, socket: string): ShaderNode | undefined {
  const [link] = linksInto(graph, node, socket);
  return link ? findNode(graph, link.fromNode) : undefined;
}

export function isImageNode(node: ShaderNode | undefined): node is ImageTextureNode {
  return node?.type === NODE_TYPES.TEX_IMAGE;
}

export function isGroupNode(node: ShaderNode | undefined): node is GroupNode {
  return node?.type === NODE_TYPES.GROUP;
}

/**
 * Fresh material with no graph and host defaults
 */
export function createMaterial(name: string, graph: ShaderGraph | null = null): Material {
  return {
    name,
    graph,
    useBackfaceCulling: false,
    blendMode: 'OPAQUE',
    shadowMode: 'OPAQUE',
    alphaThreshold: 0.5,
    derivedFrom: null,
  };
}
