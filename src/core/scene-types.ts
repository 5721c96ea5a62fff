/**
 * Scene model shared by the pipeline and every host.
 *
 * Mirrors the pieces of a host scene the pipeline reads and mutates:
 * objects, material slots, shader node graphs and images.
 */

import type { ShaderNodeType } from '../constants/shader';

export type InteractionMode = 'OBJECT' | 'POSE' | 'EDIT';

export type BlendMode = 'OPAQUE' | 'CLIP' | 'HASHED' | 'BLEND';

export type ShadowMode = 'OPAQUE' | 'CLIP' | 'HASHED' | 'NONE';

export type ColorSpace = 'sRGB' | 'Non-Color';

export type ImageAlphaMode = 'STRAIGHT' | 'PREMUL' | 'CHANNEL_PACKED' | 'NONE';

/**
 * Texture image. `filepath` is set when the pixels live on disk, `data` when
 * they are held in memory; either or both may be present.
 */
export interface SceneImage {
  name: string;
  filepath: string | null;
  data: Uint8Array | null;
  mimeType: string | null;
  colorSpace: ColorSpace;
  alphaMode: ImageAlphaMode;
}

interface ShaderNodeBase {
  id: string;
  name: string;
  inputs: string[];
  outputs: string[];
}

export interface ImageTextureNode extends ShaderNodeBase {
  type: 'TEX_IMAGE';
  image: SceneImage | null;
}

export interface GroupNode extends ShaderNodeBase {
  type: 'GROUP';
  subgraph: ShaderGraph | null;
}

export interface GenericShaderNode extends ShaderNodeBase {
  type: Exclude<ShaderNodeType, 'TEX_IMAGE' | 'GROUP'>;
}

export type ShaderNode = ImageTextureNode | GroupNode | GenericShaderNode;

/**
 * Directed link from an output socket to an input socket
 */
export interface NodeLink {
  fromNode: string;
  fromSocket: string;
  toNode: string;
  toSocket: string;
}

/**
 * Node graph; `id` is its identity for cycle detection
 */
export interface ShaderGraph {
  id: string;
  name: string;
  nodes: ShaderNode[];
  links: NodeLink[];
}

/**
 * Where a derived material came from
 */
export interface MaterialOrigin {
  original: string;
  target: string;
}

export interface Material {
  name: string;
  graph: ShaderGraph | null;
  useBackfaceCulling: boolean;
  blendMode: BlendMode;
  shadowMode: ShadowMode;
  alphaThreshold: number;
  derivedFrom: MaterialOrigin | null;
}

export interface MaterialSlot {
  material: Material | null;
}

export interface ArmatureObject {
  kind: 'armature';
  name: string;
  boneCount: number;
}

export interface MeshObject {
  kind: 'mesh';
  name: string;
  vertexCount: number;
  materialSlots: MaterialSlot[];
}

/**
 * Anything else the importer brings in (lights, cameras, empties)
 */
export interface OtherObject {
  kind: 'other';
  name: string;
}

export type SceneObject = ArmatureObject | MeshObject | OtherObject;

export function isArmature(obj: SceneObject): obj is ArmatureObject {
  return obj.kind === 'armature';
}

export function isMesh(obj: SceneObject): obj is MeshObject {
  return obj.kind === 'mesh';
}
