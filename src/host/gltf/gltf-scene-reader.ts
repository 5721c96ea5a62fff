/**
 * glTF Scene Reader
 *
 * Populates a Workspace from a gltf-transform Document: skins become
 * armatures, mesh nodes become meshes, textures become in-memory images and
 * materials become node graphs.
 */

import * as path from 'path';
import type {
  Document,
  Material as GltfMaterial,
  Node,
  Texture,
} from '@gltf-transform/core';
import { TOON_GROUP } from '../../constants/gltf';
import { NODE_TYPES, SOCKETS } from '../../constants/shader';
import { createMaterial, ShaderGraphBuilder } from '../../core/shader-graph';
import type {
  BlendMode,
  Material,
  MeshObject,
  SceneImage,
  ShaderGraph,
  ShadowMode,
} from '../../core/scene-types';
import type { Workspace } from '../../core/workspace';

/**
 * Links between workspace entities and the document they were read from
 */
export interface GltfSceneBinding {
  document: Document;
  meshNodes: Map<MeshObject, Node>;
  materials: Map<Material, GltfMaterial>;
  textures: Map<SceneImage, Texture>;
}

function textureName(texture: Texture, index: number): string {
  const uri = texture.getURI();
  return texture.getName() || (uri ? path.basename(uri) : '') || `texture_${index}`;
}

function readImage(texture: Texture, index: number): SceneImage {
  const mimeType = texture.getMimeType() || null;
  return {
    name: textureName(texture, index),
    filepath: null,
    data: texture.getImage(),
    mimeType,
    colorSpace: 'sRGB',
    alphaMode: mimeType === 'image/jpeg' ? 'NONE' : 'STRAIGHT',
  };
}

function blendModeOf(material: GltfMaterial): { blend: BlendMode; shadow: ShadowMode } {
  switch (material.getAlphaMode()) {
    case 'MASK':
      return { blend: 'CLIP', shadow: 'CLIP' };
    case 'BLEND':
      return { blend: 'BLEND', shadow: 'HASHED' };
    default:
      return { blend: 'OPAQUE', shadow: 'OPAQUE' };
  }
}

/**
 * Output <- group whose sub-graph exposes `Lit Color` and `Normal`
 */
function buildToonGraph(name: string, base: SceneImage | null, normal: SceneImage | null): ShaderGraph {
  const inner = new ShaderGraphBuilder(TOON_GROUP.SUBGRAPH_NAME);
  inner.addNode(NODE_TYPES.GROUP_INPUT, 'Group Input');
  const groupOutput = inner.addNode(NODE_TYPES.GROUP_OUTPUT, 'Group Output', { inputs: [...TOON_GROUP.OUTPUTS] });
  if (base) {
    const lit = inner.addImageNode(base, 'Lit Texture');
    inner.link(lit, SOCKETS.COLOR, groupOutput, SOCKETS.LIT_COLOR);
  }
  if (normal) {
    const normalImage = inner.addImageNode(normal, 'Normal Texture');
    inner.link(normalImage, SOCKETS.COLOR, groupOutput, SOCKETS.NORMAL);
  }

  const outer = new ShaderGraphBuilder(`${name}_tree`);
  const output = outer.addNode(NODE_TYPES.OUTPUT_MATERIAL, 'Material Output');
  const group = outer.addGroupNode(inner.build(), TOON_GROUP.NODE_NAME);
  outer.link(group, SOCKETS.BSDF, output, SOCKETS.SURFACE);
  return outer.build();
}

function buildStandardGraph(
  name: string,
  base: SceneImage | null,
  normal: SceneImage | null,
  linkAlpha: boolean
): ShaderGraph {
  const builder = new ShaderGraphBuilder(`${name}_tree`);
  const output = builder.addNode(NODE_TYPES.OUTPUT_MATERIAL, 'Material Output');
  const principled = builder.addNode(NODE_TYPES.BSDF_PRINCIPLED, 'Principled BSDF');
  builder.link(principled, SOCKETS.BSDF, output, SOCKETS.SURFACE);

  if (base) {
    const image = builder.addImageNode(base, 'Base Color Texture');
    builder.link(image, SOCKETS.COLOR, principled, SOCKETS.BASE_COLOR);
    if (linkAlpha) {
      builder.link(image, SOCKETS.ALPHA, principled, SOCKETS.ALPHA);
    }
  }
  if (normal) {
    const normalMap = builder.addNode(NODE_TYPES.NORMAL_MAP, 'Normal Map');
    const image = builder.addImageNode(normal, 'Normal Texture');
    builder.link(image, SOCKETS.COLOR, normalMap, SOCKETS.COLOR);
    builder.link(normalMap, SOCKETS.NORMAL, principled, SOCKETS.NORMAL);
  }
  return builder.build();
}

/**
 * Read `document` into `workspace`. `toonMaterials` holds indices into the
 * document's material list.
 */
export function readDocumentIntoWorkspace(
  document: Document,
  toonMaterials: ReadonlySet<number>,
  workspace: Workspace
): GltfSceneBinding {
  const root = document.getRoot();
  const binding: GltfSceneBinding = {
    document,
    meshNodes: new Map(),
    materials: new Map(),
    textures: new Map(),
  };

  const imagesByTexture = new Map<Texture, SceneImage>();
  root.listTextures().forEach((texture, index) => {
    const image = workspace.addImage(readImage(texture, index));
    imagesByTexture.set(texture, image);
    binding.textures.set(image, texture);
  });
  const imageOf = (texture: Texture | null): SceneImage | null =>
    (texture ? imagesByTexture.get(texture) : undefined) ?? null;

  const materialsBySource = new Map<GltfMaterial, Material>();
  root.listMaterials().forEach((source, index) => {
    const name = source.getName() || `Material_${index}`;
    const base = imageOf(source.getBaseColorTexture());
    const normal = imageOf(source.getNormalTexture());
    const { blend, shadow } = blendModeOf(source);

    const graph = toonMaterials.has(index)
      ? buildToonGraph(name, base, normal)
      : buildStandardGraph(name, base, normal, blend !== 'OPAQUE');

    const material = createMaterial(name, graph);
    material.useBackfaceCulling = !source.getDoubleSided();
    material.blendMode = blend;
    material.shadowMode = shadow;
    material.alphaThreshold = source.getAlphaCutoff();
    workspace.addMaterial(material);
    materialsBySource.set(source, material);
    binding.materials.set(material, source);
  });

  root.listSkins().forEach((skin, index) => {
    workspace.addObject({
      kind: 'armature',
      name: skin.getName() || `Armature_${index}`,
      boneCount: skin.listJoints().length,
    });
  });

  root.listNodes().forEach((node, index) => {
    const mesh = node.getMesh();
    if (!mesh) return;

    const primitives = mesh.listPrimitives();
    const meshObject = workspace.addObject<MeshObject>({
      kind: 'mesh',
      name: node.getName() || mesh.getName() || `Mesh_${index}`,
      vertexCount: primitives.reduce((sum, prim) => sum + (prim.getAttribute('POSITION')?.getCount() ?? 0), 0),
      materialSlots: primitives.map(prim => {
        const source = prim.getMaterial();
        return { material: (source ? materialsBySource.get(source) : undefined) ?? null };
      }),
    });
    binding.meshNodes.set(meshObject, node);
  });

  return binding;
}
