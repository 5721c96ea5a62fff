/**
 * OBJ exporter
 *
 * Writes world-space triangles with UVs and normals plus a companion `.mtl`.
 * Texture maps reference each image by file path or, for images held in
 * memory, by name; relocation makes them real files afterwards.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Primitive } from '@gltf-transform/core';
import { OBJ_DEFAULT_MATERIAL, OBJ_NUMBER_PRECISION } from '../../constants/gltf';
import { MTL_EXTENSION } from '../../constants/export';
import { resolveShaderTextures } from '../../converters/materials/shader-graph-resolver';
import type { Material, SceneImage } from '../../core/scene-types';
import { PipelineErrorFactory } from '../../errors';
import { transformDirection, transformPoint } from '../../utils/matrix-utils';
import type { ExportRequest, FormatExporter, OperatorStatus } from '../capabilities';
import type { GltfSceneBinding } from './gltf-scene-reader';

interface VertexOffsets {
  position: number;
  uv: number;
  normal: number;
}

function num(value: number): string {
  return value.toFixed(OBJ_NUMBER_PRECISION);
}

/**
 * OBJ and MTL names end at whitespace
 */
export function objIdentifier(name: string): string {
  return name.trim().replace(/\s+/g, '_') || 'unnamed';
}

/**
 * One identifier per material within a single export. Names that collapse to
 * the same identifier get `__N`; the default material's name is reserved.
 */
export class ObjMaterialNames {
  private readonly names = new Map<Material, string>();
  private readonly taken = new Set<string>([OBJ_DEFAULT_MATERIAL]);

  nameOf(material: Material): string {
    const existing = this.names.get(material);
    if (existing) return existing;

    const base = objIdentifier(material.name);
    let name = base;
    for (let i = 1; this.taken.has(name); i++) {
      name = `${base}__${i}`;
    }
    this.taken.add(name);
    this.names.set(material, name);
    return name;
  }
}

function textureReference(image: SceneImage): string {
  return image.filepath ?? image.name;
}

/**
 * `newmtl` block for one material
 */
export function formatMtlMaterial(name: string, material: Material): string[] {
  const textures = resolveShaderTextures(material);
  const lines = [`newmtl ${name}`];
  lines.push(textures.baseColor ? 'Kd 1.000000 1.000000 1.000000' : 'Kd 0.800000 0.800000 0.800000');
  lines.push('Ks 0.000000 0.000000 0.000000');
  lines.push('d 1.000000');
  lines.push('illum 1');
  if (textures.baseColor) {
    lines.push(`map_Kd ${textureReference(textures.baseColor)}`);
    if (textures.hasAlpha && material.blendMode !== 'OPAQUE') {
      lines.push(`map_d ${textureReference(textures.baseColor)}`);
    }
  }
  if (textures.normal) {
    lines.push(`map_Bump ${textureReference(textures.normal)}`);
  }
  return lines;
}

function formatDefaultMtlMaterial(name: string): string[] {
  return [
    `newmtl ${name}`,
    'Kd 0.800000 0.800000 0.800000',
    'Ks 0.000000 0.000000 0.000000',
    'd 1.000000',
    'illum 1',
  ];
}

export class ObjExporter implements FormatExporter {
  readonly format = 'obj';

  constructor(private readonly getBinding: () => GltfSceneBinding | undefined) {}

  async exportScene(request: ExportRequest): Promise<OperatorStatus> {
    const binding = this.getBinding();
    if (!binding) {
      throw PipelineErrorFactory.exportError('No glTF document loaded', this.format, { filePath: request.filePath });
    }

    const mtlFileName = `${path.basename(request.filePath, path.extname(request.filePath))}${MTL_EXTENSION}`;
    const lines = ['# avatar-batch-exporter', `mtllib ${mtlFileName}`];
    const offsets: VertexOffsets = { position: 0, uv: 0, normal: 0 };
    const names = new ObjMaterialNames();
    const used = new Map<string, Material | null>();

    for (const mesh of request.meshes) {
      const node = binding.meshNodes.get(mesh);
      const gltfMesh = node?.getMesh();
      if (!node || !gltfMesh) continue;

      const world = node.getWorldMatrix();
      lines.push(`o ${objIdentifier(mesh.name)}`);

      gltfMesh.listPrimitives().forEach((prim, index) => {
        if (prim.getMode() !== Primitive.Mode.TRIANGLES) return;
        const position = prim.getAttribute('POSITION');
        if (!position) return;
        const uv = prim.getAttribute('TEXCOORD_0');
        const normal = prim.getAttribute('NORMAL');
        const count = position.getCount();
        const element: number[] = [];

        for (let i = 0; i < count; i++) {
          const [x, y, z] = transformPoint(world, position.getElement(i, element));
          lines.push(`v ${num(x)} ${num(y)} ${num(z)}`);
        }
        if (uv) {
          for (let i = 0; i < count; i++) {
            const [u, v] = uv.getElement(i, element);
            lines.push(`vt ${num(u)} ${num(1 - v)}`);
          }
        }
        if (normal) {
          for (let i = 0; i < count; i++) {
            const [x, y, z] = transformDirection(world, normal.getElement(i, element));
            lines.push(`vn ${num(x)} ${num(y)} ${num(z)}`);
          }
        }

        // every primitive names its material so none inherits the previous one
        const material = mesh.materialSlots[index]?.material ?? null;
        const materialName = material ? names.nameOf(material) : OBJ_DEFAULT_MATERIAL;
        used.set(materialName, material);
        lines.push(`usemtl ${materialName}`);

        const corner = (vertex: number): string => {
          const v = offsets.position + vertex + 1;
          const t = uv ? String(offsets.uv + vertex + 1) : '';
          const n = normal ? String(offsets.normal + vertex + 1) : '';
          if (n) return `${v}/${t}/${n}`;
          return t ? `${v}/${t}` : String(v);
        };

        const indices = prim.getIndices();
        const cornerCount = indices ? indices.getCount() : count;
        const vertexAt = (i: number): number => (indices ? indices.getScalar(i) : i);
        for (let i = 0; i + 2 < cornerCount; i += 3) {
          lines.push(`f ${corner(vertexAt(i))} ${corner(vertexAt(i + 1))} ${corner(vertexAt(i + 2))}`);
        }

        offsets.position += count;
        if (uv) offsets.uv += count;
        if (normal) offsets.normal += count;
      });
    }

    const mtl: string[] = [];
    for (const [name, material] of used) {
      mtl.push(...(material ? formatMtlMaterial(name, material) : formatDefaultMtlMaterial(name)), '');
    }

    await fs.promises.writeFile(request.filePath, `${lines.join('\n')}\n`, 'utf-8');
    await fs.promises.writeFile(path.join(path.dirname(request.filePath), mtlFileName), mtl.join('\n'), 'utf-8');
    return 'finished';
  }
}
