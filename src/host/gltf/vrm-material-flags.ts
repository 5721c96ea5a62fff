/**
 * Detects toon-shaded materials in raw VRM JSON. The flags live in
 * extensions the document reader does not keep, so they are read before it.
 */

import type { GLTF } from '@gltf-transform/core';
import { z } from 'zod';
import { MTOON_EXTENSION, VRM0_EXTENSION, VRM0_MTOON_SHADER } from '../../constants/gltf';

const VrmZeroExtensionSchema = z.object({
  materialProperties: z.array(z.object({
    name: z.string().optional(),
    shader: z.string().optional(),
  })).optional(),
});

/**
 * Indices into `json.materials` of every toon material
 */
export function findToonMaterialIndices(json: GLTF.IGLTF): Set<number> {
  const materials = json.materials ?? [];
  const indices = new Set<number>();

  materials.forEach((material, index) => {
    if (material.extensions && MTOON_EXTENSION in material.extensions) {
      indices.add(index);
    }
  });

  const vrm0 = VrmZeroExtensionSchema.safeParse(json.extensions?.[VRM0_EXTENSION]);
  if (vrm0.success) {
    (vrm0.data.materialProperties ?? []).forEach((property, index) => {
      if (property.shader !== VRM0_MTOON_SHADER) return;
      const byName = property.name ? materials.findIndex(m => m.name === property.name) : -1;
      indices.add(byName >= 0 ? byName : index);
    });
  }

  return indices;
}
