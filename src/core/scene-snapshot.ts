import type { ArmatureObject, MeshObject } from './scene-types';
import type { Workspace } from './workspace';

/**
 * What the pipeline works on after an import
 */
export interface SceneSnapshot {
  /** Armature with the most bones */
  skeleton: ArmatureObject | undefined;
  meshes: MeshObject[];
  /** Mesh with the most vertices */
  primaryMesh: MeshObject | undefined;
}

/**
 * Item with the greatest weight; the first one wins ties
 */
export function pickLargest<T>(items: readonly T[], weight: (item: T) => number): T | undefined {
  let best: T | undefined;
  let bestWeight = -Infinity;
  for (const item of items) {
    const w = weight(item);
    if (w > bestWeight) {
      best = item;
      bestWeight = w;
    }
  }
  return best;
}

export function captureSceneSnapshot(workspace: Workspace): SceneSnapshot {
  const meshes = workspace.listMeshes();
  return {
    skeleton: pickLargest(workspace.listArmatures(), a => a.boneCount),
    meshes,
    primaryMesh: pickLargest(meshes, m => m.vertexCount),
  };
}
