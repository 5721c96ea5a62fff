import type { ExportFormat } from '../constants/export';
import type { ExportOptions } from '../host/capabilities';

/**
 * Exporter settings per format: skeleton and meshes only, deform bones only,
 * no animation, Y up / -Z forward, textures travelling with the file
 */
export function buildExportOptions(format: ExportFormat): ExportOptions {
  switch (format) {
    case 'fbx':
      return {
        format,
        addLeafBones: false,
        bakeAnimation: false,
        deformBonesOnly: true,
        applyUnitScale: true,
        embedTextures: true,
        axisForward: '-Z',
        axisUp: 'Y',
      };
    case 'glb':
      return {
        format,
        applyModifiers: true,
        exportTangents: true,
        exportSkins: true,
        exportMorphs: true,
        exportAnimations: false,
        keepOriginalImages: false,
      };
    case 'dae':
      return {
        format,
        applyModifiers: true,
        includeArmatures: true,
        includeChildren: true,
        deformBonesOnly: true,
      };
    case 'obj':
      return {
        format,
        applyModifiers: true,
        exportMaterials: true,
        exportUv: true,
        exportNormals: true,
        copyTextures: true,
        forwardAxis: '-Z',
        upAxis: 'Y',
      };
  }
}
