/**
 * Export Constants
 */

export const EXPORT_FORMATS = ['fbx', 'glb', 'dae', 'obj'] as const;

export type ExportFormat = typeof EXPORT_FORMATS[number];

/**
 * File Extensions per format
 */
export const FORMAT_EXTENSIONS: Record<ExportFormat, string> = {
  fbx: '.fbx',
  glb: '.glb',
  dae: '.dae',
  obj: '.obj',
};

export const MTL_EXTENSION = '.mtl';

/**
 * Per-format material and texture handling.
 * Kept as data so a new target only needs a row here.
 */
export interface FormatPolicy {
  prepareMaterials: boolean;
  rewriteShaders: boolean;
  classifyTransparency: boolean;
  packImages: boolean;
  relocateTextures: boolean;
}

export const FORMAT_POLICIES: Record<ExportFormat, FormatPolicy> = {
  fbx: { prepareMaterials: false, rewriteShaders: false, classifyTransparency: false, packImages: false, relocateTextures: false },
  glb: { prepareMaterials: true, rewriteShaders: true, classifyTransparency: true, packImages: true, relocateTextures: false },
  dae: { prepareMaterials: true, rewriteShaders: false, classifyTransparency: false, packImages: false, relocateTextures: false },
  obj: { prepareMaterials: true, rewriteShaders: true, classifyTransparency: false, packImages: false, relocateTextures: true },
};

/**
 * Texture file extensions listed in the export report
 */
export const REPORT_TEXTURE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.bmp', '.tga', '.tif', '.tiff', '.exr'] as const;

/**
 * Extensions accepted as-is when synthesising a file name for an in-memory image
 */
export const RECOGNIZED_IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.bmp'] as const;

/**
 * `.mtl` directives that reference a texture file
 */
export const MTL_MAP_DIRECTIVES = ['map_Kd', 'map_Ks', 'map_Bump', 'map_d', 'map_Ka', 'map_Ns', 'map_Ke', 'map_refl'] as const;

/**
 * `.mtl` texture options and how many arguments each takes
 */
export const MTL_OPTION_ARITY: Record<string, number> = {
  '-bm': 1,
  '-blendu': 1,
  '-blendv': 1,
  '-boost': 1,
  '-cc': 1,
  '-clamp': 1,
  '-imfchan': 1,
  '-texres': 1,
  '-type': 1,
  '-mm': 2,
  '-o': 3,
  '-s': 3,
  '-t': 3,
};
