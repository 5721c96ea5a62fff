/**
 * Shader graph constants
 *
 * Node type identifiers and socket names used by material graphs.
 */

export const NODE_TYPES = {
  OUTPUT_MATERIAL: 'OUTPUT_MATERIAL',
  BSDF_PRINCIPLED: 'BSDF_PRINCIPLED',
  GROUP: 'GROUP',
  GROUP_INPUT: 'GROUP_INPUT',
  GROUP_OUTPUT: 'GROUP_OUTPUT',
  TEX_IMAGE: 'TEX_IMAGE',
  NORMAL_MAP: 'NORMAL_MAP',
  MIX: 'MIX',
  EMISSION: 'EMISSION',
} as const;

export type ShaderNodeType = typeof NODE_TYPES[keyof typeof NODE_TYPES];

export const SOCKETS = {
  SURFACE: 'Surface',
  BSDF: 'BSDF',
  BASE_COLOR: 'Base Color',
  ALPHA: 'Alpha',
  NORMAL: 'Normal',
  COLOR: 'Color',
  METALLIC: 'Metallic',
  ROUGHNESS: 'Roughness',
  STRENGTH: 'Strength',
  LIT_COLOR: 'Lit Color',
} as const;

/**
 * Image name fragments that mark a normal map
 */
export const NORMAL_IMAGE_MARKERS = ['normal', 'nrm'] as const;

/**
 * Socket names whose source image holds non-colour data
 */
export const NON_COLOR_SOCKETS: readonly string[] = [
  SOCKETS.NORMAL,
  SOCKETS.METALLIC,
  SOCKETS.ROUGHNESS,
  SOCKETS.ALPHA,
];

export const NON_COLOR_SOCKET_MARKERS = ['normal', 'bump'] as const;

/**
 * Derived material naming: `{original}_{target}_principled`
 */
export const DERIVED_MATERIAL_SUFFIX = 'principled';
