/**
 * glTF / VRM Constants
 */

/**
 * VRM 1.0 toon material extension
 */
export const MTOON_EXTENSION = 'VRMC_materials_mtoon';

/**
 * VRM 0.x root extension and the shader name it gives toon materials
 */
export const VRM0_EXTENSION = 'VRM';
export const VRM0_MTOON_SHADER = 'VRM/MToon';

/**
 * Names given to the imported toon node group and its outputs
 */
export const TOON_GROUP = {
  SUBGRAPH_NAME: 'MToon',
  NODE_NAME: 'MToon Group',
  OUTPUTS: ['Lit Color', 'Normal'],
} as const;

export const GLTF_HOST_NAME = 'glTF host';

export const IMPORTER_ADDON = '@gltf-transform/core';

export const OBJ_NUMBER_PRECISION = 6;

/**
 * MTL material used by primitives that have none
 */
export const OBJ_DEFAULT_MATERIAL = 'default';
