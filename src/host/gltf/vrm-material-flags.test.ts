import { describe, expect, it } from 'vitest';
import { findToonMaterialIndices } from './vrm-material-flags';

const asset = { version: '2.0' };

describe('findToonMaterialIndices', () => {
  it('flags materials carrying the VRM 1.0 toon extension', () => {
    const json = {
      asset,
      materials: [
        { name: 'Skin' },
        { name: 'Hair', extensions: { VRMC_materials_mtoon: { specVersion: '1.0' } } },
      ],
    };
    expect([...findToonMaterialIndices(json)]).toEqual([1]);
  });

  it('matches VRM 0.x material properties by name, then by position', () => {
    const json = {
      asset,
      materials: [{ name: 'Face' }, { name: 'Body' }, { name: 'Eyes' }],
      extensions: {
        VRM: {
          materialProperties: [
            { name: 'Body', shader: 'VRM/MToon' },
            { name: 'Renamed', shader: 'VRM/MToon' },
            { name: 'Eyes', shader: 'VRM/UnlitTexture' },
          ],
        },
      },
    };
    expect([...findToonMaterialIndices(json)].sort()).toEqual([1]);
  });

  it('falls back to the property position when the name is unknown', () => {
    const json = {
      asset,
      materials: [{ name: 'Face' }, { name: 'Body' }],
      extensions: { VRM: { materialProperties: [{ shader: 'VRM/UnlitTexture' }, { name: 'Other', shader: 'VRM/MToon' }] } },
    };
    expect([...findToonMaterialIndices(json)]).toEqual([1]);
  });

  it('ignores a malformed VRM extension', () => {
    const json = { asset, materials: [{ name: 'Face' }], extensions: { VRM: { materialProperties: 'broken' } } };
    expect(findToonMaterialIndices(json).size).toBe(0);
  });
});
