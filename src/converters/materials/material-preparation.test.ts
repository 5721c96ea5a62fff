import { describe, expect, it } from 'vitest';
import { FORMAT_POLICIES } from '../../constants/export';
import { findNodeByType, isImageNode, sourceOf } from '../../core/shader-graph';
import { Workspace } from '../../core/workspace';
import { NODE_TYPES, SOCKETS } from '../../constants/shader';
import { TransparencyPolicySchema } from '../../schemas';
import {
  FakeHost,
  makeImage,
  makeMesh,
  makeStandardMaterial,
  makeToonMaterial,
  silentLogger,
} from '../../__tests__/fixtures';
import { derivedMaterialName } from './material-rewriter';
import { applyTransparencyPolicy, prepareMaterialsForExport, type MaterialPreparationContext } from './material-preparation';
import { resolveShaderTextures } from './shader-graph-resolver';

function context(workspace: Workspace): MaterialPreparationContext {
  return {
    workspace,
    host: new FakeHost(),
    logger: silentLogger(),
    shaderMarkers: ['mtoon', 'vrm'],
    transparency: TransparencyPolicySchema.parse({}),
  };
}

describe('prepareMaterialsForExport', () => {
  it('shares one derived material between every slot of the same original', async () => {
    const workspace = new Workspace();
    const base = makeImage('body_tex');
    const toon = workspace.addMaterial(makeToonMaterial('Body', base));
    const first = workspace.addObject(makeMesh('Body', 100, [toon]));
    const second = workspace.addObject(makeMesh('Body_Outline', 50, [toon]));

    const result = await prepareMaterialsForExport([first, second], 'glb', FORMAT_POLICIES.glb, context(workspace));

    expect(result).toEqual({ processed: 1, rewritten: 1 });
    const derived = first.materialSlots[0].material;
    expect(derived?.name).toBe('Body_glb_principled');
    expect(second.materialSlots[0].material).toBe(derived);
    expect(derived?.derivedFrom).toEqual({ original: 'Body', target: 'glb' });
    expect(derived?.useBackfaceCulling).toBe(false);
    expect(workspace.listMaterials().filter(m => m.name === derivedMaterialName('Body', 'glb'))).toHaveLength(1);
  });

  it('wires the base image into the principled shader of the replacement', async () => {
    const workspace = new Workspace();
    const base = makeImage('body_tex');
    const toon = workspace.addMaterial(makeToonMaterial('Body', base));
    const mesh = workspace.addObject(makeMesh('Body', 100, [toon]));

    await prepareMaterialsForExport([mesh], 'obj', FORMAT_POLICIES.obj, context(workspace));

    const derived = mesh.materialSlots[0].material;
    const graph = derived?.graph;
    expect(graph).toBeTruthy();
    if (!graph) return;
    const output = findNodeByType(graph, NODE_TYPES.OUTPUT_MATERIAL);
    expect(output).toBeDefined();
    if (!output) return;
    const principled = sourceOf(graph, output, SOCKETS.SURFACE);
    expect(principled?.type).toBe(NODE_TYPES.BSDF_PRINCIPLED);
    if (!principled) return;
    const image = sourceOf(graph, principled, SOCKETS.BASE_COLOR);
    expect(isImageNode(image) && image.image).toBe(base);
    expect(sourceOf(graph, principled, SOCKETS.ALPHA)).toBe(image);
    expect(derived?.blendMode).toBe('HASHED');
    expect(resolveShaderTextures(derived ?? toon).baseColor).toBe(base);
    expect(base.colorSpace).toBe('sRGB');
  });

  it('never rewrites a standard material, however often it runs', async () => {
    const workspace = new Workspace();
    const skin = workspace.addMaterial(makeStandardMaterial('Skin', makeImage('skin_tex')));
    const graph = skin.graph;
    const mesh = workspace.addObject(makeMesh('Body', 100, [skin]));

    const ctx = context(workspace);
    const first = await prepareMaterialsForExport([mesh], 'glb', FORMAT_POLICIES.glb, ctx);
    const second = await prepareMaterialsForExport([mesh], 'glb', FORMAT_POLICIES.glb, ctx);

    expect(first.rewritten).toBe(0);
    expect(second.rewritten).toBe(0);
    expect(mesh.materialSlots[0].material).toBe(skin);
    expect(skin.graph).toBe(graph);
    expect(skin.useBackfaceCulling).toBe(false);
    expect(workspace.listMaterials()).toEqual([skin]);
  });

  it('keeps toon materials for formats that do not rewrite shaders', async () => {
    const workspace = new Workspace();
    const toon = workspace.addMaterial(makeToonMaterial('Body', makeImage('body_tex')));
    const mesh = workspace.addObject(makeMesh('Body', 100, [toon]));

    const result = await prepareMaterialsForExport([mesh], 'dae', FORMAT_POLICIES.dae, context(workspace));

    expect(result).toEqual({ processed: 1, rewritten: 0 });
    expect(mesh.materialSlots[0].material).toBe(toon);
  });

  it('does nothing for formats without preparation', async () => {
    const workspace = new Workspace();
    const skin = workspace.addMaterial(makeStandardMaterial('Skin'));
    skin.useBackfaceCulling = true;
    const mesh = workspace.addObject(makeMesh('Body', 100, [skin]));

    const result = await prepareMaterialsForExport([mesh], 'fbx', FORMAT_POLICIES.fbx, context(workspace));

    expect(result).toEqual({ processed: 0, rewritten: 0 });
    expect(skin.useBackfaceCulling).toBe(true);
  });

  it('marks normal maps as non-colour data', async () => {
    const workspace = new Workspace();
    const normal = makeImage('body_nrm');
    const toon = workspace.addMaterial(makeToonMaterial('Body', makeImage('body_tex'), normal));
    const mesh = workspace.addObject(makeMesh('Body', 100, [toon]));

    await prepareMaterialsForExport([mesh], 'glb', FORMAT_POLICIES.glb, context(workspace));

    expect(normal.colorSpace).toBe('Non-Color');
  });
});

describe('applyTransparencyPolicy', () => {
  it('clips materials whose names match and makes the rest opaque', () => {
    const policy = TransparencyPolicySchema.parse({ alphaThreshold: 0.3 });
    const face = makeStandardMaterial('Face_Skin');
    const body = makeStandardMaterial('Body');
    body.blendMode = 'BLEND';

    applyTransparencyPolicy(face, policy);
    applyTransparencyPolicy(body, policy);

    expect(face.blendMode).toBe('CLIP');
    expect(face.alphaThreshold).toBe(0.3);
    expect(body.blendMode).toBe('OPAQUE');
  });

  it('leaves blend modes untouched under "preserve"', () => {
    const hair = makeStandardMaterial('Hair');
    hair.blendMode = 'BLEND';
    applyTransparencyPolicy(hair, TransparencyPolicySchema.parse({ mode: 'preserve' }));
    expect(hair.blendMode).toBe('BLEND');
  });
});
