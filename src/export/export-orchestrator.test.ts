import * as fs from 'fs';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import type { ExportFormat } from '../constants/export';
import { Workspace } from '../core/workspace';
import {
  FakeHost,
  makeArmature,
  makeImage,
  makeMesh,
  makeStandardMaterial,
  makeTempDir,
  silentLogger,
  writeFileExport,
  type ExportBehaviour,
  type FakeHostOptions,
} from '../__tests__/fixtures';
import { ExportOrchestrator, formatOutputDir } from './export-orchestrator';

/**
 * Writes the OBJ plus an MTL naming the in-memory `body.png`
 */
const objWithMtl: ExportBehaviour = async request => {
  await fs.promises.writeFile(request.filePath, 'o Body\n');
  const mtlPath = request.filePath.replace(/\.obj$/, '.mtl');
  await fs.promises.writeFile(mtlPath, 'newmtl Body\nmap_Kd body.png\nmap_d hair.png\n');
  return 'finished';
};

async function setup(formats: ExportFormat[], primaryFormat: ExportFormat, exporters: FakeHostOptions['exporters']) {
  const outputDir = await makeTempDir();
  const workspace = new Workspace();
  const image = workspace.addImage(makeImage('body.png'));
  const armature = workspace.addObject(makeArmature('Armature', 30));
  const mesh = workspace.addObject(makeMesh('Body', 100, [makeStandardMaterial('Body', image)]));
  const host = new FakeHost({ exporters });
  const orchestrator = new ExportOrchestrator({
    workspace,
    host,
    logger: silentLogger(),
    outputDir,
    formats,
    primaryFormat,
    shaderMarkers: ['mtoon'],
    transparency: { mode: 'preserve', clipPatterns: [], alphaThreshold: 0.5 },
  });
  return { outputDir, workspace, armature, mesh, host, orchestrator };
}

describe('formatOutputDir', () => {
  it('nests the asset under its format', () => {
    expect(formatOutputDir('/out', 'glb', 'Avatar')).toBe(path.join('/out', 'glb', 'Avatar'));
  });
});

describe('ExportOrchestrator', () => {
  it('keeps exporting after a format fails and reports every result', async () => {
    const { outputDir, armature, mesh, host, orchestrator } = await setup(['glb', 'obj', 'fbx'], 'fbx', {
      glb: writeFileExport,
      obj: objWithMtl,
    });

    const run = await orchestrator.exportAll(armature, [mesh], 'Avatar');

    const objDir = path.join(outputDir, 'obj', 'Avatar');
    expect(run.results).toEqual([
      { format: 'glb', success: true, detail: path.join(outputDir, 'glb', 'Avatar', 'Avatar.glb') },
      { format: 'obj', success: true, detail: path.join(objDir, 'Avatar.obj') },
      { format: 'fbx', success: false, detail: 'FBX exporter not available' },
    ]);
    expect(run.primarySuccess).toBe(false);
    expect(host.exportCalls.map(call => call.options.format)).toEqual(['glb', 'obj']);

    expect(fs.existsSync(path.join(objDir, 'body.png'))).toBe(true);
    const mtl = await fs.promises.readFile(path.join(objDir, 'Avatar.mtl'), 'utf-8');
    expect(mtl).toBe('newmtl Body\nmap_Kd body.png\nmap_d hair.png\n');

    expect(run.reportPath).toBe(path.join(outputDir, 'Avatar_export_report.txt'));
    const report = (await fs.promises.readFile(path.join(outputDir, 'Avatar_export_report.txt'), 'utf-8')).split('\n');
    expect(report).toContain('  FBX: FAILED -> FBX exporter not available');
    expect(report).toContain('OBJ texture files:');
    expect(report[report.indexOf('OBJ texture files:') + 1]).toBe('  body.png');
    expect(report[report.length - 1]).toBe('  OBJ missing texture: hair.png');
  });

  it('selects the armature and meshes before each export', async () => {
    const { armature, mesh, host, orchestrator, workspace } = await setup(['glb'], 'glb', { glb: writeFileExport });

    const run = await orchestrator.exportAll(armature, [mesh], 'Avatar');

    expect(run.primarySuccess).toBe(true);
    expect(workspace.getActive()).toBe(armature);
    expect(workspace.getSelection()).toEqual([armature, mesh]);
    expect(host.exportCalls[0].armature).toBe(armature);
  });

  it('treats a non-finished status as a failure', async () => {
    const { armature, mesh, orchestrator } = await setup(['glb'], 'glb', { glb: async () => 'cancelled' });

    const run = await orchestrator.exportAll(armature, [mesh], 'Avatar');

    expect(run.results).toEqual([{ format: 'glb', success: false, detail: 'operator returned cancelled' }]);
    expect(run.primarySuccess).toBe(false);
  });

  it('treats an empty output file as a failure', async () => {
    const { outputDir, armature, mesh, orchestrator } = await setup(['glb'], 'glb', {
      glb: async request => {
        await fs.promises.writeFile(request.filePath, '');
        return 'finished';
      },
    });

    const run = await orchestrator.exportAll(armature, [mesh], 'Avatar');

    expect(run.results[0]).toEqual({
      format: 'glb',
      success: false,
      detail: path.join(outputDir, 'glb', 'Avatar', 'Avatar.glb'),
    });
  });

  it('fails only the format whose folder cannot be created', async () => {
    const { outputDir, armature, mesh, host, orchestrator } = await setup(['fbx', 'glb', 'dae', 'obj'], 'glb', {
      fbx: writeFileExport,
      glb: writeFileExport,
      dae: writeFileExport,
      obj: writeFileExport,
    });
    await fs.promises.writeFile(path.join(outputDir, 'dae'), 'not a folder');

    const run = await orchestrator.exportAll(armature, [mesh], 'Avatar');

    expect(run.results.map(r => [r.format, r.success])).toEqual([
      ['fbx', true],
      ['glb', true],
      ['dae', false],
      ['obj', true],
    ]);
    expect(run.results[2].detail).toMatch(/^ENOTDIR/);
    expect(run.primarySuccess).toBe(true);
    expect(host.exportCalls.map(call => call.options.format)).toEqual(['fbx', 'glb', 'obj']);
    expect(run.reportPath).toBe(path.join(outputDir, 'Avatar_export_report.txt'));
  });
});
