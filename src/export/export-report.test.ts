import * as fs from 'fs';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { makeTempDir, silentLogger } from '../__tests__/fixtures';
import { formatExportReport, reportPathFor, writeExportReport, type ExportReport } from './export-report';

function sampleReport(overrides: Partial<ExportReport> = {}): ExportReport {
  return {
    assetName: 'Avatar',
    generatedAt: new Date(2025, 0, 2, 3, 4, 5),
    directories: [
      { format: 'glb', dir: '/out/glb/Avatar' },
      { format: 'obj', dir: '/out/obj/Avatar' },
    ],
    results: [
      { format: 'glb', success: true, detail: '/out/glb/Avatar/Avatar.glb' },
      { format: 'obj', success: false, detail: 'operator returned cancelled' },
    ],
    objTextures: ['body.png'],
    daeTextures: [],
    warnings: [],
    ...overrides,
  };
}

describe('formatExportReport', () => {
  it('lists directories, results and texture files', () => {
    expect(formatExportReport(sampleReport()).split('\n')).toEqual([
      'Export report: Avatar',
      'Generated: 2025-01-02 03:04:05',
      '',
      'Directories used:',
      '  GLB: /out/glb/Avatar',
      '  OBJ: /out/obj/Avatar',
      '',
      '  GLB: SUCCESS -> /out/glb/Avatar/Avatar.glb',
      '  OBJ: FAILED -> operator returned cancelled',
      '',
      'OBJ texture files:',
      '  body.png',
      '',
      'DAE texture files:',
      '  (none)',
    ]);
  });

  it('appends warnings when there are any', () => {
    const text = formatExportReport(sampleReport({ warnings: ['OBJ missing texture: hair.png'] }));
    expect(text.endsWith('\n\nWarnings:\n  OBJ missing texture: hair.png')).toBe(true);
  });
});

describe('writeExportReport', () => {
  it('writes the report next to the format folders', async () => {
    const dir = await makeTempDir();
    const written = await writeExportReport(sampleReport(), dir, silentLogger());

    expect(written).toBe(path.join(dir, 'Avatar_export_report.txt'));
    expect(written).toBe(reportPathFor(dir, 'Avatar'));
    const content = await fs.promises.readFile(path.join(dir, 'Avatar_export_report.txt'), 'utf-8');
    expect(content.split('\n')[0]).toBe('Export report: Avatar');
  });

  it('returns undefined when the folder cannot be written', async () => {
    const dir = await makeTempDir();
    const missing = path.join(dir, 'does-not-exist');
    expect(await writeExportReport(sampleReport(), missing, silentLogger())).toBeUndefined();
  });
});
