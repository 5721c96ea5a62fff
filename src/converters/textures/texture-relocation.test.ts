import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Workspace } from '../../core/workspace';
import { FileImageWriter } from '../../host/image-writer';
import { makeImage, makeTempDir, PNG_BYTES, silentLogger } from '../../__tests__/fixtures';
import { parseTextureDirective } from './mtl-directive';
import { memoryImageFileName, relocateMtlTextures } from './texture-relocation';
import { resolveTextureSource } from './texture-source-resolver';

describe('relocateMtlTextures', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('copies disk textures, writes memory textures and rewrites every directive', async () => {
    await fs.promises.mkdir(path.join(dir, 'src'));
    await fs.promises.writeFile(path.join(dir, 'src', 'albedo.png'), PNG_BYTES);
    const mtlPath = path.join(dir, 'hero.mtl');
    await fs.promises.writeFile(mtlPath, [
      'newmtl Body',
      'map_Kd src/albedo.png',
      'map_Bump -bm 0.5 body normal',
      'map_d missing.png',
      '',
    ].join('\n'));

    const workspace = new Workspace();
    workspace.addImage(makeImage('body normal'));
    workspace.addImage(makeImage('extra'));

    const result = await relocateMtlTextures({
      mtlPath,
      destinationDir: dir,
      workspace,
      imageWriter: new FileImageWriter(),
      logger: silentLogger(),
    });

    expect(result).toEqual({ copied: 2, missing: ['missing.png'], flushed: ['extra.png'] });
    expect(await fs.promises.readFile(mtlPath, 'utf-8')).toBe([
      'newmtl Body',
      'map_Kd albedo.png',
      'map_Bump -bm 0.5 body_normal.png',
      'map_d missing.png',
      '',
    ].join('\n'));
    expect(fs.existsSync(path.join(dir, 'albedo.png'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'body_normal.png'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'extra.png'))).toBe(true);
  });

  it('gives textures with the same base name distinct destinations', async () => {
    for (const sub of ['a', 'b']) {
      await fs.promises.mkdir(path.join(dir, sub));
      await fs.promises.writeFile(path.join(dir, sub, 'skin.png'), PNG_BYTES);
    }
    const mtlPath = path.join(dir, 'hero.mtl');
    await fs.promises.writeFile(mtlPath, 'map_Kd a/skin.png\nmap_Ks b/skin.png');

    const result = await relocateMtlTextures({
      mtlPath,
      destinationDir: dir,
      workspace: new Workspace(),
      imageWriter: new FileImageWriter(),
      logger: silentLogger(),
    });

    expect(result.copied).toBe(2);
    expect(await fs.promises.readFile(mtlPath, 'utf-8')).toBe('map_Kd skin.png\nmap_Ks skin__1.png');
  });

  it('never overwrites a texture already in the folder that the MTL still uses', async () => {
    await fs.promises.mkdir(path.join(dir, 'a'));
    await fs.promises.writeFile(path.join(dir, 'a', 'skin.png'), 'AAAA');
    await fs.promises.writeFile(path.join(dir, 'skin.png'), 'BBBB');
    const mtlPath = path.join(dir, 'hero.mtl');
    await fs.promises.writeFile(mtlPath, 'map_Kd a/skin.png\nmap_Ks skin.png');

    const result = await relocateMtlTextures({
      mtlPath,
      destinationDir: dir,
      workspace: new Workspace(),
      imageWriter: new FileImageWriter(),
      logger: silentLogger(),
    });

    expect(result).toEqual({ copied: 1, missing: [], flushed: [] });
    expect(await fs.promises.readFile(mtlPath, 'utf-8')).toBe('map_Kd skin__1.png\nmap_Ks skin.png');
    expect(await fs.promises.readFile(path.join(dir, 'skin__1.png'), 'utf-8')).toBe('AAAA');
    expect(await fs.promises.readFile(path.join(dir, 'skin.png'), 'utf-8')).toBe('BBBB');
  });

  it('keeps every rewritten directive pointing at the bytes it named before', async () => {
    const sources: Record<string, string> = { 'a/skin.png': 'AAAA', 'skin.png': 'BBBB', 'b/skin.png': 'CCCC' };
    for (const [relative, bytes] of Object.entries(sources)) {
      await fs.promises.mkdir(path.dirname(path.join(dir, relative)), { recursive: true });
      await fs.promises.writeFile(path.join(dir, relative), bytes);
    }
    const workspace = new Workspace();
    workspace.addImage(makeImage('face', { data: new TextEncoder().encode('DDDD'), mimeType: 'image/png' }));
    const mtlPath = path.join(dir, 'hero.mtl');
    await fs.promises.writeFile(mtlPath, [
      'newmtl Body',
      'map_Kd a/skin.png',
      'map_Ks skin.png',
      'map_Bump -bm 0.5 b/skin.png',
      'map_d a/skin.png',
      'map_Ka face',
    ].join('\n'));

    const result = await relocateMtlTextures({
      mtlPath,
      destinationDir: dir,
      workspace,
      imageWriter: new FileImageWriter(),
      logger: silentLogger(),
    });

    expect(result).toEqual({ copied: 3, missing: [], flushed: [] });
    const lines = (await fs.promises.readFile(mtlPath, 'utf-8')).split('\n');
    expect(lines).toEqual([
      'newmtl Body',
      'map_Kd skin__1.png',
      'map_Ks skin.png',
      'map_Bump -bm 0.5 skin__2.png',
      'map_d skin__1.png',
      'map_Ka face.png',
    ]);

    const contents: Record<string, string> = {};
    for (const line of lines) {
      const directive = parseTextureDirective(line);
      if (directive) {
        contents[directive.directive] = await fs.promises.readFile(path.join(dir, directive.path), 'utf-8');
      }
    }
    expect(contents).toEqual({ map_Kd: 'AAAA', map_Ks: 'BBBB', map_Bump: 'CCCC', map_d: 'AAAA', map_Ka: 'DDDD' });
  });

  it('leaves a missing file alone', async () => {
    const result = await relocateMtlTextures({
      mtlPath: path.join(dir, 'absent.mtl'),
      destinationDir: dir,
      workspace: new Workspace(),
      imageWriter: new FileImageWriter(),
      logger: silentLogger(),
    });
    expect(result).toEqual({ copied: 0, missing: [], flushed: [] });
  });
});

describe('resolveTextureSource', () => {
  it('falls through from a missing absolute path to an in-memory image of the same name', () => {
    const image = makeImage('skin.png');
    const source = resolveTextureSource('/nowhere/at/all/skin.png', '/tmp', [image]);
    expect(source).toEqual({ kind: 'memory', image });
  });

  it('reports unresolvable references as missing', () => {
    expect(resolveTextureSource('ghost.png', '/nowhere', [])).toEqual({ kind: 'missing', reference: 'ghost.png' });
  });
});

describe('memoryImageFileName', () => {
  it('takes the extension from the MIME type, then from the bytes', () => {
    expect(memoryImageFileName(makeImage('face', { mimeType: 'image/jpeg' }))).toBe('face.jpg');
    expect(memoryImageFileName(makeImage('face', { mimeType: null, data: new Uint8Array([0x42, 0x4d, 0]) }))).toBe('face.bmp');
  });
});
