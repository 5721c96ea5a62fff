/**
 * Shared in-process fakes for the test suites
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { ExportFormat } from '../constants/export';
import type { RigStep } from '../constants/rigging';
import { NODE_TYPES, SOCKETS } from '../constants/shader';
import { createMaterial, ShaderGraphBuilder } from '../core/shader-graph';
import type { ArmatureObject, Material, MeshObject, SceneImage } from '../core/scene-types';
import type { Workspace } from '../core/workspace';
import { FileImageWriter } from '../host/image-writer';
import type {
  AssetImporter,
  ExportRequest,
  FormatExporter,
  HostCapabilities,
  HostInfo,
  ImageWriter,
  InteractiveContext,
  OperatorStatus,
  RigOperator,
  RigPluginInfo,
} from '../host/capabilities';
import { LoggerFactory, type Logger } from '../utils/logger';

export const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0, 0, 0]);

export function silentLogger(): Logger {
  return LoggerFactory.silent();
}

export async function makeTempDir(prefix = 'avatar-test-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function makeImage(name: string, overrides: Partial<SceneImage> = {}): SceneImage {
  return {
    name,
    filepath: null,
    data: PNG_BYTES,
    mimeType: 'image/png',
    colorSpace: 'sRGB',
    alphaMode: 'STRAIGHT',
    ...overrides,
  };
}

export function makeArmature(name: string, boneCount: number): ArmatureObject {
  return { kind: 'armature', name, boneCount };
}

export function makeMesh(name: string, vertexCount: number, materials: Array<Material | null> = []): MeshObject {
  return { kind: 'mesh', name, vertexCount, materialSlots: materials.map(material => ({ material })) };
}

/**
 * Output <- principled, base image -> Base Color
 */
export function makeStandardMaterial(name: string, base: SceneImage | null = null): Material {
  const builder = new ShaderGraphBuilder(`${name}_tree`);
  const output = builder.addNode(NODE_TYPES.OUTPUT_MATERIAL);
  const principled = builder.addNode(NODE_TYPES.BSDF_PRINCIPLED);
  builder.link(principled, SOCKETS.BSDF, output, SOCKETS.SURFACE);
  if (base) {
    const image = builder.addImageNode(base);
    builder.link(image, SOCKETS.COLOR, principled, SOCKETS.BASE_COLOR);
  }
  return createMaterial(name, builder.build());
}

/**
 * Output <- toon group; the group exposes `Lit Color` and `Normal`
 */
export function makeToonMaterial(name: string, base: SceneImage | null, normal: SceneImage | null = null): Material {
  const inner = new ShaderGraphBuilder('MToon_1.0');
  const groupOutput = inner.addNode(NODE_TYPES.GROUP_OUTPUT, 'Group Output', { inputs: [SOCKETS.LIT_COLOR, SOCKETS.NORMAL] });
  if (base) {
    const lit = inner.addImageNode(base, 'Lit');
    inner.link(lit, SOCKETS.COLOR, groupOutput, SOCKETS.LIT_COLOR);
  }
  if (normal) {
    const normalImage = inner.addImageNode(normal, 'Normal');
    inner.link(normalImage, SOCKETS.COLOR, groupOutput, SOCKETS.NORMAL);
  }

  const outer = new ShaderGraphBuilder(`${name}_tree`);
  const output = outer.addNode(NODE_TYPES.OUTPUT_MATERIAL);
  const group = outer.addGroupNode(inner.build(), 'Toon Group');
  outer.link(group, SOCKETS.BSDF, output, SOCKETS.SURFACE);
  return createMaterial(name, outer.build());
}

export type ImportBehaviour = (filePath: string, workspace: Workspace) => Promise<OperatorStatus>;
export type RigBehaviour = (workspace: Workspace, context: InteractiveContext) => Promise<OperatorStatus>;
export type ExportBehaviour = (request: ExportRequest) => Promise<OperatorStatus>;

/**
 * Exporter that writes a small file and reports success
 */
export const writeFileExport: ExportBehaviour = async request => {
  await fs.promises.writeFile(request.filePath, `${request.options.format} ${request.armature.name}`);
  return 'finished';
};

/**
 * Importer that adds the given objects
 */
export function importObjects(build: () => Array<ArmatureObject | MeshObject>): ImportBehaviour {
  return async (_filePath, workspace) => {
    for (const obj of build()) {
      workspace.addObject(obj);
    }
    return 'finished';
  };
}

export interface FakeHostOptions {
  importer?: ImportBehaviour;
  rigOperators?: Partial<Record<RigStep, RigBehaviour>>;
  exporters?: Partial<Record<ExportFormat, ExportBehaviour>>;
  context?: InteractiveContext;
  plugin?: RigPluginInfo;
  info?: Partial<HostInfo>;
}

export class FakeHost implements HostCapabilities {
  readonly exportCalls: ExportRequest[] = [];
  readonly rigCalls: Array<{ step: RigStep; mode: string; active: string | undefined; selected: string[] }> = [];

  constructor(private readonly options: FakeHostOptions = {}) {}

  describe(): HostInfo {
    return { name: 'fake host', version: [4, 2, 0], background: false, ...this.options.info };
  }

  probeImporter(): AssetImporter | undefined {
    const importer = this.options.importer;
    return importer ? { addon: 'fake-importer', importAsset: importer } : undefined;
  }

  probeRigPlugin(): RigPluginInfo | undefined {
    return this.options.plugin;
  }

  probeRigOperator(step: RigStep): RigOperator | undefined {
    const behaviour = this.options.rigOperators?.[step];
    if (!behaviour) return undefined;
    return {
      step,
      invoke: async (workspace, context) => {
        this.rigCalls.push({
          step,
          mode: workspace.getMode(),
          active: workspace.getActive()?.name,
          selected: workspace.getSelection().map(o => o.name),
        });
        return behaviour(workspace, context);
      },
    };
  }

  probeExporter(format: ExportFormat): FormatExporter | undefined {
    const behaviour = this.options.exporters?.[format];
    if (!behaviour) return undefined;
    return {
      format,
      exportScene: async request => {
        this.exportCalls.push(request);
        return behaviour(request);
      },
    };
  }

  acquireInteractiveContext(): InteractiveContext | undefined {
    return this.options.context;
  }

  createImageWriter(): ImageWriter {
    return new FileImageWriter();
  }
}
