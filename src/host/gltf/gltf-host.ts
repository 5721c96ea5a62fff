/**
 * glTF Host
 *
 * Host capabilities backed by gltf-transform. Reads `.vrm` / `.glb` files and
 * writes GLB and OBJ. It has no FBX or DAE writer, no auto-rig plugin and no
 * interactive context, so those probes come back empty and the pipeline
 * takes its conversion-only path.
 */

import * as fs from 'fs';
import * as path from 'path';
import { NodeIO, VERSION } from '@gltf-transform/core';
import { ALL_EXTENSIONS } from '@gltf-transform/extensions';
import type { ExportFormat } from '../../constants/export';
import { GLTF_HOST_NAME, IMPORTER_ADDON } from '../../constants/gltf';
import type { Workspace } from '../../core/workspace';
import { errorMessage, PipelineErrorFactory } from '../../errors';
import { isFile } from '../../utils/file-utils';
import type { Logger } from '../../utils/logger';
import type {
  AssetImporter,
  FormatExporter,
  HostCapabilities,
  HostInfo,
  ImageWriter,
  InteractiveContext,
  OperatorStatus,
  RigOperator,
  RigPluginInfo,
} from '../capabilities';
import { FileImageWriter } from '../image-writer';
import { GlbExporter } from './glb-exporter';
import { readDocumentIntoWorkspace, type GltfSceneBinding } from './gltf-scene-reader';
import { ObjExporter } from './obj-exporter';
import { findToonMaterialIndices } from './vrm-material-flags';

/**
 * `v4.1.2` or `4.1.2` to `[4, 1, 2]`
 */
export function parseVersion(version: string): [number, number, number] {
  const [major = 0, minor = 0, patch = 0] = version.trim().replace(/^v/i, '').split('.').map(part => parseInt(part, 10) || 0);
  return [major, minor, patch];
}

export class GltfHost implements HostCapabilities {
  private readonly io: NodeIO;
  private readonly exporters: Map<ExportFormat, FormatExporter>;
  private binding: GltfSceneBinding | undefined;

  constructor(private readonly logger: Logger) {
    this.io = new NodeIO().registerExtensions(ALL_EXTENSIONS);
    const getBinding = (): GltfSceneBinding | undefined => this.binding;
    this.exporters = new Map<ExportFormat, FormatExporter>([
      ['glb', new GlbExporter(this.io, getBinding)],
      ['obj', new ObjExporter(getBinding)],
    ]);
  }

  describe(): HostInfo {
    return { name: GLTF_HOST_NAME, version: parseVersion(VERSION), background: true };
  }

  probeImporter(): AssetImporter {
    return {
      addon: IMPORTER_ADDON,
      importAsset: (filePath, workspace) => this.importAsset(filePath, workspace),
    };
  }

  probeRigPlugin(): RigPluginInfo | undefined {
    return undefined;
  }

  probeRigOperator(): RigOperator | undefined {
    return undefined;
  }

  probeExporter(format: ExportFormat): FormatExporter | undefined {
    return this.exporters.get(format);
  }

  acquireInteractiveContext(): InteractiveContext | undefined {
    return undefined;
  }

  createImageWriter(): ImageWriter {
    return new FileImageWriter();
  }

  /**
   * Load file-backed images into memory so the GLB carries them
   */
  async packImages(workspace: Workspace): Promise<void> {
    for (const image of workspace.listImages()) {
      if (image.data || !image.filepath || !isFile(image.filepath)) continue;
      image.data = await fs.promises.readFile(image.filepath);
    }
  }

  private async importAsset(filePath: string, workspace: Workspace): Promise<OperatorStatus> {
    let bytes: Uint8Array;
    try {
      bytes = await fs.promises.readFile(filePath);
    } catch (error) {
      throw PipelineErrorFactory.importError(`Could not read ${filePath}: ${errorMessage(error)}`, filePath);
    }

    try {
      const jsonDocument = await this.io.binaryToJSON(bytes);
      const toonMaterials = findToonMaterialIndices(jsonDocument.json);
      const document = await this.io.readJSON(jsonDocument);
      this.binding = readDocumentIntoWorkspace(document, toonMaterials, workspace);
      workspace.registerResetHook('gltf document', () => {
        this.binding = undefined;
      });
      this.logger.info(
        `Imported ${path.basename(filePath)}: ${workspace.listArmatures().length} armature(s), ` +
        `${workspace.listMeshes().length} mesh(es), ${toonMaterials.size} toon material(s)`
      );
      return 'finished';
    } catch (error) {
      throw PipelineErrorFactory.importError(
        `Could not parse ${path.basename(filePath)}: ${errorMessage(error)}`,
        filePath
      );
    }
  }
}
