/**
 * Host capability interface
 *
 * Everything the pipeline needs from the application that owns the scene.
 * Capabilities are probed: a probe returning `undefined` means the host (or
 * one of its addons) does not offer it, which drives a fallback branch rather
 * than an error.
 */

import type { ExportFormat } from '../constants/export';
import type { RigStep } from '../constants/rigging';
import type { ArmatureObject, MeshObject, SceneImage } from '../core/scene-types';
import type { Workspace } from '../core/workspace';

/**
 * Outcome of a host operator invocation
 */
export type OperatorStatus = 'finished' | 'cancelled' | 'failed';

/**
 * Handle on an interactive viewing context; operators that need a viewport
 * run inside it
 */
export interface InteractiveContext {
  readonly description: string;
}

export interface HostInfo {
  name: string;
  version: [number, number, number];
  /** True when running without any UI */
  background: boolean;
}

export interface AssetImporter {
  readonly addon: string;
  importAsset(filePath: string, workspace: Workspace): Promise<OperatorStatus>;
}

/**
 * One auto-rig plugin operator. Acts on the workspace's current selection,
 * active object and mode; may add armatures to the workspace.
 */
export interface RigOperator {
  readonly step: RigStep;
  invoke(workspace: Workspace, context: InteractiveContext): Promise<OperatorStatus>;
}

export interface RigPluginInfo {
  name: string;
  /** Oldest host version the plugin declares support for */
  minHostVersion: [number, number, number] | null;
}

export interface FbxExportOptions {
  format: 'fbx';
  addLeafBones: boolean;
  bakeAnimation: boolean;
  deformBonesOnly: boolean;
  applyUnitScale: boolean;
  embedTextures: boolean;
  axisForward: '-Z';
  axisUp: 'Y';
}

export interface GlbExportOptions {
  format: 'glb';
  applyModifiers: boolean;
  exportTangents: boolean;
  exportSkins: boolean;
  exportMorphs: boolean;
  exportAnimations: boolean;
  keepOriginalImages: boolean;
}

export interface DaeExportOptions {
  format: 'dae';
  applyModifiers: boolean;
  includeArmatures: boolean;
  includeChildren: boolean;
  deformBonesOnly: boolean;
}

export interface ObjExportOptions {
  format: 'obj';
  applyModifiers: boolean;
  exportMaterials: boolean;
  exportUv: boolean;
  exportNormals: boolean;
  copyTextures: boolean;
  forwardAxis: '-Z';
  upAxis: 'Y';
}

export type ExportOptions = FbxExportOptions | GlbExportOptions | DaeExportOptions | ObjExportOptions;

export interface ExportRequest {
  filePath: string;
  workspace: Workspace;
  armature: ArmatureObject;
  meshes: MeshObject[];
  options: ExportOptions;
  context: InteractiveContext | undefined;
}

export interface FormatExporter {
  readonly format: ExportFormat;
  exportScene(request: ExportRequest): Promise<OperatorStatus>;
}

/**
 * Serialises an image into a file
 */
export interface ImageWriter {
  writeImage(image: SceneImage, destination: string): Promise<void>;
}

export interface HostCapabilities {
  describe(): HostInfo;

  probeImporter(): AssetImporter | undefined;

  probeRigPlugin(): RigPluginInfo | undefined;

  probeRigOperator(step: RigStep): RigOperator | undefined;

  probeExporter(format: ExportFormat): FormatExporter | undefined;

  acquireInteractiveContext(): InteractiveContext | undefined;

  createImageWriter(): ImageWriter;

  /** Bake object transforms into data */
  applyTransforms?(obj: ArmatureObject | MeshObject, workspace: Workspace): Promise<void>;

  /** Make mesh normals point outward */
  recalculateNormals?(mesh: MeshObject, workspace: Workspace): Promise<void>;

  /** Embed every image's data into the scene */
  packImages?(workspace: Workspace): Promise<void>;

  /** Host-side bulk conversion of toon materials, run before the pipeline's own */
  convertSpecialShaders?(workspace: Workspace): Promise<OperatorStatus>;
}
