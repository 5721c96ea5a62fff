/**
 * Workspace
 *
 * The single editable scene shared by every component while one asset is
 * processed. Passed by reference; never global. `reset()` empties it between
 * assets and keeps going past any sub-step that fails.
 */

import type { Logger } from '../utils/logger';
import { isArmature, isMesh } from './scene-types';
import type {
  ArmatureObject,
  InteractionMode,
  Material,
  MeshObject,
  SceneImage,
  SceneObject,
} from './scene-types';

/**
 * Extra cleanup a host registers for its own per-scene state
 */
export type ResetHook = () => void | Promise<void>;

export interface ResetReport {
  completed: string[];
  failed: Array<{ step: string; error: string }>;
}

export class Workspace {
  private objects: SceneObject[] = [];
  private materials: Material[] = [];
  private images: SceneImage[] = [];
  private collections: string[] = [];
  private selection = new Set<SceneObject>();
  private active: SceneObject | null = null;
  private mode: InteractionMode = 'OBJECT';
  private readonly resetHooks = new Map<string, ResetHook>();

  // Objects

  addObject<T extends SceneObject>(obj: T): T {
    if (this.objects.some(existing => existing.name === obj.name)) {
      obj.name = this.uniqueName(obj.name, this.objects.map(o => o.name));
    }
    this.objects.push(obj);
    return obj;
  }

  listObjects(): SceneObject[] {
    return [...this.objects];
  }

  listArmatures(): ArmatureObject[] {
    return this.objects.filter(isArmature);
  }

  listMeshes(): MeshObject[] {
    return this.objects.filter(isMesh);
  }

  // Materials and images

  addMaterial(material: Material): Material {
    if (this.materials.some(existing => existing.name === material.name)) {
      material.name = this.uniqueName(material.name, this.materials.map(m => m.name));
    }
    this.materials.push(material);
    return material;
  }

  findMaterial(name: string): Material | undefined {
    return this.materials.find(m => m.name === name);
  }

  listMaterials(): Material[] {
    return [...this.materials];
  }

  addImage(image: SceneImage): SceneImage {
    this.images.push(image);
    return image;
  }

  listImages(): SceneImage[] {
    return [...this.images];
  }

  // Collections

  addCollection(name: string): void {
    if (!this.collections.includes(name)) this.collections.push(name);
  }

  listCollections(): string[] {
    return [...this.collections];
  }

  // Selection and mode

  /**
   * Deselect everything, select `selected`, make `active` active and switch mode
   */
  setSelection(active: SceneObject | null, selected: SceneObject[], mode: InteractionMode = 'OBJECT'): void {
    this.selection.clear();
    for (const obj of selected) {
      if (this.objects.includes(obj)) this.selection.add(obj);
    }
    if (active && this.objects.includes(active)) {
      this.active = active;
    }
    this.mode = mode;
  }

  getSelection(): SceneObject[] {
    return this.objects.filter(o => this.selection.has(o));
  }

  getActive(): SceneObject | null {
    return this.active;
  }

  getMode(): InteractionMode {
    return this.mode;
  }

  // Data-block lifetime

  /**
   * Remove materials and images nothing references any more.
   * Derived materials are referenced through slots like any other.
   */
  purgeOrphans(): number {
    const usedMaterials = new Set<Material>();
    for (const mesh of this.listMeshes()) {
      for (const slot of mesh.materialSlots) {
        if (slot.material) usedMaterials.add(slot.material);
      }
    }
    const usedImages = new Set<SceneImage>();
    for (const material of usedMaterials) {
      const graphs = material.graph ? [material.graph] : [];
      const seen = new Set<string>();
      while (graphs.length > 0) {
        const graph = graphs.pop();
        if (!graph || seen.has(graph.id)) continue;
        seen.add(graph.id);
        for (const node of graph.nodes) {
          if (node.type === 'TEX_IMAGE' && node.image) usedImages.add(node.image);
          if (node.type === 'GROUP' && node.subgraph) graphs.push(node.subgraph);
        }
      }
    }

    const before = this.materials.length + this.images.length;
    this.materials = this.materials.filter(m => usedMaterials.has(m));
    this.images = this.images.filter(i => usedImages.has(i));
    return before - (this.materials.length + this.images.length);
  }

  registerResetHook(name: string, hook: ResetHook): void {
    this.resetHooks.set(name, hook);
  }

  /**
   * Empty the scene. Each step is attempted even if an earlier one failed;
   * failures are logged as warnings and reported, never thrown.
   */
  async reset(logger?: Logger): Promise<ResetReport> {
    const report: ResetReport = { completed: [], failed: [] };
    const steps: Array<[string, () => void | Promise<void>]> = [
      ['object mode', () => { this.mode = 'OBJECT'; }],
      ['deselect', () => { this.selection.clear(); this.active = null; }],
      ['delete objects', () => { this.objects = []; }],
      ['unlink collections', () => { this.collections = []; }],
      // several passes, as purging one block can orphan another
      ['purge orphans', () => { for (let i = 0; i < 3; i++) this.purgeOrphans(); }],
      ...[...this.resetHooks.entries()].map(([name, hook]): [string, ResetHook] => [`host: ${name}`, hook]),
    ];

    logger?.info('Cleaning scene');
    for (const [step, run] of steps) {
      try {
        await run();
        report.completed.push(step);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        report.failed.push({ step, error: message });
        logger?.warn(`Scene reset step '${step}' failed: ${message}`);
      }
    }
    logger?.info('Scene cleaned');
    return report;
  }

  /**
   * `name.001`, `name.002`, ...
   */
  private uniqueName(name: string, taken: string[]): string {
    for (let i = 1; ; i++) {
      const candidate = `${name}.${String(i).padStart(3, '0')}`;
      if (!taken.includes(candidate)) return candidate;
    }
  }
}
