/**
 * Rig-binding strategies
 *
 * Selection/mode setups tried in order when a plugin operator refuses the
 * current context. Definitions are data; the engine's driver stays the same
 * when one is added.
 */

import type { RigStep } from '../constants/rigging';
import type { InteractionMode } from '../core/scene-types';

export type BindingRole = 'armature' | 'mesh';

export interface BindingStrategy {
  readonly label: string;
  readonly selected: readonly BindingRole[];
  readonly active: BindingRole;
  readonly mode: InteractionMode;
}

export const FULL_STRATEGIES: readonly BindingStrategy[] = Object.freeze([
  { label: 'armature active, [armature]', selected: ['armature'], active: 'armature', mode: 'OBJECT' },
  { label: 'armature active, [armature, mesh]', selected: ['armature', 'mesh'], active: 'armature', mode: 'OBJECT' },
  { label: 'mesh active, [mesh, armature]', selected: ['mesh', 'armature'], active: 'mesh', mode: 'OBJECT' },
  { label: 'armature active, [armature], POSE', selected: ['armature'], active: 'armature', mode: 'POSE' },
] as const);

export const CANONICAL_STRATEGIES: readonly BindingStrategy[] = Object.freeze([FULL_STRATEGIES[0]]);

export interface RigStepDefinition {
  readonly step: RigStep;
  readonly label: string;
  readonly strategies: readonly BindingStrategy[];
  /** Diff armatures around this step to find the rig it produced */
  readonly capturesRig: boolean;
  /** Run against the produced rig instead of the original skeleton */
  readonly usesProducedRig: boolean;
}

export const RIG_STEP_DEFINITIONS: readonly RigStepDefinition[] = Object.freeze([
  { step: 'scaleNormalization', label: 'auto scale', strategies: FULL_STRATEGIES, capturesRig: false, usesProducedRig: false },
  { step: 'markerEstimation', label: 'guess markers', strategies: CANONICAL_STRATEGIES, capturesRig: false, usesProducedRig: false },
  { step: 'rigMatching', label: 'match to rig', strategies: CANONICAL_STRATEGIES, capturesRig: true, usesProducedRig: false },
  { step: 'skinBinding', label: 'bind to rig', strategies: FULL_STRATEGIES, capturesRig: false, usesProducedRig: true },
]);
