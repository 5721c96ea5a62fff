/**
 * Rig-Binding Strategy Engine
 *
 * Drives the auto-rig plugin through scale normalisation, marker estimation,
 * rig matching and skin binding. Each step must succeed before the next runs;
 * a step with several strategies moves on to the next strategy when one fails.
 */

import type { RigStep } from '../constants/rigging';
import { RIG_STEPS } from '../constants/rigging';
import { pickLargest } from '../core/scene-snapshot';
import type { ArmatureObject, MeshObject, SceneObject } from '../core/scene-types';
import type { Workspace } from '../core/workspace';
import type { HostCapabilities, InteractiveContext, RigOperator } from '../host/capabilities';
import { errorMessage } from '../errors';
import type { Logger } from '../utils/logger';
import {
  RIG_STEP_DEFINITIONS,
  type BindingRole,
  type BindingStrategy,
  type RigStepDefinition,
} from './binding-strategies';

export interface StepAttempt {
  step: RigStep;
  strategy: string;
  status: string;
}

export type RigBindingResult =
  | { success: true; rig: ArmatureObject; attempts: StepAttempt[] }
  | { success: false; failedStep: RigStep | null; reason: string; attempts: StepAttempt[] };

export interface RigBindingRequest {
  workspace: Workspace;
  host: HostCapabilities;
  context: InteractiveContext;
  armature: ArmatureObject;
  mesh: MeshObject;
  logger: Logger;
}

type Roles = Record<BindingRole, SceneObject>;

/**
 * Try `strategies` in order; the first one whose invocation finishes wins.
 * An operator that throws counts as a failed attempt.
 */
export async function runWithStrategies(
  operator: RigOperator,
  strategies: readonly BindingStrategy[],
  roles: Roles,
  workspace: Workspace,
  context: InteractiveContext,
  logger: Logger,
  attempts: StepAttempt[]
): Promise<BindingStrategy | undefined> {
  for (const strategy of strategies) {
    const selected = strategy.selected.map(role => roles[role]);
    const active = roles[strategy.active];
    workspace.setSelection(active, selected, strategy.mode);
    logger.info(
      `  Attempt: ${strategy.label} | active=${active.name} (${active.kind}) ` +
      `selected=[${selected.map(o => o.name).join(', ')}] mode=${strategy.mode}`
    );

    try {
      const status = await operator.invoke(workspace, context);
      attempts.push({ step: operator.step, strategy: strategy.label, status });
      logger.info(`  ${operator.step} result: ${status}`);
      if (status === 'finished') {
        return strategy;
      }
    } catch (error) {
      attempts.push({ step: operator.step, strategy: strategy.label, status: `error: ${errorMessage(error)}` });
      logger.error(`  ${operator.step} failed: ${errorMessage(error)}`);
    }
  }
  return undefined;
}

export class RigBindingEngine {
  constructor(private readonly steps: readonly RigStepDefinition[] = RIG_STEP_DEFINITIONS) {}

  async run(request: RigBindingRequest): Promise<RigBindingResult> {
    const { workspace, host, context, armature, mesh, logger } = request;
    const attempts: StepAttempt[] = [];

    const operators = new Map<RigStep, RigOperator>();
    const missing: RigStep[] = [];
    for (const step of RIG_STEPS) {
      const operator = host.probeRigOperator(step);
      if (operator) operators.set(step, operator);
      else missing.push(step);
    }
    if (missing.length > 0) {
      const reason = `Missing rig-binding operators: ${missing.join(', ')}`;
      logger.error(reason);
      return { success: false, failedStep: null, reason, attempts };
    }

    let rig: ArmatureObject = armature;

    for (const [index, definition] of this.steps.entries()) {
      const operator = operators.get(definition.step);
      if (!operator) {
        return { success: false, failedStep: definition.step, reason: `No operator for ${definition.step}`, attempts };
      }

      logger.info(`Rig binding step ${index + 1}/${this.steps.length}: ${definition.label}`);
      const before = new Set(workspace.listArmatures());
      const roles: Roles = { armature: definition.usesProducedRig ? rig : armature, mesh };

      const winner = await runWithStrategies(operator, definition.strategies, roles, workspace, context, logger, attempts);
      if (!winner) {
        const reason = `${definition.label} failed under every strategy`;
        logger.error(reason);
        return { success: false, failedStep: definition.step, reason, attempts };
      }

      if (definition.capturesRig) {
        const appeared = workspace.listArmatures().filter(a => !before.has(a));
        const produced = pickLargest(appeared, a => a.boneCount);
        if (produced) {
          rig = produced;
          logger.info(`  Produced rig: '${produced.name}' (${produced.boneCount} bones)`);
        } else {
          logger.info('  Using original armature as rig');
        }
      }
    }

    return { success: true, rig, attempts };
  }
}
