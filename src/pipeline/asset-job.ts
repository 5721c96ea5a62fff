/**
 * Asset Job
 *
 * One source file moving through the pipeline. Only the state machine
 * changes it; the batch runner relocates the source once it is terminal.
 */

import * as path from 'path';
import type { Logger } from '../utils/logger';
import { sanitizeAssetName } from '../utils/name-utils';

export enum PipelineState {
  Queued = 'Queued',
  Importing = 'Importing',
  Scaffolded = 'Scaffolded',
  RigBindingAttempted = 'RigBindingAttempted',
  Exported = 'Exported',
  RiggedExport = 'RiggedExport',
  FallbackExport = 'FallbackExport',
  Failed = 'Failed',
}

export enum AssetOutcome {
  RiggedExport = 'RiggedExport',
  FallbackExport = 'FallbackExport',
  Failed = 'Failed',
}

export type AssetResult =
  | { outcome: AssetOutcome.RiggedExport | AssetOutcome.FallbackExport }
  | { outcome: AssetOutcome.Failed; reason: string };

export class AssetJob {
  readonly sourcePath: string;
  readonly fileName: string;
  /** Canonical name used for every output path */
  readonly name: string;
  private currentState: PipelineState = PipelineState.Queued;
  private finalResult: AssetResult | undefined;

  constructor(sourcePath: string) {
    this.sourcePath = sourcePath;
    this.fileName = path.basename(sourcePath);
    this.name = sanitizeAssetName(sourcePath);
  }

  get state(): PipelineState {
    return this.currentState;
  }

  get result(): AssetResult | undefined {
    return this.finalResult;
  }

  get isTerminal(): boolean {
    return this.finalResult !== undefined;
  }

  get failureReason(): string | undefined {
    return this.finalResult?.outcome === AssetOutcome.Failed ? this.finalResult.reason : undefined;
  }

  advance(to: PipelineState, logger: Logger): void {
    if (this.isTerminal) {
      throw new Error(`Job ${this.name} already finished as ${this.currentState}`);
    }
    logger.logTransition(this.name, this.currentState, to, { asset: this.name });
    this.currentState = to;
  }

  succeed(outcome: AssetOutcome.RiggedExport | AssetOutcome.FallbackExport, logger: Logger): void {
    this.advance(outcome === AssetOutcome.RiggedExport ? PipelineState.RiggedExport : PipelineState.FallbackExport, logger);
    this.finalResult = { outcome };
  }

  fail(reason: string, logger: Logger): void {
    if (this.isTerminal) return;
    this.advance(PipelineState.Failed, logger);
    this.finalResult = { outcome: AssetOutcome.Failed, reason };
    logger.error(`${this.name} failed: ${reason}`, { asset: this.name });
  }
}
