import {
  type ChainPosition,
  type ChainRun,
  type GateResult,
  type GateSummary,
  type StageOutput,
  CHAIN_DONE,
  ChainRunState,
  ChainStageId,
} from '../types';
import { getNextStage, getStageConfig, stageIndex } from './stages';
import { RunStateError, StageOrderViolation } from '../utils/errors';
import { validateStageInputs } from '../utils/validators';
import { stageLog } from '../utils/logger';

export interface TransitionResult {
  allowed: boolean;
  from: ChainStageId;
  to: ChainPosition;
  blockers: string[];
  warnings: string[];
}

/**
 * Forward-only stage machine. A run moves one stage at a time and only after
 * every required gate of the stage has passed; a blocked stage stays open for
 * remediation.
 */
export class TransitionEngine {
  evaluate(stage: ChainStageId, summary: GateSummary): TransitionResult {
    const blockers = summary.blocking.map((r) => describeGate(r));
    const warnings = summary.warnings.map((r) => describeGate(r));
    return {
      allowed: blockers.length === 0,
      from: stage,
      to: getNextStage(stage) ?? CHAIN_DONE,
      blockers,
      warnings,
    };
  }

  /** Checks that the stage's inputs are available from earlier outputs. */
  checkInputs(run: ChainRun, stage: ChainStageId): string[] {
    const available: Record<string, string> = { idea: run.idea };
    for (const output of run.stages) {
      available[output.stage] = output.content;
    }
    return validateStageInputs(getStageConfig(stage), available).map((e) => e.message);
  }

  /** Appends the output and moves the run to the next position. */
  advance(run: ChainRun, output: StageOutput): ChainPosition {
    if (run.state !== ChainRunState.IN_PROGRESS) {
      throw new RunStateError(`Run ${run.id} is ${run.state}; only in-progress runs advance`);
    }
    if (run.currentStage !== output.stage) {
      throw new StageOrderViolation(String(run.currentStage), output.stage);
    }

    const next = getNextStage(output.stage) ?? CHAIN_DONE;
    assertForward(run.currentStage, next);

    run.stages.push(output);
    run.currentStage = next;
    run.updatedAt = new Date();
    if (next === CHAIN_DONE) {
      run.state = ChainRunState.COMPLETED;
    }

    stageLog(output.stage, `Advanced to ${next === CHAIN_DONE ? 'done' : getStageConfig(next).name}`);
    return next;
  }
}

/** Only single forward steps are legal; anything else is a `StageOrderViolation`. */
export function assertForward(from: ChainPosition, to: ChainPosition): void {
  const fromIdx = stageIndex(from);
  const toIdx = stageIndex(to);
  if (fromIdx < 0 || toIdx !== fromIdx + 1) {
    throw new StageOrderViolation(String(from), String(to));
  }
}

function describeGate(result: GateResult): string {
  const detail = result.findings.length > 0 ? `: ${result.findings[0]}` : '';
  return `${result.gateId} ${result.status} (${result.score.toFixed(2)} / ${result.threshold})${detail}`;
}
