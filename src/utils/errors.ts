import { type AgentKind, type CapabilityTag, type ChainStageId, type GateResult } from '../types';

export abstract class ChainError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ContextAnalysisError extends ChainError {
  readonly code = 'CONTEXT_ANALYSIS';

  constructor(
    public readonly rootPath: string,
    public readonly reason: 'missing' | 'not_directory' | 'unreadable' | 'empty',
    cause?: string,
  ) {
    super(`Cannot analyze project root ${rootPath}: ${reason}${cause ? ` (${cause})` : ''}`);
  }
}

export class AgentSpawnFailure extends ChainError {
  readonly code = 'AGENT_SPAWN_FAILURE';

  constructor(
    public readonly kind: AgentKind,
    public readonly attempt: number,
    cause: string,
  ) {
    super(`Agent ${kind} failed on attempt ${attempt}: ${cause}`);
  }
}

export class InstanceOwnershipError extends ChainError {
  readonly code = 'INSTANCE_OWNERSHIP';

  constructor(instanceId: string, ownerRunId: string, requestedRunId: string) {
    super(`Agent instance ${instanceId} belongs to run ${ownerRunId}, cannot assign to ${requestedRunId}`);
  }
}

export class AgentTimeoutError extends ChainError {
  readonly code = 'AGENT_TIMEOUT';

  constructor(public readonly kind: AgentKind, timeoutMs: number) {
    super(`Agent ${kind} did not finish within ${timeoutMs}ms`);
  }
}

export class NoAvailableServerError extends ChainError {
  readonly code = 'NO_AVAILABLE_SERVER';

  constructor(
    public readonly capability: CapabilityTag,
    public readonly reasons: string[] = [],
  ) {
    super(`No MCP server available for capability "${capability}"${reasons.length > 0 ? `: ${reasons.join('; ')}` : ''}`);
  }
}

export class CapabilityExhaustedError extends ChainError {
  readonly code = 'CAPABILITY_EXHAUSTED';

  constructor(public readonly capability: CapabilityTag) {
    super(`Required capability "${capability}" has no server and no fallback left`);
  }
}

export class RequiredGateFailure extends ChainError {
  readonly code = 'REQUIRED_GATE_FAILURE';

  constructor(
    public readonly stage: ChainStageId,
    public readonly results: GateResult[],
  ) {
    super(`Stage ${stage} blocked by required gate(s): ${results.map((r) => r.gateId).join(', ')}`);
  }
}

export class GateConfigurationError extends ChainError {
  readonly code = 'GATE_CONFIGURATION';
}

export class GateTimeoutError extends ChainError {
  readonly code = 'GATE_TIMEOUT';

  constructor(public readonly gateId: string, timeoutMs: number) {
    super(`Gate ${gateId} timed out after ${timeoutMs}ms`);
  }
}

export class StageOrderViolation extends ChainError {
  readonly code = 'STAGE_ORDER_VIOLATION';

  constructor(from: string, to: string) {
    super(`Cannot move from ${from} to ${to}: stages advance one at a time and never re-enter an earlier stage`);
  }
}

export class RunNotFoundError extends ChainError {
  readonly code = 'RUN_NOT_FOUND';

  constructor(runId: string) {
    super(`Chain run not found: ${runId}`);
  }
}

export class RunStateError extends ChainError {
  readonly code = 'RUN_STATE';
}

export class InferenceError extends ChainError {
  readonly code = 'INFERENCE';
}

export class ConfigValidationError extends ChainError {
  readonly code = 'CONFIG_VALIDATION';

  constructor(
    public readonly filePath: string,
    public readonly issues: string[],
  ) {
    super(`Invalid configuration in ${filePath}: ${issues.join('; ')}`);
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ─── Non-fatal records ───────────────────────────────────────────────────────
// These are reported as diagnostics, never thrown.

export const ScoringAmbiguity = 'SCORING_AMBIGUITY';
export const PartialCoordinationFailureCode = 'PARTIAL_COORDINATION_FAILURE';
export const OptionalGateFailure = 'OPTIONAL_GATE_FAILURE';
export const WaveMiscalculationWarning = 'WAVE_MISCALCULATION_WARNING';
