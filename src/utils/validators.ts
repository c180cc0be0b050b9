import {
  type AgentDescriptor,
  type GateConfig,
  type McpServerConfig,
  type StageConfig,
  AgentKind,
  CapabilityTag,
  ChainStageId,
} from '../types';

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export const MIN_IDEA_LENGTH = 10;

export function validateIdea(idea: string): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!idea || idea.trim().length === 0) {
    errors.push(new ValidationError('Idea is required', 'idea', ''));
  } else if (idea.trim().length < MIN_IDEA_LENGTH) {
    errors.push(new ValidationError(
      `Idea is too short. Please provide at least ${MIN_IDEA_LENGTH} characters.`,
      'idea',
      idea,
    ));
  }

  return errors;
}

export function validateStageInputs(
  stage: StageConfig,
  available: Record<string, string>,
): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const input of stage.requiredInputs) {
    const value = available[input];
    if (value === undefined || value.trim().length === 0) {
      errors.push(new ValidationError(
        `Stage ${stage.id} requires input "${input}"`,
        'requiredInputs',
        input,
      ));
    }
  }

  return errors;
}

export function validateAgentDescriptor(descriptor: AgentDescriptor): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!Object.values(AgentKind).includes(descriptor.kind)) {
    errors.push(new ValidationError('Invalid agent kind', 'kind', descriptor.kind));
  }
  if (descriptor.domainKeywords.length === 0) {
    errors.push(new ValidationError('Agent needs at least one domain keyword', 'domainKeywords', []));
  }
  if (!Number.isInteger(descriptor.priority) || descriptor.priority < 1) {
    errors.push(new ValidationError('Agent priority must be a positive integer', 'priority', descriptor.priority));
  }
  for (const tag of descriptor.mcpCapabilityTags) {
    if (!Object.values(CapabilityTag).includes(tag)) {
      errors.push(new ValidationError('Unknown capability tag', 'mcpCapabilityTags', tag));
    }
  }
  for (const stage of descriptor.stageAffinity) {
    if (!Object.values(ChainStageId).includes(stage)) {
      errors.push(new ValidationError('Unknown stage in affinity list', 'stageAffinity', stage));
    }
  }

  return errors;
}

export function validateGateConfig(gate: GateConfig, knownGateIds: string[]): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!gate.id || gate.id.trim().length === 0) {
    errors.push(new ValidationError('Gate ID is required', 'id', gate.id));
  }
  if (gate.threshold < 0 || gate.threshold > 1) {
    errors.push(new ValidationError('Gate threshold must be within [0,1]', 'threshold', gate.threshold));
  }
  if (gate.timeoutMs <= 0) {
    errors.push(new ValidationError('Gate timeout must be positive', 'timeoutMs', gate.timeoutMs));
  }
  for (const dep of gate.dependsOn) {
    if (dep === gate.id) {
      errors.push(new ValidationError('Gate cannot depend on itself', 'dependsOn', dep));
    } else if (!knownGateIds.includes(dep)) {
      errors.push(new ValidationError(`Unknown gate dependency "${dep}"`, 'dependsOn', dep));
    }
  }

  return errors;
}

export function validateServerConfig(server: McpServerConfig): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!server.id || server.id.trim().length === 0) {
    errors.push(new ValidationError('Server ID is required', 'id', server.id));
  }
  if (server.capabilityTags.length === 0) {
    errors.push(new ValidationError('Server must declare at least one capability', 'capabilityTags', []));
  }
  if (server.maxConcurrentLeases < 1) {
    errors.push(new ValidationError('Lease cap must be at least 1', 'maxConcurrentLeases', server.maxConcurrentLeases));
  }
  if (server.healthCheck.timeoutMs > server.healthCheck.intervalMs) {
    errors.push(new ValidationError(
      'Health check timeout cannot exceed its interval',
      'healthCheck.timeoutMs',
      server.healthCheck.timeoutMs,
    ));
  }

  return errors;
}
