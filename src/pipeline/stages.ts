import {
  type StageConfig,
  type ChainPosition,
  AgentKind,
  ChainStageId,
  CHAIN_DONE,
} from '../types';
import { GateId } from '../gates/gate-ids';

export const DEFAULT_SPAWNING_THRESHOLD = 0.85;

const STAGE_CONFIGS: StageConfig[] = [
  {
    id: ChainStageId.IDEA_DEFINITION,
    name: 'Idea Definition',
    description: 'Sharpen the raw idea into a problem statement with target users, value proposition and measurable success criteria',
    requiredInputs: ['idea'],
    outputFormat: {
      format: 'markdown',
      requiredSections: ['Problem Statement', 'Target Users', 'Value Proposition', 'Success Metrics'],
    },
    requiredGates: [GateId.STRUCTURE, GateId.COMPLETENESS],
    optionalGates: [],
    agentPolicy: {
      spawningThreshold: DEFAULT_SPAWNING_THRESHOLD,
      requiredAgents: [AgentKind.ANALYZER],
      optionalAgents: [AgentKind.ARCHITECT, AgentKind.SCRIBE],
    },
    nextStage: ChainStageId.PRD,
  },
  {
    id: ChainStageId.PRD,
    name: 'Product Requirements',
    description: 'Turn the defined idea into a product requirements document with goals, functional and non-functional requirements and acceptance criteria',
    requiredInputs: [ChainStageId.IDEA_DEFINITION],
    outputFormat: {
      format: 'markdown',
      requiredSections: ['Overview', 'Goals', 'Functional Requirements', 'Non-Functional Requirements', 'Acceptance Criteria'],
    },
    requiredGates: [GateId.STRUCTURE, GateId.COMPLETENESS],
    optionalGates: [GateId.TRACEABILITY, GateId.TESTABILITY],
    agentPolicy: {
      spawningThreshold: DEFAULT_SPAWNING_THRESHOLD,
      requiredAgents: [AgentKind.ANALYZER],
      optionalAgents: [AgentKind.SCRIBE, AgentKind.FRONTEND, AgentKind.BACKEND],
    },
    nextStage: ChainStageId.TRD,
  },
  {
    id: ChainStageId.TRD,
    name: 'Technical Requirements',
    description: 'Derive the technical design: architecture, data model, API surface, security considerations and testing strategy',
    requiredInputs: [ChainStageId.PRD],
    outputFormat: {
      format: 'markdown',
      requiredSections: ['Architecture', 'Data Model', 'API Design', 'Security Considerations', 'Testing Strategy'],
    },
    requiredGates: [GateId.STRUCTURE, GateId.COMPLETENESS, GateId.SECURITY],
    optionalGates: [GateId.TRACEABILITY, GateId.PERFORMANCE, GateId.DOCUMENTATION],
    agentPolicy: {
      spawningThreshold: DEFAULT_SPAWNING_THRESHOLD,
      requiredAgents: [AgentKind.ARCHITECT],
      optionalAgents: [AgentKind.FRONTEND, AgentKind.BACKEND, AgentKind.SECURITY, AgentKind.PERFORMANCE],
    },
    nextStage: ChainStageId.FEATURE_BREAKDOWN,
  },
  {
    id: ChainStageId.FEATURE_BREAKDOWN,
    name: 'Feature Breakdown',
    description: 'Split the technical design into deliverable features with dependencies, priorities and estimates',
    requiredInputs: [ChainStageId.TRD],
    outputFormat: {
      format: 'markdown',
      requiredSections: ['Features', 'Dependencies', 'Priorities', 'Estimates'],
    },
    requiredGates: [GateId.STRUCTURE, GateId.COMPLETENESS],
    optionalGates: [GateId.TRACEABILITY],
    agentPolicy: {
      spawningThreshold: DEFAULT_SPAWNING_THRESHOLD,
      requiredAgents: [AgentKind.ARCHITECT],
      optionalAgents: [AgentKind.FRONTEND, AgentKind.BACKEND, AgentKind.ANALYZER],
    },
    nextStage: ChainStageId.USER_STORY,
  },
  {
    id: ChainStageId.USER_STORY,
    name: 'User Stories',
    description: 'Write implementation-ready user stories with acceptance criteria and a definition of done for every feature',
    requiredInputs: [ChainStageId.FEATURE_BREAKDOWN],
    outputFormat: {
      format: 'markdown',
      requiredSections: ['User Stories', 'Acceptance Criteria', 'Definition of Done'],
    },
    requiredGates: [GateId.STRUCTURE, GateId.COMPLETENESS, GateId.TESTABILITY],
    optionalGates: [GateId.TRACEABILITY, GateId.DOCUMENTATION],
    agentPolicy: {
      spawningThreshold: DEFAULT_SPAWNING_THRESHOLD,
      requiredAgents: [AgentKind.SCRIBE],
      optionalAgents: [AgentKind.FRONTEND, AgentKind.BACKEND, AgentKind.SECURITY],
    },
    nextStage: null,
  },
];

export function getStageConfig(stage: ChainStageId): StageConfig {
  const config = STAGE_CONFIGS.find((s) => s.id === stage);
  if (!config) {
    throw new Error(`Unknown chain stage: ${stage}`);
  }
  return config;
}

export function getStagesInOrder(): ChainStageId[] {
  return STAGE_CONFIGS.map((s) => s.id);
}

export function getFirstStage(): ChainStageId {
  return ChainStageId.IDEA_DEFINITION;
}

export function getNextStage(current: ChainStageId): ChainStageId | null {
  return getStageConfig(current).nextStage;
}

export function getPreviousStage(current: ChainStageId): ChainStageId | null {
  const stages = getStagesInOrder();
  const idx = stages.indexOf(current);
  if (idx <= 0) return null;
  return stages[idx - 1];
}

export function stageIndex(position: ChainPosition): number {
  if (position === CHAIN_DONE) return STAGE_CONFIGS.length;
  return getStagesInOrder().indexOf(position);
}

export function getRemainingStages(position: ChainPosition): ChainStageId[] {
  const stages = getStagesInOrder();
  const idx = stageIndex(position);
  return idx < 0 ? [] : stages.slice(idx);
}

export function getStageGates(stage: ChainStageId): string[] {
  const config = getStageConfig(stage);
  return [...config.requiredGates, ...config.optionalGates];
}
