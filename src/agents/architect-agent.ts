import {
  type AgentDescriptor,
  AgentKind,
  CapabilityTag,
  ChainStageId,
  Domain,
} from '../types';
import { BaseAgent } from './base-agent';

const ARCHITECT_AGENT_SYSTEM_PROMPT = `Solutions Architect. Owns the system's structure and the trade-offs behind it.
Structure: components and their responsibilities, boundaries, synchronous vs asynchronous integration, data ownership per component.
Decisions: record each significant choice with the alternatives considered and the reason (ADR style).
Quality attributes: availability, scalability, maintainability, cost; name the ones that drive the design.
Evolution: what can change independently, what is hard to change later, migration paths.
Keep the design as simple as the requirements allow.`;

export const ARCHITECT_AGENT: AgentDescriptor = {
  kind: AgentKind.ARCHITECT,
  name: 'architect',
  title: 'Solutions Architect',
  description: 'Owns the overall system structure, boundaries and technology choices',
  domain: Domain.ARCHITECTURE,
  priority: 2,
  domainKeywords: ['architecture', 'system', 'design', 'integration', 'module', 'layer', 'boundary', 'dependency', 'microservice', 'event'],
  filePatterns: ['*.proto', '*.graphql', '*.tf'],
  dirPatterns: ['core', 'domain', 'infrastructure', 'adapters', 'modules', 'packages', 'shared'],
  mcpCapabilityTags: [CapabilityTag.REASONING, CapabilityTag.DOCUMENTATION],
  allowedTools: ['Read', 'Grep', 'Glob'],
  stageAffinity: [ChainStageId.IDEA_DEFINITION, ChainStageId.TRD, ChainStageId.FEATURE_BREAKDOWN],
};

const CONTRIBUTIONS: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: ['Value Proposition'],
  [ChainStageId.PRD]: ['Overview'],
  [ChainStageId.TRD]: ['Architecture', 'Data Model'],
  [ChainStageId.FEATURE_BREAKDOWN]: ['Features', 'Dependencies'],
  [ChainStageId.USER_STORY]: ['Definition of Done'],
};

const FOCUS: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: [
    'What makes the idea technically distinctive or risky',
  ],
  [ChainStageId.PRD]: [
    'Scope boundaries of the product',
  ],
  [ChainStageId.TRD]: [
    'Component structure and integration style',
    'Ownership of each entity',
  ],
  [ChainStageId.FEATURE_BREAKDOWN]: [
    'Feature boundaries that follow component boundaries',
    'Ordering imposed by dependencies',
  ],
  [ChainStageId.USER_STORY]: [
    'Architectural conditions every story must respect',
  ],
};

export default class ArchitectAgent extends BaseAgent {
  constructor() {
    super(ARCHITECT_AGENT);
  }

  protected getSystemPrompt(): string {
    return ARCHITECT_AGENT_SYSTEM_PROMPT;
  }

  protected getContributionHeadings(stage: ChainStageId): string[] {
    return CONTRIBUTIONS[stage];
  }

  protected getFocusAreas(stage: ChainStageId): string[] {
    return FOCUS[stage];
  }
}
