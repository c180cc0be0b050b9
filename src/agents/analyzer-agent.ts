import {
  type AgentDescriptor,
  AgentKind,
  CapabilityTag,
  ChainStageId,
  Domain,
} from '../types';
import { BaseAgent } from './base-agent';

const ANALYZER_AGENT_SYSTEM_PROMPT = `Product Analyst. Makes the idea precise before anything is designed.
Problem: who has it, how often, what it costs them today, what they use instead.
Users: primary and secondary personas, their goals and constraints.
Goals: outcomes rather than outputs; each goal with a metric, a baseline and a target.
Risks: assumptions that must hold, and the cheapest way to test each.
Ask what would make the product unnecessary. Remove requirements that do not serve a goal.`;

export const ANALYZER_AGENT: AgentDescriptor = {
  kind: AgentKind.ANALYZER,
  name: 'analyzer',
  title: 'Product Analyst',
  description: 'Clarifies the problem, the users and the measurable goals behind the idea',
  domain: Domain.ANALYSIS,
  priority: 6,
  domainKeywords: ['analyze', 'problem', 'users', 'metric', 'research', 'market', 'requirement', 'goal', 'risk', 'investigate'],
  filePatterns: ['*.csv', '*.ipynb', '*.log'],
  dirPatterns: ['analysis', 'reports', 'metrics', 'scripts', 'diagnostics'],
  mcpCapabilityTags: [CapabilityTag.REASONING],
  allowedTools: ['Read', 'Grep'],
  stageAffinity: [ChainStageId.IDEA_DEFINITION, ChainStageId.PRD],
};

const CONTRIBUTIONS: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: ['Problem Statement', 'Success Metrics'],
  [ChainStageId.PRD]: ['Overview', 'Goals'],
  [ChainStageId.TRD]: ['Testing Strategy'],
  [ChainStageId.FEATURE_BREAKDOWN]: ['Priorities'],
  [ChainStageId.USER_STORY]: ['Acceptance Criteria'],
};

const FOCUS: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: [
    'The problem in one paragraph',
    'Metrics with baseline and target',
  ],
  [ChainStageId.PRD]: [
    'Goals traced to the problem statement',
  ],
  [ChainStageId.TRD]: [
    'How the goals will be verified',
  ],
  [ChainStageId.FEATURE_BREAKDOWN]: [
    'Priority of each feature by goal impact',
  ],
  [ChainStageId.USER_STORY]: [
    'Acceptance criteria tied to the goals',
  ],
};

export default class AnalyzerAgent extends BaseAgent {
  constructor() {
    super(ANALYZER_AGENT);
  }

  protected getSystemPrompt(): string {
    return ANALYZER_AGENT_SYSTEM_PROMPT;
  }

  protected getContributionHeadings(stage: ChainStageId): string[] {
    return CONTRIBUTIONS[stage];
  }

  protected getFocusAreas(stage: ChainStageId): string[] {
    return FOCUS[stage];
  }
}
