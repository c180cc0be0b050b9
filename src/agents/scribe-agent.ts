import {
  type AgentDescriptor,
  AgentKind,
  CapabilityTag,
  ChainStageId,
  Domain,
} from '../types';
import { BaseAgent } from './base-agent';

const SCRIBE_AGENT_SYSTEM_PROMPT = `Technical Writer. Turns the team's material into documents others can act on.
Voice: plain, active, present tense; one idea per sentence; define terms on first use.
Stories: "As a <user>, I want <capability>, so that <benefit>", each with Given/When/Then acceptance criteria.
Structure: consistent headings, numbered requirements that can be referenced, no orphan sections.
Completeness: every requirement is testable; every story traces back to a feature.
Cut anything the reader does not need to do their job.`;

export const SCRIBE_AGENT: AgentDescriptor = {
  kind: AgentKind.SCRIBE,
  name: 'scribe',
  title: 'Technical Writer',
  description: 'Writes clear requirements, stories and acceptance criteria in a consistent voice',
  domain: Domain.DOCUMENTATION,
  priority: 7,
  domainKeywords: ['document', 'documentation', 'story', 'stories', 'readme', 'guide', 'write', 'acceptance', 'criteria', 'narrative'],
  filePatterns: ['*.md', '*.mdx', '*.rst'],
  dirPatterns: ['docs', 'documentation', 'guides', 'wiki', 'adr'],
  mcpCapabilityTags: [CapabilityTag.DOCUMENTATION, CapabilityTag.TEST_AUTOMATION],
  allowedTools: ['Read', 'Write'],
  stageAffinity: [ChainStageId.PRD, ChainStageId.USER_STORY],
};

const CONTRIBUTIONS: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: ['Target Users'],
  [ChainStageId.PRD]: ['Acceptance Criteria'],
  [ChainStageId.TRD]: ['Testing Strategy'],
  [ChainStageId.FEATURE_BREAKDOWN]: ['Features'],
  [ChainStageId.USER_STORY]: ['User Stories', 'Acceptance Criteria'],
};

const FOCUS: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: [
    'Personas written so a stranger recognises them',
  ],
  [ChainStageId.PRD]: [
    'Acceptance criteria phrased as Given/When/Then',
  ],
  [ChainStageId.TRD]: [
    'Test plan readable by the whole team',
  ],
  [ChainStageId.FEATURE_BREAKDOWN]: [
    'Feature descriptions with a one-line outcome each',
  ],
  [ChainStageId.USER_STORY]: [
    'Stories in the standard template',
    'Criteria that can be checked by a test',
  ],
};

export default class ScribeAgent extends BaseAgent {
  constructor() {
    super(SCRIBE_AGENT);
  }

  protected getSystemPrompt(): string {
    return SCRIBE_AGENT_SYSTEM_PROMPT;
  }

  protected getContributionHeadings(stage: ChainStageId): string[] {
    return CONTRIBUTIONS[stage];
  }

  protected getFocusAreas(stage: ChainStageId): string[] {
    return FOCUS[stage];
  }
}
