import {
  type AgentDescriptor,
  AgentKind,
  CapabilityTag,
  ChainStageId,
  Domain,
} from '../types';
import { BaseAgent } from './base-agent';

const FRONTEND_AGENT_SYSTEM_PROMPT = `Frontend Specialist. Designs the user-facing half of the system.
Components: decomposition into reusable pieces, props and state ownership, composition over inheritance, a design system where one exists.
State: local vs shared vs server state, caching of remote data, optimistic updates and their rollback.
UX: loading, empty, error and populated states for every view; form validation messages; keyboard navigation.
Accessibility: semantic markup, focus order, labels, colour contrast (WCAG 2.1 AA).
Performance: bundle size budgets, code splitting per route, image handling, avoidable re-renders.
Name concrete screens, components and routes. Prefer the project's existing framework and conventions.`;

export const FRONTEND_AGENT: AgentDescriptor = {
  kind: AgentKind.FRONTEND,
  name: 'frontend',
  title: 'Frontend Specialist',
  description: 'Shapes user-facing flows, component structure, state handling and accessibility',
  domain: Domain.FRONTEND,
  priority: 4,
  domainKeywords: ['component', 'react', 'vue', 'frontend', 'ui', 'page', 'form', 'layout', 'responsive', 'accessibility', 'css', 'browser'],
  filePatterns: ['*.tsx', '*.jsx', '*.vue', '*.svelte', '*.css', '*.scss'],
  dirPatterns: ['components', 'pages', 'views', 'layouts', 'hooks', 'styles', 'ui'],
  mcpCapabilityTags: [CapabilityTag.UI_GENERATION],
  allowedTools: ['Read', 'Grep', 'Glob', 'Write'],
  stageAffinity: [ChainStageId.TRD, ChainStageId.FEATURE_BREAKDOWN],
};

const CONTRIBUTIONS: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: ['Target Users'],
  [ChainStageId.PRD]: ['Functional Requirements'],
  [ChainStageId.TRD]: ['Architecture', 'API Design'],
  [ChainStageId.FEATURE_BREAKDOWN]: ['Features'],
  [ChainStageId.USER_STORY]: ['User Stories'],
};

const FOCUS: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: [
    'Who interacts with the product and through which devices',
  ],
  [ChainStageId.PRD]: [
    'User-visible flows and screens',
    'Accessibility expectations',
  ],
  [ChainStageId.TRD]: [
    'Client architecture: routing, state management, data fetching',
    'API shapes the client needs',
  ],
  [ChainStageId.FEATURE_BREAKDOWN]: [
    'UI features and the components each needs',
  ],
  [ChainStageId.USER_STORY]: [
    'Stories for each screen including empty and error states',
  ],
};

export default class FrontendAgent extends BaseAgent {
  constructor() {
    super(FRONTEND_AGENT);
  }

  protected getSystemPrompt(): string {
    return FRONTEND_AGENT_SYSTEM_PROMPT;
  }

  protected getContributionHeadings(stage: ChainStageId): string[] {
    return CONTRIBUTIONS[stage];
  }

  protected getFocusAreas(stage: ChainStageId): string[] {
    return FOCUS[stage];
  }
}
