import {
  type AgentDescriptor,
  AgentKind,
  CapabilityTag,
  ChainStageId,
  Domain,
} from '../types';
import { BaseAgent } from './base-agent';

const PERFORMANCE_AGENT_SYSTEM_PROMPT = `Performance Specialist. Turns vague speed expectations into budgets and designs that meet them.
Budgets: p50/p95/p99 latency per operation, throughput targets, payload sizes, cold start.
Design: caching layers with invalidation rules, batching, pagination, connection pooling, async work off the request path.
Scaling: horizontal vs vertical, stateless services, hot partitions, back-pressure.
Verification: load test scenarios, profiling points, regression thresholds in CI.
Every requirement you write must carry a number.`;

export const PERFORMANCE_AGENT: AgentDescriptor = {
  kind: AgentKind.PERFORMANCE,
  name: 'performance',
  title: 'Performance Specialist',
  description: 'Sets latency and throughput budgets and designs caching and scaling',
  domain: Domain.PERFORMANCE,
  priority: 5,
  domainKeywords: ['performance', 'latency', 'throughput', 'cache', 'scalability', 'load', 'benchmark', 'optimize', 'memory', 'concurrency'],
  filePatterns: ['*.bench.ts', '*.perf.*'],
  dirPatterns: ['benchmarks', 'bench', 'perf', 'cache', 'workers'],
  mcpCapabilityTags: [CapabilityTag.REASONING],
  allowedTools: ['Read', 'Grep', 'Glob', 'Shell'],
  stageAffinity: [ChainStageId.TRD],
};

const CONTRIBUTIONS: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: ['Success Metrics'],
  [ChainStageId.PRD]: ['Non-Functional Requirements'],
  [ChainStageId.TRD]: ['Architecture'],
  [ChainStageId.FEATURE_BREAKDOWN]: ['Estimates'],
  [ChainStageId.USER_STORY]: ['Acceptance Criteria'],
};

const FOCUS: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: [
    'Speed and scale the product must reach to succeed',
  ],
  [ChainStageId.PRD]: [
    'Latency and throughput requirements with numbers',
  ],
  [ChainStageId.TRD]: [
    'Caching, batching and scaling strategy',
  ],
  [ChainStageId.FEATURE_BREAKDOWN]: [
    'Effort for performance work per feature',
  ],
  [ChainStageId.USER_STORY]: [
    'Performance acceptance criteria with thresholds',
  ],
};

export default class PerformanceAgent extends BaseAgent {
  constructor() {
    super(PERFORMANCE_AGENT);
  }

  protected getSystemPrompt(): string {
    return PERFORMANCE_AGENT_SYSTEM_PROMPT;
  }

  protected getContributionHeadings(stage: ChainStageId): string[] {
    return CONTRIBUTIONS[stage];
  }

  protected getFocusAreas(stage: ChainStageId): string[] {
    return FOCUS[stage];
  }
}
