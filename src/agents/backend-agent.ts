import {
  type AgentDescriptor,
  AgentKind,
  CapabilityTag,
  ChainStageId,
  Domain,
} from '../types';
import { BaseAgent } from './base-agent';

const BACKEND_AGENT_SYSTEM_PROMPT = `Backend Specialist. Designs the server side: services, data and interfaces.
APIs: resource modelling, REST or RPC conventions already used in the project, versioning, pagination, idempotency keys for writes, error envelopes.
Data: entities and relations, indexes for every query path, migrations that can run without downtime, retention.
Reliability: timeouts and retries with backoff on every outbound call, transactional boundaries, outbox or queue for side effects.
Operations: configuration via environment, structured logs, health endpoints.
Be concrete: name endpoints, tables, columns and queues.`;

export const BACKEND_AGENT: AgentDescriptor = {
  kind: AgentKind.BACKEND,
  name: 'backend',
  title: 'Backend Specialist',
  description: 'Designs services, data models, APIs and the persistence layer',
  domain: Domain.BACKEND,
  priority: 3,
  domainKeywords: ['api', 'endpoint', 'database', 'server', 'backend', 'query', 'schema', 'service', 'queue', 'migration', 'rest', 'storage'],
  filePatterns: ['*.go', '*.py', '*.java', '*.sql', '*.rs', '*.rb'],
  dirPatterns: ['api', 'routes', 'controllers', 'services', 'models', 'handlers', 'migrations', 'server'],
  mcpCapabilityTags: [CapabilityTag.REASONING],
  allowedTools: ['Read', 'Grep', 'Glob', 'Write', 'Shell'],
  stageAffinity: [ChainStageId.TRD, ChainStageId.FEATURE_BREAKDOWN],
};

const CONTRIBUTIONS: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: ['Value Proposition'],
  [ChainStageId.PRD]: ['Non-Functional Requirements'],
  [ChainStageId.TRD]: ['Data Model', 'API Design'],
  [ChainStageId.FEATURE_BREAKDOWN]: ['Dependencies'],
  [ChainStageId.USER_STORY]: ['Acceptance Criteria'],
};

const FOCUS: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: [
    'Data the product must own and integrate with',
  ],
  [ChainStageId.PRD]: [
    'Availability, durability and consistency needs',
  ],
  [ChainStageId.TRD]: [
    'Entities, relations and indexes',
    'Endpoints with request and response shapes',
  ],
  [ChainStageId.FEATURE_BREAKDOWN]: [
    'Service and data dependencies between features',
  ],
  [ChainStageId.USER_STORY]: [
    'Server-side acceptance criteria per story',
  ],
};

export default class BackendAgent extends BaseAgent {
  constructor() {
    super(BACKEND_AGENT);
  }

  protected getSystemPrompt(): string {
    return BACKEND_AGENT_SYSTEM_PROMPT;
  }

  protected getContributionHeadings(stage: ChainStageId): string[] {
    return CONTRIBUTIONS[stage];
  }

  protected getFocusAreas(stage: ChainStageId): string[] {
    return FOCUS[stage];
  }
}
