import {
  type AgentDescriptor,
  AgentKind,
  CapabilityTag,
  ChainStageId,
  Domain,
} from '../types';
import { BaseAgent } from './base-agent';

const SECURITY_AGENT_SYSTEM_PROMPT = `Security Specialist. Identifies threats and specifies mitigations across the design.
OWASP Top 10: access control, cryptographic failures, injection, insecure design, misconfiguration, vulnerable components, authentication failures, integrity failures, logging gaps, SSRF.
Authentication and authorization: session or token model (JWT expiry and rotation, OAuth2/OIDC with PKCE), RBAC or ABAC coverage of every operation.
Data: encryption at rest and in transit, PII classification, secrets management, retention and deletion.
Input: validation on every boundary, rate limiting, request size limits.
Audit: which actions are logged, without leaking PII.
State each risk with its mitigation and how it will be verified.`;

export const SECURITY_AGENT: AgentDescriptor = {
  kind: AgentKind.SECURITY,
  name: 'security',
  title: 'Security Specialist',
  description: 'Threat-models the design and specifies authentication, authorization and data protection',
  domain: Domain.SECURITY,
  priority: 1,
  domainKeywords: ['security', 'authentication', 'authorization', 'auth', 'jwt', 'oauth', 'encryption', 'password', 'token', 'permission', 'vulnerability', 'secret'],
  filePatterns: ['*.pem', '*.key', '*.rego', '*auth*'],
  dirPatterns: ['auth', 'security', 'permissions', 'policies', 'crypto', 'secrets'],
  mcpCapabilityTags: [CapabilityTag.REASONING],
  allowedTools: ['Read', 'Grep', 'Glob'],
  stageAffinity: [ChainStageId.TRD],
};

const CONTRIBUTIONS: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: ['Problem Statement'],
  [ChainStageId.PRD]: ['Non-Functional Requirements'],
  [ChainStageId.TRD]: ['Security Considerations'],
  [ChainStageId.FEATURE_BREAKDOWN]: ['Dependencies'],
  [ChainStageId.USER_STORY]: ['Definition of Done'],
};

const FOCUS: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: [
    'Sensitive data and actors the product exposes',
  ],
  [ChainStageId.PRD]: [
    'Security and privacy requirements',
  ],
  [ChainStageId.TRD]: [
    'Threat model and mitigations',
    'Authentication, authorization and encryption choices',
  ],
  [ChainStageId.FEATURE_BREAKDOWN]: [
    'Security work that other features depend on',
  ],
  [ChainStageId.USER_STORY]: [
    'Security checks every story must pass',
  ],
};

export default class SecurityAgent extends BaseAgent {
  constructor() {
    super(SECURITY_AGENT);
  }

  protected getSystemPrompt(): string {
    return SECURITY_AGENT_SYSTEM_PROMPT;
  }

  protected getContributionHeadings(stage: ChainStageId): string[] {
    return CONTRIBUTIONS[stage];
  }

  protected getFocusAreas(stage: ChainStageId): string[] {
    return FOCUS[stage];
  }
}
