import { type AgentDescriptor, AgentKind } from '../types';
import { validateAgentDescriptor } from '../utils/validators';
import { BaseAgent } from './base-agent';

import FrontendAgent, { FRONTEND_AGENT } from './frontend-agent';
import BackendAgent, { BACKEND_AGENT } from './backend-agent';
import SecurityAgent, { SECURITY_AGENT } from './security-agent';
import PerformanceAgent, { PERFORMANCE_AGENT } from './performance-agent';
import ArchitectAgent, { ARCHITECT_AGENT } from './architect-agent';
import AnalyzerAgent, { ANALYZER_AGENT } from './analyzer-agent';
import ScribeAgent, { SCRIBE_AGENT } from './scribe-agent';

export type AgentFactory = () => BaseAgent;

const AGENT_FACTORIES: Record<AgentKind, AgentFactory> = {
  [AgentKind.FRONTEND]: () => new FrontendAgent(),
  [AgentKind.BACKEND]: () => new BackendAgent(),
  [AgentKind.SECURITY]: () => new SecurityAgent(),
  [AgentKind.PERFORMANCE]: () => new PerformanceAgent(),
  [AgentKind.ARCHITECT]: () => new ArchitectAgent(),
  [AgentKind.ANALYZER]: () => new AnalyzerAgent(),
  [AgentKind.SCRIBE]: () => new ScribeAgent(),
};

const AGENT_DESCRIPTORS: Record<AgentKind, AgentDescriptor> = {
  [AgentKind.FRONTEND]: FRONTEND_AGENT,
  [AgentKind.BACKEND]: BACKEND_AGENT,
  [AgentKind.SECURITY]: SECURITY_AGENT,
  [AgentKind.PERFORMANCE]: PERFORMANCE_AGENT,
  [AgentKind.ARCHITECT]: ARCHITECT_AGENT,
  [AgentKind.ANALYZER]: ANALYZER_AGENT,
  [AgentKind.SCRIBE]: SCRIBE_AGENT,
};

export function getAgentDescriptor(kind: AgentKind): AgentDescriptor {
  return AGENT_DESCRIPTORS[kind];
}

export function getAllAgentDescriptors(): AgentDescriptor[] {
  return Object.values(AGENT_DESCRIPTORS).sort((a, b) => a.priority - b.priority);
}

/**
 * Creates agent instances on demand. Every call to `create` returns a fresh
 * agent so that concurrent instances never share state.
 */
export class AgentRegistry {
  private enabled: Set<AgentKind>;

  constructor(enabledKinds: AgentKind[] = Object.values(AgentKind)) {
    this.enabled = new Set(enabledKinds);
    for (const kind of this.enabled) {
      const errors = validateAgentDescriptor(AGENT_DESCRIPTORS[kind]);
      if (errors.length > 0) {
        throw new Error(`Invalid agent descriptor ${kind}: ${errors.map((e) => e.message).join(', ')}`);
      }
    }
  }

  create(kind: AgentKind): BaseAgent {
    if (!this.enabled.has(kind)) {
      throw new Error(`Agent ${kind} is disabled`);
    }
    return AGENT_FACTORIES[kind]();
  }

  isEnabled(kind: AgentKind): boolean {
    return this.enabled.has(kind);
  }

  getDescriptors(): AgentDescriptor[] {
    return getAllAgentDescriptors().filter((d) => this.enabled.has(d.kind));
  }
}

export {
  BaseAgent,
  FrontendAgent,
  BackendAgent,
  SecurityAgent,
  PerformanceAgent,
  ArchitectAgent,
  AnalyzerAgent,
  ScribeAgent,
};
