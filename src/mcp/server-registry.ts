import {
  type CapabilityTag,
  type McpServerConfig,
  type McpServerDescriptor,
  type ServerMetrics,
  ServerHealth,
} from '../types';
import { validateServerConfig } from '../utils/validators';

/** Mutable per-server record. Only the selector's lease API writes to it. */
export interface ServerEntry {
  config: McpServerConfig;
  health: ServerHealth;
  consecutiveFailures: number;
  latencies: number[];
  outcomes: boolean[];
  activeLeases: number;
}

export class ServerRegistry {
  private entries: Map<string, ServerEntry> = new Map();

  constructor(configs: McpServerConfig[] = []) {
    for (const config of configs) {
      this.register(config);
    }
  }

  register(config: McpServerConfig): void {
    const errors = validateServerConfig(config);
    if (errors.length > 0) {
      throw new Error(`Invalid MCP server "${config.id}": ${errors.map((e) => e.message).join(', ')}`);
    }
    if (this.entries.has(config.id)) {
      throw new Error(`MCP server "${config.id}" is already registered`);
    }
    this.entries.set(config.id, {
      config,
      health: ServerHealth.HEALTHY,
      consecutiveFailures: 0,
      latencies: [],
      outcomes: [],
      activeLeases: 0,
    });
  }

  has(serverId: string): boolean {
    return this.entries.has(serverId);
  }

  describe(serverId: string): McpServerDescriptor {
    return snapshot(this.entry(serverId));
  }

  list(): McpServerDescriptor[] {
    return [...this.entries.values()].map(snapshot);
  }

  withCapability(tag: CapabilityTag): McpServerDescriptor[] {
    return this.list().filter((s) => s.config.capabilityTags.includes(tag));
  }

  /** @internal */
  entry(serverId: string): ServerEntry {
    const entry = this.entries.get(serverId);
    if (!entry) {
      throw new Error(`Unknown MCP server: ${serverId}`);
    }
    return entry;
  }
}

export function computeMetrics(entry: ServerEntry): ServerMetrics {
  const samples = entry.outcomes.length;
  if (samples === 0) {
    return { averageLatencyMs: 0, successRate: 1, samples: 0 };
  }
  const successes = entry.outcomes.filter(Boolean).length;
  const latency = entry.latencies.reduce((sum, l) => sum + l, 0) / entry.latencies.length;
  return {
    averageLatencyMs: Math.round(latency),
    successRate: successes / samples,
    samples,
  };
}

function snapshot(entry: ServerEntry): McpServerDescriptor {
  return Object.freeze({
    config: entry.config,
    health: entry.health,
    consecutiveFailures: entry.consecutiveFailures,
    metrics: computeMetrics(entry),
    activeLeases: entry.activeLeases,
  });
}
