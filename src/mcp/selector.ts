import { v4 as uuidv4 } from 'uuid';
import {
  type AgentKind,
  type CapabilityTag,
  type McpServerDescriptor,
  ServerHealth,
} from '../types';
import { type SelectorConfig } from '../utils/config';
import { NoAvailableServerError } from '../utils/errors';
import { serverLog } from '../utils/logger';
import { type ServerRegistry } from './server-registry';

export interface Lease {
  readonly id: string;
  readonly serverId: string;
  readonly capability: CapabilityTag;
  readonly acquiredAt: number;
  release(): void;
}

export interface AcquireOptions {
  agentKind?: AgentKind;
  /** How long to wait for a lease to free up; 0 fails immediately. */
  waitMs?: number;
  /** Aborting releases the lease (or abandons the wait). */
  signal?: AbortSignal;
}

export interface CallResult {
  latencyMs: number;
  success: boolean;
}

interface LeaseWaiter {
  tag: CapabilityTag;
  agentKind?: AgentKind;
  signal?: AbortSignal;
  resolve: (lease: Lease) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
}

interface Ranking {
  ordered: McpServerDescriptor[];
  rejected: string[];
}

export class ServerSelector {
  private registry: ServerRegistry;
  private config: SelectorConfig;
  private cursors: Map<CapabilityTag, number> = new Map();
  private waiters: LeaseWaiter[] = [];

  constructor(registry: ServerRegistry, config: SelectorConfig) {
    this.registry = registry;
    this.config = config;
  }

  get serverRegistry(): ServerRegistry {
    return this.registry;
  }

  /**
   * Candidate servers for a capability in selection order: affinity first,
   * then metric thresholds, then priority and least load.
   */
  candidates(tag: CapabilityTag, agentKind?: AgentKind): McpServerDescriptor[] {
    return this.rank(tag, agentKind).ordered;
  }

  /** Picks the best candidate with a free lease slot without taking it. */
  select(tag: CapabilityTag, agentKind?: AgentKind): McpServerDescriptor {
    const { ordered, rejected } = this.rank(tag, agentKind);
    const free = ordered.find((s) => s.activeLeases < s.config.maxConcurrentLeases);
    if (!free) {
      const full = ordered.map((s) => `${s.config.id}: lease cap ${s.config.maxConcurrentLeases} reached`);
      throw new NoAvailableServerError(tag, [...rejected, ...full]);
    }
    return free;
  }

  async acquire(tag: CapabilityTag, options: AcquireOptions = {}): Promise<Lease> {
    const waitMs = options.waitMs ?? this.config.leaseWaitMs;
    try {
      return this.take(tag, options);
    } catch (error) {
      const someoneHolds = this.rank(tag, options.agentKind).ordered.length > 0;
      if (!(error instanceof NoAvailableServerError) || waitMs <= 0 || !someoneHolds) {
        throw error;
      }
      return this.waitForLease(tag, options, waitMs);
    }
  }

  recordCall(serverId: string, result: CallResult): void {
    const entry = this.registry.entry(serverId);
    entry.latencies.push(result.latencyMs);
    entry.outcomes.push(result.success);
    const window = this.config.metricsWindow;
    if (entry.outcomes.length > window) {
      entry.outcomes.splice(0, entry.outcomes.length - window);
      entry.latencies.splice(0, entry.latencies.length - window);
    }
  }

  recordHealthCheck(serverId: string, healthy: boolean): ServerHealth {
    const entry = this.registry.entry(serverId);
    const before = entry.health;

    if (healthy) {
      entry.consecutiveFailures = 0;
      entry.health = ServerHealth.HEALTHY;
    } else {
      entry.consecutiveFailures++;
      entry.health = entry.consecutiveFailures >= this.config.unhealthyAfterFailures
        ? ServerHealth.UNHEALTHY
        : ServerHealth.DEGRADED;
    }

    if (entry.health !== before) {
      const level = entry.health === ServerHealth.UNHEALTHY ? 'warn' : 'info';
      serverLog(serverId, `health ${before} -> ${entry.health} (${entry.consecutiveFailures} consecutive failures)`, level);
      if (entry.health === ServerHealth.HEALTHY) {
        this.drainWaiters();
      }
    }
    return entry.health;
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private take(tag: CapabilityTag, options: AcquireOptions): Lease {
    const server = this.select(tag, options.agentKind);
    const entry = this.registry.entry(server.config.id);
    entry.activeLeases++;
    this.advanceCursor(tag);

    let released = false;
    const onAbort = (): void => lease.release();
    const lease: Lease = {
      id: uuidv4(),
      serverId: server.config.id,
      capability: tag,
      acquiredAt: Date.now(),
      release: () => {
        if (released) return;
        released = true;
        options.signal?.removeEventListener('abort', onAbort);
        entry.activeLeases--;
        this.drainWaiters();
      },
    };

    if (options.signal) {
      if (options.signal.aborted) {
        lease.release();
      } else {
        options.signal.addEventListener('abort', onAbort, { once: true });
      }
    }
    return lease;
  }

  private waitForLease(tag: CapabilityTag, options: AcquireOptions, waitMs: number): Promise<Lease> {
    return new Promise<Lease>((resolve, reject) => {
      const timer = setTimeout(() => {
        remove();
        reject(new NoAvailableServerError(tag, [`no lease freed within ${waitMs}ms`]));
      }, waitMs);
      const onAbort = (): void => {
        remove();
        reject(new Error(`Lease wait for "${tag}" aborted`));
      };
      const waiter: LeaseWaiter = {
        tag,
        agentKind: options.agentKind,
        signal: options.signal,
        resolve,
        reject,
        cleanup: () => {
          clearTimeout(timer);
          options.signal?.removeEventListener('abort', onAbort);
        },
      };
      const remove = (): void => {
        waiter.cleanup();
        this.waiters = this.waiters.filter((w) => w !== waiter);
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private drainWaiters(): void {
    for (const waiter of [...this.waiters]) {
      let lease: Lease;
      try {
        lease = this.take(waiter.tag, { agentKind: waiter.agentKind, signal: waiter.signal });
      } catch (error) {
        if (error instanceof NoAvailableServerError) continue;
        throw error;
      }
      waiter.cleanup();
      this.waiters = this.waiters.filter((w) => w !== waiter);
      waiter.resolve(lease);
    }
  }

  private rank(tag: CapabilityTag, agentKind?: AgentKind): Ranking {
    const rejected: string[] = [];
    const eligible = this.registry.withCapability(tag).filter((server) => {
      if (server.health === ServerHealth.UNHEALTHY) {
        rejected.push(`${server.config.id}: unhealthy`);
        return false;
      }
      const { metrics } = server;
      if (metrics.samples > 0 && metrics.successRate < this.config.minSuccessRate) {
        rejected.push(`${server.config.id}: success rate ${metrics.successRate.toFixed(2)} below ${this.config.minSuccessRate}`);
        return false;
      }
      if (metrics.samples > 0 && metrics.averageLatencyMs > this.config.maxAverageLatencyMs) {
        rejected.push(`${server.config.id}: average latency ${metrics.averageLatencyMs}ms above ${this.config.maxAverageLatencyMs}ms`);
        return false;
      }
      return true;
    });

    const affinity = agentKind ? this.config.affinity[agentKind] ?? [] : [];
    const preferred = affinity
      .map((id) => eligible.find((s) => s.config.id === id))
      .filter((s): s is McpServerDescriptor => s !== undefined);
    const rest = eligible.filter((s) => !affinity.includes(s.config.id));

    return { ordered: [...preferred, ...this.orderByPriorityAndLoad(tag, rest)], rejected };
  }

  private orderByPriorityAndLoad(tag: CapabilityTag, servers: McpServerDescriptor[]): McpServerDescriptor[] {
    const sorted = [...servers].sort((a, b) =>
      a.config.priority - b.config.priority
      || a.activeLeases - b.activeLeases
      || a.config.id.localeCompare(b.config.id),
    );

    // Rotate each group of equally ranked servers by the tag's cursor.
    const cursor = this.cursors.get(tag) ?? 0;
    const result: McpServerDescriptor[] = [];
    let i = 0;
    while (i < sorted.length) {
      let j = i + 1;
      while (
        j < sorted.length
        && sorted[j].config.priority === sorted[i].config.priority
        && sorted[j].activeLeases === sorted[i].activeLeases
      ) {
        j++;
      }
      const group = sorted.slice(i, j);
      const offset = cursor % group.length;
      result.push(...group.slice(offset), ...group.slice(0, offset));
      i = j;
    }
    return result;
  }

  private advanceCursor(tag: CapabilityTag): void {
    this.cursors.set(tag, (this.cursors.get(tag) ?? 0) + 1);
  }
}
