import { type McpServerConfig, ServerHealth } from '../types';
import { toErrorMessage } from '../utils/errors';
import { serverLog } from '../utils/logger';
import { type ServerSelector } from './selector';

export type HealthProbe = (server: McpServerConfig, signal: AbortSignal) => Promise<boolean>;

/**
 * Periodically probes every registered server on its own interval and feeds
 * the outcome into the selector.
 */
export class HealthMonitor {
  private timers: Map<string, NodeJS.Timeout> = new Map();
  private inFlight: Map<string, Promise<ServerHealth>> = new Map();

  constructor(
    private readonly selector: ServerSelector,
    private readonly probe: HealthProbe,
  ) {}

  start(): void {
    for (const server of this.selector.serverRegistry.list()) {
      const { id, healthCheck } = server.config;
      if (this.timers.has(id)) continue;
      const timer = setInterval(() => {
        this.checkNow(id).catch((error: unknown) => {
          serverLog(id, `health check crashed: ${toErrorMessage(error)}`, 'error');
        });
      }, healthCheck.intervalMs);
      timer.unref();
      this.timers.set(id, timer);
    }
  }

  stop(): void {
    for (const timer of this.timers.values()) {
      clearInterval(timer);
    }
    this.timers.clear();
  }

  get running(): boolean {
    return this.timers.size > 0;
  }

  /** Runs one probe; a timeout or a thrown error counts as a failure. */
  checkNow(serverId: string): Promise<ServerHealth> {
    const pending = this.inFlight.get(serverId);
    if (pending) return pending;

    const check = this.runProbe(serverId).finally(() => {
      this.inFlight.delete(serverId);
    });
    this.inFlight.set(serverId, check);
    return check;
  }

  private async runProbe(serverId: string): Promise<ServerHealth> {
    const { config } = this.selector.serverRegistry.describe(serverId);
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(false);
      }, config.healthCheck.timeoutMs);
    });

    let healthy: boolean;
    try {
      healthy = await Promise.race([this.probe(config, controller.signal), timeout]);
    } catch (error) {
      serverLog(serverId, `probe failed: ${toErrorMessage(error)}`, 'debug');
      healthy = false;
    } finally {
      clearTimeout(timer);
    }

    return this.selector.recordHealthCheck(serverId, healthy);
  }
}
