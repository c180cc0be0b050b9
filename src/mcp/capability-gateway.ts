import {
  type AgentKind,
  type CapabilityOutcome,
  type CapabilityRequest,
  type CapabilityResponse,
  type CapabilityTag,
  type McpServerConfig,
} from '../types';
import { CapabilityExhaustedError, NoAvailableServerError, toErrorMessage } from '../utils/errors';
import { serverLog } from '../utils/logger';
import { type CapabilityFallback, DEFAULT_FALLBACKS } from './fallbacks';
import { type Lease, type ServerSelector } from './selector';

export interface CapabilityInvoker {
  invoke(server: McpServerConfig, request: CapabilityRequest, signal?: AbortSignal): Promise<CapabilityResponse>;
}

export interface InvokeOptions {
  agentKind?: AgentKind;
  signal?: AbortSignal;
  /** A required capability with neither a server nor a fallback is fatal. */
  required?: boolean;
  waitMs?: number;
}

/**
 * Single entry point for capability calls: selection, lease, invocation and
 * the degraded fallback when no server can answer.
 */
export class CapabilityGateway {
  private selector: ServerSelector;
  private invoker: CapabilityInvoker | null;
  private fallbacks: Partial<Record<CapabilityTag, CapabilityFallback>>;

  constructor(
    selector: ServerSelector,
    invoker: CapabilityInvoker | null,
    fallbacks: Partial<Record<CapabilityTag, CapabilityFallback>> = DEFAULT_FALLBACKS,
  ) {
    this.selector = selector;
    this.invoker = invoker;
    this.fallbacks = fallbacks;
  }

  async invoke(request: CapabilityRequest, options: InvokeOptions = {}): Promise<CapabilityOutcome> {
    const reason = await this.tryServer(request, options);
    if (reason.outcome) {
      return reason.outcome;
    }
    return this.fallback(request, options, reason.message);
  }

  private async tryServer(
    request: CapabilityRequest,
    options: InvokeOptions,
  ): Promise<{ outcome?: CapabilityOutcome; message: string }> {
    const tag = request.capability;
    if (!this.invoker) {
      return { message: 'no invoker configured' };
    }

    let lease: Lease;
    try {
      lease = await this.selector.acquire(tag, {
        agentKind: options.agentKind,
        waitMs: options.waitMs,
        signal: options.signal,
      });
    } catch (error) {
      if (error instanceof NoAvailableServerError) {
        return { message: error.message };
      }
      throw error;
    }

    const server = this.selector.serverRegistry.describe(lease.serverId);
    const started = Date.now();
    try {
      const response = await this.invoker.invoke(server.config, request, options.signal);
      this.selector.recordCall(lease.serverId, { latencyMs: response.latencyMs, success: response.success });
      if (!response.success) {
        return { message: `${lease.serverId} reported failure` };
      }
      return {
        message: 'ok',
        outcome: {
          capability: tag,
          serverId: lease.serverId,
          result: response.result,
          confidenceReduced: false,
          fallback: null,
        },
      };
    } catch (error) {
      this.selector.recordCall(lease.serverId, { latencyMs: Date.now() - started, success: false });
      serverLog(lease.serverId, `call for ${tag} failed: ${toErrorMessage(error)}`, 'warn');
      return { message: `${lease.serverId} call failed: ${toErrorMessage(error)}` };
    } finally {
      lease.release();
    }
  }

  private fallback(request: CapabilityRequest, options: InvokeOptions, reason: string): CapabilityOutcome {
    const tag = request.capability;
    const handler = this.fallbacks[tag];
    if (!handler) {
      if (options.required) {
        throw new CapabilityExhaustedError(tag);
      }
      serverLog('-', `capability ${tag} unavailable (${reason}); continuing without it`, 'warn');
      return { capability: tag, serverId: null, result: null, confidenceReduced: true, fallback: null };
    }

    serverLog('-', `capability ${tag} unavailable (${reason}); using ${handler.name} fallback`, 'warn');
    return {
      capability: tag,
      serverId: null,
      result: handler.handle(request),
      confidenceReduced: true,
      fallback: handler.name,
    };
  }
}
