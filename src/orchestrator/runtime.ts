import * as path from 'node:path';
import { type InferenceMode, type PcoConfig, loadConfig } from '../utils/config';
import { ServerRegistry } from '../mcp/server-registry';
import { ServerSelector } from '../mcp/selector';
import { CapabilityGateway } from '../mcp/capability-gateway';
import { HealthMonitor } from '../mcp/health-monitor';
import { StdioCapabilityInvoker } from '../mcp/stdio-invoker';
import { RunTracker } from '../tracker/run-tracker';
import { ClaudeCliProvider, type InferenceProvider, SimulationProvider } from './inference';
import { PromptChainEngine } from './chain-engine';

export interface RuntimeOptions {
  mode?: InferenceMode;
  model?: string;
  config?: PcoConfig;
  /** Start periodic health probes for configured servers. */
  monitorHealth?: boolean;
}

export interface ChainRuntime {
  config: PcoConfig;
  engine: PromptChainEngine;
  selector: ServerSelector;
  gateway: CapabilityGateway;
  monitor: HealthMonitor | null;
  tracker: RunTracker;
  close(): Promise<void>;
}

export function createInferenceProvider(projectPath: string, config: PcoConfig, options: RuntimeOptions = {}): InferenceProvider {
  const mode = options.mode ?? config.inference.mode;
  if (mode === 'simulation') {
    return new SimulationProvider();
  }
  return new ClaudeCliProvider({
    projectPath,
    claudePath: config.inference.claudePath,
    model: options.model ?? config.inference.model,
    timeoutMs: config.inference.timeoutMs,
  });
}

/** Wires config, MCP servers, inference and tracking into a ready engine. */
export function createRuntime(projectPath: string, options: RuntimeOptions = {}): ChainRuntime {
  const root = path.resolve(projectPath);
  const config = options.config ?? loadConfig(root);

  const registry = new ServerRegistry(config.servers);
  const selector = new ServerSelector(registry, config.selector);
  const invoker = config.servers.length > 0 ? new StdioCapabilityInvoker() : null;
  const gateway = new CapabilityGateway(selector, invoker);
  const tracker = new RunTracker(root);

  let monitor: HealthMonitor | null = null;
  if (invoker && options.monitorHealth) {
    monitor = new HealthMonitor(selector, invoker.probe);
    monitor.start();
  }

  const engine = new PromptChainEngine({
    config,
    inference: createInferenceProvider(root, config, options),
    gateway,
    tracker,
  });

  return {
    config,
    engine,
    selector,
    gateway,
    monitor,
    tracker,
    async close() {
      monitor?.stop();
      await invoker?.close();
    },
  };
}
