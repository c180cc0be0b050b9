import { v4 as uuidv4 } from 'uuid';
import { minimatch } from 'minimatch';
import {
  type AgentContextSubset,
  type AgentContribution,
  type AgentDescriptor,
  type AgentInstance,
  type AgentOutput,
  type AgentTask,
  type AggregatedResult,
  type ChainStageId,
  type ProjectContext,
  type SecondarySuggestion,
  AgentInstanceState,
  AgentKind,
} from '../types';
import { type BaseAgent } from '../agents/base-agent';
import { type CapabilityGateway } from '../mcp/capability-gateway';
import { type InferenceProvider } from '../orchestrator/inference';
import { getDomainSignals } from '../analyzer/context-analyzer';
import {
  AgentSpawnFailure,
  AgentTimeoutError,
  InstanceOwnershipError,
  PartialCoordinationFailureCode,
  toErrorMessage,
} from '../utils/errors';
import { deepFreeze } from '../utils/freeze';
import { agentLog, chainLog } from '../utils/logger';
import { ResultChannel } from './result-channel';
import { Semaphore } from './semaphore';

export const MAX_ATTEMPTS = 2;

export interface CoordinatorOptions {
  maxConcurrentAgents: number;
  agentTimeoutMs: number;
  cancellationGraceMs: number;
}

export interface CoordinatorDependencies {
  createAgent: (kind: AgentKind) => BaseAgent;
  inference: InferenceProvider;
  capabilities: CapabilityGateway | null;
}

export interface AwaitOptions {
  /** Overall deadline for the join; stragglers are aborted and count as failed. */
  timeoutMs?: number;
}

type InstanceMessage =
  | { instanceId: string; status: 'completed'; output: AgentOutput }
  | { instanceId: string; status: 'failed'; error: string }
  | { instanceId: string; status: 'cancelled' };

interface RunState {
  controller: AbortController;
  channel: ResultChannel<InstanceMessage>;
  executions: Map<string, Promise<void>>;
  instanceControllers: Map<string, AbortController>;
  expired: Set<string>;
}

class CancelledError extends Error {}

export class AgentCoordinator {
  private options: CoordinatorOptions;
  private deps: CoordinatorDependencies;
  private semaphore: Semaphore;
  private instances: Map<string, AgentInstance> = new Map();
  private runs: Map<string, RunState> = new Map();
  private settled: Map<string, InstanceMessage> = new Map();
  /** Run ids cancelled so far; kept after `release`. */
  private cancelled: Set<string> = new Set();

  constructor(options: CoordinatorOptions, deps: CoordinatorDependencies) {
    this.options = options;
    this.deps = deps;
    this.semaphore = new Semaphore(options.maxConcurrentAgents);
  }

  get activeCount(): number {
    return this.semaphore.inUse;
  }

  get queuedCount(): number {
    return this.semaphore.pending;
  }

  getInstance(instanceId: string): AgentInstance | undefined {
    return this.instances.get(instanceId);
  }

  /** Returns the instance when it belongs to `runId`; never hands it to another run. */
  claim(instanceId: string, runId: string): AgentInstance {
    const instance = this.instances.get(instanceId);
    if (!instance) {
      throw new Error(`Unknown agent instance: ${instanceId}`);
    }
    if (instance.runId !== runId) {
      throw new InstanceOwnershipError(instanceId, instance.runId, runId);
    }
    return instance;
  }

  spawn(
    runId: string,
    descriptors: AgentDescriptor[],
    task: Omit<AgentTask, 'id' | 'runId'>,
    context: ProjectContext | null,
  ): AgentInstance[] {
    if (this.cancelled.has(runId)) {
      throw new Error(`Run ${runId} has been cancelled`);
    }
    const run = this.runState(runId);

    return descriptors.map((descriptor) => {
      const instance: AgentInstance = {
        id: uuidv4(),
        runId,
        descriptor,
        task: { ...task, id: uuidv4(), runId },
        contextSubset: buildContextSubset(descriptor, context),
        state: AgentInstanceState.SPAWNED,
        attempts: 0,
        createdAt: new Date(),
      };
      this.instances.set(instance.id, instance);

      const execution = this.execute(instance, run).catch((error: unknown) => {
        // execute() reports every outcome on the channel; this only guards the bookkeeping.
        agentLog(descriptor.kind, `Coordinator error: ${toErrorMessage(error)}`, task.stage, 'error');
        run.channel.send({ instanceId: instance.id, status: 'failed', error: toErrorMessage(error) });
      });
      run.executions.set(instance.id, execution);
      return instance;
    });
  }

  /** Fan-in join: waits for a terminal message from every instance, then aggregates. */
  async await(
    runId: string,
    stage: ChainStageId,
    instances: AgentInstance[],
    options: AwaitOptions = {},
  ): Promise<AggregatedResult> {
    const byId = new Map(instances.map((instance) => [instance.id, this.claim(instance.id, runId)]));
    const run = this.runState(runId);
    const pendingIds = new Set(instances.map((i) => i.id).filter((id) => !this.settled.has(id)));

    let deadline: NodeJS.Timeout | undefined;
    if (options.timeoutMs !== undefined && pendingIds.size > 0) {
      deadline = setTimeout(() => {
        for (const [id, instance] of byId) {
          if (!pendingIds.has(id)) continue;
          run.expired.add(id);
          run.instanceControllers.get(id)?.abort(new AgentTimeoutError(instance.descriptor.kind, options.timeoutMs ?? 0));
        }
      }, options.timeoutMs);
    }

    try {
      while (pendingIds.size > 0) {
        const message = await run.channel.receive();
        this.settled.set(message.instanceId, message);
        pendingIds.delete(message.instanceId);
      }
    } finally {
      clearTimeout(deadline);
    }

    return this.aggregate(runId, stage, instances);
  }

  /**
   * Aborts every live instance of the run. Instances that do not settle
   * within the grace period are force-terminated.
   */
  async cancelRun(runId: string): Promise<void> {
    this.cancelled.add(runId);
    const run = this.runs.get(runId);
    if (!run) return;
    if (!run.controller.signal.aborted) {
      chainLog(`Cancelling agents of run ${runId.slice(0, 8)}`, 'warn');
      run.controller.abort();
    }
    await Promise.allSettled([...run.executions.values()]);
  }

  /** Drops bookkeeping for a finished run. A cancelled run stays cancelled. */
  release(runId: string): void {
    const run = this.runs.get(runId);
    if (!run) return;
    for (const instanceId of run.executions.keys()) {
      this.instances.delete(instanceId);
      this.settled.delete(instanceId);
    }
    run.channel.close();
    this.runs.delete(runId);
  }

  // ─── Execution ────────────────────────────────────────────────────────────

  private async execute(instance: AgentInstance, run: RunState): Promise<void> {
    const kind = instance.descriptor.kind;
    let release: () => void;
    try {
      release = await this.semaphore.acquire(run.controller.signal);
    } catch {
      this.finish(instance, run, { instanceId: instance.id, status: 'cancelled' });
      return;
    }

    try {
      let lastError = '';
      while (instance.attempts < MAX_ATTEMPTS) {
        if (run.expired.has(instance.id)) {
          lastError = lastError || `Agent ${kind} did not start before the join deadline`;
          break;
        }
        instance.attempts++;
        instance.state = AgentInstanceState.RUNNING;
        instance.startedAt = new Date();

        try {
          const output = await this.runAttempt(instance, run);
          this.finish(instance, run, { instanceId: instance.id, status: 'completed', output });
          return;
        } catch (error) {
          if (error instanceof CancelledError || run.controller.signal.aborted) {
            this.finish(instance, run, { instanceId: instance.id, status: 'cancelled' });
            return;
          }
          const failure = new AgentSpawnFailure(kind, instance.attempts, toErrorMessage(error));
          lastError = failure.message;
          agentLog(kind, failure.message, instance.task.stage, 'warn');
        }
      }
      this.finish(instance, run, { instanceId: instance.id, status: 'failed', error: lastError });
    } finally {
      release();
    }
  }

  private runAttempt(instance: AgentInstance, run: RunState): Promise<AgentOutput> {
    const kind = instance.descriptor.kind;
    const controller = new AbortController();
    run.instanceControllers.set(instance.id, controller);

    const agent = this.deps.createAgent(kind);
    const timers: NodeJS.Timeout[] = [];
    let onRunAbort: (() => void) | undefined;

    const guard = new Promise<never>((_, reject) => {
      timers.push(setTimeout(() => {
        const timeout = new AgentTimeoutError(kind, this.options.agentTimeoutMs);
        controller.abort(timeout);
        reject(timeout);
      }, this.options.agentTimeoutMs));

      controller.signal.addEventListener('abort', () => {
        const reason: unknown = controller.signal.reason;
        if (reason instanceof AgentTimeoutError) reject(reason);
      }, { once: true });

      onRunAbort = () => {
        controller.abort(new CancelledError('run cancelled'));
        timers.push(setTimeout(() => {
          agentLog(kind, `Force-terminated after ${this.options.cancellationGraceMs}ms grace`, instance.task.stage, 'warn');
          reject(new CancelledError('force terminated'));
        }, this.options.cancellationGraceMs));
      };
      if (run.controller.signal.aborted) {
        onRunAbort();
      } else {
        run.controller.signal.addEventListener('abort', onRunAbort, { once: true });
      }
    });

    const work = agent.execute(instance.task, instance.contextSubset, {
      inference: this.deps.inference,
      capabilities: this.deps.capabilities,
      signal: controller.signal,
    });

    return Promise.race([work, guard]).finally(() => {
      for (const timer of timers) clearTimeout(timer);
      if (onRunAbort) run.controller.signal.removeEventListener('abort', onRunAbort);
      run.instanceControllers.delete(instance.id);
      // Releases any capability lease still tied to this attempt.
      if (!controller.signal.aborted) controller.abort(new CancelledError('attempt settled'));
    });
  }

  private finish(instance: AgentInstance, run: RunState, message: InstanceMessage): void {
    instance.finishedAt = new Date();
    switch (message.status) {
      case 'completed':
        instance.state = AgentInstanceState.COMPLETED;
        agentLog(instance.descriptor.kind, `Completed after ${instance.attempts} attempt(s)`, instance.task.stage, 'debug');
        break;
      case 'failed':
        instance.state = AgentInstanceState.FAILED;
        instance.error = message.error;
        break;
      case 'cancelled':
        instance.state = AgentInstanceState.CANCELLED;
        break;
    }
    run.channel.send(message);
  }

  // ─── Aggregation ──────────────────────────────────────────────────────────

  private aggregate(runId: string, stage: ChainStageId, instances: AgentInstance[]): AggregatedResult {
    const ordered = [...instances].sort((a, b) =>
      a.descriptor.priority - b.descriptor.priority || a.descriptor.kind.localeCompare(b.descriptor.kind),
    );

    const contributions: AgentContribution[] = [];
    const suggestions: SecondarySuggestion[] = [];
    const cancelledKinds: AgentKind[] = [];
    const failedKinds: AgentKind[] = [];
    const errors: Record<string, string> = {};
    const owners = new Map<string, AgentKind>();

    for (const instance of ordered) {
      const message = this.settled.get(instance.id);
      const kind = instance.descriptor.kind;
      if (!message || message.status === 'cancelled') {
        cancelledKinds.push(kind);
        continue;
      }
      if (message.status === 'failed') {
        failedKinds.push(kind);
        errors[kind] = message.error;
        continue;
      }

      const kept = message.output.regions.filter((region) => {
        const owner = owners.get(region.key);
        if (owner) {
          suggestions.push({ kind, regionKey: region.key, heading: region.heading, content: region.content, supersededBy: owner });
          return false;
        }
        owners.set(region.key, kind);
        return true;
      });

      contributions.push({
        instanceId: instance.id,
        kind,
        priority: instance.descriptor.priority,
        regions: kept,
        confidenceReduced: message.output.confidenceReduced,
        capabilityNotes: message.output.capabilityNotes,
        tokensUsed: message.output.tokensUsed,
      });
    }

    if (failedKinds.length > 0) {
      chainLog(`${PartialCoordinationFailureCode}: dropped ${failedKinds.join(', ')}`, 'warn');
    }

    const mergedContent = contributions
      .flatMap((c) => c.regions.map((r) => `## ${r.heading}\n<!-- ${c.kind} -->\n\n${r.content}`))
      .join('\n\n');

    return {
      runId,
      stage,
      contributions,
      mergedContent,
      suggestions,
      cancelledKinds,
      partialFailure: failedKinds.length > 0 ? { failedKinds, errors } : null,
      confidenceReduced: contributions.some((c) => c.confidenceReduced),
    };
  }

  private runState(runId: string): RunState {
    let run = this.runs.get(runId);
    if (!run) {
      run = {
        controller: new AbortController(),
        channel: new ResultChannel<InstanceMessage>(),
        executions: new Map(),
        instanceControllers: new Map(),
        expired: new Set(),
      };
      this.runs.set(runId, run);
    }
    return run;
  }
}

export function buildContextSubset(descriptor: AgentDescriptor, context: ProjectContext | null): AgentContextSubset {
  if (!context) {
    return deepFreeze({
      contextVersion: 0,
      domain: descriptor.domain,
      domainScore: 0,
      directoryHits: {},
      keywordHits: {},
      frameworkHits: [],
    });
  }

  const directoryHits: Record<string, number> = {};
  for (const [dir, count] of Object.entries(context.directoryHits)) {
    if (descriptor.dirPatterns.some((pattern) => minimatch(dir, pattern, { nocase: true, dot: true }))) {
      directoryHits[dir] = count;
    }
  }

  const domainKeywords = new Set([...descriptor.domainKeywords, ...getDomainSignals(descriptor.domain).keywords]);
  const keywordHits: Record<string, number> = {};
  for (const [keyword, count] of Object.entries(context.keywordHits)) {
    if (domainKeywords.has(keyword)) {
      keywordHits[keyword] = count;
    }
  }

  const frameworks = new Set(getDomainSignals(descriptor.domain).frameworks);
  return deepFreeze({
    contextVersion: context.version,
    domain: descriptor.domain,
    domainScore: context.domainScores[descriptor.domain],
    directoryHits,
    keywordHits,
    frameworkHits: context.frameworkHits.filter((f) => frameworks.has(f)),
  });
}
