import { AgentCoordinator, MAX_ATTEMPTS, buildContextSubset } from '../../src/coordination/coordinator';
import { AgentRegistry, getAgentDescriptor } from '../../src/agents';
import { CapabilityGateway } from '../../src/mcp/capability-gateway';
import { ServerRegistry } from '../../src/mcp/server-registry';
import { ServerSelector } from '../../src/mcp/selector';
import { type InferenceProvider, type InferenceRequest, type InferenceResponse } from '../../src/orchestrator/inference';
import { getDefaultConfig } from '../../src/utils/config';
import { InstanceOwnershipError } from '../../src/utils/errors';
import {
  type AgentTask,
  type ProjectContext,
  AgentInstanceState,
  AgentKind,
  ChainStageId,
  Domain,
  WavePhase,
} from '../../src/types';

class ScriptedInference implements InferenceProvider {
  readonly name = 'scripted';
  calls: InferenceRequest[] = [];

  constructor(private readonly script: (request: InferenceRequest, call: number) => Promise<string>) {}

  async generate(request: InferenceRequest): Promise<InferenceResponse> {
    this.calls.push(request);
    const content = await this.script(request, this.calls.length);
    return { content, tokensUsed: 10, provider: this.name };
  }
}

const TASK: Omit<AgentTask, 'id' | 'runId'> = {
  stage: ChainStageId.TRD,
  title: 'Technical requirements',
  instructions: 'Describe the system',
  input: '# PRD\n\nA billing service.',
  wave: WavePhase.SINGLE,
};

const CONTENT: Partial<Record<AgentKind, string>> = {
  [AgentKind.SECURITY]: '## Overview\nsecure text\n## Risks\nrisk',
  [AgentKind.ARCHITECT]: '## Overview\narch text\n## Components\nparts',
  [AgentKind.BACKEND]: '## API Design\nendpoints',
};

function contentFor(request: InferenceRequest): string {
  return (request.agentKind && CONTENT[request.agentKind]) ?? '## Notes\nnothing';
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function coordinator(
  inference: InferenceProvider,
  options: Partial<{ maxConcurrentAgents: number; agentTimeoutMs: number; cancellationGraceMs: number }> = {},
  capabilities: CapabilityGateway | null = null,
): AgentCoordinator {
  const registry = new AgentRegistry();
  return new AgentCoordinator(
    { maxConcurrentAgents: 4, agentTimeoutMs: 1_000, cancellationGraceMs: 20, ...options },
    { createAgent: (kind) => registry.create(kind), inference, capabilities },
  );
}

const descriptors = (...kinds: AgentKind[]) => kinds.map(getAgentDescriptor);

describe('AgentCoordinator', () => {
  it('aggregates by priority regardless of completion order', async () => {
    const inference = new ScriptedInference(async (request) => {
      if (request.agentKind === AgentKind.SECURITY) await delay(20);
      return contentFor(request);
    });
    const coord = coordinator(inference);
    const instances = coord.spawn('run-1', descriptors(AgentKind.ARCHITECT, AgentKind.SECURITY), TASK, null);
    const result = await coord.await('run-1', ChainStageId.TRD, instances);

    expect(result.contributions.map((c) => c.kind)).toEqual([AgentKind.SECURITY, AgentKind.ARCHITECT]);
    expect(result.contributions[1].regions.map((r) => r.heading)).toEqual(['Components']);
    expect(result.suggestions).toEqual([{
      kind: AgentKind.ARCHITECT,
      regionKey: 'overview',
      heading: 'Overview',
      content: 'arch text',
      supersededBy: AgentKind.SECURITY,
    }]);
    expect(result.mergedContent).toBe([
      '## Overview\n<!-- security -->\n\nsecure text',
      '## Risks\n<!-- security -->\n\nrisk',
      '## Components\n<!-- architect -->\n\nparts',
    ].join('\n\n'));
    expect(result.partialFailure).toBeNull();
    expect(result.confidenceReduced).toBe(false);
  });

  it('produces the same aggregation on repeated runs', async () => {
    const run = async (runId: string) => {
      const coord = coordinator(new ScriptedInference(async (request) => contentFor(request)));
      const instances = coord.spawn(runId, descriptors(AgentKind.BACKEND, AgentKind.ARCHITECT, AgentKind.SECURITY), TASK, null);
      return coord.await(runId, ChainStageId.TRD, instances);
    };
    const a = await run('run-a');
    const b = await run('run-b');
    expect(a.mergedContent).toBe(b.mergedContent);
    expect(a.suggestions).toEqual(b.suggestions);
  });

  it('retries a failed attempt once', async () => {
    const inference = new ScriptedInference(async (request, call) => {
      if (call === 1) throw new Error('flaky');
      return contentFor(request);
    });
    const coord = coordinator(inference);
    const [instance] = coord.spawn('run-1', descriptors(AgentKind.BACKEND), TASK, null);
    const result = await coord.await('run-1', ChainStageId.TRD, [instance]);

    expect(inference.calls).toHaveLength(2);
    expect(instance.attempts).toBe(2);
    expect(instance.state).toBe(AgentInstanceState.COMPLETED);
    expect(result.contributions.map((c) => c.kind)).toEqual([AgentKind.BACKEND]);
  });

  it('reports a partial failure after the last attempt', async () => {
    const inference = new ScriptedInference(async (request) => {
      if (request.agentKind === AgentKind.BACKEND) throw new Error('boom');
      return contentFor(request);
    });
    const coord = coordinator(inference);
    const instances = coord.spawn('run-1', descriptors(AgentKind.BACKEND, AgentKind.ARCHITECT), TASK, null);
    const result = await coord.await('run-1', ChainStageId.TRD, instances);

    expect(result.contributions.map((c) => c.kind)).toEqual([AgentKind.ARCHITECT]);
    expect(result.partialFailure).toEqual({
      failedKinds: [AgentKind.BACKEND],
      errors: { [AgentKind.BACKEND]: `Agent backend failed on attempt ${MAX_ATTEMPTS}: boom` },
    });
    expect(instances[0].state).toBe(AgentInstanceState.FAILED);
  });

  it('times out an agent that never answers', async () => {
    const inference = new ScriptedInference(() => new Promise<string>(() => undefined));
    const coord = coordinator(inference, { agentTimeoutMs: 30 });
    const instances = coord.spawn('run-1', descriptors(AgentKind.FRONTEND), TASK, null);
    const result = await coord.await('run-1', ChainStageId.TRD, instances);

    expect(result.partialFailure?.errors[AgentKind.FRONTEND])
      .toBe('Agent frontend failed on attempt 2: Agent frontend did not finish within 30ms');
  });

  it('cancels live agents of a run', async () => {
    const inference = new ScriptedInference(() => new Promise<string>(() => undefined));
    const coord = coordinator(inference, { cancellationGraceMs: 10 });
    const instances = coord.spawn('run-1', descriptors(AgentKind.SCRIBE, AgentKind.ANALYZER), TASK, null);
    await delay(5);
    await coord.cancelRun('run-1');
    const result = await coord.await('run-1', ChainStageId.TRD, instances);

    expect(result.cancelledKinds).toEqual([AgentKind.ANALYZER, AgentKind.SCRIBE]);
    expect(result.contributions).toEqual([]);
    expect(instances.map((i) => i.state)).toEqual([AgentInstanceState.CANCELLED, AgentInstanceState.CANCELLED]);
    expect(() => coord.spawn('run-1', descriptors(AgentKind.SCRIBE), TASK, null)).toThrow('Run run-1 has been cancelled');
  });

  it('refuses to spawn for a cancelled run after its bookkeeping is released', async () => {
    const inference = new ScriptedInference(async (request) => contentFor(request));
    const coord = coordinator(inference);
    await coord.cancelRun('run-1');
    coord.release('run-1');

    expect(() => coord.spawn('run-1', descriptors(AgentKind.BACKEND), TASK, null)).toThrow('Run run-1 has been cancelled');
    expect(inference.calls).toEqual([]);
    expect(coord.activeCount).toBe(0);
  });

  it('limits concurrent agents', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const inference = new ScriptedInference(async (request) => {
      await gate;
      return contentFor(request);
    });
    const coord = coordinator(inference, { maxConcurrentAgents: 1 });
    const instances = coord.spawn('run-1', descriptors(AgentKind.BACKEND, AgentKind.ARCHITECT), TASK, null);
    await delay(5);
    expect(coord.activeCount).toBe(1);
    expect(coord.queuedCount).toBe(1);

    release();
    const result = await coord.await('run-1', ChainStageId.TRD, instances);
    expect(result.contributions).toHaveLength(2);
    expect(coord.activeCount).toBe(0);
  });

  it('never hands an instance to another run', () => {
    const coord = coordinator(new ScriptedInference(async (request) => contentFor(request)));
    const [instance] = coord.spawn('run-1', descriptors(AgentKind.BACKEND), TASK, null);
    expect(coord.claim(instance.id, 'run-1')).toBe(instance);
    expect(() => coord.claim(instance.id, 'run-2')).toThrow(InstanceOwnershipError);
  });

  it('drops bookkeeping on release', async () => {
    const coord = coordinator(new ScriptedInference(async (request) => contentFor(request)));
    const instances = coord.spawn('run-1', descriptors(AgentKind.BACKEND), TASK, null);
    await coord.await('run-1', ChainStageId.TRD, instances);
    coord.release('run-1');
    expect(coord.getInstance(instances[0].id)).toBeUndefined();
  });

  it('marks output with reduced confidence when capabilities fall back', async () => {
    const selector = new ServerSelector(new ServerRegistry([]), getDefaultConfig().selector);
    const gateway = new CapabilityGateway(selector, null);
    const coord = coordinator(new ScriptedInference(async (request) => contentFor(request)), {}, gateway);
    const instances = coord.spawn('run-1', descriptors(AgentKind.SCRIBE), TASK, null);
    const result = await coord.await('run-1', ChainStageId.TRD, instances);

    expect(result.confidenceReduced).toBe(true);
    expect(result.contributions[0].capabilityNotes).toEqual([
      'documentation unavailable, used generic-search fallback',
      'test-automation unavailable, used manual-checklist fallback',
    ]);
  });
});

describe('buildContextSubset', () => {
  const context: ProjectContext = {
    version: 3,
    rootPath: '/project',
    generatedAt: '2026-01-01T00:00:00.000Z',
    domainScores: {
      [Domain.FRONTEND]: 0.1,
      [Domain.BACKEND]: 0.2,
      [Domain.SECURITY]: 0,
      [Domain.PERFORMANCE]: 0,
      [Domain.ARCHITECTURE]: 0,
      [Domain.ANALYSIS]: 0,
      [Domain.DOCUMENTATION]: 0.4,
    },
    extensionHistogram: {},
    directoryHits: { docs: 2, src: 3 },
    keywordHits: { readme: 1, router: 4 },
    frameworkHits: ['react'],
    filesScanned: 12,
    unreadablePaths: [],
  };

  it('keeps only the signals of the agent domain', () => {
    const subset = buildContextSubset(getAgentDescriptor(AgentKind.SCRIBE), context);
    expect(subset).toEqual({
      contextVersion: 3,
      domain: Domain.DOCUMENTATION,
      domainScore: 0.4,
      directoryHits: { docs: 2 },
      keywordHits: { readme: 1 },
      frameworkHits: [],
    });
    expect(Object.isFrozen(subset)).toBe(true);
  });

  it('returns an empty subset without a context', () => {
    expect(buildContextSubset(getAgentDescriptor(AgentKind.BACKEND), null)).toEqual({
      contextVersion: 0,
      domain: Domain.BACKEND,
      domainScore: 0,
      directoryHits: {},
      keywordHits: {},
      frameworkHits: [],
    });
  });
});
