import { QualityGateFramework, type QualityGateOptions } from '../../src/gates/quality-gates';
import {
  BUILT_IN_CHECKERS,
  securityChecker,
  testabilityChecker,
  traceabilityChecker,
  documentationChecker,
  type GateCheck,
  type GateChecker,
  type GateInput,
} from '../../src/gates/checkers';
import { getDefaultGateConfigs } from '../../src/gates/gate-definitions';
import { getStageConfig, getStageGates } from '../../src/pipeline/stages';
import { GateConfigurationError } from '../../src/utils/errors';
import {
  type GateConfig,
  CapabilityTag,
  ChainStageId,
  GateStatus,
} from '../../src/types';

const FILLER =
  'This section explains the intended behaviour in enough detail for reviewers to follow the reasoning ' +
  'and check every assumption against the goals stated earlier in the document today.';

function document(headings: string[], extra: Record<string, string> = {}): string {
  return headings.map((h) => `## ${h}\n\n${extra[h] ?? FILLER}`).join('\n\n');
}

function stageInput(stage: ChainStageId, content: string, previousOutput: string | null = null): GateInput {
  return {
    stage,
    content,
    previousOutput,
    requiredSections: getStageConfig(stage).outputFormat.requiredSections,
    context: null,
  };
}

function framework(
  options: Partial<QualityGateOptions> = {},
  checkers: GateChecker[] = BUILT_IN_CHECKERS,
  gates: GateConfig[] = getDefaultGateConfigs(),
): QualityGateFramework {
  return new QualityGateFramework(
    gates,
    { strategy: 'parallel', maxParallelGates: 3, boundaryPolicy: 'inclusive', ...options },
    null,
    checkers,
  );
}

function fixedChecker(id: string, score: number): GateChecker {
  return { id, version: 'test', check: async () => ({ score, findings: [`fixed ${score}`] }) };
}

function customGate(overrides: Partial<GateConfig> & { id: string }): GateConfig {
  return {
    name: overrides.id,
    requiredCapabilityTags: [],
    threshold: 0.7,
    timeoutMs: 1000,
    required: true,
    dependsOn: [],
    ...overrides,
  };
}

const IDEA_CONTENT = document(getStageConfig(ChainStageId.IDEA_DEFINITION).outputFormat.requiredSections);

describe('QualityGateFramework', () => {
  describe('plan', () => {
    it('expands transitive dependencies in dependency order', () => {
      expect(framework().plan(['testability']).map((g) => g.id)).toEqual(['structure', 'completeness', 'testability']);
    });

    it('plans each gate once', () => {
      expect(framework().plan(['completeness', 'traceability', 'structure']).map((g) => g.id))
        .toEqual(['structure', 'completeness', 'traceability']);
    });

    it('rejects an unknown gate', () => {
      expect(() => framework().plan(['ghost'])).toThrow(GateConfigurationError);
    });

    it('rejects dependency cycles at construction', () => {
      const gates = [
        ...getDefaultGateConfigs(),
        customGate({ id: 'a', dependsOn: ['b'] }),
        customGate({ id: 'b', dependsOn: ['a'] }),
      ];
      expect(() => framework({}, BUILT_IN_CHECKERS, gates)).toThrow(/Gate dependency cycle: a -> b -> a/);
    });

    it('rejects unknown dependencies at construction', () => {
      const gates = [...getDefaultGateConfigs(), customGate({ id: 'a', dependsOn: ['missing'] })];
      expect(() => framework({}, BUILT_IN_CHECKERS, gates)).toThrow(GateConfigurationError);
    });
  });

  describe('run', () => {
    it('passes a complete idea definition', async () => {
      const results = await framework().run(stageInput(ChainStageId.IDEA_DEFINITION, IDEA_CONTENT), {
        gateIds: getStageGates(ChainStageId.IDEA_DEFINITION),
      });
      expect(results.map((r) => [r.gateId, r.status, r.score])).toEqual([
        ['structure', GateStatus.PASSED, 1],
        ['completeness', GateStatus.PASSED, 1],
      ]);
    });

    it('blocks the stage when a required security gate scores below its threshold', async () => {
      const checkers = [
        ...BUILT_IN_CHECKERS.filter((c) => c.id !== 'security'),
        fixedChecker('security', 0.8),
      ];
      const gates = framework({}, checkers);
      const trd = getStageConfig(ChainStageId.TRD);
      const results = await gates.run(stageInput(ChainStageId.TRD, document(trd.outputFormat.requiredSections)), {
        gateIds: getStageGates(ChainStageId.TRD),
        requiredGateIds: trd.requiredGates,
      });

      const security = results.find((r) => r.gateId === 'security');
      expect(security).toMatchObject({ status: GateStatus.FAILED, score: 0.8, threshold: 0.95, required: true });

      const summary = gates.summarize(results);
      expect(summary.blocking.map((r) => r.gateId)).toEqual(['security']);
    });

    it('halts sequential runs after a required failure', async () => {
      const results = await framework({ strategy: 'sequential' }).run(
        stageInput(ChainStageId.IDEA_DEFINITION, '## Problem Statement\n\nToo short.'),
        { gateIds: ['structure', 'completeness'] },
      );
      expect(results.map((r) => [r.gateId, r.status])).toEqual([
        ['structure', GateStatus.FAILED],
        ['completeness', GateStatus.SKIPPED],
      ]);
      expect(results[0].score).toBe(0.25);
      expect(results[0].findings).toEqual([
        'Missing section "Target Users"',
        'Missing section "Value Proposition"',
        'Missing section "Success Metrics"',
      ]);
    });

    it('blocks dependents of a failed gate in parallel runs', async () => {
      const results = await framework().run(
        stageInput(ChainStageId.IDEA_DEFINITION, '## Problem Statement\n\nToo short.'),
        { gateIds: ['completeness'] },
      );
      expect(results[1]).toMatchObject({
        gateId: 'completeness',
        status: GateStatus.BLOCKED,
        findings: ['Blocked by unmet dependencies: structure'],
      });
    });

    it('blocks a gate whose optional dependency only warns', async () => {
      const checkers = [fixedChecker('draft', 0.1), fixedChecker('review', 1)];
      const gates = [
        customGate({ id: 'draft', threshold: 0.8, required: false }),
        customGate({ id: 'review', dependsOn: ['draft'] }),
      ];
      const results = await framework({}, checkers, gates).run(
        stageInput(ChainStageId.IDEA_DEFINITION, IDEA_CONTENT),
        { gateIds: ['review'] },
      );

      expect(results.map((r) => [r.gateId, r.status])).toEqual([
        ['draft', GateStatus.WARNING],
        ['review', GateStatus.BLOCKED],
      ]);
      expect(results[1].findings).toEqual(['Blocked by unmet dependencies: draft']);
    });

    it('downgrades failures of optional gates to warnings', async () => {
      const results = await framework().run(
        stageInput(ChainStageId.PRD, document(getStageConfig(ChainStageId.PRD).outputFormat.requiredSections)),
        { gateIds: ['testability'], requiredGateIds: ['structure', 'completeness'] },
      );
      const testability = results.find((r) => r.gateId === 'testability');
      expect(testability?.status).toBe(GateStatus.WARNING);
      expect(testability?.findings).toEqual(['No list items to verify']);
    });

    it('makes an optional gate blocking when the stage requires it', async () => {
      const results = await framework().run(
        stageInput(ChainStageId.PRD, document(getStageConfig(ChainStageId.PRD).outputFormat.requiredSections)),
        { gateIds: ['testability'], requiredGateIds: ['structure', 'completeness', 'testability'] },
      );
      expect(results.find((r) => r.gateId === 'testability')?.status).toBe(GateStatus.FAILED);
    });

    it('uses the stage gate map under the adaptive strategy', async () => {
      const results = await framework({ strategy: 'adaptive' }).run(
        stageInput(ChainStageId.PRD, ''),
        { gateIds: ['structure'] },
      );
      expect(results.map((r) => r.gateId)).toEqual(['structure', 'completeness', 'traceability', 'testability']);
    });

    it('applies the boundary policy at the threshold', async () => {
      const checkers = [fixedChecker('structure', 0.8)];
      const gates = [customGate({ id: 'structure', threshold: 0.8 })];
      const input = stageInput(ChainStageId.IDEA_DEFINITION, IDEA_CONTENT);

      const inclusive = await framework({ boundaryPolicy: 'inclusive' }, checkers, gates).run(input, { gateIds: ['structure'] });
      const exclusive = await framework({ boundaryPolicy: 'exclusive' }, checkers, gates).run(input, { gateIds: ['structure'] });
      expect(inclusive[0].status).toBe(GateStatus.PASSED);
      expect(exclusive[0].status).toBe(GateStatus.FAILED);
    });

    it('fails a gate whose checker times out', async () => {
      const hanging: GateChecker = { id: 'slow', version: 'test', check: () => new Promise<GateCheck>(() => undefined) };
      const gates = framework();
      gates.registerGate(customGate({ id: 'slow', timeoutMs: 20 }), hanging);

      const results = await gates.run(stageInput(ChainStageId.IDEA_DEFINITION, IDEA_CONTENT), { gateIds: ['slow'] });
      expect(results[0]).toMatchObject({
        gateId: 'slow',
        status: GateStatus.FAILED,
        score: 0,
        findings: ['Gate slow timed out after 20ms'],
      });
    });

    it('scores a crashing checker as zero', async () => {
      const broken: GateChecker = { id: 'broken', version: 'test', check: async () => { throw new Error('boom'); } };
      const gates = framework();
      gates.registerGate(customGate({ id: 'broken', required: false }), broken);

      const results = await gates.run(stageInput(ChainStageId.IDEA_DEFINITION, IDEA_CONTENT), { gateIds: ['broken'] });
      expect(results[0]).toMatchObject({ status: GateStatus.WARNING, score: 0, findings: ['boom'] });
    });

    it('is idempotent for identical input', async () => {
      const gates = framework();
      const input = stageInput(ChainStageId.IDEA_DEFINITION, IDEA_CONTENT);
      const request = { gateIds: getStageGates(ChainStageId.IDEA_DEFINITION) };

      const first = await gates.run(input, request);
      const second = await gates.run(input, request);
      expect(second.map((r) => [r.gateId, r.status, r.score, r.inputHash]))
        .toEqual(first.map((r) => [r.gateId, r.status, r.score, r.inputHash]));

      const changed = await gates.run({ ...input, content: `${IDEA_CONTENT}\n\nMore.` }, request);
      expect(changed[0].inputHash).not.toBe(first[0].inputHash);
    });

    it('returns frozen results', async () => {
      const results = await framework().run(stageInput(ChainStageId.IDEA_DEFINITION, IDEA_CONTENT), { gateIds: ['structure'] });
      expect(Object.isFrozen(results[0])).toBe(true);
      expect(Object.isFrozen(results[0].findings)).toBe(true);
    });
  });
});

describe('built-in checkers', () => {
  const signal = new AbortController().signal;

  it('penalizes risky security practices', async () => {
    const check = await securityChecker.check(
      stageInput(ChainStageId.TRD, 'authentication, authorization, encryption and validation; hardcoded secrets in config'),
      { signal },
    );
    expect(check.score).toBe(0.75);
    expect(check.findings).toEqual(['Risky practice mentioned: hardcoded credentials']);
  });

  it('scores testability by measurable list items', async () => {
    const check = await testabilityChecker.check(
      stageInput(ChainStageId.USER_STORY, '- Responds within 200ms\n- Looks nice'),
      { signal },
    );
    expect(check.score).toBe(0.5);
    expect(check.findings).toEqual(['Not measurable: "Looks nice"']);
  });

  it('scores traceability by key terms carried forward', async () => {
    const check = await traceabilityChecker.check(
      stageInput(ChainStageId.PRD, 'Billing flows only', 'billing billing invoice'),
      { signal },
    );
    expect(check.score).toBe(0.5);
    expect(check.findings).toEqual(['Terms from the previous stage not carried forward: invoice']);
  });

  it('averages the local documentation score with a server score', async () => {
    const check = await documentationChecker.check(
      stageInput(ChainStageId.TRD, document(['Architecture'])),
      {
        signal,
        invokeCapability: async (request) => ({
          capability: request.capability,
          serverId: 'docs-primary',
          result: { score: 0.6 },
          confidenceReduced: false,
          fallback: null,
        }),
      },
    );
    expect(check.score).toBe(0.8);
    expect(check.breakdown).toEqual([
      { source: 'tool', name: 'paragraph-density', version: '1.0.0', score: 1 },
      { source: 'server', name: 'docs-primary', version: 'mcp', score: 0.6 },
    ]);
  });

  it('keeps the local documentation score when only a fallback answered', async () => {
    const check = await documentationChecker.check(
      stageInput(ChainStageId.TRD, document(['Architecture'])),
      {
        signal,
        invokeCapability: async (request) => ({
          capability: request.capability,
          serverId: null,
          result: 'generic answer',
          confidenceReduced: true,
          fallback: 'generic-search',
        }),
      },
    );
    expect(check.score).toBe(1);
    expect(check.confidenceReduced).toBe(true);
    expect(check.findings).toEqual(['Documentation capability answered by generic-search; local score only']);
  });

  it('declares the documentation capability on the documentation gate', () => {
    const gate = getDefaultGateConfigs().find((g) => g.id === 'documentation');
    expect(gate?.requiredCapabilityTags).toEqual([CapabilityTag.DOCUMENTATION]);
  });
});
