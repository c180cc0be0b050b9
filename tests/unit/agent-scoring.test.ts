import {
  AgentScoringEngine,
  SCORING_WEIGHTS,
  decide,
  extractPathMentions,
} from '../../src/scoring/agent-scoring';
import { getAllAgentDescriptors, getAgentDescriptor } from '../../src/agents';
import {
  type ProjectContext,
  AgentKind,
  ChainStageId,
  Domain,
  SpawnDecision,
} from '../../src/types';
import { type ScoringOptions } from '../../src/scoring/agent-scoring';

const DEFAULT_OPTIONS: ScoringOptions = {
  boundaryPolicy: 'inclusive',
  suggestThreshold: 0.7,
  stageThresholds: {},
};

function makeContext(
  scores: Partial<Record<Domain, number>> = {},
  directoryHits: Record<string, number> = {},
): ProjectContext {
  return {
    version: 1,
    rootPath: '/project',
    generatedAt: '2026-01-01T00:00:00.000Z',
    domainScores: {
      [Domain.FRONTEND]: 0,
      [Domain.BACKEND]: 0,
      [Domain.SECURITY]: 0,
      [Domain.PERFORMANCE]: 0,
      [Domain.ARCHITECTURE]: 0,
      [Domain.ANALYSIS]: 0,
      [Domain.DOCUMENTATION]: 0,
      ...scores,
    },
    extensionHistogram: {},
    directoryHits,
    keywordHits: {},
    frameworkHits: [],
    filesScanned: 10,
    unreadablePaths: [],
  };
}

function engine(options: Partial<ScoringOptions> = {}): AgentScoringEngine {
  return new AgentScoringEngine(getAllAgentDescriptors(), { ...DEFAULT_OPTIONS, ...options });
}

describe('AgentScoringEngine', () => {
  it('uses weights that sum to one', () => {
    const sum = Object.values(SCORING_WEIGHTS).reduce((a, b) => a + b, 0);
    expect(sum).toBeCloseTo(1, 9);
  });

  describe('scoreAgent', () => {
    it('auto-spawns the frontend agent for component work in a frontend project', () => {
      const result = engine().scoreAgent(
        getAgentDescriptor(AgentKind.FRONTEND),
        ChainStageId.TRD,
        'Build a react component in /components/',
        makeContext({ [Domain.FRONTEND]: 0.2 }, { components: 1 }),
      );

      expect(result.subScores.stageRequirement.value).toBe(1);
      expect(result.subScores.contentAnalysis.value).toBe(1);
      expect(result.subScores.context.value).toBe(0.7);
      expect(result.subScores.preference.value).toBe(0.5);
      expect(result.total).toBe(0.905);
      expect(result.decision).toBe(SpawnDecision.AUTO_SPAWN);
      expect(result.boundaryTie).toBe(false);
      expect(result.matchedSignals).toEqual([
        'stage:optional',
        'stage:affinity',
        'keyword:component',
        'keyword:react',
        'path:components',
        'context:components',
      ]);
    });

    it('matches keywords as whole words only', () => {
      const frontend = getAgentDescriptor(AgentKind.FRONTEND);
      const nearMisses = engine().scoreAgent(
        frontend,
        ChainStageId.TRD,
        'Define the output format of the formal uint64 report pagination',
        null,
      );
      expect(nearMisses.matchedSignals).toEqual(['stage:optional', 'stage:affinity']);
      expect(nearMisses.subScores.contentAnalysis.value).toBe(0);
      expect(nearMisses.total).toBe(0.45);
      expect(nearMisses.decision).toBe(SpawnDecision.SKIP);

      const plural = engine().scoreAgent(frontend, ChainStageId.TRD, 'Validate the signup forms in the UI', null);
      expect(plural.matchedSignals).toEqual(['stage:optional', 'stage:affinity', 'keyword:ui', 'keyword:form']);
      expect(plural.subScores.contentAnalysis.value).toBe(1);
    });

    it('auto-spawns at exactly the spawning threshold under the inclusive policy', () => {
      const result = engine().scoreAgent(
        getAgentDescriptor(AgentKind.ARCHITECT),
        ChainStageId.TRD,
        'Describe the architecture and each module',
        null,
        { preferredAgents: [AgentKind.ARCHITECT] },
      );

      expect(result.total).toBe(0.85);
      expect(result.decision).toBe(SpawnDecision.AUTO_SPAWN);
      expect(result.boundaryTie).toBe(true);
    });

    it('only suggests at the boundary under the exclusive policy', () => {
      const result = engine({ boundaryPolicy: 'exclusive' }).scoreAgent(
        getAgentDescriptor(AgentKind.ARCHITECT),
        ChainStageId.TRD,
        'Describe the architecture and each module',
        null,
        { preferredAgents: [AgentKind.ARCHITECT] },
      );

      expect(result.decision).toBe(SpawnDecision.SUGGEST);
      expect(result.boundaryTie).toBe(true);
    });

    it('honours per-stage threshold overrides', () => {
      const result = engine({ stageThresholds: { [ChainStageId.TRD]: 0.95 } }).scoreAgent(
        getAgentDescriptor(AgentKind.FRONTEND),
        ChainStageId.TRD,
        'Build a react component in /components/',
        makeContext({ [Domain.FRONTEND]: 0.2 }, { components: 1 }),
      );
      expect(result.total).toBe(0.905);
      expect(result.decision).toBe(SpawnDecision.SUGGEST);
    });

    it('scores context as zero without a project context', () => {
      const result = engine().scoreAgent(getAgentDescriptor(AgentKind.BACKEND), ChainStageId.PRD, '', null);
      expect(result.subScores.context.value).toBe(0);
    });

    it('drops excluded agents to zero preference', () => {
      const result = engine().scoreAgent(
        getAgentDescriptor(AgentKind.SCRIBE),
        ChainStageId.USER_STORY,
        '',
        null,
        { excludedAgents: [AgentKind.SCRIBE], preferredAgents: [AgentKind.SCRIBE] },
      );
      expect(result.subScores.preference.value).toBe(0);
      expect(result.matchedSignals).toContain('preference:excluded');
    });

    it('uses explicit agent weights as preference', () => {
      const result = engine().scoreAgent(
        getAgentDescriptor(AgentKind.SECURITY),
        ChainStageId.TRD,
        '',
        null,
        { agentWeights: { [AgentKind.SECURITY]: 0.8 } },
      );
      expect(result.subScores.preference.value).toBe(0.8);
    });

    it('is deterministic for identical inputs', () => {
      const context = makeContext({ [Domain.BACKEND]: 0.4 }, { api: 2 });
      const a = engine().score(ChainStageId.TRD, 'REST endpoint with database schema', context);
      const b = engine().score(ChainStageId.TRD, 'REST endpoint with database schema', context);
      expect(a).toEqual(b);
    });
  });

  describe('score', () => {
    it('returns every agent ordered by total then priority', () => {
      const results = engine().score(ChainStageId.IDEA_DEFINITION, '', null);
      expect(results).toHaveLength(Object.values(AgentKind).length);
      for (let i = 1; i < results.length; i++) {
        expect(results[i - 1].total).toBeGreaterThanOrEqual(results[i].total);
      }
      // architect and analyzer both reach full stage credit; priority breaks the tie
      expect(results.slice(0, 2).map((r) => [r.kind, r.total])).toEqual([
        [AgentKind.ARCHITECT, 0.45],
        [AgentKind.ANALYZER, 0.45],
      ]);
    });
  });
});

describe('decide', () => {
  it('buckets totals against both thresholds', () => {
    expect(decide(0.85, 0.85, 0.7)).toBe(SpawnDecision.AUTO_SPAWN);
    expect(decide(0.70, 0.85, 0.7)).toBe(SpawnDecision.SUGGEST);
    expect(decide(0.6999, 0.85, 0.7)).toBe(SpawnDecision.SKIP);
    expect(decide(0.70, 0.85, 0.7, 'exclusive')).toBe(SpawnDecision.SKIP);
  });
});

describe('extractPathMentions', () => {
  it('finds slashed paths and file names', () => {
    expect(extractPathMentions('see src/components/Button.tsx and README.md.')).toEqual([
      'src/components/Button.tsx',
      'README.md',
    ]);
  });

  it('ignores plain words', () => {
    expect(extractPathMentions('no paths here')).toEqual([]);
  });
});
