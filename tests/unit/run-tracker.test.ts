import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  type AggregatedResult,
  type ChainRun,
  type StageOutput,
  AgentKind,
  ChainRunState,
  ChainStageId,
  TrackingEventType,
} from '../../src/types';
import { RunTracker } from '../../src/tracker/run-tracker';

function makeRun(overrides: Partial<ChainRun> = {}): ChainRun {
  return {
    id: 'run-0001-abcdef',
    idea: 'A   shared grocery list\nfor households',
    projectRoot: '/project',
    state: ChainRunState.IN_PROGRESS,
    currentStage: ChainStageId.IDEA_DEFINITION,
    stages: [],
    context: null,
    preferences: {},
    waveDecision: null,
    pendingWaveDecision: null,
    pendingOutput: null,
    pendingRemediation: null,
    diagnostics: [],
    createdAt: new Date(),
    updatedAt: new Date(),
    ...overrides,
  };
}

function makeOutput(stage: ChainStageId, tokensUsed: number, remediated = false): StageOutput {
  return {
    stage,
    content: `# ${stage}`,
    scoring: [],
    suggestedAgents: [],
    aggregated: null,
    gateResults: [],
    checkpoints: [],
    remediated,
    tokensUsed,
    completedAt: new Date(),
  };
}

const AGGREGATED: AggregatedResult = {
  runId: 'run-0001-abcdef',
  stage: ChainStageId.TRD,
  contributions: [{
    instanceId: 'i-1',
    kind: AgentKind.ARCHITECT,
    priority: 2,
    regions: [{ key: 'architecture', heading: 'Architecture', content: 'layers' }],
    confidenceReduced: false,
    capabilityNotes: [],
    tokensUsed: 40,
  }],
  mergedContent: '',
  suggestions: [],
  cancelledKinds: [],
  partialFailure: { failedKinds: [AgentKind.BACKEND], errors: { backend: 'boom' } },
  confidenceReduced: false,
};

describe('RunTracker', () => {
  let tmpDir: string;
  let tracker: RunTracker;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pco-tracker-'));
    tracker = new RunTracker(tmpDir);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('records events per run in order', () => {
    const run = makeRun();
    tracker.recordRunStarted(run);
    tracker.recordStageStarted(run.id, ChainStageId.IDEA_DEFINITION, 'single');

    const events = tracker.getEvents(run.id);
    expect(events.map((e) => e.type)).toEqual([TrackingEventType.RUN_STARTED, TrackingEventType.STAGE_STARTED]);
    expect(events[0].message).toBe('Run started: "A shared grocery list for households"');
    expect(events[1].stage).toBe(ChainStageId.IDEA_DEFINITION);
    expect(tracker.getEvents('other')).toEqual([]);
  });

  it('records one event per contribution and per dropped agent', () => {
    tracker.recordAggregation('run-0001-abcdef', AGGREGATED);
    const completed = tracker.getEventsByType('run-0001-abcdef', TrackingEventType.AGENT_COMPLETED);
    const failed = tracker.getEventsByType('run-0001-abcdef', TrackingEventType.AGENT_FAILED);

    expect(completed.map((e) => e.message)).toEqual(['architect contributed 1 region(s)']);
    expect(completed[0].tokensUsed).toBe(40);
    expect(failed.map((e) => [e.agentKind, e.message])).toEqual([[AgentKind.BACKEND, 'backend dropped after retry']]);
    expect(failed[0].details).toEqual({ error: 'boom' });
  });

  it('summarizes advanced stages and tokens', () => {
    const run = makeRun();
    tracker.recordStageAdvanced(run.id, makeOutput(ChainStageId.IDEA_DEFINITION, 100));
    tracker.recordStageAdvanced(run.id, makeOutput(ChainStageId.PRD, 250, true));
    tracker.recordRemediationRequested({
      runId: run.id,
      stage: ChainStageId.PRD,
      failedGates: [],
      findings: ['Missing section: Goals'],
      content: '',
    });

    const summary = tracker.buildSummary(run.id);
    expect(summary.totalEvents).toBe(3);
    expect(summary.stagesAdvanced).toBe(2);
    expect(summary.remediationRequests).toBe(1);
    expect(summary.totalTokensUsed).toBe(350);
    expect(tracker.getEvents(run.id)[1].message).toBe('Stage prd accepted after remediation');
  });

  it('renders a markdown history', () => {
    const run = makeRun({ state: ChainRunState.COMPLETED });
    tracker.recordRunFinished(run, TrackingEventType.RUN_COMPLETED);
    const markdown = tracker.generateMarkdown(run);

    expect(markdown).toContain('# Chain Run History: run-0001');
    expect(markdown).toContain('| State | completed |');
    expect(markdown).toContain('[DONE] Run completed');
  });

  it('saves markdown and json history under the project data dir', () => {
    const run = makeRun();
    tracker.recordRunStarted(run);
    const { markdownPath, jsonPath } = tracker.saveHistory(run);

    expect(markdownPath).toBe(path.join(tmpDir, '.pco', 'history', 'run-run-0001-abcdef.md'));
    const saved: unknown = JSON.parse(fs.readFileSync(jsonPath, 'utf-8'));
    expect(saved).toMatchObject({ runId: run.id, summary: { totalEvents: 1 } });
  });
});
