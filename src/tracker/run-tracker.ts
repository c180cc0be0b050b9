import * as fs from 'node:fs';
import * as path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import {
  type AggregatedResult,
  type ChainRun,
  type ContextDelta,
  type GateResult,
  type RemediationRequest,
  type RunHistorySummary,
  type ScoringResult,
  type StageOutput,
  type TrackingEvent,
  type WaveDecision,
  type ChainStageId,
  GateStatus,
  SpawnDecision,
  TrackingEventType,
} from '../types';
import logger from '../utils/logger';

export interface RunHistory {
  runId: string;
  idea: string;
  generatedAt: string;
  events: TrackingEvent[];
  summary: RunHistorySummary;
}

type EventInput = Omit<TrackingEvent, 'id' | 'timestamp' | 'runId' | 'details'> & {
  details?: Record<string, unknown>;
};

/** Records typed events per chain run and exports a run's history on request. */
export class RunTracker {
  private events: Map<string, TrackingEvent[]> = new Map();
  private readonly historyDir: string;

  constructor(projectPath: string) {
    this.historyDir = path.join(projectPath, '.pco', 'history');
  }

  // ── Event recording ───────────────────────────────────────────────────

  recordRunStarted(run: ChainRun): void {
    this.record(run.id, {
      type: TrackingEventType.RUN_STARTED,
      message: `Run started: "${truncate(run.idea, 60)}"`,
      details: { projectRoot: run.projectRoot, contextVersion: run.context?.version ?? 0 },
    });
  }

  recordWaveAssessed(runId: string, decision: WaveDecision): void {
    this.record(runId, {
      type: TrackingEventType.WAVE_ASSESSED,
      message: `Wave assessment ${decision.total.toFixed(3)}: ${decision.strategy}`,
      details: { total: decision.total, multiWave: decision.multiWave, waves: decision.waves },
    });
  }

  recordWaveFlipped(runId: string, previous: WaveDecision, next: WaveDecision, stage?: ChainStageId): void {
    this.record(runId, {
      type: TrackingEventType.WAVE_FLIPPED,
      stage,
      message: `Wave decision flipped: ${previous.strategy} → ${next.strategy} (from next stage)`,
      details: { previousTotal: previous.total, nextTotal: next.total },
    });
  }

  recordContextRefreshed(runId: string, version: number, delta: ContextDelta): void {
    this.record(runId, {
      type: TrackingEventType.CONTEXT_REFRESHED,
      message: `Context refreshed to v${version} (max delta ${delta.maxDelta.toFixed(3)}${delta.maxDomain ? ` on ${delta.maxDomain}` : ''})`,
      details: { version, maxDelta: delta.maxDelta, maxDomain: delta.maxDomain },
    });
  }

  recordStageStarted(runId: string, stage: ChainStageId, wave: string): void {
    this.record(runId, {
      type: TrackingEventType.STAGE_STARTED,
      stage,
      message: `Stage started: ${stage} [${wave}]`,
      details: { wave },
    });
  }

  recordAgentsScored(runId: string, stage: ChainStageId, results: ScoringResult[]): void {
    const spawned = results.filter((r) => r.decision === SpawnDecision.AUTO_SPAWN).map((r) => r.kind);
    const suggested = results.filter((r) => r.decision === SpawnDecision.SUGGEST).map((r) => r.kind);
    this.record(runId, {
      type: TrackingEventType.AGENTS_SCORED,
      stage,
      message: `Agents scored: ${spawned.length} auto-spawn, ${suggested.length} suggested`,
      details: {
        spawned,
        suggested,
        totals: Object.fromEntries(results.map((r) => [r.kind, r.total])),
      },
    });
  }

  recordAggregation(runId: string, aggregated: AggregatedResult): void {
    for (const contribution of aggregated.contributions) {
      this.record(runId, {
        type: TrackingEventType.AGENT_COMPLETED,
        stage: aggregated.stage,
        agentKind: contribution.kind,
        message: `${contribution.kind} contributed ${contribution.regions.length} region(s)`,
        details: { confidenceReduced: contribution.confidenceReduced },
        tokensUsed: contribution.tokensUsed,
      });
    }
    for (const kind of aggregated.partialFailure?.failedKinds ?? []) {
      this.record(runId, {
        type: TrackingEventType.AGENT_FAILED,
        stage: aggregated.stage,
        agentKind: kind,
        message: `${kind} dropped after retry`,
        details: { error: aggregated.partialFailure?.errors[kind] },
      });
    }
  }

  recordGatesEvaluated(runId: string, stage: ChainStageId, results: GateResult[]): void {
    const count = (status: GateStatus) => results.filter((r) => r.status === status).length;
    this.record(runId, {
      type: TrackingEventType.GATES_EVALUATED,
      stage,
      message: `Gates evaluated: ${count(GateStatus.PASSED)} passed, ${count(GateStatus.WARNING)} warnings, ${count(GateStatus.FAILED) + count(GateStatus.BLOCKED)} blocking`,
      details: { results: results.map((r) => ({ gateId: r.gateId, status: r.status, score: r.score })) },
    });
  }

  recordRemediationRequested(request: RemediationRequest): void {
    this.record(request.runId, {
      type: TrackingEventType.REMEDIATION_REQUESTED,
      stage: request.stage,
      message: `Remediation requested: ${request.failedGates.map((g) => g.gateId).join(', ')}`,
      details: { findings: request.findings },
    });
  }

  recordStageAdvanced(runId: string, output: StageOutput, durationMs?: number): void {
    this.record(runId, {
      type: TrackingEventType.STAGE_ADVANCED,
      stage: output.stage,
      message: `Stage ${output.stage} accepted${output.remediated ? ' after remediation' : ''}`,
      details: { checkpoints: output.checkpoints.length, remediated: output.remediated },
      durationMs,
      tokensUsed: output.tokensUsed,
    });
  }

  recordRunFinished(run: ChainRun, type: TrackingEventType, reason?: string): void {
    this.record(run.id, {
      type,
      message: `Run ${run.state}${reason ? `: ${reason}` : ''}`,
      details: { reason, stagesCompleted: run.stages.length },
    });
  }

  // ── Query ─────────────────────────────────────────────────────────────

  getEvents(runId: string): TrackingEvent[] {
    return [...(this.events.get(runId) ?? [])];
  }

  getEventsByType(runId: string, type: TrackingEventType): TrackingEvent[] {
    return this.getEvents(runId).filter((e) => e.type === type);
  }

  // ── Summary computation ───────────────────────────────────────────────

  buildSummary(runId: string): RunHistorySummary {
    const events = this.getEvents(runId);
    const byType: Record<string, number> = {};
    let totalTokensUsed = 0;

    for (const event of events) {
      byType[event.type] = (byType[event.type] ?? 0) + 1;
      if (event.type === TrackingEventType.STAGE_ADVANCED) {
        totalTokensUsed += event.tokensUsed ?? 0;
      }
    }

    return {
      runId,
      totalEvents: events.length,
      stagesAdvanced: byType[TrackingEventType.STAGE_ADVANCED] ?? 0,
      remediationRequests: byType[TrackingEventType.REMEDIATION_REQUESTED] ?? 0,
      agentsCompleted: byType[TrackingEventType.AGENT_COMPLETED] ?? 0,
      agentsFailed: byType[TrackingEventType.AGENT_FAILED] ?? 0,
      totalTokensUsed,
      byType,
    };
  }

  // ── Report generation ─────────────────────────────────────────────────

  buildHistory(run: ChainRun): RunHistory {
    return {
      runId: run.id,
      idea: run.idea,
      generatedAt: new Date().toISOString(),
      events: this.getEvents(run.id),
      summary: this.buildSummary(run.id),
    };
  }

  generateMarkdown(run: ChainRun): string {
    const history = this.buildHistory(run);
    const s = history.summary;
    const lines: string[] = [];

    lines.push(`# Chain Run History: ${run.id.slice(0, 8)}`);
    lines.push(`> Idea: ${truncate(run.idea, 120)}`);
    lines.push(`> Generated: ${history.generatedAt}\n`);

    lines.push('## Summary');
    lines.push('| Metric | Value |');
    lines.push('|---|---|');
    lines.push(`| State | ${run.state} |`);
    lines.push(`| Stages advanced | ${s.stagesAdvanced} |`);
    lines.push(`| Remediation requests | ${s.remediationRequests} |`);
    lines.push(`| Agent contributions | ${s.agentsCompleted} (${s.agentsFailed} dropped) |`);
    lines.push(`| Total tokens used | ${s.totalTokensUsed.toLocaleString()} |`);
    lines.push('');

    if (history.events.length > 0) {
      lines.push('## Timeline\n');
      for (const event of history.events) {
        const tokenStr = event.tokensUsed ? ` (${event.tokensUsed.toLocaleString()} tokens)` : '';
        lines.push(`- \`${event.timestamp}\` ${eventIcon(event.type)} ${event.message}${tokenStr}`);
      }
      lines.push('');
    }

    return lines.join('\n');
  }

  saveHistory(run: ChainRun, outputDir?: string): { markdownPath: string; jsonPath: string } {
    const dir = outputDir ?? this.historyDir;
    fs.mkdirSync(dir, { recursive: true });

    const markdownPath = path.join(dir, `run-${run.id}.md`);
    const jsonPath = path.join(dir, `run-${run.id}.json`);

    fs.writeFileSync(markdownPath, this.generateMarkdown(run), 'utf-8');
    fs.writeFileSync(jsonPath, JSON.stringify(this.buildHistory(run), null, 2), 'utf-8');

    return { markdownPath, jsonPath };
  }

  // ── Internal ──────────────────────────────────────────────────────────

  private record(runId: string, input: EventInput): void {
    const event: TrackingEvent = {
      id: uuidv4(),
      runId,
      timestamp: new Date().toISOString(),
      details: {},
      ...input,
    };
    const list = this.events.get(runId) ?? [];
    list.push(event);
    this.events.set(runId, list);
    logger.debug(`[tracker] ${event.message}`);
  }
}

const EVENT_ICONS: Record<TrackingEventType, string> = {
  [TrackingEventType.RUN_STARTED]: '>',
  [TrackingEventType.WAVE_ASSESSED]: 'WAVE',
  [TrackingEventType.WAVE_FLIPPED]: 'FLIP',
  [TrackingEventType.CONTEXT_REFRESHED]: 'SCAN',
  [TrackingEventType.STAGE_STARTED]: '>',
  [TrackingEventType.AGENTS_SCORED]: 'SCORE',
  [TrackingEventType.AGENT_COMPLETED]: 'OK',
  [TrackingEventType.AGENT_FAILED]: 'FAIL',
  [TrackingEventType.GATES_EVALUATED]: 'GATE',
  [TrackingEventType.REMEDIATION_REQUESTED]: 'FIX',
  [TrackingEventType.STAGE_ADVANCED]: 'OK',
  [TrackingEventType.RUN_COMPLETED]: 'DONE',
  [TrackingEventType.RUN_ABORTED]: 'ABORT',
  [TrackingEventType.RUN_FAILED]: 'FAIL',
};

function eventIcon(type: TrackingEventType): string {
  return `[${EVENT_ICONS[type]}]`;
}

function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}
