import { v4 as uuidv4 } from 'uuid';
import {
  type AggregatedResult,
  type ChainRun,
  type ChainRunReport,
  type ContextDelta,
  type Diagnostic,
  type GateResult,
  type PendingStageOutput,
  type ProjectContext,
  type RemediationRequest,
  type StageOutcome,
  type StageOutput,
  type UserPreferences,
  type WaveCheckpoint,
  type WaveDecision,
  type WaveFactors,
  AgentKind,
  CHAIN_DONE,
  ChainRunState,
  Domain,
  ChainStageId,
  DiagnosticSeverity,
  SpawnDecision,
  TrackingEventType,
  WavePhase,
} from '../types';
import { AgentRegistry, getAgentDescriptor } from '../agents';
import { ContextAnalyzer, compareContexts, isSignificantChange, mapDomains } from '../analyzer/context-analyzer';
import { AgentCoordinator } from '../coordination/coordinator';
import { applyGateOverrides, getDefaultGateConfigs } from '../gates/gate-definitions';
import { QualityGateFramework } from '../gates/quality-gates';
import { type CapabilityGateway } from '../mcp/capability-gateway';
import { getFirstStage, getStageConfig, getStageGates } from '../pipeline/stages';
import { TransitionEngine } from '../pipeline/transitions';
import { AgentScoringEngine } from '../scoring/agent-scoring';
import { RunTracker } from '../tracker/run-tracker';
import { type PcoConfig, isAgentEnabled } from '../utils/config';
import {
  CapabilityExhaustedError,
  ContextAnalysisError,
  InferenceError,
  OptionalGateFailure,
  PartialCoordinationFailureCode,
  RequiredGateFailure,
  RunNotFoundError,
  RunStateError,
  WaveMiscalculationWarning,
} from '../utils/errors';
import { chainLog, stageLog } from '../utils/logger';
import { validateIdea } from '../utils/validators';
import { WaveAssessor, isFlipped } from '../wave/wave-assessor';
import { type InferenceProvider } from './inference';

export interface ChainEngineDependencies {
  config: PcoConfig;
  inference: InferenceProvider;
  gateway?: CapabilityGateway | null;
  agents?: AgentRegistry;
  gates?: QualityGateFramework;
  analyzer?: ContextAnalyzer;
  tracker?: RunTracker;
}

export interface StartRunOptions {
  preferences?: UserPreferences;
  waveOverrides?: Partial<WaveFactors>;
}

export interface RunChainOptions extends StartRunOptions {
  /** Returns remediated content for a blocked stage, or null to leave the run open. */
  onRemediation?: (request: RemediationRequest) => Promise<string | null>;
  maxRemediationAttempts?: number;
  onStageComplete?: (output: StageOutput, run: ChainRun) => void;
}

export interface ContextRefresh {
  context: ProjectContext;
  delta: ContextDelta;
  significant: boolean;
  decision: WaveDecision | null;
  flipped: boolean;
}

const DEFAULT_MAX_REMEDIATION_ATTEMPTS = 3;

/**
 * Drives chain runs through the five stages. Each stage is scored, staffed
 * with agents, generated, and admitted only when its required gates pass.
 */
export class PromptChainEngine {
  private config: PcoConfig;
  private inference: InferenceProvider;
  private gateway: CapabilityGateway | null;
  private agents: AgentRegistry;
  private gates: QualityGateFramework;
  private analyzer: ContextAnalyzer;
  private scoring: AgentScoringEngine;
  private coordinator: AgentCoordinator;
  private waves: WaveAssessor;
  private transitions: TransitionEngine;
  private tracker: RunTracker | null;
  private runs: Map<string, ChainRun> = new Map();
  private controllers: Map<string, AbortController> = new Map();

  constructor(deps: ChainEngineDependencies) {
    const { config } = deps;
    this.config = config;
    this.inference = deps.inference;
    this.gateway = deps.gateway ?? null;
    this.agents = deps.agents ?? new AgentRegistry(
      Object.values(AgentKind).filter((kind) => isAgentEnabled(config, kind)),
    );
    this.gates = deps.gates ?? new QualityGateFramework(
      applyGateOverrides(getDefaultGateConfigs(), config.gates),
      {
        strategy: config.engine.gateStrategy,
        maxParallelGates: config.engine.maxParallelGates,
        boundaryPolicy: config.engine.boundaryPolicy,
      },
      this.gateway,
    );
    this.analyzer = deps.analyzer ?? new ContextAnalyzer(config.analyzer);
    this.scoring = new AgentScoringEngine(this.agents.getDescriptors(), {
      boundaryPolicy: config.engine.boundaryPolicy,
      suggestThreshold: config.scoring.suggestThreshold,
      stageThresholds: config.scoring.stageThresholds,
    });
    this.coordinator = new AgentCoordinator(
      {
        maxConcurrentAgents: config.engine.maxConcurrentAgents,
        agentTimeoutMs: config.engine.agentTimeoutMs,
        cancellationGraceMs: config.engine.cancellationGraceMs,
      },
      {
        createAgent: (kind) => this.agents.create(kind),
        inference: this.inference,
        capabilities: this.gateway,
      },
    );
    this.waves = new WaveAssessor({
      threshold: config.engine.waveThreshold,
      boundaryPolicy: config.engine.boundaryPolicy,
    });
    this.transitions = new TransitionEngine();
    this.tracker = deps.tracker ?? null;
  }

  // ─── Run lifecycle ────────────────────────────────────────────────────────

  async startRun(idea: string, projectRoot: string, options: StartRunOptions = {}): Promise<ChainRun> {
    const errors = validateIdea(idea);
    if (errors.length > 0) {
      throw errors[0];
    }

    const now = new Date();
    const run: ChainRun = {
      id: uuidv4(),
      idea: idea.trim(),
      projectRoot,
      state: ChainRunState.IN_PROGRESS,
      currentStage: getFirstStage(),
      stages: [],
      context: null,
      preferences: options.preferences ?? {},
      waveDecision: null,
      pendingWaveDecision: null,
      pendingOutput: null,
      pendingRemediation: null,
      diagnostics: [],
      createdAt: now,
      updatedAt: now,
    };
    this.runs.set(run.id, run);
    this.controllers.set(run.id, new AbortController());

    try {
      run.context = await this.analyzer.analyze(projectRoot);
    } catch (error) {
      if (!(error instanceof ContextAnalysisError)) throw error;
      run.state = ChainRunState.ABORTED;
      this.controllers.delete(run.id);
      this.diagnose(run, error.code, DiagnosticSeverity.ERROR, error.message, undefined, { reason: error.reason });
      this.tracker?.recordRunStarted(run);
      this.tracker?.recordRunFinished(run, TrackingEventType.RUN_ABORTED, error.message);
      chainLog(`Run ${shortId(run.id)} aborted: ${error.message}`, 'error');
      return run;
    }

    run.waveDecision = this.waves.assess({
      idea: run.idea,
      position: run.currentStage,
      context: run.context,
      requiredGateIds: (stage) => this.requiredGatesFor(stage),
      overrides: options.waveOverrides,
    });

    this.tracker?.recordRunStarted(run);
    this.tracker?.recordWaveAssessed(run.id, run.waveDecision);
    chainLog(`Run ${shortId(run.id)} started (${run.waveDecision.strategy})`);
    return run;
  }

  getRun(runId: string): ChainRun {
    const run = this.runs.get(runId);
    if (!run) throw new RunNotFoundError(runId);
    return run;
  }

  listRuns(): ChainRun[] {
    return [...this.runs.values()];
  }

  async executeStage(runId: string): Promise<StageOutcome> {
    const run = this.getRun(runId);
    const stage = this.openStage(run);
    if (run.pendingRemediation) {
      throw new RunStateError(`Stage ${stage} is awaiting remediation; submit remediated content instead`);
    }

    const missing = this.transitions.checkInputs(run, stage);
    if (missing.length > 0) {
      throw new RunStateError(missing.join('; '));
    }

    this.applyPendingWaveDecision(run);

    try {
      const pending = await this.produceStage(run, stage);
      assertLive(run, stage);
      const gateResults = pending.checkpoints.length > 0
        ? pending.checkpoints[pending.checkpoints.length - 1].gateResults
        : await this.runGates(run, stage, pending.content);
      return this.conclude(run, pending, gateResults, false);
    } catch (error) {
      return this.handleStageError(run, error);
    }
  }

  /**
   * Re-runs the stage's gates against caller-supplied content. Content is
   * never regenerated here.
   */
  async submitRemediation(runId: string, content: string): Promise<StageOutcome> {
    const run = this.getRun(runId);
    const stage = this.openStage(run);
    const pending = run.pendingOutput;
    if (!pending || !run.pendingRemediation) {
      throw new RunStateError(`Stage ${stage} has no remediation request pending`);
    }

    const remediated: PendingStageOutput = { ...pending, content };
    try {
      const gateResults = await this.runGates(run, stage, content);
      return this.conclude(run, remediated, gateResults, true);
    } catch (error) {
      return this.handleStageError(run, error);
    }
  }

  async abort(runId: string, reason: string): Promise<ChainRun> {
    const run = this.getRun(runId);
    if (run.state !== ChainRunState.IN_PROGRESS) return run;

    await this.terminate(run, ChainRunState.ABORTED, DiagnosticSeverity.WARNING, 'RUN_ABORTED', reason);
    return run;
  }

  /**
   * Re-derives the project context. A significant change re-assesses wave
   * mode; the new decision applies from the next stage.
   */
  async refreshContext(runId: string): Promise<ContextRefresh> {
    const run = this.getRun(runId);
    const previous = run.context;
    let context: ProjectContext;
    try {
      context = await this.analyzer.analyze(run.projectRoot, previous ?? undefined);
    } catch (error) {
      if (error instanceof ContextAnalysisError && run.state === ChainRunState.IN_PROGRESS) {
        await this.terminate(run, ChainRunState.ABORTED, DiagnosticSeverity.ERROR, error.code, error.message, {
          reason: error.reason,
        });
      }
      throw error;
    }
    const delta = previous ? compareContexts(previous, context) : fullDelta(context);
    const significant = isSignificantChange(delta, this.config.engine.contextChangeThreshold);

    run.context = context;
    run.updatedAt = new Date();
    this.tracker?.recordContextRefreshed(run.id, context.version, delta);

    if (!significant || run.currentStage === CHAIN_DONE) {
      return { context, delta, significant, decision: null, flipped: false };
    }

    const decision = this.waves.assess({
      idea: run.idea,
      position: run.currentStage,
      context,
      requiredGateIds: (stage) => this.requiredGatesFor(stage),
    });
    const current = run.waveDecision;
    const flipped = current !== null && isFlipped(current, decision);
    run.pendingWaveDecision = decision;

    if (current && flipped) {
      this.diagnose(
        run,
        WaveMiscalculationWarning,
        DiagnosticSeverity.WARNING,
        `Wave decision flipped from ${current.strategy} to ${decision.strategy}; applies from the next stage`,
        stageOf(run),
        { previousTotal: current.total, nextTotal: decision.total, contextVersion: context.version },
      );
      this.tracker?.recordWaveFlipped(run.id, current, decision, stageOf(run));
    }

    return { context, delta, significant, decision, flipped };
  }

  async runChain(idea: string, projectRoot: string, options: RunChainOptions = {}): Promise<ChainRunReport> {
    const run = await this.startRun(idea, projectRoot, options);
    const maxAttempts = options.maxRemediationAttempts ?? DEFAULT_MAX_REMEDIATION_ATTEMPTS;

    while (run.state === ChainRunState.IN_PROGRESS && run.currentStage !== CHAIN_DONE) {
      let outcome = await this.executeStage(run.id);
      let attempts = 0;

      while (outcome.kind === 'remediation') {
        if (!options.onRemediation || attempts >= maxAttempts) {
          return this.getReport(run.id);
        }
        attempts++;
        const content = await options.onRemediation(outcome.request);
        if (content === null) {
          return this.getReport(run.id);
        }
        outcome = await this.submitRemediation(run.id, content);
      }

      if (outcome.kind === 'terminated') break;
      options.onStageComplete?.(outcome.output, outcome.run);
    }

    return this.getReport(run.id);
  }

  getReport(runId: string): ChainRunReport {
    const run = this.getRun(runId);
    const last = run.stages.length > 0 ? run.stages[run.stages.length - 1] : null;
    return {
      runId: run.id,
      state: run.state,
      currentStage: run.currentStage,
      completedStages: run.stages.map((s) => s.stage),
      finalOutput: last ? last.content : null,
      remediation: run.pendingRemediation,
      waveDecision: run.waveDecision,
      diagnostics: [...run.diagnostics],
      totalTokensUsed: run.stages.reduce((sum, s) => sum + s.tokensUsed, 0),
    };
  }

  getTracker(): RunTracker | null {
    return this.tracker;
  }

  /** Gate ids that block the stage, after config overrides of `required`. */
  requiredGatesFor(stage: ChainStageId): string[] {
    const config = getStageConfig(stage);
    const overrides = this.config.gates;
    return [
      ...config.requiredGates.filter((id) => overrides[id]?.required !== false),
      ...config.optionalGates.filter((id) => overrides[id]?.required === true),
    ];
  }

  // ─── Stage execution ──────────────────────────────────────────────────────

  private async produceStage(run: ChainRun, stage: ChainStageId): Promise<PendingStageOutput> {
    const input = stageInput(run);
    const signal = this.signalFor(run);
    const config = getStageConfig(stage);

    const scoring = this.scoring.score(stage, input, run.context, run.preferences);
    this.tracker?.recordAgentsScored(run.id, stage, scoring);
    const spawned = scoring
      .filter((r) => r.decision === SpawnDecision.AUTO_SPAWN && this.agents.isEnabled(r.kind))
      .map((r) => getAgentDescriptor(r.kind));
    const suggestedAgents = scoring.filter((r) => r.decision === SpawnDecision.SUGGEST).map((r) => r.kind);

    const decision = run.waveDecision;
    const multiWave = decision?.multiWave ?? false;
    const waves = decision ? decision.waves : [WavePhase.SINGLE];
    const checkpoints: WaveCheckpoint[] = [];
    let aggregated: AggregatedResult | null = null;
    let content = '';
    let tokensUsed = 0;

    for (const wave of waves) {
      assertLive(run, stage);
      this.tracker?.recordStageStarted(run.id, stage, wave);
      stageLog(stage, `${config.name} [${wave}] with ${spawned.length} agent(s)`);

      if (spawned.length > 0) {
        const instances = this.coordinator.spawn(run.id, spawned, {
          stage,
          title: `${config.name} (${wave})`,
          instructions: config.description,
          input: content ? `${input}\n\n## Draft So Far\n\n${content}` : input,
          wave,
        }, run.context);
        aggregated = await this.coordinator.await(run.id, stage, instances);
        tokensUsed += aggregated.contributions.reduce((sum, c) => sum + c.tokensUsed, 0);
        this.tracker?.recordAggregation(run.id, aggregated);
        if (aggregated.partialFailure) {
          this.diagnose(
            run,
            PartialCoordinationFailureCode,
            DiagnosticSeverity.WARNING,
            `Dropped contributions from ${aggregated.partialFailure.failedKinds.join(', ')}`,
            stage,
            { errors: aggregated.partialFailure.errors },
          );
        }
      }

      assertLive(run, stage);

      const response = await this.inference.generate({
        stage,
        prompt: buildStagePrompt(run, stage, input, aggregated, wave, content),
        input,
        requiredSections: config.outputFormat.requiredSections,
        wave,
        signal,
      });
      content = response.content;
      tokensUsed += response.tokensUsed;

      if (multiWave) {
        assertLive(run, stage);
        const gateResults = await this.runGates(run, stage, content);
        checkpoints.push({ wave, content, gateResults, recordedAt: new Date() });
        if (this.gates.summarize(gateResults).blocking.length > 0) {
          stageLog(stage, `Stopping after ${wave} wave: required gate failed`, 'warn');
          break;
        }
      }
    }

    return { stage, content, scoring, suggestedAgents, aggregated, checkpoints, tokensUsed };
  }

  private async runGates(run: ChainRun, stage: ChainStageId, content: string): Promise<GateResult[]> {
    const results = await this.gates.run(
      {
        stage,
        content,
        previousOutput: stageInput(run),
        requiredSections: getStageConfig(stage).outputFormat.requiredSections,
        context: run.context,
      },
      { gateIds: getStageGates(stage), requiredGateIds: this.requiredGatesFor(stage) },
    );
    this.tracker?.recordGatesEvaluated(run.id, stage, results);
    return results;
  }

  private conclude(
    run: ChainRun,
    pending: PendingStageOutput,
    gateResults: GateResult[],
    remediated: boolean,
  ): StageOutcome {
    const stage = pending.stage;
    assertLive(run, stage);
    const summary = this.gates.summarize(gateResults);
    const transition = this.transitions.evaluate(stage, summary);

    for (const warning of summary.warnings) {
      this.diagnose(run, OptionalGateFailure, DiagnosticSeverity.WARNING, `${warning.gateId} scored ${warning.score}`, stage, {
        status: warning.status,
        threshold: warning.threshold,
        findings: [...warning.findings],
      });
    }

    if (!transition.allowed) {
      const failure = new RequiredGateFailure(stage, summary.blocking);
      const request: RemediationRequest = {
        runId: run.id,
        stage,
        failedGates: summary.blocking,
        findings: summary.blocking.flatMap((r) => [...r.findings]),
        content: pending.content,
      };
      run.pendingOutput = pending;
      run.pendingRemediation = request;
      run.updatedAt = new Date();
      this.diagnose(run, failure.code, DiagnosticSeverity.ERROR, failure.message, stage, { blockers: transition.blockers });
      this.tracker?.recordRemediationRequested(request);
      stageLog(stage, failure.message, 'warn');
      return { kind: 'remediation', run, request };
    }

    const output: StageOutput = {
      ...pending,
      gateResults,
      remediated,
      completedAt: new Date(),
    };
    run.pendingOutput = null;
    run.pendingRemediation = null;
    const next = this.transitions.advance(run, output);
    this.tracker?.recordStageAdvanced(run.id, output);

    if (next === CHAIN_DONE) {
      this.coordinator.release(run.id);
      this.controllers.delete(run.id);
      this.tracker?.recordRunFinished(run, TrackingEventType.RUN_COMPLETED);
      chainLog(`Run ${shortId(run.id)} completed`);
    }
    return { kind: 'advanced', run, output };
  }

  private async handleStageError(run: ChainRun, error: unknown): Promise<StageOutcome> {
    if (run.state === ChainRunState.ABORTED) {
      return { kind: 'terminated', run, reason: 'aborted' };
    }
    if (error instanceof CapabilityExhaustedError || error instanceof InferenceError) {
      await this.terminate(run, ChainRunState.FAILED, DiagnosticSeverity.ERROR, error.code, error.message);
      return { kind: 'terminated', run, reason: error.message };
    }
    throw error;
  }

  /** Moves the run to a terminal state and stops every agent it still owns. */
  private async terminate(
    run: ChainRun,
    state: ChainRunState.ABORTED | ChainRunState.FAILED,
    severity: DiagnosticSeverity,
    code: string,
    message: string,
    details: Record<string, unknown> = {},
  ): Promise<void> {
    run.state = state;
    run.updatedAt = new Date();
    this.controllers.get(run.id)?.abort();
    this.controllers.delete(run.id);
    await this.coordinator.cancelRun(run.id);
    this.coordinator.release(run.id);

    this.diagnose(run, code, severity, message, stageOf(run), details);
    const event = state === ChainRunState.FAILED ? TrackingEventType.RUN_FAILED : TrackingEventType.RUN_ABORTED;
    this.tracker?.recordRunFinished(run, event, message);
    chainLog(`Run ${shortId(run.id)} ${state}: ${message}`, severity === DiagnosticSeverity.ERROR ? 'error' : 'warn');
  }

  // ─── Helpers ──────────────────────────────────────────────────────────────

  private openStage(run: ChainRun): ChainStageId {
    if (run.state !== ChainRunState.IN_PROGRESS) {
      throw new RunStateError(`Run ${run.id} is ${run.state}`);
    }
    if (run.currentStage === CHAIN_DONE) {
      throw new RunStateError(`Run ${run.id} has no open stage`);
    }
    return run.currentStage;
  }

  private applyPendingWaveDecision(run: ChainRun): void {
    if (!run.pendingWaveDecision) return;
    run.waveDecision = run.pendingWaveDecision;
    run.pendingWaveDecision = null;
    chainLog(`Run ${shortId(run.id)} now uses ${run.waveDecision.strategy} wave strategy`);
  }

  private signalFor(run: ChainRun): AbortSignal {
    let controller = this.controllers.get(run.id);
    if (!controller) {
      controller = new AbortController();
      this.controllers.set(run.id, controller);
    }
    return controller.signal;
  }

  private diagnose(
    run: ChainRun,
    code: string,
    severity: DiagnosticSeverity,
    message: string,
    stage?: ChainStageId,
    details: Record<string, unknown> = {},
  ): void {
    const diagnostic: Diagnostic = { code, severity, message, stage, details, timestamp: new Date() };
    run.diagnostics.push(diagnostic);
  }
}

function stageInput(run: ChainRun): string {
  const last = run.stages[run.stages.length - 1];
  return last ? last.content : run.idea;
}

function assertLive(run: ChainRun, stage: ChainStageId): void {
  if (run.state !== ChainRunState.IN_PROGRESS) {
    throw new RunStateError(`Run ${run.id} was ${run.state} during ${stage}`);
  }
}

function stageOf(run: ChainRun): ChainStageId | undefined {
  return run.currentStage === CHAIN_DONE ? undefined : run.currentStage;
}

function shortId(id: string): string {
  return id.slice(0, 8);
}

function fullDelta(context: ProjectContext): ContextDelta {
  const deltas = mapDomains((domain) => context.domainScores[domain]);
  let maxDelta = 0;
  let maxDomain: Domain | null = null;
  for (const domain of Object.values(Domain)) {
    if (deltas[domain] > maxDelta) {
      maxDelta = deltas[domain];
      maxDomain = domain;
    }
  }
  return { deltas, maxDelta, maxDomain };
}

export function buildStagePrompt(
  run: ChainRun,
  stage: ChainStageId,
  input: string,
  aggregated: AggregatedResult | null,
  wave: WavePhase,
  draft: string,
): string {
  const config = getStageConfig(stage);
  const sections: string[] = [];

  sections.push(`# ${config.name}`);
  sections.push(`## Objective\n${config.description}`);
  sections.push(`## Original Idea\n${run.idea}`);
  if (input !== run.idea) {
    sections.push(`## Previous Stage Output\n${input}`);
  }

  if (aggregated && aggregated.contributions.length > 0) {
    sections.push(`## Specialist Contributions\n${aggregated.mergedContent}`);
    if (aggregated.suggestions.length > 0) {
      const notes = aggregated.suggestions.map((s) => `- ${s.kind} on "${s.heading}" (kept ${s.supersededBy}'s version)`);
      sections.push(`## Secondary Suggestions\n${notes.join('\n')}`);
    }
  }

  if (wave !== WavePhase.SINGLE) {
    sections.push(`## Wave\nThis is the ${wave} wave.${draft ? ' Refine the draft below rather than starting over.' : ''}`);
    if (draft) sections.push(`## Current Draft\n${draft}`);
  }

  const headings = config.outputFormat.requiredSections.map((h) => `## ${h}`).join('\n');
  sections.push(`## Output Format\nRespond in markdown with exactly these sections:\n\n${headings}`);

  return sections.join('\n\n');
}
