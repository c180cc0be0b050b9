import { createHash } from 'node:crypto';
import {
  type CapabilityOutcome,
  type CapabilityRequest,
  type GateBreakdownEntry,
  type GateConfig,
  type GateResult,
  type GateStrategy,
  type GateSummary,
  type BoundaryPolicy,
  GateStatus,
} from '../types';
import {
  CapabilityExhaustedError,
  GateConfigurationError,
  GateTimeoutError,
  OptionalGateFailure,
  toErrorMessage,
} from '../utils/errors';
import { deepFreeze } from '../utils/freeze';
import { gateLog, stageLog } from '../utils/logger';
import { meetsThreshold, normalizeScore } from '../utils/score-math';
import { validateGateConfig } from '../utils/validators';
import { Semaphore } from '../coordination/semaphore';
import { type CapabilityGateway } from '../mcp/capability-gateway';
import { BUILT_IN_CHECKERS, type GateChecker, type GateCheck, type GateInput } from './checkers';
import { STAGE_GATE_MAP } from './gate-definitions';

export interface QualityGateOptions {
  strategy: GateStrategy;
  maxParallelGates: number;
  boundaryPolicy: BoundaryPolicy;
}

export interface GateRunRequest {
  gateIds: string[];
  /** Gates required for this stage; defaults to each gate's own `required` flag. */
  requiredGateIds?: string[];
  strategy?: GateStrategy;
}

interface PlannedGate {
  config: GateConfig;
  checker: GateChecker;
  required: boolean;
}

const FAILED_STATES = new Set([GateStatus.FAILED, GateStatus.BLOCKED, GateStatus.SKIPPED]);

export class QualityGateFramework {
  private gates: Map<string, GateConfig> = new Map();
  private checkers: Map<string, GateChecker> = new Map();
  private options: QualityGateOptions;
  private gateway: CapabilityGateway | null;

  constructor(
    gates: GateConfig[],
    options: QualityGateOptions,
    gateway: CapabilityGateway | null = null,
    checkers: GateChecker[] = BUILT_IN_CHECKERS,
  ) {
    this.options = options;
    this.gateway = gateway;
    for (const checker of checkers) {
      this.checkers.set(checker.id, checker);
    }
    for (const gate of gates) {
      this.gates.set(gate.id, gate);
    }
    this.validate();
  }

  registerGate(gate: GateConfig, checker?: GateChecker): void {
    this.gates.set(gate.id, gate);
    if (checker) {
      this.checkers.set(checker.id, checker);
    }
    this.validate();
  }

  getGate(gateId: string): GateConfig | undefined {
    return this.gates.get(gateId);
  }

  listGates(): GateConfig[] {
    return [...this.gates.values()];
  }

  /**
   * Expands the requested gates with their transitive dependencies and
   * returns them in dependency order.
   */
  plan(gateIds: string[]): GateConfig[] {
    const ordered: GateConfig[] = [];
    const state = new Map<string, 'visiting' | 'done'>();

    const visit = (id: string, path: string[]): void => {
      const mark = state.get(id);
      if (mark === 'done') return;
      if (mark === 'visiting') {
        throw new GateConfigurationError(`Gate dependency cycle: ${[...path, id].join(' -> ')}`);
      }
      const gate = this.gates.get(id);
      if (!gate) {
        throw new GateConfigurationError(`Unknown gate "${id}"${path.length > 0 ? ` (required by ${path[path.length - 1]})` : ''}`);
      }
      state.set(id, 'visiting');
      for (const dep of gate.dependsOn) {
        visit(dep, [...path, id]);
      }
      state.set(id, 'done');
      ordered.push(gate);
    };

    for (const id of gateIds) {
      visit(id, []);
    }
    return ordered;
  }

  async run(input: GateInput, request: GateRunRequest): Promise<GateResult[]> {
    const strategy = request.strategy ?? this.options.strategy;
    const gateIds = strategy === 'adaptive' ? STAGE_GATE_MAP[input.stage] : request.gateIds;
    const planned = this.plan(gateIds).map((config) => this.resolve(config, request));

    stageLog(input.stage, `Running ${planned.length} gate(s) with ${strategy} strategy`, 'debug');

    const results = strategy === 'sequential'
      ? await this.runSequential(planned, input)
      : await this.runParallel(planned, input);

    for (const result of results) {
      if (result.status === GateStatus.WARNING) {
        gateLog(result.gateId, `${OptionalGateFailure}: score ${result.score} below ${result.threshold}`, input.stage, 'warn');
      }
    }
    return results;
  }

  summarize(results: GateResult[]): GateSummary {
    const summary: GateSummary = { blocking: [], warnings: [], passed: [] };
    for (const result of results) {
      if (result.status === GateStatus.PASSED) {
        summary.passed.push(result);
      } else if (result.required && FAILED_STATES.has(result.status)) {
        summary.blocking.push(result);
      } else {
        summary.warnings.push(result);
      }
    }
    return summary;
  }

  // ─── Strategies ───────────────────────────────────────────────────────────

  private async runSequential(planned: PlannedGate[], input: GateInput): Promise<GateResult[]> {
    const results = new Map<string, GateResult>();
    let halted = false;

    for (const gate of planned) {
      if (halted) {
        results.set(gate.config.id, this.skippedResult(gate, input, 'Skipped after an earlier required gate failed'));
        continue;
      }
      const result = await this.evaluate(gate, input, results);
      results.set(gate.config.id, result);
      if (gate.required && FAILED_STATES.has(result.status)) {
        halted = true;
      }
    }
    return [...results.values()];
  }

  private async runParallel(planned: PlannedGate[], input: GateInput): Promise<GateResult[]> {
    const results = new Map<string, GateResult>();
    const semaphore = new Semaphore(this.options.maxParallelGates);

    for (const level of this.levels(planned)) {
      const levelResults = await Promise.all(
        level.map((gate) => semaphore.run(() => this.evaluate(gate, input, results))),
      );
      level.forEach((gate, i) => results.set(gate.config.id, levelResults[i]));
    }

    return planned.map((gate) => {
      const result = results.get(gate.config.id);
      if (!result) {
        throw new GateConfigurationError(`Gate ${gate.config.id} produced no result`);
      }
      return result;
    });
  }

  private levels(planned: PlannedGate[]): PlannedGate[][] {
    const depth = new Map<string, number>();
    const levels: PlannedGate[][] = [];
    for (const gate of planned) {
      const level = gate.config.dependsOn.reduce(
        (max, dep) => Math.max(max, (depth.get(dep) ?? -1) + 1),
        0,
      );
      depth.set(gate.config.id, level);
      if (!levels[level]) levels[level] = [];
      levels[level].push(gate);
    }
    return levels;
  }

  // ─── Evaluation ───────────────────────────────────────────────────────────

  private async evaluate(
    gate: PlannedGate,
    input: GateInput,
    completed: Map<string, GateResult>,
  ): Promise<GateResult> {
    const unmet = gate.config.dependsOn.filter((dep) => {
      const result = completed.get(dep);
      return result?.status !== GateStatus.PASSED;
    });
    if (unmet.length > 0) {
      return this.finalize(gate, input, {
        status: GateStatus.BLOCKED,
        score: 0,
        breakdown: [],
        findings: [`Blocked by unmet dependencies: ${unmet.join(', ')}`],
        confidenceReduced: false,
        durationMs: 0,
      });
    }

    const started = Date.now();
    const check = await this.checkWithTimeout(gate, input);
    const score = normalizeScore(check.score);
    const passed = meetsThreshold(score, gate.config.threshold, this.options.boundaryPolicy);
    const status = passed
      ? GateStatus.PASSED
      : gate.required ? GateStatus.FAILED : GateStatus.WARNING;

    gateLog(gate.config.id, `${status} (${score.toFixed(2)} / ${gate.config.threshold})`, input.stage, passed ? 'debug' : 'info');

    return this.finalize(gate, input, {
      status,
      score,
      breakdown: check.breakdown ?? [
        { source: 'tool', name: gate.checker.id, version: gate.checker.version, score },
      ],
      findings: check.findings,
      confidenceReduced: check.confidenceReduced ?? false,
      durationMs: Date.now() - started,
    });
  }

  private async checkWithTimeout(gate: PlannedGate, input: GateInput): Promise<GateCheck> {
    const controller = new AbortController();
    const timeoutMs = gate.config.timeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new GateTimeoutError(gate.config.id, timeoutMs));
      }, timeoutMs);
    });

    const invokeCapability = this.capabilityInvoker(gate, controller.signal);
    const toolbox = invokeCapability
      ? { signal: controller.signal, invokeCapability }
      : { signal: controller.signal };

    try {
      return await Promise.race([gate.checker.check(input, toolbox), timeout]);
    } catch (error) {
      if (error instanceof CapabilityExhaustedError) throw error;
      // A timed-out or crashed checker scores zero.
      return { score: 0, findings: [toErrorMessage(error)] };
    } finally {
      clearTimeout(timer);
    }
  }

  private capabilityInvoker(
    gate: PlannedGate,
    signal: AbortSignal,
  ): ((request: CapabilityRequest) => Promise<CapabilityOutcome>) | undefined {
    const gateway = this.gateway;
    if (!gateway || gate.config.requiredCapabilityTags.length === 0) {
      return undefined;
    }
    const allowed = new Set(gate.config.requiredCapabilityTags);
    return (request) => {
      if (!allowed.has(request.capability)) {
        return Promise.reject(new GateConfigurationError(
          `Gate ${gate.config.id} did not declare capability "${request.capability}"`,
        ));
      }
      return gateway.invoke(request, { signal, required: gate.required });
    };
  }

  private skippedResult(gate: PlannedGate, input: GateInput, reason: string): GateResult {
    return this.finalize(gate, input, {
      status: GateStatus.SKIPPED,
      score: 0,
      breakdown: [],
      findings: [reason],
      confidenceReduced: false,
      durationMs: 0,
    });
  }

  private finalize(
    gate: PlannedGate,
    input: GateInput,
    outcome: {
      status: GateStatus;
      score: number;
      breakdown: GateBreakdownEntry[];
      findings: string[];
      confidenceReduced: boolean;
      durationMs: number;
    },
  ): GateResult {
    return deepFreeze({
      gateId: gate.config.id,
      threshold: gate.config.threshold,
      required: gate.required,
      inputHash: hashGateInput(gate, input),
      ...outcome,
    });
  }

  private resolve(config: GateConfig, request: GateRunRequest): PlannedGate {
    const checker = this.checkers.get(config.id);
    if (!checker) {
      throw new GateConfigurationError(`No checker registered for gate "${config.id}"`);
    }
    const required = request.requiredGateIds
      ? request.requiredGateIds.includes(config.id)
      : config.required;
    return { config, checker, required };
  }

  private validate(): void {
    const ids = [...this.gates.keys()];
    for (const gate of this.gates.values()) {
      const errors = validateGateConfig(gate, ids);
      if (errors.length > 0) {
        throw new GateConfigurationError(
          `Invalid gate "${gate.id}": ${errors.map((e) => e.message).join(', ')}`,
        );
      }
    }
    this.plan(ids);
  }
}

export function hashGateInput(gate: { config: GateConfig; checker: GateChecker }, input: GateInput): string {
  return createHash('sha256')
    .update(JSON.stringify({
      gate: gate.config.id,
      checker: gate.checker.version,
      stage: input.stage,
      content: input.content,
      previousOutput: input.previousOutput,
      requiredSections: input.requiredSections,
      domainScores: input.context?.domainScores ?? null,
    }))
    .digest('hex');
}
