import {
  type BoundaryPolicy,
  type ChainPosition,
  type ChainStageId,
  type ProjectContext,
  type WaveDecision,
  type WaveFactors,
  type WeightedScore,
  Domain,
  WavePhase,
  WaveStrategy,
} from '../types';
import { getRemainingStages, getStageConfig, getStagesInOrder } from '../pipeline/stages';
import { countWords } from '../utils/markdown';
import { chainLog } from '../utils/logger';
import {
  assertWeightsSumToOne,
  meetsThreshold,
  normalizeScore,
  saturate,
  weightedTotal,
} from '../utils/score-math';

export const WAVE_WEIGHTS: Readonly<Record<keyof WaveFactors, number>> = {
  chainComplexity: 0.35,
  agentCoordination: 0.25,
  implementationScale: 0.20,
  projectContext: 0.15,
  qualityRequirements: 0.05,
};

export const DEFAULT_WAVE_THRESHOLD = 0.7;

const IDEA_WORDS_SATURATION = 400;
const ACTIVE_DOMAIN_FLOOR = 0.3;
const ACTIVE_DOMAINS_SATURATION = 4;
const FILES_SATURATION = 500;

const MULTI_WAVE_PHASES = [WavePhase.FOUNDATION, WavePhase.ENHANCEMENT, WavePhase.OPTIMIZATION];

/** Factor that wins the strategy pick; earlier entries win ties. */
const STRATEGY_BY_FACTOR: Array<[keyof WaveFactors, WaveStrategy]> = [
  ['chainComplexity', WaveStrategy.PROGRESSIVE],
  ['agentCoordination', WaveStrategy.AGENT_COORDINATED],
  ['implementationScale', WaveStrategy.CONTEXT_DRIVEN],
  ['projectContext', WaveStrategy.CONTEXT_DRIVEN],
  ['qualityRequirements', WaveStrategy.VALIDATION],
];

export interface WaveAssessmentInput {
  idea: string;
  position: ChainPosition;
  context: ProjectContext | null;
  /** Gate ids treated as required, per stage; defaults to the stage configs. */
  requiredGateIds?: (stage: ChainStageId) => string[];
  overrides?: Partial<WaveFactors>;
}

export interface WaveAssessorOptions {
  threshold: number;
  boundaryPolicy: BoundaryPolicy;
}

export class WaveAssessor {
  private options: WaveAssessorOptions;

  constructor(options: Partial<WaveAssessorOptions> = {}) {
    assertWeightsSumToOne(WAVE_WEIGHTS, 'Wave');
    this.options = {
      threshold: options.threshold ?? DEFAULT_WAVE_THRESHOLD,
      boundaryPolicy: options.boundaryPolicy ?? 'inclusive',
    };
  }

  deriveFactors(input: WaveAssessmentInput): WaveFactors {
    const remaining = getRemainingStages(input.position);
    const allStages = getStagesInOrder();

    const chainComplexity =
      0.5 * (remaining.length / allStages.length) +
      0.5 * saturate(countWords(input.idea), IDEA_WORDS_SATURATION);

    let activeDomains = 0;
    let strongest = 0;
    let filesScanned = 0;
    if (input.context) {
      for (const domain of Object.values(Domain)) {
        const score = input.context.domainScores[domain];
        if (score > ACTIVE_DOMAIN_FLOOR) activeDomains++;
        strongest = Math.max(strongest, score);
      }
      filesScanned = input.context.filesScanned;
    }

    let requiredGates = 0;
    let allGates = 0;
    for (const stage of remaining) {
      const config = getStageConfig(stage);
      const required = input.requiredGateIds ? input.requiredGateIds(stage) : config.requiredGates;
      requiredGates += required.length;
      allGates += new Set([...config.requiredGates, ...config.optionalGates, ...required]).size;
    }

    return {
      chainComplexity: normalizeScore(chainComplexity),
      agentCoordination: saturate(activeDomains, ACTIVE_DOMAINS_SATURATION),
      implementationScale: saturate(filesScanned, FILES_SATURATION),
      projectContext: normalizeScore(strongest),
      qualityRequirements: allGates > 0 ? normalizeScore(requiredGates / allGates) : 0,
    };
  }

  assess(input: WaveAssessmentInput): WaveDecision {
    const factors = { ...this.deriveFactors(input), ...clampOverrides(input.overrides) };
    return this.decide(factors, input.context?.version ?? 0);
  }

  decide(factors: WaveFactors, contextVersion: number): WaveDecision {
    const subScores: Record<keyof WaveFactors, WeightedScore> = {
      chainComplexity: { value: factors.chainComplexity, weight: WAVE_WEIGHTS.chainComplexity },
      agentCoordination: { value: factors.agentCoordination, weight: WAVE_WEIGHTS.agentCoordination },
      implementationScale: { value: factors.implementationScale, weight: WAVE_WEIGHTS.implementationScale },
      projectContext: { value: factors.projectContext, weight: WAVE_WEIGHTS.projectContext },
      qualityRequirements: { value: factors.qualityRequirements, weight: WAVE_WEIGHTS.qualityRequirements },
    };

    const total = weightedTotal(subScores);
    const multiWave = meetsThreshold(total, this.options.threshold, this.options.boundaryPolicy);
    const strategy = multiWave ? pickStrategy(factors) : WaveStrategy.SINGLE_PASS;

    chainLog(`Wave assessment: ${total.toFixed(3)} → ${strategy}${multiWave ? ' (multi-wave)' : ''}`, 'debug');

    return {
      subScores,
      total,
      multiWave,
      strategy,
      waves: multiWave ? [...MULTI_WAVE_PHASES] : [WavePhase.SINGLE],
      contextVersion,
      assessedAt: new Date(),
    };
  }
}

function pickStrategy(factors: WaveFactors): WaveStrategy {
  let best = STRATEGY_BY_FACTOR[0];
  for (const entry of STRATEGY_BY_FACTOR) {
    if (factors[entry[0]] > factors[best[0]]) best = entry;
  }
  return best[1];
}

function clampOverrides(overrides: Partial<WaveFactors> = {}): Partial<WaveFactors> {
  const clamped: Partial<WaveFactors> = {};
  for (const [key] of STRATEGY_BY_FACTOR) {
    const value = overrides[key];
    if (value !== undefined) clamped[key] = normalizeScore(value);
  }
  return clamped;
}

/** True when two decisions disagree on single- versus multi-wave execution. */
export function isFlipped(previous: WaveDecision, next: WaveDecision): boolean {
  return previous.multiWave !== next.multiWave;
}
