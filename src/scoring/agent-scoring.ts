import { minimatch } from 'minimatch';
import {
  type AgentDescriptor,
  type BoundaryPolicy,
  type ChainStageId,
  type ProjectContext,
  type ScoringResult,
  type ScoringSubScores,
  type UserPreferences,
  SpawnDecision,
} from '../types';
import { ScoringAmbiguity } from '../utils/errors';
import { agentLog } from '../utils/logger';
import {
  assertWeightsSumToOne,
  isOnBoundary,
  meetsThreshold,
  normalizeScore,
  saturate,
  weightedTotal,
} from '../utils/score-math';
import { getStageConfig } from '../pipeline/stages';

export const SCORING_WEIGHTS = {
  stageRequirement: 0.40,
  contentAnalysis: 0.35,
  context: 0.15,
  preference: 0.10,
} as const;

const REQUIRED_AGENT_CREDIT = 1.0;
const OPTIONAL_AGENT_CREDIT = 0.5;
const AFFINITY_CREDIT = 0.5;
const CONTENT_HIT_SATURATION = 2;
const CONTEXT_DIR_CREDIT = 0.5;
const NEUTRAL_PREFERENCE = 0.5;

export interface ScoringOptions {
  boundaryPolicy: BoundaryPolicy;
  suggestThreshold: number;
  stageThresholds: Partial<Record<ChainStageId, number>>;
}

export function decide(
  total: number,
  spawningThreshold: number,
  suggestThreshold: number,
  policy: BoundaryPolicy = 'inclusive',
): SpawnDecision {
  if (meetsThreshold(total, spawningThreshold, policy)) return SpawnDecision.AUTO_SPAWN;
  if (meetsThreshold(total, suggestThreshold, policy)) return SpawnDecision.SUGGEST;
  return SpawnDecision.SKIP;
}

export class AgentScoringEngine {
  private descriptors: AgentDescriptor[];
  private options: ScoringOptions;

  constructor(descriptors: AgentDescriptor[], options: ScoringOptions) {
    assertWeightsSumToOne(SCORING_WEIGHTS, 'Scoring');
    this.descriptors = descriptors;
    this.options = options;
  }

  spawningThreshold(stage: ChainStageId): number {
    return this.options.stageThresholds[stage] ?? getStageConfig(stage).agentPolicy.spawningThreshold;
  }

  score(
    stage: ChainStageId,
    content: string,
    context: ProjectContext | null,
    preferences: UserPreferences = {},
  ): ScoringResult[] {
    return this.descriptors
      .map((d) => ({ descriptor: d, result: this.scoreAgent(d, stage, content, context, preferences) }))
      .sort((a, b) => b.result.total - a.result.total || a.descriptor.priority - b.descriptor.priority)
      .map((entry) => entry.result);
  }

  scoreAgent(
    descriptor: AgentDescriptor,
    stage: ChainStageId,
    content: string,
    context: ProjectContext | null,
    preferences: UserPreferences = {},
  ): ScoringResult {
    const matchedSignals: string[] = [];

    const subScores: ScoringSubScores = {
      stageRequirement: {
        value: this.stageRequirement(descriptor, stage, matchedSignals),
        weight: SCORING_WEIGHTS.stageRequirement,
      },
      contentAnalysis: {
        value: this.contentAnalysis(descriptor, content, matchedSignals),
        weight: SCORING_WEIGHTS.contentAnalysis,
      },
      context: {
        value: this.contextScore(descriptor, context, matchedSignals),
        weight: SCORING_WEIGHTS.context,
      },
      preference: {
        value: this.preference(descriptor, preferences, matchedSignals),
        weight: SCORING_WEIGHTS.preference,
      },
    };

    const total = weightedTotal({ ...subScores });
    const spawning = this.spawningThreshold(stage);
    const boundaryTie = isOnBoundary(total, [spawning, this.options.suggestThreshold]);
    if (boundaryTie) {
      agentLog(descriptor.kind, `${ScoringAmbiguity}: total ${total} sits on a decision boundary (${this.options.boundaryPolicy})`, stage);
    }

    return {
      kind: descriptor.kind,
      stage,
      subScores,
      total,
      decision: decide(total, spawning, this.options.suggestThreshold, this.options.boundaryPolicy),
      matchedSignals,
      boundaryTie,
    };
  }

  // ─── Sub-scores ───────────────────────────────────────────────────────────

  private stageRequirement(descriptor: AgentDescriptor, stage: ChainStageId, signals: string[]): number {
    const policy = getStageConfig(stage).agentPolicy;
    let credit = 0;
    if (policy.requiredAgents.includes(descriptor.kind)) {
      credit += REQUIRED_AGENT_CREDIT;
      signals.push('stage:required');
    }
    if (policy.optionalAgents.includes(descriptor.kind)) {
      credit += OPTIONAL_AGENT_CREDIT;
      signals.push('stage:optional');
    }
    if (descriptor.stageAffinity.includes(stage)) {
      credit += AFFINITY_CREDIT;
      signals.push('stage:affinity');
    }
    return normalizeScore(Math.min(1, credit));
  }

  private contentAnalysis(descriptor: AgentDescriptor, content: string, signals: string[]): number {
    const lower = content.toLowerCase();
    const keywords = descriptor.domainKeywords.filter((k) => containsWord(lower, k.toLowerCase()));
    for (const k of keywords) signals.push(`keyword:${k}`);

    const paths = extractPathMentions(content);
    const patterns = new Set<string>();
    for (const mention of paths) {
      for (const pattern of descriptor.filePatterns) {
        if (minimatch(mention, pattern, { matchBase: true, nocase: true, dot: true })) {
          patterns.add(pattern);
        }
      }
      const segments = mention.split('/').filter((s) => s.length > 0);
      for (const pattern of descriptor.dirPatterns) {
        if (segments.some((segment) => minimatch(segment, pattern, { nocase: true, dot: true }))) {
          patterns.add(pattern);
        }
      }
    }
    for (const p of patterns) signals.push(`path:${p}`);

    return saturate(keywords.length + patterns.size, CONTENT_HIT_SATURATION);
  }

  private contextScore(descriptor: AgentDescriptor, context: ProjectContext | null, signals: string[]): number {
    if (!context) return 0;
    const domainScore = context.domainScores[descriptor.domain];
    const dirs = Object.keys(context.directoryHits);
    const matched = descriptor.dirPatterns.filter((pattern) =>
      dirs.some((dir) => minimatch(dir, pattern, { nocase: true, dot: true })),
    );
    for (const m of matched) signals.push(`context:${m}`);
    return normalizeScore(Math.min(1, domainScore + CONTEXT_DIR_CREDIT * matched.length));
  }

  private preference(descriptor: AgentDescriptor, preferences: UserPreferences, signals: string[]): number {
    if (preferences.excludedAgents?.includes(descriptor.kind)) {
      signals.push('preference:excluded');
      return 0;
    }
    if (preferences.preferredAgents?.includes(descriptor.kind)) {
      signals.push('preference:preferred');
      return 1;
    }
    const weight = preferences.agentWeights?.[descriptor.kind];
    if (weight !== undefined) {
      signals.push(`preference:weight=${weight}`);
      return normalizeScore(weight);
    }
    return NEUTRAL_PREFERENCE;
  }
}

/** Whole-word match; a plural `s` or `es` still counts. */
function containsWord(text: string, word: string): boolean {
  const escaped = word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[^a-z0-9])${escaped}(?:e?s)?(?=$|[^a-z0-9])`, 'i').test(text);
}

/** Path-like tokens: anything with a slash, or a file name with an extension. */
export function extractPathMentions(content: string): string[] {
  const mentions = new Set<string>();
  for (const raw of content.split(/[\s`'"()[\]{},;]+/)) {
    const token = raw.replace(/^\.?\/+/, '').replace(/[.:]+$/, '');
    if (token.length === 0) continue;
    if (raw.includes('/') || /^[\w.-]+\.[A-Za-z]{1,5}$/.test(token)) {
      mentions.add(token);
    }
  }
  return [...mentions];
}
