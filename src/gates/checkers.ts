import {
  type CapabilityOutcome,
  type CapabilityRequest,
  type ChainStageId,
  CapabilityTag,
  type GateBreakdownEntry,
  type ProjectContext,
} from '../types';
import {
  countWords,
  extractKeyTerms,
  findSection,
  listItems,
  paragraphs,
  parseSections,
} from '../utils/markdown';
import { saturate, normalizeScore } from '../utils/score-math';
import { GateId } from './gate-ids';

// ─── Checker contract ───────────────────────────────────────────────────────

export interface GateInput {
  stage: ChainStageId;
  content: string;
  previousOutput: string | null;
  requiredSections: string[];
  context: ProjectContext | null;
}

export interface GateToolbox {
  signal: AbortSignal;
  /** Present only when the gate declares capability tags. */
  invokeCapability?: (request: CapabilityRequest) => Promise<CapabilityOutcome>;
}

export interface GateCheck {
  score: number;
  findings: string[];
  breakdown?: GateBreakdownEntry[];
  confidenceReduced?: boolean;
}

export interface GateChecker {
  readonly id: string;
  readonly version: string;
  check(input: GateInput, toolbox: GateToolbox): Promise<GateCheck>;
}

// ─── Thresholds ─────────────────────────────────────────────────────────────

export const MIN_SECTION_WORDS = 20;
const TRACEABILITY_TERMS = 10;

export const SECURITY_TOPICS = ['authentication', 'authorization', 'encryption', 'validation', 'secret', 'audit'];
const SECURITY_TOPIC_SATURATION = 4;
const RISK_PENALTY = 0.25;
const SECURITY_RISK_PATTERNS: Array<{ pattern: RegExp; label: string }> = [
  { pattern: /plain\s*-?text\s+passwords?/i, label: 'plaintext passwords' },
  { pattern: /hard-?coded\s+(?:secrets?|passwords?|keys?|credentials?)/i, label: 'hardcoded credentials' },
  { pattern: /disabl\w*\s+(?:ssl|tls|https|certificate)/i, label: 'transport security disabled' },
  { pattern: /\beval\s*\(/i, label: 'dynamic code evaluation' },
  { pattern: /no\s+authentication/i, label: 'unauthenticated access' },
];

export const PERFORMANCE_TOPICS = ['latency', 'throughput', 'cache', 'scalab', 'load', 'response time'];
const PERFORMANCE_TOPIC_SATURATION = 3;

const MEASURABLE_PATTERN = /\d|\b(?:at least|at most|within|less than|more than|given|when|then|must)\b/i;

// ─── Built-in checkers ──────────────────────────────────────────────────────

export const structureChecker: GateChecker = {
  id: GateId.STRUCTURE,
  version: '1.0.0',
  async check(input) {
    if (input.requiredSections.length === 0) {
      return { score: parseSections(input.content).length > 0 ? 1 : 0, findings: [] };
    }
    const sections = parseSections(input.content);
    const findings: string[] = [];
    let present = 0;
    for (const heading of input.requiredSections) {
      if (findSection(sections, heading)) {
        present++;
      } else {
        findings.push(`Missing section "${heading}"`);
      }
    }
    return { score: normalizeScore(present / input.requiredSections.length), findings };
  },
};

export const completenessChecker: GateChecker = {
  id: GateId.COMPLETENESS,
  version: '1.0.0',
  async check(input) {
    const sections = parseSections(input.content);
    const headings = input.requiredSections.length > 0
      ? input.requiredSections
      : sections.map((s) => s.heading);
    if (headings.length === 0) {
      return { score: 0, findings: ['Output has no sections'] };
    }

    const findings: string[] = [];
    let total = 0;
    for (const heading of headings) {
      const section = findSection(sections, heading);
      const words = section ? countWords(section.body) : 0;
      const substance = saturate(words, MIN_SECTION_WORDS);
      if (substance < 1) {
        findings.push(`Section "${heading}" has ${words} words, expected at least ${MIN_SECTION_WORDS}`);
      }
      total += substance;
    }
    return { score: normalizeScore(total / headings.length), findings };
  },
};

export const traceabilityChecker: GateChecker = {
  id: GateId.TRACEABILITY,
  version: '1.0.0',
  async check(input) {
    if (!input.previousOutput) {
      return { score: 1, findings: [] };
    }
    const terms = extractKeyTerms(input.previousOutput, TRACEABILITY_TERMS);
    if (terms.length === 0) {
      return { score: 1, findings: [] };
    }
    const content = input.content.toLowerCase();
    const missing = terms.filter((t) => !content.includes(t));
    return {
      score: normalizeScore((terms.length - missing.length) / terms.length),
      findings: missing.length > 0
        ? [`Terms from the previous stage not carried forward: ${missing.join(', ')}`]
        : [],
    };
  },
};

export const securityChecker: GateChecker = {
  id: GateId.SECURITY,
  version: '1.0.0',
  async check(input) {
    const content = input.content.toLowerCase();
    const covered = SECURITY_TOPICS.filter((t) => content.includes(t));
    const risks = SECURITY_RISK_PATTERNS.filter((r) => r.pattern.test(input.content));

    const findings: string[] = [];
    if (covered.length < SECURITY_TOPIC_SATURATION) {
      const missing = SECURITY_TOPICS.filter((t) => !covered.includes(t));
      findings.push(`Security topics not addressed: ${missing.join(', ')}`);
    }
    for (const risk of risks) {
      findings.push(`Risky practice mentioned: ${risk.label}`);
    }

    const coverage = saturate(covered.length, SECURITY_TOPIC_SATURATION);
    return { score: normalizeScore(coverage - RISK_PENALTY * risks.length), findings };
  },
};

export const testabilityChecker: GateChecker = {
  id: GateId.TESTABILITY,
  version: '1.0.0',
  async check(input) {
    const items = listItems(input.content);
    if (items.length === 0) {
      return { score: 0, findings: ['No list items to verify'] };
    }
    const vague = items.filter((item) => !MEASURABLE_PATTERN.test(item));
    return {
      score: normalizeScore((items.length - vague.length) / items.length),
      findings: vague.slice(0, 5).map((item) => `Not measurable: "${item}"`),
    };
  },
};

export const performanceChecker: GateChecker = {
  id: GateId.PERFORMANCE,
  version: '1.0.0',
  async check(input) {
    const content = input.content.toLowerCase();
    const covered = PERFORMANCE_TOPICS.filter((t) => content.includes(t));
    return {
      score: saturate(covered.length, PERFORMANCE_TOPIC_SATURATION),
      findings: covered.length < PERFORMANCE_TOPIC_SATURATION
        ? [`Performance topics covered: ${covered.length}/${PERFORMANCE_TOPIC_SATURATION}`]
        : [],
    };
  },
};

const DOCUMENTATION_CHECKER_VERSION = '1.0.0';

export const documentationChecker: GateChecker = {
  id: GateId.DOCUMENTATION,
  version: DOCUMENTATION_CHECKER_VERSION,
  async check(input, toolbox) {
    const sections = parseSections(input.content);
    const prose = sections.reduce((sum, s) => sum + paragraphs(s.body).length, 0);
    const localScore = sections.length === 0 ? 0 : saturate(prose, sections.length);

    const breakdown: GateBreakdownEntry[] = [
      { source: 'tool', name: 'paragraph-density', version: DOCUMENTATION_CHECKER_VERSION, score: localScore },
    ];
    const findings: string[] = localScore < 1
      ? [`${prose} prose paragraphs across ${sections.length} sections`]
      : [];

    if (!toolbox.invokeCapability) {
      return { score: localScore, findings, breakdown };
    }

    const outcome = await toolbox.invokeCapability({
      capability: CapabilityTag.DOCUMENTATION,
      query: 'Rate documentation quality from 0 to 1',
      payload: { content: input.content },
    });
    const serverScore = readScore(outcome.result);
    if (outcome.serverId !== null && serverScore !== null) {
      breakdown.push({ source: 'server', name: outcome.serverId, version: 'mcp', score: serverScore });
      return {
        score: normalizeScore((localScore + serverScore) / 2),
        findings,
        breakdown,
        confidenceReduced: outcome.confidenceReduced,
      };
    }

    findings.push(`Documentation capability answered by ${outcome.fallback ?? 'no provider'}; local score only`);
    return { score: localScore, findings, breakdown, confidenceReduced: true };
  },
};

function readScore(result: unknown): number | null {
  if (typeof result === 'number') return normalizeScore(result);
  if (typeof result === 'object' && result !== null) {
    const score: unknown = Reflect.get(result, 'score');
    if (typeof score === 'number') return normalizeScore(score);
  }
  return null;
}

export const BUILT_IN_CHECKERS: GateChecker[] = [
  structureChecker,
  completenessChecker,
  traceabilityChecker,
  securityChecker,
  testabilityChecker,
  performanceChecker,
  documentationChecker,
];
