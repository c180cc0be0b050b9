import { type GateConfig, CapabilityTag, ChainStageId } from '../types';
import { type GateOverride } from '../utils/config';
import { getStageGates } from '../pipeline/stages';
import { GateId } from './gate-ids';

const DEFAULT_GATE_TIMEOUT_MS = 30_000;

const DEFAULT_GATES: GateConfig[] = [
  {
    id: GateId.STRUCTURE,
    name: 'Output Structure',
    requiredCapabilityTags: [],
    threshold: 0.8,
    timeoutMs: DEFAULT_GATE_TIMEOUT_MS,
    required: true,
    dependsOn: [],
  },
  {
    id: GateId.COMPLETENESS,
    name: 'Section Completeness',
    requiredCapabilityTags: [],
    threshold: 0.7,
    timeoutMs: DEFAULT_GATE_TIMEOUT_MS,
    required: true,
    dependsOn: [GateId.STRUCTURE],
  },
  {
    id: GateId.TRACEABILITY,
    name: 'Traceability to Previous Stage',
    requiredCapabilityTags: [],
    threshold: 0.6,
    timeoutMs: DEFAULT_GATE_TIMEOUT_MS,
    required: false,
    dependsOn: [GateId.STRUCTURE],
  },
  {
    id: GateId.SECURITY,
    name: 'Security Coverage',
    requiredCapabilityTags: [],
    threshold: 0.95,
    timeoutMs: DEFAULT_GATE_TIMEOUT_MS,
    required: true,
    dependsOn: [GateId.STRUCTURE],
  },
  {
    id: GateId.TESTABILITY,
    name: 'Testability',
    requiredCapabilityTags: [],
    threshold: 0.7,
    timeoutMs: DEFAULT_GATE_TIMEOUT_MS,
    required: false,
    dependsOn: [GateId.COMPLETENESS],
  },
  {
    id: GateId.PERFORMANCE,
    name: 'Performance Coverage',
    requiredCapabilityTags: [],
    threshold: 0.6,
    timeoutMs: DEFAULT_GATE_TIMEOUT_MS,
    required: false,
    dependsOn: [GateId.STRUCTURE],
  },
  {
    id: GateId.DOCUMENTATION,
    name: 'Documentation Quality',
    requiredCapabilityTags: [CapabilityTag.DOCUMENTATION],
    threshold: 0.6,
    timeoutMs: DEFAULT_GATE_TIMEOUT_MS,
    required: false,
    dependsOn: [GateId.STRUCTURE],
  },
];

export function getDefaultGateConfigs(): GateConfig[] {
  return DEFAULT_GATES.map((g) => ({
    ...g,
    requiredCapabilityTags: [...g.requiredCapabilityTags],
    dependsOn: [...g.dependsOn],
  }));
}

export function applyGateOverrides(
  gates: GateConfig[],
  overrides: Record<string, GateOverride>,
): GateConfig[] {
  return gates.map((gate) => {
    const override = overrides[gate.id];
    return override ? { ...gate, ...override } : gate;
  });
}

/** Static stage→gate mapping consulted by the adaptive strategy. */
export const STAGE_GATE_MAP: Record<ChainStageId, string[]> = {
  [ChainStageId.IDEA_DEFINITION]: getStageGates(ChainStageId.IDEA_DEFINITION),
  [ChainStageId.PRD]: getStageGates(ChainStageId.PRD),
  [ChainStageId.TRD]: getStageGates(ChainStageId.TRD),
  [ChainStageId.FEATURE_BREAKDOWN]: getStageGates(ChainStageId.FEATURE_BREAKDOWN),
  [ChainStageId.USER_STORY]: getStageGates(ChainStageId.USER_STORY),
};
