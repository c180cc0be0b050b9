import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { z } from 'zod';
import {
  type BoundaryPolicy,
  type GateStrategy,
  type McpServerConfig,
  AgentKind,
  CapabilityTag,
  ChainStageId,
} from '../types';
import { ConfigValidationError } from './errors';

export type InferenceMode = 'claude-cli' | 'simulation';

export interface EngineConfig {
  maxConcurrentAgents: number;
  agentTimeoutMs: number;
  cancellationGraceMs: number;
  boundaryPolicy: BoundaryPolicy;
  gateStrategy: GateStrategy;
  maxParallelGates: number;
  contextChangeThreshold: number;
  waveThreshold: number;
}

export interface AnalyzerConfig {
  maxDepth: number;
  maxFiles: number;
  maxContentFiles: number;
  maxContentBytes: number;
  ignore: string[];
}

export interface ScoringConfig {
  suggestThreshold: number;
  stageThresholds: Partial<Record<ChainStageId, number>>;
}

export interface SelectorConfig {
  minSuccessRate: number;
  maxAverageLatencyMs: number;
  unhealthyAfterFailures: number;
  metricsWindow: number;
  leaseWaitMs: number;
  affinity: Partial<Record<AgentKind, string[]>>;
}

export interface InferenceConfig {
  mode: InferenceMode;
  model?: string;
  claudePath?: string;
  timeoutMs: number;
}

export interface GateOverride {
  threshold?: number;
  timeoutMs?: number;
  required?: boolean;
}

export interface AgentOverrides {
  [kind: string]: { enabled: boolean };
}

export interface PcoConfig {
  engine: EngineConfig;
  analyzer: AnalyzerConfig;
  scoring: ScoringConfig;
  selector: SelectorConfig;
  inference: InferenceConfig;
  servers: McpServerConfig[];
  gates: Record<string, GateOverride>;
  agents: AgentOverrides;
}

const CONFIG_FILE_NAMES = [
  'pco.config.yaml',
  'pco.config.yml',
  'pco.config.json',
  '.pcorc',
];

const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  maxConcurrentAgents: 4,
  agentTimeoutMs: 120_000,
  cancellationGraceMs: 2_000,
  boundaryPolicy: 'inclusive',
  gateStrategy: 'adaptive',
  maxParallelGates: 3,
  contextChangeThreshold: 0.15,
  waveThreshold: 0.7,
};

const DEFAULT_ANALYZER_CONFIG: AnalyzerConfig = {
  maxDepth: 6,
  maxFiles: 5000,
  maxContentFiles: 400,
  maxContentBytes: 64 * 1024,
  ignore: [],
};

const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  suggestThreshold: 0.7,
  stageThresholds: {},
};

const DEFAULT_SELECTOR_CONFIG: SelectorConfig = {
  minSuccessRate: 0.8,
  maxAverageLatencyMs: 5_000,
  unhealthyAfterFailures: 3,
  metricsWindow: 20,
  leaseWaitMs: 0,
  affinity: {},
};

const DEFAULT_INFERENCE_CONFIG: InferenceConfig = {
  mode: 'claude-cli',
  timeoutMs: 300_000,
};

const DEFAULT_AGENT_OVERRIDES: AgentOverrides = Object.fromEntries(
  Object.values(AgentKind).map((kind) => [kind, { enabled: true }]),
);

// ─── Schema ──────────────────────────────────────────────────────────────────

const unitInterval = z.number().min(0).max(1);

const serverSchema = z.object({
  id: z.string().min(1),
  capabilityTags: z.array(z.nativeEnum(CapabilityTag)).min(1),
  priority: z.number().int().min(0).default(10),
  healthCheck: z.object({
    intervalMs: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
  }).default({ intervalMs: 30_000, timeoutMs: 5_000 }),
  maxConcurrentLeases: z.number().int().positive().default(2),
  transport: z.object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).optional(),
  }).optional(),
  toolMap: z.record(z.nativeEnum(CapabilityTag), z.string()).optional(),
});

const configSchema = z.object({
  engine: z.object({
    maxConcurrentAgents: z.number().int().positive(),
    agentTimeoutMs: z.number().int().positive(),
    cancellationGraceMs: z.number().int().nonnegative(),
    boundaryPolicy: z.enum(['inclusive', 'exclusive']),
    gateStrategy: z.enum(['sequential', 'parallel', 'adaptive']),
    maxParallelGates: z.number().int().positive(),
    contextChangeThreshold: unitInterval,
    waveThreshold: unitInterval,
  }).partial().optional(),
  analyzer: z.object({
    maxDepth: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
    maxContentFiles: z.number().int().nonnegative(),
    maxContentBytes: z.number().int().positive(),
    ignore: z.array(z.string()),
  }).partial().optional(),
  scoring: z.object({
    suggestThreshold: unitInterval,
    stageThresholds: z.record(z.nativeEnum(ChainStageId), unitInterval),
  }).partial().optional(),
  selector: z.object({
    minSuccessRate: unitInterval,
    maxAverageLatencyMs: z.number().positive(),
    unhealthyAfterFailures: z.number().int().positive(),
    metricsWindow: z.number().int().positive(),
    leaseWaitMs: z.number().int().nonnegative(),
    affinity: z.record(z.nativeEnum(AgentKind), z.array(z.string())),
  }).partial().optional(),
  inference: z.object({
    mode: z.enum(['claude-cli', 'simulation']),
    model: z.string(),
    claudePath: z.string(),
    timeoutMs: z.number().int().positive(),
  }).partial().optional(),
  servers: z.array(serverSchema).optional(),
  gates: z.record(z.object({
    threshold: unitInterval.optional(),
    timeoutMs: z.number().int().positive().optional(),
    required: z.boolean().optional(),
  })).optional(),
  agents: z.record(z.object({ enabled: z.boolean() })).optional(),
});

type ConfigInput = z.infer<typeof configSchema>;

// ─── Loading ─────────────────────────────────────────────────────────────────

export function loadConfig(projectPath: string): PcoConfig {
  for (const fileName of CONFIG_FILE_NAMES) {
    const filePath = path.join(projectPath, fileName);
    if (fs.existsSync(filePath)) {
      const content = fs.readFileSync(filePath, 'utf-8');
      const parsed: unknown = fileName.endsWith('.json')
        ? JSON.parse(content)
        : yaml.parse(content);
      return parseConfig(parsed ?? {}, filePath);
    }
  }
  return getDefaultConfig();
}

export function parseConfig(raw: unknown, source: string = '<inline>'): PcoConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(
      source,
      result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return mergeWithDefaults(result.data);
}

export function getDefaultConfig(): PcoConfig {
  return {
    engine: { ...DEFAULT_ENGINE_CONFIG },
    analyzer: { ...DEFAULT_ANALYZER_CONFIG, ignore: [] },
    scoring: { ...DEFAULT_SCORING_CONFIG, stageThresholds: {} },
    selector: { ...DEFAULT_SELECTOR_CONFIG, affinity: {} },
    inference: { ...DEFAULT_INFERENCE_CONFIG },
    servers: [],
    gates: {},
    agents: { ...DEFAULT_AGENT_OVERRIDES },
  };
}

function mergeWithDefaults(partial: ConfigInput): PcoConfig {
  return {
    engine: { ...DEFAULT_ENGINE_CONFIG, ...partial.engine },
    analyzer: { ...DEFAULT_ANALYZER_CONFIG, ...partial.analyzer },
    scoring: { ...DEFAULT_SCORING_CONFIG, ...partial.scoring },
    selector: { ...DEFAULT_SELECTOR_CONFIG, ...partial.selector },
    inference: { ...DEFAULT_INFERENCE_CONFIG, ...partial.inference },
    servers: partial.servers ?? [],
    gates: partial.gates ?? {},
    agents: { ...DEFAULT_AGENT_OVERRIDES, ...partial.agents },
  };
}

export function saveConfig(projectPath: string, config: PcoConfig): void {
  const filePath = path.join(projectPath, 'pco.config.yaml');
  const content = yaml.stringify(config);
  fs.writeFileSync(filePath, content, 'utf-8');
}

export function isAgentEnabled(config: PcoConfig, kind: AgentKind): boolean {
  return config.agents[kind]?.enabled !== false;
}
