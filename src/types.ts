/**
 * Core type definitions for the prompt-chain orchestration engine.
 * These types define the contracts between all components.
 */

// ─── Domains & Project Context ───────────────────────────────────────────────

export enum Domain {
  FRONTEND = 'frontend',
  BACKEND = 'backend',
  SECURITY = 'security',
  PERFORMANCE = 'performance',
  ARCHITECTURE = 'architecture',
  ANALYSIS = 'analysis',
  DOCUMENTATION = 'documentation',
}

export type DomainScores = Readonly<Record<Domain, number>>;

export interface ProjectContext {
  readonly version: number;
  readonly rootPath: string;
  readonly generatedAt: string;
  readonly domainScores: DomainScores;
  readonly extensionHistogram: Readonly<Record<string, number>>;
  readonly directoryHits: Readonly<Record<string, number>>;
  readonly keywordHits: Readonly<Record<string, number>>;
  readonly frameworkHits: readonly string[];
  readonly filesScanned: number;
  readonly unreadablePaths: readonly string[];
}

export interface ContextDelta {
  deltas: Record<Domain, number>;
  maxDelta: number;
  maxDomain: Domain | null;
}

// ─── Chain Stages ────────────────────────────────────────────────────────────

export enum ChainStageId {
  IDEA_DEFINITION = 'idea_definition',
  PRD = 'prd',
  TRD = 'trd',
  FEATURE_BREAKDOWN = 'feature_breakdown',
  USER_STORY = 'user_story',
}

export const CHAIN_DONE = 'done' as const;
export type ChainPosition = ChainStageId | typeof CHAIN_DONE;

export interface StageOutputFormat {
  format: 'markdown';
  requiredSections: string[];
}

export interface AgentPolicy {
  spawningThreshold: number;
  requiredAgents: AgentKind[];
  optionalAgents: AgentKind[];
}

export interface StageConfig {
  id: ChainStageId;
  name: string;
  description: string;
  requiredInputs: string[];
  outputFormat: StageOutputFormat;
  requiredGates: string[];
  optionalGates: string[];
  agentPolicy: AgentPolicy;
  nextStage: ChainStageId | null;
}

// ─── Agents ──────────────────────────────────────────────────────────────────

export enum AgentKind {
  FRONTEND = 'frontend',
  BACKEND = 'backend',
  SECURITY = 'security',
  PERFORMANCE = 'performance',
  ARCHITECT = 'architect',
  ANALYZER = 'analyzer',
  SCRIBE = 'scribe',
}

export enum AgentInstanceState {
  SPAWNED = 'spawned',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

interface AgentDescriptorBase {
  name: string;
  title: string;
  description: string;
  domain: Domain;
  /** Aggregation and conflict rank; lower wins. */
  priority: number;
  domainKeywords: string[];
  filePatterns: string[];
  dirPatterns: string[];
  mcpCapabilityTags: CapabilityTag[];
  allowedTools: string[];
  stageAffinity: ChainStageId[];
}

export type AgentDescriptor =
  | (AgentDescriptorBase & { kind: AgentKind.FRONTEND })
  | (AgentDescriptorBase & { kind: AgentKind.BACKEND })
  | (AgentDescriptorBase & { kind: AgentKind.SECURITY })
  | (AgentDescriptorBase & { kind: AgentKind.PERFORMANCE })
  | (AgentDescriptorBase & { kind: AgentKind.ARCHITECT })
  | (AgentDescriptorBase & { kind: AgentKind.ANALYZER })
  | (AgentDescriptorBase & { kind: AgentKind.SCRIBE });

export interface AgentContextSubset {
  readonly contextVersion: number;
  readonly domain: Domain;
  readonly domainScore: number;
  readonly directoryHits: Readonly<Record<string, number>>;
  readonly keywordHits: Readonly<Record<string, number>>;
  readonly frameworkHits: readonly string[];
}

export interface AgentTask {
  id: string;
  runId: string;
  stage: ChainStageId;
  title: string;
  instructions: string;
  input: string;
  wave: WavePhase;
}

export interface AgentInstance {
  id: string;
  runId: string;
  descriptor: AgentDescriptor;
  task: AgentTask;
  contextSubset: AgentContextSubset;
  state: AgentInstanceState;
  attempts: number;
  createdAt: Date;
  startedAt?: Date;
  finishedAt?: Date;
  error?: string;
}

export interface OutputRegion {
  key: string;
  heading: string;
  content: string;
}

export interface AgentOutput {
  kind: AgentKind;
  content: string;
  regions: OutputRegion[];
  confidenceReduced: boolean;
  capabilityNotes: string[];
  tokensUsed: number;
}

export interface AgentContribution {
  instanceId: string;
  kind: AgentKind;
  priority: number;
  regions: OutputRegion[];
  confidenceReduced: boolean;
  capabilityNotes: string[];
  tokensUsed: number;
}

export interface SecondarySuggestion {
  kind: AgentKind;
  regionKey: string;
  heading: string;
  content: string;
  supersededBy: AgentKind;
}

export interface PartialCoordinationFailure {
  failedKinds: AgentKind[];
  errors: Record<string, string>;
}

export interface AggregatedResult {
  runId: string;
  stage: ChainStageId;
  contributions: AgentContribution[];
  mergedContent: string;
  suggestions: SecondarySuggestion[];
  cancelledKinds: AgentKind[];
  partialFailure: PartialCoordinationFailure | null;
  confidenceReduced: boolean;
}

// ─── Scoring ─────────────────────────────────────────────────────────────────

export enum SpawnDecision {
  AUTO_SPAWN = 'auto_spawn',
  SUGGEST = 'suggest',
  SKIP = 'skip',
}

export type BoundaryPolicy = 'inclusive' | 'exclusive';

export interface WeightedScore {
  value: number;
  weight: number;
}

export interface ScoringSubScores {
  stageRequirement: WeightedScore;
  contentAnalysis: WeightedScore;
  context: WeightedScore;
  preference: WeightedScore;
}

export interface ScoringResult {
  kind: AgentKind;
  stage: ChainStageId;
  subScores: ScoringSubScores;
  total: number;
  decision: SpawnDecision;
  matchedSignals: string[];
  boundaryTie: boolean;
}

export interface UserPreferences {
  preferredAgents?: AgentKind[];
  excludedAgents?: AgentKind[];
  agentWeights?: Partial<Record<AgentKind, number>>;
}

// ─── MCP Capability Servers ──────────────────────────────────────────────────

export enum CapabilityTag {
  DOCUMENTATION = 'documentation',
  REASONING = 'reasoning',
  UI_GENERATION = 'ui-generation',
  TEST_AUTOMATION = 'test-automation',
}

export enum ServerHealth {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
  UNHEALTHY = 'unhealthy',
}

export interface ServerTransportConfig {
  command: string;
  args: string[];
  env?: Record<string, string>;
}

export interface McpServerConfig {
  id: string;
  capabilityTags: CapabilityTag[];
  priority: number;
  healthCheck: { intervalMs: number; timeoutMs: number };
  maxConcurrentLeases: number;
  transport?: ServerTransportConfig;
  toolMap?: Partial<Record<CapabilityTag, string>>;
}

export interface ServerMetrics {
  averageLatencyMs: number;
  successRate: number;
  samples: number;
}

export interface McpServerDescriptor {
  readonly config: McpServerConfig;
  readonly health: ServerHealth;
  readonly consecutiveFailures: number;
  readonly metrics: ServerMetrics;
  readonly activeLeases: number;
}

export interface CapabilityRequest {
  capability: CapabilityTag;
  query: string;
  payload?: Record<string, unknown>;
}

export interface CapabilityResponse {
  result: unknown;
  latencyMs: number;
  success: boolean;
}

export interface CapabilityOutcome {
  capability: CapabilityTag;
  serverId: string | null;
  result: unknown;
  confidenceReduced: boolean;
  fallback: string | null;
}

// ─── Quality Gates ───────────────────────────────────────────────────────────

export enum GateStatus {
  PASSED = 'passed',
  WARNING = 'warning',
  FAILED = 'failed',
  BLOCKED = 'blocked',
  SKIPPED = 'skipped',
}

export type GateStrategy = 'sequential' | 'parallel' | 'adaptive';

export interface GateConfig {
  id: string;
  name: string;
  requiredCapabilityTags: CapabilityTag[];
  threshold: number;
  timeoutMs: number;
  required: boolean;
  dependsOn: string[];
}

export interface GateBreakdownEntry {
  source: 'tool' | 'server';
  name: string;
  version: string;
  score: number;
}

export interface GateResult {
  readonly gateId: string;
  readonly status: GateStatus;
  readonly score: number;
  readonly threshold: number;
  readonly required: boolean;
  readonly breakdown: readonly GateBreakdownEntry[];
  readonly findings: readonly string[];
  readonly inputHash: string;
  readonly confidenceReduced: boolean;
  readonly durationMs: number;
}

export interface GateSummary {
  blocking: GateResult[];
  warnings: GateResult[];
  passed: GateResult[];
}

// ─── Wave Mode ───────────────────────────────────────────────────────────────

export enum WaveStrategy {
  SINGLE_PASS = 'single_pass',
  PROGRESSIVE = 'progressive',
  CONTEXT_DRIVEN = 'context_driven',
  AGENT_COORDINATED = 'agent_coordinated',
  VALIDATION = 'validation',
}

export enum WavePhase {
  SINGLE = 'single',
  FOUNDATION = 'foundation',
  ENHANCEMENT = 'enhancement',
  OPTIMIZATION = 'optimization',
}

export interface WaveFactors {
  chainComplexity: number;
  agentCoordination: number;
  implementationScale: number;
  projectContext: number;
  qualityRequirements: number;
}

export interface WaveDecision {
  subScores: Record<keyof WaveFactors, WeightedScore>;
  total: number;
  multiWave: boolean;
  strategy: WaveStrategy;
  waves: WavePhase[];
  contextVersion: number;
  assessedAt: Date;
}

// ─── Chain Runs ──────────────────────────────────────────────────────────────

export enum ChainRunState {
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  ABORTED = 'aborted',
  FAILED = 'failed',
}

export enum DiagnosticSeverity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
}

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  stage?: ChainStageId;
  details: Record<string, unknown>;
  timestamp: Date;
}

export interface WaveCheckpoint {
  wave: WavePhase;
  content: string;
  gateResults: GateResult[];
  recordedAt: Date;
}

export interface StageOutput {
  stage: ChainStageId;
  content: string;
  scoring: ScoringResult[];
  suggestedAgents: AgentKind[];
  aggregated: AggregatedResult | null;
  gateResults: GateResult[];
  checkpoints: WaveCheckpoint[];
  remediated: boolean;
  tokensUsed: number;
  completedAt: Date;
}

export interface PendingStageOutput {
  stage: ChainStageId;
  content: string;
  scoring: ScoringResult[];
  suggestedAgents: AgentKind[];
  aggregated: AggregatedResult | null;
  checkpoints: WaveCheckpoint[];
  tokensUsed: number;
}

export interface RemediationRequest {
  runId: string;
  stage: ChainStageId;
  failedGates: GateResult[];
  findings: string[];
  content: string;
}

export interface ChainRun {
  id: string;
  idea: string;
  projectRoot: string;
  state: ChainRunState;
  currentStage: ChainPosition;
  stages: StageOutput[];
  context: ProjectContext | null;
  preferences: UserPreferences;
  waveDecision: WaveDecision | null;
  pendingWaveDecision: WaveDecision | null;
  pendingOutput: PendingStageOutput | null;
  pendingRemediation: RemediationRequest | null;
  diagnostics: Diagnostic[];
  createdAt: Date;
  updatedAt: Date;
}

export type StageOutcome =
  | { kind: 'advanced'; run: ChainRun; output: StageOutput }
  | { kind: 'remediation'; run: ChainRun; request: RemediationRequest }
  | { kind: 'terminated'; run: ChainRun; reason: string };

export interface ChainRunReport {
  runId: string;
  state: ChainRunState;
  currentStage: ChainPosition;
  completedStages: ChainStageId[];
  finalOutput: string | null;
  remediation: RemediationRequest | null;
  waveDecision: WaveDecision | null;
  diagnostics: Diagnostic[];
  totalTokensUsed: number;
}

// ─── Tracking ────────────────────────────────────────────────────────────────

export enum TrackingEventType {
  RUN_STARTED = 'run_started',
  WAVE_ASSESSED = 'wave_assessed',
  WAVE_FLIPPED = 'wave_flipped',
  CONTEXT_REFRESHED = 'context_refreshed',
  STAGE_STARTED = 'stage_started',
  AGENTS_SCORED = 'agents_scored',
  AGENT_COMPLETED = 'agent_completed',
  AGENT_FAILED = 'agent_failed',
  GATES_EVALUATED = 'gates_evaluated',
  REMEDIATION_REQUESTED = 'remediation_requested',
  STAGE_ADVANCED = 'stage_advanced',
  RUN_COMPLETED = 'run_completed',
  RUN_ABORTED = 'run_aborted',
  RUN_FAILED = 'run_failed',
}

export interface TrackingEvent {
  id: string;
  runId: string;
  type: TrackingEventType;
  timestamp: string;
  stage?: ChainStageId;
  agentKind?: AgentKind;
  message: string;
  details: Record<string, unknown>;
  durationMs?: number;
  tokensUsed?: number;
}

export interface RunHistorySummary {
  runId: string;
  totalEvents: number;
  stagesAdvanced: number;
  remediationRequests: number;
  agentsCompleted: number;
  agentsFailed: number;
  totalTokensUsed: number;
  byType: Record<string, number>;
}
