export * from './types';
export * from './utils/errors';
export { loadConfig, parseConfig, getDefaultConfig, saveConfig, type PcoConfig, type InferenceMode } from './utils/config';
export { ContextAnalyzer, compareContexts, isSignificantChange, getDomainSignals } from './analyzer/context-analyzer';
export { AgentScoringEngine, SCORING_WEIGHTS, decide } from './scoring/agent-scoring';
export { AgentRegistry, getAgentDescriptor, getAllAgentDescriptors } from './agents';
export { BaseAgent, type AgentRuntime } from './agents/base-agent';
export { AgentCoordinator, buildContextSubset, MAX_ATTEMPTS } from './coordination/coordinator';
export { ServerRegistry } from './mcp/server-registry';
export { ServerSelector, type Lease } from './mcp/selector';
export { HealthMonitor, type HealthProbe } from './mcp/health-monitor';
export { CapabilityGateway, type CapabilityInvoker } from './mcp/capability-gateway';
export { StdioCapabilityInvoker } from './mcp/stdio-invoker';
export { QualityGateFramework } from './gates/quality-gates';
export { GateId } from './gates/gate-ids';
export { BUILT_IN_CHECKERS, type GateChecker, type GateInput } from './gates/checkers';
export { getDefaultGateConfigs, applyGateOverrides, STAGE_GATE_MAP } from './gates/gate-definitions';
export { getStageConfig, getStagesInOrder, getNextStage } from './pipeline/stages';
export { TransitionEngine } from './pipeline/transitions';
export { WaveAssessor, WAVE_WEIGHTS, isFlipped } from './wave/wave-assessor';
export { RunTracker } from './tracker/run-tracker';
export { ClaudeCliProvider, SimulationProvider, type InferenceProvider } from './orchestrator/inference';
export { PromptChainEngine } from './orchestrator/chain-engine';
export { createRuntime, type ChainRuntime } from './orchestrator/runtime';
