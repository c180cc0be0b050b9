#!/usr/bin/env node

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import * as path from 'node:path';
import { AgentKind, ChainStageId, type StageOutcome } from './types';
import { loadConfig } from './utils/config';
import logger, { useStderrConsole } from './utils/logger';
import { toErrorMessage } from './utils/errors';
import { ContextAnalyzer } from './analyzer/context-analyzer';
import { AgentRegistry } from './agents';
import { AgentScoringEngine } from './scoring/agent-scoring';
import { WaveAssessor } from './wave/wave-assessor';
import { createRuntime, type ChainRuntime } from './orchestrator/runtime';

// stdout carries the protocol
useStderrConsole();

const server = new McpServer({
  name: 'prompt-chain-orchestrator',
  version: '0.4.0',
});

// ─── Helpers ────────────────────────────────────────────────────────────────

type ToolResult = { content: { type: 'text'; text: string }[]; isError?: boolean };

function text(t: string): ToolResult {
  return { content: [{ type: 'text', text: t }] };
}

function json(value: unknown): ToolResult {
  return text(JSON.stringify(value, null, 2));
}

function failure(error: unknown): ToolResult {
  return { content: [{ type: 'text', text: `Error: ${toErrorMessage(error)}` }], isError: true };
}

const runtimes = new Map<string, ChainRuntime>();

/** One runtime per project, so runs survive across tool calls. */
function runtimeFor(projectPath: string, mode?: 'claude-cli' | 'simulation'): ChainRuntime {
  const root = path.resolve(projectPath);
  const key = `${root}::${mode ?? 'config'}`;
  let runtime = runtimes.get(key);
  if (!runtime) {
    runtime = createRuntime(root, { mode, monitorHealth: true });
    runtimes.set(key, runtime);
  }
  return runtime;
}

function describeOutcome(outcome: StageOutcome): Record<string, unknown> {
  switch (outcome.kind) {
    case 'advanced':
      return { outcome: 'advanced', stage: outcome.output.stage, next: outcome.run.currentStage, content: outcome.output.content };
    case 'remediation':
      return {
        outcome: 'remediation',
        stage: outcome.request.stage,
        failedGates: outcome.request.failedGates.map((g) => ({ gateId: g.gateId, status: g.status, score: g.score, threshold: g.threshold })),
        findings: outcome.request.findings,
        content: outcome.request.content,
      };
    case 'terminated':
      return { outcome: 'terminated', state: outcome.run.state, reason: outcome.reason };
  }
}

const stageSchema = z.nativeEnum(ChainStageId);
const modeSchema = z.enum(['claude-cli', 'simulation']).optional();

// ═══════════════════════════════════════════════════════════════════════════
// Tools
// ═══════════════════════════════════════════════════════════════════════════

server.tool(
  'pco_analyze_context',
  'Analyze a project directory and return per-domain relevance scores.',
  { projectPath: z.string() },
  async ({ projectPath }) => {
    try {
      const config = loadConfig(path.resolve(projectPath));
      return json(await new ContextAnalyzer(config.analyzer).analyze(path.resolve(projectPath)));
    } catch (error) {
      return failure(error);
    }
  },
);

server.tool(
  'pco_score_agents',
  'Score every agent for a chain stage against the given content and return spawn decisions.',
  {
    projectPath: z.string(),
    stage: stageSchema,
    content: z.string(),
    useContext: z.boolean().optional(),
    preferredAgents: z.array(z.nativeEnum(AgentKind)).optional(),
    excludedAgents: z.array(z.nativeEnum(AgentKind)).optional(),
  },
  async ({ projectPath, stage, content, useContext, preferredAgents, excludedAgents }) => {
    try {
      const root = path.resolve(projectPath);
      const config = loadConfig(root);
      const context = useContext === false ? null : await new ContextAnalyzer(config.analyzer).analyze(root);
      const engine = new AgentScoringEngine(new AgentRegistry().getDescriptors(), {
        boundaryPolicy: config.engine.boundaryPolicy,
        suggestThreshold: config.scoring.suggestThreshold,
        stageThresholds: config.scoring.stageThresholds,
      });
      return json(engine.score(stage, content, context, { preferredAgents, excludedAgents }));
    } catch (error) {
      return failure(error);
    }
  },
);

server.tool(
  'pco_assess_wave',
  'Decide whether an idea needs multi-wave execution and which wave strategy applies.',
  {
    projectPath: z.string(),
    idea: z.string(),
    overrides: z.object({
      chainComplexity: z.number().min(0).max(1).optional(),
      agentCoordination: z.number().min(0).max(1).optional(),
      implementationScale: z.number().min(0).max(1).optional(),
      projectContext: z.number().min(0).max(1).optional(),
      qualityRequirements: z.number().min(0).max(1).optional(),
    }).optional(),
  },
  async ({ projectPath, idea, overrides }) => {
    try {
      const root = path.resolve(projectPath);
      const config = loadConfig(root);
      const context = await new ContextAnalyzer(config.analyzer).analyze(root);
      const assessor = new WaveAssessor({ threshold: config.engine.waveThreshold, boundaryPolicy: config.engine.boundaryPolicy });
      return json(assessor.assess({ idea, position: ChainStageId.IDEA_DEFINITION, context, overrides }));
    } catch (error) {
      return failure(error);
    }
  },
);

server.tool(
  'pco_start_run',
  'Start a chain run for an idea. Returns the run id; drive it with pco_execute_stage.',
  { projectPath: z.string(), idea: z.string(), mode: modeSchema },
  async ({ projectPath, idea, mode }) => {
    try {
      const run = await runtimeFor(projectPath, mode).engine.startRun(idea, path.resolve(projectPath));
      return json({ runId: run.id, state: run.state, currentStage: run.currentStage, waveDecision: run.waveDecision });
    } catch (error) {
      return failure(error);
    }
  },
);

server.tool(
  'pco_execute_stage',
  'Execute the current stage of a run. Blocked stages return a remediation request.',
  { projectPath: z.string(), runId: z.string(), mode: modeSchema },
  async ({ projectPath, runId, mode }) => {
    try {
      return json(describeOutcome(await runtimeFor(projectPath, mode).engine.executeStage(runId)));
    } catch (error) {
      return failure(error);
    }
  },
);

server.tool(
  'pco_submit_remediation',
  'Submit revised content for a blocked stage; its gates are re-evaluated.',
  { projectPath: z.string(), runId: z.string(), content: z.string(), mode: modeSchema },
  async ({ projectPath, runId, content, mode }) => {
    try {
      return json(describeOutcome(await runtimeFor(projectPath, mode).engine.submitRemediation(runId, content)));
    } catch (error) {
      return failure(error);
    }
  },
);

server.tool(
  'pco_refresh_context',
  'Re-analyze the project for a run; a significant change re-assesses waves from the next stage.',
  { projectPath: z.string(), runId: z.string(), mode: modeSchema },
  async ({ projectPath, runId, mode }) => {
    try {
      const refresh = await runtimeFor(projectPath, mode).engine.refreshContext(runId);
      return json({ version: refresh.context.version, delta: refresh.delta, significant: refresh.significant, flipped: refresh.flipped });
    } catch (error) {
      return failure(error);
    }
  },
);

server.tool(
  'pco_get_report',
  'Return the report for a run: state, completed stages, diagnostics and final output.',
  { projectPath: z.string(), runId: z.string(), mode: modeSchema },
  async ({ projectPath, runId, mode }) => {
    try {
      return json(runtimeFor(projectPath, mode).engine.getReport(runId));
    } catch (error) {
      return failure(error);
    }
  },
);

server.tool(
  'pco_abort_run',
  'Abort a run and cancel its agents.',
  { projectPath: z.string(), runId: z.string(), reason: z.string().optional(), mode: modeSchema },
  async ({ projectPath, runId, reason, mode }) => {
    try {
      const run = await runtimeFor(projectPath, mode).engine.abort(runId, reason ?? 'aborted by client');
      return json({ runId: run.id, state: run.state });
    } catch (error) {
      return failure(error);
    }
  },
);

server.tool(
  'pco_run_chain',
  'Run the whole chain for an idea. Stops at the first blocked stage and returns its remediation request.',
  { projectPath: z.string(), idea: z.string(), mode: modeSchema },
  async ({ projectPath, idea, mode }) => {
    try {
      return json(await runtimeFor(projectPath, mode).engine.runChain(idea, path.resolve(projectPath)));
    } catch (error) {
      return failure(error);
    }
  },
);

// ─── Start ───────────────────────────────────────────────────────────────────

async function shutdown(): Promise<void> {
  await Promise.all([...runtimes.values()].map((r) => r.close()));
  runtimes.clear();
}

process.on('SIGTERM', () => {
  shutdown()
    .catch((err) => logger.error(`Shutdown failed: ${toErrorMessage(err)}`))
    .finally(() => process.exit(0));
});

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error('MCP server failed to start:', err);
  process.exit(1);
});
