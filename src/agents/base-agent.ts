import {
  type AgentContextSubset,
  type AgentDescriptor,
  type AgentKind,
  type AgentOutput,
  type AgentTask,
  type CapabilityOutcome,
  type CapabilityTag,
  type ChainStageId,
  type Domain,
  type OutputRegion,
} from '../types';
import { type CapabilityGateway } from '../mcp/capability-gateway';
import { type InferenceProvider, estimateTokens } from '../orchestrator/inference';
import { agentLog } from '../utils/logger';
import { parseSections } from '../utils/markdown';

export interface AgentRuntime {
  inference: InferenceProvider;
  capabilities: CapabilityGateway | null;
  signal: AbortSignal;
}

export abstract class BaseAgent {
  protected descriptor: AgentDescriptor;

  constructor(descriptor: AgentDescriptor) {
    this.descriptor = descriptor;
  }

  get kind(): AgentKind {
    return this.descriptor.kind;
  }

  get name(): string {
    return this.descriptor.name;
  }

  get title(): string {
    return this.descriptor.title;
  }

  get domain(): Domain {
    return this.descriptor.domain;
  }

  getDescriptor(): AgentDescriptor {
    return this.descriptor;
  }

  async execute(task: AgentTask, context: AgentContextSubset, runtime: AgentRuntime): Promise<AgentOutput> {
    agentLog(this.kind, `Starting task: ${task.title} [${task.wave}]`, task.stage);
    this.throwIfAborted(runtime.signal);

    const outcomes = await this.consultCapabilities(task, runtime);
    this.throwIfAborted(runtime.signal);

    const prompt = this.buildPrompt(task, context, outcomes);
    const response = await runtime.inference.generate({
      stage: task.stage,
      prompt,
      input: task.input,
      requiredSections: this.getContributionHeadings(task.stage),
      agentKind: this.kind,
      wave: task.wave,
      signal: runtime.signal,
    });

    const regions = this.parseRegions(response.content);
    const confidenceReduced = outcomes.some((o) => o.confidenceReduced);

    agentLog(
      this.kind,
      `Task completed: ${regions.length} region(s)${confidenceReduced ? ', confidence reduced' : ''}`,
      task.stage,
    );

    return {
      kind: this.kind,
      content: response.content,
      regions,
      confidenceReduced,
      capabilityNotes: outcomes.map(describeOutcome),
      tokensUsed: response.tokensUsed || estimateTokens(prompt + response.content),
    };
  }

  /** System prompt describing the agent's perspective. */
  protected abstract getSystemPrompt(): string;

  /** Headings this agent contributes for a stage. */
  protected abstract getContributionHeadings(stage: ChainStageId): string[];

  /** What to look at in this stage, one line per point. */
  protected abstract getFocusAreas(stage: ChainStageId): string[];

  /** Capabilities consulted before prompting; defaults to every declared tag. */
  protected getCapabilityQueries(task: AgentTask): Array<{ capability: CapabilityTag; query: string }> {
    return this.descriptor.mcpCapabilityTags.map((capability) => ({
      capability,
      query: `${this.descriptor.title}: ${task.title}`,
    }));
  }

  buildPrompt(task: AgentTask, context: AgentContextSubset, outcomes: CapabilityOutcome[] = []): string {
    const sections: string[] = [];

    sections.push(`# Agent Role: ${this.descriptor.title}`);
    sections.push(`## Role Description\n${this.descriptor.description}`);
    sections.push(`## System Instructions\n${this.getSystemPrompt()}`);
    sections.push(`## Task\n**${task.title}**\n${task.instructions}`);

    const focus = this.getFocusAreas(task.stage);
    if (focus.length > 0) {
      sections.push(`## Focus\n${focus.map((f) => `- ${f}`).join('\n')}`);
    }

    const hits = Object.entries(context.directoryHits).map(([dir, n]) => `${dir} (${n})`);
    sections.push(
      `## Project Context (v${context.contextVersion})\n` +
      `- ${context.domain} relevance: ${context.domainScore.toFixed(2)}\n` +
      `- Matching directories: ${hits.length > 0 ? hits.join(', ') : 'none'}\n` +
      `- Frameworks: ${context.frameworkHits.length > 0 ? context.frameworkHits.join(', ') : 'none'}`,
    );

    if (outcomes.length > 0) {
      sections.push(`## Capability Results\n${outcomes.map((o) => `- ${describeOutcome(o)}\n${formatResult(o.result)}`).join('\n')}`);
    }

    sections.push(`## Input\n${task.input}`);
    sections.push(this.getOutputFormatInstructions(task.stage));

    return sections.join('\n\n');
  }

  protected getOutputFormatInstructions(stage: ChainStageId): string {
    const headings = this.getContributionHeadings(stage).map((h) => `## ${h}`).join('\n');
    return `## Output Format
Respond in markdown. Write one section per heading below, using the headings exactly as given. Do not add other top-level sections.

${headings}`;
  }

  protected parseRegions(content: string): OutputRegion[] {
    return parseSections(content)
      .filter((s) => s.body.length > 0)
      .map((s) => ({ key: s.key, heading: s.heading, content: s.body }));
  }

  private async consultCapabilities(task: AgentTask, runtime: AgentRuntime): Promise<CapabilityOutcome[]> {
    const gateway = runtime.capabilities;
    if (!gateway) return [];

    const outcomes: CapabilityOutcome[] = [];
    for (const query of this.getCapabilityQueries(task)) {
      outcomes.push(await gateway.invoke(query, { agentKind: this.kind, signal: runtime.signal }));
    }
    return outcomes;
  }

  private throwIfAborted(signal: AbortSignal): void {
    if (signal.aborted) {
      throw new Error(`Agent ${this.kind} cancelled`);
    }
  }
}

function describeOutcome(outcome: CapabilityOutcome): string {
  if (outcome.serverId) {
    return `${outcome.capability} answered by ${outcome.serverId}`;
  }
  return outcome.fallback
    ? `${outcome.capability} unavailable, used ${outcome.fallback} fallback`
    : `${outcome.capability} unavailable`;
}

function formatResult(result: unknown): string {
  if (result === null || result === undefined) return '';
  const text = typeof result === 'string' ? result : JSON.stringify(result, null, 2);
  return text
    .split('\n')
    .map((line) => `    ${line}`)
    .join('\n');
}

export interface AgentConstructor {
  new (): BaseAgent;
}
