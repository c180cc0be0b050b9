import { spawn } from 'node:child_process';
import { type AgentKind, type ChainStageId, type WavePhase } from '../types';
import { InferenceError } from '../utils/errors';
import { extractKeyTerms } from '../utils/markdown';
import logger from '../utils/logger';

// ─── Provider contract ──────────────────────────────────────────────────────

export interface InferenceRequest {
  stage: ChainStageId;
  prompt: string;
  /** Raw stage input (the idea or the previous stage's output). */
  input: string;
  requiredSections: string[];
  agentKind?: AgentKind;
  wave?: WavePhase;
  signal?: AbortSignal;
}

export interface InferenceResponse {
  content: string;
  tokensUsed: number;
  provider: string;
}

export interface InferenceProvider {
  readonly name: string;
  generate(request: InferenceRequest): Promise<InferenceResponse>;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

// ─── Claude CLI ─────────────────────────────────────────────────────────────

export interface ClaudeCliOptions {
  projectPath: string;
  claudePath?: string;
  model?: string;
  timeoutMs: number;
  allowedTools?: string[];
}

export class ClaudeCliProvider implements InferenceProvider {
  readonly name = 'claude-cli';
  private options: ClaudeCliOptions;

  constructor(options: ClaudeCliOptions) {
    this.options = options;
  }

  async generate(request: InferenceRequest): Promise<InferenceResponse> {
    const claudeBin = this.options.claudePath ?? 'claude';
    const args = ['--print'];

    if (this.options.model) {
      args.push('--model', this.options.model);
    }
    if (this.options.allowedTools && this.options.allowedTools.length > 0) {
      args.push('--allowedTools', this.options.allowedTools.join(','));
    }
    args.push(request.prompt);

    logger.debug(`Invoking ${claudeBin} for ${request.agentKind ?? 'stage'} [${request.stage}]`);

    const content = await new Promise<string>((resolve, reject) => {
      const proc = spawn(claudeBin, args, {
        cwd: this.options.projectPath,
        stdio: ['ignore', 'pipe', 'pipe'],
        timeout: this.options.timeoutMs,
        signal: request.signal,
        env: {
          ...process.env,
          PCO_STAGE: request.stage,
          PCO_AGENT: request.agentKind ?? '',
        },
      });

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('error', (err) => {
        reject(new InferenceError(`Failed to launch Claude CLI: ${err.message}`));
      });

      proc.on('close', (code) => {
        if (code === 0) {
          resolve(stdout);
        } else {
          const truncatedErr = stderr.slice(0, 500);
          reject(new InferenceError(`Claude CLI exited with code ${code}: ${truncatedErr || 'no stderr'}`));
        }
      });
    });

    return {
      content,
      tokensUsed: estimateTokens(request.prompt) + estimateTokens(content),
      provider: this.name,
    };
  }
}

// ─── Simulation ─────────────────────────────────────────────────────────────

const SIMULATED_TERM_LIMIT = 10;

/**
 * Deterministic markdown for dry runs: one section per required heading,
 * each carrying the key terms of the input.
 */
export class SimulationProvider implements InferenceProvider {
  readonly name = 'simulation';

  async generate(request: InferenceRequest): Promise<InferenceResponse> {
    if (request.signal?.aborted) {
      throw new InferenceError('Simulation cancelled');
    }

    const terms = extractKeyTerms(request.input, SIMULATED_TERM_LIMIT);
    const subject = terms.length > 0 ? terms.join(', ') : 'the requested capability';
    const sections = request.requiredSections.map((heading, index) =>
      renderSection(heading, subject, index),
    );

    const content = sections.join('\n\n') + '\n';
    return {
      content,
      tokensUsed: estimateTokens(request.prompt) + estimateTokens(content),
      provider: this.name,
    };
  }
}

function renderSection(heading: string, subject: string, index: number): string {
  const topic = heading.toLowerCase();
  return [
    `## ${heading}`,
    '',
    `This ${topic} section addresses ${subject}. It covers authentication, authorization, ` +
      'encryption of stored data and input validation on every boundary, and keeps latency, ' +
      'throughput and cache behaviour within agreed budgets.',
    '',
    `- The ${topic} is reviewed in at most ${index + 2} iterations`,
    `- Each ${topic} item responds within ${200 + index * 50} ms at the 95th percentile`,
    `- At least ${index + 3} acceptance checks cover the ${topic}`,
  ].join('\n');
}
