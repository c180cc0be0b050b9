#!/usr/bin/env node

import * as path from 'node:path';
import * as fs from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { prompt } from 'enquirer';
import { z } from 'zod';
import {
  type ChainRunReport,
  type GateResult,
  type RemediationRequest,
  type ScoringResult,
  type StageOutput,
  type WaveDecision,
  type WaveFactors,
  ChainRunState,
  ChainStageId,
  DiagnosticSeverity,
  Domain,
  GateStatus,
  SpawnDecision,
} from './types';
import { loadConfig, saveConfig, getDefaultConfig, type InferenceMode } from './utils/config';
import logger, { addFileTransport, setLogLevel } from './utils/logger';
import { toErrorMessage } from './utils/errors';
import { ContextAnalyzer } from './analyzer/context-analyzer';
import { AgentScoringEngine } from './scoring/agent-scoring';
import { AgentRegistry, getAllAgentDescriptors } from './agents';
import { WaveAssessor } from './wave/wave-assessor';
import { QualityGateFramework } from './gates/quality-gates';
import { applyGateOverrides, getDefaultGateConfigs } from './gates/gate-definitions';
import { getStageConfig, getStageGates, getStagesInOrder } from './pipeline/stages';
import { createRuntime } from './orchestrator/runtime';

const packageSchema = z.object({ version: z.string() });
const { version: VERSION } = packageSchema.parse(
  JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8')),
);

// ─── Global error handlers ───────────────────────────────────────────────────

process.on('uncaughtException', (error) => {
  logger.error(`Uncaught exception: ${error.message}`);
  if (error.stack) logger.error(error.stack);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled rejection: ${toErrorMessage(reason)}`);
  process.exit(1);
});

process.on('SIGINT', () => {
  console.log(chalk.yellow('\n\nInterrupted. Exiting...'));
  process.exit(130);
});

// ─── CLI Setup ───────────────────────────────────────────────────────────────

const program = new Command();

program
  .name('pco')
  .description('Prompt chain orchestrator: idea → PRD → TRD → features → user stories, with scored agents and quality gates')
  .version(VERSION);

function parseStage(value: string): ChainStageId {
  const stage = Object.values(ChainStageId).find((s) => s === value);
  if (!stage) {
    throw new InvalidArgumentError(`Expected one of: ${Object.values(ChainStageId).join(', ')}`);
  }
  return stage;
}

function parseMode(value: string): InferenceMode {
  if (value === 'claude-cli' || value === 'simulation') return value;
  throw new InvalidArgumentError('Expected claude-cli or simulation');
}

const WAVE_FACTOR_KEYS: Array<keyof WaveFactors> = [
  'chainComplexity',
  'agentCoordination',
  'implementationScale',
  'projectContext',
  'qualityRequirements',
];

function parseFactor(value: string, previous: Partial<WaveFactors> = {}): Partial<WaveFactors> {
  const [key, raw] = value.split('=');
  const factor = WAVE_FACTOR_KEYS.find((k) => k === key);
  const num = Number(raw);
  if (!factor || raw === undefined || !Number.isFinite(num)) {
    throw new InvalidArgumentError(`Expected <factor>=<0..1> with factor one of ${WAVE_FACTOR_KEYS.join(', ')}`);
  }
  return { ...previous, [factor]: num };
}

function readText(file: string): string {
  return fs.readFileSync(path.resolve(file), 'utf-8');
}

// ─── pco analyze ─────────────────────────────────────────────────────────────

interface ProjectOpts {
  project: string;
  verbose?: boolean;
}

function prepare(opts: ProjectOpts): string {
  const projectPath = path.resolve(opts.project);
  if (opts.verbose) setLogLevel('debug');
  return projectPath;
}

program
  .command('analyze')
  .description('Derive the project context: per-domain relevance scores from files, directories, keywords and frameworks')
  .option('--project <path>', 'Project path', process.cwd())
  .option('--json', 'Print the context as JSON', false)
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (opts: ProjectOpts & { json: boolean }) => {
    const projectPath = prepare(opts);
    const config = loadConfig(projectPath);
    const spinner = ora('Analyzing project...').start();

    try {
      const context = await new ContextAnalyzer(config.analyzer).analyze(projectPath);
      spinner.succeed(`Scanned ${context.filesScanned} file(s)`);

      if (opts.json) {
        console.log(JSON.stringify(context, null, 2));
        return;
      }

      console.log(chalk.bold.cyan('\n🔎 Domain Relevance\n'));
      for (const domain of Object.values(Domain)) {
        const score = context.domainScores[domain];
        console.log(`  ${domain.padEnd(14)} ${bar(score)} ${score.toFixed(3)}`);
      }
      if (context.frameworkHits.length > 0) {
        console.log(chalk.gray(`\n  Frameworks: ${context.frameworkHits.join(', ')}`));
      }
      if (context.unreadablePaths.length > 0) {
        console.log(chalk.yellow(`  Unreadable: ${context.unreadablePaths.length} path(s)`));
      }
      console.log();
    } catch (error) {
      spinner.fail(chalk.red(toErrorMessage(error)));
      process.exitCode = 1;
    }
  });

// ─── pco score ───────────────────────────────────────────────────────────────

program
  .command('score')
  .description('Score every agent for a stage against some content')
  .argument('<content>', 'Stage content, or @file to read it from a file')
  .requiredOption('-s, --stage <stage>', 'Chain stage', parseStage)
  .option('--project <path>', 'Project path used for context', process.cwd())
  .option('--no-context', 'Score without analyzing the project')
  .option('--prefer <kinds>', 'Comma-separated preferred agents', '')
  .option('--exclude <kinds>', 'Comma-separated excluded agents', '')
  .action(async (content: string, opts: ProjectOpts & { stage: ChainStageId; context: boolean; prefer: string; exclude: string }) => {
    const projectPath = prepare(opts);
    const config = loadConfig(projectPath);
    const text = content.startsWith('@') ? readText(content.slice(1)) : content;

    try {
      const context = opts.context ? await new ContextAnalyzer(config.analyzer).analyze(projectPath) : null;
      const registry = new AgentRegistry();
      const kinds = (list: string) => registry.getDescriptors().map((d) => d.kind).filter((k) => list.split(',').includes(k));
      const engine = new AgentScoringEngine(registry.getDescriptors(), {
        boundaryPolicy: config.engine.boundaryPolicy,
        suggestThreshold: config.scoring.suggestThreshold,
        stageThresholds: config.scoring.stageThresholds,
      });
      const results = engine.score(opts.stage, text, context, {
        preferredAgents: kinds(opts.prefer),
        excludedAgents: kinds(opts.exclude),
      });

      console.log(chalk.bold.cyan(`\n🎯 Agent Scores: ${getStageConfig(opts.stage).name}\n`));
      for (const result of results) {
        printScore(result);
      }
      console.log();
    } catch (error) {
      console.error(chalk.red(`Error: ${toErrorMessage(error)}`));
      process.exitCode = 1;
    }
  });

// ─── pco assess ──────────────────────────────────────────────────────────────

program
  .command('assess')
  .description('Assess whether an idea needs multi-wave execution')
  .argument('<idea>', 'Idea text, or @file')
  .option('--project <path>', 'Project path used for context', process.cwd())
  .option('-f, --factor <factor=value>', 'Override a wave factor (repeatable)', parseFactor)
  .action(async (idea: string, opts: ProjectOpts & { factor?: Partial<WaveFactors> }) => {
    const projectPath = prepare(opts);
    const config = loadConfig(projectPath);
    const text = idea.startsWith('@') ? readText(idea.slice(1)) : idea;

    try {
      const context = await new ContextAnalyzer(config.analyzer).analyze(projectPath);
      const decision = new WaveAssessor({
        threshold: config.engine.waveThreshold,
        boundaryPolicy: config.engine.boundaryPolicy,
      }).assess({ idea: text, position: ChainStageId.IDEA_DEFINITION, context, overrides: opts.factor });
      printWaveDecision(decision);
    } catch (error) {
      console.error(chalk.red(`Error: ${toErrorMessage(error)}`));
      process.exitCode = 1;
    }
  });

// ─── pco gates ───────────────────────────────────────────────────────────────

program
  .command('gates')
  .description('Run a stage\'s quality gates against a markdown file')
  .argument('<file>', 'Stage content file')
  .requiredOption('-s, --stage <stage>', 'Chain stage', parseStage)
  .option('--previous <file>', 'Previous stage output, for traceability')
  .option('--strategy <strategy>', 'sequential | parallel | adaptive')
  .option('--project <path>', 'Project path', process.cwd())
  .action(async (file: string, opts: ProjectOpts & { stage: ChainStageId; previous?: string; strategy?: string }) => {
    const projectPath = prepare(opts);
    const config = loadConfig(projectPath);
    const strategy = opts.strategy === 'sequential' || opts.strategy === 'parallel' || opts.strategy === 'adaptive'
      ? opts.strategy
      : config.engine.gateStrategy;

    try {
      const framework = new QualityGateFramework(
        applyGateOverrides(getDefaultGateConfigs(), config.gates),
        { strategy, maxParallelGates: config.engine.maxParallelGates, boundaryPolicy: config.engine.boundaryPolicy },
      );
      const stageConfig = getStageConfig(opts.stage);
      const results = await framework.run(
        {
          stage: opts.stage,
          content: readText(file),
          previousOutput: opts.previous ? readText(opts.previous) : null,
          requiredSections: stageConfig.outputFormat.requiredSections,
          context: null,
        },
        { gateIds: getStageGates(opts.stage), requiredGateIds: stageConfig.requiredGates },
      );

      console.log(chalk.bold.cyan(`\n🚦 Quality Gates: ${stageConfig.name}\n`));
      printGateResults(results);
      const summary = framework.summarize(results);
      if (summary.blocking.length > 0) {
        console.log(chalk.red(`\n  Blocked by ${summary.blocking.map((r) => r.gateId).join(', ')}\n`));
        process.exitCode = 2;
      } else {
        console.log(chalk.green('\n  All required gates passed\n'));
      }
    } catch (error) {
      console.error(chalk.red(`Error: ${toErrorMessage(error)}`));
      process.exitCode = 1;
    }
  });

// ─── pco run ─────────────────────────────────────────────────────────────────

interface RunOpts extends ProjectOpts {
  mode?: InferenceMode;
  model?: string;
  interactive: boolean;
  maxRemediations: string;
  factor?: Partial<WaveFactors>;
}

program
  .command('run')
  .description('Run the full prompt chain for an idea')
  .argument('<idea>', 'Idea text, or @file')
  .option('--project <path>', 'Project path', process.cwd())
  .option('--mode <mode>', 'Inference mode: claude-cli or simulation', parseMode)
  .option('--model <model>', 'Model passed to the Claude CLI')
  .option('--no-interactive', 'Stop at the first remediation request instead of prompting')
  .option('--max-remediations <n>', 'Remediation attempts per stage', '3')
  .option('-f, --factor <factor=value>', 'Override a wave factor (repeatable)', parseFactor)
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (idea: string, opts: RunOpts) => {
    const projectPath = prepare(opts);
    addFileTransport(projectPath);
    const text = idea.startsWith('@') ? readText(idea.slice(1)) : idea;
    const runtime = createRuntime(projectPath, { mode: opts.mode, model: opts.model, monitorHealth: true });
    const spinner = ora();

    console.log(chalk.bold.cyan(`\n🔗 Prompt Chain Orchestrator v${VERSION}\n`));

    try {
      spinner.start(chalk.cyan('Running chain...'));
      const report = await runtime.engine.runChain(text, projectPath, {
        waveOverrides: opts.factor,
        maxRemediationAttempts: parseInt(opts.maxRemediations, 10),
        onStageComplete: (output, run) => {
          spinner.succeed(chalk.green(`${getStageConfig(output.stage).name} accepted`));
          saveStageOutput(projectPath, run.id, output);
          spinner.start(chalk.cyan('Running chain...'));
        },
        onRemediation: async (request) => {
          spinner.stop();
          return opts.interactive ? askForRemediation(request) : null;
        },
      });
      spinner.stop();

      const run = runtime.engine.getRun(report.runId);
      const { markdownPath } = runtime.tracker.saveHistory(run);
      printReport(report);
      console.log(chalk.gray(`History: ${path.relative(projectPath, markdownPath)}\n`));
      if (report.state !== ChainRunState.COMPLETED) process.exitCode = 2;
    } catch (error) {
      spinner.fail(chalk.red('Chain failed'));
      console.error(chalk.red(`\nError: ${toErrorMessage(error)}`));
      process.exitCode = 1;
    } finally {
      await runtime.close();
    }
  });

// ─── pco agents ──────────────────────────────────────────────────────────────

program
  .command('agents')
  .description('List the agent catalog')
  .action(() => {
    console.log(chalk.bold.cyan('\n👥 Agents\n'));
    for (const d of getAllAgentDescriptors()) {
      console.log(`  ${chalk.bold(d.title)} ${chalk.gray(`(${d.kind}, priority ${d.priority})`)}`);
      console.log(`     ${chalk.gray(d.description)}`);
      console.log(`     ${chalk.gray(`stages: ${d.stageAffinity.join(', ')} · capabilities: ${d.mcpCapabilityTags.join(', ') || 'none'}`)}`);
    }
    console.log();
  });

// ─── pco stages ──────────────────────────────────────────────────────────────

program
  .command('stages')
  .description('Show the chain stages with their required sections and gates')
  .action(() => {
    console.log(chalk.bold.cyan('\n📋 Chain Stages\n'));
    getStagesInOrder().forEach((stage, i) => {
      const config = getStageConfig(stage);
      console.log(`  ${i + 1}. ${chalk.bold(config.name)} ${chalk.gray(`(${stage})`)}`);
      console.log(`     Sections: ${config.outputFormat.requiredSections.join(', ')}`);
      console.log(`     Gates: ${config.requiredGates.join(', ')}${config.optionalGates.length > 0 ? chalk.gray(` + ${config.optionalGates.join(', ')}`) : ''}`);
    });
    console.log();
  });

// ─── pco config ──────────────────────────────────────────────────────────────

program
  .command('config')
  .description('Show or initialize the project configuration')
  .option('--project <path>', 'Project path', process.cwd())
  .option('--init', 'Write pco.config.yaml with the defaults', false)
  .action((opts: { project: string; init: boolean }) => {
    const projectPath = path.resolve(opts.project);
    try {
      if (opts.init) {
        saveConfig(projectPath, getDefaultConfig());
        console.log(chalk.green('✅ Created pco.config.yaml'));
        return;
      }
      console.log(JSON.stringify(loadConfig(projectPath), null, 2));
    } catch (error) {
      console.error(chalk.red(`Error: ${toErrorMessage(error)}`));
      process.exitCode = 1;
    }
  });

// ─── Helpers ─────────────────────────────────────────────────────────────────

function saveStageOutput(projectPath: string, runId: string, output: StageOutput): void {
  const dir = path.join(projectPath, '.pco', 'runs', runId);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, `${output.stage}.md`), output.content, 'utf-8');
}

async function askForRemediation(request: RemediationRequest): Promise<string | null> {
  console.log(chalk.yellow(`\n⚠️  ${getStageConfig(request.stage).name} blocked by required gates:`));
  printGateResults(request.failedGates);

  const draft = path.join(process.cwd(), `.pco-remediation-${request.stage}.md`);
  fs.writeFileSync(draft, request.content, 'utf-8');
  console.log(chalk.gray(`\n  Current content written to ${draft}`));

  const { action } = await prompt<{ action: string }>({
    type: 'select',
    name: 'action',
    message: 'Edit the file, then:',
    choices: ['Re-run gates on the edited file', 'Stop here'],
  });
  if (action !== 'Re-run gates on the edited file') return null;
  return fs.readFileSync(draft, 'utf-8');
}

function bar(value: number): string {
  const filled = Math.round(value * 20);
  return chalk.cyan('█'.repeat(filled)) + chalk.gray('░'.repeat(20 - filled));
}

function printScore(result: ScoringResult): void {
  const color = result.decision === SpawnDecision.AUTO_SPAWN ? chalk.green
    : result.decision === SpawnDecision.SUGGEST ? chalk.yellow : chalk.gray;
  const s = result.subScores;
  console.log(`  ${color(result.decision.padEnd(10))} ${result.kind.padEnd(12)} ${result.total.toFixed(3)}${result.boundaryTie ? chalk.yellow(' (boundary)') : ''}`);
  console.log(chalk.gray(`             stage ${s.stageRequirement.value.toFixed(2)} · content ${s.contentAnalysis.value.toFixed(2)} · context ${s.context.value.toFixed(2)} · pref ${s.preference.value.toFixed(2)}`));
}

function printWaveDecision(decision: WaveDecision): void {
  console.log(chalk.bold.cyan('\n🌊 Wave Assessment\n'));
  for (const [factor, score] of Object.entries(decision.subScores)) {
    console.log(`  ${factor.padEnd(20)} ${score.value.toFixed(3)} × ${score.weight.toFixed(2)}`);
  }
  const verdict = decision.multiWave ? chalk.magenta(`multi-wave (${decision.waves.join(' → ')})`) : chalk.green('single pass');
  console.log(`\n  Total ${decision.total.toFixed(3)} → ${verdict}, strategy ${chalk.bold(decision.strategy)}\n`);
}

function printGateResults(results: readonly GateResult[]): void {
  for (const result of results) {
    const icon = result.status === GateStatus.PASSED ? chalk.green('✓')
      : result.status === GateStatus.WARNING ? chalk.yellow('!')
      : chalk.red('✗');
    console.log(`  ${icon} ${result.gateId.padEnd(14)} ${result.status.padEnd(8)} ${result.score.toFixed(2)} / ${result.threshold}${result.required ? '' : chalk.gray(' (optional)')}`);
    for (const finding of result.findings) {
      console.log(chalk.gray(`      ${finding}`));
    }
  }
}

function printReport(report: ChainRunReport): void {
  console.log(chalk.bold('\n📊 Chain Summary\n'));
  console.log(`  Run:        ${report.runId}`);
  console.log(`  State:      ${report.state}`);
  console.log(`  Stage:      ${report.currentStage}`);
  console.log(`  Completed:  ${report.completedStages.join(' → ') || 'none'}`);
  console.log(`  Strategy:   ${report.waveDecision?.strategy ?? 'n/a'}`);
  console.log(`  Tokens:     ${report.totalTokensUsed.toLocaleString()}`);

  const notable = report.diagnostics.filter((d) => d.severity !== DiagnosticSeverity.INFO);
  if (notable.length > 0) {
    console.log(chalk.bold('\nDiagnostics:'));
    for (const d of notable) {
      const color = d.severity === DiagnosticSeverity.ERROR ? chalk.red : chalk.yellow;
      console.log(`  ${color(d.code)} ${d.message}`);
    }
  }
  console.log();
}

program.parse(process.argv);

if (!process.argv.slice(2).length) {
  program.outputHelp();
}
