import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createInferenceProvider, createRuntime } from '../../src/orchestrator/runtime';
import { ClaudeCliProvider, SimulationProvider } from '../../src/orchestrator/inference';
import { getDefaultConfig } from '../../src/utils/config';
import { CapabilityTag, ChainRunState } from '../../src/types';

const IDEA = 'A shared grocery list app where households plan meals, split costs and track weekly budgets';

describe('createRuntime', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pco-runtime-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads the project config file', async () => {
    fs.writeFileSync(path.join(tmpDir, 'pco.config.yaml'), 'inference:\n  mode: simulation\n', 'utf-8');
    const runtime = createRuntime(tmpDir);

    expect(runtime.config.inference.mode).toBe('simulation');
    expect(runtime.monitor).toBeNull();
    expect(runtime.engine.getTracker()).toBe(runtime.tracker);
    await runtime.close();
  });

  it('wires an engine that runs a chain to completion', async () => {
    fs.writeFileSync(path.join(tmpDir, 'package.json'), JSON.stringify({ name: 'grocery', dependencies: { express: '^4.18.0' } }), 'utf-8');
    fs.mkdirSync(path.join(tmpDir, 'src', 'routes'), { recursive: true });
    fs.writeFileSync(path.join(tmpDir, 'src', 'routes', 'lists.ts'), "import express from 'express';\nexport const router = express.Router();\n", 'utf-8');
    fs.writeFileSync(path.join(tmpDir, 'README.md'), '# Grocery\n\nUsage guide.\n', 'utf-8');
    const config = getDefaultConfig();
    const runtime = createRuntime(tmpDir, { config, mode: 'simulation' });

    const report = await runtime.engine.runChain(IDEA, tmpDir);
    expect(report.state).toBe(ChainRunState.COMPLETED);
    expect(runtime.tracker.buildSummary(report.runId).stagesAdvanced).toBe(5);
    await runtime.close();
  });

  it('schedules health probes only when asked and servers exist', async () => {
    const config = getDefaultConfig();
    config.inference.mode = 'simulation';
    config.servers = [{
      id: 'docs',
      capabilityTags: [CapabilityTag.DOCUMENTATION],
      priority: 1,
      healthCheck: { intervalMs: 60_000, timeoutMs: 50 },
      maxConcurrentLeases: 1,
      transport: { command: 'docs-server', args: [] },
    }];

    const quiet = createRuntime(tmpDir, { config });
    expect(quiet.monitor).toBeNull();
    await quiet.close();

    const monitored = createRuntime(tmpDir, { config, monitorHealth: true });
    expect(monitored.monitor?.running).toBe(true);
    expect(monitored.selector.serverRegistry.list().map((s) => s.config.id)).toEqual(['docs']);
    await monitored.close();
    expect(monitored.monitor?.running).toBe(false);
  });
});

describe('createInferenceProvider', () => {
  it('follows the configured mode unless overridden', () => {
    const config = getDefaultConfig();
    expect(createInferenceProvider('/project', config)).toBeInstanceOf(ClaudeCliProvider);
    expect(createInferenceProvider('/project', config, { mode: 'simulation' })).toBeInstanceOf(SimulationProvider);
  });
});
