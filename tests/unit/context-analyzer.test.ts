import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  ContextAnalyzer,
  compareContexts,
  isSignificantChange,
} from '../../src/analyzer/context-analyzer';
import { getDefaultConfig } from '../../src/utils/config';
import { ContextAnalysisError } from '../../src/utils/errors';
import { Domain } from '../../src/types';

function write(root: string, relative: string, content: string): void {
  const full = path.join(root, relative);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content, 'utf-8');
}

function seedProject(root: string): void {
  write(root, 'package.json', JSON.stringify({ dependencies: { react: '^18.0.0' } }));
  write(root, 'src/components/Button.tsx', "import React from 'react';\nexport function Button(props) { return <button className='x' />; }\n");
  write(root, 'docs/guide.md', 'readme usage guide\n');
}

describe('ContextAnalyzer', () => {
  let tmpDir: string;
  let analyzer: ContextAnalyzer;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pco-analyzer-'));
    analyzer = new ContextAnalyzer(getDefaultConfig().analyzer);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('analyze', () => {
    it('scores domains from extensions, directories, keywords and frameworks', async () => {
      seedProject(tmpDir);
      const context = await analyzer.analyze(tmpDir);

      expect(context.version).toBe(1);
      expect(context.filesScanned).toBe(3);
      expect(context.frameworkHits).toEqual(['react']);
      expect(context.directoryHits).toEqual({ components: 1, docs: 1, src: 1 });
      expect(context.keywordHits.react).toBe(1);
      expect(context.keywordHits.classname).toBe(1);
      expect(context.keywordHits.readme).toBe(1);

      // 0.3·1 + 0.4·(1/3) + 0.2·(3/4) + 0.1·(1/2)
      expect(context.domainScores[Domain.FRONTEND]).toBeCloseTo(0.633333, 5);
      // 0.3·1 + 0.4·(1/3) + 0.2·(3/4)
      expect(context.domainScores[Domain.DOCUMENTATION]).toBeCloseTo(0.583333, 5);
      expect(context.domainScores[Domain.BACKEND]).toBe(0);
      expect(context.domainScores[Domain.SECURITY]).toBe(0);
    });

    it('returns a frozen context', async () => {
      seedProject(tmpDir);
      const context = await analyzer.analyze(tmpDir);
      expect(Object.isFrozen(context)).toBe(true);
      expect(Object.isFrozen(context.domainScores)).toBe(true);
    });

    it('bumps the version from a previous context', async () => {
      seedProject(tmpDir);
      const first = await analyzer.analyze(tmpDir);
      const second = await analyzer.analyze(tmpDir, first);
      expect(second.version).toBe(2);
      expect(second.domainScores).toEqual(first.domainScores);
    });

    it('skips ignored directories', async () => {
      seedProject(tmpDir);
      write(tmpDir, 'node_modules/lib/index.go', 'router endpoint');
      const context = await analyzer.analyze(tmpDir);
      expect(context.filesScanned).toBe(3);
      expect(context.directoryHits.node_modules).toBeUndefined();
    });

    it('applies configured ignore patterns', async () => {
      seedProject(tmpDir);
      const config = { ...getDefaultConfig().analyzer, ignore: ['*.md'] };
      const context = await new ContextAnalyzer(config).analyze(tmpDir);
      expect(context.filesScanned).toBe(2);
      expect(context.extensionHistogram['.md']).toBeUndefined();
    });

    it('caps the number of files', async () => {
      for (let i = 0; i < 5; i++) write(tmpDir, `f${i}.txt`, 'x');
      const config = { ...getDefaultConfig().analyzer, maxFiles: 3 };
      const context = await new ContextAnalyzer(config).analyze(tmpDir);
      expect(context.filesScanned).toBe(3);
    });

    it('fails on a missing root', async () => {
      await expect(analyzer.analyze(path.join(tmpDir, 'nope'))).rejects.toMatchObject({ reason: 'missing' });
    });

    it('fails on a file root', async () => {
      write(tmpDir, 'file.txt', 'x');
      await expect(analyzer.analyze(path.join(tmpDir, 'file.txt'))).rejects.toMatchObject({ reason: 'not_directory' });
    });

    it('fails on an empty root', async () => {
      await expect(analyzer.analyze(tmpDir)).rejects.toBeInstanceOf(ContextAnalysisError);
      await expect(analyzer.analyze(tmpDir)).rejects.toMatchObject({ reason: 'empty', code: 'CONTEXT_ANALYSIS' });
    });
  });

  describe('compareContexts', () => {
    it('reports the largest per-domain change', async () => {
      seedProject(tmpDir);
      const before = await analyzer.analyze(tmpDir);
      write(tmpDir, 'src/api/routes.go', 'router endpoint database query\n');
      const after = await analyzer.analyze(tmpDir, before);

      const delta = compareContexts(before, after);
      expect(delta.maxDomain).toBe(Domain.BACKEND);
      // 0.3·(2/3) + 0.4·(1/3) + 0.2·1
      expect(delta.maxDelta).toBeCloseTo(0.533333, 5);
      expect(delta.deltas[Domain.FRONTEND]).toBeCloseTo(0.1, 5);
      expect(isSignificantChange(delta, 0.15)).toBe(true);
    });

    it('reports no change for identical contexts', async () => {
      seedProject(tmpDir);
      const context = await analyzer.analyze(tmpDir);
      const delta = compareContexts(context, context);
      expect(delta.maxDelta).toBe(0);
      expect(delta.maxDomain).toBeNull();
      expect(isSignificantChange(delta, 0)).toBe(false);
    });
  });
});
