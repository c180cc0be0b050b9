import * as fs from 'node:fs';
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import {
  type ContextDelta,
  type DomainScores,
  type ProjectContext,
  Domain,
} from '../types';
import { type AnalyzerConfig } from '../utils/config';
import { ContextAnalysisError, toErrorMessage } from '../utils/errors';
import { deepFreeze } from '../utils/freeze';
import { saturate, normalizeScore } from '../utils/score-math';
import logger from '../utils/logger';
import domainSignals from './domain-signals.json';

// ─── Signal tables ──────────────────────────────────────────────────────────

interface DomainSignalSet {
  extensions: string[];
  directories: string[];
  keywords: string[];
  frameworks: string[];
}

export const SIGNAL_WEIGHTS = {
  extensions: 0.3,
  directories: 0.4,
  keywords: 0.2,
  frameworks: 0.1,
} as const;

// Hit counts at which each signal group saturates to 1.0
const EXTENSION_SHARE_SATURATION = 0.5;
const DIRECTORY_SATURATION = 3;
const KEYWORD_SATURATION = 4;
const FRAMEWORK_SATURATION = 2;

const SIGNALS: Record<Domain, DomainSignalSet> = {
  [Domain.FRONTEND]: domainSignals.frontend,
  [Domain.BACKEND]: domainSignals.backend,
  [Domain.SECURITY]: domainSignals.security,
  [Domain.PERFORMANCE]: domainSignals.performance,
  [Domain.ARCHITECTURE]: domainSignals.architecture,
  [Domain.ANALYSIS]: domainSignals.analysis,
  [Domain.DOCUMENTATION]: domainSignals.documentation,
};

export function getDomainSignals(domain: Domain): DomainSignalSet {
  return SIGNALS[domain];
}

export function mapDomains<T>(fn: (domain: Domain) => T): Record<Domain, T> {
  return {
    [Domain.FRONTEND]: fn(Domain.FRONTEND),
    [Domain.BACKEND]: fn(Domain.BACKEND),
    [Domain.SECURITY]: fn(Domain.SECURITY),
    [Domain.PERFORMANCE]: fn(Domain.PERFORMANCE),
    [Domain.ARCHITECTURE]: fn(Domain.ARCHITECTURE),
    [Domain.ANALYSIS]: fn(Domain.ANALYSIS),
    [Domain.DOCUMENTATION]: fn(Domain.DOCUMENTATION),
  };
}

const DEFAULT_IGNORE = [
  'node_modules', '.git', 'dist', 'build', 'out', 'target', 'vendor',
  '.next', '.nuxt', 'coverage', '.pco', '.cache', '.turbo',
  '__pycache__', '.venv', 'venv', '.tox', '.mypy_cache', '.pytest_cache',
  '.idea', '.vscode', '.DS_Store',
  'package-lock.json', 'yarn.lock', 'pnpm-lock.yaml',
  '*.map', '*.min.js', '*.min.css',
];

const CONTENT_EXTENSIONS = new Set([
  '.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs',
  '.py', '.go', '.rs', '.java', '.kt', '.rb', '.php', '.cs',
  '.vue', '.svelte', '.astro', '.md', '.mdx',
]);

const IMPORT_PATTERNS = [
  /from\s+['"]([^'"]+)['"]/g,
  /require\(\s*['"]([^'"]+)['"]\s*\)/g,
  /^\s*import\s+['"]([^'"]+)['"]/gm,
];

// ─── Analyzer ───────────────────────────────────────────────────────────────

interface ScanState {
  files: string[];
  directoryHits: Record<string, number>;
  unreadable: string[];
}

export class ContextAnalyzer {
  private config: AnalyzerConfig;
  private ignorePatterns: string[];

  constructor(config: AnalyzerConfig) {
    this.config = config;
    this.ignorePatterns = [...DEFAULT_IGNORE, ...config.ignore];
  }

  async analyze(projectRoot: string, previous?: ProjectContext): Promise<ProjectContext> {
    const rootPath = path.resolve(projectRoot);
    this.assertReadableRoot(rootPath);

    this.readCache.clear();
    const state: ScanState = { files: [], directoryHits: {}, unreadable: [] };
    this.walk(rootPath, 0, state);

    if (state.files.length === 0) {
      throw new ContextAnalysisError(rootPath, 'empty');
    }

    const extensionHistogram = this.buildExtensionHistogram(state.files);
    const keywordHits = this.scanContent(state);
    const frameworkHits = this.detectFrameworks(rootPath, state);

    const domainScores = this.scoreDomains(state, keywordHits, frameworkHits);

    const context: ProjectContext = {
      version: previous ? previous.version + 1 : 1,
      rootPath,
      generatedAt: new Date().toISOString(),
      domainScores,
      extensionHistogram,
      directoryHits: state.directoryHits,
      keywordHits,
      frameworkHits,
      filesScanned: state.files.length,
      unreadablePaths: state.unreadable,
    };

    logger.info(`Context analysis v${context.version}: ${state.files.length} files, ${state.unreadable.length} unreadable`);
    return deepFreeze(context);
  }

  private assertReadableRoot(rootPath: string): void {
    let stat: fs.Stats;
    try {
      stat = fs.statSync(rootPath);
    } catch (error) {
      throw new ContextAnalysisError(rootPath, 'missing', toErrorMessage(error));
    }
    if (!stat.isDirectory()) {
      throw new ContextAnalysisError(rootPath, 'not_directory');
    }
    try {
      fs.readdirSync(rootPath);
    } catch (error) {
      throw new ContextAnalysisError(rootPath, 'unreadable', toErrorMessage(error));
    }
  }

  private walk(dir: string, depth: number, state: ScanState): void {
    if (state.files.length >= this.config.maxFiles) return;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      // The subtree contributes nothing; analysis carries on.
      state.unreadable.push(dir);
      return;
    }

    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      if (this.shouldIgnore(entry.name)) continue;
      const full = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        const name = entry.name.toLowerCase();
        state.directoryHits[name] = (state.directoryHits[name] ?? 0) + 1;
        if (depth + 1 < this.config.maxDepth) {
          this.walk(full, depth + 1, state);
        }
      } else if (entry.isFile()) {
        if (state.files.length >= this.config.maxFiles) return;
        state.files.push(full);
      }
    }
  }

  private shouldIgnore(name: string): boolean {
    return this.ignorePatterns.some((pattern) =>
      pattern.includes('*') ? minimatch(name, pattern, { dot: true }) : name === pattern,
    );
  }

  private buildExtensionHistogram(files: string[]): Record<string, number> {
    const histogram: Record<string, number> = {};
    for (const file of files) {
      const ext = path.extname(file).toLowerCase() || '(none)';
      histogram[ext] = (histogram[ext] ?? 0) + 1;
    }
    return histogram;
  }

  private scanContent(state: ScanState): Record<string, number> {
    const hits: Record<string, number> = {};
    const candidates = state.files
      .filter((f) => CONTENT_EXTENSIONS.has(path.extname(f).toLowerCase()))
      .slice(0, this.config.maxContentFiles);

    const allKeywords = new Set(Object.values(SIGNALS).flatMap((s) => s.keywords));

    for (const file of candidates) {
      const content = this.readHead(file, state);
      if (content === null) continue;
      const lower = content.toLowerCase();
      for (const keyword of allKeywords) {
        if (lower.includes(keyword)) {
          hits[keyword] = (hits[keyword] ?? 0) + 1;
        }
      }
    }

    return hits;
  }

  private detectFrameworks(rootPath: string, state: ScanState): string[] {
    const found = new Set<string>();
    const known = new Set(Object.values(SIGNALS).flatMap((s) => s.frameworks));

    const pkgPath = path.join(rootPath, 'package.json');
    if (fs.existsSync(pkgPath)) {
      try {
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
        for (const name of this.dependencyNames(pkg)) {
          if (known.has(name)) found.add(name);
        }
      } catch (error) {
        logger.warn(`Could not parse ${pkgPath}: ${toErrorMessage(error)}`);
      }
    }

    const sources = state.files
      .filter((f) => CONTENT_EXTENSIONS.has(path.extname(f).toLowerCase()))
      .slice(0, this.config.maxContentFiles);
    for (const file of sources) {
      const content = this.readHead(file, state);
      if (content === null) continue;
      for (const pattern of IMPORT_PATTERNS) {
        for (const match of content.matchAll(pattern)) {
          const name = packageNameOf(match[1]);
          if (name && known.has(name)) found.add(name);
        }
      }
    }

    return [...found].sort();
  }

  private dependencyNames(pkg: unknown): string[] {
    if (typeof pkg !== 'object' || pkg === null) return [];
    const names: string[] = [];
    for (const field of ['dependencies', 'devDependencies', 'peerDependencies']) {
      const deps: unknown = Reflect.get(pkg, field);
      if (typeof deps === 'object' && deps !== null) {
        names.push(...Object.keys(deps));
      }
    }
    return names;
  }

  private readCache = new Map<string, string | null>();

  private readHead(file: string, state: ScanState): string | null {
    const cached = this.readCache.get(file);
    if (cached !== undefined) return cached;

    let content: string | null = null;
    let fd: number | null = null;
    try {
      fd = fs.openSync(file, 'r');
      const buffer = Buffer.alloc(this.config.maxContentBytes);
      const bytesRead = fs.readSync(fd, buffer, 0, buffer.length, 0);
      content = buffer.subarray(0, bytesRead).toString('utf-8');
    } catch {
      state.unreadable.push(file);
    } finally {
      if (fd !== null) fs.closeSync(fd);
    }

    this.readCache.set(file, content);
    return content;
  }

  private scoreDomains(
    state: ScanState,
    keywordHits: Record<string, number>,
    frameworkHits: string[],
  ): DomainScores {
    const classified = state.files.filter((f) =>
      Object.values(SIGNALS).some((s) => matchesExtension(f, s.extensions)),
    ).length;

    return mapDomains((domain) => {
      const signals = SIGNALS[domain];

      const domainFiles = state.files.filter((f) => matchesExtension(f, signals.extensions)).length;
      const extensionScore = classified === 0
        ? 0
        : saturate(domainFiles / classified, EXTENSION_SHARE_SATURATION);
      const dirScore = saturate(
        signals.directories.filter((d) => (state.directoryHits[d] ?? 0) > 0).length,
        DIRECTORY_SATURATION,
      );
      const keywordScore = saturate(
        signals.keywords.filter((k) => (keywordHits[k] ?? 0) > 0).length,
        KEYWORD_SATURATION,
      );
      const frameworkScore = saturate(
        signals.frameworks.filter((f) => frameworkHits.includes(f)).length,
        FRAMEWORK_SATURATION,
      );

      return normalizeScore(
        SIGNAL_WEIGHTS.extensions * extensionScore +
        SIGNAL_WEIGHTS.directories * dirScore +
        SIGNAL_WEIGHTS.keywords * keywordScore +
        SIGNAL_WEIGHTS.frameworks * frameworkScore,
      );
    });
  }
}

function matchesExtension(file: string, extensions: string[]): boolean {
  const lower = file.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext));
}

function packageNameOf(specifier: string): string | null {
  if (specifier.startsWith('.') || specifier.startsWith('/') || specifier.startsWith('node:')) {
    return null;
  }
  const parts = specifier.split('/');
  return specifier.startsWith('@') ? parts.slice(0, 2).join('/') : parts[0];
}

// ─── Change detection ───────────────────────────────────────────────────────

export function compareContexts(previous: ProjectContext, next: ProjectContext): ContextDelta {
  const deltas = mapDomains((domain) =>
    normalizeScore(Math.abs(next.domainScores[domain] - previous.domainScores[domain])),
  );
  let maxDelta = 0;
  let maxDomain: Domain | null = null;

  for (const domain of Object.values(Domain)) {
    const delta = deltas[domain];
    if (delta > maxDelta) {
      maxDelta = delta;
      maxDomain = domain;
    }
  }

  return { deltas, maxDelta, maxDomain };
}

export function isSignificantChange(delta: ContextDelta, threshold: number): boolean {
  return delta.maxDelta > threshold;
}
