/**
 * Strategy Loader
 *
 * Reads strategy versions from a directory of JSON files into a
 * StrategyStore. Every file is validated before it is accepted: weights per
 * side must sum to 1, and so must the long and short shares. A malformed
 * revision is rejected outright, never renormalised.
 *
 * The directory can be watched: new versions are picked up on change, while
 * already loaded versions stay untouched.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { StrategyValidationError, errorMessage } from '../utils/errors.js';
import { approxEqual } from '../utils/rounding.js';
import type { StrategyVersion, TargetPosition } from './types.js';

const log = createLogger('LOADER');

export const WEIGHT_EPSILON = 1e-6;

const PositionSchema = z.object({
  ticker: z.string().min(1),
  side: z.enum(['long', 'short']),
  weight: z.number().gt(0).lte(1),
  rationale: z.string().default(''),
  confidence: z.number().min(0).max(100).nullish().transform(v => v ?? null),
});

const StrategySchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'lower-case slug expected'),
  version: z.number().int().positive(),
  name: z.string().min(1),
  description: z.string().default(''),
  baseCurrency: z.string().regex(/^[A-Z]{3}$/, 'expected an ISO 4217 code'),
  longShare: z.number().min(0).max(1),
  shortShare: z.number().min(0).max(1),
  positions: z.array(PositionSchema),
});

function sideWeight(positions: readonly TargetPosition[], side: TargetPosition['side']): number {
  return positions.filter(p => p.side === side).reduce((sum, p) => sum + p.weight, 0);
}

function checkInvariants(strategy: StrategyVersion): string[] {
  const issues: string[] = [];

  if (!approxEqual(strategy.longShare + strategy.shortShare, 1, WEIGHT_EPSILON)) {
    issues.push(`longShare + shortShare = ${strategy.longShare + strategy.shortShare}, expected 1`);
  }

  for (const [side, share] of [['long', strategy.longShare], ['short', strategy.shortShare]] as const) {
    const count = strategy.positions.filter(p => p.side === side).length;
    if (count === 0) {
      if (share > 0) issues.push(`${side}Share is ${share} but there are no ${side} positions`);
      continue;
    }
    const total = sideWeight(strategy.positions, side);
    if (!approxEqual(total, 1, WEIGHT_EPSILON)) {
      issues.push(`${side} weights sum to ${total}, expected 1`);
    }
  }

  const seen = new Set<string>();
  for (const p of strategy.positions) {
    const key = `${p.side}:${p.ticker}`;
    if (seen.has(key)) issues.push(`duplicate ${p.side} position for ${p.ticker}`);
    seen.add(key);
  }

  return issues;
}

function freezeStrategy(strategy: StrategyVersion): StrategyVersion {
  return Object.freeze({
    ...strategy,
    positions: Object.freeze(strategy.positions.map(p => Object.freeze({ ...p }))),
  });
}

/** Validates a parsed JSON document. Throws StrategyValidationError. */
export function parseStrategy(input: unknown, source = '<inline>'): StrategyVersion {
  const parsed = StrategySchema.safeParse(input);
  if (!parsed.success) {
    throw new StrategyValidationError(
      source,
      parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`)
    );
  }

  const issues = checkInvariants(parsed.data);
  if (issues.length > 0) throw new StrategyValidationError(source, issues);

  return freezeStrategy(parsed.data);
}

// =============================================================================
// Store
// =============================================================================

export class StrategyStore {
  private versions = new Map<string, Map<number, StrategyVersion>>();

  /** Adds a version. Returns false if that (id, version) is already loaded. */
  add(strategy: StrategyVersion): boolean {
    let byVersion = this.versions.get(strategy.id);
    if (!byVersion) {
      byVersion = new Map();
      this.versions.set(strategy.id, byVersion);
    }
    if (byVersion.has(strategy.version)) return false;
    byVersion.set(strategy.version, strategy);
    return true;
  }

  has(id: string, version?: number): boolean {
    const byVersion = this.versions.get(id);
    if (!byVersion) return false;
    return version === undefined ? byVersion.size > 0 : byVersion.has(version);
  }

  get(id: string, version?: number): StrategyVersion | undefined {
    return version === undefined ? this.latest(id) : this.versions.get(id)?.get(version);
  }

  latest(id: string): StrategyVersion | undefined {
    const byVersion = this.versions.get(id);
    if (!byVersion || byVersion.size === 0) return undefined;
    const newest = Math.max(...byVersion.keys());
    return byVersion.get(newest);
  }

  /** Latest version of every strategy */
  list(): StrategyVersion[] {
    const result: StrategyVersion[] = [];
    for (const id of [...this.versions.keys()].sort()) {
      const latest = this.latest(id);
      if (latest) result.push(latest);
    }
    return result;
  }

  versionsOf(id: string): number[] {
    return [...(this.versions.get(id)?.keys() ?? [])].sort((a, b) => a - b);
  }
}

// =============================================================================
// Files
// =============================================================================

function strategyFiles(dir: string): string[] {
  return fs
    .readdirSync(dir)
    .filter(f => f.endsWith('.json'))
    .sort()
    .map(f => path.join(dir, f));
}

export function readStrategyFile(filePath: string): StrategyVersion {
  const raw = fs.readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StrategyValidationError(path.basename(filePath), [`not valid JSON: ${errorMessage(error)}`]);
  }
  return parseStrategy(parsed, path.basename(filePath));
}

/** Initial load: any invalid file aborts startup. */
export function loadStrategies(store: StrategyStore, dir: string): number {
  const resolved = path.resolve(dir);
  log.info('Loading strategies', { dir: resolved });

  let added = 0;
  for (const file of strategyFiles(resolved)) {
    const strategy = readStrategyFile(file);
    if (store.add(strategy)) {
      added++;
      log.info('Strategy loaded', { id: strategy.id, version: strategy.version, positions: strategy.positions.length });
    } else {
      log.warn('Strategy version already loaded, skipping', { id: strategy.id, version: strategy.version });
    }
  }

  log.info('Strategies loaded', { count: added });
  return added;
}

export interface ReloadReport {
  added: Array<{ id: string; version: number }>;
  rejected: Array<{ file: string; reason: string }>;
}

/** Later loads: a bad revision is rejected and reported, the rest still load. */
export function reloadStrategies(store: StrategyStore, dir: string): ReloadReport {
  const resolved = path.resolve(dir);
  const report: ReloadReport = { added: [], rejected: [] };

  for (const file of strategyFiles(resolved)) {
    try {
      const strategy = readStrategyFile(file);
      if (store.add(strategy)) {
        report.added.push({ id: strategy.id, version: strategy.version });
        log.info('New strategy version', { id: strategy.id, version: strategy.version });
      }
    } catch (err) {
      const reason = errorMessage(err);
      report.rejected.push({ file: path.basename(file), reason });
      log.error('Strategy revision rejected', { file: path.basename(file), reason });
    }
  }

  log.info('Strategies reloaded', { added: report.added.length, rejected: report.rejected.length });
  return report;
}

export function watchStrategies(store: StrategyStore, dir: string): fs.FSWatcher {
  const resolved = path.resolve(dir);
  log.info('Watching strategies directory', { dir: resolved });

  let debounceTimer: ReturnType<typeof setTimeout> | null = null;

  const watcher = fs.watch(resolved, (_eventType, filename) => {
    if (filename && !filename.toString().endsWith('.json')) return;

    // fs.watch fires several events per save
    if (debounceTimer) clearTimeout(debounceTimer);
    debounceTimer = setTimeout(() => {
      try {
        reloadStrategies(store, resolved);
      } catch (err) {
        log.error('Failed to reload strategies', { msg: errorMessage(err) });
      }
    }, 300);
  });

  watcher.on('close', () => {
    if (debounceTimer) clearTimeout(debounceTimer);
  });

  return watcher;
}
