import { posix } from 'path';
import { DEFAULT_RULES, type ClassifierRules } from './rules.js';
import type { AggregateSignals, ChangeSet, CommitType } from '../types/index.js';

/**
 * Pick the commit type for a run. The checks form a decision table: the
 * first row that matches decides.
 */
export function resolveCommitType(signals: AggregateSignals): CommitType {
  if (signals.hasCi) return 'ci';
  if (signals.hasBuild) return 'build';
  if (signals.hasTests && !signals.hasNew && !signals.hasDeleted) return 'test';
  if (signals.hasDocs && signals.fileCount === 1) return 'docs';
  if (signals.styleOnly) return 'style';

  if (signals.hasDeleted || signals.breakingChange) {
    // Removing a public contract is a feature change, removing a file alone is a fix
    return signals.breakingChange ? 'feat' : 'fix';
  }

  if (signals.hasNew || signals.featureAddition) return 'feat';

  return signals.bugFixKeywords ? 'fix' : 'refactor';
}

const byName = ([a]: [string, number], [b]: [string, number]): number =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * Directory holding the most changed files. Ties go to the lexically first
 * directory.
 */
export function mostCommonDirectory(changeSet: ChangeSet): string | undefined {
  const counts = new Map<string, number>();
  for (const path of changeSet) {
    const dir = posix.dirname(path);
    counts.set(dir, (counts.get(dir) ?? 0) + 1);
  }

  const ranked = [...counts.entries()].sort(byName).sort(([, a], [, b]) => b - a);
  return ranked[0]?.[0];
}

export function resolveScope(
  changeSet: ChangeSet,
  rules: ClassifierRules = DEFAULT_RULES
): string | undefined {
  const dir = mostCommonDirectory(changeSet);
  if (!dir || dir === '.') {
    return undefined;
  }

  // CI configuration directories are not a code area
  if (rules.ciMarkers.some((marker) => dir.includes(marker))) {
    return undefined;
  }

  const name = posix.basename(dir).replace(/^\./, '');
  if (!name) {
    return undefined;
  }

  return Object.hasOwn(rules.scopeAliases, name) ? rules.scopeAliases[name] : name;
}
