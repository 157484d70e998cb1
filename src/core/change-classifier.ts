import { posix } from 'path';
import { DEFAULT_RULES, keywordPattern, type ClassifierRules } from './rules.js';
import type {
  AggregateSignals,
  Classification,
  FileChange,
  FileSignal,
} from '../types/index.js';

export interface DiffLine {
  kind: 'added' | 'removed';
  text: string;
}

export interface PathCategory {
  isDocs: boolean;
  isTest: boolean;
  isCi: boolean;
  isBuildConfig: boolean;
}

const NO_CATEGORY: PathCategory = {
  isDocs: false,
  isTest: false,
  isCi: false,
  isBuildConfig: false,
};

/**
 * Categorise a path. Rules are checked in order (docs, test, CI, build) and
 * the first one that matches wins, so at most one flag is set.
 */
export function classifyPath(path: string, rules: ClassifierRules = DEFAULT_RULES): PathCategory {
  const fileName = posix.basename(path);
  const dot = fileName.lastIndexOf('.');
  const extension = dot > 0 ? fileName.slice(dot + 1) : '';

  if (
    rules.docsExtensions.includes(extension) ||
    rules.docsFilePrefixes.some((prefix) => fileName.startsWith(prefix))
  ) {
    return { ...NO_CATEGORY, isDocs: true };
  }

  const testFile = new RegExp(
    `\\.(?:test|spec)\\.${keywordPattern(rules.testFileExtensions)}$`
  );
  if (rules.testMarkers.some((marker) => path.includes(marker)) || testFile.test(path)) {
    return { ...NO_CATEGORY, isTest: true };
  }

  if (rules.ciMarkers.some((marker) => path.includes(marker))) {
    return { ...NO_CATEGORY, isCi: true };
  }

  if (rules.buildManifests.some((manifest) => path.includes(manifest))) {
    return { ...NO_CATEGORY, isBuildConfig: true };
  }

  return NO_CATEGORY;
}

/**
 * Added and removed lines of a unified diff, without their +/- prefix.
 * File header lines (`--- a/x`, `+++ b/x`) outside of a hunk are skipped.
 */
export function contentLines(diff: string): DiffLine[] {
  const lines: DiffLine[] = [];
  let inHunk = false;

  for (const line of diff.split('\n')) {
    if (line.startsWith('diff --git')) {
      inHunk = false;
      continue;
    }
    if (line.startsWith('@@')) {
      inHunk = true;
      continue;
    }
    if (!inHunk && (line.startsWith('+++') || line.startsWith('---'))) {
      continue;
    }

    if (line.startsWith('+')) {
      lines.push({ kind: 'added', text: line.slice(1) });
    } else if (line.startsWith('-')) {
      lines.push({ kind: 'removed', text: line.slice(1) });
    }
  }

  return lines;
}

export function addedLines(diff: string): string[] {
  return contentLines(diff)
    .filter((line) => line.kind === 'added')
    .map((line) => line.text);
}

/**
 * True when the diff only moves whitespace around: with all whitespace
 * removed, the added and removed lines are the same multiset.
 */
export function isStyleOnlyDiff(diff: string): boolean {
  const added: string[] = [];
  const removed: string[] = [];

  for (const line of contentLines(diff)) {
    const compact = line.text.replace(/\s+/g, '');
    if (!compact) continue;
    (line.kind === 'added' ? added : removed).push(compact);
  }

  if (added.length !== removed.length) {
    return false;
  }

  added.sort();
  removed.sort();
  return added.every((value, i) => value === removed[i]);
}

export function hasBreakingChange(diff: string, rules: ClassifierRules = DEFAULT_RULES): boolean {
  const indicator = new RegExp(keywordPattern(rules.breakingIndicators), 'i');
  const structural = new RegExp(keywordPattern(rules.structuralKeywords), 'i');
  const removedDefinition = new RegExp(`^\\s*${keywordPattern(rules.removedDefinitionKeywords)}`);

  return contentLines(diff).some(
    (line) =>
      (indicator.test(line.text) && structural.test(line.text)) ||
      (line.kind === 'removed' && removedDefinition.test(line.text))
  );
}

export function hasFeatureAddition(diff: string, rules: ClassifierRules = DEFAULT_RULES): boolean {
  const keywords = keywordPattern(rules.featureKeywords);
  const feature = new RegExp(`${keywords}.*[^/]`, 'i');
  // "# add foo" is a note, not a feature
  const comment = new RegExp(`^\\s*#\\s*${keywords}`, 'i');

  return addedLines(diff).some((text) => feature.test(text) && !comment.test(text));
}

export function hasBugFixKeywords(diff: string, rules: ClassifierRules = DEFAULT_RULES): boolean {
  const keywords = new RegExp(keywordPattern(rules.bugFixKeywords), 'i');
  return contentLines(diff).some((line) => keywords.test(line.text));
}

export function toFileSignal(file: FileChange, rules: ClassifierRules = DEFAULT_RULES): FileSignal {
  return {
    path: file.path,
    isNew: file.isNew,
    isDeleted: file.isDeleted,
    ...classifyPath(file.path, rules),
  };
}

export function emptyAggregate(): AggregateSignals {
  return {
    fileCount: 0,
    hasNew: false,
    hasDeleted: false,
    hasDocs: false,
    hasTests: false,
    hasCi: false,
    hasBuild: false,
    styleOnly: true,
    breakingChange: false,
    featureAddition: false,
    bugFixKeywords: false,
  };
}

/**
 * Fold every file into the run-wide signals. Content checks short-circuit:
 * once a flag is settled, later files are not inspected for it.
 */
export function classifyChanges(
  files: FileChange[],
  rules: ClassifierRules = DEFAULT_RULES
): Classification {
  return files.reduce<Classification>(
    (acc, file) => {
      const signal = toFileSignal(file, rules);
      const prev = acc.aggregate;

      return {
        signals: [...acc.signals, signal],
        aggregate: {
          fileCount: prev.fileCount + 1,
          hasNew: prev.hasNew || signal.isNew,
          hasDeleted: prev.hasDeleted || signal.isDeleted,
          hasDocs: prev.hasDocs || signal.isDocs,
          hasTests: prev.hasTests || signal.isTest,
          hasCi: prev.hasCi || signal.isCi,
          hasBuild: prev.hasBuild || signal.isBuildConfig,
          styleOnly: prev.styleOnly && isStyleOnlyDiff(file.diff),
          breakingChange: prev.breakingChange || hasBreakingChange(file.diff, rules),
          featureAddition: prev.featureAddition || hasFeatureAddition(file.diff, rules),
          bugFixKeywords: prev.bugFixKeywords || hasBugFixKeywords(file.diff, rules),
        },
      };
    },
    { signals: [], aggregate: emptyAggregate() }
  );
}
