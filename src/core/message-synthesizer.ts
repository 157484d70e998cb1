import { posix } from 'path';
import { addedLines, contentLines } from './change-classifier.js';
import { resolveCommitType, resolveScope } from './commit-resolver.js';
import { DEFAULT_RULES, keywordPattern, type ClassifierRules } from './rules.js';
import type {
  ChangeSet,
  Classification,
  CommitMessage,
  CommitType,
  FileChange,
} from '../types/index.js';

export const DEFAULT_BREAKING_FOOTER =
  'BREAKING CHANGE: This change includes breaking modifications that may affect existing functionality.';

const FIXED_DESCRIPTIONS: Record<Exclude<CommitType, 'feat' | 'fix' | 'refactor'>, string> = {
  docs: 'update documentation',
  style: 'format code',
  perf: 'improve performance',
  test: 'add tests',
  build: 'update dependencies',
  ci: 'update CI configuration',
  chore: 'update project configuration',
};

const FEATURE_TOKEN_LIMIT = 30;
const FIX_TOKEN_LIMIT = 40;
const REFACTOR_TOKEN_LIMIT = 30;

/**
 * The word that follows one of `keywords` in `line`, lowercased and cut to
 * `maxLength`. Inflections such as "fixes" or "enabled" count as the keyword;
 * "prefix" or "implementation" do not.
 */
export function tokenAfter(line: string, keywords: string[], maxLength: number): string | undefined {
  const pattern = new RegExp(
    `(?<![a-z])${keywordPattern(keywords)}(?:s|d|es|ed|ing)?(?![a-z])[\\s_-]*([a-z0-9][\\w.-]*)`,
    'i'
  );
  const match = pattern.exec(line);
  if (!match?.[1]) {
    return undefined;
  }

  const token = match[1].replace(/[._-]+$/, '').toLowerCase().slice(0, maxLength);
  return token || undefined;
}

function firstToken(lines: string[], keywords: string[], maxLength: number): string | undefined {
  for (const line of lines) {
    const token = tokenAfter(line, keywords, maxLength);
    if (token) return token;
  }
  return undefined;
}

function describeIntegration(lines: string[], rules: ClassifierRules): string | undefined {
  for (const line of lines) {
    if (!/support/i.test(line)) continue;

    const lower = line.toLowerCase();
    const name = rules.integrationNames.find((candidate) => lower.includes(candidate.toLowerCase()));
    if (name) {
      const kind = /provider/i.test(line) ? 'provider' : 'agent';
      return `add support for ${name.toLowerCase()} ${kind}`;
    }
  }
  return undefined;
}

/**
 * Description drawn from one file's added lines, trying the phrase patterns
 * in priority order.
 */
export function describeFeature(diff: string, rules: ClassifierRules = DEFAULT_RULES): string | undefined {
  const lines = addedLines(diff);

  const integration = describeIntegration(lines, rules);
  if (integration) return integration;

  if (lines.some((line) => /support.*multiple|multiple.*agent/i.test(line))) {
    return 'add support for multiple agents';
  }

  if (lines.some((line) => /add.*feature|new.*feature/i.test(line))) {
    return 'add new feature';
  }

  const token = firstToken(lines, rules.featureTokenKeywords, FEATURE_TOKEN_LIMIT);
  return token ? `add ${token}` : undefined;
}

/** First word of a file's base name: `src/retry_policy.ts` gives "retry". */
export function fileNameWord(path: string): string {
  const base = posix.basename(path);
  const dot = base.lastIndexOf('.');
  const stem = dot >= 0 ? base.slice(0, dot) : base;
  return stem.toLowerCase().replace(/[_-]/g, ' ').trim().split(/\s+/)[0] ?? '';
}

function describeFeat(files: FileChange[], rules: ClassifierRules): string {
  for (const file of files) {
    const description = describeFeature(file.diff, rules);
    if (description) return description;
  }

  const newFile = files.find((file) => file.isNew);
  const word = newFile ? fileNameWord(newFile.path) : '';
  return word ? `add ${word}` : 'add new functionality';
}

/**
 * Only the first changed line naming one of `keywords` counts. A token of
 * three letters or fewer ("fix a", "fix the") gives no description.
 */
function describeByToken(
  files: FileChange[],
  keywords: string[],
  maxLength: number,
  verb: string
): string | undefined {
  const keyword = new RegExp(`(?<![a-z])${keywordPattern(keywords)}`, 'i');
  const line = files
    .flatMap((file) => contentLines(file.diff).map((diffLine) => diffLine.text))
    .find((text) => keyword.test(text));
  if (line === undefined) {
    return undefined;
  }

  const token = tokenAfter(line, keywords, maxLength);
  return token && token.length > 3 ? `${verb} ${token}` : undefined;
}

export function synthesizeDescription(
  type: CommitType,
  files: FileChange[],
  rules: ClassifierRules = DEFAULT_RULES
): string {
  switch (type) {
    case 'feat':
      return describeFeat(files, rules);
    case 'fix':
      return describeByToken(files, rules.fixKeywords, FIX_TOKEN_LIMIT, 'fix') ?? 'fix bug';
    case 'refactor':
      return (
        describeByToken(files, rules.refactorKeywords, REFACTOR_TOKEN_LIMIT, 'refactor') ??
        'refactor code'
      );
    default:
      return FIXED_DESCRIPTIONS[type];
  }
}

export function buildCommitMessage(
  type: CommitType,
  description: string,
  options: { scope?: string; breaking?: boolean; breakingFooter?: string } = {}
): CommitMessage {
  const breaking = options.breaking ?? false;
  return {
    type,
    scope: options.scope,
    breaking,
    description,
    footer: breaking ? (options.breakingFooter ?? DEFAULT_BREAKING_FOOTER) : undefined,
  };
}

export function formatCommitHeader(message: CommitMessage): string {
  const scope = message.scope ? `(${message.scope})` : '';
  const bang = message.breaking ? '!' : '';
  return `${message.type}${scope}${bang}: ${message.description}`;
}

export function formatCommitMessage(message: CommitMessage): string {
  const header = formatCommitHeader(message);
  return message.footer ? `${header}\n\n${message.footer}` : header;
}

/**
 * Resolve type and scope for a classified change set and turn them into a
 * commit message.
 */
export function synthesizeCommitMessage(
  changeSet: ChangeSet,
  files: FileChange[],
  classification: Classification,
  options: { rules?: ClassifierRules; breakingFooter?: string } = {}
): CommitMessage {
  const rules = options.rules ?? DEFAULT_RULES;
  const type = resolveCommitType(classification.aggregate);

  return buildCommitMessage(type, synthesizeDescription(type, files, rules), {
    scope: resolveScope(changeSet, rules),
    breaking: classification.aggregate.breakingChange,
    breakingFooter: options.breakingFooter,
  });
}
