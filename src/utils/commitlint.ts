import { COMMIT_TYPES, type ConventionalCommit } from '../types/index.js';

const COMMIT_PATTERN = new RegExp(
  `^(${[...COMMIT_TYPES, 'revert'].join('|')})(\\([^\\)]+\\))?(!)?:\\s*(.+)$`
);

const isCommitType = (value: string): value is ConventionalCommit['type'] =>
  value === 'revert' || COMMIT_TYPES.some((type) => type === value);

/**
 * Parse the header (first line) of a Conventional Commit message.
 */
export function parseConventionalCommit(message: string): ConventionalCommit | null {
  const header = message.split('\n')[0] ?? '';
  const match = header.match(COMMIT_PATTERN);

  if (!match) {
    return null;
  }

  const [, type = '', scope, breaking, subject = ''] = match;
  if (!isCommitType(type)) {
    return null;
  }

  return {
    type,
    scope: scope?.replace(/[()]/g, ''),
    subject: subject.trim(),
    breaking: breaking === '!',
  };
}

/**
 * True when the message footer announces a breaking change.
 */
export function hasBreakingFooter(message: string): boolean {
  return /^BREAKING[ -]CHANGE: /m.test(message);
}
