// Core types
export const COMMIT_TYPES = [
  'ci',
  'build',
  'test',
  'docs',
  'style',
  'feat',
  'fix',
  'refactor',
  'perf',
  'chore',
] as const;

export type CommitType = (typeof COMMIT_TYPES)[number];

/** Sorted, deduplicated relative paths changed since the last commit. */
export type ChangeSet = readonly string[];

export interface FileChange {
  path: string;
  diff: string;
  isNew: boolean;
  isDeleted: boolean;
}

export interface CollectedChanges {
  changeSet: ChangeSet;
  files: FileChange[];
}

export interface FileSignal {
  path: string;
  isNew: boolean;
  isDeleted: boolean;
  isDocs: boolean;
  isTest: boolean;
  isCi: boolean;
  isBuildConfig: boolean;
}

export interface AggregateSignals {
  fileCount: number;
  hasNew: boolean;
  hasDeleted: boolean;
  hasDocs: boolean;
  hasTests: boolean;
  hasCi: boolean;
  hasBuild: boolean;
  styleOnly: boolean;
  breakingChange: boolean;
  featureAddition: boolean;
  bugFixKeywords: boolean;
}

export interface Classification {
  signals: FileSignal[];
  aggregate: AggregateSignals;
}

export interface CommitMessage {
  type: CommitType;
  scope?: string;
  breaking: boolean;
  description: string;
  footer?: string;
}

export interface ConventionalCommit {
  type: CommitType | 'revert';
  scope?: string;
  subject: string;
  breaking: boolean;
}

export interface WorkingTreeStatus {
  /** Paths changed against HEAD, staged or not */
  changed: string[];
  untracked: string[];
  /** Paths added in the index */
  added: string[];
  /** Paths deleted in the index or the working tree */
  deleted: string[];
}

export type PushTarget =
  | { kind: 'upstream'; upstream: string }
  | { kind: 'set-upstream'; remote: string; branch: string };

export interface BranchCheck {
  branch: string;
  isMainBranch: boolean;
  valid: boolean;
}

export interface CommitAnalysis {
  changeSet: ChangeSet;
  classification: Classification;
  branch: BranchCheck;
  message: CommitMessage;
  formatted: string;
}

export interface CommitResult {
  analysis: CommitAnalysis;
  hash: string;
  pushedTo?: string;
  /** Paths staged by `add -A` that were not in the analysed ChangeSet, or the reverse */
  divergedPaths: string[];
}
