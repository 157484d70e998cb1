/**
 * Error types for the commit-push run.
 *
 * Every error carries a hint telling the operator what to do next. Nothing is
 * retried: each of these ends the run.
 */

export type GitStep = 'status' | 'diff' | 'branch' | 'stage' | 'commit' | 'push';

/**
 * Base error for all commit-push failures
 */
export class CommitPushError extends Error {
  readonly hint: string;

  constructor(message: string, hint: string, cause?: unknown) {
    super(message);
    this.name = 'CommitPushError';
    this.hint = hint;
    if (cause) this.cause = cause;
  }

  /**
   * Format for user-facing display (CLI output)
   */
  toUserMessage(): string {
    return `${this.message}\n  → ${this.hint}`;
  }
}

/**
 * The environment cannot support a run: git missing, not a repository,
 * detached HEAD.
 */
export class EnvironmentError extends CommitPushError {
  constructor(message: string, hint: string, cause?: unknown) {
    super(message, hint, cause);
    this.name = 'EnvironmentError';
  }
}

/**
 * A configuration file exists but cannot be used
 */
export class ConfigError extends CommitPushError {
  readonly path: string;

  constructor(path: string, details: string, cause?: unknown) {
    super(`Invalid configuration in ${path}: ${details}`, `Fix or remove ${path}`, cause);
    this.name = 'ConfigError';
    this.path = path;
  }
}

const STEP_HINTS: Record<GitStep, string> = {
  status: 'Check that `git status` works in this directory',
  diff: 'Check that `git diff HEAD` works in this directory',
  branch: 'Check that `git branch --show-current` works in this directory',
  stage: 'Resolve the problem, then run `git add -A` or rerun commit-push',
  commit: 'Changes are staged; fix the problem and run `git commit` or rerun commit-push',
  push: 'The commit was created locally; push it manually with `git push`',
};

/**
 * An external git command failed. The git error text is kept verbatim.
 */
export class GitCommandError extends CommitPushError {
  readonly step: GitStep;

  constructor(step: GitStep, gitMessage: string, cause?: unknown) {
    super(gitMessage.trim() || `git ${step} failed`, STEP_HINTS[step], cause);
    this.name = 'GitCommandError';
    this.step = step;
  }
}

export function isCommitPushError(error: unknown): error is CommitPushError {
  return error instanceof CommitPushError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
