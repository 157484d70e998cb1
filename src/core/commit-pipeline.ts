import { branchWarning, validateBranchName } from './branch-check.js';
import { classifyChanges } from './change-classifier.js';
import { collectChanges } from './change-collector.js';
import { EnvironmentError } from './errors.js';
import { formatCommitMessage, synthesizeCommitMessage } from './message-synthesizer.js';
import { DEFAULT_RULES, type ClassifierRules } from './rules.js';
import type { VcsPort } from './vcs.js';
import type { Config } from '../config/schema.js';
import type {
  ChangeSet,
  CommitAnalysis,
  CommitResult,
  PushTarget,
} from '../types/index.js';

export interface PipelineSettings {
  remote: string;
  mainBranches: string[];
  branchTypes: string[];
  breakingFooter: string;
  rules: ClassifierRules;
}

export function settingsFromConfig(
  config: Config,
  rules: ClassifierRules = DEFAULT_RULES
): PipelineSettings {
  return {
    remote: config.git.remote,
    mainBranches: config.git.mainBranches,
    branchTypes: config.git.branchTypes,
    breakingFooter: config.commit.breakingFooter,
    rules,
  };
}

/**
 * Receives progress while the pipeline runs. Steps are plain status lines,
 * warnings never stop the run.
 */
export interface PipelineReporter {
  step(message: string): void;
  warn(message: string): void;
}

const silentReporter: PipelineReporter = {
  step: () => undefined,
  warn: () => undefined,
};

export function describePushTarget(target: PushTarget): string {
  return target.kind === 'upstream' ? target.upstream : `${target.remote}/${target.branch}`;
}

/**
 * Paths present on one side only: analysed but not staged, or staged but never
 * analysed.
 */
export function divergedPaths(analysed: ChangeSet, staged: string[]): string[] {
  const before = new Set(analysed);
  const after = new Set(staged);
  return [
    ...analysed.filter((path) => !after.has(path)),
    ...staged.filter((path) => !before.has(path)),
  ].sort();
}

export class CommitPipeline {
  private vcs: VcsPort;
  private settings: PipelineSettings;
  private reporter: PipelineReporter;

  constructor(vcs: VcsPort, settings: PipelineSettings, reporter: PipelineReporter = silentReporter) {
    this.vcs = vcs;
    this.settings = settings;
    this.reporter = reporter;
  }

  /**
   * Collect, classify and describe the pending changes. Returns null when
   * there is nothing to commit.
   */
  async analyze(): Promise<CommitAnalysis | null> {
    this.reporter.step('Checking git status...');
    const { changeSet, files } = await collectChanges(this.vcs);
    if (changeSet.length === 0) {
      return null;
    }

    const branch = validateBranchName(await this.vcs.getCurrentBranch(), this.settings);
    const warning = branchWarning(branch);
    if (warning) {
      this.reporter.warn(warning);
    }

    this.reporter.step('Analyzing changes...');
    const classification = classifyChanges(files, this.settings.rules);

    this.reporter.step('Generating commit message...');
    const message = synthesizeCommitMessage(changeSet, files, classification, {
      rules: this.settings.rules,
      breakingFooter: this.settings.breakingFooter,
    });

    return {
      changeSet,
      classification,
      branch,
      message,
      formatted: formatCommitMessage(message),
    };
  }

  async resolvePushTarget(branch: string): Promise<PushTarget> {
    const upstream = await this.vcs.getUpstream();
    if (upstream) {
      return { kind: 'upstream', upstream };
    }
    return { kind: 'set-upstream', remote: this.settings.remote, branch };
  }

  /**
   * Stage the whole working tree, commit it with the analysed message and
   * optionally push. A failed push leaves the local commit in place.
   */
  async commit(analysis: CommitAnalysis, options: { push?: boolean } = {}): Promise<CommitResult> {
    const push = options.push ?? true;
    if (push && !analysis.branch.branch) {
      throw new EnvironmentError(
        'HEAD is detached, there is no branch to push',
        'Check out a branch, or rerun with --no-push'
      );
    }

    this.reporter.step('Staging all changes...');
    await this.vcs.stageAll();

    const diverged = divergedPaths(analysis.changeSet, await this.vcs.getStagedPaths());
    if (diverged.length > 0) {
      this.reporter.warn(
        `Working tree changed during analysis; committing anyway: ${diverged.join(', ')}`
      );
    }

    this.reporter.step('Committing changes...');
    const hash = await this.vcs.commit(analysis.formatted);

    if (!push) {
      return { analysis, hash, divergedPaths: diverged };
    }

    this.reporter.step('Pushing to remote...');
    const target = await this.resolvePushTarget(analysis.branch.branch);
    await this.vcs.push(target);

    return { analysis, hash, pushedTo: describePushTarget(target), divergedPaths: diverged };
  }
}
