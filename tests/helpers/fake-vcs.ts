import { GitCommandError } from '../../src/core/errors.js';
import type { VcsPort } from '../../src/core/vcs.js';
import type { PushTarget, WorkingTreeStatus } from '../../src/types/index.js';

export interface FakeVcsState {
  status?: Partial<WorkingTreeStatus>;
  diffs?: Record<string, string>;
  branch?: string;
  upstream?: string | null;
  /** What `getStagedPaths` reports after staging; defaults to the analysed paths */
  staged?: string[];
  failures?: Partial<Record<'stage' | 'commit' | 'push', string>>;
}

/**
 * In-memory stand-in for a git working tree. Records every call in order.
 */
export class FakeVcs implements VcsPort {
  readonly calls: string[] = [];
  readonly commits: string[] = [];
  readonly pushes: PushTarget[] = [];
  readonly diffRequests: Array<{ path: string; untracked: boolean }> = [];

  private status: WorkingTreeStatus;

  constructor(private state: FakeVcsState = {}) {
    this.status = {
      changed: state.status?.changed ?? [],
      untracked: state.status?.untracked ?? [],
      added: state.status?.added ?? [],
      deleted: state.status?.deleted ?? [],
    };
  }

  async getWorkingTreeStatus(): Promise<WorkingTreeStatus> {
    this.calls.push('getWorkingTreeStatus');
    return this.status;
  }

  async getFileDiff(path: string, options: { untracked?: boolean } = {}): Promise<string> {
    this.calls.push(`getFileDiff:${path}`);
    this.diffRequests.push({ path, untracked: options.untracked ?? false });
    return this.state.diffs?.[path] ?? '';
  }

  async getCurrentBranch(): Promise<string> {
    this.calls.push('getCurrentBranch');
    return this.state.branch ?? 'main';
  }

  async getUpstream(): Promise<string | null> {
    this.calls.push('getUpstream');
    return this.state.upstream ?? null;
  }

  async getStagedPaths(): Promise<string[]> {
    this.calls.push('getStagedPaths');
    return (
      this.state.staged ?? [...new Set([...this.status.changed, ...this.status.untracked])].sort()
    );
  }

  async stageAll(): Promise<void> {
    this.calls.push('stageAll');
    const failure = this.state.failures?.stage;
    if (failure) throw new GitCommandError('stage', failure);
  }

  async commit(message: string): Promise<string> {
    this.calls.push('commit');
    const failure = this.state.failures?.commit;
    if (failure) throw new GitCommandError('commit', failure);
    this.commits.push(message);
    return 'abc1234';
  }

  async push(target: PushTarget): Promise<void> {
    this.calls.push('push');
    const failure = this.state.failures?.push;
    if (failure) throw new GitCommandError('push', failure);
    this.pushes.push(target);
  }
}
