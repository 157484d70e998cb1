import { lstat, readFile } from 'fs/promises';
import { join } from 'path';
import { simpleGit, type SimpleGit } from 'simple-git';
import { EnvironmentError, GitCommandError, errorMessage, type GitStep } from './errors.js';
import type { PushTarget, WorkingTreeStatus } from '../types/index.js';

/**
 * Everything the pipeline needs from version control. Paths are relative to
 * the repository root.
 */
export interface VcsPort {
  getWorkingTreeStatus(): Promise<WorkingTreeStatus>;
  /** Unified diff of one path against the last commit, staged and unstaged together */
  getFileDiff(path: string, options?: { untracked?: boolean }): Promise<string>;
  /** Empty when HEAD is detached */
  getCurrentBranch(): Promise<string>;
  getUpstream(): Promise<string | null>;
  getStagedPaths(): Promise<string[]>;
  stageAll(): Promise<void>;
  /** Commit the index and return the short hash of the new commit */
  commit(message: string): Promise<string>;
  push(target: PushTarget): Promise<void>;
}

// `-z` output: raw paths, never quoted
const nulSeparated = (output: string): string[] => output.split('\0').filter(Boolean);

const literal = (path: string): string => `:(literal)${path}`;

/**
 * Render a file that git does not track yet as an all-added diff, so it can be
 * classified like any other change.
 */
export function untrackedFileDiff(path: string, content: string): string {
  const body = content.split('\n');
  if (body[body.length - 1] === '') body.pop();

  const header = [`--- /dev/null`, `+++ b/${path}`];
  if (body.length === 0) {
    return header.join('\n');
  }

  return [...header, `@@ -0,0 +1,${body.length} @@`, ...body.map((line) => `+${line}`)].join(
    '\n'
  );
}

export class GitVcs implements VcsPort {
  private git: SimpleGit;
  private repoRoot: string;
  private headExists: boolean | undefined;

  constructor(repoRoot: string) {
    this.repoRoot = repoRoot;
    this.git = simpleGit(repoRoot);
  }

  /**
   * Open the repository containing `cwd`.
   */
  static async open(cwd: string = process.cwd()): Promise<GitVcs> {
    try {
      const root = await simpleGit(cwd).revparse(['--show-toplevel']);
      return new GitVcs(root.trim());
    } catch (error) {
      const message = errorMessage(error);
      if (message.includes('ENOENT')) {
        throw new EnvironmentError(
          'git is not installed or not on PATH',
          'Install Git from https://git-scm.com',
          error
        );
      }
      throw new EnvironmentError(
        'Not a git repository',
        'Run commit-push inside a git working tree',
        error
      );
    }
  }

  getRepoRoot(): string {
    return this.repoRoot;
  }

  private async run<T>(step: GitStep, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw new GitCommandError(step, errorMessage(error), error);
    }
  }

  async hasCommits(): Promise<boolean> {
    if (this.headExists === undefined) {
      try {
        const head = await this.git.raw(['rev-parse', '--verify', 'HEAD']);
        this.headExists = head.trim().length > 0;
      } catch {
        // No commit yet: diffs are taken against the index instead
        this.headExists = false;
      }
    }
    return this.headExists;
  }

  async getWorkingTreeStatus(): Promise<WorkingTreeStatus> {
    const status = await this.run('status', () =>
      this.git.status(['--no-renames', '--untracked-files=all'])
    );
    const result: WorkingTreeStatus = { changed: [], untracked: [], added: [], deleted: [] };

    for (const file of status.files) {
      // Untracked directories (nested repositories) are listed with a trailing slash
      const path = file.path.replace(/\/+$/, '');
      if (file.index === '?') {
        result.untracked.push(path);
        continue;
      }
      if (file.index === '!') continue;

      result.changed.push(path);
      if (file.index === 'A') result.added.push(path);
      if (file.index === 'D' || file.working_dir === 'D') result.deleted.push(path);
    }

    return result;
  }

  async getFileDiff(path: string, options: { untracked?: boolean } = {}): Promise<string> {
    if (options.untracked) {
      return this.run('diff', async () => {
        const file = join(this.repoRoot, path);
        // Nested repositories, sockets and the like have no text to show
        if (!(await lstat(file)).isFile()) {
          return '';
        }
        return untrackedFileDiff(path, await readFile(file, 'utf-8'));
      });
    }

    const hasHead = await this.hasCommits();
    return this.run('diff', async () => {
      if (hasHead) {
        return this.git.raw(['diff', '--no-renames', 'HEAD', '--', literal(path)]);
      }
      const staged = await this.git.raw(['diff', '--cached', '--no-renames', '--', literal(path)]);
      const unstaged = await this.git.raw(['diff', '--no-renames', '--', literal(path)]);
      return [staged, unstaged].filter(Boolean).join('\n');
    });
  }

  async getCurrentBranch(): Promise<string> {
    return this.run('branch', async () =>
      (await this.git.raw(['branch', '--show-current'])).trim()
    );
  }

  async getUpstream(): Promise<string | null> {
    try {
      const upstream = await this.git.raw([
        'rev-parse',
        '--abbrev-ref',
        '--symbolic-full-name',
        '@{u}',
      ]);
      return upstream.trim() || null;
    } catch {
      // git exits non-zero when no upstream is configured
      return null;
    }
  }

  async getRemotes(): Promise<string[]> {
    const remotes = await this.git.getRemotes();
    return remotes.map((remote) => remote.name);
  }

  async getStagedPaths(): Promise<string[]> {
    return this.run('stage', async () =>
      nulSeparated(await this.git.raw(['diff', '--cached', '--name-only', '--no-renames', '-z']))
    );
  }

  async stageAll(): Promise<void> {
    await this.run('stage', () => this.git.raw(['add', '-A']));
  }

  async commit(message: string): Promise<string> {
    return this.run('commit', async () => {
      const result = await this.git.commit(message);
      // git exits non-zero without stderr when the index is empty
      if (!result.commit) {
        throw new Error('nothing to commit');
      }
      this.headExists = true;
      return result.commit;
    });
  }

  async push(target: PushTarget): Promise<void> {
    const args =
      target.kind === 'upstream' ? ['push'] : ['push', '-u', target.remote, target.branch];
    await this.run('push', () => this.git.raw(args));
  }
}
