import { Command } from 'commander';
import { execa } from 'execa';
import { ConfigManager } from '../config/index.js';
import { validateBranchName } from '../core/branch-check.js';
import { errorMessage, isCommitPushError } from '../core/errors.js';
import { GitVcs } from '../core/vcs.js';
import UI from '../ui/renderer.js';

const { colors } = UI;

export interface CheckResult {
  name: string;
  status: 'ok' | 'warning' | 'error';
  message: string;
  fix?: string;
}

/**
 * Get version of a command
 */
async function getVersion(cmd: string, args: string[] = ['--version']): Promise<string | null> {
  try {
    const { stdout } = await execa(cmd, args);
    return stdout.trim().split('\n')[0] ?? null;
  } catch {
    return null;
  }
}

/**
 * Checks that need a repository, run once git itself is known to work
 */
async function repositoryChecks(
  vcs: GitVcs,
  remote: string,
  mainBranches: string[],
  branchTypes: string[]
): Promise<CheckResult[]> {
  const checks: CheckResult[] = [{ name: 'Repository', status: 'ok', message: vcs.getRepoRoot() }];

  const branch = await vcs.getCurrentBranch();
  if (!branch) {
    checks.push({
      name: 'Branch',
      status: 'error',
      message: 'HEAD is detached',
      fix: 'Run: git switch <branch>',
    });
  } else {
    const naming = validateBranchName(branch, { mainBranches, branchTypes });
    checks.push({
      name: 'Branch',
      status: naming.valid ? 'ok' : 'warning',
      message: naming.valid ? branch : `${branch} (does not follow <type>/<name>)`,
    });
  }

  const remotes = await vcs.getRemotes();
  const upstream = await vcs.getUpstream();
  if (upstream) {
    checks.push({ name: 'Upstream', status: 'ok', message: upstream });
  } else if (remotes.includes(remote)) {
    checks.push({
      name: 'Upstream',
      status: 'ok',
      message: `none yet, first push goes to ${remote}/${branch || '<branch>'}`,
    });
  } else {
    checks.push({
      name: 'Upstream',
      status: 'error',
      message: `No upstream and no remote named '${remote}'`,
      fix: `Run: git remote add ${remote} <url>`,
    });
  }

  return checks;
}

/**
 * Run all diagnostic checks
 */
export async function runChecks(cwd: string = process.cwd()): Promise<CheckResult[]> {
  const checks: CheckResult[] = [];

  const gitVersion = await getVersion('git');
  if (!gitVersion) {
    checks.push({
      name: 'Git',
      status: 'error',
      message: 'Not found',
      fix: 'Install Git from https://git-scm.com',
    });
    return checks;
  }
  checks.push({ name: 'Git', status: 'ok', message: gitVersion });

  let manager: ConfigManager;
  try {
    manager = new ConfigManager({ cwd });
    checks.push({ name: 'Config', status: 'ok', message: manager.getConfigPath() });
  } catch (error) {
    checks.push({
      name: 'Config',
      status: 'error',
      message: errorMessage(error),
      fix: isCommitPushError(error) ? error.hint : undefined,
    });
    return checks;
  }

  const { git } = manager.get();
  try {
    const vcs = await GitVcs.open(cwd);
    checks.push(...(await repositoryChecks(vcs, git.remote, git.mainBranches, git.branchTypes)));
  } catch (error) {
    checks.push({
      name: 'Repository',
      status: 'error',
      message: errorMessage(error),
      fix: isCommitPushError(error) ? error.hint : undefined,
    });
  }

  return checks;
}

export const doctorCommand = new Command('doctor')
  .description('Check that commit-push can run in this directory')
  .action(async () => {
    console.log('');
    console.log(UI.header('System Check'));
    console.log('');

    const spinner = UI.spinner('Running diagnostics...');
    spinner.start();

    const checks = await runChecks();

    spinner.stop();

    const statusIcon = {
      ok: colors.success(UI.ASCII.status.check),
      warning: colors.warning(UI.ASCII.status.warning),
      error: colors.error(UI.ASCII.status.cross),
    };

    for (const check of checks) {
      const icon = statusIcon[check.status];
      const name = check.name.padEnd(12);
      const message =
        check.status === 'ok'
          ? colors.muted(check.message)
          : check.status === 'error'
            ? colors.error(check.message)
            : colors.warning(check.message);

      console.log(`  ${icon} ${name} ${message}`);

      if (check.fix && check.status === 'error') {
        console.log(`      ${colors.muted('Fix:')} ${colors.accent(check.fix)}`);
      }
    }

    console.log('');

    const errors = checks.filter((c) => c.status === 'error');
    if (errors.length === 0) {
      console.log(UI.success('All checks passed! commit-push is ready to use.'));
      console.log('');
      return;
    }

    console.log(UI.error(`${errors.length} issue(s) found`));
    console.log('');
    process.exit(1);
  });
