import type { GitConfig } from '../config/schema.js';
import type { BranchCheck } from '../types/index.js';

/**
 * Check a branch name against the `<type>/<name>` convention. Main branches
 * are always accepted.
 */
export function validateBranchName(
  branch: string,
  rules: Pick<GitConfig, 'mainBranches' | 'branchTypes'>
): BranchCheck {
  const isMainBranch = rules.mainBranches.includes(branch);
  const valid = isMainBranch || rules.branchTypes.some((type) => branch.startsWith(`${type}/`));

  return { branch, isMainBranch, valid };
}

export function branchWarning(check: BranchCheck): string | undefined {
  if (!check.branch) {
    return 'HEAD is detached; the commit will not be on a branch.';
  }
  if (!check.valid) {
    return `Branch '${check.branch}' does not follow conventional naming. Proceeding anyway.`;
  }
  return undefined;
}
