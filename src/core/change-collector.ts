import type { VcsPort } from './vcs.js';
import type { ChangeSet, CollectedChanges, FileChange } from '../types/index.js';

export function toChangeSet(paths: string[]): ChangeSet {
  return [...new Set(paths.filter(Boolean))].sort();
}

/**
 * Gather every path changed since the last commit, staged, unstaged or not
 * yet tracked, together with its diff.
 */
export async function collectChanges(vcs: VcsPort): Promise<CollectedChanges> {
  const status = await vcs.getWorkingTreeStatus();

  const untracked = new Set(status.untracked);
  const added = new Set(status.added);
  const deleted = new Set(status.deleted);
  const changeSet = toChangeSet([...status.changed, ...status.untracked]);

  const files: FileChange[] = [];
  for (const path of changeSet) {
    const isUntracked = untracked.has(path);
    files.push({
      path,
      diff: await vcs.getFileDiff(path, { untracked: isUntracked }),
      isNew: isUntracked || added.has(path),
      isDeleted: deleted.has(path),
    });
  }

  return { changeSet, files };
}
