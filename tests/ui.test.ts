import { describe, it, expect } from 'vitest';
import { renderClassification } from '../src/commands/commit-push.js';
import { classifyChanges } from '../src/core/change-classifier.js';
import { GitCommandError } from '../src/core/errors.js';
import { stripAnsi } from '../src/ui/ascii.js';
import UI from '../src/ui/renderer.js';

describe('UI renderer', () => {
  it('should prefix status lines with their symbol', () => {
    expect(stripAnsi(UI.success('Commit successful!'))).toBe('✓ Commit successful!');
    expect(stripAnsi(UI.warning('Push skipped'))).toBe('! Push skipped');
    expect(stripAnsi(UI.info('No changes to commit.'))).toBe('i No changes to commit.');
  });

  it('should put error details on an indented second line', () => {
    expect(stripAnsi(UI.error('Not a git repository', '→ Run git init'))).toBe(
      '✗ Not a git repository\n  → Run git init'
    );
  });

  it('should render an error with its hint', () => {
    const error = new GitCommandError('push', 'fatal: unable to access remote');
    expect(stripAnsi(UI.error(error.toUserMessage()))).toBe(
      '✗ fatal: unable to access remote\n  → The commit was created locally; push it manually with `git push`'
    );
  });

  it('should pad keys to the requested width', () => {
    expect(stripAnsi(UI.keyValue('Commit', 'abc1234', 10))).toBe('Commit     abc1234');
  });

  it('should box the commit message under its title', () => {
    const output = stripAnsi(UI.box('feat(src): add retry', 'Commit message'));

    expect(output).toContain('Commit message');
    expect(output).toContain('feat(src): add retry');
  });
});

describe('renderClassification', () => {
  it('should list file tags and run-wide signals', () => {
    const classification = classifyChanges([
      {
        path: 'src/a.test.ts',
        diff: '+expect(total).toBe(3);',
        isNew: true,
        isDeleted: false,
      },
    ]);

    const lines = stripAnsi(renderClassification(classification)).split('\n');

    expect(lines).toContain('  src/a.test.ts [new, test]');
    expect(lines).toContain(`${'  style only'.padEnd(18)} no`);
    expect(lines).toContain(`${'  breaking'.padEnd(18)} no`);
  });
});
