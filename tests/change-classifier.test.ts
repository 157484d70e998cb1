import { describe, it, expect } from 'vitest';
import {
  classifyChanges,
  classifyPath,
  contentLines,
  emptyAggregate,
  hasBreakingChange,
  hasBugFixKeywords,
  hasFeatureAddition,
  isStyleOnlyDiff,
} from '../src/core/change-classifier.js';
import { DEFAULT_RULES } from '../src/core/rules.js';
import type { FileChange } from '../src/types/index.js';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

function makeFile(overrides: Partial<FileChange> = {}): FileChange {
  return {
    path: 'src/index.ts',
    diff: '',
    isNew: false,
    isDeleted: false,
    ...overrides,
  };
}

const MODIFIED_DIFF = [
  'diff --git a/src/a.ts b/src/a.ts',
  'index 1234567..89abcde 100644',
  '--- a/src/a.ts',
  '+++ b/src/a.ts',
  '@@ -1,2 +1,2 @@',
  ' const a = 1;',
  '-const b = 2;',
  '+const b = 3;',
].join('\n');

// ─── Tests ────────────────────────────────────────────────────────────────────

describe('classifyPath', () => {
  it('should mark documentation by extension or file name', () => {
    expect(classifyPath('README.md').isDocs).toBe(true);
    expect(classifyPath('docs/guide.rst').isDocs).toBe(true);
    expect(classifyPath('CHANGELOG').isDocs).toBe(true);
    expect(classifyPath('notes/intro.adoc').isDocs).toBe(true);
  });

  it('should mark test files by marker substring', () => {
    expect(classifyPath('src/__tests__/parser.ts').isTest).toBe(true);
    expect(classifyPath('src/parser.spec.ts').isTest).toBe(true);
    expect(classifyPath('lib/contest.py').isTest).toBe(true);
  });

  it('should mark CI configuration', () => {
    expect(classifyPath('.github/workflows/ci.yml').isCi).toBe(true);
    expect(classifyPath('Jenkinsfile').isCi).toBe(true);
    expect(classifyPath('azure-pipelines.yml').isCi).toBe(true);
  });

  it('should mark build manifests', () => {
    expect(classifyPath('package.json').isBuildConfig).toBe(true);
    expect(classifyPath('backend/go.mod').isBuildConfig).toBe(true);
    expect(classifyPath('Makefile').isBuildConfig).toBe(true);
  });

  it('should leave ordinary source files unmarked', () => {
    expect(classifyPath('src/index.ts')).toEqual({
      isDocs: false,
      isTest: false,
      isCi: false,
      isBuildConfig: false,
    });
  });

  it('should let the first matching rule win', () => {
    // .txt is a docs extension, checked before build manifests
    expect(classifyPath('requirements.txt')).toEqual({
      isDocs: true,
      isTest: false,
      isCi: false,
      isBuildConfig: false,
    });
    // test markers are checked before CI markers
    expect(classifyPath('.github/workflows/test.yml')).toEqual({
      isDocs: false,
      isTest: true,
      isCi: false,
      isBuildConfig: false,
    });
  });

  it('should use substituted rules', () => {
    const rules = { ...DEFAULT_RULES, ciMarkers: ['.buildkite'] };
    expect(classifyPath('.buildkite/pipeline.yml', rules).isCi).toBe(true);
    expect(classifyPath('.github/workflows/ci.yml', rules).isCi).toBe(false);
  });
});

describe('contentLines', () => {
  it('should return added and removed lines without the file header', () => {
    expect(contentLines(MODIFIED_DIFF)).toEqual([
      { kind: 'removed', text: 'const b = 2;' },
      { kind: 'added', text: 'const b = 3;' },
    ]);
  });

  it('should keep dash-prefixed content inside a hunk', () => {
    const diff = ['@@ -1 +0,0 @@', '--- old sql comment'].join('\n');
    expect(contentLines(diff)).toEqual([{ kind: 'removed', text: '-- old sql comment' }]);
  });

  it('should read bare +/- lines without any hunk header', () => {
    expect(contentLines('+def enable_retry():')).toEqual([
      { kind: 'added', text: 'def enable_retry():' },
    ]);
  });
});

describe('isStyleOnlyDiff', () => {
  it('should treat re-indentation as style only', () => {
    const diff = ['@@ -1 +1 @@', '-  foo();', '+    foo();'].join('\n');
    expect(isStyleOnlyDiff(diff)).toBe(true);
  });

  it('should treat whitespace-only lines as style only', () => {
    const diff = ['@@ -1,0 +1,2 @@', '+   ', '+'].join('\n');
    expect(isStyleOnlyDiff(diff)).toBe(true);
  });

  it('should reject a content change', () => {
    expect(isStyleOnlyDiff(MODIFIED_DIFF)).toBe(false);
  });

  it('should reject a pure addition', () => {
    expect(isStyleOnlyDiff('+foo();')).toBe(false);
  });
});

describe('hasBreakingChange', () => {
  it('should flag a removed export', () => {
    expect(hasBreakingChange('-export function foo()')).toBe(true);
    expect(hasBreakingChange('-    export function foo()')).toBe(true);
  });

  it('should match breaking keywords case-insensitively next to a structural keyword', () => {
    expect(hasBreakingChange('+ This is BREAKING for the public API')).toBe(true);
    expect(hasBreakingChange('+ // remove the legacy api client')).toBe(true);
  });

  it('should ignore a breaking keyword without a structural keyword', () => {
    expect(hasBreakingChange('+ breaking the ice')).toBe(false);
  });

  it('should ignore added definitions and context lines', () => {
    expect(hasBreakingChange('+export function foo()')).toBe(false);
    expect(hasBreakingChange('@@ -1 +1 @@\n remove public api\n+const a = 1;')).toBe(false);
  });
});

describe('hasFeatureAddition', () => {
  it('should detect a feature keyword on an added line', () => {
    expect(hasFeatureAddition('+def enable_retry():')).toBe(true);
  });

  it('should ignore comments that start with a feature keyword', () => {
    expect(hasFeatureAddition('+# add logging later')).toBe(false);
  });

  it('should ignore removed lines and lines without keywords', () => {
    expect(hasFeatureAddition('-def enable_retry():')).toBe(false);
    expect(hasFeatureAddition('+x = 1')).toBe(false);
  });

  it('should require something other than a slash after the keyword', () => {
    expect(hasFeatureAddition('+// see docs/add/')).toBe(false);
  });
});

describe('hasBugFixKeywords', () => {
  it('should detect fix-flavoured words on changed lines', () => {
    expect(hasBugFixKeywords('+  // handle Error case')).toBe(true);
    expect(hasBugFixKeywords('+const total = 1;')).toBe(false);
  });
});

describe('classifyChanges', () => {
  it('should fold file signals into aggregate signals', () => {
    const files = [
      makeFile({ path: '.github/workflows/ci.yml', diff: '+      - run: npm test' }),
      makeFile({ path: 'src/old.ts', diff: '-export const x = 1;', isDeleted: true }),
      makeFile({ path: 'src/new.ts', diff: '+export const y = 2;', isNew: true }),
    ];

    const { signals, aggregate } = classifyChanges(files);

    expect(signals.map((s) => s.path)).toEqual([
      '.github/workflows/ci.yml',
      'src/old.ts',
      'src/new.ts',
    ]);
    expect(signals[0]?.isCi).toBe(true);
    expect(aggregate).toEqual({
      fileCount: 3,
      hasNew: true,
      hasDeleted: true,
      hasDocs: false,
      hasTests: false,
      hasCi: true,
      hasBuild: false,
      styleOnly: false,
      breakingChange: true,
      featureAddition: false,
      bugFixKeywords: false,
    });
  });

  it('should be vacuously style only for no files', () => {
    expect(classifyChanges([]).aggregate).toEqual(emptyAggregate());
    expect(emptyAggregate().styleOnly).toBe(true);
  });

  it('should return identical results for identical input', () => {
    const files = [
      makeFile({ path: 'src/a.ts', diff: MODIFIED_DIFF }),
      makeFile({ path: 'README.md', diff: '+More words' }),
    ];
    expect(classifyChanges(files)).toEqual(classifyChanges(files));
  });
});
