import { getConfig } from '../config/index.js';
import { CommitPipeline, settingsFromConfig, type PipelineReporter } from '../core/commit-pipeline.js';
import { errorMessage, isCommitPushError } from '../core/errors.js';
import { GitVcs } from '../core/vcs.js';
import type { Classification, CommitAnalysis, CommitResult } from '../types/index.js';
import UI from '../ui/renderer.js';
import { hasBreakingFooter, parseConventionalCommit } from '../utils/commitlint.js';

const { colors } = UI;

export interface CommitPushCommandOptions {
  dryRun?: boolean;
  push?: boolean;
  debug?: boolean;
}

const flag = (value: boolean): string => (value ? colors.success('yes') : colors.muted('no'));

/**
 * Per-file flags and run-wide signals, for --debug
 */
export function renderClassification(classification: Classification): string {
  const lines: string[] = [UI.section('Signals')];

  for (const signal of classification.signals) {
    const tags = [
      signal.isNew && 'new',
      signal.isDeleted && 'deleted',
      signal.isDocs && 'docs',
      signal.isTest && 'test',
      signal.isCi && 'ci',
      signal.isBuildConfig && 'build',
    ].filter((tag): tag is string => typeof tag === 'string');
    lines.push(`  ${signal.path} ${colors.muted(tags.length > 0 ? `[${tags.join(', ')}]` : '')}`);
  }

  const { aggregate } = classification;
  lines.push('');
  lines.push(UI.keyValue('  style only', flag(aggregate.styleOnly), 18));
  lines.push(UI.keyValue('  breaking', flag(aggregate.breakingChange), 18));
  lines.push(UI.keyValue('  feature added', flag(aggregate.featureAddition), 18));
  lines.push(UI.keyValue('  fix keywords', flag(aggregate.bugFixKeywords), 18));

  return lines.join('\n');
}

function printAnalysis(analysis: CommitAnalysis): void {
  console.log(UI.keyValue('Branch', analysis.branch.branch || colors.muted('(detached)')));
  console.log(UI.keyValue('Files', String(analysis.changeSet.length)));
  console.log(UI.box(analysis.formatted, 'Commit message'));
}

function printDryRun(analysis: CommitAnalysis): void {
  const parsed = parseConventionalCommit(analysis.formatted);
  if (parsed) {
    console.log(UI.keyValue('Type', parsed.type));
    console.log(UI.keyValue('Scope', parsed.scope ?? colors.muted('none')));
    console.log(
      UI.keyValue('Breaking', flag(parsed.breaking || hasBreakingFooter(analysis.formatted)))
    );
    console.log('');
  }
  console.log(UI.info('Dry run: nothing was staged, committed or pushed'));
}

function printSummary(result: CommitResult): void {
  console.log(UI.success('Commit successful!'));
  console.log(UI.keyValue('  Commit', result.hash, 13));
  console.log(UI.keyValue('  Message', result.analysis.formatted.split('\n')[0] ?? '', 13));
  if (result.pushedTo) {
    console.log(UI.keyValue('  Pushed to', result.pushedTo, 13));
  } else {
    console.log(UI.info('Push skipped'));
  }
}

/**
 * Analyse the working tree, commit everything with a Conventional Commit
 * message and push it.
 */
export async function commitPushAction(options: CommitPushCommandOptions): Promise<void> {
  console.log('');
  console.log(UI.header('conventional commit & push'));
  console.log('');

  let isDebug = options.debug || process.env.COMMIT_PUSH_DEBUG === '1';
  const spinner = UI.spinner('Checking git status...');

  const reporter: PipelineReporter = {
    step: (message) => {
      spinner.text = message;
    },
    warn: (message) => {
      spinner.stop();
      console.log(UI.warning(message));
      spinner.start();
    },
  };

  try {
    const config = getConfig();
    isDebug = isDebug || config.output.verbose;
    const push = options.push !== false && config.commit.push;

    spinner.start();
    const vcs = await GitVcs.open();
    const pipeline = new CommitPipeline(vcs, settingsFromConfig(config), reporter);

    const analysis = await pipeline.analyze();
    if (!analysis) {
      spinner.stop();
      console.log(UI.info('No changes to commit.'));
      console.log('');
      return;
    }

    spinner.stop();
    printAnalysis(analysis);
    if (isDebug) {
      console.log(renderClassification(analysis.classification));
      console.log('');
    }

    if (options.dryRun) {
      printDryRun(analysis);
      console.log('');
      return;
    }

    spinner.start('Staging all changes...');
    const result = await pipeline.commit(analysis, { push });
    spinner.stop();

    printSummary(result);
    console.log('');
  } catch (error) {
    spinner.stop();
    console.log('');

    if (isCommitPushError(error)) {
      console.log(UI.error(error.toUserMessage()));
    } else {
      console.log(UI.error('An unexpected error occurred', errorMessage(error)));
    }

    if (isDebug && error instanceof Error && error.stack) {
      console.log(colors.muted(error.stack));
    }
    process.exit(1);
  }
}
