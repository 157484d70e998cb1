import { describe, it, expect } from 'vitest';
import {
  CommitPushError,
  ConfigError,
  EnvironmentError,
  GitCommandError,
  errorMessage,
  isCommitPushError,
} from '../src/core/errors.js';

describe('CommitPushError', () => {
  it('should format the message with its hint', () => {
    const error = new CommitPushError('Something broke', 'Try again');
    expect(error.toUserMessage()).toBe('Something broke\n  → Try again');
  });

  it('should keep the cause', () => {
    const cause = new Error('root');
    expect(new EnvironmentError('Not a git repository', 'Run git init', cause).cause).toBe(cause);
  });
});

describe('GitCommandError', () => {
  it('should keep the git message and add a step hint', () => {
    const error = new GitCommandError('push', 'fatal: could not read from remote\n');

    expect(error.message).toBe('fatal: could not read from remote');
    expect(error.step).toBe('push');
    expect(error.name).toBe('GitCommandError');
    expect(error.hint).toBe('The commit was created locally; push it manually with `git push`');
  });

  it('should name the step when git printed nothing', () => {
    expect(new GitCommandError('commit', '  ').message).toBe('git commit failed');
  });
});

describe('ConfigError', () => {
  it('should name the file', () => {
    const error = new ConfigError('/tmp/x.json', 'expected a JSON object');

    expect(error.message).toBe('Invalid configuration in /tmp/x.json: expected a JSON object');
    expect(error.hint).toBe('Fix or remove /tmp/x.json');
  });
});

describe('isCommitPushError', () => {
  it('should recognise every subclass', () => {
    expect(isCommitPushError(new EnvironmentError('a', 'b'))).toBe(true);
    expect(isCommitPushError(new GitCommandError('stage', 'x'))).toBe(true);
    expect(isCommitPushError(new Error('plain'))).toBe(false);
  });
});

describe('errorMessage', () => {
  it('should read messages from errors and other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('text')).toBe('text');
  });
});
