import { z } from 'zod';
import { DEFAULT_BREAKING_FOOTER } from '../core/message-synthesizer.js';

// Theme configuration
export const ThemeSchema = z.object({
  primary: z.string().default('blue'),
  success: z.string().default('green'),
  warning: z.string().default('yellow'),
  error: z.string().default('red'),
  accent: z.string().default('cyan'),
  muted: z.string().default('gray'),
});

// Git configuration
export const GitSchema = z.object({
  // Remote used when the branch has no upstream yet
  remote: z.string().min(1).default('origin'),
  mainBranches: z.array(z.string()).default(['main', 'master', 'develop']),
  // Prefixes a feature branch is expected to start with, e.g. "feature/login"
  branchTypes: z
    .array(z.string())
    .default([
      'feature',
      'feat',
      'bugfix',
      'fix',
      'hotfix',
      'release',
      'chore',
      'docs',
      'refactor',
      'test',
      'perf',
      'ci',
    ]),
});

// Commit configuration
export const CommitSchema = z.object({
  breakingFooter: z
    .string()
    .regex(/^BREAKING[ -]CHANGE: \S/, "must start with 'BREAKING CHANGE: '")
    .default(DEFAULT_BREAKING_FOOTER),
  push: z.boolean().default(true),
});

// Output defaults
export const OutputSchema = z.object({
  verbose: z.boolean().default(false),
});

// Full configuration schema
export const ConfigSchema = z.object({
  theme: ThemeSchema.default({}),
  git: GitSchema.default({}),
  commit: CommitSchema.default({}),
  output: OutputSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type Theme = z.infer<typeof ThemeSchema>;
export type GitConfig = z.infer<typeof GitSchema>;
