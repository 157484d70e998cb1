/**
 * Keyword lists and path patterns used to classify a change set.
 *
 * Everything the classifier, resolver and synthesizer match against lives in
 * a single {@link ClassifierRules} value so callers can swap in their own.
 */

export interface ClassifierRules {
  docsExtensions: string[];
  docsFilePrefixes: string[];
  testMarkers: string[];
  testFileExtensions: string[];
  ciMarkers: string[];
  buildManifests: string[];

  breakingIndicators: string[];
  structuralKeywords: string[];
  /** Keywords that make a removed line a breaking change when they start it */
  removedDefinitionKeywords: string[];

  featureKeywords: string[];
  bugFixKeywords: string[];

  /** Integration names that turn "support for X" into a templated description */
  integrationNames: string[];
  /** Keywords whose following word names the added feature */
  featureTokenKeywords: string[];
  fixKeywords: string[];
  refactorKeywords: string[];

  scopeAliases: Record<string, string>;
}

export const DEFAULT_RULES: ClassifierRules = {
  docsExtensions: ['md', 'txt', 'rst', 'adoc'],
  docsFilePrefixes: ['README', 'CHANGELOG'],
  testMarkers: ['test', 'spec', '__tests__'],
  testFileExtensions: ['js', 'ts', 'py', 'rb', 'java'],
  ciMarkers: [
    '.github',
    '.gitlab',
    '.circleci',
    '.travis',
    'Jenkinsfile',
    '.gitlab-ci',
    'azure-pipelines',
  ],
  buildManifests: [
    'package.json',
    'package-lock',
    'yarn.lock',
    'requirements.txt',
    'Pipfile',
    'poetry.lock',
    'Cargo.toml',
    'go.mod',
    'build.gradle',
    'pom.xml',
    'Makefile',
    'CMakeLists.txt',
  ],

  breakingIndicators: ['BREAKING', 'remove', 'delete', 'deprecate', 'breaking'],
  structuralKeywords: ['function', 'def', 'class', 'export', 'public', 'api', 'interface'],
  removedDefinitionKeywords: ['export', 'function', 'def', 'class', 'public'],

  featureKeywords: ['support', 'enable', 'add', 'implement', 'introduce', 'allow'],
  bugFixKeywords: ['fix', 'bug', 'error', 'issue', 'resolve', 'correct'],

  integrationNames: ['claude', 'openai', 'gemini', 'copilot', 'ollama', 'mistral', 'bedrock'],
  featureTokenKeywords: ['enable', 'implement'],
  fixKeywords: ['fix', 'resolve', 'correct'],
  refactorKeywords: ['refactor', 'restructure', 'simplify'],

  scopeAliases: { githooks: 'hooks' },
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Case-insensitive alternation of the given literal keywords */
export function keywordPattern(keywords: string[]): string {
  return `(?:${keywords.map(escapeRegExp).join('|')})`;
}
