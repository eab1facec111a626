import type { FileChange, PullRequestData, PullRequestMetadata } from '../../src/types.js';
import type { AnalysisConfig, CommentConfig, Settings } from '../../src/config/settings.js';
import type { CompletionClient } from '../../src/analysis/ai-types.js';

export function makeFile(overrides: Partial<FileChange> & { path: string }): FileChange {
  return {
    status: 'modified',
    additions: 1,
    deletions: 0,
    changes: 1,
    ...overrides,
  };
}

export function analysisConfig(overrides: Partial<AnalysisConfig> = {}): AnalysisConfig {
  return {
    maxFilesFullAnalysis: 50,
    maxDiffLinesPerFile: 1000,
    enableSecurityCheck: true,
    enablePerformanceCheck: true,
    enableBreakingChangeCheck: true,
    enableTestCoverageCheck: true,
    ...overrides,
  };
}

export function commentConfig(overrides: Partial<CommentConfig> = {}): CommentConfig {
  return {
    includeSummary: true,
    includeKeyFiles: true,
    includeRisks: true,
    collapseFileList: true,
    maxKeyFiles: 10,
    ...overrides,
  };
}

export function makeSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    analysis: analysisConfig(),
    comment: commentConfig(),
    ai: { model: 'test-model', maxTokens: 1024, temperature: 0.3 },
    githubToken: 'test-token',
    anthropicApiKey: '',
    repository: 'acme/widgets',
    prNumber: 7,
    ...overrides,
  };
}

export function makeMetadata(overrides: Partial<PullRequestMetadata> = {}): PullRequestMetadata {
  return {
    number: 7,
    title: 'Add login endpoint',
    description: 'Adds a login endpoint backed by the user store.',
    author: 'octo-dev',
    labels: [],
    baseBranch: 'main',
    headBranch: 'feature/login',
    headSha: 'abc123',
    createdAt: '2024-01-01T00:00:00Z',
    updatedAt: '2024-01-02T00:00:00Z',
    additions: 10,
    deletions: 2,
    changedFiles: 1,
    ...overrides,
  };
}

export function makePullRequest(files: FileChange[], metadata: Partial<PullRequestMetadata> = {}): PullRequestData {
  return { metadata: makeMetadata({ changedFiles: files.length, ...metadata }), files };
}

/**
 * Replies from a queue; throws when a reply is an Error or the queue is empty.
 */
export class ScriptedCompletionClient implements CompletionClient {
  readonly prompts: string[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('No scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
