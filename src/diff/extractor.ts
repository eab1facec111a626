import type { Octokit } from '@octokit/rest';
import type { FileChange, FileStatus, PRContext, PullRequestData, PullRequestMetadata } from '../types.js';
import { GitHubAPIError, errorMessage, httpStatusOf } from '../errors.js';
import { logger } from '../observability/logger.js';

const PER_PAGE = 100;

interface HostFile {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
  changes: number;
  patch?: string;
  previous_filename?: string;
}

export function normalizeStatus(status: string): FileStatus {
  switch (status) {
    case 'added':
    case 'removed':
    case 'modified':
    case 'renamed':
      return status;
    case 'copied':
      return 'added';
    default:
      return 'modified';
  }
}

export function toFileChange(file: HostFile): FileChange {
  const status = normalizeStatus(file.status);

  return {
    path: file.filename,
    status,
    additions: file.additions,
    deletions: file.deletions,
    changes: file.changes,
    patch: file.patch,
    previousPath: status === 'renamed' ? file.previous_filename : undefined,
  };
}

export async function fetchPullRequest(octokit: Octokit, context: PRContext): Promise<PullRequestData> {
  const params = {
    owner: context.owner,
    repo: context.repo,
    pull_number: context.pull_number,
  };

  try {
    const { data: pr } = await octokit.pulls.get(params);

    const metadata: PullRequestMetadata = {
      number: pr.number,
      title: pr.title,
      description: pr.body ?? '',
      author: pr.user?.login ?? 'unknown',
      labels: pr.labels.map(label => label.name),
      baseBranch: pr.base.ref,
      headBranch: pr.head.ref,
      headSha: pr.head.sha,
      createdAt: pr.created_at,
      updatedAt: pr.updated_at,
      additions: pr.additions,
      deletions: pr.deletions,
      changedFiles: pr.changed_files,
    };

    const hostFiles = await octokit.paginate(octokit.pulls.listFiles, { ...params, per_page: PER_PAGE });
    const files = hostFiles.map(toFileChange);

    logger.info('diff_extraction', 'Fetched pull request', {
      files: files.length,
      additions: metadata.additions,
      deletions: metadata.deletions,
    });

    return { metadata, files };
  } catch (error) {
    const status = httpStatusOf(error);
    logger.error('diff_extraction', 'Failed to fetch pull request', {
      status,
      error: errorMessage(error),
    });
    throw new GitHubAPIError(`Failed to fetch PR #${context.pull_number}: ${errorMessage(error)}`, status);
  }
}
