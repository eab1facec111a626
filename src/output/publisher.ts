import type { Octokit } from '@octokit/rest';
import type { PRContext } from '../types.js';
import { GitHubAPIError, errorMessage, httpStatusOf } from '../errors.js';
import { logger } from '../observability/logger.js';

export const COMMENT_MARKER = '<!-- patchwatch-comment -->';

export type PublishOutcome = 'created' | 'updated';

export async function findExistingComment(octokit: Octokit, context: PRContext): Promise<number | null> {
  try {
    const comments = await octokit.paginate(octokit.issues.listComments, {
      owner: context.owner,
      repo: context.repo,
      issue_number: context.pull_number,
      per_page: 100,
    });

    const existing = comments.find(comment => comment.body?.includes(COMMENT_MARKER));
    if (existing) {
      logger.info('publish', 'Found existing bot comment', { commentId: existing.id });
      return existing.id;
    }
    return null;
  } catch (error) {
    // Not fatal: fall through to creating a fresh comment.
    logger.warn('publish', 'Failed to search for existing comments', { error: errorMessage(error) });
    return null;
  }
}

/**
 * Keep a single bot comment per PR: edit the marked one when present,
 * otherwise create it.
 */
export async function publishComment(octokit: Octokit, context: PRContext, body: string): Promise<PublishOutcome> {
  const bodyWithMarker = `${COMMENT_MARKER}\n${body}`;
  const existingId = await findExistingComment(octokit, context);

  try {
    if (existingId !== null) {
      await octokit.issues.updateComment({
        owner: context.owner,
        repo: context.repo,
        comment_id: existingId,
        body: bodyWithMarker,
      });
      logger.info('publish', 'Updated review comment', { commentId: existingId });
      return 'updated';
    }

    await octokit.issues.createComment({
      owner: context.owner,
      repo: context.repo,
      issue_number: context.pull_number,
      body: bodyWithMarker,
    });
    logger.info('publish', 'Posted review comment');
    return 'created';
  } catch (error) {
    throw new GitHubAPIError(
      `Failed to publish comment on PR #${context.pull_number}: ${errorMessage(error)}`,
      httpStatusOf(error)
    );
  }
}
