import { describe, it, expect } from 'vitest';
import { COMMENT_MARKER, publishComment } from '../../../src/output/publisher.js';
import { GitHubAPIError } from '../../../src/errors.js';
import { createFakeGitHub } from '../../helpers/fake-github.js';

const context = { owner: 'acme', repo: 'widgets', pull_number: 7 };
const COMMENTS_PATH = '/repos/acme/widgets/issues/7/comments';

describe('output/publisher', () => {
  it('should create a marked comment when none exists', async () => {
    const { octokit, requests } = createFakeGitHub([
      { method: 'GET', path: COMMENTS_PATH, reply: () => ({ body: [{ id: 1, body: 'Nice work!' }] }) },
      { method: 'POST', path: COMMENTS_PATH, reply: () => ({ status: 201, body: { id: 99 } }) },
    ]);

    const outcome = await publishComment(octokit, context, '## Report');

    expect(outcome).toBe('created');
    expect(requests[1]).toEqual({
      method: 'POST',
      path: COMMENTS_PATH,
      body: { body: `${COMMENT_MARKER}\n## Report` },
    });
  });

  it('should update the existing marked comment', async () => {
    const { octokit, requests } = createFakeGitHub([
      {
        method: 'GET',
        path: COMMENTS_PATH,
        reply: () => ({
          body: [
            { id: 1, body: 'Nice work!' },
            { id: 42, body: `${COMMENT_MARKER}\nold report` },
          ],
        }),
      },
      { method: 'PATCH', path: '/repos/acme/widgets/issues/comments/42', reply: () => ({ body: { id: 42 } }) },
    ]);

    const outcome = await publishComment(octokit, context, '## New report');

    expect(outcome).toBe('updated');
    expect(requests.map(r => `${r.method} ${r.path}`)).toEqual([
      `GET ${COMMENTS_PATH}`,
      'PATCH /repos/acme/widgets/issues/comments/42',
    ]);
    expect(requests[1].body).toEqual({ body: `${COMMENT_MARKER}\n## New report` });
  });

  it('should create a comment when listing fails', async () => {
    const { octokit } = createFakeGitHub([
      { method: 'GET', path: COMMENTS_PATH, reply: () => ({ status: 500, body: { message: 'Server Error' } }) },
      { method: 'POST', path: COMMENTS_PATH, reply: () => ({ status: 201, body: { id: 99 } }) },
    ]);

    expect(await publishComment(octokit, context, '## Report')).toBe('created');
  });

  it('should raise GitHubAPIError when posting fails', async () => {
    const { octokit } = createFakeGitHub([
      { method: 'GET', path: COMMENTS_PATH, reply: () => ({ body: [] }) },
      { method: 'POST', path: COMMENTS_PATH, reply: () => ({ status: 403, body: { message: 'Forbidden' } }) },
    ]);

    const error = await publishComment(octokit, context, '## Report').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GitHubAPIError);
    expect(error).toMatchObject({ status: 403 });
  });
});
