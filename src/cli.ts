#!/usr/bin/env node
import dotenv from 'dotenv';
import { DEFAULT_CONFIG_PATH, loadSettings, requireActionContext } from './config/settings.js';
import type { Settings } from './config/settings.js';
import type { PRContext } from './types.js';
import { createTokenClient } from './github/client.js';
import { createReviewCollaborators, reviewPullRequest } from './pipeline/orchestrator.js';
import { formatErrorComment } from './output/formatter.js';
import { publishComment } from './output/publisher.js';
import { ConfigurationError, GitHubAPIError, errorMessage } from './errors.js';
import { logger } from './observability/logger.js';

async function postErrorComment(settings: Settings, error: GitHubAPIError): Promise<void> {
  try {
    const action = requireActionContext(settings);
    const context: PRContext = { owner: action.owner, repo: action.repo, pull_number: action.pullNumber };
    await publishComment(createTokenClient(action.token), context, formatErrorComment(error.message));
  } catch (commentError) {
    logger.error('cli', 'Failed to post error comment', { error: errorMessage(commentError) });
  }
}

/**
 * One review for the PR named by the CI environment. Resolves to the exit code.
 */
async function main(env: Record<string, string | undefined> = process.env): Promise<number> {
  logger.info('cli', 'Starting pull request review');

  let settings: Settings | null = null;

  try {
    settings = loadSettings(env.PATCHWATCH_CONFIG_PATH || DEFAULT_CONFIG_PATH, env);
    const action = requireActionContext(settings);

    const context: PRContext = { owner: action.owner, repo: action.repo, pull_number: action.pullNumber };
    const result = await reviewPullRequest(
      createTokenClient(action.token),
      context,
      settings,
      createReviewCollaborators(settings)
    );

    logger.info('cli', 'Review completed', { partial: result.partial, risks: result.risks.length });
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error('cli', 'Configuration error', { error: error.message });
      console.error(`Configuration error: ${error.message}`);
      return 1;
    }

    if (error instanceof GitHubAPIError) {
      logger.error('cli', 'GitHub API error', { error: error.message, status: error.status });
      if (settings) {
        await postErrorComment(settings, error);
      }
      return 1;
    }

    logger.error('cli', 'Unexpected error', { error: errorMessage(error) });
    console.error(`Unexpected error: ${errorMessage(error)}`);
    return 1;
  }
}

dotenv.config();

main().then(code => {
  process.exitCode = code;
}).catch(error => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
