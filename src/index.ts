import dotenv from 'dotenv';
import { createApp } from './server.js';
import { DEFAULT_CONFIG_PATH, loadSettings } from './config/settings.js';
import { createClientFor } from './github/client.js';
import { createReviewCollaborators, reviewPullRequest } from './pipeline/orchestrator.js';
import { logger } from './observability/logger.js';

dotenv.config();

const settings = loadSettings(process.env.PATCHWATCH_CONFIG_PATH || DEFAULT_CONFIG_PATH);
const collaborators = createReviewCollaborators(settings);

const app = createApp({
  webhookSecret: process.env.GITHUB_WEBHOOK_SECRET,
  startReview: async context => {
    const octokit = await createClientFor(context.installation_id);
    return reviewPullRequest(octokit, context, settings, collaborators);
  },
});

const PORT = process.env.PORT || 3000;

const server = app.listen(PORT, () => {
  logger.info('startup', 'Webhook server listening', {
    port: PORT,
    aiEnabled: collaborators.narrator !== undefined,
  });
});

function shutdown(signal: string): void {
  logger.info('shutdown', `${signal} received, graceful shutdown`);
  server.close(() => {
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
