import { createAppAuth } from '@octokit/auth-app';
import { Octokit } from '@octokit/rest';
import { ConfigurationError } from '../errors.js';

const USER_AGENT = 'patchwatch';

export function createTokenClient(token: string): Octokit {
  if (!token) {
    throw new ConfigurationError('GitHub token is required');
  }

  return new Octokit({ auth: token, userAgent: USER_AGENT });
}

export async function createInstallationClient(
  installationId: number,
  env: Record<string, string | undefined> = process.env
): Promise<Octokit> {
  const appId = env.GITHUB_APP_ID;
  const privateKey = env.GITHUB_PRIVATE_KEY;

  if (!appId || !privateKey) {
    throw new ConfigurationError('GitHub App credentials not configured');
  }

  const auth = createAppAuth({
    appId,
    privateKey: privateKey.replace(/\\n/g, '\n'),
  });

  const installationAuth = await auth({
    type: 'installation',
    installationId,
  });

  return new Octokit({
    auth: installationAuth.token,
    userAgent: USER_AGENT,
  });
}

/**
 * App installation auth when the event names an installation, the plain
 * token otherwise.
 */
export async function createClientFor(
  installationId: number | undefined,
  env: Record<string, string | undefined> = process.env
): Promise<Octokit> {
  if (installationId !== undefined && env.GITHUB_APP_ID) {
    return createInstallationClient(installationId, env);
  }

  return createTokenClient(env.GITHUB_TOKEN || '');
}
