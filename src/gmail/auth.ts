import { authenticate } from '@google-cloud/local-auth';
import * as fs from 'fs/promises';
import { OAuth2Client } from 'google-auth-library';
import * as path from 'path';
import { CredentialsError, requiresReconsent } from './errors';
import { getOAuthCredentials, readClientSecrets, type ClientSecrets, type CredentialPaths } from './token-provider';
import type { TokenSource } from './transport';

export interface AuthOptions extends CredentialPaths {
  scopes: string[];
  reauth?: boolean;
}

export async function deleteToken(tokenPath: string): Promise<void> {
  try {
    await fs.unlink(tokenPath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
    throw error;
  }
}

async function saveToken(tokenPath: string, secrets: ClientSecrets, refreshToken: string): Promise<void> {
  const payload = {
    type: 'authorized_user',
    client_id: secrets.client_id,
    client_secret: secrets.client_secret,
    refresh_token: refreshToken,
  };
  await fs.mkdir(path.dirname(tokenPath), { recursive: true });
  await fs.writeFile(tokenPath, JSON.stringify(payload, null, 2), { mode: 0o600 });
}

/**
 * Returns an OAuth2 client that can mint access tokens for the Gmail API.
 *
 * Resolution order:
 *   1. GMAIL_CLIENT_ID / GMAIL_CLIENT_SECRET / GMAIL_REFRESH_TOKEN
 *   2. credentials.json + saved token file
 *   3. interactive browser consent (local development only); the resulting
 *      refresh token is written to the token file for next time
 */
export async function getAuthClient(options: AuthOptions): Promise<TokenSource> {
  if (options.reauth) await deleteToken(options.tokenPath);

  const credentials = await getOAuthCredentials(options);
  if (credentials) {
    const client = new OAuth2Client({
      clientId: credentials.client_id,
      clientSecret: credentials.client_secret,
      redirectUri: 'urn:ietf:wg:oauth:2.0:oob', // unused with refresh token but required by constructor
    });
    client.setCredentials({ refresh_token: credentials.refresh_token });
    console.log('Gmail: authorized (saved credentials)');
    return client;
  }

  const secrets = await readClientSecrets(options.credentialsPath);
  if (!secrets) {
    throw new CredentialsError(
      `${options.credentialsPath} not found. Download your OAuth 2.0 client credentials from ` +
        `Google Cloud Console and save them as ${path.basename(options.credentialsPath)}.`
    );
  }

  let client;
  try {
    client = await authenticate({
      scopes: options.scopes,
      keyfilePath: options.credentialsPath,
    });
  } catch (error) {
    if (requiresReconsent(error)) {
      throw new CredentialsError('Auth requires re-consent. Re-run with --reauth.', { cause: error });
    }
    throw new CredentialsError(
      `Gmail authenticate failed: ${error instanceof Error ? error.message : 'unknown error'}`,
      { cause: error }
    );
  }

  const refreshToken = client.credentials.refresh_token;
  if (refreshToken) {
    await saveToken(options.tokenPath, secrets, refreshToken);
  } else {
    console.warn('Gmail: consent returned no refresh token; you will be asked again next run');
  }
  console.log('Gmail: authorized (interactive)');
  return client;
}
