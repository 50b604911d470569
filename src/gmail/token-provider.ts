import * as fs from 'fs/promises';
import { z } from 'zod';
import { CredentialsError } from './errors';

export interface OAuthCredentials {
  client_id: string;
  client_secret: string;
  refresh_token: string;
}

export interface CredentialPaths {
  credentialsPath: string;
  tokenPath: string;
}

export interface ClientSecrets {
  client_id: string;
  client_secret: string;
}

const secretsBlock = z.object({ client_id: z.string().min(1), client_secret: z.string().min(1) });

// credentials.json as downloaded from Cloud Console: { installed: {...} } or { web: {...} }
const credentialsFileSchema = z.union([
  z.object({ installed: secretsBlock }).transform(c => c.installed),
  z.object({ web: secretsBlock }).transform(c => c.web),
]);

// Token file format: { type: 'authorized_user', client_id, client_secret, refresh_token }
const tokenFileSchema = z.object({ refresh_token: z.string().min(1) });

// null when the file does not exist
async function readJsonFile(file: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw new CredentialsError(`Cannot read ${file}`, { cause: error });
  }
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new CredentialsError(`${file} is not valid JSON`, { cause: error });
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Client id and secret from credentials.json, or null when the file is absent.
 */
export async function readClientSecrets(credentialsPath: string): Promise<ClientSecrets | null> {
  const content = await readJsonFile(credentialsPath);
  if (content === null) return null;
  const parsed = credentialsFileSchema.safeParse(content);
  if (!parsed.success) {
    throw new CredentialsError(`${credentialsPath} has no "installed" or "web" client_id/client_secret`);
  }
  return parsed.data;
}

/**
 * Get OAuth credentials for the mailbox.
 *
 * Cloud path (preferred): GMAIL_CLIENT_ID, GMAIL_CLIENT_SECRET and
 * GMAIL_REFRESH_TOKEN from the environment.
 *
 * Local path (fallback): client id/secret from credentials.json and the
 * refresh token from the saved token file.
 *
 * Returns null when neither source is complete.
 */
export async function getOAuthCredentials(
  paths: CredentialPaths,
  env: NodeJS.ProcessEnv = process.env
): Promise<OAuthCredentials | null> {
  const { GMAIL_CLIENT_ID, GMAIL_CLIENT_SECRET, GMAIL_REFRESH_TOKEN } = env;

  if (GMAIL_CLIENT_ID && GMAIL_CLIENT_SECRET && GMAIL_REFRESH_TOKEN) {
    return {
      client_id: GMAIL_CLIENT_ID,
      client_secret: GMAIL_CLIENT_SECRET,
      refresh_token: GMAIL_REFRESH_TOKEN,
    };
  }

  const secrets = await readClientSecrets(paths.credentialsPath);
  if (!secrets) return null;

  const token = tokenFileSchema.safeParse(await readJsonFile(paths.tokenPath));
  if (!token.success) return null;

  return { ...secrets, refresh_token: token.data.refresh_token };
}
