import { z } from 'zod';
import { CredentialsError, RemoteRequestError, TransportError } from './errors';

/**
 * Anything that can hand out a bearer token. google-auth-library's OAuth2Client
 * satisfies this shape as-is.
 */
export interface TokenSource {
  getAccessToken(): Promise<{ token?: string | null }>;
}

export type QueryParams = Record<string, string | number>;

export interface Transport {
  get(endpoint: string, params?: QueryParams): Promise<unknown>;
}

export interface TransportOptions {
  baseUrl: string;
  timeoutMs: number;
}

// Shape of a Google API error body: { error: { code, message, status } }
const apiErrorSchema = z.object({
  error: z.object({ message: z.string() }),
});

/**
 * Authenticated JSON GETs over the global fetch. Every call gets the same
 * fixed deadline; nothing is retried.
 */
export class FetchTransport implements Transport {
  constructor(
    private readonly tokens: TokenSource,
    private readonly options: TransportOptions
  ) {}

  async get(endpoint: string, params: QueryParams = {}): Promise<unknown> {
    const url = new URL(`${this.options.baseUrl.replace(/\/+$/, '')}/${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }

    const token = await this.accessToken();

    let status: number;
    let ok: boolean;
    let body: string;
    try {
      const response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      status = response.status;
      ok = response.ok;
      body = await response.text();
    } catch (error) {
      throw new TransportError(endpoint, error);
    }

    if (!ok) {
      throw new RemoteRequestError(status, endpoint, apiErrorMessage(body));
    }

    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch {
      throw new RemoteRequestError(status, endpoint, 'response body is not valid JSON');
    }
  }

  private async accessToken(): Promise<string> {
    let token: string | null | undefined;
    try {
      ({ token } = await this.tokens.getAccessToken());
    } catch (error) {
      throw new CredentialsError(
        `Could not obtain an access token: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
    if (!token) {
      throw new CredentialsError('Credential provider returned an empty access token');
    }
    return token;
  }
}

function apiErrorMessage(body: string): string | undefined {
  try {
    const parsed = apiErrorSchema.safeParse(JSON.parse(body));
    if (parsed.success) return parsed.data.error.message;
  } catch {
    // not JSON; fall through to the raw text
  }
  const text = body.trim();
  return text ? text.slice(0, 200) : undefined;
}
