import type { Label, Profile, RawMessagePayload } from '../types';
import type { Transport } from './transport';
import { labelListSchema, messageListSchema, profileSchema } from './schemas';

export interface GmailClientOptions {
  userId: string;   // path segment under users/, "me" for the token's owner
}

/**
 * The read operations the snapshot pipeline needs. GmailApiClient is the real
 * implementation; tests substitute their own.
 */
export interface MailboxReader {
  getLabels(): Promise<Label[]>;
  getProfile(): Promise<Profile>;
  getMessageIds(limit: number): Promise<string[]>;
  getMessageDetail(id: string): Promise<RawMessagePayload>;
}

export class GmailApiClient implements MailboxReader {
  constructor(
    private readonly transport: Transport,
    private readonly options: GmailClientOptions = { userId: 'me' }
  ) {}

  async getLabels(): Promise<Label[]> {
    const data = await this.transport.get(this.endpoint('labels'));
    return labelListSchema.parse(data).labels;
  }

  async getProfile(): Promise<Profile> {
    const data = await this.transport.get(this.endpoint('profile'));
    return profileSchema.parse(data);
  }

  /**
   * Ids of the most recent messages, newest first as the server orders them.
   * Only the first page is read.
   */
  async getMessageIds(limit: number): Promise<string[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Message limit must be a positive integer, got ${limit}`);
    }
    const data = await this.transport.get(this.endpoint('messages'), { maxResults: limit });
    return messageListSchema
      .parse(data)
      .messages.map(m => m.id)
      .filter((id): id is string => typeof id === 'string' && id.length > 0);
  }

  /**
   * The message resource exactly as the API sent it. Field-level tolerance is
   * left to normalizeMessage; a body that is not a JSON object comes back as {}.
   */
  async getMessageDetail(id: string): Promise<RawMessagePayload> {
    const data = await this.transport.get(this.endpoint(`messages/${encodeURIComponent(id)}`));
    return isMessageResource(data) ? data : {};
  }

  private endpoint(resource: string): string {
    return `users/${encodeURIComponent(this.options.userId)}/${resource}`;
  }
}

function isMessageResource(value: unknown): value is RawMessagePayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
