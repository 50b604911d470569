import type { MailboxReader } from '../gmail/client';
import { isValidTimeZone } from '../lib/config';
import { normalizeMessage, type TimeZoneSetting } from '../lib/parseMessage';
import type { FetchResult } from '../types';

export interface SnapshotOptions {
  messageLimit: number;
  timeZone: TimeZoneSetting;
}

export const DEFAULT_SNAPSHOT_OPTIONS: SnapshotOptions = {
  messageLimit: 10,
  timeZone: 'UTC',
};

/**
 * Fetch profile, labels and the most recent messages in two concurrent waves:
 *
 *   1. labels, profile and the message id list, side by side
 *   2. one detail request per listed id, side by side
 *
 * Each wave is all-or-nothing. The first failed request rejects the whole
 * snapshot with that request's error, and whatever else completed is dropped.
 * Emails come back in id-list order, whatever order the requests finish in.
 * An unknown time zone is rejected with a RangeError before any request.
 */
export async function fetchMailboxSnapshot(
  reader: MailboxReader,
  options: SnapshotOptions = DEFAULT_SNAPSHOT_OPTIONS
): Promise<FetchResult> {
  if (!isValidTimeZone(options.timeZone)) {
    throw new RangeError(`Unknown time zone: ${options.timeZone}`);
  }

  const [labels, profile, messageIds] = await Promise.all([
    reader.getLabels(),
    reader.getProfile(),
    reader.getMessageIds(options.messageLimit),
  ]);

  const details = await Promise.all(messageIds.map(id => reader.getMessageDetail(id)));

  const emails = details.map(raw => normalizeMessage(raw, { timeZone: options.timeZone }));

  return { labels, profile, emails };
}
