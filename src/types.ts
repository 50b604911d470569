import type { gmail_v1 } from 'googleapis';

export type Label = gmail_v1.Schema$Label;
export type Profile = gmail_v1.Schema$Profile;

// Gmail message resource as returned by users.messages.get (format=full)
export type RawMessagePayload = gmail_v1.Schema$Message;

export type MessageRecord = Readonly<{
  messageId: string;
  threadId: string;
  messageTimestamp: string;     // "YYYY-MM-DD HH:MM:SS" or ""
  labelIds: readonly string[];
  sender: string;               // full "From" header
  subject: string;
  messageText: string;          // text/plain body, capped at 500 chars + "..."
}>;

export type FetchResult = Readonly<{
  labels: readonly Label[];
  profile: Profile;
  emails: readonly MessageRecord[];   // same order as the listed message ids
}>;
