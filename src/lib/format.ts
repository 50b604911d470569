import type { FetchResult, MessageRecord } from '../types';

const RULE = '='.repeat(60);
const SUB_RULE = '-'.repeat(40);
const PREVIEW_LENGTH = 100;

function section(title: string): string[] {
  return [RULE, title, RULE];
}

function orNA(value: string | number | null | undefined): string {
  return value === null || value === undefined || value === '' ? 'N/A' : String(value);
}

function preview(text: string): string {
  const chars = Array.from(text);
  return chars.length > PREVIEW_LENGTH ? `${chars.slice(0, PREVIEW_LENGTH).join('')}...` : text;
}

export function formatEmail(email: MessageRecord, index: number): string[] {
  return [
    '',
    `📧 EMAIL #${index}`,
    SUB_RULE,
    `Message ID: ${email.messageId}`,
    `Thread ID: ${email.threadId}`,
    `Timestamp: ${email.messageTimestamp}`,
    `From: ${email.sender}`,
    `Subject: ${email.subject}`,
    `Labels: ${email.labelIds.length > 0 ? email.labelIds.join(', ') : 'None'}`,
    `Preview: ${preview(email.messageText)}`,
    '',
  ];
}

/**
 * Render a snapshot as plain text: profile, labels, then each email with a
 * short preview of its body.
 */
export function formatOutput(result: FetchResult): string {
  const { profile, labels, emails } = result;
  const out: string[] = [];

  out.push(...section('USER PROFILE'));
  out.push(`Email Address: ${orNA(profile.emailAddress)}`);
  out.push(`Messages Total: ${orNA(profile.messagesTotal)}`);
  out.push(`Threads Total: ${orNA(profile.threadsTotal)}`);
  out.push(`History ID: ${orNA(profile.historyId)}`);
  out.push('');

  out.push(...section('LABELS'));
  for (const label of labels) {
    out.push(`• ${label.name ?? label.id ?? '(unnamed)'} (${label.type || 'user'})`);
  }
  out.push('');

  out.push(...section(`LAST ${emails.length} EMAILS`));
  emails.forEach((email, i) => out.push(...formatEmail(email, i + 1)));

  return out.join('\n');
}
