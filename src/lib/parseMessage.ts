import type { MessageRecord, RawMessagePayload } from '../types';
import { DecodeError } from '../gmail/errors';
import { rawMessageSchema, type RawPart } from '../gmail/schemas';

export const MAX_TEXT_LENGTH = 500;
export const ELLIPSIS = '...';

/** "UTC", any IANA zone name, or "local" for the host's zone. */
export type TimeZoneSetting = string;

export interface NormalizeOptions {
  timeZone?: TimeZoneSetting;
}

// Where a message keeps its readable text
export type MessageBody =
  | { kind: 'multipart'; parts: RawPart[] }
  | { kind: 'simple'; mimeType: string; data: string }
  | { kind: 'empty' };

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Decode Gmail's base64url body data. Gmail drops the trailing "=" padding,
 * so it is restored before decoding. Throws DecodeError on input that is not
 * base64 or does not decode to UTF-8.
 */
export function decodeBase64Url(data: string): string {
  const compact = data.replace(/\s+/g, '').replace(/=+$/, '');
  if (!/^[A-Za-z0-9_+/-]*$/.test(compact)) {
    throw new DecodeError(data.length, 'unexpected character');
  }
  if (compact.length % 4 === 1) {
    throw new DecodeError(data.length, 'truncated input');
  }
  const padded = compact.padEnd(Math.ceil(compact.length / 4) * 4, '=');
  try {
    return utf8.decode(Buffer.from(padded, 'base64url'));
  } catch (error) {
    throw new DecodeError(data.length, error instanceof Error ? error.message : 'invalid UTF-8');
  }
}

function tryDecode(data: string): string | null {
  try {
    return decodeBase64Url(data);
  } catch (error) {
    if (error instanceof DecodeError) return null;
    throw error;
  }
}

export function classifyBody(payload: RawPart | undefined): MessageBody {
  if (!payload) return { kind: 'empty' };
  if (payload.parts) return { kind: 'multipart', parts: payload.parts };
  const data = payload.body?.data;
  if (payload.mimeType && data) {
    return { kind: 'simple', mimeType: payload.mimeType, data };
  }
  return { kind: 'empty' };
}

// text/plain parts only, top level, in payload order
export function extractPlaintext(body: MessageBody): string {
  switch (body.kind) {
    case 'multipart': {
      const texts: string[] = [];
      for (const part of body.parts) {
        const data = part.body?.data;
        if (part.mimeType !== 'text/plain' || !data) continue;
        const text = tryDecode(data);
        if (text !== null) texts.push(text);
      }
      return texts.join('\n');
    }
    case 'simple':
      return body.mimeType === 'text/plain' ? (tryDecode(body.data) ?? '') : '';
    case 'empty':
      return '';
  }
}

// Counted in code points so a surrogate pair is never split
export function truncateText(text: string, max: number = MAX_TEXT_LENGTH): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return chars.slice(0, max).join('') + ELLIPSIS;
}

// Grab a header value by name (e.g., 'From', 'Subject'); first match wins
export function getHeader(payload: RawPart | undefined, name: string): string {
  const wanted = name.toLowerCase();
  const header = (payload?.headers ?? []).find(h => (h.name ?? '').toLowerCase() === wanted);
  return header?.value ?? '';
}

/**
 * Format an epoch-milliseconds string as "YYYY-MM-DD HH:MM:SS" in the given
 * zone. Returns "" for anything that is not a whole number of milliseconds,
 * or that lands outside years 1-9999 in that zone.
 */
export function formatTimestamp(internalDate: string | null | undefined, timeZone: TimeZoneSetting = 'UTC'): string {
  if (!internalDate || !/^-?\d+$/.test(internalDate.trim())) return '';
  const date = new Date(Number(internalDate));
  if (Number.isNaN(date.getTime())) return '';

  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timeZone === 'local' ? undefined : timeZone,
    era: 'short',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '00';
  const year = get('year');
  if (get('era') !== 'AD' || year.length > 4) return '';
  return `${year.padStart(4, '0')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')}:${get('second')}`;
}

/**
 * Map one Gmail message resource onto a MessageRecord. Missing or malformed
 * fields fall back to "" or []; only an unknown timeZone option throws
 * (RangeError).
 */
export function normalizeMessage(payload: RawMessagePayload, options: NormalizeOptions = {}): MessageRecord {
  const msg = rawMessageSchema.parse(payload);
  const text = extractPlaintext(classifyBody(msg.payload));

  return Object.freeze({
    messageId: msg.id,
    threadId: msg.threadId,
    messageTimestamp: formatTimestamp(msg.internalDate, options.timeZone),
    labelIds: Object.freeze([...msg.labelIds]),
    sender: getHeader(msg.payload, 'From'),
    subject: getHeader(msg.payload, 'Subject'),
    messageText: truncateText(text),
  });
}
