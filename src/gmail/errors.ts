/**
 * Error taxonomy for the mailbox fetch pipeline.
 *
 * Request-level errors (RemoteRequestError, TransportError) propagate to the
 * caller untouched. DecodeError never leaves the message normalizer.
 */

export class MailboxError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MailboxError';
  }
}

/** The API answered with a non-2xx status, or with a body that is not JSON. */
export class RemoteRequestError extends MailboxError {
  constructor(
    public readonly status: number,
    public readonly endpoint: string,
    detail?: string
  ) {
    super(`Gmail API ${endpoint} returned ${status}${detail ? `: ${detail}` : ''}`);
    this.name = 'RemoteRequestError';
  }
}

/** Connection refused, DNS failure, deadline exceeded and friends. */
export class TransportError extends MailboxError {
  constructor(
    public readonly endpoint: string,
    cause: unknown
  ) {
    super(`Request to ${endpoint} failed: ${describeCause(cause)}`, { cause });
    this.name = 'TransportError';
  }
}

export class DecodeError extends MailboxError {
  constructor(
    public readonly inputLength: number,
    reason: string
  ) {
    super(`Cannot decode base64url body (${inputLength} chars): ${reason}`);
    this.name = 'DecodeError';
  }
}

export class CredentialsError extends MailboxError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CredentialsError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    if (cause.name === 'TimeoutError') return 'request timed out';
    return cause.message || cause.name;
  }
  return String(cause);
}

/**
 * OAuth failures that only a fresh browser consent can fix.
 */
export function requiresReconsent(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return message.includes('invalid_rapt') || message.includes('invalid_grant');
}
