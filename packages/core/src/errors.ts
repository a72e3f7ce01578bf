/**
 * Error taxonomy shared by every package
 */

import type { RecipientEntry } from './types.js';

export type ErrorCode =
  | 'INVALID_INPUT'
  | 'NOT_CONNECTED'
  | 'NETWORK_ERROR'
  | 'PARTIAL_SEND_FAILURE'
  | 'BUSY';

export abstract class CoffeeChatError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed query, window, recipient or settings; rejected before any work */
export class InvalidInputError extends CoffeeChatError {
  readonly code = 'INVALID_INPUT' as const;
}

/** No usable calendar credential */
export class NotConnectedError extends CoffeeChatError {
  readonly code = 'NOT_CONNECTED' as const;
}

/** A calendar, OAuth or SMTP call failed */
export class NetworkError extends CoffeeChatError {
  readonly code = 'NETWORK_ERROR' as const;

  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describeError(cause)}`, { cause });
  }
}

export interface RecipientFailure {
  recipient: RecipientEntry;
  reason: string;
}

export class PartialSendFailureError extends CoffeeChatError {
  readonly code = 'PARTIAL_SEND_FAILURE' as const;
  readonly failures: RecipientFailure[];

  constructor(failures: RecipientFailure[], total: number) {
    const listed = failures
      .map((f) => `${f.recipient.name} <${f.recipient.email}>: ${f.reason}`)
      .join('; ');
    super(`Failed to deliver to ${failures.length} of ${total} recipient(s): ${listed}`);
    this.failures = failures;
  }
}

/** Another operation is already in flight or awaiting acknowledgement */
export class BusyError extends CoffeeChatError {
  readonly code = 'BUSY' as const;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
