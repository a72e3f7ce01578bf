import type {
  CoffeeChatError,
  CredentialHandle,
  ErrorCode,
  Interval,
  RecipientEntry,
  SlotQuery,
} from '@coffee-chat/core';
import type { CalendarCollaborator } from '@coffee-chat/calendar';
import type { MailAddress, MailCollaborator, SmtpSettings, TemplateRenderer } from '@coffee-chat/mailer';

export type OperationKind = 'connect' | 'fetch' | 'send';

export interface DeliveryOutcome {
  recipient: RecipientEntry;
  delivered: boolean;
  error?: string;
}

export interface IdleState {
  status: 'idle';
}

export interface ActiveState {
  status: 'connecting' | 'fetching' | 'sending';
  operation: OperationKind;
  operationId: string;
  startedAt: Date;
}

export interface SucceededState {
  status: 'succeeded';
  operation: OperationKind;
  operationId: string;
  finishedAt: Date;
  summary: string;
  deliveries?: DeliveryOutcome[];
}

export interface FailedState {
  status: 'failed';
  operation: OperationKind;
  operationId: string;
  finishedAt: Date;
  code: ErrorCode;
  reason: string;
  deliveries?: DeliveryOutcome[];
}

export type OperationState = IdleState | ActiveState | SucceededState | FailedState;

export type TerminalState = SucceededState | FailedState;

/**
 * Everything the render loop reads. Replaced whole, never mutated.
 */
export interface OrchestratorSnapshot {
  operation: OperationState;
  credential: CredentialHandle | null;
  freeSlots: readonly Interval[];
  /** Query the free slots were computed for */
  lastQuery: SlotQuery | null;
}

/**
 * Result of a background operation, posted once per operation
 */
export type CompletionMessage =
  | { kind: 'connected'; operationId: string; credential: CredentialHandle }
  | { kind: 'fetched'; operationId: string; freeSlots: Interval[]; query: SlotQuery }
  | { kind: 'sent'; operationId: string; deliveries: DeliveryOutcome[] }
  | { kind: 'failed'; operation: OperationKind; operationId: string; error: CoffeeChatError };

export type StartResult =
  | { started: true; operationId: string; operation: OperationKind }
  | { started: false; error: CoffeeChatError };

export interface SendEnvelope {
  senderName: string;
  from: MailAddress;
  smtp: SmtpSettings;
}

export interface OrchestratorCollaborators {
  calendar: CalendarCollaborator;
  mailer: MailCollaborator;
  renderer: TemplateRenderer;
}
