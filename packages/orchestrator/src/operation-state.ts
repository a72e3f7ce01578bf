import { PartialSendFailureError } from '@coffee-chat/core';
import type {
  ActiveState,
  CompletionMessage,
  OperationKind,
  OperationState,
  OrchestratorSnapshot,
  TerminalState,
} from './types.js';

export const ACTIVE_STATUS = {
  connect: 'connecting',
  fetch: 'fetching',
  send: 'sending',
} as const satisfies Record<OperationKind, ActiveState['status']>;

export const IDLE: OperationState = Object.freeze({ status: 'idle' });

export function isActive(state: OperationState): state is ActiveState {
  return state.status === 'connecting' || state.status === 'fetching' || state.status === 'sending';
}

export function isTerminal(state: OperationState): state is TerminalState {
  return state.status === 'succeeded' || state.status === 'failed';
}

export function freezeSnapshot(snapshot: OrchestratorSnapshot): OrchestratorSnapshot {
  return Object.freeze({
    ...snapshot,
    operation: Object.freeze(snapshot.operation),
    freeSlots: Object.freeze([...snapshot.freeSlots]),
  });
}

/**
 * Apply one completion to the snapshot. Messages for an operation that is no
 * longer in flight leave the snapshot as it is.
 */
export function applyCompletion(
  snapshot: OrchestratorSnapshot,
  message: CompletionMessage,
  finishedAt: Date = new Date()
): OrchestratorSnapshot {
  const current = snapshot.operation;
  if (!isActive(current) || current.operationId !== message.operationId) {
    return snapshot;
  }

  const base = { operation: current.operation, operationId: current.operationId, finishedAt };

  switch (message.kind) {
    case 'connected':
      return freezeSnapshot({
        ...snapshot,
        credential: message.credential,
        operation: { ...base, status: 'succeeded', summary: `Connected calendar ${message.credential.accountId}` },
      });

    case 'fetched':
      return freezeSnapshot({
        ...snapshot,
        freeSlots: message.freeSlots,
        lastQuery: message.query,
        operation: { ...base, status: 'succeeded', summary: `Found ${message.freeSlots.length} free slot(s)` },
      });

    case 'sent': {
      const total = message.deliveries.length;
      const failures = message.deliveries
        .filter((outcome) => !outcome.delivered)
        .map((outcome) => ({ recipient: outcome.recipient, reason: outcome.error ?? 'unknown error' }));

      if (failures.length === 0) {
        return freezeSnapshot({
          ...snapshot,
          operation: {
            ...base,
            status: 'succeeded',
            summary: `Sent ${total} invitation(s)`,
            deliveries: message.deliveries,
          },
        });
      }

      const error = new PartialSendFailureError(failures, total);
      return freezeSnapshot({
        ...snapshot,
        operation: { ...base, status: 'failed', code: error.code, reason: error.message, deliveries: message.deliveries },
      });
    }

    case 'failed':
      return freezeSnapshot({
        ...snapshot,
        operation: { ...base, status: 'failed', code: message.error.code, reason: message.error.message },
      });
  }
}
