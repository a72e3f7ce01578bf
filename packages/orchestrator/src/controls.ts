import type { OrchestratorSnapshot } from './types.js';

export interface Controls {
  connect: boolean;
  fetch: boolean;
  send: boolean;
  acknowledge: boolean;
  /** Editing recipients, template and settings */
  edit: boolean;
  /** Label for the operation in flight */
  activity?: string;
}

const ACTIVITY_LABELS = {
  connecting: 'Waiting for calendar authorization...',
  fetching: 'Fetching available slots...',
  sending: 'Sending invitations...',
} as const;

export function deriveControls(snapshot: OrchestratorSnapshot): Controls {
  const { operation } = snapshot;
  const idle = operation.status === 'idle';

  const controls: Controls = {
    connect: idle,
    fetch: idle && snapshot.credential !== null,
    send: idle,
    acknowledge: operation.status === 'succeeded' || operation.status === 'failed',
    edit: idle,
  };

  if (operation.status === 'connecting' || operation.status === 'fetching' || operation.status === 'sending') {
    controls.activity = ACTIVITY_LABELS[operation.status];
  }

  return controls;
}
