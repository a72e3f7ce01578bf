import { v4 as uuidv4 } from 'uuid';
import {
  BusyError,
  CoffeeChatError,
  InvalidInputError,
  NetworkError,
  NotConnectedError,
  computeFreeSlots,
  describeError,
  summarizeSlots,
  validateSlotQuery,
} from '@coffee-chat/core';
import type { CredentialHandle, RecipientEntry, SlotQuery } from '@coffee-chat/core';
import type { MessageTemplate } from '@coffee-chat/mailer';
import { CompletionChannel } from './channel.js';
import { ACTIVE_STATUS, IDLE, applyCompletion, freezeSnapshot, isTerminal } from './operation-state.js';
import type {
  CompletionMessage,
  DeliveryOutcome,
  OperationKind,
  OperationState,
  OrchestratorCollaborators,
  OrchestratorSnapshot,
  SendEnvelope,
  StartResult,
} from './types.js';

const FAILURE_CONTEXT: Record<OperationKind, string> = {
  connect: 'Calendar authorization failed',
  fetch: 'Calendar request failed',
  send: 'Sending failed',
};

export function validateRecipient(recipient: RecipientEntry): string | null {
  if (!recipient.name.trim() || !recipient.email.trim()) {
    return 'Recipient name and email are both required';
  }
  if (!recipient.email.includes('@')) {
    return `Invalid email address "${recipient.email}"`;
  }
  return null;
}

function validateEnvelope(envelope: SendEnvelope): string[] {
  const { smtp, from } = envelope;
  const problems: string[] = [];
  if (!smtp.host.trim()) problems.push('SMTP host is missing');
  if (!Number.isInteger(smtp.port) || smtp.port < 1 || smtp.port > 65535) {
    problems.push(`Invalid SMTP port ${smtp.port}`);
  }
  if (!smtp.username.trim()) problems.push('SMTP user is missing');
  if (!smtp.password.serviceId || !smtp.password.accountId) problems.push('SMTP password is not set');
  if (!from.address.includes('@')) problems.push('Sender address is missing or invalid');
  return problems;
}

/**
 * Runs connect, fetch and send off the caller's stack, one at a time.
 *
 * `startX` validates synchronously and returns immediately; the work runs on
 * a later turn of the event loop and posts a single completion message, which
 * `poll()` applies to the snapshot. Terminal states stay put until
 * `acknowledge()`.
 */
export class TaskOrchestrator {
  private collaborators: OrchestratorCollaborators;
  private state: OrchestratorSnapshot;
  private channel = new CompletionChannel<CompletionMessage>();
  private inFlight: Promise<void> = Promise.resolve();

  constructor(collaborators: OrchestratorCollaborators, credential: CredentialHandle | null = null) {
    this.collaborators = collaborators;
    this.state = freezeSnapshot({ operation: IDLE, credential, freeSlots: [], lastQuery: null });
  }

  startConnect(): StartResult {
    const busy = this.rejectUnlessIdle('connect');
    if (busy) return busy;

    return this.dispatch('connect', { freeSlots: [], lastQuery: null }, async (operationId) => {
      const credential = await this.collaborators.calendar.authorize();
      return { kind: 'connected', operationId, credential };
    });
  }

  startFetch(query: SlotQuery): StartResult {
    const busy = this.rejectUnlessIdle('fetch');
    if (busy) return busy;

    const credential = this.state.credential;
    if (!credential) {
      return { started: false, error: new NotConnectedError('Calendar is not connected') };
    }

    try {
      validateSlotQuery(query);
    } catch (error) {
      return { started: false, error: this.toError('fetch', error) };
    }

    return this.dispatch('fetch', {}, async (operationId) => {
      const busyIntervals = await this.collaborators.calendar.listBusyEvents(credential, query.queryRange);
      const freeSlots = computeFreeSlots(busyIntervals, query);
      console.log(`[Orchestrator] ${busyIntervals.length} busy period(s) left ${freeSlots.length} free slot(s)`);
      return { kind: 'fetched', operationId, freeSlots, query };
    });
  }

  startSend(template: MessageTemplate, recipients: RecipientEntry[], envelope: SendEnvelope): StartResult {
    const busy = this.rejectUnlessIdle('send');
    if (busy) return busy;

    if (recipients.length === 0) {
      return { started: false, error: new InvalidInputError('No recipients added') };
    }
    for (const recipient of recipients) {
      const problem = validateRecipient(recipient);
      if (problem) return { started: false, error: new InvalidInputError(problem) };
    }
    const problems = validateEnvelope(envelope);
    if (problems.length > 0) {
      return { started: false, error: new InvalidInputError(`Incomplete SMTP settings: ${problems.join('; ')}`) };
    }

    const availabilities = this.availabilities();
    if (availabilities.length === 0) {
      console.warn('[Orchestrator] Sending invitations without any available slots');
    }
    const batch = recipients.map((recipient) => ({ ...recipient }));

    return this.dispatch('send', {}, async (operationId) => {
      const { mailer, renderer } = this.collaborators;
      const deliveries: DeliveryOutcome[] = [];

      // One attempt per recipient; a failure only marks that recipient
      for (const recipient of batch) {
        try {
          const variables = {
            recipient_name: recipient.name,
            sender_name: envelope.senderName,
            availabilities,
          };
          const subject = renderer.render(template.subject, variables);
          const body = renderer.render(template.body, variables);
          await mailer.send(envelope.smtp, envelope.from, recipient, subject, body);
          deliveries.push({ recipient, delivered: true });
        } catch (error) {
          console.error(`[Orchestrator] Invitation to ${recipient.email} failed:`, describeError(error));
          deliveries.push({ recipient, delivered: false, error: describeError(error) });
        }
      }

      return { kind: 'sent', operationId, deliveries };
    });
  }

  /**
   * Apply at most one pending completion and return the current state
   */
  poll(): OperationState {
    const message = this.channel.take();
    if (message) {
      const next = applyCompletion(this.state, message);
      if (next === this.state) {
        console.warn(`[Orchestrator] Dropped completion for stale operation ${message.operationId}`);
      } else {
        this.replace(next);
      }
    }
    return this.state.operation;
  }

  /**
   * Return a finished operation to idle. Returns false when nothing has finished.
   */
  acknowledge(): boolean {
    if (!isTerminal(this.state.operation)) {
      return false;
    }
    this.replace(freezeSnapshot({ ...this.state, operation: IDLE }));
    return true;
  }

  snapshot(): OrchestratorSnapshot {
    return this.state;
  }

  /** Free slots as the summary lines handed to invitation templates */
  availabilities(): string[] {
    const { freeSlots, lastQuery } = this.state;
    if (!lastQuery) return [];
    return summarizeSlots(freeSlots, {
      timeZone: lastQuery.timeZone,
      minDurationMinutes: lastQuery.minDurationMinutes,
    });
  }

  /**
   * Resolves once the operation in flight has posted its completion
   */
  settled(): Promise<void> {
    return this.inFlight;
  }

  private rejectUnlessIdle(operation: OperationKind): StartResult | null {
    const { status } = this.state.operation;
    if (status === 'idle') return null;
    const error = new BusyError(
      isTerminal(this.state.operation)
        ? `Cannot ${operation}: the previous result has not been acknowledged`
        : `Cannot ${operation}: another operation is ${status}`
    );
    return { started: false, error };
  }

  private dispatch(
    operation: OperationKind,
    changes: Partial<Omit<OrchestratorSnapshot, 'operation'>>,
    work: (operationId: string) => Promise<CompletionMessage>
  ): StartResult {
    const operationId = uuidv4();

    // Mark the operation active before the caller's next poll
    this.replace(
      freezeSnapshot({
        ...this.state,
        ...changes,
        operation: { status: ACTIVE_STATUS[operation], operation, operationId, startedAt: new Date() },
      })
    );

    // Work starts on a later turn of the event loop
    this.inFlight = new Promise<void>((resolve) => setImmediate(resolve)).then(() =>
      this.run(operation, operationId, work)
    );

    return { started: true, operationId, operation };
  }

  private async run(
    operation: OperationKind,
    operationId: string,
    work: (operationId: string) => Promise<CompletionMessage>
  ): Promise<void> {
    let message: CompletionMessage;
    try {
      message = await work(operationId);
    } catch (error) {
      // Every failure still posts exactly one completion
      console.error(`[Orchestrator] ${operation} ${operationId} failed:`, describeError(error));
      message = { kind: 'failed', operation, operationId, error: this.toError(operation, error) };
    }
    this.channel.post(message);
  }

  private toError(operation: OperationKind, error: unknown): CoffeeChatError {
    return error instanceof CoffeeChatError ? error : new NetworkError(FAILURE_CONTEXT[operation], error);
  }

  private replace(next: OrchestratorSnapshot): void {
    const from = this.state.operation;
    this.state = next;
    if (from !== next.operation) {
      console.log(`[Orchestrator] ${from.status} -> ${next.operation.status}`);
    }
  }
}
