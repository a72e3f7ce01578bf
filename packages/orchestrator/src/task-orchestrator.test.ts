import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { BusyError, InvalidInputError, NotConnectedError } from '@coffee-chat/core';
import type { CredentialHandle, Interval, RecipientEntry, SlotQuery } from '@coffee-chat/core';
import { NunjucksTemplateRenderer } from '@coffee-chat/mailer';
import type { MailAddress, SmtpSettings, TemplateRenderer } from '@coffee-chat/mailer';
import { TaskOrchestrator } from './task-orchestrator.js';
import type { SendEnvelope } from './types.js';

const at = (time: string, day = '2026-03-02'): Date => new Date(`${day}T${time}:00Z`);

const handle: CredentialHandle = { serviceId: 'coffee-chat.google-calendar', accountId: 'me@example.com' };

const query: SlotQuery = {
  queryRange: { start: at('00:00'), end: at('00:00', '2026-03-03') },
  dailyWindow: { from: 9 * 60, to: 17 * 60 },
  bufferMinutes: 0,
  minDurationMinutes: 30,
  timeZone: 'UTC',
};

const envelope: SendEnvelope = {
  senderName: 'Grace',
  from: { name: 'Grace', address: 'grace@example.com' },
  smtp: {
    host: 'smtp.example.com',
    port: 587,
    username: 'grace@example.com',
    secure: false,
    password: { serviceId: 'coffee-chat.smtp', accountId: 'grace@example.com' },
  },
};

const template = { subject: 'Coffee, {{ recipient_name }}?', body: '{{ availabilities | join(", ") }}' };

const recipients: RecipientEntry[] = [
  { name: 'Ada', email: 'ada@example.com' },
  { name: 'Bob', email: 'bob@example.com' },
  { name: 'Cy', email: 'cy@example.com' },
];

type AuthorizeFn = () => Promise<CredentialHandle>;
type ListBusyFn = (credential: CredentialHandle, range: Interval) => Promise<Interval[]>;
type SendFn = (smtp: SmtpSettings, from: MailAddress, to: RecipientEntry, subject: string, body: string) => Promise<void>;

describe('TaskOrchestrator', () => {
  let authorize: Mock<AuthorizeFn>;
  let listBusyEvents: Mock<ListBusyFn>;
  let send: Mock<SendFn>;
  let renderer: TemplateRenderer;

  const create = (credential: CredentialHandle | null = handle) =>
    new TaskOrchestrator({ calendar: { authorize, listBusyEvents }, mailer: { send }, renderer }, credential);

  const finish = async (orchestrator: TaskOrchestrator) => {
    await orchestrator.settled();
    return orchestrator.poll();
  };

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    authorize = vi.fn<AuthorizeFn>(async () => handle);
    listBusyEvents = vi.fn<ListBusyFn>(async () => [{ start: at('09:00'), end: at('10:00') }]);
    send = vi.fn<SendFn>(async () => undefined);
    renderer = new NunjucksTemplateRenderer();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('connect', () => {
    it('stores the handle returned by the consent flow', async () => {
      const orchestrator = create(null);

      const result = orchestrator.startConnect();

      expect(result).toMatchObject({ started: true, operation: 'connect' });
      expect(orchestrator.poll().status).toBe('connecting');
      expect(authorize).not.toHaveBeenCalled();

      const state = await finish(orchestrator);

      expect(state).toMatchObject({ status: 'succeeded', operation: 'connect', summary: 'Connected calendar me@example.com' });
      expect(orchestrator.snapshot().credential).toEqual(handle);
    });

    it('rejects a second connect before the first is acknowledged', async () => {
      const orchestrator = create();
      orchestrator.startConnect();
      const before = orchestrator.snapshot();

      const second = orchestrator.startConnect();

      expect(second.started).toBe(false);
      if (!second.started) expect(second.error).toBeInstanceOf(BusyError);
      expect(orchestrator.snapshot()).toBe(before);
      expect(await finish(orchestrator)).toMatchObject({ status: 'succeeded' });

      const third = orchestrator.startConnect();
      expect(third).toMatchObject({ started: false });
      if (!third.started) {
        expect(third.error.message).toBe('Cannot connect: the previous result has not been acknowledged');
      }
      expect(authorize).toHaveBeenCalledTimes(1);
    });

    it('keeps the previous handle when consent fails', async () => {
      authorize.mockRejectedValueOnce(new Error('consent denied'));
      const orchestrator = create();

      orchestrator.startConnect();
      const state = await finish(orchestrator);

      expect(state).toMatchObject({
        status: 'failed',
        code: 'NETWORK_ERROR',
        reason: 'Calendar authorization failed: consent denied',
      });
      expect(orchestrator.snapshot().credential).toEqual(handle);
    });

    it('clears slots from an earlier fetch', async () => {
      const orchestrator = create();
      orchestrator.startFetch(query);
      await finish(orchestrator);
      orchestrator.acknowledge();

      orchestrator.startConnect();

      expect(orchestrator.snapshot().freeSlots).toEqual([]);
      expect(orchestrator.availabilities()).toEqual([]);
      await orchestrator.settled();
    });
  });

  describe('fetch', () => {
    it('stores the free slots computed from busy time', async () => {
      const orchestrator = create();

      orchestrator.startFetch(query);
      const state = await finish(orchestrator);

      expect(listBusyEvents).toHaveBeenCalledWith(handle, query.queryRange);
      expect(state).toMatchObject({ status: 'succeeded', summary: 'Found 1 free slot(s)' });
      expect(orchestrator.snapshot().freeSlots).toEqual([{ start: at('10:00'), end: at('17:00') }]);
      expect(orchestrator.snapshot().lastQuery).toEqual(query);
      expect(orchestrator.availabilities()).toEqual(['Monday Mar 2: 10am–5pm']);
    });

    it('requires a connected calendar', () => {
      const result = create(null).startFetch(query);

      expect(result.started).toBe(false);
      if (!result.started) expect(result.error).toBeInstanceOf(NotConnectedError);
    });

    it('rejects a malformed query without leaving idle', () => {
      const orchestrator = create();

      const result = orchestrator.startFetch({ ...query, dailyWindow: { from: 600, to: 600 } });

      expect(result.started).toBe(false);
      if (!result.started) expect(result.error).toBeInstanceOf(InvalidInputError);
      expect(orchestrator.poll()).toEqual({ status: 'idle' });
      expect(listBusyEvents).not.toHaveBeenCalled();
    });

    it.each(['connect', 'fetch', 'send'] as const)('is rejected while %s is in flight', async (operation) => {
      const orchestrator = create();
      if (operation === 'connect') orchestrator.startConnect();
      if (operation === 'fetch') orchestrator.startFetch(query);
      if (operation === 'send') orchestrator.startSend(template, recipients, envelope);
      const before = orchestrator.snapshot();

      const result = orchestrator.startFetch(query);

      expect(result.started).toBe(false);
      if (!result.started) expect(result.error).toBeInstanceOf(BusyError);
      expect(orchestrator.snapshot()).toBe(before);
      await orchestrator.settled();
    });

    it('reports a lost credential as not connected', async () => {
      listBusyEvents.mockRejectedValueOnce(new NotConnectedError('No stored Google credential for me@example.com'));
      const orchestrator = create();

      orchestrator.startFetch(query);

      expect(await finish(orchestrator)).toMatchObject({ status: 'failed', code: 'NOT_CONNECTED' });
    });

    it('wraps calendar errors as network errors', async () => {
      listBusyEvents.mockRejectedValueOnce(new Error('socket hang up'));
      const orchestrator = create();

      orchestrator.startFetch(query);

      expect(await finish(orchestrator)).toMatchObject({
        status: 'failed',
        code: 'NETWORK_ERROR',
        reason: 'Calendar request failed: socket hang up',
      });
    });
  });

  describe('send', () => {
    it('renders and delivers one message per recipient in order', async () => {
      const orchestrator = create();
      orchestrator.startFetch(query);
      await finish(orchestrator);
      orchestrator.acknowledge();

      orchestrator.startSend(template, recipients, envelope);
      const state = await finish(orchestrator);

      expect(state).toMatchObject({ status: 'succeeded', summary: 'Sent 3 invitation(s)' });
      expect(send.mock.calls.map((call) => call[2].name)).toEqual(['Ada', 'Bob', 'Cy']);
      expect(send).toHaveBeenNthCalledWith(
        1,
        envelope.smtp,
        envelope.from,
        recipients[0],
        'Coffee, Ada?',
        'Monday Mar 2: 10am–5pm'
      );
    });

    it('fails naming only the recipient whose delivery errored', async () => {
      send.mockImplementation(async (_smtp, _from, to) => {
        if (to.name === 'Bob') throw new Error('550 mailbox unavailable');
      });
      const orchestrator = create();

      orchestrator.startSend(template, recipients, envelope);
      const state = await finish(orchestrator);

      expect(state).toMatchObject({
        status: 'failed',
        code: 'PARTIAL_SEND_FAILURE',
        reason: 'Failed to deliver to 1 of 3 recipient(s): Bob <bob@example.com>: 550 mailbox unavailable',
      });
      if (state.status === 'failed') {
        expect(state.deliveries?.map((outcome) => outcome.delivered)).toEqual([true, false, true]);
      }
      expect(send).toHaveBeenCalledTimes(3);
    });

    it('fails only the recipient whose message does not render', async () => {
      const orchestrator = new TaskOrchestrator(
        {
          calendar: { authorize, listBusyEvents },
          mailer: { send },
          renderer: {
            render: (text, variables) => {
              if (variables.recipient_name === 'Cy') throw new InvalidInputError('Template could not be rendered');
              return text;
            },
          },
        },
        handle
      );

      orchestrator.startSend(template, recipients, envelope);
      const state = await finish(orchestrator);

      expect(state).toMatchObject({
        status: 'failed',
        reason: 'Failed to deliver to 1 of 3 recipient(s): Cy <cy@example.com>: Template could not be rendered',
      });
      expect(send).toHaveBeenCalledTimes(2);
    });

    it('sends without slots when nothing was fetched', async () => {
      const orchestrator = create();

      orchestrator.startSend(template, recipients.slice(0, 1), envelope);
      await finish(orchestrator);

      expect(send).toHaveBeenCalledWith(envelope.smtp, envelope.from, recipients[0], 'Coffee, Ada?', '');
    });

    it.each<[string, RecipientEntry[], SendEnvelope, string]>([
      ['no recipients', [], envelope, 'No recipients added'],
      ['a recipient without a name', [{ name: ' ', email: 'x@example.com' }], envelope, 'Recipient name and email are both required'],
      ['an email without @', [{ name: 'Ada', email: 'ada.example.com' }], envelope, 'Invalid email address "ada.example.com"'],
      [
        'missing SMTP settings',
        recipients,
        { ...envelope, smtp: { ...envelope.smtp, host: '', port: 0 } },
        'Incomplete SMTP settings: SMTP host is missing; Invalid SMTP port 0',
      ],
    ])('rejects %s', (_label, list, sendEnvelope, message) => {
      const orchestrator = create();

      const result = orchestrator.startSend(template, list, sendEnvelope);

      expect(result.started).toBe(false);
      if (!result.started) {
        expect(result.error).toBeInstanceOf(InvalidInputError);
        expect(result.error.message).toBe(message);
      }
      expect(orchestrator.snapshot().operation.status).toBe('idle');
    });
  });

  describe('acknowledge', () => {
    it('only resets finished operations', async () => {
      const orchestrator = create();
      expect(orchestrator.acknowledge()).toBe(false);

      orchestrator.startConnect();
      expect(orchestrator.acknowledge()).toBe(false);

      await finish(orchestrator);
      expect(orchestrator.acknowledge()).toBe(true);
      expect(orchestrator.poll()).toEqual({ status: 'idle' });
      expect(orchestrator.startConnect().started).toBe(true);
      await orchestrator.settled();
    });
  });

  it('logs each state change once', async () => {
    const orchestrator = create();
    const log = vi.mocked(console.log);

    orchestrator.startFetch(query);
    orchestrator.poll();
    await finish(orchestrator);
    orchestrator.poll();
    orchestrator.acknowledge();

    const changes = log.mock.calls.map(([line]) => String(line)).filter((line) => line.includes(' -> '));
    expect(changes).toEqual([
      '[Orchestrator] idle -> fetching',
      '[Orchestrator] fetching -> succeeded',
      '[Orchestrator] succeeded -> idle',
    ]);
  });

  it('keeps snapshots frozen', async () => {
    const orchestrator = create();
    orchestrator.startConnect();

    expect(Object.isFrozen(orchestrator.snapshot())).toBe(true);
    expect(Object.isFrozen(orchestrator.snapshot().operation)).toBe(true);
    await orchestrator.settled();
  });
});
