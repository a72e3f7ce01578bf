/**
 * Owns the form state shown by the front end and turns commands into
 * orchestrator operations
 */

import { addHours } from 'date-fns';
import {
  BusyError,
  InvalidInputError,
  assertValidDailyWindow,
  formatTimeOfDay,
  isValidTimeZone,
  localDateOf,
  parseTimeOfDay,
  startOfLocalDay,
} from '@coffee-chat/core';
import type { CredentialHandle, DailyWindow, SecretStore, SlotQuery } from '@coffee-chat/core';
import { deriveControls, validateRecipient } from '@coffee-chat/orchestrator';
import type { Controls, SendEnvelope, StartResult, TaskOrchestrator } from '@coffee-chat/orchestrator';
import type { SmtpField } from './commands.js';
import type { AppSettings, SettingsStore } from './storage.js';

export const SMTP_PASSWORD_SERVICE_ID = 'coffee-chat.smtp';

const MAX_BUFFER_MINUTES = 120;
const MAX_LOOK_AHEAD_DAYS = 365;
const TRUE_WORDS = ['on', 'true', 'yes', '1'];
const FALSE_WORDS = ['off', 'false', 'no', '0'];

export interface AppControllerOptions {
  orchestrator: TaskOrchestrator;
  secrets: SecretStore;
  storage: SettingsStore;
  settings: AppSettings;
  now?: () => Date;
}

export class AppController {
  private orchestrator: TaskOrchestrator;
  private secrets: SecretStore;
  private storage: SettingsStore;
  private settings: AppSettings;
  private now: () => Date;
  private status = 'Ready.';

  constructor(options: AppControllerOptions) {
    this.orchestrator = options.orchestrator;
    this.secrets = options.secrets;
    this.storage = options.storage;
    this.settings = options.settings;
    this.now = options.now ?? (() => new Date());
  }

  get statusLine(): string {
    return this.status;
  }

  controls(): Controls {
    return deriveControls(this.orchestrator.snapshot());
  }

  currentSettings(): AppSettings {
    return structuredClone(this.settings);
  }

  /**
   * Called by the render loop. Applies a finished operation, records its
   * outcome as the status line and acknowledges it. Returns the new status
   * line when one was produced.
   */
  tick(): string | null {
    const state = this.orchestrator.poll();
    if (state.status !== 'succeeded' && state.status !== 'failed') {
      return null;
    }

    if (state.status === 'succeeded' && state.operation === 'connect') {
      const credential = this.orchestrator.snapshot().credential ?? undefined;
      this.settings = { ...this.settings, calendar: { ...this.settings.calendar, credential } };
    }

    this.status = state.status === 'succeeded' ? state.summary : `Failed: ${state.reason}`;
    this.orchestrator.acknowledge();
    return this.status;
  }

  connect(): string {
    return this.started(
      this.orchestrator.startConnect(),
      'Opening the browser for Google Calendar authorization...'
    );
  }

  /**
   * Start looking for slots from `from` (or now) over the configured number
   * of days. A whole-day start begins at local midnight.
   */
  fetch(from?: Date, wholeDay = false): string {
    const query = this.buildQuery(from, wholeDay);
    return this.started(
      this.orchestrator.startFetch(query),
      `Fetching available slots for the next ${this.settings.calendar.lookAheadDays} day(s)...`
    );
  }

  async send(): Promise<string> {
    if (!this.controls().send) {
      throw new BusyError('Cannot send while another operation is running');
    }

    const handle = this.smtpPasswordHandle();
    if (!(await this.secrets.get(handle))) {
      throw new InvalidInputError('SMTP password is not set; use "smtp password <value>"');
    }

    const { subject, body, recipients, senderName, smtp } = this.settings;
    const envelope: SendEnvelope = {
      senderName,
      from: { name: senderName, address: smtp.fromAddress },
      smtp: {
        host: smtp.host,
        port: smtp.port,
        username: smtp.username,
        secure: smtp.secure,
        password: handle,
      },
    };

    const warning =
      this.orchestrator.availabilities().length === 0 ? ' Warning: sending without available slots.' : '';
    return this.started(
      this.orchestrator.startSend({ subject, body }, recipients, envelope),
      `Sending to ${recipients.length} recipient(s)...${warning}`
    );
  }

  addRecipient(name: string, email: string): string {
    this.requireEditable();
    const recipient = { name: name.trim(), email: email.trim() };
    const problem = validateRecipient(recipient);
    if (problem) {
      throw new InvalidInputError(problem);
    }

    this.settings = { ...this.settings, recipients: [...this.settings.recipients, recipient] };
    return this.setStatus('Recipient added.');
  }

  /** Remove by 1-based position, as listed by `describeRecipients` */
  removeRecipient(position: number): string {
    this.requireEditable();
    const { recipients } = this.settings;
    if (!Number.isInteger(position) || position < 1 || position > recipients.length) {
      throw new InvalidInputError(`There is no recipient number ${position}`);
    }

    this.settings = { ...this.settings, recipients: recipients.filter((_, i) => i !== position - 1) };
    return this.setStatus(
      this.settings.recipients.length === 0 ? 'Recipient removed. No recipients left.' : 'Recipient removed.'
    );
  }

  setSubject(subject: string): string {
    this.requireEditable();
    this.settings = { ...this.settings, subject };
    return this.setStatus('Subject updated.');
  }

  setBody(body: string): string {
    this.requireEditable();
    this.settings = { ...this.settings, body };
    return this.setStatus('Body updated.');
  }

  setSenderName(senderName: string): string {
    this.requireEditable();
    this.settings = { ...this.settings, senderName };
    return this.setStatus('Sender name updated.');
  }

  setSmtpField(field: Exclude<SmtpField, 'password'>, value: string): string {
    this.requireEditable();
    const smtp = { ...this.settings.smtp };

    switch (field) {
      case 'host':
        smtp.host = value.trim();
        break;
      case 'user':
        smtp.username = value.trim();
        break;
      case 'from':
        if (!value.includes('@')) {
          throw new InvalidInputError(`Invalid sender address "${value}"`);
        }
        smtp.fromAddress = value.trim();
        break;
      case 'port': {
        const port = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
        if (!(port >= 1 && port <= 65535)) {
          throw new InvalidInputError('Invalid SMTP Port number.');
        }
        smtp.port = port;
        break;
      }
      case 'secure': {
        const word = value.toLowerCase();
        if (!TRUE_WORDS.includes(word) && !FALSE_WORDS.includes(word)) {
          throw new InvalidInputError(`Expected on or off, got "${value}"`);
        }
        smtp.secure = TRUE_WORDS.includes(word);
        break;
      }
    }

    this.settings = { ...this.settings, smtp };
    return this.setStatus(`SMTP ${field} updated.`);
  }

  async setSmtpPassword(password: string): Promise<string> {
    this.requireEditable();
    const { host, username } = this.settings.smtp;
    if (!host || !username) {
      throw new InvalidInputError('Set the SMTP host and user before the password');
    }

    await this.secrets.set(this.smtpPasswordHandle(), password);
    return this.setStatus('SMTP password stored.');
  }

  setDailyWindow(window: DailyWindow): string {
    this.requireEditable();
    assertValidDailyWindow(window);
    this.updateCalendar({ dayStart: formatTimeOfDay(window.from), dayEnd: formatTimeOfDay(window.to) });
    return this.setStatus(`Daily window set to ${formatTimeOfDay(window.from)}-${formatTimeOfDay(window.to)}.`);
  }

  setBufferMinutes(minutes: number): string {
    this.requireEditable();
    if (!Number.isInteger(minutes) || minutes < 0 || minutes > MAX_BUFFER_MINUTES) {
      throw new InvalidInputError(`Buffer must be between 0 and ${MAX_BUFFER_MINUTES} minutes`);
    }
    this.updateCalendar({ bufferMinutes: minutes });
    return this.setStatus(`Buffer set to ${minutes} minute(s).`);
  }

  setMinDuration(minutes: number): string {
    this.requireEditable();
    if (!Number.isInteger(minutes) || minutes < 0) {
      throw new InvalidInputError('Minimum duration must be zero or more minutes');
    }
    this.updateCalendar({ minDurationMinutes: minutes });
    return this.setStatus(`Minimum slot length set to ${minutes} minute(s).`);
  }

  setLookAheadDays(days: number): string {
    this.requireEditable();
    if (!Number.isInteger(days) || days < 1 || days > MAX_LOOK_AHEAD_DAYS) {
      throw new InvalidInputError(`Look-ahead must be between 1 and ${MAX_LOOK_AHEAD_DAYS} days`);
    }
    this.updateCalendar({ lookAheadDays: days });
    return this.setStatus(`Looking ${days} day(s) ahead.`);
  }

  setTimeZone(timeZone: string): string {
    this.requireEditable();
    if (!isValidTimeZone(timeZone)) {
      throw new InvalidInputError(`Unknown time zone "${timeZone}"`);
    }
    this.updateCalendar({ timeZone });
    return this.setStatus(`Time zone set to ${timeZone}.`);
  }

  describeRecipients(): string[] {
    const { recipients } = this.settings;
    if (recipients.length === 0) {
      return ['No recipients added.'];
    }
    return recipients.map((recipient, i) => `${i + 1}. ${recipient.name} <${recipient.email}>`);
  }

  describeSlots(): string[] {
    const lines = this.orchestrator.availabilities();
    return lines.length > 0 ? lines : ['No free slots fetched yet.'];
  }

  describeStatus(): string[] {
    const { calendar, smtp, senderName, recipients } = this.settings;
    const { credential } = this.orchestrator.snapshot();
    const activity = this.controls().activity;

    return [
      `Status: ${activity ?? this.status}`,
      `Calendar: ${credential ? `connected as ${credential.accountId}` : 'not connected'}`,
      `Window: ${calendar.dayStart}-${calendar.dayEnd} ${calendar.timeZone}, buffer ${calendar.bufferMinutes} min, ` +
        `min ${calendar.minDurationMinutes} min, ${calendar.lookAheadDays} day(s) ahead`,
      `SMTP: ${smtp.username || '(no user)'}@${smtp.host || '(no host)'}:${smtp.port} ` +
        `${smtp.secure ? 'TLS' : 'STARTTLS'}, from ${smtp.fromAddress || '(not set)'}`,
      `Sender: ${senderName || '(not set)'}`,
      `Recipients: ${recipients.length}`,
    ];
  }

  /**
   * Wait for the operation in flight, apply its result and write the settings
   */
  async shutdown(): Promise<void> {
    await this.orchestrator.settled();
    this.tick();
    await this.storage.save(this.currentSettings());
  }

  smtpPasswordHandle(): CredentialHandle {
    const { username, host } = this.settings.smtp;
    return { serviceId: SMTP_PASSWORD_SERVICE_ID, accountId: `${username}@${host}` };
  }

  private buildQuery(from: Date | undefined, wholeDay: boolean): SlotQuery {
    const calendar = this.settings.calendar;
    const { timeZone } = calendar;

    let start = from ?? this.now();
    if (from && wholeDay) {
      start = startOfLocalDay(localDateOf(from, timeZone), timeZone);
    }

    return {
      queryRange: { start, end: addHours(start, calendar.lookAheadDays * 24) },
      dailyWindow: { from: parseTimeOfDay(calendar.dayStart), to: parseTimeOfDay(calendar.dayEnd) },
      bufferMinutes: calendar.bufferMinutes,
      minDurationMinutes: calendar.minDurationMinutes,
      timeZone,
    };
  }

  private updateCalendar(changes: Partial<AppSettings['calendar']>): void {
    this.settings = { ...this.settings, calendar: { ...this.settings.calendar, ...changes } };
  }

  private requireEditable(): void {
    if (!this.controls().edit) {
      throw new BusyError('Settings cannot change while an operation is running');
    }
  }

  private started(result: StartResult, message: string): string {
    if (!result.started) {
      throw result.error;
    }
    return this.setStatus(message);
  }

  private setStatus(message: string): string {
    this.status = message;
    return message;
  }
}
