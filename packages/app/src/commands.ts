/**
 * Parsing of terminal command lines
 */

import * as chrono from 'chrono-node';
import { InvalidInputError, parseDailyWindow } from '@coffee-chat/core';
import type { DailyWindow } from '@coffee-chat/core';

export const SMTP_FIELDS = ['host', 'port', 'user', 'from', 'secure', 'password'] as const;
export type SmtpField = (typeof SMTP_FIELDS)[number];

export type Command =
  | { type: 'help' }
  | { type: 'status' }
  | { type: 'connect' }
  | { type: 'fetch'; from?: Date; wholeDay: boolean }
  | { type: 'slots' }
  | { type: 'add'; name: string; email: string }
  | { type: 'remove'; index: number }
  | { type: 'recipients' }
  | { type: 'subject'; text: string }
  | { type: 'body'; text: string }
  | { type: 'sender'; name: string }
  | { type: 'smtp'; field: SmtpField; value: string }
  | { type: 'window'; window: DailyWindow }
  | { type: 'buffer'; minutes: number }
  | { type: 'min'; minutes: number }
  | { type: 'days'; days: number }
  | { type: 'timezone'; zone: string }
  | { type: 'send' }
  | { type: 'quit' };

export const HELP_TEXT = [
  'Commands:',
  '  connect                      Authorize Google Calendar in the browser',
  '  fetch [from <date>]          Find free slots, starting now or from a date ("fetch from next monday")',
  '  slots                        Show the free slots found by the last fetch',
  '  add <name> <email>           Add a recipient',
  '  remove <n>                   Remove recipient number n',
  '  recipients                   List recipients',
  '  subject <text>               Set the subject template',
  '  body <text>                  Set the body template (\\n for a new line)',
  '  sender <name>                Set your name as it appears in invitations',
  '  smtp <field> <value>         Set host, port, user, from, secure (on/off) or password',
  '  window HH:MM-HH:MM           Daily window to look for slots in',
  '  buffer <minutes>             Gap kept around every meeting (0-120)',
  '  min <minutes>                Shortest slot worth proposing',
  '  days <n>                     How many days ahead to look',
  '  timezone <IANA zone>         Time zone for the daily window',
  '  send                         Email every recipient',
  '  status                       Show the current state and settings',
  '  quit                         Save and exit',
].join('\n');

function wholeNumber(value: string | undefined, what: string): number {
  if (!value || !/^\d+$/.test(value)) {
    throw new InvalidInputError(`Expected a whole number of ${what}, got "${value ?? ''}"`);
  }
  return parseInt(value, 10);
}

function requireText(value: string, usage: string): string {
  if (!value) {
    throw new InvalidInputError(`Usage: ${usage}`);
  }
  return value;
}

function parseFetch(rest: string, now: Date): Command {
  if (!rest) {
    return { type: 'fetch', wholeDay: false };
  }

  const phrase = rest.replace(/^from\s+/i, '');
  const [result] = chrono.parse(phrase, now, { forwardDate: true });
  if (!result) {
    throw new InvalidInputError(`Could not understand the date "${phrase}"`);
  }

  return { type: 'fetch', from: result.start.date(), wholeDay: !result.start.isCertain('hour') };
}

/**
 * Parse one input line. Returns null for blank lines.
 */
export function parseCommand(line: string, now: Date = new Date()): Command | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  const [word, ...args] = trimmed.split(/\s+/);
  const name = word.toLowerCase();
  const rest = trimmed.slice(word.length).trim();

  switch (name) {
    case 'help':
    case '?':
      return { type: 'help' };
    case 'status':
      return { type: 'status' };
    case 'connect':
      return { type: 'connect' };
    case 'slots':
      return { type: 'slots' };
    case 'recipients':
      return { type: 'recipients' };
    case 'send':
      return { type: 'send' };
    case 'quit':
    case 'exit':
      return { type: 'quit' };
    case 'fetch':
      return parseFetch(rest, now);
    case 'add': {
      const email = args[args.length - 1];
      const recipientName = args.slice(0, -1).join(' ');
      if (!email || !recipientName) {
        throw new InvalidInputError('Please enter both name and email: add <name> <email>');
      }
      return { type: 'add', name: recipientName, email };
    }
    case 'remove':
      return { type: 'remove', index: wholeNumber(args[0], 'the recipient to remove') };
    case 'subject':
      return { type: 'subject', text: requireText(rest, 'subject <text>') };
    case 'body':
      return { type: 'body', text: requireText(rest, 'body <text>').replace(/\\n/g, '\n') };
    case 'sender':
      return { type: 'sender', name: requireText(rest, 'sender <name>') };
    case 'smtp': {
      const field = SMTP_FIELDS.find((candidate) => candidate === args[0]);
      const value = trimmed.split(/\s+/).slice(2).join(' ');
      if (!field || !value) {
        throw new InvalidInputError(`Usage: smtp ${SMTP_FIELDS.join('|')} <value>`);
      }
      return { type: 'smtp', field, value };
    }
    case 'window':
      return { type: 'window', window: parseDailyWindow(requireText(rest, 'window HH:MM-HH:MM')) };
    case 'buffer':
      return { type: 'buffer', minutes: wholeNumber(args[0], 'minutes') };
    case 'min':
      return { type: 'min', minutes: wholeNumber(args[0], 'minutes') };
    case 'days':
      return { type: 'days', days: wholeNumber(args[0], 'days') };
    case 'timezone':
      return { type: 'timezone', zone: requireText(rest, 'timezone <IANA zone>') };
    default:
      throw new InvalidInputError(`Unknown command "${word}". Type "help" for the list of commands.`);
  }
}
