/**
 * Line-oriented terminal front end. A fixed-interval tick drives the
 * orchestrator's poll loop while commands are read from the input stream.
 */

import { createInterface, type Interface } from 'readline';
import { describeError } from '@coffee-chat/core';
import { HELP_TEXT, parseCommand, type Command } from './commands.js';
import type { AppController } from './controller.js';

export interface TerminalOptions {
  tickIntervalMs: number;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  prompt?: string;
  now?: () => Date;
}

export class TerminalUI {
  private controller: AppController;
  private options: Required<Omit<TerminalOptions, 'now'>> & { now: () => Date };
  private rl: Interface | null = null;
  private pending: Promise<void> = Promise.resolve();
  private ticker: NodeJS.Timeout | null = null;

  constructor(controller: AppController, options: TerminalOptions) {
    this.controller = controller;
    this.options = {
      input: process.stdin,
      output: process.stdout,
      prompt: 'coffee-chat> ',
      now: () => new Date(),
      ...options,
    };
  }

  /**
   * Run until `quit`, end of input or `stop()`. Resolves once the controller
   * has shut down.
   */
  run(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const rl = createInterface({ input: this.options.input, output: this.options.output });
      this.rl = rl;
      rl.setPrompt(this.options.prompt);

      this.ticker = setInterval(() => {
        const message = this.controller.tick();
        if (message) this.print(message);
      }, this.options.tickIntervalMs);

      rl.on('line', (line) => {
        this.pending = this.pending.then(() => this.handleLine(line));
      });
      rl.on('SIGINT', () => rl.close());
      rl.on('close', () => {
        if (this.ticker) clearInterval(this.ticker);
        this.ticker = null;
        this.rl = null;
        void this.pending.then(() => this.controller.shutdown()).then(resolve, reject);
      });

      this.print('Coffee Chat. Type "help" for commands.');
      rl.prompt();
    });
  }

  stop(): void {
    this.rl?.close();
  }

  private async handleLine(line: string): Promise<void> {
    try {
      const command = parseCommand(line, this.options.now());
      if (command?.type === 'quit') {
        this.stop();
        return;
      }
      if (command) {
        this.print(await this.execute(command));
      }
    } catch (error) {
      this.print(`Error: ${describeError(error)}`);
    }
    this.rl?.prompt();
  }

  private async execute(command: Exclude<Command, { type: 'quit' }>): Promise<string> {
    const controller = this.controller;

    switch (command.type) {
      case 'help':
        return HELP_TEXT;
      case 'status':
        return controller.describeStatus().join('\n');
      case 'connect':
        return controller.connect();
      case 'fetch':
        return controller.fetch(command.from, command.wholeDay);
      case 'slots':
        return controller.describeSlots().join('\n');
      case 'add':
        return controller.addRecipient(command.name, command.email);
      case 'remove':
        return controller.removeRecipient(command.index);
      case 'recipients':
        return controller.describeRecipients().join('\n');
      case 'subject':
        return controller.setSubject(command.text);
      case 'body':
        return controller.setBody(command.text);
      case 'sender':
        return controller.setSenderName(command.name);
      case 'smtp':
        return command.field === 'password'
          ? controller.setSmtpPassword(command.value)
          : controller.setSmtpField(command.field, command.value);
      case 'window':
        return controller.setDailyWindow(command.window);
      case 'buffer':
        return controller.setBufferMinutes(command.minutes);
      case 'min':
        return controller.setMinDuration(command.minutes);
      case 'days':
        return controller.setLookAheadDays(command.days);
      case 'timezone':
        return controller.setTimeZone(command.zone);
      case 'send':
        return controller.send();
    }
  }

  private print(message: string): void {
    this.options.output.write(`${message}\n`);
  }
}
