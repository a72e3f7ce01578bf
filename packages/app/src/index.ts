/**
 * Coffee Chat
 *
 * Finds free slots on a Google Calendar and emails them to a list of people
 * from an interactive terminal.
 */

import 'dotenv/config';
import { InvalidInputError, describeError } from '@coffee-chat/core';
import type { SecretStore } from '@coffee-chat/core';
import { GoogleCalendarClient, type CalendarCollaborator } from '@coffee-chat/calendar';
import { NunjucksTemplateRenderer, SmtpMailer, loadTemplateFile } from '@coffee-chat/mailer';
import { TaskOrchestrator } from '@coffee-chat/orchestrator';
import { createSecretStore } from '@coffee-chat/secrets';
import { loadConfig, type AppConfig } from './config.js';
import { AppController } from './controller.js';
import { JsonSettingsStorage, type AppSettings } from './storage.js';
import { TerminalUI } from './terminal.js';

export { loadConfig, type AppConfig } from './config.js';
export { AppController, SMTP_PASSWORD_SERVICE_ID } from './controller.js';
export { parseCommand, HELP_TEXT, type Command } from './commands.js';
export { JsonSettingsStorage, SettingsSchema, defaultSettings } from './storage.js';
export type { AppSettings, SettingsStore } from './storage.js';
export { TerminalUI } from './terminal.js';

const MISSING_OAUTH_CLIENT = 'Set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET to connect a calendar';

function createCalendar(config: AppConfig, secrets: SecretStore): CalendarCollaborator {
  if (config.google) {
    return new GoogleCalendarClient(config.google, secrets);
  }
  return {
    authorize: async () => {
      throw new InvalidInputError(MISSING_OAUTH_CLIENT);
    },
    listBusyEvents: async () => {
      throw new InvalidInputError(MISSING_OAUTH_CLIENT);
    },
  };
}

/**
 * Fill an empty subject and body from the template file
 */
async function withTemplate(settings: AppSettings, templatePath: string): Promise<AppSettings> {
  if (settings.subject || settings.body) {
    return settings;
  }

  try {
    const template = await loadTemplateFile(templatePath);
    console.log(`[App] Loaded email template from ${templatePath}`);
    return { ...settings, subject: template.subject, body: template.body };
  } catch (error) {
    console.warn(`[App] No email template loaded: ${describeError(error)}`);
    return settings;
  }
}

async function main(): Promise<void> {
  const config = loadConfig();

  console.log('[App] Starting Coffee Chat...');
  console.log(`[App] Settings: ${config.statePath}`);
  console.log(`[App] Secret store: ${config.secretBackend}`);
  if (!config.google) {
    console.warn(`[App] ${MISSING_OAUTH_CLIENT}`);
  }

  const secrets = createSecretStore(config.secretBackend);
  const storage = new JsonSettingsStorage(config.statePath);
  const settings = await withTemplate(await storage.load(), config.templatePath);

  const orchestrator = new TaskOrchestrator(
    {
      calendar: createCalendar(config, secrets),
      mailer: new SmtpMailer(secrets),
      renderer: new NunjucksTemplateRenderer(),
    },
    settings.calendar.credential ?? null
  );

  const controller = new AppController({ orchestrator, secrets, storage, settings });
  const ui = new TerminalUI(controller, { tickIntervalMs: config.tickIntervalMs });

  process.on('SIGINT', () => {
    console.log('\n[App] Received SIGINT, shutting down...');
    ui.stop();
  });
  process.on('SIGTERM', () => {
    console.log('[App] Received SIGTERM, shutting down...');
    ui.stop();
  });

  await ui.run();
  console.log('[App] Goodbye.');
  process.exit(0);
}

// Run if executed directly
const isMainModule = import.meta.url === `file://${process.argv[1]}`;
if (isMainModule) {
  main().catch((error) => {
    console.error('[App] Fatal error:', error);
    process.exit(1);
  });
}
