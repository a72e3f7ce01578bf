import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { InvalidInputError } from '@coffee-chat/core';
import type { GoogleCalendarConfig } from '@coffee-chat/calendar';
import type { SecretBackend } from '@coffee-chat/secrets';

export interface AppConfig {
  /** Null when no OAuth client is configured; connecting is then unavailable */
  google: GoogleCalendarConfig | null;
  statePath: string;
  templatePath: string;
  secretBackend: SecretBackend;
  tickIntervalMs: number;
}

const DEFAULT_STATE_PATH = join(homedir(), '.config', 'coffee-chat', 'settings.json');

const EnvSchema = z
  .object({
    GOOGLE_CLIENT_ID: z.string().optional(),
    GOOGLE_CLIENT_SECRET: z.string().optional(),
    GOOGLE_CALENDAR_IDS: z
      .string()
      .default('primary')
      .transform((value) => value.split(',').map((id) => id.trim()).filter(Boolean)),
    OAUTH_REDIRECT_PORT: z.coerce.number().int().min(0).max(65535).default(0),
    OAUTH_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(300),
    COFFEE_CHAT_STATE_PATH: z.string().default(DEFAULT_STATE_PATH),
    COFFEE_CHAT_TEMPLATE_PATH: z.string().default('email_template.txt'),
    COFFEE_CHAT_SECRET_BACKEND: z.enum(['keyring', 'memory']).default('keyring'),
    TICK_INTERVAL_MS: z.coerce.number().int().positive().default(200),
  })
  .refine((env) => Boolean(env.GOOGLE_CLIENT_ID) === Boolean(env.GOOGLE_CLIENT_SECRET), {
    message: 'GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET must be set together',
    path: ['GOOGLE_CLIENT_SECRET'],
  });

/**
 * Read configuration from the environment. Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = EnvSchema.safeParse(present);

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidInputError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  const google =
    values.GOOGLE_CLIENT_ID && values.GOOGLE_CLIENT_SECRET
      ? {
          clientId: values.GOOGLE_CLIENT_ID,
          clientSecret: values.GOOGLE_CLIENT_SECRET,
          calendarIds: values.GOOGLE_CALENDAR_IDS,
          redirectPort: values.OAUTH_REDIRECT_PORT,
          consentTimeoutMs: values.OAUTH_TIMEOUT_SECONDS * 1000,
        }
      : null;

  return {
    google,
    statePath: values.COFFEE_CHAT_STATE_PATH,
    templatePath: values.COFFEE_CHAT_TEMPLATE_PATH,
    secretBackend: values.COFFEE_CHAT_SECRET_BACKEND,
    tickIntervalMs: values.TICK_INTERVAL_MS,
  };
}
