/**
 * Settings snapshot persisted as a JSON file between runs
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { isValidTimeZone, parseTimeOfDay } from '@coffee-chat/core';

const TIME_OF_DAY = /^\d{1,2}:\d{2}$/;

const timeOfDay = z
  .string()
  .regex(TIME_OF_DAY, 'Expected HH:MM')
  .refine((value) => {
    try {
      parseTimeOfDay(value);
      return true;
    } catch {
      return false;
    }
  }, 'Not a valid time of day');

const systemTimeZone = (): string => Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC';

const RecipientSchema = z.object({
  name: z.string(),
  email: z.string(),
});

const SmtpSchema = z.object({
  host: z.string().default(''),
  port: z.number().int().min(1).max(65535).default(587),
  username: z.string().default(''),
  fromAddress: z.string().default(''),
  secure: z.boolean().default(false),
});

const CalendarSchema = z.object({
  bufferMinutes: z.number().int().min(0).max(120).default(15),
  dayStart: timeOfDay.default('09:00'),
  dayEnd: timeOfDay.default('21:00'),
  minDurationMinutes: z.number().int().min(0).default(30),
  lookAheadDays: z.number().int().min(1).max(365).default(14),
  timeZone: z.string().refine(isValidTimeZone, 'Unknown time zone').default(systemTimeZone),
  credential: z.object({ serviceId: z.string(), accountId: z.string() }).optional(),
});

export const SettingsSchema = z.object({
  subject: z.string().default(''),
  body: z.string().default(''),
  senderName: z.string().default(''),
  recipients: z.array(RecipientSchema).default([]),
  smtp: SmtpSchema.default({}),
  calendar: CalendarSchema.default({}),
});

export type AppSettings = z.infer<typeof SettingsSchema>;
export type SmtpFormSettings = AppSettings['smtp'];
export type CalendarSettings = AppSettings['calendar'];

export interface SettingsStore {
  load(): Promise<AppSettings>;
  save(settings: AppSettings): Promise<void>;
}

export function defaultSettings(): AppSettings {
  return SettingsSchema.parse({});
}

/**
 * JSON file storage for the settings snapshot. Passwords and tokens live in
 * the secret store and never reach this file.
 */
export class JsonSettingsStorage implements SettingsStore {
  private storagePath: string;

  constructor(storagePath: string) {
    this.storagePath = storagePath;
  }

  /**
   * Load the snapshot. A missing or unreadable file yields defaults.
   */
  async load(): Promise<AppSettings> {
    if (!existsSync(this.storagePath)) {
      console.log(`[Storage] No settings file at ${this.storagePath}, starting with defaults`);
      return defaultSettings();
    }

    try {
      const data = await readFile(this.storagePath, 'utf-8');
      // The envelope's version and updatedAt are stripped by the schema
      const parsed = SettingsSchema.safeParse(JSON.parse(data));
      if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        console.error(`[Storage] Ignoring invalid settings in ${this.storagePath}: ${problems.join('; ')}`);
        return defaultSettings();
      }

      console.log(
        `[Storage] Loaded settings with ${parsed.data.recipients.length} recipient(s) from ${this.storagePath}`
      );
      return parsed.data;
    } catch (error) {
      console.error('[Storage] Error loading settings:', error);
      return defaultSettings();
    }
  }

  async save(settings: AppSettings): Promise<void> {
    // Ensure directory exists
    const dir = dirname(this.storagePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }

    const data = {
      version: 1,
      updatedAt: new Date().toISOString(),
      ...SettingsSchema.parse(settings),
    };

    try {
      await writeFile(this.storagePath, JSON.stringify(data, null, 2), 'utf-8');
    } catch (error) {
      console.error('[Storage] Error saving settings:', error);
      throw error;
    }
    console.log(`[Storage] Saved settings to ${this.storagePath}`);
  }
}
