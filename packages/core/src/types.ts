/**
 * Shared domain types for slot finding, credentials and recipients
 */

/**
 * A half-open span of time `[start, end)` between two absolute instants.
 */
export interface Interval {
  start: Date;
  end: Date;
}

/**
 * Recurring daily availability boundary, in minutes after local midnight.
 * `to` may be 1440 (24:00), meaning the end of the day.
 */
export interface DailyWindow {
  from: number;
  to: number;
}

/**
 * Input to a single free-slot computation. Built fresh per fetch.
 */
export interface SlotQuery {
  /** Overall range to search */
  queryRange: Interval;
  /** Time-of-day window applied to every calendar day in the range */
  dailyWindow: DailyWindow;
  /** Padding added on both sides of every busy interval (0-120) */
  bufferMinutes: number;
  /** Slots shorter than this are dropped */
  minDurationMinutes: number;
  /** IANA time zone the daily window and day boundaries are resolved in */
  timeZone: string;
}

/**
 * Opaque reference to a secret held by the secret store.
 */
export interface CredentialHandle {
  serviceId: string;
  accountId: string;
}

export interface RecipientEntry {
  name: string;
  email: string;
}

/**
 * Keychain-like storage addressed by credential handle
 */
export interface SecretStore {
  get(handle: CredentialHandle): Promise<string | null>;
  set(handle: CredentialHandle, secret: string): Promise<void>;
  delete(handle: CredentialHandle): Promise<boolean>;
}
