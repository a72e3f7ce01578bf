/**
 * Types for the calendar integration
 */

import type { CredentialHandle, Interval } from '@coffee-chat/core';

export interface GoogleCalendarConfig {
  clientId: string;
  clientSecret: string;
  /** Calendars whose busy time is combined; defaults to the primary calendar */
  calendarIds?: string[];
  /** Loopback port for the consent redirect; 0 picks a free port */
  redirectPort?: number;
  /** How long to wait for the user to finish consent in the browser */
  consentTimeoutMs?: number;
}

/**
 * Calendar collaborator consumed by the orchestrator
 */
export interface CalendarCollaborator {
  /** Run the browser consent flow and return a handle to the stored token */
  authorize(): Promise<CredentialHandle>;
  /** Busy periods across the configured calendars within `range` */
  listBusyEvents(credential: CredentialHandle, range: Interval): Promise<Interval[]>;
}

export interface ConsentResult {
  code: string;
  redirectUri: string;
}
