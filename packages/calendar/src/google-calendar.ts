/**
 * Google Calendar API client
 */

import { google, calendar_v3 } from 'googleapis';
import { NetworkError, NotConnectedError } from '@coffee-chat/core';
import type { CredentialHandle, Interval, SecretStore } from '@coffee-chat/core';
import { runConsentFlow } from './consent-flow.js';
import { openInBrowser } from './open-browser.js';
import type { CalendarCollaborator, GoogleCalendarConfig } from './types.js';

export const GOOGLE_CALENDAR_SERVICE_ID = 'coffee-chat.google-calendar';

const SCOPES = ['https://www.googleapis.com/auth/calendar.readonly'];
const DEFAULT_CONSENT_TIMEOUT_MS = 5 * 60 * 1000;

type OAuth2Client = InstanceType<typeof google.auth.OAuth2>;

export class GoogleCalendarClient implements CalendarCollaborator {
  private config: GoogleCalendarConfig;
  private secrets: SecretStore;
  private openUrl: (url: string) => void;

  constructor(config: GoogleCalendarConfig, secrets: SecretStore, openUrl: (url: string) => void = openInBrowser) {
    this.config = config;
    this.secrets = secrets;
    this.openUrl = openUrl;
  }

  /**
   * Run the consent flow, store the refresh token in the secret store and
   * return the handle it was stored under
   */
  async authorize(): Promise<CredentialHandle> {
    const oauth2Client = this.createOAuthClient();

    // Wait for the browser to hand back an authorization code
    const { code, redirectUri } = await runConsentFlow({
      port: this.config.redirectPort ?? 0,
      timeoutMs: this.config.consentTimeoutMs ?? DEFAULT_CONSENT_TIMEOUT_MS,
      buildAuthUrl: (redirect_uri) =>
        oauth2Client.generateAuthUrl({
          access_type: 'offline',
          scope: SCOPES,
          prompt: 'consent',
          redirect_uri,
        }),
      openUrl: this.openUrl,
    });

    // Exchange the code; only a refresh token survives restarts
    const { tokens } = await oauth2Client.getToken({ code, redirect_uri: redirectUri });
    if (!tokens.refresh_token) {
      throw new NetworkError('Google did not return a refresh token; remove the app grant and connect again');
    }
    oauth2Client.setCredentials(tokens);

    // Key the stored token by the account's primary calendar id
    const calendar = google.calendar({ version: 'v3', auth: oauth2Client });
    const primary = await calendar.calendarList.get({ calendarId: 'primary' });
    const handle: CredentialHandle = {
      serviceId: GOOGLE_CALENDAR_SERVICE_ID,
      accountId: primary.data.id || 'primary',
    };

    await this.secrets.set(handle, tokens.refresh_token);
    console.log(`[Calendar] Connected Google account ${handle.accountId}`);
    return handle;
  }

  async listBusyEvents(credential: CredentialHandle, range: Interval): Promise<Interval[]> {
    const refreshToken = await this.secrets.get(credential);
    if (!refreshToken) {
      throw new NotConnectedError(`No stored Google credential for ${credential.accountId}; connect the calendar again`);
    }

    const oauth2Client = this.createOAuthClient();
    oauth2Client.setCredentials({ refresh_token: refreshToken });
    const calendar = google.calendar({ version: 'v3', auth: oauth2Client });
    const calendarIds = await this.resolveCalendarIds(calendar);

    console.log(
      `[Calendar] Querying busy time for ${calendarIds.join(', ')} between ${range.start.toISOString()} and ${range.end.toISOString()}`
    );

    const response = await calendar.freebusy.query({
      requestBody: {
        timeMin: range.start.toISOString(),
        timeMax: range.end.toISOString(),
        timeZone: 'UTC',
        items: calendarIds.map((id) => ({ id })),
      },
    });

    const busy = toBusyIntervals(response.data.calendars || {}, calendarIds);
    console.log(`[Calendar] Found ${busy.length} busy period(s)`);
    return busy;
  }

  /**
   * FreeBusy keys its response by real calendar id, so `primary` is looked up first
   */
  private async resolveCalendarIds(calendar: calendar_v3.Calendar): Promise<string[]> {
    const configured = this.config.calendarIds?.length ? this.config.calendarIds : ['primary'];
    if (!configured.includes('primary')) {
      return configured;
    }

    const primary = await calendar.calendarList.get({ calendarId: 'primary' });
    if (!primary.data.id) {
      throw new NetworkError('Primary calendar not found');
    }
    const primaryId = primary.data.id;
    return configured.map((id) => (id === 'primary' ? primaryId : id));
  }

  private createOAuthClient(): OAuth2Client {
    return new google.auth.OAuth2(this.config.clientId, this.config.clientSecret);
  }
}

/**
 * Collect busy periods from a FreeBusy response, sorted by start. A calendar
 * the API reports errors for fails the whole lookup.
 */
export function toBusyIntervals(
  calendars: Record<string, calendar_v3.Schema$FreeBusyCalendar>,
  calendarIds: string[]
): Interval[] {
  const busyPeriods: Interval[] = [];

  for (const calendarId of calendarIds) {
    const calendarInfo = calendars[calendarId];
    if (!calendarInfo) continue;

    if (calendarInfo.errors?.length) {
      const reasons = calendarInfo.errors.map((e) => e.reason || 'unknown').join(', ');
      throw new NetworkError(`Calendar ${calendarId} could not be read (${reasons})`);
    }

    for (const busy of calendarInfo.busy || []) {
      if (busy.start && busy.end) {
        busyPeriods.push({
          start: new Date(busy.start),
          end: new Date(busy.end),
        });
      }
    }
  }

  return busyPeriods.sort((a, b) => a.start.getTime() - b.start.getTime());
}
