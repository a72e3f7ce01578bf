export { GoogleCalendarClient, GOOGLE_CALENDAR_SERVICE_ID, toBusyIntervals } from './google-calendar.js';
export { runConsentFlow, CALLBACK_PATH } from './consent-flow.js';
export type { ConsentFlowOptions } from './consent-flow.js';
export { openInBrowser } from './open-browser.js';
export type * from './types.js';
