export { SmtpMailer } from './smtp-mailer.js';
export type { MailTransport, MailTransportFactory, SmtpTransportOptions } from './smtp-mailer.js';
export { NunjucksTemplateRenderer, formatTemplateText, loadTemplateFile, parseTemplateText } from './template.js';
export type * from './types.js';
