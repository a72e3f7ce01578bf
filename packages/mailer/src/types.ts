/**
 * Types for composing and delivering invitations
 */

import type { CredentialHandle, RecipientEntry } from '@coffee-chat/core';

export interface SmtpSettings {
  host: string;
  port: number;
  username: string;
  /** Implicit TLS (usually port 465); otherwise STARTTLS is required */
  secure: boolean;
  /** Where the password lives in the secret store */
  password: CredentialHandle;
}

export interface MailAddress {
  name: string;
  address: string;
}

export interface MessageTemplate {
  subject: string;
  body: string;
}

export interface TemplateVariables {
  recipient_name: string;
  sender_name: string;
  availabilities: string[];
}

/**
 * Mail collaborator consumed by the orchestrator, called once per recipient
 */
export interface MailCollaborator {
  send(smtp: SmtpSettings, from: MailAddress, to: RecipientEntry, subject: string, body: string): Promise<void>;
}

export interface TemplateRenderer {
  render(text: string, variables: TemplateVariables): string;
}
