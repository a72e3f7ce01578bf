/**
 * SMTP delivery through nodemailer
 */

import nodemailer, { type SendMailOptions } from 'nodemailer';
import { InvalidInputError, NetworkError } from '@coffee-chat/core';
import type { RecipientEntry, SecretStore } from '@coffee-chat/core';
import type { MailAddress, MailCollaborator, SmtpSettings } from './types.js';

export interface SmtpTransportOptions {
  host: string;
  port: number;
  secure: boolean;
  requireTLS: boolean;
  auth: { user: string; pass: string };
}

export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
  close(): void;
}

export type MailTransportFactory = (options: SmtpTransportOptions) => MailTransport;

const createSmtpTransport: MailTransportFactory = (options) => nodemailer.createTransport(options);

export class SmtpMailer implements MailCollaborator {
  private secrets: SecretStore;
  private createTransport: MailTransportFactory;

  constructor(secrets: SecretStore, createTransport: MailTransportFactory = createSmtpTransport) {
    this.secrets = secrets;
    this.createTransport = createTransport;
  }

  async send(smtp: SmtpSettings, from: MailAddress, to: RecipientEntry, subject: string, body: string): Promise<void> {
    const password = await this.secrets.get(smtp.password);
    if (!password) {
      throw new InvalidInputError(`No SMTP password stored for ${smtp.username}@${smtp.host}`);
    }

    const transport = this.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: smtp.secure,
      requireTLS: !smtp.secure,
      auth: { user: smtp.username, pass: password },
    });

    try {
      await transport.sendMail({
        from: { name: from.name, address: from.address },
        to: { name: to.name, address: to.email },
        subject,
        text: body,
      });
      console.log(`[Mailer] Sent invitation to ${to.name} <${to.email}>`);
    } catch (error) {
      console.error(`[Mailer] Delivery to ${to.email} failed:`, error);
      throw new NetworkError(`SMTP delivery to ${to.email} failed`, error);
    } finally {
      transport.close();
    }
  }
}
