import nodemailer, { type SendMailOptions } from 'nodemailer';

import type { SmtpSettings } from '../config';
import type { Contacts, EmailMetadata, NotificationRequest, Notifier } from '../types/probe';
import { getErrorMessage, NotificationDeliveryError } from '../utils/errors';
import { logger as defaultLogger, type LoggerService } from '../utils/logger';
import { type ComposedMessage, composeFatalErrorMessage, composeMessage } from './composeMessage';

export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

export interface EmailNotifierOptions {
  contacts: Contacts;
  metadata: EmailMetadata;
  transport: MailTransport;
  logger?: Pick<LoggerService, 'info' | 'error'>;
}

export function createSmtpTransport(smtp: SmtpSettings, contacts: Contacts): MailTransport {
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.secure,
    auth: {
      user: contacts.source.account,
      pass: smtp.password,
    },
  });
}

export class EmailNotifier implements Notifier {
  private contacts: Contacts;
  private metadata: EmailMetadata;
  private transport: MailTransport;
  private logger: Pick<LoggerService, 'info' | 'error'>;

  constructor(options: EmailNotifierOptions) {
    this.contacts = options.contacts;
    this.metadata = options.metadata;
    this.transport = options.transport;
    this.logger = options.logger ?? defaultLogger;
  }

  get fromAddress(): string {
    return `${this.contacts.source.account}${this.contacts.source.service}`;
  }

  public async send(request: NotificationRequest): Promise<void> {
    await this.deliver(composeMessage(request, this.metadata), request.recipients, request.category);
  }

  /**
   * Reports a failure that aborted the whole run to the script recipients.
   */
  public async sendFatalError(error: unknown): Promise<void> {
    await this.deliver(composeFatalErrorMessage(error, this.metadata), this.contacts.scriptRecipients, 'FATAL');
  }

  private async deliver(
    message: ComposedMessage,
    recipients: string[],
    category: NotificationDeliveryError['category']
  ): Promise<void> {
    try {
      await this.transport.sendMail({
        from: this.fromAddress,
        to: recipients.join(', '),
        subject: message.subject,
        text: message.text,
      });
    } catch (error) {
      this.logger.error('Error sending email', { category, recipients, error: getErrorMessage(error) });
      throw new NotificationDeliveryError(
        `Failed to send ${category} email: ${getErrorMessage(error)}`,
        category,
        recipients,
        { cause: error }
      );
    }

    this.logger.info(`Email alert sent to ${recipients.join(', ')}`, { category });
  }
}
