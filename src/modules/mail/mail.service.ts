import { Inject, Injectable } from '@nestjs/common';
import * as nodemailer from 'nodemailer';
import { MailConfig, mailConfig } from '../../core/config';
import { logger } from '../../core/logger/logger.config';

export interface OutgoingMail {
  to: string;
  subject: string;
  text: string;
}

/**
 * SMTP delivery. Without `SMTP_HOST` messages are logged and dropped.
 */
@Injectable()
export class MailService {
  private readonly logger = logger();
  private readonly transporter: nodemailer.Transporter | null;

  constructor(@Inject(mailConfig.KEY) private readonly config: MailConfig) {
    this.transporter = config.host
      ? nodemailer.createTransport({
          host: config.host,
          port: config.port,
          secure: config.secure,
          auth:
            config.user && config.password
              ? { user: config.user, pass: config.password }
              : undefined,
        })
      : null;
  }

  isConfigured(): boolean {
    return this.transporter !== null;
  }

  async send(mail: OutgoingMail): Promise<void> {
    if (!this.transporter) {
      this.logger.warn(
        { to: mail.to, subject: mail.subject },
        'SMTP is not configured, mail not sent',
      );
      return;
    }

    try {
      await this.transporter.sendMail({ from: this.config.from, ...mail });
      this.logger.info({ to: mail.to, subject: mail.subject }, 'Mail sent');
    } catch (error) {
      this.logger.error(
        {
          to: mail.to,
          subject: mail.subject,
          error: error instanceof Error ? error.message : String(error),
        },
        'Failed to send mail',
      );
      throw error;
    }
  }

  sendPasswordReset(email: string, token: string): Promise<void> {
    return this.send({
      to: email,
      subject: 'Password Reset Request',
      text: `Use this token to reset your password: ${token}`,
    });
  }
}
