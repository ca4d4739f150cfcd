import { ConfigType, registerAs } from '@nestjs/config';
import { readBool, readInt, readOptional } from './env.util';

export const mailConfig = registerAs('mail', () => ({
  host: readOptional(process.env.SMTP_HOST),
  port: readInt(process.env.SMTP_PORT, 587),
  secure: readBool(process.env.SMTP_SECURE, false),
  user: readOptional(process.env.SMTP_USER),
  password: readOptional(process.env.SMTP_PASSWORD),
  from: process.env.MAIL_FROM || 'no-reply@localhost',
}));

export type MailConfig = ConfigType<typeof mailConfig>;
