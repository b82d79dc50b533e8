/**
 * Digest email delivery over SMTP
 */

import { createTransport, type Transporter } from 'nodemailer';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';

export interface DigestEmail {
  subject: string;
  html: string;
}

export interface SendResult {
  sent: boolean;
  messageId?: string;
}

/**
 * Check if email delivery is configured
 */
export function isEmailAvailable(): boolean {
  const { host, user, password, from, to } = config.email;
  return Boolean(host && user && password && from && to);
}

function createMailTransport(): Transporter {
  const { host, port, secure, user, password } = config.email;
  if (!host || !user || !password) {
    throw new Error('SMTP_HOST, SMTP_USER and SMTP_PASSWORD must be configured');
  }

  return createTransport({
    host,
    port,
    secure,
    auth: { user, pass: password },
  });
}

export async function sendDigestEmail(
  email: DigestEmail,
  transport: Pick<Transporter, 'sendMail'> = createMailTransport()
): Promise<SendResult> {
  const { from, to } = config.email;
  if (!from || !to) {
    throw new Error('DIGEST_FROM and DIGEST_TO must be configured');
  }

  const info: { messageId?: string } = await transport.sendMail({
    from,
    to,
    subject: email.subject,
    html: email.html,
  });
  logger.info({ to, messageId: info.messageId }, 'Digest email sent');

  return { sent: true, messageId: info.messageId };
}
