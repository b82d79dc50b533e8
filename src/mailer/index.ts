/**
 * Mailer Module
 */

export { sendDigestEmail, isEmailAvailable, type DigestEmail, type SendResult } from './mailer.js';
