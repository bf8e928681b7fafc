import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import sgMail from '@sendgrid/mail';
import Handlebars from 'handlebars';
import { env } from '../../config/env.js';
import { repositories } from '../../repositories/index.js';
import type { EmailLogRecord } from '../../repositories/index.js';
import { EmailLogStatus } from '../../utils/constants.js';
import { logger } from '../../utils/logger.js';

const useSendGridApi = env.EMAIL_PROVIDER === 'sendgrid_api';

if (useSendGridApi) {
  sgMail.setApiKey(env.SENDGRID_API_KEY);
}

const transporter: Transporter | null = useSendGridApi
  ? null
  : nodemailer.createTransport({
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      secure: env.SMTP_PORT === 465,
      auth: env.SMTP_USER
        ? {
            user: env.SMTP_USER,
            pass: env.SMTP_PASS,
          }
        : undefined,
    });

const layout = (title: string, body: string) => `
    <div style="font-family: Arial, sans-serif; max-width: 500px; margin: 0 auto; padding: 20px;">
      <div style="text-align: center; padding: 20px; background: #1f3a5f; color: white; border-radius: 8px 8px 0 0;">
        <h1 style="margin: 0;">{{appName}}</h1>
      </div>
      <div style="padding: 30px; background: #f9f9f9; border-radius: 0 0 8px 8px;">
        <h2>${title}</h2>
        ${body}
      </div>
    </div>
  `;

// Template definitions
const templates: Record<string, string> = {
  verification: layout(
    'Welcome!',
    `<p>To confirm your registration, follow the link:</p>
        <p style="text-align: center; margin: 24px 0;">
          <a href="{{link}}" style="padding: 12px 24px; background: #1f3a5f; color: white; border-radius: 6px; text-decoration: none;">Confirm email</a>
        </p>
        <p style="color: #666;">This link expires in {{expiresIn}}.</p>`,
  ),
  password_reset: layout(
    'Password reset',
    `<p>To reset your password, follow the link:</p>
        <p style="text-align: center; margin: 24px 0;">
          <a href="{{link}}" style="padding: 12px 24px; background: #1f3a5f; color: white; border-radius: 6px; text-decoration: none;">Reset password</a>
        </p>
        <p style="color: #666;">This link expires in {{expiresIn}}. If you didn't request this, ignore this email.</p>`,
  ),
};

// Compile templates
const compiledTemplates: Record<string, Handlebars.TemplateDelegate> = {};
for (const [key, html] of Object.entries(templates)) {
  compiledTemplates[key] = Handlebars.compile(html);
}

// Retry config
export const RETRY_DELAYS = [60 * 1000, 5 * 60 * 1000, 15 * 60 * 1000]; // 1min, 5min, 15min
export const MAX_ATTEMPTS = RETRY_DELAYS.length + 1;
// A claimed log is left alone by other runs until this long after the claim
const RETRY_LEASE_MS = 15 * 60 * 1000;

export function renderTemplate(templateKey: string, data: Record<string, string>): string {
  const template = compiledTemplates[templateKey];
  if (!template) {
    throw new Error(`Unknown email template: ${templateKey}`);
  }
  return template({ appName: env.SMTP_FROM_NAME, ...data });
}

async function sendWithProvider(to: string, subject: string, html: string): Promise<void> {
  if (useSendGridApi) {
    await sgMail.send({
      to,
      from: {
        email: env.SMTP_FROM_EMAIL,
        name: env.SMTP_FROM_NAME,
      },
      subject,
      html,
    });
    return;
  }

  if (!transporter) {
    throw new Error('SMTP transporter is not configured');
  }

  await transporter.sendMail({
    to,
    from: `"${env.SMTP_FROM_NAME}" <${env.SMTP_FROM_EMAIL}>`,
    subject,
    html,
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Core send function. Delivery failures are recorded for retry, never thrown.
async function sendEmail(
  to: string,
  subject: string,
  templateKey: string,
  data: Record<string, string>,
): Promise<EmailLogRecord> {
  const html = renderTemplate(templateKey, data);
  const { emailLogs } = repositories();

  const emailLog = await emailLogs.create({ to, subject, template: templateKey, data });

  try {
    await sendWithProvider(to, subject, html);
    return (
      (await emailLogs.update(emailLog.id, {
        status: EmailLogStatus.SENT,
        attempts: 1,
        lastAttemptAt: new Date(),
      })) ?? emailLog
    );
  } catch (error) {
    logger.error('Email send failed:', { to, subject, error: errorMessage(error) });
    return (
      (await emailLogs.update(emailLog.id, {
        status: EmailLogStatus.FAILED,
        attempts: 1,
        lastAttemptAt: new Date(),
        errorMessage: errorMessage(error),
        nextRetryAt: new Date(Date.now() + RETRY_DELAYS[0]),
      })) ?? emailLog
    );
  }
}

// Public email functions

export async function sendVerificationEmail(to: string, link: string): Promise<EmailLogRecord> {
  return sendEmail(to, 'Confirmation of registration', 'verification', {
    link,
    expiresIn: `${env.VERIFICATION_TOKEN_EXPIRE_HOURS} hours`,
  });
}

export async function sendPasswordResetEmail(to: string, link: string): Promise<EmailLogRecord> {
  return sendEmail(to, 'Password reset instructions', 'password_reset', {
    link,
    expiresIn: `${env.RESET_TOKEN_EXPIRE_MINUTES} minutes`,
  });
}

// Retry processor (called on an interval by the server)
export async function processEmailRetries(): Promise<number> {
  const { emailLogs } = repositories();
  const due = await emailLogs.findDueForRetry(new Date(), MAX_ATTEMPTS);
  let delivered = 0;

  for (const candidate of due) {
    const emailLog = await emailLogs.claimForRetry(
      candidate.id,
      candidate.attempts,
      new Date(Date.now() + RETRY_LEASE_MS),
    );
    if (!emailLog) continue;

    const { attempts } = emailLog;
    try {
      const html = renderTemplate(emailLog.template, emailLog.data);
      await sendWithProvider(emailLog.to, emailLog.subject, html);

      await emailLogs.update(emailLog.id, {
        status: EmailLogStatus.SENT,
        nextRetryAt: null,
        errorMessage: null,
      });
      delivered += 1;
    } catch (error) {
      const retryDelay = RETRY_DELAYS[attempts - 1];
      await emailLogs.update(emailLog.id, {
        errorMessage: errorMessage(error),
        nextRetryAt: retryDelay !== undefined ? new Date(Date.now() + retryDelay) : null,
      });
      logger.warn('Email retry failed', { to: emailLog.to, attempts, error: errorMessage(error) });
    }
  }

  return delivered;
}
