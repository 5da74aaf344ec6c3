import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { Logger } from 'pino';
import type { Notifier } from '../../domain/index.js';
import type { AppConfig } from '../config/index.js';

export type EmailConfig = AppConfig['email'];

/** Port on which SMTP speaks TLS from the first byte; others upgrade via STARTTLS. */
const IMPLICIT_TLS_PORT = 465;

function isComplete(config: EmailConfig): boolean {
  return config.smtp_user !== '' && config.smtp_pass !== '' && config.recipient !== '';
}

/**
 * Sends alert emails to the single configured recipient over SMTP.
 *
 * The transport is only built when credentials and recipient are all
 * present. Without them every send resolves `false` with a warning, so
 * incomplete configuration surfaces at send time, not at startup.
 *
 * Connection, greeting and socket timeouts bound each send.
 */
export class EmailNotifier implements Notifier {
  private readonly transporter: Transporter | null;

  constructor(
    private readonly config: EmailConfig,
    private readonly log: Logger,
  ) {
    this.transporter = isComplete(config)
      ? nodemailer.createTransport({
          host: config.smtp_host,
          port: config.smtp_port,
          secure: config.smtp_port === IMPLICIT_TLS_PORT,
          requireTLS: config.smtp_port !== IMPLICIT_TLS_PORT,
          auth: { user: config.smtp_user, pass: config.smtp_pass },
          connectionTimeout: config.timeout_ms,
          greetingTimeout: config.timeout_ms,
          socketTimeout: config.timeout_ms,
        })
      : null;
  }

  async send(subject: string, body: string): Promise<boolean> {
    if (this.transporter === null) {
      this.log.warn(
        { smtp_host: this.config.smtp_host },
        'SMTP credentials or alert recipient missing, cannot send email',
      );
      return false;
    }

    try {
      await this.transporter.sendMail({
        from: this.config.smtp_user,
        to: this.config.recipient,
        subject,
        text: body,
      });
      this.log.info({ recipient: this.config.recipient }, 'Alert email sent');
      return true;
    } catch (err: unknown) {
      this.log.warn(
        { err, recipient: this.config.recipient, smtp_host: this.config.smtp_host },
        'Failed to send alert email',
      );
      return false;
    }
  }
}
