import nodemailer, { type Transporter } from 'nodemailer';
import type Mail from 'nodemailer/lib/mailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import { GatewayLogger } from './gateway-logger';
import type { OutboundDelivery, OutboundTransport } from './transports';
import type { ResolvedAccount } from '../types/gateway';

export interface SmtpTransportOptions {
  connectionTimeout?: number;
  socketTimeout?: number;
  rejectUnauthorized?: boolean;
}

function addressOf(entry: string | Mail.Address): string {
  return typeof entry === 'string' ? entry : entry.address;
}

/**
 * nodemailer-backed outbound connection. One instance sends one message.
 */
export class SmtpTransport implements OutboundTransport {
  private transporter: Transporter<SMTPTransport.SentMessageInfo>;
  private account: ResolvedAccount;
  private logger: GatewayLogger;

  constructor(account: ResolvedAccount, logger: GatewayLogger, options: SmtpTransportOptions = {}) {
    this.account = account;
    this.logger = logger;

    const endpoint = account.profile.smtp;
    const auth: SMTPTransport.Options['auth'] = account.authMethod === 'oauth2'
      ? { type: 'OAuth2', user: account.username, accessToken: account.secret }
      : { user: account.username, pass: account.secret };

    this.transporter = nodemailer.createTransport({
      host: endpoint.host,
      port: endpoint.port,
      secure: endpoint.tls === 'tls',
      requireTLS: endpoint.tls === 'starttls',
      ignoreTLS: endpoint.tls === 'none',
      auth,
      connectionTimeout: options.connectionTimeout || 10000,
      socketTimeout: options.socketTimeout || 30000,
      tls: {
        servername: endpoint.host,
        rejectUnauthorized: options.rejectUnauthorized ?? true
      }
    });
  }

  async sendMail(options: Mail.Options): Promise<OutboundDelivery> {
    const startTime = Date.now();
    const endpoint = this.account.profile.smtp;

    this.logger.log(this.account.email, {
      level: 'debug',
      command: 'SMTP_SEND',
      data: { raw: `Submitting to ${endpoint.host}:${endpoint.port}` }
    });

    const info = await this.transporter.sendMail(options);

    this.logger.log(this.account.email, {
      level: 'info',
      command: 'SMTP_SEND',
      data: {
        response: info.response,
        parsed: { accepted: info.accepted.length, rejected: info.rejected.length },
        duration: Date.now() - startTime
      }
    });

    return {
      messageId: info.messageId,
      accepted: info.accepted.map(addressOf),
      rejected: info.rejected.map(addressOf),
      response: info.response
    };
  }

  close(): void {
    this.transporter.close();
  }
}
