/**
 * Mailbox Monitoring Service
 * Polls registered accounts through the gateway and reports new messages.
 * Polls go through the facade, so they queue behind other work on the
 * same account and obey the operation timeout.
 */

import { EventEmitter } from 'events';
import { classifyError } from './error-classifier';
import { GatewayError, accountNotFound } from './gateway-errors';
import { GatewayLogger, gatewayLogger } from './gateway-logger';
import type { MailGateway } from './mail-gateway';
import { normalizeEmail } from './providers';
import type { MailboxCursor, MessageSummary } from '../types/gateway';

export interface MonitorConfig {
  pollInterval?: number; // ms between polls
  folder?: string;
  logger?: GatewayLogger;
}

export interface MonitorStatus {
  email: string;
  folder: string;
  status: 'active' | 'error';
  lastPoll?: Date;
  lastError?: string;
  messagesReceived: number;
}

export interface MessageReceivedEvent {
  email: string;
  message: MessageSummary;
}

export interface MonitorErrorEvent {
  email: string;
  error: GatewayError;
}

interface MonitorEntry {
  status: MonitorStatus;
  cursor: MailboxCursor | null;
  timer: NodeJS.Timeout | null;
  polling: Promise<MessageSummary[]> | null;
}

// Events:
//   'message.received': (event: MessageReceivedEvent) => void
//   'monitor.error': (event: MonitorErrorEvent) => void
export class MailboxMonitor extends EventEmitter {
  private monitors: Map<string, MonitorEntry> = new Map();
  private gateway: MailGateway;
  private pollInterval: number;
  private folder: string;
  private logger: GatewayLogger;
  private onAccountRemoved = ({ email }: { email: string }) => {
    this.stopMonitoring(email);
  };

  constructor(gateway: MailGateway, config: MonitorConfig = {}) {
    super();
    this.gateway = gateway;
    this.pollInterval = config.pollInterval ?? 60000;
    this.folder = config.folder ?? 'INBOX';
    this.logger = config.logger || gatewayLogger;
    this.gateway.on('account.removed', this.onAccountRemoved);
  }

  /**
   * Start monitoring an account. The first poll only records where the
   * folder currently ends; messages already there are not reported.
   */
  async startMonitoring(rawEmail: string, folder: string = this.folder): Promise<void> {
    const email = normalizeEmail(rawEmail);
    if (this.monitors.has(email)) {
      return;
    }
    if (!this.gateway.hasAccount(email)) {
      throw accountNotFound(email);
    }

    const entry: MonitorEntry = {
      status: { email, folder, status: 'active', messagesReceived: 0 },
      cursor: null,
      timer: null,
      polling: null
    };
    this.monitors.set(email, entry);

    await this.pollOnce(email);

    if (this.monitors.get(email) === entry) {
      entry.timer = setInterval(() => {
        this.pollOnce(email).catch((error: unknown) => this.reportError(email, error));
      }, this.pollInterval);
      entry.timer.unref();
    }

    this.logger.log(email, {
      level: 'info',
      command: 'MONITOR_START',
      data: { parsed: { folder, pollInterval: this.pollInterval } }
    });
  }

  stopMonitoring(rawEmail: string): boolean {
    const email = normalizeEmail(rawEmail);
    const entry = this.monitors.get(email);
    if (!entry) {
      return false;
    }

    if (entry.timer) {
      clearInterval(entry.timer);
    }
    this.monitors.delete(email);
    this.logger.log(email, { level: 'info', command: 'MONITOR_STOP', data: {} });
    return true;
  }

  stopAll(): void {
    for (const email of Array.from(this.monitors.keys())) {
      this.stopMonitoring(email);
    }
  }

  /**
   * Stops every monitor and detaches from the gateway.
   */
  dispose(): void {
    this.stopAll();
    this.gateway.off('account.removed', this.onAccountRemoved);
  }

  getStatus(): MonitorStatus[] {
    return Array.from(this.monitors.values()).map(entry => ({ ...entry.status }));
  }

  getAccountStatus(rawEmail: string): MonitorStatus | undefined {
    const entry = this.monitors.get(normalizeEmail(rawEmail));
    return entry ? { ...entry.status } : undefined;
  }

  isMonitoring(rawEmail: string): boolean {
    return this.monitors.has(normalizeEmail(rawEmail));
  }

  /**
   * Runs one poll now. Concurrent calls share the poll already running.
   * Failures are reported through `monitor.error`, never thrown.
   */
  pollOnce(rawEmail: string): Promise<MessageSummary[]> {
    const email = normalizeEmail(rawEmail);
    const entry = this.monitors.get(email);
    if (!entry) {
      return Promise.resolve([]);
    }
    if (entry.polling) {
      return entry.polling;
    }

    entry.polling = this.poll(email, entry).finally(() => {
      entry.polling = null;
    });
    return entry.polling;
  }

  private async poll(email: string, entry: MonitorEntry): Promise<MessageSummary[]> {
    try {
      const result = await this.gateway.checkForNewMessages(email, entry.status.folder, entry.cursor);

      // Stopped while the poll was running
      if (this.monitors.get(email) !== entry) {
        return [];
      }

      entry.cursor = result.cursor;
      entry.status.status = 'active';
      entry.status.lastPoll = new Date();
      entry.status.lastError = undefined;
      entry.status.messagesReceived += result.messages.length;

      if (result.messages.length > 0) {
        this.logger.log(email, {
          level: 'info',
          command: 'MONITOR_NEW_MESSAGES',
          data: { parsed: { count: result.messages.length, lastUid: result.cursor.lastUid } }
        });
      }

      for (const message of result.messages) {
        const event: MessageReceivedEvent = { email, message };
        this.emit('message.received', event);
      }

      return result.messages;
    } catch (error) {
      this.reportError(email, error);
      return [];
    }
  }

  private reportError(email: string, error: unknown): void {
    const classified = classifyError(error, { email });
    const entry = this.monitors.get(email);

    if (entry) {
      entry.status.status = 'error';
      entry.status.lastError = classified.message;
    }

    if (classified.code === 'ACCOUNT_NOT_FOUND') {
      this.stopMonitoring(email);
    }

    const event: MonitorErrorEvent = { email, error: classified };
    this.emit('monitor.error', event);
  }
}
