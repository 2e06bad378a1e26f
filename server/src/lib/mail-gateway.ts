import { EventEmitter } from 'events';
import type { OutboundHandle, SessionHandle } from './account-session';
import { DEFAULT_RETRY_POLICY, RetryPolicy, untilAborted } from './backoff';
import {
  DEFAULT_QUERY_LIMITS,
  FetchBodyOptions,
  MessageQueryInput,
  NewMessages,
  QueryLimits,
  createMessageQuery,
  fetchBody,
  listFolders,
  listMessages,
  listSince,
  sendMessage,
  sendRawMessage
} from './command-translator';
import { classifyError } from './error-classifier';
import { GatewayError, accountNotFound } from './gateway-errors';
import { GatewayLogger, gatewayLogger } from './gateway-logger';
import { ImapConnection } from './imap-connection';
import { ProviderDirectory, defaultProviderDirectory, normalizeEmail } from './providers';
import { PoolStats, SessionPool, SessionStateChange } from './session-pool';
import { SmtpTransport } from './smtp-transport';
import type { ImapTransportFactory, MailboxFolder, OutboundTransportFactory } from './transports';
import type {
  AccountCredentials,
  AccountInfo,
  ComposedMessage,
  MailboxCursor,
  MessageBody,
  MessageQuery,
  MessageSummary,
  RawMessage,
  ResolvedAccount,
  SendResult,
  SessionState
} from '../types/gateway';

export interface MailGatewayOptions {
  createTransport?: ImapTransportFactory;
  createOutbound?: OutboundTransportFactory;
  providers?: ProviderDirectory;
  operationTimeoutMs?: number;
  retryPolicy?: RetryPolicy;
  idleTimeoutMs?: number;
  queryLimits?: QueryLimits;
  logger?: GatewayLogger;
}

export interface FetchMessageOptions extends FetchBodyOptions {
  folder?: string;
}

export interface MessageSentEvent {
  email: string;
  messageId: string;
  accepted: string[];
  rejected: string[];
  raw?: boolean;
}

interface OperationContext {
  signal: AbortSignal;
  handle: SessionHandle | null;
}

export const DEFAULT_OPERATION_TIMEOUT_MS = 30000;

// Failures that say nothing about the health of the connection
function keepsSession(error: GatewayError): boolean {
  return error.kind === 'not_found' || error.kind === 'configuration';
}

/**
 * Single entry point for account lifecycle and message operations.
 *
 * Every operation is bounded by `operationTimeoutMs`, holds the account's
 * session for no longer than it runs, and fails only with GatewayError.
 *
 * Events: `account.added` (AccountInfo), `account.removed` ({ email }),
 * `message.sent` (MessageSentEvent), `session.state` (SessionStateChange).
 */
export class MailGateway extends EventEmitter {
  private accounts: Map<string, ResolvedAccount> = new Map();
  private pending: Map<string, ResolvedAccount> = new Map();
  private pool: SessionPool;
  private providers: ProviderDirectory;
  private operationTimeoutMs: number;
  private queryLimits: QueryLimits;
  private logger: GatewayLogger;

  constructor(options: MailGatewayOptions = {}) {
    super();
    this.logger = options.logger || gatewayLogger;
    this.providers = options.providers || defaultProviderDirectory;
    this.operationTimeoutMs = options.operationTimeoutMs || DEFAULT_OPERATION_TIMEOUT_MS;
    this.queryLimits = options.queryLimits || DEFAULT_QUERY_LIMITS;

    const logger = this.logger;
    this.pool = new SessionPool({
      createTransport: options.createTransport || (account => new ImapConnection(account, logger)),
      createOutbound: options.createOutbound || (account => new SmtpTransport(account, logger)),
      retryPolicy: options.retryPolicy || DEFAULT_RETRY_POLICY,
      idleTimeout: options.idleTimeoutMs,
      logger
    });

    this.pool.on('state', (change: SessionStateChange) => {
      this.emit('session.state', change);
    });
  }

  /**
   * Registers an account after proving its credentials with a live login.
   * Nothing stays registered when the login fails.
   */
  async addAccount(credentials: AccountCredentials): Promise<AccountInfo> {
    let account: ResolvedAccount;
    try {
      account = this.providers.resolveAccount(credentials);
    } catch (error) {
      throw classifyError(error, { secrets: [credentials.secret] });
    }

    const { email } = account;
    if (this.accounts.has(email) || this.pending.has(email)) {
      throw new GatewayError('configuration', `Account ${email} is already registered`, {
        email,
        code: 'ACCOUNT_EXISTS'
      });
    }

    this.pending.set(email, account);
    try {
      await this.pool.open(account);
      await this.runWithTimeout(email, 'ADD_ACCOUNT', async (context) => {
        const handle = await this.pool.acquire(email, context.signal);
        this.pool.release(handle);
      });
    } catch (error) {
      await this.pool.remove(email);
      throw this.classify(error, email);
    } finally {
      this.pending.delete(email);
    }

    this.accounts.set(email, account);
    const info = this.describe(account);
    this.emit('account.added', info);
    return info;
  }

  /**
   * Idempotent. Returns whether an account was actually removed.
   */
  async removeAccount(rawEmail: string): Promise<boolean> {
    const email = normalizeEmail(rawEmail);
    const existed = this.accounts.delete(email);
    await this.pool.remove(email);

    if (existed) {
      this.logger.log(email, { level: 'info', command: 'GATEWAY_REMOVE_ACCOUNT', data: {} });
      this.emit('account.removed', { email });
    }
    return existed;
  }

  async listMessages(rawEmail: string, query: MessageQueryInput): Promise<MessageSummary[]> {
    const email = this.requireAccount(rawEmail);
    let normalized: MessageQuery;
    try {
      normalized = createMessageQuery(query, this.queryLimits);
    } catch (error) {
      throw this.classify(error, email);
    }
    return this.withSession(email, 'LIST_MESSAGES', handle => listMessages(handle, normalized));
  }

  async fetchMessage(rawEmail: string, messageId: string, options: FetchMessageOptions = {}): Promise<MessageBody> {
    const email = this.requireAccount(rawEmail);
    const folder = options.folder || 'INBOX';
    return this.withSession(email, 'FETCH_MESSAGE', handle => fetchBody(handle, folder, messageId, options));
  }

  async listFolders(rawEmail: string): Promise<MailboxFolder[]> {
    const email = this.requireAccount(rawEmail);
    return this.withSession(email, 'LIST_FOLDERS', handle => listFolders(handle));
  }

  /**
   * New messages since `cursor`; pass null to establish a starting point.
   */
  async checkForNewMessages(rawEmail: string, folder: string, cursor: MailboxCursor | null): Promise<NewMessages> {
    const email = this.requireAccount(rawEmail);
    return this.withSession(email, 'CHECK_NEW_MESSAGES', handle => listSince(handle, folder, cursor));
  }

  async sendMessage(rawEmail: string, message: ComposedMessage): Promise<SendResult> {
    const email = this.requireAccount(rawEmail);
    const result = await this.deliver(email, 'SEND_MESSAGE', outbound => sendMessage(outbound, message));

    const event: MessageSentEvent = {
      email,
      messageId: result.messageId,
      accepted: result.accepted,
      rejected: result.rejected
    };
    this.emit('message.sent', event);
    return result;
  }

  /**
   * Sends an already-built RFC 5322 message to an explicit envelope. The
   * message is not re-encoded.
   */
  async sendRawMessage(rawEmail: string, message: RawMessage): Promise<SendResult> {
    const email = this.requireAccount(rawEmail);
    const result = await this.deliver(email, 'SEND_RAW_MESSAGE', outbound => sendRawMessage(outbound, message));

    const event: MessageSentEvent = {
      email,
      messageId: result.messageId,
      accepted: result.accepted,
      rejected: result.rejected,
      raw: true
    };
    this.emit('message.sent', event);
    return result;
  }

  private async deliver(
    email: string,
    operation: string,
    submit: (outbound: OutboundHandle) => Promise<SendResult>
  ): Promise<SendResult> {
    return this.runWithTimeout(email, operation, async ({ signal }) => {
      const outbound = await this.pool.acquireOutbound(email, signal);
      try {
        return await untilAborted(submit(outbound), signal);
      } finally {
        this.pool.releaseOutbound(outbound);
      }
    });
  }

  /**
   * Replaces the secret once in-flight work has drained. The next operation
   * logs in again with the new secret.
   */
  async rotateSecret(rawEmail: string, secret: string): Promise<void> {
    const email = this.requireAccount(rawEmail);
    const account = this.accounts.get(email);
    if (!account) {
      throw accountNotFound(email);
    }
    if (!secret) {
      throw new GatewayError('configuration', 'Account secret is required', { email });
    }

    await this.runWithTimeout(email, 'ROTATE_SECRET', ({ signal }) =>
      this.pool.updateSecret(email, secret, signal)
    );
    this.accounts.set(email, { ...account, secret });
  }

  listAccounts(): AccountInfo[] {
    return Array.from(this.accounts.values()).map(account => this.describe(account));
  }

  getAccount(rawEmail: string): AccountInfo {
    const email = this.requireAccount(rawEmail);
    const account = this.accounts.get(email);
    if (!account) {
      throw accountNotFound(email);
    }
    return this.describe(account);
  }

  hasAccount(rawEmail: string): boolean {
    return this.accounts.has(normalizeEmail(rawEmail));
  }

  getSessionState(rawEmail: string): SessionState | undefined {
    return this.pool.getState(normalizeEmail(rawEmail));
  }

  getPoolStats(): PoolStats {
    return this.pool.getPoolStats();
  }

  async close(): Promise<void> {
    this.accounts.clear();
    await this.pool.closeAll();
  }

  private requireAccount(rawEmail: string): string {
    const email = normalizeEmail(rawEmail);
    if (!this.accounts.has(email)) {
      throw accountNotFound(email);
    }
    return email;
  }

  private describe(account: ResolvedAccount): AccountInfo {
    return {
      email: account.email,
      username: account.username,
      authMethod: account.authMethod,
      provider: account.profile.provider,
      imap: { ...account.profile.imap },
      smtp: { ...account.profile.smtp },
      state: this.pool.getState(account.email) ?? 'disconnected'
    };
  }

  private classify(error: unknown, email: string): GatewayError {
    const secrets: string[] = [];
    const registered = this.accounts.get(email);
    const pending = this.pending.get(email);
    if (registered) {
      secrets.push(registered.secret);
    }
    if (pending) {
      secrets.push(pending.secret);
    }
    return classifyError(error, { email, secrets });
  }

  private withSession<T>(
    email: string,
    operation: string,
    task: (handle: SessionHandle) => Promise<T>
  ): Promise<T> {
    return this.runWithTimeout(email, operation, async (context) => {
      const handle = await this.pool.acquire(email, context.signal);
      context.handle = handle;

      try {
        return await untilAborted(task(handle), context.signal);
      } catch (error) {
        const classified = this.classify(error, email);
        if (!keepsSession(classified)) {
          this.pool.discard(handle, classified);
        }
        throw classified;
      } finally {
        context.handle = null;
        this.pool.release(handle);
      }
    });
  }

  /**
   * Runs `task` under the operation timeout. On expiry the signal is aborted,
   * a held session is invalidated and the caller gets a TimeoutError at once.
   */
  private async runWithTimeout<T>(
    email: string,
    operation: string,
    task: (context: OperationContext) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const context: OperationContext = { signal: controller.signal, handle: null };
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new GatewayError(
          'timeout',
          `${operation} did not complete within ${this.operationTimeoutMs}ms`,
          { email }
        );
        controller.abort(error);
        if (context.handle) {
          this.pool.discard(context.handle, error);
        }
        reject(error);
      }, this.operationTimeoutMs);
    });

    try {
      const result = await Promise.race([task(context), expired]);
      this.logger.log(email, {
        level: 'debug',
        command: `GATEWAY_${operation}`,
        data: { duration: Date.now() - startTime }
      });
      return result;
    } catch (error) {
      const classified = this.classify(error, email);
      this.logger.log(email, {
        level: classified.kind === 'internal' ? 'error' : 'warn',
        command: `GATEWAY_${operation}`,
        data: {
          error: classified.message,
          parsed: { kind: classified.kind, code: classified.code },
          duration: Date.now() - startTime
        }
      });
      throw classified;
    } finally {
      clearTimeout(timer);
    }
  }
}
