import { EventEmitter } from 'events';
import { AccountSession, OutboundHandle, SessionHandle } from './account-session';
import { DEFAULT_RETRY_POLICY, RetryPolicy, abortReason, computeBackoffDelay, sleep, untilAborted } from './backoff';
import { classifyError } from './error-classifier';
import { GatewayError, accountNotFound } from './gateway-errors';
import { GatewayLogger, gatewayLogger } from './gateway-logger';
import type { ImapTransport, ImapTransportFactory, OutboundTransportFactory } from './transports';
import type { ResolvedAccount, SessionState } from '../types/gateway';

export interface SessionPoolOptions {
  createTransport: ImapTransportFactory;
  createOutbound: OutboundTransportFactory;
  retryPolicy?: RetryPolicy;
  idleTimeout?: number; // ms before an unused connection is closed; 0 keeps connections open
  logger?: GatewayLogger;
}

export interface SessionStateChange {
  email: string;
  from: SessionState;
  to: SessionState;
}

export interface PoolStats {
  totalSessions: number;
  connectedSessions: number;
  busySessions: number;
  queuedRequests: number;
}

function sessionClosed(email: string): GatewayError {
  return new GatewayError('not_found', `Session for ${email} was closed`, {
    email,
    code: 'SESSION_CLOSED'
  });
}

/**
 * Owns every AccountSession. acquire/release/invalidate/remove are the only
 * ways to touch a session, and each account is serialised by its own lock.
 */
export class SessionPool extends EventEmitter {
  private sessions: Map<string, AccountSession> = new Map();
  private handleOwners = new WeakMap<SessionHandle, AccountSession>();
  private outboundOwners = new WeakMap<OutboundHandle, AccountSession>();
  private createTransport: ImapTransportFactory;
  private createOutbound: OutboundTransportFactory;
  private retryPolicy: RetryPolicy;
  private idleTimeout: number;
  private logger: GatewayLogger;
  private idleTimer: NodeJS.Timeout | null = null;

  constructor(options: SessionPoolOptions) {
    super();
    this.createTransport = options.createTransport;
    this.createOutbound = options.createOutbound;
    this.retryPolicy = options.retryPolicy || DEFAULT_RETRY_POLICY;
    this.idleTimeout = options.idleTimeout ?? 0;
    this.logger = options.logger || gatewayLogger;

    if (this.idleTimeout > 0) {
      this.startIdleCleanup();
    }
  }

  /**
   * Registers a session in `disconnected`. An existing session for the same
   * account is torn down first.
   */
  async open(account: ResolvedAccount): Promise<void> {
    if (this.sessions.has(account.email)) {
      await this.remove(account.email);
    }

    this.sessions.set(account.email, new AccountSession(account));
    this.logger.registerSecret(account.secret);
    this.logPoolEvent('session_opened', account.email, { provider: account.profile.provider });
  }

  has(email: string): boolean {
    return this.sessions.has(email);
  }

  getState(email: string): SessionState | undefined {
    return this.sessions.get(email)?.state;
  }

  async acquire(email: string, signal?: AbortSignal): Promise<SessionHandle> {
    const session = this.sessions.get(email);
    if (!session) {
      throw accountNotFound(email);
    }

    await session.lock.acquire(signal);

    try {
      if (session.isClosed()) {
        throw sessionClosed(email);
      }

      if (!session.connection || !session.connection.isConnected() || session.state === 'disconnected') {
        await this.connect(session, signal);
      }

      if (signal?.aborted) {
        throw abortReason(signal);
      }
    } catch (error) {
      session.lock.release();
      throw error;
    }

    const connection = session.connection;
    if (!connection) {
      session.lock.release();
      throw sessionClosed(email);
    }

    const handle: SessionHandle = { email, connection, signal };
    session.activeHandle = handle;
    this.handleOwners.set(handle, session);
    this.setState(session, 'busy');

    this.logPoolEvent('session_acquired', email, { queued: session.lock.queueLength });
    return handle;
  }

  /**
   * Returns the session to `ready` and wakes the next waiter. Releasing a
   * handle that was invalidated or whose session was removed does nothing.
   */
  release(handle: SessionHandle): void {
    const session = this.handleOwners.get(handle);
    if (!session || session.activeHandle !== handle) {
      return;
    }

    session.activeHandle = null;
    session.lastUsed = Date.now();
    this.handleOwners.delete(handle);

    if (session.connection?.isConnected()) {
      this.setState(session, 'ready');
    } else {
      session.connection = null;
      this.setState(session, 'disconnected');
    }

    session.lock.release();
    this.logPoolEvent('session_released', session.email, { queued: session.lock.queueLength });
  }

  /**
   * Forces `disconnected` and drops the connection. The in-flight handle, if
   * any, loses its lock and its later release is ignored. Passing the failure
   * counts it toward reconnect backoff.
   */
  invalidate(email: string, failure?: GatewayError): void {
    const session = this.sessions.get(email);
    if (!session || session.isClosed()) {
      return;
    }

    if (failure) {
      session.failures++;
    }

    this.dropConnection(session);
    this.setState(session, 'disconnected');

    const handle = session.activeHandle;
    if (handle) {
      session.activeHandle = null;
      this.handleOwners.delete(handle);
      session.lock.release();
    }

    this.logPoolEvent('session_invalidated', email, {
      failure: failure?.code,
      failures: session.failures
    });
  }

  /**
   * Invalidates on behalf of a handle holder. Does nothing once the handle
   * has gone stale, so a late failure cannot disturb the next holder.
   */
  discard(handle: SessionHandle, failure?: GatewayError): void {
    const session = this.handleOwners.get(handle);
    if (!session || session.activeHandle !== handle) {
      return;
    }
    this.invalidate(session.email, failure);
  }

  /**
   * Moves the session to `closed` and forgets it. Queued callers are rejected.
   * Resolves without waiting for the server to acknowledge the logout.
   */
  async remove(email: string): Promise<boolean> {
    const session = this.sessions.get(email);
    if (!session) {
      return false;
    }

    this.sessions.delete(email);
    this.setState(session, 'closed');

    if (session.activeHandle) {
      this.handleOwners.delete(session.activeHandle);
      session.activeHandle = null;
    }

    const error = sessionClosed(email);
    session.lock.rejectAll(error);
    session.outboundLock.rejectAll(error);

    // The peer's answer to LOGOUT is not awaited
    this.dropConnection(session);

    this.logger.forgetSecret(session.account.secret);
    this.logPoolEvent('session_removed', email, {});
    return true;
  }

  /**
   * Swaps the secret once any in-flight operation has finished; the next
   * acquisition reconnects with it.
   */
  async updateSecret(email: string, secret: string, signal?: AbortSignal): Promise<void> {
    const session = this.sessions.get(email);
    if (!session) {
      throw accountNotFound(email);
    }

    await session.lock.acquire(signal);
    try {
      if (session.isClosed()) {
        throw sessionClosed(email);
      }
      this.logger.forgetSecret(session.account.secret);
      session.account = { ...session.account, secret };
      this.logger.registerSecret(secret);
      session.failures = 0;
      this.dropConnection(session);
      this.setState(session, 'disconnected');
    } finally {
      session.lock.release();
    }

    this.logPoolEvent('secret_rotated', email, {});
  }

  /**
   * Opens a fresh outbound connection for one send. Sends for the same
   * account queue behind each other; they never wait for IMAP work.
   */
  async acquireOutbound(email: string, signal?: AbortSignal): Promise<OutboundHandle> {
    const session = this.sessions.get(email);
    if (!session) {
      throw accountNotFound(email);
    }

    await session.outboundLock.acquire(signal);

    if (session.isClosed()) {
      session.outboundLock.release();
      throw sessionClosed(email);
    }

    let handle: OutboundHandle;
    try {
      handle = {
        email,
        from: session.account.email,
        transport: this.createOutbound(session.account),
        signal
      };
    } catch (error) {
      session.outboundLock.release();
      throw error;
    }

    this.outboundOwners.set(handle, session);
    this.logPoolEvent('outbound_opened', email, {});
    return handle;
  }

  releaseOutbound(handle: OutboundHandle): void {
    const session = this.outboundOwners.get(handle);
    if (!session) {
      return;
    }

    this.outboundOwners.delete(handle);

    try {
      handle.transport.close();
    } catch (error) {
      this.logPoolEvent('outbound_close_failed', handle.email, {
        error: error instanceof Error ? error.message : String(error)
      });
    }

    session.outboundLock.release();
    this.logPoolEvent('outbound_closed', handle.email, {});
  }

  private async connect(session: AccountSession, signal?: AbortSignal): Promise<void> {
    const { email } = session;
    const secrets = [session.account.secret];
    const { maxAttempts } = this.retryPolicy;
    let lastError: GatewayError | null = null;

    this.setState(session, 'connecting');
    this.dropConnection(session);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const delay = computeBackoffDelay(session.failures, this.retryPolicy);

      try {
        if (delay > 0) {
          this.logPoolEvent('reconnect_backoff', email, { attempt, delay });
          await sleep(delay, signal);
        }

        const connection = this.createTransport(session.account);
        try {
          await untilAborted(connection.connect(), signal);
        } catch (error) {
          this.disconnectQuietly(email, connection);
          throw error;
        }

        if (session.isClosed()) {
          this.disconnectQuietly(email, connection);
          throw sessionClosed(email);
        }

        this.attach(session, connection);
        session.connection = connection;
        session.failures = 0;
        this.setState(session, 'ready');
        this.logPoolEvent('connection_created', email, { attempt });
        return;
      } catch (error) {
        const classified = classifyError(error, { email, secrets });
        lastError = classified;

        if (signal?.aborted || session.isClosed()) {
          this.settleAfterFailedConnect(session);
          throw classified;
        }

        session.failures++;
        const retryable = classified.kind !== 'authentication' && classified.kind !== 'configuration';

        this.logPoolEvent('connection_failed', email, {
          error: classified.message,
          attempt,
          willRetry: retryable && attempt < maxAttempts
        });

        if (!retryable) {
          this.settleAfterFailedConnect(session);
          throw classified;
        }
      }
    }

    this.settleAfterFailedConnect(session);
    throw new GatewayError(
      'connection',
      `Failed to connect after ${maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
      { email, code: 'CONNECTION_FAILED', causeDescription: lastError?.causeDescription }
    );
  }

  private settleAfterFailedConnect(session: AccountSession): void {
    if (!session.isClosed()) {
      this.setState(session, 'disconnected');
    }
  }

  private attach(session: AccountSession, connection: ImapTransport): void {
    connection.on('close', (hadError: boolean) => {
      if (session.connection !== connection) {
        return;
      }
      // A busy session finds out on release
      if (session.state === 'ready') {
        session.connection = null;
        this.setState(session, 'disconnected');
      }
      this.logPoolEvent('connection_closed', session.email, { hadError });
    });

    connection.on('error', (err: Error) => {
      this.logPoolEvent('connection_error', session.email, { error: err.message });
    });
  }

  private dropConnection(session: AccountSession): void {
    const connection = session.connection;
    session.connection = null;
    if (connection) {
      this.disconnectQuietly(session.email, connection);
    }
  }

  private disconnectQuietly(email: string, connection: ImapTransport): void {
    connection.removeAllListeners('close');
    connection.disconnect().catch((err: unknown) => {
      this.logPoolEvent('disconnect_failed', email, {
        error: err instanceof Error ? err.message : String(err)
      });
    });
  }

  private setState(session: AccountSession, to: SessionState): void {
    const from = session.state;
    if (from === to) {
      return;
    }
    session.state = to;
    const change: SessionStateChange = { email: session.email, from, to };
    this.emit('state', change);
  }

  private startIdleCleanup(): void {
    const interval = Math.min(60000, this.idleTimeout);
    this.idleTimer = setInterval(() => this.closeIdleConnections(), interval);
    this.idleTimer.unref();
  }

  closeIdleConnections(now: number = Date.now()): number {
    let closed = 0;

    for (const session of this.sessions.values()) {
      if (session.state === 'ready' &&
          !session.lock.isHeld &&
          now - session.lastUsed > this.idleTimeout) {
        this.dropConnection(session);
        this.setState(session, 'disconnected');
        this.logPoolEvent('connection_idle_closed', session.email, {
          idleTime: now - session.lastUsed
        });
        closed++;
      }
    }

    return closed;
  }

  async closeAll(): Promise<void> {
    if (this.idleTimer) {
      clearInterval(this.idleTimer);
      this.idleTimer = null;
    }

    const emails = Array.from(this.sessions.keys());
    await Promise.allSettled(emails.map(email => this.remove(email)));
  }

  getPoolStats(): PoolStats {
    let connectedSessions = 0;
    let busySessions = 0;
    let queuedRequests = 0;

    for (const session of this.sessions.values()) {
      if (session.connection?.isConnected()) {
        connectedSessions++;
      }
      if (session.state === 'busy') {
        busySessions++;
      }
      queuedRequests += session.lock.queueLength;
    }

    return {
      totalSessions: this.sessions.size,
      connectedSessions,
      busySessions,
      queuedRequests
    };
  }

  private logPoolEvent(event: string, email: string, data: Record<string, unknown>): void {
    this.logger.log(email, {
      level: event.endsWith('failed') ? 'warn' : 'debug',
      command: `POOL_${event.toUpperCase()}`,
      data: { parsed: data }
    });
  }
}
