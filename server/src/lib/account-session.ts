import { abortReason } from './backoff';
import type { ImapTransport, OutboundTransport } from './transports';
import type { ResolvedAccount, SessionState } from '../types/gateway';

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * FIFO mutex. Ownership passes directly from the releasing holder to the
 * oldest waiter, so a late arrival can never overtake the queue.
 */
export class SessionLock {
  private held = false;
  private waiters: Waiter[] = [];

  get isHeld(): boolean {
    return this.held;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };

      if (signal) {
        waiter.onAbort = () => {
          this.waiters = this.waiters.filter(w => w !== waiter);
          reject(abortReason(signal));
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.waiters.push(waiter);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (!next) {
      this.held = false;
      return;
    }

    detach(next);
    next.resolve();
  }

  rejectAll(error: Error): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      detach(waiter);
      waiter.reject(error);
    }
  }
}

function detach(waiter: Waiter): void {
  if (waiter.signal && waiter.onAbort) {
    waiter.signal.removeEventListener('abort', waiter.onAbort);
  }
}

/**
 * Exclusive access to one account's IMAP connection for one operation.
 * The connection is only valid until the handle is released or invalidated.
 */
export interface SessionHandle {
  readonly email: string;
  readonly connection: ImapTransport;
  readonly signal?: AbortSignal;
}

export interface OutboundHandle {
  readonly email: string;
  readonly from: string;
  readonly transport: OutboundTransport;
  readonly signal?: AbortSignal;
}

/**
 * Live protocol state for one account. Owned by SessionPool.
 */
export class AccountSession {
  readonly email: string;
  account: ResolvedAccount;
  state: SessionState = 'disconnected';
  connection: ImapTransport | null = null;
  activeHandle: SessionHandle | null = null;
  failures = 0;
  lastUsed = Date.now();
  readonly lock = new SessionLock();
  readonly outboundLock = new SessionLock();

  constructor(account: ResolvedAccount) {
    this.email = account.email;
    this.account = account;
  }

  isClosed(): boolean {
    return this.state === 'closed';
  }
}
