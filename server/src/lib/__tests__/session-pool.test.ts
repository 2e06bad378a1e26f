import { IMMEDIATE_RETRY_POLICY } from '../backoff';
import { GatewayError } from '../gateway-errors';
import { GatewayLogger } from '../gateway-logger';
import { SessionPool, SessionStateChange } from '../session-pool';
import {
  FakeImapServer,
  FakeSmtpServer,
  imapFactory,
  resolvedAccount,
  smtpFactory,
  socketError,
  testLogger
} from './test-utils';

const ALICE = 'alice@example.org';
const BOB = 'bob@example.org';

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

async function rejection(promise: Promise<unknown>): Promise<GatewayError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof GatewayError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the promise to reject');
}

describe('SessionPool', () => {
  let alice: FakeImapServer;
  let bob: FakeImapServer;
  let aliceSmtp: FakeSmtpServer;
  let logger: GatewayLogger;
  let pool: SessionPool;

  beforeEach(async () => {
    alice = new FakeImapServer({ password: 'test-secret' });
    bob = new FakeImapServer({ password: 'test-secret' });
    aliceSmtp = new FakeSmtpServer();
    logger = testLogger();
    pool = new SessionPool({
      createTransport: imapFactory({ [ALICE]: alice, [BOB]: bob }),
      createOutbound: smtpFactory({ [ALICE]: aliceSmtp }),
      retryPolicy: IMMEDIATE_RETRY_POLICY,
      logger
    });
    await pool.open(resolvedAccount(ALICE));
    await pool.open(resolvedAccount(BOB));
  });

  afterEach(async () => {
    await pool.closeAll();
  });

  describe('acquire/release', () => {
    it('should fail for accounts that were never opened', async () => {
      const error = await rejection(pool.acquire('nobody@example.org'));

      expect(error.kind).toBe('not_found');
      expect(error.code).toBe('ACCOUNT_NOT_FOUND');
    });

    it('should connect on first use and reuse the connection afterwards', async () => {
      expect(pool.getState(ALICE)).toBe('disconnected');

      const first = await pool.acquire(ALICE);
      expect(pool.getState(ALICE)).toBe('busy');
      pool.release(first);
      expect(pool.getState(ALICE)).toBe('ready');

      const second = await pool.acquire(ALICE);
      pool.release(second);

      expect(alice.connectAttempts).toBe(1);
      expect(second.connection).toBe(first.connection);
    });

    it('should report every state transition', async () => {
      const changes: string[] = [];
      pool.on('state', (change: SessionStateChange) => changes.push(`${change.from}->${change.to}`));

      pool.release(await pool.acquire(ALICE));

      expect(changes).toEqual(['disconnected->connecting', 'connecting->ready', 'ready->busy', 'busy->ready']);
    });

    it('should queue acquisitions for the same account in FIFO order', async () => {
      const order: number[] = [];
      const held = await pool.acquire(ALICE);

      const second = pool.acquire(ALICE).then(handle => {
        order.push(2);
        return handle;
      });
      const third = pool.acquire(ALICE).then(handle => {
        order.push(3);
        return handle;
      });

      await flush();
      expect(order).toEqual([]);
      expect(pool.getPoolStats().queuedRequests).toBe(2);

      pool.release(held);
      pool.release(await second);
      expect(order).toEqual([2]);

      pool.release(await third);
      expect(order).toEqual([2, 3]);
    });

    it('should not make other accounts wait', async () => {
      const heldByAlice = await pool.acquire(ALICE);

      const bobHandle = await pool.acquire(BOB);
      expect(pool.getState(BOB)).toBe('busy');
      pool.release(bobHandle);

      pool.release(heldByAlice);
    });

    it('should drop a queued acquisition when its signal aborts', async () => {
      const held = await pool.acquire(ALICE);
      const controller = new AbortController();
      const waiting = pool.acquire(ALICE, controller.signal);

      controller.abort(new Error('cancelled'));

      await expect(waiting).rejects.toThrow('cancelled');
      expect(pool.getPoolStats().queuedRequests).toBe(0);

      pool.release(held);
      pool.release(await pool.acquire(ALICE));
    });
  });

  describe('invalidate', () => {
    it('should force a fresh handshake on the next acquisition', async () => {
      pool.release(await pool.acquire(ALICE));

      pool.invalidate(ALICE);
      expect(pool.getState(ALICE)).toBe('disconnected');
      expect(alice.transports[0].isConnected()).toBe(false);

      pool.release(await pool.acquire(ALICE));
      expect(alice.successfulLogins).toBe(2);
      expect(alice.transports).toHaveLength(2);
    });

    it('should ignore the release of an invalidated handle', async () => {
      const stale = await pool.acquire(ALICE);
      pool.invalidate(ALICE, new GatewayError('connection', 'reset'));

      const fresh = await pool.acquire(ALICE);
      pool.release(stale);

      expect(pool.getState(ALICE)).toBe('busy');
      pool.release(fresh);
      expect(pool.getState(ALICE)).toBe('ready');
    });

    it('should only discard on behalf of the current holder', async () => {
      const stale = await pool.acquire(ALICE);
      pool.invalidate(ALICE);
      const fresh = await pool.acquire(ALICE);

      pool.discard(stale);
      expect(pool.getState(ALICE)).toBe('busy');

      pool.discard(fresh);
      expect(pool.getState(ALICE)).toBe('disconnected');
    });

    it('should notice a connection the server closed while idle', async () => {
      pool.release(await pool.acquire(ALICE));

      alice.transports[0].drop();
      expect(pool.getState(ALICE)).toBe('disconnected');

      pool.release(await pool.acquire(ALICE));
      expect(alice.successfulLogins).toBe(2);
    });
  });

  describe('reconnect policy', () => {
    it('should retry transient connection failures', async () => {
      alice.behaviour.connectFailure = attempt => (attempt < 3 ? socketError() : undefined);

      pool.release(await pool.acquire(ALICE));

      expect(alice.connectAttempts).toBe(3);
      expect(pool.getState(ALICE)).toBe('ready');
    });

    it('should surface a connection error once attempts are exhausted', async () => {
      alice.behaviour.connectFailure = () => socketError();

      const error = await rejection(pool.acquire(ALICE));

      expect(error.kind).toBe('connection');
      expect(error.code).toBe('CONNECTION_FAILED');
      expect(error.message).toBe('Failed to connect after 3 attempts: Connection to the mail server failed: read ECONNRESET');
      expect(alice.connectAttempts).toBe(3);
      expect(pool.getState(ALICE)).toBe('disconnected');
      expect(pool.getPoolStats().busySessions).toBe(0);
    });

    it('should not retry rejected credentials', async () => {
      alice.behaviour.password = 'other-secret';

      const error = await rejection(pool.acquire(ALICE));

      expect(error.kind).toBe('authentication');
      expect(alice.connectAttempts).toBe(1);
    });

    it('should wait between attempts after a failure', async () => {
      const slowPool = new SessionPool({
        createTransport: imapFactory({ [ALICE]: alice }),
        createOutbound: smtpFactory({}),
        retryPolicy: { maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 10, jitter: false },
        logger
      });
      await slowPool.open(resolvedAccount(ALICE));
      alice.behaviour.connectFailure = attempt => (attempt === 1 ? socketError() : undefined);

      slowPool.release(await slowPool.acquire(ALICE));

      const backoff = logger.getLogs(ALICE).find(entry => entry.command === 'POOL_RECONNECT_BACKOFF');
      expect(backoff?.data.parsed).toEqual({ attempt: 2, delay: 10 });
      await slowPool.closeAll();
    });
  });

  describe('remove', () => {
    it('should close the session and reject queued callers', async () => {
      const held = await pool.acquire(ALICE);
      const queued = rejection(pool.acquire(ALICE));

      await flush();
      expect(await pool.remove(ALICE)).toBe(true);

      const error = await queued;
      expect(error.kind).toBe('not_found');
      expect(error.code).toBe('SESSION_CLOSED');
      expect(pool.getState(ALICE)).toBeUndefined();
      expect(held.connection.isConnected()).toBe(false);

      pool.release(held);
      expect(pool.getPoolStats().totalSessions).toBe(1);
    });

    it('should not wait for a server that never answers the logout', async () => {
      const held = await pool.acquire(ALICE);
      pool.release(held);
      alice.behaviour.hangDisconnect = true;

      expect(await pool.remove(ALICE)).toBe(true);

      expect(pool.has(ALICE)).toBe(false);
      expect(alice.transports[0].disconnectCalls).toBe(1);
    });

    it('should report unknown accounts as not removed', async () => {
      expect(await pool.remove('nobody@example.org')).toBe(false);
    });

    it('should replace an existing session when reopened', async () => {
      const held = await pool.acquire(ALICE);

      await pool.open(resolvedAccount(ALICE));

      expect(held.connection.isConnected()).toBe(false);
      expect(pool.getState(ALICE)).toBe('disconnected');
    });
  });

  describe('updateSecret', () => {
    it('should reconnect with the new secret', async () => {
      pool.release(await pool.acquire(ALICE));
      alice.behaviour.password = 'rotated-secret';

      await pool.updateSecret(ALICE, 'rotated-secret');
      expect(pool.getState(ALICE)).toBe('disconnected');

      pool.release(await pool.acquire(ALICE));
      expect(alice.successfulLogins).toBe(2);
    });
  });

  describe('outbound connections', () => {
    it('should open one transport per send and close it on release', async () => {
      const outbound = await pool.acquireOutbound(ALICE);
      expect(outbound.from).toBe(ALICE);
      expect(aliceSmtp.opened).toBe(1);

      pool.releaseOutbound(outbound);
      expect(aliceSmtp.closed).toBe(1);
    });

    it('should serialise sends for one account without touching the IMAP lock', async () => {
      const imapHandle = await pool.acquire(ALICE);
      const first = await pool.acquireOutbound(ALICE);

      let secondReady = false;
      const second = pool.acquireOutbound(ALICE).then(handle => {
        secondReady = true;
        return handle;
      });

      await flush();
      expect(secondReady).toBe(false);

      pool.releaseOutbound(first);
      pool.releaseOutbound(await second);
      expect(aliceSmtp.opened).toBe(2);

      pool.release(imapHandle);
    });
  });

  describe('idle cleanup', () => {
    it('should disconnect sessions that have sat idle', async () => {
      pool.release(await pool.acquire(ALICE));
      const busy = await pool.acquire(BOB);

      const closed = pool.closeIdleConnections(Date.now() + 60000);

      expect(closed).toBe(1);
      expect(pool.getState(ALICE)).toBe('disconnected');
      expect(pool.getState(BOB)).toBe('busy');
      pool.release(busy);
    });
  });

  it('should report pool statistics', async () => {
    const held = await pool.acquire(ALICE);
    pool.release(await pool.acquire(BOB));

    expect(pool.getPoolStats()).toEqual({
      totalSessions: 2,
      connectedSessions: 2,
      busySessions: 1,
      queuedRequests: 0
    });
    pool.release(held);
  });
});
