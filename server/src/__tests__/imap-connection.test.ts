import net from 'net';
import { ImapConnection, ImapConnectionError, buildXOAuth2Token } from '../lib/imap-connection';
import { GatewayLogger } from '../lib/gateway-logger';
import type { AuthMethod, ResolvedAccount } from '../types/gateway';

const wait = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function testAccount(port: number, authMethod: AuthMethod = 'password'): ResolvedAccount {
  return {
    email: 'user1@testmail.local',
    username: 'user1@testmail.local',
    secret: authMethod === 'oauth2' ? 'test-token' : 'test-secret',
    authMethod,
    profile: {
      provider: 'custom',
      imap: { host: '127.0.0.1', port, tls: 'none' },
      smtp: { host: '127.0.0.1', port: 1025, tls: 'none' }
    }
  };
}

interface PeerOptions {
  greetDelayMs?: number;
  capabilities?: string;
  // Keeps its side open and never answers LOGOUT
  ignoreLogout?: boolean;
  message?: Buffer;
  // Byte offset at which the FETCH literal is cut into two writes
  splitAt?: number;
}

/**
 * Minimal IMAP server on a loopback socket: enough of the protocol for
 * login, EXAMINE, one UID FETCH and LOGOUT.
 */
class ImapPeer {
  readonly sockets = new Set<net.Socket>();
  readonly lines: string[] = [];
  readonly commands: string[] = [];
  private server: net.Server;
  private options: PeerOptions;

  constructor(options: PeerOptions = {}) {
    this.options = options;
    this.server = net.createServer({ allowHalfOpen: options.ignoreLogout ?? false }, socket => this.accept(socket));
  }

  listen(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(0, '127.0.0.1', () => {
        const address = this.server.address();
        if (address && typeof address === 'object') {
          resolve(address.port);
        } else {
          reject(new Error('peer has no port'));
        }
      });
    });
  }

  close(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    return new Promise(resolve => this.server.close(() => resolve()));
  }

  private accept(socket: net.Socket): void {
    this.sockets.add(socket);
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', (error: Error) => this.lines.push(`! ${error.message}`));

    const greet = () => this.write(socket, '* OK test IMAP ready\r\n');
    if (this.options.greetDelayMs) {
      setTimeout(greet, this.options.greetDelayMs);
    } else {
      greet();
    }

    let pending = '';
    socket.on('data', (chunk: Buffer) => {
      pending += chunk.toString('utf8');
      let index = pending.indexOf('\r\n');
      while (index !== -1) {
        const line = pending.slice(0, index);
        pending = pending.slice(index + 2);
        this.respond(socket, line);
        index = pending.indexOf('\r\n');
      }
    });
  }

  private write(socket: net.Socket, data: string | Buffer): void {
    if (socket.writable) {
      socket.write(data);
    }
  }

  private respond(socket: net.Socket, line: string): void {
    const [tag, ...words] = line.split(' ');
    const verb = (words[0] === 'UID' ? `UID ${words[1]}` : words[0] ?? '').toUpperCase();
    this.lines.push(line);
    this.commands.push(verb);

    switch (verb) {
      case 'CAPABILITY':
        this.write(socket, `* CAPABILITY ${this.options.capabilities ?? 'IMAP4rev1'}\r\n${tag} OK CAPABILITY completed\r\n`);
        break;
      case 'LIST':
        this.write(socket, `* LIST (\\Noselect) "/" ""\r\n${tag} OK LIST completed\r\n`);
        break;
      case 'EXAMINE':
        this.write(socket, [
          '* 1 EXISTS',
          '* 0 RECENT',
          '* OK [UIDVALIDITY 7] UIDs valid',
          '* OK [UIDNEXT 2] Predicted next UID',
          `${tag} OK [READ-ONLY] EXAMINE completed`,
          ''
        ].join('\r\n'));
        break;
      case 'UID FETCH':
        this.sendMessage(socket, tag);
        break;
      case 'LOGOUT':
        if (!this.options.ignoreLogout) {
          this.write(socket, `* BYE logging out\r\n${tag} OK LOGOUT completed\r\n`);
          socket.end();
        }
        break;
      default:
        this.write(socket, `${tag} OK ${verb} completed\r\n`);
    }
  }

  private sendMessage(socket: net.Socket, tag: string): void {
    const source = this.options.message ?? Buffer.from('Subject: hello\r\n\r\nhi\r\n', 'utf8');
    const splitAt = this.options.splitAt ?? source.length;
    const trailer = Buffer.from(`)\r\n${tag} OK FETCH completed\r\n`, 'utf8');

    this.write(socket, `* 1 FETCH (UID 1 FLAGS (\\Seen) RFC822.SIZE ${source.length} BODY[] {${source.length}}\r\n`);
    this.write(socket, source.subarray(0, splitAt));
    setTimeout(() => {
      this.write(socket, Buffer.concat([source.subarray(splitAt), trailer]));
    }, 20);
  }
}

describe('ImapConnection', () => {
  describe('without a server', () => {
    let connection: ImapConnection;

    beforeEach(() => {
      connection = new ImapConnection(testAccount(1143), new GatewayLogger({ logLevel: 'debug' }));
    });

    it('should start disconnected', () => {
      expect(connection.isConnected()).toBe(false);
      expect(connection.getCurrentFolder()).toBeNull();
    });

    it('should resolve disconnect when never connected', async () => {
      await expect(connection.disconnect()).resolves.toBeUndefined();
    });

    it('should fail listFolders when not connected', async () => {
      await expect(connection.listFolders()).rejects.toThrow('Not connected');
    });

    it('should fail selectFolder with a coded error when not connected', async () => {
      await expect(connection.selectFolder('INBOX')).rejects.toMatchObject({ code: 'NOT_CONNECTED' });
    });

    it('should require a selected folder for search and fetch', async () => {
      await expect(connection.search(['ALL'])).rejects.toBeInstanceOf(ImapConnectionError);
      await expect(connection.fetch([1], 'headers')).rejects.toMatchObject({ code: 'INVALID_STATE' });
    });
  });

  describe('against a loopback server', () => {
    let peer: ImapPeer;
    let connection: ImapConnection | null;
    let logger: GatewayLogger;

    const open = async (options: PeerOptions, authMethod: AuthMethod = 'password') => {
      peer = new ImapPeer(options);
      const port = await peer.listen();
      connection = new ImapConnection(testAccount(port, authMethod), logger, {
        connTimeout: 2000,
        authTimeout: 2000,
        logoutTimeout: 100
      });
      return connection;
    };

    beforeEach(() => {
      connection = null;
      logger = new GatewayLogger({ logLevel: 'debug' });
    });

    afterEach(async () => {
      if (connection) {
        await connection.disconnect();
      }
      await peer.close();
    });

    it('should log in with a password', async () => {
      const imap = await open({});

      await imap.connect();

      expect(imap.isConnected()).toBe(true);
      expect(peer.lines.some(line => line.endsWith(' LOGIN "user1@testmail.local" "test-secret"'))).toBe(true);
    });

    it('should authenticate with XOAUTH2 for oauth2 accounts', async () => {
      const imap = await open({ capabilities: 'IMAP4rev1 AUTH=XOAUTH2' }, 'oauth2');

      await imap.connect();

      const token = buildXOAuth2Token('user1@testmail.local', 'test-token');
      expect(peer.commands).toContain('AUTHENTICATE');
      expect(peer.commands).not.toContain('LOGIN');
      expect(peer.lines.some(line => line.includes(token))).toBe(true);
    });

    it('should drop a connection that is still waiting for the greeting', async () => {
      const imap = await open({ greetDelayMs: 150 });

      const outcome = imap.connect().then(() => 'connected', (error: unknown) => error);
      await wait(30);
      await imap.disconnect();
      await wait(300);

      expect(imap.isConnected()).toBe(false);
      expect(peer.sockets.size).toBe(0);
      expect(peer.commands).toEqual([]);
      expect(await outcome).toBeInstanceOf(ImapConnectionError);
    });

    it('should stop waiting for a server that never answers LOGOUT', async () => {
      const imap = await open({ ignoreLogout: true });
      await imap.connect();

      const started = Date.now();
      await imap.disconnect();

      expect(Date.now() - started).toBeLessThan(1000);
      expect(imap.isConnected()).toBe(false);
      expect(peer.commands).toContain('LOGOUT');
      expect(logger.getLogs('user1@testmail.local').map(entry => entry.command)).toContain('LOGOUT');
    });

    it('should close cleanly when the server answers LOGOUT', async () => {
      const imap = await open({});
      await imap.connect();

      await imap.disconnect();
      await wait(50);

      expect(imap.isConnected()).toBe(false);
      expect(peer.sockets.size).toBe(0);
    });

    it('should keep a character split across two reads intact', async () => {
      const source = Buffer.from('Subject: café\r\nFrom: a@example.org\r\n\r\nVoilà\r\n', 'utf8');
      // between the two bytes of "é"
      const splitAt = source.indexOf(Buffer.from('é', 'utf8')) + 1;
      const imap = await open({ message: source, splitAt });
      await imap.connect();

      const status = await imap.selectFolder('INBOX');
      const [message] = await imap.fetch([1], 'full');

      expect(status).toEqual({ name: 'INBOX', uidValidity: 7, uidNext: 2, total: 1 });
      expect(message.uid).toBe(1);
      expect(message.flags).toEqual(['\\Seen']);
      expect(message.size).toBe(source.length);
      expect(message.headers.subject).toEqual(['café']);
      expect(message.headers.from).toEqual(['a@example.org']);
      expect(Buffer.isBuffer(message.body)).toBe(true);
      expect(message.body?.equals(source)).toBe(true);
    });
  });
});

describe('buildXOAuth2Token', () => {
  it('should encode the SASL XOAUTH2 initial response', () => {
    const token = buildXOAuth2Token('user@example.org', 'test-token');

    expect(Buffer.from(token, 'base64').toString('utf8'))
      .toBe('user=user@example.org\x01auth=Bearer test-token\x01\x01');
  });
});
