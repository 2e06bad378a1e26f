import Imap from 'imap';
import { EventEmitter } from 'events';
import { GatewayLogger, LogLevel, GatewayLogData } from './gateway-logger';
import type { ResolvedAccount } from '../types/gateway';
import type {
  FetchedHeaders,
  FetchedMessage,
  FetchPart,
  ImapTransport,
  MailboxFolder,
  MailboxStatus,
  SearchCriterion
} from './transports';

export interface ImapConnectionOptions {
  authTimeout?: number;
  connTimeout?: number;
  logoutTimeout?: number; // ms to wait for the server to answer LOGOUT before dropping the socket
  rejectUnauthorized?: boolean;
}

const HEADER_FIELDS = 'HEADER.FIELDS (FROM TO CC SUBJECT DATE MESSAGE-ID)';

export class ImapConnectionError extends Error {
  constructor(
    message: string,
    public code?: string,
    public source?: string
  ) {
    super(message);
    this.name = 'ImapConnectionError';
  }
}

function stringField(error: Error, field: 'code' | 'source' | 'textCode'): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

/**
 * SASL XOAUTH2 initial response for OAuth2 access tokens.
 */
export function buildXOAuth2Token(user: string, accessToken: string): string {
  return Buffer.from(`user=${user}\x01auth=Bearer ${accessToken}\x01\x01`, 'utf8').toString('base64');
}

/**
 * IMAP transport backed by the `imap` package. One instance is one TCP
 * connection; a failed connect is not retried on the same instance.
 */
export class ImapConnection extends EventEmitter implements ImapTransport {
  private imap: Imap;
  private account: ResolvedAccount;
  private logger: GatewayLogger;
  private connected = false;
  private socketOpen = false;
  private closing = false;
  private connectTimer: NodeJS.Timeout | null = null;
  private currentBox: string | null = null;
  private connTimeout: number;
  private logoutTimeout: number;

  constructor(account: ResolvedAccount, logger: GatewayLogger, options: ImapConnectionOptions = {}) {
    super();
    this.account = account;
    this.logger = logger;
    this.connTimeout = options.connTimeout || 10000;
    this.logoutTimeout = options.logoutTimeout || 5000;

    const endpoint = account.profile.imap;
    const config: Imap.Config = {
      user: account.username,
      password: account.authMethod === 'oauth2' ? '' : account.secret,
      host: endpoint.host,
      port: endpoint.port,
      tls: endpoint.tls === 'tls',
      autotls: endpoint.tls === 'starttls' ? 'required' : 'never',
      tlsOptions: {
        servername: endpoint.host,
        rejectUnauthorized: options.rejectUnauthorized ?? true
      },
      authTimeout: options.authTimeout || 10000,
      connTimeout: this.connTimeout,
      keepalive: {
        interval: 10000,
        idleInterval: 300000,
        forceNoop: true
      }
    };
    if (account.authMethod === 'oauth2') {
      config.xoauth2 = buildXOAuth2Token(account.username, account.secret);
    }

    this.imap = new Imap(config);
    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.imap.on('ready', () => {
      // Login finished after disconnect() gave up on this connection
      if (this.closing) {
        this.imap.destroy();
        return;
      }
      this.connected = true;
    });

    this.imap.on('error', (err: Error) => {
      this.logOperation('ERROR', {
        error: err.message,
        parsed: { code: stringField(err, 'code'), source: stringField(err, 'source') }
      }, 'error');
      if (this.listenerCount('error') > 0) {
        this.emit('error', err);
      }
    });

    this.imap.on('end', () => {
      this.connected = false;
      this.currentBox = null;
      this.logOperation('DISCONNECT', { response: 'Connection ended' }, 'debug');
    });

    this.imap.on('close', (hadError: boolean) => {
      this.connected = false;
      this.socketOpen = false;
      this.currentBox = null;
      this.logOperation('CLOSE', {
        response: hadError ? 'Connection closed with error' : 'Connection closed',
        parsed: { hadError }
      }, hadError ? 'warn' : 'debug');
      this.emit('close', hadError);
    });
  }

  private logOperation(command: string, data: GatewayLogData, level: LogLevel = 'info'): void {
    this.logger.log(this.account.email, { level, command, data });
  }

  async connect(): Promise<void> {
    const endpoint = this.account.profile.imap;

    return new Promise((resolve, reject) => {
      const startTime = Date.now();

      this.logOperation('CONNECT', {
        raw: `Connecting to ${endpoint.host}:${endpoint.port}`,
        parsed: { host: endpoint.host, port: endpoint.port, tls: endpoint.tls }
      });

      const settle = (error: ImapConnectionError | null) => {
        this.clearConnectTimer();
        this.imap.removeListener('ready', onReady);
        this.imap.removeListener('error', onError);
        this.imap.removeListener('close', onClose);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const onReady = () => {
        if (this.closing) {
          settle(new ImapConnectionError('Connection closed before login completed', 'ECONNRESET', 'socket'));
          return;
        }
        this.logOperation('LOGIN', {
          raw: `LOGIN ${this.account.username} ****`,
          response: 'Authentication successful',
          duration: Date.now() - startTime
        });
        settle(null);
      };

      const onError = (err: Error) => {
        settle(new ImapConnectionError(
          err.message,
          stringField(err, 'textCode') ?? stringField(err, 'code'),
          stringField(err, 'source')
        ));
      };

      const onClose = () => {
        settle(new ImapConnectionError('Connection closed before login completed', 'ECONNRESET', 'socket'));
      };

      this.connectTimer = setTimeout(() => {
        this.closing = true;
        this.imap.destroy();
        settle(new ImapConnectionError('Connection timeout', 'ETIMEDOUT', 'timeout'));
      }, this.connTimeout);

      this.imap.once('ready', onReady);
      this.imap.once('error', onError);
      this.imap.once('close', onClose);

      this.socketOpen = true;
      this.imap.connect();
    });
  }

  /**
   * Logs out and waits for the server to close, for at most `logoutTimeout`.
   * A connection still greeting or logging in is dropped at once.
   */
  async disconnect(): Promise<void> {
    this.clearConnectTimer();

    if (!this.socketOpen || this.closing) {
      return;
    }

    this.closing = true;

    if (!this.connected) {
      this.logOperation('DISCONNECT', { response: 'Dropped before login completed' }, 'debug');
      this.imap.destroy();
      return;
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.imap.removeListener('close', onClose);
        this.logOperation('LOGOUT', {
          response: `No reply within ${this.logoutTimeout}ms, dropping connection`
        }, 'warn');
        this.connected = false;
        this.currentBox = null;
        this.imap.destroy();
        resolve();
      }, this.logoutTimeout);

      const onClose = () => {
        clearTimeout(timer);
        resolve();
      };

      this.imap.once('close', onClose);
      this.imap.end();
    });
  }

  private clearConnectTimer(): void {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  async listFolders(): Promise<MailboxFolder[]> {
    this.assertConnected();

    return new Promise((resolve, reject) => {
      const startTime = Date.now();

      this.logOperation('LIST', { raw: 'LIST "" "*"' }, 'debug');

      this.imap.getBoxes((err: Error | null, boxes: Imap.MailBoxes) => {
        if (err) {
          this.logOperation('LIST', { error: err.message, duration: Date.now() - startTime }, 'error');
          reject(new ImapConnectionError(`Failed to list folders: ${err.message}`, 'LIST_FAILED'));
          return;
        }

        const folders = this.parseBoxes(boxes);

        this.logOperation('LIST', {
          response: `Found ${folders.length} folders`,
          duration: Date.now() - startTime
        }, 'debug');

        resolve(folders);
      });
    });
  }

  private parseBoxes(boxes: Imap.MailBoxes, parent?: string): MailboxFolder[] {
    const folders: MailboxFolder[] = [];

    for (const [name, box] of Object.entries(boxes)) {
      const delimiter = box.delimiter || '.';
      const folder: MailboxFolder = {
        name: parent ? `${parent}${delimiter}${name}` : name,
        delimiter,
        flags: box.attribs || []
      };

      if (box.children) {
        folder.children = this.parseBoxes(box.children, folder.name);
      }

      folders.push(folder);
    }

    return folders;
  }

  async selectFolder(folderName: string): Promise<MailboxStatus> {
    this.assertConnected();

    return new Promise((resolve, reject) => {
      const startTime = Date.now();

      this.logOperation('EXAMINE', { raw: `EXAMINE ${folderName}` }, 'debug');

      this.imap.openBox(folderName, true, (err: Error | null, box: Imap.Box) => {
        if (err) {
          this.logOperation('EXAMINE', { error: err.message, duration: Date.now() - startTime }, 'error');
          reject(new ImapConnectionError(`Failed to select folder ${folderName}: ${err.message}`, 'SELECT_FAILED'));
          return;
        }

        this.currentBox = folderName;

        this.logOperation('EXAMINE', {
          response: `Selected ${folderName}`,
          parsed: {
            messages: box.messages.total,
            uidvalidity: box.uidvalidity,
            uidnext: box.uidnext
          },
          duration: Date.now() - startTime
        }, 'debug');

        resolve({
          name: folderName,
          uidValidity: box.uidvalidity,
          uidNext: box.uidnext,
          total: box.messages.total
        });
      });
    });
  }

  async search(criteria: SearchCriterion[]): Promise<number[]> {
    this.assertSelected();

    return new Promise((resolve, reject) => {
      const startTime = Date.now();

      this.logOperation('SEARCH', {
        raw: `UID SEARCH ${JSON.stringify(criteria)}`
      }, 'debug');

      this.imap.search(criteria, (err: Error | null, uids: number[]) => {
        if (err) {
          this.logOperation('SEARCH', { error: err.message, duration: Date.now() - startTime }, 'error');
          reject(new ImapConnectionError(`Search failed: ${err.message}`, 'SEARCH_FAILED', stringField(err, 'source')));
          return;
        }

        this.logOperation('SEARCH', {
          response: `Found ${uids.length} messages`,
          duration: Date.now() - startTime
        }, 'debug');

        resolve(uids);
      });
    });
  }

  async fetch(uids: number[], part: FetchPart): Promise<FetchedMessage[]> {
    this.assertSelected();

    if (uids.length === 0) {
      return [];
    }

    return new Promise((resolve, reject) => {
      const pending: Promise<FetchedMessage | null>[] = [];
      const startTime = Date.now();
      const bodies = part === 'full' ? '' : HEADER_FIELDS;

      this.logOperation('FETCH', {
        raw: `UID FETCH ${uids.join(',')} (FLAGS RFC822.SIZE BODY.PEEK[${bodies}])`
      }, 'debug');

      const fetch = this.imap.fetch(uids, { bodies, size: true, struct: false });

      fetch.on('message', (msg: Imap.ImapMessage) => {
        pending.push(readMessage(msg));
      });

      fetch.once('error', (err: Error) => {
        this.logOperation('FETCH', { error: err.message, duration: Date.now() - startTime }, 'error');
        reject(new ImapConnectionError(`Fetch failed: ${err.message}`, 'FETCH_FAILED', stringField(err, 'source')));
      });

      fetch.once('end', () => {
        Promise.all(pending)
          .then((results) => {
            const messages = results.filter((message): message is FetchedMessage => message !== null);
            this.logOperation('FETCH', {
              response: `Fetched ${messages.length} messages`,
              duration: Date.now() - startTime
            }, 'debug');
            resolve(messages);
          })
          .catch(reject);
      });
    });
  }

  isConnected(): boolean {
    return this.connected;
  }

  getCurrentFolder(): string | null {
    return this.currentBox;
  }

  private assertConnected(): void {
    if (!this.connected) {
      throw new ImapConnectionError('Not connected', 'NOT_CONNECTED');
    }
  }

  private assertSelected(): void {
    if (!this.connected || !this.currentBox) {
      throw new ImapConnectionError('Not connected or no folder selected', 'INVALID_STATE');
    }
  }
}

// Chunks are joined before decoding so a character split across reads survives
function readBody(stream: NodeJS.ReadableStream): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer | string) => {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
    });
    stream.once('end', () => resolve(Buffer.concat(chunks)));
    stream.once('error', reject);
  });
}

function headerBlock(source: Buffer): Buffer {
  const end = source.indexOf('\r\n\r\n');
  if (end !== -1) {
    return source.subarray(0, end);
  }
  const bare = source.indexOf('\n\n');
  return bare === -1 ? source : source.subarray(0, bare);
}

/**
 * Collects one FETCH response. Resolves to null when the server sent no
 * attributes for it.
 */
function readMessage(msg: Imap.ImapMessage): Promise<FetchedMessage | null> {
  return new Promise((resolve, reject) => {
    let attributes: Imap.ImapMessageAttributes | null = null;
    const parts: Promise<{ which: string; content: Buffer }>[] = [];

    msg.on('body', (stream: NodeJS.ReadableStream, info: Imap.ImapMessageBodyInfo) => {
      parts.push(readBody(stream).then(content => ({ which: info.which, content })));
    });

    msg.once('attributes', (attrs: Imap.ImapMessageAttributes) => {
      attributes = attrs;
    });

    msg.once('end', () => {
      Promise.all(parts)
        .then((bodies) => {
          if (!attributes) {
            resolve(null);
            return;
          }

          let headers: FetchedHeaders = {};
          let body: Buffer | undefined;
          for (const { which, content } of bodies) {
            if (which.toUpperCase().startsWith('HEADER')) {
              headers = parseHeaderBlock(content.toString('utf8'));
            } else {
              body = content;
              headers = parseHeaderBlock(headerBlock(content).toString('utf8'));
            }
          }

          resolve({
            uid: attributes.uid,
            flags: attributes.flags,
            date: attributes.date ?? null,
            size: attributes.size ?? null,
            headers,
            ...(body !== undefined ? { body } : {})
          });
        })
        .catch(reject);
    });
  });
}

function parseHeaderBlock(raw: string): FetchedHeaders {
  const headers = Imap.parseHeader(raw);
  return {
    from: headers.from,
    to: headers.to,
    cc: headers.cc,
    subject: headers.subject,
    date: headers.date,
    messageId: headers['message-id']
  };
}
