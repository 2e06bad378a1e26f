import { decryptSecret, encryptSecret } from './crypto';
import { configurationError } from './gateway-errors';
import { normalizeEmail } from './providers';
import type { AccountCredentials, AuthMethod, EndpointSettings, TlsMode } from '../types/gateway';

/**
 * Durable home of account credentials. The gateway core never writes here;
 * the REST layer does, and start-up restores sessions from it.
 */
export interface AccountStore {
  list(): Promise<AccountCredentials[]>;
  save(credentials: AccountCredentials): Promise<void>;
  delete(email: string): Promise<boolean>;
}

export class MemoryAccountStore implements AccountStore {
  private records: Map<string, AccountCredentials> = new Map();

  async list(): Promise<AccountCredentials[]> {
    return Array.from(this.records.values()).map(record => ({ ...record }));
  }

  async save(credentials: AccountCredentials): Promise<void> {
    const email = normalizeEmail(credentials.email);
    this.records.set(email, { ...credentials, email });
  }

  async delete(email: string): Promise<boolean> {
    return this.records.delete(normalizeEmail(email));
  }
}

/**
 * The subset of a pg Pool or Client the store needs.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export const GATEWAY_ACCOUNTS_SCHEMA = `
  CREATE TABLE IF NOT EXISTS gateway_accounts (
    email TEXT PRIMARY KEY,
    username TEXT,
    auth_method TEXT NOT NULL DEFAULT 'password',
    secret_encrypted TEXT NOT NULL,
    imap_host TEXT,
    imap_port INTEGER,
    imap_tls TEXT,
    smtp_host TEXT,
    smtp_port INTEGER,
    smtp_tls TEXT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isTlsMode(value: unknown): value is TlsMode {
  return value === 'tls' || value === 'starttls' || value === 'none';
}

function isAuthMethod(value: unknown): value is AuthMethod {
  return value === 'password' || value === 'oauth2';
}

function endpointFrom(host: unknown, port: unknown, tls: unknown): EndpointSettings | undefined {
  if (typeof host !== 'string' || typeof port !== 'number' || !isTlsMode(tls)) {
    return undefined;
  }
  return { host, port, tls };
}

/**
 * Credentials in PostgreSQL, secrets encrypted with ENCRYPTION_KEY.
 */
export class PgAccountStore implements AccountStore {
  private db: Queryable;
  private encryptionKey?: string;

  constructor(db: Queryable, encryptionKey: string | undefined = process.env.ENCRYPTION_KEY) {
    this.db = db;
    this.encryptionKey = encryptionKey;
  }

  async ensureSchema(): Promise<void> {
    await this.db.query(GATEWAY_ACCOUNTS_SCHEMA);
  }

  async list(): Promise<AccountCredentials[]> {
    const result = await this.db.query(
      `SELECT email, username, auth_method, secret_encrypted,
              imap_host, imap_port, imap_tls, smtp_host, smtp_port, smtp_tls
       FROM gateway_accounts
       ORDER BY created_at ASC`
    );

    return result.rows.map(row => this.fromRow(row));
  }

  async save(credentials: AccountCredentials): Promise<void> {
    const imap = credentials.settings?.imap;
    const smtp = credentials.settings?.smtp;

    await this.db.query(
      `INSERT INTO gateway_accounts
       (email, username, auth_method, secret_encrypted,
        imap_host, imap_port, imap_tls, smtp_host, smtp_port, smtp_tls)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       ON CONFLICT (email) DO UPDATE SET
         username = EXCLUDED.username,
         auth_method = EXCLUDED.auth_method,
         secret_encrypted = EXCLUDED.secret_encrypted,
         imap_host = EXCLUDED.imap_host,
         imap_port = EXCLUDED.imap_port,
         imap_tls = EXCLUDED.imap_tls,
         smtp_host = EXCLUDED.smtp_host,
         smtp_port = EXCLUDED.smtp_port,
         smtp_tls = EXCLUDED.smtp_tls,
         updated_at = NOW()`,
      [
        normalizeEmail(credentials.email),
        credentials.username ?? null,
        credentials.authMethod ?? 'password',
        encryptSecret(credentials.secret, this.encryptionKey),
        imap?.host ?? null,
        imap?.port ?? null,
        imap?.tls ?? null,
        smtp?.host ?? null,
        smtp?.port ?? null,
        smtp?.tls ?? null
      ]
    );
  }

  async delete(email: string): Promise<boolean> {
    const result = await this.db.query(
      'DELETE FROM gateway_accounts WHERE email = $1 RETURNING email',
      [normalizeEmail(email)]
    );
    return result.rows.length > 0;
  }

  private fromRow(row: unknown): AccountCredentials {
    if (!isRecord(row) || typeof row.email !== 'string' || typeof row.secret_encrypted !== 'string') {
      throw configurationError('Malformed row in gateway_accounts');
    }

    const credentials: AccountCredentials = {
      email: row.email,
      secret: decryptSecret(row.secret_encrypted, this.encryptionKey),
      authMethod: isAuthMethod(row.auth_method) ? row.auth_method : 'password'
    };

    if (typeof row.username === 'string') {
      credentials.username = row.username;
    }

    const imap = endpointFrom(row.imap_host, row.imap_port, row.imap_tls);
    const smtp = endpointFrom(row.smtp_host, row.smtp_port, row.smtp_tls);
    if (imap || smtp) {
      credentials.settings = {
        ...(imap ? { imap } : {}),
        ...(smtp ? { smtp } : {})
      };
    }

    return credentials;
  }
}
