import { MemoryAccountStore, PgAccountStore, Queryable } from '../account-store';
import { encryptSecret } from '../crypto';

const KEY = 'test-encryption-key';

interface RecordedQuery {
  text: string;
  values?: unknown[];
}

/**
 * Records statements and answers with canned rows.
 */
class FakeDb implements Queryable {
  queries: RecordedQuery[] = [];
  rows: unknown[] = [];

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }> {
    this.queries.push({ text, values });
    return { rows: this.rows, rowCount: this.rows.length };
  }
}

describe('MemoryAccountStore', () => {
  it('should save, list and delete by normalised address', async () => {
    const store = new MemoryAccountStore();

    await store.save({ email: ' Alice@Gmail.com ', secret: 'test-secret' });
    await store.save({ email: 'alice@gmail.com', secret: 'rotated-secret' });

    expect(await store.list()).toEqual([{ email: 'alice@gmail.com', secret: 'rotated-secret' }]);
    expect(await store.delete('ALICE@gmail.com')).toBe(true);
    expect(await store.delete('alice@gmail.com')).toBe(false);
    expect(await store.list()).toEqual([]);
  });
});

describe('PgAccountStore', () => {
  let db: FakeDb;
  let store: PgAccountStore;

  beforeEach(() => {
    db = new FakeDb();
    store = new PgAccountStore(db, KEY);
  });

  it('should create its table', async () => {
    await store.ensureSchema();
    expect(db.queries[0].text).toContain('CREATE TABLE IF NOT EXISTS gateway_accounts');
  });

  it('should upsert with the secret encrypted', async () => {
    await store.save({
      email: 'Me@Corp.example',
      secret: 'test-secret',
      username: 'me',
      settings: { imap: { host: 'imap.corp.example', port: 993, tls: 'tls' } }
    });

    const [{ text, values }] = db.queries;
    expect(text).toContain('ON CONFLICT (email) DO UPDATE');
    expect(values?.slice(0, 3)).toEqual(['me@corp.example', 'me', 'password']);
    expect(values?.[3]).not.toBe('test-secret');
    expect(values?.slice(4)).toEqual(['imap.corp.example', 993, 'tls', null, null, null]);
  });

  it('should decrypt rows and rebuild endpoint settings', async () => {
    db.rows = [
      {
        email: 'me@corp.example',
        username: 'me',
        auth_method: 'password',
        secret_encrypted: encryptSecret('test-secret', KEY),
        imap_host: 'imap.corp.example',
        imap_port: 993,
        imap_tls: 'tls',
        smtp_host: 'smtp.corp.example',
        smtp_port: 587,
        smtp_tls: 'starttls'
      },
      {
        email: 'alice@gmail.com',
        username: null,
        auth_method: 'oauth2',
        secret_encrypted: encryptSecret('test-token', KEY),
        imap_host: null,
        imap_port: null,
        imap_tls: null,
        smtp_host: null,
        smtp_port: null,
        smtp_tls: null
      }
    ];

    expect(await store.list()).toEqual([
      {
        email: 'me@corp.example',
        username: 'me',
        secret: 'test-secret',
        authMethod: 'password',
        settings: {
          imap: { host: 'imap.corp.example', port: 993, tls: 'tls' },
          smtp: { host: 'smtp.corp.example', port: 587, tls: 'starttls' }
        }
      },
      { email: 'alice@gmail.com', secret: 'test-token', authMethod: 'oauth2' }
    ]);
  });

  it('should reject malformed rows', async () => {
    db.rows = [{ email: 'me@corp.example' }];
    await expect(store.list()).rejects.toThrow('Malformed row in gateway_accounts');
  });

  it('should report whether a row was deleted', async () => {
    db.rows = [{ email: 'me@corp.example' }];
    expect(await store.delete('ME@corp.example')).toBe(true);
    expect(db.queries[0].values).toEqual(['me@corp.example']);

    db.rows = [];
    expect(await store.delete('me@corp.example')).toBe(false);
  });
});
