import express from 'express';
import cors from 'cors';
import { Pool } from 'pg';
import dotenv from 'dotenv';
import { AccountStore, MemoryAccountStore, PgAccountStore } from './lib/account-store';
import { loadConfig } from './lib/config';
import { GatewayLogger } from './lib/gateway-logger';
import { MailGateway } from './lib/mail-gateway';
import { MailboxMonitor } from './lib/mailbox-monitor';
import { defaultProviderDirectory, loadProviderFile } from './lib/providers';
import { classifyError } from './lib/error-classifier';
import { createAccountsRouter } from './routes/accounts';
import { createMessagesRouter } from './routes/messages';

export interface AppDeps {
  gateway: MailGateway;
  store: AccountStore;
  logger: GatewayLogger;
  monitor?: MailboxMonitor;
  frontendUrl?: string;
  requestLogging?: boolean;
}

export function createApp({ gateway, store, logger, monitor, frontendUrl, requestLogging }: AppDeps): express.Express {
  const app = express();

  // CORS configuration for the frontend
  app.use(cors({
    origin: frontendUrl || 'http://localhost:3001',
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  if (requestLogging) {
    app.use((req, _res, next) => {
      console.log(`${new Date().toISOString()} - ${req.method} ${req.path}`);
      next();
    });
  }

  app.use(express.json({ limit: '25mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      accounts: gateway.listAccounts().length,
      pool: gateway.getPoolStats()
    });
  });

  app.use('/api/accounts', createAccountsRouter({ gateway, store, logger, monitor }));
  app.use('/api/accounts', createMessagesRouter({ gateway }));

  // Malformed JSON bodies and anything a route let through
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Invalid request body' });
      return;
    }
    const gatewayError = classifyError(err);
    console.error('Unhandled request error:', gatewayError.message);
    res.status(500).json({ error: gatewayError.code, kind: gatewayError.kind, message: gatewayError.message });
  });

  return app;
}

/**
 * Re-establishes sessions for every stored account. One account failing to
 * log in does not stop the others.
 */
export async function restoreAccounts(gateway: MailGateway, store: AccountStore): Promise<{ restored: string[]; failed: string[] }> {
  const restored: string[] = [];
  const failed: string[] = [];

  const accounts = await store.list();
  const results = await Promise.allSettled(accounts.map(credentials => gateway.addAccount(credentials)));

  results.forEach((result, index) => {
    const email = accounts[index].email;
    if (result.status === 'fulfilled') {
      restored.push(email);
    } else {
      const error = classifyError(result.reason, { email });
      console.error(`❌ Could not restore ${email}: ${error.message}`);
      failed.push(email);
    }
  });

  return { restored, failed };
}

async function main(): Promise<void> {
  // Load environment variables
  dotenv.config();

  const config = loadConfig();

  const logger = new GatewayLogger({
    maxLogsPerAccount: config.maxLogsPerAccount,
    logLevel: config.logLevel,
    console: config.logToConsole
  });

  const providers = config.providersFile
    ? defaultProviderDirectory.withEntries(loadProviderFile(config.providersFile))
    : defaultProviderDirectory;

  let dbPool: Pool | null = null;
  let store: AccountStore;
  if (config.databaseUrl) {
    if (!config.encryptionKey) {
      console.error('❌ ENCRYPTION_KEY environment variable is required when DATABASE_URL is set');
      console.error('   Generate one with: openssl rand -base64 32');
      process.exit(1);
    }
    const db = new Pool({ connectionString: config.databaseUrl });
    dbPool = db;
    const pgStore = new PgAccountStore(
      { query: (text, values) => db.query(text, values) },
      config.encryptionKey
    );
    await pgStore.ensureSchema();
    console.log('✅ Connected to PostgreSQL');
    store = pgStore;
  } else {
    console.warn('⚠️ DATABASE_URL not set; accounts are kept in memory only');
    store = new MemoryAccountStore();
  }

  const gateway = new MailGateway({
    providers,
    operationTimeoutMs: config.operationTimeoutMs,
    retryPolicy: config.retryPolicy,
    idleTimeoutMs: config.idleTimeoutMs,
    queryLimits: config.queryLimits,
    logger
  });
  const monitor = new MailboxMonitor(gateway, { pollInterval: config.monitorPollIntervalMs, logger });

  const app = createApp({ gateway, store, logger, monitor, frontendUrl: config.frontendUrl, requestLogging: true });

  const { restored, failed } = await restoreAccounts(gateway, store);
  console.log(`📬 Restored ${restored.length} account(s)${failed.length ? `, ${failed.length} failed` : ''}`);

  const server = app.listen(config.port, () => {
    console.log(`🚀 Server running on http://localhost:${config.port}`);
    console.log(`📊 Health check: http://localhost:${config.port}/health`);
    console.log(`📧 Accounts API: http://localhost:${config.port}/api/accounts`);
  });

  const shutdown = async (signal: string) => {
    console.log(`Received ${signal}, shutting down`);

    monitor.dispose();
    await gateway.close();
    console.log('Mail sessions closed');

    server.close();
    if (dbPool) {
      await dbPool.end();
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error: unknown) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  });

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error: unknown) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('💥 Failed to start server:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
