import express, { Router } from 'express';
import type { AccountStore } from '../lib/account-store';
import { accountNotFound } from '../lib/gateway-errors';
import { GatewayLogger } from '../lib/gateway-logger';
import { mapGatewayError, withGatewayJson } from '../lib/http/gateway-http';
import type { MailGateway } from '../lib/mail-gateway';
import type { MailboxMonitor } from '../lib/mailbox-monitor';
import { validateCreateAccount, validateSecretRotation } from '../middleware/validation';
import { AccountResponse, CreateAccountRequest, RequestValidationError, RotateSecretRequest } from '../types/api';
import type { AccountCredentials, AccountInfo } from '../types/gateway';

export interface AccountRouteDeps {
  gateway: MailGateway;
  store: AccountStore;
  logger: GatewayLogger;
  monitor?: MailboxMonitor;
}

export function toAccountResponse(info: AccountInfo): AccountResponse {
  return {
    email_address: info.email,
    username: info.username,
    auth_method: info.authMethod,
    provider: info.provider,
    imap: info.imap,
    smtp: info.smtp,
    state: info.state
  };
}

function toCredentials(body: CreateAccountRequest): AccountCredentials {
  const settings = body.imap || body.smtp
    ? { ...(body.imap ? { imap: body.imap } : {}), ...(body.smtp ? { smtp: body.smtp } : {}) }
    : undefined;

  return {
    email: body.email_address,
    secret: body.secret,
    ...(body.auth_method ? { authMethod: body.auth_method } : {}),
    ...(body.username ? { username: body.username } : {}),
    ...(settings ? { settings } : {})
  };
}

// Accounts resolved from the provider table are stored without settings so
// table updates apply on the next restore
function storedCredentials(info: AccountInfo, secret: string): AccountCredentials {
  return {
    email: info.email,
    secret,
    authMethod: info.authMethod,
    username: info.username,
    ...(info.provider === 'custom' ? { settings: { imap: info.imap, smtp: info.smtp } } : {})
  };
}

export function createAccountsRouter({ gateway, store, logger, monitor }: AccountRouteDeps): Router {
  const router = express.Router();

  // Register an account; the gateway logs in before anything is stored
  router.post('/', validateCreateAccount, async (req, res) => {
    const body: CreateAccountRequest = req.body;

    await withGatewayJson(res, async () => {
      const credentials = toCredentials(body);
      const info = await gateway.addAccount(credentials);

      try {
        await store.save(storedCredentials(info, credentials.secret));
      } catch (error) {
        await gateway.removeAccount(info.email);
        throw error;
      }

      console.log(`[accounts] Registered ${info.email} (${info.provider})`);
      return toAccountResponse(info);
    }, 201);
  });

  router.get('/', (_req, res) => {
    res.json(gateway.listAccounts().map(toAccountResponse));
  });

  router.get('/:email', (req, res) => {
    try {
      res.json(toAccountResponse(gateway.getAccount(req.params.email)));
    } catch (error) {
      mapGatewayError(res, error);
    }
  });

  // Idempotent: removing an unknown account still answers 204
  router.delete('/:email', async (req, res) => {
    try {
      monitor?.stopMonitoring(req.params.email);
      const removed = await gateway.removeAccount(req.params.email);
      await store.delete(req.params.email);
      if (removed) {
        console.log(`[accounts] Removed ${req.params.email}`);
      }
      res.status(204).send();
    } catch (error) {
      mapGatewayError(res, error);
    }
  });

  router.put('/:email/secret', validateSecretRotation, async (req, res) => {
    const body: RotateSecretRequest = req.body;

    await withGatewayJson(res, async () => {
      const info = gateway.getAccount(req.params.email);
      const previous = (await store.list()).find(record => record.email === info.email);

      await gateway.rotateSecret(info.email, body.secret);
      try {
        await store.save(storedCredentials(info, body.secret));
      } catch (error) {
        // The gateway goes back to the secret the store still holds
        if (previous) {
          await gateway.rotateSecret(info.email, previous.secret);
        }
        throw error;
      }

      return toAccountResponse(info);
    });
  });

  router.get('/:email/folders', async (req, res) => {
    await withGatewayJson(res, () => gateway.listFolders(req.params.email));
  });

  router.get('/:email/logs', (req, res) => {
    try {
      if (!gateway.hasAccount(req.params.email)) {
        throw accountNotFound(req.params.email);
      }

      const limitRaw = typeof req.query.limit === 'string' ? req.query.limit : undefined;
      const limit = limitRaw === undefined ? 100 : Number(limitRaw);
      if (!Number.isInteger(limit) || limit < 1 || limit > 1000) {
        throw new RequestValidationError('limit', 'limit must be an integer between 1 and 1000');
      }

      const info = gateway.getAccount(req.params.email);
      res.json({ logs: logger.getLogs(info.email, limit) });
    } catch (error) {
      mapGatewayError(res, error);
    }
  });

  if (monitor) {
    router.post('/:email/monitor', async (req, res) => {
      await withGatewayJson(res, async () => {
        const folder = typeof req.body?.folder === 'string' ? req.body.folder : undefined;
        await monitor.startMonitoring(req.params.email, folder);
        return monitor.getAccountStatus(req.params.email) ?? null;
      });
    });

    router.get('/:email/monitor', (req, res) => {
      try {
        if (!gateway.hasAccount(req.params.email)) {
          throw accountNotFound(req.params.email);
        }
        res.json({
          monitoring: monitor.isMonitoring(req.params.email),
          status: monitor.getAccountStatus(req.params.email) ?? null
        });
      } catch (error) {
        mapGatewayError(res, error);
      }
    });

    router.delete('/:email/monitor', (req, res) => {
      monitor.stopMonitoring(req.params.email);
      res.status(204).send();
    });
  }

  return router;
}
