import { Request, Response, NextFunction } from 'express';
import type { MessageQueryInput } from '../lib/command-translator';
import type { AuthMethod, EndpointSettings, TlsMode } from '../types/gateway';
import {
  AttachmentRequest,
  CreateAccountRequest,
  RequestValidationError,
  RotateSecretRequest,
  SendMessageRequest,
  SendRawMessageRequest
} from '../types/api';

const EMAIL_REGEX = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const TLS_MODES: readonly TlsMode[] = ['tls', 'starttls', 'none'];
const AUTH_METHODS: readonly AuthMethod[] = ['password', 'oauth2'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new RequestValidationError(field, `${field} must be a string`);
  }
  return value;
}

function requiredString(body: Record<string, unknown>, field: string, label: string): string {
  const value = optionalString(body, field);
  if (!value || value.trim().length === 0) {
    throw new RequestValidationError(field, `${label} is required`);
  }
  return value;
}

function emailAddress(value: string, field: string): string {
  const email = value.toLowerCase().trim();
  if (!EMAIL_REGEX.test(email)) {
    throw new RequestValidationError(field, 'Invalid email address format');
  }
  return email;
}

function endpoint(body: Record<string, unknown>, field: 'imap' | 'smtp'): EndpointSettings | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new RequestValidationError(field, `${field} must be an object with host, port and tls`);
  }

  const host = typeof value.host === 'string' ? value.host.trim() : '';
  if (host.length < 3 || host.includes(' ')) {
    throw new RequestValidationError(`${field}.host`, `Invalid ${field.toUpperCase()} host format`);
  }

  const port = Number(value.port);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new RequestValidationError(`${field}.port`, `${field.toUpperCase()} port must be between 1 and 65535`);
  }

  const tls = TLS_MODES.find(mode => mode === value.tls);
  if (!tls) {
    throw new RequestValidationError(`${field}.tls`, `${field.toUpperCase()} tls must be one of ${TLS_MODES.join(', ')}`);
  }

  return { host, port, tls };
}

function addressList(body: Record<string, unknown>, field: string, required: boolean): string[] | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    if (required) {
      throw new RequestValidationError(field, `${field} is required`);
    }
    return undefined;
  }

  const list = typeof value === 'string' ? value.split(',') : value;
  if (!Array.isArray(list)) {
    throw new RequestValidationError(field, `${field} must be a list of email addresses`);
  }

  const addresses = list.map((item: unknown) => {
    if (typeof item !== 'string') {
      throw new RequestValidationError(field, `${field} must be a list of email addresses`);
    }
    return emailAddress(item, field);
  });

  if (required && addresses.length === 0) {
    throw new RequestValidationError(field, `${field} must contain at least one address`);
  }
  return addresses;
}

function attachments(body: Record<string, unknown>): AttachmentRequest[] | undefined {
  const value = body.attachments;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new RequestValidationError('attachments', 'attachments must be a list');
  }

  return value.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new RequestValidationError(`attachments[${index}]`, 'Attachment must be an object');
    }
    const filename = requiredString(item, 'filename', 'Attachment filename');
    const content = requiredString(item, 'content', 'Attachment content');
    if (!/^[A-Za-z0-9+/\r\n]*={0,2}\s*$/.test(content)) {
      throw new RequestValidationError(`attachments[${index}].content`, 'Attachment content must be base64');
    }
    const contentType = optionalString(item, 'content_type');
    return { filename, content, ...(contentType ? { content_type: contentType } : {}) };
  });
}

function respondWithError(res: Response, error: unknown): void {
  if (error instanceof RequestValidationError) {
    res.status(400).json({
      error: 'Validation error',
      field: error.field,
      message: error.message
    });
    return;
  }

  res.status(400).json({
    error: 'Invalid request body'
  });
}

export function validateCreateAccount(req: Request, res: Response, next: NextFunction): void {
  try {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      throw new RequestValidationError('body', 'Request body must be a JSON object');
    }

    const email = emailAddress(requiredString(body, 'email_address', 'Email address'), 'email_address');
    const secret = requiredString(body, 'secret', 'Secret');

    const authMethodRaw = optionalString(body, 'auth_method');
    const authMethod = authMethodRaw === undefined ? undefined : AUTH_METHODS.find(m => m === authMethodRaw);
    if (authMethodRaw !== undefined && !authMethod) {
      throw new RequestValidationError('auth_method', `auth_method must be one of ${AUTH_METHODS.join(', ')}`);
    }

    const username = optionalString(body, 'username')?.trim();
    const imap = endpoint(body, 'imap');
    const smtp = endpoint(body, 'smtp');

    const normalized: CreateAccountRequest = {
      email_address: email,
      secret, // Don't trim secrets
      ...(authMethod ? { auth_method: authMethod } : {}),
      ...(username ? { username } : {}),
      ...(imap ? { imap } : {}),
      ...(smtp ? { smtp } : {})
    };
    req.body = normalized;

    next();
  } catch (error) {
    respondWithError(res, error);
  }
}

export function validateSecretRotation(req: Request, res: Response, next: NextFunction): void {
  try {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      throw new RequestValidationError('body', 'Request body must be a JSON object');
    }

    const normalized: RotateSecretRequest = { secret: requiredString(body, 'secret', 'Secret') };
    req.body = normalized;

    next();
  } catch (error) {
    respondWithError(res, error);
  }
}

export function validateSendMessage(req: Request, res: Response, next: NextFunction): void {
  try {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      throw new RequestValidationError('body', 'Request body must be a JSON object');
    }

    const to = addressList(body, 'to', true) ?? [];
    const cc = addressList(body, 'cc', false);
    const bcc = addressList(body, 'bcc', false);
    const subject = optionalString(body, 'subject') ?? '';
    const text = optionalString(body, 'text');
    const html = optionalString(body, 'html');
    if (!text && !html) {
      throw new RequestValidationError('text', 'Either text or html is required');
    }

    const replyTo = optionalString(body, 'reply_to');
    const inReplyTo = optionalString(body, 'in_reply_to');
    const referencesValue = body.references;
    let references: string[] | undefined;
    if (typeof referencesValue === 'string') {
      references = referencesValue.split(/\s+/).filter(Boolean);
    } else if (Array.isArray(referencesValue) && referencesValue.every((r: unknown) => typeof r === 'string')) {
      references = referencesValue.filter((r: unknown): r is string => typeof r === 'string');
    } else if (referencesValue !== undefined && referencesValue !== null) {
      throw new RequestValidationError('references', 'references must be a list of message ids');
    }

    const normalized: SendMessageRequest = {
      to,
      subject,
      ...(cc ? { cc } : {}),
      ...(bcc ? { bcc } : {}),
      ...(text ? { text } : {}),
      ...(html ? { html } : {}),
      ...(replyTo ? { reply_to: emailAddress(replyTo, 'reply_to') } : {}),
      ...(inReplyTo ? { in_reply_to: inReplyTo } : {}),
      ...(references && references.length > 0 ? { references } : {}),
      ...(body.attachments !== undefined ? { attachments: attachments(body) } : {})
    };
    req.body = normalized;

    next();
  } catch (error) {
    respondWithError(res, error);
  }
}

export function validateSendRawMessage(req: Request, res: Response, next: NextFunction): void {
  try {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      throw new RequestValidationError('body', 'Request body must be a JSON object');
    }

    const to = addressList(body, 'to', true) ?? [];
    const from = optionalString(body, 'from');
    const normalized: SendRawMessageRequest = {
      to,
      ...(from ? { from: emailAddress(from, 'from') } : {}),
      raw: requiredString(body, 'raw', 'raw')
    };
    req.body = normalized;

    next();
  } catch (error) {
    respondWithError(res, error);
  }
}

function queryValue(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return queryValue(value[value.length - 1]);
  }
  return typeof value === 'string' ? value : undefined;
}

function queryDate(raw: string | undefined, field: string): Date | undefined {
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) {
    throw new RequestValidationError(field, `${field} must be an ISO 8601 date`);
  }
  return date;
}

/**
 * Reads list filters from the query string. Limits on max_results are
 * enforced by the gateway.
 */
export function parseMessageQuery(params: Request['query']): MessageQueryInput {
  const folder = queryValue(params.folder);
  const unseenOnly = queryValue(params.unseen_only);
  const from = queryValue(params.from);
  const subject = queryValue(params.subject);
  const maxResultsRaw = queryValue(params.max_results);

  if (unseenOnly !== undefined && unseenOnly !== 'true' && unseenOnly !== 'false') {
    throw new RequestValidationError('unseen_only', 'unseen_only must be true or false');
  }

  let maxResults: number | undefined;
  if (maxResultsRaw !== undefined && maxResultsRaw !== '') {
    maxResults = Number(maxResultsRaw);
    if (!Number.isInteger(maxResults) || maxResults < 1) {
      throw new RequestValidationError('max_results', 'max_results must be a positive integer');
    }
  }

  const since = queryDate(queryValue(params.since), 'since');
  const before = queryDate(queryValue(params.before), 'before');

  return {
    ...(folder ? { folder } : {}),
    unseenOnly: unseenOnly === 'true',
    ...(from ? { from } : {}),
    ...(since ? { since } : {}),
    ...(before ? { before } : {}),
    ...(subject ? { subject } : {}),
    ...(maxResults !== undefined ? { maxResults } : {})
  };
}

export function validateMessageQuery(req: Request, res: Response, next: NextFunction): void {
  try {
    parseMessageQuery(req.query);
    next();
  } catch (error) {
    respondWithError(res, error);
  }
}
