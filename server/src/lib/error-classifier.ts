import { GatewayError, GatewayErrorKind, isGatewayError } from './gateway-errors';

export interface ClassifyContext {
  email?: string;
  secrets?: string[];
}

const REDACTED = '****';

const CONNECTION_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'EAI_AGAIN',
  'ECONNECTION', // nodemailer
  'ESOCKET',
  'EDNS',
  'NOT_CONNECTED',
  'INVALID_STATE',
  'CONNECTION_FAILED'
]);

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ETIMEOUT', 'ESOCKETTIMEDOUT']);

const PROTOCOL_CODES = new Set([
  'SEARCH_FAILED',
  'FETCH_FAILED',
  'LIST_FAILED',
  'EENVELOPE',
  'EMESSAGE',
  'EPROTOCOL'
]);

const AUTH_MESSAGE = /authentication failed|invalid credentials|login failed|authenticationfailed|username and password not accepted/i;

interface ErrorFacts {
  message: string;
  code?: string;
  source?: string;
  textCode?: string;
  responseCode?: number;
}

function readFacts(error: Error): ErrorFacts {
  const code: unknown = Reflect.get(error, 'code');
  const source: unknown = Reflect.get(error, 'source');
  const textCode: unknown = Reflect.get(error, 'textCode');
  const responseCode: unknown = Reflect.get(error, 'responseCode');

  return {
    message: error.message,
    code: typeof code === 'string' ? code : undefined,
    source: typeof source === 'string' ? source : undefined,
    textCode: typeof textCode === 'string' ? textCode : undefined,
    responseCode: typeof responseCode === 'number' ? responseCode : undefined
  };
}

export function scrubSecrets(text: string, secrets: string[] = []): string {
  let result = text;
  for (const secret of secrets) {
    if (secret.length > 0) {
      result = result.split(secret).join(REDACTED);
    }
  }
  return result;
}

function kindOf(facts: ErrorFacts): { kind: GatewayErrorKind; summary: string; code?: string } {
  const { code, source, textCode, responseCode, message } = facts;

  if (source === 'authentication' ||
      textCode === 'AUTHENTICATIONFAILED' ||
      code === 'AUTHENTICATIONFAILED' ||
      code === 'EAUTH' ||
      responseCode === 535 ||
      AUTH_MESSAGE.test(message)) {
    return { kind: 'authentication', summary: 'Authentication rejected by the mail server' };
  }

  if (source === 'timeout' ||
      source === 'timeout-auth' ||
      source === 'socket-timeout' ||
      (code !== undefined && TIMEOUT_CODES.has(code))) {
    return { kind: 'timeout', summary: 'Mail server did not respond in time' };
  }

  if (source === 'socket' || (code !== undefined && CONNECTION_CODES.has(code))) {
    return { kind: 'connection', summary: 'Connection to the mail server failed' };
  }

  if (code === 'SELECT_FAILED' || textCode === 'NONEXISTENT') {
    return { kind: 'not_found', summary: 'Folder not found', code: 'FOLDER_NOT_FOUND' };
  }

  if (code === 'EENVELOPE') {
    return { kind: 'protocol', summary: 'Mail server rejected the recipients', code: 'RECIPIENTS_REJECTED' };
  }

  if (source === 'protocol' ||
      (code !== undefined && PROTOCOL_CODES.has(code)) ||
      (responseCode !== undefined && responseCode >= 400)) {
    return { kind: 'protocol', summary: 'Unexpected response from the mail server' };
  }

  return { kind: 'internal', summary: 'Unexpected gateway failure' };
}

/**
 * Maps any failure raised below the facade onto the closed GatewayError
 * taxonomy. The returned error holds no reference to the original.
 */
export function classifyError(error: unknown, context: ClassifyContext = {}): GatewayError {
  if (isGatewayError(error)) {
    return error;
  }

  if (!(error instanceof Error)) {
    return new GatewayError('internal', 'Unexpected gateway failure', {
      email: context.email,
      causeDescription: scrubSecrets(String(error), context.secrets)
    });
  }

  const facts = readFacts(error);
  const { kind, summary, code } = kindOf(facts);
  const causeDescription = scrubSecrets(facts.message, context.secrets);

  const message = kind === 'internal' || causeDescription.length === 0
    ? summary
    : `${summary}: ${causeDescription}`;

  return new GatewayError(kind, message, {
    email: context.email,
    code,
    causeDescription
  });
}
