export type GatewayErrorKind =
  | 'authentication'
  | 'connection'
  | 'timeout'
  | 'not_found'
  | 'configuration'
  | 'protocol'
  | 'internal';

export const GATEWAY_ERROR_KINDS: readonly GatewayErrorKind[] = [
  'authentication',
  'connection',
  'timeout',
  'not_found',
  'configuration',
  'protocol',
  'internal'
];

export interface GatewayErrorOptions {
  email?: string;
  code?: string;
  causeDescription?: string;
}

const DEFAULT_CODES: Record<GatewayErrorKind, string> = {
  authentication: 'AUTHENTICATION_FAILED',
  connection: 'CONNECTION_FAILED',
  timeout: 'OPERATION_TIMEOUT',
  not_found: 'NOT_FOUND',
  configuration: 'INVALID_CONFIGURATION',
  protocol: 'PROTOCOL_ERROR',
  internal: 'INTERNAL_ERROR'
};

/**
 * The only error shape that leaves the gateway core. Carries a scrubbed
 * description of the underlying failure, never the failure object itself.
 */
export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  readonly code: string;
  readonly email?: string;
  readonly causeDescription?: string;

  constructor(kind: GatewayErrorKind, message: string, options: GatewayErrorOptions = {}) {
    super(message);
    this.name = errorNameFor(kind);
    this.kind = kind;
    this.code = options.code ?? DEFAULT_CODES[kind];
    this.email = options.email;
    this.causeDescription = options.causeDescription;
  }

  toJSON(): { kind: GatewayErrorKind; code: string; message: string; email?: string } {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      ...(this.email ? { email: this.email } : {})
    };
  }
}

function errorNameFor(kind: GatewayErrorKind): string {
  switch (kind) {
    case 'authentication':
      return 'AuthenticationError';
    case 'connection':
      return 'ConnectionError';
    case 'timeout':
      return 'TimeoutError';
    case 'not_found':
      return 'NotFoundError';
    case 'configuration':
      return 'ConfigurationError';
    case 'protocol':
      return 'ProtocolError';
    case 'internal':
      return 'InternalError';
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

export function accountNotFound(email: string): GatewayError {
  return new GatewayError('not_found', `No such account: ${email}`, {
    email,
    code: 'ACCOUNT_NOT_FOUND'
  });
}

export function configurationError(message: string, email?: string): GatewayError {
  return new GatewayError('configuration', message, { email });
}
