import { Response } from 'express';
import { classifyError } from '../error-classifier';
import { GatewayErrorKind } from '../gateway-errors';
import { RequestValidationError } from '../../types/api';

type Task<T> = () => Promise<T>;

const STATUS_BY_KIND: Record<GatewayErrorKind, number> = {
  authentication: 401,
  not_found: 404,
  configuration: 400,
  connection: 502,
  protocol: 502,
  timeout: 504,
  internal: 500
};

export function statusForKind(kind: GatewayErrorKind): number {
  return STATUS_BY_KIND[kind];
}

/**
 * Writes a failure as JSON. Everything except request validation goes
 * through the classifier, so raw transport errors never reach a client.
 */
export function mapGatewayError(res: Response, error: unknown): Response {
  if (error instanceof RequestValidationError) {
    return res.status(400).json({
      error: 'Validation error',
      field: error.field,
      message: error.message
    });
  }

  const gatewayError = classifyError(error);
  const status = gatewayError.code === 'ACCOUNT_EXISTS' ? 409 : statusForKind(gatewayError.kind);

  return res.status(status).json({
    error: gatewayError.code,
    kind: gatewayError.kind,
    message: gatewayError.message
  });
}

export async function withGatewayJson<T>(res: Response, task: Task<T>, status = 200): Promise<Response> {
  try {
    const data = await task();
    return res.status(status).json(data);
  } catch (error) {
    return mapGatewayError(res, error);
  }
}
