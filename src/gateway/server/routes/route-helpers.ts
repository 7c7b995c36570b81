/**
 * @fileoverview Shared helper utilities and dependency contracts for gateway route modules.
 *
 * Centralizes request pooling, validation and standardized error responses so individual
 * route modules can focus on the orchestrator call. Status codes follow `getHttpStatus`.
 */

import type { Response } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';
import { ErrorCode, fromZodError, getHttpStatus, toAppError } from '../../../utils/error.utils';
import type { StandardAPIResponse } from '../../types/gateway.types';
import type { GatewayDependencies } from '../job-operations';

/**
 * Common dependencies shared across route modules.
 */
export type RouteDependencies = GatewayDependencies;

/**
 * Convenience helper for returning standardized error payloads from modules.
 */
export function sendErrorResponse(
  res: Response,
  statusCode: number,
  message: string,
  extras: Omit<StandardAPIResponse, 'success' | 'error'> = {}
): Response {
  const payload: StandardAPIResponse = {
    ...extras,
    success: false,
    error: message
  };
  return res.status(statusCode).json(payload);
}

export function sendAppError(res: Response, error: unknown): Response {
  const appError = toAppError(error);
  const details = appError.code === ErrorCode.VALIDATION ? appError.context?.issues : undefined;
  return sendErrorResponse(
    res,
    getHttpStatus(appError.code),
    appError.message,
    details === undefined ? { code: appError.code } : { code: appError.code, details }
  );
}

/**
 * Parse untrusted input or throw a VALIDATION AppError
 */
export function parseOrThrow<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
  const validation = schema.safeParse(value);
  if (!validation.success) {
    throw fromZodError(validation.error);
  }
  return validation.data;
}

/**
 * Run `work` on the request pool and answer `{ success: true, ...payload }`, or the mapped
 * error response
 */
export async function respond(
  res: Response,
  deps: RouteDependencies,
  work: () => object,
  statusCode = 200
): Promise<void> {
  try {
    const payload = await deps.requestPool.run(async () => work());
    res.status(statusCode).json({ success: true, ...payload });
  } catch (error) {
    const appError = toAppError(error);
    if (getHttpStatus(appError.code) >= 500) {
      deps.logger.error(`Request failed: ${appError.message}`);
    }
    sendAppError(res, appError);
  }
}
