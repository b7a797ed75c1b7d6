/**
 * API Error Handling
 *
 * One JSON error shape for every route:
 * `{ success: false, error, code, timestamp, details? }`
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { logger } from './logger';
import { ConfigurationError, InvalidAnalysisContextError } from '../services/analysis/errors';
import { LlmNetworkError, LlmTimeoutError } from '../services/llm/llm-client';
import { CircuitOpenError } from '../services/resilience/circuit-breaker';

export type ErrorCode =
  | 'AUTH_ERROR'
  | 'UNAUTHORIZED'
  | 'RATE_LIMIT'
  | 'TIMEOUT'
  | 'MODEL_ERROR'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'CONFIG_ERROR'
  | 'INTERNAL_ERROR';

interface ClassifiedError {
  status: ContentfulStatusCode;
  code: ErrorCode;
  message: string;
  details?: string[];
}

function classifyError(error: unknown): ClassifiedError {
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof InvalidAnalysisContextError) {
    return { status: 400, code: 'VALIDATION_ERROR', message, details: error.issues };
  }
  if (error instanceof ConfigurationError) {
    return { status: 500, code: 'CONFIG_ERROR', message };
  }
  if (error instanceof LlmTimeoutError) {
    return { status: 504, code: 'TIMEOUT', message };
  }
  if (error instanceof LlmNetworkError || error instanceof CircuitOpenError) {
    return { status: 503, code: 'MODEL_ERROR', message };
  }

  const lower = message.toLowerCase();

  if (lower.includes('api key') || lower.includes('unauthorized') || lower.includes('forbidden')) {
    return { status: 401, code: 'AUTH_ERROR', message };
  }
  if (lower.includes('rate limit') || lower.includes('quota') || lower.includes('too many')) {
    return { status: 429, code: 'RATE_LIMIT', message };
  }
  if (lower.includes('timeout') || lower.includes('timed out') || lower.includes('deadline')) {
    return { status: 504, code: 'TIMEOUT', message };
  }
  if (lower.includes('model') || lower.includes('provider')) {
    return { status: 503, code: 'MODEL_ERROR', message };
  }
  if (lower.includes('required') || lower.includes('invalid') || lower.includes('validation')) {
    return { status: 400, code: 'VALIDATION_ERROR', message };
  }
  if (lower.includes('not found')) {
    return { status: 404, code: 'NOT_FOUND', message };
  }

  return { status: 500, code: 'INTERNAL_ERROR', message };
}

function errorBody(code: ErrorCode, error: string, details?: string[]) {
  return {
    success: false,
    error,
    code,
    ...(details ? { details } : {}),
    timestamp: new Date().toISOString(),
  };
}

export function handleApiError(c: Context, error: unknown, context?: string) {
  const classified = classifyError(error);

  if (classified.status >= 500) {
    logger.error(
      { err: error instanceof Error ? error : undefined, code: classified.code, context },
      `[API] ${context ?? c.req.path} failed: ${classified.message}`
    );
  } else {
    logger.warn(`[API] ${context ?? c.req.path} rejected (${classified.code}): ${classified.message}`);
  }

  return c.json(
    errorBody(classified.code, classified.message, classified.details),
    classified.status
  );
}

export function handleValidationError(c: Context, message: string, details?: string[]) {
  return c.json(errorBody('VALIDATION_ERROR', message, details), 400);
}

export function handleNotFoundError(c: Context, resource: string) {
  return c.json(errorBody('NOT_FOUND', `${resource} not found`), 404);
}

export function handleUnauthorizedError(c: Context) {
  return c.json(errorBody('UNAUTHORIZED', 'Unauthorized'), 401);
}

export function jsonSuccess<T extends Record<string, unknown>>(
  c: Context,
  data: T,
  status: ContentfulStatusCode = 200
) {
  return c.json({ success: true, ...data, timestamp: new Date().toISOString() }, status);
}

export function jsonSuccessData<T>(c: Context, data: T, status: ContentfulStatusCode = 200) {
  return c.json({ success: true, data, timestamp: new Date().toISOString() }, status);
}
