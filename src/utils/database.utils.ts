import { Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { errorMessage } from './errors';

const logger = new Logger('DatabaseUtils');

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  operationName?: string;
}

/**
 * Retry a database operation with exponential backoff.
 * Only connection-class failures are retried; constraint violations and
 * other query errors are rethrown on the first attempt.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelayMs = 100,
    maxDelayMs = 2000,
    operationName = 'Database operation',
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isRetryableError(error) || attempt >= maxRetries) {
        logger.error(
          `${operationName} failed after ${attempt} attempt(s): ${errorMessage(error)}`,
        );
        throw error;
      }

      const delay = Math.min(
        baseDelayMs * Math.pow(2, attempt - 1) + Math.random() * 100,
        maxDelayMs,
      );

      logger.warn(
        `${operationName} failed (attempt ${attempt}/${maxRetries}), retrying in ${Math.round(delay)}ms: ${errorMessage(error)}`,
      );

      await sleep(delay);
    }
  }
}

const RETRYABLE_PATTERNS = [
  'connection terminated',
  'connection timeout',
  'connection refused',
  'econnreset',
  'econnrefused',
  'etimedout',
  'socket hang up',
  'too many clients',
  'remaining connection slots',
  'cannot acquire',
  'database is locked',
];

// PostgreSQL SQLSTATE classes 08 (connection), 57P (operator intervention), 53 (resources)
const RETRYABLE_CODES = [
  '08000',
  '08001',
  '08003',
  '08004',
  '08006',
  '57p01',
  '57p02',
  '57p03',
  '53300',
  '53400',
];

export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const message = error.message.toLowerCase();
  if (RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern))) {
    return true;
  }

  const code = 'code' in error ? String(error.code).toLowerCase() : '';
  return RETRYABLE_CODES.includes(code);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function isConnectionHealthy(dataSource: DataSource): Promise<boolean> {
  if (!dataSource.isInitialized) {
    return false;
  }

  try {
    await dataSource.query('SELECT 1');
    return true;
  } catch (error) {
    logger.warn(`Database health check failed: ${errorMessage(error)}`);
    return false;
  }
}
