import { promises as fs } from 'fs';
import { logger } from '../core/logger';
import { config } from '../core/config';
import { InputFileError } from '../core/errors';

const TRANSIENT_CODES = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE']);

// Sleep utility
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// Exponential backoff
function getDelay(attempt: number, baseMs: number): number {
  return baseMs * Math.pow(2, attempt - 1);
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isTransientFsError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && TRANSIENT_CODES.has(code);
}

export interface RetryPolicy {
  times: number;
  baseMs: number;
}

// Retry wrapper for transient filesystem errors; anything else fails at once
export async function withFsRetry<T>(
  operation: () => Promise<T>,
  operationName: string,
  context: Record<string, unknown> = {},
  policy: RetryPolicy = { times: config.RETRY_TIMES, baseMs: config.RETRY_BASE_MS }
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ ...context, operationName, attempt, error: message }, `${operationName} attempt failed`);

      if (!isTransientFsError(error) || attempt > policy.times) {
        throw error;
      }

      const delay = getDelay(attempt, policy.baseMs);
      logger.info({ ...context, operationName, attempt, delay }, `Retrying ${operationName}`);
      await sleep(delay);
    }
  }
}

// Read a UTF-8 text file, surfacing failures as InputFileError
export async function readTextFile(filePath: string, policy?: RetryPolicy): Promise<string> {
  try {
    const text = await withFsRetry(() => fs.readFile(filePath, 'utf8'), 'File read', { filePath }, policy);
    logger.debug({ filePath, bytes: Buffer.byteLength(text) }, 'File read successfully');
    return text;
  } catch (error) {
    const reason = errorCode(error) ?? (error instanceof Error ? error.message : String(error));
    logger.error({ filePath, reason }, 'File read failed');
    throw InputFileError.unreadable(filePath, reason);
  }
}
