/**
 * Centralized Simulator Configuration
 *
 * Environment-driven configuration with typed defaults:
 * - Logging level
 * - HTTP port and body limit
 * - File read retry policy
 * - Stack size and unresolved-item policies
 */

import { LogLevel, SimulatorConfig } from './config.types';
import {
  parseEnumVar,
  parseNonNegativeInt,
  parsePositiveInt,
  parseStringVar,
} from './config.utils';
import { STACK_SIZE_POLICIES, UNRESOLVED_POLICIES } from './types';

export type { SimulatorConfig } from './config.types';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Read the configuration from the current environment
 */
export function loadConfig(): SimulatorConfig {
  return Object.freeze({
    LOG_LEVEL: parseEnumVar('LOG_LEVEL', 'info', LOG_LEVELS),

    PORT: parsePositiveInt('PORT', 3000, 65535),
    BODY_LIMIT: parseStringVar('BODY_LIMIT', '1mb'),

    RETRY_TIMES: parseNonNegativeInt('RETRY_TIMES', 2),
    RETRY_BASE_MS: parsePositiveInt('RETRY_BASE_MS', 50), // doubled per attempt

    STACK_SIZE_POLICY: parseEnumVar('STACK_SIZE_POLICY', 'quantity', STACK_SIZE_POLICIES),
    UNRESOLVED_POLICY: parseEnumVar('UNRESOLVED_POLICY', 'drop', UNRESOLVED_POLICIES),
  });
}

export const config: SimulatorConfig = loadConfig();

/**
 * Check if configuration is valid
 */
export function validateConfig(candidate: SimulatorConfig = config): boolean {
  const issues: string[] = [];

  if (candidate.PORT <= 0 || candidate.PORT > 65535) {
    issues.push('PORT must be between 1 and 65535');
  }

  if (candidate.RETRY_TIMES < 0) {
    issues.push('RETRY_TIMES must be non-negative');
  }

  if (candidate.RETRY_BASE_MS <= 0) {
    issues.push('RETRY_BASE_MS must be positive');
  }

  if (!STACK_SIZE_POLICIES.includes(candidate.STACK_SIZE_POLICY)) {
    issues.push(`STACK_SIZE_POLICY must be one of ${STACK_SIZE_POLICIES.join(', ')}`);
  }

  if (!UNRESOLVED_POLICIES.includes(candidate.UNRESOLVED_POLICY)) {
    issues.push(`UNRESOLVED_POLICY must be one of ${UNRESOLVED_POLICIES.join(', ')}`);
  }

  if (issues.length > 0) {
    console.error('Configuration validation failed:', issues);
    return false;
  }

  return true;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(): Record<string, unknown> {
  return {
    logLevel: config.LOG_LEVEL,
    http: {
      port: config.PORT,
      bodyLimit: config.BODY_LIMIT,
    },
    retry: {
      times: config.RETRY_TIMES,
      baseMs: config.RETRY_BASE_MS,
    },
    policies: {
      stackSize: config.STACK_SIZE_POLICY,
      unresolved: config.UNRESOLVED_POLICY,
    },
  };
}
