import { StackSizePolicy, UnresolvedPolicy } from './types';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface SimulatorConfig {
  // Logging
  readonly LOG_LEVEL: LogLevel;

  // HTTP surface
  readonly PORT: number;
  readonly BODY_LIMIT: string;

  // File read retry policy
  readonly RETRY_TIMES: number;
  readonly RETRY_BASE_MS: number;

  // Allocation policies
  readonly STACK_SIZE_POLICY: StackSizePolicy;
  readonly UNRESOLVED_POLICY: UnresolvedPolicy;
}
