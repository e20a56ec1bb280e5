import type { LevelWithSilent } from 'pino';

/**
 * Logging configuration.
 */
export interface LoggingConfig {
  /** Minimum level written (default: 'info') */
  readonly level?: LevelWithSilent | undefined;
  /** Value of the `service` base field (default: 'typed-cache') */
  readonly service?: string | undefined;
}
