import type { Result } from 'neverthrow';

export type HistoricalSourceError = {
  readonly code: 'HISTORICAL_SOURCE_FAILED';
  readonly fqn: string;
  readonly message: string;
};

/**
 * Historical value source port.
 *
 * Supplies the value a feature had for an entity at a point in time.
 * `undefined` means no value was recorded.
 */
export interface HistoricalValueSource {
  valueAt(
    fqn: string,
    keys: Readonly<Record<string, string>>,
    timestamp: Date
  ): Result<unknown, HistoricalSourceError>;
}
