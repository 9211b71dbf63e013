/**
 * Time port.
 *
 * Replay stamps requests that carry no timestamp with `now()`.
 * Injectable so tests are deterministic.
 */
export interface TimeClockPort {
  now(): Date;
}
