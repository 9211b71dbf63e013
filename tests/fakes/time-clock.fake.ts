import type { TimeClockPort } from '../../src/ports/time-clock.port.js';

/**
 * Fake time clock for deterministic replays.
 */
export class FakeTimeClock implements TimeClockPort {
  private currentMs = Date.UTC(2024, 0, 15, 12, 0, 0);

  now(): Date {
    return new Date(this.currentMs);
  }

  // Test utilities
  advance(ms: number): void {
    this.currentMs += ms;
  }

  setTime(date: Date): void {
    this.currentMs = date.getTime();
  }
}
