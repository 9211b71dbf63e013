import { singleton } from 'tsyringe';
import type { TimeClockPort } from '../../ports/time-clock.port.js';

@singleton()
export class SystemClock implements TimeClockPort {
  now(): Date {
    return new Date();
  }
}
