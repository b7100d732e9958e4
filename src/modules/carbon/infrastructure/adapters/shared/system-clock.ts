import { Injectable } from '@nestjs/common';
import type { ClockPort } from '../../../application/ports/clock.port';

@Injectable()
export class SystemClock implements ClockPort {
  now(): number {
    return Date.now();
  }

  sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
