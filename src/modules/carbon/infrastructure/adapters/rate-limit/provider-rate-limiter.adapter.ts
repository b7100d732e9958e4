import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ENV_DEFAULTS } from '../../../../../common/config/env.validation';
import { createLogger } from '../../../../../common/utils/logger';
import type { ClockPort } from '../../../application/ports/clock.port';
import type { ProviderRateLimiterPort } from '../../../application/ports/rate-limiter.port';
import { CLOCK_PORT } from '../../../application/ports/tokens';

/**
 * Process-wide spacing of provider calls. Waiters are served in arrival
 * order and each call starts at least `minIntervalMs` after the previous one.
 */
@Injectable()
export class ProviderRateLimiterAdapter implements ProviderRateLimiterPort {
  private readonly logger = createLogger(ProviderRateLimiterAdapter.name);
  private readonly enabled: boolean;
  private readonly minIntervalMs: number;
  private tail: Promise<void> = Promise.resolve();
  private lastStartedAt: number | undefined;
  private pending = 0;

  constructor(
    private readonly configService: ConfigService,
    @Inject(CLOCK_PORT) private readonly clock: ClockPort,
  ) {
    this.enabled =
      this.configService.get<boolean>('PROVIDER_RATE_LIMIT_ENABLED') ??
      ENV_DEFAULTS.PROVIDER_RATE_LIMIT_ENABLED;
    this.minIntervalMs =
      this.configService.get<number>('PROVIDER_RATE_LIMIT_MIN_INTERVAL_MS') ??
      ENV_DEFAULTS.PROVIDER_RATE_LIMIT_MIN_INTERVAL_MS;
  }

  get pendingCount(): number {
    return this.pending;
  }

  async acquireSlot(): Promise<void> {
    if (!this.enabled) {
      return;
    }

    this.pending += 1;
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;

      const waitMs = this.computeWaitMs();
      if (waitMs > 0) {
        this.logger.provider('provider_rate_limit_wait', {
          event: 'provider_rate_limit_wait',
          wait_ms: waitMs,
          queued: this.pending - 1,
        });
        await this.clock.sleep(waitMs);
      }

      this.lastStartedAt = this.clock.now();
    } finally {
      this.pending -= 1;
      release();
    }
  }

  private computeWaitMs(): number {
    if (this.lastStartedAt === undefined) {
      return 0;
    }

    return this.lastStartedAt + this.minIntervalMs - this.clock.now();
  }
}
