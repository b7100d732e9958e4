import { validateEnv } from '@/common/config/env.validation';
import { ProviderRateLimiterAdapter } from '@/modules/carbon/infrastructure/adapters/rate-limit';
import { FakeClock } from '../../../_helpers/carbon-fakes';
import { buildConfigService } from '../../../_helpers/config';

function buildLimiter(overrides: Record<string, unknown> = {}) {
  const clock = new FakeClock();
  const limiter = new ProviderRateLimiterAdapter(
    buildConfigService({
      PROVIDER_RATE_LIMIT_ENABLED: true,
      PROVIDER_RATE_LIMIT_MIN_INTERVAL_MS: 20000,
      ...overrides,
    }),
    clock,
  );

  return { clock, limiter };
}

describe('ProviderRateLimiterAdapter', () => {
  it('lets the first call start at once', async () => {
    const { clock, limiter } = buildLimiter();

    await limiter.acquireSlot();

    expect(clock.sleeps).toEqual([]);
    expect(clock.now()).toBe(0);
  });

  it('spaces call starts by the minimum interval', async () => {
    const { clock, limiter } = buildLimiter();
    const starts: number[] = [];

    await limiter.acquireSlot();
    starts.push(clock.now());
    clock.advance(3000);
    await limiter.acquireSlot();
    starts.push(clock.now());

    expect(clock.sleeps).toEqual([17000]);
    expect(starts).toEqual([0, 20000]);
  });

  it('does not wait once the interval has already passed', async () => {
    const { clock, limiter } = buildLimiter();

    await limiter.acquireSlot();
    clock.advance(25000);
    await limiter.acquireSlot();

    expect(clock.sleeps).toEqual([]);
  });

  it('queues concurrent callers one interval apart', async () => {
    const { clock, limiter } = buildLimiter();

    const pending = [limiter.acquireSlot(), limiter.acquireSlot(), limiter.acquireSlot()];
    expect(limiter.pendingCount).toBe(3);

    await Promise.all(pending);

    expect(clock.sleeps).toEqual([20000, 20000]);
    expect(clock.now()).toBe(40000);
    expect(limiter.pendingCount).toBe(0);
  });

  it('is a no-op when disabled', async () => {
    const { clock, limiter } = buildLimiter({ PROVIDER_RATE_LIMIT_ENABLED: false });

    await Promise.all([limiter.acquireSlot(), limiter.acquireSlot()]);

    expect(clock.sleeps).toEqual([]);
    expect(limiter.pendingCount).toBe(0);
  });

  it('takes the interval from the validated env', async () => {
    const env = validateEnv({
      PROVIDER_RATE_LIMIT_ENABLED: 'yes',
      PROVIDER_RATE_LIMIT_MIN_INTERVAL_MS: '500',
    });
    const { clock, limiter } = buildLimiter({ ...env });

    await limiter.acquireSlot();
    await limiter.acquireSlot();

    expect(clock.sleeps).toEqual([500]);
  });

  it('applies the default interval when nothing is configured', async () => {
    const clock = new FakeClock();
    const limiter = new ProviderRateLimiterAdapter(buildConfigService({}), clock);

    await limiter.acquireSlot();
    await limiter.acquireSlot();

    expect(clock.sleeps).toEqual([20000]);
  });
});
