// src/common/utils/deadline.util.spec.ts

import { withDeadline } from './deadline.util';
import { DeadlineExceededError, WeatherErrorKind } from '../errors/weather.errors';

describe('withDeadline', () => {
  it('returns the result of work that finishes in time', async () => {
    await expect(withDeadline(1000, 'quick', async () => 42)).resolves.toBe(42);
  });

  it('passes through failures of the work itself', async () => {
    const failure = new Error('boom');

    await expect(
      withDeadline(1000, 'failing', async () => {
        throw failure;
      })
    ).rejects.toBe(failure);
  });

  it('rejects with DEADLINE_EXCEEDED and aborts the signal when work hangs', async () => {
    let received: AbortSignal | undefined;

    const error = await withDeadline(10, 'Weather query for "Paris"', (signal) => {
      received = signal;
      return new Promise<never>(() => undefined);
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeadlineExceededError);
    expect(error).toMatchObject({
      kind: WeatherErrorKind.DEADLINE_EXCEEDED,
      message: 'Weather query for "Paris" did not finish within 10ms',
      details: { timeoutMs: 10 },
    });
    expect(received?.aborted).toBe(true);
  });

  it('leaves the signal untouched when work completes', async () => {
    let received: AbortSignal | undefined;

    await withDeadline(1000, 'quick', async (signal) => {
      received = signal;
    });

    expect(received?.aborted).toBe(false);
  });
});
