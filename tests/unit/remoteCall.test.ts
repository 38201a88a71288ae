/**
 * Unit Tests for bounded remote calls
 */

import { TransportError } from '../../src/errors';
import { asTransportError, withTimeout } from '../../src/utils/remoteCall';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the call result', async () => {
    await expect(withTimeout('op', 1000, async () => 'value')).resolves.toBe('value');
  });

  it('should reject with a timed-out TransportError and abort the signal', async () => {
    vi.useFakeTimers();
    const seen: { signal?: AbortSignal } = {};
    const pending = withTimeout('listRemoteUsers', 500, (signal) => {
      seen.signal = signal;
      return new Promise<never>(() => undefined);
    });
    const outcome = pending.catch((error: unknown) => error);

    await vi.advanceTimersByTimeAsync(500);
    const error = await outcome;

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ operation: 'listRemoteUsers', timedOut: true });
    expect(seen.signal?.aborted).toBe(true);
  });

  it('should wrap other rejections', async () => {
    const error = await withTimeout('deleteInvite', 1000, async () => {
      throw new Error('socket hang up');
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'deleteInvite: socket hang up', timedOut: false });
  });

  it('should wrap synchronous throws', async () => {
    await expect(
      withTimeout('createInvite', 1000, () => {
        throw new Error('bad request');
      }),
    ).rejects.toThrow('createInvite: bad request');
  });
});

describe('asTransportError', () => {
  it('should pass TransportErrors through unchanged', () => {
    const original = new TransportError('login', 'HTTP 500');
    expect(asTransportError('other', original)).toBe(original);
  });

  it('should stringify non-errors', () => {
    expect(asTransportError('login', 'refused').message).toBe('login: refused');
  });
});
