import { getEventListeners } from 'events';
import { delay } from '../utils/async.utils';

describe('delay', () => {
  it('should remove its abort listener once the wait is over', async () => {
    const controller = new AbortController();

    await delay(5, controller.signal);
    await delay(5, controller.signal);

    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0);
  });

  it('should reject when the signal aborts', async () => {
    const controller = new AbortController();
    const waiting = delay(1000, controller.signal);

    controller.abort();

    await expect(waiting).rejects.toThrow('Aborted');
  });

  it('should reject at once for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(delay(1000, controller.signal)).rejects.toThrow('Aborted');
  });
});
