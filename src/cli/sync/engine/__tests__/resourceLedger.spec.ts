import { model } from '../../../../test/testUtils';
import { ResourceLedger } from '../resourceLedger';
import { ModelHandle } from '../types';

function handle(id: string): ModelHandle {
  return { id, identity: model(id), mode: 'full' };
}

describe('ResourceLedger', () => {
  it('closes a released handle once', async () => {
    const close = jest.fn<Promise<void>, [ModelHandle]>().mockResolvedValue(undefined);
    const ledger = new ResourceLedger({ close });
    const first = ledger.track(handle('h1'));

    await ledger.release(first);
    await ledger.release(first);

    expect(close).toHaveBeenCalledTimes(1);
    expect(ledger.size).toBe(0);
  });

  it('closes every remaining handle on drain', async () => {
    const close = jest.fn<Promise<void>, [ModelHandle]>().mockResolvedValue(undefined);
    const ledger = new ResourceLedger({ close });
    ledger.track(handle('h1'));
    ledger.track(handle('h2'));

    expect(await ledger.drain()).toBe(2);
    expect(close.mock.calls.map(([closed]) => closed.id)).toEqual(['h1', 'h2']);
    expect(await ledger.drain()).toBe(0);
  });

  it('forgets a handle even when closing it fails', async () => {
    const close = jest.fn<Promise<void>, [ModelHandle]>().mockRejectedValue(new Error('network down'));
    const ledger = new ResourceLedger({ close });
    const tracked = ledger.track(handle('h1'));

    await expect(ledger.release(tracked)).resolves.toBeUndefined();
    expect(ledger.has(tracked)).toBe(false);
  });

  it('refuses to track the same handle twice', () => {
    const ledger = new ResourceLedger({ close: jest.fn<Promise<void>, [ModelHandle]>() });
    ledger.track(handle('h1'));

    expect(() => ledger.track(handle('h1'))).toThrow('Handle h1 is already tracked');
  });
});
