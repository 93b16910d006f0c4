import { model } from '../../test/testUtils';
import { identityKey, SyncTaskState, TransitionEvent } from './engine';
import { shouldShowProgressBar, SyncProgressBar } from './progressBar';

function event(name: string, to: SyncTaskState): TransitionEvent {
  return { key: identityKey(model(name)), identity: model(name), from: 'Closing', to, attempt: 1, at: 0 };
}

describe('SyncProgressBar', () => {
  it('counts selected models toward completion and every model toward the stats', () => {
    const bar = new SyncProgressBar({ requestedKeys: new Set([identityKey(model('r'))]) }, false);

    bar.update(event('a', 'Synced'));
    bar.update(event('b', 'Failed'));
    bar.update(event('c', 'Skipped'));
    bar.update(event('r', 'Skipped'));

    expect(bar.getStats()).toEqual({ synced: 1, failed: 1, skipped: 2 });
    expect(bar.getRequestedCompleted()).toBe(1);
  });

  it('ignores transitions that do not settle a model', () => {
    const bar = new SyncProgressBar({ requestedKeys: new Set([identityKey(model('a'))]) }, false);

    bar.update(event('a', 'Syncing'));
    bar.update(event('a', 'WaitingOnChildren'));

    expect(bar.getStats()).toEqual({ synced: 0, failed: 0, skipped: 0 });
    expect(bar.getRequestedCompleted()).toBe(0);
  });

  it('counts a model once', () => {
    const bar = new SyncProgressBar({ requestedKeys: new Set([identityKey(model('a'))]) }, false);

    bar.update(event('a', 'Synced'));
    bar.update(event('a', 'Synced'));

    expect(bar.getRequestedCompleted()).toBe(1);
  });
});

describe('shouldShowProgressBar', () => {
  it('shows the bar only on a terminal without machine or verbose output', () => {
    expect(shouldShowProgressBar({}, true)).toBe(true);
    expect(shouldShowProgressBar({}, false)).toBe(false);
    expect(shouldShowProgressBar({ json: true }, true)).toBe(false);
    expect(shouldShowProgressBar({ verbose: true }, true)).toBe(false);
  });
});
