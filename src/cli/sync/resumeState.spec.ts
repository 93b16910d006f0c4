import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { createGraph, FakeGateway, model, names } from '../../test/testUtils';
import { buildSyncPlan, identityKey, resolveRunConfig, sortGraph, SyncOrchestrator, discoverDependencies } from './engine';
import { applyResumeState, clearResumeState, loadResumeState, saveResumeState, toResumeState } from './resumeState';

describe('toResumeState', () => {
  it('keeps the selected models that did not sync', async () => {
    const gateway = new FakeGateway({ r: ['a', 'b'], a: [], b: [] }).fail('sync', 'b', 'SyncConflict');
    const graph = await discoverDependencies(model('r'), gateway);
    const plan = buildSyncPlan(graph, [model('a'), model('b'), model('r')]);
    const result = await new SyncOrchestrator(gateway).run(
      plan,
      resolveRunConfig({ linkReloadDelayMs: 0, retryBackoffBaseMs: 0 })
    );

    expect(toResumeState(model('r'), result)).toEqual({
      root: identityKey(model('r')),
      pending: [identityKey(model('b')), identityKey(model('r'))],
    });
  });

  it('returns nothing after a clean run', async () => {
    const gateway = new FakeGateway({ r: [] });
    const plan = buildSyncPlan(await discoverDependencies(model('r'), gateway));
    const result = await new SyncOrchestrator(gateway).run(plan, resolveRunConfig({ linkReloadDelayMs: 0 }));

    expect(toResumeState(model('r'), result)).toBeUndefined();
  });
});

describe('applyResumeState', () => {
  const order = sortGraph(createGraph({ r: ['a', 'b'], a: [], b: [] }));

  it('selects the pending models still in the order', () => {
    const state = {
      root: identityKey(model('r')),
      pending: [identityKey(model('r')), identityKey(model('gone')), identityKey(model('b'))],
    };

    expect(applyResumeState(order, state, model('r')).map(identity => identity.modelId)).toEqual(['b', 'r']);
  });

  it('ignores a state saved for another root', () => {
    const state = { root: identityKey(model('other')), pending: [identityKey(model('a'))] };

    expect(applyResumeState(order, state, model('r'))).toEqual([]);
  });

  it('plans nothing when the state is foreign or no longer linked', () => {
    const graph = createGraph({ r: ['a', 'b'], a: [], b: [] });
    const foreign = { root: identityKey(model('other')), pending: [identityKey(model('a'))] };
    const stale = { root: identityKey(model('r')), pending: [identityKey(model('gone'))] };

    expect(buildSyncPlan(graph, applyResumeState(order, foreign, model('r')), order).entries).toEqual([]);
    expect(buildSyncPlan(graph, applyResumeState(order, stale, model('r')), order).entries).toEqual([]);
  });

  it('feeds the planner like a selection', () => {
    const graph = createGraph({ r: ['a', 'b'], a: [], b: [] });
    const state = { root: identityKey(model('r')), pending: [identityKey(model('a'))] };

    expect(names(buildSyncPlan(graph, applyResumeState(order, state, model('r'))).entries)).toEqual(['a']);
  });
});

describe('resume state file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'synctree-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('round-trips through the state file and clears it', async () => {
    const stateFile = join(dir, '.synctree-state');
    const state = { root: identityKey(model('r')), pending: [identityKey(model('a'))] };

    await saveResumeState(stateFile, state);
    expect(await loadResumeState(stateFile)).toEqual(state);

    await clearResumeState(stateFile);
    expect(await loadResumeState(stateFile)).toBeUndefined();
  });

  it('treats a missing or malformed file as no state', async () => {
    const stateFile = join(dir, 'state.json');
    await fs.writeFile(stateFile, JSON.stringify({ fileName: 'old.http', line: 3 }));

    expect(await loadResumeState(join(dir, 'missing'))).toBeUndefined();
    expect(await loadResumeState(stateFile)).toBeUndefined();
    await expect(clearResumeState(join(dir, 'missing'))).resolves.toBeUndefined();
  });
});
