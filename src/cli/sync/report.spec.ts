import chalk from 'chalk';

import { model } from '../../test/testUtils';
import { identityKey, SyncRunResult, SyncTaskOutcome } from './engine';
import { toSyncOutputModel } from './jsonOutput';
import { formatOutcome, formatSummary, formatTreeLine } from './report';

function outcome(name: string, overrides: Partial<SyncTaskOutcome> = {}): SyncTaskOutcome {
  return {
    key: identityKey(model(name)),
    identity: model(name),
    implicit: false,
    state: 'Synced',
    attempts: 1,
    ...overrides,
  };
}

describe('report', () => {
  const level = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  it('formats each final state', () => {
    expect(formatOutcome(outcome('arch', { name: 'Architecture' }))).toBe('✓ Architecture (arch)');
    expect(formatOutcome(outcome('grid', { implicit: true, attempts: 3 }))).toBe('✓ grid (dependency) after 3 attempts');
    expect(formatOutcome(outcome('grid', { state: 'Failed', error: 'Locked', message: 'locked by another user' }))).toBe(
      '✗ grid: Locked locked by another user'
    );
    expect(
      formatOutcome(
        outcome('site', { state: 'Skipped', skipReason: 'dependency-failed', error: 'Locked', causedBy: model('grid') })
      )
    ).toBe('⊘ site: skipped, grid failed (Locked)');
    expect(formatOutcome(outcome('site', { state: 'Skipped', skipReason: 'cancelled' }))).toBe(
      '⊘ site: skipped, run cancelled'
    );
  });

  it('summarizes the run', () => {
    const tasks = [outcome('a'), outcome('b', { state: 'Failed', error: 'SyncConflict' }), outcome('r', { state: 'Skipped' })];
    const result: SyncRunResult = {
      status: 'completed',
      tasks,
      explicit: tasks,
      implicit: [],
      stats: { synced: 1, failed: 1, skipped: 1 },
    };

    expect(formatSummary(result)).toBe('3 models processed (1 synced, 1 failed, 1 skipped)');
    expect(formatSummary({ ...result, status: 'cancelled' })).toBe(
      '3 models processed (1 synced, 1 failed, 1 skipped) - run cancelled'
    );
  });

  it('indents tree lines and marks circular links', () => {
    const line = { depth: 2, key: identityKey(model('a')), identity: model('a'), failed: false, cyclic: true };

    expect(formatTreeLine(line)).toBe('    a ↺ circular link');
    expect(formatTreeLine({ ...line, depth: 0, cyclic: false, failed: true, name: 'Arch' })).toBe('Arch (a) (unreachable)');
  });

  it('writes the cause of a skip as an id in json output', () => {
    expect(toSyncOutputModel(outcome('r', { state: 'Skipped', causedBy: model('b') })).causedBy).toBe('US:project-1:b');
  });
});
