import { promises as fs } from 'fs';

import { log } from '../../io';
import * as utils from '../../utils';
import { IdentityKey, identityKey, ModelIdentity, OrderedModel, SyncRunResult } from './engine';

export interface ResumeState {
  root: IdentityKey;
  /** Selected models that did not sync in the last run. */
  pending: Array<IdentityKey>;
}

export function toResumeState(root: ModelIdentity, result: SyncRunResult): ResumeState | undefined {
  const pending = result.explicit.filter(task => task.state !== 'Synced').map(task => task.key);
  if (pending.length === 0) {
    return undefined;
  }
  return { root: identityKey(root), pending };
}

/**
 * Selects the pending models of `state` that are still part of the discovered order.
 * A state saved for another root selects nothing; an empty selection plans nothing.
 */
export function applyResumeState(order: Array<OrderedModel>, state: ResumeState, root: ModelIdentity): Array<ModelIdentity> {
  if (state.root !== identityKey(root)) {
    log.warn(`resume state belongs to ${state.root}, not ${identityKey(root)}; ignoring it`);
    return [];
  }
  const pending = new Set(state.pending);
  const selection = order.filter(model => pending.has(model.key)).map(model => model.identity);
  if (selection.length < pending.size) {
    log.warn(`${pending.size - selection.length} model(s) from the resume state are no longer linked`);
  }
  return selection;
}

export async function loadResumeState(stateFile: string): Promise<ResumeState | undefined> {
  let content: unknown;
  try {
    content = await utils.readJsonFile(stateFile);
  } catch (err) {
    if (!utils.isErrnoException(err) || err.code !== 'ENOENT') {
      log.warn(`Failed to read resume state from ${stateFile}: ${utils.errorToString(err)}`);
    }
    return undefined;
  }
  if (!isResumeState(content)) {
    log.warn(`Ignoring resume state in ${stateFile}: unexpected content`);
    return undefined;
  }
  return content;
}

export async function saveResumeState(stateFile: string, state: ResumeState): Promise<void> {
  await fs.writeFile(stateFile, utils.stringifySafe(state, 2));
}

export async function clearResumeState(stateFile: string): Promise<void> {
  try {
    await fs.unlink(stateFile);
  } catch (err) {
    if (!utils.isErrnoException(err) || err.code !== 'ENOENT') {
      log.warn(`Failed to clear resume state at ${stateFile}: ${utils.errorToString(err)}`);
    }
  }
}

function isResumeState(value: unknown): value is ResumeState {
  return (
    utils.isRecord(value) &&
    typeof value.root === 'string' &&
    Array.isArray(value.pending) &&
    value.pending.every(key => typeof key === 'string')
  );
}
