import { log } from '../../../io';
import { errorToString, sleep } from '../../../utils';
import { toDocumentOptions, validateRunConfig, RunConfig } from './config';
import { toErrorKind } from './errors';
import { formatIdentity } from './identity';
import { ResourceLedger } from './resourceLedger';
import { RetryPolicy } from './retryPolicy';
import {
  CloudDocumentGateway,
  DocumentOptions,
  ErrorKind,
  IdentityKey,
  ModelHandle,
  NodeError,
  PlanEntry,
  SkipReason,
  SyncPlan,
  SyncRunResult,
  SyncTask,
  SyncTaskOutcome,
  SyncTaskState,
  TransitionEvent,
  TransitionListener,
} from './types';

const TRANSITIONS: Record<SyncTaskState, ReadonlyArray<SyncTaskState>> = {
  Queued: ['WaitingOnChildren', 'Skipped', 'Failed'],
  WaitingOnChildren: ['Opening', 'Skipped'],
  Opening: ['Syncing', 'Failed', 'WaitingOnChildren'],
  Syncing: ['Closing', 'Failed', 'WaitingOnChildren'],
  Closing: ['Synced', 'Failed', 'WaitingOnChildren'],
  Synced: [],
  Failed: [],
  Skipped: [],
};

const TERMINAL_STATES: ReadonlyArray<SyncTaskState> = ['Synced', 'Failed', 'Skipped'];

export function isTerminalState(state: SyncTaskState): boolean {
  return TERMINAL_STATES.includes(state);
}

export function canTransition(from: SyncTaskState, to: SyncTaskState): boolean {
  return TRANSITIONS[from].includes(to);
}

export interface RunOptions {
  /** Stops dequeuing; models already being synced finish first. */
  signal?: AbortSignal;
}

interface TransitionDetails {
  error?: ErrorKind;
  message?: string;
  skipReason?: SkipReason;
  causedBy?: IdentityKey;
}

/**
 * Syncs the models of a plan bottom-up. A model is opened only after every plan
 * member it links has synced; when one of them fails, the model and everything above
 * it is skipped. Progress is published as state transitions to the subscribers of
 * {@link onTransition}.
 */
export class SyncOrchestrator {
  private readonly listeners = new Set<TransitionListener>();

  constructor(
    private readonly gateway: CloudDocumentGateway,
    private readonly now: () => number = Date.now
  ) {}

  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async run(plan: SyncPlan, config: RunConfig, options: RunOptions = {}): Promise<SyncRunResult> {
    const run = new SyncRun(this.gateway, plan, config, options, this.now, event => this.emit(event));
    return await run.execute();
  }

  private emit(event: TransitionEvent) {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.warn(`transition listener failed: ${errorToString(err)}`);
      }
    }
  }
}

class SyncRun {
  private readonly tasks = new Map<IdentityKey, SyncTask>();
  private readonly running = new Map<IdentityKey, Promise<void>>();
  private readonly ledger: ResourceLedger;
  private readonly retry: RetryPolicy;
  private readonly documentOptions: DocumentOptions;
  private haltedBy: NodeError | undefined;

  constructor(
    private readonly gateway: CloudDocumentGateway,
    private readonly plan: SyncPlan,
    private readonly config: RunConfig,
    private readonly options: RunOptions,
    private readonly now: () => number,
    private readonly emit: (event: TransitionEvent) => void
  ) {
    validateRunConfig(config);
    this.ledger = new ResourceLedger(gateway);
    this.retry = new RetryPolicy(config);
    this.documentOptions = toDocumentOptions(config);

    for (const entry of plan.entries) {
      if (this.tasks.has(entry.key)) {
        throw new Error(`Model ${formatIdentity(entry.identity, entry.name)} appears twice in the plan`);
      }
      this.tasks.set(entry.key, { key: entry.key, identity: entry.identity, state: 'Queued', attempt: 0 });
    }
    for (const entry of plan.entries) {
      const missing = entry.children.find(child => !this.tasks.has(child));
      if (missing) {
        throw new Error(`Model ${formatIdentity(entry.identity, entry.name)} links ${missing}, which is not in the plan`);
      }
    }
  }

  private get cancelled(): boolean {
    return this.options.signal?.aborted === true;
  }

  private get stopping(): boolean {
    return this.cancelled || this.haltedBy !== undefined;
  }

  async execute(): Promise<SyncRunResult> {
    for (const entry of this.plan.entries) {
      const task = this.getTask(entry.key);
      if (entry.discoveryError) {
        this.transition(task, 'Failed', { error: entry.discoveryError.kind, message: entry.discoveryError.message });
      } else {
        this.transition(task, 'WaitingOnChildren');
      }
    }

    try {
      await this.schedule();
    } finally {
      await Promise.allSettled(this.running.values());
      await this.ledger.drain();
    }

    this.skipRemaining();
    return this.buildResult();
  }

  private async schedule(): Promise<void> {
    while (!this.stopping) {
      this.propagateFailures();
      const slots = this.config.maxConcurrentSyncs - this.running.size;
      for (const entry of this.eligibleEntries().slice(0, Math.max(slots, 0))) {
        this.start(entry);
      }
      if (this.running.size === 0) {
        break;
      }
      await Promise.race(this.running.values());
    }
    await Promise.all(this.running.values());
  }

  private propagateFailures() {
    let changed = true;
    while (changed) {
      changed = false;
      for (const entry of this.plan.entries) {
        const task = this.getTask(entry.key);
        if (task.state !== 'WaitingOnChildren' || this.running.has(task.key)) {
          continue;
        }
        const broken = entry.children
          .map(child => this.getTask(child))
          .find(child => child.state === 'Failed' || (child.state === 'Skipped' && child.skipReason === 'dependency-failed'));
        if (broken) {
          this.transition(task, 'Skipped', {
            skipReason: 'dependency-failed',
            causedBy: broken.causedBy ?? broken.key,
            error: broken.lastError,
          });
          changed = true;
        }
      }
    }
  }

  private eligibleEntries(): PlanEntry[] {
    return this.plan.entries.filter(entry => {
      const task = this.getTask(entry.key);
      return (
        task.state === 'WaitingOnChildren' &&
        !this.running.has(entry.key) &&
        entry.children.every(child => this.getTask(child).state === 'Synced')
      );
    });
  }

  private start(entry: PlanEntry) {
    const task = this.getTask(entry.key);
    const promise = this.process(task, entry).finally(() => {
      this.running.delete(entry.key);
    });
    this.running.set(entry.key, promise);
  }

  private async process(task: SyncTask, entry: PlanEntry): Promise<void> {
    for (;;) {
      const failure = await this.attempt(task, entry);
      if (!failure) {
        return;
      }
      if (failure.kind === 'GatewayUnavailable') {
        this.halt(failure);
      }
      if (!this.stopping && this.retry.shouldRetry(failure.kind, task.attempt)) {
        const delayMs = this.retry.backoffMs(task.attempt);
        this.transition(task, 'WaitingOnChildren', { error: failure.kind, message: failure.message });
        log.debug(`${formatIdentity(task.identity, entry.name)}: retrying in ${delayMs}ms after ${failure.kind}`);
        await sleep(delayMs, this.options.signal);
        if (this.stopping) {
          this.transition(task, 'Skipped', { skipReason: this.cancelled ? 'cancelled' : 'halted' });
          return;
        }
        continue;
      }
      this.transition(task, 'Failed', { error: failure.kind, message: failure.message });
      return;
    }
  }

  /** One open → apply → sync → close pass. The handle is closed before this resolves. */
  private async attempt(task: SyncTask, entry: PlanEntry): Promise<NodeError | undefined> {
    this.transition(task, 'Opening');
    let handle: ModelHandle | undefined;
    try {
      handle = this.ledger.track(await this.gateway.openFull(task.identity));
      await this.gateway.applyOptions(handle, this.documentOptions);
      if (this.config.linkReloadDelayMs > 0 && entry.children.length > 0) {
        // freshly synced children may not be visible to the parent right away
        await sleep(this.config.linkReloadDelayMs);
      }
      this.transition(task, 'Syncing');
      await this.gateway.sync(handle);
      this.transition(task, 'Closing');
      const closing = handle;
      handle = undefined;
      await this.ledger.release(closing);
      this.transition(task, 'Synced');
      return undefined;
    } catch (err) {
      return { kind: toErrorKind(err), message: errorToString(err) };
    } finally {
      if (handle) {
        await this.ledger.release(handle);
      }
    }
  }

  private halt(error: NodeError) {
    if (!this.haltedBy) {
      this.haltedBy = error;
      log.error(`gateway unavailable, stopping run: ${error.message}`);
    }
  }

  private skipRemaining() {
    this.propagateFailures();
    const skipReason: SkipReason = this.haltedBy ? 'halted' : 'cancelled';
    for (const entry of this.plan.entries) {
      const task = this.getTask(entry.key);
      if (!isTerminalState(task.state)) {
        this.transition(task, 'Skipped', { skipReason });
      }
    }
  }

  private transition(task: SyncTask, to: SyncTaskState, details: TransitionDetails = {}) {
    const from = task.state;
    if (!canTransition(from, to)) {
      throw new Error(`Illegal transition ${from} → ${to} for ${formatIdentity(task.identity)}`);
    }
    task.state = to;
    if (to === 'Opening') {
      task.attempt += 1;
    }
    if (details.error !== undefined) {
      task.lastError = details.error;
    }
    if (details.message !== undefined) {
      task.message = details.message;
    }
    if (details.skipReason) {
      task.skipReason = details.skipReason;
    }
    if (details.causedBy) {
      task.causedBy = details.causedBy;
    }
    log.trace(`${formatIdentity(task.identity)}: ${from} → ${to}`);
    this.emit({
      key: task.key,
      identity: task.identity,
      from,
      to,
      attempt: task.attempt,
      error: details.error,
      skipReason: details.skipReason,
      causedBy: details.causedBy,
      at: this.now(),
    });
  }

  private getTask(key: IdentityKey): SyncTask {
    const task = this.tasks.get(key);
    if (!task) {
      throw new Error(`No task for ${key}`);
    }
    return task;
  }

  private buildResult(): SyncRunResult {
    const tasks: SyncTaskOutcome[] = this.plan.entries.map(entry => {
      const task = this.getTask(entry.key);
      const settledWithError = task.state !== 'Synced';
      return {
        key: task.key,
        identity: task.identity,
        name: entry.name,
        implicit: entry.implicit,
        state: task.state,
        attempts: task.attempt,
        error: settledWithError ? task.lastError : undefined,
        message: settledWithError ? task.message : undefined,
        skipReason: task.skipReason,
        causedBy: task.causedBy ? this.tasks.get(task.causedBy)?.identity : undefined,
      };
    });

    let status: SyncRunResult['status'] = 'completed';
    if (this.haltedBy) {
      status = 'failed';
    } else if (this.cancelled) {
      status = 'cancelled';
    }

    return {
      status,
      tasks,
      explicit: tasks.filter(task => !task.implicit),
      implicit: tasks.filter(task => task.implicit),
      stats: {
        synced: tasks.filter(task => task.state === 'Synced').length,
        failed: tasks.filter(task => task.state === 'Failed').length,
        skipped: tasks.filter(task => task.state === 'Skipped').length,
      },
      haltedBy: this.haltedBy,
    };
  }
}
