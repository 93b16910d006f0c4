import {
  DependencyGraph,
  identityKey,
  IdentityKey,
  SyncPlan,
  SyncRunResult,
  SyncTaskOutcome,
  TransitionEvent,
} from './engine';

export interface SyncOutputModel {
  id: IdentityKey;
  name?: string;
  implicit: boolean;
  state: string;
  attempts: number;
  error?: string;
  message?: string;
  skipReason?: string;
  causedBy?: IdentityKey;
}

export interface SyncJsonOutput {
  _meta: { version: string };
  root: IdentityKey;
  status: SyncRunResult['status'];
  models: Array<SyncOutputModel>;
  summary: {
    totalModels: number;
    requestedModels: number;
    implicitModels: number;
    syncedModels: number;
    failedModels: number;
    skippedModels: number;
  };
  haltedBy?: SyncRunResult['haltedBy'];
}

export function toSyncOutputModel(task: SyncTaskOutcome): SyncOutputModel {
  return {
    id: task.key,
    name: task.name,
    implicit: task.implicit,
    state: task.state,
    attempts: task.attempts,
    error: task.error,
    message: task.message,
    skipReason: task.skipReason,
    causedBy: task.causedBy ? identityKey(task.causedBy) : undefined,
  };
}

export function toSyncJsonOutput(graph: DependencyGraph, plan: SyncPlan, result: SyncRunResult): SyncJsonOutput {
  return {
    _meta: { version: '1.0' },
    root: identityKey(graph.root),
    status: result.status,
    models: result.tasks.map(toSyncOutputModel),
    summary: {
      totalModels: plan.stats.totalModels,
      requestedModels: plan.stats.requestedModels,
      implicitModels: plan.stats.implicitModels,
      syncedModels: result.stats.synced,
      failedModels: result.stats.failed,
      skippedModels: result.stats.skipped,
    },
    haltedBy: result.haltedBy,
  };
}

export function toTransitionLine(event: TransitionEvent) {
  return {
    type: 'transition',
    id: event.key,
    from: event.from,
    to: event.to,
    attempt: event.attempt,
    error: event.error,
    skipReason: event.skipReason,
    causedBy: event.causedBy,
    at: new Date(event.at).toISOString(),
  };
}

export function toGraphJsonOutput(graph: DependencyGraph) {
  return {
    root: identityKey(graph.root),
    models: graph.order.map(key => {
      const node = graph.nodes[key];
      return {
        id: key,
        name: node.name,
        state: node.discoveryState,
        links: node.directChildren.map(identityKey),
        error: node.error,
      };
    }),
  };
}

export function toPlanJsonOutput(plan: SyncPlan) {
  return {
    models: plan.entries.map(entry => ({
      id: entry.key,
      name: entry.name,
      reason: entry.reason,
      children: entry.children,
      discoveryError: entry.discoveryError,
    })),
    stats: plan.stats,
  };
}
