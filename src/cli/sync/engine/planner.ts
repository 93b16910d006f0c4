import { formatIdentity, identityKey } from './identity';
import { sortGraph } from './sorter';
import { DependencyGraph, IdentityKey, ModelIdentity, OrderedModel, PlanEntry, SyncPlan } from './types';

/**
 * Restricts the leaf-first order to the selection plus everything a selected model
 * links to, directly or not. Models pulled in only as dependencies are `implicit`.
 * Without a selection every discovered model is requested; an empty selection plans
 * nothing.
 */
export function buildSyncPlan(
  graph: DependencyGraph,
  selection?: ModelIdentity[],
  order: OrderedModel[] = sortGraph(graph)
): SyncPlan {
  const requestedKeys = collectRequestedModels(graph, order, selection);
  const requested = new Set(requestedKeys);
  const required = expandDependencies(requested, graph);

  const entries: PlanEntry[] = order
    .filter(model => required.has(model.key))
    .map((model): PlanEntry => {
      const node = graph.nodes[model.key];
      const children: IdentityKey[] = [];
      if (!model.discoveryFailed) {
        for (const child of node.directChildren) {
          const childKey = identityKey(child);
          if (childKey !== model.key && required.has(childKey) && !children.includes(childKey)) {
            children.push(childKey);
          }
        }
      }
      const implicit = !requested.has(model.key);
      return {
        key: model.key,
        identity: model.identity,
        name: model.name,
        implicit,
        reason: implicit ? 'dependency' : 'selected',
        children,
        discoveryError: model.discoveryFailed ? node.error : undefined,
      };
    });

  return {
    entries,
    requestedKeys,
    stats: {
      totalModels: entries.length,
      requestedModels: requestedKeys.length,
      implicitModels: entries.filter(entry => entry.implicit).length,
      unreachableModels: entries.filter(entry => entry.discoveryError).length,
    },
  };
}

function collectRequestedModels(
  graph: DependencyGraph,
  order: OrderedModel[],
  selection: ModelIdentity[] | undefined
): IdentityKey[] {
  if (!selection) {
    return order.map(model => model.key);
  }
  const requested: IdentityKey[] = [];
  for (const identity of selection) {
    const key = identityKey(identity);
    if (!graph.nodes[key]) {
      throw new Error(`Model ${formatIdentity(identity)} is not part of the discovered graph`);
    }
    if (!requested.includes(key)) {
      requested.push(key);
    }
  }
  return requested;
}

function expandDependencies(requested: Set<IdentityKey>, graph: DependencyGraph): Set<IdentityKey> {
  const required = new Set<IdentityKey>();
  const queue: IdentityKey[] = [...requested];

  while (queue.length > 0) {
    const key = queue.pop();
    if (key === undefined || required.has(key)) {
      continue;
    }
    required.add(key);
    const node = graph.nodes[key];
    if (!node || node.discoveryState === 'Failed') {
      continue;
    }
    node.directChildren.forEach(child => {
      const childKey = identityKey(child);
      if (!required.has(childKey)) {
        queue.push(childKey);
      }
    });
  }

  return required;
}
