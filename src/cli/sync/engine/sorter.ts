import { CycleDetectedError } from './errors';
import { identityKey } from './identity';
import { DependencyGraph, DependencyNode, IdentityKey, OrderedModel } from './types';

/**
 * Orders the graph leaf-first by in-degree elimination over child → parent edges.
 * Among models that become eligible together, the one discovered first goes first.
 * A model whose discovery failed is treated as a leaf.
 *
 * @throws CycleDetectedError when the links form a cycle; no partial order is returned.
 */
export function sortGraph(graph: DependencyGraph): OrderedModel[] {
  const keys = graph.order.filter(key => isSortable(graph.nodes[key]));
  const included = new Set(keys);
  const remaining = new Map<IdentityKey, number>();
  const dependents = new Map<IdentityKey, IdentityKey[]>();

  for (const key of keys) {
    dependents.set(key, []);
  }
  for (const key of keys) {
    const children = childKeys(graph.nodes[key], key).filter(child => included.has(child));
    remaining.set(key, children.length);
    children.forEach(child => dependents.get(child)?.push(key));
  }

  const byDiscovery = (a: IdentityKey, b: IdentityKey) =>
    graph.nodes[a].discoveryIndex - graph.nodes[b].discoveryIndex;

  const ready = keys.filter(key => remaining.get(key) === 0);
  const order: OrderedModel[] = [];

  while (ready.length > 0) {
    const current = ready.shift();
    if (current === undefined) {
      break;
    }
    const node = graph.nodes[current];
    order.push({
      key: current,
      identity: node.identity,
      name: node.name,
      discoveryFailed: node.discoveryState === 'Failed',
    });

    for (const dependent of dependents.get(current) ?? []) {
      const next = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, next);
      if (next === 0) {
        insertSorted(ready, dependent, byDiscovery);
      }
    }
  }

  if (order.length !== keys.length) {
    throw new CycleDetectedError(findCycle(graph, keys, remaining).map(key => graph.nodes[key].identity));
  }

  return order;
}

function isSortable(node: DependencyNode | undefined): boolean {
  return node?.discoveryState === 'Discovered' || node?.discoveryState === 'Failed';
}

/** Distinct child keys in link order, self-links dropped. */
function childKeys(node: DependencyNode, key: IdentityKey): IdentityKey[] {
  if (node.discoveryState === 'Failed') {
    return [];
  }
  const result: IdentityKey[] = [];
  for (const child of node.directChildren) {
    const childKey = identityKey(child);
    if (childKey !== key && !result.includes(childKey)) {
      result.push(childKey);
    }
  }
  return result;
}

function insertSorted<T>(list: T[], item: T, compare: (a: T, b: T) => number) {
  let index = list.length;
  while (index > 0 && compare(list[index - 1], item) > 0) {
    index -= 1;
  }
  list.splice(index, 0, item);
}

/**
 * Every unsorted model still waits on an unsorted child, so following the first such
 * child from the earliest-discovered unsorted model must revisit a model on the path.
 */
function findCycle(graph: DependencyGraph, keys: IdentityKey[], remaining: Map<IdentityKey, number>): IdentityKey[] {
  const unsorted = (key: IdentityKey) => (remaining.get(key) ?? 0) > 0;
  const start = keys.find(unsorted);
  if (start === undefined) {
    return [];
  }

  const path: IdentityKey[] = [];
  const positions = new Map<IdentityKey, number>();
  let current: IdentityKey | undefined = start;

  while (current !== undefined) {
    const seenAt = positions.get(current);
    if (seenAt !== undefined) {
      return path.slice(seenAt);
    }
    positions.set(current, path.length);
    path.push(current);
    const from: IdentityKey = current;
    current = childKeys(graph.nodes[from], from).find(child => keys.includes(child) && unsorted(child));
  }

  return path;
}
