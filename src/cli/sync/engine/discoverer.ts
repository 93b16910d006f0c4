import { log } from '../../../io';
import { errorToString, promiseQueue } from '../../../utils';
import { SyncCancelledError, toErrorKind } from './errors';
import { formatIdentity, identityKey, uniqueIdentities } from './identity';
import { ResourceLedger } from './resourceLedger';
import { RetryOptions, RetryPolicy } from './retryPolicy';
import { CloudDocumentGateway, DependencyGraph, DependencyNode, ErrorKind, ModelIdentity } from './types';

export type DiscoveryEvent =
  | { type: 'scanning'; identity: ModelIdentity; name?: string }
  | { type: 'discovered'; identity: ModelIdentity; name?: string; links: number }
  | { type: 'failed'; identity: ModelIdentity; name?: string; error: ErrorKind; message: string };

export interface DiscoverOptions {
  maxConcurrentOpens?: number;
  retry?: RetryOptions;
  /** Links of the root when it is already open, e.g. as the active document. */
  rootLinks?: ModelIdentity[];
  rootName?: string;
  signal?: AbortSignal;
  listener?: (event: DiscoveryEvent) => void;
}

const DEFAULT_DISCOVERY_RETRY: RetryOptions = {
  maxRetryAttempts: 2,
  retryBackoffBaseMs: 500,
};

type InspectResult = { status: 'done'; links: ModelIdentity[] } | { status: 'halted'; error: unknown } | { status: 'cancelled' };

/**
 * Breadth-first walk over the links reachable from `root`. Every model is opened
 * detached at most once and closed again right after its links are read.
 *
 * A frontier level is inspected through a bounded pool; new children are appended in
 * frontier order once the level settles, so discovery order does not depend on which
 * open finished first.
 */
export async function discoverDependencies(
  root: ModelIdentity,
  gateway: CloudDocumentGateway,
  options: DiscoverOptions = {}
): Promise<DependencyGraph> {
  const graph: DependencyGraph = { root, nodes: {}, order: [] };
  const ledger = new ResourceLedger(gateway);
  const retry = new RetryPolicy(options.retry ?? DEFAULT_DISCOVERY_RETRY);
  const maxConcurrentOpens = Math.max(1, options.maxConcurrentOpens ?? 2);
  let halted: { error: unknown } | undefined;

  registerNode(graph, root, options.rootName);

  const inspect = async (identity: ModelIdentity): Promise<InspectResult> => {
    if (halted) {
      return { status: 'halted', error: halted.error };
    }
    if (options.signal?.aborted) {
      return { status: 'cancelled' };
    }
    const node = getNode(graph, identity);
    node.discoveryState = 'Discovering';
    options.listener?.({ type: 'scanning', identity, name: node.name });

    let links: ModelIdentity[];
    try {
      if (options.rootLinks && identityKey(identity) === identityKey(root)) {
        links = options.rootLinks;
      } else {
        links = await readLinksDetached(identity, node, gateway, ledger, retry, options.signal);
      }
    } catch (err) {
      const kind = toErrorKind(err);
      if (kind === 'GatewayUnavailable') {
        halted = { error: err };
        node.discoveryState = 'Pending';
        return { status: 'halted', error: err };
      }
      const message = errorToString(err);
      node.discoveryState = 'Failed';
      node.error = { kind, message };
      log.warn(`scan of ${formatIdentity(identity, node.name)} failed (${kind}): ${message}`);
      options.listener?.({ type: 'failed', identity, name: node.name, error: kind, message });
      return { status: 'done', links: [] };
    }

    node.directChildren = uniqueIdentities(links);
    node.discoveryState = 'Discovered';
    log.debug(`found ${node.directChildren.length} link(s) in ${formatIdentity(identity, node.name)}`);
    options.listener?.({ type: 'discovered', identity, name: node.name, links: node.directChildren.length });
    return { status: 'done', links: node.directChildren };
  };

  let frontier: ModelIdentity[] = [root];
  try {
    while (frontier.length > 0) {
      const results = await promiseQueue(maxConcurrentOpens, ...frontier.map(identity => () => inspect(identity)));

      const outage = results.find((result): result is { status: 'halted'; error: unknown } => result.status === 'halted');
      if (outage) {
        throw outage.error;
      }
      if (options.signal?.aborted) {
        throw new SyncCancelledError('Discovery cancelled');
      }

      const next: ModelIdentity[] = [];
      for (const result of results) {
        if (result.status !== 'done') {
          continue;
        }
        for (const child of result.links) {
          if (!graph.nodes[identityKey(child)]) {
            registerNode(graph, child);
            next.push(child);
          }
        }
      }
      frontier = next;
    }
  } finally {
    await ledger.drain();
  }

  return graph;
}

async function readLinksDetached(
  identity: ModelIdentity,
  node: DependencyNode,
  gateway: CloudDocumentGateway,
  ledger: ResourceLedger,
  retry: RetryPolicy,
  signal: AbortSignal | undefined
): Promise<ModelIdentity[]> {
  const handle = ledger.track(
    await retry.run(() => gateway.openDetached(identity), {
      signal,
      onRetry: (attempt, kind, delayMs) =>
        log.debug(`detached open of ${formatIdentity(identity, node.name)} failed (${kind}), attempt ${attempt}, retrying in ${delayMs}ms`),
    })
  );
  try {
    node.name = node.name ?? handle.name;
    return await gateway.readDirectLinks(handle);
  } finally {
    await ledger.release(handle);
  }
}

function registerNode(graph: DependencyGraph, identity: ModelIdentity, name?: string): DependencyNode {
  const key = identityKey(identity);
  const node: DependencyNode = {
    identity,
    name,
    directChildren: [],
    discoveryState: 'Pending',
    discoveryIndex: graph.order.length,
  };
  graph.nodes[key] = node;
  graph.order.push(key);
  return node;
}

function getNode(graph: DependencyGraph, identity: ModelIdentity): DependencyNode {
  const node = graph.nodes[identityKey(identity)];
  if (!node) {
    throw new Error(`Model ${formatIdentity(identity)} is not part of the graph`);
  }
  return node;
}

export interface TreeLine {
  depth: number;
  key: string;
  identity: ModelIdentity;
  name?: string;
  failed: boolean;
  /** Set on a node already shown higher up the current branch. */
  cyclic: boolean;
}

/**
 * Flattens the graph into indented lines rooted at `graph.root`. A model reachable
 * along several paths is listed under each parent; a link back into the current
 * branch is listed once, marked cyclic, and not expanded.
 */
export function formatTree(graph: DependencyGraph): TreeLine[] {
  const lines: TreeLine[] = [];
  const stack: Array<{ identity: ModelIdentity; depth: number; branch: ReadonlySet<string> }> = [
    { identity: graph.root, depth: 0, branch: new Set<string>() },
  ];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) {
      break;
    }
    const key = identityKey(current.identity);
    const node = graph.nodes[key];
    const cyclic = current.branch.has(key);
    lines.push({
      depth: current.depth,
      key,
      identity: current.identity,
      name: node?.name,
      failed: node?.discoveryState === 'Failed',
      cyclic,
    });
    if (cyclic || !node) {
      continue;
    }
    const branch = new Set(current.branch).add(key);
    const children = node.directChildren.filter(child => identityKey(child) !== key);
    for (let index = children.length - 1; index >= 0; index -= 1) {
      stack.push({ identity: children[index], depth: current.depth + 1, branch });
    }
  }

  return lines;
}
