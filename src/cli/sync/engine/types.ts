export type CloudRegion = 'US' | 'EMEA' | 'AUS' | 'CAN' | 'DEU' | 'IND' | 'JPN' | 'GBR';

export interface ModelIdentity {
  readonly region: CloudRegion;
  readonly projectId: string;
  readonly modelId: string;
}

/** Value key of a {@link ModelIdentity}; two identities are the same node exactly when their keys match. */
export type IdentityKey = string;

export type ErrorKind =
  | 'NotFound'
  | 'AccessDenied'
  | 'Locked'
  | 'TransientIO'
  | 'SyncConflict'
  | 'CycleDetected'
  | 'CorruptModel'
  | 'GatewayUnavailable'
  | 'Unexpected';

export type OpenMode = 'detached' | 'full';

export interface ModelHandle {
  readonly id: string;
  readonly identity: ModelIdentity;
  readonly mode: OpenMode;
  /** Document title as reported by the host, if any. */
  readonly name?: string;
}

export type WorksetOpeningMode = 'All' | 'LastViewed' | 'Specify';

export interface DocumentOptions {
  worksetOpeningMode: WorksetOpeningMode;
  worksets: string[];
  reloadLinks: boolean;
  reloadLatest: boolean;
}

export interface CloudDocumentGateway {
  /** Read-only open without edit locks; used only to read links. */
  openDetached(identity: ModelIdentity): Promise<ModelHandle>;
  openFull(identity: ModelIdentity): Promise<ModelHandle>;
  readDirectLinks(handle: ModelHandle): Promise<ModelIdentity[]>;
  applyOptions(handle: ModelHandle, options: DocumentOptions): Promise<void>;
  sync(handle: ModelHandle): Promise<void>;
  /** Must be idempotent. */
  close(handle: ModelHandle): Promise<void>;
}

export type DiscoveryState = 'Pending' | 'Discovering' | 'Discovered' | 'Failed';

export interface NodeError {
  kind: ErrorKind;
  message: string;
}

export interface DependencyNode {
  identity: ModelIdentity;
  name?: string;
  directChildren: ModelIdentity[];
  discoveryState: DiscoveryState;
  discoveryIndex: number;
  error?: NodeError;
}

export interface DependencyGraph {
  root: ModelIdentity;
  nodes: Record<IdentityKey, DependencyNode>;
  /** Keys in the order they were first seen. */
  order: IdentityKey[];
}

export interface OrderedModel {
  key: IdentityKey;
  identity: ModelIdentity;
  name?: string;
  discoveryFailed: boolean;
}

export interface PlanEntry {
  key: IdentityKey;
  identity: ModelIdentity;
  name?: string;
  implicit: boolean;
  reason: 'selected' | 'dependency';
  /** Plan members this model links, self-links excluded. */
  children: IdentityKey[];
  discoveryError?: NodeError;
}

export interface SyncPlan {
  entries: PlanEntry[];
  requestedKeys: IdentityKey[];
  stats: PlanStats;
}

export interface PlanStats {
  totalModels: number;
  requestedModels: number;
  implicitModels: number;
  unreachableModels: number;
}

export type SyncTaskState =
  | 'Queued'
  | 'WaitingOnChildren'
  | 'Opening'
  | 'Syncing'
  | 'Closing'
  | 'Synced'
  | 'Failed'
  | 'Skipped';

export type SkipReason = 'dependency-failed' | 'cancelled' | 'halted';

export interface SyncTask {
  key: IdentityKey;
  identity: ModelIdentity;
  state: SyncTaskState;
  attempt: number;
  lastError?: ErrorKind;
  message?: string;
  skipReason?: SkipReason;
  /** The failed model whose failure caused this task to be skipped. */
  causedBy?: IdentityKey;
}

export interface TransitionEvent {
  key: IdentityKey;
  identity: ModelIdentity;
  from: SyncTaskState;
  to: SyncTaskState;
  attempt: number;
  error?: ErrorKind;
  skipReason?: SkipReason;
  causedBy?: IdentityKey;
  at: number;
}

export type TransitionListener = (event: TransitionEvent) => void;

export interface SyncTaskOutcome {
  key: IdentityKey;
  identity: ModelIdentity;
  name?: string;
  implicit: boolean;
  state: SyncTaskState;
  attempts: number;
  error?: ErrorKind;
  message?: string;
  skipReason?: SkipReason;
  causedBy?: ModelIdentity;
}

export type RunStatus = 'completed' | 'cancelled' | 'failed';

export interface SyncRunResult {
  status: RunStatus;
  tasks: SyncTaskOutcome[];
  explicit: SyncTaskOutcome[];
  implicit: SyncTaskOutcome[];
  stats: RunStats;
  /** Set when the run halted because the gateway became unreachable. */
  haltedBy?: NodeError;
}

export interface RunStats {
  synced: number;
  failed: number;
  skipped: number;
}
