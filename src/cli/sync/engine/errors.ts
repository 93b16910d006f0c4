import { formatIdentity } from './identity';
import { ErrorKind, ModelIdentity } from './types';

export type GatewayErrorKind = Exclude<ErrorKind, 'CycleDetected' | 'Unexpected'>;

const TRANSIENT_ERROR_KINDS: ReadonlyArray<ErrorKind> = ['TransientIO', 'Locked'];

export class GatewayError extends Error {
  constructor(
    readonly kind: GatewayErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GatewayError';
  }
}

export class CycleDetectedError extends Error {
  readonly kind = 'CycleDetected';

  constructor(readonly cycle: ModelIdentity[]) {
    super(`Circular link detected: ${[...cycle, ...cycle.slice(0, 1)].map(identity => formatIdentity(identity)).join(' → ')}`);
    this.name = 'CycleDetectedError';
  }
}

export class SyncCancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'SyncCancelledError';
  }
}

export function isTransientErrorKind(kind: ErrorKind): boolean {
  return TRANSIENT_ERROR_KINDS.includes(kind);
}

export function toErrorKind(err: unknown): ErrorKind {
  if (err instanceof GatewayError || err instanceof CycleDetectedError) {
    return err.kind;
  }
  return 'Unexpected';
}
