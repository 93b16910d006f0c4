import { log } from '../../../io';
import { errorToString } from '../../../utils';
import { formatIdentity } from './identity';
import { CloudDocumentGateway, ModelHandle } from './types';

/**
 * Tracks every handle opened through a gateway. A tracked handle is closed exactly
 * once, by {@link release} or by {@link drain}; close errors are logged, never thrown.
 */
export class ResourceLedger {
  private readonly openHandles = new Map<string, ModelHandle>();

  constructor(private readonly gateway: Pick<CloudDocumentGateway, 'close'>) {}

  get size(): number {
    return this.openHandles.size;
  }

  track(handle: ModelHandle): ModelHandle {
    if (this.openHandles.has(handle.id)) {
      throw new Error(`Handle ${handle.id} is already tracked`);
    }
    this.openHandles.set(handle.id, handle);
    return handle;
  }

  has(handle: ModelHandle): boolean {
    return this.openHandles.has(handle.id);
  }

  handles(): ModelHandle[] {
    return Array.from(this.openHandles.values());
  }

  async release(handle: ModelHandle): Promise<void> {
    if (!this.openHandles.delete(handle.id)) {
      return;
    }
    try {
      await this.gateway.close(handle);
    } catch (err) {
      log.warn(`close of ${formatIdentity(handle.identity, handle.name)} failed: ${errorToString(err)}`);
    }
  }

  /** Closes every handle still open and returns how many there were. */
  async drain(): Promise<number> {
    const handles = this.handles();
    if (handles.length > 0) {
      log.debug(`closing ${handles.length} handle(s) left open`);
    }
    await Promise.all(handles.map(handle => this.release(handle)));
    return handles.length;
  }
}
