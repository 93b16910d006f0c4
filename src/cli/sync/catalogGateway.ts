import { log } from '../../io';
import { isRecord, readJsonFile } from '../../utils';
import {
  CloudDocumentGateway,
  createIdentity,
  DocumentOptions,
  formatIdentity,
  GatewayError,
  identityKey,
  IdentityKey,
  ModelHandle,
  ModelIdentity,
  OpenMode,
  parseIdentityRecord,
} from './engine';

export interface CatalogModel {
  identity: ModelIdentity;
  name?: string;
  links: ModelIdentity[];
}

/**
 * Gateway over a JSON catalog of models and their links. It rehearses an order
 * without a cloud host: opening, syncing and closing only touch memory.
 *
 * ```json
 * {
 *   "region": "US",
 *   "projectId": "project-1",
 *   "models": [
 *     { "name": "Site", "modelId": "site", "links": ["arch", "EMEA,project-2,grid"] },
 *     { "name": "Architecture", "modelId": "arch" }
 *   ]
 * }
 * ```
 *
 * A link is a model id in the linking model's project or a `region,projectId,modelId`
 * record.
 */
export class CatalogGateway implements CloudDocumentGateway {
  private readonly models = new Map<IdentityKey, CatalogModel>();
  private readonly openHandles = new Map<string, ModelHandle>();
  private readonly syncedAt = new Map<IdentityKey, Date>();
  private nextHandle = 1;

  constructor(
    models: CatalogModel[],
    private readonly now: () => Date = () => new Date()
  ) {
    for (const model of models) {
      const key = identityKey(model.identity);
      if (this.models.has(key)) {
        throw new Error(`Model ${formatIdentity(model.identity, model.name)} is listed twice in the catalog`);
      }
      this.models.set(key, model);
    }
  }

  static async load(fileName: string): Promise<CatalogGateway> {
    return new CatalogGateway(parseCatalog(await readJsonFile(fileName), fileName));
  }

  get openCount(): number {
    return this.openHandles.size;
  }

  lastSynced(identity: ModelIdentity): Date | undefined {
    return this.syncedAt.get(identityKey(identity));
  }

  async openDetached(identity: ModelIdentity): Promise<ModelHandle> {
    return this.open(identity, 'detached');
  }

  async openFull(identity: ModelIdentity): Promise<ModelHandle> {
    return this.open(identity, 'full');
  }

  async readDirectLinks(handle: ModelHandle): Promise<ModelIdentity[]> {
    return [...this.getOpenModel(handle).links];
  }

  async applyOptions(handle: ModelHandle, options: DocumentOptions): Promise<void> {
    const model = this.getOpenModel(handle);
    log.trace(`${formatIdentity(model.identity, model.name)}: worksets ${options.worksetOpeningMode}`);
  }

  async sync(handle: ModelHandle): Promise<void> {
    const model = this.getOpenModel(handle);
    if (handle.mode !== 'full') {
      throw new GatewayError('CorruptModel', `${formatIdentity(model.identity, model.name)} was opened detached`);
    }
    this.syncedAt.set(identityKey(model.identity), this.now());
  }

  async close(handle: ModelHandle): Promise<void> {
    this.openHandles.delete(handle.id);
  }

  private open(identity: ModelIdentity, mode: OpenMode): ModelHandle {
    const model = this.models.get(identityKey(identity));
    if (!model) {
      throw new GatewayError('NotFound', `Model ${formatIdentity(identity)} is not in the catalog`);
    }
    const handle: ModelHandle = { id: `${mode}-${this.nextHandle}`, identity: model.identity, mode, name: model.name };
    this.nextHandle += 1;
    this.openHandles.set(handle.id, handle);
    return handle;
  }

  private getOpenModel(handle: ModelHandle): CatalogModel {
    const model = this.models.get(identityKey(handle.identity));
    if (!model || !this.openHandles.has(handle.id)) {
      throw new GatewayError('NotFound', `Handle ${handle.id} is not open`);
    }
    return model;
  }
}

export function parseCatalog(value: unknown, source = 'catalog'): CatalogModel[] {
  if (!isRecord(value) || !Array.isArray(value.models)) {
    throw new Error(`${source}: expected an object with a "models" list`);
  }
  const defaultRegion = optionalString(value.region, `${source}: region`);
  const defaultProject = optionalString(value.projectId, `${source}: projectId`);

  return value.models.map((entry: unknown, index: number) => {
    const where = `${source}: models[${index}]`;
    if (!isRecord(entry)) {
      throw new Error(`${where} must be an object`);
    }
    const region = optionalString(entry.region, `${where}.region`) ?? defaultRegion;
    const projectId = optionalString(entry.projectId, `${where}.projectId`) ?? defaultProject;
    const modelId = optionalString(entry.modelId, `${where}.modelId`);
    if (!region || !projectId || !modelId) {
      throw new Error(`${where} needs region, projectId and modelId`);
    }
    const links = entry.links ?? [];
    if (!Array.isArray(links) || !links.every((link): link is string => typeof link === 'string')) {
      throw new Error(`${where}.links must be a list of model ids`);
    }
    return {
      identity: createIdentity(region, projectId, modelId),
      name: optionalString(entry.name, `${where}.name`),
      links: links.map(link => (link.includes(',') ? parseIdentityRecord(link).identity : createIdentity(region, projectId, link))),
    };
  });
}

function optionalString(value: unknown, name: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`${name} must be a string`);
  }
  return value;
}
