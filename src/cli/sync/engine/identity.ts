import { CloudRegion, IdentityKey, ModelIdentity } from './types';

export const CLOUD_REGIONS: ReadonlyArray<CloudRegion> = ['US', 'EMEA', 'AUS', 'CAN', 'DEU', 'IND', 'JPN', 'GBR'];

export function isCloudRegion(value: string): value is CloudRegion {
  return CLOUD_REGIONS.some(region => region === value);
}

/**
 * Creates a frozen identity. Project and model ids are GUIDs on the host, which
 * compares them case-insensitively, so they are stored lower case.
 */
export function createIdentity(region: string, projectId: string, modelId: string): ModelIdentity {
  const normalizedRegion = region.trim().toUpperCase();
  if (!isCloudRegion(normalizedRegion)) {
    throw new Error(`Unknown cloud region "${region}" (expected one of ${CLOUD_REGIONS.join(', ')})`);
  }
  const project = projectId.trim().toLowerCase();
  const model = modelId.trim().toLowerCase();
  if (!project) {
    throw new Error('Project id must not be empty');
  }
  if (!model) {
    throw new Error('Model id must not be empty');
  }
  return Object.freeze({ region: normalizedRegion, projectId: project, modelId: model });
}

export function identityKey(identity: ModelIdentity): IdentityKey {
  return `${identity.region}:${identity.projectId}:${identity.modelId}`;
}

export function identityEquals(a: ModelIdentity, b: ModelIdentity): boolean {
  return identityKey(a) === identityKey(b);
}

export function uniqueIdentities(identities: Iterable<ModelIdentity>): ModelIdentity[] {
  const seen = new Set<IdentityKey>();
  const result: ModelIdentity[] = [];
  for (const identity of identities) {
    const key = identityKey(identity);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(identity);
    }
  }
  return result;
}

export function formatIdentity(identity: ModelIdentity, name?: string): string {
  return name ? `${name} (${identity.modelId})` : identity.modelId;
}

/** Delimited record for clipboard export: `name,region,projectId,modelId`. */
export function formatIdentityRecord(identity: ModelIdentity, name: string): string {
  return [name.replace(/,/gu, ' '), identity.region, identity.projectId, identity.modelId].join(',');
}

export interface IdentityRecord {
  identity: ModelIdentity;
  name?: string;
}

/** Accepts `region,projectId,modelId` or `name,region,projectId,modelId`. */
export function parseIdentityRecord(text: string): IdentityRecord {
  const fields = text.split(',').map(field => field.trim());
  if (fields.length === 3) {
    const [region, projectId, modelId] = fields;
    return { identity: createIdentity(region, projectId, modelId) };
  }
  if (fields.length === 4) {
    const [name, region, projectId, modelId] = fields;
    return { identity: createIdentity(region, projectId, modelId), name: name || undefined };
  }
  throw new Error(`Invalid model record "${text}": expected region,projectId,modelId or name,region,projectId,modelId`);
}
