import { isRecord } from '../../../utils';
import { DocumentOptions, WorksetOpeningMode } from './types';

export interface RunConfig {
  worksetOpeningMode: WorksetOpeningMode;
  /** Workset names to open when the mode is `Specify`. */
  worksets: string[];
  linkReloadDelayMs: number;
  maxConcurrentSyncs: number;
  maxRetryAttempts: number;
  retryBackoffBaseMs: number;
  reloadLinks: boolean;
  reloadLatest: boolean;
}

export const DEFAULT_RUN_CONFIG: Readonly<RunConfig> = {
  worksetOpeningMode: 'All',
  worksets: [],
  linkReloadDelayMs: 2000,
  maxConcurrentSyncs: 2,
  maxRetryAttempts: 2,
  retryBackoffBaseMs: 1000,
  reloadLinks: true,
  reloadLatest: true,
};

const WORKSET_MODES: ReadonlyArray<WorksetOpeningMode> = ['All', 'LastViewed', 'Specify'];

export function isWorksetOpeningMode(value: unknown): value is WorksetOpeningMode {
  return WORKSET_MODES.some(mode => mode === value);
}

/**
 * Merges the sources over the defaults, later sources winning; `undefined` values
 * never override.
 */
export function resolveRunConfig(...sources: Array<Partial<RunConfig> | undefined>): RunConfig {
  const config: RunConfig = { ...DEFAULT_RUN_CONFIG, worksets: [...DEFAULT_RUN_CONFIG.worksets] };
  for (const source of sources) {
    if (!source) {
      continue;
    }
    config.worksetOpeningMode = source.worksetOpeningMode ?? config.worksetOpeningMode;
    config.worksets = source.worksets ?? config.worksets;
    config.linkReloadDelayMs = source.linkReloadDelayMs ?? config.linkReloadDelayMs;
    config.maxConcurrentSyncs = source.maxConcurrentSyncs ?? config.maxConcurrentSyncs;
    config.maxRetryAttempts = source.maxRetryAttempts ?? config.maxRetryAttempts;
    config.retryBackoffBaseMs = source.retryBackoffBaseMs ?? config.retryBackoffBaseMs;
    config.reloadLinks = source.reloadLinks ?? config.reloadLinks;
    config.reloadLatest = source.reloadLatest ?? config.reloadLatest;
  }
  validateRunConfig(config);
  return config;
}

export function validateRunConfig(config: RunConfig): void {
  if (!isWorksetOpeningMode(config.worksetOpeningMode)) {
    throw new Error(`worksetOpeningMode must be one of ${WORKSET_MODES.join(', ')}`);
  }
  if (config.worksetOpeningMode === 'Specify' && config.worksets.length === 0) {
    throw new Error('worksetOpeningMode Specify needs at least one workset name');
  }
  assertInteger('linkReloadDelayMs', config.linkReloadDelayMs, 0);
  assertInteger('maxConcurrentSyncs', config.maxConcurrentSyncs, 1);
  assertInteger('maxRetryAttempts', config.maxRetryAttempts, 0);
  assertInteger('retryBackoffBaseMs', config.retryBackoffBaseMs, 0);
}

function assertInteger(name: string, value: number, min: number) {
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

/** Reads the run configuration section of a JSON config file. */
export function parseRunConfig(value: unknown, source = 'config'): Partial<RunConfig> {
  if (!isRecord(value)) {
    throw new Error(`${source} must be a JSON object`);
  }
  const result: Partial<RunConfig> = {};
  for (const [name, entry] of Object.entries(value)) {
    switch (name) {
      case 'worksetOpeningMode':
        if (!isWorksetOpeningMode(entry)) {
          throw new Error(`${source}: worksetOpeningMode must be one of ${WORKSET_MODES.join(', ')}`);
        }
        result.worksetOpeningMode = entry;
        break;
      case 'worksets':
        if (!Array.isArray(entry) || !entry.every((item): item is string => typeof item === 'string')) {
          throw new Error(`${source}: worksets must be a list of names`);
        }
        result.worksets = entry;
        break;
      case 'linkReloadDelayMs':
      case 'maxConcurrentSyncs':
      case 'maxRetryAttempts':
      case 'retryBackoffBaseMs':
        if (typeof entry !== 'number') {
          throw new Error(`${source}: ${name} must be a number`);
        }
        result[name] = entry;
        break;
      case 'reloadLinks':
      case 'reloadLatest':
        if (typeof entry !== 'boolean') {
          throw new Error(`${source}: ${name} must be true or false`);
        }
        result[name] = entry;
        break;
      default:
        throw new Error(`${source}: unknown option "${name}"`);
    }
  }
  return result;
}

export function toDocumentOptions(config: RunConfig): DocumentOptions {
  return {
    worksetOpeningMode: config.worksetOpeningMode,
    worksets: config.worksetOpeningMode === 'Specify' ? [...config.worksets] : [],
    reloadLinks: config.reloadLinks,
    reloadLatest: config.reloadLatest,
  };
}
