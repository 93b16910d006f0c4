import { join } from 'path';

import { LogLevel } from '../../models';
import * as utils from '../../utils';
import { isWorksetOpeningMode, parseRunConfig, resolveRunConfig, RunConfig, WorksetOpeningMode } from './engine';

export const DEFAULT_CONFIG_FILE = 'synctree.json';
export const DEFAULT_STATE_FILE = '.synctree-state';

export interface OutputOptions {
  json?: boolean;
  jsonl?: boolean;
  silent?: boolean;
  verbose?: boolean;
}

export interface DiscoverCliOptions extends OutputOptions {
  catalog: string;
  maxConcurrentOpens?: number;
}

export interface SyncOptions extends DiscoverCliOptions {
  config?: string;
  select?: Array<string>;
  resume?: boolean;
  stateFile?: string;
  showPlan?: boolean;
  worksetMode?: string;
  worksets?: Array<string>;
  linkReloadDelay?: number;
  maxConcurrentSyncs?: number;
  maxRetryAttempts?: number;
  retryBackoff?: number;
  reloadLinks?: boolean;
  reloadLatest?: boolean;
}

export function getLogLevel(cliOptions: OutputOptions): LogLevel | undefined {
  if (cliOptions.json || cliOptions.jsonl) {
    return LogLevel.none;
  }
  if (cliOptions.silent) {
    return LogLevel.error;
  }
  if (cliOptions.verbose) {
    return LogLevel.trace;
  }
  return undefined;
}

export function toRunConfigOverrides(cliOptions: SyncOptions): Partial<RunConfig> {
  const { worksetMode } = cliOptions;
  let worksetOpeningMode: WorksetOpeningMode | undefined;
  if (worksetMode !== undefined) {
    if (!isWorksetOpeningMode(worksetMode)) {
      throw new Error(`--workset-mode must be All, LastViewed or Specify, got ${worksetMode}`);
    }
    worksetOpeningMode = worksetMode;
  }
  return {
    worksetOpeningMode,
    worksets: cliOptions.worksets,
    linkReloadDelayMs: cliOptions.linkReloadDelay,
    maxConcurrentSyncs: cliOptions.maxConcurrentSyncs,
    maxRetryAttempts: cliOptions.maxRetryAttempts,
    retryBackoffBaseMs: cliOptions.retryBackoff,
    reloadLinks: cliOptions.reloadLinks,
    reloadLatest: cliOptions.reloadLatest,
  };
}

/**
 * Defaults, then the config file, then flags. Without `--config` the default file is
 * read only when it exists.
 */
export async function loadRunConfig(cliOptions: SyncOptions, cwd = process.cwd()): Promise<RunConfig> {
  const configFile = cliOptions.config ?? join(cwd, DEFAULT_CONFIG_FILE);
  let fileConfig: Partial<RunConfig> | undefined;
  if (cliOptions.config || (await utils.fileExists(configFile))) {
    fileConfig = parseRunConfig(await utils.readJsonFile(configFile), configFile);
  }
  return resolveRunConfig(fileConfig, toRunConfigOverrides(cliOptions));
}

export function getStateFile(cliOptions: SyncOptions, cwd = process.cwd()): string {
  return cliOptions.stateFile || join(cwd, DEFAULT_STATE_FILE);
}
