import { Command } from 'commander';

import { log, Logger } from '../../io';
import { LogLevel } from '../../models';
import * as utils from '../../utils';
import { initLibraryLogger } from '../initCliProvider';
import { CatalogGateway } from './catalogGateway';
import {
  buildSyncPlan,
  discoverDependencies,
  parseIdentityRecord,
  sortGraph,
  SyncOrchestrator,
  SyncRunResult,
} from './engine';
import { toPlanJsonOutput, toSyncJsonOutput, toTransitionLine } from './jsonOutput';
import { getLogLevel, getStateFile, loadRunConfig, SyncOptions } from './options';
import { shouldShowProgressBar, SyncProgressBar } from './progressBar';
import { formatPlan, reportResult } from './report';
import { applyResumeState, clearResumeState, loadResumeState, saveResumeState, toResumeState } from './resumeState';
import { selectModels } from './selectModels';

export function syncCommand() {
  const program = new Command('sync')
    .description('sync a model after every model it links to, leaves first')
    .argument('<root>', 'root model as region,projectId,modelId (optionally preceded by a name)')
    .requiredOption('--catalog <file>', 'JSON catalog of models and their links')
    .option('-c, --config <file>', 'JSON file with run options (default: synctree.json if present)')
    .option('--select <models...>', 'model ids or names to sync; their dependencies are added')
    .option('-r, --resume', 'sync only the selected models that did not sync last time')
    .option('--state-file <path>', 'path to state file for resume (default: .synctree-state)')
    .option('--show-plan', 'print the sync order without running')
    .option('--workset-mode <mode>', 'worksets to open: All, LastViewed or Specify')
    .option('--worksets <names...>', 'workset names to open with --workset-mode Specify')
    .option('--link-reload-delay <ms>', 'wait after opening a model that has links', utils.toNumber)
    .option('--max-concurrent-syncs <count>', 'models open for sync at the same time', utils.toNumber)
    .option('--max-concurrent-opens <count>', 'models opened at the same time during discovery', utils.toNumber)
    .option('--max-retry-attempts <count>', 'retries after a transient failure', utils.toNumber)
    .option('--retry-backoff <ms>', 'delay before the first retry, doubled for each further one', utils.toNumber)
    .option('--no-reload-links', 'keep linked models as they were loaded')
    .option('--no-reload-latest', 'do not fetch the latest central version before syncing')
    .option('--json', 'use json output')
    .option('--jsonl', 'stream json lines output')
    .option('-s, --silent', 'log only errors')
    .option('-v, --verbose', 'make the operation more talkative')
    .action(execute);
  return program;
}

/** Negated flags default to true; only an explicit flag may override the config file. */
export function applyCliSwitches(options: SyncOptions, command: Pick<Command, 'getOptionValueSource'>): SyncOptions {
  return {
    ...options,
    reloadLinks: command.getOptionValueSource('reloadLinks') === 'cli' ? options.reloadLinks : undefined,
    reloadLatest: command.getOptionValueSource('reloadLatest') === 'cli' ? options.reloadLatest : undefined,
  };
}

async function execute(root: string, cliOptions: SyncOptions, command: Command): Promise<void> {
  const options = applyCliSwitches(cliOptions, command);
  const showProgress = shouldShowProgressBar(options);
  initLibraryLogger({ level: getLogLevel(options), collect: showProgress });
  const output = new Logger({ level: getLogLevel(options) ?? LogLevel.info });

  const config = await loadRunConfig(options);
  const { identity: rootIdentity, name: rootName } = parseIdentityRecord(root);
  const gateway = await CatalogGateway.load(options.catalog);

  const controller = new AbortController();
  const onInterrupt = () => {
    output.error('interrupted: letting running syncs finish');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const graph = await discoverDependencies(rootIdentity, gateway, {
      maxConcurrentOpens: options.maxConcurrentOpens,
      retry: config,
      rootName,
      signal: controller.signal,
    });
    const order = sortGraph(graph);

    const stateFile = getStateFile(options);
    const resumeState = options.resume ? await loadResumeState(stateFile) : undefined;
    if (options.resume && !resumeState) {
      output.info(`Nothing to resume: no state in ${stateFile}.`);
      return;
    }
    const selection = resumeState
      ? applyResumeState(order, resumeState, rootIdentity)
      : await selectModels(order, options);
    if (selection.length === 0) {
      output.info(resumeState ? 'Nothing to resume.' : 'No models selected.');
      return;
    }
    const plan = buildSyncPlan(graph, selection, order);

    if (options.showPlan) {
      if (options.json) {
        console.info(utils.stringifySafe(toPlanJsonOutput(plan), 2));
      } else {
        formatPlan(plan).forEach(line => output.info(line));
      }
      return;
    }

    const progressBar = new SyncProgressBar({ requestedKeys: new Set(plan.requestedKeys) }, showProgress);
    const emitJsonLine = options.jsonl ? createJsonlEmitter() : undefined;
    const orchestrator = new SyncOrchestrator(gateway);
    orchestrator.onTransition(event => {
      emitJsonLine?.(toTransitionLine(event));
      progressBar.update(event);
    });

    emitJsonLine?.({
      type: 'start',
      totalModels: plan.stats.totalModels,
      requestedModels: plan.stats.requestedModels,
    });
    progressBar.start();
    let result: SyncRunResult;
    try {
      result = await orchestrator.run(plan, config, { signal: controller.signal });
    } finally {
      progressBar.stop();
    }
    if (showProgress) {
      console.info('');
    }

    const jsonOutput = toSyncJsonOutput(graph, plan, result);
    if (options.jsonl) {
      emitJsonLine?.({ type: 'summary', status: result.status, summary: jsonOutput.summary });
    } else if (options.json) {
      console.info(utils.stringifySafe(jsonOutput, 2));
    } else {
      reportResult(result, output);
    }

    const state = toResumeState(rootIdentity, result);
    if (state) {
      await saveResumeState(stateFile, state);
      output.info(`Resume state saved to ${stateFile}. Run with --resume (-r) to sync the rest.`);
    } else {
      await clearResumeState(stateFile);
    }

    if (result.status !== 'completed' || result.stats.failed > 0) {
      process.exitCode = 1;
    }
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    log.flush();
  }
}

function createJsonlEmitter() {
  return (line: unknown) => {
    process.stdout.write(`${utils.stringifySafe(line)}\n`);
  };
}
