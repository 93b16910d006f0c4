import { default as chalk } from 'chalk';
import { Command } from 'commander';

import { log, Logger } from '../../io';
import { LogLevel } from '../../models';
import * as utils from '../../utils';
import { initLibraryLogger } from '../initCliProvider';
import { CatalogGateway } from '../sync/catalogGateway';
import { CycleDetectedError, discoverDependencies, formatIdentity, formatTree, parseIdentityRecord, sortGraph } from '../sync/engine';
import { toGraphJsonOutput } from '../sync/jsonOutput';
import { DiscoverCliOptions, getLogLevel } from '../sync/options';
import { formatTreeLine } from '../sync/report';

export function discoverCommand() {
  return new Command('discover')
    .description('list every model reachable through links from a root model')
    .argument('<root>', 'root model as region,projectId,modelId (optionally preceded by a name)')
    .requiredOption('--catalog <file>', 'JSON catalog of models and their links')
    .option('--max-concurrent-opens <count>', 'models opened at the same time', utils.toNumber)
    .option('--json', 'use json output')
    .option('-s, --silent', 'log only errors')
    .option('-v, --verbose', 'make the operation more talkative')
    .action(execute);
}

async function execute(root: string, options: DiscoverCliOptions): Promise<void> {
  initLibraryLogger({ level: getLogLevel(options) });
  const output = new Logger({ level: getLogLevel(options) ?? LogLevel.info });
  const { identity, name } = parseIdentityRecord(root);
  const gateway = await CatalogGateway.load(options.catalog);

  const graph = await discoverDependencies(identity, gateway, {
    maxConcurrentOpens: options.maxConcurrentOpens,
    rootName: name,
    listener: event => {
      if (event.type === 'scanning') {
        log.debug(`scanning ${formatIdentity(event.identity, event.name)}`);
      }
    },
  });

  if (options.json) {
    console.info(utils.stringifySafe(toGraphJsonOutput(graph), 2));
    return;
  }

  formatTree(graph).forEach(line => output.info(formatTreeLine(line)));
  output.info('---------------------');
  try {
    const order = sortGraph(graph);
    output.info(chalk`{bold ${order.length}} models, sync order: ${order.map(model => formatIdentity(model.identity, model.name)).join(', ')}`);
  } catch (err) {
    if (!(err instanceof CycleDetectedError)) {
      throw err;
    }
    output.error(chalk.red(err.message));
    process.exitCode = 1;
  }
}
