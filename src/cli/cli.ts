import { default as chalk } from 'chalk';
import { Command } from 'commander';
import { join } from 'path';

import * as utils from '../utils';
import { discoverCommand } from './discover/discover';
import { initCliProvider } from './initCliProvider';
import { modelIdCommand } from './modelId/modelId';
import { syncCommand } from './sync/sync';

export async function createProgram() {
  const packageJson = await utils.readJsonFile(join(__dirname, '..', '..', 'package.json'));
  const version = utils.isRecord(packageJson) && utils.isString(packageJson.version) ? packageJson.version : '0.0.1';
  return new Command('synctree')
    .description('sync linked cloud models bottom-up, every link before the model that uses it')
    .version(version)
    .addCommand(syncCommand())
    .addCommand(discoverCommand())
    .addCommand(modelIdCommand());
}

export async function execute(rawArgs: string[]): Promise<void> {
  try {
    initCliProvider();
    const program = await createProgram();
    await program.parseAsync(rawArgs);
  } catch (err) {
    console.error(chalk.red(utils.errorToString(err)));
    if (!process.exitCode) {
      process.exitCode = 1;
    }
  }
}
