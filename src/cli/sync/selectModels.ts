import { formatIdentity, IdentityKey, ModelIdentity, OrderedModel } from './engine';
import { SyncOptions } from './options';

/**
 * Resolves `--select` terms against the discovered models. A term matches a model id
 * or a model name, ignoring case. Without terms the user picks interactively when
 * possible, otherwise every model is selected. An empty result means the user chose
 * nothing.
 */
export async function selectModels(
  order: Array<OrderedModel>,
  cliOptions: SyncOptions,
  interactive = canPrompt(cliOptions)
): Promise<Array<ModelIdentity>> {
  if (cliOptions.select && cliOptions.select.length > 0) {
    return selectModelsWithArgs(order, cliOptions.select);
  }
  if (interactive) {
    return await selectManualModels(order);
  }
  return order.map(model => model.identity);
}

export function selectModelsWithArgs(order: Array<OrderedModel>, terms: Array<string>): Array<ModelIdentity> {
  const result: Array<ModelIdentity> = [];
  for (const term of terms) {
    const needle = term.trim().toLowerCase();
    const matches = order.filter(model => model.identity.modelId === needle || model.name?.toLowerCase() === needle);
    if (matches.length === 0) {
      throw new Error(`No discovered model matches "${term}"`);
    }
    for (const match of matches) {
      if (!result.includes(match.identity)) {
        result.push(match.identity);
      }
    }
  }
  return result;
}

async function selectManualModels(order: Array<OrderedModel>): Promise<Array<ModelIdentity>> {
  const byKey = new Map<IdentityKey, ModelIdentity>(order.map(model => [model.key, model.identity]));
  const inquirer = await import('inquirer');
  const answer = await inquirer.default.prompt<{ models: Array<string> }>([
    {
      type: 'checkbox',
      name: 'models',
      message: 'please choose which models to sync (dependencies are added)',
      choices: [...order].reverse().map(model => ({
        name: `${formatIdentity(model.identity, model.name)}${model.discoveryFailed ? ' (unreachable)' : ''}`,
        value: model.key,
      })),
    },
  ]);
  const selection: Array<ModelIdentity> = [];
  for (const key of answer.models) {
    const identity = byKey.get(key);
    if (identity) {
      selection.push(identity);
    }
  }
  return selection;
}

function canPrompt(cliOptions: SyncOptions): boolean {
  if (cliOptions.json || cliOptions.jsonl || cliOptions.resume) {
    return false;
  }
  return process.stdin.isTTY === true && process.stdout.isTTY === true;
}
