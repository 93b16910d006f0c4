import { Command } from 'commander';

import { createIdentity, formatIdentityRecord } from '../sync/engine';

export function modelIdCommand() {
  return new Command('id')
    .description('print the identity record of a model, e.g. to pass it as <root>')
    .argument('<region>', 'cloud region (US, EMEA, AUS, CAN, DEU, IND, JPN, GBR)')
    .argument('<projectId>', 'project id')
    .argument('<modelId>', 'model id')
    .argument('[name]', 'display name, defaults to the model id')
    .action((region: string, projectId: string, modelId: string, name: string | undefined) => {
      const identity = createIdentity(region, projectId, modelId);
      console.info(formatIdentityRecord(identity, name ?? identity.modelId));
    });
}
