import { createGraph } from '../../test/testUtils';
import { sortGraph } from './engine';
import { selectModels, selectModelsWithArgs } from './selectModels';

const mockPrompt = jest.fn<Promise<{ models: Array<string> }>, []>();
jest.mock('inquirer', () => ({ prompt: mockPrompt }));

function namedOrder() {
  const graph = createGraph({ site: ['arch', 'grid'], arch: ['grid'], grid: [] });
  graph.nodes['US:project-1:arch'].name = 'Architecture';
  graph.nodes['US:project-1:grid'].name = 'Grid';
  return sortGraph(graph);
}

describe('selectModelsWithArgs', () => {
  it('matches model ids and names ignoring case', () => {
    const selection = selectModelsWithArgs(namedOrder(), ['SITE', 'architecture']);

    expect(selection.map(identity => identity.modelId)).toEqual(['site', 'arch']);
  });

  it('selects a model once even when several terms match it', () => {
    expect(selectModelsWithArgs(namedOrder(), ['grid', 'Grid'])).toHaveLength(1);
  });

  it('rejects terms that match nothing', () => {
    expect(() => selectModelsWithArgs(namedOrder(), ['mep'])).toThrow('No discovered model matches "mep"');
  });
});

describe('selectModels', () => {
  it('selects everything when there is nothing to ask', async () => {
    const selection = await selectModels(namedOrder(), { catalog: 'catalog.json' }, false);

    expect(selection.map(identity => identity.modelId)).toEqual(['grid', 'arch', 'site']);
    expect(mockPrompt).not.toHaveBeenCalled();
  });

  it('returns the models ticked in the prompt', async () => {
    mockPrompt.mockResolvedValueOnce({ models: ['US:project-1:arch'] });

    const selection = await selectModels(namedOrder(), { catalog: 'catalog.json' }, true);

    expect(selection.map(identity => identity.modelId)).toEqual(['arch']);
  });

  it('selects nothing when every box is unticked', async () => {
    mockPrompt.mockResolvedValueOnce({ models: [] });

    expect(await selectModels(namedOrder(), { catalog: 'catalog.json' }, true)).toEqual([]);
  });

  it('prefers --select over prompting', async () => {
    const selection = await selectModels(namedOrder(), { catalog: 'catalog.json', select: ['grid'] }, true);

    expect(selection.map(identity => identity.modelId)).toEqual(['grid']);
  });
});
