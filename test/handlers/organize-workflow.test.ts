import { describe, it, expect } from 'vitest';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { handleOrganizeWorkflow } from '../../src/handlers';
import { captureSink, graphOf, parseResult, wireGraph } from '../helpers';

describe('handleOrganizeWorkflow', () => {
  it('returns positions and sizes keyed by node id', async () => {
    const res = parseResult(
      await handleOrganizeWorkflow({ graph: wireGraph(graphOf([1, 2], [[1, 2]])) })
    );
    expect(res).toEqual({
      status: 'success',
      message: 'Complete - positioned 2 nodes',
      positions: { '1': [100, 0], '2': [300, 0] },
      sizes: { '1': [100, 50], '2': [100, 50] },
      componentCount: 1,
      converged: true,
    });
  });

  it('accepts links in serialized array form', async () => {
    const graph = {
      nodes: [
        { id: 4, type: 'Loader', pos: [0, 0], size: [120, 80] },
        { id: 5, type: 'Sampler', pos: [0, 0], size: [200, 100] },
      ],
      links: [[1, 4, 0, 5, 2, 'MODEL']],
    };
    const res = parseResult(await handleOrganizeWorkflow({ graph }));
    expect(res.positions).toEqual({ '4': [100, 0], '5': [320, 0] });
    expect(res.sizes).toEqual({ '4': [120, 80], '5': [200, 100] });
  });

  it('returns empty maps when nothing is linked', async () => {
    const res = parseResult(
      await handleOrganizeWorkflow({
        graph: { nodes: [{ id: 1, type: 'Note', pos: [0, 0], size: [10, 10] }], links: [] },
      })
    );
    expect(res.message).toBe('No workflow nodes to organize');
    expect(res.positions).toEqual({});
  });

  it('applies spacing overrides', async () => {
    const res = parseResult(
      await handleOrganizeWorkflow({
        graph: wireGraph(graphOf([1, 2], [[1, 2]])),
        columnSpacing: 40,
      })
    );
    expect(res.positions['2']).toEqual([240, 0]);
  });

  it('rejects a call without a graph', async () => {
    await expect(handleOrganizeWorkflow({})).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
    await expect(handleOrganizeWorkflow({})).rejects.toThrow(/Missing required argument\(s\): graph/);
  });

  it('names the malformed field', async () => {
    const graph = { nodes: [{ id: 1, type: 'A', pos: [0], size: [1, 1] }], links: [] };
    await expect(handleOrganizeWorkflow({ graph })).rejects.toThrow(
      /nodes\[0\]\.pos must be a \[number, number\] pair/
    );
  });

  it('rejects negative spacing', async () => {
    await expect(
      handleOrganizeWorkflow({ graph: wireGraph(graphOf([1, 2], [[1, 2]])), nodeSpacing: -5 })
    ).rejects.toThrow(/nodeSpacing must be >= 0/);
  });

  it('refuses workflows with too many chains', async () => {
    const graph = wireGraph(graphOf(['r', 'a', 'b'], [['r', 'a'], ['r', 'b']]));
    await expect(handleOrganizeWorkflow({ graph, maxChains: 1 })).rejects.toMatchObject({
      code: ErrorCode.InvalidRequest,
    });
  });

  it('writes diagnostics to the context sink at the requested level', async () => {
    const { lines, sink } = captureSink();
    await handleOrganizeWorkflow(
      { graph: wireGraph(graphOf([1, 2], [[1, 2]])), debugLevel: 1 },
      { logSink: sink }
    );
    expect(lines[0]).toBe('[layout:organize]   [organize] received 2 nodes and 1 links');
  });

  it('stays silent at the default level', async () => {
    const { lines, sink } = captureSink();
    await handleOrganizeWorkflow(
      { graph: wireGraph(graphOf([1, 2], [[1, 2]])) },
      { debugLevel: 0, logSink: sink }
    );
    expect(lines).toEqual([]);
  });
});
