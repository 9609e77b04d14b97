import { describe, expect, it } from 'vitest';
import { BadRequestException } from '../../src/http/errors.js';
import { QueryExecutionException } from '../../src/query/errors.js';
import {
  countResults,
  executeList,
  isPaged,
  runEngineCall,
  UNBOUNDED_MAX_RESULTS,
} from '../../src/query/executor.js';
import {
  buildProcessInstance,
  RecordingProcessInstanceQuery,
} from '../fixtures/recording-engine.js';

const instances = ['a', 'b', 'c', 'd'].map((id) => buildProcessInstance({ id }));

describe('isPaged', () => {
  it('is false without a page spec or bounds', () => {
    expect(isPaged(undefined)).toBe(false);
    expect(isPaged({})).toBe(false);
  });

  it('is true when either bound is present, including zero', () => {
    expect(isPaged({ firstResult: 0 })).toBe(true);
    expect(isPaged({ maxResults: 10 })).toBe(true);
  });
});

describe('executeList', () => {
  it('uses the unbounded path without bounds', async () => {
    const query = new RecordingProcessInstanceQuery({ results: instances });

    const results = await executeList('instance', query, {});

    expect(results).toEqual(instances);
    expect(query.calls).toEqual([{ method: 'list', args: [] }]);
  });

  it('uses the page path when both bounds are given', async () => {
    const query = new RecordingProcessInstanceQuery({ results: instances });

    const results = await executeList('instance', query, { firstResult: 1, maxResults: 2 });

    expect(results.map((instance) => instance.id)).toEqual(['b', 'c']);
    expect(query.calls).toEqual([{ method: 'listPage', args: [1, 2] }]);
  });

  it('defaults a missing firstResult to 0', async () => {
    const query = new RecordingProcessInstanceQuery({ results: instances });

    await executeList('instance', query, { maxResults: 3 });

    expect(query.calls).toEqual([{ method: 'listPage', args: [0, 3] }]);
  });

  it('leaves the page unbounded at the top without maxResults', async () => {
    const query = new RecordingProcessInstanceQuery({ results: instances });

    const results = await executeList('instance', query, { firstResult: 2 });

    expect(results.map((instance) => instance.id)).toEqual(['c', 'd']);
    expect(query.calls).toEqual([{ method: 'listPage', args: [2, UNBOUNDED_MAX_RESULTS] }]);
  });

  it('returns an empty list for a page past the end', async () => {
    const query = new RecordingProcessInstanceQuery({ results: instances });

    expect(await executeList('instance', query, { firstResult: 10, maxResults: 5 })).toEqual([]);
  });

  it('wraps engine failures in QueryExecutionException', async () => {
    const engineError = new Error('Invalid value for tenant');
    const query = new RecordingProcessInstanceQuery({ failWith: engineError });

    const result = executeList('instance', query);

    await expect(result).rejects.toBeInstanceOf(QueryExecutionException);
    await expect(result).rejects.toMatchObject({
      message: 'Cannot execute instance query: Invalid value for tenant',
      queryType: 'instance',
      cause: engineError,
    });
  });
});

describe('countResults', () => {
  it('returns the engine count', async () => {
    const query = new RecordingProcessInstanceQuery({ results: instances, count: 42 });

    expect(await countResults('instance', query)).toBe(42);
    expect(query.methods).toEqual(['count']);
  });

  it('wraps engine failures', async () => {
    const query = new RecordingProcessInstanceQuery({ failWith: new Error('boom') });

    await expect(countResults('instance', query)).rejects.toThrow(
      'Cannot execute instance query: boom'
    );
  });
});

describe('runEngineCall', () => {
  it('returns the call result', async () => {
    expect(await runEngineCall('instance', () => 7)).toBe(7);
  });

  it('passes domain exceptions through untouched', async () => {
    const error = new BadRequestException('already mapped');

    await expect(
      runEngineCall('instance', () => {
        throw error;
      })
    ).rejects.toBe(error);
  });

  it('wraps non-Error rejections', async () => {
    await expect(runEngineCall('instance', () => Promise.reject('offline'))).rejects.toThrow(
      'Cannot execute instance query: offline'
    );
  });
});
