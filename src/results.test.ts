import { describe, it, expect } from 'vitest';
import { ResultsAggregator, createEmptyResults } from './results.js';

describe('ResultsAggregator', () => {
  it('groups moved files by category', () => {
    const aggregator = new ResultsAggregator();
    aggregator.record('a.jpg', { status: 'moved', category: 'images', destination: '/d/images/a.jpg', planned: false });
    aggregator.record('b.png', { status: 'moved', category: 'images', destination: '/d/images/b.png', planned: false });
    aggregator.record('c.pdf', { status: 'moved', category: 'documents', destination: '/d/documents/c.pdf', planned: false });

    const results = aggregator.finish(3, 0);

    expect(results.moved).toEqual({ images: ['a.jpg', 'b.png'], documents: ['c.pdf'] });
    expect(results.stats.moved).toBe(3);
  });

  it('keeps skipped and failed files with their reasons', () => {
    const aggregator = new ResultsAggregator();
    aggregator.record('.hidden', { status: 'skipped', reason: 'Hidden or temporary file' });
    aggregator.record('x.jpg', { status: 'error', message: 'Move operation failed: boom' });

    const results = aggregator.finish(2, 0);

    expect(results.skipped).toEqual([{ file: '.hidden', reason: 'Hidden or temporary file' }]);
    expect(results.errors).toEqual([{ file: 'x.jpg', message: 'Move operation failed: boom' }]);
    expect(results.stats).toEqual({
      totalFiles: 2,
      moved: 0,
      skipped: 1,
      errors: 1,
      executionTimeSeconds: 0,
    });
  });

  it('counts every recorded outcome', () => {
    const aggregator = new ResultsAggregator();
    aggregator.record('a', { status: 'skipped', reason: 'Unknown file type' });
    aggregator.record('b', { status: 'error', message: 'boom' });
    expect(aggregator.recorded()).toBe(2);
  });

  it('rounds execution time to hundredths of a second', () => {
    const results = new ResultsAggregator().finish(0, 1234);
    expect(results.stats.executionTimeSeconds).toBe(1.23);
  });

  it('freezes the results once finished', () => {
    const aggregator = new ResultsAggregator();
    aggregator.record('a.jpg', { status: 'moved', category: 'images', destination: '/d/images/a.jpg', planned: false });
    const results = aggregator.finish(1, 10);

    expect(Object.isFrozen(results)).toBe(true);
    expect(Object.isFrozen(results.moved.images)).toBe(true);
    expect(() => aggregator.record('b.jpg', { status: 'skipped', reason: 'Unknown file type' })).toThrow(
      'Cannot record b.jpg: results are already final'
    );
    expect(aggregator.finish(5, 999)).toBe(results);
    expect(results.stats.totalFiles).toBe(1);
  });
});

describe('createEmptyResults', () => {
  it('starts with zero counts', () => {
    expect(createEmptyResults()).toEqual({
      moved: {},
      skipped: [],
      errors: [],
      stats: { totalFiles: 0, moved: 0, skipped: 0, errors: 0, executionTimeSeconds: 0 },
    });
  });
});
