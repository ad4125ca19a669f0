import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { UnexpectedResponseError } from './errors.js';
import { DecimalField, IntegerField, Namespace } from './fields.js';
import { DataFrame } from './frame.js';
import { INDEX, RecordingExecutor, recordingLogger } from './__tests__/helpers.js';

let executor: RecordingExecutor;
let logger: ReturnType<typeof recordingLogger>;
let frame: DataFrame;

beforeEach(async () => {
  executor = new RecordingExecutor();
  logger = recordingLogger();
  frame = await DataFrame.fromIndex(INDEX, { executor, logger });
});

// ─── Handles ─────────────────────────────────────────────────────────

describe('handles', () => {
  it('carry the full dotted name and the local key', () => {
    const visits = frame.field('stats.inner.visits');
    expect(visits).toBeInstanceOf(IntegerField);
    expect(visits.name).toBe('stats.inner.visits');
    expect(visits.key).toBe('visits');
    expect(visits.toString()).toBe('IntegerField(stats.inner.visits)');
  });

  it('list the children of a namespace', () => {
    const stats = frame.namespace('stats');
    expect(stats.fields).toEqual(['visits', 'score']);
    expect(stats.namespaces).toEqual(['inner']);
    expect(stats.get('inner')).toBeInstanceOf(Namespace);
    expect(stats.get('missing')).toBeUndefined();
  });

  it('map scaled floats to decimals', () => {
    expect(frame.numeric('device.unit_fee')).toBeInstanceOf(DecimalField);
  });

  it('build exists conditions for fields and namespaces', () => {
    expect(frame.namespace('stats').exists().compile()).toEqual({ exists: { field: 'stats' } });
    expect(frame.field('rank').not().exists().compile()).toEqual({
      bool: { must_not: [{ exists: { field: 'rank' } }] },
    });
  });

  it('invert without changing the handle they came from', () => {
    const rank = frame.field('rank');
    const inverted = rank.not();
    expect(inverted.isInverted).toBe(true);
    expect(rank.isInverted).toBe(false);
    expect(inverted.name).toBe('rank');
  });
});

// ─── Conditions ──────────────────────────────────────────────────────

describe('conditions', () => {
  it('compares for equality', () => {
    expect(frame.field('rank').eq(3).compile()).toEqual({ term: { rank: 3 } });
    expect(frame.boolean('device.enabled').eq(false).compile()).toEqual({ term: { 'device.enabled': false } });
  });

  it('wraps inequality in must_not', () => {
    expect(frame.field('rank').ne(3).compile()).toEqual({ bool: { must_not: [{ term: { rank: 3 } }] } });
  });

  it('turns an inverted inequality back into a term', () => {
    expect(frame.field('rank').not().ne(3).compile()).toEqual({ term: { rank: 3 } });
  });

  it('negates equality on an inverted handle', () => {
    expect(frame.field('rank').not().eq(3).compile()).toEqual({ bool: { must_not: [{ term: { rank: 3 } }] } });
  });

  it('tests membership', () => {
    expect(frame.text('device.os').isin(['mac', 'linux']).compile()).toEqual({
      terms: { 'device.os': ['mac', 'linux'] },
    });
  });

  it('compares ranges', () => {
    const visits = frame.numeric('stats.visits');
    expect(visits.gt(5).compile()).toEqual({ range: { 'stats.visits': { gt: 5 } } });
    expect(visits.ge(5).compile()).toEqual({ range: { 'stats.visits': { gte: 5 } } });
    expect(visits.lt(5).compile()).toEqual({ range: { 'stats.visits': { lt: 5 } } });
    expect(visits.le(5).compile()).toEqual({ range: { 'stats.visits': { lte: 5 } } });
    expect(visits.not().le(5).compile()).toEqual({
      bool: { must_not: [{ range: { 'stats.visits': { lte: 5 } } }] },
    });
  });

  it('matches strings', () => {
    const title = frame.text('title');
    expect(title.match('hello').compile()).toEqual({ match: { title: 'hello' } });
    expect(title.regexp('h.*o').compile()).toEqual({ regexp: { title: 'h.*o' } });
    expect(title.contains('ell').compile()).toEqual({ wildcard: { title: '*ell*' } });
    expect(title.startsWith('he').compile()).toEqual({ prefix: { title: 'he' } });
    expect(title.endsWith('lo').compile()).toEqual({ wildcard: { title: '*lo' } });
  });

  it('inverts a full-text match', () => {
    expect(frame.text('title').not().match('hello').compile()).toEqual({
      bool: { must_not: [{ match: { title: 'hello' } }] },
    });
  });
});

describe('age conditions', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-11T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('matches dates at least a number of days old', () => {
    const age = frame.date('events.signup_date').age;
    expect(age.ge(10).compile()).toEqual({
      range: { 'events.signup_date': { lte: new Date('2024-03-01T00:00:00.000Z') } },
    });
  });

  it('reverses every comparison', () => {
    const age = frame.date('events.signup_date').age;
    const dayAgo = new Date('2024-03-10T00:00:00.000Z');
    expect(age.lt(1).compile()).toEqual({ range: { 'events.signup_date': { gt: dayAgo } } });
    expect(age.le(1).compile()).toEqual({ range: { 'events.signup_date': { gte: dayAgo } } });
    expect(age.gt(1).compile()).toEqual({ range: { 'events.signup_date': { lt: dayAgo } } });
    expect(age.eq(1).compile()).toEqual({ term: { 'events.signup_date': dayAgo } });
  });

  it('keeps the inversion of the date handle', () => {
    const age = frame.date('events.signup_date').not().age;
    expect(age.isInverted).toBe(true);
    expect(age.ge(10).compile()).toEqual({
      bool: { must_not: [{ range: { 'events.signup_date': { lte: new Date('2024-03-01T00:00:00.000Z') } } }] },
    });
  });
});

// ─── Aggregations ────────────────────────────────────────────────────

describe('aggregations', () => {
  it('counts values with the remainder under OTHER', async () => {
    executor.answerAggregation('terms', {
      buckets: [
        { key: 'mac', doc_count: 6 },
        { key: 'linux', doc_count: 3 },
      ],
      sum_other_doc_count: 1,
      doc_count_error_upper_bound: 0,
    });

    const counts = await frame.text('device.os').valueCounts();

    expect(counts).toEqual([
      ['mac', 6],
      ['linux', 3],
      ['OTHER', 1],
    ]);
    expect(executor.lastSearch.body).toEqual({
      query: { match_all: {} },
      aggs: { terms: { terms: { field: 'device.os', size: 10 } } },
    });
    expect(executor.lastSearch.options).toEqual({ size: 0, source: undefined, params: undefined });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('normalizes value counts', async () => {
    executor.answerAggregation('terms', {
      buckets: [
        { key: 1, key_as_string: 'true', doc_count: 3 },
        { key: 0, key_as_string: 'false', doc_count: 1 },
      ],
    });

    const counts = await frame.boolean('device.enabled').valueCounts({ normalize: true, missing: false });

    expect(counts).toEqual([
      [true, 0.75],
      [false, 0.25],
    ]);
    expect(executor.lastSearch.body.aggs).toEqual({
      terms: { terms: { field: 'device.enabled', size: 10, missing: false } },
    });
  });

  it('warns when a term may be missing from the counts', async () => {
    executor.answerAggregation('terms', {
      buckets: [
        { key: 'mac', doc_count: 6 },
        { key: 'linux', doc_count: 3 },
      ],
      doc_count_error_upper_bound: 5,
    });

    await frame.text('device.os').valueCounts({ n: 2 });

    expect(logger.warn).toHaveBeenCalledWith(
      { field: 'device.os', n: 2, errorBound: 5 },
      'The current `n` may leave out a term from the value counts',
    );
  });

  it('runs aggregations over the current conditions', async () => {
    executor.answerAggregation('cardinality', { value: 17 });
    const filtered = frame.where(frame.field('rank').eq(1));

    await expect(filtered.text('device.os').nunique()).resolves.toBe(17);
    expect(executor.lastSearch.body).toEqual({
      query: { term: { rank: 1 } },
      aggs: { cardinality: { cardinality: { field: 'device.os', precision_threshold: 3000 } } },
    });
  });

  it('warns that limits are ignored', async () => {
    executor.answerAggregation('avg', { value: 4.5 });

    await expect(frame.limit(3).numeric('stats.visits').average()).resolves.toBe(4.5);
    expect(logger.warn).toHaveBeenCalledWith(
      { field: 'stats.visits', aggregation: 'avg' },
      'Limits are not applied in aggregations',
    );
  });

  it('returns undefined for a metric over no values', async () => {
    executor.answerAggregation('max', { value: null });
    await expect(frame.numeric('stats.score').max()).resolves.toBeUndefined();
  });

  it('sums to zero over no values', async () => {
    executor.answerAggregation('sum', { value: null });
    await expect(frame.numeric('stats.visits').sum()).resolves.toBe(0);
  });

  it('requests percentiles as a list', async () => {
    executor.answerAggregation('percentiles', {
      values: [
        { key: 50, value: 3 },
        { key: 99, value: 12 },
      ],
    });

    const percentiles = await frame.numeric('stats.visits').percentiles({ precision: 200 });

    expect(percentiles).toEqual([
      { key: 50, value: 3 },
      { key: 99, value: 12 },
    ]);
    expect(executor.lastSearch.body.aggs).toEqual({
      percentiles: { percentiles: { field: 'stats.visits', keyed: false, tdigest: { compression: 200 } } },
    });
  });

  it('requests percentile ranks for the given values', async () => {
    executor.answerAggregation('percentile_ranks', { values: [{ key: 10, value: 80 }] });

    await expect(frame.numeric('stats.visits').percentileRanks([10])).resolves.toEqual([{ key: 10, value: 80 }]);
    expect(executor.lastSearch.body.aggs).toEqual({
      percentile_ranks: {
        percentile_ranks: { field: 'stats.visits', keyed: false, values: [10], tdigest: { compression: 100 } },
      },
    });
  });

  it('describes with extended stats', async () => {
    executor.answerAggregation('extended_stats', { count: 2, min: 1, max: 3, avg: 2, sum: 4, variance: 1 });

    const stats = await frame.numeric('metrics.load').describe({ extended: true });

    expect(stats).toEqual({ count: 2, min: 1, max: 3, avg: 2, sum: 4, variance: 1 });
    expect(executor.lastSearch.body.aggs).toEqual({
      extended_stats: { extended_stats: { field: 'metrics.load' } },
    });
  });

  it('computes the median absolute deviation', async () => {
    executor.answerAggregation('median_absolute_deviation', { value: 1.5 });

    await expect(frame.numeric('stats.score').medianAbsoluteDeviation()).resolves.toBe(1.5);
    expect(executor.lastSearch.body.aggs).toEqual({
      median_absolute_deviation: { median_absolute_deviation: { field: 'stats.score', compression: 1000 } },
    });
  });

  it('labels histogram bins by interval', async () => {
    executor.answerAggregation('histogram', {
      buckets: [
        { key: 0, doc_count: 4 },
        { key: 50, doc_count: 1 },
      ],
    });

    const bins = await frame.numeric('stats.visits').histogram();

    expect(bins).toEqual([
      ['[0, 50)', 4],
      ['[50, 100)', 1],
    ]);
    expect(executor.lastSearch.body.aggs).toEqual({
      histogram: { histogram: { field: 'stats.visits', interval: 50, min_doc_count: 1 } },
    });
  });

  it('returns date metrics as dates', async () => {
    executor.answerAggregation('max', { value: 1704067200000 });
    await expect(frame.date('events.signup_date').max()).resolves.toEqual(new Date('2024-01-01T00:00:00.000Z'));
  });

  it('buckets dates by calendar interval', async () => {
    executor.answerAggregation('date_histogram', {
      buckets: [
        { key: 1704067200000, key_as_string: '2024-01-01', doc_count: 3 },
        { key: 1706745600000, doc_count: 2 },
      ],
    });

    const bins = await frame.date('events.signup_date').histogram({ interval: 'month' });

    expect(bins).toEqual([
      ['2024-01-01', 3],
      ['2024-02-01T00:00:00.000Z', 2],
    ]);
    expect(executor.lastSearch.body.aggs).toEqual({
      date_histogram: {
        date_histogram: { field: 'events.signup_date', calendar_interval: 'month', min_doc_count: 1 },
      },
    });
  });

  it('rejects a malformed aggregation result', async () => {
    executor.answerAggregation('avg', { nope: 1 });
    await expect(frame.numeric('stats.visits').average()).rejects.toThrow(UnexpectedResponseError);
  });

  it('passes request parameters through', async () => {
    executor.answerAggregation('min', { value: 2 });
    await frame.numeric('rank').min({ params: { request_cache: true } });
    expect(executor.lastSearch.options.params).toEqual({ request_cache: true });
  });
});
