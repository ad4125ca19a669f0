/**
 * @sift/search — Field and namespace handles
 *
 * Handles are bound to the frame they were taken from. Comparison
 * methods build query conditions; aggregation methods run against the
 * frame's current query.
 */

import { Bool, Exists, Match, Prefix, Range, Regexp, Term, Terms, Wildcard, type Query, type RangeValue } from './queries.js';
import {
  histogramAggregationSchema,
  parseResponse,
  percentilesAggregationSchema,
  statsAggregationSchema,
  termsAggregationSchema,
  valueAggregationSchema,
  type BucketKey,
  type Percentile,
  type Stats,
  type TermsBucket,
} from './responses.js';
import type { FieldNode, FieldType, NamespaceNode, SchemaNode } from './schema.js';
import type {
  ExecuteOptions,
  QueryDocument,
  QueryValue,
  RequestParams,
  SearchBody,
  SearchLogger,
  SearchResponse,
  TermValue,
} from './types.js';
import { cloneWith } from './utils.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** What a handle needs from the frame it belongs to. */
export interface FieldHost {
  readonly body: SearchBody;
  readonly limitValue: number | undefined;
  readonly logger: SearchLogger;
  execute(body: SearchBody, options: ExecuteOptions): Promise<SearchResponse>;
}

// ─── Options ─────────────────────────────────────────────────────────

interface AggregationOptions {
  /** Extra request parameters for the search call */
  params?: RequestParams;
}

export interface MissingOptions extends AggregationOptions {
  /** Value used for documents without one; ignored when omitted */
  missing?: TermValue;
}

export interface ValueCountsOptions extends MissingOptions {
  /** Number of buckets to return. Larger is more accurate and more expensive. */
  n?: number;
  /** Return relative frequencies instead of counts */
  normalize?: boolean;
}

export interface PrecisionOptions extends MissingOptions {
  /** Accuracy/memory trade-off of the underlying sketch */
  precision?: number;
}

export interface DescribeOptions extends MissingOptions {
  extended?: boolean;
}

export interface HistogramOptions extends MissingOptions {
  interval?: number;
  minDocCount?: number;
}

export interface DateHistogramOptions extends MissingOptions {
  /** Calendar interval, e.g. `day`, `week`, `1M` */
  interval?: string;
  minDocCount?: number;
}

export type ValueCount = [BucketKey, number];
export type HistogramBin = [string, number];

// ─── Base ────────────────────────────────────────────────────────────

abstract class Handle {
  protected readonly inverted: boolean = false;

  constructor(
    /** Local name within the parent namespace */
    readonly key: string,
    /** Full dotted name including parents */
    readonly name: string,
    protected readonly host: FieldHost,
  ) {}

  /** Copy whose conditions are negated. */
  not(): this {
    return cloneWith(this, { inverted: true });
  }

  get isInverted(): boolean {
    return this.inverted;
  }

  exists(): Query {
    return this.condition(new Exists(this.name));
  }

  toString(): string {
    return `${this.constructor.name}(${this.name})`;
  }

  protected condition(query: Query): Query {
    return this.inverted ? new Bool({ mustNot: [query] }) : query;
  }
}

export class Namespace extends Handle {
  constructor(
    key: string,
    name: string,
    host: FieldHost,
    readonly node: NamespaceNode,
  ) {
    super(key, name, host);
  }

  get(key: string): Namespace | Field | undefined {
    const child = this.node.children.get(key);
    if (!child) return undefined;
    return createHandle(child, this.name ? `${this.name}.${key}` : key, this.host);
  }

  field(key: string): Field | undefined {
    const child = this.get(key);
    return child instanceof Field ? child : undefined;
  }

  /** Names of the scalar fields directly inside the namespace. */
  get fields(): string[] {
    return this.childKeys('field');
  }

  get namespaces(): string[] {
    return this.childKeys('namespace');
  }

  private childKeys(kind: SchemaNode['kind']): string[] {
    return [...this.node.children.values()].filter((child) => child.kind === kind).map((child) => child.key);
  }
}

export abstract class Field extends Handle {
  abstract readonly dtype: FieldType;

  eq(value: TermValue): Query {
    return this.condition(new Term(this.name, value));
  }

  ne(value: TermValue): Query {
    const condition = new Term(this.name, value);
    if (this.inverted) return condition;
    return new Bool({ mustNot: [condition] });
  }

  isin(values: TermValue[]): Query {
    return this.condition(new Terms(this.name, values));
  }

  /**
   * Unique values and their counts, by descending count. Approximate when
   * there are more unique terms than `n`; the remainder is reported under
   * `OTHER`.
   */
  async valueCounts(options: ValueCountsOptions = {}): Promise<ValueCount[]> {
    const { n = 10, normalize = false, missing, params } = options;
    const raw = await this.aggregate('terms', { size: n, missing }, params);
    const result = parseResponse(termsAggregationSchema, raw, 'terms aggregation');

    let counts: ValueCount[] = result.buckets.map((bucket) => [this.bucketKey(bucket), bucket.doc_count]);
    const smallest = counts[counts.length - 1];
    if (smallest && result.doc_count_error_upper_bound > smallest[1]) {
      this.host.logger.warn(
        { field: this.name, n, errorBound: result.doc_count_error_upper_bound },
        'The current `n` may leave out a term from the value counts',
      );
    }
    if (result.sum_other_doc_count) {
      counts.push(['OTHER', result.sum_other_doc_count]);
    }
    if (normalize) {
      const total = counts.reduce((sum, [, count]) => sum + count, 0);
      counts = counts.map(([key, count]) => [key, count / total]);
    }
    return counts;
  }

  /**
   * Approximate count of distinct values. Counts below `precision` are
   * expected to be close to exact; the cluster caps it at 40000.
   */
  async nunique(options: { precision?: number } & AggregationOptions = {}): Promise<number> {
    const { precision = 3000, params } = options;
    const raw = await this.aggregate('cardinality', { precision_threshold: precision }, params);
    return parseResponse(valueAggregationSchema, raw, 'cardinality aggregation').value ?? 0;
  }

  /** Value a terms bucket is reported under. */
  protected bucketKey(bucket: TermsBucket): BucketKey {
    return bucket.key;
  }

  /** Run a single-metric aggregation over the frame's query with no hits. */
  protected async aggregate(
    key: string,
    settings: Record<string, QueryValue | undefined>,
    params?: RequestParams,
  ): Promise<unknown> {
    if (this.host.limitValue) {
      this.host.logger.warn({ field: this.name, aggregation: key }, 'Limits are not applied in aggregations');
    }
    const definition: QueryDocument = { field: this.name };
    for (const [name, value] of Object.entries(settings)) {
      if (value !== undefined) definition[name] = value;
    }
    const body: SearchBody = { ...this.host.body, aggs: { [key]: { [key]: definition } } };
    const response = await this.host.execute(body, { size: 0, params });
    return response.aggregations?.[key];
  }
}

// ─── Range and metrics ───────────────────────────────────────────────

export abstract class RangeField extends Field {
  lt(value: RangeValue): Query {
    return this.condition(new Range(this.name).lessThan(value));
  }

  le(value: RangeValue): Query {
    return this.condition(new Range(this.name).lessThanOrEqual(value));
  }

  gt(value: RangeValue): Query {
    return this.condition(new Range(this.name).greaterThan(value));
  }

  ge(value: RangeValue): Query {
    return this.condition(new Range(this.name).greaterThanOrEqual(value));
  }
}

/** Fields with single-value metrics; `M` is how a metric value is returned. */
export abstract class MetricField<M> extends RangeField {
  async average(options: AggregationOptions = {}): Promise<M | undefined> {
    return this.metric('avg', {}, options.params);
  }

  async max(options: AggregationOptions = {}): Promise<M | undefined> {
    return this.metric('max', {}, options.params);
  }

  async min(options: AggregationOptions = {}): Promise<M | undefined> {
    return this.metric('min', {}, options.params);
  }

  /**
   * Percentiles over `[1, 5, 25, 50, 75, 95, 99]`. Extreme percentiles are
   * more accurate than the median; small data sets can be exact.
   */
  async percentiles(options: PrecisionOptions = {}): Promise<Percentile[]> {
    const { missing, precision = 100, params } = options;
    const raw = await this.aggregate(
      'percentiles',
      { keyed: false, tdigest: { compression: precision }, missing },
      params,
    );
    return parseResponse(percentilesAggregationSchema, raw, 'percentiles aggregation').values;
  }

  /**
   * `count`, `min`, `max`, `avg` and `sum`; with `extended` also
   * `sum_of_squares`, `variance`, `std_deviation` and `std_deviation_bounds`.
   */
  async describe(options: DescribeOptions = {}): Promise<Stats> {
    const { extended = false, missing, params } = options;
    const key = extended ? 'extended_stats' : 'stats';
    const raw = await this.aggregate(key, { missing }, params);
    return parseResponse(statsAggregationSchema, raw, `${key} aggregation`);
  }

  protected abstract fromMetric(value: number | null): M | undefined;

  protected async metric(
    key: string,
    settings: Record<string, QueryValue | undefined>,
    params?: RequestParams,
  ): Promise<M | undefined> {
    const raw = await this.aggregate(key, settings, params);
    return this.fromMetric(parseResponse(valueAggregationSchema, raw, `${key} aggregation`).value);
  }
}

// ─── Dtypes ──────────────────────────────────────────────────────────

export abstract class NumericField extends MetricField<number> {
  /** Percentage of observed values below each of `values`. */
  async percentileRanks(values: number[], options: PrecisionOptions = {}): Promise<Percentile[]> {
    const { missing, precision = 100, params } = options;
    const raw = await this.aggregate(
      'percentile_ranks',
      { keyed: false, values, tdigest: { compression: precision }, missing },
      params,
    );
    return parseResponse(percentilesAggregationSchema, raw, 'percentile_ranks aggregation').values;
  }

  async sum(options: MissingOptions = {}): Promise<number> {
    const { missing, params } = options;
    return (await this.metric('sum', { missing }, params)) ?? 0;
  }

  /** Approximate median absolute deviation, a variability measure that tolerates outliers. */
  async medianAbsoluteDeviation(options: PrecisionOptions = {}): Promise<number | undefined> {
    const { missing, precision = 1000, params } = options;
    return this.metric('median_absolute_deviation', { compression: precision, missing }, params);
  }

  /** Counts bucketed by `interval`, keyed `[start, end)`. */
  async histogram(options: HistogramOptions = {}): Promise<HistogramBin[]> {
    const { interval = 50, minDocCount = 1, missing, params } = options;
    const raw = await this.aggregate(
      'histogram',
      { interval, min_doc_count: minDocCount, missing },
      params,
    );
    const result = parseResponse(histogramAggregationSchema, raw, 'histogram aggregation');
    return result.buckets.map((bucket) => [`[${bucket.key}, ${bucket.key + interval})`, bucket.doc_count]);
  }

  protected fromMetric(value: number | null): number | undefined {
    return value ?? undefined;
  }
}

export class IntegerField extends NumericField {
  readonly dtype = 'integer';
}

export class FloatField extends NumericField {
  readonly dtype = 'float';
}

export class DecimalField extends NumericField {
  readonly dtype = 'decimal';
}

export class BooleanField extends Field {
  readonly dtype = 'boolean';

  /** Boolean terms come back keyed `1`/`0` with `key_as_string` set. */
  protected bucketKey(bucket: TermsBucket): BucketKey {
    return bucket.key_as_string === undefined ? bucket.key : bucket.key_as_string === 'true';
  }
}

export class StringField extends Field {
  readonly dtype = 'string';

  /** Term occurs in an analyzed field. */
  match(term: TermValue): Query {
    return this.condition(new Match(this.name, term));
  }

  regexp(pattern: string): Query {
    return this.condition(new Regexp(this.name, pattern));
  }

  /** Slow on large indices; prefer `match` on analyzed fields. */
  contains(value: string): Query {
    return this.condition(new Wildcard(this.name, `*${value}*`));
  }

  startsWith(value: string): Query {
    return this.condition(new Prefix(this.name, value));
  }

  /** Slow on large indices; prefer `match` on analyzed fields. */
  endsWith(value: string): Query {
    return this.condition(new Wildcard(this.name, `*${value}`));
  }
}

function daysAgo(days: number): Date {
  return new Date(Date.now() - days * DAY_MS);
}

/**
 * A date field compared by age in days. Older means earlier, so every
 * comparison flips: `age.ge(10)` matches dates on or before ten days ago.
 */
export class AgeField extends RangeField {
  readonly dtype = 'date';

  eq(days: number): Query {
    return super.eq(daysAgo(days));
  }

  ne(days: number): Query {
    return super.ne(daysAgo(days));
  }

  lt(days: number): Query {
    return super.gt(daysAgo(days));
  }

  le(days: number): Query {
    return super.ge(daysAgo(days));
  }

  gt(days: number): Query {
    return super.lt(daysAgo(days));
  }

  ge(days: number): Query {
    return super.le(daysAgo(days));
  }
}

export class DateField extends MetricField<Date> {
  readonly dtype = 'date';

  /**
   * Conditions on this field treating the compared value as days before
   * now. Keeps the handle's inversion.
   */
  get age(): AgeField {
    return cloneWith(new AgeField(this.key, this.name, this.host), { inverted: this.inverted });
  }

  /** Counts per calendar interval, keyed by the bucket's formatted date. */
  async histogram(options: DateHistogramOptions = {}): Promise<HistogramBin[]> {
    const { interval = 'month', minDocCount = 1, missing, params } = options;
    const raw = await this.aggregate(
      'date_histogram',
      { calendar_interval: interval, min_doc_count: minDocCount, missing },
      params,
    );
    const result = parseResponse(histogramAggregationSchema, raw, 'date_histogram aggregation');
    return result.buckets.map((bucket) => [
      bucket.key_as_string ?? new Date(bucket.key).toISOString(),
      bucket.doc_count,
    ]);
  }

  /** Metrics on dates come back as epoch milliseconds. */
  protected fromMetric(value: number | null): Date | undefined {
    return value === null ? undefined : new Date(value);
  }
}

/** Placeholder for mapping types without dedicated support. */
export class DummyField extends Field {
  readonly dtype = 'dummy';
}

// ─── Factory ─────────────────────────────────────────────────────────

export function createHandle(node: SchemaNode, name: string, host: FieldHost): Namespace | Field {
  if (node.kind === 'namespace') return new Namespace(node.key, name, host, node);
  return createField(node, name, host);
}

function createField(node: FieldNode, name: string, host: FieldHost): Field {
  switch (node.dtype) {
    case 'integer':
      return new IntegerField(node.key, name, host);
    case 'float':
      return new FloatField(node.key, name, host);
    case 'decimal':
      return new DecimalField(node.key, name, host);
    case 'boolean':
      return new BooleanField(node.key, name, host);
    case 'string':
      return new StringField(node.key, name, host);
    case 'date':
      return new DateField(node.key, name, host);
    case 'dummy':
      return new DummyField(node.key, name, host);
  }
}
