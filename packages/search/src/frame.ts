/**
 * @sift/search — DataFrame
 *
 * An immutable, lazily compiled search over one index. Conditions are
 * accumulated with `where` / `filter` / `and` / `or` / `not` and only
 * sent to the cluster when rows, counts or aggregations are requested.
 *
 * ```ts
 * const visits = await DataFrame.fromIndex('site-visits');
 * const os = visits.text('device.os');
 * const frame = visits.where(os.eq('mac').or(os.eq('linux')));
 * const rows = await frame.take(20, ['device.os', 'stats.visits']);
 * ```
 */

import { createLogger, settings } from '@sift/config';
import { createSearchExecutor } from './client-factory.js';
import { BadOperatorError, FieldTypeError, MissingQueryError, UnknownFieldError } from './errors.js';
import {
  BooleanField,
  DateField,
  Field,
  Namespace,
  NumericField,
  StringField,
  type FieldHost,
} from './fields.js';
import { Bool, Query, Script } from './queries.js';
import { hitToRow, toRecordTable, type RecordTable, type Row } from './rows.js';
import { dtypes, schemaFromMappingResponse, type DtypeTree, type IndexSchema } from './schema.js';
import type {
  ExecuteOptions,
  RequestParams,
  SearchBody,
  SearchExecutor,
  SearchHit,
  SearchLogger,
  SearchResponse,
  Source,
} from './types.js';

const defaultLogger = createLogger('sift:frame');

// ─── Options ─────────────────────────────────────────────────────────

export interface FrameOptions {
  executor: SearchExecutor;
  logger?: SearchLogger;
  /** Conditions the frame starts with */
  query?: Query;
  limit?: number;
}

export interface OpenOptions {
  /** Defaults to an Elasticsearch executor built from the global settings */
  executor?: SearchExecutor;
  logger?: SearchLogger;
}

export interface ScanOptions {
  fields?: string[];
  preserveOrder?: boolean;
  params?: RequestParams;
}

export interface CollectOptions extends ScanOptions {
  /** Overrides the frame limit for this call */
  limit?: number;
  includeScore?: boolean;
  includeId?: boolean;
}

/** Throws `BadOperatorError` unless the value is a query condition. */
export function assertQuery(value: unknown): asserts value is Query {
  if (!(value instanceof Query)) throw new BadOperatorError(value);
}

// ─── Frame ───────────────────────────────────────────────────────────

export class DataFrame implements FieldHost {
  readonly logger: SearchLogger;
  private readonly root: Namespace;

  constructor(
    readonly index: string,
    readonly schema: IndexSchema,
    private readonly options: FrameOptions,
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.root = new Namespace('', '', this, schema);
  }

  /** Open a frame over an index, reading its mapping from the cluster. */
  static async fromIndex(index: string, options: OpenOptions = {}): Promise<DataFrame> {
    const executor = options.executor ?? createSearchExecutor(settings.snapshot());
    const mapping = await executor.getMapping(index);
    const schema = schemaFromMappingResponse(index, mapping);
    return new DataFrame(index, schema, { executor, logger: options.logger });
  }

  get query(): Query | undefined {
    return this.options.query;
  }

  get limitValue(): number | undefined {
    return this.options.limit;
  }

  /** Request body for the current conditions; matches everything without any. */
  get body(): SearchBody {
    if (!this.query) return { query: { match_all: {} } };
    return { query: this.query.compile() };
  }

  // ─── Fields ──────────────────────────────────────────────────────

  /** Names of the top-level scalar fields. */
  get fields(): string[] {
    return this.root.fields;
  }

  get namespaces(): string[] {
    return this.root.namespaces;
  }

  get dtypes(): DtypeTree {
    return dtypes(this.schema);
  }

  namespace(path: string): Namespace {
    const handle = this.resolve(path);
    if (handle instanceof Namespace) return handle;
    throw new FieldTypeError(path, 'namespace', handle.dtype);
  }

  field(path: string): Field {
    const handle = this.resolve(path);
    if (handle instanceof Field) return handle;
    throw new FieldTypeError(path, 'field', 'namespace');
  }

  numeric(path: string): NumericField {
    const field = this.field(path);
    if (field instanceof NumericField) return field;
    throw new FieldTypeError(path, 'numeric', field.dtype);
  }

  text(path: string): StringField {
    const field = this.field(path);
    if (field instanceof StringField) return field;
    throw new FieldTypeError(path, 'string', field.dtype);
  }

  boolean(path: string): BooleanField {
    const field = this.field(path);
    if (field instanceof BooleanField) return field;
    throw new FieldTypeError(path, 'boolean', field.dtype);
  }

  date(path: string): DateField {
    const field = this.field(path);
    if (field instanceof DateField) return field;
    throw new FieldTypeError(path, 'date', field.dtype);
  }

  // ─── Conditions ──────────────────────────────────────────────────

  /** Frame matching the current conditions and `condition`. */
  where(condition: Query): DataFrame {
    assertQuery(condition);
    return this.withQuery(this.query ? this.query.and(condition) : condition);
  }

  /**
   * Add conditions that have to match but do not contribute to the score.
   * Current conditions keep scoring.
   */
  filter(...conditions: Query[]): DataFrame {
    for (const condition of conditions) assertQuery(condition);
    if (conditions.length === 0) return this;
    const clause = new Bool({ filter: conditions });
    if (!this.query) return this.withQuery(clause);
    return this.withQuery(this.scoringBool(this.query).add(clause));
  }

  and(other: DataFrame): DataFrame {
    if (!this.query) return this.withQuery(other.query);
    return this.withQuery(this.query.and(other.query));
  }

  or(other: DataFrame): DataFrame {
    if (!this.query) return this.withQuery(other.query);
    return this.withQuery(this.query.or(other.query));
  }

  not(): DataFrame {
    if (!this.query) throw new MissingQueryError();
    return this.withQuery(this.query.not());
  }

  /** Filter with a painless script, e.g. `doc['stats.visits'].value > 5`. */
  script(source: string): DataFrame {
    return this.where(new Script(source));
  }

  limit(n: number): DataFrame {
    return new DataFrame(this.index, this.schema, { ...this.options, limit: n });
  }

  // ─── Execution ───────────────────────────────────────────────────

  execute(body: SearchBody, options: ExecuteOptions): Promise<SearchResponse> {
    const { size, fields, params } = options;
    return this.options.executor.search(this.index, body, { size, source: fields, params });
  }

  /** Every hit for `body`, paged through a scroll. */
  scan(body: SearchBody, options: ScanOptions = {}): AsyncIterable<SearchHit> {
    const { fields, preserveOrder, params } = options;
    return this.options.executor.scroll(this.index, body, { source: fields, preserveOrder, params });
  }

  /**
   * Rows matching the current conditions. With a limit (from the call or
   * the frame) a single search is made; without one every match is
   * scrolled through.
   */
  async *collect(options: CollectOptions = {}): AsyncGenerator<Row> {
    const { fields, preserveOrder = false, includeScore = false, includeId = false, params } = options;
    const size = options.limit ?? this.limitValue;
    const body: SearchBody = { ...this.body, track_scores: includeScore };
    const rowOptions = { includeScore, includeId };

    if (size === undefined) {
      for await (const hit of this.scan(body, { fields, preserveOrder, params })) {
        yield hitToRow(hit, rowOptions);
      }
      return;
    }
    const response = await this.execute(body, { size, fields, params });
    for (const hit of response.hits.hits) {
      yield hitToRow(hit, rowOptions);
    }
  }

  /** First `n` rows; the frame's own limit is left as it is. */
  async take(n: number, fields?: string[]): Promise<Row[]> {
    const rows: Row[] = [];
    for await (const row of this.collect({ limit: n, fields })) rows.push(row);
    return rows;
  }

  count(): Promise<number> {
    return this.options.executor.count(this.index, this.body);
  }

  get(id: string, fields?: string[]): Promise<Source> {
    return this.options.executor.get(this.index, id, fields);
  }

  /** All matching rows flattened to dot-notation columns. */
  async toRecords(fields?: string[]): Promise<RecordTable> {
    const rows: Row[] = [];
    for await (const row of this.collect({ fields })) rows.push(row);
    return toRecordTable(rows);
  }

  listIndices(): Promise<string[]> {
    return this.options.executor.listIndices();
  }

  toString(): string {
    return `DataFrame(${this.index})`;
  }

  // ─── Internals ───────────────────────────────────────────────────

  private withQuery(query: Query | undefined): DataFrame {
    return new DataFrame(this.index, this.schema, { ...this.options, query });
  }

  /** The current conditions as a Bool that a filter clause can be merged into. */
  private scoringBool(query: Query): Bool {
    if (query instanceof Bool && query.should.length === 0 && query.boostValue === undefined) {
      return query;
    }
    return new Bool({ must: [query] });
  }

  private resolve(path: string): Namespace | Field {
    let handle: Namespace | Field = this.root;
    for (const key of path.split('.')) {
      const child: Namespace | Field | undefined = handle instanceof Namespace ? handle.get(key) : undefined;
      if (!child) throw new UnknownFieldError(path);
      handle = child;
    }
    return handle;
  }
}
