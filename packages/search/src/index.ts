/**
 * @sift/search — Lazy search frames
 *
 * Chainable conditions over the fields of an index, compiled to the
 * search DSL and run through a pluggable executor.
 */

// Frame
export {
  DataFrame,
  assertQuery,
  type FrameOptions,
  type OpenOptions,
  type ScanOptions,
  type CollectOptions,
} from './frame.js';

// Queries
export {
  boost,
  Query,
  Term,
  Terms,
  Regexp,
  Wildcard,
  Prefix,
  Match,
  Exists,
  Range,
  Script,
  Bool,
  type BoolClause,
  type BoolParams,
  type RangeOperator,
  type RangeValue,
} from './queries.js';

// Fields
export {
  Namespace,
  Field,
  RangeField,
  MetricField,
  NumericField,
  IntegerField,
  FloatField,
  DecimalField,
  BooleanField,
  StringField,
  DateField,
  AgeField,
  DummyField,
  type FieldHost,
  type ValueCount,
  type HistogramBin,
  type ValueCountsOptions,
  type PrecisionOptions,
  type DescribeOptions,
  type HistogramOptions,
  type DateHistogramOptions,
} from './fields.js';

// Schema
export {
  parseMapping,
  schemaFromMappingResponse,
  resolvePath,
  dtypes,
  dtypeOf,
  type FieldType,
  type IndexSchema,
  type SchemaNode,
  type DtypeTree,
} from './schema.js';

// Executors
export { ElasticsearchExecutor, type ElasticsearchExecutorConfig } from './elasticsearch-client.js';
export { createSearchExecutor, toNodeUrl } from './client-factory.js';

// Rows
export { hitToRow, hitsToRows, flattenRow, toRecordTable, type Row, type RecordTable } from './rows.js';

// Errors
export {
  SiftError,
  BadOperatorError,
  FieldConflictError,
  MissingMappingError,
  MissingQueryError,
  InvalidQueryError,
  UnknownFieldError,
  FieldTypeError,
  UnexpectedResponseError,
} from './errors.js';

// Types
export type { BucketKey, Percentile, Stats } from './responses.js';
export type {
  SearchExecutor,
  SearchBody,
  SearchHit,
  SearchResponse,
  SearchOptions,
  ScrollOptions,
  ExecuteOptions,
  QueryDocument,
  TermValue,
  Source,
  RequestParams,
} from './types.js';
