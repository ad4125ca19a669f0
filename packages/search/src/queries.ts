/**
 * @sift/search — Query objects
 *
 * Immutable representations of search-engine queries. Conditions are
 * combined with `and` / `or` / `not` and only turned into the wire
 * format when `compile()` is called.
 */

import { InvalidQueryError } from './errors.js';
import type { QueryDocument, QueryValue, TermValue } from './types.js';
import { cloneWith, formatParams, formatValue } from './utils.js';

/**
 * Boost the weight of a query by a value.
 *
 * Reads better than the method form when several boosted conditions are
 * combined:
 *
 * ```ts
 * frame.where(boost(visits.gt(5), 2).and(boost(rank.eq(6), 3)));
 * ```
 */
export function boost<Q extends Query>(query: Q, value: number): Q {
  return query.boost(value);
}

// ─── Base ────────────────────────────────────────────────────────────

export abstract class Query {
  /** Type of the query object in the search DSL, e.g. `term` */
  abstract readonly key: string;

  constructor(readonly boostValue?: number) {}

  and(other?: Query | null): Query {
    if (other == null) return this;
    if (other instanceof Bool) return new Bool({ must: [this] }).and(other);
    return new Bool({ must: [this, other] });
  }

  or(other?: Query | null): Query {
    if (other == null) return this;
    if (other instanceof Bool) return new Bool({ should: [this] }).or(other);
    return new Bool({ should: [this, other] });
  }

  not(): Query {
    return new Bool({ mustNot: [this] });
  }

  /** Copy of the query carrying a weight. A boost of 0 is still applied. */
  boost(value: number): this {
    return cloneWith(this, { boostValue: value });
  }

  /** Query body formatted for the search engine. */
  compile(): QueryDocument {
    if (this.boostValue !== undefined) return this.boostedQuery();
    return this.plainQuery();
  }

  toJSON(): QueryDocument {
    return this.compile();
  }

  protected abstract plainQuery(): QueryDocument;

  protected abstract boostedQuery(): QueryDocument;
}

abstract class FieldQuery<V extends QueryValue = TermValue> extends Query {
  constructor(
    readonly field: string,
    readonly value: V,
    boostValue?: number,
  ) {
    super(boostValue);
  }

  toString(): string {
    return `${this.constructor.name}(field=${this.field}, value=${formatValue(this.value)}, boost=${this.boostValue})`;
  }

  protected plainQuery(): QueryDocument {
    return { [this.key]: { [this.field]: this.value } };
  }

  protected boostedQuery(): QueryDocument {
    return { [this.key]: { [this.field]: { value: this.value, boost: this.boostValue } } };
  }
}

// ─── Leaf queries ────────────────────────────────────────────────────

/** Documents containing the exact term in the inverted index. The field is not analyzed. */
export class Term extends FieldQuery {
  readonly key = 'term';
}

/** Documents containing any of the provided terms. */
export class Terms extends FieldQuery<TermValue[]> {
  readonly key = 'terms';

  protected boostedQuery(): QueryDocument {
    return { [this.key]: { [this.field]: this.value, boost: this.boostValue } };
  }
}

export class Regexp extends FieldQuery<string> {
  readonly key = 'regexp';
}

/**
 * Documents whose field matches a wildcard expression: `*` for any
 * sequence, `?` for a single character. Slow when the pattern starts
 * with a wildcard.
 */
export class Wildcard extends FieldQuery<string> {
  readonly key = 'wildcard';
}

export class Prefix extends FieldQuery<string> {
  readonly key = 'prefix';
}

/** Full-text match. The provided text is analyzed before matching. */
export class Match extends FieldQuery {
  readonly key = 'match';

  protected boostedQuery(): QueryDocument {
    return { [this.key]: { [this.field]: { query: this.value, boost: this.boostValue } } };
  }
}

export class Exists extends Query {
  readonly key = 'exists';

  constructor(
    readonly field: string,
    boostValue?: number,
  ) {
    super(boostValue);
  }

  toString(): string {
    return `Exists(field=${this.field}, boost=${this.boostValue})`;
  }

  protected plainQuery(): QueryDocument {
    return { [this.key]: { field: this.field } };
  }

  protected boostedQuery(): QueryDocument {
    return { [this.key]: { field: this.field, boost: this.boostValue } };
  }
}

export type RangeOperator = 'gt' | 'gte' | 'lt' | 'lte';

export type RangeValue = number | string | Date;

export class Range extends Query {
  readonly key = 'range';

  constructor(
    readonly field: string,
    readonly operators: Readonly<Partial<Record<RangeOperator, RangeValue>>> = {},
    boostValue?: number,
  ) {
    super(boostValue);
  }

  greaterThan(value: RangeValue): Range {
    return this.withOperator('gt', value);
  }

  greaterThanOrEqual(value: RangeValue): Range {
    return this.withOperator('gte', value);
  }

  lessThan(value: RangeValue): Range {
    return this.withOperator('lt', value);
  }

  lessThanOrEqual(value: RangeValue): Range {
    return this.withOperator('lte', value);
  }

  toString(): string {
    const operators = formatParams(this.operators);
    return `Range(field=${this.field}, boost=${this.boostValue}${operators ? `, ${operators}` : ''})`;
  }

  protected plainQuery(): QueryDocument {
    return { [this.key]: { [this.field]: this.validOperators() } };
  }

  protected boostedQuery(): QueryDocument {
    return { [this.key]: { [this.field]: { ...this.validOperators(), boost: this.boostValue } } };
  }

  private withOperator(operator: RangeOperator, value: RangeValue): Range {
    const operators: Partial<Record<RangeOperator, RangeValue>> = { ...this.operators };
    operators[operator] = value;
    return new Range(this.field, operators, this.boostValue);
  }

  private validOperators(): Partial<Record<RangeOperator, RangeValue>> {
    if (Object.keys(this.operators).length === 0) {
      throw new InvalidQueryError('At least one range operation must be applied.');
    }
    return { ...this.operators };
  }
}

/** Painless script evaluated per document. */
export class Script extends Query {
  readonly key = 'script';

  constructor(
    readonly source: string,
    boostValue?: number,
  ) {
    super(boostValue);
  }

  toString(): string {
    return `Script(source='${this.source}', boost=${this.boostValue})`;
  }

  protected plainQuery(): QueryDocument {
    return { [this.key]: { script: { source: this.source, lang: 'painless' } } };
  }

  protected boostedQuery(): QueryDocument {
    return {
      [this.key]: { script: { source: this.source, lang: 'painless' }, boost: this.boostValue },
    };
  }
}

// ─── Bool ────────────────────────────────────────────────────────────

export type BoolClause = 'must' | 'filter' | 'should' | 'mustNot';

/** Clause order used when compiling and when exploding clauses. */
const CLAUSES: readonly BoolClause[] = ['must', 'filter', 'should', 'mustNot'];

const WIRE_NAMES: Readonly<Record<BoolClause, string>> = {
  must: 'must',
  filter: 'filter',
  should: 'should',
  mustNot: 'must_not',
};

export type BoolParams = Partial<Record<BoolClause, Query | readonly Query[]>>;

function toList(value: Query | readonly Query[] | undefined): readonly Query[] {
  if (value === undefined) return [];
  if (value instanceof Query) return [value];
  return [...value];
}

function negate(query: Query): Query {
  if (query instanceof Bool) return query.not();
  return new Bool({ mustNot: [query] });
}

/**
 * Boolean combination of other queries.
 *
 * - `must`: has to match and contributes to the score
 * - `filter`: has to match, scoring ignored
 * - `should`: without `must`/`filter` at least one has to match;
 *   otherwise only influences the score
 * - `mustNot`: must not match, scoring ignored
 */
export class Bool extends Query {
  readonly key = 'bool';
  readonly params: Readonly<Record<BoolClause, readonly Query[]>>;

  constructor(params: BoolParams, boostValue?: number) {
    super(boostValue);
    this.params = {
      must: toList(params.must),
      filter: toList(params.filter),
      should: toList(params.should),
      mustNot: toList(params.mustNot),
    };
    if (CLAUSES.every((clause) => this.params[clause].length === 0)) {
      throw new InvalidQueryError('At least one initialization parameter must be supplied.');
    }
  }

  get must(): readonly Query[] {
    return this.params.must;
  }

  get filter(): readonly Query[] {
    return this.params.filter;
  }

  get should(): readonly Query[] {
    return this.params.should;
  }

  get mustNot(): readonly Query[] {
    return this.params.mustNot;
  }

  /** Only the clauses populated with conditions. */
  get filteredParams(): Partial<Record<BoolClause, readonly Query[]>> {
    const populated: Partial<Record<BoolClause, readonly Query[]>> = {};
    for (const clause of this.populatedClauses()) {
      populated[clause] = this.params[clause];
    }
    return populated;
  }

  /** Clause-wise merge of two queries. A non-Bool counts as `must`. */
  add(other?: Query | null): Bool {
    if (other == null) return this;
    const right = other instanceof Bool ? other : new Bool({ must: [other] });
    const merged: Partial<Record<BoolClause, readonly Query[]>> = {};
    for (const clause of CLAUSES) {
      merged[clause] = [...this.params[clause], ...right.params[clause]];
    }
    return new Bool(merged);
  }

  and(other?: Query | null): Bool {
    if (other == null) return this;
    const right = other instanceof Bool ? other : new Bool({ must: [other] });
    return new Bool({ must: [...this.explode('must'), ...right.explode('must')] });
  }

  or(other?: Query | null): Bool {
    if (other == null) return this;
    const right = other instanceof Bool ? other : new Bool({ should: [other] });
    return new Bool({ should: [...this.explode('should'), ...right.explode('should')] });
  }

  /**
   * Split the query into conditions that can sit side by side in the
   * `destination` clause: its own conditions as they are, and every other
   * populated clause as a single-clause Bool. A boosted Bool stays whole.
   *
   * `Bool(must=[a], should=[b], mustNot=[c]).explode('should')`
   * gives `[b, Bool(must=[a]), Bool(mustNot=[c])]`.
   */
  explode(destination: BoolClause): Query[] {
    if (this.boostValue !== undefined) return [this];
    const exploded: Query[] = [...this.params[destination]];
    for (const clause of this.populatedClauses()) {
      if (clause === destination) continue;
      const single: BoolParams = {};
      single[clause] = this.params[clause];
      exploded.push(new Bool(single));
    }
    return exploded;
  }

  not(): Bool {
    return new Bool({
      must: [...this.should.map(negate), ...this.mustNot],
      should: [...this.must, ...this.filter].map(negate),
    });
  }

  toString(): string {
    const clauses: Record<string, readonly Query[]> = {};
    for (const clause of this.populatedClauses()) {
      clauses[clause] = this.params[clause];
    }
    return `Bool(boost=${this.boostValue}, ${formatParams(clauses)})`;
  }

  protected plainQuery(): QueryDocument {
    const single = this.singleCondition();
    if (single) return single.compile();
    return { [this.key]: this.compiledClauses() };
  }

  protected boostedQuery(): QueryDocument {
    const single = this.singleCondition();
    if (single && this.boostValue !== undefined) return single.boost(this.boostValue).compile();
    return { [this.key]: { ...this.compiledClauses(), boost: this.boostValue } };
  }

  /** The lone condition when `must` with one entry is the only clause. */
  private singleCondition(): Query | undefined {
    const populated = this.populatedClauses();
    if (populated.length === 1 && this.must.length === 1) return this.must[0];
    return undefined;
  }

  private populatedClauses(): BoolClause[] {
    return CLAUSES.filter((clause) => this.params[clause].length > 0);
  }

  private compiledClauses(): QueryDocument {
    const compiled: QueryDocument = {};
    for (const clause of this.populatedClauses()) {
      compiled[WIRE_NAMES[clause]] = this.params[clause].map((query) => query.compile());
    }
    return compiled;
  }
}
