/**
 * @sift/search — Response validation
 *
 * Zod schemas for what the cluster sends back. Everything coming off the
 * wire goes through `parseResponse` before the frame or fields read it.
 */

import { z } from 'zod';
import { UnexpectedResponseError } from './errors.js';

export function parseResponse<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new UnexpectedResponseError(
      what,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

// ─── Search ──────────────────────────────────────────────────────────

export const hitSchema = z.object({
  _id: z.string(),
  _index: z.string().optional(),
  _score: z.number().nullable().optional(),
  _source: z.record(z.unknown()).default({}),
});

export const searchResponseSchema = z.object({
  _scroll_id: z.string().optional(),
  hits: z.object({
    total: z
      .union([z.number(), z.object({ value: z.number() })])
      .optional()
      .transform((total) => (typeof total === 'object' ? total.value : total)),
    hits: z.array(hitSchema),
  }),
  aggregations: z.record(z.unknown()).optional(),
});

export const countResponseSchema = z.object({ count: z.number() });

export const indicesResponseSchema = z.record(z.unknown());

// ─── Aggregations ────────────────────────────────────────────────────

export const valueAggregationSchema = z.object({ value: z.number().nullable() });

const bucketKeySchema = z.union([z.string(), z.number(), z.boolean()]);

export const termsAggregationSchema = z.object({
  buckets: z.array(z.object({ key: bucketKeySchema, key_as_string: z.string().optional(), doc_count: z.number() })),
  sum_other_doc_count: z.number().default(0),
  doc_count_error_upper_bound: z.number().default(0),
});

export const percentileSchema = z.object({
  key: z.number(),
  value: z.number().nullable(),
  value_as_string: z.string().optional(),
});

export const percentilesAggregationSchema = z.object({ values: z.array(percentileSchema) });

export const statsAggregationSchema = z
  .object({
    count: z.number(),
    min: z.number().nullable(),
    max: z.number().nullable(),
    avg: z.number().nullable(),
    sum: z.number(),
  })
  .passthrough();

export const histogramAggregationSchema = z.object({
  buckets: z.array(
    z.object({
      key: z.number(),
      key_as_string: z.string().optional(),
      doc_count: z.number(),
    }),
  ),
});

export type BucketKey = z.infer<typeof bucketKeySchema>;
export type TermsBucket = z.infer<typeof termsAggregationSchema>['buckets'][number];
export type Percentile = z.infer<typeof percentileSchema>;
export type Stats = z.infer<typeof statsAggregationSchema>;
