/**
 * Mesh Client: Query Construction
 *
 * Queries are validated once on construction and frozen. Their canonical
 * text is both the staging request body and the cache key material.
 */

import { z } from 'zod';
import type { Feature } from 'geojson';
import { canonicalJson } from './canonical';
import { sha224Hex } from './hash';
import type { Query } from './types';

const timeValue = z.union([z.string(), z.date(), z.null()]).transform((v) => (v instanceof Date ? v.toISOString() : v));

const featureSchema = z.custom<Feature>(
    (v) => typeof v === 'object' && v !== null && 'type' in v && v.type === 'Feature' && 'geometry' in v,
    { message: 'Expected a GeoJSON Feature' }
);

const querySchema = z.object({
    datasource: z.string().min(1),
    parameters: z.record(z.unknown()).default({}),
    description: z.string().optional(),
    variables: z.array(z.string()).optional(),
    timefilter: z
        .object({
            type: z.literal('range').default('range'),
            times: z.tuple([timeValue, timeValue]),
            resolution: z.string().optional(),
            resample: z.enum(['mean', 'nearest', 'slinear']).optional(),
        })
        .optional(),
    geofilter: z
        .discriminatedUnion('type', [
            z.object({
                type: z.literal('bbox'),
                geom: z.tuple([z.number(), z.number(), z.number(), z.number()]),
                resolution: z.number().optional(),
            }),
            z.object({
                type: z.literal('radius'),
                geom: z.tuple([z.number(), z.number(), z.number().positive()]),
                resolution: z.number().optional(),
            }),
            z.object({
                type: z.literal('feature'),
                geom: featureSchema,
                resolution: z.number().optional(),
            }),
        ])
        .optional(),
    coordfilter: z
        .array(z.object({ coord: z.string(), values: z.array(z.union([z.string(), z.number()])) }))
        .optional(),
    aggregate: z
        .object({
            operations: z.array(z.enum(['mean', 'min', 'max', 'std', 'sum'])).default(['mean']),
            spatial: z.boolean().optional(),
            temporal: z.boolean().optional(),
        })
        .optional(),
    crs: z.union([z.string(), z.number().int()]).optional(),
    request: z.enum(['data', 'schema', 'coords']).default('data'),
});

export type QueryInput = z.input<typeof querySchema>;

/**
 * Validate and freeze a query. Dates become ISO strings.
 */
export function createQuery(input: QueryInput): Query {
    const parsed = querySchema.safeParse(input);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Invalid query: ${issue ? `${issue.path.join('.')} ${issue.message}` : parsed.error.message}`);
    }
    return deepFreeze(parsed.data);
}

/**
 * Canonical text of a query: sorted keys, no whitespace, unset fields omitted.
 */
export function serializeQuery(query: Query): string {
    return canonicalJson(query);
}

/** SHA-224 of the canonical query text. */
export function queryHash(query: Query): string {
    return sha224Hex(serializeQuery(query));
}

function deepFreeze<T>(value: T): T {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) deepFreeze(child);
    }
    return value;
}
