/**
 * Mesh Client: Datasource Metadata
 *
 * Snapshots are immutable. Catalog listings produce `summary` snapshots,
 * single fetches produce `detailed` ones; updates return a new snapshot.
 */
/* eslint-disable no-console */

import { z } from 'zod';
import type { Geometry } from 'geojson';
import { datasetSchema, getVariable } from './dataset';
import { bboxPolygon } from './geometry';
import {
    COORD_ROLES,
    type Container,
    type CoordRole,
    type DatasourceGeometry,
    type DatasourcePhase,
    type DatasourceProperties,
    type DatasourceSchema,
    type DatasourceSnapshot,
    type GeoTable,
    type Table,
} from './types';

export const DATASOURCE_ID_PATTERN = /^[a-z0-9_-]*$/;

/** Coordinate role by the first three letters of a coordinate name. */
export const COORD_MAPPING: Readonly<Record<string, CoordRole>> = {
    lon: 'x',
    x: 'x',
    eas: 'x',
    lat: 'y',
    y: 'y',
    nor: 'y',
    dep: 'z',
    lev: 'z',
    z: 'z',
    ens: 'e',
    tim: 't',
    ban: 'b',
    mon: 'm',
    sta: 's',
    sit: 's',
    fre: 'f',
    dir: 'd',
    cat: 'c',
    sea: 'n',
    geo: 'g',
};

// =============================================================================
// Wire Format
// =============================================================================

const geometrySchema = z.custom<DatasourceGeometry>(
    (v) =>
        typeof v === 'object' &&
        v !== null &&
        'type' in v &&
        (v.type === 'Point' || v.type === 'MultiPoint' || v.type === 'Polygon') &&
        'coordinates' in v &&
        Array.isArray(v.coordinates),
    { message: 'Geometry must be Point, MultiPoint or Polygon' }
);

const variableSchema = z.object({
    dims: z.array(z.string()).default([]),
    attrs: z.record(z.unknown()).default({}),
    shape: z.array(z.number()).optional(),
    dtype: z.string().optional(),
});

const schemaSchema = z.object({
    attrs: z.record(z.unknown()).default({}),
    dims: z.record(z.number()).default({}),
    coords: z.record(variableSchema).default({}),
    data_vars: z.record(variableSchema).default({}),
});

const roleSchema = z.enum(['t', 'z', 'x', 'y', 'e', 's', 'g', 'f', 'd', 'b', 'c', 'q', 'n', 'm', 'i', 'j', 'k']);

const propertiesSchema = z.object({
    name: z.string().default(''),
    description: z.string().nullable().default(null),
    parameters: z.record(z.unknown()).nullable().default({}),
    tstart: z.string().nullable().default(null),
    tend: z.string().nullable().default(null),
    pforecast: z.string().nullable().default(null),
    parchive: z.string().nullable().default(null),
    tags: z.array(z.string()).nullable().default([]),
    labels: z.array(z.string()).nullable().default([]),
    info: z.record(z.unknown()).nullable().default({}),
    schema: schemaSchema.nullable().default({}),
    coordinates: z.record(roleSchema, z.string()).nullable().default({}),
    details: z.string().nullable().default(null),
    driver: z.string().default('_null'),
    args: z.record(z.unknown()).nullable().default({}),
    created: z.string().nullable().default(null),
    modified: z.string().nullable().default(null),
    expires: z.string().nullable().default(null),
});

const featureSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    geometry: geometrySchema.nullable().default(null),
    properties: propertiesSchema.default({}),
});

const featureCollectionSchema = z.object({
    features: z.array(featureSchema).default([]),
});

type FeatureWire = z.infer<typeof featureSchema>;

function emptySchema(): DatasourceSchema {
    return { attrs: {}, dims: {}, coords: {}, data_vars: {} };
}

function fromWire(feature: FeatureWire, phase: DatasourcePhase): DatasourceSnapshot {
    const p = feature.properties;
    return freezeSnapshot({
        id: feature.id,
        name: p.name,
        description: p.description,
        parameters: p.parameters ?? {},
        geom: feature.geometry,
        tstart: p.tstart,
        tend: p.tend,
        pforecast: p.pforecast,
        parchive: p.parchive,
        tags: p.tags ?? [],
        labels: p.labels ?? [],
        info: p.info ?? {},
        schema: p.schema ?? emptySchema(),
        coordinates: p.coordinates ?? {},
        details: p.details,
        driver: p.driver,
        driverArgs: p.args ?? {},
        created: p.created,
        modified: p.modified,
        expires: p.expires,
        phase,
    });
}

/** Single datasource response (GeoJSON Feature). */
export function parseDatasource(body: unknown, phase: DatasourcePhase = 'detailed'): DatasourceSnapshot {
    return fromWire(featureSchema.parse(body), phase);
}

/** Catalog response (GeoJSON FeatureCollection). */
export function parseCatalog(body: unknown): DatasourceSnapshot[] {
    return featureCollectionSchema.parse(body).features.map((f) => fromWire(f, 'summary'));
}

/** Flat metadata body for create (POST) and update (PATCH). */
export function datasourceToWire(ds: DatasourceSnapshot): Record<string, unknown> {
    return {
        id: ds.id,
        name: ds.name,
        description: ds.description,
        parameters: ds.parameters,
        geom: ds.geom,
        tstart: ds.tstart,
        tend: ds.tend,
        pforecast: ds.pforecast,
        parchive: ds.parchive,
        tags: ds.tags,
        labels: ds.labels,
        info: ds.info,
        schema: ds.schema,
        coordinates: ds.coordinates,
        details: ds.details,
        driver: ds.driver,
        args: ds.driverArgs,
        expires: ds.expires,
    };
}

// =============================================================================
// Construction & Updates
// =============================================================================

function freezeSnapshot(ds: DatasourceSnapshot): DatasourceSnapshot {
    return Object.freeze({ ...ds });
}

/** "my_wave-data" -> "My wave data" */
export function defaultName(id: string): string {
    const capitalized = id.charAt(0).toUpperCase() + id.slice(1).toLowerCase();
    return capitalized.replace(/[_-]/g, ' ');
}

export function newDatasource(id: string, props: DatasourceProperties = {}): DatasourceSnapshot {
    return freezeSnapshot({
        id,
        name: props.name ?? defaultName(id),
        description: props.description ?? '',
        parameters: props.parameters ?? {},
        geom: props.geom ?? null,
        tstart: props.tstart ?? null,
        tend: props.tend ?? null,
        pforecast: props.pforecast ?? null,
        parchive: props.parchive ?? null,
        tags: props.tags ?? [],
        labels: props.labels ?? [],
        info: props.info ?? {},
        schema: props.schema ?? emptySchema(),
        coordinates: props.coordinates ?? {},
        details: props.details ?? null,
        driver: props.driver ?? '_null',
        driverArgs: props.driverArgs ?? {},
        created: null,
        modified: null,
        expires: props.expires ?? null,
        phase: 'detailed',
    });
}

/** New snapshot with the given fields replaced. */
export function withProperties(
    ds: DatasourceSnapshot,
    props: Partial<Omit<DatasourceSnapshot, 'id'>>
): DatasourceSnapshot {
    const defined = Object.fromEntries(Object.entries(props).filter(([, v]) => v !== undefined));
    return freezeSnapshot({ ...ds, ...defined });
}

// =============================================================================
// Property Sniffing
// =============================================================================

function tableSchema(table: Table | GeoTable): DatasourceSchema {
    const dataVars: DatasourceSchema['data_vars'] = {};
    for (const c of table.columns) dataVars[c] = { dims: ['index'], attrs: {} };
    if (table.kind === 'geodataframe') dataVars[table.geometryColumn] = { dims: ['index'], attrs: {} };
    return { attrs: {}, dims: { index: table.rows.length }, coords: {}, data_vars: dataVars };
}

/** Schema summary of any container. */
export function containerSchema(data: Container): DatasourceSchema {
    return data.kind === 'dataset' ? datasetSchema(data) : tableSchema(data);
}

function candidateNames(data: Container): string[] {
    if (data.kind === 'dataset') return Object.keys(data.coords);
    return data.kind === 'geodataframe' ? [...data.columns, data.geometryColumn] : [...data.columns];
}

/** Guess coordinate roles from names. The first name for a role wins. */
export function guessCoordinates(names: readonly string[]): Partial<Record<CoordRole, string>> {
    const coords: Partial<Record<CoordRole, string>> = {};
    for (const name of names) {
        const role = COORD_MAPPING[name.slice(0, 3).toLowerCase()];
        if (role && !(role in coords)) coords[role] = name;
    }
    return coords;
}

function values(data: Container, name: string): (number | string)[] {
    if (data.kind === 'dataset') {
        const v = getVariable(data, name);
        return v ? Array.from(v.data).filter((x) => !Number.isNaN(x)) : [];
    }
    const out: (number | string)[] = [];
    for (const row of data.rows) {
        const cell = row[name];
        if (typeof cell === 'number' || typeof cell === 'string') out.push(cell);
    }
    return out;
}

function numericRange(list: (number | string)[]): [number, number] | null {
    const nums = list.filter((v): v is number => typeof v === 'number' && Number.isFinite(v));
    if (nums.length === 0) return null;
    return [Math.min(...nums), Math.max(...nums)];
}

const TIME_UNITS_MS: Record<string, number> = {
    milliseconds: 1,
    seconds: 1000,
    minutes: 60_000,
    hours: 3_600_000,
    days: 86_400_000,
};

/**
 * Decode a time value. Numbers follow CF `units` ("hours since 2000-01-01")
 * when given, otherwise they are epoch milliseconds.
 */
export function decodeTime(value: number | string, units?: unknown): Date | null {
    if (typeof value === 'string') {
        const d = new Date(value);
        return Number.isNaN(d.getTime()) ? null : d;
    }
    let ms = value;
    if (typeof units === 'string') {
        const m = /^(\w+)\s+since\s+(.+)$/.exec(units.trim());
        if (m && m[1] in TIME_UNITS_MS) {
            const epochText = m[2].includes('T') || m[2].endsWith('Z') ? m[2] : `${m[2].replace(' ', 'T')}Z`;
            const epoch = new Date(epochText).getTime();
            if (!Number.isNaN(epoch)) ms = epoch + value * TIME_UNITS_MS[m[1]];
        }
    }
    const d = new Date(ms);
    return Number.isNaN(d.getTime()) ? null : d;
}

function timeRange(data: Container, name: string): [string, string] | null {
    const units = data.kind === 'dataset' ? getVariable(data, name)?.attrs.units : undefined;
    const times = values(data, name)
        .map((v) => decodeTime(v, units))
        .filter((d): d is Date => d !== null)
        .map((d) => d.getTime());
    if (times.length === 0) return null;
    return [new Date(Math.min(...times)).toISOString(), new Date(Math.max(...times)).toISOString()];
}

function geometriesBbox(geometries: readonly (Geometry | null)[]): [number, number, number, number] | null {
    let box: [number, number, number, number] | null = null;
    const visit = (p: number[]) => {
        const [x, y] = p;
        box = box
            ? [Math.min(box[0], x), Math.min(box[1], y), Math.max(box[2], x), Math.max(box[3], y)]
            : [x, y, x, y];
    };
    const walk = (c: unknown) => {
        if (Array.isArray(c) && typeof c[0] === 'number') {
            visit(c.map(Number));
        } else if (Array.isArray(c)) {
            c.forEach(walk);
        }
    };
    for (const g of geometries) {
        if (!g) continue;
        if (g.type === 'GeometryCollection') g.geometries.forEach((child) => walk('coordinates' in child ? child.coordinates : []));
        else walk(g.coordinates);
    }
    return box;
}

function isDefaultGeometry(geom: DatasourceGeometry | null): boolean {
    return geom === null || (geom.type === 'Point' && geom.coordinates[0] === 0 && geom.coordinates[1] === 0);
}

/**
 * Fill in missing schema, coordinate mapping, geometry and time extent
 * from the data being written.
 */
export function guessProperties(
    ds: DatasourceSnapshot,
    data: Container,
    options: { append?: boolean } = {}
): DatasourceSnapshot {
    const updates: { -readonly [K in keyof Omit<DatasourceSnapshot, 'id'>]?: DatasourceSnapshot[K] } = {};

    const schema = Object.keys(ds.schema.dims).length === 0 ? containerSchema(data) : ds.schema;
    if (schema !== ds.schema) updates.schema = schema;

    const coordinates = Object.keys(ds.coordinates).length === 0 ? guessCoordinates(candidateNames(data)) : ds.coordinates;
    if (coordinates !== ds.coordinates) updates.coordinates = coordinates;

    if (isDefaultGeometry(ds.geom)) {
        const xName = coordinates.x;
        const yName = coordinates.y;
        const xr = xName ? numericRange(values(data, xName)) : null;
        const yr = yName ? numericRange(values(data, yName)) : null;
        if (xr && yr) {
            console.warn('[datasource] Setting geometry as a bbox from x and y coordinates');
            updates.geom = bboxPolygon(xr[0], yr[0], xr[1], yr[1]);
        } else if (data.kind === 'geodataframe') {
            const box = geometriesBbox(data.geometries);
            if (box) updates.geom = bboxPolygon(...box);
        }
    }

    const tName = coordinates.t;
    const tr = tName ? timeRange(data, tName) : null;
    if (!ds.tstart) {
        if (tr) {
            updates.tstart = tr[0];
        } else {
            console.warn('[datasource] Setting tstart to 1970-01-01T00:00:00Z');
            updates.tstart = '1970-01-01T00:00:00Z';
        }
    }
    if (!ds.tend && !ds.pforecast && !options.append) {
        if (tr) {
            updates.tend = tr[1];
        } else {
            console.warn('[datasource] Setting tend to current time');
            updates.tend = new Date().toISOString();
        }
    }

    return withProperties(ds, updates);
}

/** Coordinate mapping targets missing from the schema. */
export function checkCoordinates(ds: DatasourceSnapshot): string[] {
    const bad: string[] = [];
    for (const role of COORD_ROLES) {
        const name = ds.coordinates[role];
        if (name === undefined) continue;
        if (!(name in ds.schema.coords) && !(name in ds.schema.data_vars)) bad.push(name);
    }
    return bad;
}
