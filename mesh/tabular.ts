/**
 * Mesh Client: Columnar Table Codec
 *
 * Tables travel and are cached as Parquet. Geo-tables are GeoParquet:
 * a WKB geometry column described by the `geo` file metadata entry.
 */

import { parquetMetadata, parquetReadObjects } from 'hyparquet';
import { parquetWriteBuffer } from 'hyparquet-writer';
import { z } from 'zod';
import type { Geometry } from 'geojson';
import { decodeWkb, encodeWkb } from './geometry';
import type { CellValue, GeoTable, Table } from './types';

const geoMetadataSchema = z.object({
    version: z.string().optional(),
    primary_column: z.string(),
    columns: z.record(
        z
            .object({
                encoding: z.string(),
                crs: z.unknown().optional(),
            })
            .passthrough()
    ),
});

export function createTable(rows: Record<string, CellValue>[], columns?: string[]): Table {
    return Object.freeze({
        kind: 'dataframe',
        columns: Object.freeze(columns ?? inferColumns(rows)),
        rows: Object.freeze(rows.map((r) => Object.freeze({ ...r }))),
    });
}

export function createGeoTable(
    rows: Record<string, CellValue>[],
    geometries: (Geometry | null)[],
    options: { columns?: string[]; geometryColumn?: string; crs?: string | null } = {}
): GeoTable {
    if (rows.length !== geometries.length) {
        throw new Error(`Geo-table has ${rows.length} rows but ${geometries.length} geometries`);
    }
    return Object.freeze({
        kind: 'geodataframe',
        columns: Object.freeze(options.columns ?? inferColumns(rows)),
        rows: Object.freeze(rows.map((r) => Object.freeze({ ...r }))),
        geometryColumn: options.geometryColumn ?? 'geometry',
        geometries: Object.freeze([...geometries]),
        crs: options.crs ?? null,
    });
}

function inferColumns(rows: Record<string, CellValue>[]): string[] {
    const seen = new Set<string>();
    for (const row of rows) for (const key of Object.keys(row)) seen.add(key);
    return [...seen];
}

// =============================================================================
// Encode
// =============================================================================

function crsToProjJson(crs: string | null): unknown {
    if (crs === null) return undefined;
    const m = /^EPSG:(\d+)$/i.exec(crs);
    if (m) return { id: { authority: 'EPSG', code: Number(m[1]) } };
    return crs;
}

function crsFromProjJson(value: unknown): string | null {
    if (typeof value === 'string') return value;
    if (value && typeof value === 'object' && 'id' in value) {
        const id = value.id;
        if (id && typeof id === 'object' && 'authority' in id && 'code' in id) {
            return `${String(id.authority)}:${String(id.code)}`;
        }
    }
    return null;
}

// The writer infers column types from the values; a column with none is
// written as optional strings.
function typed<T>(name: string, data: (T | null)[]) {
    return data.every((v) => v === null) ? { name, data, type: 'STRING' as const } : { name, data };
}

export function encodeTable(table: Table | GeoTable): Uint8Array {
    const columnData = table.columns.map((name) => typed(name, table.rows.map((row) => row[name] ?? null)));

    if (table.kind === 'dataframe') {
        return new Uint8Array(parquetWriteBuffer({ columnData }));
    }

    const geo = {
        version: '1.0.0',
        primary_column: table.geometryColumn,
        columns: {
            [table.geometryColumn]: {
                encoding: 'WKB',
                geometry_types: [],
                crs: crsToProjJson(table.crs),
            },
        },
    };
    return new Uint8Array(
        parquetWriteBuffer({
            columnData: [
                ...columnData,
                typed(table.geometryColumn, table.geometries.map((g) => (g ? encodeWkb(g) : null))),
            ],
            kvMetadata: [{ key: 'geo', value: JSON.stringify(geo) }],
        })
    );
}

// =============================================================================
// Decode
// =============================================================================

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);
    return buffer;
}

function toCell(value: unknown): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (typeof value === 'bigint') return Number(value);
    if (value instanceof Date) return value.toISOString();
    if (value instanceof Uint8Array) return new TextDecoder().decode(value);
    return JSON.stringify(value);
}

function toGeometry(value: unknown): Geometry | null {
    if (value === null || value === undefined) return null;
    if (value instanceof Uint8Array) return decodeWkb(value);
    throw new Error('Geometry column is not WKB encoded');
}

/**
 * Decode Parquet bytes; a `geo` metadata entry makes the result a GeoTable.
 */
export async function decodeTable(bytes: Uint8Array): Promise<Table | GeoTable> {
    const file = toArrayBuffer(bytes);
    const metadata = parquetMetadata(file);
    const columns = metadata.schema.slice(1).map((element) => element.name);
    const geoEntry = (metadata.key_value_metadata ?? []).find((kv) => kv.key === 'geo');
    const records = await parquetReadObjects({ file, utf8: false });

    if (!geoEntry || !geoEntry.value) {
        const rows = records.map((record) => Object.fromEntries(columns.map((c) => [c, toCell(record[c])])));
        return createTable(rows, columns);
    }

    const geo = geoMetadataSchema.parse(JSON.parse(geoEntry.value));
    const geometryColumn = geo.primary_column;
    const plain = columns.filter((c) => c !== geometryColumn);
    const rows = records.map((record) => Object.fromEntries(plain.map((c) => [c, toCell(record[c])])));
    const geometries = records.map((record) => toGeometry(record[geometryColumn]));
    const columnMeta = geo.columns[geometryColumn];
    return createGeoTable(rows, geometries, {
        columns: plain,
        geometryColumn,
        crs: columnMeta ? crsFromProjJson(columnMeta.crs) : null,
    });
}

export function tableLength(table: Table | GeoTable): number {
    return table.rows.length;
}
