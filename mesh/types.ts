/**
 * Mesh Client: Type Definitions
 *
 * Plain immutable value objects exchanged between components.
 */

import type { Feature, Geometry, MultiPoint, Point, Polygon } from 'geojson';

// =============================================================================
// Query
// =============================================================================

export type TimeValue = string | null;

export interface TimeFilter {
    type: 'range';
    /** ISO timestamps or ISO-8601 durations relative to now (e.g. `-P1D`). */
    times: [TimeValue, TimeValue];
    resolution?: string;
    resample?: 'mean' | 'nearest' | 'slinear';
}

export type GeoFilter =
    | { type: 'bbox'; geom: [number, number, number, number]; resolution?: number }
    | { type: 'radius'; geom: [number, number, number]; resolution?: number }
    | { type: 'feature'; geom: Feature; resolution?: number };

export interface CoordSelector {
    coord: string;
    values: (string | number)[];
}

export interface Aggregate {
    operations: ('mean' | 'min' | 'max' | 'std' | 'sum')[];
    spatial?: boolean;
    temporal?: boolean;
}

export type RequestKind = 'data' | 'schema' | 'coords';

export interface Query {
    readonly datasource: string;
    readonly parameters: Readonly<Record<string, unknown>>;
    readonly description?: string;
    readonly variables?: string[];
    readonly timefilter?: TimeFilter;
    readonly geofilter?: GeoFilter;
    readonly coordfilter?: CoordSelector[];
    readonly aggregate?: Aggregate;
    readonly crs?: string | number;
    readonly request: RequestKind;
}

// =============================================================================
// Stage
// =============================================================================

export type ContainerKind = 'dataset' | 'geodataframe' | 'dataframe';

export interface Stage {
    readonly query: Query;
    readonly qhash: string;
    readonly formats: readonly string[];
    /** Staged payload size in bytes. */
    readonly size: number;
    /** Element or row count. */
    readonly dlen: number;
    readonly coords: Readonly<Record<string, string>>;
    readonly container: ContainerKind;
}

// =============================================================================
// Session
// =============================================================================

export interface SessionInfo {
    readonly id: string;
    readonly user: string;
    readonly creationTime: Date;
    readonly endTime: Date;
    readonly write: boolean;
    readonly allowMultiwrite: boolean;
    readonly verified: boolean;
    /** Synthesised locally because the service has no session API. */
    readonly legacy: boolean;
}

// =============================================================================
// Datasource
// =============================================================================

/**
 * Coordinate roles:
 * t time, z vertical, x easting, y northing, e ensemble, s station,
 * g geometry, f frequency, d direction, b band, c category, q quantile,
 * n season, m month, i/j/k other.
 */
export type CoordRole =
    | 't' | 'z' | 'x' | 'y' | 'e' | 's' | 'g' | 'f' | 'd'
    | 'b' | 'c' | 'q' | 'n' | 'm' | 'i' | 'j' | 'k';

export const COORD_ROLES: readonly CoordRole[] = [
    't', 'z', 'x', 'y', 'e', 's', 'g', 'f', 'd', 'b', 'c', 'q', 'n', 'm', 'i', 'j', 'k',
];

export interface VariableSchema {
    dims: string[];
    attrs: Record<string, unknown>;
    shape?: number[];
    dtype?: string;
}

export interface DatasourceSchema {
    attrs: Record<string, unknown>;
    dims: Record<string, number>;
    coords: Record<string, VariableSchema>;
    data_vars: Record<string, VariableSchema>;
}

export type DatasourceGeometry = Point | MultiPoint | Polygon;

/** Listing entries are summaries; a single fetch returns the detailed form. */
export type DatasourcePhase = 'summary' | 'detailed';

export interface DatasourceSnapshot {
    readonly id: string;
    readonly name: string;
    readonly description: string | null;
    readonly parameters: Readonly<Record<string, unknown>>;
    readonly geom: DatasourceGeometry | null;
    readonly tstart: string | null;
    readonly tend: string | null;
    readonly pforecast: string | null;
    readonly parchive: string | null;
    readonly tags: readonly string[];
    readonly labels: readonly string[];
    readonly info: Readonly<Record<string, unknown>>;
    readonly schema: DatasourceSchema;
    readonly coordinates: Readonly<Partial<Record<CoordRole, string>>>;
    readonly details: string | null;
    readonly driver: string;
    readonly driverArgs: Readonly<Record<string, unknown>>;
    readonly created: string | null;
    readonly modified: string | null;
    readonly expires: string | null;
    readonly phase: DatasourcePhase;
}

/** Caller-supplied properties for a write or metadata update. */
export type DatasourceProperties = Partial<
    Omit<DatasourceSnapshot, 'id' | 'phase' | 'schema' | 'created' | 'modified'>
> & { schema?: DatasourceSchema };

// =============================================================================
// Containers
// =============================================================================

export interface Variable {
    readonly dims: readonly string[];
    readonly shape: readonly number[];
    readonly data: Float64Array;
    readonly attrs: Readonly<Record<string, unknown>>;
}

export interface ArrayDataset {
    readonly kind: 'dataset';
    readonly attrs: Readonly<Record<string, unknown>>;
    readonly coords: Readonly<Record<string, Variable>>;
    readonly dataVars: Readonly<Record<string, Variable>>;
}

export type CellValue = string | number | boolean | null;

export interface Table {
    readonly kind: 'dataframe';
    readonly columns: readonly string[];
    readonly rows: readonly Readonly<Record<string, CellValue>>[];
}

export interface GeoTable {
    readonly kind: 'geodataframe';
    readonly columns: readonly string[];
    readonly rows: readonly Readonly<Record<string, CellValue>>[];
    readonly geometryColumn: string;
    readonly geometries: readonly (Geometry | null)[];
    readonly crs: string | null;
}

export type Container = ArrayDataset | Table | GeoTable;
