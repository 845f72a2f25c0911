/**
 * Mesh Client: Geometry Codecs
 *
 * Well-known binary for geo-table columns, well-known text for catalog
 * search filters. 2-D geometries only.
 */

import type { Geometry, Polygon, Position } from 'geojson';

const WKB_TYPES = {
    Point: 1,
    LineString: 2,
    Polygon: 3,
    MultiPoint: 4,
    MultiLineString: 5,
    MultiPolygon: 6,
    GeometryCollection: 7,
} as const;

// =============================================================================
// WKB
// =============================================================================

class ByteWriter {
    private chunks: Uint8Array[] = [];

    u8(value: number): void {
        this.chunks.push(Uint8Array.of(value));
    }

    u32(value: number): void {
        const buf = new Uint8Array(4);
        new DataView(buf.buffer).setUint32(0, value, true);
        this.chunks.push(buf);
    }

    f64(value: number): void {
        const buf = new Uint8Array(8);
        new DataView(buf.buffer).setFloat64(0, value, true);
        this.chunks.push(buf);
    }

    bytes(): Uint8Array {
        const total = this.chunks.reduce((n, c) => n + c.length, 0);
        const out = new Uint8Array(total);
        let offset = 0;
        for (const c of this.chunks) {
            out.set(c, offset);
            offset += c.length;
        }
        return out;
    }
}

function writePosition(w: ByteWriter, p: Position): void {
    w.f64(p[0]);
    w.f64(p[1]);
}

function writeRing(w: ByteWriter, ring: Position[]): void {
    w.u32(ring.length);
    ring.forEach((p) => writePosition(w, p));
}

function writeGeometry(w: ByteWriter, g: Geometry): void {
    w.u8(1); // little endian
    w.u32(WKB_TYPES[g.type]);
    switch (g.type) {
        case 'Point':
            writePosition(w, g.coordinates);
            break;
        case 'LineString':
            writeRing(w, g.coordinates);
            break;
        case 'Polygon':
            w.u32(g.coordinates.length);
            g.coordinates.forEach((ring) => writeRing(w, ring));
            break;
        case 'MultiPoint':
            w.u32(g.coordinates.length);
            g.coordinates.forEach((p) => writeGeometry(w, { type: 'Point', coordinates: p }));
            break;
        case 'MultiLineString':
            w.u32(g.coordinates.length);
            g.coordinates.forEach((l) => writeGeometry(w, { type: 'LineString', coordinates: l }));
            break;
        case 'MultiPolygon':
            w.u32(g.coordinates.length);
            g.coordinates.forEach((p) => writeGeometry(w, { type: 'Polygon', coordinates: p }));
            break;
        case 'GeometryCollection':
            w.u32(g.geometries.length);
            g.geometries.forEach((child) => writeGeometry(w, child));
            break;
    }
}

export function encodeWkb(geometry: Geometry): Uint8Array {
    const w = new ByteWriter();
    writeGeometry(w, geometry);
    return w.bytes();
}

class ByteReader {
    private offset = 0;
    private readonly view: DataView;
    littleEndian = true;

    constructor(bytes: Uint8Array) {
        this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }

    u8(): number {
        return this.view.getUint8(this.offset++);
    }

    u32(): number {
        const v = this.view.getUint32(this.offset, this.littleEndian);
        this.offset += 4;
        return v;
    }

    f64(): number {
        const v = this.view.getFloat64(this.offset, this.littleEndian);
        this.offset += 8;
        return v;
    }
}

function readPosition(r: ByteReader): Position {
    return [r.f64(), r.f64()];
}

function readRing(r: ByteReader): Position[] {
    const n = r.u32();
    const ring: Position[] = [];
    for (let i = 0; i < n; i++) ring.push(readPosition(r));
    return ring;
}

function readMany<T>(r: ByteReader, read: () => T): T[] {
    const n = r.u32();
    const out: T[] = [];
    for (let i = 0; i < n; i++) out.push(read());
    return out;
}

function readGeometry(r: ByteReader): Geometry {
    r.littleEndian = r.u8() === 1;
    const type = r.u32();
    switch (type) {
        case WKB_TYPES.Point:
            return { type: 'Point', coordinates: readPosition(r) };
        case WKB_TYPES.LineString:
            return { type: 'LineString', coordinates: readRing(r) };
        case WKB_TYPES.Polygon:
            return { type: 'Polygon', coordinates: readMany(r, () => readRing(r)) };
        case WKB_TYPES.MultiPoint:
            return { type: 'MultiPoint', coordinates: readMany(r, () => expectCoords(readGeometry(r), 'Point')) };
        case WKB_TYPES.MultiLineString:
            return {
                type: 'MultiLineString',
                coordinates: readMany(r, () => expectCoords(readGeometry(r), 'LineString')),
            };
        case WKB_TYPES.MultiPolygon:
            return { type: 'MultiPolygon', coordinates: readMany(r, () => expectCoords(readGeometry(r), 'Polygon')) };
        case WKB_TYPES.GeometryCollection:
            return { type: 'GeometryCollection', geometries: readMany(r, () => readGeometry(r)) };
        default:
            throw new Error(`Unsupported WKB geometry type ${type}`);
    }
}

type CoordsOf = {
    Point: Position;
    LineString: Position[];
    Polygon: Position[][];
};

function expectCoords<K extends keyof CoordsOf>(g: Geometry, type: K): CoordsOf[K];
function expectCoords(g: Geometry, type: keyof CoordsOf): Position | Position[] | Position[][] {
    if (g.type === type && (g.type === 'Point' || g.type === 'LineString' || g.type === 'Polygon')) {
        return g.coordinates;
    }
    throw new Error(`Expected ${type} inside multi-geometry, got ${g.type}`);
}

export function decodeWkb(bytes: Uint8Array): Geometry {
    return readGeometry(new ByteReader(bytes));
}

// =============================================================================
// WKT
// =============================================================================

function pos(p: Position): string {
    return `${p[0]} ${p[1]}`;
}

function ring(r: Position[]): string {
    return `(${r.map(pos).join(', ')})`;
}

function poly(p: Position[][]): string {
    return `(${p.map(ring).join(', ')})`;
}

export function toWkt(g: Geometry): string {
    switch (g.type) {
        case 'Point':
            return `POINT (${pos(g.coordinates)})`;
        case 'LineString':
            return `LINESTRING ${ring(g.coordinates)}`;
        case 'Polygon':
            return `POLYGON ${poly(g.coordinates)}`;
        case 'MultiPoint':
            return `MULTIPOINT (${g.coordinates.map((p) => `(${pos(p)})`).join(', ')})`;
        case 'MultiLineString':
            return `MULTILINESTRING (${g.coordinates.map(ring).join(', ')})`;
        case 'MultiPolygon':
            return `MULTIPOLYGON (${g.coordinates.map(poly).join(', ')})`;
        case 'GeometryCollection':
            return `GEOMETRYCOLLECTION (${g.geometries.map(toWkt).join(', ')})`;
    }
}

/** Closed rectangle polygon for a bounding box. */
export function bboxPolygon(xmin: number, ymin: number, xmax: number, ymax: number): Polygon {
    return {
        type: 'Polygon',
        coordinates: [[[xmin, ymin], [xmax, ymin], [xmax, ymax], [xmin, ymax], [xmin, ymin]]],
    };
}
