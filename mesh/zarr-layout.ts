/**
 * Mesh Client: Chunked Array Layout
 *
 * Reads and writes datasets as a consolidated zarr v2 group over any
 * ChunkStore. Metadata documents are written here; chunk encoding and
 * region selection are left to zarrita.
 *
 * Layout:
 *   .zgroup, .zattrs, .zmetadata
 *   {var}/.zarray   dtype <f8, C order, no compressor
 *   {var}/.zattrs   _ARRAY_DIMENSIONS plus variable attrs
 *   {var}/{i.j...}  chunks
 */

import createDebug from 'debug';
import * as zarr from 'zarrita';
import { z } from 'zod';
import { ChunkNotFoundError, MeshConnectError, MeshWriteError } from './errors';
import type { ChunkStore } from './chunk-store';
import { allVariables, createDataset, product, type VariableInput } from './dataset';
import { ZarrStoreAdapter } from './zarr-store';
import type { ArrayDataset, DatasourceSchema, Variable, VariableSchema } from './types';

const debug = createDebug('mesh:zarr');

const DIMENSION_KEY = '_ARRAY_DIMENSIONS';

// =============================================================================
// Metadata Documents
// =============================================================================

const zarraySchema = z
    .object({
        zarr_format: z.literal(2),
        shape: z.array(z.number().int().nonnegative()),
        chunks: z.array(z.number().int().positive()),
        dtype: z.string(),
        compressor: z.unknown().nullable(),
        fill_value: z.unknown(),
        order: z.enum(['C', 'F']),
        filters: z.unknown().nullable(),
    })
    .passthrough();

const attrsSchema = z.record(z.unknown());

const consolidatedSchema = z.object({
    zarr_consolidated_format: z.literal(1),
    metadata: z.record(z.unknown()),
});

export type ZArray = z.infer<typeof zarraySchema>;

export interface ArrayLayout {
    zarray: ZArray;
    dims: string[];
    /** Attributes without the dimension key. */
    attrs: Record<string, unknown>;
}

export interface ZarrLayout {
    attrs: Record<string, unknown>;
    arrays: Record<string, ArrayLayout>;
}

function encodeJson(value: unknown): Uint8Array {
    return new TextEncoder().encode(JSON.stringify(value, null, 4));
}

function decodeJson(bytes: Uint8Array): unknown {
    return JSON.parse(new TextDecoder().decode(bytes));
}

async function getOptional(store: ChunkStore, key: string): Promise<Uint8Array | null> {
    try {
        return await store.get(key);
    } catch (err) {
        if (err instanceof ChunkNotFoundError) return null;
        throw err;
    }
}

function arrayLayout(name: string, zarray: unknown, zattrs: unknown): ArrayLayout {
    const parsed = zarraySchema.safeParse(zarray);
    if (!parsed.success) {
        throw new MeshConnectError(`Malformed .zarray for ${name}: ${parsed.error.message}`);
    }
    const attrs = attrsSchema.parse(zattrs ?? {});
    const rawDims = attrs[DIMENSION_KEY];
    const dims = Array.isArray(rawDims) ? rawDims.map(String) : parsed.data.shape.map((_, i) => `dim_${i}`);
    const rest = { ...attrs };
    delete rest[DIMENSION_KEY];
    return { zarray: parsed.data, dims, attrs: rest };
}

/**
 * Read group metadata, preferring the consolidated document and falling
 * back to per-array documents found through the store listing.
 */
export async function readLayout(store: ChunkStore): Promise<ZarrLayout> {
    const consolidated = await getOptional(store, '.zmetadata');
    if (consolidated) {
        const doc = consolidatedSchema.parse(decodeJson(consolidated));
        const arrays: Record<string, ArrayLayout> = {};
        for (const [key, value] of Object.entries(doc.metadata)) {
            if (!key.endsWith('/.zarray')) continue;
            const name = key.slice(0, -'/.zarray'.length);
            arrays[name] = arrayLayout(name, value, doc.metadata[`${name}/.zattrs`]);
        }
        return { attrs: attrsSchema.parse(doc.metadata['.zattrs'] ?? {}), arrays };
    }

    debug('no consolidated metadata, listing store');
    const arrays: Record<string, ArrayLayout> = {};
    for (const entry of await store.keys()) {
        const name = entry.replace(/\/+$/, '');
        if (!name || name.startsWith('.')) continue;
        const zarray = await getOptional(store, `${name}/.zarray`);
        if (!zarray) continue;
        const zattrs = await getOptional(store, `${name}/.zattrs`);
        arrays[name] = arrayLayout(name, decodeJson(zarray), zattrs ? decodeJson(zattrs) : {});
    }
    const rootAttrs = await getOptional(store, '.zattrs');
    return { attrs: rootAttrs ? attrsSchema.parse(decodeJson(rootAttrs)) : {}, arrays };
}

async function writeConsolidated(store: ChunkStore, layout: ZarrLayout): Promise<void> {
    const metadata: Record<string, unknown> = {
        '.zgroup': { zarr_format: 2 },
        '.zattrs': layout.attrs,
    };
    for (const [name, arr] of Object.entries(layout.arrays)) {
        metadata[`${name}/.zarray`] = arr.zarray;
        metadata[`${name}/.zattrs`] = { [DIMENSION_KEY]: arr.dims, ...arr.attrs };
    }
    await store.set('.zmetadata', encodeJson({ zarr_consolidated_format: 1, metadata }));
}

async function writeArrayMeta(store: ChunkStore, name: string, arr: ArrayLayout): Promise<void> {
    await store.set(`${name}/.zarray`, encodeJson(arr.zarray));
    await store.set(`${name}/.zattrs`, encodeJson({ [DIMENSION_KEY]: arr.dims, ...arr.attrs }));
}

// =============================================================================
// Dataset <-> Layout
// =============================================================================

function isDimensionCoord(name: string, v: { dims: readonly string[] }): boolean {
    return v.dims.length === 1 && v.dims[0] === name;
}

/**
 * Layout a dataset would be written with. Non-dimension coordinates are
 * recorded in a `coordinates` attribute so they read back as coordinates.
 */
export function layoutOf(ds: ArrayDataset): ZarrLayout {
    const auxCoords = Object.entries(ds.coords)
        .filter(([name, v]) => !isDimensionCoord(name, v))
        .map(([name]) => name);
    const arrays: Record<string, ArrayLayout> = {};
    for (const [name, v] of allVariables(ds)) {
        const attrs: Record<string, unknown> = { ...v.attrs };
        if (name in ds.dataVars && auxCoords.length > 0) attrs.coordinates = auxCoords.join(' ');
        arrays[name] = {
            zarray: {
                zarr_format: 2,
                shape: [...v.shape],
                chunks: v.shape.map((n) => Math.max(1, n)),
                dtype: '<f8',
                compressor: null,
                fill_value: 'NaN',
                order: 'C',
                filters: null,
            },
            dims: [...v.dims],
            attrs,
        };
    }
    const attrs: Record<string, unknown> = { ...ds.attrs };
    if (auxCoords.length > 0 && Object.keys(ds.dataVars).length === 0) attrs.coordinates = auxCoords.join(' ');
    return { attrs, arrays };
}

function coordinateNames(layout: ZarrLayout): Set<string> {
    const names = new Set<string>();
    const addListed = (attrs: Record<string, unknown>) => {
        if (typeof attrs.coordinates === 'string') {
            for (const c of attrs.coordinates.split(/\s+/)) if (c) names.add(c);
        }
    };
    addListed(layout.attrs);
    for (const [name, arr] of Object.entries(layout.arrays)) {
        if (isDimensionCoord(name, arr)) names.add(name);
        addListed(arr.attrs);
    }
    return names;
}

function stripCoordinates(attrs: Record<string, unknown>): Record<string, unknown> {
    const rest = { ...attrs };
    delete rest.coordinates;
    return rest;
}

function arraySchema(arr: ArrayLayout): VariableSchema {
    return { dims: [...arr.dims], attrs: stripCoordinates(arr.attrs), shape: [...arr.zarray.shape], dtype: arr.zarray.dtype };
}

/** Schema summary of a stored group. */
export function layoutSchema(layout: ZarrLayout): DatasourceSchema {
    const coords = coordinateNames(layout);
    const schema: DatasourceSchema = { attrs: stripCoordinates(layout.attrs), dims: {}, coords: {}, data_vars: {} };
    for (const [name, arr] of Object.entries(layout.arrays)) {
        arr.dims.forEach((dim, i) => {
            schema.dims[dim] = arr.zarray.shape[i];
        });
        if (coords.has(name)) schema.coords[name] = arraySchema(arr);
        else schema.data_vars[name] = arraySchema(arr);
    }
    return schema;
}

// =============================================================================
// Array Data (zarrita)
// =============================================================================

function toFloat64(data: unknown): Float64Array {
    if (data instanceof Float64Array) return data;
    if (
        data instanceof Float32Array ||
        data instanceof Int8Array ||
        data instanceof Uint8Array ||
        data instanceof Int16Array ||
        data instanceof Uint16Array ||
        data instanceof Int32Array ||
        data instanceof Uint32Array
    ) {
        return Float64Array.from(data);
    }
    if (data instanceof BigInt64Array || data instanceof BigUint64Array) {
        return Float64Array.from(data, (v) => Number(v));
    }
    throw new MeshConnectError('Unsupported array data type: only numeric arrays can be read');
}

function stridesOf(shape: readonly number[]): number[] {
    const strides = new Array<number>(shape.length);
    let acc = 1;
    for (let i = shape.length - 1; i >= 0; i--) {
        strides[i] = acc;
        acc *= shape[i];
    }
    return strides;
}

async function openArray(store: ChunkStore, name: string) {
    const root = zarr.root(new ZarrStoreAdapter(store));
    return zarr.open.v2(root.resolve(name), { kind: 'array' });
}

/** Inclusive-exclusive index range per dimension. */
export type Selection = Record<string, [number, number]>;

/**
 * Read one variable, optionally restricted to index ranges by dimension.
 */
export async function readVariable(
    store: ChunkStore,
    name: string,
    arr: ArrayLayout,
    selection: Selection = {}
): Promise<Variable> {
    const array = await openArray(store, name);
    const sel = arr.dims.map((dim) => {
        const range = selection[dim];
        return range ? zarr.slice(range[0], range[1]) : null;
    });
    const result = await zarr.get(array, sel);
    const shape = arr.dims.map((dim, i) => {
        const range = selection[dim];
        const n = arr.zarray.shape[i];
        return range ? Math.max(0, Math.min(range[1], n) - range[0]) : n;
    });
    const data = toFloat64(result.data);
    if (data.length !== product(shape)) {
        throw new MeshConnectError(`Unexpected data length ${data.length} reading ${name}`);
    }
    return { dims: arr.dims, shape, data, attrs: stripCoordinates(arr.attrs) };
}

export interface ReadOptions {
    variables?: readonly string[];
    selection?: Selection;
}

/**
 * Materialise a stored group (or a subset of it) as a dataset.
 */
export async function readDataset(store: ChunkStore, options: ReadOptions = {}, known?: ZarrLayout): Promise<ArrayDataset> {
    const layout = known ?? (await readLayout(store));
    const coordNames = coordinateNames(layout);
    const wanted = options.variables ? new Set(options.variables) : null;

    const coords: Record<string, VariableInput> = {};
    const dataVars: Record<string, VariableInput> = {};
    for (const [name, arr] of Object.entries(layout.arrays)) {
        const isCoord = coordNames.has(name);
        if (wanted && !isCoord && !wanted.has(name)) continue;
        const v = await readVariable(store, name, arr, options.selection);
        if (isCoord) coords[name] = v;
        else dataVars[name] = v;
    }
    return createDataset({ attrs: stripCoordinates(layout.attrs), coords, dataVars });
}

async function writeVariableData(
    store: ChunkStore,
    name: string,
    v: Variable,
    region?: { axis: number; start: number }
): Promise<void> {
    const array = await openArray(store, name);
    const sel = v.dims.map((_, i) =>
        region && i === region.axis ? zarr.slice(region.start, region.start + v.shape[i]) : null
    );
    const chunk = { data: v.data, shape: [...v.shape], stride: stridesOf(v.shape) };
    await zarr.set(array, sel, chunk);
}

/**
 * Fresh write (mode "w"): clears the store, then writes every variable
 * and the consolidated metadata.
 */
export async function writeDataset(store: ChunkStore, ds: ArrayDataset): Promise<ZarrLayout> {
    const layout = layoutOf(ds);
    await store.clear();
    await store.set('.zgroup', encodeJson({ zarr_format: 2 }));
    await store.set('.zattrs', encodeJson(layout.attrs));
    for (const [name, v] of allVariables(ds)) {
        await writeArrayMeta(store, name, layout.arrays[name]);
        if (v.data.length > 0) await writeVariableData(store, name, v);
    }
    await writeConsolidated(store, layout);
    debug('wrote %d arrays', Object.keys(layout.arrays).length);
    return layout;
}

function axisOf(name: string, arr: ArrayLayout, dim: string): number {
    const axis = arr.dims.indexOf(dim);
    if (axis < 0) throw new MeshWriteError(`Variable ${name} does not have dimension ${dim}`);
    return axis;
}

function checkCompatible(name: string, stored: ArrayLayout, v: Variable, axis: number): void {
    if (stored.dims.join(',') !== v.dims.join(',')) {
        throw new MeshWriteError(`Dimensions of ${name} (${v.dims.join(', ')}) do not match stored (${stored.dims.join(', ')})`);
    }
    stored.zarray.shape.forEach((n, i) => {
        if (i !== axis && n !== v.shape[i]) {
            throw new MeshWriteError(`Shape of ${name} does not match stored array along ${stored.dims[i]}`);
        }
    });
}

/**
 * Overwrite the index range [start, start + len) along `dim`.
 * Every variable in `ds` must vary along `dim` and already exist.
 */
export async function writeRegion(store: ChunkStore, ds: ArrayDataset, dim: string, start: number): Promise<void> {
    const layout = await readLayout(store);
    for (const [name, v] of allVariables(ds)) {
        const stored = layout.arrays[name];
        if (!stored) throw new MeshWriteError(`Variable ${name} not found in existing store`);
        const axis = axisOf(name, stored, dim);
        checkCompatible(name, stored, v, axis);
        if (start + v.shape[axis] > stored.zarray.shape[axis]) {
            throw new MeshWriteError(`Region for ${name} extends beyond the stored array`);
        }
        await writeVariableData(store, name, v, { axis, start });
    }
}

/**
 * Grow every variable along `dim` by the batch length and write the batch
 * into the new tail. Variables without `dim` are left untouched.
 */
export async function appendAlong(store: ChunkStore, ds: ArrayDataset, dim: string): Promise<ZarrLayout> {
    const layout = await readLayout(store);
    const updates: [string, Variable, number][] = [];
    for (const [name, v] of allVariables(ds)) {
        if (!v.dims.includes(dim)) continue;
        const stored = layout.arrays[name];
        if (!stored) throw new MeshWriteError(`Variable ${name} not found in existing store`);
        const axis = axisOf(name, stored, dim);
        checkCompatible(name, stored, v, axis);
        updates.push([name, v, axis]);
    }
    for (const [name, arr] of Object.entries(layout.arrays)) {
        if (arr.dims.includes(dim) && !updates.some(([n]) => n === name)) {
            throw new MeshWriteError(`Variable ${name} along ${dim} is missing from the appended data`);
        }
    }

    for (const [name, v, axis] of updates) {
        const stored = layout.arrays[name];
        const start = stored.zarray.shape[axis];
        const shape = [...stored.zarray.shape];
        shape[axis] = start + v.shape[axis];
        stored.zarray = { ...stored.zarray, shape };
        await writeArrayMeta(store, name, stored);
        await writeVariableData(store, name, v, { axis, start });
    }
    await writeConsolidated(store, layout);
    debug('appended %d arrays along %s', updates.length, dim);
    return layout;
}
