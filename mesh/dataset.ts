/**
 * Mesh Client: Labeled Array Container
 *
 * A small, immutable stand-in for a labeled multidimensional dataset:
 * named variables over named dimensions, C-ordered Float64 data.
 */

import type { ArrayDataset, DatasourceSchema, Variable, VariableSchema } from './types';

export interface VariableInput {
    dims: readonly string[];
    data: Float64Array | readonly number[];
    /** Defaults to a 1-D shape of the data length. */
    shape?: readonly number[];
    attrs?: Record<string, unknown>;
}

export interface DatasetInput {
    attrs?: Record<string, unknown>;
    coords?: Record<string, VariableInput>;
    dataVars?: Record<string, VariableInput>;
}

export function createVariable(input: VariableInput): Variable {
    const data = input.data instanceof Float64Array ? input.data : Float64Array.from(input.data);
    const shape = input.shape ? [...input.shape] : [data.length];
    if (shape.length !== input.dims.length) {
        throw new Error(`Variable has ${input.dims.length} dims but shape of rank ${shape.length}`);
    }
    if (shape.length === 0) {
        throw new Error('Scalar variables are not supported');
    }
    if (product(shape) !== data.length) {
        throw new Error(`Data length ${data.length} does not match shape [${shape.join(', ')}]`);
    }
    return Object.freeze({
        dims: Object.freeze([...input.dims]),
        shape: Object.freeze(shape),
        data,
        attrs: Object.freeze({ ...(input.attrs ?? {}) }),
    });
}

/**
 * Build a dataset, checking that every dimension has one size.
 */
export function createDataset(input: DatasetInput): ArrayDataset {
    const coords = mapValues(input.coords ?? {}, createVariable);
    const dataVars = mapValues(input.dataVars ?? {}, createVariable);
    const ds: ArrayDataset = Object.freeze({
        kind: 'dataset',
        attrs: Object.freeze({ ...(input.attrs ?? {}) }),
        coords: Object.freeze(coords),
        dataVars: Object.freeze(dataVars),
    });
    datasetDims(ds);
    return ds;
}

export function allVariables(ds: ArrayDataset): [string, Variable][] {
    return [...Object.entries(ds.coords), ...Object.entries(ds.dataVars)];
}

export function getVariable(ds: ArrayDataset, name: string): Variable | undefined {
    return ds.coords[name] ?? ds.dataVars[name];
}

/** Dimension sizes. Throws on conflicting sizes. */
export function datasetDims(ds: ArrayDataset): Record<string, number> {
    const dims: Record<string, number> = {};
    for (const [name, v] of allVariables(ds)) {
        v.dims.forEach((dim, i) => {
            const size = v.shape[i];
            if (dim in dims && dims[dim] !== size) {
                throw new Error(`Conflicting sizes for dimension '${dim}': ${dims[dim]} vs ${size} (variable ${name})`);
            }
            dims[dim] = size;
        });
    }
    return dims;
}

/**
 * Slice `v` along `axis` to [start, stop).
 */
export function sliceVariable(v: Variable, axis: number, start: number, stop: number): Variable {
    const shape = [...v.shape];
    const len = Math.max(0, Math.min(stop, shape[axis]) - start);
    const inner = product(shape.slice(axis + 1));
    const outer = product(shape.slice(0, axis));
    const out = new Float64Array(outer * len * inner);
    for (let o = 0; o < outer; o++) {
        const src = (o * shape[axis] + start) * inner;
        out.set(v.data.subarray(src, src + len * inner), o * len * inner);
    }
    shape[axis] = len;
    return createVariable({ dims: v.dims, shape, data: out, attrs: { ...v.attrs } });
}

/**
 * Index-select along a dimension; variables without it are kept unchanged.
 */
export function isel(ds: ArrayDataset, dim: string, start: number, stop?: number): ArrayDataset {
    const slice = (vars: Readonly<Record<string, Variable>>) =>
        mapValues(vars, (v) => {
            const axis = v.dims.indexOf(dim);
            if (axis < 0) return v;
            return sliceVariable(v, axis, start, stop ?? v.shape[axis]);
        });
    return createDataset({ attrs: { ...ds.attrs }, coords: slice(ds.coords), dataVars: slice(ds.dataVars) });
}

/**
 * Keep only the variables that vary along `dim`.
 */
export function keepAlong(ds: ArrayDataset, dim: string): ArrayDataset {
    const keep = (vars: Readonly<Record<string, Variable>>) =>
        Object.fromEntries(Object.entries(vars).filter(([, v]) => v.dims.includes(dim)));
    return createDataset({ attrs: { ...ds.attrs }, coords: keep(ds.coords), dataVars: keep(ds.dataVars) });
}

export function variableSchema(v: Variable): VariableSchema {
    return { dims: [...v.dims], attrs: { ...v.attrs }, shape: [...v.shape], dtype: 'float64' };
}

export function datasetSchema(ds: ArrayDataset): DatasourceSchema {
    return {
        attrs: { ...ds.attrs },
        dims: datasetDims(ds),
        coords: mapValues(ds.coords, variableSchema),
        data_vars: mapValues(ds.dataVars, variableSchema),
    };
}

export function product(values: readonly number[]): number {
    return values.reduce((a, b) => a * b, 1);
}

function mapValues<A, B>(record: Readonly<Record<string, A>>, fn: (value: A) => B): Record<string, B> {
    const out: Record<string, B> = {};
    for (const [key, value] of Object.entries(record)) out[key] = fn(value);
    return out;
}
