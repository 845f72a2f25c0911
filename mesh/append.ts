/**
 * Mesh Client: Append Writer
 *
 * Writes a dataset onto a remote chunked array, either fresh or by
 * extending it along a one-dimensional append coordinate. Where the new
 * batch overlaps existing coordinate values, the overlap is overwritten in
 * place; anything beyond is appended. Consistency checks run before the
 * first remote mutation.
 *
 * Precondition: the append coordinate is ascending in both the stored
 * array and the new batch.
 */

import createDebug from 'debug';
import { MeshWriteError } from './errors';
import type { ChunkStore } from './chunk-store';
import { datasetDims, getVariable, isel, keepAlong } from './dataset';
import { newDatasource, withProperties } from './datasource';
import { appendAlong, layoutSchema, readLayout, readVariable, writeDataset, writeRegion } from './zarr-layout';
import type { ArrayDataset, DatasourceSnapshot } from './types';

const debug = createDebug('mesh:append');

/** Resolves to null when the datasource does not exist. */
export type DatasourceLookup = (datasourceId: string) => Promise<DatasourceSnapshot | null>;

export interface AppendRequest {
    datasourceId: string;
    data: ArrayDataset;
    /** Coordinate to append along. Absent means full overwrite. */
    append?: string;
    overwrite?: boolean;
}

export interface AppendOutcome {
    datasource: DatasourceSnapshot;
    mode: 'fresh' | 'append';
    /** Index range overwritten in place, if any. */
    replaced: [number, number] | null;
    /** Elements added beyond the previous end. */
    appended: number;
}

/** Indices of `existing` within [lo, hi]. */
export function overlapIndices(existing: Float64Array, lo: number, hi: number): number[] {
    const out: number[] = [];
    existing.forEach((v, i) => {
        if (v >= lo && v <= hi) out.push(i);
    });
    return out;
}

function sameValues(a: Float64Array, b: Float64Array): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

export class AppendWriter {
    constructor(
        private readonly store: ChunkStore,
        private readonly lookup: DatasourceLookup
    ) {}

    async write(request: AppendRequest): Promise<AppendOutcome> {
        const { datasourceId, data, overwrite = false } = request;
        let append = request.append;
        let existing: DatasourceSnapshot | null = null;

        if (overwrite) {
            await this.store.clear();
            append = undefined;
        } else {
            existing = await this.lookup(datasourceId);
        }

        if (!append || !existing) {
            await writeDataset(this.store, data);
            const base = existing ?? newDatasource(datasourceId);
            debug('fresh write of %s', datasourceId);
            return {
                datasource: withProperties(base, { schema: layoutSchema(await readLayout(this.store)) }),
                mode: 'fresh',
                replaced: null,
                appended: 0,
            };
        }

        return this.appendOnto(existing, data, append);
    }

    private async appendOnto(existing: DatasourceSnapshot, data: ArrayDataset, append: string): Promise<AppendOutcome> {
        if (!(append in existing.schema.coords)) {
            throw new MeshWriteError(`Append coordinate ${append} not in existing zarr`);
        }
        const layout = await readLayout(this.store);
        const stored = layout.arrays[append];
        if (!stored) {
            throw new MeshWriteError(`Append coordinate ${append} not in existing zarr`);
        }
        if (stored.dims.length > 1) {
            throw new MeshWriteError(`Append coordinate ${append} has more than one dimension`);
        }
        const appendDim = stored.dims[0];

        const incoming = getVariable(data, append);
        if (!incoming || incoming.dims.length !== 1 || incoming.dims[0] !== appendDim) {
            throw new MeshWriteError(`Data must have a one-dimensional coordinate ${append} along ${appendDim}`);
        }
        const batchLength = datasetDims(data)[appendDim];
        const current = (await readVariable(this.store, append, stored)).data;

        let lo = Infinity;
        let hi = -Infinity;
        for (const v of incoming.data) {
            if (v < lo) lo = v;
            if (v > hi) hi = v;
        }
        const overlap = overlapIndices(current, lo, hi);

        let replaced: [number, number] | null = null;
        if (overlap.length > 0) {
            if (overlap.length > batchLength) {
                throw new MeshWriteError(
                    'Cannot append to zarr with a region that would be smaller than the original'
                );
            }
            const start = overlap[0];
            const stop = overlap[overlap.length - 1] + 1;
            const section = keepAlong(isel(data, appendDim, 0, overlap.length), appendDim);
            const sectionCoord = getVariable(section, append);
            if (
                stop < current.length &&
                (!sectionCoord || !sameValues(sectionCoord.data, current.subarray(start, stop)))
            ) {
                throw new MeshWriteError(
                    `Data inconsistency on coordinate ${append} replacing a inner section of an existing zarr array`
                );
            }
            debug('overwriting %s[%d:%d]', appendDim, start, stop);
            await writeRegion(this.store, section, appendDim, start);
            replaced = [start, stop];
        }

        let appended = 0;
        if (batchLength > overlap.length) {
            const tail = isel(data, appendDim, overlap.length);
            appended = batchLength - overlap.length;
            debug('appending %d along %s', appended, appendDim);
            await appendAlong(this.store, tail, appendDim);
        }

        return {
            datasource: withProperties(existing, { schema: layoutSchema(await readLayout(this.store)) }),
            mode: 'append',
            replaced,
            appended,
        };
    }
}
