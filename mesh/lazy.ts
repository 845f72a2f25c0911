/**
 * Mesh Client: Lazy Array Handle
 *
 * A remote array opened for on-demand reads. The handle owns the session
 * its store was opened with; close() releases it.
 */

import type { ChunkStore } from './chunk-store';
import { layoutSchema, readDataset, readLayout, readVariable, type ReadOptions, type Selection, type ZarrLayout } from './zarr-layout';
import type { ArrayDataset, DatasourceSchema, Variable } from './types';

export class LazyDataset {
    private closed = false;

    private constructor(
        readonly store: ChunkStore,
        private readonly layout: ZarrLayout,
        private readonly release: () => Promise<void>
    ) {}

    /**
     * Read the group metadata. The session is released if that fails.
     */
    static async open(store: ChunkStore, release: () => Promise<void>): Promise<LazyDataset> {
        let layout: ZarrLayout;
        try {
            layout = await readLayout(store);
        } catch (err) {
            await release();
            throw err;
        }
        return new LazyDataset(store, layout, release);
    }

    get schema(): DatasourceSchema {
        return layoutSchema(this.layout);
    }

    get variables(): string[] {
        return Object.keys(this.layout.arrays);
    }

    get isClosed(): boolean {
        return this.closed;
    }

    async read(name: string, selection?: Selection): Promise<Variable> {
        this.assertOpen();
        const arr = this.layout.arrays[name];
        if (!arr) throw new Error(`Variable ${name} not found`);
        return readVariable(this.store, name, arr, selection);
    }

    /** Materialise all (or some) variables. */
    async load(options: ReadOptions = {}): Promise<ArrayDataset> {
        this.assertOpen();
        return readDataset(this.store, options, this.layout);
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        await this.release();
    }

    private assertOpen(): void {
        if (this.closed) throw new Error('Lazy dataset is closed');
    }
}
