/**
 * Mesh Client: Catalog
 *
 * Read-only collection of summary datasource snapshots returned by a
 * catalog search.
 */

import type { QueryInput } from './query';
import type { DatasourceSnapshot } from './types';

/** What a catalog needs from its connector. */
export interface CatalogSource<TResult> {
    loadDatasource(datasourceId: string): Promise<TResult>;
    query(query: QueryInput): Promise<TResult>;
}

export class Catalog<TResult = unknown> implements Iterable<DatasourceSnapshot> {
    private readonly byId: ReadonlyMap<string, DatasourceSnapshot>;

    constructor(
        readonly datasources: readonly DatasourceSnapshot[],
        private readonly source: CatalogSource<TResult>
    ) {
        this.byId = new Map(datasources.map((ds) => [ds.id, ds]));
    }

    get ids(): string[] {
        return this.datasources.map((ds) => ds.id);
    }

    get size(): number {
        return this.datasources.length;
    }

    has(datasourceId: string): boolean {
        return this.byId.has(datasourceId);
    }

    get(datasourceId: string): DatasourceSnapshot {
        const ds = this.byId.get(datasourceId);
        if (!ds) throw new Error(`Datasource ${datasourceId} not in catalog`);
        return ds;
    }

    [Symbol.iterator](): Iterator<DatasourceSnapshot> {
        return this.datasources[Symbol.iterator]();
    }

    async load(datasourceId: string): Promise<TResult> {
        this.get(datasourceId);
        return this.source.loadDatasource(datasourceId);
    }

    async query(query: QueryInput): Promise<TResult> {
        this.get(query.datasource);
        return this.source.query(query);
    }

    toString(): string {
        return this.datasources.map((ds) => ` ${ds.name} [${ds.id}]`).join('\n');
    }
}
