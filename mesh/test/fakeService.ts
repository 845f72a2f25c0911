/**
 * In-process stand-in for the catalog service, installed as `fetch`.
 * Holds metadata, tables and chunk stores in memory and records every call.
 */

import { MemoryChunkStore } from '../memory-store';

export interface RecordedCall {
    method: string;
    url: URL;
    headers: Headers;
    body: Uint8Array | null;
}

export interface StagedShape {
    container: 'dataset' | 'geodataframe' | 'dataframe';
    size?: number;
    dlen?: number;
}

export const TEST_ORIGIN = 'https://datamesh.test';

function json(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function text(body: string, status: number): Response {
    return new Response(body, { status });
}

function asRecord(value: unknown): Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        ? Object.fromEntries(Object.entries(value))
        : {};
}

async function readBody(input: RequestInit['body']): Promise<Uint8Array | null> {
    if (input === undefined || input === null) return null;
    return new Uint8Array(await new Response(input).arrayBuffer());
}

export class FakeMeshService {
    readonly calls: RecordedCall[] = [];
    /** Stored GeoJSON features keyed by datasource id. */
    readonly datasources = new Map<string, Record<string, unknown>>();
    readonly tables = new Map<string, Uint8Array>();
    readonly stores = new Map<string, MemoryChunkStore>();
    readonly staged = new Map<string, StagedShape>();
    readonly closedSessions: { id: string; finalise: boolean }[] = [];

    /** Answer the info probe with 404, like a service without sessions. */
    legacy = false;
    infoMessage: string | null = null;
    /** Statuses for successive transfer requests before they succeed. */
    transferFailures: number[] = [];
    sessionFailure: string | null = null;
    closeFailure: string | null = null;
    /** Drop the connection on every session close. */
    closeUnreachable = false;

    private sessionCount = 0;

    readonly fetch = async (input: string | URL | Request, init: RequestInit = {}): Promise<Response> => {
        const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
        const method = (init.method ?? 'GET').toUpperCase();
        const headers = new Headers(init.headers);
        const body = await readBody(init.body);
        this.calls.push({ method, url, headers, body });
        if (this.closeUnreachable && method === 'DELETE' && url.pathname.startsWith('/session/')) {
            throw new TypeError('fetch failed');
        }
        return this.route(method, url, headers, body);
    };

    /** Register a datasource feature the way the service would return it. */
    addDatasource(id: string, properties: Record<string, unknown> = {}, geometry: unknown = null): void {
        this.datasources.set(id, { id, type: 'Feature', geometry, properties: { name: id, ...properties } });
    }

    store(id: string): MemoryChunkStore {
        let store = this.stores.get(id);
        if (!store) {
            store = new MemoryChunkStore();
            this.stores.set(id, store);
        }
        return store;
    }

    callsTo(method: string, pathPrefix: string): RecordedCall[] {
        return this.calls.filter((c) => c.method === method && c.url.pathname.startsWith(pathPrefix));
    }

    private async route(method: string, url: URL, headers: Headers, body: Uint8Array | null): Promise<Response> {
        const p = url.pathname;

        if (p.startsWith('/info/')) {
            return this.legacy ? text('Not found', 404) : json(this.infoMessage ? { message: this.infoMessage } : {});
        }
        if (p === '/session/' && method === 'GET') {
            if (this.sessionFailure) return text(this.sessionFailure, 500);
            this.sessionCount++;
            const now = Date.now();
            return json({
                id: `session-${this.sessionCount}`,
                user: 'test-user',
                creation_time: new Date(now).toISOString(),
                end_time: new Date(now + 3600_000).toISOString(),
                write: false,
                allow_multiwrite: url.searchParams.get('allow_multiwrite') === 'True',
                verified: false,
            });
        }
        if (p.startsWith('/session/') && method === 'GET') {
            const id = decodeURIComponent(p.slice('/session/'.length));
            if (!id.startsWith('session-')) return text(`Session ${id} not found`, 404);
            const now = Date.now();
            return json({
                id,
                user: 'test-user',
                creation_time: new Date(now).toISOString(),
                end_time: new Date(now + 3600_000).toISOString(),
                write: true,
                allow_multiwrite: false,
                verified: true,
            });
        }
        if (p.startsWith('/session/') && method === 'DELETE') {
            if (this.closeFailure) return text(this.closeFailure, 409);
            const id = decodeURIComponent(p.slice('/session/'.length));
            this.closedSessions.push({ id, finalise: url.searchParams.get('finalise_write') === 'True' });
            return new Response(null, { status: 204 });
        }
        if (p.startsWith('/datasource/')) {
            return this.routeMetadata(method, p.slice('/datasource/'.length).replace(/\/$/, ''), body);
        }
        if (p.startsWith('/data/')) {
            return this.routeData(method, p.slice('/data/'.length), headers, body);
        }
        if (p === '/oceanql/stage/' && method === 'POST') {
            return this.routeStage(body);
        }
        if (p === '/oceanql/' && method === 'POST') {
            return this.routeTransfer(body);
        }
        if (p.startsWith('/zarr/query/')) {
            const [qhash, ...rest] = p.slice('/zarr/query/'.length).split('/');
            return this.routeChunks(method, qhash.replace(/^q-/, ''), rest.join('/'), body);
        }
        if (p.startsWith('/zarr/')) {
            const [id, ...rest] = p.slice('/zarr/'.length).split('/');
            return this.routeChunks(method, id, rest.join('/'), body);
        }
        return text('Not found', 404);
    }

    private routeMetadata(method: string, id: string, body: Uint8Array | null): Response {
        if (method === 'GET' && id === '') {
            return json({ type: 'FeatureCollection', features: [...this.datasources.values()] });
        }
        if (method === 'GET') {
            const feature = this.datasources.get(id);
            return feature ? json(feature) : json({ detail: 'Not found' }, 404);
        }
        if (method === 'POST' || method === 'PATCH') {
            const flat = asRecord(JSON.parse(new TextDecoder().decode(body ?? new Uint8Array())));
            const { id: bodyId, geom, ...properties } = flat;
            const key = typeof bodyId === 'string' ? bodyId : id;
            this.datasources.set(key, { id: key, type: 'Feature', geometry: geom ?? null, properties });
            return json({ id: key }, method === 'POST' ? 201 : 200);
        }
        return text('Method not allowed', 405);
    }

    private routeData(method: string, id: string, headers: Headers, body: Uint8Array | null): Response {
        switch (method) {
            case 'DELETE':
                this.datasources.delete(id);
                this.tables.delete(id);
                this.stores.delete(id);
                return new Response(null, { status: 204 });
            case 'GET': {
                const table = this.tables.get(id);
                return table ? new Response(table, { status: 200 }) : json({ detail: 'No data' }, 404);
            }
            case 'PUT':
            case 'PATCH':
                if (!body) return json({ detail: 'Empty body' }, 400);
                if (headers.get('Content-Type') !== 'application/parquet') return json({ detail: 'Bad type' }, 415);
                this.tables.set(id, body);
                return json({}, 200);
            default:
                return text('Method not allowed', 405);
        }
    }

    private routeStage(body: Uint8Array | null): Response {
        const query = asRecord(JSON.parse(new TextDecoder().decode(body ?? new Uint8Array())));
        const id = String(query.datasource);
        if (!this.datasources.has(id)) return json({ detail: `Datasource ${id} not found` }, 404);
        const shape = this.staged.get(id) ?? (this.stores.has(id) ? { container: 'dataset' } : this.tables.has(id) ? { container: 'dataframe' } : null);
        if (!shape) return new Response(null, { status: 204 });
        return json({
            qhash: `q-${id}`,
            formats: ['parquet'],
            size: shape.size ?? 100,
            dlen: shape.dlen ?? 1,
            coords: {},
            container: shape.container,
        });
    }

    private routeTransfer(body: Uint8Array | null): Response {
        const failure = this.transferFailures.shift();
        if (failure !== undefined) return text('upstream exploded', failure);
        const query = asRecord(JSON.parse(new TextDecoder().decode(body ?? new Uint8Array())));
        const table = this.tables.get(String(query.datasource));
        return table ? new Response(table, { status: 200 }) : json({ detail: 'No table' }, 404);
    }

    private async routeChunks(method: string, id: string, key: string, body: Uint8Array | null): Promise<Response> {
        if (method === 'GET' && key === '') {
            const store = this.stores.get(id);
            if (!store) return text('Not found', 404);
            const names = await store.keys();
            return text(`<html><body>${names.map((n) => `<a href="${n}">${n}</a>`).join('\n')}</body></html>`, 200);
        }
        switch (method) {
            case 'GET':
            case 'HEAD': {
                const store = this.stores.get(id);
                if (!store || !(await store.contains(key))) return text('Not found', 404);
                return method === 'HEAD' ? new Response(null, { status: 200 }) : new Response(await store.get(key), { status: 200 });
            }
            case 'POST':
            case 'PUT':
                await this.store(id).set(key, body ?? new Uint8Array());
                return new Response(null, { status: 200 });
            case 'DELETE':
                await this.stores.get(id)?.delete(key);
                return new Response(null, { status: 204 });
            default:
                return text('Method not allowed', 405);
        }
    }
}
