/**
 * Mesh Client: Remote Chunk Store
 *
 * Key -> bytes mapping over HTTP. This is the backing store for the
 * chunked-array runtime: reads and writes of array chunks and metadata
 * go through it one key at a time.
 */

import createDebug from 'debug';
import { ChunkNotFoundError, MeshConnectError, MeshWriteError } from './errors';
import { parseDirectoryListing } from './listing';
import type { Session } from './session';
import type { RetryTransport } from './transport';

const debug = createDebug('mesh:chunkstore');

// =============================================================================
// Storage Interface
// =============================================================================

export interface ChunkStore {
    /** Throws ChunkNotFoundError when the key is absent. */
    get(key: string): Promise<Uint8Array>;
    contains(key: string): Promise<boolean>;
    set(key: string, value: Uint8Array): Promise<void>;
    delete(key: string): Promise<void>;
    /** Top-level key names. */
    keys(): Promise<string[]>;
    /** Remove the whole resource. */
    clear(): Promise<void>;
}

// =============================================================================
// HTTP Implementation
// =============================================================================

/** `zarr` is read/write on a datasource; `query` is read-only on a staged query. */
export type ChunkApi = 'zarr' | 'query';

export interface OperationOptions {
    timeoutMs?: number | null;
    retries?: number;
}

export interface RemoteChunkStoreOptions {
    transport: RetryTransport;
    gateway: string;
    /** Datasource id, or staged query hash for the query api. */
    resource: string;
    session: Session;
    headers: Record<string, string>;
    api?: ChunkApi;
    /** Service has no session API: zarr api only, GET for existence checks. */
    legacy?: boolean;
    parameters?: Record<string, unknown>;
    nocache?: boolean;
    /** HTTP method for writes. */
    writeMethod?: 'POST' | 'PUT';
    list?: OperationOptions;
    read?: OperationOptions;
    write?: OperationOptions;
    remove?: OperationOptions;
}

export class RemoteChunkStore implements ChunkStore {
    readonly api: ChunkApi;
    readonly root: string;
    private readonly transport: RetryTransport;
    private readonly headers: Record<string, string>;
    private readonly legacy: boolean;
    private readonly writeMethod: 'POST' | 'PUT';
    private readonly ops: Record<'list' | 'read' | 'write' | 'remove', OperationOptions>;

    constructor(options: RemoteChunkStoreOptions) {
        this.transport = options.transport;
        this.legacy = options.legacy ?? false;
        this.api = this.legacy ? 'zarr' : (options.api ?? 'query');
        this.writeMethod = options.writeMethod ?? 'POST';

        const base = this.api === 'zarr' ? `${options.gateway}/zarr` : `${options.gateway}/zarr/query`;
        this.root = `${base}/${options.resource}`;

        const headers = options.session.addHeader(options.headers);
        if (options.nocache) headers['cache-control'] = 'no-transform,no-cache';
        if (options.parameters && Object.keys(options.parameters).length > 0) {
            headers['X-PARAMETERS'] = JSON.stringify(options.parameters);
        }
        this.headers = headers;

        this.ops = {
            list: { timeoutMs: 10_000, ...options.list },
            read: { timeoutMs: 60_000, ...options.read },
            write: { timeoutMs: 600_000, ...options.write },
            remove: { timeoutMs: 10_000, ...options.remove },
        };
    }

    get readOnly(): boolean {
        return this.api === 'query';
    }

    async get(key: string): Promise<Uint8Array> {
        const res = await this.request(key, 'GET', this.ops.read);
        if (res.status >= 300) {
            debug('get %s -> %d', key, res.status);
            throw new ChunkNotFoundError(key);
        }
        return new Uint8Array(await res.arrayBuffer());
    }

    async contains(key: string): Promise<boolean> {
        const res = await this.request(key, this.legacy ? 'GET' : 'HEAD', this.ops.read);
        return res.status === 200;
    }

    async set(key: string, value: Uint8Array): Promise<void> {
        if (this.readOnly) {
            throw new MeshConnectError('Query api does not support write operations');
        }
        const res = await this.request(key, this.writeMethod, this.ops.write, value);
        if (res.status >= 300) {
            throw new MeshWriteError(`Failed to write ${key}: ${res.status} - ${await res.text()}`);
        }
        debug('set %s (%d bytes)', key, value.byteLength);
    }

    async delete(key: string): Promise<void> {
        if (this.readOnly) {
            throw new MeshConnectError('Query api does not support delete operations');
        }
        await this.request(key, 'DELETE', this.ops.remove);
    }

    async keys(): Promise<string[]> {
        const res = await this.request('', 'GET', this.ops.list);
        if (res.status >= 300) return [];
        return parseDirectoryListing(await res.text());
    }

    async clear(): Promise<void> {
        await this.delete('');
    }

    private async request(
        key: string,
        method: string,
        op: OperationOptions,
        body?: Uint8Array
    ): Promise<Response> {
        const res = await this.transport.execute({
            url: `${this.root}/${key}`,
            method,
            headers: this.headers,
            body,
            timeoutMs: op.timeoutMs,
            retries: op.retries,
        });
        if (res.status === 401) {
            throw new MeshConnectError(`Not Authorized ${await res.text()}`);
        }
        return res;
    }
}
