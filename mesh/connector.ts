/**
 * Mesh Client: Connector
 *
 * Entry point for all catalog operations. Owns the configuration, auth
 * headers and transport; every operation acquires its own session.
 */
/* eslint-disable no-console */

import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Geometry } from 'geojson';
import { AppendWriter } from './append';
import { CACHE_EXTENSIONS, LocalResultCache } from './cache';
import { Catalog } from './catalog';
import { RemoteChunkStore, type ChunkApi } from './chunk-store';
import { CLIENT_NAME, CLIENT_VERSION, resolveMeshConfig, type MeshConfig } from './config';
import {
    checkCoordinates,
    DATASOURCE_ID_PATTERN,
    datasourceToWire,
    guessProperties,
    newDatasource,
    parseCatalog,
    parseDatasource,
    withProperties,
} from './datasource';
import {
    DatasourceNotFoundError,
    extractDetail,
    MeshConnectError,
    MeshQueryError,
    MeshWriteError,
} from './errors';
import { bboxPolygon, toWkt } from './geometry';
import { LazyDataset } from './lazy';
import { InProcessLockProvider } from './locks';
import { createQuery, serializeQuery, type QueryInput } from './query';
import { SessionManager, withSession, type Session } from './session';
import { StageNegotiator } from './stage';
import { decodeTable, encodeTable } from './tabular';
import { RetryTransport, sleep as defaultSleep, type ParamValue } from './transport';
import { readDataset } from './zarr-layout';
import type {
    Container,
    DatasourceProperties,
    DatasourceSnapshot,
    GeoFilter,
    Query,
    Stage,
    TimeFilter,
} from './types';

export type QueryResult = Container | LazyDataset | null;

type Env = Record<string, string | undefined>;

export interface ConnectOptions extends Partial<MeshConfig> {
    env?: Env;
    fetch?: typeof fetch;
    sleep?: (ms: number) => Promise<void>;
}

export interface QueryOptions {
    /** Return a lazy handle for arrays instead of materialising them. */
    lazy?: boolean;
    /** Serve from (and fill) the local cache for this many seconds; 0 disables it. */
    cacheTimeoutS?: number;
}

export interface LoadOptions {
    parameters?: Record<string, unknown>;
    lazy?: boolean;
}

export interface CatalogFilter {
    search?: string;
    timefilter?: TimeFilter | [string | null, string | null];
    geofilter?: GeoFilter | Geometry;
    limit?: number;
}

export interface WriteOptions extends DatasourceProperties {
    append?: string;
    overwrite?: boolean;
    /** CRS of the data when not WGS84, e.g. "EPSG:2193". */
    crs?: string | number;
}

const DRIVERS = {
    dataset: 'onzarr',
    geodataframe: 'postgis',
    dataframe: 'onsql',
} as const;

const TRANSFER_FORMAT = 'application/parquet';

/** Server answered 5xx on the transfer step; the whole query may be re-run. */
class TransferServerError extends MeshConnectError {}

export function authHeaders(token: string, user: string | null = null): Record<string, string> {
    if (token.startsWith('Bearer ')) {
        return { Authorization: token };
    }
    const headers: Record<string, string> = {
        Authorization: `Token ${token}`,
        'X-DATAMESH-TOKEN': token,
    };
    if (user) headers['X-DATAMESH-USER'] = user;
    return headers;
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/** Raise on error statuses using the server's detail message when present. */
async function validateResponse(res: Response): Promise<void> {
    if (res.status < 400) return;
    const text = await res.text();
    const detail = extractDetail(text);
    throw new MeshConnectError(detail ?? `Datamesh server error: ${text}`);
}

function catalogTimeRange(timefilter: TimeFilter | [string | null, string | null]): string {
    const times = Array.isArray(timefilter) ? timefilter : timefilter.times;
    const fmt = (t: string | null, fallback: string) => `${(t ?? fallback).replace(/Z$/, '')}Z`;
    return `${fmt(times[0], '0001-01-01 00:00:00')},${fmt(times[1], '2500-01-01 00:00:00')}`;
}

function catalogGeometry(geofilter: GeoFilter | Geometry): Geometry {
    switch (geofilter.type) {
        case 'bbox':
            return bboxPolygon(...geofilter.geom);
        case 'feature':
            if (!geofilter.geom.geometry) throw new Error('Feature geofilter has no geometry');
            return geofilter.geom.geometry;
        case 'radius':
            throw new Error('Radius geofilter is not supported for catalog search');
        default:
            return geofilter;
    }
}

function crsAttr(crs: string | number): string | number | null {
    const text = String(crs).toUpperCase();
    return text === '4326' || text === 'EPSG:4326' ? null : crs;
}

export class Connector {
    readonly sessions: SessionManager;
    private readonly stager: StageNegotiator;
    private readonly cacheLocks = new InProcessLockProvider();
    private readonly sleep: (ms: number) => Promise<void>;

    private constructor(
        readonly config: MeshConfig,
        private readonly headers: Record<string, string>,
        private readonly transport: RetryTransport,
        readonly gateway: string,
        readonly legacy: boolean,
        sleep: (ms: number) => Promise<void>
    ) {
        this.sleep = sleep;
        this.sessions = new SessionManager({
            transport,
            gateway,
            headers,
            legacy,
            durationS: config.sessionDurationS,
            readTimeoutMs: config.readTimeoutMs,
        });
        this.stager = new StageNegotiator({
            transport,
            gateway,
            headers,
            timeoutMs: config.stageReadTimeoutMs,
        });
    }

    /**
     * Resolve configuration, then probe the service to find the gateway
     * and whether it supports sessions.
     */
    static async connect(options: ConnectOptions = {}): Promise<Connector> {
        const { env, fetch, sleep, ...overrides } = options;
        const config = resolveMeshConfig(overrides, env);
        if (!config.token) {
            throw new Error(
                'A valid key must be supplied as a connection constructor argument or defined in environment variables as DATAMESH_TOKEN'
            );
        }
        const headers = authHeaders(config.token, config.user);
        const transport = new RetryTransport({
            retries: config.retries,
            badGatewayCooldownMs: config.badGatewayCooldownMs,
            connectTimeoutMs: config.connectTimeoutMs,
            readTimeoutMs: config.readTimeoutMs,
            sleep,
            fetch,
        });

        const service = new URL(config.service);
        const proto = service.protocol.replace(/:$/, '');
        let gateway = config.gateway ?? `${proto}://${service.host}`;
        let legacy = false;
        try {
            const res = await transport.execute({
                url: `${gateway}/info/${CLIENT_NAME}/${CLIENT_VERSION}`,
                headers,
            });
            if (res.status !== 200) {
                throw new MeshConnectError(`Failed to reach datamesh: ${res.status}-${await res.text()}`);
            }
            const body: unknown = await res.json();
            if (body && typeof body === 'object' && 'message' in body && typeof body.message === 'string') {
                console.log(`[connector] ${body.message}`);
            }
            console.log('[connector] Using datamesh API version 1');
        } catch (err) {
            gateway = config.gateway ?? `${proto}://gateway.${service.host}`;
            legacy = true;
            console.log(`[connector] Using datamesh API version beta (${errorMessage(err)})`);
        }

        const serviceTld = service.host.split('.').pop();
        const gatewayTld = new URL(gateway).host.split('.').pop();
        if (serviceTld !== gatewayTld) {
            console.warn('[connector] Gateway and service domain do not match');
        }

        return new Connector(config, headers, transport, gateway.replace(/\/+$/, ''), legacy, sleep ?? defaultSleep);
    }

    get service(): string {
        return this.config.service;
    }

    // =========================================================================
    // Chunk stores
    // =========================================================================

    openChunkStore(
        resource: string,
        session: Session,
        options: { api?: ChunkApi; parameters?: Record<string, unknown>; nocache?: boolean } = {}
    ): RemoteChunkStore {
        return new RemoteChunkStore({
            transport: this.transport,
            gateway: this.gateway,
            resource,
            session,
            headers: this.headers,
            api: options.api,
            legacy: this.legacy,
            parameters: options.parameters,
            nocache: options.nocache,
            list: { timeoutMs: this.config.listTimeoutMs, retries: 10 },
            read: { timeoutMs: this.config.chunkReadTimeoutMs, retries: 10 },
            write: { timeoutMs: this.config.chunkWriteTimeoutMs, retries: 10 },
            remove: { timeoutMs: this.config.listTimeoutMs, retries: 10 },
        });
    }

    // =========================================================================
    // Metadata
    // =========================================================================

    private async metadataRequest(datasourceId = '', params?: Record<string, ParamValue>): Promise<unknown> {
        const res = await this.transport.execute({
            url: `${this.config.service}/datasource/${datasourceId}`,
            headers: this.headers,
            params,
            timeoutMs: this.config.readTimeoutMs,
        });
        if (res.status === 404) throw new DatasourceNotFoundError(`Datasource ${datasourceId} not found`);
        if (res.status === 401) throw new MeshConnectError(`Datasource ${datasourceId} not Authorized`);
        await validateResponse(res);
        return res.json();
    }

    private async metadataWrite(ds: DatasourceSnapshot, exists: boolean): Promise<void> {
        const res = await this.transport.execute({
            url: exists ? `${this.config.service}/datasource/${ds.id}/` : `${this.config.service}/datasource/`,
            method: exists ? 'PATCH' : 'POST',
            body: JSON.stringify(datasourceToWire(ds)),
            headers: { ...this.headers, 'Content-Type': 'application/json' },
            timeoutMs: this.config.writeTimeoutMs,
        });
        await validateResponse(res);
    }

    async getCatalog(filter: CatalogFilter = {}): Promise<Catalog<QueryResult>> {
        const params: Record<string, ParamValue> = {};
        if (filter.limit) params.limit = filter.limit;
        if (filter.search) params.search = filter.search;
        if (filter.timefilter) params.in_trange = catalogTimeRange(filter.timefilter);
        if (filter.geofilter) params.geom_intersects = toWkt(catalogGeometry(filter.geofilter));
        const body = await this.metadataRequest('', params);
        return new Catalog(parseCatalog(body), this);
    }

    async getDatasource(datasourceId: string): Promise<DatasourceSnapshot> {
        const body = await this.metadataRequest(datasourceId);
        return parseDatasource(body, 'detailed');
    }

    /** Like getDatasource, but null when it does not exist. */
    async findDatasource(datasourceId: string): Promise<DatasourceSnapshot | null> {
        try {
            return await this.getDatasource(datasourceId);
        } catch (err) {
            if (err instanceof DatasourceNotFoundError) return null;
            throw err;
        }
    }

    // =========================================================================
    // Reading
    // =========================================================================

    private async fetchTable(datasourceId: string): Promise<Container> {
        const res = await this.transport.execute({
            url: `${this.gateway}/data/${datasourceId}`,
            headers: { Accept: TRANSFER_FORMAT, ...this.headers },
            timeoutMs: this.config.downloadTimeoutMs,
        });
        await validateResponse(res);
        return decodeTable(new Uint8Array(await res.arrayBuffer()));
    }

    /**
     * Load a whole datasource. Arrays come through the chunk store (lazily
     * if asked); tables are downloaded.
     */
    async loadDatasource(datasourceId: string, options: LoadOptions = {}): Promise<QueryResult> {
        const parameters = options.parameters ?? {};
        const session = await this.sessions.acquire();
        let handedOff = false;
        try {
            const stage = await this.stager.stage(createQuery({ datasource: datasourceId, parameters }), session);
            if (stage === null) {
                console.warn('[connector] No data found for query');
                return null;
            }
            if (stage.container === 'dataset' || options.lazy) {
                const store = this.openChunkStore(datasourceId, session, { api: 'zarr', parameters });
                if (options.lazy) {
                    handedOff = true;
                    return await LazyDataset.open(store, () => this.sessions.close(session));
                }
                return await readDataset(store);
            }
            return await this.fetchTable(datasourceId);
        } finally {
            if (!handedOff) await this.release(session);
        }
    }

    /**
     * Run a query: stage it, then transfer the result. Server errors on
     * the transfer re-run the whole query a few times before giving up.
     */
    async query(input: QueryInput, options: QueryOptions = {}): Promise<QueryResult> {
        const query = createQuery(input);
        const cacheTimeoutS = options.cacheTimeoutS ?? 0;
        const cache =
            cacheTimeoutS > 0 && !options.lazy
                ? new LocalResultCache({
                      cacheDir: this.config.cacheDir,
                      cacheTimeoutS,
                      lockTimeoutS: this.config.lockTimeoutS,
                      locks: this.cacheLocks,
                  })
                : null;

        if (cache) {
            const cached = await cache.get(query);
            if (cached !== null) return cached;
        }

        for (let retry = 0; ; retry++) {
            try {
                return await this.runQuery(query, options.lazy ?? false, cache);
            } catch (err) {
                if (!(err instanceof TransferServerError)) throw err;
                if (retry >= this.config.queryRetries) {
                    throw new MeshConnectError(err.message, { cause: err.cause });
                }
                await this.sleep(retry * 1000);
            }
        }
    }

    private async runQuery(query: Query, lazy: boolean, cache: LocalResultCache | null): Promise<QueryResult> {
        const session = await this.sessions.acquire();
        let handedOff = false;
        try {
            const stage = await this.stager.stage(query, session);
            if (stage === null) {
                console.warn('[connector] No data found for query');
                return null;
            }
            if (stage.dlen >= this.config.rowLimit && stage.container !== 'dataset') {
                console.warn(
                    `[connector] Query limited to ${this.config.rowLimit} rows, not all data may be returned. Use a more specific query.`
                );
            } else if (stage.size > this.config.lazyThresholdBytes) {
                console.warn('[connector] Query is too large for direct access, using lazy access');
                lazy = true;
            }

            if (stage.container === 'dataset') {
                const store = this.openChunkStore(stage.qhash, session, { api: 'query' });
                if (lazy) {
                    handedOff = true;
                    return await LazyDataset.open(store, () => this.sessions.close(session));
                }
                return await this.withCacheLock(query, cache, async () => {
                    const ds = await readDataset(store);
                    if (cache) await this.cacheBestEffort(() => cache.put(query, ds));
                    return ds;
                });
            }

            return await this.withCacheLock(query, cache, () => this.transferTable(query, stage, cache));
        } finally {
            if (!handedOff) await this.release(session);
        }
    }

    private async transferTable(query: Query, stage: Stage, cache: LocalResultCache | null): Promise<Container> {
        const res = await this.transport.execute({
            url: `${this.gateway}/oceanql/`,
            method: 'POST',
            headers: { Accept: TRANSFER_FORMAT, ...this.headers, 'Content-Type': 'application/json' },
            body: serializeQuery(query),
            timeoutMs: this.config.downloadTimeoutMs,
        });
        if (res.status >= 500) {
            throw new TransferServerError(`Datamesh server error: ${await res.text()}`);
        }
        if (res.status >= 400) {
            const text = await res.text();
            const detail = extractDetail(text);
            if (detail === null) throw new MeshConnectError(`Datamesh server error: ${text}`);
            throw new MeshQueryError(detail);
        }

        const bytes = new Uint8Array(await res.arrayBuffer());
        const data = await decodeTable(bytes);
        if (data.kind !== stage.container) {
            console.warn(`[connector] Staged container ${stage.container} but received ${data.kind}`);
        }
        if (cache) {
            const ext = data.kind === 'geodataframe' ? CACHE_EXTENSIONS.geodataframe : CACHE_EXTENSIONS.dataframe;
            await this.cacheBestEffort(async () => {
                await fs.mkdir(cache.cacheDir, { recursive: true });
                const tmp = path.join(cache.cacheDir, `.${randomUUID()}.download`);
                await fs.writeFile(tmp, bytes);
                await cache.copy(query, tmp, ext);
            });
        }
        return data;
    }

    private async withCacheLock<T>(query: Query, cache: LocalResultCache | null, fn: () => Promise<T>): Promise<T> {
        if (!cache) return fn();
        await this.cacheBestEffort(() => cache.lock(query));
        try {
            return await fn();
        } finally {
            await this.cacheBestEffort(() => cache.unlock(query));
        }
    }

    /** A failed close never replaces the outcome of the work it wrapped. */
    private async release(session: Session): Promise<void> {
        try {
            await this.sessions.close(session);
        } catch (err) {
            console.warn(`[connector] Failed to release session ${session.id}: ${String(err)}`);
        }
    }

    /** Cache faults never mask the result they were caching. */
    private async cacheBestEffort(fn: () => Promise<void>): Promise<void> {
        try {
            await fn();
        } catch (err) {
            console.warn(`[cache] ${errorMessage(err)}`);
        }
    }

    // =========================================================================
    // Writing
    // =========================================================================

    private async deleteData(datasourceId: string): Promise<boolean> {
        const res = await this.transport.execute({
            url: `${this.gateway}/data/${datasourceId}`,
            method: 'DELETE',
            headers: this.headers,
            timeoutMs: this.config.readTimeoutMs,
        });
        await validateResponse(res);
        return true;
    }

    private async writeTable(
        datasourceId: string,
        bytes: Uint8Array,
        options: { append?: string; overwrite: boolean }
    ): Promise<void> {
        const headers: Record<string, string> = { 'Content-Type': TRANSFER_FORMAT, ...this.headers };
        if (!options.overwrite && options.append) headers['X-Append'] = options.append;
        const res = await this.transport.execute({
            url: `${this.gateway}/data/${datasourceId}`,
            method: options.overwrite ? 'PUT' : 'PATCH',
            body: bytes,
            headers,
            timeoutMs: this.config.writeTimeoutMs,
        });
        await validateResponse(res);
    }

    /**
     * Write data and/or metadata to a datasource. `data === null` updates
     * metadata only.
     */
    async writeDatasource(
        datasourceId: string,
        data: Container | null,
        options: WriteOptions = {}
    ): Promise<DatasourceSnapshot> {
        if (!DATASOURCE_ID_PATTERN.test(datasourceId)) {
            throw new MeshWriteError(
                'Datasource ID must only contain lowercase letters, numbers, dashes and underscores'
            );
        }
        const { append, overwrite: requestedOverwrite = false, crs, ...properties } = options;
        const { schema: _schema, driver, ...overlay } = properties;
        const draft = newDatasource(datasourceId, {
            ...properties,
            driver: driver ?? (data ? DRIVERS[data.kind] : undefined),
        });

        const existing = await this.findDatasource(datasourceId);
        const overwrite = requestedOverwrite || existing === null;
        let ds: DatasourceSnapshot = existing ?? draft;
        let exists = existing !== null;

        if (existing && overwrite) {
            try {
                await this.deleteData(datasourceId);
            } catch (err) {
                throw new MeshWriteError('Cannot delete existing datasource', { cause: err });
            }
            exists = false;
            ds = draft;
        }

        if (data !== null) {
            try {
                if (data.kind === 'dataset') {
                    const outcome = await withSession(
                        this.sessions,
                        (session) => {
                            const store = this.openChunkStore(datasourceId, session, { api: 'zarr', nocache: true });
                            const writer = new AppendWriter(store, (id) => this.findDatasource(id));
                            return writer.write({ datasourceId, data, append, overwrite });
                        },
                        { finaliseWrite: true }
                    );
                    ds = withProperties(ds, { schema: outcome.datasource.schema });
                } else {
                    await this.writeTable(datasourceId, encodeTable(data), { append, overwrite });
                }
                exists = true;
            } catch (err) {
                if (err instanceof MeshWriteError) throw err;
                throw new MeshWriteError(errorMessage(err), { cause: err });
            }
        }
        ds = withProperties(ds, { ...overlay, phase: 'detailed' });
        if (!append && data !== null) {
            ds = guessProperties(ds, data);
        }
        if (crs !== undefined) {
            const attr = crsAttr(crs);
            if (attr !== null) {
                ds = withProperties(ds, { schema: { ...ds.schema, attrs: { ...ds.schema.attrs, crs: attr } } });
            }
        }
        const bad = checkCoordinates(ds);
        if (bad.length > 0) {
            throw new MeshWriteError(`Coordinates [${bad.join(', ')}] not found in data`);
        }
        if (!ds.geom) {
            console.warn('[connector] Geometry not set for datasource, will have a default geometry of Point(0,0)');
        }

        try {
            await this.metadataWrite(ds, exists);
        } catch (err) {
            throw new MeshWriteError(`Cannot register datasource ${datasourceId}: ${errorMessage(err)}`, { cause: err });
        }
        return ds;
    }

    /**
     * Update metadata properties. Driver settings and schema are not
     * updatable and are ignored.
     */
    async updateMetadata(datasourceId: string, properties: DatasourceProperties): Promise<DatasourceSnapshot> {
        const ds = await this.getDatasource(datasourceId);
        const { driver, driverArgs, schema: _schema, ...rest } = properties;
        if (driver !== undefined) console.warn('[connector] driver is not an updatable property of a datasource');
        if (driverArgs !== undefined) console.warn('[connector] driverArgs is not an updatable property of a datasource');
        const updated = withProperties(ds, rest);
        await this.metadataWrite(updated, true);
        return updated;
    }

    async deleteDatasource(datasourceId: string): Promise<boolean> {
        return this.deleteData(datasourceId);
    }
}
