/**
 * Mesh Client: Local Result Cache
 *
 * Content-addressed query results on the local filesystem:
 *
 *   {cacheDir}/{sha224(query)}.zarr.zip    labeled arrays (zarr group in a stored zip)
 *   {cacheDir}/{sha224(query)}.gpq         geo-tables (GeoParquet)
 *   {cacheDir}/{sha224(query)}.pq          tables (Parquet)
 *   {cacheDir}/{sha224(query)}.lock        writer in progress
 *
 * Artifacts only ever appear at their final path by rename, so a reader
 * never sees a partial file. The lock file is advisory: an expired lock
 * counts as released, but only its owner ever deletes it.
 */

import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import createDebug from 'debug';
import { unzipSync, zipSync } from 'fflate';
import { CacheError } from './errors';
import { InProcessLockProvider, type LockProvider } from './locks';
import { MemoryChunkStore } from './memory-store';
import { queryHash } from './query';
import { sleep } from './transport';
import { decodeTable, encodeTable } from './tabular';
import { readDataset, writeDataset } from './zarr-layout';
import type { ArrayDataset, Container, Query } from './types';

const debug = createDebug('mesh:cache');

export const CACHE_EXTENSIONS = {
    dataset: '.zarr.zip',
    geodataframe: '.gpq',
    dataframe: '.pq',
} as const;

export type CacheExtension = (typeof CACHE_EXTENSIONS)[keyof typeof CACHE_EXTENSIONS];

/** Lookup order when reading. */
const READ_ORDER: readonly CacheExtension[] = [CACHE_EXTENSIONS.dataset, CACHE_EXTENSIONS.geodataframe, CACHE_EXTENSIONS.dataframe];

export interface LocalResultCacheOptions {
    cacheDir: string;
    /** Entry time-to-live in seconds. */
    cacheTimeoutS?: number;
    /** Lock expiry in seconds. */
    lockTimeoutS?: number;
    pollIntervalMs?: number;
    locks?: LockProvider;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}

async function mtimeMs(file: string): Promise<number | null> {
    try {
        return (await fs.stat(file)).mtimeMs;
    } catch (err) {
        if (isErrnoException(err) && err.code === 'ENOENT') return null;
        throw err;
    }
}

// =============================================================================
// Array Packing
// =============================================================================

/**
 * Zip a dataset's zarr store, one uncompressed entry per key, in the
 * layout zarr zip stores read.
 */
export async function packDataset(ds: ArrayDataset): Promise<Uint8Array> {
    const store = new MemoryChunkStore();
    await writeDataset(store, ds);
    return zipSync(Object.fromEntries(store.entries), { level: 0 });
}

export async function unpackDataset(bytes: Uint8Array): Promise<ArrayDataset> {
    let files: Record<string, Uint8Array>;
    try {
        files = unzipSync(bytes);
    } catch (err) {
        throw new CacheError(`Cached dataset is not a zip archive: ${err instanceof Error ? err.message : String(err)}`, {
            cause: err,
        });
    }
    const store = new MemoryChunkStore();
    for (const [key, value] of Object.entries(files)) {
        if (key.endsWith('/')) continue;
        store.entries.set(key, value);
    }
    if (!store.entries.has('.zgroup')) throw new CacheError('Cached dataset has no zarr group');
    return readDataset(store);
}

async function encodeContainer(data: Container): Promise<{ bytes: Uint8Array; ext: CacheExtension }> {
    switch (data.kind) {
        case 'dataset':
            return { bytes: await packDataset(data), ext: CACHE_EXTENSIONS.dataset };
        case 'geodataframe':
            return { bytes: encodeTable(data), ext: CACHE_EXTENSIONS.geodataframe };
        case 'dataframe':
            return { bytes: encodeTable(data), ext: CACHE_EXTENSIONS.dataframe };
    }
}

async function decodeContainer(bytes: Uint8Array, ext: CacheExtension): Promise<Container> {
    if (ext === CACHE_EXTENSIONS.dataset) return unpackDataset(bytes);
    const table = await decodeTable(bytes);
    const expected = ext === CACHE_EXTENSIONS.geodataframe ? 'geodataframe' : 'dataframe';
    if (table.kind !== expected) throw new CacheError(`Cached ${ext} entry decoded as ${table.kind}`);
    return table;
}

function hasKind(data: unknown): data is Container {
    if (typeof data !== 'object' || data === null || !('kind' in data)) return false;
    return data.kind === 'dataset' || data.kind === 'geodataframe' || data.kind === 'dataframe';
}

// =============================================================================
// Cache
// =============================================================================

export class LocalResultCache {
    readonly cacheDir: string;
    readonly cacheTimeoutS: number;
    readonly lockTimeoutS: number;
    private readonly pollIntervalMs: number;
    private readonly locks: LockProvider;

    constructor(options: LocalResultCacheOptions) {
        this.cacheDir = options.cacheDir;
        this.cacheTimeoutS = options.cacheTimeoutS ?? 600;
        this.lockTimeoutS = options.lockTimeoutS ?? 60;
        this.pollIntervalMs = options.pollIntervalMs ?? 100;
        this.locks = options.locks ?? new InProcessLockProvider();
    }

    /** Deterministic path without extension. */
    cachePath(query: Query): string {
        return path.join(this.cacheDir, queryHash(query));
    }

    private lockPath(query: Query): string {
        return `${this.cachePath(query)}.lock`;
    }

    /**
     * Create the lock file if absent. An existing one, live or expired, is
     * left as it is.
     */
    async lock(query: Query): Promise<void> {
        await fs.mkdir(this.cacheDir, { recursive: true });
        try {
            const handle = await fs.open(this.lockPath(query), 'wx');
            await handle.close();
        } catch (err) {
            if (!isErrnoException(err) || err.code !== 'EEXIST') throw err;
            debug('lock on %s already held', queryHash(query));
        }
    }

    async locked(query: Query): Promise<boolean> {
        const mtime = await mtimeMs(this.lockPath(query));
        return mtime !== null && mtime + this.lockTimeoutS * 1000 > Date.now();
    }

    async unlock(query: Query): Promise<void> {
        if (!(await this.locked(query))) return;
        await fs.rm(this.lockPath(query), { force: true });
    }

    /**
     * Cached result, or null when absent, stale, unreadable, or still
     * locked after `timeoutS`. Never throws.
     */
    async get(query: Query, timeoutS: number = this.lockTimeoutS): Promise<Container | null> {
        try {
            let budgetMs = timeoutS * 1000;
            while (await this.locked(query)) {
                if (budgetMs <= 0) {
                    debug('gave up waiting for lock on %s', queryHash(query));
                    return null;
                }
                await sleep(this.pollIntervalMs);
                budgetMs -= this.pollIntervalMs;
            }
            return await this.locks.withLock(queryHash(query), () => this.read(query));
        } catch (err) {
            debug('cache read failed: %s', err instanceof Error ? err.message : String(err));
            return null;
        }
    }

    private async read(query: Query): Promise<Container | null> {
        const base = this.cachePath(query);
        for (const ext of READ_ORDER) {
            const file = base + ext;
            const mtime = await mtimeMs(file);
            if (mtime === null) continue;
            if (mtime + this.cacheTimeoutS * 1000 < Date.now()) {
                debug('removing stale entry %s', file);
                await fs.rm(file, { force: true });
                return null;
            }
            return decodeContainer(new Uint8Array(await fs.readFile(file)), ext);
        }
        return null;
    }

    /**
     * Serialize a result into the cache. Unknown containers are a TypeError.
     */
    async put(query: Query, data: unknown): Promise<void> {
        if (!hasKind(data)) {
            throw new TypeError('Unsupported data type');
        }
        const { bytes, ext } = await encodeContainer(data);
        await this.locks.withLock(queryHash(query), async () => {
            await fs.mkdir(this.cacheDir, { recursive: true });
            const tmp = path.join(this.cacheDir, `.${randomUUID()}.tmp`);
            await fs.writeFile(tmp, bytes);
            await fs.rename(tmp, this.cachePath(query) + ext);
        });
    }

    /**
     * Move a file produced out-of-band (e.g. a download) into the cache.
     */
    async copy(query: Query, tmpPath: string, ext: CacheExtension): Promise<void> {
        await this.locks.withLock(queryHash(query), async () => {
            await fs.mkdir(this.cacheDir, { recursive: true });
            const target = this.cachePath(query) + ext;
            try {
                await fs.rename(tmpPath, target);
            } catch (err) {
                if (!isErrnoException(err) || err.code !== 'EXDEV') throw err;
                // Different filesystem: copy beside the target, then rename.
                const staged = path.join(this.cacheDir, `.${randomUUID()}.tmp`);
                await fs.copyFile(tmpPath, staged);
                await fs.rename(staged, target);
                await fs.rm(tmpPath, { force: true });
            }
        });
    }
}
