import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { strToU8, unzipSync, zipSync } from 'fflate';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { CACHE_EXTENSIONS, LocalResultCache, packDataset, unpackDataset } from '../cache';
import { CacheError } from '../errors';
import { createDataset } from '../dataset';
import { StrictTestLockProvider } from '../locks';
import { createQuery, queryHash } from '../query';
import { createGeoTable, createTable, encodeTable } from '../tabular';
import type { ArrayDataset } from '../types';

const query = createQuery({ datasource: 'wave', variables: ['hs'] });

function grid(): ArrayDataset {
    return createDataset({
        coords: { time: { dims: ['time'], data: [0, 1, 2] } },
        dataVars: { hs: { dims: ['time'], data: [1.5, 2.5, 3.5], attrs: { units: 'm' } } },
    });
}

async function backdate(file: string, seconds: number): Promise<void> {
    const past = new Date(Date.now() - seconds * 1000);
    await fs.utimes(file, past, past);
}

async function exists(file: string): Promise<boolean> {
    return fs.stat(file).then(
        () => true,
        () => false
    );
}

describe('LocalResultCache', () => {
    let dir: string;
    let cache: LocalResultCache;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mesh-cache-'));
        cache = new LocalResultCache({ cacheDir: dir, cacheTimeoutS: 600, lockTimeoutS: 60, pollIntervalMs: 5 });
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('addresses entries by the SHA-224 of the query', () => {
        const p = cache.cachePath(query);
        expect(path.dirname(p)).toBe(dir);
        expect(path.basename(p)).toBe(queryHash(query));
        expect(path.basename(p)).toMatch(/^[0-9a-f]{56}$/);
    });

    it('creates and removes the lock file', async () => {
        const lockFile = `${cache.cachePath(query)}.lock`;
        await cache.lock(query);
        expect(await exists(lockFile)).toBe(true);
        expect(await cache.locked(query)).toBe(true);

        await cache.unlock(query);
        expect(await exists(lockFile)).toBe(false);
        expect(await cache.locked(query)).toBe(false);
    });

    it('treats an expired lock as released without touching it', async () => {
        const lockFile = `${cache.cachePath(query)}.lock`;
        await cache.lock(query);
        await backdate(lockFile, 120);
        expect(await cache.locked(query)).toBe(false);

        await cache.lock(query);
        expect(await cache.locked(query)).toBe(false);

        await cache.unlock(query);
        expect(await exists(lockFile)).toBe(true);
    });

    it('makes a second cache on the same directory wait for the writer', async () => {
        const writer = new LocalResultCache({ cacheDir: dir, pollIntervalMs: 5 });
        const reader = new LocalResultCache({ cacheDir: dir, pollIntervalMs: 5 });
        const table = createTable([{ station: 'a', value: 1.25 }]);

        await writer.lock(query);
        let settled = false;
        const pending = reader.get(query).then((result) => {
            settled = true;
            return result;
        });

        await writer.put(query, table);
        await new Promise((resolve) => setTimeout(resolve, 30));
        expect(settled).toBe(false);

        await writer.unlock(query);
        expect(await pending).toEqual(table);
        expect(await exists(`${cache.cachePath(query)}.lock`)).toBe(false);
    });

    it('gives up on a locked entry once the wait budget is spent', async () => {
        await cache.put(query, createTable([{ a: 1 }]));
        await cache.lock(query);
        expect(await cache.get(query, 0)).toBeNull();
        expect(await cache.get(query, 0.02)).toBeNull();
    });

    it('round trips labeled arrays', async () => {
        await cache.put(query, grid());
        expect(CACHE_EXTENSIONS.dataset).toBe('.zarr.zip');
        expect(await exists(cache.cachePath(query) + CACHE_EXTENSIONS.dataset)).toBe(true);

        const back = await cache.get(query);
        if (back?.kind !== 'dataset') throw new Error('expected a dataset');
        expect(Array.from(back.dataVars.hs.data)).toEqual([1.5, 2.5, 3.5]);
        expect(back.dataVars.hs.attrs).toEqual({ units: 'm' });
        expect(Array.from(back.coords.time.data)).toEqual([0, 1, 2]);
    });

    it('round trips tables and geo-tables under their own extensions', async () => {
        const table = createTable([{ station: 'a', value: 1.25 }]);
        await cache.put(query, table);
        expect(await exists(cache.cachePath(query) + '.pq')).toBe(true);
        expect(await cache.get(query)).toEqual(table);

        const other = createQuery({ datasource: 'sites' });
        const geo = createGeoTable([{ name: 'x' }], [{ type: 'Point', coordinates: [1, 2] }]);
        await cache.put(other, geo);
        expect(await exists(cache.cachePath(other) + '.gpq')).toBe(true);
        expect(await cache.get(other)).toEqual(geo);
    });

    it('deletes a stale entry and reports a miss', async () => {
        await cache.put(query, createTable([{ a: 1 }]));
        const file = cache.cachePath(query) + '.pq';
        await backdate(file, 700);

        expect(await cache.get(query)).toBeNull();
        expect(await exists(file)).toBe(false);
    });

    it('misses on an unreadable entry', async () => {
        await fs.writeFile(cache.cachePath(query) + '.pq', 'not parquet');
        expect(await cache.get(query)).toBeNull();
    });

    it('misses when nothing is cached', async () => {
        expect(await cache.get(query)).toBeNull();
    });

    it('refuses data it cannot serialize', async () => {
        await expect(cache.put(query, { rows: [] })).rejects.toThrow(new TypeError('Unsupported data type'));
        await expect(cache.put(query, 'text')).rejects.toThrow(TypeError);
    });

    it('moves a downloaded file into place', async () => {
        const table = createTable([{ a: 7 }]);
        const tmp = path.join(dir, 'download.part');
        await fs.writeFile(tmp, encodeTable(table));

        await cache.copy(query, tmp, CACHE_EXTENSIONS.dataframe);
        expect(await exists(tmp)).toBe(false);
        expect(await cache.get(query)).toEqual(table);
    });

    it('serializes concurrent writers of one entry', async () => {
        const locks = new StrictTestLockProvider();
        const shared = new LocalResultCache({ cacheDir: dir, locks });
        const tables = [1, 2, 3, 4, 5].map((n) => createTable([{ n }]));

        await Promise.all(tables.map((t) => shared.put(query, t)));

        expect(locks.overlapCount).toBe(0);
        const back = await shared.get(query);
        expect(tables).toContainEqual(back);
        const leftovers = (await fs.readdir(dir)).filter((f) => f.endsWith('.tmp'));
        expect(leftovers).toEqual([]);
    });
});

describe('packDataset', () => {
    it('writes each zarr key as a zip entry', async () => {
        const bytes = await packDataset(grid());
        expect(Array.from(bytes.subarray(0, 4))).toEqual([0x50, 0x4b, 0x03, 0x04]);

        const files = unzipSync(bytes);
        expect(Object.keys(files)).toEqual(
            expect.arrayContaining(['.zgroup', '.zattrs', '.zmetadata', 'hs/.zarray', 'hs/.zattrs', 'time/.zarray'])
        );
        expect(JSON.parse(new TextDecoder().decode(files['.zgroup']))).toEqual({ zarr_format: 2 });
    });
});

describe('unpackDataset', () => {
    it('rejects bytes that are not a zip archive', async () => {
        await expect(unpackDataset(new Uint8Array([1, 2, 3]))).rejects.toBeInstanceOf(CacheError);
    });

    it('rejects an archive without a zarr group', async () => {
        const bytes = zipSync({ 'notes.txt': strToU8('hello') });
        await expect(unpackDataset(bytes)).rejects.toThrow(new CacheError('Cached dataset has no zarr group'));
    });
});
