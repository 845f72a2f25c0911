/**
 * Mesh Client: In-Memory Chunk Store
 *
 * Same contract as the remote store. Used to stage arrays for the local
 * cache and as a test double.
 */

import { ChunkNotFoundError } from './errors';
import type { ChunkStore } from './chunk-store';

export class MemoryChunkStore implements ChunkStore {
    readonly entries = new Map<string, Uint8Array>();

    constructor(initial?: Iterable<[string, Uint8Array]>) {
        if (initial) {
            for (const [key, value] of initial) this.entries.set(key, value);
        }
    }

    async get(key: string): Promise<Uint8Array> {
        const value = this.entries.get(key);
        if (!value) throw new ChunkNotFoundError(key);
        return value;
    }

    async contains(key: string): Promise<boolean> {
        return this.entries.has(key);
    }

    async set(key: string, value: Uint8Array): Promise<void> {
        this.entries.set(key, new Uint8Array(value));
    }

    async delete(key: string): Promise<void> {
        if (key === '') {
            this.entries.clear();
            return;
        }
        this.entries.delete(key);
    }

    async keys(): Promise<string[]> {
        const top = new Set<string>();
        for (const key of this.entries.keys()) top.add(key.split('/')[0]);
        return [...top].sort();
    }

    async clear(): Promise<void> {
        this.entries.clear();
    }
}
