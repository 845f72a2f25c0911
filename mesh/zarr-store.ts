/**
 * Mesh Client: Chunk Store Adapter for the Array Runtime
 *
 * zarrita addresses keys as absolute paths and expects `undefined` for a
 * missing key; the chunk stores use bare keys and throw ChunkNotFoundError.
 */

import type { AsyncMutable } from '@zarrita/storage';
import { ChunkNotFoundError } from './errors';
import type { ChunkStore } from './chunk-store';

type AbsolutePath = `/${string}`;

export class ZarrStoreAdapter implements AsyncMutable {
    constructor(readonly store: ChunkStore) {}

    async get(key: AbsolutePath): Promise<Uint8Array | undefined> {
        try {
            return await this.store.get(key.slice(1));
        } catch (err) {
            if (err instanceof ChunkNotFoundError) return undefined;
            throw err;
        }
    }

    async set(key: AbsolutePath, value: Uint8Array): Promise<void> {
        await this.store.set(key.slice(1), value);
    }
}
