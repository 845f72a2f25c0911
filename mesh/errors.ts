/**
 * Mesh Client: Error Taxonomy
 *
 * Every fatal condition raised by this package is one of these classes.
 * Lower layers throw them; upper layers let them pass through unchanged.
 */

export class MeshError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Transport failure, exhausted retries or an unusable server reply. */
export class MeshConnectError extends MeshError {}

/** Metadata lookup answered 404. */
export class DatasourceNotFoundError extends MeshConnectError {}

/** The service rejected a query; the message is the server's detail verbatim. */
export class MeshQueryError extends MeshError {}

/** A write could not be applied. Never retried. */
export class MeshWriteError extends MeshError {}

export class MeshSessionError extends MeshError {}

export class CacheError extends MeshError {}

/**
 * Absent chunk. Not a failure: the array runtime reads it as "use fill value".
 */
export class ChunkNotFoundError extends MeshError {
    readonly key: string;

    constructor(key: string) {
        super(`Chunk not found: ${key}`);
        this.key = key;
    }
}

/** Best-effort extraction of a `detail` field from an error body. */
export function extractDetail(text: string): string | null {
    try {
        const body: unknown = JSON.parse(text);
        if (body && typeof body === 'object' && 'detail' in body) {
            const detail = body.detail;
            if (typeof detail === 'string') return detail;
            return JSON.stringify(detail);
        }
    } catch {
        return null;
    }
    return null;
}
