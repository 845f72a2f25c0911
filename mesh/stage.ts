/**
 * Mesh Client: Query Staging
 *
 * First half of the two-phase protocol: the service resolves the query and
 * reports what would be transferred, without transferring it.
 */

import { z } from 'zod';
import { extractDetail, MeshConnectError, MeshQueryError } from './errors';
import { serializeQuery } from './query';
import type { Session } from './session';
import type { RetryTransport } from './transport';
import type { Query, Stage } from './types';

const stageResponseSchema = z.object({
    qhash: z.string().min(1),
    formats: z.array(z.string()).default([]),
    size: z.number().nonnegative().default(0),
    dlen: z.number().nonnegative().default(0),
    coords: z.record(z.string()).default({}),
    container: z.enum(['dataset', 'geodataframe', 'dataframe']),
});

export interface StageNegotiatorOptions {
    transport: RetryTransport;
    gateway: string;
    headers: Record<string, string>;
    timeoutMs?: number | null;
}

export class StageNegotiator {
    constructor(private readonly options: StageNegotiatorOptions) {}

    /**
     * Stage a query. Resolves to null when nothing matches (HTTP 204).
     */
    async stage(query: Query, session: Session): Promise<Stage | null> {
        const { transport, gateway, headers, timeoutMs } = this.options;
        const res = await transport.execute({
            url: `${gateway}/oceanql/stage/`,
            method: 'POST',
            body: serializeQuery(query),
            headers: session.addHeader({ ...headers, 'Content-Type': 'application/json' }),
            timeoutMs,
        });

        if (res.status >= 400) {
            const text = await res.text();
            const detail = extractDetail(text);
            if (detail !== null) throw new MeshQueryError(detail);
            throw new MeshConnectError(`Datamesh server error: ${text}`);
        }
        if (res.status === 204) {
            return null;
        }

        const parsed = stageResponseSchema.safeParse(await res.json());
        if (!parsed.success) {
            throw new MeshConnectError(`Malformed stage response: ${parsed.error.message}`);
        }
        return Object.freeze({ query, ...parsed.data });
    }
}
