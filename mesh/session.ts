/**
 * Mesh Client: Session Lifecycle
 *
 * A session scopes one logical operation (a staged query, a lazy read, a
 * write). Services without a session API get a locally synthesised one.
 */
/* eslint-disable no-console */

import { z } from 'zod';
import { MeshError, MeshSessionError } from './errors';
import type { RetryTransport } from './transport';
import type { SessionInfo } from './types';

export const SESSION_HEADER = 'X-SESSION-ID';

const sessionResponseSchema = z.object({
    id: z.string(),
    user: z.string(),
    creation_time: z.coerce.date(),
    end_time: z.coerce.date(),
    write: z.boolean(),
    allow_multiwrite: z.boolean().default(false),
    verified: z.boolean().default(false),
});

export class Session implements SessionInfo {
    readonly id: string;
    readonly user: string;
    readonly creationTime: Date;
    readonly endTime: Date;
    readonly write: boolean;
    readonly allowMultiwrite: boolean;
    readonly verified: boolean;
    readonly legacy: boolean;
    private closed = false;

    constructor(info: SessionInfo) {
        this.id = info.id;
        this.user = info.user;
        this.creationTime = info.creationTime;
        this.endTime = info.endTime;
        this.write = info.write;
        this.allowMultiwrite = info.allowMultiwrite;
        this.verified = info.verified;
        this.legacy = info.legacy;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /** Mark closed; returns false if it already was. */
    markClosed(): boolean {
        if (this.closed) return false;
        this.closed = true;
        return true;
    }

    /** Copy of `headers` with the session header overlaid. */
    addHeader(headers: Record<string, string>): Record<string, string> {
        return { ...headers, [SESSION_HEADER]: this.id };
    }
}

export interface SessionManagerOptions {
    transport: RetryTransport;
    gateway: string;
    headers: Record<string, string>;
    /** Service has no session API. */
    legacy: boolean;
    durationS?: number;
    readTimeoutMs?: number | null;
}

export interface AcquireOptions {
    allowMultiwrite?: boolean;
}

export class SessionManager {
    private readonly transport: RetryTransport;
    private readonly gateway: string;
    private readonly headers: Record<string, string>;
    private readonly durationS: number | undefined;
    private readonly readTimeoutMs: number | null | undefined;
    readonly legacy: boolean;

    constructor(options: SessionManagerOptions) {
        this.transport = options.transport;
        this.gateway = options.gateway;
        this.headers = options.headers;
        this.legacy = options.legacy;
        this.durationS = options.durationS;
        this.readTimeoutMs = options.readTimeoutMs;
    }

    async acquire(options: AcquireOptions = {}): Promise<Session> {
        const allowMultiwrite = options.allowMultiwrite ?? false;
        if (this.legacy) {
            const now = new Date();
            return new Session({
                id: 'dummy_session',
                user: 'dummy_user',
                creationTime: now,
                endTime: new Date(now.getTime() + (this.durationS ?? 3600) * 1000),
                write: false,
                allowMultiwrite,
                verified: false,
                legacy: true,
            });
        }

        try {
            const res = await this.transport.execute({
                url: `${this.gateway}/session/`,
                headers: { ...this.headers, 'Cache-Control': 'no-store' },
                params: { duration: this.durationS, allow_multiwrite: allowMultiwrite },
                timeoutMs: this.readTimeoutMs,
            });
            if (res.status !== 200) {
                throw new MeshSessionError(`Failed to create session with error: ${await res.text()}`);
            }
            return parseSession(await res.json());
        } catch (err) {
            throw wrap(err, 'Error when acquiring datamesh session');
        }
    }

    /** Re-attach to a session created elsewhere. */
    async fromSessionId(sessionId: string): Promise<Session> {
        if (this.legacy) {
            throw new MeshSessionError('Cannot acquire session from id when the service has no session API');
        }
        try {
            const res = await this.transport.execute({
                url: `${this.gateway}/session/${encodeURIComponent(sessionId)}`,
                headers: this.headers,
                timeoutMs: this.readTimeoutMs,
            });
            if (res.status !== 200) {
                throw new MeshSessionError(`Failed to retrieve session ${sessionId} with error: ${await res.text()}`);
            }
            return parseSession(await res.json());
        } catch (err) {
            throw wrap(err, 'Error when acquiring datamesh session');
        }
    }

    /**
     * Release a session. Idempotent. A failure is fatal only when a write
     * was waiting on finalisation.
     */
    async close(session: Session, finaliseWrite = false): Promise<void> {
        if (!session.markClosed() || session.legacy) return;

        let res: Response;
        try {
            res = await this.transport.execute({
                url: `${this.gateway}/session/${encodeURIComponent(session.id)}`,
                method: 'DELETE',
                params: { finalise_write: finaliseWrite },
                headers: session.addHeader(this.headers),
                timeoutMs: this.readTimeoutMs,
            });
        } catch (err) {
            if (finaliseWrite) throw wrap(err, 'Failed to finalise write with error');
            console.warn(`[session] Failed to close session with error: ${err instanceof Error ? err.message : String(err)}`);
            return;
        }
        if (res.status !== 204) {
            const text = await res.text();
            if (finaliseWrite) {
                throw new MeshSessionError(`Failed to finalise write with error: ${text}`);
            }
            console.warn(`[session] Failed to close session with error: ${text}`);
        }
    }
}

export interface WithSessionOptions extends AcquireOptions {
    /** Finalise the write when `fn` succeeds. */
    finaliseWrite?: boolean;
}

/**
 * Scoped acquisition: the session is released on every exit path.
 * On error the session is closed without finalisation and the original
 * error is rethrown.
 */
export async function withSession<T>(
    manager: SessionManager,
    fn: (session: Session) => Promise<T>,
    options: WithSessionOptions = {}
): Promise<T> {
    const session = await manager.acquire(options);
    let result: T;
    try {
        result = await fn(session);
    } catch (err) {
        try {
            await manager.close(session, false);
        } catch (closeErr) {
            console.warn(`[session] Failed to release session ${session.id}: ${String(closeErr)}`);
        }
        throw err;
    }
    await manager.close(session, options.finaliseWrite ?? false);
    return result;
}

function parseSession(body: unknown): Session {
    const parsed = sessionResponseSchema.safeParse(body);
    if (!parsed.success) {
        throw new MeshSessionError(`Malformed session response: ${parsed.error.message}`);
    }
    const s = parsed.data;
    return new Session({
        id: s.id,
        user: s.user,
        creationTime: s.creation_time,
        endTime: s.end_time,
        write: s.write,
        allowMultiwrite: s.allow_multiwrite,
        verified: s.verified,
        legacy: false,
    });
}

function wrap(err: unknown, prefix: string): MeshError {
    if (err instanceof MeshSessionError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new MeshSessionError(`${prefix}: ${message}`, { cause: err });
}
