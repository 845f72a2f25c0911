/**
 * Mesh Client: Retry Transport
 *
 * Every HTTP call to the service goes through here. Network failures,
 * timeouts and 502 replies are retried with exponential backoff; any other
 * status is handed back to the caller uninterpreted.
 */

import createDebug from 'debug';
import { MeshConnectError } from './errors';

const debug = createDebug('mesh:transport');

export type ParamValue = string | number | boolean | null | undefined;

export interface RequestSpec {
    url: string;
    method?: string;
    headers?: Record<string, string>;
    params?: Record<string, ParamValue>;
    body?: string | Uint8Array;
    /** Read timeout; null waits forever. Falls back to the transport default. */
    timeoutMs?: number | null;
    connectTimeoutMs?: number | null;
    retries?: number;
}

export interface RetryTransportOptions {
    retries?: number;
    badGatewayCooldownMs?: number;
    connectTimeoutMs?: number | null;
    readTimeoutMs?: number | null;
    /** Backoff base in milliseconds (delay = base * 2^attempt). */
    backoffBaseMs?: number;
    sleep?: (ms: number) => Promise<void>;
    fetch?: typeof fetch;
}

/**
 * Sleeps for the specified duration.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the next attempt: base * 2^attempt.
 */
export function calculateDelay(attempt: number, baseDelayMs: number): number {
    return baseDelayMs * Math.pow(2, attempt);
}

/**
 * The service parses booleans in query strings as `True`/`False`.
 */
export function buildUrl(url: string, params?: Record<string, ParamValue>): string {
    if (!params) return url;
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
        if (value === undefined || value === null) continue;
        if (typeof value === 'boolean') search.append(key, value ? 'True' : 'False');
        else search.append(key, String(value));
    }
    const qs = search.toString();
    if (!qs) return url;
    return url + (url.includes('?') ? '&' : '?') + qs;
}

class BadGatewayError extends Error {
    constructor(url: string) {
        super(`502 Bad Gateway from ${url}`);
        this.name = 'BadGatewayError';
    }
}

export class RetryTransport {
    readonly retries: number;
    private readonly badGatewayCooldownMs: number;
    private readonly connectTimeoutMs: number | null;
    private readonly readTimeoutMs: number | null;
    private readonly backoffBaseMs: number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly fetchImpl: typeof fetch | undefined;

    constructor(options: RetryTransportOptions = {}) {
        this.retries = options.retries ?? 8;
        this.badGatewayCooldownMs = options.badGatewayCooldownMs ?? 30_000;
        this.connectTimeoutMs = options.connectTimeoutMs === undefined ? 3050 : options.connectTimeoutMs;
        this.readTimeoutMs = options.readTimeoutMs === undefined ? 10_000 : options.readTimeoutMs;
        this.backoffBaseMs = options.backoffBaseMs ?? 100;
        this.sleep = options.sleep ?? sleep;
        this.fetchImpl = options.fetch;
    }

    /**
     * Perform the request, retrying transport failures.
     * Throws MeshConnectError once the attempts are spent.
     */
    async execute(spec: RequestSpec): Promise<Response> {
        const url = buildUrl(spec.url, spec.params);
        const method = spec.method ?? 'GET';
        const attempts = Math.max(1, spec.retries ?? this.retries);
        const timeoutMs = this.totalTimeout(spec);
        // Resolved per call so a stubbed global fetch is picked up.
        const doFetch = this.fetchImpl ?? fetch;

        let lastError: unknown = null;
        for (let attempt = 0; attempt < attempts; attempt++) {
            try {
                const response = await doFetch(url, {
                    method,
                    headers: spec.headers,
                    body: spec.body,
                    signal: timeoutMs === null ? undefined : AbortSignal.timeout(timeoutMs),
                });
                if (response.status === 502) {
                    debug('%s %s: bad gateway, cooling down %dms', method, url, this.badGatewayCooldownMs);
                    await this.sleep(this.badGatewayCooldownMs);
                    throw new BadGatewayError(url);
                }
                return response;
            } catch (err) {
                lastError = err;
                const delay = calculateDelay(attempt, this.backoffBaseMs);
                debug('%s %s failed (attempt %d/%d): %s', method, url, attempt + 1, attempts, describe(err));
                await this.sleep(delay);
            }
        }

        throw new MeshConnectError(
            `Failed to connect to ${url} after ${attempts} retries with error: ${describe(lastError)}`,
            { cause: lastError }
        );
    }

    private totalTimeout(spec: RequestSpec): number | null {
        const connect = spec.connectTimeoutMs === undefined ? this.connectTimeoutMs : spec.connectTimeoutMs;
        const read = spec.timeoutMs === undefined ? this.readTimeoutMs : spec.timeoutMs;
        if (read === null) return null;
        return (connect ?? 0) + read;
    }
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
