/**
 * Mesh Client: Configuration
 *
 * One immutable value object, built once per Connector and handed down to
 * every component. Environment variables are parsed here and nowhere else.
 */

import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

export const DEFAULT_SERVICE = 'https://datamesh.oceanum.io';
export const CLIENT_NAME = 'oceanum_python';
export const CLIENT_VERSION = '0.17.0';

export type MeshConfig = Readonly<{
    service: string;
    /** Unset means "probe the service to find it". */
    gateway: string | null;
    token: string | null;
    user: string | null;

    // Timeouts in milliseconds; null disables the timeout.
    connectTimeoutMs: number | null;
    readTimeoutMs: number | null;
    stageReadTimeoutMs: number | null;
    downloadTimeoutMs: number | null;
    writeTimeoutMs: number | null;
    chunkReadTimeoutMs: number | null;
    chunkWriteTimeoutMs: number | null;
    listTimeoutMs: number | null;

    retries: number;
    badGatewayCooldownMs: number;
    queryRetries: number;

    sessionDurationS: number;

    cacheDir: string;
    cacheTimeoutS: number;
    lockTimeoutS: number;

    lazyThresholdBytes: number;
    rowLimit: number;
}>;

type Env = Record<string, string | undefined>;

const seconds = z.union([z.literal('None'), z.coerce.number().positive()]).optional();

const envSchema = z.object({
    DATAMESH_SERVICE: z.string().url().optional(),
    DATAMESH_GATEWAY: z.string().url().optional(),
    DATAMESH_TOKEN: z.string().min(1).optional(),
    DATAMESH_USER: z.string().min(1).optional(),
    DATAMESH_CONNECT_TIMEOUT: seconds,
    DATAMESH_READ_TIMEOUT: seconds,
    DATAMESH_STAGE_READ_TIMEOUT: seconds,
    DATAMESH_DOWNLOAD_TIMEOUT: seconds,
    DATAMESH_WRITE_TIMEOUT: seconds,
    DATAMESH_CHUNK_READ_TIMEOUT: seconds,
    DATAMESH_CHUNK_WRITE_TIMEOUT: seconds,
    DATAMESH_RETRIES: z.coerce.number().int().min(0).optional(),
    DATAMESH_SESSION_DURATION: z.coerce.number().int().min(1).optional(),
    DATAMESH_CACHE_DIR: z.string().min(1).optional(),
    DATAMESH_LOCK_TIMEOUT: z.coerce.number().min(0).optional(),
});

function toMs(value: 'None' | number | undefined, defaultSeconds: number | null): number | null {
    if (value === 'None') return null;
    const s = value ?? defaultSeconds;
    return s === null ? null : Math.round(s * 1000);
}

/**
 * Read configuration from environment variables.
 * Throws on malformed values instead of silently falling back.
 */
export function loadMeshConfig(env: Env = process.env): MeshConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const name = issue ? issue.path.join('.') : 'environment';
        throw new Error(`Invalid ${name}: ${issue ? issue.message : parsed.error.message}`);
    }
    const raw = parsed.data;

    return Object.freeze({
        service: (raw.DATAMESH_SERVICE ?? DEFAULT_SERVICE).replace(/\/+$/, ''),
        gateway: raw.DATAMESH_GATEWAY ? raw.DATAMESH_GATEWAY.replace(/\/+$/, '') : null,
        token: raw.DATAMESH_TOKEN ?? null,
        user: raw.DATAMESH_USER ?? null,

        connectTimeoutMs: toMs(raw.DATAMESH_CONNECT_TIMEOUT, 3.05),
        readTimeoutMs: toMs(raw.DATAMESH_READ_TIMEOUT, 10),
        stageReadTimeoutMs: toMs(raw.DATAMESH_STAGE_READ_TIMEOUT, 900),
        downloadTimeoutMs: toMs(raw.DATAMESH_DOWNLOAD_TIMEOUT, 900),
        writeTimeoutMs: toMs(raw.DATAMESH_WRITE_TIMEOUT, null),
        chunkReadTimeoutMs: toMs(raw.DATAMESH_CHUNK_READ_TIMEOUT, 60),
        chunkWriteTimeoutMs: toMs(raw.DATAMESH_CHUNK_WRITE_TIMEOUT, 600),
        listTimeoutMs: 10_000,

        retries: raw.DATAMESH_RETRIES ?? 8,
        badGatewayCooldownMs: 30_000,
        queryRetries: 5,

        sessionDurationS: raw.DATAMESH_SESSION_DURATION ?? 3600,

        cacheDir: raw.DATAMESH_CACHE_DIR ?? path.join(os.tmpdir(), 'datamesh-cache'),
        cacheTimeoutS: 600,
        lockTimeoutS: raw.DATAMESH_LOCK_TIMEOUT ?? 60,

        lazyThresholdBytes: 1e9,
        rowLimit: 2_000_000,
    });
}

/**
 * Environment config with explicit overrides applied on top.
 */
export function resolveMeshConfig(overrides: Partial<MeshConfig> = {}, env: Env = process.env): MeshConfig {
    const defined = Object.fromEntries(
        Object.entries(overrides).filter(([, v]) => v !== undefined)
    );
    return Object.freeze({ ...loadMeshConfig(env), ...defined });
}
