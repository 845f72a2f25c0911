import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { DEFAULT_SERVICE, loadMeshConfig, resolveMeshConfig } from '../config';

describe('loadMeshConfig', () => {
    it('uses defaults for an empty environment', () => {
        const config = loadMeshConfig({});
        expect(config.service).toBe(DEFAULT_SERVICE);
        expect(config.gateway).toBeNull();
        expect(config.token).toBeNull();
        expect(config.connectTimeoutMs).toBe(3050);
        expect(config.readTimeoutMs).toBe(10_000);
        expect(config.stageReadTimeoutMs).toBe(900_000);
        expect(config.writeTimeoutMs).toBeNull();
        expect(config.retries).toBe(8);
        expect(config.sessionDurationS).toBe(3600);
        expect(config.cacheDir).toBe(path.join(os.tmpdir(), 'datamesh-cache'));
        expect(config.lockTimeoutS).toBe(60);
    });

    it('reads variables and converts seconds to milliseconds', () => {
        const config = loadMeshConfig({
            DATAMESH_SERVICE: 'https://mesh.example.org/',
            DATAMESH_TOKEN: 'test-secret',
            DATAMESH_READ_TIMEOUT: '2.5',
            DATAMESH_WRITE_TIMEOUT: '30',
            DATAMESH_RETRIES: '3',
            DATAMESH_SESSION_DURATION: '120',
        });
        expect(config.service).toBe('https://mesh.example.org');
        expect(config.token).toBe('test-secret');
        expect(config.readTimeoutMs).toBe(2500);
        expect(config.writeTimeoutMs).toBe(30_000);
        expect(config.retries).toBe(3);
        expect(config.sessionDurationS).toBe(120);
    });

    it('treats None as no timeout', () => {
        expect(loadMeshConfig({ DATAMESH_DOWNLOAD_TIMEOUT: 'None' }).downloadTimeoutMs).toBeNull();
    });

    it('rejects malformed values', () => {
        expect(() => loadMeshConfig({ DATAMESH_READ_TIMEOUT: 'soon' })).toThrow(/^Invalid DATAMESH_READ_TIMEOUT/);
        expect(() => loadMeshConfig({ DATAMESH_RETRIES: '-1' })).toThrow(/^Invalid DATAMESH_RETRIES/);
        expect(() => loadMeshConfig({ DATAMESH_SERVICE: 'not a url' })).toThrow(/^Invalid DATAMESH_SERVICE/);
    });

    it('returns a frozen object', () => {
        expect(Object.isFrozen(loadMeshConfig({}))).toBe(true);
    });
});

describe('resolveMeshConfig', () => {
    it('applies defined overrides over the environment', () => {
        const config = resolveMeshConfig(
            { token: 'override-token', retries: undefined, cacheDir: '/tmp/mesh-test' },
            { DATAMESH_TOKEN: 'test-secret', DATAMESH_RETRIES: '2' }
        );
        expect(config.token).toBe('override-token');
        expect(config.retries).toBe(2);
        expect(config.cacheDir).toBe('/tmp/mesh-test');
    });
});
