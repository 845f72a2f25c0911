/**
 * Mesh Client: Public API
 */

export { Connector, authHeaders } from './connector';
export type { CatalogFilter, ConnectOptions, LoadOptions, QueryOptions, QueryResult, WriteOptions } from './connector';
export { loadMeshConfig, resolveMeshConfig, DEFAULT_SERVICE } from './config';
export type { MeshConfig } from './config';
export {
    MeshError,
    MeshConnectError,
    DatasourceNotFoundError,
    MeshQueryError,
    MeshWriteError,
    MeshSessionError,
    CacheError,
    ChunkNotFoundError,
} from './errors';
export { RetryTransport } from './transport';
export type { RequestSpec, RetryTransportOptions } from './transport';
export { Session, SessionManager, withSession, SESSION_HEADER } from './session';
export { StageNegotiator } from './stage';
export { RemoteChunkStore } from './chunk-store';
export type { ChunkStore, ChunkApi } from './chunk-store';
export { MemoryChunkStore } from './memory-store';
export { LocalResultCache, CACHE_EXTENSIONS } from './cache';
export { AppendWriter } from './append';
export type { AppendOutcome, AppendRequest } from './append';
export { LazyDataset } from './lazy';
export { Catalog } from './catalog';
export { createQuery, queryHash, serializeQuery } from './query';
export type { QueryInput } from './query';
export { createDataset, createVariable, isel } from './dataset';
export { createTable, createGeoTable } from './tabular';
export { InProcessLockProvider } from './locks';
export type { LockProvider } from './locks';
export type * from './types';
