export { CacheEngine } from './CacheEngine';
export type {
  CacheEngineOptions,
  CacheEvent,
  CacheEventListener,
  CacheProgress,
  CacheState,
  DisposeOptions,
} from './CacheEngine';
export { BackingStore } from './BackingStore';
export { TransferController } from './TransferController';
export type { ContentInformation, TransferCallbacks, TransferProgress, TransferState } from './TransferController';
export { ConnectivityMonitor, createDnsProbe } from './ConnectivityMonitor';
export type { ConnectivityListener, ConnectivityProbe } from './ConnectivityMonitor';
export { RequestFulfiller } from './RequestFulfiller';
export type { ReadDelivery, ReadRequestHandle, ReadRequestStatus } from './RequestFulfiller';
export { STREAM_CACHE_CONFIG, resolveConfig } from './config';
export type { StreamCacheConfig } from './config';
export * from './errors';
