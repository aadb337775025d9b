import { useEffect, useState } from 'react';
import type { CacheEvent, CacheProgress, CacheState } from '../services/streamCache/CacheEngine';
import type { StreamCacheError } from '../services/streamCache/errors';

/** The part of CacheEngine the hook reads; lets views take any event source. */
export interface CacheEventSource {
  readonly state: CacheState;
  subscribe(listener: (event: CacheEvent) => void): () => void;
  currentProgress(): CacheProgress;
}

export interface StreamCacheView {
  state: CacheState;
  bytesDownloaded: number;
  bytesExpected: number | null;
  isConnected: boolean | null;
  completedFilePath: string | null;
  error: StreamCacheError | null;
}

function snapshot(source: CacheEventSource | null): StreamCacheView {
  const progress = source?.currentProgress();
  return {
    state: source?.state ?? 'idle',
    bytesDownloaded: progress?.bytesDownloaded ?? 0,
    bytesExpected: progress?.bytesExpected ?? null,
    isConnected: null,
    completedFilePath: null,
    error: null,
  };
}

function reduce(view: StreamCacheView, event: CacheEvent): StreamCacheView {
  switch (event.type) {
    case 'progress':
      return { ...view, bytesDownloaded: event.bytesDownloaded, bytesExpected: event.bytesExpected };
    case 'stateChanged':
      return { ...view, state: event.state };
    case 'connectivityChanged':
      return { ...view, isConnected: event.connected };
    case 'completed':
      return { ...view, state: 'completed', completedFilePath: event.filePath };
    case 'failed':
      return { ...view, state: 'failed', error: event.error };
    case 'contentInformation':
      return event.info.contentLength === null ? view : { ...view, bytesExpected: event.info.contentLength };
  }
}

/**
 * Mirrors a stream cache's events into React state for progress bars and
 * offline badges.
 */
export const useStreamCache = (source: CacheEventSource | null): StreamCacheView => {
  const [view, setView] = useState<StreamCacheView>(() => snapshot(source));

  useEffect(() => {
    setView(snapshot(source));
    if (!source) return;
    return source.subscribe((event) => {
      setView(prev => reduce(prev, event));
    });
  }, [source]);

  return view;
};
