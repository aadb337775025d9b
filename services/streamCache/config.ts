import { z } from 'zod';

export const STREAM_CACHE_CONFIG = {
  // Bytes held in memory before the in-flight buffer is written to disk
  DOWNLOAD_BUFFER_FLUSH_THRESHOLD: 128 * 1024,
  // Cap on a single read handed to a pending request
  MAX_IN_MEMORY_READ_CHUNK: 10 * 1024 * 1024,

  VERIFY_DOWNLOADED_FILE_SIZE: false,
  MINIMUM_EXPECTED_FILE_SIZE: 0,

  // Timeouts
  REQUEST_TIMEOUT_MS: 60 * 1000,
  RESOURCE_TIMEOUT_MS: 60 * 60 * 1000,

  CONNECTIVITY_POLL_INTERVAL_MS: 5 * 1000,
  CONNECTIVITY_PROBE_TIMEOUT_MS: 3 * 1000,
} as const;

const configSchema = z.object({
  downloadBufferFlushThreshold: z.number().int().positive().default(STREAM_CACHE_CONFIG.DOWNLOAD_BUFFER_FLUSH_THRESHOLD),
  maxInMemoryReadChunk: z.number().int().positive().default(STREAM_CACHE_CONFIG.MAX_IN_MEMORY_READ_CHUNK),
  verifyDownloadedFileSize: z.boolean().default(STREAM_CACHE_CONFIG.VERIFY_DOWNLOADED_FILE_SIZE),
  // 0 disables the check
  minimumExpectedFileSize: z.number().int().min(0).default(STREAM_CACHE_CONFIG.MINIMUM_EXPECTED_FILE_SIZE),
  requestTimeoutMs: z.number().int().positive().default(STREAM_CACHE_CONFIG.REQUEST_TIMEOUT_MS),
  resourceTimeoutMs: z.number().int().positive().default(STREAM_CACHE_CONFIG.RESOURCE_TIMEOUT_MS),
  connectivityPollIntervalMs: z.number().int().positive().default(STREAM_CACHE_CONFIG.CONNECTIVITY_POLL_INTERVAL_MS),
});

export type StreamCacheConfig = z.infer<typeof configSchema>;

export function resolveConfig(overrides: Partial<StreamCacheConfig> = {}): StreamCacheConfig {
  const parsed = configSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new Error(`Invalid stream cache configuration:\n${parsed.error.message}`);
  }
  return parsed.data;
}
