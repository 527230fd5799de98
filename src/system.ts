/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { s3Client } from './aws-client.js';
import * as config from './config.js';
import {
  CollectionListCache,
  CollectionListRegistry,
} from './hips/collection-list-cache.js';
import { HipsPropertiesSource } from './hips/hips-properties-source.js';
import { loadTapMetadata } from './lib/tap-metadata.js';
import { LinkAssembler } from './links/link-assembler.js';
import { ResponseRenderer } from './links/response-renderer.js';
import log from './log.js';
import * as metrics from './metrics.js';
import {
  CompositeUrlSigner,
  PresignedUrlSigner,
  S3UrlSigner,
} from './signing/url-signers.js';
import { CompositeStorageResolver } from './storage/composite-storage-resolver.js';
import { StaticCutoutLocator } from './storage/cutout-locator.js';
import { HttpDatasetRegistry } from './storage/http-dataset-registry.js';
import { TapRowResolver } from './storage/tap-row-resolver.js';
import type { LinkCapabilities } from './types.js';

// Shutdown registry for managing cleanup handlers
type CleanupHandler = {
  name: string;
  handler: () => Promise<void>;
};

const cleanupHandlers: CleanupHandler[] = [];

/**
 * Register a cleanup handler to be called during shutdown.
 * Handlers are called in the order they are registered.
 */
export function registerCleanupHandler(
  name: string,
  handler: () => Promise<void>,
): void {
  cleanupHandlers.push({ name, handler });
  log.debug(`Registered cleanup handler: ${name}`);
}

process.on('uncaughtException', (error) => {
  metrics.errorsCounter.inc();
  log.error('Uncaught exception:', error);
});

//
// Links
//

export const tapMetadata = loadTapMetadata(config.TAP_METADATA_DIR);

export const capabilities: LinkCapabilities = {
  cutout: config.CUTOUT_SYNC_URL !== undefined,
  cutoutExcludedDatasetTypes: config.CUTOUT_EXCLUDED_DATASET_TYPES,
  timeseriesSources: config.TIMESERIES_SOURCES,
};

const storageResolver = new CompositeStorageResolver({
  images: new HttpDatasetRegistry({
    log,
    registryUrl: config.DATASET_REGISTRY_URL,
    requestTimeoutMs: config.BACKEND_REQUEST_TIMEOUT_MS,
  }),
  catalogRows: new TapRowResolver({ tapSyncUrl: config.TAP_SYNC_PATH }),
});

const urlSigner = new CompositeUrlSigner({
  signers: {
    http: new PresignedUrlSigner(),
    https: new PresignedUrlSigner(),
    s3: new S3UrlSigner({ log, s3Client }),
  },
});

export const linkAssembler = new LinkAssembler({
  log,
  storageResolver,
  urlSigner,
  cutoutLocator: new StaticCutoutLocator({
    defaultUrl: config.CUTOUT_SYNC_URL,
    urls: config.CUTOUT_SYNC_URLS,
  }),
  linksBaseUrl: `${config.PUBLIC_BASE_URL}${config.PATH_PREFIX}`,
  linksLifetimeSeconds: config.LINKS_LIFETIME_SECONDS,
  backendTimeoutMs: config.BACKEND_REQUEST_TIMEOUT_MS,
});

export const responseRenderer = new ResponseRenderer({
  defaultMaxAgeSeconds: config.LINKS_LIFETIME_SECONDS,
});

//
// HiPS
//

export const hipsPathOrder = Object.fromEntries(
  Object.entries(config.HIPS_DATASETS).map(([dataset, { paths }]) => [
    dataset,
    paths,
  ]),
);

export const collectionListRegistry = new CollectionListRegistry({
  caches: Object.entries(config.HIPS_DATASETS).map(
    ([dataset, { url, paths }]) =>
      new CollectionListCache({
        log,
        dataset,
        source: new HipsPropertiesSource({
          log,
          dataset,
          baseUrl: url,
          paths,
          token: config.HIPS_TOKEN,
          requestTimeoutMs: config.BACKEND_REQUEST_TIMEOUT_MS,
        }),
        ttlSeconds: config.HIPS_CACHE_TTL_SECONDS,
        refreshIntervalSeconds: config.HIPS_REFRESH_INTERVAL_SECONDS,
      }),
  ),
});

let isShuttingDown = false;

export const shutdown = async (exitCode = 0) => {
  if (isShuttingDown) {
    log.info('Shutdown already in progress');
    return;
  }
  isShuttingDown = true;
  log.info('Shutting down...');

  // Call registered cleanup handlers first (e.g., HTTP server)
  for (const { name, handler } of cleanupHandlers) {
    try {
      log.debug(`Running cleanup handler: ${name}`);
      await handler();
      log.debug(`Cleanup handler completed: ${name}`);
    } catch (error: unknown) {
      log.error(`Error in cleanup handler: ${name}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  collectionListRegistry.stopAll();
  s3Client.destroy();

  log.info('Shutdown complete');
  process.exit(exitCode);
};

// Handle shutdown signals
process.on('SIGINT', async () => {
  await shutdown();
});

process.on('SIGTERM', async () => {
  await shutdown();
});
