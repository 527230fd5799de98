/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as env from './lib/env.js';
import {
  parseHipsDatasets,
  parseStringRecord,
  parseTimeseriesSources,
} from './lib/config-parsing.js';

//
// HTTP server
//

export const PORT = +env.varOrDefault('PORT', '8080');

// External base URL of this service, used for links back to itself
export const PUBLIC_BASE_URL = env
  .varOrDefault('PUBLIC_BASE_URL', `http://localhost:${PORT}`)
  .replace(/\/+$/, '');

// URL prefix for the DataLink API and the helpers it links to
export const PATH_PREFIX = env.varOrDefault('PATH_PREFIX', '/api/datalink');

export const HIPS_PATH_PREFIX = env.varOrDefault(
  'HIPS_PATH_PREFIX',
  '/api/hips',
);

export const HIPS_V2_PATH_PREFIX = env.varOrDefault(
  'HIPS_V2_PATH_PREFIX',
  '/api/hips/v2',
);

//
// TAP
//

export const TAP_SYNC_PATH = env.varOrDefault('TAP_SYNC_PATH', '/api/tap/sync');

// Directory of YAML files describing column sets of TAP tables
export const TAP_METADATA_DIR = env.varOrUndefined('TAP_METADATA_DIR');

//
// Links
//

// Presence of a cutout URL enables the cutout capability for the deployment
export const CUTOUT_SYNC_URL = env.varOrUndefined('CUTOUT_SYNC_URL');

// Per-repository overrides of the cutout URL
export const CUTOUT_SYNC_URLS = parseStringRecord(
  'CUTOUT_SYNC_URLS',
  env.varOrDefault('CUTOUT_SYNC_URLS', '{}'),
);

export const CUTOUT_EXCLUDED_DATASET_TYPES = env.varAsList(
  'CUTOUT_EXCLUDED_DATASET_TYPES',
  'raw',
);

// Should match the lifetime of signed URLs returned by the registry
export const LINKS_LIFETIME_SECONDS = +env.varOrDefault(
  'LINKS_LIFETIME_SECONDS',
  `${60 * 60}`, // 1 hour
);

export const BACKEND_REQUEST_TIMEOUT_MS = +env.varOrDefault(
  'BACKEND_REQUEST_TIMEOUT_MS',
  '10000',
);

export const TIMESERIES_SOURCES = parseTimeseriesSources(
  'TIMESERIES_SOURCES',
  env.varOrDefault('TIMESERIES_SOURCES', '{}'),
);

//
// Storage
//

export const DATASET_REGISTRY_URL = env
  .varOrDefault('DATASET_REGISTRY_URL', 'http://localhost:8081')
  .replace(/\/+$/, '');

// Repository used for identifiers that do not name one
export const DEFAULT_REPOSITORY = env.varOrDefault(
  'DEFAULT_REPOSITORY',
  'default',
);

export const S3_ENDPOINT_URL = env.varOrUndefined('S3_ENDPOINT_URL');

export const S3_REGION = env.varOrDefault('S3_REGION', 'us-east-1');

//
// HiPS
//

export const HIPS_DATASETS = parseHipsDatasets(
  'HIPS_DATASETS',
  env.varOrDefault('HIPS_DATASETS', '{}'),
);

// Dataset served by the legacy list endpoint
export const HIPS_DEFAULT_DATASET = env.varOrUndefined('HIPS_DEFAULT_DATASET');

export const HIPS_TOKEN = env.varOrUndefined('HIPS_TOKEN');

export const HIPS_CACHE_TTL_SECONDS = +env.varOrDefault(
  'HIPS_CACHE_TTL_SECONDS',
  `${60 * 60}`, // 1 hour
);

export const HIPS_REFRESH_INTERVAL_SECONDS = +env.varOrDefault(
  'HIPS_REFRESH_INTERVAL_SECONDS',
  `${60 * 10}`, // 10 minutes
);
