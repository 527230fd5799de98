/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as cors } from 'cors';
import express from 'express';

import * as config from './config.js';
import { headerNames } from './constants.js';
import log from './log.js';
import { createAbortSignalMiddleware } from './middleware/abort-signal.js';
import { createCaseInsensitiveQueryMiddleware } from './middleware/case-insensitive-query.js';
import { createErrorHandlerMiddleware } from './middleware/error-handler.js';
import { createRequestContextMiddleware } from './middleware/request-context.js';
import { createHipsRouter } from './routes/hips.js';
import { createInternalRouter } from './routes/internal.js';
import { createLinksRouter } from './routes/links.js';
import * as system from './system.js';

system.collectionListRegistry.startAll();

// HTTP server
const app = express();

app.use(
  cors({
    exposedHeaders: [
      // these are not exposed by default and must be added manually to be used on browsers
      'content-length',
      ...Object.values(headerNames),
    ],
  }),
);
app.use(createRequestContextMiddleware({ log }));
app.use(createAbortSignalMiddleware());
app.use(createCaseInsensitiveQueryMiddleware());

app.use(
  config.PATH_PREFIX,
  createLinksRouter({
    log,
    linkAssembler: system.linkAssembler,
    responseRenderer: system.responseRenderer,
    capabilities: system.capabilities,
    defaultRepository: config.DEFAULT_REPOSITORY,
    tapSyncPath: config.TAP_SYNC_PATH,
    tapMetadata: system.tapMetadata,
  }),
);
app.use(
  createHipsRouter({
    log,
    registry: system.collectionListRegistry,
    defaultDataset: config.HIPS_DEFAULT_DATASET,
    pathOrder: system.hipsPathOrder,
    legacyPrefix: config.HIPS_PATH_PREFIX,
    v2Prefix: config.HIPS_V2_PATH_PREFIX,
  }),
);
app.use(createInternalRouter({ registry: system.collectionListRegistry }));
app.use(createErrorHandlerMiddleware({ log }));

const server = app.listen(config.PORT, () => {
  log.info(`Listening on port ${config.PORT}`);
});

system.registerCleanupHandler(
  'http-server',
  () =>
    new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    }),
);

export { server };
