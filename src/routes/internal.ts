/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Router } from 'express';
import { default as asyncHandler } from 'express-async-handler';
import * as promClient from 'prom-client';

import { CollectionListRegistry } from '../hips/collection-list-cache.js';
import * as version from '../version.js';

/**
 * Routes for the cluster-internal surface: metadata, health and metrics.
 */
export function createInternalRouter({
  registry,
  metricsRegistry = promClient.register,
}: {
  registry: CollectionListRegistry;
  metricsRegistry?: promClient.Registry;
}): Router {
  const internalRouter = Router();

  internalRouter.get('/', (_req, res) => {
    res.status(200).json(version.metadata());
  });

  internalRouter.get('/healthcheck', (_req, res) => {
    const { healthy, reasons } = registry.health();

    res.status(200).send({
      status: healthy ? 'ok' : 'unhealthy',
      uptime: process.uptime(),
      date: new Date(),
      ...(reasons.length > 0 && { reasons }),
    });
  });

  internalRouter.get(
    '/metrics',
    asyncHandler(async (_req, res) => {
      res.setHeader('Content-Type', metricsRegistry.contentType);
      res.status(200).send(await metricsRegistry.metrics());
    }),
  );

  return internalRouter;
}
