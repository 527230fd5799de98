/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Router, Response } from 'express';
import { Logger } from 'winston';

import { CollectionListRegistry } from '../hips/collection-list-cache.js';
import { formatHipsList } from '../hips/hips-list.js';
import { CollectionListUnavailableError } from '../lib/error.js';
import type { CollectionListSnapshot } from '../types.js';

export interface HipsRouterConfig {
  log: Logger;
  registry: CollectionListRegistry;
  // Dataset served by the legacy list endpoint
  defaultDataset?: string;
  // Configured path order per dataset
  pathOrder?: Readonly<Record<string, readonly string[]>>;
  legacyPrefix: string;
  v2Prefix: string;
}

/**
 * HiPS list routes. Every handler reads the published snapshot; none of them
 * waits on the source.
 */
export function createHipsRouter({
  log,
  registry,
  defaultDataset,
  pathOrder = {},
  legacyPrefix,
  v2Prefix,
}: HipsRouterConfig): Router {
  const hipsRouter = Router();

  const withSnapshot = (
    res: Response,
    dataset: string,
    handler: (snapshot: CollectionListSnapshot) => void,
  ) => {
    const cache = registry.get(dataset);
    if (registry.datasets().length === 0) {
      res.status(404).json({ detail: 'No HiPS datasets are configured' });
      return;
    }
    if (cache === undefined) {
      res.status(404).json({
        detail: `Dataset '${dataset}' not configured. Available datasets: ${registry
          .datasets()
          .join(', ')}`,
      });
      return;
    }

    try {
      handler(cache.getSnapshot());
    } catch (error: unknown) {
      if (error instanceof CollectionListUnavailableError) {
        log.warn('Collection list requested before first refresh', {
          dataset,
        });
        res.status(503).json({
          error: 'not_yet_available',
          detail: error.message,
        });
        return;
      }
      throw error;
    }
  };

  const sendList = (res: Response, dataset: string) => {
    withSnapshot(res, dataset, (snapshot) => {
      res
        .status(200)
        .type('text/plain')
        .send(formatHipsList(snapshot.entries, pathOrder[dataset]));
    });
  };

  hipsRouter.get(`${legacyPrefix}/list`, (_req, res) => {
    if (
      defaultDataset === undefined ||
      registry.get(defaultDataset) === undefined
    ) {
      res.status(200).type('text/plain').send('');
      return;
    }
    sendList(res, defaultDataset);
  });

  hipsRouter.get(`${v2Prefix}/:dataset/list`, (req, res) => {
    sendList(res, req.params.dataset);
  });

  hipsRouter.get(`${v2Prefix}/:dataset/collections`, (req, res) => {
    withSnapshot(res, req.params.dataset, (snapshot) => {
      res.status(200).json(
        Object.fromEntries(
          [...snapshot.entries.values()].map((entry) => [
            entry.key,
            entry.properties,
          ]),
        ),
      );
    });
  });

  return hipsRouter;
}
