/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as promClient from 'prom-client';

//
// Global error metrics
//

export const errorsCounter = new promClient.Counter({
  name: 'errors_total',
  help: 'Total error count',
});

//
// Link resolution metrics
//

export const linksRequestsCounter = new promClient.Counter({
  name: 'links_requests_total',
  help: 'Count of DataLink requests by identifier kind',
  labelNames: ['kind'],
});

export const linkEntryErrorsCounter = new promClient.Counter({
  name: 'link_entry_errors_total',
  help: 'Count of DataLink rows downgraded to error rows',
  labelNames: ['semantics'],
});

export const invalidIdentifiersCounter = new promClient.Counter({
  name: 'invalid_identifiers_total',
  help: 'Count of requests rejected for an invalid identifier',
});

//
// Collection list cache metrics
//

export const collectionRefreshCounter = new promClient.Counter({
  name: 'collection_list_refresh_total',
  help: 'Count of collection list refreshes by dataset and status',
  labelNames: ['dataset', 'status'],
});

export const collectionRefreshDurationSummary = new promClient.Summary({
  name: 'collection_list_refresh_duration_ms',
  help: 'Time in ms to refresh a collection list',
  labelNames: ['dataset'],
});

export const collectionCacheHealthyGauge = new promClient.Gauge({
  name: 'collection_list_healthy',
  help: 'Whether the last refresh of a collection list succeeded (1) or not (0)',
  labelNames: ['dataset'],
});

export const collectionCacheEntriesGauge = new promClient.Gauge({
  name: 'collection_list_entries',
  help: 'Number of collections in the published snapshot',
  labelNames: ['dataset'],
});
