/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { requireKnownKind } from '../lib/identifier.js';
import { CompositeStorageResolver } from './composite-storage-resolver.js';
import { StaticCutoutLocator } from './cutout-locator.js';
import { TapRowResolver } from './tap-row-resolver.js';

describe('StaticCutoutLocator', () => {
  it('should prefer the per-repository URL', async () => {
    const locator = new StaticCutoutLocator({
      defaultUrl: 'https://data.example.test/api/cutout/sync',
      urls: { dp1: 'https://dp1.example.test/api/cutout/sync' },
    });

    assert.equal(
      await locator.endpointFor('dp1'),
      'https://dp1.example.test/api/cutout/sync',
    );
    assert.equal(
      await locator.endpointFor('dp02'),
      'https://data.example.test/api/cutout/sync',
    );
  });

  it('should report deployments without a cutout service', async () => {
    const locator = new StaticCutoutLocator({ urls: {} });
    await assert.rejects(locator.endpointFor('dp02'), {
      name: 'ServiceUnavailableError',
      message: 'No cutout service is available for dp02',
    });
  });

  it('should stop when the caller has cancelled', async () => {
    const locator = new StaticCutoutLocator({
      defaultUrl: 'https://data.example.test/api/cutout/sync',
    });
    await assert.rejects(
      locator.endpointFor('dp02', { signal: AbortSignal.abort() }),
      { name: 'AbortError' },
    );
  });
});

describe('TapRowResolver', () => {
  it('should locate catalog rows with a public TAP query', async () => {
    const resolver = new CompositeStorageResolver({
      images: {
        locate: async () => {
          throw new Error('images are not resolved here');
        },
      },
      catalogRows: new TapRowResolver({ tapSyncUrl: '/api/tap/sync' }),
    });

    assert.deepEqual(
      await resolver.locate(requireKnownKind('row:cat.Object/objectId/42')),
      {
        uri: '/api/tap/sync?LANG=ADQL&REQUEST=doQuery&QUERY=SELECT+*+FROM+cat.Object+WHERE+objectId+%3D+42',
        contentType: 'application/x-votable+xml',
        public: true,
      },
    );
  });
});

describe('CompositeStorageResolver', () => {
  it('should route images to the image resolver', async () => {
    const resolver = new CompositeStorageResolver({
      images: {
        locate: async (identifier) => ({
          uri: `s3://bucket/${identifier.repository}/${identifier.datasetId}`,
        }),
      },
      catalogRows: new TapRowResolver({ tapSyncUrl: '/api/tap/sync' }),
    });

    assert.deepEqual(await resolver.locate(requireKnownKind('img:abc')), {
      uri: 's3://bucket/default/abc',
    });
  });
});
