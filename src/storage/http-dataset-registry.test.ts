/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { afterEach, describe, it, mock } from 'node:test';
import axios from 'axios';

import { createTestLogger } from '../../test/test-logger.js';
import { NotFoundError } from '../lib/error.js';
import { requireKnownKind } from '../lib/identifier.js';
import { HttpDatasetRegistry } from './http-dataset-registry.js';
import type { ImageIdentifier } from '../types.js';

const log = createTestLogger({ suite: 'HttpDatasetRegistry' });

function image(raw: string): ImageIdentifier {
  const identifier = requireKnownKind(raw);
  assert.ok(identifier.kind === 'Image');
  return identifier;
}

function mockRegistryResponse(status: number, data: unknown) {
  const mockAxiosInstance = {
    get: mock.fn(async () => ({ status, data })),
  };
  mock.method(axios, 'create', () => mockAxiosInstance);
  return mockAxiosInstance;
}

describe('HttpDatasetRegistry', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('should map the registry response to an object reference', async () => {
    const mockAxiosInstance = mockRegistryResponse(200, {
      uri: 's3://bucket/dp02/calexp.fits',
      size: 4096,
      content_type: 'application/fits',
      dataset_type: 'calexp',
    });
    const registry = new HttpDatasetRegistry({
      log,
      registryUrl: 'http://registry.example.test',
    });

    const reference = await registry.locate(
      image('butler://dp02/58f56d2e-cfd8-44e7-a343-20ebdc1f4127'),
    );

    assert.deepEqual(reference, {
      uri: 's3://bucket/dp02/calexp.fits',
      size: 4096,
      contentType: 'application/fits',
      datasetType: 'calexp',
      expiresAt: undefined,
    });
    assert.equal(mockAxiosInstance.get.mock.callCount(), 1);
  });

  it('should request the dataset path with the delegated token', async () => {
    const mockAxiosInstance = {
      get: mock.fn(async (_url: string, _config?: unknown) => ({
        status: 200,
        data: {
          uri: 'https://butler.example.test/signed/calexp.fits',
          expires_at: '2026-03-01T13:00:00Z',
        },
      })),
    };
    mock.method(axios, 'create', () => mockAxiosInstance);
    const registry = new HttpDatasetRegistry({
      log,
      registryUrl: 'http://registry.example.test',
    });
    const controller = new AbortController();

    const reference = await registry.locate(image('img:calexp.1'), {
      token: 'test-token',
      signal: controller.signal,
    });

    assert.deepEqual(
      reference.expiresAt,
      new Date('2026-03-01T13:00:00Z'),
    );
    const [url, config] = mockAxiosInstance.get.mock.calls[0].arguments;
    assert.equal(url, '/repositories/default/datasets/calexp.1');
    assert.deepEqual(
      config !== null && typeof config === 'object' && 'headers' in config
        ? config.headers
        : undefined,
      { Authorization: 'Bearer test-token' },
    );
    assert.ok(
      config !== null &&
        typeof config === 'object' &&
        'signal' in config &&
        config.signal === controller.signal,
    );
  });

  it('should report missing datasets as not found', async () => {
    mockRegistryResponse(404, { detail: 'not found' });
    const registry = new HttpDatasetRegistry({
      log,
      registryUrl: 'http://registry.example.test',
    });

    await assert.rejects(registry.locate(image('img:missing')), (error) => {
      assert.ok(error instanceof NotFoundError);
      assert.equal(error.message, 'Dataset img:missing does not exist');
      return true;
    });
  });

  it('should reject malformed registry responses', async () => {
    mockRegistryResponse(200, { location: 's3://bucket/key' });
    const registry = new HttpDatasetRegistry({
      log,
      registryUrl: 'http://registry.example.test',
    });

    await assert.rejects(registry.locate(image('img:odd')), {
      name: 'DetailedError',
      message: 'Invalid registry response for img:odd',
    });
  });

  it('should reject sizes that are not byte counts', async () => {
    for (const size of [1.5, -1]) {
      mockRegistryResponse(200, { uri: 's3://bucket/calexp.fits', size });
      const registry = new HttpDatasetRegistry({
        log,
        registryUrl: 'http://registry.example.test',
      });

      await assert.rejects(registry.locate(image('img:1')), {
        name: 'DetailedError',
        message: 'Invalid registry response for img:1',
      });
      mock.restoreAll();
    }
  });

  it('should reject expiry times that are not dates', async () => {
    mockRegistryResponse(200, {
      uri: 'https://butler.example.test/signed/calexp.fits',
      expires_at: 'soon',
    });
    const registry = new HttpDatasetRegistry({
      log,
      registryUrl: 'http://registry.example.test',
    });

    await assert.rejects(registry.locate(image('img:1')), {
      message: 'Invalid registry response for img:1',
    });
  });

  it('should propagate transport failures', async () => {
    mock.method(axios, 'create', () => ({
      get: async () => {
        throw new Error('connect ECONNREFUSED');
      },
    }));
    const registry = new HttpDatasetRegistry({
      log,
      registryUrl: 'http://registry.example.test',
    });

    await assert.rejects(registry.locate(image('img:1')), {
      message: 'connect ECONNREFUSED',
    });
  });
});
