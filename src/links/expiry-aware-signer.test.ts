/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it, mock } from 'node:test';

import { SigningError } from '../lib/error.js';
import { ExpiryAwareSigner } from './expiry-aware-signer.js';
import type { UrlSigner } from '../types.js';

const reference = { uri: 's3://bucket/image.fits' };

describe('ExpiryAwareSigner', () => {
  it('should track the earliest expiry of signed URLs', async () => {
    const expiries = [
      new Date('2026-01-01T01:00:00Z'),
      new Date('2026-01-01T00:05:00Z'),
      new Date('2026-01-01T00:30:00Z'),
    ];
    const signer: UrlSigner = {
      sign: mock.fn(async () => ({
        url: 'https://example.test/signed',
        expiresAt: expiries.shift(),
      })),
    };
    const expiryAware = new ExpiryAwareSigner({ signer });

    assert.equal(expiryAware.window, undefined);
    await expiryAware.sign(reference, 3600);
    await expiryAware.sign(reference, 3600);
    await expiryAware.sign(reference, 3600);

    assert.deepEqual(expiryAware.window, {
      minExpiry: new Date('2026-01-01T00:05:00Z'),
    });
  });

  it('should ignore URLs without an expiry', async () => {
    const expiryAware = new ExpiryAwareSigner({
      signer: { sign: async () => ({ url: 'https://example.test/a' }) },
    });
    await expiryAware.sign(reference, 60);
    expiryAware.track(undefined);
    assert.equal(expiryAware.window, undefined);
  });

  it('should include expiries tracked for unsigned URLs', () => {
    const expiryAware = new ExpiryAwareSigner({
      signer: { sign: async () => ({ url: 'unused' }) },
    });
    expiryAware.track(new Date('2026-01-01T00:10:00Z'));
    expiryAware.track(new Date('2026-01-01T00:20:00Z'));
    assert.deepEqual(expiryAware.window, {
      minExpiry: new Date('2026-01-01T00:10:00Z'),
    });
  });

  it('should ignore expiries that are not valid dates', () => {
    const expiryAware = new ExpiryAwareSigner({
      signer: { sign: async () => ({ url: 'unused' }) },
    });
    expiryAware.track(new Date('soon'));
    assert.equal(expiryAware.window, undefined);

    expiryAware.track(new Date('2026-01-01T00:10:00Z'));
    expiryAware.track(new Date('later'));
    assert.deepEqual(expiryAware.window, {
      minExpiry: new Date('2026-01-01T00:10:00Z'),
    });
  });

  it('should pass signing errors through', async () => {
    const error = new SigningError('Object URL gs://b/k was not signed');
    const expiryAware = new ExpiryAwareSigner({
      signer: {
        sign: async () => {
          throw error;
        },
      },
    });
    await assert.rejects(expiryAware.sign(reference, 60), (thrown) => {
      assert.equal(thrown, error);
      return true;
    });
    assert.equal(expiryAware.window, undefined);
  });

  it('should wrap other failures in a SigningError', async () => {
    const expiryAware = new ExpiryAwareSigner({
      signer: {
        sign: async () => {
          throw new Error('credentials not found');
        },
      },
    });
    await assert.rejects(expiryAware.sign(reference, 60), {
      name: 'SigningError',
      message: 'Unable to sign s3://bucket/image.fits: credentials not found',
    });
  });

  it('should not wrap failures after cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    const expiryAware = new ExpiryAwareSigner({
      signer: {
        sign: async () => {
          throw new Error('aborted');
        },
      },
    });
    await assert.rejects(
      expiryAware.sign(reference, 60, { signal: controller.signal }),
      { name: 'Error', message: 'aborted' },
    );
  });
});
