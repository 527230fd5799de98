/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';
import express from 'express';
import { default as asyncHandler } from 'express-async-handler';
import request from 'supertest';

import { createTestLogger } from '../../test/test-logger.js';
import { MalformedEntryError } from '../lib/error.js';
import { createErrorHandlerMiddleware } from './error-handler.js';
import { createRequestContextMiddleware } from './request-context.js';

const log = createTestLogger({ suite: 'ErrorHandler' });

function createApp() {
  const app = express();
  app.use(createRequestContextMiddleware({ log }));
  app.get(
    '/broken',
    asyncHandler(async () => {
      throw new MalformedEntryError(
        'Link entry for img:1 has invalid content_length 1.5',
      );
    }),
  );
  app.get('/sync-broken', () => {
    throw new Error('unexpected');
  });
  app.use(createErrorHandlerMiddleware({ log }));
  return app;
}

describe('createErrorHandlerMiddleware', () => {
  it('should answer unhandled errors with a JSON body', async () => {
    const res = await request(createApp())
      .get('/broken')
      .set('X-Request-Id', 'req-7')
      .expect(500);

    assert.match(res.headers['content-type'], /^application\/json/);
    assert.deepEqual(res.body, {
      error: 'internal_error',
      detail: 'Internal server error',
      request_id: 'req-7',
    });
  });

  it('should not expose stack traces', async () => {
    const res = await request(createApp()).get('/sync-broken').expect(500);

    assert.deepEqual(Object.keys(res.body), ['error', 'detail', 'request_id']);
    assert.equal(res.body.detail, 'Internal server error');
  });
});
