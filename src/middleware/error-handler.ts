/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { ErrorRequestHandler } from 'express';
import winston from 'winston';

import { errorMessage } from '../lib/error.js';
import * as metrics from '../metrics.js';

/**
 * Last handler in the chain. Answers unhandled errors with a JSON body and
 * keeps stack traces in the log.
 */
export function createErrorHandlerMiddleware({
  log,
}: {
  log: winston.Logger;
}): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    metrics.errorsCounter.inc();
    // Falls back to the process logger if the request context never ran
    const requestLog: winston.Logger | undefined = req.log;
    (requestLog ?? log).error('Unhandled error while serving request', {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });

    if (res.headersSent) {
      next(error);
      return;
    }
    res.status(500).json({
      error: 'internal_error',
      detail: 'Internal server error',
      request_id: req.id,
    });
  };
}
