/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Handler, Request, Response } from 'express';

/**
 * Middleware that attaches an AbortSignal to each request. The signal is
 * aborted when the client disconnects before the response completes, which
 * abandons any backend calls still running for the request.
 */
export function createAbortSignalMiddleware(): Handler {
  return (req: Request, res: Response, next) => {
    const controller = new AbortController();

    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    req.signal = controller.signal;

    next();
  };
}
