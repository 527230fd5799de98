/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { randomUUID } from 'node:crypto';
import { Handler, Request, Response } from 'express';
import winston from 'winston';

import { headerNames } from '../constants.js';

/**
 * Assign each request an ID (reusing a proxy-supplied one) and a child logger
 * that carries it.
 */
export function createRequestContextMiddleware({
  log,
}: {
  log: winston.Logger;
}): Handler {
  return (req: Request, res: Response, next) => {
    const supplied = req.get(headerNames.requestId);
    req.id =
      supplied !== undefined && /^[A-Za-z0-9._-]{1,128}$/.test(supplied)
        ? supplied
        : randomUUID();
    req.log = log.child({ requestId: req.id, path: req.path });
    res.setHeader(headerNames.requestId, req.id);
    next();
  };
}
