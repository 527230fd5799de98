/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Handler, Request, Response } from 'express';

/**
 * DataLink parameter names are case-insensitive. Rewrite the query with
 * lowercased keys; when a name appears in several cases the values are
 * combined in order.
 */
export function lowercaseQueryKeys(
  query: Request['query'],
): Request['query'] {
  const result: Request['query'] = {};
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) {
      continue;
    }
    const name = key.toLowerCase();
    const existing = result[name];
    if (existing === undefined) {
      result[name] = value;
    } else {
      result[name] = [
        ...(Array.isArray(existing) ? existing : [existing]),
        ...(Array.isArray(value) ? value : [value]),
      ].filter((item): item is string => typeof item === 'string');
    }
  }
  return result;
}

export function createCaseInsensitiveQueryMiddleware(): Handler {
  return (req: Request, _res: Response, next) => {
    req.query = lowercaseQueryKeys(req.query);
    next();
  };
}
