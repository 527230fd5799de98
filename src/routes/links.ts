/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Router, Request, Response } from 'express';
import { default as asyncHandler } from 'express-async-handler';
import { Logger } from 'winston';

import {
  ADQL_COMPOUND_TABLE_REGEX,
  ADQL_FOREIGN_COLUMN_REGEX,
  ADQL_IDENTIFIER_REGEX,
  DATALINK_RESPONSE_FORMATS,
  headerNames,
} from '../constants.js';
import {
  coneSearchQuery,
  isBand,
  isDetail,
  tapSyncUrl,
  timeseriesQuery,
} from '../lib/adql.js';
import { InvalidIdentifierError } from '../lib/error.js';
import { requireKnownKind } from '../lib/identifier.js';
import { LinkAssembler } from '../links/link-assembler.js';
import { ResponseRenderer } from '../links/response-renderer.js';
import * as metrics from '../metrics.js';
import * as version from '../version.js';
import type {
  KnownIdentifier,
  LinkCapabilities,
  TapMetadata,
} from '../types.js';

export interface LinksRouterConfig {
  log: Logger;
  linkAssembler: LinkAssembler;
  responseRenderer: ResponseRenderer;
  capabilities: LinkCapabilities;
  defaultRepository: string;
  tapSyncPath: string;
  tapMetadata: TapMetadata;
}

/**
 * Reply 422 with the offending query parameter, in the shape clients of the
 * DataLink API already parse.
 */
export function sendValidationError(
  res: Response,
  {
    parameter,
    message,
    type = 'value_error',
  }: { parameter: string; message: string; type?: string },
) {
  res.status(422).json({
    detail: [{ loc: ['query', parameter], msg: message, type }],
  });
}

class QueryValidationError extends Error {
  constructor(
    public readonly parameter: string,
    message: string,
  ) {
    super(message);
  }
}

function stringParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new QueryValidationError(name, `${name} must be given once`);
  }
  return value;
}

function requiredParam(req: Request, name: string): string {
  const value = stringParam(req, name);
  if (value === undefined || value === '') {
    throw new QueryValidationError(name, `${name} is required`);
  }
  return value;
}

function patternParam(req: Request, name: string, pattern: RegExp): string {
  const value = requiredParam(req, name);
  if (!pattern.test(value)) {
    throw new QueryValidationError(name, `${name} must match ${pattern.source}`);
  }
  return value;
}

function numberParam(req: Request, name: string): number {
  const value = Number(requiredParam(req, name));
  if (!Number.isFinite(value)) {
    throw new QueryValidationError(name, `${name} must be a number`);
  }
  return value;
}

export function createLinksRouter({
  log,
  linkAssembler,
  responseRenderer,
  capabilities,
  defaultRepository,
  tapSyncPath,
  tapMetadata,
}: LinksRouterConfig): Router {
  const linksRouter = Router();

  const redirectToTap = (req: Request, res: Response, adql: string) => {
    const url = tapSyncUrl(tapSyncPath, adql);
    log.info('Redirecting to TAP', { requestId: req.id, url });
    res.redirect(307, url);
  };

  const parseIdentifierOrReject = (
    req: Request,
    res: Response,
    id: string,
  ): KnownIdentifier | undefined => {
    try {
      return requireKnownKind(id, { defaultRepository });
    } catch (error: unknown) {
      if (error instanceof InvalidIdentifierError) {
        metrics.invalidIdentifiersCounter.inc();
        req.log.warn('Rejected invalid identifier', { id });
        sendValidationError(res, {
          parameter: 'id',
          message: error.message,
          type: error.errorType,
        });
        return undefined;
      }
      throw error;
    }
  };

  const withValidation =
    (handler: (req: Request, res: Response) => Promise<void> | void) =>
    asyncHandler(async (req: Request, res: Response) => {
      try {
        await handler(req, res);
      } catch (error: unknown) {
        if (error instanceof QueryValidationError) {
          sendValidationError(res, {
            parameter: error.parameter,
            message: error.message,
          });
          return;
        }
        throw error;
      }
    });

  linksRouter.get('/', (_req, res) => {
    res.json({ metadata: version.metadata() });
  });

  linksRouter.get(
    '/links',
    withValidation(async (req, res) => {
      const id = requiredParam(req, 'id');
      const responseFormat = stringParam(req, 'responseformat');
      if (
        responseFormat !== undefined &&
        !DATALINK_RESPONSE_FORMATS.some((format) => format === responseFormat)
      ) {
        throw new QueryValidationError(
          'responseformat',
          `Unsupported response format ${responseFormat}`,
        );
      }

      const identifier = parseIdentifierOrReject(req, res, id);
      if (identifier === undefined) {
        return;
      }
      metrics.linksRequestsCounter.inc({ kind: identifier.kind });

      const assembled = await linkAssembler
        .assemble(identifier, capabilities, {
          signal: req.signal,
          token: req.get(headerNames.delegatedToken),
        })
        .catch((error: unknown) => {
          if (req.signal.aborted) {
            req.log.debug('Client disconnected before links were assembled');
            return undefined;
          }
          throw error;
        });
      if (assembled === undefined) {
        return;
      }

      const rendered = responseRenderer.render(
        assembled.entries,
        assembled.descriptors,
        assembled.window,
      );
      res.removeHeader(headerNames.expires);
      res.setHeader(headerNames.cacheControl, rendered.cacheControl);
      res.type(rendered.contentType);
      res.status(200).send(rendered.body);
    }),
  );

  linksRouter.get(
    '/cone_search',
    withValidation((req, res) => {
      const adql = coneSearchQuery({
        table: patternParam(req, 'table', ADQL_COMPOUND_TABLE_REGEX),
        raColumn: patternParam(req, 'ra_col', ADQL_IDENTIFIER_REGEX),
        decColumn: patternParam(req, 'dec_col', ADQL_IDENTIFIER_REGEX),
        ra: numberParam(req, 'ra_val'),
        dec: numberParam(req, 'dec_val'),
        radius: numberParam(req, 'radius'),
      });
      redirectToTap(req, res, adql);
    }),
  );

  linksRouter.get(
    '/timeseries',
    withValidation((req, res) => {
      const id = patternParam(req, 'id', /^-?[0-9]{1,20}$/);
      const table = patternParam(req, 'table', ADQL_COMPOUND_TABLE_REGEX);
      const idColumn = patternParam(req, 'id_column', ADQL_IDENTIFIER_REGEX);

      const bandColumn =
        stringParam(req, 'band_column') !== undefined
          ? patternParam(req, 'band_column', ADQL_IDENTIFIER_REGEX)
          : undefined;
      const joinTimeColumn =
        stringParam(req, 'join_time_column') !== undefined
          ? patternParam(req, 'join_time_column', ADQL_FOREIGN_COLUMN_REGEX)
          : undefined;

      const band = stringParam(req, 'band') ?? 'all';
      if (!isBand(band)) {
        throw new QueryValidationError('band', `Unknown band ${band}`);
      }
      const detail = stringParam(req, 'detail') ?? 'full';
      if (!isDetail(detail)) {
        throw new QueryValidationError('detail', `Unknown detail ${detail}`);
      }

      const adql = timeseriesQuery({
        id,
        table,
        idColumn,
        bandColumn,
        band,
        detail,
        joinTimeColumn,
        metadata: tapMetadata,
      });
      redirectToTap(req, res, adql);
    }),
  );

  return linksRouter;
}
