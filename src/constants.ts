/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * HTTP header names used by the service.
 *
 * @remarks
 * `X-Auth-Request-Token` is set by the platform's authentication proxy and
 * carries a delegated token that is forwarded to the dataset registry.
 */
export const headerNames = {
  cacheControl: 'Cache-Control',
  expires: 'Expires',
  delegatedToken: 'X-Auth-Request-Token',
  requestId: 'X-Request-Id',
} as const;

/**
 * Controlled vocabulary for the DataLink `semantics` column.
 *
 * @see {@link https://www.ivoa.net/rdf/datalink/core | IVOA DataLink core vocabulary}
 */
export const semantics = {
  this: '#this',
  cutout: '#cutout',
  auxiliary: '#auxiliary',
} as const;

export const contentTypes = {
  votable: 'application/x-votable+xml',
  fits: 'application/fits',
  text: 'text/plain',
} as const;

export const standardIds = {
  sodaSync: 'ivo://ivoa.net/std/SODA#sync-1.0',
} as const;

// Accepted values of the DataLink RESPONSEFORMAT parameter
export const DATALINK_RESPONSE_FORMATS = [
  'votable',
  'application/x-votable+xml',
] as const;

export const CUTOUT_SERVICE_ID = 'cutout-sync';

/** ADQL table with optional schema prefix. */
export const ADQL_COMPOUND_TABLE_REGEX = /^([a-zA-Z0-9_]+\.)?[a-zA-Z0-9_.]+$/;

/** ADQL column qualified by table and optional schema. */
export const ADQL_FOREIGN_COLUMN_REGEX = /^([a-zA-Z0-9_]+\.){1,2}[a-zA-Z0-9_]+$/;

/** Bare ADQL identifier. */
export const ADQL_IDENTIFIER_REGEX = /^[a-zA-Z0-9_]+$/;

// Width of the key column in HiPS properties files
export const HIPS_PROPERTY_KEY_WIDTH = 25;
