/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { TapMetadata } from '../types.js';

export const BANDS = ['all', 'u', 'g', 'r', 'i', 'z', 'y'] as const;
export type Band = (typeof BANDS)[number];

export const DETAILS = ['minimal', 'principal', 'full'] as const;
export type Detail = (typeof DETAILS)[number];

export function isBand(value: string): value is Band {
  return BANDS.some((band) => band === value);
}

export function isDetail(value: string): value is Detail {
  return DETAILS.some((detail) => detail === value);
}

/**
 * Build the URL of a synchronous TAP query for the given ADQL.
 */
export function tapSyncUrl(tapSyncPath: string, adql: string): string {
  const params = new URLSearchParams({
    LANG: 'ADQL',
    REQUEST: 'doQuery',
    QUERY: adql,
  });
  return `${tapSyncPath}?${params.toString()}`;
}

export function coneSearchQuery({
  table,
  raColumn,
  decColumn,
  ra,
  dec,
  radius,
}: {
  table: string;
  raColumn: string;
  decColumn: string;
  ra: number;
  dec: number;
  radius: number;
}): string {
  return (
    `SELECT * FROM ${table} WHERE` +
    ` CONTAINS(POINT('ICRS',${raColumn},${decColumn}),` +
    `CIRCLE('ICRS',${ra},${dec},${radius}))=1`
  );
}

/**
 * SQL column expression for the requested level of detail. Falls back to all
 * columns when the TAP metadata has no column set for the table.
 */
export function tapColumns(
  table: string,
  detail: Detail,
  metadata: TapMetadata,
): string {
  const columnSet =
    detail === 'minimal'
      ? 'lsst:minimal'
      : detail === 'principal'
        ? 'tap:principal'
        : undefined;
  if (columnSet === undefined) {
    return 's.*';
  }

  const columnSets = Object.hasOwn(metadata, table) ? metadata[table] : {};
  const columns = Object.hasOwn(columnSets, columnSet)
    ? columnSets[columnSet]
    : [];
  if (columns.length === 0) {
    return 's.*';
  }
  return columns.map((column) => `s.${column}`).join(',');
}

export function timeseriesQuery({
  id,
  table,
  idColumn,
  bandColumn = 'band',
  band = 'all',
  detail = 'full',
  joinTimeColumn,
  metadata,
}: {
  id: string;
  table: string;
  idColumn: string;
  bandColumn?: string;
  band?: Band;
  detail?: Detail;
  joinTimeColumn?: string;
  metadata: TapMetadata;
}): string {
  const columns = tapColumns(table, detail, metadata);

  let adql: string;
  // Normalized time series tables carry no time column; join on the visit
  if (joinTimeColumn !== undefined) {
    const separator = joinTimeColumn.lastIndexOf('.');
    const joinTable = joinTimeColumn.slice(0, separator);
    const timeColumn = joinTimeColumn.slice(separator + 1);
    adql =
      `SELECT t.${timeColumn},${columns} FROM ${table} AS s` +
      ` JOIN ${joinTable} AS t ON s.ccdVisitId = t.ccdVisitId`;
  } else {
    adql = `SELECT ${columns} FROM ${table} AS s`;
  }

  adql += ` WHERE s.${idColumn} = ${id}`;
  if (band !== 'all') {
    adql += ` AND s.${bandColumn} = '${band}'`;
  }

  return adql;
}

export function catalogRowQuery({
  table,
  column,
  value,
}: {
  table: string;
  column: string;
  value: string;
}): string {
  return `SELECT * FROM ${table} WHERE ${column} = ${value}`;
}
