/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { TimeseriesSource } from '../types.js';

export interface HipsDatasetConfig {
  url: string;
  paths: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonRecord(
  name: string,
  json: string,
): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new Error(`${name} is not valid JSON`, { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new Error(`${name} must be a JSON object`);
  }
  return parsed;
}

// Object.fromEntries keeps a __proto__ key as an own property
export function parseStringRecord(
  name: string,
  json: string,
): Record<string, string> {
  return Object.fromEntries(
    Object.entries(parseJsonRecord(name, json)).map(
      ([key, value]): [string, string] => {
        if (typeof value !== 'string') {
          throw new Error(`${name}.${key} must be a string`);
        }
        return [key, value];
      },
    ),
  );
}

export function parseHipsDatasets(
  name: string,
  json: string,
): Record<string, HipsDatasetConfig> {
  return Object.fromEntries(
    Object.entries(parseJsonRecord(name, json)).map(
      ([dataset, value]): [string, HipsDatasetConfig] => {
        if (
          !isRecord(value) ||
          typeof value.url !== 'string' ||
          !Array.isArray(value.paths) ||
          !value.paths.every((p): p is string => typeof p === 'string')
        ) {
          throw new Error(
            `${name}.${dataset} must be { url: string, paths: string[] }`,
          );
        }
        return [
          dataset,
          { url: value.url.replace(/\/+$/, ''), paths: value.paths },
        ];
      },
    ),
  );
}

export function parseTimeseriesSources(
  name: string,
  json: string,
): Record<string, TimeseriesSource> {
  return Object.fromEntries(
    Object.entries(parseJsonRecord(name, json)).map(
      ([table, value]): [string, TimeseriesSource] => {
        if (
          !isRecord(value) ||
          typeof value.table !== 'string' ||
          typeof value.idColumn !== 'string'
        ) {
          throw new Error(`${name}.${table} must include table and idColumn`);
        }
        return [
          table,
          {
            table: value.table,
            idColumn: value.idColumn,
            ...(typeof value.joinTimeColumn === 'string' && {
              joinTimeColumn: value.joinTimeColumn,
            }),
            ...(typeof value.bandColumn === 'string' && {
              bandColumn: value.bandColumn,
            }),
          },
        ];
      },
    ),
  );
}
