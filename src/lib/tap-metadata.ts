/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'yaml';

import type { TapMetadata } from '../types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === 'string')
  );
}

/**
 * Extract the `tables` section of one metadata document. Column sets that
 * are not lists of strings are skipped.
 */
export function parseTapMetadataDocument(document: unknown): TapMetadata {
  if (!isRecord(document) || !isRecord(document.tables)) {
    throw new Error('TAP metadata document has no tables section');
  }

  const tables: TapMetadata = {};
  for (const [table, columnSets] of Object.entries(document.tables)) {
    if (!isRecord(columnSets)) {
      continue;
    }
    const sets: Record<string, string[]> = {};
    for (const [setName, columns] of Object.entries(columnSets)) {
      if (isStringArray(columns)) {
        sets[setName] = columns;
      }
    }
    tables[table] = sets;
  }
  return tables;
}

/**
 * Load and merge every `.yaml` file in a directory. Table entries that appear
 * in more than one file are merged by column set.
 */
export function loadTapMetadata(directory: string | undefined): TapMetadata {
  if (directory === undefined) {
    return {};
  }

  const metadata: TapMetadata = {};
  const files = fs
    .readdirSync(directory)
    .filter((file) => path.extname(file) === '.yaml')
    .sort();

  for (const file of files) {
    const document: unknown = parse(
      fs.readFileSync(path.join(directory, file), 'utf-8'),
    );
    for (const [table, sets] of Object.entries(
      parseTapMetadataDocument(document),
    )) {
      metadata[table] = { ...metadata[table], ...sets };
    }
  }

  return metadata;
}
