/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { HIPS_PROPERTY_KEY_WIDTH } from '../constants.js';
import type { CollectionListEntry } from '../types.js';

export function formatProperties(
  properties: Readonly<Record<string, string>>,
): string {
  return Object.entries(properties)
    .map(([key, value]) => `${key.padEnd(HIPS_PROPERTY_KEY_WIDTH)}= ${value}`)
    .join('\n');
}

function propertiesBlock(entry: CollectionListEntry): string {
  if (entry.text === undefined) {
    return `${formatProperties(entry.properties)}\n`;
  }
  return entry.text.endsWith('\n') ? entry.text : `${entry.text}\n`;
}

/**
 * Serialize collections as a HiPS list: one properties file per collection,
 * separated by blank lines. Published file text is kept as is; entries without
 * it are formatted from their properties. Keys listed in `order` come first,
 * in that order.
 */
export function formatHipsList(
  entries: ReadonlyMap<string, CollectionListEntry>,
  order: readonly string[] = [],
): string {
  const keys = [
    ...order.filter((key) => entries.has(key)),
    ...[...entries.keys()].filter((key) => !order.includes(key)),
  ];

  const blocks: string[] = [];
  for (const key of keys) {
    const entry = entries.get(key);
    if (entry !== undefined) {
      blocks.push(propertiesBlock(entry));
    }
  }
  return blocks.join('\n');
}
