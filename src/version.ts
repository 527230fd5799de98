/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as env from './lib/env.js';

export const name = 'datalink-node';

export const release = env.varOrDefault('RELEASE', '1.0.0');

export const description =
  'IVOA DataLink and HiPS list service for an astronomical data platform';

export const repositoryUrl = env.varOrDefault(
  'REPOSITORY_URL',
  'https://github.com/example/datalink-node',
);

export const documentationUrl = env.varOrDefault(
  'DOCUMENTATION_URL',
  'https://github.com/example/datalink-node#readme',
);

export function metadata() {
  return {
    name,
    version: release,
    description,
    repository_url: repositoryUrl,
    documentation_url: documentationUrl,
  };
}
