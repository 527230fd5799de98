/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { S3Client } from '@aws-sdk/client-s3';
import { fromNodeProviderChain } from '@aws-sdk/credential-providers';

import * as config from './config.js';

// Credentials resolve lazily on the first signature, so the service starts
// without them and reports signing failures per link
export const s3Client = new S3Client({
  region: config.S3_REGION,
  endpoint: config.S3_ENDPOINT_URL,
  forcePathStyle: config.S3_ENDPOINT_URL !== undefined,
  credentials: fromNodeProviderChain(),
});
