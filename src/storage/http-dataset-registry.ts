/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as axios, AxiosInstance } from 'axios';
import winston from 'winston';

import { DetailedError, NotFoundError } from '../lib/error.js';
import type {
  BackendCallOptions,
  ImageIdentifier,
  ObjectReference,
} from '../types.js';

interface DatasetLocation {
  uri: string;
  size?: number;
  content_type?: string;
  dataset_type?: string;
  expires_at?: string;
}

function isContentLength(value: unknown): boolean {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

function isTimestamp(value: unknown): boolean {
  return typeof value === 'string' && !Number.isNaN(Date.parse(value));
}

function isDatasetLocation(value: unknown): value is DatasetLocation {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.uri === 'string' &&
    (record.size === undefined || isContentLength(record.size)) &&
    (record.content_type === undefined ||
      typeof record.content_type === 'string') &&
    (record.dataset_type === undefined ||
      typeof record.dataset_type === 'string') &&
    (record.expires_at === undefined || isTimestamp(record.expires_at))
  );
}

/**
 * Looks up image datasets in the dataset registry service. The registry may
 * return either an object store URI that still needs signing or an http(s)
 * URL it has signed itself.
 */
export class HttpDatasetRegistry {
  private log: winston.Logger;
  private axiosInstance: AxiosInstance;

  constructor({
    log,
    registryUrl,
    requestTimeoutMs = 10000,
  }: {
    log: winston.Logger;
    registryUrl: string;
    requestTimeoutMs?: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.axiosInstance = axios.create({
      baseURL: registryUrl,
      timeout: requestTimeoutMs,
    });
  }

  async locate(
    identifier: ImageIdentifier,
    options?: BackendCallOptions,
  ): Promise<ObjectReference> {
    const log = this.log.child({
      method: 'locate',
      repository: identifier.repository,
      datasetId: identifier.datasetId,
    });
    log.debug('Retrieving dataset location from registry');

    const response = await this.axiosInstance.get<unknown>(
      `/repositories/${encodeURIComponent(identifier.repository)}/datasets/${encodeURIComponent(identifier.datasetId)}`,
      {
        signal: options?.signal,
        headers:
          options?.token !== undefined
            ? { Authorization: `Bearer ${options.token}` }
            : undefined,
        validateStatus: (status) => status === 200 || status === 404,
      },
    );

    if (response.status === 404) {
      log.warn('Dataset does not exist');
      throw new NotFoundError(`Dataset ${identifier.raw} does not exist`);
    }

    const location = response.data;
    if (!isDatasetLocation(location)) {
      throw new DetailedError(
        `Invalid registry response for ${identifier.raw}`,
      );
    }
    log.debug('Got dataset location from registry', { uri: location.uri });

    return {
      uri: location.uri,
      size: location.size,
      contentType: location.content_type,
      datasetType: location.dataset_type,
      expiresAt:
        location.expires_at !== undefined
          ? new Date(location.expires_at)
          : undefined,
    };
  }
}
