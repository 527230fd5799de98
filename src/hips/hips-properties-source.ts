/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as axios, AxiosInstance } from 'axios';
import winston from 'winston';

import { HIPS_PROPERTY_KEY_WIDTH } from '../constants.js';
import { SourceUnavailableError, errorMessage } from '../lib/error.js';
import type {
  BackendCallOptions,
  CollectionListing,
  CollectionRecord,
  CollectionSource,
} from '../types.js';

/**
 * Parse a HiPS properties file into an ordered record. Blank lines and
 * `#` comments are skipped; later duplicates win.
 */
export function parseProperties(text: string): Record<string, string> {
  const properties: Record<string, string> = {};
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) {
      continue;
    }
    const separator = trimmed.indexOf('=');
    if (separator <= 0) {
      continue;
    }
    properties[trimmed.slice(0, separator).trim()] = trimmed
      .slice(separator + 1)
      .trim();
  }
  return properties;
}

/**
 * Our properties files do not carry `hips_service_url`, which every HiPS list
 * entry needs. Add it before `hips_status`, or last if that is missing.
 */
export function withServiceUrl(
  properties: Record<string, string>,
  serviceUrl: string,
): Record<string, string> {
  const result: Record<string, string> = {};
  let inserted = false;
  for (const [key, value] of Object.entries(properties)) {
    if (key === 'hips_service_url') {
      continue;
    }
    if (key === 'hips_status' && !inserted) {
      result.hips_service_url = serviceUrl;
      inserted = true;
    }
    result[key] = value;
  }
  if (!inserted) {
    result.hips_service_url = serviceUrl;
  }
  return result;
}

/**
 * Add the `hips_service_url` line to a properties file without touching the
 * rest of its text. The line goes before `hips_status`, or last if that is
 * missing.
 */
export function insertServiceUrlLine(text: string, serviceUrl: string): string {
  const serviceLine = `${'hips_service_url'.padEnd(HIPS_PROPERTY_KEY_WIDTH)}= ${serviceUrl}`;
  const lines = text
    .split('\n')
    .filter((line) => !/^hips_service_url\s*=/.test(line));
  const status = lines.findIndex((line) => /^hips_status\s*=/.test(line));
  if (status >= 0) {
    lines.splice(status, 0, serviceLine);
  } else {
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    lines.push(serviceLine, '');
  }
  return lines.join('\n');
}

/**
 * Reads the `properties` file of each HiPS tree of one dataset.
 */
export class HipsPropertiesSource implements CollectionSource {
  private log: winston.Logger;
  private axiosInstance: AxiosInstance;
  private baseUrl: string;
  private paths: string[];
  private token: string | undefined;

  constructor({
    log,
    dataset,
    baseUrl,
    paths,
    token,
    requestTimeoutMs = 10000,
  }: {
    log: winston.Logger;
    dataset: string;
    baseUrl: string;
    paths: string[];
    token?: string;
    requestTimeoutMs?: number;
  }) {
    this.log = log.child({ class: this.constructor.name, dataset });
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.paths = paths;
    this.token = token;
    this.axiosInstance = axios.create({
      timeout: requestTimeoutMs,
      responseType: 'text',
    });
  }

  async listCollections(
    options?: BackendCallOptions,
  ): Promise<CollectionListing> {
    const collections: CollectionRecord[] = [];
    const unavailable: string[] = [];

    for (const path of this.paths) {
      try {
        collections.push(await this.getCollection(path, options));
      } catch (error: unknown) {
        options?.signal?.throwIfAborted();
        this.log.warn('Unable to get HiPS properties', {
          path,
          error: errorMessage(error),
        });
        unavailable.push(path);
      }
    }

    if (collections.length === 0 && unavailable.length > 0) {
      throw new SourceUnavailableError(
        `Unable to get HiPS properties from ${this.baseUrl}`,
        { unavailable },
      );
    }

    return { collections, unavailable };
  }

  async getCollection(
    key: string,
    options?: BackendCallOptions,
  ): Promise<CollectionRecord> {
    const url = `${this.baseUrl}/${key}`;
    const token = options?.token ?? this.token;
    const response = await this.axiosInstance.get<string>(
      `${url}/properties`,
      {
        signal: options?.signal,
        headers:
          token !== undefined ? { Authorization: `bearer ${token}` } : undefined,
      },
    );

    if (typeof response.data !== 'string') {
      throw new SourceUnavailableError(`Invalid HiPS properties at ${url}`);
    }

    return {
      key,
      url,
      properties: withServiceUrl(parseProperties(response.data), url),
      text: insertServiceUrlLine(response.data, url),
    };
  }
}
