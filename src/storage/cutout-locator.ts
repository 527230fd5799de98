/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { ServiceUnavailableError } from '../lib/error.js';
import type { BackendCallOptions, CutoutLocator } from '../types.js';

/**
 * Cutout endpoints come from configuration: a per-repository URL when one is
 * set, otherwise the deployment-wide default.
 */
export class StaticCutoutLocator implements CutoutLocator {
  private defaultUrl: string | undefined;
  private urls: Map<string, string>;

  constructor({
    defaultUrl,
    urls = {},
  }: {
    defaultUrl?: string;
    urls?: Record<string, string>;
  }) {
    this.defaultUrl = defaultUrl;
    this.urls = new Map(Object.entries(urls));
  }

  async endpointFor(
    deployment: string,
    options?: BackendCallOptions,
  ): Promise<string> {
    options?.signal?.throwIfAborted();
    const url = this.urls.get(deployment) ?? this.defaultUrl;
    if (url === undefined) {
      throw new ServiceUnavailableError(
        `No cutout service is available for ${deployment}`,
      );
    }
    return url;
  }
}
