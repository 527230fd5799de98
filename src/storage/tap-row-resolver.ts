/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { contentTypes } from '../constants.js';
import { catalogRowQuery, tapSyncUrl } from '../lib/adql.js';
import type {
  BackendCallOptions,
  CatalogRowIdentifier,
  ObjectReference,
} from '../types.js';

/**
 * Catalog rows are served by a synchronous TAP query. The URL is public, so
 * it needs no signing and carries no expiry.
 */
export class TapRowResolver {
  private tapSyncUrl: string;

  constructor({ tapSyncUrl }: { tapSyncUrl: string }) {
    this.tapSyncUrl = tapSyncUrl;
  }

  async locate(
    identifier: CatalogRowIdentifier,
    options?: BackendCallOptions,
  ): Promise<ObjectReference> {
    options?.signal?.throwIfAborted();
    return {
      uri: tapSyncUrl(
        this.tapSyncUrl,
        catalogRowQuery({
          table: identifier.table,
          column: identifier.column,
          value: identifier.value,
        }),
      ),
      contentType: contentTypes.votable,
      public: true,
    };
  }
}
