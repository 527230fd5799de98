/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type {
  BackendCallOptions,
  CatalogRowIdentifier,
  ImageIdentifier,
  KnownIdentifier,
  ObjectReference,
  StorageResolver,
} from '../types.js';

interface Locator<T extends KnownIdentifier> {
  locate(identifier: T, options?: BackendCallOptions): Promise<ObjectReference>;
}

/**
 * Routes each identifier kind to the resolver that knows where it lives.
 */
export class CompositeStorageResolver implements StorageResolver {
  private images: Locator<ImageIdentifier>;
  private catalogRows: Locator<CatalogRowIdentifier>;

  constructor({
    images,
    catalogRows,
  }: {
    images: Locator<ImageIdentifier>;
    catalogRows: Locator<CatalogRowIdentifier>;
  }) {
    this.images = images;
    this.catalogRows = catalogRows;
  }

  async locate(
    identifier: KnownIdentifier,
    options?: BackendCallOptions,
  ): Promise<ObjectReference> {
    switch (identifier.kind) {
      case 'Image':
        return this.images.locate(identifier, options);
      case 'CatalogRow':
        return this.catalogRows.locate(identifier, options);
    }
  }
}
