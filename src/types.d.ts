/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

//
// Identifiers
//

export type IdentifierKind = 'Image' | 'CatalogRow' | 'Unknown';

export interface ImageIdentifier {
  kind: 'Image';
  raw: string;
  repository: string;
  datasetId: string;
}

export interface CatalogRowIdentifier {
  kind: 'CatalogRow';
  raw: string;
  table: string;
  column: string;
  value: string;
}

export interface UnknownIdentifier {
  kind: 'Unknown';
  raw: string;
  scheme: string;
}

export type ParsedIdentifier =
  | ImageIdentifier
  | CatalogRowIdentifier
  | UnknownIdentifier;

export type KnownIdentifier = ImageIdentifier | CatalogRowIdentifier;

//
// Backend collaborators
//

export interface BackendCallOptions {
  signal?: AbortSignal;
  // Delegated token of the requesting user, forwarded as-is
  token?: string;
}

export interface ObjectReference {
  uri: string;
  size?: number;
  contentType?: string;
  datasetType?: string;
  // Set when the URI was already signed by the backend
  expiresAt?: Date;
  // Public references are served without signing
  public?: boolean;
}

export interface SignedUrl {
  url: string;
  expiresAt?: Date;
}

export interface StorageResolver {
  /**
   * Resolve an identifier to a byte-addressable object.
   * Rejects with NotFoundError when no such object exists.
   */
  locate(
    identifier: KnownIdentifier,
    options?: BackendCallOptions,
  ): Promise<ObjectReference>;
}

export interface UrlSigner {
  /**
   * Rejects with SigningError when the reference cannot be signed.
   */
  sign(
    reference: ObjectReference,
    ttlSeconds: number,
    options?: BackendCallOptions,
  ): Promise<SignedUrl>;
}

export interface CutoutLocator {
  /**
   * Rejects with ServiceUnavailableError when no cutout service serves the
   * deployment.
   */
  endpointFor(deployment: string, options?: BackendCallOptions): Promise<string>;
}

export interface CollectionRecord {
  key: string;
  url: string;
  properties: Readonly<Record<string, string>>;
  // Properties file as published, with hips_service_url added
  text?: string;
}

export interface CollectionListing {
  collections: CollectionRecord[];
  // Keys that exist but could not be fetched this time
  unavailable: string[];
}

export interface CollectionSource {
  /**
   * Enumerate the full collection set. Rejects with SourceUnavailableError
   * when nothing could be fetched.
   */
  listCollections(options?: BackendCallOptions): Promise<CollectionListing>;
  getCollection?(
    key: string,
    options?: BackendCallOptions,
  ): Promise<CollectionRecord>;
}

//
// DataLink model
//

export interface LinkEntry {
  id: string;
  accessUrl: string;
  serviceDef: string;
  errorMessage: string;
  description: string;
  semantics: string;
  contentType: string;
  contentLength?: number;
}

export interface ServiceParameter {
  name: string;
  datatype: 'char' | 'double' | 'long';
  arraysize?: string;
  unit?: string;
  ucd?: string;
  xtype?: string;
  value: string;
}

export interface ServiceDescriptor {
  id: string;
  accessUrl: string;
  standardId: string;
  inputParams: ServiceParameter[];
}

export interface ExpiryWindow {
  minExpiry: Date;
}

export interface TimeseriesSource {
  table: string;
  idColumn: string;
  joinTimeColumn?: string;
  bandColumn?: string;
}

export interface LinkCapabilities {
  cutout: boolean;
  cutoutExcludedDatasetTypes: readonly string[];
  timeseriesSources: Readonly<Record<string, TimeseriesSource>>;
}

export interface AssembledLinks {
  entries: LinkEntry[];
  descriptors: ServiceDescriptor[];
  window?: ExpiryWindow;
}

//
// Collection list cache
//

export interface CollectionListEntry {
  key: string;
  url: string;
  properties: Readonly<Record<string, string>>;
  text?: string;
  refreshedAt: Date;
}

export type CollectionListState = 'empty' | 'fresh' | 'stale' | 'refreshing';

export interface CollectionListSnapshot {
  entries: ReadonlyMap<string, CollectionListEntry>;
  lastSuccessAt?: Date;
  healthy: boolean;
}

//
// TAP metadata
//

// Table name -> column set name (tap:principal, lsst:minimal) -> columns
export type TapMetadata = Record<string, Record<string, string[]>>;
