/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { contentTypes, semantics } from '../constants.js';
import {
  NotFoundError,
  ServiceUnavailableError,
  SigningError,
} from '../lib/error.js';
import * as metrics from '../metrics.js';
import { SpanStatusCode, startChildSpan, tracer } from '../tracing.js';
import { ExpiryAwareSigner } from './expiry-aware-signer.js';
import { cutoutServiceDescriptor } from './service-descriptors.js';
import type {
  AssembledLinks,
  BackendCallOptions,
  CutoutLocator,
  KnownIdentifier,
  LinkCapabilities,
  LinkEntry,
  ObjectReference,
  ServiceDescriptor,
  StorageResolver,
  TimeseriesSource,
  UrlSigner,
} from '../types.js';

export type LinkTarget =
  | {
      type: 'access';
      url: string;
      contentType: string;
      contentLength?: number;
    }
  | {
      type: 'service';
      descriptor: ServiceDescriptor;
      contentType: string;
    };

export type LinkResult =
  | { ok: true; target: LinkTarget }
  | { ok: false; error: unknown };

interface AssemblyContext {
  identifier: KnownIdentifier;
  capabilities: LinkCapabilities;
  // Present when the primary artifact was located
  primary?: ObjectReference;
  cutoutLocator: CutoutLocator;
  linksBaseUrl: string;
  callOptions: () => BackendCallOptions;
}

interface CapabilityDefinition {
  name: string;
  semantics: string;
  description: string;
  isEligible(context: AssemblyContext): boolean;
  build(context: AssemblyContext): Promise<LinkResult>;
}

// Table names come from requests; only configured tables count
function timeseriesSourceFor(
  capabilities: LinkCapabilities,
  table: string,
): TimeseriesSource | undefined {
  return Object.hasOwn(capabilities.timeseriesSources, table)
    ? capabilities.timeseriesSources[table]
    : undefined;
}

/**
 * Optional link types, in the order their rows appear after the primary row.
 */
export const LINK_CAPABILITIES: readonly CapabilityDefinition[] = [
  {
    name: 'cutout',
    semantics: semantics.cutout,
    description: 'Cutout service for this image',
    isEligible: ({ identifier, capabilities, primary }) =>
      capabilities.cutout &&
      identifier.kind === 'Image' &&
      !(
        primary?.datasetType !== undefined &&
        capabilities.cutoutExcludedDatasetTypes.includes(primary.datasetType)
      ),
    build: async ({ identifier, cutoutLocator, callOptions }) => {
      if (identifier.kind !== 'Image') {
        throw new Error(`Cutouts are not defined for ${identifier.kind}`);
      }
      const accessUrl = await cutoutLocator.endpointFor(
        identifier.repository,
        callOptions(),
      );
      return {
        ok: true,
        target: {
          type: 'service',
          descriptor: cutoutServiceDescriptor({
            id: identifier.raw,
            accessUrl,
          }),
          contentType: contentTypes.fits,
        },
      };
    },
  },
  {
    name: 'timeseries',
    semantics: semantics.auxiliary,
    description: 'Time series for this object',
    isEligible: ({ identifier, capabilities }) =>
      identifier.kind === 'CatalogRow' &&
      timeseriesSourceFor(capabilities, identifier.table) !== undefined,
    build: async ({ identifier, capabilities, linksBaseUrl }) => {
      const source =
        identifier.kind === 'CatalogRow'
          ? timeseriesSourceFor(capabilities, identifier.table)
          : undefined;
      if (identifier.kind !== 'CatalogRow' || source === undefined) {
        throw new Error(`No time series is configured for ${identifier.raw}`);
      }
      const params = new URLSearchParams({
        id: identifier.value,
        table: source.table,
        id_column: source.idColumn,
      });
      if (source.bandColumn !== undefined) {
        params.set('band_column', source.bandColumn);
      }
      if (source.joinTimeColumn !== undefined) {
        params.set('join_time_column', source.joinTimeColumn);
      }
      return {
        ok: true,
        target: {
          type: 'access',
          url: `${linksBaseUrl}/timeseries?${params.toString()}`,
          contentType: contentTypes.votable,
        },
      };
    },
  },
];

const PRIMARY_DESCRIPTIONS = {
  Image: 'Primary image or dataset',
  CatalogRow: 'Catalog row',
} as const;

const PRIMARY_CONTENT_TYPES = {
  Image: contentTypes.fits,
  CatalogRow: contentTypes.votable,
} as const;

/**
 * Map an error to the DataLink fault name it is reported under.
 */
export function faultMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof NotFoundError) {
    return `NotFoundFault: ${message}`;
  }
  if (
    error instanceof ServiceUnavailableError ||
    (error instanceof Error && error.name === 'TimeoutError')
  ) {
    return `TransientFault: ${message}`;
  }
  if (error instanceof SigningError) {
    return `FatalFault: ${message}`;
  }
  return `DefaultFault: ${message}`;
}

export function toLinkEntry({
  id,
  semantics,
  description,
  result,
}: {
  id: string;
  semantics: string;
  description: string;
  result: LinkResult;
}): LinkEntry {
  const entry: LinkEntry = {
    id,
    accessUrl: '',
    serviceDef: '',
    errorMessage: '',
    description,
    semantics,
    contentType: '',
  };

  if (!result.ok) {
    entry.errorMessage = faultMessage(result.error);
    return entry;
  }

  const { target } = result;
  entry.contentType = target.contentType;
  if (target.type === 'access') {
    entry.accessUrl = target.url;
    if (target.contentLength !== undefined) {
      entry.contentLength = target.contentLength;
    }
  } else {
    entry.serviceDef = target.descriptor.id;
  }
  return entry;
}

/**
 * Builds the ordered DataLink rows for an identifier. Every backend failure
 * is contained to the row it affects; only cancellation of the caller's
 * signal escapes.
 */
export class LinkAssembler {
  private log: winston.Logger;
  private storageResolver: StorageResolver;
  private urlSigner: UrlSigner;
  private cutoutLocator: CutoutLocator;
  private linksBaseUrl: string;
  private linksLifetimeSeconds: number;
  private backendTimeoutMs: number;

  constructor({
    log,
    storageResolver,
    urlSigner,
    cutoutLocator,
    linksBaseUrl,
    linksLifetimeSeconds = 3600,
    backendTimeoutMs = 10000,
  }: {
    log: winston.Logger;
    storageResolver: StorageResolver;
    urlSigner: UrlSigner;
    cutoutLocator: CutoutLocator;
    linksBaseUrl: string;
    linksLifetimeSeconds?: number;
    backendTimeoutMs?: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.storageResolver = storageResolver;
    this.urlSigner = urlSigner;
    this.cutoutLocator = cutoutLocator;
    this.linksBaseUrl = linksBaseUrl;
    this.linksLifetimeSeconds = linksLifetimeSeconds;
    this.backendTimeoutMs = backendTimeoutMs;
  }

  async assemble(
    identifier: KnownIdentifier,
    capabilities: LinkCapabilities,
    options: BackendCallOptions = {},
  ): Promise<AssembledLinks> {
    const log = this.log.child({ method: 'assemble', id: identifier.raw });
    const span = tracer.startSpan('LinkAssembler.assemble', {
      attributes: {
        'datalink.id': identifier.raw,
        'datalink.kind': identifier.kind,
      },
    });

    try {
      const signer = new ExpiryAwareSigner({ signer: this.urlSigner });
      const callOptions = () => this.callOptions(options);

      const primary = await this.buildPrimary({
        identifier,
        signer,
        callOptions,
        signal: options.signal,
      });
      const entries: LinkEntry[] = [
        toLinkEntry({
          id: identifier.raw,
          semantics: semantics.this,
          description: PRIMARY_DESCRIPTIONS[identifier.kind],
          result: primary.result,
        }),
      ];
      const descriptors: ServiceDescriptor[] = [];

      const context: AssemblyContext = {
        identifier,
        capabilities,
        primary: primary.reference,
        cutoutLocator: this.cutoutLocator,
        linksBaseUrl: this.linksBaseUrl,
        callOptions,
      };

      for (const capability of LINK_CAPABILITIES) {
        if (!capability.isEligible(context)) {
          continue;
        }

        const capabilitySpan = startChildSpan(
          'LinkAssembler.buildCapability',
          { attributes: { 'datalink.capability': capability.name } },
          span,
        );
        const result = await this.attempt(
          () => capability.build(context),
          options.signal,
        )
          .then((result) => {
            if (!result.ok) {
              capabilitySpan.setStatus({ code: SpanStatusCode.ERROR });
            }
            return result;
          })
          .finally(() => {
            capabilitySpan.end();
          });
        if (result.ok && result.target.type === 'service') {
          descriptors.push(result.target.descriptor);
        }
        entries.push(
          toLinkEntry({
            id: identifier.raw,
            semantics: capability.semantics,
            description: capability.description,
            result,
          }),
        );
      }

      for (const entry of entries) {
        if (entry.errorMessage !== '') {
          metrics.linkEntryErrorsCounter.inc({ semantics: entry.semantics });
          log.warn('Link could not be produced', {
            semantics: entry.semantics,
            error: entry.errorMessage,
          });
        }
      }

      span.setAttributes({
        'datalink.entries': entries.length,
        'datalink.descriptors': descriptors.length,
      });

      return { entries, descriptors, window: signer.window };
    } catch (error: unknown) {
      span.setStatus({ code: SpanStatusCode.ERROR });
      throw error;
    } finally {
      span.end();
    }
  }

  private async buildPrimary({
    identifier,
    signer,
    callOptions,
    signal,
  }: {
    identifier: KnownIdentifier;
    signer: ExpiryAwareSigner;
    callOptions: () => BackendCallOptions;
    signal?: AbortSignal;
  }): Promise<{ result: LinkResult; reference?: ObjectReference }> {
    let reference: ObjectReference;
    try {
      reference = await this.storageResolver.locate(identifier, callOptions());
    } catch (error: unknown) {
      signal?.throwIfAborted();
      return { result: { ok: false, error } };
    }

    const located = reference;
    const result = await this.attempt(async () => {
      let url: string;
      if (located.public === true) {
        url = located.uri;
        signer.track(located.expiresAt);
      } else {
        ({ url } = await signer.sign(
          located,
          this.linksLifetimeSeconds,
          callOptions(),
        ));
      }
      return {
        ok: true,
        target: {
          type: 'access',
          url,
          contentType:
            located.contentType ?? PRIMARY_CONTENT_TYPES[identifier.kind],
          contentLength:
            located.size !== undefined &&
            Number.isSafeInteger(located.size) &&
            located.size >= 0
              ? located.size
              : undefined,
        },
      };
    }, signal);

    return { result, reference };
  }

  private async attempt(
    fn: () => Promise<LinkResult>,
    signal: AbortSignal | undefined,
  ): Promise<LinkResult> {
    try {
      return await fn();
    } catch (error: unknown) {
      signal?.throwIfAborted();
      return { ok: false, error };
    }
  }

  private callOptions(options: BackendCallOptions): BackendCallOptions {
    const deadline = AbortSignal.timeout(this.backendTimeoutMs);
    return {
      ...options,
      signal:
        options.signal !== undefined
          ? AbortSignal.any([options.signal, deadline])
          : deadline,
    };
  }
}
