/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { XMLBuilder } from 'fast-xml-parser';

import { contentTypes } from '../constants.js';
import { MalformedEntryError } from '../lib/error.js';
import type {
  ExpiryWindow,
  LinkEntry,
  ServiceDescriptor,
  ServiceParameter,
} from '../types.js';

export const VOTABLE_NAMESPACE = 'http://www.ivoa.net/xml/VOTable/v1.3';

/**
 * Columns of the DataLink table in their required order.
 *
 * @see {@link https://www.ivoa.net/documents/DataLink/ | IVOA DataLink 1.1, section 3.2}
 */
export const DATALINK_FIELDS = [
  { name: 'ID', datatype: 'char', arraysize: '*', ucd: 'meta.id;meta.main' },
  {
    name: 'access_url',
    datatype: 'char',
    arraysize: '*',
    ucd: 'meta.ref.url',
  },
  { name: 'service_def', datatype: 'char', arraysize: '*', ucd: 'meta.ref' },
  {
    name: 'error_message',
    datatype: 'char',
    arraysize: '*',
    ucd: 'meta.code.error',
  },
  { name: 'description', datatype: 'char', arraysize: '*', ucd: 'meta.note' },
  { name: 'semantics', datatype: 'char', arraysize: '*', ucd: 'meta.code' },
  {
    name: 'content_type',
    datatype: 'char',
    arraysize: '*',
    ucd: 'meta.code.mime',
  },
  {
    name: 'content_length',
    datatype: 'long',
    unit: 'byte',
    ucd: 'phys.size;meta.file',
  },
] as const;

export interface CacheDirectives {
  maxAgeSeconds: number;
  cacheControl: string;
}

export interface RenderedResponse extends CacheDirectives {
  body: string;
  contentType: string;
}

/**
 * Throws MalformedEntryError unless exactly one of access_url, service_def
 * and error_message is set.
 */
export function validateLinkEntry(entry: LinkEntry) {
  const populated = [entry.accessUrl, entry.serviceDef, entry.errorMessage]
    .filter((value) => value !== '').length;
  if (populated !== 1) {
    throw new MalformedEntryError(
      `Link entry for ${entry.id} (${entry.semantics}) must set exactly one of access_url, service_def and error_message`,
      { entry },
    );
  }
  if (
    entry.contentLength !== undefined &&
    (!Number.isInteger(entry.contentLength) || entry.contentLength < 0)
  ) {
    throw new MalformedEntryError(
      `Link entry for ${entry.id} has invalid content_length ${entry.contentLength}`,
      { entry },
    );
  }
}

export function cacheDirectives({
  window,
  now,
  defaultMaxAgeSeconds,
}: {
  window: ExpiryWindow | undefined;
  now: Date;
  defaultMaxAgeSeconds: number;
}): CacheDirectives {
  const maxAgeSeconds =
    window !== undefined
      ? Math.max(
          0,
          Math.floor((window.minExpiry.getTime() - now.getTime()) / 1000),
        )
      : defaultMaxAgeSeconds;
  return {
    maxAgeSeconds,
    cacheControl: `private, max-age=${maxAgeSeconds}`,
  };
}

function paramNode(param: ServiceParameter) {
  return {
    '@_name': param.name,
    '@_datatype': param.datatype,
    ...(param.arraysize !== undefined && { '@_arraysize': param.arraysize }),
    ...(param.unit !== undefined && { '@_unit': param.unit }),
    ...(param.ucd !== undefined && { '@_ucd': param.ucd }),
    ...(param.xtype !== undefined && { '@_xtype': param.xtype }),
    '@_value': param.value,
  };
}

function descriptorResource(descriptor: ServiceDescriptor) {
  return {
    '@_type': 'meta',
    '@_utype': 'adhoc:service',
    '@_ID': descriptor.id,
    PARAM: [
      {
        '@_name': 'standardID',
        '@_datatype': 'char',
        '@_arraysize': '*',
        '@_value': descriptor.standardId,
      },
      {
        '@_name': 'accessURL',
        '@_datatype': 'char',
        '@_arraysize': '*',
        '@_value': descriptor.accessUrl,
      },
    ],
    GROUP: {
      '@_name': 'inputParams',
      PARAM: descriptor.inputParams.map(paramNode),
    },
  };
}

function rowNode(entry: LinkEntry) {
  return {
    TD: [
      entry.id,
      entry.accessUrl,
      entry.serviceDef,
      entry.errorMessage,
      entry.description,
      entry.semantics,
      entry.contentType,
      entry.contentLength !== undefined ? entry.contentLength.toString() : '',
    ],
  };
}

/**
 * Renders DataLink rows and their service descriptors as a VOTable document.
 */
export class ResponseRenderer {
  private builder: XMLBuilder;
  private defaultMaxAgeSeconds: number;

  constructor({ defaultMaxAgeSeconds }: { defaultMaxAgeSeconds: number }) {
    this.defaultMaxAgeSeconds = defaultMaxAgeSeconds;
    this.builder = new XMLBuilder({
      ignoreAttributes: false,
      attributeNamePrefix: '@_',
      format: true,
      indentBy: '  ',
      suppressEmptyNode: true,
      suppressBooleanAttributes: false,
    });
  }

  render(
    entries: LinkEntry[],
    descriptors: ServiceDescriptor[],
    window: ExpiryWindow | undefined,
    now: Date = new Date(),
  ): RenderedResponse {
    const descriptorIds = new Set(descriptors.map(({ id }) => id));
    if (descriptorIds.size !== descriptors.length) {
      throw new MalformedEntryError('Service descriptor IDs must be unique');
    }
    for (const entry of entries) {
      validateLinkEntry(entry);
      if (entry.serviceDef !== '' && !descriptorIds.has(entry.serviceDef)) {
        throw new MalformedEntryError(
          `Link entry for ${entry.id} references unknown service descriptor ${entry.serviceDef}`,
          { entry },
        );
      }
    }

    const document = {
      '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8' },
      VOTABLE: {
        '@_xmlns': VOTABLE_NAMESPACE,
        '@_version': '1.3',
        RESOURCE: [
          {
            '@_type': 'results',
            TABLE: {
              FIELD: DATALINK_FIELDS.map((field) =>
                Object.fromEntries(
                  Object.entries(field).map(([key, value]) => [
                    `@_${key}`,
                    value,
                  ]),
                ),
              ),
              DATA: {
                TABLEDATA: {
                  TR: entries.map(rowNode),
                },
              },
            },
          },
          ...descriptors.map(descriptorResource),
        ],
      },
    };

    return {
      body: this.builder.build(document),
      contentType: contentTypes.votable,
      ...cacheDirectives({
        window,
        now,
        defaultMaxAgeSeconds: this.defaultMaxAgeSeconds,
      }),
    };
  }
}
