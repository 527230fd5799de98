/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';
import fc from 'fast-check';
import { XMLParser } from 'fast-xml-parser';

import { createTestLogger } from '../../test/test-logger.js';
import {
  NotFoundError,
  ServiceUnavailableError,
  SigningError,
} from '../lib/error.js';
import { requireKnownKind } from '../lib/identifier.js';
import { LinkAssembler } from './link-assembler.js';
import { ResponseRenderer } from './response-renderer.js';
import type { LinkCapabilities, LinkEntry } from '../types.js';

const log = createTestLogger({ suite: 'LinkAssembler properties' });

const capabilities: LinkCapabilities = {
  cutout: true,
  cutoutExcludedDatasetTypes: ['raw'],
  timeseriesSources: {},
};

type Outcome = 'ok' | 'missing' | 'failed';

const outcome = fc.constantFrom<Outcome>('ok', 'missing', 'failed');

function createAssembler({
  locate,
  sign,
  cutout,
}: {
  locate: Outcome;
  sign: Outcome;
  cutout: Outcome;
}) {
  return new LinkAssembler({
    log,
    storageResolver: {
      locate: async (identifier) => {
        if (locate === 'missing') {
          throw new NotFoundError(`Dataset ${identifier.raw} does not exist`);
        }
        if (locate === 'failed') {
          throw new Error('registry returned 500');
        }
        return { uri: 's3://bucket/a&b.fits', size: 2048 };
      },
    },
    urlSigner: {
      sign: async (reference) => {
        if (sign !== 'ok') {
          throw new SigningError(`Object URL ${reference.uri} was not signed`);
        }
        return {
          url: 'https://bucket.example.test/a&b.fits?sig=test',
          expiresAt: new Date(Date.now() + 600 * 1000),
        };
      },
    },
    cutoutLocator: {
      endpointFor: async (deployment) => {
        if (cutout !== 'ok') {
          throw new ServiceUnavailableError(
            `No cutout service is available for ${deployment}`,
          );
        }
        return 'https://data.example.test/api/cutout/sync';
      },
    },
    linksBaseUrl: 'https://data.example.test/api/datalink',
  });
}

function linkKind(entry: {
  accessUrl: string;
  serviceDef: string;
  errorMessage: string;
}): string {
  if (entry.accessUrl !== '') return 'access';
  if (entry.serviceDef !== '') return 'service';
  return 'error';
}

function asRecord(value: unknown): Record<string, unknown> {
  assert.ok(
    typeof value === 'object' && value !== null && !Array.isArray(value),
  );
  return { ...value };
}

function asArray(value: unknown): unknown[] {
  assert.ok(Array.isArray(value));
  return value;
}

function asString(value: unknown): string {
  assert.equal(typeof value, 'string');
  return String(value);
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  isArray: (name) => ['RESOURCE', 'TR', 'TD'].includes(name),
});

/**
 * Read the DataLink rows back out of a rendered document.
 */
function parseRows(xml: string): string[][] {
  const votable = asRecord(asRecord(parser.parse(xml)).VOTABLE);
  const results = asRecord(asArray(votable.RESOURCE)[0]);
  const tableData = asRecord(
    asRecord(asRecord(results.TABLE).DATA).TABLEDATA,
  );
  return asArray(tableData.TR).map((row) =>
    asArray(asRecord(row).TD).map(asString),
  );
}

const imageToken = fc.stringMatching(/^[A-Za-z0-9_.-]{1,40}$/);

describe('LinkAssembler properties', () => {
  it('should produce one #this row then one #cutout row for every image', async () => {
    await fc.assert(
      fc.asyncProperty(
        imageToken,
        outcome,
        outcome,
        outcome,
        async (token, locate, sign, cutout) => {
          const assembler = createAssembler({ locate, sign, cutout });
          const { entries } = await assembler.assemble(
            requireKnownKind(`img:${token}`),
            capabilities,
          );

          assert.deepEqual(
            entries.map(({ semantics }) => semantics),
            ['#this', '#cutout'],
          );
        },
      ),
      { numRuns: 100 },
    );
  });

  it('should populate exactly one of the link columns in every row', async () => {
    await fc.assert(
      fc.asyncProperty(
        imageToken,
        outcome,
        outcome,
        outcome,
        async (token, locate, sign, cutout) => {
          const assembler = createAssembler({ locate, sign, cutout });
          const { entries } = await assembler.assemble(
            requireKnownKind(`img:${token}`),
            capabilities,
          );

          for (const entry of entries) {
            const populated = [
              entry.accessUrl,
              entry.serviceDef,
              entry.errorMessage,
            ].filter((value) => value !== '');
            assert.equal(populated.length, 1);
          }
        },
      ),
      { numRuns: 100 },
    );
  });

  it('should recover semantics and link kinds from the rendered table', async () => {
    const renderer = new ResponseRenderer({ defaultMaxAgeSeconds: 3600 });

    await fc.assert(
      fc.asyncProperty(
        imageToken,
        outcome,
        outcome,
        outcome,
        async (token, locate, sign, cutout) => {
          const assembler = createAssembler({ locate, sign, cutout });
          const { entries, descriptors, window } = await assembler.assemble(
            requireKnownKind(`img:${token}`),
            capabilities,
          );
          const { body } = renderer.render(entries, descriptors, window);

          const expected = entries
            .map((entry: LinkEntry) => `${entry.semantics} ${linkKind(entry)}`)
            .sort();
          const actual = parseRows(body)
            .map(
              ([, accessUrl, serviceDef, errorMessage, , semantics]) =>
                `${semantics} ${linkKind({ accessUrl, serviceDef, errorMessage })}`,
            )
            .sort();
          assert.deepEqual(actual, expected);
        },
      ),
      { numRuns: 100 },
    );
  });
});
