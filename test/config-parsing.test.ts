/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { afterEach, describe, it } from 'node:test';

import * as env from '../src/lib/env.js';
import {
  parseHipsDatasets,
  parseJsonRecord,
  parseStringRecord,
  parseTimeseriesSources,
} from '../src/lib/config-parsing.js';

describe('env', () => {
  afterEach(() => {
    delete process.env.TEST_DATALINK_VALUE;
  });

  it('should treat blank variables as unset', () => {
    process.env.TEST_DATALINK_VALUE = '  ';

    assert.equal(env.varOrDefault('TEST_DATALINK_VALUE', 'fallback'), 'fallback');
    assert.equal(env.varOrUndefined('TEST_DATALINK_VALUE'), undefined);
  });

  it('should split lists on commas and drop empty items', () => {
    process.env.TEST_DATALINK_VALUE = 'raw, bias,,flat ';

    assert.deepEqual(env.varAsList('TEST_DATALINK_VALUE', ''), [
      'raw',
      'bias',
      'flat',
    ]);
  });
});

describe('parseJsonRecord', () => {
  it('should reject invalid JSON', () => {
    assert.throws(() => parseJsonRecord('HIPS_DATASETS', '{'), {
      message: 'HIPS_DATASETS is not valid JSON',
    });
  });

  it('should reject values that are not objects', () => {
    assert.throws(() => parseJsonRecord('HIPS_DATASETS', '["dp1"]'), {
      message: 'HIPS_DATASETS must be a JSON object',
    });
  });
});

describe('parseStringRecord', () => {
  it('should accept a map of strings', () => {
    assert.deepEqual(
      parseStringRecord(
        'CUTOUT_SYNC_URLS',
        '{"dp02": "https://data.example.test/api/cutout/sync"}',
      ),
      { dp02: 'https://data.example.test/api/cutout/sync' },
    );
  });

  it('should name the entry that is not a string', () => {
    assert.throws(() => parseStringRecord('CUTOUT_SYNC_URLS', '{"dp02": 1}'), {
      message: 'CUTOUT_SYNC_URLS.dp02 must be a string',
    });
  });
});

describe('parseHipsDatasets', () => {
  it('should parse datasets and trim trailing slashes from URLs', () => {
    assert.deepEqual(
      parseHipsDatasets(
        'HIPS_DATASETS',
        JSON.stringify({
          dp1: {
            url: 'https://data.example.test/api/hips/v2/dp1/',
            paths: ['color_gri', 'band_r'],
          },
        }),
      ),
      {
        dp1: {
          url: 'https://data.example.test/api/hips/v2/dp1',
          paths: ['color_gri', 'band_r'],
        },
      },
    );
  });

  it('should reject datasets without paths', () => {
    assert.throws(
      () =>
        parseHipsDatasets(
          'HIPS_DATASETS',
          '{"dp1": {"url": "https://data.example.test", "paths": [1]}}',
        ),
      { message: 'HIPS_DATASETS.dp1 must be { url: string, paths: string[] }' },
    );
  });
});

describe('parseTimeseriesSources', () => {
  it('should keep only the optional columns that are given', () => {
    assert.deepEqual(
      parseTimeseriesSources(
        'TIMESERIES_SOURCES',
        JSON.stringify({
          'dp02.Object': {
            table: 'dp02.ForcedSource',
            idColumn: 'objectId',
            joinTimeColumn: 'dp02.CcdVisit.expMidptMJD',
          },
          'dp02.DiaObject': {
            table: 'dp02.DiaSource',
            idColumn: 'diaObjectId',
            bandColumn: 'filterName',
          },
        }),
      ),
      {
        'dp02.Object': {
          table: 'dp02.ForcedSource',
          idColumn: 'objectId',
          joinTimeColumn: 'dp02.CcdVisit.expMidptMJD',
        },
        'dp02.DiaObject': {
          table: 'dp02.DiaSource',
          idColumn: 'diaObjectId',
          bandColumn: 'filterName',
        },
      },
    );
  });

  it('should keep a __proto__ table as an ordinary entry', () => {
    const sources = parseTimeseriesSources(
      'TIMESERIES_SOURCES',
      '{"__proto__": {"table": "dp02.ForcedSource", "idColumn": "objectId"}}',
    );

    assert.equal(Object.getPrototypeOf(sources), Object.prototype);
    assert.ok(Object.hasOwn(sources, '__proto__'));
    assert.equal(Object.hasOwn(sources, 'constructor'), false);
  });

  it('should require a table and id column', () => {
    assert.throws(
      () =>
        parseTimeseriesSources(
          'TIMESERIES_SOURCES',
          '{"dp02.Object": {"table": "dp02.ForcedSource"}}',
        ),
      { message: 'TIMESERIES_SOURCES.dp02.Object must include table and idColumn' },
    );
  });
});
