/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { CUTOUT_SERVICE_ID, standardIds } from '../constants.js';
import type { ServiceDescriptor } from '../types.js';

/**
 * Descriptor of the synchronous SODA cutout service for one dataset. The ID
 * parameter is bound to the dataset; the spatial parameters are left for the
 * client to fill in.
 */
export function cutoutServiceDescriptor({
  id,
  accessUrl,
}: {
  id: string;
  accessUrl: string;
}): ServiceDescriptor {
  return {
    id: CUTOUT_SERVICE_ID,
    accessUrl,
    standardId: standardIds.sodaSync,
    inputParams: [
      {
        name: 'ID',
        datatype: 'char',
        arraysize: '*',
        ucd: 'meta.id;meta.dataset',
        value: id,
      },
      {
        name: 'POLYGON',
        datatype: 'double',
        arraysize: '*',
        unit: 'deg',
        ucd: 'pos.outline;obs',
        xtype: 'polygon',
        value: '',
      },
      {
        name: 'CIRCLE',
        datatype: 'double',
        arraysize: '3',
        unit: 'deg',
        ucd: 'pos.outline;obs',
        xtype: 'circle',
        value: '',
      },
    ],
  };
}
