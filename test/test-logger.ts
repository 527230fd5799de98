/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';
import log from '../src/log.js';

/**
 * Create a logger for use in tests. It writes to logs/test.log like the main
 * logger and tags every entry with the suite and test case.
 *
 * @example
 * ```typescript
 * const logger = createTestLogger({ suite: 'LinkAssembler' });
 * ```
 */
export function createTestLogger(options?: {
  suite?: string;
  test?: string;
  metadata?: Record<string, unknown>;
}): winston.Logger {
  const { suite, test, metadata = {} } = options ?? {};

  const testMetadata = {
    ...metadata,
    ...(suite !== undefined && { testSuite: suite }),
    ...(test !== undefined && { testCase: test }),
  };

  return log.child(testMetadata);
}
