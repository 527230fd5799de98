/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  trace,
  context,
  SpanStatusCode,
  type Span,
  type SpanOptions,
} from '@opentelemetry/api';
import * as env from './lib/env.js';
import * as version from './version.js';

const OTEL_SERVICE_NAME = env.varOrDefault('OTEL_SERVICE_NAME', version.name);

// Spans are recorded only when an SDK registers a global tracer provider;
// otherwise the API hands out a no-op tracer.
export const tracer = trace.getTracer(OTEL_SERVICE_NAME, version.release);

export { context, trace, SpanStatusCode };

// Helper function to start a child span with proper context inheritance
export function startChildSpan(
  name: string,
  options?: SpanOptions,
  parentSpan?: Span,
): Span {
  if (parentSpan) {
    return tracer.startSpan(
      name,
      options,
      trace.setSpan(context.active(), parentSpan),
    );
  }
  return tracer.startSpan(name, options);
}
