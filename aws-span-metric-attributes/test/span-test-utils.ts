// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { Attributes, SpanContext, SpanKind } from '@opentelemetry/api';
import { Resource } from '@opentelemetry/resources';
import { ReadableSpan } from '@opentelemetry/sdk-trace-base';

export const TEST_TRACE_ID: string = '00000000000000000000000000000008';
export const TEST_SPAN_ID: string = '0000000000000009';
export const TEST_PARENT_SPAN_ID: string = '0000000000000007';

export interface TestSpanOptions {
  name?: string;
  kind?: SpanKind;
  // `null` builds a span without a parent
  parentSpanId?: string | null;
  instrumentationLibraryName?: string;
}

/**
 * Finished span with the given attributes. The attributes object is used as is, so tests may keep
 * adding to it after the span is created.
 */
export function createReadableSpan(attributes: Attributes, options: TestSpanOptions = {}): ReadableSpan {
  const spanContext: SpanContext = {
    traceId: TEST_TRACE_ID,
    spanId: TEST_SPAN_ID,
    traceFlags: 0,
  };
  return {
    name: options.name ?? 'spanName',
    kind: options.kind ?? SpanKind.SERVER,
    spanContext: () => spanContext,
    parentSpanId: options.parentSpanId === null ? undefined : options.parentSpanId ?? TEST_PARENT_SPAN_ID,
    startTime: [0, 0],
    endTime: [0, 1],
    status: { code: 0 },
    attributes,
    links: [],
    events: [],
    duration: [0, 1],
    ended: true,
    resource: Resource.empty(),
    instrumentationLibrary: { name: options.instrumentationLibraryName ?? 'Scope name' },
    droppedAttributesCount: 0,
    droppedEventsCount: 0,
    droppedLinksCount: 0,
  };
}
