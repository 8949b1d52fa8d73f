// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { Attributes } from '@opentelemetry/api';
import { Resource } from '@opentelemetry/resources';
import { ReadableSpan } from '@opentelemetry/sdk-trace-base';

export const SERVICE_METRIC: 'Service' = 'Service';
export const DEPENDENCY_METRIC: 'Dependency' = 'Dependency';

export type MetricType = typeof SERVICE_METRIC | typeof DEPENDENCY_METRIC;

export type AttributeMap = Partial<Record<MetricType, Attributes>>;

/**
 * Metric attribute generator defines an interface for classes that can generate specific attributes
 * to be used by a span metrics processor to produce service and dependency metrics.
 */
export interface MetricAttributeGenerator {
  /**
   * Given a span and associated resource, produce meaningful metric attributes for metrics produced
   * from the span. If no metrics should be generated from this span, return an empty map.
   *
   * @param span - Finished span to be used to generate metric attributes.
   * @param resource - Resource associated with the span.
   * @return Attributes under {@link SERVICE_METRIC} and/or {@link DEPENDENCY_METRIC}; 0, 1, or 2 entries.
   */
  generateMetricAttributeMapFromSpan(span: ReadableSpan, resource: Resource): AttributeMap;
}
