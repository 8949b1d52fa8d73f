// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { Span as APISpan, AttributeValue, Context, SpanKind, trace } from '@opentelemetry/api';
import { ReadableSpan, Span, SpanProcessor } from '@opentelemetry/sdk-trace-base';
import { AWS_ATTRIBUTE_KEYS } from './aws-attribute-keys';
import { AwsSpanClassifier } from './aws-span-classifier';

export type PropagationDataExtractor = (span: ReadableSpan) => string;

/**
 * AttributePropagatingSpanProcessor handles the propagation of attributes from parent spans to
 * child spans, specified in {@link attributesKeysToPropagate}. It also propagates configurable data
 * from parent spans to child spans, as a new attribute specified by {@link propagationDataKey}.
 * Propagated data can be configured via the {@link propagationDataExtractor}. Span data
 * propagation only starts from local root server/consumer spans, but from there will be
 * propagated to any descendant spans.
 *
 * <p>If the span is a CONSUMER with a CONSUMER parent, {@link AWS_ATTRIBUTE_KEYS.AWS_CONSUMER_PARENT_SPAN_KIND}
 * is recorded so that the metric attribute generator can skip the duplicate dependency.
 */
export class AttributePropagatingSpanProcessor implements SpanProcessor {
  private readonly propagationDataExtractor: PropagationDataExtractor;
  private readonly propagationDataKey: string;
  private readonly attributesKeysToPropagate: readonly string[];

  public static create(
    propagationDataExtractor: PropagationDataExtractor,
    propagationDataKey: string,
    attributesKeysToPropagate: readonly string[]
  ): AttributePropagatingSpanProcessor {
    return new AttributePropagatingSpanProcessor(
      propagationDataExtractor,
      propagationDataKey,
      attributesKeysToPropagate
    );
  }

  private constructor(
    propagationDataExtractor: PropagationDataExtractor,
    propagationDataKey: string,
    attributesKeysToPropagate: readonly string[]
  ) {
    this.propagationDataExtractor = propagationDataExtractor;
    this.propagationDataKey = propagationDataKey;
    this.attributesKeysToPropagate = attributesKeysToPropagate;
  }

  public onStart(span: Span, parentContext: Context): void {
    // The parent context is not reachable from a finished span, so the local root flag is stored now.
    AwsSpanClassifier.setIsLocalRootInformation(span, parentContext);

    const parentSpan: APISpan | undefined = trace.getSpan(parentContext);
    // ReadableSpan is an interface; the SDK Span class is its runtime implementation.
    const parent: Span | undefined = parentSpan instanceof Span ? parentSpan : undefined;

    if (parent !== undefined) {
      // Immediate children of an AWS SDK span (the underlying HTTP calls) are marked so that they
      // can be told apart from the SDK span itself.
      if (AwsSpanClassifier.isAwsSdkSpan(parent)) {
        span.setAttribute(AWS_ATTRIBUTE_KEYS.AWS_SDK_DESCENDANT, 'true');
      }
      if (SpanKind.INTERNAL === parent.kind) {
        this.copyPropagatedAttributes(parent, span);
      }
      // messaging.operation may only be set after start, so the pair is recorded here and
      // evaluated when metrics are generated.
      if (SpanKind.CONSUMER === span.kind && SpanKind.CONSUMER === parent.kind) {
        span.setAttribute(AWS_ATTRIBUTE_KEYS.AWS_CONSUMER_PARENT_SPAN_KIND, SpanKind[parent.kind]);
      }
    }

    const propagationData: AttributeValue | undefined = this.resolvePropagationData(span, parent);
    if (propagationData !== undefined) {
      span.setAttribute(this.propagationDataKey, propagationData);
    }
  }

  private copyPropagatedAttributes(parent: ReadableSpan, span: Span): void {
    for (const key of this.attributesKeysToPropagate) {
      const value: AttributeValue | undefined = parent.attributes[key];
      if (value !== undefined) {
        span.setAttribute(key, value);
      }
    }
  }

  private resolvePropagationData(span: Span, parent: Span | undefined): AttributeValue | undefined {
    if (AwsSpanClassifier.isLocalRoot(span)) {
      return SpanKind.SERVER === span.kind ? undefined : this.propagationDataExtractor(span);
    }
    if (parent === undefined) {
      return undefined;
    }
    if (SpanKind.SERVER === parent.kind) {
      return this.propagationDataExtractor(parent);
    }
    return parent.attributes[this.propagationDataKey];
  }

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  public onEnd(span: ReadableSpan): void {}

  public shutdown(): Promise<void> {
    return this.forceFlush();
  }

  public forceFlush(): Promise<void> {
    return Promise.resolve();
  }
}
