// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { Span as APISpan, Attributes, SpanKind, context, trace } from '@opentelemetry/api';
import { ReadableSpan, Span } from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import type { Tracer } from '@opentelemetry/api';
import expect from 'expect';
import { AttributePropagatingSpanProcessor } from '../src/attribute-propagating-span-processor';
import { AttributePropagatingSpanProcessorBuilder } from '../src/attribute-propagating-span-processor-builder';
import { AWS_ATTRIBUTE_KEYS } from '../src/aws-attribute-keys';

function tracerFor(spanProcessor: AttributePropagatingSpanProcessor): Tracer {
  return new NodeTracerProvider({ spanProcessors: [spanProcessor] }).getTracer('span-metric-attributes');
}

function startChild(tracer: Tracer, parentSpan: APISpan, kind: SpanKind = SpanKind.INTERNAL): Attributes {
  const childSpan: APISpan = tracer.startSpan('child', { kind }, trace.setSpan(context.active(), parentSpan));
  expect(childSpan).toBeInstanceOf(Span);
  return childSpan instanceof Span ? childSpan.attributes : {};
}

describe('AttributePropagatingSpanProcessorBuilderTest', () => {
  it('BasicTest', () => {
    const builder: AttributePropagatingSpanProcessorBuilder = AttributePropagatingSpanProcessorBuilder.create();
    expect(builder.setPropagationDataKey('test')).toBe(builder);

    function mock_extractor(_: ReadableSpan): string {
      return 'test';
    }

    expect(builder.setPropagationDataExtractor(mock_extractor)).toBe(builder);
    expect(builder.setAttributesKeysToPropagate(['key1'])).toBe(builder);

    const tracer: Tracer = tracerFor(builder.build());
    const serverSpan: APISpan = tracer.startSpan('parent', { kind: SpanKind.SERVER });
    expect(startChild(tracer, serverSpan)['test']).toEqual('test');

    const internalSpan: APISpan = tracer.startSpan('parent', {
      kind: SpanKind.INTERNAL,
      attributes: { key1: 'value1', key2: 'value2' },
    });
    const childAttributes: Attributes = startChild(tracer, internalSpan);
    expect(childAttributes['key1']).toEqual('value1');
    expect(childAttributes['key2']).toBeUndefined();
  });

  it('uses the default propagation settings', () => {
    const tracer: Tracer = tracerFor(AttributePropagatingSpanProcessorBuilder.create().build());

    const serverSpan: APISpan = tracer.startSpan('GET /users', { kind: SpanKind.SERVER });
    expect(startChild(tracer, serverSpan, SpanKind.CLIENT)[AWS_ATTRIBUTE_KEYS.AWS_LOCAL_OPERATION]).toEqual(
      'GET /users'
    );

    const internalSpan: APISpan = tracer.startSpan('parent', {
      kind: SpanKind.INTERNAL,
      attributes: {
        [AWS_ATTRIBUTE_KEYS.AWS_REMOTE_SERVICE]: 'remote service',
        [AWS_ATTRIBUTE_KEYS.AWS_REMOTE_OPERATION]: 'remote operation',
      },
    });
    const childAttributes: Attributes = startChild(tracer, internalSpan, SpanKind.CLIENT);
    expect(childAttributes[AWS_ATTRIBUTE_KEYS.AWS_REMOTE_SERVICE]).toEqual('remote service');
    expect(childAttributes[AWS_ATTRIBUTE_KEYS.AWS_REMOTE_OPERATION]).toEqual('remote operation');
    expect(childAttributes[AWS_ATTRIBUTE_KEYS.AWS_LOCAL_OPERATION]).toEqual('InternalOperation');
  });

  it('copies the keys to propagate', () => {
    const keys: string[] = ['key1'];
    const builder: AttributePropagatingSpanProcessorBuilder =
      AttributePropagatingSpanProcessorBuilder.create().setAttributesKeysToPropagate(keys);
    keys.push('key2');

    const tracer: Tracer = tracerFor(builder.build());
    const internalSpan: APISpan = tracer.startSpan('parent', {
      kind: SpanKind.INTERNAL,
      attributes: { key1: 'value1', key2: 'value2' },
    });
    expect(startChild(tracer, internalSpan)['key2']).toBeUndefined();
  });

  it('throws errors when expected to', () => {
    const builder: AttributePropagatingSpanProcessorBuilder = AttributePropagatingSpanProcessorBuilder.create();
    expect(() => Reflect.apply(builder.setPropagationDataExtractor, builder, [undefined])).toThrow(
      'propagationDataExtractor must not be null'
    );
    expect(() => Reflect.apply(builder.setPropagationDataKey, builder, [null])).toThrow(
      'propagationDataKey must not be null'
    );
    expect(() => Reflect.apply(builder.setAttributesKeysToPropagate, builder, [undefined])).toThrow(
      'attributesKeysToPropagate must not be null'
    );
  });
});
