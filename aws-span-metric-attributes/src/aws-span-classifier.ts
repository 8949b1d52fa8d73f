// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { AttributeValue, Context, SpanContext, SpanKind, diag, isSpanContextValid, trace } from '@opentelemetry/api';
import { InstrumentationLibrary } from '@opentelemetry/core';
import { ReadableSpan, Span } from '@opentelemetry/sdk-trace-base';
import {
  ATTR_HTTP_REQUEST_METHOD,
  ATTR_URL_FULL,
  ATTR_URL_PATH,
  MESSAGINGOPERATIONVALUES_PROCESS,
  SEMATTRS_DB_OPERATION,
  SEMATTRS_DB_STATEMENT,
  SEMATTRS_DB_SYSTEM,
  SEMATTRS_HTTP_METHOD,
  SEMATTRS_HTTP_TARGET,
  SEMATTRS_HTTP_URL,
  SEMATTRS_MESSAGING_OPERATION,
  SEMATTRS_RPC_METHOD,
  SEMATTRS_RPC_SERVICE,
  SEMATTRS_RPC_SYSTEM,
} from '@opentelemetry/semantic-conventions';
import { AWS_ATTRIBUTE_KEYS } from './aws-attribute-keys';
import * as SQL_DIALECT_KEYWORDS_JSON from './configuration/sql-dialect-keywords.json';
import { attributeToString } from './utils';

const AWS_API_RPC_SYSTEM: string = 'aws-api';
const LAMBDA_RPC_SERVICE: string = 'Lambda';
const LAMBDA_INVOKE_OPERATION: string = 'Invoke';

/**
 * Stateless predicates and extractors over finished spans, shared by the metric attribute
 * generator and the attribute propagating span processor.
 */
export class AwsSpanClassifier {
  // Default attribute values if no valid span attribute value is identified
  static readonly UNKNOWN_SERVICE: string = 'UnknownService';
  static readonly UNKNOWN_OPERATION: string = 'UnknownOperation';
  static readonly UNKNOWN_REMOTE_SERVICE: string = 'UnknownRemoteService';
  static readonly UNKNOWN_REMOTE_OPERATION: string = 'UnknownRemoteOperation';
  static readonly INTERNAL_OPERATION: string = 'InternalOperation';
  static readonly LOCAL_ROOT: string = 'LOCAL_ROOT';
  static readonly SQS_RECEIVE_MESSAGE_SPAN_NAME: string = 'Sqs.ReceiveMessage';
  static readonly AWS_SDK_INSTRUMENTATION_SCOPE_PREFIX: string = '@opentelemetry/instrumentation-aws-sdk';

  // Only this many leading characters of db.statement are matched against the keyword list.
  static readonly MAX_KEYWORD_LENGTH: number = 80;
  static readonly SQL_DIALECT_PATTERN: RegExp = new RegExp(
    '^(?:' + AwsSpanClassifier.getDialectKeywords().join('|') + ')\\b'
  );

  /** SQL keywords, longest first so that multi-word forms such as `DROP VIEW` win over `DROP`. */
  static getDialectKeywords(): string[] {
    return [...SQL_DIALECT_KEYWORDS_JSON.keywords].sort((a: string, b: string) => b.length - a.length);
  }

  /**
   * Ingress operation (i.e. operation for Server and Consumer spans) will be generated from
   * "http.method + http.target/with the first API path parameter" if the default span name is
   * empty, UnknownOperation or the http.method value. Local roots that are not Server spans always
   * report InternalOperation.
   */
  static getIngressOperation(span: ReadableSpan): string {
    if (AwsSpanClassifier.shouldUseInternalOperation(span)) {
      return AwsSpanClassifier.INTERNAL_OPERATION;
    }
    if (AwsSpanClassifier.isValidOperation(span, span.name)) {
      return span.name;
    }

    const generated: string | undefined = AwsSpanClassifier.generateIngressOperation(span);
    if (generated !== undefined) {
      return generated;
    }
    return AwsSpanClassifier.isLocalRoot(span)
      ? AwsSpanClassifier.INTERNAL_OPERATION
      : AwsSpanClassifier.UNKNOWN_OPERATION;
  }

  /**
   * Egress operation (i.e. operation for Client and Producer spans) is read from
   * {@link AWS_ATTRIBUTE_KEYS.AWS_LOCAL_OPERATION}, which is written when the span starts by
   * {@link AttributePropagatingSpanProcessor}.
   */
  static getEgressOperation(span: ReadableSpan): string | undefined {
    if (AwsSpanClassifier.shouldUseInternalOperation(span)) {
      return AwsSpanClassifier.INTERNAL_OPERATION;
    }
    return attributeToString(span.attributes[AWS_ATTRIBUTE_KEYS.AWS_LOCAL_OPERATION]);
  }

  /**
   * Extract the first part from API http target if it exists
   *
   * @param httpTarget http request target string value. Eg, /payment/1234?id=1
   * @return the first part from the http target. Eg, /payment
   */
  static extractApiPathValue(httpTarget: string | undefined | null): string {
    if (httpTarget == null || httpTarget === '') {
      return '/';
    }
    // The path ends at the first '?' or '#' (RFC 3986, section 3.3)
    const paths: string[] = httpTarget.split(/[/?#]/);
    if (paths.length > 1) {
      return '/' + paths[1];
    }
    return '/';
  }

  static isKeyPresent(span: ReadableSpan, key: string): boolean {
    return span.attributes[key] !== undefined;
  }

  static getFirstPresentAttribute(span: ReadableSpan, keys: string[]): AttributeValue | undefined {
    for (const key of keys) {
      const value: AttributeValue | undefined = span.attributes[key];
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }

  static getHttpMethod(span: ReadableSpan): string | undefined {
    return attributeToString(
      AwsSpanClassifier.getFirstPresentAttribute(span, [SEMATTRS_HTTP_METHOD, ATTR_HTTP_REQUEST_METHOD])
    );
  }

  static getHttpUrl(span: ReadableSpan): string | undefined {
    return attributeToString(AwsSpanClassifier.getFirstPresentAttribute(span, [SEMATTRS_HTTP_URL, ATTR_URL_FULL]));
  }

  // https://opentelemetry.io/docs/specs/otel/trace/semantic_conventions/instrumentation/aws-sdk/#common-attributes
  // Older AWS SDK instrumentations only record aws.service.
  static isAwsSdkSpan(span: ReadableSpan): boolean {
    const rpcSystem: AttributeValue | undefined = span.attributes[SEMATTRS_RPC_SYSTEM];
    if (rpcSystem === undefined) {
      return AwsSpanClassifier.isKeyPresent(span, AWS_ATTRIBUTE_KEYS.AWS_SERVICE_NAME);
    }
    return AWS_API_RPC_SYSTEM === rpcSystem;
  }

  // Check if the current Span adheres to database semantic conventions
  static isDbSpan(span: ReadableSpan): boolean {
    return (
      AwsSpanClassifier.isKeyPresent(span, SEMATTRS_DB_SYSTEM) ||
      AwsSpanClassifier.isKeyPresent(span, SEMATTRS_DB_OPERATION) ||
      AwsSpanClassifier.isKeyPresent(span, SEMATTRS_DB_STATEMENT)
    );
  }

  // Lambda Invoke calls are modeled as a call to a service, not to a resource.
  static isLambdaInvokeOperation(span: ReadableSpan): boolean {
    if (!AwsSpanClassifier.isAwsSdkSpan(span)) {
      return false;
    }
    return (
      span.attributes[SEMATTRS_RPC_SERVICE] === LAMBDA_RPC_SERVICE &&
      span.attributes[SEMATTRS_RPC_METHOD] === LAMBDA_INVOKE_OPERATION
    );
  }

  static shouldGenerateServiceMetricAttributes(span: ReadableSpan): boolean {
    return (
      (AwsSpanClassifier.isLocalRoot(span) && !AwsSpanClassifier.isSqsReceiveMessageConsumerSpan(span)) ||
      SpanKind.SERVER === span.kind
    );
  }

  static shouldGenerateDependencyMetricAttributes(span: ReadableSpan): boolean {
    return (
      SpanKind.CLIENT === span.kind ||
      SpanKind.PRODUCER === span.kind ||
      (AwsSpanClassifier.isDependencyConsumerSpan(span) && !AwsSpanClassifier.isSqsReceiveMessageConsumerSpan(span))
    );
  }

  static isConsumerProcessSpan(span: ReadableSpan): boolean {
    const messagingOperation: AttributeValue | undefined = span.attributes[SEMATTRS_MESSAGING_OPERATION];
    return SpanKind.CONSUMER === span.kind && MESSAGINGOPERATIONVALUES_PROCESS === messagingOperation;
  }

  // Any spans that are Local Roots and also not SERVER should have aws.local.operation renamed to
  // InternalOperation.
  static shouldUseInternalOperation(span: ReadableSpan): boolean {
    return AwsSpanClassifier.isLocalRoot(span) && SpanKind.SERVER !== span.kind;
  }

  /**
   * A span is a local root if it has no parent or if the parent is remote. A ReadableSpan does not
   * expose its parent context, so the answer is computed when the span starts (see
   * {@link setIsLocalRootInformation}) and stored as an attribute.
   */
  static isLocalRoot(span: ReadableSpan): boolean {
    const isLocalRoot: AttributeValue | undefined = span.attributes[AWS_ATTRIBUTE_KEYS.AWS_IS_LOCAL_ROOT];
    if (typeof isLocalRoot !== 'boolean') {
      diag.debug('isLocalRoot for span has not been precalculated. Falling back to the parent span id.');
      return span.parentSpanId === undefined;
    }
    return isLocalRoot;
  }

  static setIsLocalRootInformation(span: Span, parentContext: Context): void {
    const parentSpanContext: SpanContext | undefined = trace.getSpanContext(parentContext);
    const isParentSpanContextValid: boolean = parentSpanContext !== undefined && isSpanContextValid(parentSpanContext);
    const isParentSpanRemote: boolean = parentSpanContext !== undefined && parentSpanContext.isRemote === true;

    const isLocalRoot: boolean = span.parentSpanId === undefined || !isParentSpanContextValid || isParentSpanRemote;
    span.setAttribute(AWS_ATTRIBUTE_KEYS.AWS_IS_LOCAL_ROOT, isLocalRoot);
  }

  // To identify the SQS consumer spans produced by AWS SDK instrumentation
  private static isSqsReceiveMessageConsumerSpan(span: ReadableSpan): boolean {
    const messagingOperation: AttributeValue | undefined = span.attributes[SEMATTRS_MESSAGING_OPERATION];
    const instrumentationLibrary: InstrumentationLibrary | undefined = span.instrumentationLibrary;

    return (
      AwsSpanClassifier.SQS_RECEIVE_MESSAGE_SPAN_NAME.toLowerCase() === span.name.toLowerCase() &&
      SpanKind.CONSUMER === span.kind &&
      instrumentationLibrary != null &&
      instrumentationLibrary.name.startsWith(AwsSpanClassifier.AWS_SDK_INSTRUMENTATION_SCOPE_PREFIX) &&
      (messagingOperation === undefined || messagingOperation === MESSAGINGOPERATIONVALUES_PROCESS)
    );
  }

  /**
   * A CONSUMER process span whose parent is also a CONSUMER is part of a span pair that already
   * produced the dependency metric, unless it is itself the local root.
   */
  private static isDependencyConsumerSpan(span: ReadableSpan): boolean {
    if (SpanKind.CONSUMER !== span.kind) {
      return false;
    }
    if (AwsSpanClassifier.isConsumerProcessSpan(span)) {
      if (AwsSpanClassifier.isLocalRoot(span)) {
        return true;
      }
      const parentSpanKind: AttributeValue | undefined =
        span.attributes[AWS_ATTRIBUTE_KEYS.AWS_CONSUMER_PARENT_SPAN_KIND];
      return SpanKind[SpanKind.CONSUMER] !== parentSpanKind;
    }
    return true;
  }

  /**
   * When Span name is empty, UnknownOperation or HttpMethod value, it will be treated as invalid
   * local operation value that needs to be further processed
   */
  private static isValidOperation(span: ReadableSpan, operation: string): boolean {
    if (operation === '' || operation === AwsSpanClassifier.UNKNOWN_OPERATION) {
      return false;
    }
    return operation !== AwsSpanClassifier.getHttpMethod(span);
  }

  /**
   * When span name is not meaningful as operation name for http use cases, combine the http
   * method with the first segment of the request path. Both must be known.
   */
  private static generateIngressOperation(span: ReadableSpan): string | undefined {
    const httpMethod: string | undefined = AwsSpanClassifier.getHttpMethod(span);
    if (httpMethod === undefined) {
      return undefined;
    }

    let httpPath: string | undefined = attributeToString(
      AwsSpanClassifier.getFirstPresentAttribute(span, [SEMATTRS_HTTP_TARGET, ATTR_URL_PATH])
    );
    if (httpPath === undefined) {
      const httpUrl: string | undefined = AwsSpanClassifier.getHttpUrl(span);
      if (httpUrl !== undefined) {
        try {
          httpPath = new URL(httpUrl).pathname;
        } catch (e: unknown) {
          diag.verbose(`invalid http.url attribute: ${httpUrl}`);
        }
      }
    }

    if (httpPath === undefined) {
      return undefined;
    }
    return httpMethod + ' ' + AwsSpanClassifier.extractApiPathValue(httpPath);
  }
}
