// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { AttributeValue } from '@opentelemetry/api';
import { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import {
  SEMATTRS_DB_OPERATION,
  SEMATTRS_DB_STATEMENT,
  SEMATTRS_DB_SYSTEM,
  SEMATTRS_FAAS_INVOKED_NAME,
  SEMATTRS_FAAS_TRIGGER,
  SEMATTRS_MESSAGING_OPERATION,
  SEMATTRS_MESSAGING_SYSTEM,
  SEMATTRS_RPC_METHOD,
  SEMATTRS_RPC_SERVICE,
} from '@opentelemetry/semantic-conventions';
import { AWS_ATTRIBUTE_KEYS } from './aws-attribute-keys';
import {
  AWS_SDK_SERVICE_NAMES,
  AWS_SERVICE_NAME_PREFIX,
  LAMBDA_SDK_SERVICE_NAME,
  NORMALIZED_LAMBDA_SERVICE_NAME,
} from './aws-service-names';
import { AwsSpanClassifier } from './aws-span-classifier';
import { GRAPHQL_OPERATION_TYPE } from './semantic-attribute-keys';
import { attributeToString } from './utils';

// Special DEPENDENCY attribute value if GRAPHQL_OPERATION_TYPE attribute key is present.
export const GRAPHQL: string = 'graphql';

export interface RemoteServiceAndOperation {
  remoteService: string;
  remoteOperation: string;
}

/**
 * One family of low-cardinality span attributes that names the remote side of a call. A source
 * is selected as soon as any of its keys is present on the span.
 */
export interface RemoteServiceSource {
  matches(span: ReadableSpan): boolean;
  resolve(span: ReadableSpan): RemoteServiceAndOperation;
}

export function getRemoteService(span: ReadableSpan, remoteServiceKey: string): string {
  return attributeToString(span.attributes[remoteServiceKey]) ?? AwsSpanClassifier.UNKNOWN_REMOTE_SERVICE;
}

export function getRemoteOperation(span: ReadableSpan, remoteOperationKey: string): string {
  return attributeToString(span.attributes[remoteOperationKey]) ?? AwsSpanClassifier.UNKNOWN_REMOTE_OPERATION;
}

/**
 * If the span is an AWS SDK span, normalize the name to align with <a
 * href="https://docs.aws.amazon.com/cloudcontrolapi/latest/userguide/supported-resources.html">AWS
 * Cloud Control resource format</a> as much as possible, with special attention to services we
 * can detect remote resource information for.
 *
 * <p>A Lambda Invoke is a call to another service, so the remote service becomes the function
 * name rather than a generic AWS::Lambda. Without a function name we report
 * UnknownRemoteService.
 */
export function normalizeRemoteServiceName(span: ReadableSpan, serviceName: string): string {
  if (!AwsSpanClassifier.isAwsSdkSpan(span)) {
    return serviceName;
  }
  if (serviceName === LAMBDA_SDK_SERVICE_NAME) {
    if (AwsSpanClassifier.isLambdaInvokeOperation(span)) {
      return getRemoteService(span, AWS_ATTRIBUTE_KEYS.AWS_LAMBDA_FUNCTION_NAME);
    }
    return NORMALIZED_LAMBDA_SERVICE_NAME;
  }
  return AWS_SDK_SERVICE_NAMES.get(serviceName) ?? AWS_SERVICE_NAME_PREFIX + serviceName;
}

/**
 * If no db.operation attribute provided in the span, we use db.statement to compute a valid
 * remote operation in a best-effort manner. To do this, we take the first substring of the
 * statement and compare to a regex list of known SQL keywords.
 */
export function getDbStatementRemoteOperation(span: ReadableSpan, remoteOperationKey: string): string {
  const statement: AttributeValue | undefined = span.attributes[remoteOperationKey];
  if (typeof statement !== 'string') {
    return AwsSpanClassifier.UNKNOWN_REMOTE_OPERATION;
  }

  // Remove all whitespace and newline characters from the beginning of the statement
  // and retrieve the first MAX_KEYWORD_LENGTH characters
  let remoteOperation: string = statement.trimStart();
  if (remoteOperation.length > AwsSpanClassifier.MAX_KEYWORD_LENGTH) {
    remoteOperation = remoteOperation.substring(0, AwsSpanClassifier.MAX_KEYWORD_LENGTH);
  }

  const matcher: RegExpMatchArray | null = remoteOperation.toUpperCase().match(AwsSpanClassifier.SQL_DIALECT_PATTERN);
  if (matcher == null || matcher.length === 0) {
    return AwsSpanClassifier.UNKNOWN_REMOTE_OPERATION;
  }
  return matcher[0];
}

function keyPairSource(
  serviceKey: string,
  operationKey: string,
  normalize: (span: ReadableSpan, serviceName: string) => string = (span: ReadableSpan, serviceName: string) =>
    serviceName
): RemoteServiceSource {
  return {
    matches: (span: ReadableSpan) =>
      AwsSpanClassifier.isKeyPresent(span, serviceKey) || AwsSpanClassifier.isKeyPresent(span, operationKey),
    resolve: (span: ReadableSpan) => ({
      remoteService: normalize(span, getRemoteService(span, serviceKey)),
      remoteOperation: getRemoteOperation(span, operationKey),
    }),
  };
}

/**
 * Remote service and operation sources in priority order; the first matching source decides.
 *
 * <p>The first priority is the AWS Remote attributes, which are generated from manually
 * instrumented span attributes, and are clear indications of customer intent. After this come the
 * OpenTelemetry semantic convention attribute families that are defined to be low cardinality:
 * RPC (with the AWS SDK service name normalized), the legacy AWS SDK attributes, DB, FaaS,
 * Messaging, and GraphQL, which always reports {@link GRAPHQL} as the remote service.
 */
export const REMOTE_SERVICE_SOURCES: readonly RemoteServiceSource[] = [
  keyPairSource(AWS_ATTRIBUTE_KEYS.AWS_REMOTE_SERVICE, AWS_ATTRIBUTE_KEYS.AWS_REMOTE_OPERATION),
  keyPairSource(SEMATTRS_RPC_SERVICE, SEMATTRS_RPC_METHOD, normalizeRemoteServiceName),
  keyPairSource(
    AWS_ATTRIBUTE_KEYS.AWS_SERVICE_NAME,
    AWS_ATTRIBUTE_KEYS.AWS_OPERATION_NAME,
    normalizeRemoteServiceName
  ),
  {
    matches: (span: ReadableSpan) => AwsSpanClassifier.isDbSpan(span),
    resolve: (span: ReadableSpan) => ({
      remoteService: getRemoteService(span, SEMATTRS_DB_SYSTEM),
      remoteOperation: AwsSpanClassifier.isKeyPresent(span, SEMATTRS_DB_OPERATION)
        ? getRemoteOperation(span, SEMATTRS_DB_OPERATION)
        : getDbStatementRemoteOperation(span, SEMATTRS_DB_STATEMENT),
    }),
  },
  keyPairSource(SEMATTRS_FAAS_INVOKED_NAME, SEMATTRS_FAAS_TRIGGER),
  keyPairSource(SEMATTRS_MESSAGING_SYSTEM, SEMATTRS_MESSAGING_OPERATION),
  {
    matches: (span: ReadableSpan) => AwsSpanClassifier.isKeyPresent(span, GRAPHQL_OPERATION_TYPE),
    resolve: (span: ReadableSpan) => ({
      remoteService: GRAPHQL,
      remoteOperation: getRemoteOperation(span, GRAPHQL_OPERATION_TYPE),
    }),
  },
];
