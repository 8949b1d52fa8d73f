// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

export {
  getLambdaRemoteEnvironment,
  LAMBDA_APPLICATION_SIGNALS_REMOTE_ENVIRONMENT_CONFIG,
} from './application-signals-config';
export { escapeDelimiters } from './attribute-escaper';
export { AttributePropagatingSpanProcessor } from './attribute-propagating-span-processor';
export type { PropagationDataExtractor } from './attribute-propagating-span-processor';
export { AttributePropagatingSpanProcessorBuilder } from './attribute-propagating-span-processor-builder';
export { AWS_ATTRIBUTE_KEYS } from './aws-attribute-keys';
export { AwsMetricAttributeGenerator } from './aws-metric-attribute-generator';
export { AwsSpanClassifier } from './aws-span-classifier';
export { DEPENDENCY_METRIC, SERVICE_METRIC } from './metric-attribute-generator';
export type { AttributeMap, MetricAttributeGenerator, MetricType } from './metric-attribute-generator';
export { RegionalResourceArnParser } from './regional-resource-arn-parser';
export type { ParsedArn } from './regional-resource-arn-parser';
export { SqsUrlParser } from './sqs-url-parser';
export type { ParsedSqsUrl } from './sqs-url-parser';
