// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

// Normalized remote service names for supported AWS services, aligned with the
// AWS Cloud Control resource format:
// https://docs.aws.amazon.com/cloudcontrolapi/latest/userguide/supported-resources.html
export const NORMALIZED_DYNAMO_DB_SERVICE_NAME: string = 'AWS::DynamoDB';
export const NORMALIZED_KINESIS_SERVICE_NAME: string = 'AWS::Kinesis';
export const NORMALIZED_LAMBDA_SERVICE_NAME: string = 'AWS::Lambda';
export const NORMALIZED_S3_SERVICE_NAME: string = 'AWS::S3';
export const NORMALIZED_SECRETSMANAGER_SERVICE_NAME: string = 'AWS::SecretsManager';
export const NORMALIZED_SNS_SERVICE_NAME: string = 'AWS::SNS';
export const NORMALIZED_SQS_SERVICE_NAME: string = 'AWS::SQS';
export const NORMALIZED_STEPFUNCTIONS_SERVICE_NAME: string = 'AWS::StepFunctions';
export const NORMALIZED_BEDROCK_SERVICE_NAME: string = 'AWS::Bedrock';
export const NORMALIZED_BEDROCK_RUNTIME_SERVICE_NAME: string = 'AWS::BedrockRuntime';

export const AWS_SERVICE_NAME_PREFIX: string = 'AWS::';
export const LAMBDA_SDK_SERVICE_NAME: string = 'Lambda';

// SDK client names, in both the older and the current SDK spelling, to their normalized name.
// Lambda is absent: its normalization depends on the operation.
export const AWS_SDK_SERVICE_NAMES: ReadonlyMap<string, string> = new Map<string, string>([
  ['AmazonDynamoDBv2', NORMALIZED_DYNAMO_DB_SERVICE_NAME],
  ['DynamoDB', NORMALIZED_DYNAMO_DB_SERVICE_NAME],
  ['DynamoDb', NORMALIZED_DYNAMO_DB_SERVICE_NAME],
  ['AmazonKinesis', NORMALIZED_KINESIS_SERVICE_NAME],
  ['Kinesis', NORMALIZED_KINESIS_SERVICE_NAME],
  ['Amazon S3', NORMALIZED_S3_SERVICE_NAME],
  ['S3', NORMALIZED_S3_SERVICE_NAME],
  ['Secrets Manager', NORMALIZED_SECRETSMANAGER_SERVICE_NAME],
  ['SecretsManager', NORMALIZED_SECRETSMANAGER_SERVICE_NAME],
  ['SNS', NORMALIZED_SNS_SERVICE_NAME],
  ['AmazonSQS', NORMALIZED_SQS_SERVICE_NAME],
  ['Sqs', NORMALIZED_SQS_SERVICE_NAME],
  ['SQS', NORMALIZED_SQS_SERVICE_NAME],
  ['SFN', NORMALIZED_STEPFUNCTIONS_SERVICE_NAME],
  ['Bedrock', NORMALIZED_BEDROCK_SERVICE_NAME],
  ['Bedrock Agent', NORMALIZED_BEDROCK_SERVICE_NAME],
  ['Bedrock Agent Runtime', NORMALIZED_BEDROCK_SERVICE_NAME],
  ['Bedrock Runtime', NORMALIZED_BEDROCK_RUNTIME_SERVICE_NAME],
]);
