// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { SEMATTRS_AWS_DYNAMODB_TABLE_NAMES } from '@opentelemetry/semantic-conventions';

// Attribute keys with special meaning to AWS components. Output keys are read by the downstream
// metric aggregation and must not change.
export const AWS_ATTRIBUTE_KEYS = {
  AWS_SPAN_KIND: 'aws.span.kind',
  AWS_LOCAL_SERVICE: 'aws.local.service',
  AWS_LOCAL_OPERATION: 'aws.local.operation',
  AWS_REMOTE_SERVICE: 'aws.remote.service',
  AWS_REMOTE_OPERATION: 'aws.remote.operation',
  AWS_REMOTE_ENVIRONMENT: 'aws.remote.environment',
  AWS_REMOTE_RESOURCE_TYPE: 'aws.remote.resource.type',
  AWS_REMOTE_RESOURCE_IDENTIFIER: 'aws.remote.resource.identifier',
  AWS_CLOUDFORMATION_PRIMARY_IDENTIFIER: 'aws.remote.resource.cfn.primary.identifier',
  AWS_REMOTE_DB_USER: 'aws.remote.db.user',

  // Cross-account support
  AWS_REMOTE_RESOURCE_ACCOUNT_ID: 'aws.remote.resource.account.id',
  AWS_REMOTE_RESOURCE_REGION: 'aws.remote.resource.region',
  AWS_REMOTE_RESOURCE_ACCESS_KEY: 'aws.remote.resource.account.access_key',
  AWS_AUTH_ACCESS_KEY: 'aws.auth.account.access_key',
  AWS_AUTH_REGION: 'aws.auth.region',

  // Written by AttributePropagatingSpanProcessor when a span starts
  AWS_SDK_DESCENDANT: 'aws.sdk.descendant',
  AWS_CONSUMER_PARENT_SPAN_KIND: 'aws.consumer.parent.span.kind',
  AWS_IS_LOCAL_ROOT: 'aws.is.local.root',

  // Set by the older AWS SDK instrumentations instead of rpc.service / rpc.method
  AWS_SERVICE_NAME: 'aws.service',
  AWS_OPERATION_NAME: 'aws.operation',

  // Resource attributes recorded by the AWS SDK instrumentation
  AWS_DYNAMODB_TABLE_NAMES: SEMATTRS_AWS_DYNAMODB_TABLE_NAMES,
  AWS_DYNAMODB_TABLE_ARN: 'aws.dynamodb.table.arn',
  AWS_KINESIS_STREAM_NAME: 'aws.kinesis.stream.name',
  AWS_KINESIS_STREAM_ARN: 'aws.kinesis.stream.arn',
  AWS_LAMBDA_FUNCTION_NAME: 'aws.lambda.function.name',
  AWS_LAMBDA_FUNCTION_ARN: 'aws.lambda.function.arn',
  AWS_LAMBDA_RESOURCE_MAPPING_ID: 'aws.lambda.resource_mapping.id',
  AWS_S3_BUCKET: 'aws.s3.bucket',
  AWS_SECRETSMANAGER_SECRET_ARN: 'aws.secretsmanager.secret.arn',
  AWS_SNS_TOPIC_ARN: 'aws.sns.topic.arn',
  AWS_SQS_QUEUE_URL: 'aws.sqs.queue.url',
  AWS_SQS_QUEUE_NAME: 'aws.sqs.queue.name',
  AWS_STEPFUNCTIONS_ACTIVITY_ARN: 'aws.stepfunctions.activity.arn',
  AWS_STEPFUNCTIONS_STATE_MACHINE_ARN: 'aws.stepfunctions.state_machine.arn',
  AWS_BEDROCK_GUARDRAIL_ID: 'aws.bedrock.guardrail.id',
  AWS_BEDROCK_GUARDRAIL_ARN: 'aws.bedrock.guardrail.arn',
  AWS_BEDROCK_AGENT_ID: 'aws.bedrock.agent.id',
  AWS_BEDROCK_KNOWLEDGE_BASE_ID: 'aws.bedrock.knowledge_base.id',
  AWS_BEDROCK_DATA_SOURCE_ID: 'aws.bedrock.data_source.id',
} as const;
