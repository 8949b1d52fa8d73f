// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { AttributeValue, diag } from '@opentelemetry/api';
import { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import {
  ATTR_SERVER_ADDRESS,
  ATTR_SERVER_PORT,
  SEMATTRS_DB_CONNECTION_STRING,
  SEMATTRS_DB_NAME,
  SEMATTRS_NET_PEER_NAME,
  SEMATTRS_NET_PEER_PORT,
} from '@opentelemetry/semantic-conventions';
import { escapeDelimiters, IDENTIFIER_DELIMITER } from './attribute-escaper';
import { AWS_ATTRIBUTE_KEYS } from './aws-attribute-keys';
import {
  NORMALIZED_BEDROCK_SERVICE_NAME,
  NORMALIZED_DYNAMO_DB_SERVICE_NAME,
  NORMALIZED_KINESIS_SERVICE_NAME,
  NORMALIZED_LAMBDA_SERVICE_NAME,
  NORMALIZED_S3_SERVICE_NAME,
  NORMALIZED_SECRETSMANAGER_SERVICE_NAME,
  NORMALIZED_SNS_SERVICE_NAME,
  NORMALIZED_SQS_SERVICE_NAME,
  NORMALIZED_STEPFUNCTIONS_SERVICE_NAME,
} from './aws-service-names';
import { AwsSpanClassifier } from './aws-span-classifier';
import { RegionalResourceArnParser } from './regional-resource-arn-parser';
import { GEN_AI_REQUEST_MODEL, SERVER_SOCKET_ADDRESS, SERVER_SOCKET_PORT } from './semantic-attribute-keys';
import { SqsUrlParser } from './sqs-url-parser';
import { attributeToString } from './utils';

export const DB_CONNECTION_RESOURCE_TYPE: string = 'DB::Connection';

export interface RemoteResource {
  type: string;
  identifier: string;
  cloudformationPrimaryIdentifier: string;
}

/**
 * A rule claims a span when {@link applies} is true. Rules are evaluated in order and the first
 * claiming rule decides: if its {@link extract} yields nothing, no remote resource is reported.
 */
export interface RemoteResourceRule {
  type: string;
  applies(span: ReadableSpan): boolean;
  extract(span: ReadableSpan): RemoteResource | undefined;
}

type ValueExtractor = (span: ReadableSpan) => string | undefined;

const attribute =
  (key: string): ValueExtractor =>
  (span: ReadableSpan) =>
    escapeDelimiters(span.attributes[key]);

const extractedFrom =
  (key: string, extractName: (arn: AttributeValue | undefined) => string | undefined): ValueExtractor =>
  (span: ReadableSpan) =>
    escapeDelimiters(extractName(span.attributes[key]));

const keyPresent =
  (key: string) =>
  (span: ReadableSpan): boolean =>
    AwsSpanClassifier.isKeyPresent(span, key);

function awsSdkRule(
  applies: (span: ReadableSpan) => boolean,
  type: string,
  identifier: ValueExtractor,
  cloudformationPrimaryIdentifier?: ValueExtractor
): RemoteResourceRule {
  return {
    type,
    applies: (span: ReadableSpan) => AwsSpanClassifier.isAwsSdkSpan(span) && applies(span),
    extract: (span: ReadableSpan) => {
      const resourceIdentifier: string | undefined = identifier(span);
      // The CloudFormation primary identifier defaults to the resource identifier
      const cfnIdentifier: string | undefined = cloudformationPrimaryIdentifier?.(span) ?? resourceIdentifier;
      if (resourceIdentifier === undefined || cfnIdentifier === undefined) {
        return undefined;
      }
      return { type, identifier: resourceIdentifier, cloudformationPrimaryIdentifier: cfnIdentifier };
    },
  };
}

// aws.dynamodb.table_names is an array attribute; a resource is only known for a single table.
function getSingleDynamoDbTableName(span: ReadableSpan): string | undefined {
  const tableNames: AttributeValue | undefined = span.attributes[AWS_ATTRIBUTE_KEYS.AWS_DYNAMODB_TABLE_NAMES];
  if (Array.isArray(tableNames)) {
    const [tableName] = tableNames;
    return tableNames.length === 1 && typeof tableName === 'string' ? tableName : undefined;
  }
  return typeof tableNames === 'string' ? tableNames : undefined;
}

function getLambdaFunctionName(span: ReadableSpan): string | undefined {
  // Lambda Invoke is modeled as a remote service, see normalizeRemoteServiceName
  if (AwsSpanClassifier.isLambdaInvokeOperation(span)) {
    return undefined;
  }
  return escapeDelimiters(span.attributes[AWS_ATTRIBUTE_KEYS.AWS_LAMBDA_FUNCTION_NAME]);
}

// The knowledge base id is part of the identifier even when it is unknown, e.g. `|<data source id>`.
function getBedrockDataSourceCfnIdentifier(span: ReadableSpan): string | undefined {
  const dataSourceId: string | undefined = escapeDelimiters(
    span.attributes[AWS_ATTRIBUTE_KEYS.AWS_BEDROCK_DATA_SOURCE_ID]
  );
  if (dataSourceId === undefined) {
    return undefined;
  }
  const knowledgeBaseId: string =
    escapeDelimiters(span.attributes[AWS_ATTRIBUTE_KEYS.AWS_BEDROCK_KNOWLEDGE_BASE_ID]) ?? '';
  return knowledgeBaseId + IDENTIFIER_DELIMITER + dataSourceId;
}

const DB_ADDRESS_AND_PORT_KEYS: ReadonlyArray<[string, string]> = [
  [ATTR_SERVER_ADDRESS, ATTR_SERVER_PORT],
  [SEMATTRS_NET_PEER_NAME, SEMATTRS_NET_PEER_PORT],
  [SERVER_SOCKET_ADDRESS, SERVER_SOCKET_PORT],
];

/**
 * RemoteResourceIdentifier is populated with rule <code>
 *     ^[{db.name}|]?{address}[|{port}]?
 * </code>
 *
 * <pre>
 * {address} and {port} are retrieved in priority order:
 * - server.address, server.port
 * - net.peer.name, net.peer.port
 * - server.socket.address, server.socket.port
 * - host and port of db.connection_string
 * </pre>
 *
 * If address is not present, neither RemoteResourceType nor RemoteResourceIdentifier will be
 * provided.
 */
export function getDbConnection(span: ReadableSpan): string | undefined {
  let dbConnection: string | undefined;

  const addressAndPortKeys: [string, string] | undefined = DB_ADDRESS_AND_PORT_KEYS.find(
    ([addressKey]: [string, string]) => AwsSpanClassifier.isKeyPresent(span, addressKey)
  );
  if (addressAndPortKeys !== undefined) {
    const [addressKey, portKey] = addressAndPortKeys;
    dbConnection = buildDbConnection(
      attributeToString(span.attributes[addressKey]),
      attributeToString(span.attributes[portKey])
    );
  } else if (AwsSpanClassifier.isKeyPresent(span, SEMATTRS_DB_CONNECTION_STRING)) {
    dbConnection = buildDbConnectionFromConnectionString(
      attributeToString(span.attributes[SEMATTRS_DB_CONNECTION_STRING])
    );
  }

  const dbName: string | undefined = escapeDelimiters(attributeToString(span.attributes[SEMATTRS_DB_NAME]));
  if (dbConnection !== undefined && dbName !== undefined) {
    return dbName + IDENTIFIER_DELIMITER + dbConnection;
  }
  return dbConnection;
}

function buildDbConnection(address: string | undefined, port: string | undefined): string | undefined {
  const escapedAddress: string | undefined = escapeDelimiters(address);
  if (escapedAddress === undefined) {
    return undefined;
  }
  return escapedAddress + (port !== undefined ? IDENTIFIER_DELIMITER + port : '');
}

function buildDbConnectionFromConnectionString(connectionString: string | undefined): string | undefined {
  if (connectionString === undefined) {
    return undefined;
  }

  let url: URL;
  try {
    // `jdbc:<database>://` and other multi-colon schemes leave host and port empty with `new URL()`,
    // so the scheme is swapped for one without colons. e.g.
    // - jdbc:postgresql://host:port/database?properties
    // - abc:def:ghi://host:3306
    const schemeEndIndex: number = connectionString.indexOf('://');
    url = new URL(schemeEndIndex === -1 ? connectionString : 'dummyschema' + connectionString.substring(schemeEndIndex));
  } catch (e: unknown) {
    diag.verbose(`invalid DB ConnectionString: ${connectionString}`);
    return undefined;
  }

  if (url.hostname === '') {
    return undefined;
  }
  return buildDbConnection(url.hostname, url.port !== '' ? url.port : undefined);
}

/**
 * Remote resource rules in priority order. AWS resource types and identifiers adhere to the <a
 * href="https://docs.aws.amazon.com/cloudcontrolapi/latest/userguide/supported-resources.html">AWS
 * Cloud Control resource format</a>; the last rule describes the connection of a DB client span.
 */
export const REMOTE_RESOURCE_RULES: readonly RemoteResourceRule[] = [
  awsSdkRule(
    (span: ReadableSpan) => getSingleDynamoDbTableName(span) !== undefined,
    NORMALIZED_DYNAMO_DB_SERVICE_NAME + '::Table',
    (span: ReadableSpan) => escapeDelimiters(getSingleDynamoDbTableName(span))
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_DYNAMODB_TABLE_ARN),
    NORMALIZED_DYNAMO_DB_SERVICE_NAME + '::Table',
    extractedFrom(AWS_ATTRIBUTE_KEYS.AWS_DYNAMODB_TABLE_ARN, (arn: AttributeValue | undefined) =>
      RegionalResourceArnParser.extractDynamoDbTableNameFromArn(arn)
    )
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_KINESIS_STREAM_NAME),
    NORMALIZED_KINESIS_SERVICE_NAME + '::Stream',
    attribute(AWS_ATTRIBUTE_KEYS.AWS_KINESIS_STREAM_NAME)
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_KINESIS_STREAM_ARN),
    NORMALIZED_KINESIS_SERVICE_NAME + '::Stream',
    extractedFrom(AWS_ATTRIBUTE_KEYS.AWS_KINESIS_STREAM_ARN, (arn: AttributeValue | undefined) =>
      RegionalResourceArnParser.extractKinesisStreamNameFromArn(arn)
    )
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_LAMBDA_FUNCTION_NAME),
    NORMALIZED_LAMBDA_SERVICE_NAME + '::Function',
    getLambdaFunctionName,
    attribute(AWS_ATTRIBUTE_KEYS.AWS_LAMBDA_FUNCTION_ARN)
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_LAMBDA_RESOURCE_MAPPING_ID),
    NORMALIZED_LAMBDA_SERVICE_NAME + '::EventSourceMapping',
    attribute(AWS_ATTRIBUTE_KEYS.AWS_LAMBDA_RESOURCE_MAPPING_ID)
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_S3_BUCKET),
    NORMALIZED_S3_SERVICE_NAME + '::Bucket',
    attribute(AWS_ATTRIBUTE_KEYS.AWS_S3_BUCKET)
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_SECRETSMANAGER_SECRET_ARN),
    NORMALIZED_SECRETSMANAGER_SERVICE_NAME + '::Secret',
    extractedFrom(AWS_ATTRIBUTE_KEYS.AWS_SECRETSMANAGER_SECRET_ARN, (arn: AttributeValue | undefined) =>
      RegionalResourceArnParser.extractResourceNameFromArn(arn)
    ),
    attribute(AWS_ATTRIBUTE_KEYS.AWS_SECRETSMANAGER_SECRET_ARN)
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_SNS_TOPIC_ARN),
    NORMALIZED_SNS_SERVICE_NAME + '::Topic',
    extractedFrom(AWS_ATTRIBUTE_KEYS.AWS_SNS_TOPIC_ARN, (arn: AttributeValue | undefined) =>
      RegionalResourceArnParser.extractResourceNameFromArn(arn)
    ),
    attribute(AWS_ATTRIBUTE_KEYS.AWS_SNS_TOPIC_ARN)
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_SQS_QUEUE_NAME),
    NORMALIZED_SQS_SERVICE_NAME + '::Queue',
    attribute(AWS_ATTRIBUTE_KEYS.AWS_SQS_QUEUE_NAME),
    attribute(AWS_ATTRIBUTE_KEYS.AWS_SQS_QUEUE_URL)
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_SQS_QUEUE_URL),
    NORMALIZED_SQS_SERVICE_NAME + '::Queue',
    extractedFrom(AWS_ATTRIBUTE_KEYS.AWS_SQS_QUEUE_URL, (url: AttributeValue | undefined) =>
      SqsUrlParser.getQueueName(url)
    ),
    attribute(AWS_ATTRIBUTE_KEYS.AWS_SQS_QUEUE_URL)
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_STEPFUNCTIONS_ACTIVITY_ARN),
    NORMALIZED_STEPFUNCTIONS_SERVICE_NAME + '::Activity',
    extractedFrom(AWS_ATTRIBUTE_KEYS.AWS_STEPFUNCTIONS_ACTIVITY_ARN, (arn: AttributeValue | undefined) =>
      RegionalResourceArnParser.extractResourceNameFromArn(arn)
    ),
    attribute(AWS_ATTRIBUTE_KEYS.AWS_STEPFUNCTIONS_ACTIVITY_ARN)
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_STEPFUNCTIONS_STATE_MACHINE_ARN),
    NORMALIZED_STEPFUNCTIONS_SERVICE_NAME + '::StateMachine',
    extractedFrom(AWS_ATTRIBUTE_KEYS.AWS_STEPFUNCTIONS_STATE_MACHINE_ARN, (arn: AttributeValue | undefined) =>
      RegionalResourceArnParser.extractResourceNameFromArn(arn)
    ),
    attribute(AWS_ATTRIBUTE_KEYS.AWS_STEPFUNCTIONS_STATE_MACHINE_ARN)
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_BEDROCK_GUARDRAIL_ID),
    NORMALIZED_BEDROCK_SERVICE_NAME + '::Guardrail',
    attribute(AWS_ATTRIBUTE_KEYS.AWS_BEDROCK_GUARDRAIL_ID),
    attribute(AWS_ATTRIBUTE_KEYS.AWS_BEDROCK_GUARDRAIL_ARN)
  ),
  awsSdkRule(keyPresent(GEN_AI_REQUEST_MODEL), NORMALIZED_BEDROCK_SERVICE_NAME + '::Model', attribute(GEN_AI_REQUEST_MODEL)),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_BEDROCK_AGENT_ID),
    NORMALIZED_BEDROCK_SERVICE_NAME + '::Agent',
    attribute(AWS_ATTRIBUTE_KEYS.AWS_BEDROCK_AGENT_ID)
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_BEDROCK_DATA_SOURCE_ID),
    NORMALIZED_BEDROCK_SERVICE_NAME + '::DataSource',
    attribute(AWS_ATTRIBUTE_KEYS.AWS_BEDROCK_DATA_SOURCE_ID),
    getBedrockDataSourceCfnIdentifier
  ),
  awsSdkRule(
    keyPresent(AWS_ATTRIBUTE_KEYS.AWS_BEDROCK_KNOWLEDGE_BASE_ID),
    NORMALIZED_BEDROCK_SERVICE_NAME + '::KnowledgeBase',
    attribute(AWS_ATTRIBUTE_KEYS.AWS_BEDROCK_KNOWLEDGE_BASE_ID)
  ),
  {
    type: DB_CONNECTION_RESOURCE_TYPE,
    applies: (span: ReadableSpan) => !AwsSpanClassifier.isAwsSdkSpan(span) && AwsSpanClassifier.isDbSpan(span),
    extract: (span: ReadableSpan) => {
      const identifier: string | undefined = getDbConnection(span);
      if (identifier === undefined) {
        return undefined;
      }
      return { type: DB_CONNECTION_RESOURCE_TYPE, identifier, cloudformationPrimaryIdentifier: identifier };
    },
  },
];

/** Applies the first rule that claims the span. */
export function extractRemoteResource(span: ReadableSpan): RemoteResource | undefined {
  const rule: RemoteResourceRule | undefined = REMOTE_RESOURCE_RULES.find((candidate: RemoteResourceRule) =>
    candidate.applies(span)
  );
  if (rule === undefined) {
    return undefined;
  }
  const remoteResource: RemoteResource | undefined = rule.extract(span);
  if (remoteResource === undefined) {
    diag.verbose(`No valid ${rule.type} identifier found for span ${span.spanContext().spanId}`);
  }
  return remoteResource;
}
