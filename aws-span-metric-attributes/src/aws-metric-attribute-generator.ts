// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { Attributes, AttributeValue, diag, SpanKind } from '@opentelemetry/api';
import { defaultServiceName, Resource } from '@opentelemetry/resources';
import { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import {
  SEMATTRS_DB_USER,
  SEMATTRS_NET_PEER_NAME,
  SEMATTRS_NET_PEER_PORT,
  SEMATTRS_PEER_SERVICE,
  SEMRESATTRS_SERVICE_NAME,
} from '@opentelemetry/semantic-conventions';
import { getLambdaRemoteEnvironment } from './application-signals-config';
import { AWS_ATTRIBUTE_KEYS } from './aws-attribute-keys';
import { AwsSpanClassifier } from './aws-span-classifier';
import {
  AttributeMap,
  DEPENDENCY_METRIC,
  MetricAttributeGenerator,
  SERVICE_METRIC,
} from './metric-attribute-generator';
import { RegionalResourceArnParser } from './regional-resource-arn-parser';
import { extractRemoteResource, RemoteResource } from './remote-resource-rules';
import {
  getRemoteService,
  REMOTE_SERVICE_SOURCES,
  RemoteServiceAndOperation,
  RemoteServiceSource,
} from './remote-service-sources';
import { NET_SOCK_PEER_ADDR, NET_SOCK_PEER_PORT } from './semantic-attribute-keys';
import { SqsUrlParser } from './sqs-url-parser';
import { attributeToString } from './utils';

// As per https://opentelemetry.io/docs/specs/semconv/resource/#service, if service name is not specified, SDK defaults
// the service name to unknown_service:<process name> or just unknown_service.
// - `defaultServiceName()` returns `unknown_service:${process.argv0}`
const OTEL_UNKNOWN_SERVICE: string = defaultServiceName();

// ARN attributes that locate the account and region of a remote resource, in priority order
export const ARN_ATTRIBUTE_KEYS: readonly string[] = [
  AWS_ATTRIBUTE_KEYS.AWS_DYNAMODB_TABLE_ARN,
  AWS_ATTRIBUTE_KEYS.AWS_KINESIS_STREAM_ARN,
  AWS_ATTRIBUTE_KEYS.AWS_SNS_TOPIC_ARN,
  AWS_ATTRIBUTE_KEYS.AWS_SECRETSMANAGER_SECRET_ARN,
  AWS_ATTRIBUTE_KEYS.AWS_STEPFUNCTIONS_ACTIVITY_ARN,
  AWS_ATTRIBUTE_KEYS.AWS_STEPFUNCTIONS_STATE_MACHINE_ARN,
  AWS_ATTRIBUTE_KEYS.AWS_BEDROCK_GUARDRAIL_ARN,
  AWS_ATTRIBUTE_KEYS.AWS_LAMBDA_FUNCTION_ARN,
];

interface AccountAndRegion {
  accountId: string | undefined;
  region: string | undefined;
}

/**
 * AwsMetricAttributeGenerator generates very specific metric attributes based on low-cardinality
 * span and resource attributes. If such attributes are not present, we fallback to default values.
 *
 * <p>The goal of these particular metric attributes is to get metrics for incoming and outgoing
 * traffic for a service. Namely, {@link SpanKind.SERVER} and {@link SpanKind.CONSUMER} spans
 * represent "incoming" traffic, {@link SpanKind.CLIENT} and {@link SpanKind.PRODUCER} spans
 * represent "outgoing" traffic, and {@link SpanKind.INTERNAL} spans are ignored unless they are a
 * local root.
 *
 * <p>The generator keeps no state, so a single instance may serve any number of spans.
 */
export class AwsMetricAttributeGenerator implements MetricAttributeGenerator {
  public generateMetricAttributeMapFromSpan(span: ReadableSpan, resource: Resource): AttributeMap {
    const attributesMap: AttributeMap = {};

    if (AwsSpanClassifier.shouldGenerateServiceMetricAttributes(span)) {
      attributesMap[SERVICE_METRIC] = this.generateServiceMetricAttributes(span, resource);
    }
    if (AwsSpanClassifier.shouldGenerateDependencyMetricAttributes(span)) {
      attributesMap[DEPENDENCY_METRIC] = this.generateDependencyMetricAttributes(span, resource);
    }

    return attributesMap;
  }

  private generateServiceMetricAttributes(span: ReadableSpan, resource: Resource): Attributes {
    const attributes: Attributes = {};

    AwsMetricAttributeGenerator.setService(resource, span, attributes);
    AwsMetricAttributeGenerator.setIngressOperation(span, attributes);
    AwsMetricAttributeGenerator.setSpanKindForService(span, attributes);

    return attributes;
  }

  private generateDependencyMetricAttributes(span: ReadableSpan, resource: Resource): Attributes {
    const attributes: Attributes = {};

    AwsMetricAttributeGenerator.setService(resource, span, attributes);
    AwsMetricAttributeGenerator.setEgressOperation(span, attributes);
    AwsMetricAttributeGenerator.setRemoteEnvironment(span, attributes);
    AwsMetricAttributeGenerator.setRemoteServiceAndOperation(span, attributes);
    const isRemoteResourceSet: boolean = AwsMetricAttributeGenerator.setRemoteResourceTypeAndIdentifier(
      span,
      attributes
    );
    if (isRemoteResourceSet) {
      AwsMetricAttributeGenerator.setRemoteResourceAccountIdAndRegion(span, attributes);
    }
    AwsMetricAttributeGenerator.setSpanKindForDependency(span, attributes);
    AwsMetricAttributeGenerator.setRemoteDbUser(span, attributes);

    return attributes;
  }

  /** Service is always derived from {@link SEMRESATTRS_SERVICE_NAME} */
  private static setService(resource: Resource, span: ReadableSpan, attributes: Attributes): void {
    let service: AttributeValue | undefined = resource.attributes[SEMRESATTRS_SERVICE_NAME];

    if (service === undefined || service === OTEL_UNKNOWN_SERVICE) {
      AwsMetricAttributeGenerator.logUnknownAttribute(AWS_ATTRIBUTE_KEYS.AWS_LOCAL_SERVICE, span);
      service = AwsSpanClassifier.UNKNOWN_SERVICE;
    }
    attributes[AWS_ATTRIBUTE_KEYS.AWS_LOCAL_SERVICE] = service;
  }

  private static setIngressOperation(span: ReadableSpan, attributes: Attributes): void {
    const operation: string = AwsSpanClassifier.getIngressOperation(span);
    if (operation === AwsSpanClassifier.UNKNOWN_OPERATION) {
      AwsMetricAttributeGenerator.logUnknownAttribute(AWS_ATTRIBUTE_KEYS.AWS_LOCAL_OPERATION, span);
    }
    attributes[AWS_ATTRIBUTE_KEYS.AWS_LOCAL_OPERATION] = operation;
  }

  /**
   * Egress operation (i.e. operation for Client and Producer spans) is always derived from a
   * special span attribute, {@link AWS_ATTRIBUTE_KEYS.AWS_LOCAL_OPERATION}. This attribute is
   * generated with a separate SpanProcessor, {@link AttributePropagatingSpanProcessor}
   */
  private static setEgressOperation(span: ReadableSpan, attributes: Attributes): void {
    let operation: string | undefined = AwsSpanClassifier.getEgressOperation(span);
    if (operation === undefined) {
      AwsMetricAttributeGenerator.logUnknownAttribute(AWS_ATTRIBUTE_KEYS.AWS_LOCAL_OPERATION, span);
      operation = AwsSpanClassifier.UNKNOWN_OPERATION;
    }
    attributes[AWS_ATTRIBUTE_KEYS.AWS_LOCAL_OPERATION] = operation;
  }

  // The invoked function's environment can only be configured, it is not observable from the span.
  private static setRemoteEnvironment(span: ReadableSpan, attributes: Attributes): void {
    if (AwsSpanClassifier.isLambdaInvokeOperation(span)) {
      attributes[AWS_ATTRIBUTE_KEYS.AWS_REMOTE_ENVIRONMENT] = getLambdaRemoteEnvironment();
    }
  }

  /**
   * Remote attributes (only for Client and Producer spans) are generated based on low-cardinality
   * span attributes, in the priority order of {@link REMOTE_SERVICE_SOURCES}.
   *
   * <p>Peer Service is also a reliable indicator of customer intent. If it is set, it overrides
   * AWS_REMOTE_SERVICE identified from any span attribute other than the AWS Remote attributes.
   *
   * <p>If the selected attributes still produce UnknownRemoteService or UnknownRemoteOperation,
   * `net.peer.name`, `net.peer.port`, `net.sock.peer.addr`, `net.sock.peer.port` and the http url
   * are used to derive the RemoteService, and the http method and url to derive the
   * RemoteOperation.
   */
  private static setRemoteServiceAndOperation(span: ReadableSpan, attributes: Attributes): void {
    const source: RemoteServiceSource | undefined = REMOTE_SERVICE_SOURCES.find((candidate: RemoteServiceSource) =>
      candidate.matches(span)
    );
    let { remoteService, remoteOperation }: RemoteServiceAndOperation = source?.resolve(span) ?? {
      remoteService: AwsSpanClassifier.UNKNOWN_REMOTE_SERVICE,
      remoteOperation: AwsSpanClassifier.UNKNOWN_REMOTE_OPERATION,
    };

    if (
      AwsSpanClassifier.isKeyPresent(span, SEMATTRS_PEER_SERVICE) &&
      !AwsSpanClassifier.isKeyPresent(span, AWS_ATTRIBUTE_KEYS.AWS_REMOTE_SERVICE)
    ) {
      remoteService = getRemoteService(span, SEMATTRS_PEER_SERVICE);
    }

    if (remoteService === AwsSpanClassifier.UNKNOWN_REMOTE_SERVICE) {
      remoteService = AwsMetricAttributeGenerator.generateRemoteService(span);
    }
    if (remoteOperation === AwsSpanClassifier.UNKNOWN_REMOTE_OPERATION) {
      remoteOperation = AwsMetricAttributeGenerator.generateRemoteOperation(span);
    }

    attributes[AWS_ATTRIBUTE_KEYS.AWS_REMOTE_SERVICE] = remoteService;
    attributes[AWS_ATTRIBUTE_KEYS.AWS_REMOTE_OPERATION] = remoteOperation;
  }

  /**
   * When the remote call operation is undetermined for http use cases, will try to extract the
   * remote operation name from http url string
   */
  private static generateRemoteOperation(span: ReadableSpan): string {
    let remoteOperation: string = AwsSpanClassifier.UNKNOWN_REMOTE_OPERATION;
    const httpUrl: string | undefined = AwsSpanClassifier.getHttpUrl(span);
    if (httpUrl !== undefined) {
      try {
        const url: URL = new URL(httpUrl);
        remoteOperation = AwsSpanClassifier.extractApiPathValue(url.pathname);
        const httpMethod: string | undefined = AwsSpanClassifier.getHttpMethod(span);
        if (httpMethod !== undefined) {
          remoteOperation = httpMethod + ' ' + remoteOperation;
        }
      } catch (e: unknown) {
        diag.verbose(`invalid http.url attribute: ${httpUrl}`);
      }
    }
    if (remoteOperation === AwsSpanClassifier.UNKNOWN_REMOTE_OPERATION) {
      AwsMetricAttributeGenerator.logUnknownAttribute(AWS_ATTRIBUTE_KEYS.AWS_REMOTE_OPERATION, span);
    }
    return remoteOperation;
  }

  private static generateRemoteService(span: ReadableSpan): string {
    if (AwsSpanClassifier.isKeyPresent(span, SEMATTRS_NET_PEER_NAME)) {
      return AwsMetricAttributeGenerator.withPort(
        getRemoteService(span, SEMATTRS_NET_PEER_NAME),
        span.attributes[SEMATTRS_NET_PEER_PORT]
      );
    }
    if (AwsSpanClassifier.isKeyPresent(span, NET_SOCK_PEER_ADDR)) {
      return AwsMetricAttributeGenerator.withPort(
        getRemoteService(span, NET_SOCK_PEER_ADDR),
        span.attributes[NET_SOCK_PEER_PORT]
      );
    }

    const httpUrl: string | undefined = AwsSpanClassifier.getHttpUrl(span);
    if (httpUrl !== undefined) {
      try {
        const url: URL = new URL(httpUrl);
        if (url.hostname !== '') {
          return AwsMetricAttributeGenerator.withPort(url.hostname, url.port !== '' ? url.port : undefined);
        }
      } catch (e: unknown) {
        diag.verbose(`invalid http.url attribute: ${httpUrl}`);
      }
    }

    AwsMetricAttributeGenerator.logUnknownAttribute(AWS_ATTRIBUTE_KEYS.AWS_REMOTE_SERVICE, span);
    return AwsSpanClassifier.UNKNOWN_REMOTE_SERVICE;
  }

  private static withPort(host: string, port: AttributeValue | undefined): string {
    const portString: string | undefined = attributeToString(port);
    return portString !== undefined ? host + ':' + portString : host;
  }

  /**
   * Remote resource attributes {@link AWS_ATTRIBUTE_KEYS.AWS_REMOTE_RESOURCE_TYPE},
   * {@link AWS_ATTRIBUTE_KEYS.AWS_REMOTE_RESOURCE_IDENTIFIER} and
   * {@link AWS_ATTRIBUTE_KEYS.AWS_CLOUDFORMATION_PRIMARY_IDENTIFIER} are set together or not at all.
   *
   * @return whether the remote resource attributes were set
   */
  private static setRemoteResourceTypeAndIdentifier(span: ReadableSpan, attributes: Attributes): boolean {
    const remoteResource: RemoteResource | undefined = extractRemoteResource(span);
    if (remoteResource === undefined) {
      return false;
    }

    attributes[AWS_ATTRIBUTE_KEYS.AWS_REMOTE_RESOURCE_TYPE] = remoteResource.type;
    attributes[AWS_ATTRIBUTE_KEYS.AWS_REMOTE_RESOURCE_IDENTIFIER] = remoteResource.identifier;
    attributes[AWS_ATTRIBUTE_KEYS.AWS_CLOUDFORMATION_PRIMARY_IDENTIFIER] =
      remoteResource.cloudformationPrimaryIdentifier;
    return true;
  }

  /**
   * The account of a remote resource comes from its queue url or ARN. When neither is known, the
   * access key the call was signed with stands in for the account.
   */
  private static setRemoteResourceAccountIdAndRegion(span: ReadableSpan, attributes: Attributes): void {
    const { accountId, region }: AccountAndRegion = AwsMetricAttributeGenerator.getAccountIdAndRegion(span);
    if (accountId !== undefined && region !== undefined) {
      attributes[AWS_ATTRIBUTE_KEYS.AWS_REMOTE_RESOURCE_ACCOUNT_ID] = accountId;
      attributes[AWS_ATTRIBUTE_KEYS.AWS_REMOTE_RESOURCE_REGION] = region;
      return;
    }

    const accessKey: string | undefined = attributeToString(span.attributes[AWS_ATTRIBUTE_KEYS.AWS_AUTH_ACCESS_KEY]);
    const authRegion: string | undefined = attributeToString(span.attributes[AWS_ATTRIBUTE_KEYS.AWS_AUTH_REGION]);
    if (accessKey !== undefined && authRegion !== undefined) {
      attributes[AWS_ATTRIBUTE_KEYS.AWS_REMOTE_RESOURCE_ACCESS_KEY] = accessKey;
      attributes[AWS_ATTRIBUTE_KEYS.AWS_REMOTE_RESOURCE_REGION] = authRegion;
    }
  }

  private static getAccountIdAndRegion(span: ReadableSpan): AccountAndRegion {
    const queueUrl: AttributeValue | undefined = span.attributes[AWS_ATTRIBUTE_KEYS.AWS_SQS_QUEUE_URL];
    if (queueUrl !== undefined) {
      return { accountId: SqsUrlParser.getAccountId(queueUrl), region: SqsUrlParser.getRegion(queueUrl) };
    }

    const arnKey: string | undefined = ARN_ATTRIBUTE_KEYS.find((key: string) =>
      AwsSpanClassifier.isKeyPresent(span, key)
    );
    if (arnKey === undefined) {
      return { accountId: undefined, region: undefined };
    }
    const arn: AttributeValue | undefined = span.attributes[arnKey];
    return { accountId: RegionalResourceArnParser.getAccountId(arn), region: RegionalResourceArnParser.getRegion(arn) };
  }

  /** Span kind is needed for differentiating metrics in the EMF exporter */
  private static setSpanKindForService(span: ReadableSpan, attributes: Attributes): void {
    let spanKind: string = SpanKind[span.kind];
    if (AwsSpanClassifier.isLocalRoot(span)) {
      spanKind = AwsSpanClassifier.LOCAL_ROOT;
    }
    attributes[AWS_ATTRIBUTE_KEYS.AWS_SPAN_KIND] = spanKind;
  }

  private static setSpanKindForDependency(span: ReadableSpan, attributes: Attributes): void {
    attributes[AWS_ATTRIBUTE_KEYS.AWS_SPAN_KIND] = SpanKind[span.kind];
  }

  private static setRemoteDbUser(span: ReadableSpan, attributes: Attributes): void {
    const dbUser: AttributeValue | undefined = span.attributes[SEMATTRS_DB_USER];
    if (AwsSpanClassifier.isDbSpan(span) && dbUser !== undefined) {
      attributes[AWS_ATTRIBUTE_KEYS.AWS_REMOTE_DB_USER] = dbUser;
    }
  }

  private static logUnknownAttribute(attributeKey: string, span: ReadableSpan): void {
    diag.verbose(`No valid ${attributeKey} value found for ${SpanKind[span.kind]} span ${span.spanContext().spanId}`);
  }
}
