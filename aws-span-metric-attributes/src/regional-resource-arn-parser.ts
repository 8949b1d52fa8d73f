// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { AttributeValue } from '@opentelemetry/api';
import { checkDigits } from './utils';

const ARN_PREFIX: string = 'arn:';
const DYNAMODB_TABLE_PREFIX: string = 'table/';
const KINESIS_STREAM_PREFIX: string = 'stream/';

export interface ParsedArn {
  partition: string;
  service: string;
  region: string;
  accountId: string;
  // Colon-delimited resource parts, e.g. ['table/test_table'] or ['function', 'my-function']
  resource: string[];
}

export class RegionalResourceArnParser {
  /**
   * Parses ARN with formats:
   * arn:partition:service:region:account-id:resource-type/resource-id or
   * arn:partition:service:region:account-id:resource-type:resource-id
   *
   * Anything else, including an account id that is not made of digits, gives undefined.
   */
  public static parseArn(arn: AttributeValue | undefined): ParsedArn | undefined {
    if (typeof arn !== 'string' || !arn.startsWith(ARN_PREFIX)) {
      return undefined;
    }
    const [, partition, service, region, accountId, ...resource] = arn.split(':');
    if (resource.length === 0 || !checkDigits(accountId)) {
      return undefined;
    }
    return { partition, service, region, accountId, resource };
  }

  public static getAccountId(arn: AttributeValue | undefined): string | undefined {
    return this.parseArn(arn)?.accountId;
  }

  public static getRegion(arn: AttributeValue | undefined): string | undefined {
    return this.parseArn(arn)?.region;
  }

  public static extractDynamoDbTableNameFromArn(arn: AttributeValue | undefined): string | undefined {
    return stripPrefix(this.extractResourceNameFromArn(arn), DYNAMODB_TABLE_PREFIX);
  }

  public static extractKinesisStreamNameFromArn(arn: AttributeValue | undefined): string | undefined {
    return stripPrefix(this.extractResourceNameFromArn(arn), KINESIS_STREAM_PREFIX);
  }

  /** The last colon-delimited part, which may still carry a `type/` prefix. */
  public static extractResourceNameFromArn(arn: AttributeValue | undefined): string | undefined {
    const resource: string[] | undefined = this.parseArn(arn)?.resource;
    return resource?.[resource.length - 1];
  }
}

function stripPrefix(value: string | undefined, prefix: string): string | undefined {
  if (value !== undefined && value.startsWith(prefix)) {
    return value.substring(prefix.length);
  }
  return value;
}
