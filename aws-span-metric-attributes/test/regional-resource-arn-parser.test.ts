// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { AttributeValue } from '@opentelemetry/api';
import { expect } from 'expect';
import { RegionalResourceArnParser } from '../src/regional-resource-arn-parser';

const MALFORMED_ARNS: (AttributeValue | undefined)[] = [
  undefined,
  '',
  ' ',
  ':',
  '::::::',
  'not:an:arn:string',
  'arn:aws:ec2:us-west-2:123456',
  'arn:aws:ec2:us-west-2:123456789012',
  'arn:aws:dynamodb:us-west-2:1234567xxxxx:table/test_table',
  'arn:aws:dynamodb:us-west-2::table/test_table',
  'aws:dynamodb:us-west-2:123456789012:table/test_table:x',
  123456789012,
  ['arn:aws:dynamodb:us-west-2:123456789012:table/test_table'],
];

describe('RegionalResourceArnParserTest', () => {
  it('testMalformedArnsYieldNothing', () => {
    MALFORMED_ARNS.forEach((arn: AttributeValue | undefined) => {
      expect(RegionalResourceArnParser.parseArn(arn)).toBeUndefined();
      expect(RegionalResourceArnParser.getAccountId(arn)).toBeUndefined();
      expect(RegionalResourceArnParser.getRegion(arn)).toBeUndefined();
      expect(RegionalResourceArnParser.extractResourceNameFromArn(arn)).toBeUndefined();
    });
  });

  it('testParseArn', () => {
    expect(RegionalResourceArnParser.parseArn('arn:aws:acm:us-east-1:123456789012:certificate:abc-123')).toEqual({
      partition: 'aws',
      service: 'acm',
      region: 'us-east-1',
      accountId: '123456789012',
      resource: ['certificate', 'abc-123'],
    });
  });

  it('testGetAccountId', () => {
    validateAccountId('arn:aws:dynamodb:us-west-2:123456789012:table/test_table', '123456789012');
    validateAccountId('arn:aws:acm:us-east-1:123456789012:certificate:abc-123', '123456789012');
    validateAccountId('arn:aws:sns:us-east-1:1234:topic', '1234');
  });

  it('testGetRegion', () => {
    validateRegion('arn:aws:dynamodb:us-west-2:123456789012:table/test_table', 'us-west-2');
    validateRegion('arn:aws:acm:us-east-1:123456789012:certificate:abc-123', 'us-east-1');
  });

  it('testExtractDynamoDbTableNameFromArn', () => {
    expect(RegionalResourceArnParser.extractDynamoDbTableNameFromArn(undefined)).toBeUndefined();
    expect(RegionalResourceArnParser.extractDynamoDbTableNameFromArn('not:an:arn:string')).toBeUndefined();
    expect(
      RegionalResourceArnParser.extractDynamoDbTableNameFromArn('arn:aws:dynamodb:us-west-2:123456789012:table/test_table')
    ).toEqual('test_table');
    expect(
      RegionalResourceArnParser.extractDynamoDbTableNameFromArn(
        'arn:aws:dynamodb:us-west-2:123456789012:table/my-table-name'
      )
    ).toEqual('my-table-name');
    // Only a leading prefix is removed
    expect(
      RegionalResourceArnParser.extractDynamoDbTableNameFromArn('arn:aws:dynamodb:us-west-2:123456789012:my-table/x')
    ).toEqual('my-table/x');
  });

  it('testExtractKinesisStreamNameFromArn', () => {
    expect(RegionalResourceArnParser.extractKinesisStreamNameFromArn(undefined)).toBeUndefined();
    expect(
      RegionalResourceArnParser.extractKinesisStreamNameFromArn('arn:aws:kinesis:us-west-2:123456789012:stream/test_stream')
    ).toEqual('test_stream');
    expect(
      RegionalResourceArnParser.extractKinesisStreamNameFromArn(
        'arn:aws:kinesis:us-west-2:123456789012:stream/my-stream-name'
      )
    ).toEqual('my-stream-name');
  });

  it('testExtractResourceNameFromArn', () => {
    validateResourceName('arn:aws:dynamodb:us-west-2:123456789012:table/test_table', 'table/test_table');
    validateResourceName('arn:aws:kinesis:us-west-2:123456789012:stream/test_stream', 'stream/test_stream');
    validateResourceName('arn:aws:sns:us-east-1:123456789012:my-topic', 'my-topic');
    validateResourceName('arn:aws:states:us-east-1:123456789012:stateMachine:my-state-machine', 'my-state-machine');
    validateResourceName('arn:aws:secretsmanager:us-east-1:123456789012:secret:my-secret-abc123', 'my-secret-abc123');
  });
});

function validateAccountId(arn: string, expectedAccountId: string): void {
  expect(RegionalResourceArnParser.getAccountId(arn)).toEqual(expectedAccountId);
}

function validateRegion(arn: string, expectedRegion: string): void {
  expect(RegionalResourceArnParser.getRegion(arn)).toEqual(expectedRegion);
}

function validateResourceName(arn: string, expectedName: string): void {
  expect(RegionalResourceArnParser.extractResourceNameFromArn(arn)).toEqual(expectedName);
}
