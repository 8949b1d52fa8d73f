// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { expect } from 'expect';
import { SqsUrlParser } from '../src/sqs-url-parser';

const INVALID_URLS: (string | undefined)[] = [
  undefined,
  '',
  ' ',
  '/',
  '//',
  '///',
  '//asdf',
  '/123412341234/as&df',
  'invalidUrl',
  'https://www.amazon.com',
  'https://sqs.us-east-1.amazonaws.com/123412341234/.',
  'https://sqs.us-east-1.amazonaws.com/12341234xxxx/.',
  'https://sqs.us-east-1.amazonaws.com/A/A',
  'https://sqs.us-east-1.amazonaws.com/123412341234/A/ThisShouldNotBeHere',
];

describe('SqsUrlParserTest', () => {
  it('testSqsClientSpanBasicUrls', () => {
    validateGetQueueName('https://sqs.us-east-1.amazonaws.com/123412341234/Q_Name-5', 'Q_Name-5');
    validateGetQueueName('https://sqs.af-south-1.amazonaws.com/999999999999/-_ThisIsValid', '-_ThisIsValid');
    validateGetQueueName('http://sqs.eu-west-3.amazonaws.com/000000000000/FirstQueue', 'FirstQueue');
    validateGetQueueName('sqs.sa-east-1.amazonaws.com/123456781234/SecondQueue', 'SecondQueue');
  });

  it('testSqsClientSpanRepeatedSchemes', () => {
    validateGetQueueName('http://http://sqs.us-east-1.amazonaws.com/123456789012/Queue', 'Queue');
    validateGetQueueName('https://https://sqs.us-east-1.amazonaws.com/123456789012/Queue', 'Queue');
    expect(SqsUrlParser.getRegion('http://https://sqs.us-east-1.amazonaws.com/123456789012/Queue')).toEqual(
      'us-east-1'
    );
  });

  it('testSqsClientSpanLegacyFormatUrls', () => {
    validateGetQueueName('https://ap-northeast-2.queue.amazonaws.com/123456789012/MyQueue', 'MyQueue');
    validateGetQueueName('http://cn-north-1.queue.amazonaws.com/123456789012/MyQueue', 'MyQueue');
    validateGetQueueName('https://queue.amazonaws.com/123456789012/MyQueue', 'MyQueue');
  });

  it('testSqsClientSpanCustomUrls', () => {
    validateGetQueueName('http://127.0.0.1:1212/123456789012/MyQueue', 'MyQueue');
    validateGetQueueName('127.0.0.1:1212/123412341234/QQ', 'QQ');
    validateGetQueueName('https://amazon.com/123412341234/BB', 'BB');
  });

  it('testSqsClientSpanLongUrls', () => {
    const queueName: string = 'a'.repeat(80);
    validateGetQueueName('http://127.0.0.1:1212/123456789012/' + queueName, queueName);

    const queueNameTooLong: string = 'a'.repeat(81);
    validateGetQueueName('http://127.0.0.1:1212/123456789012/' + queueNameTooLong, undefined);
  });

  it('testClientSpanSqsInvalidOrEmptyUrls', () => {
    INVALID_URLS.forEach((url: string | undefined) => {
      validateGetQueueName(url, undefined);
      expect(SqsUrlParser.parseUrl(url)).toBeUndefined();
      expect(SqsUrlParser.getAccountId(url)).toBeUndefined();
      expect(SqsUrlParser.getRegion(url)).toBeUndefined();
    });
  });

  it('testParseUrl', () => {
    expect(SqsUrlParser.parseUrl('https://sqs.us-east-2.amazonaws.com/123456789012/MyQueue')).toEqual({
      queueName: 'MyQueue',
      accountId: '123456789012',
      region: 'us-east-2',
    });
    expect(SqsUrlParser.parseUrl('https://SQS.us-east-2.amazonaws.com/123456789012/MyQueue')?.region).toEqual(
      'us-east-2'
    );
    // Region is only known for the four part domain
    expect(SqsUrlParser.parseUrl('http://sqs.amazonaws.com/123456789012/MyQueue')).toEqual({
      queueName: 'MyQueue',
      accountId: '123456789012',
      region: undefined,
    });
  });

  it('testParseUrlRequiresSqsDomain', () => {
    expect(SqsUrlParser.parseUrl('https://ap-northeast-2.queue.amazonaws.com/123456789012/MyQueue')).toBeUndefined();
    expect(SqsUrlParser.parseUrl('http://127.0.0.1:1212/123456789012/MyQueue')).toBeUndefined();
  });

  it('testGetAccountId', () => {
    expect(SqsUrlParser.getAccountId('https://sqs.us-east-1.amazonaws.com/12341234/Queue')).toEqual('12341234');
    expect(SqsUrlParser.getAccountId('https://sqs.us-east-1.amazonaws.com/1234123412xx/Queue')).toBeUndefined();
    expect(SqsUrlParser.getAccountId('https://sqs.us-east-1.amazonaws.com/123412341234/Q_Namez-5')).toEqual(
      '123412341234'
    );
  });

  it('testGetRegion', () => {
    expect(SqsUrlParser.getRegion('https://sqs.us-east-1.amazonaws.com/123412341234/Queue')).toEqual('us-east-1');
    expect(SqsUrlParser.getRegion('sqs.eu-west-3.amazonaws.com/123412341234/Queue')).toEqual('eu-west-3');
    expect(SqsUrlParser.getRegion('https://sqs.us-east-1.amazonaws.com/123412341234')).toBeUndefined();
  });
});

function validateGetQueueName(url: string | undefined, expectedName: string | undefined): void {
  expect(SqsUrlParser.getQueueName(url)).toEqual(expectedName);
}
