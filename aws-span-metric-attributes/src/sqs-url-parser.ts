// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { AttributeValue } from '@opentelemetry/api';
import { checkDigits } from './utils';

const HTTP_SCHEMA: string = 'http://';
const HTTPS_SCHEMA: string = 'https://';
const SQS_DOMAIN_PREFIX: string = 'sqs';
const MAX_QUEUE_NAME_LENGTH: number = 80;

// Cannot define type for regex variables
// eslint-disable-next-line @typescript-eslint/typedef
const QUEUE_NAME_REGEX = /^[A-Za-z0-9_-]+$/;

export interface ParsedSqsUrl {
  queueName: string;
  accountId: string;
  region?: string;
}

export class SqsUrlParser {
  /**
   * Best-effort logic to extract queue name from an HTTP url. This method should only be used with
   * a string that is, with reasonably high confidence, an SQS queue URL. Handles new/legacy/some
   * custom URLs. Essentially, we require that the URL should have exactly three parts, delimited by
   * /'s (excluding schema), the second part should be an account id consisting of digits, and the
   * third part should be a valid queue name, per SQS naming conventions.
   */
  public static getQueueName(url: AttributeValue | undefined): string | undefined {
    const segments: string[] | undefined = this.splitQueueUrl(url);
    return segments?.[2];
  }

  public static getAccountId(url: AttributeValue | undefined): string | undefined {
    return this.parseUrl(url)?.accountId;
  }

  public static getRegion(url: AttributeValue | undefined): string | undefined {
    return this.parseUrl(url)?.region;
  }

  /**
   * Parses an SQS URL of the form `https://sqs.<region>.amazonaws.com/<accountId>/<queueName>`.
   * Unlike {@link getQueueName}, the host must start with `sqs`. The region is only known for the
   * four-part domain form.
   */
  public static parseUrl(url: AttributeValue | undefined): ParsedSqsUrl | undefined {
    const segments: string[] | undefined = this.splitQueueUrl(url);
    if (segments === undefined) {
      return undefined;
    }

    const [domain, accountId, queueName] = segments;
    if (!domain.toLowerCase().startsWith(SQS_DOMAIN_PREFIX)) {
      return undefined;
    }

    const domainParts: string[] = domain.split('.');
    return {
      queueName,
      accountId,
      region: domainParts.length === 4 ? domainParts[1] : undefined,
    };
  }

  private static splitQueueUrl(url: AttributeValue | undefined): string[] | undefined {
    if (typeof url !== 'string') {
      return undefined;
    }
    const urlWithoutProtocol: string = url.replaceAll(HTTP_SCHEMA, '').replaceAll(HTTPS_SCHEMA, '');
    const segments: string[] = urlWithoutProtocol.split('/');
    if (segments.length === 3 && checkDigits(segments[1]) && this.isValidQueueName(segments[2])) {
      return segments;
    }
    return undefined;
  }

  private static isValidQueueName(input: string): boolean {
    return input.length <= MAX_QUEUE_NAME_LENGTH && QUEUE_NAME_REGEX.test(input);
  }
}
