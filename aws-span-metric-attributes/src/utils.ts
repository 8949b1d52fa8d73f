// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { AttributeValue } from '@opentelemetry/api';

export const checkDigits = (str: string): boolean => {
  return /^\d+$/.test(str);
};

/**
 * Scalar attribute values as strings. Array values have no single string form and are treated
 * as absent.
 */
export const attributeToString = (value: AttributeValue | undefined): string | undefined => {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
};
