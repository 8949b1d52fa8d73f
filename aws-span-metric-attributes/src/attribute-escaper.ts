// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { AttributeValue } from '@opentelemetry/api';

export const ESCAPE_CHARACTER: string = '^';
export const IDENTIFIER_DELIMITER: string = '|';

/**
 * Escapes the characters with special meaning in composite identifiers: `^` becomes `^^` and `|`
 * becomes `^|`. The escape character is handled first, so an existing `^|` turns into `^^^|`.
 */
export function escapeDelimiters(input: AttributeValue | undefined): string | undefined {
  if (typeof input !== 'string') {
    return undefined;
  }
  return input
    .replaceAll(ESCAPE_CHARACTER, ESCAPE_CHARACTER + ESCAPE_CHARACTER)
    .replaceAll(IDENTIFIER_DELIMITER, ESCAPE_CHARACTER + IDENTIFIER_DELIMITER);
}
