// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { expect } from 'expect';
import { escapeDelimiters } from '../src/attribute-escaper';

describe('AttributeEscaperTest', () => {
  it('testEscapesCaretBeforePipe', () => {
    expect(escapeDelimiters('a^b|c')).toEqual('a^^b^|c');
    expect(escapeDelimiters('^|')).toEqual('^^^|');
  });

  it('testLeavesPlainValues', () => {
    expect(escapeDelimiters('my-table')).toEqual('my-table');
    expect(escapeDelimiters('')).toEqual('');
  });

  it('testEveryPipeIsEscaped', () => {
    ['|', '||', 'a|b|c', '^^|x', 'db|name^'].forEach((value: string) => {
      const escaped: string | undefined = escapeDelimiters(value);
      expect(escaped).toBeDefined();
      expect(/(^|[^^])\|/.test(escaped ?? '')).toBe(false);
    });
  });

  it('testNonStringValues', () => {
    expect(escapeDelimiters(undefined)).toBeUndefined();
    expect(escapeDelimiters(3306)).toBeUndefined();
    expect(escapeDelimiters(true)).toBeUndefined();
    expect(escapeDelimiters(['a|b'])).toBeUndefined();
  });
});
