// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { expect } from 'expect';
import {
  getLambdaRemoteEnvironment,
  LAMBDA_APPLICATION_SIGNALS_REMOTE_ENVIRONMENT_CONFIG,
} from '../src/application-signals-config';

describe('ApplicationSignalsConfigTest', () => {
  afterEach(() => {
    delete process.env[LAMBDA_APPLICATION_SIGNALS_REMOTE_ENVIRONMENT_CONFIG];
  });

  it('testDefaultLambdaRemoteEnvironment', () => {
    expect(getLambdaRemoteEnvironment()).toEqual('lambda:default');
  });

  it('testBlankLambdaRemoteEnvironment', () => {
    process.env[LAMBDA_APPLICATION_SIGNALS_REMOTE_ENVIRONMENT_CONFIG] = '   ';
    expect(getLambdaRemoteEnvironment()).toEqual('lambda:default');
  });

  it('testConfiguredLambdaRemoteEnvironment', () => {
    process.env[LAMBDA_APPLICATION_SIGNALS_REMOTE_ENVIRONMENT_CONFIG] = ' prod ';
    expect(getLambdaRemoteEnvironment()).toEqual('lambda:prod');

    process.env[LAMBDA_APPLICATION_SIGNALS_REMOTE_ENVIRONMENT_CONFIG] = 'staging';
    expect(getLambdaRemoteEnvironment()).toEqual('lambda:staging');
  });
});
