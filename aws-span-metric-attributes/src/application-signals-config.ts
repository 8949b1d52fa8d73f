// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

export const LAMBDA_APPLICATION_SIGNALS_REMOTE_ENVIRONMENT_CONFIG: string =
  'LAMBDA_APPLICATION_SIGNALS_REMOTE_ENVIRONMENT';
const DEFAULT_LAMBDA_REMOTE_ENVIRONMENT: string = 'default';
const LAMBDA_REMOTE_ENVIRONMENT_PREFIX: string = 'lambda:';

/**
 * Environment of downstream Lambda functions, as `lambda:<name>`. Read on every call so that
 * changes to the process environment are picked up.
 */
export const getLambdaRemoteEnvironment = (): string => {
  const configured: string = (process.env[LAMBDA_APPLICATION_SIGNALS_REMOTE_ENVIRONMENT_CONFIG] ?? '').trim();
  return LAMBDA_REMOTE_ENVIRONMENT_PREFIX + (configured === '' ? DEFAULT_LAMBDA_REMOTE_ENVIRONMENT : configured);
};
