// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { AttributePropagatingSpanProcessor, PropagationDataExtractor } from './attribute-propagating-span-processor';
import { AWS_ATTRIBUTE_KEYS } from './aws-attribute-keys';
import { AwsSpanClassifier } from './aws-span-classifier';

const DEFAULT_ATTRIBUTES_KEYS_TO_PROPAGATE: readonly string[] = [
  AWS_ATTRIBUTE_KEYS.AWS_REMOTE_SERVICE,
  AWS_ATTRIBUTE_KEYS.AWS_REMOTE_OPERATION,
];

function requireNonNull<T>(value: T | null | undefined, name: string): T {
  if (value == null) {
    throw new Error(`${name} must not be null`);
  }
  return value;
}

/**
 * Constructs an {@link AttributePropagatingSpanProcessor}. Unless overridden, the processor
 * propagates the ingress operation of the local root as `aws.local.operation`, together with the
 * `aws.remote.service` and `aws.remote.operation` attributes of INTERNAL parents.
 */
export class AttributePropagatingSpanProcessorBuilder {
  private propagationDataExtractor: PropagationDataExtractor = AwsSpanClassifier.getIngressOperation;
  private propagationDataKey: string = AWS_ATTRIBUTE_KEYS.AWS_LOCAL_OPERATION;
  private attributesKeysToPropagate: readonly string[] = DEFAULT_ATTRIBUTES_KEYS_TO_PROPAGATE;

  public static create(): AttributePropagatingSpanProcessorBuilder {
    return new AttributePropagatingSpanProcessorBuilder();
  }

  private constructor() {}

  public setPropagationDataExtractor(
    propagationDataExtractor: PropagationDataExtractor
  ): AttributePropagatingSpanProcessorBuilder {
    this.propagationDataExtractor = requireNonNull(propagationDataExtractor, 'propagationDataExtractor');
    return this;
  }

  public setPropagationDataKey(propagationDataKey: string): AttributePropagatingSpanProcessorBuilder {
    this.propagationDataKey = requireNonNull(propagationDataKey, 'propagationDataKey');
    return this;
  }

  public setAttributesKeysToPropagate(
    attributesKeysToPropagate: readonly string[]
  ): AttributePropagatingSpanProcessorBuilder {
    this.attributesKeysToPropagate = [...requireNonNull(attributesKeysToPropagate, 'attributesKeysToPropagate')];
    return this;
  }

  public build(): AttributePropagatingSpanProcessor {
    return AttributePropagatingSpanProcessor.create(
      this.propagationDataExtractor,
      this.propagationDataKey,
      this.attributesKeysToPropagate
    );
  }
}
