// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

export type DescriptorErrorCode =
  | 'SyntaxError'
  | 'MalformedKey'
  | 'IllegalNesting'
  | 'PrivateDerivationUnavailable'
  | 'IndexOutOfRange'
  | 'MissingPrivateKey'
  | 'InvalidChecksum'
  | 'ScriptSize';

/**
 * Base class of every error thrown by the descriptor engine. `code` lets
 * callers branch on the failure kind without `instanceof` chains.
 */
export class DescriptorError extends Error {
  constructor(
    readonly code: DescriptorErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'DescriptorError';
  }
}

export class DescriptorSyntaxError extends DescriptorError {
  constructor(message: string) {
    super('SyntaxError', message);
    this.name = 'DescriptorSyntaxError';
  }
}

export class MalformedKeyError extends DescriptorError {
  constructor(message: string) {
    super('MalformedKey', message);
    this.name = 'MalformedKeyError';
  }
}

export class IllegalNestingError extends DescriptorError {
  constructor(message: string) {
    super('IllegalNesting', message);
    this.name = 'IllegalNestingError';
  }
}

export class PrivateDerivationUnavailableError extends DescriptorError {
  constructor(message: string) {
    super('PrivateDerivationUnavailable', message);
    this.name = 'PrivateDerivationUnavailableError';
  }
}

export class IndexOutOfRangeError extends DescriptorError {
  constructor(message: string) {
    super('IndexOutOfRange', message);
    this.name = 'IndexOutOfRangeError';
  }
}

export class MissingPrivateKeyError extends DescriptorError {
  constructor(message: string) {
    super('MissingPrivateKey', message);
    this.name = 'MissingPrivateKeyError';
  }
}

export class InvalidChecksumError extends DescriptorError {
  constructor(message: string) {
    super('InvalidChecksum', message);
    this.name = 'InvalidChecksumError';
  }
}

export class ScriptSizeError extends DescriptorError {
  constructor(message: string) {
    super('ScriptSize', message);
    this.name = 'ScriptSizeError';
  }
}
