// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

export type {
  TinySecp256k1Interface,
  KeyExpression,
  FixedPublicKeyExpression,
  FixedPrivateKeyExpression,
  ExtendedKeyExpression,
  ExtendedKeyMaterial,
  DerivationStep,
  KeyOrigin,
  Wildcard,
  DescriptorNode,
  LeafKind,
  LeafNode,
  MultiNode,
  ShNode,
  WshNode,
  ComboNode,
  DerivedKey,
  ParsedKey,
  ParseKeyExpression
} from './types';
export type { ParseResult } from './parser';
export {
  DescriptorsFactory,
  DescriptorInstance,
  DescriptorConstructor
} from './descriptors';
export { SigningMaterials } from './signingMaterials';
export type { WIFKey } from './signingMaterials';
export { DescriptorChecksum as checksum } from './checksum';
export {
  DescriptorError,
  DescriptorSyntaxError,
  MalformedKeyError,
  IllegalNestingError,
  PrivateDerivationUnavailableError,
  IndexOutOfRangeError,
  MissingPrivateKeyError,
  InvalidChecksumError,
  ScriptSizeError
} from './errors';
export type { DescriptorErrorCode } from './errors';

