// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { crypto } from 'bitcoinjs-lib';
import type { BIP32Interface } from 'bip32';
import type {
  DerivationStep,
  DerivedKey,
  ExtendedKeyExpression,
  KeyExpression,
  KeyOrigin
} from './types';
import type { SigningMaterials } from './signingMaterials';
import {
  IndexOutOfRangeError,
  PrivateDerivationUnavailableError
} from './errors';
import { HARDENED_OFFSET } from './keyExpressions';

export const MAX_INDEX = HARDENED_OFFSET - 1;

export function isRangeKey(keyExpression: KeyExpression): boolean {
  return (
    keyExpression.type === 'extended' && keyExpression.wildcard !== 'none'
  );
}

function fixedOrigin(pubkey: Buffer, origin?: KeyOrigin): KeyOrigin {
  return (
    origin ?? { fingerprint: crypto.hash160(pubkey).subarray(0, 4), path: [] }
  );
}

/**
 * Resolves the node derivation starts from: the expression's own xprv, else a
 * matching xprv in `materials`, else the xpub.
 */
function derivationRoot(
  keyExpression: ExtendedKeyExpression,
  materials?: SigningMaterials
): BIP32Interface {
  const { material } = keyExpression;
  if (material.type === 'publicAndPrivate') return material.xprv;
  return materials?.getExtendedKey(material.xpub) ?? material.xpub;
}

/**
 * Evaluates a key expression at `index`.
 *
 * Fixed keys ignore `index`. Ranged extended keys substitute it for the
 * wildcard and require `0 <= index < 2^31`. Hardened steps need private
 * material, taken from the expression itself or from `materials`.
 *
 * @throws {IndexOutOfRangeError} for an invalid index on a ranged key.
 * @throws {PrivateDerivationUnavailableError} when a hardened step is reached
 * with public material only.
 */
export function deriveKey({
  keyExpression,
  index = 0,
  materials
}: {
  keyExpression: KeyExpression;
  index?: number;
  materials?: SigningMaterials;
}): DerivedKey {
  switch (keyExpression.type) {
    case 'fixedPublic':
      return {
        pubkey: keyExpression.pubkey,
        origin: fixedOrigin(keyExpression.pubkey, keyExpression.origin)
      };
    case 'fixedPrivate': {
      const privateKey = keyExpression.ecpair.privateKey;
      return {
        pubkey: keyExpression.pubkey,
        ...(privateKey !== undefined ? { privateKey } : {}),
        origin: fixedOrigin(keyExpression.pubkey, keyExpression.origin)
      };
    }
    case 'extended':
      return deriveExtendedKey({ keyExpression, index, materials });
  }
}

function deriveExtendedKey({
  keyExpression,
  index,
  materials
}: {
  keyExpression: ExtendedKeyExpression;
  index: number;
  materials: SigningMaterials | undefined;
}): DerivedKey {
  const steps: DerivationStep[] = [...keyExpression.path];
  if (keyExpression.wildcard !== 'none') {
    if (!Number.isInteger(index) || index < 0 || index > MAX_INDEX)
      throw new IndexOutOfRangeError(
        `Error: index ${index} is out of range [0, ${MAX_INDEX}]`
      );
    steps.push({ index, hardened: keyExpression.wildcard === 'hardened' });
  }

  const root = derivationRoot(keyExpression, materials);
  if (root.isNeutered() && steps.some(step => step.hardened))
    throw new PrivateDerivationUnavailableError(
      `Error: hardened derivation of ${root.toBase58()} requires its private key`
    );
  const node = steps.reduce(
    (parent, step) =>
      step.hardened
        ? parent.deriveHardened(step.index)
        : parent.derive(step.index),
    root
  );

  const origin: KeyOrigin = keyExpression.origin
    ? {
        fingerprint: keyExpression.origin.fingerprint,
        path: [...keyExpression.origin.path, ...steps]
      }
    : { fingerprint: root.fingerprint, path: steps };
  return {
    pubkey: node.publicKey,
    ...(node.privateKey !== undefined ? { privateKey: node.privateKey } : {}),
    origin
  };
}
