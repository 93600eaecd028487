// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import type { DerivedKey, DescriptorNode, KeyExpression } from './types';
import { SigningMaterials } from './signingMaterials';
import { deriveKey, isRangeKey } from './derivation';
import {
  multisigScript,
  p2pkhScript,
  p2pkScript,
  p2shScript,
  p2wpkhScript,
  p2wshScript
} from './scripts';

/**
 * Returns true when any key of the tree carries a wildcard.
 */
export function isRange(node: DescriptorNode): boolean {
  switch (node.type) {
    case 'leaf':
    case 'combo':
      return isRangeKey(node.key);
    case 'multi':
      return node.keys.some(isRangeKey);
    case 'sh':
    case 'wsh':
      return isRange(node.child);
  }
}

function expandNode(
  node: DescriptorNode,
  derive: (keyExpression: KeyExpression) => DerivedKey,
  collected: SigningMaterials
): Buffer[] {
  switch (node.type) {
    case 'leaf': {
      const { pubkey } = derive(node.key);
      if (node.kind === 'pk') return [p2pkScript(pubkey)];
      if (node.kind === 'pkh') return [p2pkhScript(pubkey)];
      return [p2wpkhScript(pubkey)];
    }
    case 'multi':
      return [
        multisigScript(
          node.threshold,
          node.keys.map(key => derive(key).pubkey)
        )
      ];
    case 'sh':
      return expandNode(node.child, derive, collected).map(redeemScript => {
        collected.addRedeemScript(redeemScript);
        return p2shScript(redeemScript);
      });
    case 'wsh':
      return expandNode(node.child, derive, collected).map(witnessScript => {
        collected.addWitnessScript(witnessScript);
        return p2wshScript(witnessScript);
      });
    case 'combo': {
      const { pubkey } = derive(node.key);
      const scripts = [p2pkScript(pubkey), p2pkhScript(pubkey)];
      //Segwit forms only exist for compressed keys
      if (pubkey.length === 33) {
        const witnessProgram = p2wpkhScript(pubkey);
        collected.addRedeemScript(witnessProgram);
        scripts.push(witnessProgram, p2shScript(witnessProgram));
      }
      return scripts;
    }
  }
}

/**
 * Expands a descriptor tree at `index` into its output scripts.
 *
 * Every key is derived at the same `index`. Redeem scripts (for sh), witness
 * scripts (for wsh), derived public keys and their origins are recorded in
 * `materials`, which also supplies the private keys that hardened derivation
 * needs. `materials` is written only after the whole expansion succeeded.
 *
 * @throws {PrivateDerivationUnavailableError}
 * @throws {IndexOutOfRangeError}
 */
export function expand({
  node,
  index = 0,
  materials = new SigningMaterials()
}: {
  node: DescriptorNode;
  index?: number;
  materials?: SigningMaterials;
}): Buffer[] {
  const collected = new SigningMaterials();
  const derive = (keyExpression: KeyExpression) => {
    const derivedKey = deriveKey({ keyExpression, index, materials });
    collected.addPubkey(derivedKey.pubkey, derivedKey.origin);
    return derivedKey;
  };
  const scripts = expandNode(node, derive, collected);
  materials.merge(collected);
  return scripts;
}
