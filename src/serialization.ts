// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import type { BIP32Interface } from 'bip32';
import type {
  DescriptorNode,
  ExtendedKeyExpression,
  KeyExpression
} from './types';
import type { SigningMaterials } from './signingMaterials';
import { originToString, pathToString } from './keyExpressions';
import { DescriptorChecksum } from './checksum';
import { MissingPrivateKeyError } from './errors';

type KeyPrinter = (keyExpression: KeyExpression) => string;

function rootXpub(keyExpression: ExtendedKeyExpression) {
  const { material } = keyExpression;
  return material.type === 'publicOnly'
    ? material.xpub
    : material.xprv.neutered();
}

function keyToString(
  keyExpression: KeyExpression,
  printFixed: (pubkey: Buffer) => string,
  printExtended: (xpub: BIP32Interface) => string
): string {
  const origin =
    keyExpression.origin !== undefined
      ? originToString(keyExpression.origin)
      : '';
  if (keyExpression.type !== 'extended')
    return origin + printFixed(keyExpression.pubkey);
  const wildcard =
    keyExpression.wildcard === 'none'
      ? ''
      : keyExpression.wildcard === 'hardened'
      ? "/*'"
      : '/*';
  return (
    origin +
    printExtended(rootXpub(keyExpression)) +
    pathToString(keyExpression.path) +
    wildcard
  );
}

function nodeToString(node: DescriptorNode, printKey: KeyPrinter): string {
  switch (node.type) {
    case 'leaf':
      return `${node.kind}(${printKey(node.key)})`;
    case 'combo':
      return `combo(${printKey(node.key)})`;
    case 'multi':
      return `multi(${[node.threshold, ...node.keys.map(printKey)].join(',')})`;
    case 'sh':
    case 'wsh':
      return `${node.type}(${nodeToString(node.child, printKey)})`;
  }
}

const withChecksum = (descriptor: string, checksum: boolean) =>
  checksum ? `${descriptor}#${DescriptorChecksum(descriptor)}` : descriptor;

/**
 * Canonical public text of a tree. Private keys are printed as their public
 * counterparts (hex pubkey, xpub) and hardened steps always as `'`.
 */
export function toPublicString({
  node,
  checksum = false
}: {
  node: DescriptorNode;
  checksum?: boolean;
}): string {
  const printKey: KeyPrinter = keyExpression =>
    keyToString(
      keyExpression,
      pubkey => pubkey.toString('hex'),
      xpub => xpub.toBase58()
    );
  return withChecksum(nodeToString(node, printKey), checksum);
}

/**
 * Text of a tree with every key printed in private form (WIF or xprv).
 *
 * Private keys are looked up in `materials` only: a tree parsed from private
 * text still needs the materials returned by the parser.
 *
 * @throws {MissingPrivateKeyError} if any key has no private counterpart in
 * `materials`.
 */
export function toPrivateString({
  node,
  materials,
  checksum = false
}: {
  node: DescriptorNode;
  materials: SigningMaterials;
  checksum?: boolean;
}): string {
  const printKey: KeyPrinter = keyExpression =>
    keyToString(
      keyExpression,
      pubkey => {
        const ecpair = materials.getKey(pubkey);
        if (!ecpair)
          throw new MissingPrivateKeyError(
            `Error: missing private key for ${pubkey.toString('hex')}`
          );
        return ecpair.toWIF();
      },
      xpub => {
        const xprv = materials.getExtendedKey(xpub);
        if (!xprv)
          throw new MissingPrivateKeyError(
            `Error: missing private key for ${xpub.toBase58()}`
          );
        return xprv.toBase58();
      }
    );
  return withChecksum(nodeToString(node, printKey), checksum);
}
