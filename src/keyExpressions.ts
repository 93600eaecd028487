// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { networks, Network } from 'bitcoinjs-lib';
import type { ECPairAPI, ECPairInterface } from 'ecpair';
import type { BIP32API, BIP32Interface } from 'bip32';
import type {
  DerivationStep,
  KeyExpression,
  KeyOrigin,
  Wildcard
} from './types';
import { MalformedKeyError } from './errors';

import * as RE from './re';

export const HARDENED_OFFSET = 0x80000000;

function parseDerivationStep(
  element: string,
  keyExpression: string
): DerivationStep {
  const mLevel = element.match(RE.anchorStartAndEnd(RE.reDerivationLevel));
  if (mLevel === null || mLevel[1] === undefined)
    throw new MalformedKeyError(
      `Error: invalid path element ${element} in ${keyExpression}`
    );
  const index = Number(mLevel[1]);
  if (!Number.isSafeInteger(index) || index >= HARDENED_OFFSET)
    throw new MalformedKeyError(`Error: BIP 32 path element overflow`);
  return { index, hardened: mLevel[2] !== undefined };
}

/**
 * Parses "/1/2'/3h/*" style paths. The leading slash has already been split
 * away, so `elements` is ['1', "2'", '3h', '*'].
 */
function parseKeyPath(
  elements: string[],
  keyExpression: string
): { path: DerivationStep[]; wildcard: Wildcard } {
  let wildcard: Wildcard = 'none';
  const last = elements[elements.length - 1];
  if (last !== undefined) {
    const mRange = last.match(RE.anchorStartAndEnd(RE.reRangeLevel));
    if (mRange !== null) {
      wildcard = mRange[1] === undefined ? 'unhardened' : 'hardened';
      elements = elements.slice(0, -1);
    }
  }
  //Any remaining "*" is a wildcard in a non-final position
  const path = elements.map(element => {
    if (element.startsWith('*'))
      throw new MalformedKeyError(
        `Error: wildcard must be the last path element in ${keyExpression}`
      );
    return parseDerivationStep(element, keyExpression);
  });
  return { path, wildcard };
}

function parseOrigin(
  keyExpression: string
): { origin?: KeyOrigin; actualKey: string } {
  if (!keyExpression.startsWith('[')) return { actualKey: keyExpression };
  const mOrigin = keyExpression.match(RE.reOriginAnchoredStart);
  if (mOrigin === null || mOrigin[2] === undefined)
    throw new MalformedKeyError(
      `Error: invalid key origin in keyExpression: ${keyExpression}`
    );
  const fingerprint = Buffer.from(mOrigin[2], 'hex');
  const originPath = mOrigin[3] ?? '';
  const path =
    originPath === ''
      ? []
      : originPath
          .slice(1)
          .split('/')
          .map(element => parseDerivationStep(element, keyExpression));
  return {
    origin: { fingerprint, path },
    actualKey: keyExpression.slice(mOrigin[0].length)
  };
}

/*
 * Takes a key expression (xpub, xprv, pubkey or wif, with an optional origin)
 * and returns its typed form. Throws MalformedKeyError for anything else.
 */
export function parseKeyExpression({
  keyExpression,
  isSegwit,
  ECPair,
  BIP32,
  network = networks.bitcoin
}: {
  keyExpression: string;
  network?: Network;
  isSegwit?: boolean;
  ECPair: ECPairAPI;
  BIP32: BIP32API;
}): KeyExpression {
  const { origin, actualKey } = parseOrigin(keyExpression);
  const [token, ...pathElements] = actualKey.split('/');
  if (token === undefined || token === '')
    throw new MalformedKeyError(
      `Error: expected a keyExpression but got ${keyExpression}`
    );
  const assertCompressed = (pubkey: Buffer) => {
    //Inside wpkh and wsh, only compressed public keys are permitted.
    if (isSegwit === true && pubkey.length !== 33)
      throw new MalformedKeyError(
        `Error: uncompressed keys are not allowed in witness context: ${keyExpression}`
      );
  };

  if (pathElements.length === 0) {
    //match pubkey:
    if (token.match(RE.anchorStartAndEnd(RE.rePubKey)) !== null) {
      const pubkey = Buffer.from(token, 'hex');
      if (!ECPair.isPoint(pubkey))
        throw new MalformedKeyError(`Error: invalid pubkey ${token}`);
      assertCompressed(pubkey);
      return {
        type: 'fixedPublic',
        pubkey,
        ...(origin !== undefined ? { origin } : {})
      };
    }
    //match WIF:
    if (token.match(RE.anchorStartAndEnd(RE.reWIF)) !== null) {
      let ecpair: ECPairInterface;
      try {
        ecpair = ECPair.fromWIF(token, network);
      } catch (err) {
        throw new MalformedKeyError(
          `Error: invalid WIF in keyExpression ${keyExpression}: ${
            err instanceof Error ? err.message : String(err)
          }`
        );
      }
      assertCompressed(ecpair.publicKey);
      return {
        type: 'fixedPrivate',
        ecpair,
        pubkey: ecpair.publicKey,
        ...(origin !== undefined ? { origin } : {})
      };
    }
  }

  //match xpub or xprv:
  let node: BIP32Interface;
  try {
    node = BIP32.fromBase58(token, network);
  } catch (err) {
    throw new MalformedKeyError(
      `Error: could not parse keyExpression ${keyExpression}: ${
        err instanceof Error ? err.message : String(err)
      }`
    );
  }
  const { path, wildcard } = parseKeyPath(pathElements, keyExpression);
  return {
    type: 'extended',
    material: node.isNeutered()
      ? { type: 'publicOnly', xpub: node }
      : { type: 'publicAndPrivate', xprv: node },
    path,
    wildcard,
    ...(origin !== undefined ? { origin } : {})
  };
}

/**
 * Renders a path as "/44'/0'/0'" (hardened steps always use the apostrophe).
 */
export function pathToString(path: DerivationStep[]): string {
  return path
    .map(step => `/${step.index}${step.hardened ? "'" : ''}`)
    .join('');
}

export function originToString(origin: KeyOrigin): string {
  return `[${origin.fingerprint.toString('hex')}${pathToString(origin.path)}]`;
}
