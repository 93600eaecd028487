// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { networks, Network } from 'bitcoinjs-lib';
import type { ECPairAPI } from 'ecpair';
import type { BIP32API } from 'bip32';
import type {
  DescriptorNode,
  KeyExpression,
  LeafKind,
  LeafNode,
  MultiNode,
  ParsedKey,
  ShNode,
  WshNode
} from './types';
import { SigningMaterials } from './signingMaterials';
import { parseKeyExpression } from './keyExpressions';
import { splitFunctionCall, splitTopLevelArgs } from './parseUtils';
import { DescriptorChecksum } from './checksum';
import {
  DescriptorSyntaxError,
  IllegalNestingError,
  InvalidChecksumError,
  ScriptSizeError
} from './errors';
import {
  MAX_PUBKEYS_PER_MULTISIG,
  MAX_PUBKEYS_PER_WITNESS_MULTISIG,
  MAX_SCRIPT_ELEMENT_SIZE,
  multisigScriptSize
} from './scripts';
import * as RE from './re';

/**
 * Where an expression sits: at the top, directly inside sh(), or inside
 * wsh() (possibly sh(wsh())).
 */
type ParseContext = 'top' | 'p2sh' | 'p2wsh';

export type ParseResult = {
  node: DescriptorNode;
  /** Every key in textual order */
  keys: ParsedKey[];
  /** Private keys (wif and xprv roots) found in the descriptor */
  materials: SigningMaterials;
};

type ParseState = {
  keys: ParsedKey[];
  materials: SigningMaterials;
  network: Network;
  ECPair: ECPairAPI;
  BIP32: BIP32API;
};

const contextName = (context: ParseContext) =>
  context === 'p2wsh' ? 'wsh()' : context === 'p2sh' ? 'sh()' : 'top level';

/*
 * Verifies and removes the checksum (if it exists).
 */
function stripChecksum({
  descriptor,
  checksumRequired
}: {
  descriptor: string;
  checksumRequired: boolean;
}): string {
  const hashPosition = descriptor.indexOf('#');
  if (hashPosition === -1) {
    if (checksumRequired)
      throw new InvalidChecksumError(
        `Error: descriptor ${descriptor} has no checksum`
      );
    return descriptor;
  }
  const mChecksum = descriptor.match(String.raw`${RE.reChecksum}$`);
  if (mChecksum === null || mChecksum.index !== hashPosition)
    throw new InvalidChecksumError(
      `Error: malformed descriptor checksum in ${descriptor}`
    );
  const bareDescriptor = descriptor.slice(0, hashPosition);
  let expected: string;
  try {
    expected = DescriptorChecksum(bareDescriptor);
  } catch (err) {
    throw new DescriptorSyntaxError(
      err instanceof Error ? err.message : String(err)
    );
  }
  if (mChecksum[0].slice(1) !== expected)
    throw new InvalidChecksumError(
      `Error: invalid descriptor checksum for ${descriptor}`
    );
  return bareDescriptor;
}

function parseKey(
  expression: string,
  isWitness: boolean,
  state: ParseState
): KeyExpression {
  const keyExpression = parseKeyExpression({
    keyExpression: expression,
    isSegwit: isWitness,
    network: state.network,
    ECPair: state.ECPair,
    BIP32: state.BIP32
  });
  if (keyExpression.type === 'fixedPrivate')
    state.materials.addKey(keyExpression.ecpair);
  else if (
    keyExpression.type === 'extended' &&
    keyExpression.material.type === 'publicAndPrivate'
  )
    state.materials.addExtendedKey(keyExpression.material.xprv);
  state.keys.push({ expression, keyExpression, isWitness });
  return keyExpression;
}

function singleArg(name: string, args: string): string {
  const parts = splitTopLevelArgs({
    expression: args,
    onError: reason =>
      new DescriptorSyntaxError(`Error: ${name}(): ${reason}`)
  });
  if (parts.length !== 1 || parts[0] === undefined)
    throw new DescriptorSyntaxError(
      `Error: ${name}() takes exactly one argument, got ${parts.length}`
    );
  return parts[0];
}

function parseLeaf<K extends LeafKind>(
  kind: K,
  args: string,
  context: ParseContext,
  state: ParseState
): LeafNode<K> {
  const isWitness = kind === 'wpkh' || context === 'p2wsh';
  return {
    type: 'leaf',
    kind,
    key: parseKey(singleArg(kind, args), isWitness, state)
  };
}

function parseMulti(
  args: string,
  context: ParseContext,
  state: ParseState
): MultiNode {
  const [thresholdArg, ...keyArgs] = splitTopLevelArgs({
    expression: args,
    onError: reason => new DescriptorSyntaxError(`Error: multi(): ${reason}`)
  });
  if (thresholdArg === undefined || !/^\d+$/.test(thresholdArg))
    throw new DescriptorSyntaxError(
      `Error: multi() threshold ${thresholdArg} is not a number`
    );
  const threshold = Number(thresholdArg);
  const isWitness = context === 'p2wsh';
  const keys = keyArgs.map(keyArg => parseKey(keyArg, isWitness, state));

  const maxKeys = isWitness
    ? MAX_PUBKEYS_PER_WITNESS_MULTISIG
    : MAX_PUBKEYS_PER_MULTISIG;
  if (keys.length < 1 || keys.length > maxKeys)
    throw new DescriptorSyntaxError(
      `Error: multi() takes between 1 and ${maxKeys} keys in ${contextName(
        context
      )}, got ${keys.length}`
    );
  if (threshold < 1 || threshold > keys.length)
    throw new DescriptorSyntaxError(
      `Error: multi() threshold ${threshold} must be between 1 and ${keys.length}`
    );
  if (context === 'p2sh') {
    //Extended keys always derive compressed (33 bytes) pubkeys
    const scriptSize = multisigScriptSize(
      keys.map(key => (key.type === 'extended' ? 33 : key.pubkey.length))
    );
    if (scriptSize > MAX_SCRIPT_ELEMENT_SIZE)
      throw new ScriptSizeError(
        `Error: P2SH script is too large, ${scriptSize} bytes is larger than ${MAX_SCRIPT_ELEMENT_SIZE} bytes`
      );
  }
  return { type: 'multi', threshold, keys };
}

function parseShChild(expression: string, state: ParseState): ShNode['child'] {
  const child = parseScript(expression, 'p2sh', state);
  switch (child.type) {
    case 'leaf':
    case 'multi':
    case 'wsh':
      return child;
    default:
      throw new IllegalNestingError(
        `Error: ${child.type}() cannot be nested in sh()`
      );
  }
}

function parseWshChild(
  expression: string,
  state: ParseState
): WshNode['child'] {
  const child = parseScript(expression, 'p2wsh', state);
  if (child.type === 'multi') return child;
  if (child.type === 'leaf' && child.kind !== 'wpkh')
    return { type: 'leaf', kind: child.kind, key: child.key };
  throw new IllegalNestingError(
    `Error: ${
      child.type === 'leaf' ? child.kind : child.type
    }() cannot be nested in wsh()`
  );
}

/**
 * Recursive descent over one script expression. Nesting rules are checked
 * here, as soon as a function name is read in its context.
 */
function parseScript(
  expression: string,
  context: ParseContext,
  state: ParseState
): DescriptorNode {
  const call = splitFunctionCall({
    expression,
    onError: reason =>
      new DescriptorSyntaxError(`Error: ${reason} in ${expression}`)
  });
  if (call === null) {
    if (context !== 'top')
      throw new IllegalNestingError(
        `Error: ${contextName(context)} needs a script, not a key: ${expression}`
      );
    throw new DescriptorSyntaxError(
      `Error: expected a script expression but got ${expression}`
    );
  }
  const { name, args } = call;
  switch (name) {
    case 'pk':
    case 'pkh':
      return parseLeaf(name, args, context, state);
    case 'wpkh':
      if (context === 'p2wsh')
        throw new IllegalNestingError(
          `Error: wpkh() cannot be nested in wsh(): cannot embed witness inside witness`
        );
      return parseLeaf(name, args, context, state);
    case 'combo':
      if (context !== 'top')
        throw new IllegalNestingError(
          `Error: combo() can only be used at the top level, not in ${contextName(
            context
          )}`
        );
      return {
        type: 'combo',
        key: parseKey(singleArg(name, args), false, state)
      };
    case 'multi':
      return parseMulti(args, context, state);
    case 'sh':
      if (context !== 'top')
        throw new IllegalNestingError(
          `Error: sh() can only be used at the top level, not in ${contextName(
            context
          )}`
        );
      return { type: 'sh', child: parseShChild(singleArg(name, args), state) };
    case 'wsh':
      if (context === 'p2wsh')
        throw new IllegalNestingError(
          `Error: wsh() cannot be nested in wsh()`
        );
      return {
        type: 'wsh',
        child: parseWshChild(singleArg(name, args), state)
      };
    default:
      throw new DescriptorSyntaxError(`Error: unknown function ${name}()`);
  }
}

/**
 * Parses a descriptor into its tree.
 *
 * Returns the tree, every key found (in textual order) and the private
 * material found in the text. Throws a {@link DescriptorError} subclass on
 * any failure; nothing is returned partially.
 */
export function parseDescriptor({
  descriptor,
  network = networks.bitcoin,
  checksumRequired = false,
  ECPair,
  BIP32
}: {
  descriptor: string;
  network?: Network;
  checksumRequired?: boolean;
  ECPair: ECPairAPI;
  BIP32: BIP32API;
}): ParseResult {
  if (typeof descriptor !== 'string' || descriptor === '')
    throw new DescriptorSyntaxError('Error: You must provide a descriptor.');
  const state: ParseState = {
    keys: [],
    materials: new SigningMaterials(),
    network,
    ECPair,
    BIP32
  };
  const node = parseScript(
    stripChecksum({ descriptor, checksumRequired }),
    'top',
    state
  );
  return { node, keys: state.keys, materials: state.materials };
}
