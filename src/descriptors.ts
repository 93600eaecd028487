// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import memoize from 'lodash.memoize';
import { networks, Network } from 'bitcoinjs-lib';
import { ECPairFactory, ECPairAPI } from 'ecpair';
import { BIP32Factory, BIP32API } from 'bip32';

import type {
  DescriptorNode,
  ParsedKey,
  ParseKeyExpression,
  TinySecp256k1Interface
} from './types';
import {
  parseKeyExpression as globalParseKeyExpression
} from './keyExpressions';
import { parseDescriptor, ParseResult } from './parser';
import { deriveKey, MAX_INDEX } from './derivation';
import { expand, isRange } from './expansion';
import { toPrivateString, toPublicString } from './serialization';
import { SigningMaterials } from './signingMaterials';
import { IndexOutOfRangeError } from './errors';

/**
 * Constructs the descriptor functions and the `Descriptor` class for a given
 * elliptic curve library (tiny-secp256k1 or @bitcoinerlab/secp256k1).
 */
export function DescriptorsFactory(ecc: TinySecp256k1Interface) {
  const BIP32: BIP32API = BIP32Factory(ecc);
  const ECPair: ECPairAPI = ECPairFactory(ecc);

  /*
   * Parses a key expression (xpub, xprv, pubkey or wif) into a
   * KeyExpression
   */
  const parseKeyExpression: ParseKeyExpression = ({
    keyExpression,
    isSegwit,
    network = networks.bitcoin
  }) => {
    return globalParseKeyExpression({
      keyExpression,
      network,
      ...(typeof isSegwit === 'boolean' ? { isSegwit } : {}),
      ECPair,
      BIP32
    });
  };

  /**
   * Parses a descriptor string into its tree, the keys it contains (in
   * textual order) and the private material found in it.
   *
   * @throws {DescriptorError} - when the descriptor is invalid
   */
  function parse({
    descriptor,
    network = networks.bitcoin,
    checksumRequired = false
  }: {
    descriptor: string;
    /** @defaultValue networks.bitcoin */
    network?: Network;
    /** @defaultValue false */
    checksumRequired?: boolean;
  }): ParseResult {
    return parseDescriptor({
      descriptor,
      network,
      checksumRequired,
      ECPair,
      BIP32
    });
  }

  class Descriptor {
    readonly #node: DescriptorNode;
    readonly #keys: ParsedKey[];
    readonly #materials: SigningMaterials;
    readonly #getScriptPubKeys: (index?: number) => Buffer[];

    /**
     * @throws {DescriptorError} - when descriptor is invalid
     */
    constructor({
      descriptor,
      network = networks.bitcoin,
      checksumRequired = false
    }: {
      /**
       * The descriptor string in ASCII format. It may include a "*" to
       * denote an arbitrary index (ranged descriptors) and an optional
       * "#checksum" suffix.
       */
      descriptor: string;
      /**
       * One of bitcoinjs-lib [`networks`](https://github.com/bitcoinjs/bitcoinjs-lib/blob/master/src/networks.js)
       * (or another one following the same interface). It decides which
       * WIF, xpub and xprv version bytes are accepted.
       * @defaultValue networks.bitcoin
       */
      network?: Network;
      /**
       * Whether the descriptor must include a checksum.
       * @defaultValue false
       */
      checksumRequired?: boolean;
    }) {
      if (typeof descriptor !== 'string')
        throw new Error(`Error: invalid descriptor type`);
      const { node, keys, materials } = parse({
        descriptor,
        network,
        checksumRequired
      });
      this.#node = node;
      this.#keys = keys;
      this.#materials = materials;

      this.isRange = memoize(this.isRange);
      this.#getScriptPubKeys = memoize(
        (index?: number) =>
          expand({
            node: this.#node,
            ...(index !== undefined ? { index } : {}),
            materials: this.#materials.clone()
          }),
        // resolver function:
        (index?: number) => (index === undefined ? 'default' : index)
      );
      this.toString = memoize(
        this.toString,
        // resolver function:
        ({ checksum = false }: { checksum?: boolean } = {}) =>
          checksum ? 'checksum' : 'plain'
      );
    }

    /** The parsed tree. */
    getNode(): DescriptorNode {
      return this.#node;
    }

    /**
     * Keys in the order they appear in the descriptor text.
     */
    getKeys(): ParsedKey[] {
      return [...this.#keys];
    }

    /**
     * Returns a copy of the private material (WIF keys and xprv roots) that
     * was found in the descriptor text.
     */
    getSigningMaterials(): SigningMaterials {
      return this.#materials.clone();
    }

    /**
     * Whether this descriptor contains a wildcard and must be expanded at an
     * index.
     */
    isRange(): boolean {
      return isRange(this.#node);
    }

    /**
     * Expands the descriptor at `index` into its output scripts.
     *
     * Redeem and witness scripts, derived public keys and origins are
     * written into `materials` (when passed). Pass private keys in
     * `materials` to expand hardened paths of descriptors written with
     * xpubs.
     */
    expand({
      index,
      materials
    }: {
      index?: number;
      materials?: SigningMaterials;
    } = {}): Buffer[] {
      return expand({
        node: this.#node,
        ...(index !== undefined ? { index } : {}),
        ...(materials !== undefined ? { materials } : {})
      });
    }

    /**
     * Expands every index in `[start, end)`. Returns one array of scripts
     * per index. `materials` is written only if every index expanded.
     */
    expandRange({
      start,
      end,
      materials
    }: {
      start: number;
      end: number;
      materials?: SigningMaterials;
    }): Buffer[][] {
      if (
        !Number.isInteger(start) ||
        !Number.isInteger(end) ||
        start < 0 ||
        end < start ||
        end > MAX_INDEX + 1
      )
        throw new IndexOutOfRangeError(
          `Error: invalid range [${start}, ${end})`
        );
      const collected = materials ? materials.clone() : new SigningMaterials();
      const scripts: Buffer[][] = [];
      for (let index = start; index < end; index++)
        scripts.push(
          expand({ node: this.#node, index, materials: collected })
        );
      materials?.merge(collected);
      return scripts;
    }

    /**
     * Output scripts at `index` (0 when not passed), expanded with the
     * private material found in the descriptor itself.
     */
    getScriptPubKeys(index?: number): Buffer[] {
      return [...this.#getScriptPubKeys(index)];
    }

    /**
     * Canonical public form of the descriptor.
     */
    toString({ checksum = false }: { checksum?: boolean } = {}): string {
      return toPublicString({ node: this.#node, checksum });
    }

    /**
     * Private form of the descriptor. Keys are looked up in `materials`,
     * which defaults to the private material found while parsing.
     *
     * @throws {MissingPrivateKeyError} - if a key has no private counterpart
     */
    toPrivateString({
      materials = this.#materials,
      checksum = false
    }: {
      materials?: SigningMaterials;
      checksum?: boolean;
    } = {}): string {
      return toPrivateString({ node: this.#node, materials, checksum });
    }
  }

  return {
    Descriptor,
    parse,
    expand,
    isRange,
    deriveKey,
    toPublicString,
    toPrivateString,
    parseKeyExpression,
    ECPair,
    BIP32
  };
}

type DescriptorConstructor = ReturnType<
  typeof DescriptorsFactory
>['Descriptor'];
/**
 * The {@link DescriptorsFactory | `DescriptorsFactory`} function internally
 * creates and returns the `Descriptor` class. This class is specialized for
 * the provided `TinySecp256k1Interface`. Use `DescriptorInstance` to declare
 * instances for this class: `const descriptor: DescriptorInstance = new Descriptor();`
 */
type DescriptorInstance = InstanceType<DescriptorConstructor>;
export { DescriptorInstance, DescriptorConstructor };
