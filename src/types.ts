// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import type { ECPairInterface } from 'ecpair';
import type { BIP32Interface } from 'bip32';
import type { Network } from 'bitcoinjs-lib';

/** @ignore */
interface XOnlyPointAddTweakResult {
  parity: 1 | 0;
  xOnlyPubkey: Uint8Array;
}

/** @ignore */
export interface TinySecp256k1Interface {
  isPoint(p: Uint8Array): boolean;
  pointCompress(p: Uint8Array, compressed?: boolean): Uint8Array;
  isPrivate(d: Uint8Array): boolean;
  pointFromScalar(d: Uint8Array, compressed?: boolean): Uint8Array | null;
  pointAddScalar(
    p: Uint8Array,
    tweak: Uint8Array,
    compressed?: boolean
  ): Uint8Array | null;
  privateAdd(d: Uint8Array, tweak: Uint8Array): Uint8Array | null;
  sign(h: Uint8Array, d: Uint8Array, e?: Uint8Array): Uint8Array;
  signSchnorr?(h: Uint8Array, d: Uint8Array, e?: Uint8Array): Uint8Array;
  verify(
    h: Uint8Array,
    Q: Uint8Array,
    signature: Uint8Array,
    strict?: boolean
  ): boolean;
  verifySchnorr?(h: Uint8Array, Q: Uint8Array, signature: Uint8Array): boolean;
  xOnlyPointAddTweak(
    p: Uint8Array,
    tweak: Uint8Array
  ): XOnlyPointAddTweakResult | null;
  privateNegate(d: Uint8Array): Uint8Array;
}

/**
 * A single BIP32 derivation step. `index` is always below 2^31; hardening is
 * carried by the flag, never by the high bit.
 */
export type DerivationStep = {
  index: number;
  hardened: boolean;
};

/**
 * Key origin information: the fingerprint of the master key and the path
 * from it. Written as `[d34db33f/44'/0'/0']` in front of a key.
 */
export type KeyOrigin = {
  fingerprint: Buffer;
  path: DerivationStep[];
};

/**
 * Root material of an extended key. Consumers must handle the public-only
 * case explicitly.
 */
export type ExtendedKeyMaterial =
  | { type: 'publicOnly'; xpub: BIP32Interface }
  | { type: 'publicAndPrivate'; xprv: BIP32Interface };

export type Wildcard = 'none' | 'unhardened' | 'hardened';

export type FixedPublicKeyExpression = {
  type: 'fixedPublic';
  pubkey: Buffer;
  origin?: KeyOrigin;
};

export type FixedPrivateKeyExpression = {
  type: 'fixedPrivate';
  ecpair: ECPairInterface;
  pubkey: Buffer;
  origin?: KeyOrigin;
};

export type ExtendedKeyExpression = {
  type: 'extended';
  material: ExtendedKeyMaterial;
  path: DerivationStep[];
  /** The wildcard, if any, is always the final derivation step. */
  wildcard: Wildcard;
  origin?: KeyOrigin;
};

/**
 * A parsed key token (pubkey, wif, xpub or xprv with its path).
 * Immutable once parsed.
 */
export type KeyExpression =
  | FixedPublicKeyExpression
  | FixedPrivateKeyExpression
  | ExtendedKeyExpression;

export type LeafKind = 'pk' | 'pkh' | 'wpkh';

export type LeafNode<K extends LeafKind = LeafKind> = {
  type: 'leaf';
  kind: K;
  key: KeyExpression;
};

export type MultiNode = {
  type: 'multi';
  threshold: number;
  keys: KeyExpression[];
};

export type WshNode = {
  type: 'wsh';
  child: LeafNode<'pk' | 'pkh'> | MultiNode;
};

export type ShNode = {
  type: 'sh';
  child: LeafNode | MultiNode | WshNode;
};

export type ComboNode = {
  type: 'combo';
  key: KeyExpression;
};

/**
 * The descriptor tree. Which node may nest inside which is encoded in
 * `ShNode['child']` and `WshNode['child']`; `combo` is only ever the root.
 */
export type DescriptorNode =
  | LeafNode
  | MultiNode
  | ShNode
  | WshNode
  | ComboNode;

/**
 * The result of evaluating a key expression at an index.
 */
export type DerivedKey = {
  pubkey: Buffer;
  /** Set when private material was available for this key */
  privateKey?: Buffer;
  origin: KeyOrigin;
};

/**
 * A key found while parsing, in textual order.
 */
export type ParsedKey = {
  /** The key token exactly as written in the descriptor */
  expression: string;
  keyExpression: KeyExpression;
  /**
   * Whether the key sits under `wpkh(...)` or `wsh(...)`, where only
   * compressed public keys are allowed.
   */
  isWitness: boolean;
};

/**
 * The {@link DescriptorsFactory | `DescriptorsFactory`} function creates and
 * returns the `parseKeyExpression` function, which is an implementation of this
 * interface.
 *
 * It parses a key expression string (xpub, xprv, pubkey or wif, optionally
 * preceded by its origin) into a {@link KeyExpression | `KeyExpression`}.
 *
 * For example, `[d34db33f/49'/0'/0']xpub6ERApfZw...RcEL/1/*` is parsed into
 * an `extended` expression with a public-only root, the path `/1` and an
 * unhardened wildcard.
 */
export interface ParseKeyExpression {
  (params: {
    keyExpression: string;
    /**
     * Indicates if this key expression belongs to a witness script or a
     * witness program. When set, the public key must be compressed (33 bytes).
     */
    isSegwit?: boolean;
    network?: Network;
  }): KeyExpression;
}
