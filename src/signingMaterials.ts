// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { crypto, script as bscript } from 'bitcoinjs-lib';
import type { ECPairInterface } from 'ecpair';
import type { BIP32Interface } from 'bip32';
import type { KeyOrigin } from './types';

/**
 * A private key that can be printed in WIF: a key pair, or the root of an
 * extended private key.
 */
export type WIFKey = Pick<
  ECPairInterface,
  'publicKey' | 'privateKey' | 'toWIF'
>;

const keyId = (pubkey: Buffer) => crypto.hash160(pubkey).toString('hex');

/**
 * The handoff object between the descriptor engine and an external signer.
 *
 * Callers put private keys in; expansion puts the redeem and witness scripts
 * it built (and the public keys and origins it derived) in. Nothing here
 * is locked: concurrent writers must be serialized by the caller.
 */
export class SigningMaterials {
  readonly #keys = new Map<string, ECPairInterface>();
  readonly #extendedKeys = new Map<string, BIP32Interface>();
  readonly #pubkeys = new Map<string, Buffer>();
  readonly #origins = new Map<string, KeyOrigin>();
  readonly #scripts = new Map<string, Buffer>();

  /** Adds a WIF-style key pair, stored under HASH160 of its public key. */
  addKey(ecpair: ECPairInterface): void {
    if (!ecpair.privateKey)
      throw new Error(`Error: ecpair does not carry a private key`);
    this.#keys.set(keyId(ecpair.publicKey), ecpair);
  }

  /** Adds an extended private key, stored under HASH160 of its public key. */
  addExtendedKey(xprv: BIP32Interface): void {
    if (xprv.isNeutered())
      throw new Error(`Error: extended key does not carry a private key`);
    this.#extendedKeys.set(keyId(xprv.publicKey), xprv);
  }

  /**
   * Returns the private key of `pubkey`. A key pair is preferred; otherwise
   * an extended private key rooted at `pubkey` is returned.
   */
  getKey(pubkey: Buffer): WIFKey | undefined {
    const id = keyId(pubkey);
    return this.#keys.get(id) ?? this.#extendedKeys.get(id);
  }

  /**
   * Returns the extended private key matching `xpub` (same public key and
   * chain code), if any.
   */
  getExtendedKey(xpub: BIP32Interface): BIP32Interface | undefined {
    const xprv = this.#extendedKeys.get(keyId(xpub.publicKey));
    return xprv?.chainCode.equals(xpub.chainCode) ? xprv : undefined;
  }

  hasPrivateKeys(): boolean {
    return this.#keys.size > 0 || this.#extendedKeys.size > 0;
  }

  addPubkey(pubkey: Buffer, origin: KeyOrigin): void {
    const id = keyId(pubkey);
    this.#pubkeys.set(id, pubkey);
    this.#origins.set(id, origin);
  }

  getPubkey(pubkeyHash: Buffer): Buffer | undefined {
    return this.#pubkeys.get(pubkeyHash.toString('hex'));
  }

  getOrigin(pubkey: Buffer): KeyOrigin | undefined {
    return this.#origins.get(keyId(pubkey));
  }

  /** Registers a P2SH redeem script under HASH160(script). */
  addRedeemScript(script: Buffer): void {
    this.#scripts.set(crypto.hash160(script).toString('hex'), script);
  }

  /** Registers a P2WSH witness script under SHA256(script). */
  addWitnessScript(script: Buffer): void {
    this.#scripts.set(crypto.sha256(script).toString('hex'), script);
  }

  /**
   * Returns the redeem or witness script a P2SH or P2WSH output commits to,
   * if it was registered.
   */
  getScript(output: Buffer): Buffer | undefined {
    const hash = guessScriptHash(output);
    return hash ? this.#scripts.get(hash.toString('hex')) : undefined;
  }

  /**
   * Copies every entry of `other` into this collection. Entries already
   * present are overwritten.
   */
  merge(other: SigningMaterials): this {
    other.#keys.forEach((value, id) => this.#keys.set(id, value));
    other.#extendedKeys.forEach((value, id) =>
      this.#extendedKeys.set(id, value)
    );
    other.#pubkeys.forEach((value, id) => this.#pubkeys.set(id, value));
    other.#origins.forEach((value, id) => this.#origins.set(id, value));
    other.#scripts.forEach((value, id) => this.#scripts.set(id, value));
    return this;
  }

  clone(): SigningMaterials {
    return new SigningMaterials().merge(this);
  }
}

function guessScriptHash(output: Buffer): Buffer | undefined {
  const chunks = bscript.decompile(output);
  if (!chunks) return undefined;
  const [first, hash, last] = chunks;
  if (!Buffer.isBuffer(hash)) return undefined;
  //OP_HASH160 <20 bytes> OP_EQUAL
  if (
    chunks.length === 3 &&
    first === bscript.OPS['OP_HASH160'] &&
    hash.length === 20 &&
    last === bscript.OPS['OP_EQUAL']
  )
    return hash;
  //OP_0 <32 bytes>
  if (
    chunks.length === 2 &&
    first === bscript.OPS['OP_0'] &&
    hash.length === 32
  )
    return hash;
  return undefined;
}
