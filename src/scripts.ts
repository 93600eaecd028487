// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import { payments, script as bscript, Payment } from 'bitcoinjs-lib';
const { p2sh, p2wpkh, p2pkh, p2pk, p2wsh } = payments;

//Consensus: a P2SH redeemScript is pushed as a single stack element
export const MAX_SCRIPT_ELEMENT_SIZE = 520;
export const MAX_PUBKEYS_PER_MULTISIG = 16;
//Multisig inside a witness script may list up to 20 keys
export const MAX_PUBKEYS_PER_WITNESS_MULTISIG = 20;

function outputOf(payment: Payment, label: string): Buffer {
  if (!payment.output)
    throw new Error(`Error: could not build the ${label} output script`);
  return payment.output;
}

export const p2pkScript = (pubkey: Buffer): Buffer =>
  outputOf(p2pk({ pubkey }), 'p2pk');

export const p2pkhScript = (pubkey: Buffer): Buffer =>
  outputOf(p2pkh({ pubkey }), 'p2pkh');

export const p2wpkhScript = (pubkey: Buffer): Buffer =>
  outputOf(p2wpkh({ pubkey }), 'p2wpkh');

export const p2shScript = (redeemScript: Buffer): Buffer =>
  outputOf(p2sh({ redeem: { output: redeemScript } }), 'p2sh');

export const p2wshScript = (witnessScript: Buffer): Buffer =>
  outputOf(p2wsh({ redeem: { output: witnessScript } }), 'p2wsh');

/**
 * OP_m <pubkey>... OP_n OP_CHECKMULTISIG, keys in the given order.
 *
 * Built with `script.compile` rather than `payments.p2ms` so that witness
 * scripts can list more than 16 keys (17..20 are pushed as script numbers).
 */
export function multisigScript(threshold: number, pubkeys: Buffer[]): Buffer {
  return bscript.compile([
    bscript.number.encode(threshold),
    ...pubkeys,
    bscript.number.encode(pubkeys.length),
    bscript.OPS['OP_CHECKMULTISIG']!
  ]);
}

/**
 * Size of the multisig script for keys of the given lengths when n <= 16:
 * OP_m, one push per key, OP_n and OP_CHECKMULTISIG.
 */
export function multisigScriptSize(pubkeyLengths: number[]): number {
  return pubkeyLengths.reduce((size, length) => size + length + 1, 3);
}
