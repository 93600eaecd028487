// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as ecc from '@bitcoinerlab/secp256k1';
import { DescriptorsFactory, SigningMaterials, checksum } from '../src';
import { errorCode } from './helpers/errorCode';

const {
  Descriptor,
  parse,
  expand,
  toPublicString,
  toPrivateString,
  ECPair,
  BIP32
} = DescriptorsFactory(ecc);

const KEY_A =
  '03a34b99f22c790c4e36b2b3c2c35a36db06226e41c692fc82b8b56ac1c540c5bd';
const UNCOMPRESSED_KEY =
  '04a34b99f22c790c4e36b2b3c2c35a36db06226e41c692fc82b8b56ac1c540c5bd5b8dec5235a0fa8722476c7709c02559e3aa73aa03918ba2d492eea75abea235';
const WIF_A = 'L4rK1yDtCWekvXuE6oXD9jCYfFNV2cWRpVuPLBcCU2z8TrisoyY1';
const XPUB =
  'xpub6ERApfZwUNrhLCkDtcHTcxd75RbzS1ed54G1LkBUHQVHQKqhMkhgbmJbZRkrgZw4koxb5JaHWkY4ALHY2grBGRjaDMzQLcgJvLJuZZvRcEL';
const XPRV =
  'xprvA1RpRA33e1JQ7ifknakTFpgNXPmW2YvmhqLQYMmrj4xJXXWYpDPS3xz7iAxn8L39njGVyuoseXzU6rcxFLJ8HFsTjSyQbLYnMpCqE2VbFWc';

describe('toPublicString', () => {
  test('prints WIF keys as public keys and xprvs as xpubs', () => {
    expect(
      toPublicString({
        node: parse({ descriptor: `sh(multi(1,${WIF_A},${XPRV}/0))` }).node
      })
    ).toBe(`sh(multi(1,${KEY_A},${XPUB}/0))`);
  });

  test('prints every hardened marker as an apostrophe', () => {
    expect(
      new Descriptor({
        descriptor: `pkh([d34db33f/44h/0H/0']${XPUB}/1h/*h)`
      }).toString()
    ).toBe(`pkh([d34db33f/44'/0'/0']${XPUB}/1'/*')`);
  });

  test('prints an origin made of a fingerprint alone', () => {
    expect(
      new Descriptor({ descriptor: `pk([D34DB33F]${KEY_A})` }).toString()
    ).toBe(`pk([d34db33f]${KEY_A})`);
  });

  test('appends the checksum on request', () => {
    const descriptor = new Descriptor({ descriptor: `wpkh(${XPUB}/0/*)` });
    const expected = `wpkh(${XPUB}/0/*)`;
    expect(descriptor.toString()).toBe(expected);
    expect(descriptor.toString({ checksum: true })).toBe(
      `${expected}#${checksum(expected)}`
    );
    expect(
      new Descriptor({
        descriptor: descriptor.toString({ checksum: true }),
        checksumRequired: true
      }).toString()
    ).toBe(expected);
  });

  test('round-trips to a descriptor that expands the same', () => {
    const { node } = parse({ descriptor: `combo(${XPRV}/*)` });
    const { node: reparsed } = parse({ descriptor: toPublicString({ node }) });
    for (const index of [0, 1, 7])
      expect(expand({ node: reparsed, index })).toEqual(
        expand({ node, index })
      );
  });
});

describe('toPrivateString', () => {
  test('prints keys found in caller supplied materials', () => {
    const materials = new SigningMaterials();
    materials.addKey(ECPair.fromWIF(WIF_A));
    materials.addExtendedKey(BIP32.fromBase58(XPRV));
    const { node } = parse({
      descriptor: `wsh(multi(1,${KEY_A},${XPUB}/0/*))`
    });
    expect(toPrivateString({ node, materials })).toBe(
      `wsh(multi(1,${WIF_A},${XPRV}/0/*))`
    );
    expect(toPrivateString({ node, materials, checksum: true })).toBe(
      `wsh(multi(1,${WIF_A},${XPRV}/0/*))#${checksum(
        `wsh(multi(1,${WIF_A},${XPRV}/0/*))`
      )}`
    );
  });

  test('keeps the key origin', () => {
    const descriptor = new Descriptor({
      descriptor: `pkh([d34db33f/44h/0h/0h]${WIF_A})`
    });
    expect(descriptor.toPrivateString()).toBe(
      `pkh([d34db33f/44'/0'/0']${WIF_A})`
    );
  });

  test('fails as a whole when one key has no private counterpart', () => {
    const materials = new SigningMaterials();
    materials.addKey(ECPair.fromWIF(WIF_A));
    const { node } = parse({
      descriptor: `multi(1,${KEY_A},${UNCOMPRESSED_KEY})`
    });
    expect(errorCode(() => toPrivateString({ node, materials }))).toBe(
      'MissingPrivateKey'
    );
  });

  test('does not fall back to the private material inside the tree', () => {
    const { node } = parse({ descriptor: `pk(${WIF_A})` });
    expect(
      errorCode(() =>
        toPrivateString({ node, materials: new SigningMaterials() })
      )
    ).toBe('MissingPrivateKey');
  });

  test('prints a WIF key and an xprv that share a private key', () => {
    const privateKey = ECPair.fromWIF(WIF_A).privateKey;
    if (!privateKey) throw new Error('expected a private key');
    const xprv = BIP32.fromPrivateKey(privateKey, Buffer.alloc(32, 1));
    const expression = `sh(multi(1,${WIF_A},${xprv.toBase58()}/0))`;
    expect(new Descriptor({ descriptor: expression }).toPrivateString()).toBe(
      expression
    );
  });

  test('round-trips to a descriptor that expands the same', () => {
    const { node, materials } = parse({
      descriptor: `sh(wpkh(${XPRV}/1/*'))`
    });
    const { node: reparsed, materials: reparsedMaterials } = parse({
      descriptor: toPrivateString({ node, materials })
    });
    expect(expand({ node: reparsed, index: 3 })).toEqual(
      expand({ node, index: 3 })
    );
    expect(reparsedMaterials.hasPrivateKeys()).toBe(true);
  });
});
