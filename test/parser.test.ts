// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as ecc from '@bitcoinerlab/secp256k1';
import { DescriptorsFactory, checksum } from '../src';
import { errorCode } from './helpers/errorCode';

const { parse, Descriptor } = DescriptorsFactory(ecc);

const KEY_A =
  '03a34b99f22c790c4e36b2b3c2c35a36db06226e41c692fc82b8b56ac1c540c5bd';
const KEY_B =
  '03669b8afcec803a0d323e9a17f3ea8e68e8abe5a278020a929adbec52421adbd0';
const UNCOMPRESSED_KEY =
  '04a34b99f22c790c4e36b2b3c2c35a36db06226e41c692fc82b8b56ac1c540c5bd5b8dec5235a0fa8722476c7709c02559e3aa73aa03918ba2d492eea75abea235';
const WIF_A = 'L4rK1yDtCWekvXuE6oXD9jCYfFNV2cWRpVuPLBcCU2z8TrisoyY1';
const XPUB =
  'xpub69H7F5d8KSRgmmdJg2KhpAK8SR3DjMwAdkxj3ZuxV27CprR9LgpeyGmXUbC6wb7ERfvrnKZjXoUmmDznezpbZb7ap6r1D3tgFxHmwMkQTPH';

const manyKeys = (count: number) => Array(count).fill(KEY_A).join(',');

describe('Descriptor tree', () => {
  test('builds nested nodes', () => {
    const { node } = parse({
      descriptor: `sh(wsh(multi(1,${KEY_A},${KEY_B})))`
    });
    expect(node.type).toBe('sh');
    if (node.type !== 'sh' || node.child.type !== 'wsh')
      throw new Error('expected sh(wsh())');
    const multi = node.child.child;
    if (multi.type !== 'multi') throw new Error('expected multi()');
    expect(multi.threshold).toBe(1);
    expect(multi.keys.map(key => key.type)).toEqual([
      'fixedPublic',
      'fixedPublic'
    ]);
  });

  test('lists keys in textual order with their witness flag', () => {
    expect(
      parse({ descriptor: `multi(1,${WIF_A},${KEY_B})` }).keys.map(
        ({ expression, isWitness }) => ({ expression, isWitness })
      )
    ).toEqual([
      { expression: WIF_A, isWitness: false },
      { expression: KEY_B, isWitness: false }
    ]);
    expect(
      parse({ descriptor: `sh(wsh(multi(1,${KEY_B},${KEY_A})))` }).keys.map(
        ({ expression, isWitness }) => ({ expression, isWitness })
      )
    ).toEqual([
      { expression: KEY_B, isWitness: true },
      { expression: KEY_A, isWitness: true }
    ]);
    expect(
      parse({ descriptor: `sh(wpkh(${KEY_A}))` }).keys[0]?.isWitness
    ).toBe(true);
    expect(parse({ descriptor: `sh(pk(${KEY_A}))` }).keys[0]?.isWitness).toBe(
      false
    );
  });

  test('keeps the source text of each key, origin and path included', () => {
    const expression = `[d34db33f/84h/0h/0h]${XPUB}/0/*`;
    expect(
      parse({ descriptor: `wpkh(${expression})` }).keys[0]?.expression
    ).toBe(expression);
  });

  test('collects the private keys found in the text', () => {
    const { materials } = parse({ descriptor: `multi(1,${WIF_A},${KEY_B})` });
    expect(materials.getKey(Buffer.from(KEY_A, 'hex'))?.toWIF()).toBe(WIF_A);
    expect(materials.getKey(Buffer.from(KEY_B, 'hex'))).toBeUndefined();
  });

  test('accepts uncompressed keys outside witness scripts', () => {
    expect(
      parse({ descriptor: `sh(multi(1,${UNCOMPRESSED_KEY},${KEY_A}))` }).node
        .type
    ).toBe('sh');
    expect(parse({ descriptor: `combo(${UNCOMPRESSED_KEY})` }).node.type).toBe(
      'combo'
    );
  });
});

describe('Syntax errors', () => {
  test.each([
    ['an empty descriptor', ''],
    ['a bare key', KEY_A],
    ['an unknown function', `foo(${KEY_A})`],
    ['an upper case function name', `PK(${KEY_A})`],
    ['unbalanced parentheses', `pk(${KEY_A}`],
    ['an extra closing parenthesis', `pk(${KEY_A}))`],
    ['trailing characters', `pk(${KEY_A})x`],
    ['a missing argument', 'pk()'],
    ['too many arguments', `pk(${KEY_A},${KEY_B})`],
    ['an empty argument', `multi(1,${KEY_A},)`],
    ['a non-numeric threshold', `multi(a,${KEY_A})`],
    ['a negative threshold', `multi(-1,${KEY_A})`],
    ['a zero threshold', `multi(0,${KEY_A})`],
    ['a threshold above the key count', `multi(2,${KEY_A})`],
    ['multi() without keys', 'multi(1)'],
    ['more than 16 keys outside witness', `multi(1,${manyKeys(17)})`],
    ['more than 20 keys in a witness script', `wsh(multi(1,${manyKeys(21)}))`]
  ])('rejects %s', (_, descriptor) => {
    expect(errorCode(() => parse({ descriptor }))).toBe('SyntaxError');
  });

  test('reports a malformed key inside a valid structure', () => {
    expect(errorCode(() => parse({ descriptor: 'pkh(notakey)' }))).toBe(
      'MalformedKey'
    );
  });
});

describe('Nesting rules', () => {
  test.each([
    `wsh(combo(${KEY_A}))`,
    `sh(wsh(wpkh(${KEY_A})))`,
    `sh(wsh(sh(pk(${KEY_A}))))`,
    `sh(wsh(wsh(pk(${KEY_A}))))`,
    `sh(wsh(${KEY_A}))`,
    `sh(${XPUB}/0)`
  ])('rejects %s', descriptor => {
    expect(errorCode(() => parse({ descriptor }))).toBe('IllegalNesting');
  });

  test.each([
    `sh(wpkh(${KEY_A}))`,
    `sh(wsh(pkh(${KEY_A})))`,
    `sh(multi(1,${KEY_A}))`,
    `wsh(multi(1,${KEY_A}))`
  ])('accepts %s', descriptor => {
    expect(() => parse({ descriptor })).not.toThrow();
  });
});

describe('Multisig limits', () => {
  test('accepts 15 compressed keys in a P2SH redeem script', () => {
    expect(() =>
      parse({ descriptor: `sh(multi(15,${manyKeys(15)}))` })
    ).not.toThrow();
  });

  test('accepts 16 keys outside P2SH', () => {
    expect(() =>
      parse({ descriptor: `multi(16,${manyKeys(16)})` })
    ).not.toThrow();
  });

  test('rejects a P2SH redeem script larger than 520 bytes', () => {
    expect(
      errorCode(() => parse({ descriptor: `sh(multi(1,${manyKeys(16)}))` }))
    ).toBe('ScriptSize');
    //3 + 8 * 66 = 531 bytes
    expect(
      errorCode(() =>
        parse({
          descriptor: `sh(multi(1,${Array(8).fill(UNCOMPRESSED_KEY).join(',')}))`
        })
      )
    ).toBe('ScriptSize');
  });

  test('builds a 20 key witness script', () => {
    const descriptor = new Descriptor({
      descriptor: `wsh(multi(20,${manyKeys(20)}))`
    });
    const materials = descriptor.getSigningMaterials();
    const [scriptPubKey] = descriptor.expand({ materials });
    if (!scriptPubKey) throw new Error('expected one script');
    expect(materials.getScript(scriptPubKey)?.toString('hex')).toBe(
      '0114' + `21${KEY_A}`.repeat(20) + '0114ae'
    );
  });
});

describe('Checksums', () => {
  const descriptor = `pk(${KEY_A})`;
  const validChecksum = checksum(descriptor);
  const lastChar = validChecksum.slice(-1);
  const badChecksum =
    validChecksum.slice(0, -1) + (lastChar === 'q' ? 'p' : 'q');

  test('accepts a valid checksum', () => {
    expect(
      parse({ descriptor: `${descriptor}#${validChecksum}` }).node.type
    ).toBe('leaf');
    expect(
      parse({
        descriptor: `${descriptor}#${validChecksum}`,
        checksumRequired: true
      }).node.type
    ).toBe('leaf');
  });

  test('rejects a wrong checksum', () => {
    expect(
      errorCode(() => parse({ descriptor: `${descriptor}#${badChecksum}` }))
    ).toBe('InvalidChecksum');
  });

  test.each([
    ['too short', `${descriptor}#${validChecksum.slice(1)}`],
    ['outside the charset', `${descriptor}#${validChecksum.slice(1)}b`],
    ['duplicated', `${descriptor}#${validChecksum}#${validChecksum}`]
  ])('rejects a checksum that is %s', (_, withChecksum) => {
    expect(errorCode(() => parse({ descriptor: withChecksum }))).toBe(
      'InvalidChecksum'
    );
  });

  test('requires a checksum when asked to', () => {
    expect(
      errorCode(() => parse({ descriptor, checksumRequired: true }))
    ).toBe('InvalidChecksum');
  });
});
