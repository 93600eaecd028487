// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

// Descriptor checksum: a BCH code over the descriptor characters, 8 chars long.
// See https://github.com/bitcoin/bips/blob/master/bip-0380.mediawiki#checksum

const INPUT_CHARSET =
  '0123456789()[],\'/*abcdefgh@:$%{}' +
  'IJKLMNOPQRSTUVWXYZ&+-.;<=>?!^_|~' +
  'ijklmnopqrstuvwxyzABCDEFGH`#"\\ ';
export const CHECKSUM_CHARSET = 'qpzry9x8gf2tvdw0s3jn54khce6mua7l';

const GENERATOR = [
  0xf5dee51989n,
  0xa9fdca3312n,
  0x1bab10e32dn,
  0x3706b1677an,
  0x644d626ffdn
];

function polymod(c: bigint, val: number): bigint {
  const c0 = c >> 35n;
  c = ((c & 0x7ffffffffn) << 5n) ^ BigInt(val);
  GENERATOR.forEach((generator, i) => {
    if ((c0 >> BigInt(i)) & 1n) c ^= generator;
  });
  return c;
}

/**
 * Computes the 8-character checksum of a descriptor (without the `#`).
 * @throws {Error} if the descriptor contains characters outside the
 * descriptor charset.
 */
export function DescriptorChecksum(descriptor: string): string {
  let c = 1n;
  let cls = 0;
  let clscount = 0;
  for (const ch of descriptor) {
    const pos = INPUT_CHARSET.indexOf(ch);
    if (pos === -1)
      throw new Error(`Error: invalid character in descriptor: ${ch}`);
    c = polymod(c, pos & 31);
    //Every 3 characters, fold the group numbers into the checksum
    cls = cls * 3 + (pos >> 5);
    if (++clscount === 3) {
      c = polymod(c, cls);
      cls = 0;
      clscount = 0;
    }
  }
  if (clscount > 0) c = polymod(c, cls);
  for (let j = 0; j < 8; ++j) c = polymod(c, 0);
  c ^= 1n;

  let checksum = '';
  for (let j = 0; j < 8; ++j)
    checksum += CHECKSUM_CHARSET.charAt(
      Number((c >> BigInt(5 * (7 - j))) & 31n)
    );
  return checksum;
}
