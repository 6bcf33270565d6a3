/**
 * Key-dependent 4-bit S-box. The table is a permutation of 0..15, shuffled by
 * {@link MT19937} seeded with the 32-bit master key, so the same key always yields
 * the same table.
 * @module
 */
import { MT19937 } from './_mt19937.ts';
import { au32 } from './utils.ts';

/** Nibble substitution table: `table[i]` is what nibble `i` maps to. */
export type SBoxTable = Uint8Array;
export type SBox = { table: SBoxTable; inverse: SBoxTable };

const NIBBLES = 16;

/** Inverse permutation: inv[table[i]] = i. */
export function invertSBox(table: SBoxTable): SBoxTable {
  if (!isPermutation(table)) throw new Error('S-box expected permutation of 0..15');
  const inv = new Uint8Array(NIBBLES);
  for (let i = 0; i < NIBBLES; i++) inv[table[i]] = i;
  return inv;
}

/** Checks that table holds each of 0..15 exactly once. */
export function isPermutation(table: SBoxTable): boolean {
  if (table.length !== NIBBLES) return false;
  let seen = 0;
  for (let i = 0; i < NIBBLES; i++) {
    const v = table[i];
    if (v >= NIBBLES) return false;
    seen |= 1 << v;
  }
  return seen === 0xffff;
}

/**
 * Derives forward and inverse tables from the master key.
 * @example generateSBox(1).table // [2, 10, 0, 14, 6, 5, 3, 8, 7, 11, 15, 1, 12, 13, 9, 4]
 */
export function generateSBox(masterKey: number): SBox {
  au32(masterKey, 'key');
  const rng = new MT19937(masterKey);
  const table = rng.shuffle(Uint8Array.from({ length: NIBBLES }, (_, i) => i));
  rng.clean();
  return { table, inverse: invertSBox(table) };
}

/** Substitutes each of the four nibbles of a 16-bit half, most-significant first. */
export function substituteHalf(half: number, table: SBoxTable): number {
  return (
    (table[(half >>> 12) & 0xf] << 12) |
    (table[(half >>> 8) & 0xf] << 8) |
    (table[(half >>> 4) & 0xf] << 4) |
    table[half & 0xf]
  );
}
