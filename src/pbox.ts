/**
 * Fixed 16-bit P-box: bit `i` moves to bit `(3 * i) mod 16`.
 * 3 is odd, so the map is a bijection; the inverse multiplies by 11 (3 * 11 = 33 = 1 mod 16).
 * @module
 */

const BITS = 16;
const MUL = 3;
const MUL_INV = 11;

// Bit position tables, computed once
const genPositions = (mul: number) =>
  Uint8Array.from({ length: BITS }, (_, i) => (i * mul) % BITS);
const FWD = /* @__PURE__ */ genPositions(MUL);
const INV = /* @__PURE__ */ genPositions(MUL_INV);

function move(value: number, pos: Uint8Array): number {
  let res = 0;
  // Same 16 iterations for any input
  for (let i = 0; i < BITS; i++) res |= ((value >>> i) & 1) << pos[i];
  return res;
}

/** Forward permutation of a 16-bit value. */
export function permute(value: number): number {
  return move(value, FWD);
}

/** Inverse of {@link permute}: inversePermute(permute(v)) === v. */
export function inversePermute(value: number): number {
  return move(value, INV);
}
