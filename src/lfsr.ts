/**
 * LFSR key schedule: 32-bit Fibonacci shift register with taps at bits 0, 1, 21 and 31.
 * Each step shifts right by one and inserts the feedback bit at bit 31;
 * the round subkey is the low 16 bits of the new state.
 *
 * Not a secure key schedule: the sequence is linear in the master key.
 * @module
 */
import { anumber, au32 } from './utils.ts';

/** Result of one register step. */
export type LfsrStep = { state: number; subkey: number };

/** Advances the register once. */
export function lfsrStep(state: number): LfsrStep {
  const fb = (state ^ (state >>> 1) ^ (state >>> 21) ^ (state >>> 31)) & 1;
  const next = ((state >>> 1) | (fb << 31)) >>> 0;
  return { state: next, subkey: next & 0xffff };
}

/**
 * Runs `count` steps from arbitrary `state`.
 * Returns subkeys in round order and the state after the last step.
 */
export function expandSubkeys(
  state: number,
  count: number
): { subkeys: Uint16Array; state: number } {
  au32(state, 'state');
  anumber(count, 'count');
  const subkeys = new Uint16Array(count);
  for (let i = 0; i < count; i++) {
    const s = lfsrStep(state);
    state = s.state;
    subkeys[i] = s.subkey;
  }
  return { subkeys, state };
}

/**
 * Subkeys for rounds 1..count, fully determined by (masterKey, count).
 * @example lfsrSubkeys(0x12345678, 4) // Uint16Array [0x2b3c, 0x159e, 0x8acf, 0x4567]
 */
export function lfsrSubkeys(masterKey: number, count: number): Uint16Array {
  au32(masterKey, 'key');
  return expandSubkeys(masterKey, count).subkeys;
}
