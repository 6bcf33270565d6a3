/**
 * 32-bit Feistel block cipher with LFSR key schedule and key-dependent S-box.
 * Teaching primitive: 32-bit key, 32-bit block, **not secure**.
 *
 * The block is split into 16-bit halves `L | R`. Every round:
 * 1. **S-box**, each nibble of `R` goes through the key-dependent table
 * 2. **P-box**, bit `i` moves to `3i mod 16`
 * 3. **Add round key**, xor with the 16-bit LFSR subkey
 * 4. **Swap**, `(L, R) = (R, L ^ F)`
 *
 * Decryption runs the same round function with subkeys reversed and halves swapped,
 * so neither the S-box nor the P-box needs to be inverted.
 * There is no authentication: decrypting with the wrong key or round count
 * silently returns garbage.
 * @module
 */
import { expandSubkeys, lfsrSubkeys } from './lfsr.ts';
import { permute } from './pbox.ts';
import { type SBoxTable, generateSBox, substituteHalf } from './sbox.ts';
import {
  type Cipher,
  abool,
  abytes,
  anumber,
  au32,
  checkOpts,
  clean,
  createView,
  randomBytes,
} from './utils.ts';

/** Block size in bytes. */
export const BLOCK_SIZE = 4;
/** Round count used by {@link feistel} when none is given. */
export const DEFAULT_ROUNDS = 4;

export type Halves = { L: number; R: number };

/** `L` is bits 31..16, `R` is bits 15..0. */
export function split(block: number): Halves {
  return { L: (block >>> 16) & 0xffff, R: block & 0xffff };
}

export function combine(L: number, R: number): number {
  return ((L << 16) | (R & 0xffff)) >>> 0;
}

/** F(half, subkey) = P(S(half)) ^ subkey. */
export function roundFunction(half: number, subkey: number, table: SBoxTable): number {
  return (permute(substituteHalf(half, table)) ^ subkey) & 0xffff;
}

function encryptRounds(block: number, subkeys: Uint16Array, table: SBoxTable): number {
  let { L, R } = split(block);
  for (let r = 0; r < subkeys.length; r++) {
    const F = roundFunction(R, subkeys[r], table);
    [L, R] = [R, L ^ F];
  }
  return combine(L, R);
}

function decryptRounds(block: number, subkeys: Uint16Array, table: SBoxTable): number {
  let { L, R } = split(block);
  for (let r = subkeys.length - 1; r >= 0; r--) {
    const F = roundFunction(L, subkeys[r], table);
    [L, R] = [R ^ F, L];
  }
  return combine(L, R);
}

type RoundsFn = typeof encryptRounds;

function processBlock(
  fn: RoundsFn,
  block: number,
  masterKey: number,
  rounds: number,
  title: string
): number {
  au32(block, title);
  au32(masterKey, 'key');
  anumber(rounds, 'rounds');
  const { table, inverse } = generateSBox(masterKey);
  const subkeys = lfsrSubkeys(masterKey, rounds);
  const res = fn(block, subkeys, table);
  clean(table, inverse, subkeys);
  return res;
}

/**
 * Encrypts one 32-bit block. With `rounds = 0` returns the block unchanged.
 * @example encryptBlock(0x12345678, 0xdeadbeef, 4) // 0x5915e61a
 */
export function encryptBlock(plaintext: number, masterKey: number, rounds: number): number {
  return processBlock(encryptRounds, plaintext, masterKey, rounds, 'plaintext');
}

/**
 * Decrypts one 32-bit block. `masterKey` and `rounds` must match encryption:
 * a mismatch can't be detected and yields wrong plaintext.
 */
export function decryptBlock(ciphertext: number, masterKey: number, rounds: number): number {
  return processBlock(decryptRounds, ciphertext, masterKey, rounds, 'ciphertext');
}

/** `encrypt(plaintext, key, rounds)`, alias to {@link encryptBlock}. */
export const encrypt: typeof encryptBlock = encryptBlock;
/** `decrypt(ciphertext, key, rounds)`, alias to {@link decryptBlock}. */
export const decrypt: typeof decryptBlock = decryptBlock;

/** Options for {@link feistel}. */
export type FeistelOpts = {
  /** Rounds per block, default 4. */
  rounds?: number;
  /**
   * Carry LFSR state from block to block (default). When false, every block
   * restarts the schedule from the key: identical blocks give identical output.
   */
  chain?: boolean;
};

/**
 * Byte-level cipher over big-endian 32-bit blocks. No padding:
 * data length must be a multiple of 4.
 * @example
 * const c = feistel(0xdeadbeef, { rounds: 4 });
 * c.encrypt(Uint8Array.from([1, 2, 3, 4])) // Uint8Array [0x0d, 0x2c, 0xab, 0xcb]
 */
export function feistel(key: number, opts: FeistelOpts = {}): Cipher {
  au32(key, 'key');
  const { rounds, chain } = checkOpts({ rounds: DEFAULT_ROUNDS, chain: true }, opts);
  anumber(rounds, 'rounds');
  abool(chain, 'chain');
  const run = (fn: RoundsFn, data: Uint8Array) => {
    abytes(data, undefined, 'data');
    if (data.length % BLOCK_SIZE)
      throw new Error(`"data" expected length multiple of ${BLOCK_SIZE}, got length=${data.length}`);
    const { table, inverse } = generateSBox(key);
    const out = new Uint8Array(data.length);
    const src = createView(data);
    const dst = createView(out);
    let state = key;
    for (let pos = 0; pos < data.length; pos += BLOCK_SIZE) {
      const ks = expandSubkeys(chain ? state : key, rounds);
      state = ks.state;
      dst.setUint32(pos, fn(src.getUint32(pos, false), ks.subkeys, table), false);
      clean(ks.subkeys);
    }
    clean(table, inverse);
    return out;
  };
  return {
    encrypt: (plaintext: Uint8Array) => run(encryptRounds, plaintext),
    decrypt: (ciphertext: Uint8Array) => run(decryptRounds, ciphertext),
  };
}

/** Random 32-bit master key from CSPRNG. */
export function randomKey(): number {
  const bytes = randomBytes(BLOCK_SIZE);
  const key = createView(bytes).getUint32(0, false);
  clean(bytes);
  return key;
}

/** Unsafe low-level internal methods. May change at any time. */
export const unsafe: {
  encryptRounds: typeof encryptRounds;
  decryptRounds: typeof decryptRounds;
} = {
  encryptRounds,
  decryptRounds,
};
