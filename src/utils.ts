/**
 * Utilities for assertions, hex, big-endian words, CSPRNG.
 * @module
 */
/*! noble-ciphers - MIT License (c) 2023 Paul Miller (paulmillr.com) */
import * as nc from 'node:crypto';

/** Checks if something is Uint8Array. Be careful: nodejs Buffer will return true. */
export function isBytes(a: unknown): a is Uint8Array {
  return a instanceof Uint8Array || (ArrayBuffer.isView(a) && a.constructor.name === 'Uint8Array');
}

/** Asserts something is boolean. */
export function abool(b: boolean, title: string = ''): void {
  if (typeof b !== 'boolean') {
    const prefix = title && `"${title}" `;
    throw new Error(prefix + 'expected boolean, got ' + b);
  }
}

/** Asserts something is non-negative integer. */
export function anumber(n: number, title: string = ''): void {
  if (!Number.isSafeInteger(n) || n < 0) {
    const prefix = title && `"${title}" `;
    throw new Error(prefix + 'expected integer >= 0, got ' + n);
  }
}

/** Asserts something is unsigned 32-bit integer: 0..2**32-1. */
export function au32(n: number, title: string = ''): void {
  if (!Number.isSafeInteger(n) || n < 0 || n > 0xffffffff) {
    const prefix = title && `"${title}" `;
    throw new Error(prefix + 'expected uint32, got ' + n);
  }
}

/** Asserts something is Uint8Array. */
export function abytes(value: Uint8Array, length?: number, title: string = ''): Uint8Array {
  const bytes = isBytes(value);
  const len = value?.length;
  const needsLen = length !== undefined;
  if (!bytes || (needsLen && len !== length)) {
    const prefix = title && `"${title}" `;
    const ofLen = needsLen ? ` of length ${length}` : '';
    const got = bytes ? `length=${len}` : `type=${typeof value}`;
    throw new Error(prefix + 'expected Uint8Array' + ofLen + ', got ' + got);
  }
  return value;
}

/** Zeroize typed arrays. Warning: JS provides no guarantees. */
export function clean(...arrays: (Uint8Array | Uint16Array | Uint32Array)[]): void {
  for (let i = 0; i < arrays.length; i++) {
    arrays[i].fill(0);
  }
}

/** Create DataView of an array for easy byte-level manipulation. */
export function createView(arr: Uint8Array): DataView {
  return new DataView(arr.buffer, arr.byteOffset, arr.byteLength);
}

// Array where index 0xf0 (240) is mapped to string 'f0'
const hexes = /* @__PURE__ */ Array.from({ length: 256 }, (_, i) =>
  i.toString(16).padStart(2, '0')
);

/**
 * Convert byte array to hex string.
 * @example bytesToHex(Uint8Array.from([0xca, 0xfe, 0x01, 0x23])) // 'cafe0123'
 */
export function bytesToHex(bytes: Uint8Array): string {
  abytes(bytes);
  let hex = '';
  for (let i = 0; i < bytes.length; i++) {
    hex += hexes[bytes[i]];
  }
  return hex;
}

const asciis = { _0: 48, _9: 57, A: 65, F: 70, a: 97, f: 102 } as const;
function asciiToBase16(ch: number): number | undefined {
  if (ch >= asciis._0 && ch <= asciis._9) return ch - asciis._0; // '2' => 50-48
  if (ch >= asciis.A && ch <= asciis.F) return ch - (asciis.A - 10); // 'B' => 66-(65-10)
  if (ch >= asciis.a && ch <= asciis.f) return ch - (asciis.a - 10); // 'b' => 98-(97-10)
  return;
}

/**
 * Convert hex string to byte array.
 * @example hexToBytes('cafe0123') // Uint8Array.from([0xca, 0xfe, 0x01, 0x23])
 */
export function hexToBytes(hex: string): Uint8Array {
  if (typeof hex !== 'string') throw new Error('hex string expected, got ' + typeof hex);
  const hl = hex.length;
  const al = hl / 2;
  if (hl % 2) throw new Error('hex string expected, got unpadded hex of length ' + hl);
  const array = new Uint8Array(al);
  for (let ai = 0, hi = 0; ai < al; ai++, hi += 2) {
    const n1 = asciiToBase16(hex.charCodeAt(hi));
    const n2 = asciiToBase16(hex.charCodeAt(hi + 1));
    if (n1 === undefined || n2 === undefined) {
      const char = hex[hi] + hex[hi + 1];
      throw new Error('hex string expected, got non-hex character "' + char + '" at index ' + hi);
    }
    array[ai] = n1 * 16 + n2;
  }
  return array;
}

/**
 * Parses up to 8 hex characters as an unsigned 32-bit number.
 * @example hexToU32('deadbeef') // 0xdeadbeef
 */
export function hexToU32(hex: string): number {
  if (typeof hex !== 'string') throw new Error('hex string expected, got ' + typeof hex);
  if (hex.length === 0 || hex.length > 8)
    throw new Error('hex string of 1..8 characters expected, got length ' + hex.length);
  let n = 0;
  for (let i = 0; i < hex.length; i++) {
    const d = asciiToBase16(hex.charCodeAt(i));
    if (d === undefined)
      throw new Error('hex string expected, got non-hex character "' + hex[i] + '" at index ' + i);
    n = n * 16 + d;
  }
  return n;
}

/**
 * Formats unsigned 32-bit number as 8 hex characters.
 * @example u32ToHex(0xcafe) // '0000cafe'
 */
export function u32ToHex(n: number): string {
  au32(n);
  return n.toString(16).padStart(8, '0');
}

// Used in feistel: options are merged over defaults
type EmptyObj = {};
export function checkOpts<T1 extends EmptyObj, T2 extends EmptyObj>(
  defaults: T1,
  opts: T2
): T1 & T2 {
  if (opts == null || typeof opts !== 'object') throw new Error('options must be defined');
  return Object.assign({}, defaults, opts);
}

/** Sync cipher: takes byte array and returns byte array. */
export type Cipher = {
  encrypt(plaintext: Uint8Array): Uint8Array;
  decrypt(ciphertext: Uint8Array): Uint8Array;
};

/** Cryptographically secure PRNG. Uses OS-level `crypto.getRandomValues` from node:crypto. */
export function randomBytes(bytesLength = 32): Uint8Array {
  anumber(bytesLength, 'bytesLength');
  const cr = nc.webcrypto;
  if (typeof cr?.getRandomValues !== 'function')
    throw new Error('crypto.getRandomValues must be defined');
  return cr.getRandomValues(new Uint8Array(bytesLength));
}
