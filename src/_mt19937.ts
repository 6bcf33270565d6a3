/**
 * MT19937: 32-bit Mersenne Twister by Matsumoto & Nishimura.
 * Deterministic, NOT cryptographically secure. Used only to derive key-dependent S-boxes,
 * where the same seed must give the same table on every platform.
 *
 * Seeding is `init_by_array` from the reference `mt19937ar.c`; 32-bit keys are seeded as
 * a single-word array. Bounded integers use rejection sampling over the top `bitLength(n)` bits:
 * any implementation following these rules reproduces the same shuffles.
 * See [mt19937ar.c](http://www.math.sci.hiroshima-u.ac.jp/m-mat/MT/MT2002/CODES/mt19937ar.c).
 * @module
 */
import { anumber, au32 } from './utils.ts';

const N = 624;
const M = 397;
const MATRIX_A = 0x9908b0df;
const UPPER_MASK = 0x80000000;
const LOWER_MASK = 0x7fffffff;

/** Number of bits needed to represent n: bitLength(16) = 5. */
export function bitLength(n: number): number {
  return n === 0 ? 0 : 32 - Math.clz32(n);
}

export class MT19937 {
  private readonly mt = new Uint32Array(N);
  private idx = N;
  constructor(seed: number | number[]) {
    const key = typeof seed === 'number' ? [seed] : seed;
    if (!Array.isArray(key) || key.length === 0) throw new Error('MT19937: empty seed');
    key.forEach((k) => au32(k, 'seed'));
    this.initByArray(key);
  }
  private initGenrand(s: number) {
    const mt = this.mt;
    mt[0] = s;
    for (let i = 1; i < N; i++) {
      const prev = mt[i - 1] ^ (mt[i - 1] >>> 30);
      mt[i] = Math.imul(1812433253, prev) + i;
    }
  }
  private initByArray(key: number[]) {
    const mt = this.mt;
    this.initGenrand(19650218);
    let i = 1;
    let j = 0;
    for (let k = Math.max(N, key.length); k > 0; k--) {
      const prev = mt[i - 1] ^ (mt[i - 1] >>> 30);
      mt[i] = (mt[i] ^ Math.imul(prev, 1664525)) + key[j] + j; // non linear
      i++;
      j++;
      if (i >= N) {
        mt[0] = mt[N - 1];
        i = 1;
      }
      if (j >= key.length) j = 0;
    }
    for (let k = N - 1; k > 0; k--) {
      const prev = mt[i - 1] ^ (mt[i - 1] >>> 30);
      mt[i] = (mt[i] ^ Math.imul(prev, 1566083941)) - i; // non linear
      i++;
      if (i >= N) {
        mt[0] = mt[N - 1];
        i = 1;
      }
    }
    mt[0] = UPPER_MASK; // MSB is 1; assuring non-zero initial array
    this.idx = N;
  }
  private twist() {
    const mt = this.mt;
    for (let k = 0; k < N; k++) {
      const y = (mt[k] & UPPER_MASK) | (mt[(k + 1) % N] & LOWER_MASK);
      mt[k] = mt[(k + M) % N] ^ (y >>> 1) ^ (MATRIX_A & -(y & 1));
    }
    this.idx = 0;
  }
  /** Next tempered 32-bit output. */
  nextU32(): number {
    if (this.idx >= N) this.twist();
    let y = this.mt[this.idx++];
    y ^= y >>> 11;
    y ^= (y << 7) & 0x9d2c5680;
    y ^= (y << 15) & 0xefc60000;
    y ^= y >>> 18;
    return y >>> 0;
  }
  /** Top `k` bits of the next output, 1 <= k <= 32. */
  randBits(k: number): number {
    if (!Number.isSafeInteger(k) || k < 1 || k > 32)
      throw new Error('MT19937: bit count expected 1..32, got ' + k);
    return this.nextU32() >>> (32 - k);
  }
  /** Uniform integer in [0, n), no modulo bias. */
  randBelow(n: number): number {
    anumber(n, 'n');
    if (n < 1 || n > 0xffffffff) throw new Error('MT19937: bound expected 1..2**32-1, got ' + n);
    const k = bitLength(n);
    let r = this.randBits(k);
    while (r >= n) r = this.randBits(k);
    return r;
  }
  /** In-place Fisher-Yates shuffle, walking from the last index down. */
  shuffle<T extends { length: number; [i: number]: number }>(arr: T): T {
    for (let i = arr.length - 1; i > 0; i--) {
      const j = this.randBelow(i + 1);
      const tmp = arr[i];
      arr[i] = arr[j];
      arr[j] = tmp;
    }
    return arr;
  }
  clean(): void {
    this.mt.fill(0);
    this.idx = N;
  }
}
