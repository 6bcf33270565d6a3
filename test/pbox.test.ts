import { describe, should } from 'micro-should';
import { deepStrictEqual as eql } from 'node:assert';
import { inversePermute, permute } from '../src/pbox.ts';

describe('P-box', () => {
  should('vectors', () => {
    eql(permute(0x0000), 0x0000);
    eql(permute(0x0001), 0x0001);
    eql(permute(0x0002), 0x0008);
    eql(permute(0x8000), 0x2000);
    eql(permute(0x1234), 0x9850);
    eql(permute(0xbeef), 0xeaff);
    eql(permute(0xffff), 0xffff);
    eql(inversePermute(0x0002), 0x0800);
    eql(inversePermute(0x8000), 0x0020);
    eql(inversePermute(0x1234), 0x10d8);
  });
  should('single bits', () => {
    for (let i = 0; i < 16; i++) {
      eql(permute(1 << i), 1 << ((3 * i) % 16));
      eql(inversePermute(1 << i), 1 << ((11 * i) % 16));
    }
  });
  should('bijection over all 16-bit values', () => {
    const seen = new Uint8Array(0x10000);
    for (let v = 0; v <= 0xffff; v++) {
      const p = permute(v);
      eql(p >= 0 && p <= 0xffff, true);
      seen[p] = 1;
      eql(inversePermute(p), v);
      eql(permute(inversePermute(v)), v);
    }
    eql(seen.every((i) => i === 1), true);
  });
});

should.runWhen(import.meta.url);
