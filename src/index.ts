/**
 * Small 32-bit Feistel block cipher for teaching: LFSR key schedule,
 * key-dependent 4-bit S-box, fixed 16-bit P-box. Check out individual modules.
 * @example
```js
import { encrypt, decrypt, feistel, randomKey } from 'feistel32/feistel.js';
import { generateSBox, substituteHalf } from 'feistel32/sbox.js';
import { permute, inversePermute } from 'feistel32/pbox.js';
import { lfsrStep, lfsrSubkeys } from 'feistel32/lfsr.js';

const key = randomKey();
const ct = encrypt(0x12345678, key, 4);
decrypt(ct, key, 4); // 0x12345678
```
 * @module
 */
export {
  BLOCK_SIZE,
  DEFAULT_ROUNDS,
  combine,
  decrypt,
  decryptBlock,
  encrypt,
  encryptBlock,
  feistel,
  randomKey,
  roundFunction,
  split,
  type FeistelOpts,
  type Halves,
} from './feistel.ts';
export { expandSubkeys, lfsrStep, lfsrSubkeys, type LfsrStep } from './lfsr.ts';
export { inversePermute, permute } from './pbox.ts';
export {
  generateSBox,
  invertSBox,
  isPermutation,
  substituteHalf,
  type SBox,
  type SBoxTable,
} from './sbox.ts';
export { bytesToHex, hexToBytes, hexToU32, u32ToHex, type Cipher } from './utils.ts';
