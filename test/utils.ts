import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const _dirname = dirname(fileURLToPath(import.meta.url));

export function json(path: string): unknown {
  return JSON.parse(readFileSync(join(_dirname, path), 'utf8'));
}

export type BlockVector = { key: string; rounds: number; plaintext: string; ciphertext: string };
export type SBoxVector = { key: string; table: number[]; inverse: number[] };
export type ScheduleVector = { key: string; subkeys: string[] };
export type Vectors = {
  blocks: BlockVector[];
  sboxes: SBoxVector[];
  schedules: ScheduleVector[];
};

const isObj = (v: unknown): v is Record<string, unknown> => typeof v === 'object' && v !== null;
const isStr = (v: unknown): v is string => typeof v === 'string';
const isNums = (v: unknown): v is number[] =>
  Array.isArray(v) && v.every((i) => typeof i === 'number');

function list<T>(v: unknown, name: string, check: (item: Record<string, unknown>) => T): T[] {
  if (!Array.isArray(v)) throw new Error(`vectors: "${name}" expected array`);
  return v.map((item, i) => {
    if (!isObj(item)) throw new Error(`vectors: ${name}[${i}] expected object`);
    return check(item);
  });
}

/** Loads vectors/feistel.json with shape checks. */
export function loadVectors(): Vectors {
  const raw = json('./vectors/feistel.json');
  if (!isObj(raw)) throw new Error('vectors: expected object');
  return {
    blocks: list(raw.blocks, 'blocks', ({ key, rounds, plaintext, ciphertext }) => {
      if (!isStr(key) || typeof rounds !== 'number' || !isStr(plaintext) || !isStr(ciphertext))
        throw new Error('vectors: invalid block vector');
      return { key, rounds, plaintext, ciphertext };
    }),
    sboxes: list(raw.sboxes, 'sboxes', ({ key, table, inverse }) => {
      if (!isStr(key) || !isNums(table) || !isNums(inverse))
        throw new Error('vectors: invalid sbox vector');
      return { key, table, inverse };
    }),
    schedules: list(raw.schedules, 'schedules', ({ key, subkeys }) => {
      if (!isStr(key) || !Array.isArray(subkeys) || !subkeys.every(isStr))
        throw new Error('vectors: invalid schedule vector');
      return { key, subkeys };
    }),
  };
}

export const popcount = (n: number): number => {
  let c = 0;
  for (n >>>= 0; n; n >>>= 1) c += n & 1;
  return c;
};

export const uint32 = { min: 0, max: 0xffffffff } as const;
export const uint16 = { min: 0, max: 0xffff } as const;
