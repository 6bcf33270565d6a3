// Deterministic filler; length is a multiple of the 4-byte block
export function buf(n: number): Uint8Array {
  return new Uint8Array(n - (n % 4)).fill(n % 251);
}
