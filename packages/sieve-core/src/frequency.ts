// packages/sieve-core/src/frequency.ts
//
// Relative frequency of each letter in running English text, in percent.
// Loaded once, frozen, and shared by every table and the ranker.

export const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

export type FrequencyTable = Readonly<Record<string, number>>;

export const LETTER_FREQUENCIES: FrequencyTable = Object.freeze({
  a: 8.167,
  b: 1.492,
  c: 2.782,
  d: 4.253,
  e: 12.702,
  f: 2.228,
  g: 2.015,
  h: 6.094,
  i: 6.966,
  j: 0.153,
  k: 0.772,
  l: 4.025,
  m: 2.406,
  n: 6.749,
  o: 7.507,
  p: 1.929,
  q: 0.095,
  r: 5.987,
  s: 6.327,
  t: 9.056,
  u: 2.758,
  v: 0.978,
  w: 2.36,
  x: 0.15,
  y: 1.974,
  z: 0.074,
});

/** true for a single lowercase letter a–z */
export function isLetter(ch: string): boolean {
  return ch.length === 1 && ALPHABET.includes(ch);
}
