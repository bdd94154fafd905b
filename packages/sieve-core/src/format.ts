// packages/sieve-core/src/format.ts
//
// Text rendering of the constraint table, one line per letter:
//
//   a  8.17  excluded  confirmed=[]   rejected=[]
//   e 12.70  -         confirmed=[4]  rejected=[]

import type { LetterConstraintSnapshot } from './table.js';

export function formatConstraintLine(entry: LetterConstraintSnapshot): string {
  const freq = entry.frequency.toFixed(2).padStart(5);
  const flag = (entry.excluded ? 'excluded' : '-').padEnd(8);
  const confirmed = `confirmed=[${entry.confirmed.join(',')}]`;
  return `${entry.letter} ${freq}  ${flag}  ${confirmed.padEnd(13)}  rejected=[${entry.rejected.join(',')}]`;
}

export function formatConstraintTable(snapshot: readonly LetterConstraintSnapshot[]): string {
  return snapshot.map(formatConstraintLine).join('\n');
}
