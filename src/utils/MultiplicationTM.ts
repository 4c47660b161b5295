// src/utils/MultiplicationTM.ts
import { HALT, type Transition, type TransitionTable } from '@mytypes/TMTypes';

// Multiplies two unary numbers. Tape 1 holds the input "0^a 1 0^b", tape 2 a copy
// of the multiplier, tape 3 the product. For every 0 of the multiplicand the copy
// on tape 2 is appended to tape 3.
export const MultiplicationTable: TransitionTable = [
  // 0: copy the multiplier to tape 2, skip the separator
  { number: 0, read: '0BB', write: 'B0B', move: 'RRN', next: 0 },
  { number: 0, read: '1BB', write: 'BBB', move: 'RNN', next: 1 },
  // 1: next multiplicand digit, or done
  { number: 1, read: '0BB', write: '0BB', move: 'NLN', next: 2 },
  { number: 1, read: 'BBB', write: 'BBB', move: 'NNN', next: HALT },
  // 2: rewind tape 2
  { number: 2, read: '00B', write: '00B', move: 'NLN', next: 2 },
  { number: 2, read: '0BB', write: '0BB', move: 'NRN', next: 3 },
  // 3: append tape 2 to tape 3, then consume the multiplicand digit
  { number: 3, read: '0BB', write: 'BBB', move: 'RNN', next: 1 },
  { number: 3, read: '00B', write: '000', move: 'NRR', next: 3 },
];

const finishRow: Transition = { number: 4, read: 'BBB', write: 'BBB', move: 'NNN', next: HALT };

// Same machine, but halting goes through a separate no-op state 4 (one extra step).
export const MultiplicationTableWithFinishState: TransitionTable = [
  ...MultiplicationTable.map((t) => (t.next === HALT ? { ...t, next: finishRow.number } : t)),
  finishRow,
];

// Number of steps the base table takes for a x b.
export function expectedStepCount(multiplier: number, multiplicand: number): number {
  return 2 + multiplier + multiplicand * (2 * multiplier + 3);
}
