// src/utils/printTMState.ts
import { formatNextState, type MachineSnapshot, type TapeView } from '@mytypes/TMTypes';
import { PRINT_PADDING } from '@utils/constants';

export function printTape(tape: TapeView, padding: number = PRINT_PADDING): string {
  return `|${tape.renderWindow(padding).join('|')}|`;
}

// Marker line placing an R above the head cell of printTape's output.
export function printHeadMarker(padding: number = PRINT_PADDING): string {
  return `${' '.repeat(padding * 2)} R`;
}

export function printTMState(snapshot: MachineSnapshot, padding: number = PRINT_PADDING): string {
  const t = snapshot.transition;
  const fields = t
    ? [String(t.number), t.read, t.write, t.move, formatNextState(t.next)]
    : ['', '', '', '', ''];

  const lines = [
    `Computing ${snapshot.multiplier} x ${snapshot.multiplicand}`,
    '',
    'Current State:',
    ` Number: ${fields[0]}`,
    ` Read:   ${fields[1]}`,
    ` Write:  ${fields[2]}`,
    ` Move:   ${fields[3]}`,
    ` Next:   ${fields[4]}`,
    '',
    `Step #${snapshot.stepCount}`,
    '',
    printHeadMarker(padding),
    ...snapshot.tapes.map((tape) => printTape(tape, padding)),
  ];

  return lines.join('\n');
}

export function printResult(snapshot: MachineSnapshot, result: number): string {
  return `Computing done: ${snapshot.multiplier} x ${snapshot.multiplicand} = ${result} in ${snapshot.stepCount} steps.`;
}
