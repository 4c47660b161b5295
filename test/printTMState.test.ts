import { describe, it, expect } from 'vitest';

import { Machine } from '@tmfunctions/Machine';
import { printHeadMarker, printResult, printTMState, printTape } from '@utils/printTMState';

describe('printTMState', () => {
  it('leaves the transition fields empty before the first step', () => {
    const machine = new Machine(1, 1);

    expect(printTMState(machine.getSnapshot(), 2).split('\n')).toEqual([
      'Computing 1 x 1',
      '',
      'Current State:',
      ' Number: ',
      ' Read:   ',
      ' Write:  ',
      ' Move:   ',
      ' Next:   ',
      '',
      'Step #0',
      '',
      '     R',
      '| | |0|1|0|',
      '| | | | | |',
      '| | | | | |',
    ]);
  });

  it('shows the fired transition and the moved heads', () => {
    const machine = new Machine(1, 1);
    machine.step();

    expect(printTMState(machine.getSnapshot(), 2).split('\n')).toEqual([
      'Computing 1 x 1',
      '',
      'Current State:',
      ' Number: 0',
      ' Read:   0BB',
      ' Write:  B0B',
      ' Move:   RRN',
      ' Next:   0',
      '',
      'Step #1',
      '',
      '     R',
      '| | |1|0| |',
      '| |0| | | |',
      '| | | | | |',
    ]);
  });

  it('prints HALT as the successor of the final transition', () => {
    const machine = new Machine(0, 0);
    machine.run();
    const lines = printTMState(machine.getSnapshot()).split('\n');
    expect(lines[7]).toBe(' Next:   HALT');
  });

  it('returns the same text when called twice between steps', () => {
    const machine = new Machine(2, 3);
    for (let i = 0; i < 5; i++) machine.step();

    const first = printTMState(machine.getSnapshot());
    expect(printTMState(machine.getSnapshot())).toBe(first);
  });

  it('puts the head marker above the middle cell', () => {
    const machine = new Machine(3, 0);
    const row = printTape(machine.tapes[0]);
    const marker = printHeadMarker();

    expect(row).toHaveLength(63);
    expect(marker.indexOf('R')).toBe(31);
    expect(row.charAt(31)).toBe('0');
  });

  it('formats the summary line', () => {
    const machine = new Machine(2, 3);
    const result = machine.run();
    expect(printResult(machine.getSnapshot(), result)).toBe(
      'Computing done: 2 x 3 = 6 in 25 steps.'
    );
  });
});
