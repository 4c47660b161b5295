// src/tmfunctions/Machine.ts
import {
  HALT,
  isTapeSymbol,
  type MachineSnapshot,
  type StepCallback,
  type TapeView,
  type Transition,
  type TransitionTable,
} from '@mytypes/TMTypes';
import { Tape } from '@tmfunctions/Tape';
import { TransitionLookup } from '@tmfunctions/TransitionLookup';
import {
  InvalidSymbolError,
  MachineHaltedError,
  NoMatchingTransitionError,
} from '@tmfunctions/Errors';
import { MultiplicationTable } from '@utils/MultiplicationTM';
import { NUMBER_OF_TAPES, RESULT_TAPE_INDEX } from '@utils/constants';

function assertUnaryOperand(name: string, value: number) {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Three-tape machine computing multiplier x multiplicand in unary.
 *
 * Tape 1 starts with `0^multiplier 1 0^multiplicand`, the other two are empty.
 * Each step reads one symbol per tape, looks up the row for the state the previous
 * row pointed to, writes, moves, and remembers the row. The product ends up as the
 * number of non-blank cells on tape 3.
 */
export class Machine {
  readonly multiplier: number;
  readonly multiplicand: number;

  private readonly tapeList: Tape[];
  private readonly lookup: TransitionLookup;
  private steps = 0;
  private last: Transition | null = null;

  constructor(multiplier: number, multiplicand: number, table: TransitionTable = MultiplicationTable) {
    assertUnaryOperand('multiplier', multiplier);
    assertUnaryOperand('multiplicand', multiplicand);

    this.multiplier = multiplier;
    this.multiplicand = multiplicand;

    const input = ['0'.repeat(multiplier), '0'.repeat(multiplicand)].join('1');
    this.tapeList = [new Tape(input), ...Array.from({ length: NUMBER_OF_TAPES - 1 }, () => new Tape())];
    this.lookup = new TransitionLookup(table);
  }

  // Only the stepping algorithm writes to or moves the tapes.
  get tapes(): readonly TapeView[] {
    return this.tapeList;
  }

  get table(): TransitionTable {
    return this.lookup.table;
  }

  get stepCount(): number {
    return this.steps;
  }

  get lastTransition(): Transition | null {
    return this.last;
  }

  // Composite read key: the symbol under each head, in tape order.
  readKey(): string {
    return this.tapeList.map((tape) => tape.read()).join('');
  }

  findMatchingTransition(previous: Transition | null): Transition {
    const key = this.readKey();
    const required = previous === null ? null : previous.next;
    const transition = this.lookup.find(required, key);
    if (!transition) {
      throw new NoMatchingTransitionError(key, required);
    }
    return transition;
  }

  applyTransition(transition: Transition) {
    this.tapeList.forEach((tape, index) => {
      const symbol = transition.write.charAt(index);
      if (!isTapeSymbol(symbol)) throw new InvalidSymbolError(symbol);
      tape.write(symbol);
      tape.move(transition.move.charAt(index));
    });
  }

  step(): Transition {
    if (this.isHalted()) {
      throw new MachineHaltedError(this.steps);
    }

    this.steps += 1;
    const transition = this.findMatchingTransition(this.last);
    this.applyTransition(transition);
    this.last = transition;
    return transition;
  }

  isHalted(): boolean {
    return this.last !== null && this.last.next === HALT;
  }

  // Runs to HALT and returns the product. The callback sees the machine after every step.
  run(onEachStep?: StepCallback): number {
    while (!this.isHalted()) {
      this.step();
      onEachStep?.(this.getSnapshot());
    }
    return this.result();
  }

  result(): number {
    return this.tapeList[RESULT_TAPE_INDEX].occupiedCount();
  }

  getSnapshot(): MachineSnapshot {
    return {
      multiplier: this.multiplier,
      multiplicand: this.multiplicand,
      stepCount: this.steps,
      transition: this.last,
      halted: this.isHalted(),
      heads: this.tapeList.map((tape) => tape.head),
      tapes: this.tapeList.map((tape) => tape.clone()),
    };
  }
}
