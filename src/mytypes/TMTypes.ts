// src/mytypes/TMTypes.ts

export const BLANK = 'B';

export type TapeSymbol = '0' | '1' | typeof BLANK;

export function isTapeSymbol(value: string): value is TapeSymbol {
  return value === '0' || value === '1' || value === BLANK;
}

export enum Move {
  L = 'L',
  R = 'R',
  N = 'N',
}

export function isMove(value: string): value is Move {
  return value === Move.L || value === Move.R || value === Move.N;
}

// Terminal successor; a transition pointing here ends the run.
export const HALT = 'HALT';

export type NextState = number | typeof HALT;

// One row of a transition table. read/write/move hold one character per tape, in tape order.
export type Transition = Readonly<{
  number: number;
  read: string;
  write: string;
  move: string;
  next: NextState;
}>;

export type TransitionTable = readonly Transition[];

// Read-only view of a tape, handed out to renderers and step callbacks.
export interface TapeView {
  readonly head: number;
  read(): TapeSymbol;
  occupiedCount(): number;
  renderWindow(centerPadding: number): string[];
}

export type MachineSnapshot = {
  multiplier: number;
  multiplicand: number;
  stepCount: number;
  transition: Transition | null;
  halted: boolean;
  heads: number[];
  tapes: readonly TapeView[];
};

export type StepCallback = (snapshot: MachineSnapshot) => void;

export function formatNextState(next: NextState): string {
  return next === HALT ? HALT : String(next);
}

// Blank cells are shown as a space on screen.
export function displaySymbol(value: TapeSymbol | undefined): string {
  if (value === undefined || value === BLANK) return ' ';
  return value;
}
