// src/tmfunctions/Errors.ts
import { formatNextState, type NextState } from '@mytypes/TMTypes';

// A move pattern contained something other than L, R or N.
export class InvalidDirectionError extends Error {
  readonly direction: string;

  constructor(direction: string) {
    super(`Unknown direction ${direction}`);
    this.name = 'InvalidDirectionError';
    this.direction = direction;
  }
}

// A write pattern contained something outside the tape alphabet.
export class InvalidSymbolError extends Error {
  readonly symbol: string;

  constructor(symbol: string) {
    super(`Unknown tape symbol ${symbol}`);
    this.name = 'InvalidSymbolError';
    this.symbol = symbol;
  }
}

export class NoMatchingTransitionError extends Error {
  readonly key: string;
  readonly expectedState: NextState | null; // null when there was no previous transition

  constructor(key: string, expectedState: NextState | null) {
    const expected = expectedState === null ? 'any' : formatNextState(expectedState);
    super(`No transition for key ${key} and state ${expected} found!`);
    this.name = 'NoMatchingTransitionError';
    this.key = key;
    this.expectedState = expectedState;
  }
}

export class MachineHaltedError extends Error {
  readonly stepCount: number;

  constructor(stepCount: number) {
    super(`Machine already halted after ${stepCount} steps`);
    this.name = 'MachineHaltedError';
    this.stepCount = stepCount;
  }
}
