// src/tmfunctions/Tape.ts
import {
  BLANK,
  Move,
  isMove,
  isTapeSymbol,
  displaySymbol,
  type TapeSymbol,
  type TapeView,
} from '@mytypes/TMTypes';
import { InvalidDirectionError, InvalidSymbolError } from '@tmfunctions/Errors';

/**
 * Unbounded tape in both directions. Only visited cells are stored; every other
 * position reads as blank. Negative positions are to the left of the input.
 */
export class Tape implements TapeView {
  private readonly cells = new Map<number, TapeSymbol>();
  private headPosition = 0;

  constructor(initial: string = '') {
    Array.from(initial).forEach((symbol, position) => {
      if (!isTapeSymbol(symbol)) throw new InvalidSymbolError(symbol);
      this.cells.set(position, symbol);
    });
  }

  get head(): number {
    return this.headPosition;
  }

  read(): TapeSymbol {
    return this.cells.get(this.headPosition) ?? BLANK;
  }

  write(value: TapeSymbol) {
    this.cells.set(this.headPosition, value);
  }

  // Takes a raw character from a move pattern, so corrupt tables fail here.
  move(direction: string) {
    if (!isMove(direction)) {
      throw new InvalidDirectionError(direction);
    }

    switch (direction) {
      case Move.L:
        this.headPosition -= 1;
        break;
      case Move.R:
        this.headPosition += 1;
        break;
      case Move.N:
        break;
    }
  }

  occupiedCount(): number {
    let count = 0;
    for (const value of this.cells.values()) {
      if (value !== BLANK) count += 1;
    }
    return count;
  }

  // Detached copy; later writes and moves on either tape do not affect the other.
  clone(): Tape {
    const copy = new Tape();
    this.cells.forEach((value, position) => copy.cells.set(position, value));
    copy.headPosition = this.headPosition;
    return copy;
  }

  // 2 * centerPadding + 1 cells, the head cell in the middle.
  renderWindow(centerPadding: number): string[] {
    const window: string[] = [];
    for (let i = this.headPosition - centerPadding; i <= this.headPosition + centerPadding; i++) {
      window.push(displaySymbol(this.cells.get(i)));
    }
    return window;
  }
}
