// src/tmfunctions/TransitionLookup.ts
import type { NextState, Transition, TransitionTable } from '@mytypes/TMTypes';

// Wildcard for the entry lookup: no previous transition, any state may match.
const ANY_STATE = '*';

const lookupKey = (state: NextState | null, read: string) =>
  `${state === null ? ANY_STATE : state}/${read}`;

/**
 * Index over a transition table keyed by (required state | none, composite read key).
 * The first row in definition order wins, so a lookup returns the same row
 * a linear scan of the table would.
 */
export class TransitionLookup {
  private readonly byKey = new Map<string, Transition>();

  constructor(readonly table: TransitionTable) {
    table.forEach((t) => {
      const stateKey = lookupKey(t.number, t.read);
      if (!this.byKey.has(stateKey)) this.byKey.set(stateKey, t);

      const entryKey = lookupKey(null, t.read);
      if (!this.byKey.has(entryKey)) this.byKey.set(entryKey, t);
    });
  }

  find(requiredState: NextState | null, read: string): Transition | undefined {
    return this.byKey.get(lookupKey(requiredState, read));
  }

  get size(): number {
    return this.byKey.size;
  }
}
