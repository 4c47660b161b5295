// src/zustands/GlobalZustand.ts
import { createStore } from 'zustand/vanilla';

import type { Transition } from '@mytypes/TMTypes';
import type { Machine } from '@tmfunctions/Machine';

interface GlobalZustand {
  //For the initialization of a run
  setAll: (machine: Machine) => void;

  //The machine being run. Null until one is loaded
  machine: Machine | null;

  //Last fired transition; Should be set after every step
  lastTransition: Transition | null;
  setLastTransition: (transition: Transition | null) => void;

  //Result once the machine halted
  result: number | null;
  setResult: (result: number | null) => void;

  runningLive: boolean; //If there is a loop driving the machine right now
  setRunningLive: (runningLive: boolean) => void;

  //Every live run gets its own ID, so a stopped loop cannot be resumed by a stale timer
  runningLiveID: number;
  incrementRunningLiveID: () => void;

  //Log every fired transition
  debug: boolean;
  setDebug: (debug: boolean) => void;

  reset: () => void;
}

export const globalZustand = createStore<GlobalZustand>((set) => ({
  setAll: (machine) => {
    set((prev) => ({
      machine,
      lastTransition: machine.lastTransition,
      result: null,
      runningLive: false,
      runningLiveID: prev.runningLiveID + 1,
    }));
  },

  machine: null,

  lastTransition: null,
  setLastTransition: (transition) => set({ lastTransition: transition }),

  result: null,
  setResult: (result) => set({ result }),

  runningLive: false,
  setRunningLive: (runningLive) => set({ runningLive }),

  runningLiveID: 0,
  incrementRunningLiveID: () =>
    set((state) => ({ runningLiveID: state.runningLiveID + 1 })),

  debug: false,
  setDebug: (debug) => set({ debug }),

  reset: () =>
    set({
      machine: null,
      lastTransition: null,
      result: null,
      runningLive: false,
      runningLiveID: 0,
      debug: false,
    }),
}));
