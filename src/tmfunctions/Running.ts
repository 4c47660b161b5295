// src/tmfunctions/Running.ts
import type { MachineSnapshot, TransitionTable } from '@mytypes/TMTypes';
import { Machine } from '@tmfunctions/Machine';
import { printTMState } from '@utils/printTMState';
import { globalZustand } from '@zustands/GlobalZustand';

export type LiveRunOptions = {
  // Pause between steps in ms; null runs without pausing
  delayMs: number | null;
  // Called before each step with the machine as it is about to be stepped.
  // stepCount already counts the upcoming step.
  beforeStep?: (snapshot: MachineSnapshot) => void;
  // Resolves when the next step may run (interactive mode)
  waitForInput?: () => Promise<void>;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function loadMachine(
  multiplier: number,
  multiplicand: number,
  table?: TransitionTable
): Machine {
  const machine = new Machine(multiplier, multiplicand, table);
  globalZustand.getState().setAll(machine);
  return machine;
}

// Returned boolean is whether a step was executed.
export function makeStep(): boolean {
  const store = globalZustand.getState();
  const machine = store.machine;

  if (!machine) {
    console.warn('No machine loaded. Please load a machine before stepping.');
    return false;
  }

  if (machine.isHalted()) {
    console.warn('The machine has halted. Reset it to run again.');
    return false;
  }

  const transition = machine.step();
  store.setLastTransition(transition);

  if (machine.isHalted()) {
    store.setResult(machine.result());
  }

  if (store.debug) {
    console.log(transition.next);
    console.log('TM State: ', printTMState(machine.getSnapshot()));
  }

  return true;
}

/**
 * Drives the loaded machine to HALT one step at a time. Resolves with the product,
 * or with null when the run was stopped before the machine halted.
 * Errors from the machine end the run and are rethrown.
 */
export async function startRunningLive(options: LiveRunOptions): Promise<number | null> {
  const store = globalZustand.getState();
  const machine = store.machine;
  if (!machine) {
    throw new Error('No machine loaded. Please load a machine before running.');
  }

  store.incrementRunningLiveID();
  const runningID = globalZustand.getState().runningLiveID;
  store.setRunningLive(true);

  const stillLive = () => {
    const latest = globalZustand.getState();
    return latest.runningLive && latest.runningLiveID === runningID;
  };

  try {
    while (!machine.isHalted()) {
      if (!stillLive()) return null;

      const snapshot = machine.getSnapshot();
      options.beforeStep?.({ ...snapshot, stepCount: snapshot.stepCount + 1 });

      if (options.delayMs !== null) {
        await sleep(options.delayMs);
        if (!stillLive()) return null;
      }

      makeStep();

      if (options.waitForInput) {
        await options.waitForInput();
      }
    }
  } catch (error) {
    console.error('Run aborted:', error instanceof Error ? error.message : error);
    throw error;
  } finally {
    if (globalZustand.getState().runningLiveID === runningID) {
      globalZustand.getState().setRunningLive(false);
    }
  }

  return machine.result();
}

export function stopRunningLive() {
  const store = globalZustand.getState();
  if (!store.runningLive) {
    console.warn('No live run to stop.');
    return;
  }
  store.setRunningLive(false);
}

// Puts a fresh machine with the same inputs and table into the store.
export function runningReset(): Machine | null {
  const store = globalZustand.getState();
  const machine = store.machine;
  if (!machine) return null;

  return loadMachine(machine.multiplier, machine.multiplicand, machine.table);
}
