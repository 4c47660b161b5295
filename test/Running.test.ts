import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import type { MachineSnapshot } from '@mytypes/TMTypes';
import {
  loadMachine,
  makeStep,
  runningReset,
  startRunningLive,
  stopRunningLive,
} from '@tmfunctions/Running';
import { NoMatchingTransitionError } from '@tmfunctions/Errors';
import { MultiplicationTable } from '@utils/MultiplicationTM';
import { globalZustand } from '@zustands/GlobalZustand';

describe('Running', () => {
  beforeEach(() => {
    // Reset global state and silence the driver's console output
    globalZustand.getState().reset();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('makeStep', () => {
    it('does nothing without a loaded machine', () => {
      expect(makeStep()).toBe(false);
      expect(console.warn).toHaveBeenCalledWith(
        'No machine loaded. Please load a machine before stepping.'
      );
    });

    it('records the fired transition and the result in the store', () => {
      loadMachine(0, 0);

      expect(makeStep()).toBe(true);
      expect(globalZustand.getState().lastTransition).toBe(MultiplicationTable[1]);
      expect(globalZustand.getState().result).toBeNull();

      expect(makeStep()).toBe(true);
      expect(globalZustand.getState().lastTransition).toBe(MultiplicationTable[3]);
      expect(globalZustand.getState().result).toBe(0);
    });

    it('refuses to step a halted machine', () => {
      const machine = loadMachine(0, 0);
      machine.run();

      expect(makeStep()).toBe(false);
      expect(machine.stepCount).toBe(2);
      expect(console.warn).toHaveBeenCalledWith('The machine has halted. Reset it to run again.');
    });

    it('logs every step in debug mode', () => {
      globalZustand.getState().setDebug(true);
      loadMachine(1, 1);
      makeStep();

      expect(console.log).toHaveBeenCalledWith(0);
      expect(console.log).toHaveBeenCalledTimes(2);
    });
  });

  describe('startRunningLive', () => {
    it('runs to HALT and resolves with the product', async () => {
      const machine = loadMachine(2, 3);

      await expect(startRunningLive({ delayMs: null })).resolves.toBe(6);
      expect(machine.stepCount).toBe(25);
      expect(globalZustand.getState().runningLive).toBe(false);
      expect(globalZustand.getState().result).toBe(6);
    });

    it('shows each step before it runs', async () => {
      loadMachine(1, 1);
      const seen: MachineSnapshot[] = [];

      await startRunningLive({
        delayMs: null,
        beforeStep: (snapshot) => {
          seen.push(snapshot);
        },
      });

      expect(seen).toHaveLength(8);
      expect(seen[0].stepCount).toBe(1);
      expect(seen[0].transition).toBeNull();
      expect(seen[1].transition).toBe(MultiplicationTable[0]);
      expect(seen[7].stepCount).toBe(8);
    });

    it('waits the configured delay between steps', async () => {
      vi.useFakeTimers();
      const machine = loadMachine(0, 0);

      const run = startRunningLive({ delayMs: 100 });
      await vi.advanceTimersByTimeAsync(99);
      expect(machine.stepCount).toBe(0);

      await vi.advanceTimersByTimeAsync(1);
      expect(machine.stepCount).toBe(1);

      await vi.advanceTimersByTimeAsync(100);
      await expect(run).resolves.toBe(0);
      expect(machine.stepCount).toBe(2);
    });

    it('waits for input after every step', async () => {
      loadMachine(0, 0);
      const waitForInput = vi.fn(() => Promise.resolve());

      await startRunningLive({ delayMs: null, waitForInput });
      expect(waitForInput).toHaveBeenCalledTimes(2);
    });

    it('stops when the live flag is cleared', async () => {
      const machine = loadMachine(2, 2);

      const result = await startRunningLive({
        delayMs: null,
        waitForInput: async () => {
          stopRunningLive();
        },
      });

      expect(result).toBeNull();
      expect(machine.stepCount).toBe(1);
      expect(machine.isHalted()).toBe(false);
      expect(globalZustand.getState().runningLive).toBe(false);
    });

    it('stops when another machine is loaded during the run', async () => {
      const first = loadMachine(2, 2);

      const result = await startRunningLive({
        delayMs: null,
        waitForInput: async () => {
          loadMachine(1, 1);
        },
      });

      expect(result).toBeNull();
      expect(first.stepCount).toBe(1);
      expect(globalZustand.getState().machine?.stepCount).toBe(0);
    });

    it('rethrows machine errors and ends the run', async () => {
      loadMachine(0, 0, [{ number: 0, read: '0BB', write: 'B0B', move: 'RRN', next: 0 }]);

      await expect(startRunningLive({ delayMs: null })).rejects.toBeInstanceOf(
        NoMatchingTransitionError
      );
      expect(console.error).toHaveBeenCalledWith(
        'Run aborted:',
        'No transition for key 1BB and state any found!'
      );
      expect(globalZustand.getState().runningLive).toBe(false);
    });

    it('needs a loaded machine', async () => {
      await expect(startRunningLive({ delayMs: null })).rejects.toThrow(
        'No machine loaded. Please load a machine before running.'
      );
    });
  });

  describe('stopRunningLive and runningReset', () => {
    it('warns when nothing is running', () => {
      stopRunningLive();
      expect(console.warn).toHaveBeenCalledWith('No live run to stop.');
    });

    it('replaces the machine with a fresh one on the same inputs', () => {
      const machine = loadMachine(3, 2);
      machine.run();

      const fresh = runningReset();
      expect(fresh).not.toBe(machine);
      expect(fresh?.stepCount).toBe(0);
      expect(fresh?.multiplier).toBe(3);
      expect(fresh?.multiplicand).toBe(2);
      expect(fresh?.table).toBe(machine.table);
      expect(globalZustand.getState().machine).toBe(fresh);
      expect(globalZustand.getState().lastTransition).toBeNull();
    });

    it('returns null without a machine', () => {
      expect(runningReset()).toBeNull();
    });
  });
});
