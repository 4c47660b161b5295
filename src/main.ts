// src/main.ts
import * as readline from 'node:readline/promises';
import { pathToFileURL } from 'node:url';

import type { MachineSnapshot } from '@mytypes/TMTypes';
import { loadMachine, startRunningLive } from '@tmfunctions/Running';
import { buildTMGraph, renderTMGraph } from '@utils/buildTMGraph';
import { UsageError, buildConfig, getUsageText, parseCliArgs, type CliConfig } from '@utils/cliArgs';
import { printResult, printTMState } from '@utils/printTMState';
import { globalZustand } from '@zustands/GlobalZustand';

function waitForEnter(): () => Promise<void> {
  return async () => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
      await rl.question('');
    } finally {
      rl.close();
    }
  };
}

async function runWithConfig(config: CliConfig): Promise<number> {
  globalZustand.getState().setDebug(config.debug);

  const machine = loadMachine(config.multiplier, config.multiplicand);
  const graph = config.printGraph ? buildTMGraph(machine.table) : null;
  const entryState = machine.table.length > 0 ? machine.table[0].number : null;

  const render = (snapshot: MachineSnapshot) => {
    if (config.clearScreen) console.clear();
    if (config.printSteps) console.log(`\n${printTMState(snapshot)}`);
    if (graph) {
      const active = snapshot.transition ? snapshot.transition.next : entryState;
      console.log(`\n${renderTMGraph(graph, active)}`);
    }
  };

  const result = await startRunningLive({
    delayMs: config.delayMs,
    beforeStep: config.printSteps || graph || config.clearScreen ? render : undefined,
    waitForInput: config.interactive ? waitForEnter() : undefined,
  });
  if (result === null) {
    console.warn('Run stopped before the machine halted.');
    return 1;
  }

  console.log(`\n${printResult(machine.getSnapshot(), result)}`);
  return 0;
}

// Returns the process exit code.
export async function runCli(argv: string[], env: NodeJS.ProcessEnv): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.help) {
    console.log(getUsageText());
    return 0;
  }

  let config: CliConfig;
  try {
    config = buildConfig(args, env);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Invalid arguments. ${error.message}\n\n${getUsageText()}`);
      return 1;
    }
    throw error;
  }

  try {
    return await runWithConfig(config);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runCli(process.argv.slice(2), process.env).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
