#!/usr/bin/env node
import { gen, replayFile } from './gen.js';
import { createSmallSubsetOfCoveringTraces } from './traceUtil.js';

function usage() {
  console.log(`usage:
  gen <seconds> [dir]
  properties <seconds> [dir]
  subset <output file> [num event instances] [dir]
  replay <filename> <list index> <num actions>`);
}

function main(argv: string[]): number {
  const [cmd, ...args] = argv;
  if (cmd === 'gen') {
    /*
     * Generate new traces and write them to files, for <seconds> seconds.
     */
    console.log(`gen`);
    gen({ seconds: parseInt(args[0]), checkProperties: false, dir: args[1] });
  } else if (cmd === 'properties') {
    /*
     * Check properties of the model for <seconds> seconds.
     * A violating trace is written to the trace directory.
     */
    console.log(`properties`);
    gen({ seconds: parseInt(args[0]), checkProperties: true, dir: args[1] });
  } else if (cmd === 'subset') {
    /*
     * Creates a trace file containing several traces, in a way that ensures
     * each interesting model event is emitted by some trace.
     */
    console.log(`createSmallSubsetOfCoveringTraces`);
    const eventInstances = args[1] === undefined ? 20 : parseInt(args[1]);
    createSmallSubsetOfCoveringTraces(args[0], eventInstances, args[2]);
  } else if (cmd === 'replay') {
    /*
     * Replay a trace from a file, up to a given number of actions.
     */
    console.log(`replay`);
    const [fn, traceNum, numActions] = args;
    replayFile(fn, parseInt(traceNum), parseInt(numActions));
  } else {
    usage();
    return 1;
  }
  return 0;
}

try {
  process.exitCode = main(process.argv.slice(2));
} catch (e) {
  console.log(e instanceof Error ? e.message : e);
  process.exitCode = 1;
}
