import * as fs from 'fs';
import * as path from 'path';
import _ from 'underscore';
import { TraceAction } from './common.js';
import {
  MAX_SLASH,
  UNBOND_DELAY,
  BURN_ADDRESS,
  LEDGER,
  TOKEN,
  AUTHORITY,
  ACCOUNTS,
  POOLS,
  BOND_AMOUNTS,
  NONCES,
  SLASH_POINTS,
  TIME_STEPS,
  START_TIME,
  Event,
} from './constants.js';

/**
 * A trace as written to disk.
 */
interface DumpedTrace {
  meta: { generatedAt: string };
  constants: Record<string, unknown>;
  actions: TraceAction[];
  events: Event[];
}

// bigints are written as decimal strings with an n suffix
const BIGINT = /^-?\d+n$/;

function stringify(x: unknown): string {
  return JSON.stringify(x, (_key, v: unknown) =>
    typeof v === 'bigint' ? `${v.toString()}n` : v,
  );
}

function parse(json: string): unknown {
  return JSON.parse(json, (_key, v: unknown) =>
    typeof v === 'string' && BIGINT.test(v) ? BigInt(v.slice(0, -1)) : v,
  );
}

/**
 * Forcibly ensure an empty directory exists.
 * @param dir directory name
 */
function forceMakeEmptyDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
    return;
  }
  fs.rmSync(dir, { recursive: true });
  forceMakeEmptyDir(dir);
}

/**
 * Write the trace data to file, with accompanying metadata.
 *
 * @param fn Filename
 * @param actions Actions included in trace
 * @param events Events included in trace
 */
function dumpTrace(fn: string, actions: TraceAction[], events: Event[]) {
  const toDump: DumpedTrace = {
    meta: { generatedAt: new Date().toISOString() },
    // Record values of model constants
    constants: {
      MAX_SLASH,
      UNBOND_DELAY,
      BURN_ADDRESS,
      LEDGER,
      TOKEN,
      AUTHORITY,
      ACCOUNTS,
      POOLS,
      BOND_AMOUNTS,
      NONCES,
      SLASH_POINTS,
      TIME_STEPS,
      START_TIME,
    },
    // Record which actions occurred
    actions,
    // Events which occurred
    events,
  };
  fs.writeFileSync(fn, stringify([toDump]));
}

function isDumpedTrace(x: unknown): x is DumpedTrace {
  return (
    typeof x === 'object' &&
    x !== null &&
    'actions' in x &&
    Array.isArray(x.actions) &&
    'events' in x &&
    Array.isArray(x.events)
  );
}

/**
 * Read a file written by dumpTrace or createSmallSubsetOfCoveringTraces.
 */
function readTraces(fn: string): DumpedTrace[] {
  const traces = parse(fs.readFileSync(fn, 'utf8'));
  if (!Array.isArray(traces) || !traces.every(isDumpedTrace)) {
    throw new Error(`${fn} does not contain traces`);
  }
  return traces;
}

/**
 * Reads all json traces in dir and creates a new trace file
 * consisting of a list of several traces. The traces in the new
 * trace file are chosen in such a way to ensure a covering of
 * each model event.
 * The traces are selected according to a greedy algorithm, ensuring
 * that each event occurs targetCntForEventMax times while somewhat
 * minimizing the number of traces included.
 *
 * @param outFile filepath to write output to
 * @param targetCntForEventMax max number of times to hit each event
 * @param dir directory to read traces from
 * @returns the filenames of the traces used
 */
function createSmallSubsetOfCoveringTraces(
  outFile: string,
  targetCntForEventMax: number,
  dir = 'traces/',
): string[] {
  const inputFilenames = fs
    .readdirSync(dir)
    .filter((fn) => fn.endsWith('.json'))
    .map((fn) => path.join(dir, fn));

  const eventNames: string[] = _.values(Event);
  const NUM_EVENTS = eventNames.length;

  const maxPossibleCntForEvent: number[] = new Array(NUM_EVENTS).fill(0);

  const eventCntsByTrace: [string, number[]][] = [];
  // For each trace file
  inputFilenames.forEach((fn) => {
    const trace = readTraces(fn)[0];
    const traceEventCnt: number[] = new Array(NUM_EVENTS).fill(0);
    // for each event that occurred in the trace
    trace.events.forEach((evtName) => {
      const i = eventNames.indexOf(evtName);
      // cnt the occurrences in this trace
      traceEventCnt[i] += 1;
      // cnt the global occurrences
      maxPossibleCntForEvent[i] += 1;
    });
    eventCntsByTrace.push([fn, traceEventCnt]);
  });

  const targetCntForEvent = maxPossibleCntForEvent.map((x) =>
    Math.min(x, targetCntForEventMax),
  );

  const accumulatedCntForEvent: number[] = new Array(NUM_EVENTS).fill(0);
  /**
   * Computes greedy score for a event frequency cnt vector
   * @param v vector representing event counts
   */
  function score(v: number[]): number {
    let x = 0;
    for (let i = 0; i < v.length; i++) {
      // How many events of this type are still desired?
      const need = Math.max(
        targetCntForEvent[i] - accumulatedCntForEvent[i],
        0,
      );
      // How many events of this type does this trace have?
      x += Math.min(need, v[i]);
    }
    return x;
  }

  const outputFilenames: string[] = [];
  // While we have not reached the target occurrence count for all events
  while (
    accumulatedCntForEvent.some((x, i) => x < targetCntForEvent[i])
  ) {
    // Sort by score descending
    eventCntsByTrace.sort((a, b) => score(b[1]) - score(a[1]));
    const next = eventCntsByTrace.shift();
    if (next === undefined) {
      break;
    }
    const [fn, traceEventCnt] = next;
    for (let i = 0; i < traceEventCnt.length; i++) {
      accumulatedCntForEvent[i] += traceEventCnt[i];
    }
    // Use this trace
    outputFilenames.push(fn);
  }

  // Diagnostic ////////////////////////////////////////////
  console.log(`num traces used: `, outputFilenames.length);
  eventNames.forEach((evtName, i) => {
    console.log(evtName, accumulatedCntForEvent[i]);
  });
  //////////////////////////////////////////////////////////

  const allTraces = outputFilenames.map((fn) => readTraces(fn)[0]);
  fs.writeFileSync(outFile, stringify(allTraces));
  return outputFilenames;
}

/**
 * Count the number of times each event occurs, including events
 * that never occurred, most frequent first.
 * @param allEvents events emitted during generation
 */
function countEvents(allEvents: Event[]): [string, number][] {
  const eventCnt = _.countBy(allEvents, _.identity);
  _.values(Event).forEach((evtName) => {
    if (!_.has(eventCnt, evtName)) {
      eventCnt[evtName] = 0;
    }
  });
  return _.chain(eventCnt)
    .pairs()
    .sortBy((pair) => -pair[1])
    .value();
}

/**
 * Pretty print the number of times each event occurs.
 */
function logEventData(allEvents: Event[]) {
  console.log(countEvents(allEvents));
}

export {
  DumpedTrace,
  stringify,
  parse,
  forceMakeEmptyDir,
  dumpTrace,
  readTraces,
  createSmallSubsetOfCoveringTraces,
  countEvents,
  logEventData,
};
