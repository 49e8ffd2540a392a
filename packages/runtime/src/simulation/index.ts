/**
 * Non-interactive playthroughs
 *
 * Feeds a fixed command list through the engine, the same way the console
 * loop does, and reports the visited-location log. Used to check authored
 * walkthroughs and to produce demo transcripts.
 */

import type { GameState, LocationId, World } from '../types';
import { AdventureEngine, type EngineOptions } from '../engine';
import { cloneState } from '../engine/state';
import type { EventList } from '../log/event-log';
import { SimulationError } from '../errors';

export const DEFAULT_SIMULATION_SEED = 2026;

export interface SimulationResult {
  idLog: LocationId[];
  /** Location descriptions interleaved with the commands chosen */
  transcript: string[];
  /** Everything the engine printed, in order */
  messages: string[];
  finalState: GameState;
  log: EventList;
}

/**
 * Runs every command in order. A command the engine rejects (unknown at that
 * point, or issued after the game ended) aborts with SimulationError.
 *
 * The world is mutated (items move, locations get visited); load a fresh one
 * per simulation.
 */
export function runSimulation(world: World, commands: string[], options: EngineOptions = {}): SimulationResult {
  const engine = new AdventureEngine(world, { seed: DEFAULT_SIMULATION_SEED, ...options });
  const messages: string[] = [];
  engine.on((event) => {
    if (event.type === 'message') messages.push(event.text);
  });
  engine.start();

  commands.forEach((command, step) => {
    const result = engine.execute(command);
    if (!result.accepted) {
      throw new SimulationError(step, command, engine.getState().currentLocationId);
    }
  });

  const log = engine.getLog();
  const transcript: string[] = [];
  for (const event of log.forward()) {
    transcript.push(event.description);
    if (event.nextCommand !== null) {
      transcript.push(`You choose: ${event.nextCommand}`);
    }
  }

  return {
    idLog: log.getIdLog(),
    transcript,
    messages,
    finalState: cloneState(engine.getState()),
    log,
  };
}

export interface WalkthroughCheck {
  matches: boolean;
  actual: LocationId[];
  expected: LocationId[];
  /** Index of the first differing entry, or -1 */
  firstMismatch: number;
}

/**
 * Compares a simulation's id log with the expected sequence.
 */
export function checkWalkthrough(result: SimulationResult, expected: LocationId[]): WalkthroughCheck {
  const actual = result.idLog;
  const length = Math.max(actual.length, expected.length);
  let firstMismatch = -1;
  for (let i = 0; i < length; i++) {
    if (actual[i] !== expected[i]) {
      firstMismatch = i;
      break;
    }
  }
  return { matches: firstMismatch === -1, actual, expected, firstMismatch };
}
