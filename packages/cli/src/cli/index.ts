#!/usr/bin/env -S npx tsx
/**
 * CLI for playing text adventures in the terminal
 *
 * Usage:
 *   npx tsx src/cli/index.ts --world ./worlds/campus.json
 *
 * Options:
 *   --world, -w     Path to the world JSON file (required)
 *   --seed, -s      Random seed for movement costs (or set ADVENTURE_SEED env var)
 *   --start         Starting location id (default: settings.start_location)
 *   --script        Run commands from a file instead of playing interactively
 *   --expect, -e    With --script: expected location id log, e.g. "0,1,1,2"
 *   --verbose, -v   Show meters after every turn and world warnings
 *   --help, -h      Show help
 */

import { parseArgs } from 'util';
import {
  AdventureEngine,
  checkWalkthrough,
  runSimulation,
  SimulationError,
  WorldLoadError,
  DEFAULT_SIMULATION_SEED,
} from '@text-adventure/runtime';
import { ConsoleRenderer, describeMeters } from '../lib/renderer';
import { createLineReader, playSession } from '../lib/session';
import { parseIdList, readScriptFile, readWorldFile } from '../lib/world-file';

// Parse command line arguments
const { values: args } = parseArgs({
  options: {
    world: { type: 'string', short: 'w' },
    seed: { type: 'string', short: 's' },
    start: { type: 'string' },
    script: { type: 'string' },
    expect: { type: 'string', short: 'e' },
    verbose: { type: 'boolean', short: 'v', default: false },
    help: { type: 'boolean', short: 'h', default: false },
  },
});

function printHelp() {
  console.log(`
Text Adventure CLI - Play a world file in the terminal

Usage:
  npx tsx src/cli/index.ts --world ./worlds/campus.json

Options:
  --world, -w     Path to the world JSON file (required)
  --seed, -s      Random seed for movement costs (or set ADVENTURE_SEED env var)
  --start         Starting location id (default: settings.start_location)
  --script        Run commands from a file instead of playing interactively
  --expect, -e    With --script: expected location id log, e.g. "0,1,1,2"
  --verbose, -v   Show meters after every turn and world warnings
  --help, -h      Show help

Examples:
  # Play interactively
  npx tsx src/cli/index.ts -w worlds/campus.json

  # Replay a walkthrough and check the visited locations
  npx tsx src/cli/index.ts -w worlds/campus.json --script worlds/campus.walkthrough.txt \\
    -e 0,0,1,2,3,3,2,1,1,1,2,3,3,2,1,0
`);
}

function parseInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    console.error(`Error: ${name} must be an integer, got "${value}"`);
    process.exit(1);
  }
  return parsed;
}

async function main() {
  // Show help
  if (args.help) {
    printHelp();
    process.exit(0);
  }

  // Validate required arguments
  const worldPath = args.world;
  if (!worldPath) {
    console.error('Error: --world argument is required');
    printHelp();
    process.exit(1);
  }

  const seed = parseInteger(args.seed ?? process.env.ADVENTURE_SEED, 'seed');
  const startLocationId = parseInteger(args.start, '--start');
  const verbose = args.verbose ?? false;

  const { world, report } = readWorldFile(worldPath);
  if (verbose) {
    console.log(`World: ${worldPath}`);
    console.log(`  Locations: ${report.stats.locations}, Items: ${report.stats.items}, NPCs: ${report.stats.npcs}`);
    console.log(`  Rules: ${report.stats.rules}, Interactions: ${report.stats.interactions}`);
    report.warnings.forEach((warning) => console.warn(`  Warning: ${warning}`));
  }

  // Scripted run
  if (args.script) {
    const commands = readScriptFile(args.script);
    const result = runSimulation(world, commands, {
      seed: seed ?? DEFAULT_SIMULATION_SEED,
      startLocationId,
    });
    result.transcript.forEach((line) => console.log(line));
    console.log('='.repeat(40));
    console.log(`Location log: ${result.idLog.join(', ')}`);
    console.log(`Outcome: ${result.finalState.outcome} (${describeMeters(result.finalState)})`);

    if (args.expect) {
      const check = checkWalkthrough(result, parseIdList(args.expect));
      if (!check.matches) {
        console.error(
          `Walkthrough mismatch at entry ${check.firstMismatch}: expected ${check.expected.join(', ')}`
        );
        process.exit(1);
      }
      console.log('Walkthrough matches the expected log.');
    }
    return;
  }

  // Interactive run
  const engine = new AdventureEngine(world, { seed, startLocationId });
  const renderer = new ConsoleRenderer(engine, { verbose });
  const reader = createLineReader(process.stdin, process.stdout);

  try {
    await playSession(engine, renderer, reader.ask);
  } finally {
    renderer.destroy();
    reader.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof WorldLoadError) {
    console.error('\nCould not load the world:');
    error.problems.forEach((problem) => console.error(`  - ${problem}`));
  } else if (error instanceof SimulationError) {
    console.error(`\n${error.message}`);
  } else {
    console.error('\nError:', error);
  }
  process.exit(1);
});
