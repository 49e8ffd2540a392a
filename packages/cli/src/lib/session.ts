import * as readline from 'readline';
import {
  classifyCommand,
  normalizeCommand,
  type AdventureEngine,
  type GameState,
} from '@text-adventure/runtime';
import type { ConsoleRenderer } from './renderer';

/**
 * Reads one line of player input. Resolves null once input is exhausted.
 */
export type AskFn = (prompt: string) => Promise<string | null>;

export const PROMPT = '\nEnter action: ';

export interface LineReader {
  ask: AskFn;
  close: () => void;
}

/**
 * Line input over a stream. Lines that arrive before they are asked for are
 * kept, so piped input is replayed in full; end of input resolves null.
 */
export function createLineReader(input: NodeJS.ReadableStream, output?: NodeJS.WritableStream): LineReader {
  const rl = readline.createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    ask: async (prompt) => {
      output?.write(prompt);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close: () => rl.close(),
  };
}

/**
 * The interactive command loop: narrate, prompt, re-prompt on invalid input,
 * run the command. Returns the final state once the session ends or input
 * runs out.
 */
export async function playSession(
  engine: AdventureEngine,
  renderer: ConsoleRenderer,
  ask: AskFn
): Promise<Readonly<GameState>> {
  engine.start();

  while (engine.getState().ongoing) {
    renderer.renderArrival();
    renderer.renderPrompt();

    const command = await askForValidCommand(engine, renderer, ask);
    if (command === null) {
      // Input closed: end the way `quit` would, when the world allows it
      if (engine.getMenu().includes('quit')) engine.execute('quit');
      break;
    }

    renderer.renderChoice(command);
    engine.execute(command);
  }

  return engine.getState();
}

async function askForValidCommand(
  engine: AdventureEngine,
  renderer: ConsoleRenderer,
  ask: AskFn
): Promise<string | null> {
  for (;;) {
    const input = await ask(PROMPT);
    if (input === null) return null;

    const command = normalizeCommand(input);
    if (classifyCommand(engine.getWorld(), engine.getState(), command).kind !== 'invalid') {
      return command;
    }
    // Run it anyway so the engine reports the rejection; nothing changes
    engine.execute(command);
  }
}
