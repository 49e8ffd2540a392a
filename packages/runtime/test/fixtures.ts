/**
 * Shared world fixtures. Movement costs use a fixed range so expected meter
 * values are exact.
 */

import type { EffectContext } from '../src/engine/effects';
import { createInitialState } from '../src/engine/state';
import type { WorldDocumentInput } from '../src/world/schema';
import { loadWorld } from '../src/world/loader';
import type { World } from '../src/types';

export function makeDocument(overrides: Partial<WorldDocumentInput> = {}): WorldDocumentInput {
  return {
    items: [
      { name: 'A', description: 'Item A', start_position: 1, target_position: 0, target_points: 10 },
      { name: 'B', description: 'Item B', start_position: 2, target_position: 0, target_points: 20 },
      {
        name: 'Snack',
        description: 'A crunchy snack',
        start_position: 0,
        target_position: 0,
        target_points: 1,
        edible: true,
        restore_value: 2,
        special_effect: 'energized',
      },
    ],
    locations: [
      {
        id: 0,
        name: 'Home',
        brief_description: 'Home again.',
        long_description: 'You are at home. A door leads out.',
        available_commands: { 'go out': 1 },
        items: ['Snack'],
      },
      {
        id: 1,
        name: 'Field',
        brief_description: 'The field.',
        long_description: 'An open field. Home is behind you, a forest lies north.',
        available_commands: { 'go home': 0, 'go north': 2 },
        items: ['A'],
      },
      {
        id: 2,
        name: 'Forest',
        brief_description: 'The forest.',
        long_description: 'Tall trees block out the sky. The field is south.',
        available_commands: { 'go south': 1 },
        items: ['B'],
      },
    ],
    settings: {
      movement_timer_start: 100,
      health_bar_start: 5,
      movement_costs: { timer_range: [5, 5], health_per_move: 1 },
    },
    ...overrides,
  };
}

export function makeWorld(overrides: Partial<WorldDocumentInput> = {}): World {
  return loadWorld(makeDocument(overrides));
}

/**
 * Effect context over a fresh state, collecting printed lines
 */
export function makeContext(world: World): EffectContext & { messages: string[] } {
  const messages: string[] = [];
  return {
    world,
    state: createInitialState(world),
    print: (message) => messages.push(message),
    messages,
  };
}
