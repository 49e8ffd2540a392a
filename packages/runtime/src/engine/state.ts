import type { GameState, LocationId, World } from '../types';

/**
 * Creates the initial game state from the world's settings
 */
export function createInitialState(world: World, startLocationId?: LocationId): GameState {
  const { settings } = world;

  return {
    currentLocationId: startLocationId ?? settings.startLocation,
    inventory: new Map(),
    flags: { ...world.initialFlags },
    score: 0,
    movementTimer: settings.movementTimerStart,
    healthBar: settings.healthBarStart,
    hungry: settings.hungryStart,
    energized: false,
    movesMade: 0,
    ongoing: true,
    outcome: 'playing',
  };
}

/**
 * Starving doubles movement costs (via the hungry cost range)
 */
export function isStarving(state: GameState): boolean {
  return state.hungry || state.healthBar <= 0;
}

/**
 * Creates a copy of the game state for transcripts and assertions.
 * Inventory entries are copied; the items they point at are shared.
 */
export function cloneState(state: GameState): GameState {
  return {
    ...state,
    inventory: new Map(
      [...state.inventory].map(([key, entry]) => [key, { item: entry.item, count: entry.count }])
    ),
    flags: { ...state.flags },
  };
}
