import type { GameState, LocationId, Settings } from '../types';
import { UI_STRINGS } from '../ui/strings';
import type { EffectContext } from './effects';
import type { SeededRandom } from './random';
import { isStarving } from './state';

export interface MovementResult {
  from: LocationId;
  to: LocationId;
  cost: number;
  /** The timer hit zero on this move */
  ranOutOfTime: boolean;
}

/**
 * Time a single move costs: a draw from the normal range, or from the hungry
 * range while starving, halved (rounded down) while energized.
 */
export function computeMoveCost(state: GameState, settings: Settings, rng: SeededRandom): number {
  const [min, max] = isStarving(state) ? settings.hungryTimerRange : settings.timerRange;
  const cost = rng.nextInt(min, max);
  return state.energized ? Math.floor(cost / 2) : cost;
}

/**
 * Moves the player and charges the meters. Timer and health are floored at
 * zero. When the timer runs out the session ends here, before any rule sweep.
 */
export function applyMovement(ctx: EffectContext, destination: LocationId, rng: SeededRandom): MovementResult {
  const { state, world } = ctx;
  const from = state.currentLocationId;
  const cost = computeMoveCost(state, world.settings, rng);

  state.currentLocationId = destination;
  state.movementTimer = Math.max(0, state.movementTimer - cost);

  const wasStarving = isStarving(state);
  state.healthBar = Math.max(0, state.healthBar - world.settings.healthPerMove);
  if (state.healthBar === 0) {
    state.hungry = true;
    if (!wasStarving) ctx.print(UI_STRINGS.starving);
  }

  state.movesMade += 1;

  const ranOutOfTime = state.movementTimer === 0;
  if (ranOutOfTime) {
    state.ongoing = false;
    state.outcome = 'lost';
    ctx.print(UI_STRINGS.outOfTime);
  }

  return { from, to: destination, cost, ranOutOfTime };
}
