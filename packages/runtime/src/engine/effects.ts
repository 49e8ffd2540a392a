import type { Effect, GameState, World } from '../types';
import { requireItem, requireLocation } from '../world/lookup';
import { addToInventory, removeFromInventory } from './inventory';

/**
 * Everything an effect may touch. `print` is the output channel.
 */
export interface EffectContext {
  world: World;
  state: GameState;
  print: (message: string) => void;
}

/**
 * Applies a single effect to the game state (mutates state)
 */
export function applyEffect(effect: Effect, ctx: EffectContext): void {
  const { world, state } = ctx;

  switch (effect.type) {
    // Output only; messages are static text
    case 'print':
      ctx.print(effect.message);
      break;

    case 'set_flag':
      state.flags[effect.flag] = effect.value;
      break;

    // Repeated rule firings must not pile up copies at the location
    case 'spawn_item_here': {
      const location = requireLocation(world, state.currentLocationId);
      const item = requireItem(world, effect.item);
      const key = item.name.toLowerCase();
      if (!location.items.some((present) => present.name.toLowerCase() === key)) {
        location.items.push(item);
      }
      break;
    }

    case 'add_item_to_inventory':
      addToInventory(state, requireItem(world, effect.item), effect.count);
      break;

    case 'remove_item_from_inventory':
      removeFromInventory(state, requireItem(world, effect.item).name.toLowerCase(), effect.count);
      break;
  }
}

/**
 * Applies multiple effects in order; later effects see earlier mutations
 */
export function applyEffects(effects: Effect[], ctx: EffectContext): void {
  for (const effect of effects) {
    applyEffect(effect, ctx);
  }
}
