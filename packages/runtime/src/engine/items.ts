import { UI_STRINGS, formatString } from '../ui/strings';
import { requireLocation, resolveItem } from '../world/lookup';
import { requirementsMet } from './conditions';
import { applyEffect, applyEffects, type EffectContext } from './effects';
import { addToInventory, hasItem, removeFromInventory } from './inventory';
import type { ItemVerb } from './dispatcher';

/**
 * Moves every item lying at the current location into the inventory.
 */
export function searchLocation(ctx: EffectContext): number {
  const location = requireLocation(ctx.world, ctx.state.currentLocationId);
  if (location.items.length === 0) {
    ctx.print(UI_STRINGS.emptyHanded);
    return 0;
  }

  const found = location.items.splice(0, location.items.length);
  ctx.print(formatString(UI_STRINGS.found, { items: found.map((item) => item.name).join(', ') }));
  for (const item of found) {
    addToInventory(ctx.state, item);
  }
  return found.length;
}

export function pickUpItem(ctx: EffectContext, rawName: string): boolean {
  const item = resolveItem(ctx.world, rawName);
  if (!item) {
    ctx.print(UI_STRINGS.unknownItem);
    return false;
  }

  const location = requireLocation(ctx.world, ctx.state.currentLocationId);
  const index = location.items.indexOf(item);
  if (index === -1) {
    ctx.print(formatString(UI_STRINGS.itemNotHere, { item: item.name }));
    return false;
  }

  if (!requirementsMet(item.pickupRequires, ctx.state)) {
    for (const message of item.pickupFailMessages) ctx.print(message);
    return false;
  }

  location.items.splice(index, 1);
  addToInventory(ctx.state, item);

  if (item.pickupSuccessMessages.length > 0) {
    for (const message of item.pickupSuccessMessages) ctx.print(message);
  } else {
    ctx.print(formatString(UI_STRINGS.pickedUp, { item: item.name }));
  }
  return true;
}

export function dropItem(ctx: EffectContext, rawName: string): boolean {
  const item = resolveItem(ctx.world, rawName);
  if (!item) {
    ctx.print(UI_STRINGS.unknownItem);
    return false;
  }

  if (removeFromInventory(ctx.state, item.name.toLowerCase()) === 0) {
    ctx.print(UI_STRINGS.notCarrying);
    return false;
  }

  requireLocation(ctx.world, ctx.state.currentLocationId).items.push(item);
  ctx.print(formatString(UI_STRINGS.dropped, { item: item.name }));
  return true;
}

/**
 * Runs the item's use effects. Using a held item without any counts as a
 * turn even though nothing happens.
 */
export function useItem(ctx: EffectContext, rawName: string): boolean {
  const item = resolveItem(ctx.world, rawName);
  if (!item) {
    ctx.print(UI_STRINGS.unknownItem);
    return false;
  }
  if (!hasItem(ctx.state, item.name.toLowerCase())) {
    ctx.print(UI_STRINGS.useNeedsInventory);
    return false;
  }

  if (item.useEffects.length === 0) {
    ctx.print(formatString(UI_STRINGS.cannotUse, { item: item.name }));
  } else {
    applyEffects(item.useEffects, ctx);
  }
  return true;
}

/**
 * Consumes one unit of an edible item: restores health up to the starting
 * value, ends starvation, and applies the item's special effect.
 * The `energized` effect halves movement costs; any other tag is raised as
 * a flag of the same name.
 */
export function eatItem(ctx: EffectContext, rawName: string): boolean {
  const { state, world } = ctx;
  const item = resolveItem(world, rawName);
  if (!item) {
    ctx.print(UI_STRINGS.unknownItem);
    return false;
  }
  const key = item.name.toLowerCase();
  if (!hasItem(state, key)) {
    ctx.print(UI_STRINGS.notCarrying);
    return false;
  }
  if (!item.edible) {
    ctx.print(formatString(UI_STRINGS.notEdible, { item: item.name }));
    return false;
  }

  removeFromInventory(state, key);
  state.healthBar = Math.min(world.settings.healthBarStart, state.healthBar + item.restoreValue);
  if (state.healthBar > 0) {
    state.hungry = false;
  }
  ctx.print(formatString(UI_STRINGS.ate, { item: item.name }));

  if (item.specialEffect === 'energized') {
    state.energized = true;
    ctx.print(UI_STRINGS.energized);
  } else if (item.specialEffect) {
    applyEffect({ type: 'set_flag', flag: item.specialEffect, value: true }, ctx);
  }
  return true;
}

export function runItemVerb(ctx: EffectContext, verb: ItemVerb, rawName: string): boolean {
  switch (verb) {
    case 'pick_up':
      return pickUpItem(ctx, rawName);
    case 'drop':
      return dropItem(ctx, rawName);
    case 'use':
      return useItem(ctx, rawName);
    case 'eat':
      return eatItem(ctx, rawName);
  }
}
