import type { Item, Location, LocationId, World } from '../types';
import { InvariantError } from '../errors';

export function requireLocation(world: World, id: LocationId): Location {
  const location = world.locations.get(id);
  if (!location) {
    throw new InvariantError(`Location ${id} does not exist`);
  }
  return location;
}

export function requireItem(world: World, key: string): Item {
  const item = world.items.get(key.toLowerCase());
  if (!item) {
    throw new InvariantError(`Item "${key}" does not exist`);
  }
  return item;
}

/**
 * Resolves a player-typed item name to its canonical item, ignoring case.
 */
export function resolveItem(world: World, rawName: string): Item | undefined {
  return world.items.get(rawName.trim().toLowerCase());
}
