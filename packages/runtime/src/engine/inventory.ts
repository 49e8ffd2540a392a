import type { GameState, InventoryEntry, Item } from '../types';

/**
 * Adds `count` units of an item to the inventory and credits its point
 * value once per unit.
 */
export function addToInventory(state: GameState, item: Item, count = 1): void {
  if (count <= 0) return;

  const key = item.name.toLowerCase();
  const entry = state.inventory.get(key);
  if (entry) {
    entry.count += count;
  } else {
    state.inventory.set(key, { item, count });
  }
  state.score += item.targetPoints * count;
}

/**
 * Removes up to `count` units. The key disappears once the count reaches zero.
 * Returns the number of units actually removed.
 */
export function removeFromInventory(state: GameState, key: string, count = 1): number {
  const entry = state.inventory.get(key);
  if (!entry || count <= 0) return 0;

  const removed = Math.min(entry.count, count);
  entry.count -= removed;
  if (entry.count === 0) {
    state.inventory.delete(key);
  }
  return removed;
}

export function hasItem(state: GameState, key: string): boolean {
  return state.inventory.has(key);
}

/**
 * Inventory entries in insertion order, for display
 */
export function listInventory(state: GameState): InventoryEntry[] {
  return [...state.inventory.values()];
}
