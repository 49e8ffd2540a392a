import { describe, it, expect } from 'vitest';
import { applyEffect, applyEffects } from '../src/engine/effects';
import { addToInventory, removeFromInventory } from '../src/engine/inventory';
import { requireItem, requireLocation } from '../src/world/lookup';
import { makeContext, makeWorld } from './fixtures';

describe('applyEffects', () => {
  it('runs effects in list order', () => {
    const ctx = makeContext(makeWorld());

    applyEffects(
      [
        { type: 'set_flag', flag: 'x', value: true },
        { type: 'print', message: 'first' },
        { type: 'set_flag', flag: 'x', value: false },
        { type: 'print', message: 'second' },
      ],
      ctx
    );

    expect(ctx.messages).toEqual(['first', 'second']);
    expect(ctx.state.flags.x).toBe(false);
  });

  it('prints static text without touching state', () => {
    const ctx = makeContext(makeWorld({ initial_flags: { a: true } }));

    applyEffect({ type: 'print', message: 'Hello' }, ctx);

    expect(ctx.messages).toEqual(['Hello']);
    expect(ctx.state.flags).toEqual({ a: true });
    expect(ctx.state.score).toBe(0);
  });
});

describe('spawn_item_here', () => {
  it('spawns an item only once at the same location', () => {
    const ctx = makeContext(makeWorld());
    ctx.state.currentLocationId = 2;
    const forest = requireLocation(ctx.world, 2);
    forest.items = [];

    applyEffect({ type: 'spawn_item_here', item: 'a' }, ctx);
    applyEffect({ type: 'spawn_item_here', item: 'a' }, ctx);

    expect(forest.items.map((item) => item.name)).toEqual(['A']);
  });

  it('leaves a location that already holds the item unchanged', () => {
    const ctx = makeContext(makeWorld());
    ctx.state.currentLocationId = 1;

    applyEffect({ type: 'spawn_item_here', item: 'a' }, ctx);

    expect(requireLocation(ctx.world, 1).items).toHaveLength(1);
  });

  it('spawns the shared item object, not a copy', () => {
    const ctx = makeContext(makeWorld());
    ctx.state.currentLocationId = 2;

    applyEffect({ type: 'spawn_item_here', item: 'a' }, ctx);

    expect(requireLocation(ctx.world, 2).items[1]).toBe(requireItem(ctx.world, 'a'));
  });
});

describe('inventory effects', () => {
  it('adds units and scores the item once per unit', () => {
    const ctx = makeContext(makeWorld());

    applyEffect({ type: 'add_item_to_inventory', item: 'a', count: 3 }, ctx);

    expect(ctx.state.inventory.get('a')?.count).toBe(3);
    expect(ctx.state.score).toBe(30);
  });

  it('increments an existing entry', () => {
    const ctx = makeContext(makeWorld());

    applyEffect({ type: 'add_item_to_inventory', item: 'b', count: 1 }, ctx);
    applyEffect({ type: 'add_item_to_inventory', item: 'b', count: 1 }, ctx);

    expect(ctx.state.inventory.get('b')?.count).toBe(2);
    expect(ctx.state.score).toBe(40);
  });

  it('deletes the key when the last unit is removed', () => {
    const ctx = makeContext(makeWorld());
    applyEffect({ type: 'add_item_to_inventory', item: 'a', count: 2 }, ctx);

    applyEffect({ type: 'remove_item_from_inventory', item: 'a', count: 1 }, ctx);
    expect(ctx.state.inventory.get('a')?.count).toBe(1);

    applyEffect({ type: 'remove_item_from_inventory', item: 'a', count: 5 }, ctx);
    expect(ctx.state.inventory.has('a')).toBe(false);
  });

  it('never leaves an entry with a count below one', () => {
    const world = makeWorld();
    const { state } = makeContext(world);
    const a = requireItem(world, 'a');

    addToInventory(state, a, 2);
    expect(removeFromInventory(state, 'a', 1)).toBe(1);
    expect(removeFromInventory(state, 'a', 1)).toBe(1);
    expect(removeFromInventory(state, 'a', 1)).toBe(0);

    for (const entry of state.inventory.values()) {
      expect(entry.count).toBeGreaterThanOrEqual(1);
    }
    expect(state.inventory.size).toBe(0);
  });
});
