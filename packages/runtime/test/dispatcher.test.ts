import { describe, it, expect } from 'vitest';
import {
  applyRules,
  classifyCommand,
  getSpecialCommands,
  runInteraction,
  runTalk,
} from '../src/engine/dispatcher';
import { makeContext, makeWorld } from './fixtures';

const npcWorld = () =>
  makeWorld({
    initial_flags: { met: false, power: false },
    npcs: [
      {
        name: 'Reuben',
        location: 0,
        dialogue: [
          { requires: { flags: { met: true } }, text: 'Good to see you again.' },
          { text: 'Hello there!', effects: [{ type: 'set_flag', flag: 'met', value: true }] },
        ],
      },
      {
        name: 'Guard',
        location: 0,
        dialogue: [{ requires: { flags: { power: true } }, text: 'The gate is open.' }],
      },
      { name: 'Hermit', location: 2, dialogue: [{ text: 'Go away.' }] },
    ],
    interactions: [
      {
        command: 'Pull Lever',
        locations: [0],
        requires: { flags: { power: true } },
        effects: [{ type: 'print', message: 'Clunk.' }],
      },
    ],
  });

describe('applyRules', () => {
  it('keeps firing a rule that never turns itself off', () => {
    const ctx = makeContext(
      makeWorld({
        initial_flags: { bell: true },
        rules: [{ when: { flags: { bell: true } }, then: [{ type: 'print', message: 'Ding!' }] }],
      })
    );

    applyRules(ctx);
    applyRules(ctx);
    applyRules(ctx);

    expect(ctx.messages).toEqual(['Ding!', 'Ding!', 'Ding!']);
  });

  it('fires a flag-guarded rule exactly once', () => {
    const ctx = makeContext(
      makeWorld({
        initial_flags: { alarm: false },
        rules: [
          {
            when: { flags: { alarm: false } },
            then: [
              { type: 'print', message: 'Alarm!' },
              { type: 'set_flag', flag: 'alarm', value: true },
            ],
          },
        ],
      })
    );

    expect(applyRules(ctx)).toBe(1);
    expect(applyRules(ctx)).toBe(0);
    expect(applyRules(ctx)).toBe(0);

    expect(ctx.messages).toEqual(['Alarm!']);
  });

  it('waits for the minimum move count', () => {
    const ctx = makeContext(
      makeWorld({ rules: [{ when: { min_moves: 2 }, then: [{ type: 'print', message: 'Tick' }] }] })
    );

    ctx.state.movesMade = 1;
    applyRules(ctx);
    expect(ctx.messages).toEqual([]);

    ctx.state.movesMade = 2;
    applyRules(ctx);
    expect(ctx.messages).toEqual(['Tick']);
  });

  it('evaluates rules in authored order against updated state', () => {
    const ctx = makeContext(
      makeWorld({
        initial_flags: { first: false },
        rules: [
          { when: { flags: { first: true } }, then: [{ type: 'print', message: 'second rule' }] },
          {
            when: { flags: { first: false } },
            then: [
              { type: 'print', message: 'first rule' },
              { type: 'set_flag', flag: 'first', value: true },
            ],
          },
        ],
      })
    );

    applyRules(ctx);
    expect(ctx.messages).toEqual(['first rule']);

    applyRules(ctx);
    expect(ctx.messages).toEqual(['first rule', 'second rule']);
  });
});

describe('runTalk', () => {
  it('runs the first dialogue line whose requirement holds', () => {
    const ctx = makeContext(npcWorld());

    expect(runTalk(ctx, 'reuben')).toBe(true);
    expect(ctx.messages).toEqual(['Hello there!']);
    expect(ctx.state.flags.met).toBe(true);

    expect(runTalk(ctx, 'reuben')).toBe(true);
    expect(ctx.messages).toEqual(['Hello there!', 'Good to see you again.']);
  });

  it('matches NPC names without regard to case', () => {
    const ctx = makeContext(npcWorld());

    expect(runTalk(ctx, 'REUBEN')).toBe(true);
    expect(ctx.messages).toEqual(['Hello there!']);
  });

  it('falls back when no line applies but still succeeds', () => {
    const ctx = makeContext(npcWorld());

    expect(runTalk(ctx, 'guard')).toBe(true);
    expect(ctx.messages).toEqual(['Guard has nothing new to say.']);
  });

  it('fails when nobody by that name is at the current location', () => {
    const ctx = makeContext(npcWorld());

    expect(runTalk(ctx, 'hermit')).toBe(false);
    expect(ctx.messages).toEqual(['There is no one called "hermit" here.']);
  });
});

describe('runInteraction', () => {
  it('reports an unmet interaction as found but not yet possible', () => {
    const ctx = makeContext(npcWorld());

    expect(runInteraction(ctx, 'pull lever')).toBe(true);
    expect(ctx.messages).toEqual(["You can't do that yet."]);
  });

  it('applies the effects once the requirement holds', () => {
    const ctx = makeContext(npcWorld());
    ctx.state.flags.power = true;

    expect(runInteraction(ctx, 'pull lever')).toBe(true);
    expect(ctx.messages).toEqual(['Clunk.']);
  });

  it('does not find an interaction at another location', () => {
    const ctx = makeContext(npcWorld());
    ctx.state.currentLocationId = 1;

    expect(runInteraction(ctx, 'pull lever')).toBe(false);
    expect(ctx.messages).toEqual([]);
  });
});

describe('getSpecialCommands', () => {
  it('lists talk commands and interactions here, gated or not', () => {
    const ctx = makeContext(npcWorld());

    expect(getSpecialCommands(ctx.world, ctx.state)).toEqual(['talk reuben', 'talk guard', 'pull lever']);
  });

  it('lists only what belongs to the current location', () => {
    const ctx = makeContext(npcWorld());
    ctx.state.currentLocationId = 2;

    expect(getSpecialCommands(ctx.world, ctx.state)).toEqual(['talk hermit']);
  });
});

describe('classifyCommand', () => {
  it('classifies by priority', () => {
    const { world, state } = makeContext(npcWorld());

    expect(classifyCommand(world, state, 'look')).toEqual({ kind: 'menu', command: 'look' });
    expect(classifyCommand(world, state, 'talk reuben')).toEqual({ kind: 'talk', name: 'reuben' });
    expect(classifyCommand(world, state, 'pull lever').kind).toBe('interaction');
    expect(classifyCommand(world, state, 'go out')).toEqual({ kind: 'movement', destination: 1 });
    expect(classifyCommand(world, state, 'pick up snack')).toEqual({
      kind: 'item',
      verb: 'pick_up',
      itemName: 'snack',
    });
    expect(classifyCommand(world, state, 'eat snack')).toEqual({ kind: 'item', verb: 'eat', itemName: 'snack' });
  });

  it('rejects unknown input and bare prefixes', () => {
    const { world, state } = makeContext(npcWorld());

    expect(classifyCommand(world, state, 'dance')).toEqual({ kind: 'invalid' });
    expect(classifyCommand(world, state, 'talk')).toEqual({ kind: 'invalid' });
    expect(classifyCommand(world, state, 'go north')).toEqual({ kind: 'invalid' });
  });

  it('prefers an interaction over a movement command of the same name', () => {
    const { world, state } = makeContext(
      makeWorld({ interactions: [{ command: 'go out', locations: [0], effects: [] }] })
    );

    expect(classifyCommand(world, state, 'go out').kind).toBe('interaction');
  });

  it('ignores menu commands the world leaves out', () => {
    const { world, state } = makeContext(makeWorld({ settings: { menu: ['look', 'quit'] } }));

    expect(classifyCommand(world, state, 'search')).toEqual({ kind: 'invalid' });
  });
});
