import { describe, it, expect } from 'vitest';
import { SimulationError } from '../src/errors';
import { checkWalkthrough, runSimulation } from '../src/simulation';
import { makeWorld } from './fixtures';

describe('runSimulation', () => {
  it('replays commands and reports the visited locations', () => {
    const result = runSimulation(makeWorld(), ['go out', 'search', 'go north']);

    expect(result.idLog).toEqual([0, 1, 1, 2]);
    expect(result.messages).toEqual(['You found: A!']);
    expect(result.transcript).toEqual([
      'You are at home. A door leads out.',
      'You choose: go out',
      'An open field. Home is behind you, a forest lies north.',
      'You choose: search',
      'An open field. Home is behind you, a forest lies north.',
      'You choose: go north',
      'Tall trees block out the sky. The field is south.',
    ]);
    expect(result.finalState.score).toBe(10);
    expect(result.finalState.movementTimer).toBe(90);
  });

  it('aborts on a command that is invalid where it is issued', () => {
    const run = () => runSimulation(makeWorld(), ['go out', 'dance']);

    expect(run).toThrow(SimulationError);
    expect(run).toThrow('Invalid command at step 2 (location 1): "dance"');
  });

  it('aborts on a command issued after the game ended', () => {
    const world = makeWorld({ settings: { movement_timer_start: 5, movement_costs: { timer_range: [5, 5] } } });

    expect(() => runSimulation(world, ['go out', 'look'])).toThrow(
      'Invalid command at step 2 (location 1): "look"'
    );
  });

  it('hands back a state detached from the engine', () => {
    const result = runSimulation(makeWorld(), ['search']);

    expect(result.finalState.inventory.get('snack')?.count).toBe(1);
    result.finalState.inventory.clear();
    expect(result.log.length).toBe(2);
  });

  it('is deterministic for the same seed', () => {
    const commands = ['go out', 'go north', 'go south', 'go home'];
    const ranged = () => makeWorld({ settings: { movement_costs: { timer_range: [2, 9] } } });

    const first = runSimulation(ranged(), commands, { seed: 5 });
    const second = runSimulation(ranged(), commands, { seed: 5 });

    expect(second.finalState.movementTimer).toBe(first.finalState.movementTimer);
    expect(second.idLog).toEqual(first.idLog);
  });
});

describe('checkWalkthrough', () => {
  const result = () => runSimulation(makeWorld(), ['go out', 'go north']);

  it('matches an identical log', () => {
    expect(checkWalkthrough(result(), [0, 1, 2])).toEqual({
      matches: true,
      actual: [0, 1, 2],
      expected: [0, 1, 2],
      firstMismatch: -1,
    });
  });

  it('points at the first differing entry', () => {
    expect(checkWalkthrough(result(), [0, 2, 2]).firstMismatch).toBe(1);
  });

  it('treats a length difference as a mismatch', () => {
    const check = checkWalkthrough(result(), [0, 1]);

    expect(check.matches).toBe(false);
    expect(check.firstMismatch).toBe(2);
  });
});
