import type { Condition, GameState } from '../types';

/**
 * Evaluates a single condition against the current game state
 */
export function evaluateCondition(condition: Condition, state: GameState): boolean {
  switch (condition.type) {
    // An absent flag never matches, whatever value is expected
    case 'flag':
      return state.flags[condition.flag] === condition.value;

    // Inventory conditions
    case 'has_item':
      return state.inventory.has(condition.item);

    case 'lacks_item':
      return !state.inventory.has(condition.item);

    // Progress conditions
    case 'min_score':
      return state.score >= condition.value;

    case 'min_moves':
      return state.movesMade >= condition.value;
  }
}

/**
 * Evaluates all conditions - all must be true for the result to be true
 */
export function requirementsMet(conditions: Condition[], state: GameState): boolean {
  if (conditions.length === 0) return true;
  return conditions.every((condition) => evaluateCondition(condition, state));
}
