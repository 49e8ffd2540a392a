/**
 * Player-facing strings
 *
 * Every line the engine prints that is not authored in the world document.
 * Placeholders use {name} syntax and are filled by formatString.
 */

export interface UIStrings {
  // Commands
  invalidCommand: string;
  gameOver: string;

  // Dialogue and interactions
  nothingNewToSay: string; // "{name} has nothing new to say." - use {name}
  noOneByThatName: string; // use {name}
  notYetPossible: string;

  // Items
  unknownItem: string;
  itemNotHere: string; // use {item}
  pickedUp: string; // use {item}
  dropped: string; // use {item}
  notCarrying: string;
  useNeedsInventory: string;
  cannotUse: string; // use {item}
  notEdible: string; // use {item}
  ate: string; // use {item}
  energized: string;
  found: string; // "You found: {items}!" - use {items}
  emptyHanded: string;

  // Menu
  inventoryEmpty: string;
  inventoryHeader: string;
  inventoryLine: string; // use {item} and {count}
  inventoryFooter: string;
  score: string; // use {score}
  status: string; // use {timer}, {health} and {moves}
  logLine: string; // use {id} and {command}
  noCommand: string;

  // Meters and endings
  starving: string;
  outOfTime: string;
  won: string; // use {bonus} and {score}
  quit: string;
}

export const UI_STRINGS: UIStrings = {
  invalidCommand: 'That was an invalid option; try again.',
  gameOver: 'The game is over.',
  nothingNewToSay: '{name} has nothing new to say.',
  noOneByThatName: 'There is no one called "{name}" here.',
  notYetPossible: "You can't do that yet.",
  unknownItem: "That item doesn't exist.",
  itemNotHere: "There is no {item} here.",
  pickedUp: 'Picked up {item}.',
  dropped: 'Dropped {item}.',
  notCarrying: "You don't have that item.",
  useNeedsInventory: 'You can only use items in your inventory.',
  cannotUse: "You can't use {item} right now.",
  notEdible: "You can't eat {item}.",
  ate: 'You ate the {item}.',
  energized: 'You feel energized! Your steps quicken.',
  found: 'You found: {items}!',
  emptyHanded: 'You turned up empty handed!',
  inventoryEmpty: 'Your inventory is empty!',
  inventoryHeader: '--- Inventory ---',
  inventoryLine: '{item} (x{count})',
  inventoryFooter: '-----------------',
  score: 'Your score is: {score}',
  status: 'Time left: {timer} | Health: {health} | Moves: {moves}',
  logLine: 'Location: {id}, Command: {command}',
  noCommand: 'none',
  starving: 'You are starving. Every step takes longer now.',
  outOfTime: 'You ran out of time. GAME OVER.',
  won: 'You made it with everything you needed! Time bonus: {bonus}. Final score: {score}.',
  quit: 'You gave up. Thanks for playing.',
};

/**
 * Fills {placeholders} in a template. Unknown placeholders are left as-is.
 */
export function formatString(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    key in values ? String(values[key]) : match
  );
}
