/**
 * Text Adventure Runtime
 *
 * Data-driven engine for turn-based text adventures: a world loader, the
 * condition/effect engine, the command dispatcher and the event history log.
 * Front ends (such as the console CLI) feed it commands and render its events.
 */

// Export engine
export { AdventureEngine } from './engine';
export type { GameEvent, GameEventType, GameEventListener, EngineOptions } from './engine';

// Export world loading
export { loadWorld, loadWorldWithReport, parseWorldDocument, toConditions } from './world/loader';
export { validateWorldDocument, normalizeCommand } from './world/validation';
export type { ValidationReport } from './world/validation';
export { WorldDocumentSchema, MENU_COMMANDS } from './world/schema';
export type { WorldDocument, WorldDocumentInput } from './world/schema';
export { resolveItem } from './world/lookup';

// Export event log
export { EventList } from './log/event-log';
export type { LogEvent } from './log/event-log';

// Export simulation
export { runSimulation, checkWalkthrough, DEFAULT_SIMULATION_SEED } from './simulation';
export type { SimulationResult, WalkthroughCheck } from './simulation';

// Export strings
export { UI_STRINGS, formatString } from './ui/strings';
export type { UIStrings } from './ui/strings';

// Export errors
export { WorldLoadError, InvariantError, SimulationError } from './errors';

// Export types
export * from './types';

// Export utility functions
export { evaluateCondition, requirementsMet } from './engine/conditions';
export { applyEffect, applyEffects } from './engine/effects';
export type { EffectContext } from './engine/effects';
export {
  applyRules,
  runTalk,
  runInteraction,
  classifyCommand,
  getSpecialCommands,
  getMovementCommands,
} from './engine/dispatcher';
export type { Classification, ItemVerb } from './engine/dispatcher';
export { applyMovement, computeMoveCost } from './engine/movement';
export { searchLocation, pickUpItem, dropItem, useItem, eatItem } from './engine/items';
export { addToInventory, removeFromInventory } from './engine/inventory';
export { createInitialState, cloneState, isStarving } from './engine/state';
export { SeededRandom } from './engine/random';
