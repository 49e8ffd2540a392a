import type {
  CommandKind,
  GameState,
  Location,
  LocationId,
  MenuCommand,
  Outcome,
  TurnResult,
  World,
} from '../types';
import { EventList } from '../log/event-log';
import { UI_STRINGS, formatString } from '../ui/strings';
import { requireLocation } from '../world/lookup';
import { normalizeCommand } from '../world/validation';
import {
  applyRules,
  classifyCommand,
  getMovementCommands,
  getSpecialCommands,
  runInteraction,
  runTalk,
} from './dispatcher';
import type { EffectContext } from './effects';
import { listInventory } from './inventory';
import { runItemVerb, searchLocation } from './items';
import { applyMovement } from './movement';
import { SeededRandom } from './random';
import { createInitialState } from './state';

export type GameEvent =
  | { type: 'game_started'; location: Location; state: GameState }
  | { type: 'message'; text: string }
  | { type: 'location_changed'; location: Location; state: GameState }
  | { type: 'state_changed'; state: GameState }
  | { type: 'game_ended'; outcome: Outcome; state: GameState };

export type GameEventType = GameEvent['type'];

export type GameEventListener = (event: GameEvent) => void;

export interface EngineOptions {
  /** Seed for movement cost draws; same seed and commands replay identically */
  seed?: number;
  /** Overrides settings.start_location */
  startLocationId?: LocationId;
}

/**
 * Adventure Engine
 * Owns the session's state and event log, dispatches commands, applies
 * effects and rules, and runs the win/loss checks.
 */
export class AdventureEngine {
  private readonly world: World;
  private readonly state: GameState;
  private readonly log = new EventList();
  private readonly rng: SeededRandom;
  private readonly listeners: Set<GameEventListener> = new Set();
  private readonly ctx: EffectContext;
  private turnMessages: string[] = [];

  constructor(world: World, options: EngineOptions = {}) {
    this.world = world;
    this.rng = new SeededRandom(options.seed);
    this.state = createInitialState(world, options.startLocationId);
    requireLocation(world, this.state.currentLocationId);
    this.ctx = {
      world,
      state: this.state,
      print: (message) => this.print(message),
    };
  }

  /**
   * Subscribe to game events
   */
  on(listener: GameEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private emit(event: GameEvent): void {
    this.listeners.forEach((listener) => listener(event));
  }

  private print(text: string): void {
    this.turnMessages.push(text);
    this.emit({ type: 'message', text });
  }

  /**
   * Records the starting location as the first log event. Safe to call twice.
   */
  start(): void {
    if (!this.log.isEmpty()) return;

    const location = this.getCurrentLocation();
    this.log.addEvent({ locationId: location.id, description: location.longDescription });
    this.emit({ type: 'game_started', location, state: this.state });
  }

  getState(): Readonly<GameState> {
    return this.state;
  }

  getWorld(): World {
    return this.world;
  }

  getLog(): EventList {
    return this.log;
  }

  getCurrentLocation(): Location {
    return requireLocation(this.world, this.state.currentLocationId);
  }

  /**
   * Narration for arriving at the current location: the long description the
   * first time, the brief one afterwards.
   */
  describeLocation(): string {
    const location = this.getCurrentLocation();
    if (location.visited) {
      return location.briefDescription;
    }
    location.visited = true;
    return location.longDescription;
  }

  getMenu(): MenuCommand[] {
    return [...this.world.settings.menu];
  }

  getSpecialCommands(): string[] {
    return getSpecialCommands(this.world, this.state);
  }

  getMovementCommands(): string[] {
    return getMovementCommands(this.world, this.state);
  }

  /**
   * Runs one player command. Rejected commands change nothing and are not
   * logged; accepted ones append a log event unless they failed without
   * consuming the turn (talking to nobody, an item that is not there).
   */
  execute(rawCommand: string): TurnResult {
    this.start();
    this.turnMessages = [];

    if (!this.state.ongoing) {
      this.print(UI_STRINGS.gameOver);
      return this.result(false);
    }

    const command = normalizeCommand(rawCommand);
    const classification = classifyCommand(this.world, this.state, command);
    const locationBefore = this.state.currentLocationId;

    if (classification.kind === 'invalid') {
      this.print(UI_STRINGS.invalidCommand);
      return this.result(false);
    }

    let consumed = false;
    switch (classification.kind) {
      case 'menu':
        this.runMenuCommand(classification.command);
        consumed = true;
        break;

      case 'talk':
        consumed = runTalk(this.ctx, classification.name);
        if (consumed) applyRules(this.ctx);
        break;

      case 'interaction':
        consumed = runInteraction(this.ctx, command);
        if (consumed) applyRules(this.ctx);
        break;

      case 'movement': {
        const move = applyMovement(this.ctx, classification.destination, this.rng);
        if (move.ranOutOfTime) {
          this.emit({ type: 'game_ended', outcome: 'lost', state: this.state });
        } else {
          applyRules(this.ctx);
        }
        consumed = true;
        break;
      }

      case 'item':
        consumed = runItemVerb(this.ctx, classification.verb, classification.itemName);
        if (consumed) applyRules(this.ctx);
        break;
    }

    if (consumed) {
      const location = this.getCurrentLocation();
      this.log.addEvent({ locationId: location.id, description: location.longDescription }, command);
      if (location.id !== locationBefore) {
        this.emit({ type: 'location_changed', location, state: this.state });
      }
    }

    if (this.state.ongoing) {
      this.checkWin();
    }

    this.emit({ type: 'state_changed', state: this.state });
    return this.result(true, classification.kind, consumed);
  }

  private result(accepted: boolean, kind?: CommandKind, logged = false): TurnResult {
    return { accepted, kind, logged, messages: [...this.turnMessages] };
  }

  private runMenuCommand(command: MenuCommand): void {
    switch (command) {
      case 'look':
        this.print(this.getCurrentLocation().longDescription);
        break;

      case 'inventory':
        this.printInventory();
        break;

      case 'score':
        this.print(formatString(UI_STRINGS.score, { score: this.state.score }));
        this.print(
          formatString(UI_STRINGS.status, {
            timer: this.state.movementTimer,
            health: this.state.healthBar,
            moves: this.state.movesMade,
          })
        );
        break;

      case 'log':
        this.log.format().forEach((line) => this.print(line));
        break;

      case 'search':
        searchLocation(this.ctx);
        break;

      case 'quit':
        this.state.ongoing = false;
        this.state.outcome = 'quit';
        this.print(UI_STRINGS.quit);
        this.emit({ type: 'game_ended', outcome: 'quit', state: this.state });
        break;
    }
  }

  private printInventory(): void {
    const entries = listInventory(this.state);
    if (entries.length === 0) {
      this.print(UI_STRINGS.inventoryEmpty);
      return;
    }
    this.print(UI_STRINGS.inventoryHeader);
    for (const { item, count } of entries) {
      this.print(formatString(UI_STRINGS.inventoryLine, { item: item.name, count }));
    }
    this.print(UI_STRINGS.inventoryFooter);
  }

  /**
   * Win: standing at the goal location holding every required item.
   * The remaining timer is added to the score as a bonus.
   */
  private checkWin(): boolean {
    const win = this.world.settings.win;
    if (!win || this.state.currentLocationId !== win.location) return false;
    if (!win.items.every((key) => this.state.inventory.has(key))) return false;

    const bonus = this.state.movementTimer;
    this.state.score += bonus;
    this.state.ongoing = false;
    this.state.outcome = 'won';
    this.print(formatString(UI_STRINGS.won, { bonus, score: this.state.score }));
    this.emit({ type: 'game_ended', outcome: 'won', state: this.state });
    return true;
  }
}

// Re-export types and utilities
export * from '../types';
export { evaluateCondition, requirementsMet } from './conditions';
export { applyEffect, applyEffects } from './effects';
