// =============================================================================
// WORLD MODEL
// =============================================================================

export type LocationId = number;

export interface Item {
  name: string; // Canonical display name; lower-cased form is the lookup key
  description: string;

  // Authoring metadata, not enforced at runtime
  startPosition: LocationId;
  targetPosition: LocationId;

  targetPoints: number;

  // Consumables
  edible: boolean;
  restoreValue: number;
  specialEffect?: string; // e.g. "energized"

  // Pickup gate and item use
  pickupRequires: Condition[];
  pickupFailMessages: string[];
  pickupSuccessMessages: string[];
  useEffects: Effect[];
}

export interface Location {
  id: LocationId;
  name: string;
  briefDescription: string;
  longDescription: string;
  availableCommands: Record<string, LocationId>; // command -> destination
  items: Item[]; // Items currently lying here (references, no counts)
  visited: boolean;
}

// =============================================================================
// CONDITIONS - Predicates gating rules, interactions, dialogue and pickups
// =============================================================================

export type Condition =
  | { type: 'flag'; flag: string; value: boolean }
  | { type: 'has_item'; item: string }
  | { type: 'lacks_item'; item: string }
  | { type: 'min_score'; value: number }
  | { type: 'min_moves'; value: number };

export type ConditionType = Condition['type'];

// =============================================================================
// EFFECTS - Ordered state mutations and output
// =============================================================================

export type Effect =
  | { type: 'print'; message: string }
  | { type: 'set_flag'; flag: string; value: boolean }
  | { type: 'spawn_item_here'; item: string }
  | { type: 'add_item_to_inventory'; item: string; count: number }
  | { type: 'remove_item_from_inventory'; item: string; count: number };

export type EffectType = Effect['type'];

// =============================================================================
// RULES, INTERACTIONS, NPCS
// =============================================================================

export interface Rule {
  minMoves: number;
  when: Condition[];
  then: Effect[];
}

export interface Interaction {
  command: string;
  locations: LocationId[];
  requires: Condition[];
  effects: Effect[];
}

export interface DialogueLine {
  text: string;
  requires: Condition[];
  effects: Effect[];
}

export interface Npc {
  name: string;
  location: LocationId;
  dialogue: DialogueLine[];
}

// =============================================================================
// SETTINGS
// =============================================================================

export type MenuCommand = 'look' | 'inventory' | 'score' | 'log' | 'search' | 'quit';

export interface WinCondition {
  location: LocationId;
  items: string[]; // Lower-cased item keys
}

export interface Settings {
  startLocation: LocationId;
  movementTimerStart: number;
  healthBarStart: number;
  hungryStart: boolean;
  timerRange: [number, number];
  hungryTimerRange: [number, number];
  healthPerMove: number;
  menu: MenuCommand[];
  win?: WinCondition;
}

// =============================================================================
// COMPLETE WORLD
// =============================================================================

export interface World {
  locations: Map<LocationId, Location>;
  items: Map<string, Item>; // Keyed by lower-cased name
  initialFlags: Record<string, boolean>;
  rules: Rule[];
  npcs: Npc[];
  interactions: Interaction[];
  settings: Settings;
}

// =============================================================================
// GAME STATE
// =============================================================================

export interface InventoryEntry {
  item: Item;
  count: number; // Always >= 1
}

export type Outcome = 'playing' | 'won' | 'lost' | 'quit';

export interface GameState {
  currentLocationId: LocationId;

  // Lower-cased item name -> entry; a key exists iff its count > 0
  inventory: Map<string, InventoryEntry>;

  flags: Record<string, boolean>;
  score: number;

  // Meters
  movementTimer: number;
  healthBar: number;
  hungry: boolean;
  energized: boolean;

  movesMade: number;
  ongoing: boolean;
  outcome: Outcome;
}

// =============================================================================
// TURNS
// =============================================================================

export type CommandKind = 'menu' | 'talk' | 'item' | 'interaction' | 'movement';

export interface TurnResult {
  accepted: boolean;
  kind?: CommandKind;
  /** An event was appended to the log for this command */
  logged: boolean;
  messages: string[];
}
