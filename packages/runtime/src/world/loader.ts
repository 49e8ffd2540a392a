import type {
  Condition,
  Effect,
  Item,
  Location,
  Settings,
  World,
} from '../types';
import { WorldLoadError } from '../errors';
import {
  WorldDocumentSchema,
  type EffectDocument,
  type RequirementDocument,
  type WorldDocument,
} from './schema';
import { normalizeCommand, normalizeCommands, validateWorldDocument, type ValidationReport } from './validation';

/**
 * Parses an untyped document (usually the result of JSON.parse) against the
 * world schema. Structural problems are reported all at once.
 */
export function parseWorldDocument(raw: unknown): WorldDocument {
  const result = WorldDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new WorldLoadError(
      result.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
      })
    );
  }
  return result.data;
}

/**
 * Builds the world model from a raw document. Throws WorldLoadError when the
 * document is malformed or has dangling references.
 */
export function loadWorld(raw: unknown): World {
  return loadWorldWithReport(raw).world;
}

/**
 * Same as loadWorld, but also hands back the validation report so callers can
 * surface warnings.
 */
export function loadWorldWithReport(raw: unknown): { world: World; report: ValidationReport } {
  const doc = parseWorldDocument(raw);
  const report = validateWorldDocument(doc);
  if (report.errors.length > 0) {
    throw new WorldLoadError(report.errors);
  }
  return { world: buildWorld(doc), report };
}

function buildWorld(doc: WorldDocument): World {
  const items = new Map<string, Item>();
  for (const data of doc.items) {
    items.set(data.name.toLowerCase(), {
      name: data.name,
      description: data.description,
      startPosition: data.start_position,
      targetPosition: data.target_position,
      targetPoints: data.target_points,
      edible: data.edible,
      restoreValue: data.restore_value,
      specialEffect: data.special_effect,
      pickupRequires: toConditions(data.pickup_requires),
      pickupFailMessages: data.pickup_fail_messages,
      pickupSuccessMessages: data.pickup_success_messages,
      useEffects: toEffects(data.use_effects),
    });
  }

  const locations = new Map<number, Location>();
  for (const data of doc.locations) {
    locations.set(data.id, {
      id: data.id,
      name: data.name,
      briefDescription: data.brief_description,
      longDescription: data.long_description,
      availableCommands: normalizeCommands(data.available_commands),
      items: data.items.map((name) => lookup(items, name)),
      visited: false,
    });
  }

  const { settings } = doc;
  const costs = settings.movement_costs;
  const timerRange: [number, number] = [costs.timer_range[0], costs.timer_range[1]];
  const resolved: Settings = {
    startLocation: settings.start_location ?? doc.locations[0].id,
    movementTimerStart: settings.movement_timer_start,
    healthBarStart: settings.health_bar_start,
    hungryStart: settings.hungry_start,
    timerRange,
    hungryTimerRange: costs.hungry_timer_range
      ? [costs.hungry_timer_range[0], costs.hungry_timer_range[1]]
      : [timerRange[0] * 2, timerRange[1] * 2],
    healthPerMove: costs.health_per_move,
    menu: [...new Set(settings.menu)],
    win: settings.win
      ? {
          location: settings.win.location,
          items: settings.win.items.map((name) => name.toLowerCase()),
        }
      : undefined,
  };

  return {
    locations,
    items,
    initialFlags: { ...doc.initial_flags },
    rules: doc.rules.map((rule) => ({
      minMoves: rule.when.min_moves ?? 0,
      when: toConditions({ ...rule.when, min_moves: undefined }),
      then: toEffects(rule.then),
    })),
    npcs: doc.npcs.map((npc) => ({
      name: npc.name,
      location: npc.location,
      dialogue: npc.dialogue.map((line) => ({
        text: line.text,
        requires: toConditions(line.requires),
        effects: toEffects(line.effects),
      })),
    })),
    interactions: doc.interactions.map((interaction) => ({
      command: normalizeCommand(interaction.command),
      locations: [...interaction.locations],
      requires: toConditions(interaction.requires),
      effects: toEffects(interaction.effects),
    })),
    settings: resolved,
  };
}

/**
 * Expands the authored requirement shorthand into tagged conditions.
 * Item names become lower-cased keys.
 */
export function toConditions(req: RequirementDocument | undefined): Condition[] {
  if (!req) return [];

  const conditions: Condition[] = [];
  for (const [flag, value] of Object.entries(req.flags ?? {})) {
    conditions.push({ type: 'flag', flag, value });
  }
  for (const name of req.items ?? []) {
    conditions.push({ type: 'has_item', item: name.toLowerCase() });
  }
  for (const name of req.lacks_items ?? []) {
    conditions.push({ type: 'lacks_item', item: name.toLowerCase() });
  }
  if (req.min_score !== undefined) {
    conditions.push({ type: 'min_score', value: req.min_score });
  }
  if (req.min_moves !== undefined) {
    conditions.push({ type: 'min_moves', value: req.min_moves });
  }
  return conditions;
}

function toEffects(effects: EffectDocument[]): Effect[] {
  return effects.map((effect): Effect => {
    switch (effect.type) {
      case 'print':
      case 'set_flag':
        return { ...effect };
      case 'spawn_item_here':
        return { type: effect.type, item: effect.item.toLowerCase() };
      case 'add_item_to_inventory':
      case 'remove_item_from_inventory':
        return { type: effect.type, item: effect.item.toLowerCase(), count: effect.count };
    }
  });
}

function lookup(items: Map<string, Item>, name: string): Item {
  const item = items.get(name.toLowerCase());
  if (!item) {
    // Validation already rejects dangling item references
    throw new WorldLoadError([`Unknown item "${name}"`]);
  }
  return item;
}
