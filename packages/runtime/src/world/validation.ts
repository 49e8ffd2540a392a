/**
 * World document validation
 *
 * Cross-reference checks that a schema alone cannot express: dangling
 * location ids, unknown item names, duplicate keys. Runs on a document
 * that has already passed the structural schema.
 */

import type { EffectDocument, RequirementDocument, WorldDocument } from './schema';

export interface ValidationReport {
  errors: string[];
  warnings: string[];
  stats: {
    locations: number;
    items: number;
    rules: number;
    npcs: number;
    interactions: number;
    unreachableLocations: number[];
  };
}

/**
 * Validate a parsed world document. Errors make the document unloadable;
 * warnings describe authoring oddities the engine tolerates.
 */
export function validateWorldDocument(doc: WorldDocument): ValidationReport {
  const report: ValidationReport = {
    errors: [],
    warnings: [],
    stats: {
      locations: doc.locations.length,
      items: doc.items.length,
      rules: doc.rules.length,
      npcs: doc.npcs.length,
      interactions: doc.interactions.length,
      unreachableLocations: [],
    },
  };

  // --- Check 1: unique location ids ---
  const locationIds = new Set<number>();
  for (const loc of doc.locations) {
    if (locationIds.has(loc.id)) {
      report.errors.push(`Duplicate location id ${loc.id}`);
    }
    locationIds.add(loc.id);
  }

  // --- Check 2: item names unique ignoring case ---
  const itemKeys = new Set<string>();
  for (const item of doc.items) {
    const key = item.name.toLowerCase();
    if (itemKeys.has(key)) {
      report.errors.push(`Duplicate item name "${item.name}" (names are matched case-insensitively)`);
    }
    itemKeys.add(key);

    if (!locationIds.has(item.start_position)) {
      report.warnings.push(`Item "${item.name}" has unknown start_position ${item.start_position}`);
    }
    if (!locationIds.has(item.target_position)) {
      report.warnings.push(`Item "${item.name}" has unknown target_position ${item.target_position}`);
    }
  }

  const checkItem = (name: string, where: string) => {
    if (!itemKeys.has(name.toLowerCase())) {
      report.errors.push(`${where} references unknown item "${name}"`);
    }
  };
  const checkLocation = (id: number, where: string) => {
    if (!locationIds.has(id)) {
      report.errors.push(`${where} references unknown location ${id}`);
    }
  };
  const checkRequirement = (req: RequirementDocument | undefined, where: string) => {
    for (const name of req?.items ?? []) checkItem(name, where);
    for (const name of req?.lacks_items ?? []) checkItem(name, where);
  };
  const checkEffects = (effects: EffectDocument[], where: string) => {
    for (const effect of effects) {
      if (effect.type !== 'print' && effect.type !== 'set_flag') {
        checkItem(effect.item, `${where} (${effect.type})`);
      }
    }
  };

  // --- Check 3: location commands and item lists resolve ---
  for (const loc of doc.locations) {
    const commandKeys = new Set<string>();
    for (const [command, destination] of Object.entries(loc.available_commands)) {
      checkLocation(destination, `Location ${loc.id} command "${command}"`);
      const key = normalizeCommand(command);
      if (commandKeys.has(key)) {
        report.errors.push(
          `Location ${loc.id} has duplicate command "${command}" (commands are matched case-insensitively)`
        );
      }
      commandKeys.add(key);
    }
    for (const name of loc.items) {
      checkItem(name, `Location ${loc.id} item list`);
    }
  }

  // --- Check 4: item gates and use effects ---
  for (const item of doc.items) {
    checkRequirement(item.pickup_requires, `Item "${item.name}" pickup requirement`);
    checkEffects(item.use_effects, `Item "${item.name}" use effects`);
  }

  // --- Check 5: rules ---
  doc.rules.forEach((rule, i) => {
    checkRequirement(rule.when, `Rule ${i}`);
    checkEffects(rule.then, `Rule ${i}`);
  });

  // --- Check 6: NPCs ---
  const npcKeys = new Set<string>();
  for (const npc of doc.npcs) {
    checkLocation(npc.location, `NPC "${npc.name}"`);
    const key = `${npc.location}:${npc.name.toLowerCase()}`;
    if (npcKeys.has(key)) {
      report.errors.push(`Duplicate NPC "${npc.name}" at location ${npc.location}`);
    }
    npcKeys.add(key);
    if (npc.dialogue.length === 0) {
      report.warnings.push(`NPC "${npc.name}" has no dialogue`);
    }
    npc.dialogue.forEach((line, i) => {
      checkRequirement(line.requires, `NPC "${npc.name}" line ${i}`);
      checkEffects(line.effects, `NPC "${npc.name}" line ${i}`);
    });
  }

  // --- Check 7: interactions ---
  const menu = new Set<string>(doc.settings.menu);
  for (const interaction of doc.interactions) {
    const where = `Interaction "${interaction.command}"`;
    for (const id of interaction.locations) {
      checkLocation(id, where);
      const loc = doc.locations.find((l) => l.id === id);
      if (loc && normalizeCommand(interaction.command) in normalizeCommands(loc.available_commands)) {
        report.warnings.push(`${where} shadows the movement command at location ${id}`);
      }
    }
    if (menu.has(normalizeCommand(interaction.command))) {
      report.warnings.push(`${where} is shadowed by the menu command of the same name`);
    }
    if (normalizeCommand(interaction.command).startsWith(TALK_PREFIX)) {
      report.warnings.push(`${where} is shadowed by the talk command and can never run`);
    }
    checkRequirement(interaction.requires, where);
    checkEffects(interaction.effects, where);
  }

  // --- Check 8: settings ---
  const startLocation = doc.settings.start_location ?? doc.locations[0]?.id;
  if (startLocation !== undefined) {
    checkLocation(startLocation, 'settings.start_location');
  }
  if (doc.settings.win) {
    checkLocation(doc.settings.win.location, 'settings.win');
    for (const name of doc.settings.win.items) checkItem(name, 'settings.win');
  }

  // --- Check 9: reachability (warning only) ---
  if (startLocation !== undefined && locationIds.has(startLocation)) {
    const reached = new Set<number>([startLocation]);
    const queue = [startLocation];
    const byId = new Map(doc.locations.map((l) => [l.id, l]));
    for (let id = queue.shift(); id !== undefined; id = queue.shift()) {
      const current = byId.get(id);
      for (const next of Object.values(current?.available_commands ?? {})) {
        if (!reached.has(next)) {
          reached.add(next);
          queue.push(next);
        }
      }
    }
    report.stats.unreachableLocations = [...locationIds].filter((id) => !reached.has(id));
    for (const id of report.stats.unreachableLocations) {
      report.warnings.push(`Location ${id} is unreachable from the start location`);
    }
  }

  return report;
}

/** Prefix of the talk command; anything after it is taken as an NPC name */
export const TALK_PREFIX = 'talk ';

/** Commands are matched against trimmed, case-folded input */
export function normalizeCommand(command: string): string {
  return command.trim().toLowerCase();
}

export function normalizeCommands(commands: Record<string, number>): Record<string, number> {
  const result: Record<string, number> = {};
  for (const [command, destination] of Object.entries(commands)) {
    result[normalizeCommand(command)] = destination;
  }
  return result;
}
