import type { GameState, Interaction, LocationId, MenuCommand, Npc, World } from '../types';
import { UI_STRINGS, formatString } from '../ui/strings';
import { requireLocation } from '../world/lookup';
import { TALK_PREFIX } from '../world/validation';
import { requirementsMet } from './conditions';
import { applyEffects, type EffectContext } from './effects';

export type ItemVerb = 'pick_up' | 'drop' | 'use' | 'eat';

export type Classification =
  | { kind: 'menu'; command: MenuCommand }
  | { kind: 'talk'; name: string }
  | { kind: 'interaction'; interaction: Interaction }
  | { kind: 'movement'; destination: LocationId }
  | { kind: 'item'; verb: ItemVerb; itemName: string }
  | { kind: 'invalid' };

// Longest prefix first so "pick up" wins over a shorter verb
const ITEM_VERBS: Array<[prefix: string, verb: ItemVerb]> = [
  ['pick up ', 'pick_up'],
  ['pickup ', 'pick_up'],
  ['drop ', 'drop'],
  ['use ', 'use'],
  ['eat ', 'eat'],
];

/**
 * Sweeps every global rule in authored order. Rules are neither exclusive
 * nor consumed; a rule keeps firing until its own requirement stops holding.
 */
export function applyRules(ctx: EffectContext): number {
  let fired = 0;
  for (const rule of ctx.world.rules) {
    if (ctx.state.movesMade < rule.minMoves) continue;
    if (!requirementsMet(rule.when, ctx.state)) continue;

    applyEffects(rule.then, ctx);
    fired++;
  }
  return fired;
}

export function findNpc(world: World, state: GameState, name: string): Npc | undefined {
  const wanted = name.trim().toLowerCase();
  return world.npcs.find(
    (npc) => npc.location === state.currentLocationId && npc.name.toLowerCase() === wanted
  );
}

/**
 * Talks to an NPC at the current location. The first dialogue line whose
 * requirement holds runs. Returns false when nobody by that name is here.
 */
export function runTalk(ctx: EffectContext, name: string): boolean {
  const npc = findNpc(ctx.world, ctx.state, name);
  if (!npc) {
    ctx.print(formatString(UI_STRINGS.noOneByThatName, { name: name.trim() }));
    return false;
  }

  const line = npc.dialogue.find((candidate) => requirementsMet(candidate.requires, ctx.state));
  if (!line) {
    ctx.print(formatString(UI_STRINGS.nothingNewToSay, { name: npc.name }));
    return true;
  }

  applyEffects(line.effects, ctx);
  ctx.print(line.text);
  return true;
}

export function findInteraction(world: World, state: GameState, command: string): Interaction | undefined {
  return world.interactions.find(
    (interaction) =>
      interaction.command === command && interaction.locations.includes(state.currentLocationId)
  );
}

/**
 * Runs a location interaction. An interaction whose requirement is unmet is
 * still reported as found: the player used the right command too early.
 */
export function runInteraction(ctx: EffectContext, command: string): boolean {
  const interaction = findInteraction(ctx.world, ctx.state, command);
  if (!interaction) return false;

  if (!requirementsMet(interaction.requires, ctx.state)) {
    ctx.print(UI_STRINGS.notYetPossible);
    return true;
  }

  applyEffects(interaction.effects, ctx);
  return true;
}

/**
 * Talk commands for NPCs here plus every interaction command valid here.
 * Interactions are listed whether or not their requirement currently holds.
 */
export function getSpecialCommands(world: World, state: GameState): string[] {
  const commands: string[] = [];
  for (const npc of world.npcs) {
    if (npc.location === state.currentLocationId) {
      commands.push(`${TALK_PREFIX}${npc.name.toLowerCase()}`);
    }
  }
  for (const interaction of world.interactions) {
    if (
      interaction.locations.includes(state.currentLocationId) &&
      !commands.includes(interaction.command)
    ) {
      commands.push(interaction.command);
    }
  }
  return commands;
}

export function getMovementCommands(world: World, state: GameState): string[] {
  return Object.keys(requireLocation(world, state.currentLocationId).availableCommands);
}

/**
 * Classifies a trimmed, case-folded command. Priority: menu, talk,
 * interaction, movement, item verbs.
 */
export function classifyCommand(world: World, state: GameState, command: string): Classification {
  const menu = world.settings.menu.find((entry) => entry === command);
  if (menu) {
    return { kind: 'menu', command: menu };
  }

  if (command.startsWith(TALK_PREFIX) && command.length > TALK_PREFIX.length) {
    return { kind: 'talk', name: command.slice(TALK_PREFIX.length) };
  }

  const interaction = findInteraction(world, state, command);
  if (interaction) {
    return { kind: 'interaction', interaction };
  }

  const location = requireLocation(world, state.currentLocationId);
  if (Object.hasOwn(location.availableCommands, command)) {
    return { kind: 'movement', destination: location.availableCommands[command] };
  }

  for (const [prefix, verb] of ITEM_VERBS) {
    if (command.startsWith(prefix) && command.length > prefix.length) {
      return { kind: 'item', verb, itemName: command.slice(prefix.length) };
    }
  }

  return { kind: 'invalid' };
}
