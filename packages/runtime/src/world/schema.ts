import { z } from 'zod';

export const MENU_COMMANDS = ['look', 'inventory', 'score', 'log', 'search', 'quit'] as const;

const LocationIdSchema = z.number().int().nonnegative();

const CostRangeSchema = z
  .tuple([z.number().int().nonnegative(), z.number().int().nonnegative()])
  .refine(([min, max]) => min <= max, { message: 'range minimum must not exceed maximum' });

/**
 * Authored shorthand for a requirement. Every listed part must hold.
 */
export const RequirementSchema = z
  .object({
    flags: z.record(z.boolean()).optional(),
    items: z.array(z.string().min(1)).optional(),
    lacks_items: z.array(z.string().min(1)).optional(),
    min_score: z.number().int().optional(),
    min_moves: z.number().int().nonnegative().optional(),
  })
  .strict();

export const EffectSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('print'), message: z.string() }),
  z.object({ type: z.literal('set_flag'), flag: z.string().min(1), value: z.boolean() }),
  z.object({ type: z.literal('spawn_item_here'), item: z.string().min(1) }),
  z.object({
    type: z.literal('add_item_to_inventory'),
    item: z.string().min(1),
    count: z.number().int().positive().default(1),
  }),
  z.object({
    type: z.literal('remove_item_from_inventory'),
    item: z.string().min(1),
    count: z.number().int().positive().default(1),
  }),
]);

export const ItemSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  start_position: LocationIdSchema,
  target_position: LocationIdSchema,
  target_points: z.number().int(),
  edible: z.boolean().default(false),
  restore_value: z.number().int().nonnegative().default(0),
  special_effect: z.string().min(1).optional(),
  pickup_requires: RequirementSchema.optional(),
  pickup_fail_messages: z.array(z.string()).default([]),
  pickup_success_messages: z.array(z.string()).default([]),
  use_effects: z.array(EffectSchema).default([]),
});

export const LocationSchema = z.object({
  id: LocationIdSchema,
  name: z.string().min(1),
  brief_description: z.string(),
  long_description: z.string(),
  available_commands: z.record(LocationIdSchema),
  items: z.array(z.string().min(1)),
});

export const RuleSchema = z.object({
  when: RequirementSchema.default({}),
  then: z.array(EffectSchema),
});

export const InteractionSchema = z.object({
  command: z.string().min(1),
  locations: z.array(LocationIdSchema).min(1),
  requires: RequirementSchema.optional(),
  effects: z.array(EffectSchema).default([]),
});

export const NpcSchema = z.object({
  name: z.string().min(1),
  location: LocationIdSchema,
  dialogue: z.array(
    z.object({
      text: z.string(),
      requires: RequirementSchema.optional(),
      effects: z.array(EffectSchema).default([]),
    })
  ),
});

export const SettingsSchema = z
  .object({
    start_location: LocationIdSchema.optional(),
    movement_timer_start: z.number().int().nonnegative().default(120),
    health_bar_start: z.number().int().nonnegative().default(5),
    hungry_start: z.boolean().default(false),
    movement_costs: z
      .object({
        timer_range: CostRangeSchema.default([5, 8]),
        hungry_timer_range: CostRangeSchema.optional(),
        health_per_move: z.number().int().nonnegative().default(1),
      })
      .default({}),
    menu: z.array(z.enum(MENU_COMMANDS)).default([...MENU_COMMANDS]),
    win: z
      .object({
        location: LocationIdSchema,
        items: z.array(z.string().min(1)).min(1),
      })
      .optional(),
  })
  .default({});

export const WorldDocumentSchema = z.object({
  items: z.array(ItemSchema),
  locations: z.array(LocationSchema).min(1),
  initial_flags: z.record(z.boolean()).default({}),
  rules: z.array(RuleSchema).default([]),
  npcs: z.array(NpcSchema).default([]),
  interactions: z.array(InteractionSchema).default([]),
  settings: SettingsSchema,
});

export type RequirementDocument = z.output<typeof RequirementSchema>;
export type EffectDocument = z.output<typeof EffectSchema>;
export type ItemDocument = z.output<typeof ItemSchema>;
export type LocationDocument = z.output<typeof LocationSchema>;
export type WorldDocument = z.output<typeof WorldDocumentSchema>;

/** Input shape accepted by the loader, before defaults are filled in */
export type WorldDocumentInput = z.input<typeof WorldDocumentSchema>;
