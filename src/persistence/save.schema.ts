// Save-file shape. Items are stored with an `item_type` tag and rebuilt through the content item schema.

import { z } from 'zod';
import { baseStatsSchema, itemSchema } from '../content/content.schema.js';
import {
  CHARACTER_CLASSES,
  OBJECTIVE_TYPES,
  STANCES,
  type Item,
  type ItemType,
} from '../types/index.js';

export const ITEM_TYPE_TAGS = ['weapon', 'armor', 'consumable', 'item'] as const satisfies readonly ItemType[];

export type ItemRecord = Omit<Item, 'itemType'> & { item_type: ItemType };

export function toItemRecord(item: Item): ItemRecord {
  const { itemType, ...rest } = item;
  return { item_type: itemType, ...rest };
}

export const savedItemSchema = z
  .object({ item_type: z.enum(ITEM_TYPE_TAGS) })
  .passthrough()
  .transform(({ item_type, ...rest }) => ({ ...rest, itemType: item_type }))
  .pipe(itemSchema);

const effectSchema = z.object({
  type: z.enum(['stun', 'defense_boost', 'evasion_boost', 'damage_shield', 'attack_boost']),
  value: z.number(),
  duration: z.number().int(),
  source: z.string(),
  permanent: z.boolean().optional(),
});

const slotSchema = z.string().nullable().default(null);

export const savedPlayerSchema = z
  .object({
    name: z.string().min(1),
    characterClass: z.enum(CHARACTER_CLASSES),
    level: z.number().int().positive(),
    essence: z.number().int().nonnegative(),
    lostEssence: z
      .object({ amount: z.number().int().nonnegative(), locationId: z.string() })
      .nullable()
      .default(null),
    hp: z.number().int().nonnegative(),
    maxHp: z.number().int().positive(),
    stamina: z.number().int().nonnegative(),
    maxStamina: z.number().int().positive(),
    estus: z.object({ current: z.number().int().nonnegative(), max: z.number().int().nonnegative() }),
    stats: baseStatsSchema,
    inventory: z.array(savedItemSchema),
    equipment: z.object({
      weapon: slotSchema,
      shield: slotSchema,
      armor: slotSchema,
      ring1: slotSchema,
      ring2: slotSchema,
      amulet: slotSchema,
    }),
    stance: z.enum(STANCES).default('balanced'),
    currentLocationId: z.string().min(1),
    discoveredLocations: z.array(z.string()).default([]),
    killCounts: z.record(z.string(), z.number().int().nonnegative()).default({}),
    quests: z
      .object({
        active: z.record(z.string(), z.record(z.enum(OBJECTIVE_TYPES), z.number().int().nonnegative())),
        completed: z.array(z.string()),
      })
      .default({ active: {}, completed: [] }),
    effects: z.array(effectSchema).default([]),
    flags: z.record(z.string(), z.boolean()).default({}),
    factionReputation: z.record(z.string(), z.number()).default({}),
    unlockedLore: z.array(z.string()).default([]),
  })
  .refine((p) => p.hp <= p.maxHp && p.stamina <= p.maxStamina, {
    message: 'hp/stamina exceed their maximum',
  })
  .refine((p) => p.estus.current <= p.estus.max, { message: 'estus charges exceed the flask' });

export const savedWorldSchema = z.object({
  locations: z.record(
    z.string(),
    z.object({ visited: z.boolean(), items: z.array(z.string()) }),
  ),
  npcs: z.record(
    z.string(),
    z.object({ met: z.boolean(), relationship: z.number(), currentNode: z.string() }),
  ),
  defeatedBosses: z.array(z.string()).default([]),
});

export const saveFileSchema = z.object({
  version: z.string(),
  timestamp: z.string(),
  player: savedPlayerSchema,
  world: savedWorldSchema,
  rng: z.object({ seed: z.string(), cursor: z.number().int().nonnegative() }).optional(),
});

export type SaveFile = z.infer<typeof saveFileSchema>;
