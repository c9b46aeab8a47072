// ashen_v1 content schemas: every JSON file is parsed through these on load

import { z } from 'zod';
import {
  CHARACTER_CLASSES,
  DAMAGE_TYPES,
  OBJECTIVE_TYPES,
  STANCES,
} from '../types/index.js';

const idSchema = z.string().min(1);
const damageTypeSchema = z.enum(DAMAGE_TYPES);
export const resistanceSchema = z.record(damageTypeSchema, z.number()).default({});

// ── Items ──

const itemBaseShape = {
  id: idSchema,
  name: z.string().min(1),
  description: z.string().default(''),
  value: z.number().int().nonnegative().default(0),
  weight: z.number().nonnegative().default(0),
  quantity: z.number().int().positive().default(1),
  equipped: z.boolean().default(false),
};

export const weaponItemSchema = z.object({
  ...itemBaseShape,
  itemType: z.literal('weapon'),
  kind: z.literal('weapon').default('weapon'),
  usable: z.boolean().default(false),
  equippable: z.boolean().default(true),
  weapon: z.object({
    damage: z.number().int().nonnegative(),
    damageType: damageTypeSchema.default('physical'),
    twoHanded: z.boolean().default(false),
    scaling: z.enum(['strength', 'dexterity']).optional(),
    staminaCost: z.number().int().nonnegative().default(10),
    weaponType: z.string().default('sword'),
  }),
});

export const armorItemSchema = z.object({
  ...itemBaseShape,
  itemType: z.literal('armor'),
  kind: z.literal('armor').default('armor'),
  usable: z.boolean().default(false),
  equippable: z.boolean().default(true),
  armor: z.object({
    defense: z.number().int().nonnegative(),
    armorType: z.enum(['body', 'shield']),
    resistance: resistanceSchema,
  }),
});

export const consumableItemSchema = z.object({
  ...itemBaseShape,
  itemType: z.literal('consumable'),
  kind: z.literal('consumable').default('consumable'),
  usable: z.boolean().default(true),
  equippable: z.boolean().default(false),
  effect: z.object({
    effectType: z.enum(['heal', 'stamina', 'buff']),
    value: z.number().int(),
    duration: z.number().int().nonnegative().default(0),
    buffStat: z.enum(['attack', 'defense']).optional(),
  }),
});

export const plainItemSchema = z.object({
  ...itemBaseShape,
  itemType: z.literal('item'),
  kind: z.enum(['key', 'material', 'ring', 'amulet', 'catalyst']),
  usable: z.boolean().default(false),
  equippable: z.boolean().default(false),
  accessory: z
    .object({
      defense: z.number().int().nonnegative().default(0),
      resistance: resistanceSchema,
    })
    .optional(),
});

export const itemSchema = z.discriminatedUnion('itemType', [
  weaponItemSchema,
  armorItemSchema,
  consumableItemSchema,
  plainItemSchema,
]);

// ── Enemies / bosses ──

const attackPatternSchema = z.object({
  name: z.string().min(1),
  power: z.number().int().nonnegative(),
  damageType: damageTypeSchema.default('physical'),
  text: z.string().optional(),
});

const enemySchema = z.object({
  id: idSchema,
  name: z.string().min(1),
  description: z.string().default(''),
  level: z.number().int().positive().default(1),
  maxHp: z.number().int().positive(),
  attack: z.number().int().nonnegative(),
  defense: z.number().int().nonnegative(),
  attackPatterns: z.array(attackPatternSchema).default([]),
  loot: z
    .array(
      z.object({
        itemId: idSchema,
        chance: z.number().min(0).max(1),
        min: z.number().int().positive().optional(),
        max: z.number().int().positive().optional(),
      }),
    )
    .default([]),
  essence: z.number().int().nonnegative(),
  weaknesses: z.array(damageTypeSchema).default([]),
});

const bossPhaseSchema = z.object({
  trigger: z.number().min(0).max(100),
  attackPatterns: z.array(attackPatternSchema).optional(),
  attackBonus: z.number().int().optional(),
  defenseBonus: z.number().int().optional(),
  message: z.string().optional(),
});

const bossSchema = enemySchema.extend({
  phases: z
    .array(bossPhaseSchema)
    .min(1)
    .refine(
      (phases) => phases.every((p, i) => i === 0 || p.trigger < phases[i - 1].trigger),
      { message: 'phase triggers must be strictly descending' },
    ),
});

export const enemiesFileSchema = z.array(enemySchema);
export const bossesFileSchema = z.array(bossSchema);

// ── Classes ──

const statValue = z.number().int().positive();

export const baseStatsSchema = z.object({
  strength: statValue,
  dexterity: statValue,
  intelligence: statValue,
  faith: statValue,
  vitality: statValue,
  endurance: statValue,
});

const specialMoveSchema = z
  .object({
    id: idSchema,
    name: z.string().min(1),
    staminaCost: z.number().int().nonnegative(),
    multiplier: z.number().positive().optional(),
    flat: z.number().int().nonnegative().optional(),
    scaling: z.enum(['faith', 'intelligence', 'dexterity']).optional(),
    damageType: damageTypeSchema.optional(),
    effect: z
      .object({
        type: z.enum(['stun', 'defense_boost', 'evasion_boost', 'damage_shield']),
        chance: z.number().min(0).max(100).optional(),
        value: z.number().int().nonnegative(),
        duration: z.number().int().positive(),
      })
      .optional(),
  })
  .refine((m) => (m.multiplier === undefined) !== (m.flat === undefined), {
    message: 'a move needs exactly one of multiplier or flat',
  });

export const classesFileSchema = z.array(
  z.object({
    id: z.enum(CHARACTER_CLASSES),
    name: z.string().min(1),
    description: z.string().default(''),
    maxHp: z.number().int().positive(),
    maxStamina: z.number().int().positive(),
    stats: baseStatsSchema,
    startingItems: z
      .array(
        z.object({
          itemId: idSchema,
          quantity: z.number().int().positive().default(1),
          equip: z.boolean().optional(),
        }),
      )
      .default([]),
    moves: z.array(specialMoveSchema).default([]),
  }),
);

// ── World ──

const conditionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('item'), itemId: idSchema }),
  z.object({ type: z.literal('quest_complete'), questId: idSchema }),
  z.object({ type: z.literal('flag'), flag: idSchema }),
]);

export const locationsFileSchema = z.array(
  z.object({
    id: idSchema,
    name: z.string().min(1),
    description: z.string().default(''),
    region: z.string().default('unknown'),
    connections: z.record(z.string(), idSchema).default({}),
    enemies: z.array(idSchema).default([]),
    items: z.array(idSchema).default([]),
    npcs: z.array(idSchema).default([]),
    isBeacon: z.boolean().default(false),
    isBossArea: z.boolean().default(false),
    firstVisitText: z.string().optional(),
    visitRequirement: conditionSchema.optional(),
  }),
);

const dialogueNodeSchema = z.object({
  text: z.string().min(1),
  options: z
    .array(
      z.object({
        text: z.string().min(1),
        next: idSchema.optional(),
        relationship: z.number().int().optional(),
        setFlag: idSchema.optional(),
        startQuest: idSchema.optional(),
        questProgress: z
          .object({
            questId: idSchema,
            type: z.enum(OBJECTIVE_TYPES),
            amount: z.number().int().positive(),
          })
          .optional(),
        condition: conditionSchema.optional(),
      }),
    )
    .optional(),
});

export const npcsFileSchema = z.array(
  z.object({
    id: idSchema,
    name: z.string().min(1),
    description: z.string().default(''),
    dialogue: z
      .record(z.string(), dialogueNodeSchema)
      .refine((d) => 'greeting' in d, { message: 'dialogue needs a "greeting" node' }),
    shop: z.array(idSchema).optional(),
    faction: z.string().optional(),
  }),
);

export const questsFileSchema = z.array(
  z.object({
    id: idSchema,
    name: z.string().min(1),
    description: z.string().default(''),
    objectives: z
      .array(
        z.object({
          type: z.enum(OBJECTIVE_TYPES),
          target: idSchema,
          quantity: z.number().int().positive(),
        }),
      )
      .min(1),
    rewards: z
      .object({
        essence: z.number().int().nonnegative().optional(),
        itemId: idSchema.optional(),
        faction: z.string().optional(),
        reputation: z.number().int().optional(),
        lore: idSchema.optional(),
      })
      .default({}),
  }),
);

export const loreFileSchema = z.record(z.string(), z.string());

export const playerDefaultsSchema = z.object({
  startLocationId: idSchema,
  estusMax: z.number().int().nonnegative().default(3),
  stance: z.enum(STANCES).default('balanced'),
});

/** zod issues → `path: message` lines (same shape the CLI prints) */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
}
