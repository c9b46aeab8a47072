// Shared enumerations for combat, items and progression

export const DAMAGE_TYPES = ['physical', 'fire', 'frost', 'lightning', 'magic', 'dark'] as const;
export type DamageType = (typeof DAMAGE_TYPES)[number];

export const ITEM_KINDS = [
  'weapon',
  'armor',
  'consumable',
  'key',
  'material',
  'ring',
  'amulet',
  'catalyst',
] as const;
export type ItemKind = (typeof ITEM_KINDS)[number];

export const STANCES = ['balanced', 'aggressive', 'defensive'] as const;
export type Stance = (typeof STANCES)[number];

export const BASE_STATS = [
  'strength',
  'dexterity',
  'intelligence',
  'faith',
  'vitality',
  'endurance',
] as const;
export type BaseStat = (typeof BASE_STATS)[number];

export const CHARACTER_CLASSES = ['warrior', 'knight', 'pyromancer', 'thief'] as const;
export type CharacterClass = (typeof CHARACTER_CLASSES)[number];

export const EQUIPMENT_SLOTS = ['weapon', 'shield', 'armor', 'ring1', 'ring2', 'amulet'] as const;
export type EquipmentSlot = (typeof EQUIPMENT_SLOTS)[number];

export const OBJECTIVE_TYPES = ['item', 'kill'] as const;
export type ObjectiveType = (typeof OBJECTIVE_TYPES)[number];

export type CombatOutcome = 'ONGOING' | 'VICTORY' | 'DEFEAT' | 'FLED';

export type SessionMode = 'explore' | 'combat' | 'dialogue';
