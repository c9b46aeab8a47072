// Player record: resources, stats, inventory/equipment, progression bookkeeping

import type { ActiveEffect } from './effects.js';
import type {
  BaseStat,
  CharacterClass,
  EquipmentSlot,
  ObjectiveType,
  Stance,
} from './enums.js';
import type { Item } from './item.js';

export type BaseStats = Record<BaseStat, number>;

export type Equipment = Record<EquipmentSlot, string | null>; // slot → item id

export interface EstusFlask {
  current: number;
  max: number;
}

export interface LostEssence {
  amount: number;
  locationId: string;
}

export interface QuestLog {
  active: Record<string, Partial<Record<ObjectiveType, number>>>;
  completed: string[];
}

export interface Player {
  name: string;
  characterClass: CharacterClass;
  level: number;
  essence: number;
  lostEssence: LostEssence | null;
  hp: number;
  maxHp: number;
  stamina: number;
  maxStamina: number;
  estus: EstusFlask;
  stats: BaseStats;
  inventory: Item[];
  equipment: Equipment;
  stance: Stance;
  currentLocationId: string;
  discoveredLocations: string[]; // discovery order
  killCounts: Record<string, number>;
  quests: QuestLog;
  effects: ActiveEffect[];
  flags: Record<string, boolean>;
  factionReputation: Record<string, number>;
  unlockedLore: string[];
}

export function emptyEquipment(): Equipment {
  return { weapon: null, shield: null, armor: null, ring1: null, ring2: null, amulet: null };
}
