// Starting classes and their special moves

import type { BaseStats } from './player.js';
import type { CharacterClass, DamageType } from './enums.js';

export type MoveScaling = 'faith' | 'intelligence' | 'dexterity';

export interface MoveEffect {
  type: 'stun' | 'defense_boost' | 'evasion_boost' | 'damage_shield';
  chance?: number; // percent; absent = always
  value: number;
  duration: number;
}

export interface SpecialMove {
  id: string;
  name: string;
  staminaCost: number;
  multiplier?: number;
  flat?: number;
  scaling?: MoveScaling;
  damageType?: DamageType;
  effect?: MoveEffect;
}

export interface StartingItem {
  itemId: string;
  quantity: number;
  equip?: boolean;
}

export interface ClassDefinition {
  id: CharacterClass;
  name: string;
  description: string;
  maxHp: number;
  maxStamina: number;
  stats: BaseStats;
  startingItems: StartingItem[];
  moves: SpecialMove[];
}
