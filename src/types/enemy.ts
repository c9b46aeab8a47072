// Enemy / Boss templates and per-encounter runtime state

import type { DamageType } from './enums.js';

export interface AttackPattern {
  name: string;
  power: number;
  damageType: DamageType;
  text?: string;
}

export interface LootEntry {
  itemId: string;
  chance: number; // 0~1
  min?: number;
  max?: number;
}

export interface EnemyDefinition {
  id: string;
  name: string;
  description: string;
  level: number;
  maxHp: number;
  attack: number;
  defense: number;
  attackPatterns: AttackPattern[];
  loot: LootEntry[];
  essence: number;
  weaknesses: DamageType[];
}

export interface BossPhase {
  trigger: number; // hp %, descending across the list
  attackPatterns?: AttackPattern[];
  attackBonus?: number;
  defenseBonus?: number;
  message?: string;
}

export interface BossDefinition extends EnemyDefinition {
  phases: BossPhase[];
}

export type EnemyTemplate = EnemyDefinition | BossDefinition;

export function isBoss(template: EnemyTemplate): template is BossDefinition {
  return 'phases' in template && template.phases.length > 0;
}
