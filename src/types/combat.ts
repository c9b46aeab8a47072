// Per-encounter combat state and turn results

import type { ActiveEffect } from './effects.js';
import type { AttackPattern, EnemyTemplate } from './enemy.js';
import type { CombatOutcome } from './enums.js';

export interface EnemyState {
  template: EnemyTemplate; // private copy, never the content template
  hp: number;
  maxHp: number;
}

export interface ComboState {
  count: number;
  lastAttackAt: number | null;
}

export interface Encounter {
  enemy: EnemyState;
  isBoss: boolean;
  patternIndex: number;
  activePatterns: AttackPattern[];
  phaseIndex: number;
  attackBonus: number;
  defenseBonus: number;
  combo: ComboState;
  enemyEffects: ActiveEffect[];
  turnNo: number;
}

export type CombatEventKind = 'PLAYER' | 'ENEMY' | 'PHASE' | 'STATUS' | 'SYSTEM';

export interface CombatEvent {
  kind: CombatEventKind;
  text: string;
  damage?: number;
}

export type CombatFailReason =
  | 'INSUFFICIENT_STAMINA'
  | 'TARGET_DEAD'
  | 'UNKNOWN_MOVE'
  | 'NO_ESTUS'
  | 'NOT_USABLE'
  | 'CANNOT_FLEE'
  | 'COMBAT_OVER';

export interface CombatTurnResult {
  ok: boolean;
  reason?: CombatFailReason;
  events: CombatEvent[];
  outcome: CombatOutcome;
}
